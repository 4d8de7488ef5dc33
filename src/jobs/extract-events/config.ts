import type { ConceptConfig } from '../ConceptConfig.js';
import type { ResultArrays } from '../schemaParts.js';
import { validator } from '../../utils/validators.js';
import { EVENTS_PROMPT } from './prompt.js';
import {
  candidateEventClassSchema,
  eventIndividualSchema,
  eventResultSchema,
  type CandidateEventClass,
  type EventIndividual,
} from './schema.js';

/**
 * Events Extraction Configuration
 */
const config: ConceptConfig<CandidateEventClass, EventIndividual> = {
  concept: 'events',
  description: 'Unchosen occurrences and the timeline of events in the case',

  step: 3,
  modelTier: 'default',
  temperature: 0.7,
  maxTokens: 8192,

  classesKey: 'new_event_classes',
  individualsKey: 'event_individuals',
  classRefField: 'event_class',
  categoryField: 'event_category',
  ontologyCategory: 'Event',

  enumFields: ['event_category', 'causal_position'],

  promptTemplate: EVENTS_PROMPT,

  schemas: {
    candidate: candidateEventClassSchema,
    individual: eventIndividualSchema,
    result: eventResultSchema,
  },

  validators: {
    candidate: validator.compile<CandidateEventClass>(candidateEventClassSchema),
    individual: validator.compile<EventIndividual>(eventIndividualSchema),
    result: validator.compile<ResultArrays<CandidateEventClass, EventIndividual>>(eventResultSchema),
  },

  classRef(individual) {
    return individual.event_class;
  },

  category(candidate) {
    return candidate.event_category;
  },
};

export default config;
