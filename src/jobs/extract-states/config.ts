import type { ConceptConfig } from '../ConceptConfig.js';
import type { ResultArrays } from '../schemaParts.js';
import { validator } from '../../utils/validators.js';
import { STATES_PROMPT } from './prompt.js';
import {
  candidateStateClassSchema,
  stateIndividualSchema,
  stateResultSchema,
  type CandidateStateClass,
  type StateIndividual,
} from './schema.js';

/**
 * States Extraction Configuration
 *
 * Pass 1. State categories that have no intermediate class map onto the
 * core State class (see data/category-iris.json).
 */
const config: ConceptConfig<CandidateStateClass, StateIndividual> = {
  concept: 'states',
  description: 'Situational states (conflicts, risks, emergencies) and their occurrences in the case',

  step: 1,
  modelTier: 'powerful',
  temperature: 0.3,
  maxTokens: 8192,

  classesKey: 'new_state_classes',
  individualsKey: 'state_individuals',
  classRefField: 'state_class',
  categoryField: 'state_category',
  ontologyCategory: 'State',

  enumFields: ['state_category', 'persistence_type', 'urgency_level'],

  summaryFields: { classRefKey: 'stateClass', descriptorKeys: ['subject', 'triggeringEvent'] },

  promptTemplate: STATES_PROMPT,

  schemas: {
    candidate: candidateStateClassSchema,
    individual: stateIndividualSchema,
    result: stateResultSchema,
  },

  validators: {
    candidate: validator.compile<CandidateStateClass>(candidateStateClassSchema),
    individual: validator.compile<StateIndividual>(stateIndividualSchema),
    result: validator.compile<ResultArrays<CandidateStateClass, StateIndividual>>(stateResultSchema),
  },

  classRef(individual) {
    return individual.state_class;
  },

  category(candidate) {
    return candidate.state_category;
  },

  describe(individual) {
    return individual.subject;
  },
};

export default config;
