import type { ConceptConfig } from '../ConceptConfig.js';
import type { ResultArrays } from '../schemaParts.js';
import { validator } from '../../utils/validators.js';
import { ACTIONS_PROMPT } from './prompt.js';
import {
  actionIndividualSchema,
  actionResultSchema,
  candidateActionClassSchema,
  type ActionIndividual,
  type CandidateActionClass,
} from './schema.js';

/**
 * Actions Extraction Configuration
 *
 * Pass 3 (temporal). No descriptor field: an action individual's graph
 * definition falls back to its description.
 */
const config: ConceptConfig<CandidateActionClass, ActionIndividual> = {
  concept: 'actions',
  description: 'Deliberate actions and the timeline of actions taken in the case',

  step: 3,
  modelTier: 'default',
  temperature: 0.7,
  maxTokens: 8192,

  classesKey: 'new_action_classes',
  individualsKey: 'action_individuals',
  classRefField: 'action_class',
  categoryField: 'action_category',
  ontologyCategory: 'Action',

  enumFields: ['action_category'],

  promptTemplate: ACTIONS_PROMPT,

  schemas: {
    candidate: candidateActionClassSchema,
    individual: actionIndividualSchema,
    result: actionResultSchema,
  },

  validators: {
    candidate: validator.compile<CandidateActionClass>(candidateActionClassSchema),
    individual: validator.compile<ActionIndividual>(actionIndividualSchema),
    result: validator.compile<ResultArrays<CandidateActionClass, ActionIndividual>>(actionResultSchema),
  },

  classRef(individual) {
    return individual.action_class;
  },

  category(candidate) {
    return candidate.action_category;
  },
};

export default config;
