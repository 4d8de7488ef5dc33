import type { ConceptConfig } from '../ConceptConfig.js';
import type { ResultArrays } from '../schemaParts.js';
import { validator } from '../../utils/validators.js';
import { RESOURCES_PROMPT } from './prompt.js';
import {
  candidateResourceClassSchema,
  resourceIndividualSchema,
  resourceResultSchema,
  type CandidateResourceClass,
  type ResourceIndividual,
} from './schema.js';

/**
 * Resources Extraction Configuration
 */
const config: ConceptConfig<CandidateResourceClass, ResourceIndividual> = {
  concept: 'resources',
  description: 'Codes, standards, precedents and other resources cited in the case',

  step: 1,
  modelTier: 'powerful',
  temperature: 0.3,
  maxTokens: 8192,

  classesKey: 'new_resource_classes',
  individualsKey: 'resource_individuals',
  classRefField: 'resource_class',
  categoryField: 'resource_category',
  ontologyCategory: 'Resource',

  enumFields: ['resource_category'],

  summaryFields: { classRefKey: 'resourceClass', descriptorKeys: ['usedInContext', 'documentTitle'] },

  promptTemplate: RESOURCES_PROMPT,

  schemas: {
    candidate: candidateResourceClassSchema,
    individual: resourceIndividualSchema,
    result: resourceResultSchema,
  },

  validators: {
    candidate: validator.compile<CandidateResourceClass>(candidateResourceClassSchema),
    individual: validator.compile<ResourceIndividual>(resourceIndividualSchema),
    result: validator.compile<ResultArrays<CandidateResourceClass, ResourceIndividual>>(resourceResultSchema),
  },

  classRef(individual) {
    return individual.resource_class;
  },

  category(candidate) {
    return candidate.resource_category;
  },

  describe(individual) {
    return individual.used_in_context;
  },
};

export default config;
