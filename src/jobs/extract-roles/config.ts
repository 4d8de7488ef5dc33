import type { ConceptConfig } from '../ConceptConfig.js';
import type { ResultArrays } from '../schemaParts.js';
import { validator } from '../../utils/validators.js';
import { ROLES_PROMPT } from './prompt.js';
import {
  candidateRoleClassSchema,
  roleIndividualSchema,
  roleResultSchema,
  type CandidateRoleClass,
  type RoleIndividual,
} from './schema.js';

/**
 * Roles Extraction Configuration
 *
 * Pass 1 (contextual). Roles come first in the pipeline: later concepts
 * (principles, obligations, capabilities) receive them as context.
 */
const config: ConceptConfig<CandidateRoleClass, RoleIndividual> = {
  concept: 'roles',

  description:
    'Professional roles (classes) and the people or organisations occupying them (individuals)',

  step: 1,
  modelTier: 'powerful',
  temperature: 0.3,
  maxTokens: 8192,

  classesKey: 'new_role_classes',
  individualsKey: 'role_individuals',
  classRefField: 'role_class',
  categoryField: 'role_category',
  ontologyCategory: 'Role',

  enumFields: ['role_category'],

  summaryFields: { classRefKey: 'roleClass', descriptorKeys: ['caseInvolvement'] },

  promptTemplate: ROLES_PROMPT,

  schemas: {
    candidate: candidateRoleClassSchema,
    individual: roleIndividualSchema,
    result: roleResultSchema,
  },

  validators: {
    candidate: validator.compile<CandidateRoleClass>(candidateRoleClassSchema),
    individual: validator.compile<RoleIndividual>(roleIndividualSchema),
    result: validator.compile<ResultArrays<CandidateRoleClass, RoleIndividual>>(roleResultSchema),
  },

  classRef(individual) {
    return individual.role_class;
  },

  category(candidate) {
    return candidate.role_category;
  },

  describe(individual) {
    return individual.case_involvement;
  },
};

export default config;
