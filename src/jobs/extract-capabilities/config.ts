import type { ConceptConfig } from '../ConceptConfig.js';
import type { ResultArrays } from '../schemaParts.js';
import { validator } from '../../utils/validators.js';
import { CAPABILITIES_PROMPT } from './prompt.js';
import {
  candidateCapabilityClassSchema,
  capabilityIndividualSchema,
  capabilityResultSchema,
  type CandidateCapabilityClass,
  type CapabilityIndividual,
} from './schema.js';

/**
 * Capabilities Extraction Configuration
 */
const config: ConceptConfig<CandidateCapabilityClass, CapabilityIndividual> = {
  concept: 'capabilities',
  description: 'Competences needed to meet obligations, and who has them',

  step: 2,
  modelTier: 'powerful',
  temperature: 0.2,
  maxTokens: 8192,

  classesKey: 'new_capability_classes',
  individualsKey: 'capability_individuals',
  classRefField: 'capability_class',
  categoryField: 'capability_category',
  ontologyCategory: 'Capability',

  enumFields: ['capability_category', 'skill_level', 'proficiency_level'],

  summaryFields: {
    classRefKey: 'capabilityClass',
    descriptorKeys: ['capabilityStatement', 'possessedBy'],
  },

  fieldRequirements: {
    classRequired:
      'label, definition, confidence (float 0-1), match_decision, capability_category, skill_level, text_references',
    individualRequired: 'identifier, capability_class, confidence (float 0-1), text_references',
  },

  crossConceptDependencies: {
    dependsOn: ['obligations', 'roles'],
    instruction:
      'The following OBLIGATIONS and ROLES were identified. Identify capabilities needed by each role to fulfill these obligations.',
  },

  promptTemplate: CAPABILITIES_PROMPT,

  schemas: {
    candidate: candidateCapabilityClassSchema,
    individual: capabilityIndividualSchema,
    result: capabilityResultSchema,
  },

  validators: {
    candidate: validator.compile<CandidateCapabilityClass>(candidateCapabilityClassSchema),
    individual: validator.compile<CapabilityIndividual>(capabilityIndividualSchema),
    result: validator.compile<ResultArrays<CandidateCapabilityClass, CapabilityIndividual>>(capabilityResultSchema),
  },

  classRef(individual) {
    return individual.capability_class;
  },

  category(candidate) {
    return candidate.capability_category;
  },

  describe(individual) {
    return individual.capability_statement;
  },
};

export default config;
