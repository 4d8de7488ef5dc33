import type { ConceptConfig } from '../ConceptConfig.js';
import type { ResultArrays } from '../schemaParts.js';
import { validator } from '../../utils/validators.js';
import { OBLIGATIONS_PROMPT } from './prompt.js';
import {
  candidateObligationClassSchema,
  obligationIndividualSchema,
  obligationResultSchema,
  type CandidateObligationClass,
  type ObligationIndividual,
} from './schema.js';

/**
 * Obligations Extraction Configuration
 */
const config: ConceptConfig<CandidateObligationClass, ObligationIndividual> = {
  concept: 'obligations',
  description: 'Professional duties and their concrete instances in the case',

  step: 2,
  modelTier: 'powerful',
  temperature: 0.2,
  maxTokens: 8192,

  classesKey: 'new_obligation_classes',
  individualsKey: 'obligation_individuals',
  classRefField: 'obligation_class',
  categoryField: 'obligation_type',
  ontologyCategory: 'Obligation',

  enumFields: ['obligation_type', 'enforcement_level', 'compliance_status'],

  summaryFields: {
    classRefKey: 'obligationClass',
    descriptorKeys: ['obligationStatement', 'obligatedParty'],
  },

  fieldRequirements: {
    classRequired:
      'label, definition, confidence (float 0-1), match_decision, obligation_type, enforcement_level, text_references',
    individualRequired: 'identifier, obligation_class, confidence (float 0-1), text_references',
    matchDecisionNote: 'Every new class MUST include a match_decision object.',
  },

  crossConceptDependencies: {
    dependsOn: ['principles', 'roles'],
    instruction:
      'The following PRINCIPLES and ROLES were identified. Derive specific obligations from these principles for each role.',
  },

  promptTemplate: OBLIGATIONS_PROMPT,

  schemas: {
    candidate: candidateObligationClassSchema,
    individual: obligationIndividualSchema,
    result: obligationResultSchema,
  },

  validators: {
    candidate: validator.compile<CandidateObligationClass>(candidateObligationClassSchema),
    individual: validator.compile<ObligationIndividual>(obligationIndividualSchema),
    result: validator.compile<ResultArrays<CandidateObligationClass, ObligationIndividual>>(obligationResultSchema),
  },

  classRef(individual) {
    return individual.obligation_class;
  },

  category(candidate) {
    return candidate.obligation_type;
  },

  describe(individual) {
    return individual.obligation_statement;
  },
};

export default config;
