import type { ConceptConfig } from '../ConceptConfig.js';
import type { ResultArrays } from '../schemaParts.js';
import { validator } from '../../utils/validators.js';
import { PRINCIPLES_PROMPT } from './prompt.js';
import {
  candidatePrincipleClassSchema,
  principleIndividualSchema,
  principleResultSchema,
  type CandidatePrincipleClass,
  type PrincipleIndividual,
} from './schema.js';

/**
 * Principles Extraction Configuration
 *
 * First concept of pass 2 (normative). Runs hotter than the other
 * normative concepts: principles are stated abstractly and benefit from
 * broader phrasing.
 */
const config: ConceptConfig<CandidatePrincipleClass, PrincipleIndividual> = {
  concept: 'principles',
  description: 'Ethical principles and the places the case invokes them',

  step: 2,
  modelTier: 'powerful',
  temperature: 0.5,
  maxTokens: 8192,

  classesKey: 'new_principle_classes',
  individualsKey: 'principle_individuals',
  classRefField: 'principle_class',
  categoryField: 'principle_category',
  ontologyCategory: 'Principle',

  enumFields: ['principle_category'],

  summaryFields: {
    classRefKey: 'principleClass',
    descriptorKeys: ['concreteExpression', 'interpretation'],
  },

  fieldRequirements: {
    classRequired:
      'label, definition, confidence (float 0-1), match_decision (object with matches_existing, matched_label, confidence, reasoning), principle_category (fundamental_ethical | professional_virtue | relational | domain_specific), text_references (list of direct quotes)',
    individualRequired:
      'identifier, principle_class, confidence (float 0-1), text_references (list of direct quotes)',
    matchDecisionNote:
      'Every new class MUST include a match_decision object. If the class matches an existing ontology class, set matches_existing=true and matched_label to the existing label.',
  },

  crossConceptDependencies: {
    dependsOn: ['roles'],
    instruction:
      "The following ROLES were identified in this case. Consider which ethical principles apply to each role's professional responsibilities.",
  },

  promptTemplate: PRINCIPLES_PROMPT,

  schemas: {
    candidate: candidatePrincipleClassSchema,
    individual: principleIndividualSchema,
    result: principleResultSchema,
  },

  validators: {
    candidate: validator.compile<CandidatePrincipleClass>(candidatePrincipleClassSchema),
    individual: validator.compile<PrincipleIndividual>(principleIndividualSchema),
    result: validator.compile<ResultArrays<CandidatePrincipleClass, PrincipleIndividual>>(principleResultSchema),
  },

  classRef(individual) {
    return individual.principle_class;
  },

  category(candidate) {
    return candidate.principle_category;
  },

  describe(individual) {
    return individual.concrete_expression;
  },
};

export default config;
