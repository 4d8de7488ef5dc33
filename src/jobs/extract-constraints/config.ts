import type { ConceptConfig } from '../ConceptConfig.js';
import type { ResultArrays } from '../schemaParts.js';
import { validator } from '../../utils/validators.js';
import { CONSTRAINTS_PROMPT } from './prompt.js';
import {
  candidateConstraintClassSchema,
  constraintIndividualSchema,
  constraintResultSchema,
  type CandidateConstraintClass,
  type ConstraintIndividual,
} from './schema.js';

/**
 * Constraints Extraction Configuration
 */
const config: ConceptConfig<CandidateConstraintClass, ConstraintIndividual> = {
  concept: 'constraints',
  description: 'Limits on permissible action and their instances in the case',

  step: 2,
  modelTier: 'powerful',
  temperature: 0.2,
  maxTokens: 8192,

  classesKey: 'new_constraint_classes',
  individualsKey: 'constraint_individuals',
  classRefField: 'constraint_class',
  categoryField: 'constraint_type',
  ontologyCategory: 'Constraint',

  enumFields: ['constraint_type', 'flexibility', 'severity'],

  summaryFields: {
    classRefKey: 'constraintClass',
    descriptorKeys: ['constraintStatement', 'constrainedEntity'],
  },

  fieldRequirements: {
    classRequired:
      'label, definition, confidence (float 0-1), match_decision, constraint_type, flexibility, text_references',
    individualRequired:
      'identifier, constraint_class, confidence (float 0-1), severity, text_references',
  },

  crossConceptDependencies: {
    dependsOn: ['obligations', 'states', 'resources'],
    instruction:
      'The following OBLIGATIONS, STATES, and RESOURCES were identified. Identify constraints that limit or affect the fulfillment of these obligations within the given states and available resources.',
  },

  promptTemplate: CONSTRAINTS_PROMPT,

  schemas: {
    candidate: candidateConstraintClassSchema,
    individual: constraintIndividualSchema,
    result: constraintResultSchema,
  },

  validators: {
    candidate: validator.compile<CandidateConstraintClass>(candidateConstraintClassSchema),
    individual: validator.compile<ConstraintIndividual>(constraintIndividualSchema),
    result: validator.compile<ResultArrays<CandidateConstraintClass, ConstraintIndividual>>(constraintResultSchema),
  },

  classRef(individual) {
    return individual.constraint_class;
  },

  category(candidate) {
    return candidate.constraint_type;
  },

  describe(individual) {
    return individual.constraint_statement;
  },
};

export default config;
