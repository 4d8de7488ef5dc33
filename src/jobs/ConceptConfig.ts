import type { SchemaObject, ValidateFunction } from 'ajv';
import type { BaseCandidate, BaseIndividual, ResultArrays } from './schemaParts.js';

/**
 * The nine extraction targets, in pipeline order
 */
export const CONCEPT_TYPES = [
  'roles',
  'states',
  'resources',
  'principles',
  'obligations',
  'constraints',
  'capabilities',
  'actions',
  'events',
] as const;

export type ConceptType = (typeof CONCEPT_TYPES)[number];

export type PassNumber = 1 | 2 | 3;

export type ModelTier = 'default' | 'powerful';

export function isConceptType(value: string): value is ConceptType {
  return CONCEPT_TYPES.some((concept) => concept === value);
}

/**
 * Required-field reminder appended to the end of the prompt
 */
export interface FieldRequirements {
  classRequired: string;
  individualRequired: string;
  matchDecisionNote?: string;
}

/**
 * Prior concepts whose results are injected into this concept's prompt
 */
export interface CrossConceptDependency {
  dependsOn: ConceptType[];
  instruction: string;
}

/**
 * Concept Configuration Interface
 *
 * One frozen row of the concept registry. Each extract-<concept> job
 * directory exports one of these; nothing mutates them at runtime.
 */
export interface ConceptConfig<
  C extends BaseCandidate = BaseCandidate,
  I extends BaseIndividual = BaseIndividual,
> {
  /**
   * Registry key, e.g. "roles"
   */
  concept: ConceptType;

  description: string;

  /**
   * Pass the concept belongs to; also the template store's step number
   */
  step: PassNumber;

  modelTier: ModelTier;
  temperature: number;
  maxTokens: number;

  /**
   * Response keys, e.g. new_role_classes / role_individuals
   */
  classesKey: string;
  individualsKey: string;

  /**
   * Individual field naming the owning class, e.g. role_class
   */
  classRefField: string;

  /**
   * Candidate field holding the category enum, e.g. role_category
   */
  categoryField: string;

  /**
   * Catalogue category and core base class local name, e.g. "Role"
   */
  ontologyCategory: string;

  /**
   * Enum-valued fields whose hyphens are normalized to underscores
   */
  enumFields: readonly string[];

  /**
   * camelCase property keys used to summarise an individual in the
   * cross-concept context of later concepts
   */
  summaryFields?: { classRefKey: string; descriptorKeys: string[] };

  fieldRequirements?: FieldRequirements;

  crossConceptDependencies?: CrossConceptDependency;

  /**
   * Template shipped with the code; seeds the in-memory template store
   */
  promptTemplate: string;

  /**
   * result validates both arrays under the fixed ResultArrays keys
   */
  schemas: {
    candidate: SchemaObject;
    individual: SchemaObject;
    result: SchemaObject;
  };

  validators: {
    candidate: ValidateFunction<C>;
    individual: ValidateFunction<I>;
    result: ValidateFunction<ResultArrays<C, I>>;
  };

  /**
   * Class reference of an individual
   */
  classRef(individual: I): string | null | undefined;

  /**
   * Category enum value of a candidate class
   */
  category(candidate: C): string | null | undefined;

  /**
   * Case-specific text used as an individual's definition
   */
  describe?(individual: I): string | null | undefined;
}
