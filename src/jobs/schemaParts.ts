import type { SchemaObject } from 'ajv';

/**
 * Shared schema building blocks for the per-concept extraction schemas.
 *
 * Wire field names stay snake_case: they are what the LLM is asked to emit
 * and what the graph converter later camel-cases into property keys.
 */

// ============================================================================
// Shared record types
// ============================================================================

/**
 * Whether and how a candidate maps onto an existing ontology entity
 */
export interface MatchDecision {
  matches_existing: boolean;
  matched_uri?: string | null;
  matched_label?: string | null;
  confidence: number;
  reasoning?: string | null;
}

export interface BaseCandidate {
  label: string;
  definition: string;
  text_references: string[];
  source_text?: string | null;
  confidence: number;
  importance?: string | null;
  match_decision: MatchDecision;
}

/**
 * Individuals keep fields the schema does not name
 */
export interface BaseIndividual {
  identifier: string;
  name?: string | null;
  text_references: string[];
  source_text?: string | null;
  confidence: number;
  importance?: string | null;
  match_decision: MatchDecision;
  [extra: string]: unknown;
}

export function defaultMatchDecision(): MatchDecision {
  return {
    matches_existing: false,
    matched_uri: null,
    matched_label: null,
    confidence: 0,
    reasoning: null,
  };
}

// ============================================================================
// Schema helpers
// ============================================================================

export const SOURCE_TEXT_MAX_LENGTH = 500;

export function optionalString(description: string): SchemaObject {
  return { type: ['string', 'null'], description };
}

export function stringList(description: string): SchemaObject {
  return { type: 'array', items: { type: 'string' }, default: [], description };
}

export function optionalEnum(values: readonly string[], description: string): SchemaObject {
  return { enum: [...values, null], description };
}

export function optionalInteger(description: string): SchemaObject {
  return { type: ['integer', 'null'], description };
}

export const matchDecisionSchema: SchemaObject = {
  type: 'object',
  properties: {
    matches_existing: { type: 'boolean', default: false },
    matched_uri: { type: ['string', 'null'], default: null },
    matched_label: { type: ['string', 'null'], default: null },
    confidence: { type: 'number', default: 0 },
    reasoning: { type: ['string', 'null'], default: null },
  },
  default: {},
};

const sharedProperties: Record<string, SchemaObject> = {
  text_references: stringList('Direct quotes from the source text'),
  source_text: {
    type: ['string', 'null'],
    maxLength: SOURCE_TEXT_MAX_LENGTH,
    description: 'One representative quote',
  },
  confidence: { type: 'number', minimum: 0, maximum: 1, default: 0 },
  importance: optionalString('Relative importance in the case'),
  match_decision: matchDecisionSchema,
};

/**
 * Candidate class schema: unknown keys are stripped during validation
 */
export function candidateSchema(properties: Record<string, SchemaObject>): SchemaObject {
  return {
    type: 'object',
    required: ['label', 'definition'],
    properties: {
      label: { type: 'string', minLength: 1 },
      definition: { type: 'string' },
      ...sharedProperties,
      ...properties,
    },
    additionalProperties: false,
  };
}

/**
 * Individual schema: unknown keys are kept
 */
export function individualSchema(properties: Record<string, SchemaObject>): SchemaObject {
  return {
    type: 'object',
    required: ['identifier'],
    properties: {
      identifier: { type: 'string', minLength: 1 },
      name: optionalString('Display name'),
      ...sharedProperties,
      ...properties,
    },
    additionalProperties: true,
  };
}

/**
 * Both arrays of one concept's response, lifted out of their
 * concept-specific keys (new_role_classes, role_individuals, ...)
 */
export interface ResultArrays<C, I> {
  classes: C[];
  individuals: I[];
}

/**
 * Combined two-array result schema for one concept, over ResultArrays
 */
export function resultSchema(candidate: SchemaObject, individual: SchemaObject): SchemaObject {
  return {
    type: 'object',
    required: ['classes', 'individuals'],
    properties: {
      classes: { type: 'array', items: candidate },
      individuals: { type: 'array', items: individual },
    },
    additionalProperties: false,
  };
}
