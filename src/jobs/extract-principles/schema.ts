import type { SchemaObject } from 'ajv';
import {
  candidateSchema,
  individualSchema,
  optionalEnum,
  optionalString,
  resultSchema,
  stringList,
  type BaseCandidate,
  type BaseIndividual,
} from '../schemaParts.js';

export const PRINCIPLE_CATEGORIES = [
  'fundamental_ethical',
  'professional_virtue',
  'relational',
  'domain_specific',
] as const;

export type PrincipleCategory = (typeof PRINCIPLE_CATEGORIES)[number];

/**
 * Principles are abstract: their meaning is fixed through the concrete
 * cases they are applied to (extensional_examples).
 */
export interface CandidatePrincipleClass extends BaseCandidate {
  principle_category?: PrincipleCategory | null;
  abstract_nature?: string | null;
  extensional_examples: string[];
  value_basis?: string | null;
  operationalization?: string | null;
  derived_obligations: string[];
  potential_conflicts: string[];
}

export interface PrincipleIndividual extends BaseIndividual {
  principle_class?: string;
  concrete_expression?: string | null;
  invoked_by?: string[];
  applied_to?: string[];
  interpretation?: string | null;
  balancing_with?: string[];
  tension_resolution?: string | null;
}

export const candidatePrincipleClassSchema: SchemaObject = candidateSchema({
  principle_category: optionalEnum(PRINCIPLE_CATEGORIES, 'Kind of principle'),
  abstract_nature: optionalString('The abstract ideal the principle expresses'),
  extensional_examples: stringList('Concrete applications that give the principle meaning'),
  value_basis: optionalString('Underlying value'),
  operationalization: optionalString('How the principle becomes actionable'),
  derived_obligations: stringList('Obligations derived from the principle'),
  potential_conflicts: stringList('Principles it may be in tension with'),
});

export const principleIndividualSchema: SchemaObject = individualSchema({
  principle_class: { type: 'string', default: '', description: 'Principle class label or URI' },
  concrete_expression: optionalString('How the principle is expressed in the case'),
  invoked_by: stringList('Who invokes the principle'),
  applied_to: stringList('Situations or parties it is applied to'),
  interpretation: optionalString('How it is interpreted here'),
  balancing_with: stringList('Principles it is weighed against'),
  tension_resolution: optionalString('How competing principles are resolved'),
});

export const principleResultSchema: SchemaObject = resultSchema(
  candidatePrincipleClassSchema,
  principleIndividualSchema
);
