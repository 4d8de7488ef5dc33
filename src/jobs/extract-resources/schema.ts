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

export const RESOURCE_CATEGORIES = [
  'professional_code',
  'case_precedent',
  'expert_interpretation',
  'technical_standard',
  'legal_resource',
  'decision_tool',
  'reference_material',
] as const;

export type ResourceCategory = (typeof RESOURCE_CATEGORIES)[number];

export interface CandidateResourceClass extends BaseCandidate {
  resource_category?: ResourceCategory | null;
  authority_source?: string | null;
  extensional_function?: string | null;
  usage_context: string[];
}

export interface ResourceIndividual extends BaseIndividual {
  resource_class?: string;
  document_title?: string | null;
  created_by?: string | null;
  version?: string | null;
  used_by?: string | null;
  used_in_context?: string | null;
}

export const candidateResourceClassSchema: SchemaObject = candidateSchema({
  resource_category: optionalEnum(RESOURCE_CATEGORIES, 'Kind of resource'),
  authority_source: optionalString('Body that issues or maintains the resource'),
  extensional_function: optionalString('How the resource gives concrete meaning to norms'),
  usage_context: stringList('Situations in which the resource is consulted'),
});

export const resourceIndividualSchema: SchemaObject = individualSchema({
  resource_class: { type: 'string', default: '', description: 'Resource class label or URI' },
  document_title: optionalString('Title as cited in the case'),
  created_by: optionalString('Author or issuing body'),
  version: optionalString('Edition or version'),
  used_by: optionalString('Who relies on the resource'),
  used_in_context: optionalString('How the resource is used in the case'),
});

export const resourceResultSchema: SchemaObject = resultSchema(
  candidateResourceClassSchema,
  resourceIndividualSchema
);
