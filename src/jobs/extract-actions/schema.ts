import type { SchemaObject } from 'ajv';
import {
  candidateSchema,
  individualSchema,
  optionalEnum,
  optionalInteger,
  optionalString,
  resultSchema,
  stringList,
  type BaseCandidate,
  type BaseIndividual,
} from '../schemaParts.js';

export const ACTION_CATEGORIES = [
  'communication',
  'prevention',
  'maintenance',
  'performance',
  'evaluation',
  'collaboration',
  'creation',
  'monitoring',
] as const;

export type ActionCategory = (typeof ACTION_CATEGORIES)[number];

export interface CandidateActionClass extends BaseCandidate {
  action_category?: ActionCategory | null;
  volitional_nature?: string | null;
  professional_context?: string | null;
  obligations_fulfilled: string[];
  causal_implications: string[];
  temporal_constraints: string[];
}

export interface ActionIndividual extends BaseIndividual {
  action_class?: string;
  performed_by?: string | null;
  performed_on?: string | null;
  temporal_interval?: string | null;
  sequence_order?: number | null;
  causal_triggers?: string[];
  causal_results?: string[];
  obligations_fulfilled?: string[];
  constraints_respected?: string[];
  capabilities_required?: string[];
  case_context?: string | null;
}

export const candidateActionClassSchema: SchemaObject = candidateSchema({
  action_category: optionalEnum(ACTION_CATEGORIES, 'Kind of action'),
  volitional_nature: optionalString('The deliberate choice the action reflects'),
  professional_context: optionalString('Professional setting of the action'),
  obligations_fulfilled: stringList('Obligations the action discharges'),
  causal_implications: stringList('What the action brings about'),
  temporal_constraints: stringList('Timing requirements'),
});

export const actionIndividualSchema: SchemaObject = individualSchema({
  action_class: { type: 'string', default: '', description: 'Action class label or URI' },
  performed_by: optionalString('Agent'),
  performed_on: optionalString('Target of the action'),
  temporal_interval: optionalString('When it happened'),
  sequence_order: optionalInteger('Position in the case timeline'),
  causal_triggers: stringList('What prompted it'),
  causal_results: stringList('What it caused'),
  obligations_fulfilled: stringList('Obligations it discharged'),
  constraints_respected: stringList('Constraints it observed'),
  capabilities_required: stringList('Capabilities it needed'),
  case_context: optionalString('Circumstances in the case'),
});

export const actionResultSchema: SchemaObject = resultSchema(
  candidateActionClassSchema,
  actionIndividualSchema
);
