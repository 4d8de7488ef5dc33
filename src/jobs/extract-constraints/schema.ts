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

export const CONSTRAINT_TYPES = [
  'legal',
  'regulatory',
  'resource',
  'competence',
  'jurisdictional',
  'procedural',
  'safety',
  'confidentiality',
  'ethical',
  'temporal',
  'priority',
] as const;

export type ConstraintType = (typeof CONSTRAINT_TYPES)[number];

export const FLEXIBILITY_LEVELS = ['hard', 'soft', 'negotiable'] as const;

export type Flexibility = (typeof FLEXIBILITY_LEVELS)[number];

export const SEVERITY_LEVELS = ['critical', 'major', 'minor'] as const;

export type Severity = (typeof SEVERITY_LEVELS)[number];

export interface CandidateConstraintClass extends BaseCandidate {
  constraint_type?: ConstraintType | null;
  flexibility?: Flexibility | null;
  violation_impact?: string | null;
  mitigation_strategies: string[];
  affected_stakeholders: string[];
}

export interface ConstraintIndividual extends BaseIndividual {
  constraint_class?: string;
  constrained_entity?: string | null;
  constraint_statement?: string | null;
  source?: string | null;
  temporal_scope?: string | null;
  severity?: Severity | null;
  case_context?: string | null;
}

export const candidateConstraintClassSchema: SchemaObject = candidateSchema({
  constraint_type: optionalEnum(CONSTRAINT_TYPES, 'Kind of limit'),
  flexibility: optionalEnum(FLEXIBILITY_LEVELS, 'Whether the limit can be relaxed'),
  violation_impact: optionalString('What happens if the limit is crossed'),
  mitigation_strategies: stringList('Ways to work within the constraint'),
  affected_stakeholders: stringList('Parties the limit affects'),
});

export const constraintIndividualSchema: SchemaObject = individualSchema({
  constraint_class: { type: 'string', default: '', description: 'Constraint class label or URI' },
  constrained_entity: optionalString('What or who is constrained'),
  constraint_statement: optionalString('The specific limit'),
  source: optionalString('Where the constraint comes from'),
  temporal_scope: optionalString('When it applies'),
  severity: optionalEnum(SEVERITY_LEVELS, 'How severe a breach would be'),
  case_context: optionalString('Circumstances in the case'),
});

export const constraintResultSchema: SchemaObject = resultSchema(
  candidateConstraintClassSchema,
  constraintIndividualSchema
);
