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

export const OBLIGATION_TYPES = [
  'disclosure',
  'safety',
  'competence',
  'confidentiality',
  'reporting',
  'collegial',
  'legal',
  'ethical',
] as const;

export type ObligationType = (typeof OBLIGATION_TYPES)[number];

export const ENFORCEMENT_LEVELS = ['mandatory', 'defeasible', 'conditional', 'prima_facie'] as const;

export type EnforcementLevel = (typeof ENFORCEMENT_LEVELS)[number];

export const COMPLIANCE_STATUSES = ['met', 'unmet', 'partial', 'unclear'] as const;

export type ComplianceStatus = (typeof COMPLIANCE_STATUSES)[number];

export interface CandidateObligationClass extends BaseCandidate {
  obligation_type?: ObligationType | null;
  enforcement_level?: EnforcementLevel | null;
  derived_from_principle?: string | null;
  violation_consequences?: string | null;
  stakeholders_affected: string[];
  monitoring_criteria?: string | null;
  code_reference?: string | null;
}

export interface ObligationIndividual extends BaseIndividual {
  obligation_class?: string;
  obligated_party?: string | null;
  obligation_statement?: string | null;
  case_context?: string | null;
  temporal_scope?: string | null;
  compliance_status?: ComplianceStatus | null;
}

export const candidateObligationClassSchema: SchemaObject = candidateSchema({
  obligation_type: optionalEnum(OBLIGATION_TYPES, 'Kind of duty'),
  enforcement_level: optionalEnum(ENFORCEMENT_LEVELS, 'How binding the duty is'),
  derived_from_principle: optionalString('Principle the obligation derives from'),
  violation_consequences: optionalString('What follows from a breach'),
  stakeholders_affected: stringList('Parties the duty protects'),
  monitoring_criteria: optionalString('How fulfilment is assessed'),
  code_reference: optionalString("Code provision, e.g. 'III.4'"),
});

export const obligationIndividualSchema: SchemaObject = individualSchema({
  obligation_class: { type: 'string', default: '', description: 'Obligation class label or URI' },
  obligated_party: optionalString('Who bears the obligation'),
  obligation_statement: optionalString('The specific duty'),
  case_context: optionalString('Circumstances in the case'),
  temporal_scope: optionalString('When the obligation applies'),
  compliance_status: optionalEnum(COMPLIANCE_STATUSES, 'Whether the duty was fulfilled'),
});

export const obligationResultSchema: SchemaObject = resultSchema(
  candidateObligationClassSchema,
  obligationIndividualSchema
);
