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

export const CAPABILITY_CATEGORIES = [
  'norm_management',
  'awareness',
  'learning',
  'reasoning',
  'communication',
  'domain_specific',
  'retrieval',
] as const;

export type CapabilityCategory = (typeof CAPABILITY_CATEGORIES)[number];

export const SKILL_LEVELS = ['basic', 'intermediate', 'advanced', 'expert'] as const;

export type SkillLevel = (typeof SKILL_LEVELS)[number];

export interface CandidateCapabilityClass extends BaseCandidate {
  capability_category?: CapabilityCategory | null;
  enables_actions: string[];
  required_for_obligations: string[];
  skill_level?: SkillLevel | null;
  domain_specificity?: string | null;
}

export interface CapabilityIndividual extends BaseIndividual {
  capability_class?: string;
  possessed_by?: string | null;
  capability_statement?: string | null;
  demonstrated_through?: string | null;
  proficiency_level?: SkillLevel | null;
  case_context?: string | null;
}

export const candidateCapabilityClassSchema: SchemaObject = candidateSchema({
  capability_category: optionalEnum(CAPABILITY_CATEGORIES, 'Kind of capability'),
  enables_actions: stringList('Actions the capability makes possible'),
  required_for_obligations: stringList('Obligations that need it'),
  skill_level: optionalEnum(SKILL_LEVELS, 'Level of skill required'),
  domain_specificity: optionalString('Domain the capability belongs to'),
});

export const capabilityIndividualSchema: SchemaObject = individualSchema({
  capability_class: { type: 'string', default: '', description: 'Capability class label or URI' },
  possessed_by: optionalString('Who has the capability'),
  capability_statement: optionalString('The capability in one sentence'),
  demonstrated_through: optionalString('Evidence in the case'),
  proficiency_level: optionalEnum(SKILL_LEVELS, 'Observed proficiency'),
  case_context: optionalString('Circumstances in the case'),
});

export const capabilityResultSchema: SchemaObject = resultSchema(
  candidateCapabilityClassSchema,
  capabilityIndividualSchema
);
