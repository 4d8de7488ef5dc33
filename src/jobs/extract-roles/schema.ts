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

/**
 * Role categories (Kong et al. professional role framework)
 */
export const ROLE_CATEGORIES = [
  'provider_client',
  'professional_peer',
  'employer_relationship',
  'public_responsibility',
  'participant',
  'stakeholder',
] as const;

export type RoleCategory = (typeof ROLE_CATEGORIES)[number];

export interface CandidateRoleClass extends BaseCandidate {
  role_category?: RoleCategory | null;
  distinguishing_features: string[];
  professional_scope?: string | null;
  obligations_generated: string[];
}

export interface RoleIndividual extends BaseIndividual {
  role_class?: string;
  role_category?: RoleCategory | null;
  attributes?: Record<string, unknown>;
  relationships?: Array<Record<string, string>>;
  case_involvement?: string | null;
}

export const candidateRoleClassSchema: SchemaObject = candidateSchema({
  role_category: optionalEnum(ROLE_CATEGORIES, 'Relationship category of the role'),
  distinguishing_features: stringList('What sets this role apart'),
  professional_scope: optionalString('Areas of responsibility and authority'),
  obligations_generated: stringList('Obligations this role generates'),
});

export const roleIndividualSchema: SchemaObject = individualSchema({
  role_class: { type: 'string', default: '', description: 'Role class label or URI' },
  role_category: optionalEnum(ROLE_CATEGORIES, 'Category of this individual'),
  attributes: { type: 'object', default: {}, description: 'Qualifications, experience, credentials' },
  relationships: {
    type: 'array',
    items: { type: 'object', additionalProperties: { type: 'string' } },
    default: [],
    description: 'Employment, collaboration and client relationships',
  },
  case_involvement: optionalString('How the individual takes part in the case'),
});

export const roleResultSchema: SchemaObject = resultSchema(
  candidateRoleClassSchema,
  roleIndividualSchema
);
