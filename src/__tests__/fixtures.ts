import type { OntologyNamespaces } from '../config/ontology.js';
import type { OntologyEntity } from '../core/OntologyCatalogue.js';
import type { CandidateRoleClass, RoleIndividual } from '../jobs/extract-roles/schema.js';
import { defaultMatchDecision } from '../jobs/schemaParts.js';

/**
 * Shared test data: namespaces, catalogue entities and role records
 */

export const TEST_NAMESPACES: OntologyNamespaces = {
  core: 'http://test.example/core#',
  intermediate: 'http://test.example/intermediate#',
  case: 'http://test.example/case/',
};

export const TEST_TIMESTAMP = '2026-01-15T10:00:00.000Z';

export const ENGINEER_ENTITY: OntologyEntity = {
  uri: 'http://test.example/core#Engineer',
  label: 'Engineer',
  definition: 'A licensed professional engineer',
  tier: 'canonical',
  source: 'test-core',
};

export const CLIENT_ENTITY: OntologyEntity = {
  uri: 'http://test.example/core#Client',
  label: 'Client',
  tier: 'canonical',
  source: 'test-core',
};

export function roleClass(label: string, overrides: Partial<CandidateRoleClass> = {}): CandidateRoleClass {
  return {
    label,
    definition: `${label} definition`,
    text_references: [],
    confidence: 0.8,
    match_decision: defaultMatchDecision(),
    distinguishing_features: [],
    obligations_generated: [],
    ...overrides,
  };
}

export function roleIndividual(
  identifier: string,
  roleClassLabel?: string,
  overrides: Partial<RoleIndividual> = {}
): RoleIndividual {
  return {
    identifier,
    name: identifier,
    text_references: [],
    confidence: 0.8,
    match_decision: defaultMatchDecision(),
    ...(roleClassLabel === undefined ? {} : { role_class: roleClassLabel }),
    ...overrides,
  };
}
