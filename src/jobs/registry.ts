import { ConfigurationError } from '../utils/errors.js';
import { CONCEPT_TYPES, isConceptType, type ConceptConfig, type ConceptType } from './ConceptConfig.js';
import rolesConfig from './extract-roles/config.js';
import statesConfig from './extract-states/config.js';
import resourcesConfig from './extract-resources/config.js';
import principlesConfig from './extract-principles/config.js';
import obligationsConfig from './extract-obligations/config.js';
import constraintsConfig from './extract-constraints/config.js';
import capabilitiesConfig from './extract-capabilities/config.js';
import actionsConfig from './extract-actions/config.js';
import eventsConfig from './extract-events/config.js';
import type { CandidateRoleClass, RoleIndividual } from './extract-roles/schema.js';
import type { CandidateStateClass, StateIndividual } from './extract-states/schema.js';
import type { CandidateResourceClass, ResourceIndividual } from './extract-resources/schema.js';
import type { CandidatePrincipleClass, PrincipleIndividual } from './extract-principles/schema.js';
import type { CandidateObligationClass, ObligationIndividual } from './extract-obligations/schema.js';
import type { CandidateConstraintClass, ConstraintIndividual } from './extract-constraints/schema.js';
import type { CandidateCapabilityClass, CapabilityIndividual } from './extract-capabilities/schema.js';
import type { CandidateActionClass, ActionIndividual } from './extract-actions/schema.js';
import type { CandidateEventClass, EventIndividual } from './extract-events/schema.js';

/**
 * Candidate and individual shapes per concept type
 */
export interface ConceptModels {
  roles: { candidate: CandidateRoleClass; individual: RoleIndividual };
  states: { candidate: CandidateStateClass; individual: StateIndividual };
  resources: { candidate: CandidateResourceClass; individual: ResourceIndividual };
  principles: { candidate: CandidatePrincipleClass; individual: PrincipleIndividual };
  obligations: { candidate: CandidateObligationClass; individual: ObligationIndividual };
  constraints: { candidate: CandidateConstraintClass; individual: ConstraintIndividual };
  capabilities: { candidate: CandidateCapabilityClass; individual: CapabilityIndividual };
  actions: { candidate: CandidateActionClass; individual: ActionIndividual };
  events: { candidate: CandidateEventClass; individual: EventIndividual };
}

export type CandidateOf<K extends ConceptType> = ConceptModels[K]['candidate'];
export type IndividualOf<K extends ConceptType> = ConceptModels[K]['individual'];

export type ConceptRegistry = {
  readonly [K in ConceptType]: ConceptConfig<CandidateOf<K>, IndividualOf<K>>;
};

/**
 * Static concept registry, loaded once at startup
 */
export const CONCEPT_REGISTRY: ConceptRegistry = Object.freeze({
  roles: rolesConfig,
  states: statesConfig,
  resources: resourcesConfig,
  principles: principlesConfig,
  obligations: obligationsConfig,
  constraints: constraintsConfig,
  capabilities: capabilitiesConfig,
  actions: actionsConfig,
  events: eventsConfig,
});

export function getConceptConfig<K extends ConceptType>(concept: K): ConceptRegistry[K] {
  return CONCEPT_REGISTRY[concept];
}

/**
 * Validate an untrusted concept name (CLI argument, manifest entry)
 *
 * @throws ConfigurationError for names outside the registry
 */
export function resolveConceptType(value: string): ConceptType {
  const normalized = value.trim().toLowerCase();
  if (!isConceptType(normalized)) {
    throw new ConfigurationError(
      `Unknown concept type "${value}". Expected one of: ${CONCEPT_TYPES.join(', ')}`
    );
  }
  return normalized;
}

/**
 * Every registry row, in pipeline order
 */
export function listConceptConfigs(): ConceptConfig[] {
  return CONCEPT_TYPES.map((concept) => CONCEPT_REGISTRY[concept]);
}
