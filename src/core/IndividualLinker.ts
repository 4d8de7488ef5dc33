import type { ConceptConfig } from '../jobs/ConceptConfig.js';
import type { BaseCandidate, BaseIndividual } from '../jobs/schemaParts.js';
import type { OntologyEntity } from './OntologyCatalogue.js';
import { indexByLabel, normalizeLabel } from './OntologyMatcher.js';

export const DIRECT_TYPE_CONFIDENCE = 0.95;

/**
 * Individual Linker
 *
 * Carries class-level match decisions down to the individuals that
 * reference them. An individual whose class reference names a catalogue
 * class directly is linked to that class. Unresolved references are left
 * alone: they usually name a class that is new in this extraction.
 *
 * @returns number of individuals linked
 */
export function linkIndividuals<C extends BaseCandidate, I extends BaseIndividual>(
  individuals: readonly I[],
  classes: readonly C[],
  entities: readonly OntologyEntity[],
  config: ConceptConfig<C, I>
): number {
  const candidates = indexByLabel(classes);
  const existing = indexByLabel(entities);
  let linked = 0;

  for (const individual of individuals) {
    const ref = config.classRef(individual);
    if (!ref) {
      continue;
    }
    const key = normalizeLabel(ref);

    const candidate = candidates.get(key);
    if (candidate) {
      const decision = candidate.match_decision;
      if (decision.matches_existing) {
        individual.match_decision = {
          matches_existing: true,
          matched_uri: decision.matched_uri ?? null,
          matched_label: decision.matched_label ?? null,
          confidence: decision.confidence,
          reasoning: `Via class '${candidate.label}': ${decision.reasoning ?? ''}`,
        };
        linked++;
      }
      continue;
    }

    const entity = existing.get(key);
    if (entity) {
      individual.match_decision = {
        matches_existing: true,
        matched_uri: entity.uri,
        matched_label: entity.label,
        confidence: DIRECT_TYPE_CONFIDENCE,
        reasoning: `Individual typed as existing ontology class '${entity.label}'`,
      };
      linked++;
    }
  }

  return linked;
}
