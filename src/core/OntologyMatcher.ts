import { defaultMatchDecision, type BaseCandidate } from '../jobs/schemaParts.js';
import type { OntologyEntity } from './OntologyCatalogue.js';

/**
 * Ontology Matcher
 *
 * Exact label matching only. "Design Engineer Role" must stay distinct from
 * "Engineer Role", so there is no substring or fuzzy comparison.
 */

export const LABEL_MATCH_CONFIDENCE = 0.9;
export const LABEL_MATCH_REASONING = 'Label match with existing ontology class';

/**
 * Lowercase, underscores and hyphens read as spaces, whitespace collapsed
 */
export function normalizeLabel(label: string): string {
  return label.toLowerCase().replace(/[_-]/g, ' ').replace(/\s+/g, ' ').trim();
}

export function labelsMatch(a: string, b: string): boolean {
  return normalizeLabel(a) === normalizeLabel(b);
}

/**
 * normalized label -> first entity carrying it
 */
export function indexByLabel<T extends { label: string }>(items: readonly T[]): Map<string, T> {
  const index = new Map<string, T>();
  for (const item of items) {
    const key = normalizeLabel(item.label);
    if (key && !index.has(key)) {
      index.set(key, item);
    }
  }
  return index;
}

/**
 * Fill or confirm the match decision of every candidate class. Classes that
 * end up without a matched URI are reset to "no match".
 *
 * @returns number of classes matched to a catalogue entity
 */
export function matchClasses(classes: readonly BaseCandidate[], entities: readonly OntologyEntity[]): number {
  const byLabel = indexByLabel(entities);

  for (const candidate of classes) {
    const decision = candidate.match_decision;

    if (decision.matches_existing) {
      // The LLM only sees labels, so a claimed match may lack a real IRI
      const uri = decision.matched_uri ?? '';
      if (!uri.startsWith('http')) {
        const resolved = byLabel.get(normalizeLabel(decision.matched_label || decision.matched_uri || ''));
        if (resolved) {
          decision.matched_uri = resolved.uri;
          decision.matched_label = resolved.label;
        }
      }
      continue;
    }

    const existing = byLabel.get(normalizeLabel(candidate.label));
    if (existing) {
      candidate.match_decision = {
        matches_existing: true,
        matched_uri: existing.uri,
        matched_label: existing.label,
        confidence: LABEL_MATCH_CONFIDENCE,
        reasoning: LABEL_MATCH_REASONING,
      };
    }
  }

  let matched = 0;
  for (const candidate of classes) {
    if (candidate.match_decision.matched_uri) {
      matched++;
    } else {
      candidate.match_decision = defaultMatchDecision();
    }
  }
  return matched;
}

export interface OntologyDefinition {
  text: string;
  sourceUri: string;
  sourceOntology: string;
}

/**
 * Catalogue definitions of matched classes, keyed by candidate label
 */
export function collectOntologyDefinitions(
  classes: readonly BaseCandidate[],
  entities: readonly OntologyEntity[]
): Record<string, OntologyDefinition> {
  const byUri = new Map(entities.map((entity) => [entity.uri, entity]));
  const byLabel = indexByLabel(entities);
  const definitions: Record<string, OntologyDefinition> = {};

  for (const candidate of classes) {
    const decision = candidate.match_decision;
    if (!decision.matches_existing) {
      continue;
    }

    const entity =
      (decision.matched_uri ? byUri.get(decision.matched_uri) : undefined) ??
      (decision.matched_label ? byLabel.get(normalizeLabel(decision.matched_label)) : undefined);
    if (entity?.definition) {
      definitions[candidate.label] = {
        text: entity.definition,
        sourceUri: entity.uri,
        sourceOntology: entity.source ?? '',
      };
    }
  }

  return definitions;
}
