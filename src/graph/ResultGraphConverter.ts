import { OntologyConfig, type OntologyNamespaces } from '../config/ontology.js';
import { resolveCategoryIri } from '../jobs/categoryTables.js';
import type { ConceptConfig } from '../jobs/ConceptConfig.js';
import type { BaseCandidate, BaseIndividual, MatchDecision } from '../jobs/schemaParts.js';

/**
 * Result-to-Graph Converter
 *
 * Maps validated candidates and individuals onto the triple-like records the
 * storage sink persists: a minted URI, label, definition, parent class, a
 * property bag of string lists and fixed provenance properties.
 */

/**
 * camelCase property name -> string values
 */
export type PropertyBag = Record<string, string[]>;

export interface GraphClass {
  uri: string;
  label: string;
  definition: string;
  parent: string;
  properties: PropertyBag;
  source_text: string | null;
  section_sources: string[];
  source_texts: Record<string, string>;
  match_decision: MatchDecision;

  /**
   * Category enum value the parent was resolved from
   */
  category?: string;
}

export interface GraphIndividual {
  uri: string;
  label: string;
  definition: string;
  types: string[];
  properties: PropertyBag;
  source_text: string | null;
  section_sources: string[];
  source_texts: Record<string, string>;
  match_decision: MatchDecision;
}

export interface ConceptGraphData {
  new_classes: GraphClass[];
  new_individuals: GraphIndividual[];
}

export interface GraphConversionOptions {
  passNumber?: number;
  namespaces?: OntologyNamespaces;

  /**
   * Timestamp stamped on every record (defaults to now)
   */
  timestamp?: string;
}

/**
 * Fields stored at the top level of a record rather than in its property bag
 */
const TOP_LEVEL_FIELDS = new Set([
  'label',
  'definition',
  'match_decision',
  'source_text',
  'identifier',
  'name',
]);

export function sanitizeLabel(label: string, spaceChar = ''): string {
  return label.replaceAll(' ', spaceChar).replace(/[()"'<>&,]/g, '');
}

export function toCamelCase(snake: string): string {
  const [head, ...rest] = snake.split('_');
  return head + rest.map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase()).join('');
}

function fieldsOf(item: object): Array<[string, unknown]> {
  return Object.entries(item);
}

function stringifyValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

function isEmptyCollection(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return typeof value === 'object' && value !== null && Object.keys(value).length === 0;
}

function extractProperties(
  item: BaseCandidate | BaseIndividual,
  caseId: number,
  sectionType: string,
  timestamp: string,
  passNumber?: number
): PropertyBag {
  const properties: PropertyBag = {};

  for (const [field, value] of fieldsOf(item)) {
    if (TOP_LEVEL_FIELDS.has(field) || value === null || value === undefined || isEmptyCollection(value)) {
      continue;
    }

    const values = Array.isArray(value)
      ? value.filter((entry) => entry !== null && entry !== undefined).map(stringifyValue)
      : [stringifyValue(value)];

    if (values.length > 0) {
      properties[toCamelCase(field)] = values;
    }
  }

  properties.generatedAtTime = [timestamp];
  properties.wasAttributedTo = [`Case ${caseId} Extraction`];
  properties.firstDiscoveredInCase = [String(caseId)];
  properties.firstDiscoveredAt = [timestamp];
  properties.discoveredInCase = [String(caseId)];
  properties.discoveredInSection = [sectionType];

  if (passNumber !== undefined) {
    properties.discoveredInPass = [String(passNumber)];
  }

  if (item.source_text) {
    properties.sourceText = [item.source_text];
  }

  return properties;
}

function sourceTextOf(item: BaseCandidate | BaseIndividual): string | null {
  return item.source_text || item.text_references[0] || null;
}

function copyMatchDecision(decision: MatchDecision): MatchDecision {
  return {
    matches_existing: decision.matches_existing,
    matched_uri: decision.matched_uri ?? null,
    matched_label: decision.matched_label ?? null,
    confidence: decision.confidence,
    reasoning: decision.reasoning ?? null,
  };
}

export function convertToGraph<C extends BaseCandidate, I extends BaseIndividual>(
  classes: readonly C[],
  individuals: readonly I[],
  config: ConceptConfig<C, I>,
  caseId: number,
  sectionType: string,
  options: GraphConversionOptions = {}
): ConceptGraphData {
  const namespaces = options.namespaces ?? OntologyConfig.getNamespaces();
  const timestamp = options.timestamp ?? new Date().toISOString();
  const baseParent = `${namespaces.core}${config.ontologyCategory}`;

  const newClasses = classes.map((candidate): GraphClass => {
    const category = config.category(candidate) || undefined;
    const parent =
      (category && resolveCategoryIri(config.concept, category, namespaces)) || baseParent;
    const sourceText = sourceTextOf(candidate);

    return {
      uri: `${namespaces.intermediate}${sanitizeLabel(candidate.label)}`,
      label: candidate.label,
      definition: candidate.definition,
      parent,
      properties: extractProperties(candidate, caseId, sectionType, timestamp, options.passNumber),
      source_text: sourceText,
      section_sources: [sectionType],
      source_texts: sourceText ? { [sectionType]: sourceText } : {},
      match_decision: copyMatchDecision(candidate.match_decision),
      ...(category ? { category } : {}),
    };
  });

  const newIndividuals = individuals.map((individual): GraphIndividual => {
    const identifier = individual.identifier || individual.name || 'Unknown';
    const classRef = config.classRef(individual);
    const sourceText = sourceTextOf(individual);

    return {
      uri: `${namespaces.case}${caseId}#${sanitizeLabel(identifier, '_')}`,
      label: identifier,
      definition: describeIndividual(config, individual),
      types: classRef ? [`${namespaces.intermediate}${sanitizeLabel(classRef)}`] : [],
      properties: extractProperties(individual, caseId, sectionType, timestamp, options.passNumber),
      source_text: sourceText,
      section_sources: [sectionType],
      source_texts: sourceText ? { [sectionType]: sourceText } : {},
      match_decision: copyMatchDecision(individual.match_decision),
    };
  });

  return { new_classes: newClasses, new_individuals: newIndividuals };
}

/**
 * Concept-specific descriptor, then description, then definition
 */
function describeIndividual<C extends BaseCandidate, I extends BaseIndividual>(
  config: ConceptConfig<C, I>,
  individual: I
): string {
  const descriptor = config.describe?.(individual);
  if (descriptor) {
    return descriptor;
  }

  for (const key of ['description', 'definition']) {
    const value = individual[key];
    if (typeof value === 'string' && value) {
      return value;
    }
  }
  return '';
}
