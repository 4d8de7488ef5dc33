import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import type { OntologyNamespaces } from '../config/ontology.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function loadTable<T>(fileName: string): T {
  return JSON.parse(readFileSync(join(__dirname, 'data', fileName), 'utf-8'));
}

export interface CategoryRule {
  value: string;
  keywords: string[];
}

/**
 * Keyword rules for inferring a missing category, tried in order
 */
export interface CategoryKeywordTable {
  field: string;
  rules: CategoryRule[];
}

export interface ComplianceStatusTable {
  valid: string[];
  synonyms: Record<string, string>;
  keywordFallback: Array<{ value: string; tokens: string[] }>;
  default: string;
}

/**
 * Category enum value -> prefixed class name ("intermediate:SafetyObligation")
 */
export const CATEGORY_IRIS: Record<string, Record<string, string>> = loadTable('category-iris.json');

export const CATEGORY_KEYWORDS: Record<string, CategoryKeywordTable> = loadTable('category-keywords.json');

export const COMPLIANCE_STATUS: ComplianceStatusTable = loadTable('compliance-status.json');

/**
 * Expand the category IRI for a concept's category value.
 * Returns undefined when the value has no mapping.
 */
export function resolveCategoryIri(
  concept: string,
  value: string,
  namespaces: OntologyNamespaces
): string | undefined {
  const prefixed = CATEGORY_IRIS[concept]?.[value];
  if (!prefixed) {
    return undefined;
  }

  const [prefix, localName] = prefixed.split(':');
  switch (prefix) {
    case 'core':
      return `${namespaces.core}${localName}`;
    case 'intermediate':
      return `${namespaces.intermediate}${localName}`;
    default:
      return prefixed;
  }
}
