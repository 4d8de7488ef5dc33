import type { ConceptConfig } from '../jobs/ConceptConfig.js';
import { CATEGORY_KEYWORDS, COMPLIANCE_STATUS } from '../jobs/categoryTables.js';
import { SOURCE_TEXT_MAX_LENGTH } from '../jobs/schemaParts.js';
import { JobLogger } from '../utils/logger.js';
import { isRecord } from '../utils/validators.js';

export type ItemKind = 'class' | 'individual';

type RawItem = Record<string, unknown>;

export const DEFAULT_ITEM_CONFIDENCE = 0.75;

const MATCHED_LABEL_ALIASES = ['matched_class', 'matched_name', 'match_label'];

/**
 * Map a free-form compliance status onto met | unmet | partial | unclear
 */
export function normalizeComplianceStatus(value: string): string {
  if (COMPLIANCE_STATUS.valid.includes(value)) {
    return value;
  }

  const synonym = COMPLIANCE_STATUS.synonyms[value];
  if (synonym) {
    return synonym;
  }

  // Whole tokens only: "unmet" is not a "met" token
  const tokens = new Set(value.toLowerCase().replaceAll('-', '_').split('_'));
  for (const rule of COMPLIANCE_STATUS.keywordFallback) {
    if (rule.tokens.some((token) => tokens.has(token))) {
      return rule.value;
    }
  }
  return COMPLIANCE_STATUS.default;
}

/**
 * Category implied by keywords in the label, definition or value basis,
 * or undefined when no rule fires
 */
export function inferCategory(concept: string, item: RawItem): string | undefined {
  const table = CATEGORY_KEYWORDS[concept];
  if (!table) {
    return undefined;
  }

  const text = ['label', 'definition', 'value_basis']
    .map((field) => {
      const value = item[field];
      return typeof value === 'string' ? value : '';
    })
    .join(' ')
    .toLowerCase();
  if (!text.trim()) {
    return undefined;
  }

  return table.rules.find((rule) => rule.keywords.some((keyword) => text.includes(keyword)))?.value;
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Result Normalizer
 *
 * Maps the field-name and shape variants LLMs produce onto the concept
 * schema before validation. Normalizing an already normalized item changes
 * nothing.
 */
export class ResultNormalizer {
  private logger: JobLogger;

  constructor(private readonly config: ConceptConfig) {
    this.logger = new JobLogger(`ResultNormalizer:${config.concept}`);
  }

  /**
   * Bring a parsed response into the two-array shape, normalizing every
   * object item. Returns null when the response is neither an object nor
   * an array.
   */
  normalizeResponse(raw: unknown): RawItem | null {
    const { classesKey, individualsKey, concept } = this.config;

    let payload: RawItem;
    if (Array.isArray(raw)) {
      this.logger.info(`LLM returned a list of ${raw.length} items, wrapping as ${classesKey}`);
      payload = { [classesKey]: raw };
    } else if (isRecord(raw)) {
      payload = { ...raw };
    } else {
      this.logger.error(`Unexpected LLM response type: ${raw === null ? 'null' : typeof raw}`);
      return null;
    }

    // Single-array responses keyed by the concept name
    const legacy = payload[concept];
    if (!(classesKey in payload) && !(individualsKey in payload) && Array.isArray(legacy)) {
      this.logger.info(`Remapping legacy '${concept}' key (${legacy.length} items) to '${classesKey}'`);
      payload[classesKey] = legacy;
      delete payload[concept];
    }

    for (const [key, kind] of [
      [classesKey, 'class'],
      [individualsKey, 'individual'],
    ] as const) {
      const items = payload[key];
      if (Array.isArray(items)) {
        payload[key] = items.filter(isRecord).map((item) => this.normalizeItem(item, kind));
      }
    }

    return payload;
  }

  normalizeItem(raw: RawItem, kind: ItemKind): RawItem {
    const item: RawItem = { ...raw };

    this.applyAliases(item);
    this.fillReferences(item);

    if (kind === 'individual' && isBlank(item.identifier)) {
      const fallback = !isBlank(item.name) ? item.name : item.label;
      if (!isBlank(fallback)) {
        item.identifier = fallback;
      }
    }
    if (kind === 'individual' && isBlank(item.name) && typeof item.identifier === 'string') {
      item.name = item.identifier;
    }

    if (!('confidence' in item)) {
      item.confidence = DEFAULT_ITEM_CONFIDENCE;
    }

    this.normalizeMatchDecision(item);

    if (kind === 'class') {
      const field = CATEGORY_KEYWORDS[this.config.concept]?.field;
      if (field && isBlank(item[field])) {
        const inferred = inferCategory(this.config.concept, item);
        if (inferred) {
          item[field] = inferred;
        }
      }
    }

    for (const field of this.config.enumFields) {
      const value = item[field];
      if (typeof value === 'string') {
        item[field] = value.replaceAll('-', '_');
      }
    }

    const status = item.compliance_status;
    if (typeof status === 'string' && status) {
      item.compliance_status = normalizeComplianceStatus(status);
    }

    return item;
  }

  private applyAliases(item: RawItem): void {
    if (isBlank(item.definition) && typeof item.description === 'string') {
      item.definition = item.description;
    }

    if (item.text_references === undefined && item.examples_from_case !== undefined) {
      item.text_references = item.examples_from_case;
    }
    delete item.examples_from_case;

    if (typeof item.text_references === 'string') {
      item.text_references = [item.text_references];
    }

    const classRefField = this.config.classRefField;
    if (isBlank(item[classRefField]) && typeof item.instance_of === 'string') {
      item[classRefField] = item.instance_of;
    }
    delete item.instance_of;

    if ('balancing_requirements' in item && !('potential_conflicts' in item)) {
      item.potential_conflicts = item.balancing_requirements;
    }
    delete item.balancing_requirements;
    delete item.application_context;
    delete item.case_relevance;
  }

  /**
   * source_text and text_references back-fill each other
   */
  private fillReferences(item: RawItem): void {
    const refs = Array.isArray(item.text_references) ? item.text_references : [];
    const firstRef: unknown = refs[0];

    if (isBlank(item.source_text) && typeof firstRef === 'string' && firstRef) {
      item.source_text = firstRef.slice(0, SOURCE_TEXT_MAX_LENGTH);
    } else if (typeof item.source_text === 'string' && item.source_text && refs.length === 0) {
      item.text_references = [item.source_text];
    }
  }

  private normalizeMatchDecision(item: RawItem): void {
    const decision = item.match_decision;

    if (isRecord(decision)) {
      const normalized: RawItem = { ...decision };
      if (!('matches_existing' in normalized)) {
        normalized.matches_existing = false;
      }
      if (!('confidence' in normalized)) {
        normalized.confidence = 0.5;
      }
      if (!normalized.reasoning) {
        normalized.reasoning = 'No reasoning provided by LLM';
      }
      if (!normalized.matched_label) {
        const alias = MATCHED_LABEL_ALIASES.find((key) => key in normalized);
        if (alias) {
          normalized.matched_label = normalized[alias];
        }
      }
      for (const alias of MATCHED_LABEL_ALIASES) {
        delete normalized[alias];
      }
      item.match_decision = normalized;
      return;
    }

    if (decision === undefined && 'label' in item) {
      item.match_decision = {
        matches_existing: false,
        confidence: 0.5,
        reasoning: 'match_decision omitted by LLM; post-hoc matching will resolve',
      };
    }
  }
}
