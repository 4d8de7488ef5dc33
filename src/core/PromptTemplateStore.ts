import type pg from 'pg';
import { ReadOnlyDatabase, type QueryClient } from '../config/database.js';
import type { ConceptType, PassNumber } from '../jobs/ConceptConfig.js';
import { listConceptConfigs } from '../jobs/registry.js';

/**
 * Variables a concept template may reference
 */
export type TemplateVariables = Record<string, string>;

/**
 * An active extraction prompt template
 */
export interface PromptTemplate {
  id: string;
  version: number;
  source: string;
  render(variables: TemplateVariables): string;
}

/**
 * Template store keyed by (step, concept). A null result means the concept
 * has no active template.
 */
export interface PromptTemplateStore {
  getActiveTemplate(step: PassNumber, concept: ConceptType): Promise<PromptTemplate | null>;
}

/**
 * Substitute {{ name }} placeholders in one pass. Unknown names render as
 * an empty string; substituted values are never re-scanned.
 */
export function renderTemplate(source: string, variables: TemplateVariables): string {
  return source.replace(/\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g, (_match, name: string) =>
    Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : ''
  );
}

export function createPromptTemplate(id: string, version: number, source: string): PromptTemplate {
  return {
    id,
    version,
    source,
    render: (variables) => renderTemplate(source, variables),
  };
}

function templateKey(step: PassNumber, concept: ConceptType): string {
  return `${step}:${concept}`;
}

/**
 * In-memory template store
 */
export class InMemoryPromptTemplateStore implements PromptTemplateStore {
  private templates = new Map<string, PromptTemplate>();

  /**
   * Store seeded with the templates shipped in src/jobs/extract-<concept>/prompt.ts
   */
  static fromShippedTemplates(): InMemoryPromptTemplateStore {
    const store = new InMemoryPromptTemplateStore();
    for (const config of listConceptConfigs()) {
      store.setTemplate(config.step, config.concept, config.promptTemplate);
    }
    return store;
  }

  setTemplate(step: PassNumber, concept: ConceptType, source: string, version = 1): PromptTemplate {
    const template = createPromptTemplate(`shipped:${concept}`, version, source);
    this.templates.set(templateKey(step, concept), template);
    return template;
  }

  removeTemplate(step: PassNumber, concept: ConceptType): void {
    this.templates.delete(templateKey(step, concept));
  }

  async getActiveTemplate(step: PassNumber, concept: ConceptType): Promise<PromptTemplate | null> {
    return this.templates.get(templateKey(step, concept)) ?? null;
  }
}

interface TemplateRow extends pg.QueryResultRow {
  id: number;
  version: number | null;
  template_text: string;
}

/**
 * Template store backed by the extraction_prompt_templates table.
 * Read-only: only SELECTs are issued.
 */
export class PostgresPromptTemplateStore implements PromptTemplateStore {
  private db: ReadOnlyDatabase;

  constructor(client: QueryClient) {
    this.db = new ReadOnlyDatabase(client);
  }

  async getActiveTemplate(step: PassNumber, concept: ConceptType): Promise<PromptTemplate | null> {
    const rows = await this.db.query<TemplateRow>(
      `SELECT id, version, template_text
         FROM extraction_prompt_templates
        WHERE step_number = $1
          AND concept_type = $2
          AND is_active = true
        ORDER BY version DESC
        LIMIT 1`,
      [step, concept]
    );

    const row = rows[0];
    if (!row) {
      return null;
    }

    return createPromptTemplate(`db:${row.id}`, row.version ?? 1, row.template_text);
  }
}
