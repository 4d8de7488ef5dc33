import { OntologyConfig } from '../config/ontology.js';
import { asTransientError } from '../utils/errors.js';
import { JobLogger } from '../utils/logger.js';
import { isRecord } from '../utils/validators.js';

/**
 * Source tier of a catalogue entity, used to group entities in the prompt
 */
export type EntityTier = 'canonical' | 'extracted' | 'external';

/**
 * Minimal summary of an existing ontology entity
 */
export interface OntologyEntity {
  uri: string;
  label: string;
  definition?: string;
  tier?: EntityTier;

  /**
   * Name of the ontology the entity comes from
   */
  source?: string;
}

/**
 * Read-only entity catalogue, keyed by ontology category ("Role", "State"...)
 */
export interface OntologyCatalogue {
  getEntitiesByCategory(category: string): Promise<OntologyEntity[]>;
}

function firstString(record: Record<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value) {
      return value;
    }
  }
  return undefined;
}

function toTier(value: string | undefined, source: string | undefined): EntityTier {
  if (value === 'canonical' || value === 'extracted' || value === 'external') {
    return value;
  }
  if (source?.endsWith('-extended')) {
    return 'extracted';
  }
  return 'canonical';
}

/**
 * Map one service entity onto OntologyEntity. Entries without a URI or a
 * label are dropped.
 */
export function parseOntologyEntity(raw: unknown): OntologyEntity | null {
  if (!isRecord(raw)) {
    return null;
  }

  const uri = firstString(raw, ['uri', 'iri', 'id']);
  const label = firstString(raw, ['label', 'name']);
  if (!uri || !label) {
    return null;
  }

  const source = firstString(raw, ['ontology_name', 'source', 'ontology']);
  return {
    uri,
    label,
    definition: firstString(raw, ['definition', 'description', 'comment']),
    tier: toTier(firstString(raw, ['tier']), source),
    source,
  };
}

/**
 * HTTP client for the ontology entity service
 *
 * GET <base>/api/ontology/entities/<category> returning either a bare array
 * or { entities: [...] }.
 */
export class HttpOntologyCatalogue implements OntologyCatalogue {
  private logger = new JobLogger('OntologyCatalogue');

  constructor(
    private readonly baseUrl: string = OntologyConfig.getConfig().serviceUrl,
    private readonly timeoutMs: number = OntologyConfig.getConfig().timeoutMs,
    private readonly fetchFn: typeof fetch = fetch
  ) {}

  async getEntitiesByCategory(category: string): Promise<OntologyEntity[]> {
    const url = `${this.baseUrl}/api/ontology/entities/${encodeURIComponent(category)}`;

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw asTransientError(error, `Ontology catalogue ${category}`);
    }

    if (!response.ok) {
      throw new Error(`Ontology catalogue returned HTTP ${response.status} for ${category}`);
    }

    const body: unknown = await response.json();
    const rawEntities = Array.isArray(body)
      ? body
      : isRecord(body) && Array.isArray(body.entities)
        ? body.entities
        : [];

    const entities: OntologyEntity[] = [];
    for (const raw of rawEntities) {
      const entity = parseOntologyEntity(raw);
      if (entity) {
        entities.push(entity);
      }
    }

    this.logger.debug(`Loaded ${entities.length} ${category} entities`, { url });
    return entities;
  }
}

/**
 * Fixed in-memory catalogue
 */
export class InMemoryOntologyCatalogue implements OntologyCatalogue {
  private entities: Map<string, OntologyEntity[]>;

  constructor(entities: Record<string, OntologyEntity[]> = {}) {
    this.entities = new Map(Object.entries(entities));
  }

  async getEntitiesByCategory(category: string): Promise<OntologyEntity[]> {
    return [...(this.entities.get(category) ?? [])];
  }
}
