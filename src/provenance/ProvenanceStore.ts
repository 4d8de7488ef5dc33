import fs from 'fs/promises';
import path from 'path';
import type { SchemaObject } from 'ajv';
import { ProvenanceConfig } from '../config/provenance.js';
import { ValidationError } from '../utils/errors.js';
import { JobLogger } from '../utils/logger.js';
import { validator } from '../utils/validators.js';
import {
  COLLECTION_NAMES,
  type CollectionName,
  type ProvenanceCollections,
  type ProvenanceSnapshot,
} from './types.js';

/**
 * Provenance Store
 *
 * Collection-oriented persistence for provenance records. Records go in and
 * come out as copies; the only way to change a stored record is update().
 */
export interface ProvenanceStore {
  /**
   * @throws ValidationError when the collection already holds the id
   */
  insert<K extends CollectionName>(collection: K, record: ProvenanceCollections[K]): Promise<void>;

  /**
   * @returns false when no record has the id
   */
  update<K extends CollectionName>(
    collection: K,
    id: string,
    patch: Partial<ProvenanceCollections[K]>
  ): Promise<boolean>;

  get<K extends CollectionName>(collection: K, id: string): Promise<ProvenanceCollections[K] | undefined>;

  find<K extends CollectionName>(
    collection: K,
    predicate?: (record: ProvenanceCollections[K]) => boolean
  ): Promise<ProvenanceCollections[K][]>;

  /**
   * @returns number of records removed
   */
  remove<K extends CollectionName>(collection: K, ids: readonly string[]): Promise<number>;
}

export function emptySnapshot(): ProvenanceSnapshot {
  return {
    agents: [],
    activities: [],
    entities: [],
    derivations: [],
    usages: [],
    communications: [],
    bundles: [],
    versions: [],
    revisions: [],
    configurations: [],
  };
}

/**
 * In-memory store
 */
export class InMemoryProvenanceStore implements ProvenanceStore {
  protected data: ProvenanceSnapshot;

  constructor(snapshot: ProvenanceSnapshot = emptySnapshot()) {
    this.data = structuredClone(snapshot);
  }

  async insert<K extends CollectionName>(collection: K, record: ProvenanceCollections[K]): Promise<void> {
    const records: ProvenanceCollections[K][] = this.data[collection];
    if (records.some((existing) => existing.id === record.id)) {
      throw new ValidationError(`Duplicate ${collection} id ${record.id}`);
    }
    records.push(structuredClone(record));
    await this.changed();
  }

  async update<K extends CollectionName>(
    collection: K,
    id: string,
    patch: Partial<ProvenanceCollections[K]>
  ): Promise<boolean> {
    const records: ProvenanceCollections[K][] = this.data[collection];
    const index = records.findIndex((record) => record.id === id);
    if (index === -1) {
      return false;
    }
    records[index] = { ...records[index], ...structuredClone(patch) };
    await this.changed();
    return true;
  }

  async get<K extends CollectionName>(collection: K, id: string): Promise<ProvenanceCollections[K] | undefined> {
    const records: ProvenanceCollections[K][] = this.data[collection];
    const record = records.find((candidate) => candidate.id === id);
    return record === undefined ? undefined : structuredClone(record);
  }

  async find<K extends CollectionName>(
    collection: K,
    predicate: (record: ProvenanceCollections[K]) => boolean = () => true
  ): Promise<ProvenanceCollections[K][]> {
    const records: ProvenanceCollections[K][] = this.data[collection];
    return records.filter(predicate).map((record) => structuredClone(record));
  }

  async remove<K extends CollectionName>(collection: K, ids: readonly string[]): Promise<number> {
    const targets = new Set(ids);
    const records: ProvenanceCollections[K][] = this.data[collection];
    const kept = records.filter((record) => !targets.has(record.id));
    const removed = records.length - kept.length;
    if (removed > 0) {
      records.splice(0, records.length, ...kept);
      await this.changed();
    }
    return removed;
  }

  /**
   * Copy of everything stored
   */
  snapshot(): ProvenanceSnapshot {
    return structuredClone(this.data);
  }

  /**
   * Called after every mutation
   */
  protected async changed(): Promise<void> {}
}

const recordList: SchemaObject = {
  type: 'array',
  items: { type: 'object', required: ['id'], properties: { id: { type: 'string' } } },
  default: [],
};

const snapshotSchema: SchemaObject = {
  type: 'object',
  properties: Object.fromEntries(COLLECTION_NAMES.map((name) => [name, recordList])),
};

const validateSnapshot = validator.compile<ProvenanceSnapshot>(snapshotSchema);

/**
 * JSON File Store
 *
 * Keeps the snapshot in memory and rewrites the whole file after every
 * mutation. Writes are serialised.
 */
export class JsonFileProvenanceStore extends InMemoryProvenanceStore {
  private logger = new JobLogger('ProvenanceStore');
  private pending: Promise<void> = Promise.resolve();

  private constructor(
    readonly filePath: string,
    snapshot: ProvenanceSnapshot
  ) {
    super(snapshot);
  }

  /**
   * Open the store at filePath, starting empty when the file does not exist
   *
   * @throws ValidationError when the file is not a provenance snapshot
   */
  static async open(filePath: string = ProvenanceConfig.getConfig().storePath): Promise<JsonFileProvenanceStore> {
    const resolved = path.resolve(filePath);

    let content: string;
    try {
      content = await fs.readFile(resolved, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return new JsonFileProvenanceStore(resolved, emptySnapshot());
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    const result = validator.validate(validateSnapshot, parsed);
    if (!result.valid || !result.data) {
      throw new ValidationError(
        `Provenance store ${resolved} is not a valid snapshot:\n${validator.formatErrors(result.errors)}`
      );
    }
    return new JsonFileProvenanceStore(resolved, result.data);
  }

  protected async changed(): Promise<void> {
    const content = JSON.stringify(this.data, null, 2);
    const write = this.pending.then(async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, content, 'utf-8');
    });
    // A failed write must not block later ones
    this.pending = write.catch((error: unknown) => {
      this.logger.error('Failed to write provenance snapshot', error, { path: this.filePath });
    });
    await write;
  }
}
