import fs from 'fs/promises';
import path from 'path';
import { ExtractionConfig } from '../config/extraction.js';
import type { ConceptType, PassNumber } from '../jobs/ConceptConfig.js';
import type { ConceptGraphData } from '../graph/ResultGraphConverter.js';
import { JobLogger } from '../utils/logger.js';
import type { OntologyDefinition } from './OntologyMatcher.js';

/**
 * Prompt and raw response of one concept extraction
 */
export interface ExtractionPromptRecord {
  caseId: number;
  concept: ConceptType;
  step: PassNumber;
  sectionType: string;
  sessionId: string;
  promptText: string;
  rawResponse: string;
  model: string;
  templateId: string | null;
  classCount: number;
  individualCount: number;
  createdAt: string;
}

/**
 * Converted graph data of one concept extraction
 */
export interface StoredConceptResult {
  caseId: number;
  concept: ConceptType;
  passNumber: PassNumber;
  sectionType: string;
  sessionId: string;
  data: ConceptGraphData;
  ontologyDefinitions: Record<string, OntologyDefinition>;
  storedAt: string;
}

/**
 * Where extraction output is handed off. Storage schema is the sink's business.
 */
export interface ResultsSink {
  storePrompt(record: ExtractionPromptRecord): Promise<void>;
  storeResults(result: StoredConceptResult): Promise<void>;
}

/**
 * JSON File Results Sink
 *
 * results/<caseId>/<concept>-<sessionId>.json
 * results/<caseId>/<concept>-<sessionId>.prompt.json
 */
export class JsonFileResultsSink implements ResultsSink {
  private baseDir: string;
  private logger: JobLogger;

  constructor(baseDir: string = ExtractionConfig.getConfig().resultsDir) {
    this.baseDir = path.resolve(baseDir);
    this.logger = new JobLogger('ResultsSink');
  }

  resultPath(caseId: number, concept: ConceptType, sessionId: string): string {
    return path.join(this.baseDir, String(caseId), `${concept}-${sessionId}.json`);
  }

  promptPath(caseId: number, concept: ConceptType, sessionId: string): string {
    return path.join(this.baseDir, String(caseId), `${concept}-${sessionId}.prompt.json`);
  }

  async storePrompt(record: ExtractionPromptRecord): Promise<void> {
    await this.write(this.promptPath(record.caseId, record.concept, record.sessionId), record);
  }

  async storeResults(result: StoredConceptResult): Promise<void> {
    const filePath = this.resultPath(result.caseId, result.concept, result.sessionId);
    await this.write(filePath, result);
    this.logger.debug('Results saved', {
      concept: result.concept,
      classes: result.data.new_classes.length,
      individuals: result.data.new_individuals.length,
      path: filePath,
    });
  }

  private async write(filePath: string, value: object): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(value, null, 2), 'utf-8');
  }
}

/**
 * Keeps everything in arrays; used by tests and dry runs
 */
export class InMemoryResultsSink implements ResultsSink {
  readonly prompts: ExtractionPromptRecord[] = [];
  readonly results: StoredConceptResult[] = [];

  async storePrompt(record: ExtractionPromptRecord): Promise<void> {
    this.prompts.push(record);
  }

  async storeResults(result: StoredConceptResult): Promise<void> {
    this.results.push(result);
  }

  resultsFor(concept: ConceptType): StoredConceptResult[] {
    return this.results.filter((result) => result.concept === concept);
  }
}
