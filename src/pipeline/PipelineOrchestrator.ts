/**
 * Pipeline Orchestrator
 *
 * Runs one case through the nine concept extractions in three passes.
 * Concepts run strictly one after another; each concept's results join the
 * cross-concept context before the next prompt is built. A failing concept
 * is recorded and the pipeline moves on.
 */

import { randomUUID } from 'crypto';
import type { OntologyNamespaces } from '../config/ontology.js';
import { ConceptExtractor, type ExtractionResult, type ExtractorDependencies } from '../core/ConceptExtractor.js';
import type { ResultsSink } from '../core/ResultsSink.js';
import { withRetry, type RetryOptions } from '../core/RetryWrapper.js';
import { convertToGraph } from '../graph/ResultGraphConverter.js';
import type { ConceptConfig, ConceptType, PassNumber } from '../jobs/ConceptConfig.js';
import { getConceptConfig } from '../jobs/registry.js';
import { ProvenanceAwareExtractor } from '../provenance/ProvenanceAwareExtractor.js';
import type { VersioningContext } from '../provenance/types.js';
import type { VersionedProvenanceTracker } from '../provenance/VersionedProvenanceTracker.js';
import { toErrorMessage } from '../utils/errors.js';
import { htmlToText } from '../utils/html.js';
import { JobLogger } from '../utils/logger.js';
import { CrossConceptContext } from './CrossConceptContext.js';
import { selectPasses, type PipelinePass } from './steps.js';

// ============================================================================
// Types
// ============================================================================

export interface PipelineDependencies extends ExtractorDependencies {
  sink: ResultsSink;

  /**
   * Records every concept extraction as a provenance activity when set
   */
  tracker?: VersionedProvenanceTracker;
  versioning?: VersioningContext;

  retry?: RetryOptions;
  namespaces?: OntologyNamespaces;
}

export interface PipelineRunOptions {
  caseId: number;

  /**
   * Section name -> text (plain or HTML)
   */
  sections: Partial<Record<string, string>>;

  /**
   * Passes to run; all three by default
   */
  passes?: readonly number[];

  /**
   * Section read by a pass instead of its default
   */
  sectionOverrides?: Partial<Record<PassNumber, string>>;

  /**
   * Results of an earlier run to start from
   */
  context?: CrossConceptContext;
}

export interface ConceptResult {
  concept: ConceptType;
  passNumber: PassNumber;
  sectionType: string;
  sessionId: string | null;
  classCount: number;
  individualCount: number;
  elapsedSeconds: number;
  model: string | null;
  error: string | null;

  /**
   * Extraction succeeded but handing the results to the sink failed
   */
  storageError: string | null;
}

export type PipelineStatus = 'not_started' | 'running' | 'completed' | 'failed';

export interface PipelineState {
  caseId: number | null;
  status: PipelineStatus;
  current: { passNumber: PassNumber; concept: ConceptType } | null;
  startedAt: string | null;
  completedAt: string | null;
  errors: string[];
}

export interface PipelineTotals {
  classes: number;
  individuals: number;
  succeeded: number;
  failed: number;
  elapsedSeconds: number;
}

export interface PipelineResult {
  caseId: number;
  status: 'completed' | 'failed';
  results: ConceptResult[];
  errors: string[];
  totals: PipelineTotals;
  context: CrossConceptContext;
}

export type PipelineEvent =
  | { type: 'pass_started'; passNumber: PassNumber; name: string; concepts: readonly ConceptType[]; sectionType: string }
  | { type: 'concept_started'; passNumber: PassNumber; concept: ConceptType; sectionType: string }
  | { type: 'concept_completed'; result: ConceptResult }
  | { type: 'concept_failed'; result: ConceptResult }
  | { type: 'pass_completed'; passNumber: PassNumber; results: ConceptResult[] }
  | { type: 'pipeline_completed'; result: PipelineResult };

function elapsedSince(startMs: number): number {
  return Math.round((Date.now() - startMs) / 10) / 100;
}

// ============================================================================
// Pipeline Orchestrator
// ============================================================================

export class PipelineOrchestrator {
  private state: PipelineState = {
    caseId: null,
    status: 'not_started',
    current: null,
    startedAt: null,
    completedAt: null,
    errors: [],
  };
  private logger: JobLogger;

  constructor(private readonly deps: PipelineDependencies) {
    this.logger = new JobLogger('PipelineOrchestrator');
  }

  getState(): PipelineState {
    return { ...this.state, errors: [...this.state.errors] };
  }

  /**
   * Run the selected passes and return the per-concept outcome
   */
  async run(options: PipelineRunOptions): Promise<PipelineResult> {
    const stream = this.runStream(options);
    let step = await stream.next();
    while (!step.done) {
      step = await stream.next();
    }
    return step.value;
  }

  /**
   * Same as run(), emitting an event as each pass and concept starts and
   * finishes. Events already emitted stand even if a later concept fails.
   */
  async *runStream(options: PipelineRunOptions): AsyncGenerator<PipelineEvent, PipelineResult, void> {
    const passes = selectPasses(options.passes);
    const startMs = Date.now();
    const results: ConceptResult[] = [];
    let context = options.context ?? CrossConceptContext.empty();

    this.state = {
      caseId: options.caseId,
      status: 'running',
      current: null,
      startedAt: new Date(startMs).toISOString(),
      completedAt: null,
      errors: [],
    };
    this.logger.info(`Pipeline starting for case ${options.caseId}`, {
      passes: passes.map((pass) => pass.number),
    });

    for (const pass of passes) {
      const sectionType = options.sectionOverrides?.[pass.number] ?? pass.defaultSection;
      const rawText = options.sections[sectionType];
      const text = rawText ? htmlToText(rawText) : '';

      yield { type: 'pass_started', passNumber: pass.number, name: pass.name, concepts: pass.concepts, sectionType };

      const passResults: ConceptResult[] = [];
      for (const concept of pass.concepts) {
        this.state.current = { passNumber: pass.number, concept };
        yield { type: 'concept_started', passNumber: pass.number, concept, sectionType };

        const outcome = await this.runConcept(pass, concept, sectionType, text, options.caseId, context);
        context = outcome.context;
        passResults.push(outcome.result);
        results.push(outcome.result);

        for (const message of [outcome.result.error, outcome.result.storageError]) {
          if (message) {
            this.state.errors.push(message);
          }
        }

        yield outcome.result.error
          ? { type: 'concept_failed', result: outcome.result }
          : { type: 'concept_completed', result: outcome.result };
      }

      yield { type: 'pass_completed', passNumber: pass.number, results: passResults };
    }

    const totals: PipelineTotals = {
      classes: results.reduce((sum, result) => sum + result.classCount, 0),
      individuals: results.reduce((sum, result) => sum + result.individualCount, 0),
      succeeded: results.filter((result) => !result.error).length,
      failed: results.filter((result) => result.error).length,
      elapsedSeconds: elapsedSince(startMs),
    };
    const status = totals.succeeded > 0 ? 'completed' : 'failed';

    this.state.status = status;
    this.state.current = null;
    this.state.completedAt = new Date().toISOString();
    this.logger.info(
      `Pipeline ${status} for case ${options.caseId}: ${totals.classes} classes, ` +
        `${totals.individuals} individuals, ${totals.failed} failed concepts (${totals.elapsedSeconds}s)`
    );

    const result: PipelineResult = {
      caseId: options.caseId,
      status,
      results,
      errors: [...this.state.errors],
      totals,
      context,
    };
    yield { type: 'pipeline_completed', result };
    return result;
  }

  private async runConcept(
    pass: PipelinePass,
    concept: ConceptType,
    sectionType: string,
    text: string,
    caseId: number,
    context: CrossConceptContext
  ): Promise<{ result: ConceptResult; context: CrossConceptContext }> {
    const startMs = Date.now();
    const base: ConceptResult = {
      concept,
      passNumber: pass.number,
      sectionType,
      sessionId: null,
      classCount: 0,
      individualCount: 0,
      elapsedSeconds: 0,
      model: null,
      error: null,
      storageError: null,
    };

    const log = this.logger.withContext({ caseId, concept, passNumber: pass.number });

    if (!text.trim()) {
      const error = `No ${sectionType} text for ${concept}`;
      log.warn(`[Pass ${pass.number}] ${error}`);
      return { result: { ...base, error }, context };
    }

    const config: ConceptConfig = getConceptConfig(concept);
    const sessionId = randomUUID();

    let extraction: ExtractionResult;
    try {
      extraction = await withRetry(() => this.extractOnce(config, sessionId, text, caseId, sectionType, context), {
        ...this.deps.retry,
        label: concept,
      });
    } catch (error) {
      const message = `${concept} extraction failed: ${toErrorMessage(error)}`;
      log.error(`[Pass ${pass.number}] ${message}`, error, { sessionId });
      return { result: { ...base, sessionId, error: message, elapsedSeconds: elapsedSince(startMs) }, context };
    }

    const data = convertToGraph(extraction.classes, extraction.individuals, config, caseId, sectionType, {
      passNumber: pass.number,
      namespaces: this.deps.namespaces,
    });

    let storageError: string | null = null;
    try {
      await this.deps.sink.storePrompt({
        caseId,
        concept,
        step: pass.number,
        sectionType,
        sessionId,
        promptText: extraction.prompt,
        rawResponse: extraction.rawResponse,
        model: extraction.model,
        templateId: extraction.templateId,
        classCount: extraction.classes.length,
        individualCount: extraction.individuals.length,
        createdAt: new Date().toISOString(),
      });
      await this.deps.sink.storeResults({
        caseId,
        concept,
        passNumber: pass.number,
        sectionType,
        sessionId,
        data,
        ontologyDefinitions: extraction.ontologyDefinitions,
        storedAt: new Date().toISOString(),
      });
    } catch (error) {
      storageError = `${concept} storage failed: ${toErrorMessage(error)}`;
      log.error(`[Pass ${pass.number}] ${storageError}`, error, { sessionId });
    }

    const result: ConceptResult = {
      ...base,
      sessionId,
      classCount: extraction.classes.length,
      individualCount: extraction.individuals.length,
      elapsedSeconds: elapsedSince(startMs),
      model: extraction.model,
      storageError,
    };
    log.info(
      `[Pass ${pass.number}] ${concept}: ${result.classCount} classes, ` +
        `${result.individualCount} individuals (${result.elapsedSeconds}s)`
    );

    return { result, context: context.with(concept, sectionType, data) };
  }

  /**
   * One attempt: a fresh extractor, wrapped in provenance when a tracker is set
   */
  private async extractOnce(
    config: ConceptConfig,
    sessionId: string,
    text: string,
    caseId: number,
    sectionType: string,
    context: CrossConceptContext
  ): Promise<ExtractionResult> {
    const extractor = await ConceptExtractor.create(config, this.deps);

    const tracker = this.deps.tracker;
    if (!tracker) {
      return extractor.extract(text, caseId, sectionType, context);
    }

    const tracked = new ProvenanceAwareExtractor(extractor, tracker, {
      sessionId,
      versioning: this.deps.versioning,
    });
    const { result } = await tracked.extract(text, caseId, sectionType, context);
    return result;
  }
}
