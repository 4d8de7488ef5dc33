import { randomUUID } from 'crypto';
import type { ConceptExtractor, ExtractionResult } from '../core/ConceptExtractor.js';
import type { PriorResults } from '../core/PromptBuilder.js';
import type { BaseCandidate, BaseIndividual } from '../jobs/schemaParts.js';
import type { VersionedProvenanceTracker } from './VersionedProvenanceTracker.js';
import type { VersioningContext } from './types.js';

export interface ProvenanceExtraction<C extends BaseCandidate, I extends BaseIndividual> {
  result: ExtractionResult<C, I>;
  activityId: string;
  promptEntityId: string;
  responseEntityId: string;
  extractionEntityId: string;
}

export interface ProvenanceExtractorOptions {
  /**
   * Agent name, e.g. "RolesExtractor"
   */
  extractorName?: string;
  sessionId?: string;
  versioning?: VersioningContext;
}

function defaultExtractorName(concept: string): string {
  return `${concept.charAt(0).toUpperCase()}${concept.slice(1)}Extractor`;
}

/**
 * Provenance-aware extraction
 *
 * Runs a concept extraction inside an "extraction" activity and records the
 * prompt, the raw response (derived from the prompt) and the result set
 * (derived from the response).
 */
export class ProvenanceAwareExtractor<C extends BaseCandidate, I extends BaseIndividual> {
  readonly sessionId: string;
  readonly extractorName: string;

  constructor(
    private readonly extractor: ConceptExtractor<C, I>,
    private readonly tracker: VersionedProvenanceTracker,
    private readonly options: ProvenanceExtractorOptions = {}
  ) {
    this.sessionId = options.sessionId ?? randomUUID();
    this.extractorName = options.extractorName ?? defaultExtractorName(extractor.concept);
  }

  async extract(
    caseText: string,
    caseId: number,
    sectionType: string,
    prior?: PriorResults
  ): Promise<ProvenanceExtraction<C, I>> {
    const concept = this.extractor.concept;
    const config = this.extractor.config;

    return this.tracker.trackActivity(
      {
        activityType: 'extraction',
        activityName: `${concept}_extraction`,
        caseId,
        sessionId: this.sessionId,
        agentType: 'extraction_service',
        agentName: this.extractorName,
        executionPlan: {
          concept,
          section_type: sectionType,
          step: config.step,
          model_tier: config.modelTier,
          temperature: config.temperature,
        },
        versioning: this.options.versioning,
      },
      async (activity) => {
        const result = await this.extractor.extract(caseText, caseId, sectionType, prior);
        const items = [...result.classes, ...result.individuals];

        const prompt = await this.tracker.recordPrompt(result.prompt, activity, {
          entityName: `${this.extractorName}_prompt`,
          metadata: {
            extractor: this.extractorName,
            concept_type: concept,
            section_type: sectionType,
            text_length: caseText.length,
            template_id: result.templateId,
          },
        });

        const response = await this.tracker.recordResponse(result.rawResponse, activity, {
          derivedFrom: prompt,
          entityName: `${this.extractorName}_response`,
          metadata: {
            extractor: this.extractorName,
            model: result.model,
            truncated: result.truncated,
            candidates_count: items.length,
          },
        });

        const extraction = await this.tracker.recordExtractionResults(items, activity, `extracted_${concept}`, {
          derivedFrom: [response],
          metadata: {
            extractor: this.extractorName,
            concept_type: concept,
            class_count: result.classes.length,
            individual_count: result.individuals.length,
            discarded: result.discarded,
          },
        });

        return {
          result,
          activityId: activity.id,
          promptEntityId: prompt.id,
          responseEntityId: response.id,
          extractionEntityId: extraction.id,
        };
      }
    );
  }
}
