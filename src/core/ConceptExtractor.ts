import type { ConceptConfig, ConceptType } from '../jobs/ConceptConfig.js';
import { getConceptConfig } from '../jobs/registry.js';
import type { BaseCandidate, BaseIndividual } from '../jobs/schemaParts.js';
import { ValidationError } from '../utils/errors.js';
import { JobLogger } from '../utils/logger.js';
import { extractJsonFromResponse, isValidJson } from '../utils/validators.js';
import { linkIndividuals } from './IndividualLinker.js';
import { repairTruncatedJson } from './jsonRepair.js';
import type { OntologyCatalogue, OntologyEntity } from './OntologyCatalogue.js';
import { collectOntologyDefinitions, matchClasses, type OntologyDefinition } from './OntologyMatcher.js';
import { PromptBuilder, type PriorResults } from './PromptBuilder.js';
import type { PromptTemplate, PromptTemplateStore } from './PromptTemplateStore.js';
import type { LLMProvider } from './providers/LLMProvider.js';
import { ResultNormalizer } from './ResultNormalizer.js';
import { ResultValidator } from './ResultValidator.js';

/**
 * Collaborators handed to every extractor. Nothing is cached between
 * extractors; each call site constructs its own.
 */
export interface ExtractorDependencies {
  provider: LLMProvider;
  catalogue: OntologyCatalogue;
  templates: PromptTemplateStore;
}

export interface ExtractionResult<C extends BaseCandidate = BaseCandidate, I extends BaseIndividual = BaseIndividual> {
  concept: ConceptType;
  classes: C[];
  individuals: I[];
  prompt: string;
  rawResponse: string;
  model: string;
  truncated: boolean;

  /**
   * Items dropped during per-item validation
   */
  discarded: number;

  /**
   * Catalogue definitions of matched classes, by class label
   */
  ontologyDefinitions: Record<string, OntologyDefinition>;

  /**
   * Id of the template the prompt was rendered from
   */
  templateId: string | null;
}

/**
 * Concept Extractor
 *
 * One concept type over one piece of case text:
 * prompt -> LLM -> repair -> parse -> normalize -> validate -> match -> link.
 *
 * Malformed output degrades to partial or empty results. LLM and catalogue
 * failures propagate to the caller's retry wrapper.
 */
export class ConceptExtractor<C extends BaseCandidate = BaseCandidate, I extends BaseIndividual = BaseIndividual> {
  private logger: JobLogger;
  private builder: PromptBuilder;
  private normalizer: ResultNormalizer;
  private validator: ResultValidator<C, I>;

  private constructor(
    readonly config: ConceptConfig<C, I>,
    private readonly provider: LLMProvider,
    private readonly template: PromptTemplate | null,
    private readonly existingEntities: readonly OntologyEntity[]
  ) {
    this.logger = new JobLogger(`ConceptExtractor:${config.concept}`);
    this.builder = new PromptBuilder(config, template, existingEntities, (concept) => getConceptConfig(concept));
    this.normalizer = new ResultNormalizer(config);
    this.validator = new ResultValidator(config);
  }

  /**
   * Load the catalogue entities and the active template for a concept.
   * A missing template is reported when the prompt is built.
   */
  static async create<C extends BaseCandidate, I extends BaseIndividual>(
    config: ConceptConfig<C, I>,
    deps: ExtractorDependencies
  ): Promise<ConceptExtractor<C, I>> {
    const [entities, template] = await Promise.all([
      deps.catalogue.getEntitiesByCategory(config.ontologyCategory),
      deps.templates.getActiveTemplate(config.step, config.concept),
    ]);
    return new ConceptExtractor(config, deps.provider, template, entities);
  }

  get concept(): ConceptType {
    return this.config.concept;
  }

  get entityCount(): number {
    return this.existingEntities.length;
  }

  /**
   * @throws ValidationError on empty source text
   * @throws ConfigurationError when the concept has no active template
   */
  async extract(
    caseText: string,
    caseId: number,
    sectionType: string,
    prior?: PriorResults
  ): Promise<ExtractionResult<C, I>> {
    if (!caseText.trim()) {
      throw new ValidationError(`Source text for ${this.concept} extraction is empty`);
    }

    const prompt = this.builder.build({ caseText, sectionType, prior });
    this.logger.info(`Case ${caseId} (${sectionType}): prompt ${prompt.length} chars, ${this.entityCount} existing entities`);

    const response = await this.provider.complete({
      prompt,
      tier: this.config.modelTier,
      maxTokens: this.config.maxTokens,
      temperature: this.config.temperature,
      label: this.concept,
    });
    this.logger.info(`Response ${response.text.length} chars from ${response.model}`, {
      truncated: response.truncated,
      usage: response.usage,
    });

    const result: ExtractionResult<C, I> = {
      concept: this.concept,
      classes: [],
      individuals: [],
      prompt,
      rawResponse: response.text,
      model: response.model,
      truncated: response.truncated,
      discarded: 0,
      ontologyDefinitions: {},
      templateId: this.template?.id ?? null,
    };

    const parsed = this.parseResponse(response.text, response.truncated);
    if (parsed === undefined) {
      return result;
    }

    const payload = this.normalizer.normalizeResponse(parsed);
    if (!payload) {
      return result;
    }

    const { classes, individuals, discarded } = this.validator.validate(payload);

    const matched = matchClasses(classes, this.existingEntities);
    const linked = linkIndividuals(individuals, classes, this.existingEntities, this.config);
    this.logger.info(
      `Extracted ${classes.length} classes, ${individuals.length} individuals ` +
        `(${matched} classes matched, ${linked} individuals linked, ${discarded} discarded)`
    );

    return {
      ...result,
      classes,
      individuals,
      discarded,
      ontologyDefinitions: collectOntologyDefinitions(classes, this.existingEntities),
    };
  }

  /**
   * Parsed JSON value, or undefined when nothing usable came back
   */
  private parseResponse(text: string, truncated: boolean): unknown {
    let content = text;

    if (truncated) {
      this.logger.warn('Response hit the output token limit, attempting JSON repair');
      const repair = repairTruncatedJson(text);
      if (!isValidJson(repair.text)) {
        this.logger.error('JSON repair failed, returning empty result');
        return undefined;
      }
      if (repair.repaired) {
        this.logger.warn(
          `Repaired truncated JSON: kept ${repair.keptChars}/${repair.totalChars} chars ` +
            `(discarded ${repair.totalChars - repair.keptChars})`
        );
      }
      content = repair.text;
    }

    try {
      return extractJsonFromResponse(content);
    } catch (error) {
      this.logger.error('Could not parse LLM response as JSON', error, {
        preview: content.slice(0, 200),
      });
      return undefined;
    }
  }
}
