import type { ConceptConfig, ConceptType } from '../jobs/ConceptConfig.js';
import type { ConceptGraphData, GraphIndividual } from '../graph/ResultGraphConverter.js';
import { ConfigurationError } from '../utils/errors.js';
import type { OntologyEntity } from './OntologyCatalogue.js';
import type { PromptTemplate } from './PromptTemplateStore.js';

/**
 * Prompt construction for one concept extraction
 *
 * template(case text, existing entities, prior-section classes,
 * cross-concept context) + JSON wrapper suffix
 */

export const MAX_EXISTING_ENTITIES = 20;
export const EXISTING_DEFINITION_MAX_LENGTH = 150;
const CROSS_DEFINITION_MAX_LENGTH = 120;
const SUMMARY_DESCRIPTOR_MAX_LENGTH = 150;

/**
 * Case sections in reading order
 */
export const SECTION_ORDER = ['facts', 'discussion', 'questions', 'conclusions'] as const;

/**
 * Earlier extraction results for the same case, as stored by the pipeline
 */
export interface PriorResults {
  resultsFor(concept: ConceptType): ReadonlyArray<{ section: string; data: ConceptGraphData }>;
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text;
}

/**
 * Drop control characters other than tab, newline and carriage return
 */
export function stripControlCharacters(text: string): string {
  return text.replace(/[\x00-\x08\x0b\x0c\x0e-\x1f]/g, '');
}

function entityLine(entity: OntologyEntity): string {
  return entity.definition
    ? `- ${entity.label}: ${truncate(entity.definition, EXISTING_DEFINITION_MAX_LENGTH)}`
    : `- ${entity.label}`;
}

/**
 * Existing catalogue entities grouped by tier
 */
export function formatExistingEntities(entities: readonly OntologyEntity[], concept: ConceptType): string {
  if (entities.length === 0) {
    return `No existing ${concept} classes found in ontology.`;
  }

  const shown = entities.slice(0, MAX_EXISTING_ENTITIES);
  const groups = [
    {
      entities: shown.filter((entity) => (entity.tier ?? 'canonical') === 'canonical'),
      heading: `=== CANONICAL ONTOLOGY CLASSES (${concept}) ===`,
      note: 'Hand-curated classes from the formal ontology. Match to these with high confidence.',
    },
    {
      entities: shown.filter((entity) => entity.tier === 'extracted'),
      heading: '=== PREVIOUSLY EXTRACTED CLASSES (from other cases) ===',
      note: 'Extracted from earlier cases and approved. Match if the same concept appears.',
    },
    {
      entities: shown.filter((entity) => entity.tier === 'external'),
      heading: '=== EXTERNAL REFERENCE STANDARDS ===',
      note: 'Professional codes and technical standards. Reference context only.',
    },
  ];

  const lines: string[] = [];
  for (const group of groups) {
    if (group.entities.length === 0) {
      continue;
    }
    if (lines.length > 0) {
      lines.push('');
    }
    lines.push(group.heading, group.note, ...group.entities.map(entityLine));
  }
  return lines.join('\n');
}

/**
 * Classes of the same concept already extracted from earlier sections of
 * the case. Empty for the facts section.
 */
export function formatPriorSectionClasses(
  concept: ConceptType,
  sectionType: string,
  prior?: PriorResults
): string {
  if (!prior) {
    return '';
  }

  const currentIndex = SECTION_ORDER.findIndex((section) => section === sectionType);
  const priorSections: readonly string[] = SECTION_ORDER.slice(0, Math.max(currentIndex, 0));
  if (priorSections.length === 0) {
    return '';
  }

  const classes = prior
    .resultsFor(concept)
    .filter((result) => priorSections.includes(result.section))
    .flatMap((result) => result.data.new_classes);
  if (classes.length === 0) {
    return '';
  }

  const lines = [
    `\n\n--- ${concept.toUpperCase()} CLASSES ALREADY EXTRACTED FROM PRIOR SECTIONS ---`,
    'These classes were found in earlier sections of this case.',
    'Reference them via match_decision if the same concept appears here.',
    'Do NOT re-create them as new classes.\n',
    ...classes.map((cls) => `- ${cls.label}: ${cls.definition}`),
  ];
  return lines.join('\n');
}

/**
 * One-line summary of a stored individual: class reference and the first
 * available descriptor
 */
export function summarizeIndividual(individual: GraphIndividual, config: ConceptConfig): string {
  const summaryFields = config.summaryFields;
  if (!summaryFields) {
    return '';
  }

  const parts: string[] = [];
  const classRef = individual.properties[summaryFields.classRefKey]?.[0];
  if (classRef) {
    parts.push(classRef);
  }

  for (const key of summaryFields.descriptorKeys) {
    const descriptor = individual.properties[key]?.[0];
    if (descriptor) {
      parts.push(truncate(descriptor, SUMMARY_DESCRIPTOR_MAX_LENGTH));
      break;
    }
  }

  return parts.join(' -- ');
}

/**
 * Results of the concepts this concept depends on, rendered for the prompt.
 * Empty when the concept has no dependencies or nothing was extracted yet.
 */
export function formatCrossConceptContext(
  config: ConceptConfig,
  prior: PriorResults | undefined,
  lookup: (concept: ConceptType) => ConceptConfig
): string {
  const dependencies = config.crossConceptDependencies;
  if (!dependencies || !prior) {
    return '';
  }

  const sections: string[] = [];
  for (const dependency of dependencies.dependsOn) {
    const results = prior.resultsFor(dependency);
    const classes = results.flatMap((result) => result.data.new_classes);
    const individuals = results.flatMap((result) => result.data.new_individuals);
    if (classes.length === 0 && individuals.length === 0) {
      continue;
    }

    const lines = [`\n--- ${dependency.toUpperCase()} (from prior extraction) ---`];
    if (classes.length > 0) {
      lines.push(`Classes (${classes.length}):`);
      for (const cls of classes) {
        lines.push(`  - ${cls.label}: ${truncate(cls.definition, CROSS_DEFINITION_MAX_LENGTH)}`);
      }
    }
    if (individuals.length > 0) {
      const dependencyConfig = lookup(dependency);
      lines.push(`Individuals (${individuals.length}):`);
      for (const individual of individuals) {
        const summary =
          summarizeIndividual(individual, dependencyConfig) ||
          truncate(individual.definition, CROSS_DEFINITION_MAX_LENGTH);
        lines.push(`  - ${individual.label}: ${summary}`);
      }
    }
    sections.push(lines.join('\n'));
  }

  if (sections.length === 0) {
    return '';
  }

  return `\n\n=== CROSS-CONCEPT CONTEXT ===\n${dependencies.instruction}\n` + sections.join('\n');
}

/**
 * Instruction appended after the rendered template so the response keys
 * always match the registry
 */
export function buildJsonWrapperSuffix(config: ConceptConfig): string {
  const { classesKey, individualsKey, fieldRequirements } = config;

  let suffix =
    '\n\nIMPORTANT: Wrap your response as a JSON object with exactly two keys:\n' +
    `{"${classesKey}": [...], "${individualsKey}": [...]}\n` +
    `If there are no individuals to report, use an empty array for "${individualsKey}".`;

  if (fieldRequirements) {
    suffix +=
      `\n\nREQUIRED FIELDS on every class: ${fieldRequirements.classRequired}\n` +
      `REQUIRED FIELDS on every individual: ${fieldRequirements.individualRequired}`;
    if (fieldRequirements.matchDecisionNote) {
      suffix += `\n${fieldRequirements.matchDecisionNote}`;
    }
  }

  return suffix;
}

export interface PromptInput {
  caseText: string;
  sectionType: string;
  prior?: PriorResults;
}

/**
 * Prompt Builder
 */
export class PromptBuilder {
  constructor(
    private readonly config: ConceptConfig,
    private readonly template: PromptTemplate | null,
    private readonly existingEntities: readonly OntologyEntity[],
    private readonly lookup: (concept: ConceptType) => ConceptConfig
  ) {}

  /**
   * @throws ConfigurationError when the concept has no active template
   */
  build(input: PromptInput): string {
    if (!this.template) {
      throw new ConfigurationError(
        `No prompt template available for ${this.config.concept} (step ${this.config.step}). ` +
          'Check extraction_prompt_templates.'
      );
    }

    const concept = this.config.concept;
    const existingText =
      formatExistingEntities(this.existingEntities, concept) +
      formatPriorSectionClasses(concept, input.sectionType, input.prior);

    const rendered = this.template.render({
      case_text: stripControlCharacters(input.caseText),
      section_type: input.sectionType,
      [`existing_${concept}_text`]: existingText,
      existing_entities_text: existingText,
      cross_concept_context: formatCrossConceptContext(this.config, input.prior, this.lookup),
    });

    return rendered + buildJsonWrapperSuffix(this.config);
  }
}
