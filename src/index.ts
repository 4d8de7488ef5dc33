export { ConceptExtractor, type ExtractionResult, type ExtractorDependencies } from './core/ConceptExtractor.js';
export { ResultNormalizer, normalizeComplianceStatus, inferCategory } from './core/ResultNormalizer.js';
export { ResultValidator, type ValidatedResult } from './core/ResultValidator.js';
export { matchClasses, collectOntologyDefinitions, normalizeLabel, type OntologyDefinition } from './core/OntologyMatcher.js';
export { linkIndividuals } from './core/IndividualLinker.js';
export { withRetry, isTransientFailure, backoffDelay, type RetryOptions } from './core/RetryWrapper.js';
export { repairTruncatedJson, type JsonRepairResult } from './core/jsonRepair.js';
export { PromptBuilder, type PriorResults } from './core/PromptBuilder.js';
export {
  InMemoryPromptTemplateStore,
  PostgresPromptTemplateStore,
  type PromptTemplate,
  type PromptTemplateStore,
} from './core/PromptTemplateStore.js';
export {
  HttpOntologyCatalogue,
  InMemoryOntologyCatalogue,
  type OntologyCatalogue,
  type OntologyEntity,
} from './core/OntologyCatalogue.js';
export {
  InMemoryResultsSink,
  JsonFileResultsSink,
  type ResultsSink,
  type ExtractionPromptRecord,
  type StoredConceptResult,
} from './core/ResultsSink.js';
export * from './core/providers/index.js';

export { convertToGraph, type ConceptGraphData, type GraphClass, type GraphIndividual } from './graph/ResultGraphConverter.js';

export { CONCEPT_TYPES, type ConceptConfig, type ConceptType, type PassNumber } from './jobs/ConceptConfig.js';
export { CONCEPT_REGISTRY, getConceptConfig, resolveConceptType, listConceptConfigs } from './jobs/registry.js';

export {
  PipelineOrchestrator,
  type ConceptResult,
  type PipelineDependencies,
  type PipelineEvent,
  type PipelineResult,
  type PipelineRunOptions,
} from './pipeline/PipelineOrchestrator.js';
export { CrossConceptContext } from './pipeline/CrossConceptContext.js';
export { PIPELINE_PASSES, selectPasses, passOf, type PipelinePass } from './pipeline/steps.js';
export { loadManifest, parseManifest, type BatchManifest } from './pipeline/manifest.js';

export * from './provenance/types.js';
export {
  InMemoryProvenanceStore,
  JsonFileProvenanceStore,
  type ProvenanceStore,
} from './provenance/ProvenanceStore.js';
export { ProvenanceTracker, contentHash } from './provenance/ProvenanceTracker.js';
export { VersionedProvenanceTracker, nextVersionNumber } from './provenance/VersionedProvenanceTracker.js';
export { ProvenanceAwareExtractor } from './provenance/ProvenanceAwareExtractor.js';

export * from './utils/errors.js';
export { createLogger, JobLogger } from './utils/logger.js';
export { htmlToText } from './utils/html.js';
