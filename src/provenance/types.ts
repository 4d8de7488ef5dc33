import { VersionEnvironment } from '../config/provenance.js';

/**
 * PROV-O record types
 *
 * Agents perform activities; activities generate and use entities; entities
 * derive from one another. Every id is an opaque string.
 */

export { VersionEnvironment };

export enum ActivityStatus {
  STARTED = 'started',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export enum VersionStatus {
  DRAFT = 'draft',
  CANDIDATE = 'candidate',
  RELEASED = 'released',
  SUPERSEDED = 'superseded',
  ARCHIVED = 'archived',
}

export type AgentType = 'user' | 'llm_model' | 'extraction_service' | 'system';

export type CommunicationType = 'dependency' | 'sequence' | 'trigger';

export type ConsolidationStrategy = 'latest_best' | 'average' | 'union';

export const CONSOLIDATION_STRATEGIES: readonly ConsolidationStrategy[] = ['latest_best', 'average', 'union'];

export function isConsolidationStrategy(value: string): value is ConsolidationStrategy {
  return CONSOLIDATION_STRATEGIES.some((strategy) => strategy === value);
}

export type Metadata = Record<string, unknown>;

export interface ProvenanceAgent {
  id: string;
  agent_type: AgentType;
  agent_name: string;
  agent_version: string | null;
  metadata: Metadata;
  created_at: string;
}

/**
 * Version fields stamped on activities and entities recorded inside a
 * versioned workflow
 */
export interface VersionStamp {
  version_id: string | null;
  version_number: string | null;
  version_environment: VersionEnvironment;
  version_status: VersionStatus;
  is_development: boolean;
  auto_cleanup: boolean;
  cleanup_after: string | null;
}

export interface ProvenanceActivity extends Partial<VersionStamp> {
  id: string;
  activity_type: string;
  activity_name: string;
  case_id: number | null;
  session_id: string | null;
  agent_id: string;
  execution_plan: Metadata;
  started_at: string;
  ended_at: string | null;
  duration_ms: number | null;
  status: ActivityStatus;
  error_message: string | null;
  revision_of_id?: string | null;
  revision_number?: number | null;
}

export interface QualityMetrics {
  count?: number;
  avg_confidence?: number;
}

/**
 * Content-addressed artefact: content_hash is the SHA-256 of content
 */
export interface ProvenanceEntity extends Partial<VersionStamp> {
  id: string;
  entity_type: string;
  entity_name: string;
  case_id: number | null;
  content: string;
  content_hash: string;
  content_size: number;
  generating_activity_id: string;
  generated_at: string;
  confidence_score: number | null;
  quality_metrics: QualityMetrics;
  metadata: Metadata;
}

export interface ProvenanceDerivation {
  id: string;
  derived_entity_id: string;
  source_entity_id: string;
  derivation_type: string;
  metadata: Metadata;
  created_at: string;
}

export interface ProvenanceUsage {
  id: string;
  activity_id: string;
  entity_id: string;
  usage_role: string;
  metadata: Metadata;
  created_at: string;
}

/**
 * wasInformedBy
 */
export interface ProvenanceCommunication {
  id: string;
  informed_activity_id: string;
  informing_activity_id: string;
  communication_type: CommunicationType;
  created_at: string;
}

export interface ProvenanceBundle {
  id: string;
  bundle_name: string;
  bundle_type: string;
  case_id: number | null;
  session_id: string | null;
  metadata: Metadata;
  started_at: string;
}

export interface ProvenanceVersion {
  id: string;
  workflow_name: string;
  version_number: string;
  version_tag: string;
  environment: VersionEnvironment;
  status: VersionStatus;
  description: string | null;
  created_at: string;
  released_at: string | null;
  superseded_at: string | null;
  expires_at: string | null;
  is_consolidated: boolean;
  consolidated_from: string[];
  consolidation_strategy: ConsolidationStrategy | null;
  performance_metrics: Record<string, number>;
  approved_by: string | null;
}

export interface ProvenanceRevision {
  id: string;
  newer_activity_id: string;
  older_activity_id: string;
  revision_type: 'minor' | 'major' | 'consolidation';
  revision_reason: string;
  version_number: string | null;
  created_at: string;
}

/**
 * Per-workflow versioning policy. The id is the workflow name.
 */
export interface VersionConfiguration {
  id: string;
  workflow_name: string;
  auto_increment_version: boolean;
  dev_retention_hours: number;
  auto_cleanup_dev: boolean;
  consolidation_strategy: ConsolidationStrategy;
  min_versions_to_consolidate: number;
  require_approval: boolean;
  min_test_runs: number;
  required_validation_score: number;
}

/**
 * Record type of every store collection
 */
export interface ProvenanceCollections {
  agents: ProvenanceAgent;
  activities: ProvenanceActivity;
  entities: ProvenanceEntity;
  derivations: ProvenanceDerivation;
  usages: ProvenanceUsage;
  communications: ProvenanceCommunication;
  bundles: ProvenanceBundle;
  versions: ProvenanceVersion;
  revisions: ProvenanceRevision;
  configurations: VersionConfiguration;
}

export type CollectionName = keyof ProvenanceCollections;

export const COLLECTION_NAMES: readonly CollectionName[] = [
  'agents',
  'activities',
  'entities',
  'derivations',
  'usages',
  'communications',
  'bundles',
  'versions',
  'revisions',
  'configurations',
];

export type ProvenanceSnapshot = { [K in CollectionName]: ProvenanceCollections[K][] };

/**
 * The workflow version a tracked call runs under. Passed explicitly through
 * the call chain; trackers keep no current-version state.
 */
export interface VersioningContext {
  workflowName: string;
  environment: VersionEnvironment;
  version: ProvenanceVersion;
  config: VersionConfiguration;
}

export interface GraphNode {
  id: string;
  type: string;
  name: string;
  [detail: string]: unknown;
}

export interface GraphEdge {
  from: string;
  to: string;
  [detail: string]: unknown;
}

export interface ProvenanceGraph {
  nodes: { agents: GraphNode[]; activities: GraphNode[]; entities: GraphNode[] };
  edges: {
    wasGeneratedBy: GraphEdge[];
    wasDerivedFrom: GraphEdge[];
    wasAssociatedWith: GraphEdge[];
    used: GraphEdge[];
    wasInformedBy: GraphEdge[];
  };
}
