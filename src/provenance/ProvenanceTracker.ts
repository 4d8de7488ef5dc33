import { createHash, randomUUID } from 'crypto';
import { toErrorMessage } from '../utils/errors.js';
import { JobLogger } from '../utils/logger.js';
import { isRecord } from '../utils/validators.js';
import type { ProvenanceStore } from './ProvenanceStore.js';
import {
  ActivityStatus,
  type AgentType,
  type CommunicationType,
  type Metadata,
  type ProvenanceActivity,
  type ProvenanceAgent,
  type ProvenanceBundle,
  type ProvenanceEntity,
  type ProvenanceGraph,
  type QualityMetrics,
  type VersionStamp,
} from './types.js';

export interface ActivityOptions {
  activityType: string;
  activityName: string;
  caseId?: number | null;
  sessionId?: string | null;
  agentType?: AgentType;
  agentName?: string;
  agentVersion?: string | null;
  executionPlan?: Metadata;
}

export interface EntityOptions {
  entityName?: string;
  metadata?: Metadata;
}

export interface TrackerOptions {
  clock?: () => Date;
}

export function contentHash(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Count and mean confidence of a list of result records
 */
export function computeQualityMetrics(results: unknown): QualityMetrics {
  if (!Array.isArray(results)) {
    return {};
  }

  const metrics: QualityMetrics = { count: results.length };
  const confidences = results
    .map((result: unknown) => (isRecord(result) ? result.confidence : undefined))
    .filter((value): value is number => typeof value === 'number');
  if (confidences.length > 0) {
    metrics.avg_confidence = confidences.reduce((sum, value) => sum + value, 0) / confidences.length;
  }
  return metrics;
}

/**
 * Provenance Tracker
 *
 * Records extraction work as PROV-O activities, entities and relations.
 *
 * Usage:
 *   await tracker.trackActivity({ activityType: 'llm_query', activityName: 'role_extraction', caseId: 7 },
 *     async (activity) => {
 *       const prompt = await tracker.recordPrompt(promptText, activity);
 *       // ... call the LLM ...
 *       await tracker.recordResponse(responseText, activity, { derivedFrom: prompt });
 *     });
 */
export class ProvenanceTracker {
  protected logger: JobLogger;
  protected clock: () => Date;
  private agentCache = new Map<string, ProvenanceAgent>();

  constructor(
    readonly store: ProvenanceStore,
    options: TrackerOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = new JobLogger('ProvenanceTracker');
  }

  protected now(): string {
    return this.clock().toISOString();
  }

  async getOrCreateAgent(
    agentType: AgentType,
    agentName: string,
    agentVersion: string | null = null,
    metadata: Metadata = {}
  ): Promise<ProvenanceAgent> {
    const cacheKey = `${agentType}:${agentName}:${agentVersion}`;
    const cached = this.agentCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const [existing] = await this.store.find(
      'agents',
      (agent) =>
        agent.agent_type === agentType && agent.agent_name === agentName && agent.agent_version === agentVersion
    );

    let agent = existing;
    if (!agent) {
      agent = {
        id: randomUUID(),
        agent_type: agentType,
        agent_name: agentName,
        agent_version: agentVersion,
        metadata,
        created_at: this.now(),
      };
      await this.store.insert('agents', agent);
    }

    this.agentCache.set(cacheKey, agent);
    return agent;
  }

  /**
   * Run fn inside a tracked activity. The activity is stored as started
   * before fn runs and always ends completed or failed; errors from fn are
   * rethrown after the failure is recorded, even when recording it fails.
   */
  async trackActivity<T>(options: ActivityOptions, fn: (activity: ProvenanceActivity) => Promise<T>): Promise<T> {
    const activity = await this.startActivity(options);

    let value: T;
    try {
      value = await fn(activity);
    } catch (error) {
      try {
        await this.finishActivity(activity, ActivityStatus.FAILED, {
          error_message: toErrorMessage(error),
          ...this.failedPatch(activity),
        });
      } catch (recordError) {
        this.logger.error(`Could not record failure of activity ${activity.activity_name}`, recordError, {
          activityId: activity.id,
        });
      }
      throw error;
    }

    await this.finishActivity(activity, ActivityStatus.COMPLETED, this.completedPatch(activity));
    return value;
  }

  protected async startActivity(options: ActivityOptions): Promise<ProvenanceActivity> {
    const agent = await this.getOrCreateAgent(
      options.agentType ?? 'system',
      options.agentName ?? 'concept-extraction-engine',
      options.agentVersion ?? null
    );

    const activity: ProvenanceActivity = {
      id: randomUUID(),
      activity_type: options.activityType,
      activity_name: options.activityName,
      case_id: options.caseId ?? null,
      session_id: options.sessionId ?? null,
      agent_id: agent.id,
      execution_plan: options.executionPlan ?? {},
      started_at: this.now(),
      ended_at: null,
      duration_ms: null,
      status: ActivityStatus.STARTED,
      error_message: null,
      ...(await this.activityExtras(options)),
    };
    await this.store.insert('activities', activity);
    await this.afterStart(activity, options);
    return activity;
  }

  private async finishActivity(
    activity: ProvenanceActivity,
    status: ActivityStatus,
    patch: Partial<ProvenanceActivity>
  ): Promise<void> {
    const endedAt = this.clock();
    const update: Partial<ProvenanceActivity> = {
      ended_at: endedAt.toISOString(),
      duration_ms: endedAt.getTime() - new Date(activity.started_at).getTime(),
      status,
      ...patch,
    };
    Object.assign(activity, update);
    await this.store.update('activities', activity.id, update);

    if (status === ActivityStatus.FAILED) {
      this.logger.warn(`Activity ${activity.activity_name} failed: ${activity.error_message}`);
    } else {
      this.logger.debug(`Activity ${activity.activity_name} completed in ${activity.duration_ms}ms`);
    }
  }

  /**
   * Extra fields for a new activity
   */
  protected async activityExtras(_options: ActivityOptions): Promise<Partial<ProvenanceActivity>> {
    return {};
  }

  protected async afterStart(_activity: ProvenanceActivity, _options: ActivityOptions): Promise<void> {}

  protected completedPatch(_activity: ProvenanceActivity): Partial<ProvenanceActivity> {
    return {};
  }

  protected failedPatch(_activity: ProvenanceActivity): Partial<ProvenanceActivity> {
    return {};
  }

  /**
   * Version fields entities inherit from their generating activity
   */
  protected entityStamp(_activity: ProvenanceActivity): Partial<VersionStamp> {
    return {};
  }

  private async recordEntity(
    entityType: string,
    entityName: string,
    content: string,
    activity: ProvenanceActivity,
    extra: Partial<ProvenanceEntity> = {}
  ): Promise<ProvenanceEntity> {
    const entity: ProvenanceEntity = {
      id: randomUUID(),
      entity_type: entityType,
      entity_name: entityName,
      case_id: activity.case_id,
      content,
      content_hash: contentHash(content),
      content_size: Buffer.byteLength(content, 'utf8'),
      generating_activity_id: activity.id,
      generated_at: this.now(),
      confidence_score: null,
      quality_metrics: {},
      metadata: {},
      ...this.entityStamp(activity),
      ...extra,
    };
    await this.store.insert('entities', entity);
    return entity;
  }

  /**
   * Store a prompt and record that the activity used it
   */
  async recordPrompt(promptText: string, activity: ProvenanceActivity, options: EntityOptions = {}): Promise<ProvenanceEntity> {
    const entity = await this.recordEntity(
      'prompt',
      options.entityName ?? `prompt_${activity.activity_name}`,
      promptText,
      activity,
      { metadata: options.metadata ?? {} }
    );

    await this.store.insert('usages', {
      id: randomUUID(),
      activity_id: activity.id,
      entity_id: entity.id,
      usage_role: 'input',
      metadata: { purpose: 'llm_prompt' },
      created_at: this.now(),
    });
    return entity;
  }

  async recordResponse(
    responseText: string,
    activity: ProvenanceActivity,
    options: EntityOptions & { derivedFrom?: ProvenanceEntity; confidenceScore?: number } = {}
  ): Promise<ProvenanceEntity> {
    const entity = await this.recordEntity(
      'response',
      options.entityName ?? `response_${activity.activity_name}`,
      responseText,
      activity,
      { metadata: options.metadata ?? {}, confidence_score: options.confidenceScore ?? null }
    );

    if (options.derivedFrom) {
      await this.addDerivation(entity, options.derivedFrom, 'generation', { method: 'llm_generation' });
    }
    return entity;
  }

  /**
   * Store serialised extraction results with count / mean-confidence metrics
   */
  async recordExtractionResults(
    results: unknown,
    activity: ProvenanceActivity,
    entityType: string,
    options: { derivedFrom?: ProvenanceEntity[]; metadata?: Metadata } = {}
  ): Promise<ProvenanceEntity> {
    const entity = await this.recordEntity(
      entityType,
      `${entityType}_${activity.activity_name}`,
      JSON.stringify(results, null, 2),
      activity,
      { quality_metrics: computeQualityMetrics(results), metadata: options.metadata ?? {} }
    );

    for (const source of options.derivedFrom ?? []) {
      await this.addDerivation(entity, source, 'extraction', { extraction_type: entityType });
    }
    return entity;
  }

  private async addDerivation(
    derived: ProvenanceEntity,
    source: ProvenanceEntity,
    derivationType: string,
    metadata: Metadata
  ): Promise<void> {
    await this.store.insert('derivations', {
      id: randomUUID(),
      derived_entity_id: derived.id,
      source_entity_id: source.id,
      derivation_type: derivationType,
      metadata,
      created_at: this.now(),
    });
  }

  /**
   * informed wasInformedBy informing
   */
  async linkActivities(
    informed: ProvenanceActivity,
    informing: ProvenanceActivity,
    communicationType: CommunicationType = 'dependency'
  ): Promise<void> {
    await this.store.insert('communications', {
      id: randomUUID(),
      informed_activity_id: informed.id,
      informing_activity_id: informing.id,
      communication_type: communicationType,
      created_at: this.now(),
    });
  }

  async createBundle(
    bundleName: string,
    bundleType: string,
    options: { caseId?: number; sessionId?: string; metadata?: Metadata } = {}
  ): Promise<ProvenanceBundle> {
    const bundle: ProvenanceBundle = {
      id: randomUUID(),
      bundle_name: bundleName,
      bundle_type: bundleType,
      case_id: options.caseId ?? null,
      session_id: options.sessionId ?? null,
      metadata: options.metadata ?? {},
      started_at: this.now(),
    };
    await this.store.insert('bundles', bundle);
    return bundle;
  }

  /**
   * Agents, activities and entities of a case with the relations between them
   */
  async getProvenanceGraph(caseId: number): Promise<ProvenanceGraph> {
    const activities = await this.store.find('activities', (activity) => activity.case_id === caseId);
    const entities = await this.store.find('entities', (entity) => entity.case_id === caseId);
    const activityIds = new Set(activities.map((activity) => activity.id));
    const entityIds = new Set(entities.map((entity) => entity.id));
    const agentIds = new Set(activities.map((activity) => activity.agent_id));

    const agents = await this.store.find('agents', (agent) => agentIds.has(agent.id));
    const derivations = await this.store.find('derivations', (d) => entityIds.has(d.derived_entity_id));
    const usages = await this.store.find('usages', (usage) => activityIds.has(usage.activity_id));
    const communications = await this.store.find('communications', (c) => activityIds.has(c.informed_activity_id));

    return {
      nodes: {
        agents: agents.map((agent) => ({
          id: `agent_${agent.id}`,
          type: agent.agent_type,
          name: agent.agent_name,
          version: agent.agent_version,
        })),
        activities: activities.map((activity) => ({
          id: `activity_${activity.id}`,
          type: activity.activity_type,
          name: activity.activity_name,
          status: activity.status,
          duration_ms: activity.duration_ms,
        })),
        entities: entities.map((entity) => ({
          id: `entity_${entity.id}`,
          type: entity.entity_type,
          name: entity.entity_name,
          confidence: entity.confidence_score,
        })),
      },
      edges: {
        wasGeneratedBy: entities.map((entity) => ({
          from: `entity_${entity.id}`,
          to: `activity_${entity.generating_activity_id}`,
        })),
        wasDerivedFrom: derivations.map((derivation) => ({
          from: `entity_${derivation.derived_entity_id}`,
          to: `entity_${derivation.source_entity_id}`,
          type: derivation.derivation_type,
        })),
        wasAssociatedWith: activities.map((activity) => ({
          from: `activity_${activity.id}`,
          to: `agent_${activity.agent_id}`,
        })),
        used: usages.map((usage) => ({
          from: `activity_${usage.activity_id}`,
          to: `entity_${usage.entity_id}`,
          role: usage.usage_role,
        })),
        wasInformedBy: communications.map((communication) => ({
          from: `activity_${communication.informed_activity_id}`,
          to: `activity_${communication.informing_activity_id}`,
          type: communication.communication_type,
        })),
      },
    };
  }
}
