import { randomUUID } from 'crypto';
import { ProvenanceConfig } from '../config/provenance.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import type { ProvenanceStore } from './ProvenanceStore.js';
import { ProvenanceTracker, type ActivityOptions, type TrackerOptions } from './ProvenanceTracker.js';
import {
  ActivityStatus,
  VersionEnvironment,
  VersionStatus,
  type ConsolidationStrategy,
  type ProvenanceActivity,
  type ProvenanceVersion,
  type VersionConfiguration,
  type VersionStamp,
  type VersioningContext,
} from './types.js';

export interface VersionedActivityOptions extends ActivityOptions {
  /**
   * Workflow version the activity belongs to
   */
  versioning?: VersioningContext;

  /**
   * Earlier activity this one revises
   */
  revisionOf?: ProvenanceActivity;
}

export interface WorkflowOptions {
  description?: string;
  versionTag?: string;
  autoVersion?: boolean;
}

const HOUR_MS = 60 * 60 * 1000;

const PROMOTABLE_STATUSES: ReadonlySet<VersionStatus> = new Set([VersionStatus.DRAFT, VersionStatus.CANDIDATE]);

/**
 * Next semantic version after latest. Production bumps the minor component,
 * everything else the patch.
 */
export function nextVersionNumber(latest: string | undefined, environment: VersionEnvironment): string {
  const production = environment === VersionEnvironment.PRODUCTION;
  if (latest === undefined) {
    return production ? '1.0.0' : '0.1.0';
  }

  const parts = latest.split('.');
  if (parts.length !== 3 || parts.some((part) => !/^\d+$/.test(part))) {
    return '1.0.0';
  }

  const [major, minor, patch] = parts.map((part) => parseInt(part, 10));
  return production ? `${major}.${minor + 1}.0` : `${major}.${minor}.${patch + 1}`;
}

function latestOf<T extends { created_at: string }>(records: readonly T[]): T | undefined {
  let latest: T | undefined;
  for (const record of records) {
    if (!latest || record.created_at >= latest.created_at) {
      latest = record;
    }
  }
  return latest;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Versioned Provenance Tracker
 *
 * Adds workflow versions on top of ProvenanceTracker: activities and
 * entities recorded inside a workflow carry its version stamps, versions
 * can be promoted to production, trial versions consolidated, and expired
 * development versions cleaned up.
 *
 * The current version is never held on the tracker; it travels in the
 * VersioningContext handed to trackVersionedWorkflow's callback.
 */
export class VersionedProvenanceTracker extends ProvenanceTracker {
  readonly environment: VersionEnvironment;
  private allocations = new Map<string, Promise<void>>();

  constructor(
    store: ProvenanceStore,
    options: TrackerOptions & { environment?: VersionEnvironment } = {}
  ) {
    super(store, options);
    this.environment = options.environment ?? ProvenanceConfig.detectEnvironment();
  }

  private get isDevelopment(): boolean {
    return this.environment === VersionEnvironment.DEVELOPMENT;
  }

  private initialStatus(): VersionStatus {
    return this.isDevelopment ? VersionStatus.DRAFT : VersionStatus.CANDIDATE;
  }

  /**
   * Run fn once every earlier configuration or version allocation for the
   * workflow has settled. Reads of the latest version and the insert of the
   * next one must not interleave across concurrent workflows.
   */
  private serialized<T>(workflowName: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.allocations.get(workflowName) ?? Promise.resolve();
    const next = previous.then(fn);
    // The chain only orders work; fn's own error reaches the caller through next
    this.allocations.set(
      workflowName,
      next.then(
        () => undefined,
        () => undefined
      )
    );
    return next;
  }

  async getOrCreateVersionConfig(workflowName: string): Promise<VersionConfiguration> {
    return this.serialized(workflowName, () => this.loadOrCreateConfig(workflowName));
  }

  private async loadOrCreateConfig(workflowName: string): Promise<VersionConfiguration> {
    const existing = await this.store.get('configurations', workflowName);
    if (existing) {
      return existing;
    }

    const config: VersionConfiguration = {
      id: workflowName,
      workflow_name: workflowName,
      auto_increment_version: true,
      dev_retention_hours: 24,
      auto_cleanup_dev: false,
      consolidation_strategy: 'latest_best',
      min_versions_to_consolidate: 3,
      require_approval: this.environment === VersionEnvironment.PRODUCTION,
      min_test_runs: 3,
      required_validation_score: 0.8,
    };
    await this.store.insert('configurations', config);
    return config;
  }

  async configureWorkflow(
    workflowName: string,
    patch: Partial<Omit<VersionConfiguration, 'id' | 'workflow_name'>>
  ): Promise<VersionConfiguration> {
    return this.serialized(workflowName, async () => {
      const config = await this.loadOrCreateConfig(workflowName);
      await this.store.update('configurations', workflowName, patch);
      return { ...config, ...patch };
    });
  }

  async getNextVersionNumber(
    workflowName: string,
    environment: VersionEnvironment = this.environment
  ): Promise<string> {
    return this.serialized(workflowName, () => this.computeNextVersionNumber(workflowName, environment));
  }

  private async computeNextVersionNumber(workflowName: string, environment: VersionEnvironment): Promise<string> {
    const versions = await this.store.find(
      'versions',
      (version) => version.workflow_name === workflowName && version.environment === environment
    );
    return nextVersionNumber(latestOf(versions)?.version_number, environment);
  }

  /**
   * Run fn inside a new workflow version. The version is archived if fn
   * throws; in production it is released when fn succeeds.
   */
  async trackVersionedWorkflow<T>(
    workflowName: string,
    fn: (context: VersioningContext) => Promise<T>,
    options: WorkflowOptions = {}
  ): Promise<T> {
    const { config, version } = await this.serialized(workflowName, async () => {
      const config = await this.loadOrCreateConfig(workflowName);
      const autoVersion = options.autoVersion ?? true;
      const versionNumber =
        autoVersion && config.auto_increment_version
          ? await this.computeNextVersionNumber(workflowName, this.environment)
          : options.versionTag ?? '0.0.1';

      const createdAt = this.clock();
      const version: ProvenanceVersion = {
        id: randomUUID(),
        workflow_name: workflowName,
        version_number: versionNumber,
        version_tag: options.versionTag ?? (this.isDevelopment ? 'dev' : 'stable'),
        environment: this.environment,
        status: this.initialStatus(),
        description: options.description ?? null,
        created_at: createdAt.toISOString(),
        released_at: null,
        superseded_at: null,
        expires_at:
          this.isDevelopment && config.auto_cleanup_dev
            ? new Date(createdAt.getTime() + config.dev_retention_hours * HOUR_MS).toISOString()
            : null,
        is_consolidated: false,
        consolidated_from: [],
        consolidation_strategy: null,
        performance_metrics: {},
        approved_by: null,
      };
      await this.store.insert('versions', version);
      return { config, version };
    });
    this.logger.info(`Workflow ${workflowName} version ${version.version_number} (${this.environment}) started`);

    const context: VersioningContext = { workflowName, environment: this.environment, version, config };

    let value: T;
    try {
      value = await fn(context);
    } catch (error) {
      await this.store.update('versions', version.id, { status: VersionStatus.ARCHIVED });
      throw error;
    }

    if (this.environment === VersionEnvironment.PRODUCTION) {
      await this.store.update('versions', version.id, {
        status: VersionStatus.RELEASED,
        released_at: this.now(),
      });
    }
    return value;
  }

  async trackActivity<T>(options: VersionedActivityOptions, fn: (activity: ProvenanceActivity) => Promise<T>): Promise<T> {
    return super.trackActivity(options, fn);
  }

  protected async activityExtras(options: VersionedActivityOptions): Promise<Partial<ProvenanceActivity>> {
    const versioning = options.versioning;
    const extras: Partial<ProvenanceActivity> = {
      version_id: versioning?.version.id ?? null,
      version_number: versioning?.version.version_number ?? null,
      version_environment: this.environment,
      version_status: this.initialStatus(),
      is_development: this.isDevelopment,
      auto_cleanup: false,
      cleanup_after: null,
    };

    if (this.isDevelopment && versioning?.config.auto_cleanup_dev) {
      extras.auto_cleanup = true;
      extras.cleanup_after = new Date(
        this.clock().getTime() + versioning.config.dev_retention_hours * HOUR_MS
      ).toISOString();
    }

    if (options.revisionOf) {
      extras.revision_of_id = options.revisionOf.id;
      extras.revision_number = (options.revisionOf.revision_number ?? 0) + 1;
    }
    return extras;
  }

  protected async afterStart(activity: ProvenanceActivity, options: VersionedActivityOptions): Promise<void> {
    if (!options.revisionOf) {
      return;
    }
    await this.store.insert('revisions', {
      id: randomUUID(),
      newer_activity_id: activity.id,
      older_activity_id: options.revisionOf.id,
      revision_type: this.isDevelopment ? 'minor' : 'major',
      revision_reason: `Version ${activity.version_number ?? 'unversioned'} of ${activity.activity_name}`,
      version_number: activity.version_number ?? null,
      created_at: this.now(),
    });
  }

  protected completedPatch(_activity: ProvenanceActivity): Partial<ProvenanceActivity> {
    if (this.environment === VersionEnvironment.PRODUCTION) {
      return { version_status: VersionStatus.RELEASED };
    }
    if (this.environment === VersionEnvironment.TEST) {
      return { version_status: VersionStatus.CANDIDATE };
    }
    return {};
  }

  protected failedPatch(_activity: ProvenanceActivity): Partial<ProvenanceActivity> {
    return { version_status: VersionStatus.ARCHIVED };
  }

  protected entityStamp(activity: ProvenanceActivity): Partial<VersionStamp> {
    return {
      version_id: activity.version_id ?? null,
      version_number: activity.version_number ?? null,
      version_environment: activity.version_environment ?? this.environment,
      version_status: activity.version_status ?? this.initialStatus(),
      is_development: activity.is_development ?? this.isDevelopment,
      auto_cleanup: activity.auto_cleanup ?? false,
      cleanup_after: activity.cleanup_after ?? null,
    };
  }

  /**
   * Merge numeric metrics (accuracy, token_count, duration_ms...) into a version
   */
  async recordVersionMetrics(versionId: string, metrics: Record<string, number>): Promise<ProvenanceVersion> {
    const version = await this.requireVersion(versionId);
    const performance_metrics = { ...version.performance_metrics, ...metrics };
    await this.store.update('versions', versionId, { performance_metrics });
    return { ...version, performance_metrics };
  }

  /**
   * Promote a version to production
   *
   * @throws ValidationError when the version is not a draft or candidate,
   *   approval is required and missing, or the version has fewer completed
   *   activities than the workflow's min_test_runs. Nothing is modified in
   *   that case.
   */
  async markAsProduction(versionId: string, approvedBy?: string): Promise<ProvenanceVersion> {
    const version = await this.requireVersion(versionId);
    if (!PROMOTABLE_STATUSES.has(version.status)) {
      throw new ValidationError(
        `Version ${version.version_number} is ${version.status}; only draft or candidate versions can be promoted`
      );
    }
    const config = await this.getOrCreateVersionConfig(version.workflow_name);

    if (config.require_approval && !approvedBy) {
      throw new ValidationError('Approval required for production promotion');
    }

    const completed = await this.store.find(
      'activities',
      (activity) => activity.version_id === versionId && activity.status === ActivityStatus.COMPLETED
    );
    if (completed.length < config.min_test_runs) {
      throw new ValidationError(
        `Need at least ${config.min_test_runs} successful test runs (found ${completed.length})`
      );
    }

    const released: Partial<ProvenanceVersion> = {
      status: VersionStatus.RELEASED,
      environment: VersionEnvironment.PRODUCTION,
      released_at: this.now(),
      approved_by: approvedBy ?? null,
    };
    await this.store.update('versions', versionId, released);

    const stamp: Partial<VersionStamp> = {
      version_environment: VersionEnvironment.PRODUCTION,
      version_status: VersionStatus.RELEASED,
      is_development: false,
      auto_cleanup: false,
    };
    for (const activity of await this.store.find('activities', (a) => a.version_id === versionId)) {
      await this.store.update('activities', activity.id, stamp);
    }
    for (const entity of await this.store.find('entities', (e) => e.version_id === versionId)) {
      await this.store.update('entities', entity.id, stamp);
    }

    this.logger.info(`Version ${version.workflow_name} ${version.version_number} promoted to production`);
    return { ...version, ...released };
  }

  /**
   * Merge trial versions into one production candidate. Source versions are
   * marked superseded, never deleted.
   *
   * - latest_best: copy the activities of the version with the highest accuracy
   * - average: no activities; the new version's metrics are the per-key means
   *   of the finite source values
   * - union: copy every source activity, one per (activity name, case), latest run wins
   *
   * @throws NotFoundError for unknown version ids
   * @throws ValidationError for too few versions or versions of another workflow
   */
  async consolidateVersions(
    workflowName: string,
    versionIds: readonly string[],
    strategy?: ConsolidationStrategy
  ): Promise<ProvenanceVersion> {
    const config = await this.getOrCreateVersionConfig(workflowName);
    const chosen = strategy ?? config.consolidation_strategy;

    const versions: ProvenanceVersion[] = [];
    for (const id of new Set(versionIds)) {
      const version = await this.requireVersion(id);
      if (version.workflow_name !== workflowName) {
        throw new ValidationError(`Version ${id} belongs to workflow ${version.workflow_name}, not ${workflowName}`);
      }
      versions.push(version);
    }

    if (versions.length < config.min_versions_to_consolidate) {
      throw new ValidationError(`Need at least ${config.min_versions_to_consolidate} versions to consolidate`);
    }

    const consolidated = await this.serialized(workflowName, async () => {
      const record: ProvenanceVersion = {
        id: randomUUID(),
        workflow_name: workflowName,
        version_number: await this.computeNextVersionNumber(workflowName, VersionEnvironment.PRODUCTION),
        version_tag: 'consolidated',
        environment: VersionEnvironment.PRODUCTION,
        status: VersionStatus.CANDIDATE,
        description: `Consolidated from ${versions.length} test versions`,
        created_at: this.now(),
        released_at: null,
        superseded_at: null,
        expires_at: null,
        is_consolidated: true,
        consolidated_from: versions.map((version) => version.id),
        consolidation_strategy: chosen,
        performance_metrics: this.consolidatedMetrics(versions, chosen),
        approved_by: null,
      };
      await this.store.insert('versions', record);
      return record;
    });

    if (chosen === 'latest_best') {
      const best = versions.reduce((top, version) =>
        (version.performance_metrics.accuracy ?? 0) > (top.performance_metrics.accuracy ?? 0) ? version : top
      );
      const activities = await this.store.find('activities', (activity) => activity.version_id === best.id);
      await this.copyActivities(activities, consolidated, () => best.version_number);
    } else if (chosen === 'union') {
      const versionNumbers = new Map(versions.map((version) => [version.id, version.version_number]));
      const sourceIds = new Set(versionNumbers.keys());
      const activities = await this.store.find(
        'activities',
        (activity) => activity.version_id != null && sourceIds.has(activity.version_id)
      );
      const byKey = new Map<string, ProvenanceActivity>();
      for (const activity of activities) {
        const key = `${activity.activity_name}:${activity.case_id}`;
        const current = byKey.get(key);
        if (!current || activity.started_at >= current.started_at) {
          byKey.set(key, activity);
        }
      }
      await this.copyActivities([...byKey.values()], consolidated, (activity) =>
        versionNumbers.get(activity.version_id ?? '') ?? 'unknown'
      );
    }

    const supersededAt = this.now();
    for (const version of versions) {
      await this.store.update('versions', version.id, {
        status: VersionStatus.SUPERSEDED,
        superseded_at: supersededAt,
      });
    }

    this.logger.info(
      `Consolidated ${versions.length} versions of ${workflowName} into ${consolidated.version_number} (${chosen})`
    );
    return consolidated;
  }

  private consolidatedMetrics(versions: readonly ProvenanceVersion[], strategy: ConsolidationStrategy): Record<string, number> {
    const metrics: Record<string, number> = { source_versions: versions.length };

    const collect = (key: string) =>
      versions
        .map((version) => version.performance_metrics[key])
        .filter((value): value is number => typeof value === 'number' && Number.isFinite(value));

    const tokens = collect('token_count');
    if (tokens.length > 0) {
      metrics.avg_token_count = mean(tokens);
      metrics.min_token_count = Math.min(...tokens);
      metrics.max_token_count = Math.max(...tokens);
    }

    const durations = collect('duration_ms');
    if (durations.length > 0) {
      metrics.avg_duration_ms = mean(durations);
      metrics.min_duration_ms = Math.min(...durations);
      metrics.max_duration_ms = Math.max(...durations);
    }

    const accuracy = collect('accuracy');
    if (accuracy.length > 0) {
      metrics.avg_accuracy = mean(accuracy);
      metrics.best_accuracy = Math.max(...accuracy);
    }

    if (strategy === 'average') {
      const keys = new Set(versions.flatMap((version) => Object.keys(version.performance_metrics)));
      for (const key of keys) {
        // Aggregates computed above win over same-named source metrics
        if (key in metrics) {
          continue;
        }
        const values = collect(key);
        if (values.length > 0) {
          metrics[key] = mean(values);
        }
      }
    }

    return metrics;
  }

  private async copyActivities(
    activities: readonly ProvenanceActivity[],
    consolidated: ProvenanceVersion,
    sourceVersionOf: (activity: ProvenanceActivity) => string
  ): Promise<void> {
    for (const activity of activities) {
      const copy: ProvenanceActivity = {
        ...activity,
        id: randomUUID(),
        version_id: consolidated.id,
        version_number: consolidated.version_number,
        version_environment: VersionEnvironment.PRODUCTION,
        version_status: VersionStatus.CANDIDATE,
        is_development: false,
        auto_cleanup: false,
        cleanup_after: null,
        revision_of_id: activity.id,
        revision_number: (activity.revision_number ?? 0) + 1,
      };
      await this.store.insert('activities', copy);
      await this.store.insert('revisions', {
        id: randomUUID(),
        newer_activity_id: copy.id,
        older_activity_id: activity.id,
        revision_type: 'consolidation',
        revision_reason: `Consolidated from version ${sourceVersionOf(activity)}`,
        version_number: consolidated.version_number,
        created_at: this.now(),
      });
    }
  }

  /**
   * Delete expired development versions with their activities and entities.
   * With force, every development version goes regardless of expiry.
   *
   * @returns number of records deleted
   */
  async cleanupDevelopmentVersions(force = false): Promise<number> {
    const now = this.now();
    const expired = await this.store.find(
      'versions',
      (version) =>
        version.environment === VersionEnvironment.DEVELOPMENT &&
        (force || (version.expires_at !== null && version.expires_at <= now))
    );

    let count = 0;
    for (const version of expired) {
      const activities = await this.store.find('activities', (activity) => activity.version_id === version.id);
      const entities = await this.store.find('entities', (entity) => entity.version_id === version.id);
      count += await this.store.remove('activities', activities.map((activity) => activity.id));
      count += await this.store.remove('entities', entities.map((entity) => entity.id));
      count += await this.store.remove('versions', [version.id]);
    }

    if (count > 0) {
      this.logger.info(`Cleaned up ${expired.length} development versions (${count} records)`);
    }
    return count;
  }

  /**
   * Versions of a workflow, newest first
   */
  async getVersionHistory(workflowName: string, environment?: VersionEnvironment): Promise<ProvenanceVersion[]> {
    const versions = await this.store.find(
      'versions',
      (version) =>
        version.workflow_name === workflowName && (environment === undefined || version.environment === environment)
    );
    return versions.reverse().sort((a, b) => (a.created_at < b.created_at ? 1 : a.created_at > b.created_at ? -1 : 0));
  }

  private async requireVersion(versionId: string): Promise<ProvenanceVersion> {
    const version = await this.store.get('versions', versionId);
    if (!version) {
      throw new NotFoundError(`Provenance version ${versionId} not found`);
    }
    return version;
  }
}
