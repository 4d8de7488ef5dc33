import { describe, expect, it } from 'vitest';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import { InMemoryProvenanceStore } from '../ProvenanceStore.js';
import { VersionedProvenanceTracker, nextVersionNumber } from '../VersionedProvenanceTracker.js';
import { VersionEnvironment, VersionStatus, type ProvenanceVersion, type VersioningContext } from '../types.js';

const HOUR_MS = 60 * 60 * 1000;
const WORKFLOW = 'concept_extraction';

function manualClock(start = '2026-01-15T10:00:00.000Z') {
  let ms = Date.parse(start);
  return {
    now: () => new Date(ms),
    advance: (delta: number) => {
      ms += delta;
    },
  };
}

function setup(environment: VersionEnvironment = VersionEnvironment.DEVELOPMENT) {
  const store = new InMemoryProvenanceStore();
  const clock = manualClock();
  const tracker = new VersionedProvenanceTracker(store, { clock: clock.now, environment });
  return { store, clock, tracker };
}

type Setup = ReturnType<typeof setup>;

/**
 * Run one workflow version with an extraction activity per case id and
 * return the version
 */
async function runVersion({ tracker, clock }: Setup, caseIds: number[] = [42]): Promise<ProvenanceVersion> {
  const version = await tracker.trackVersionedWorkflow(WORKFLOW, async (versioning) => {
    for (const caseId of caseIds) {
      await tracker.trackActivity(
        { activityType: 'extraction', activityName: 'roles_extraction', caseId, versioning },
        async () => undefined
      );
    }
    return versioning.version;
  });
  clock.advance(60_000);
  return version;
}

async function storedVersion(store: InMemoryProvenanceStore, id: string): Promise<ProvenanceVersion | undefined> {
  return store.get('versions', id);
}

/* ===== Version numbers ===== */

describe('nextVersionNumber', () => {
  it('starts development at 0.1.0 and production at 1.0.0', () => {
    expect(nextVersionNumber(undefined, VersionEnvironment.DEVELOPMENT)).toBe('0.1.0');
    expect(nextVersionNumber(undefined, VersionEnvironment.PRODUCTION)).toBe('1.0.0');
  });

  it('bumps the patch outside production and the minor in production', () => {
    expect(nextVersionNumber('0.1.0', VersionEnvironment.DEVELOPMENT)).toBe('0.1.1');
    expect(nextVersionNumber('0.1.9', VersionEnvironment.TEST)).toBe('0.1.10');
    expect(nextVersionNumber('1.2.3', VersionEnvironment.PRODUCTION)).toBe('1.3.0');
  });

  it('restarts at 1.0.0 after a malformed number', () => {
    expect(nextVersionNumber('v2', VersionEnvironment.DEVELOPMENT)).toBe('1.0.0');
  });
});

/* ===== Workflows ===== */

describe('trackVersionedWorkflow', () => {
  it('creates draft development versions with increasing numbers', async () => {
    const env = setup();

    const first = await runVersion(env);
    const second = await runVersion(env);

    expect(first).toMatchObject({ version_number: '0.1.0', version_tag: 'dev', status: VersionStatus.DRAFT });
    expect(second.version_number).toBe('0.1.1');
    expect(first.expires_at).toBeNull();
  });

  it('stamps activities and entities with the version', async () => {
    const { store, tracker } = setup();

    await tracker.trackVersionedWorkflow(WORKFLOW, async (versioning) =>
      tracker.trackActivity(
        { activityType: 'extraction', activityName: 'roles_extraction', caseId: 42, versioning },
        async (activity) => tracker.recordPrompt('Prompt text', activity)
      )
    );

    const [version] = store.snapshot().versions;
    const stamp = {
      version_id: version.id,
      version_number: '0.1.0',
      version_environment: VersionEnvironment.DEVELOPMENT,
      version_status: VersionStatus.DRAFT,
      is_development: true,
      auto_cleanup: false,
      cleanup_after: null,
    };
    expect(store.snapshot().activities[0]).toMatchObject(stamp);
    expect(store.snapshot().entities[0]).toMatchObject(stamp);
  });

  it('gives concurrent workflows distinct versions and one configuration', async () => {
    const { store, tracker } = setup();

    const numbers = await Promise.all([
      tracker.trackVersionedWorkflow(WORKFLOW, async (versioning) => versioning.version.version_number),
      tracker.trackVersionedWorkflow(WORKFLOW, async (versioning) => versioning.version.version_number),
    ]);

    expect(numbers).toEqual(['0.1.0', '0.1.1']);
    expect(store.snapshot().configurations).toHaveLength(1);
  });

  it('creates one configuration for concurrent lookups', async () => {
    const { store, tracker } = setup();

    await Promise.all([tracker.getOrCreateVersionConfig(WORKFLOW), tracker.getOrCreateVersionConfig(WORKFLOW)]);

    expect(store.snapshot().configurations).toHaveLength(1);
  });

  it('archives the version when the workflow throws', async () => {
    const { store, tracker } = setup();

    await expect(
      tracker.trackVersionedWorkflow(WORKFLOW, async () => {
        throw new Error('pipeline crashed');
      })
    ).rejects.toThrow('pipeline crashed');

    expect(store.snapshot().versions[0].status).toBe(VersionStatus.ARCHIVED);
  });

  it('releases production versions that succeed', async () => {
    const env = setup(VersionEnvironment.PRODUCTION);

    const version = await runVersion(env);

    expect(version).toMatchObject({ version_number: '1.0.0', version_tag: 'stable', status: VersionStatus.CANDIDATE });
    expect(await storedVersion(env.store, version.id)).toMatchObject({
      status: VersionStatus.RELEASED,
      released_at: '2026-01-15T10:00:00.000Z',
    });
    expect(env.store.snapshot().activities[0].version_status).toBe(VersionStatus.RELEASED);
  });

  it('records revisions of earlier activities', async () => {
    const { store, tracker } = setup();

    const revised = await tracker.trackVersionedWorkflow(WORKFLOW, async (versioning) => {
      const options = { activityType: 'extraction', activityName: 'roles_extraction', caseId: 42, versioning };
      const first = await tracker.trackActivity(options, async (activity) => activity);
      return tracker.trackActivity({ ...options, revisionOf: first }, async (activity) => activity);
    });

    expect(revised.revision_number).toBe(1);
    expect(store.snapshot().revisions).toEqual([
      expect.objectContaining({
        newer_activity_id: revised.id,
        older_activity_id: revised.revision_of_id,
        revision_type: 'minor',
        revision_reason: 'Version 0.1.0 of roles_extraction',
      }),
    ]);
  });
});

/* ===== Cleanup ===== */

describe('cleanupDevelopmentVersions', () => {
  it('removes expired development versions with their records', async () => {
    const env = setup();
    await env.tracker.configureWorkflow(WORKFLOW, { auto_cleanup_dev: true, dev_retention_hours: 1 });

    const version = await runVersion(env);
    expect(version.expires_at).toBe('2026-01-15T11:00:00.000Z');
    expect(env.store.snapshot().activities[0]).toMatchObject({
      auto_cleanup: true,
      cleanup_after: '2026-01-15T11:00:00.000Z',
    });

    expect(await env.tracker.cleanupDevelopmentVersions()).toBe(0);

    env.clock.advance(HOUR_MS);
    expect(await env.tracker.cleanupDevelopmentVersions()).toBe(2);
    expect(env.store.snapshot().versions).toEqual([]);
    expect(env.store.snapshot().activities).toEqual([]);
  });

  it('removes every development version when forced', async () => {
    const env = setup();
    await runVersion(env);

    expect(await env.tracker.cleanupDevelopmentVersions(true)).toBe(2);
  });
});

/* ===== Promotion ===== */

describe('markAsProduction', () => {
  it('refuses a version with too few successful runs and changes nothing', async () => {
    const env = setup();
    const version = await runVersion(env, [1, 2]);

    await expect(env.tracker.markAsProduction(version.id)).rejects.toThrow(
      'Need at least 3 successful test runs (found 2)'
    );

    expect(await storedVersion(env.store, version.id)).toMatchObject({
      status: VersionStatus.DRAFT,
      environment: VersionEnvironment.DEVELOPMENT,
    });
  });

  it('promotes a version with its activities', async () => {
    const env = setup();
    const version = await runVersion(env, [1, 2, 3]);

    const promoted = await env.tracker.markAsProduction(version.id, 'reviewer');

    expect(promoted).toMatchObject({
      status: VersionStatus.RELEASED,
      environment: VersionEnvironment.PRODUCTION,
      approved_by: 'reviewer',
    });
    expect(env.store.snapshot().activities.map((activity) => activity.version_environment)).toEqual([
      VersionEnvironment.PRODUCTION,
      VersionEnvironment.PRODUCTION,
      VersionEnvironment.PRODUCTION,
    ]);
  });

  it('requires an approver when the workflow asks for one', async () => {
    const env = setup();
    await env.tracker.configureWorkflow(WORKFLOW, { require_approval: true });
    const version = await runVersion(env, [1, 2, 3]);

    await expect(env.tracker.markAsProduction(version.id)).rejects.toThrow(
      'Approval required for production promotion'
    );
    expect((await storedVersion(env.store, version.id))?.status).toBe(VersionStatus.DRAFT);
  });

  it('asks for approval by default in production', async () => {
    const { tracker } = setup(VersionEnvironment.PRODUCTION);

    expect((await tracker.getOrCreateVersionConfig(WORKFLOW)).require_approval).toBe(true);
  });

  it('refuses versions that are already released', async () => {
    const env = setup();
    const version = await runVersion(env, [1, 2, 3]);
    await env.tracker.markAsProduction(version.id, 'reviewer');

    await expect(env.tracker.markAsProduction(version.id, 'reviewer')).rejects.toThrow(
      'Version 0.1.0 is released; only draft or candidate versions can be promoted'
    );
  });

  it('refuses archived versions and leaves them archived', async () => {
    const { store, tracker } = setup();
    await expect(
      tracker.trackVersionedWorkflow(WORKFLOW, async () => {
        throw new Error('pipeline crashed');
      })
    ).rejects.toThrow('pipeline crashed');
    const [archived] = store.snapshot().versions;

    await expect(tracker.markAsProduction(archived.id, 'reviewer')).rejects.toBeInstanceOf(ValidationError);
    expect((await storedVersion(store, archived.id))?.status).toBe(VersionStatus.ARCHIVED);
  });

  it('rejects unknown versions', async () => {
    const { tracker } = setup();

    await expect(tracker.markAsProduction('missing')).rejects.toBeInstanceOf(NotFoundError);
  });
});

/* ===== Consolidation ===== */

describe('consolidateVersions', () => {
  async function threeVersions(env: Setup, metrics: Array<Record<string, number>>): Promise<ProvenanceVersion[]> {
    const versions: ProvenanceVersion[] = [];
    for (const [index, values] of metrics.entries()) {
      const version = await runVersion(env, index === 0 ? [42, 43] : [42]);
      await env.tracker.recordVersionMetrics(version.id, values);
      versions.push(version);
    }
    return versions;
  }

  it('copies the activities of the most accurate version', async () => {
    const env = setup();
    const versions = await threeVersions(env, [{ accuracy: 0.6 }, { accuracy: 0.9 }, { accuracy: 0.75 }]);

    const consolidated = await env.tracker.consolidateVersions(
      WORKFLOW,
      versions.map((version) => version.id),
      'latest_best'
    );

    expect(consolidated).toMatchObject({
      version_number: '1.0.0',
      version_tag: 'consolidated',
      environment: VersionEnvironment.PRODUCTION,
      status: VersionStatus.CANDIDATE,
      is_consolidated: true,
      consolidated_from: versions.map((version) => version.id),
      performance_metrics: { source_versions: 3, avg_accuracy: 0.75, best_accuracy: 0.9 },
    });

    const copies = env.store.snapshot().activities.filter((activity) => activity.version_id === consolidated.id);
    expect(copies).toHaveLength(1);
    expect(env.store.snapshot().revisions).toEqual([
      expect.objectContaining({
        newer_activity_id: copies[0].id,
        revision_type: 'consolidation',
        revision_reason: 'Consolidated from version 0.1.1',
      }),
    ]);

    for (const version of versions) {
      expect((await storedVersion(env.store, version.id))?.status).toBe(VersionStatus.SUPERSEDED);
    }
  });

  it('keeps one activity per name and case for union, latest run first', async () => {
    const env = setup();
    const versions = await threeVersions(env, [{}, {}, {}]);

    const consolidated = await env.tracker.consolidateVersions(
      WORKFLOW,
      versions.map((version) => version.id),
      'union'
    );

    const copies = env.store.snapshot().activities.filter((activity) => activity.version_id === consolidated.id);
    expect(copies.map((activity) => activity.case_id).sort()).toEqual([42, 43]);
    const reasons = env.store.snapshot().revisions.map((revision) => revision.revision_reason).sort();
    expect(reasons).toEqual(['Consolidated from version 0.1.0', 'Consolidated from version 0.1.2']);
  });

  it('averages the metrics without copying activities', async () => {
    const env = setup();
    const versions = await threeVersions(env, [{ token_count: 100 }, { token_count: 200 }, { token_count: 300 }]);

    const consolidated = await env.tracker.consolidateVersions(
      WORKFLOW,
      versions.map((version) => version.id),
      'average'
    );

    expect(consolidated.performance_metrics).toEqual({
      source_versions: 3,
      avg_token_count: 200,
      min_token_count: 100,
      max_token_count: 300,
      token_count: 200,
    });
    expect(env.store.snapshot().activities.filter((a) => a.version_id === consolidated.id)).toEqual([]);
  });

  it('keeps the source count and skips non-finite metrics when averaging', async () => {
    const env = setup();
    const versions = await threeVersions(env, [
      { token_count: 100, source_versions: 9, score: Number.NaN },
      { token_count: 200, score: 0.5 },
      { token_count: 300, score: Number.POSITIVE_INFINITY },
    ]);

    const consolidated = await env.tracker.consolidateVersions(
      WORKFLOW,
      versions.map((version) => version.id),
      'average'
    );

    expect(consolidated.performance_metrics).toEqual({
      source_versions: 3,
      avg_token_count: 200,
      min_token_count: 100,
      max_token_count: 300,
      token_count: 200,
      score: 0.5,
    });
  });

  it('needs enough versions of the same workflow', async () => {
    const env = setup();
    const [first, second] = await threeVersions(env, [{}, {}, {}]);

    await expect(env.tracker.consolidateVersions(WORKFLOW, [first.id, second.id, first.id])).rejects.toThrow(
      'Need at least 3 versions to consolidate'
    );
    await expect(env.tracker.consolidateVersions('other_workflow', [first.id, second.id])).rejects.toBeInstanceOf(
      ValidationError
    );
    await expect(env.tracker.consolidateVersions(WORKFLOW, ['missing'])).rejects.toBeInstanceOf(NotFoundError);
    expect((await storedVersion(env.store, first.id))?.status).toBe(VersionStatus.DRAFT);
  });
});

describe('getVersionHistory', () => {
  it('lists versions newest first, optionally by environment', async () => {
    const env = setup();
    await runVersion(env);
    await runVersion(env);

    const history = await env.tracker.getVersionHistory(WORKFLOW);

    expect(history.map((version) => version.version_number)).toEqual(['0.1.1', '0.1.0']);
    expect(await env.tracker.getVersionHistory(WORKFLOW, VersionEnvironment.PRODUCTION)).toEqual([]);
  });
});

describe('VersioningContext', () => {
  it('carries the workflow configuration', async () => {
    const { tracker } = setup();

    const seen: VersioningContext = await tracker.trackVersionedWorkflow(WORKFLOW, async (context) => context);

    expect(seen.config).toMatchObject({ min_test_runs: 3, min_versions_to_consolidate: 3, require_approval: false });
    expect(seen.environment).toBe(VersionEnvironment.DEVELOPMENT);
  });
});
