import { describe, expect, it } from 'vitest';
import { InMemoryProvenanceStore } from '../ProvenanceStore.js';
import { ProvenanceTracker, computeQualityMetrics, contentHash } from '../ProvenanceTracker.js';
import { ActivityStatus } from '../types.js';

/**
 * Clock that only moves when told to
 */
function manualClock(start = '2026-01-15T10:00:00.000Z') {
  let ms = Date.parse(start);
  return {
    now: () => new Date(ms),
    advance: (delta: number) => {
      ms += delta;
    },
  };
}

describe('ProvenanceTracker', () => {
  it('records a completed activity with its duration and agent', async () => {
    const store = new InMemoryProvenanceStore();
    const clock = manualClock();
    const tracker = new ProvenanceTracker(store, { clock: clock.now });

    const value = await tracker.trackActivity(
      { activityType: 'llm_query', activityName: 'roles_extraction', caseId: 7, sessionId: 'session-1' },
      async () => {
        clock.advance(1500);
        return 'done';
      }
    );

    expect(value).toBe('done');
    const [activity] = store.snapshot().activities;
    expect(activity).toMatchObject({
      activity_type: 'llm_query',
      activity_name: 'roles_extraction',
      case_id: 7,
      session_id: 'session-1',
      status: ActivityStatus.COMPLETED,
      started_at: '2026-01-15T10:00:00.000Z',
      ended_at: '2026-01-15T10:00:01.500Z',
      duration_ms: 1500,
      error_message: null,
    });
    expect(store.snapshot().agents).toEqual([
      expect.objectContaining({ id: activity.agent_id, agent_type: 'system', agent_name: 'concept-extraction-engine' }),
    ]);
  });

  it('marks the activity failed and rethrows', async () => {
    const store = new InMemoryProvenanceStore();
    const tracker = new ProvenanceTracker(store);

    await expect(
      tracker.trackActivity({ activityType: 'llm_query', activityName: 'roles_extraction' }, async () => {
        throw new Error('model unavailable');
      })
    ).rejects.toThrow('model unavailable');

    expect(store.snapshot().activities[0]).toMatchObject({
      status: ActivityStatus.FAILED,
      error_message: 'model unavailable',
    });
  });

  it('rethrows the original error when the failure cannot be stored', async () => {
    class FailingUpdateStore extends InMemoryProvenanceStore {
      async update(): Promise<boolean> {
        throw new Error('disk full');
      }
    }
    const store = new FailingUpdateStore();
    const tracker = new ProvenanceTracker(store);

    await expect(
      tracker.trackActivity({ activityType: 'llm_query', activityName: 'roles_extraction' }, async () => {
        throw new Error('model unavailable');
      })
    ).rejects.toThrow('model unavailable');

    expect(store.snapshot().activities[0].status).toBe(ActivityStatus.STARTED);
  });

  it('reuses agents across trackers sharing a store', async () => {
    const store = new InMemoryProvenanceStore();

    const first = await new ProvenanceTracker(store).getOrCreateAgent('llm_model', 'mock', '1');
    const second = await new ProvenanceTracker(store).getOrCreateAgent('llm_model', 'mock', '1');
    const other = await new ProvenanceTracker(store).getOrCreateAgent('llm_model', 'mock', '2');

    expect(second.id).toBe(first.id);
    expect(other.id).not.toBe(first.id);
    expect(store.snapshot().agents).toHaveLength(2);
  });

  it('builds the provenance graph of a case', async () => {
    const store = new InMemoryProvenanceStore();
    const tracker = new ProvenanceTracker(store);

    const ids = await tracker.trackActivity(
      { activityType: 'extraction', activityName: 'roles_extraction', caseId: 42 },
      async (activity) => {
        const prompt = await tracker.recordPrompt('Prompt text', activity);
        const response = await tracker.recordResponse('{"new_role_classes": []}', activity, { derivedFrom: prompt });
        const results = await tracker.recordExtractionResults(
          [{ confidence: 0.5 }, { confidence: 0.75 }, { label: 'no confidence' }],
          activity,
          'extracted_roles',
          { derivedFrom: [response] }
        );
        return { activity: activity.id, prompt, response, results };
      }
    );

    expect(ids.prompt).toMatchObject({
      entity_type: 'prompt',
      entity_name: 'prompt_roles_extraction',
      case_id: 42,
      content_hash: contentHash('Prompt text'),
      content_size: 11,
      generating_activity_id: ids.activity,
    });
    expect(ids.results.quality_metrics).toEqual({ count: 3, avg_confidence: 0.625 });

    const graph = await tracker.getProvenanceGraph(42);

    expect(graph.nodes.activities.map((node) => node.id)).toEqual([`activity_${ids.activity}`]);
    expect(graph.nodes.entities).toHaveLength(3);
    expect(graph.edges.used).toEqual([
      { from: `activity_${ids.activity}`, to: `entity_${ids.prompt.id}`, role: 'input' },
    ]);
    expect(graph.edges.wasDerivedFrom).toEqual([
      { from: `entity_${ids.response.id}`, to: `entity_${ids.prompt.id}`, type: 'generation' },
      { from: `entity_${ids.results.id}`, to: `entity_${ids.response.id}`, type: 'extraction' },
    ]);
    expect(graph.edges.wasGeneratedBy).toHaveLength(3);
    expect(graph.edges.wasAssociatedWith).toHaveLength(1);
    expect(await tracker.getProvenanceGraph(99)).toMatchObject({ nodes: { activities: [], entities: [] } });
  });

  it('links activities that informed one another', async () => {
    const store = new InMemoryProvenanceStore();
    const tracker = new ProvenanceTracker(store);
    const options = { activityType: 'extraction', caseId: 42 };

    const roles = await tracker.trackActivity({ ...options, activityName: 'roles_extraction' }, async (a) => a);
    const principles = await tracker.trackActivity({ ...options, activityName: 'principles_extraction' }, async (a) => a);
    await tracker.linkActivities(principles, roles);

    const graph = await tracker.getProvenanceGraph(42);
    expect(graph.edges.wasInformedBy).toEqual([
      { from: `activity_${principles.id}`, to: `activity_${roles.id}`, type: 'dependency' },
    ]);
  });

  it('creates bundles', async () => {
    const store = new InMemoryProvenanceStore();
    const tracker = new ProvenanceTracker(store);

    const bundle = await tracker.createBundle('case_42_pipeline', 'pipeline_run', { caseId: 42 });

    expect(store.snapshot().bundles).toEqual([bundle]);
    expect(bundle).toMatchObject({ case_id: 42, session_id: null, metadata: {} });
  });
});

describe('provenance helpers', () => {
  it('hashes content with SHA-256', () => {
    expect(contentHash('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('computes metrics only for lists', () => {
    expect(computeQualityMetrics({ confidence: 1 })).toEqual({});
    expect(computeQualityMetrics([])).toEqual({ count: 0 });
  });
});
