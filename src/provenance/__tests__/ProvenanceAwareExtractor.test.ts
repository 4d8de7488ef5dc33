import { describe, expect, it } from 'vitest';
import { ConceptExtractor } from '../../core/ConceptExtractor.js';
import { InMemoryOntologyCatalogue } from '../../core/OntologyCatalogue.js';
import { InMemoryPromptTemplateStore } from '../../core/PromptTemplateStore.js';
import { MockLLMProvider, type MockResponder } from '../../core/providers/MockLLMProvider.js';
import { getConceptConfig } from '../../jobs/registry.js';
import { ProvenanceAwareExtractor } from '../ProvenanceAwareExtractor.js';
import { InMemoryProvenanceStore } from '../ProvenanceStore.js';
import { VersionedProvenanceTracker } from '../VersionedProvenanceTracker.js';
import { ActivityStatus, VersionEnvironment } from '../types.js';

const REPLY = {
  new_role_classes: [{ label: 'Engineer', definition: 'Professional engineer', confidence: 0.75 }],
  role_individuals: [{ identifier: 'Engineer A', role_class: 'Engineer', confidence: 0.25 }],
};

async function setup(responder: MockResponder = () => REPLY) {
  const extractor = await ConceptExtractor.create(getConceptConfig('roles'), {
    provider: new MockLLMProvider(responder),
    catalogue: new InMemoryOntologyCatalogue(),
    templates: InMemoryPromptTemplateStore.fromShippedTemplates(),
  });
  const store = new InMemoryProvenanceStore();
  const tracker = new VersionedProvenanceTracker(store, { environment: VersionEnvironment.DEVELOPMENT });
  return { extractor, store, tracker };
}

describe('ProvenanceAwareExtractor', () => {
  it('records the extraction activity with prompt, response and results', async () => {
    const { extractor, store, tracker } = await setup();
    const tracked = new ProvenanceAwareExtractor(extractor, tracker, { sessionId: 'session-1' });

    const outcome = await tracked.extract('Engineer A reviewed the plans.', 42, 'facts');

    const snapshot = store.snapshot();
    expect(snapshot.activities).toHaveLength(1);
    expect(snapshot.activities[0]).toMatchObject({
      id: outcome.activityId,
      activity_type: 'extraction',
      activity_name: 'roles_extraction',
      case_id: 42,
      session_id: 'session-1',
      status: ActivityStatus.COMPLETED,
      execution_plan: { concept: 'roles', section_type: 'facts', step: 1, model_tier: 'powerful', temperature: 0.3 },
    });
    expect(snapshot.agents[0]).toMatchObject({ agent_type: 'extraction_service', agent_name: 'RolesExtractor' });

    const byId = new Map(snapshot.entities.map((entity) => [entity.id, entity]));
    expect(byId.get(outcome.promptEntityId)).toMatchObject({
      entity_type: 'prompt',
      entity_name: 'RolesExtractor_prompt',
      content: outcome.result.prompt,
      metadata: { template_id: 'shipped:roles', text_length: 30 },
    });
    expect(byId.get(outcome.responseEntityId)).toMatchObject({
      entity_type: 'response',
      content: JSON.stringify(REPLY),
      metadata: { model: 'mock-powerful', truncated: false, candidates_count: 2 },
    });
    expect(byId.get(outcome.extractionEntityId)).toMatchObject({
      entity_type: 'extracted_roles',
      quality_metrics: { count: 2, avg_confidence: 0.5 },
      metadata: { class_count: 1, individual_count: 1, discarded: 0 },
    });
    expect(snapshot.derivations.map((derivation) => derivation.derivation_type)).toEqual(['generation', 'extraction']);
  });

  it('stamps the activity with the workflow version', async () => {
    const { extractor, store, tracker } = await setup();

    await tracker.trackVersionedWorkflow('concept_extraction', async (versioning) =>
      new ProvenanceAwareExtractor(extractor, tracker, { versioning }).extract('Engineer A reviewed the plans.', 42, 'facts')
    );

    const [version] = store.snapshot().versions;
    expect(store.snapshot().activities[0]).toMatchObject({ version_id: version.id, version_number: '0.1.0' });
  });

  it('records a failed activity when the model call fails', async () => {
    const { extractor, store, tracker } = await setup(() => {
      throw new Error('Invalid API key');
    });
    const tracked = new ProvenanceAwareExtractor(extractor, tracker);

    await expect(tracked.extract('Engineer A reviewed the plans.', 42, 'facts')).rejects.toThrow('Invalid API key');

    expect(store.snapshot().activities[0]).toMatchObject({
      status: ActivityStatus.FAILED,
      error_message: 'Invalid API key',
    });
    expect(store.snapshot().entities).toEqual([]);
  });
});
