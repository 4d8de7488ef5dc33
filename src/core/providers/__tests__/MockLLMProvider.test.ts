import { describe, expect, it } from 'vitest';
import type { LLMRequest } from '../LLMProvider.js';
import { MockLLMProvider } from '../MockLLMProvider.js';

const request: LLMRequest = { prompt: 'Extract roles', tier: 'default', maxTokens: 100, temperature: 0, label: 'roles' };

describe('MockLLMProvider', () => {
  it('replays queued replies, serialising objects', async () => {
    const provider = new MockLLMProvider(['raw text', { new_role_classes: [] }]);

    expect(await provider.complete(request)).toEqual({ text: 'raw text', truncated: false, model: 'mock-default' });
    expect((await provider.complete(request)).text).toBe('{"new_role_classes":[]}');
    expect((await provider.complete(request)).text).toBe('{}');
    expect(provider.calls).toHaveLength(3);
  });

  it('passes full responses through', async () => {
    const provider = new MockLLMProvider([{ text: '{"a"', truncated: true, model: 'custom' }]);

    expect(await provider.complete(request)).toEqual({ text: '{"a"', truncated: true, model: 'custom' });
  });

  it('asks the responder for every call', async () => {
    const provider = new MockLLMProvider((incoming) => `reply to ${incoming.label}`);

    expect((await provider.complete({ ...request, tier: 'powerful' })).text).toBe('reply to roles');
    expect(provider.modelFor('powerful')).toBe('mock-powerful');
  });

  it('rejects when the responder throws', async () => {
    const provider = new MockLLMProvider(() => {
      throw new Error('Request timeout');
    });

    await expect(provider.complete(request)).rejects.toThrow('Request timeout');
  });
});
