import { afterEach, describe, expect, it, vi } from 'vitest';
import { AnthropicConfig } from '../../../config/anthropic.js';
import { ConfigurationError } from '../../../utils/errors.js';
import { AnthropicProvider } from '../AnthropicProvider.js';
import { MockLLMProvider } from '../MockLLMProvider.js';
import { ProviderFactory } from '../ProviderFactory.js';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('ProviderFactory', () => {
  it('creates the provider named by LLM_PROVIDER', () => {
    vi.stubEnv('LLM_PROVIDER', 'MOCK');

    const provider = ProviderFactory.createProvider();

    expect(provider).toBeInstanceOf(MockLLMProvider);
    expect(provider.name).toBe('mock');
  });

  it('rejects unknown providers', () => {
    vi.stubEnv('LLM_PROVIDER', 'gemini');

    expect(() => ProviderFactory.createProvider()).toThrow(ConfigurationError);
    expect(() => ProviderFactory.getDefaultProvider()).toThrow("Unknown LLM_PROVIDER 'gemini'");
  });

  it('needs an API key for Anthropic', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');

    expect(() => ProviderFactory.createProvider('anthropic')).toThrow(ConfigurationError);
  });

  it('resolves Anthropic models per tier', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
    vi.stubEnv('ANTHROPIC_MODEL_DEFAULT', 'model-default');
    vi.stubEnv('ANTHROPIC_MODEL_POWERFUL', 'model-powerful');

    const provider = ProviderFactory.createProvider('anthropic');

    expect(provider).toBeInstanceOf(AnthropicProvider);
    expect(provider.modelFor('default')).toBe('model-default');
    expect(provider.modelFor('powerful')).toBe('model-powerful');
  });

  it('uses the default model for both tiers unless a powerful one is set', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
    vi.stubEnv('ANTHROPIC_MODEL_DEFAULT', 'model-default');
    vi.stubEnv('ANTHROPIC_MODEL_POWERFUL', '');

    expect(AnthropicConfig.getModel('powerful')).toBe('model-default');
  });
});
