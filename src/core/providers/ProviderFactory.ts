import { ExtractionConfig, type ProviderType } from '../../config/extraction.js';
import { ConfigurationError } from '../../utils/errors.js';
import { AnthropicProvider } from './AnthropicProvider.js';
import type { LLMProvider } from './LLMProvider.js';
import { MockLLMProvider } from './MockLLMProvider.js';
import { OpenAIProvider } from './OpenAIProvider.js';

/**
 * Provider Factory
 *
 * Creates a fresh LLM provider per call; providers are never shared
 * between extractions.
 */
export class ProviderFactory {
  /**
   * Provider named by LLM_PROVIDER (defaults to anthropic)
   */
  static getDefaultProvider(): ProviderType {
    return ExtractionConfig.getConfig().provider;
  }

  static createProvider(providerType: ProviderType = this.getDefaultProvider()): LLMProvider {
    switch (providerType) {
      case 'anthropic':
        return new AnthropicProvider();
      case 'openai':
        return new OpenAIProvider();
      case 'mock':
        return new MockLLMProvider();
      default:
        throw new ConfigurationError(
          `Unknown provider type: ${String(providerType)}. Valid options: 'anthropic', 'openai', 'mock'`
        );
    }
  }
}
