import Anthropic from '@anthropic-ai/sdk';
import { AnthropicConfig } from '../../config/anthropic.js';
import type { ModelTier } from '../../jobs/ConceptConfig.js';
import { TransientError, asTransientError } from '../../utils/errors.js';
import { JobLogger } from '../../utils/logger.js';
import type { LLMProvider, LLMRequest, LLMResponse } from './LLMProvider.js';

/**
 * Anthropic Messages API provider
 *
 * Sends the prompt as a single user message and concatenates the text blocks
 * of the reply. A stop_reason of max_tokens marks the response as truncated.
 */
export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private logger = new JobLogger('AnthropicProvider');

  constructor(
    private readonly client: Anthropic = AnthropicConfig.createClient(),
    private readonly resolveModel: (tier: ModelTier) => string = (tier) => AnthropicConfig.getModel(tier)
  ) {}

  modelFor(tier: ModelTier): string {
    return this.resolveModel(tier);
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const model = this.modelFor(request.tier);

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        messages: [{ role: 'user', content: request.prompt }],
      });
    } catch (error) {
      throw this.toProviderError(error);
    }

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }

    const truncated = response.stop_reason === 'max_tokens';
    if (truncated) {
      this.logger.warn('Response hit max_tokens', {
        label: request.label,
        maxTokens: request.maxTokens,
      });
    }

    return {
      text,
      truncated,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }

  /**
   * The SDK reports timeouts as "Request timed out.", so SDK connection
   * errors are mapped by class rather than by message.
   */
  private toProviderError(error: unknown): unknown {
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new TransientError(`Anthropic request timeout: ${error.message}`, error);
    }
    if (error instanceof Anthropic.APIConnectionError) {
      return new TransientError(`Anthropic connection error: ${error.message}`, error);
    }
    return asTransientError(error, 'Anthropic');
  }
}
