import OpenAI from 'openai';
import { OpenAIConfig } from '../../config/openai.js';
import type { ModelTier } from '../../jobs/ConceptConfig.js';
import { TransientError, asTransientError } from '../../utils/errors.js';
import { JobLogger } from '../../utils/logger.js';
import type { LLMProvider, LLMRequest, LLMResponse } from './LLMProvider.js';

/**
 * OpenAI Chat Completions provider
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  private logger = new JobLogger('OpenAIProvider');

  constructor(
    private readonly client: OpenAI = OpenAIConfig.createClient(),
    private readonly resolveModel: (tier: ModelTier) => string = (tier) => OpenAIConfig.getModel(tier)
  ) {}

  modelFor(tier: ModelTier): string {
    return this.resolveModel(tier);
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const model = this.modelFor(request.tier);

    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        messages: [{ role: 'user', content: request.prompt }],
      });
    } catch (error) {
      if (error instanceof OpenAI.APIConnectionTimeoutError) {
        throw new TransientError(`OpenAI request timeout: ${error.message}`, error);
      }
      if (error instanceof OpenAI.APIConnectionError) {
        throw new TransientError(`OpenAI connection error: ${error.message}`, error);
      }
      throw asTransientError(error, 'OpenAI');
    }

    const choice = completion.choices[0];
    const truncated = choice?.finish_reason === 'length';
    if (truncated) {
      this.logger.warn('Response hit max_tokens', {
        label: request.label,
        maxTokens: request.maxTokens,
      });
    }

    return {
      text: choice?.message.content ?? '',
      truncated,
      model: completion.model,
      usage: completion.usage
        ? {
            inputTokens: completion.usage.prompt_tokens,
            outputTokens: completion.usage.completion_tokens,
          }
        : undefined,
    };
  }
}
