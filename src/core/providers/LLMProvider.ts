/**
 * LLM Provider Interface
 *
 * The boundary the concept extractor talks to. Implementations turn one
 * prompt into raw response text; parsing, repair and validation happen on
 * the caller's side.
 */

import type { ModelTier } from '../../jobs/ConceptConfig.js';

export interface LLMRequest {
  prompt: string;
  tier: ModelTier;
  maxTokens: number;
  temperature: number;

  /**
   * Label used in log lines, e.g. "roles"
   */
  label?: string;
}

export interface LLMUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LLMResponse {
  text: string;

  /**
   * True when generation stopped at the output token limit
   */
  truncated: boolean;

  model: string;
  usage?: LLMUsage;
}

/**
 * All providers (Anthropic, OpenAI, mock) implement this interface
 */
export interface LLMProvider {
  readonly name: string;

  /**
   * Model that serves a tier
   */
  modelFor(tier: ModelTier): string;

  /**
   * Send one prompt.
   *
   * @throws TransientError on timeouts and connection failures
   */
  complete(request: LLMRequest): Promise<LLMResponse>;
}
