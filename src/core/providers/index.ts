/**
 * LLM Provider Exports
 */

export type { LLMProvider, LLMRequest, LLMResponse, LLMUsage } from './LLMProvider.js';
export { AnthropicProvider } from './AnthropicProvider.js';
export { OpenAIProvider } from './OpenAIProvider.js';
export { MockLLMProvider, type MockReply, type MockResponder } from './MockLLMProvider.js';
export { ProviderFactory } from './ProviderFactory.js';
