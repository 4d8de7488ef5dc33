import type { ModelTier } from '../../jobs/ConceptConfig.js';
import type { LLMProvider, LLMRequest, LLMResponse } from './LLMProvider.js';

/**
 * What a mock reply may be: raw text, a full response, or a value to
 * serialise as JSON
 */
export type MockReply = string | LLMResponse | Record<string, unknown> | unknown[];

export type MockResponder = (request: LLMRequest) => MockReply | Promise<MockReply>;

function isLLMResponse(reply: MockReply): reply is LLMResponse {
  return (
    typeof reply === 'object' &&
    !Array.isArray(reply) &&
    typeof reply.text === 'string' &&
    typeof reply.truncated === 'boolean'
  );
}

/**
 * Mock LLM Provider
 *
 * Deterministic stand-in for tests and offline runs (LLM_PROVIDER=mock).
 * Replies come from a responder function or a fixed queue; with neither,
 * every call returns "{}". A responder that throws simulates a failing call.
 */
export class MockLLMProvider implements LLMProvider {
  readonly name = 'mock';
  readonly calls: LLMRequest[] = [];
  private readonly queue: MockReply[];
  private readonly responder?: MockResponder;

  constructor(replies: MockResponder | MockReply[] = []) {
    if (typeof replies === 'function') {
      this.responder = replies;
      this.queue = [];
    } else {
      this.queue = [...replies];
    }
  }

  modelFor(tier: ModelTier): string {
    return `mock-${tier}`;
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    this.calls.push(request);

    const reply = this.responder ? await this.responder(request) : this.queue.shift() ?? '{}';

    if (typeof reply === 'string') {
      return { text: reply, truncated: false, model: this.modelFor(request.tier) };
    }
    if (isLLMResponse(reply)) {
      return reply;
    }
    return { text: JSON.stringify(reply), truncated: false, model: this.modelFor(request.tier) };
  }
}
