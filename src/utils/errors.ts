/**
 * Error taxonomy
 *
 * - ConfigurationError: unknown concept type, missing template or credentials.
 *   Raised immediately, never retried.
 * - TransientError: timeouts and connection failures at the LLM or catalogue
 *   boundary. The message always carries "timeout" or "connection" so the
 *   retry wrapper recognises it.
 * - ValidationError: a rejected state transition (promotion, consolidation)
 *   or bad caller input. No state has been mutated when it is thrown.
 * - NotFoundError: a referenced record does not exist.
 *
 * Malformed LLM output is not an error: the extractor degrades to partial or
 * empty results.
 */

export class ExtractionEngineError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class ConfigurationError extends ExtractionEngineError {}

export class TransientError extends ExtractionEngineError {}

export class ValidationError extends ExtractionEngineError {}

export class NotFoundError extends ExtractionEngineError {}

/**
 * Message of any thrown value, for error accumulators
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Convert a low-level network failure into a TransientError.
 * Anything that is not a timeout or connection failure is returned unchanged.
 */
export function asTransientError(error: unknown, context: string): unknown {
  if (error instanceof TransientError) {
    return error;
  }

  const code = errorCode(error) ?? errorCode(error instanceof Error ? error.cause : undefined);
  const name = error instanceof Error ? error.name : '';
  const message = toErrorMessage(error);

  if (name === 'TimeoutError' || name === 'AbortError' || code === 'ETIMEDOUT' || code === 'UND_ERR_CONNECT_TIMEOUT') {
    return new TransientError(`${context}: request timeout (${message})`, error);
  }

  if ((code && TRANSIENT_CODES.has(code)) || name === 'APIConnectionError' || /fetch failed/i.test(message)) {
    return new TransientError(`${context}: connection failure (${message})`, error);
  }

  return error;
}
