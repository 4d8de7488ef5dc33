import { describe, expect, it } from 'vitest';
import { TransientError, ValidationError, asTransientError, toErrorMessage } from '../errors.js';

describe('error classes', () => {
  it('carry their class name and cause', () => {
    const cause = new Error('root');
    const error = new ValidationError('bad input', cause);

    expect(error.name).toBe('ValidationError');
    expect(error.cause).toBe(cause);
  });
});

describe('asTransientError', () => {
  it('wraps connection failures', () => {
    const error = asTransientError(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }), 'LLM');

    expect(error).toBeInstanceOf(TransientError);
    expect(toErrorMessage(error)).toBe('LLM: connection failure (socket hang up)');
  });

  it('wraps timeouts', () => {
    const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });

    expect(toErrorMessage(asTransientError(timeout, 'Ontology catalogue Role'))).toBe(
      'Ontology catalogue Role: request timeout (The operation was aborted due to timeout)'
    );
  });

  it('returns other errors unchanged', () => {
    const error = new Error('Invalid API key');

    expect(asTransientError(error, 'LLM')).toBe(error);
  });
});

describe('toErrorMessage', () => {
  it('stringifies non-errors', () => {
    expect(toErrorMessage('plain')).toBe('plain');
    expect(toErrorMessage(404)).toBe('404');
  });
});
