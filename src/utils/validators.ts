import { Ajv } from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';

/**
 * JSON Schema Validator
 *
 * Validates normalized LLM output against the per-concept schemas.
 *
 * - useDefaults fills schema defaults (empty reference lists, the default
 *   match decision) into the validated object.
 * - removeAdditional strips unknown keys wherever a schema declares
 *   additionalProperties: false (candidate classes); individuals keep theirs.
 */

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  useDefaults: true,
  removeAdditional: true,
});

/**
 * Validation Result
 */
export interface ValidationResult<T> {
  valid: boolean;
  errors?: ErrorObject[];
  data?: T;
}

export class SchemaValidator {
  /**
   * Compile a schema into a type guard. Ajv caches compiled schemas by
   * object identity, so compiling the same schema object twice is cheap.
   */
  compile<T>(schema: SchemaObject): ValidateFunction<T> {
    return ajv.compile<T>(schema);
  }

  /**
   * Validate data with a compiled guard
   */
  validate<T>(validateFn: ValidateFunction<T>, data: unknown): ValidationResult<T> {
    if (validateFn(data)) {
      return { valid: true, data };
    }

    return {
      valid: false,
      errors: validateFn.errors ? [...validateFn.errors] : [],
    };
  }

  /**
   * Format validation errors as a readable string
   */
  formatErrors(errors?: ErrorObject[]): string {
    if (!errors || errors.length === 0) {
      return 'No errors';
    }

    return errors
      .map((error) => {
        const path = error.instancePath || 'root';
        const message = error.message || 'validation failed';
        return `  - ${path}: ${message} ${JSON.stringify(error.params)}`;
      })
      .join('\n');
  }
}

/**
 * Global validator instance
 */
export const validator = new SchemaValidator();

/**
 * Strip a surrounding markdown code fence, if any
 */
export function stripCodeFences(content: string): string {
  return content
    .trim()
    .replace(/^```(?:json)?\s*/, '')
    .replace(/\s*```$/, '');
}

type ParseAttempt = { ok: true; value: unknown } | { ok: false };

function tryParse(text: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Extract and parse JSON content from model response
 * Handles bare JSON, markdown code blocks and JSON surrounded by prose.
 *
 * @throws Error when no JSON value can be recovered
 */
export function extractJsonFromResponse(content: string): unknown {
  const cleaned = stripCodeFences(content);

  const direct = tryParse(cleaned);
  if (direct.ok) {
    return direct.value;
  }

  const jsonBlockMatch = content.match(/```json\s*([\s\S]*?)\s*```/);
  if (jsonBlockMatch) {
    const fenced = tryParse(jsonBlockMatch[1]);
    if (fenced.ok) {
      return fenced.value;
    }
  }

  // Outermost object or array span in surrounding prose
  for (const [open, close] of [['{', '}'], ['[', ']']]) {
    const start = cleaned.indexOf(open);
    const end = cleaned.lastIndexOf(close);
    if (start !== -1 && end > start) {
      const span = tryParse(cleaned.slice(start, end + 1));
      if (span.ok) {
        return span.value;
      }
    }
  }

  throw new Error('Could not extract valid JSON from response content');
}

/**
 * Whether a JSON string parses
 */
export function isValidJson(text: string): boolean {
  return tryParse(text).ok;
}

/**
 * Plain JSON object check used before reading fields of parsed LLM or
 * service output
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
