import fs from 'fs/promises';
import path from 'path';
import type { SchemaObject } from 'ajv';
import { ValidationError } from '../utils/errors.js';
import { validator } from '../utils/validators.js';

/**
 * One case of a batch run. Section values are file paths, resolved
 * against the manifest's directory.
 */
export interface ManifestCase {
  caseId: number;
  sections: Record<string, string>;
  passes?: number[];
}

export interface BatchManifest {
  cases: ManifestCase[];
}

const manifestSchema: SchemaObject = {
  type: 'object',
  required: ['cases'],
  properties: {
    cases: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['caseId', 'sections'],
        properties: {
          caseId: { type: 'integer', minimum: 1 },
          sections: {
            type: 'object',
            minProperties: 1,
            additionalProperties: { type: 'string', minLength: 1 },
          },
          passes: {
            type: 'array',
            items: { type: 'integer', minimum: 1, maximum: 3 },
          },
        },
      },
    },
  },
};

const validateManifest = validator.compile<BatchManifest>(manifestSchema);

/**
 * Validate a parsed manifest and resolve its section paths against baseDir
 *
 * @throws ValidationError when the manifest does not match the schema
 */
export function parseManifest(raw: unknown, baseDir: string): BatchManifest {
  const result = validator.validate(validateManifest, raw);
  if (!result.valid || !result.data) {
    throw new ValidationError(`Invalid batch manifest:\n${validator.formatErrors(result.errors)}`);
  }

  return {
    cases: result.data.cases.map((entry) => ({
      ...entry,
      sections: Object.fromEntries(
        Object.entries(entry.sections).map(([section, file]) => [section, path.resolve(baseDir, file)])
      ),
    })),
  };
}

export async function loadManifest(manifestPath: string): Promise<BatchManifest> {
  const content = await fs.readFile(manifestPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Batch manifest ${manifestPath} is not valid JSON`, error);
  }
  return parseManifest(parsed, path.dirname(path.resolve(manifestPath)));
}

/**
 * Read every section file of a case
 */
export async function readSections(sections: Record<string, string>): Promise<Record<string, string>> {
  const entries = await Promise.all(
    Object.entries(sections).map(async ([section, file]) => [section, await fs.readFile(file, 'utf-8')] as const)
  );
  return Object.fromEntries(entries);
}
