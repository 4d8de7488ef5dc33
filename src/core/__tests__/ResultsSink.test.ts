import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TEST_TIMESTAMP } from '../../__tests__/fixtures.js';
import {
  InMemoryResultsSink,
  JsonFileResultsSink,
  type ExtractionPromptRecord,
  type StoredConceptResult,
} from '../ResultsSink.js';

const result: StoredConceptResult = {
  caseId: 42,
  concept: 'roles',
  passNumber: 1,
  sectionType: 'facts',
  sessionId: 'session-1',
  data: { new_classes: [], new_individuals: [] },
  ontologyDefinitions: {},
  storedAt: TEST_TIMESTAMP,
};

const prompt: ExtractionPromptRecord = {
  caseId: 42,
  concept: 'roles',
  step: 1,
  sectionType: 'facts',
  sessionId: 'session-1',
  promptText: 'Extract roles',
  rawResponse: '{}',
  model: 'mock-powerful',
  templateId: 'shipped:roles',
  classCount: 0,
  individualCount: 0,
  createdAt: TEST_TIMESTAMP,
};

describe('JsonFileResultsSink', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'results-sink-'));
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  it('writes results and prompts under the case directory', async () => {
    const sink = new JsonFileResultsSink(baseDir);

    await sink.storeResults(result);
    await sink.storePrompt(prompt);

    const resultFile = path.join(baseDir, '42', 'roles-session-1.json');
    const promptFile = path.join(baseDir, '42', 'roles-session-1.prompt.json');
    expect(sink.resultPath(42, 'roles', 'session-1')).toBe(resultFile);
    expect(sink.promptPath(42, 'roles', 'session-1')).toBe(promptFile);
    expect(JSON.parse(await fs.readFile(resultFile, 'utf-8'))).toEqual(result);
    expect(JSON.parse(await fs.readFile(promptFile, 'utf-8'))).toEqual(prompt);
  });
});

describe('InMemoryResultsSink', () => {
  it('filters stored results by concept', async () => {
    const sink = new InMemoryResultsSink();

    await sink.storeResults(result);
    await sink.storeResults({ ...result, concept: 'states', sessionId: 'session-2' });
    await sink.storePrompt(prompt);

    expect(sink.resultsFor('states').map((stored) => stored.sessionId)).toEqual(['session-2']);
    expect(sink.prompts).toHaveLength(1);
  });
});
