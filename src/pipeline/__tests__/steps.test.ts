import { describe, expect, it } from 'vitest';
import { CONCEPT_TYPES } from '../../jobs/ConceptConfig.js';
import { ValidationError } from '../../utils/errors.js';
import { PIPELINE_PASSES, passOf, selectPasses } from '../steps.js';

describe('pipeline passes', () => {
  it('cover every concept exactly once, in registry order', () => {
    expect(PIPELINE_PASSES.flatMap((pass) => pass.concepts)).toEqual([...CONCEPT_TYPES]);
  });

  it('select all passes by default', () => {
    expect(selectPasses().map((pass) => pass.number)).toEqual([1, 2, 3]);
    expect(selectPasses([]).map((pass) => pass.number)).toEqual([1, 2, 3]);
  });

  it('keep pipeline order whatever order they are requested in', () => {
    expect(selectPasses([3, 1]).map((pass) => pass.name)).toEqual(['contextual', 'temporal']);
  });

  it('reject unknown pass numbers', () => {
    expect(() => selectPasses([2, 4])).toThrow(ValidationError);
    expect(() => selectPasses([0])).toThrow('Unknown pass number(s): 0. Expected 1, 2 or 3');
  });

  it('find the pass of a concept', () => {
    expect(passOf('obligations')?.number).toBe(2);
    expect(passOf('events')?.defaultSection).toBe('discussion');
  });
});
