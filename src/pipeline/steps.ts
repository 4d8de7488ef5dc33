import type { ConceptType, PassNumber } from '../jobs/ConceptConfig.js';
import { ValidationError } from '../utils/errors.js';

/**
 * Pipeline Pass Definitions
 *
 * Three passes, nine concepts. Concepts inside a pass run in the listed
 * order; each one's results are available to the ones after it.
 */

export type PassName = 'contextual' | 'normative' | 'temporal';

export interface PipelinePass {
  number: PassNumber;
  name: PassName;
  concepts: readonly ConceptType[];

  /**
   * Case section read when the caller does not override it
   */
  defaultSection: string;
}

export const PIPELINE_PASSES: readonly PipelinePass[] = [
  {
    number: 1,
    name: 'contextual',
    concepts: ['roles', 'states', 'resources'],
    defaultSection: 'facts',
  },
  {
    number: 2,
    name: 'normative',
    concepts: ['principles', 'obligations', 'constraints', 'capabilities'],
    defaultSection: 'discussion',
  },
  {
    number: 3,
    name: 'temporal',
    concepts: ['actions', 'events'],
    defaultSection: 'discussion',
  },
];

/**
 * Passes to run, in pipeline order
 *
 * @throws ValidationError for pass numbers outside 1-3
 */
export function selectPasses(numbers?: readonly number[]): PipelinePass[] {
  if (!numbers || numbers.length === 0) {
    return [...PIPELINE_PASSES];
  }

  const unknown = numbers.filter((n) => !PIPELINE_PASSES.some((pass) => pass.number === n));
  if (unknown.length > 0) {
    throw new ValidationError(`Unknown pass number(s): ${unknown.join(', ')}. Expected 1, 2 or 3`);
  }
  return PIPELINE_PASSES.filter((pass) => numbers.includes(pass.number));
}

export function passOf(concept: ConceptType): PipelinePass | undefined {
  return PIPELINE_PASSES.find((pass) => pass.concepts.includes(concept));
}
