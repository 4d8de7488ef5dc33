import type { PriorResults } from '../core/PromptBuilder.js';
import type { StoredConceptResult } from '../core/ResultsSink.js';
import type { ConceptGraphData } from '../graph/ResultGraphConverter.js';
import type { ConceptType } from '../jobs/ConceptConfig.js';

export interface ContextEntry {
  concept: ConceptType;
  section: string;
  data: ConceptGraphData;
}

/**
 * Cross-Concept Context
 *
 * Results extracted so far in a pipeline run, read by later concepts'
 * prompts. Immutable: with() returns a new context.
 */
export class CrossConceptContext implements PriorResults {
  private constructor(private readonly entries: readonly ContextEntry[]) {}

  static empty(): CrossConceptContext {
    return new CrossConceptContext([]);
  }

  /**
   * Rebuild the context of an earlier run from its stored results
   */
  static fromStoredResults(results: readonly StoredConceptResult[]): CrossConceptContext {
    return new CrossConceptContext(
      results.map((result) => ({ concept: result.concept, section: result.sectionType, data: result.data }))
    );
  }

  with(concept: ConceptType, section: string, data: ConceptGraphData): CrossConceptContext {
    return new CrossConceptContext([...this.entries, { concept, section, data }]);
  }

  resultsFor(concept: ConceptType): ReadonlyArray<{ section: string; data: ConceptGraphData }> {
    return this.entries.filter((entry) => entry.concept === concept);
  }

  get size(): number {
    return this.entries.length;
  }

  concepts(): ConceptType[] {
    return [...new Set(this.entries.map((entry) => entry.concept))];
  }
}
