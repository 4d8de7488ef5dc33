import type { ValidateFunction } from 'ajv';
import type { ConceptConfig } from '../jobs/ConceptConfig.js';
import type { BaseCandidate, BaseIndividual } from '../jobs/schemaParts.js';
import { JobLogger } from '../utils/logger.js';
import { isRecord, validator } from '../utils/validators.js';

export interface ValidatedResult<C, I> {
  classes: C[];
  individuals: I[];

  /**
   * Items dropped by per-item validation
   */
  discarded: number;
}

function itemName(item: unknown, index: number): string {
  if (isRecord(item)) {
    for (const key of ['label', 'identifier', 'name']) {
      const value = item[key];
      if (typeof value === 'string' && value) {
        return value;
      }
    }
  }
  return `#${index}`;
}

/**
 * Result Validator
 *
 * Validates a normalized response against the combined result schema and
 * returns that pass's data when it succeeds. Otherwise each class and
 * individual is validated on its own and only the failing items are dropped.
 */
export class ResultValidator<C extends BaseCandidate, I extends BaseIndividual> {
  private logger: JobLogger;

  constructor(private readonly config: ConceptConfig<C, I>) {
    this.logger = new JobLogger(`ResultValidator:${config.concept}`);
  }

  validate(payload: Record<string, unknown>): ValidatedResult<C, I> {
    const arrays = {
      classes: payload[this.config.classesKey] ?? [],
      individuals: payload[this.config.individualsKey] ?? [],
    };

    const full = validator.validate(this.config.validators.result, arrays);
    if (full.valid && full.data) {
      return { classes: full.data.classes, individuals: full.data.individuals, discarded: 0 };
    }

    this.logger.warn(
      `Full validation failed with ${full.errors?.length ?? 0} errors, validating items individually`,
      { details: validator.formatErrors(full.errors) }
    );

    const classes = this.validateItems(arrays.classes, this.config.validators.candidate, 'class');
    const individuals = this.validateItems(arrays.individuals, this.config.validators.individual, 'individual');

    return {
      classes: classes.valid,
      individuals: individuals.valid,
      discarded: classes.discarded + individuals.discarded,
    };
  }

  private validateItems<T>(
    items: unknown,
    validate: ValidateFunction<T>,
    kind: 'class' | 'individual'
  ): { valid: T[]; discarded: number } {
    if (!Array.isArray(items)) {
      return { valid: [], discarded: 0 };
    }

    const valid: T[] = [];
    let discarded = 0;
    items.forEach((item: unknown, index) => {
      const result = validator.validate(validate, item);
      if (result.valid && result.data !== undefined) {
        valid.push(result.data);
        return;
      }
      discarded++;
      this.logger.warn(
        `Skipping invalid ${this.config.concept} ${kind} '${itemName(item, index)}': ` +
          `${result.errors?.length ?? 0} validation errors`
      );
    });

    return { valid, discarded };
  }
}
