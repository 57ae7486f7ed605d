/**
 * Call-count expectations
 * @module mocks/expectation
 */

import { z } from 'zod';
import { InvalidExpectationError, formatCountRange, type CountRange } from '../errors/index.js';

const CountSchema = z.number().int().nonnegative();

const ExpectationRangeSchema = z
  .object({
    min: CountSchema,
    max: z.union([CountSchema, z.literal(Infinity)]),
  })
  .refine((range) => range.min <= range.max, {
    message: 'min must not exceed max',
    path: ['max'],
  });

/**
 * Accepted shorthand: a number means "exactly n"; a partial range
 * defaults min to 0 and max to unbounded.
 */
export type ExpectationInput = number | Expectation | { min?: number; max?: number };

/**
 * Inclusive call-count range `[min, max]`
 */
export class Expectation implements CountRange {
  private constructor(
    public readonly min: number,
    public readonly max: number
  ) {
    Object.freeze(this);
  }

  /**
   * Validate and build a range
   *
   * @throws InvalidExpectationError
   */
  static range(min: number, max: number = Infinity): Expectation {
    const result = ExpectationRangeSchema.safeParse({ min, max });
    if (!result.success) {
      throw new InvalidExpectationError(
        result.error.issues.map((issue) => `${issue.path.join('.') || 'range'}: ${issue.message}`)
      );
    }
    return new Expectation(result.data.min, result.data.max);
  }

  static exactly(count: number): Expectation {
    return Expectation.range(count, count);
  }

  static atLeast(count: number): Expectation {
    return Expectation.range(count, Infinity);
  }

  static atMost(count: number): Expectation {
    return Expectation.range(0, count);
  }

  static between(min: number, max: number): Expectation {
    return Expectation.range(min, max);
  }

  static never(): Expectation {
    return Expectation.range(0, 0);
  }

  /** The default: any number of calls, including none */
  static unconstrained(): Expectation {
    return Expectation.range(0, Infinity);
  }

  static from(input: ExpectationInput): Expectation {
    if (input instanceof Expectation) {
      return input;
    }
    if (typeof input === 'number') {
      return Expectation.exactly(input);
    }
    return Expectation.range(input.min ?? 0, input.max ?? Infinity);
  }

  isSatisfiedBy(count: number): boolean {
    return this.min <= count && count <= this.max;
  }

  get isUnconstrained(): boolean {
    return this.min === 0 && this.max === Infinity;
  }

  toString(): string {
    return formatCountRange(this);
  }
}
