/**
 * @fileoverview Failure - Structured Error Value
 *
 * @packageDocumentation
 * @module @registry-di/core/common/result
 * @license Apache-2.0
 *
 * A `Failure` is the error half of a `Result`: a human-readable message, an
 * optional underlying cause (usually a thrown `Error`) and an optional
 * payload for logging context. `AggregateFailure` batches several failures
 * into one value while keeping each message.
 *
 * @version 1.0.0
 */

/**
 * Message used by `AggregateFailure` when none is given.
 */
export const AGGREGATE_FAILURE_MESSAGE = 'Multiple errors occurred, see failures for details.';

/**
 * Failure - message, optional cause and optional payload.
 *
 * @example
 * ```typescript
 * const failure = new Failure('Invalid format', undefined, { input: 'abc' });
 * ```
 */
export class Failure {
  constructor(
    public readonly message: string,
    public readonly cause?: unknown,
    public readonly payload?: unknown,
  ) {}

  /**
   * Convert anything caught or returned into a Failure.
   *
   * @remarks
   * - `Failure`: returned as-is
   * - `Error`: its message, with the error kept as `cause`
   * - anything else: `String(value)` as the message
   */
  static from(value: unknown): Failure {
    if (value instanceof Failure) {
      return value;
    }
    if (value instanceof Error) {
      return new Failure(value.message, value);
    }
    return new Failure(String(value));
  }

  /**
   * Case-insensitive message comparison.
   */
  isSimilarTo(other: Failure): boolean {
    return this.message.toLowerCase() === other.message.toLowerCase();
  }

  toString(): string {
    return this.message;
  }
}

/**
 * AggregateFailure - several failures reported as one.
 *
 * @example
 * ```typescript
 * const failure = new AggregateFailure([
 *   new Failure('IClock: not registered'),
 *   new Failure('IRepository: no valid constructor'),
 * ]);
 *
 * failure.failures.length; // 2
 * ```
 */
export class AggregateFailure extends Failure {
  public readonly failures: readonly Failure[];

  constructor(failures: readonly Failure[], message: string = AGGREGATE_FAILURE_MESSAGE, cause?: unknown) {
    super(message, cause, failures);
    this.failures = [...failures];
  }
}
