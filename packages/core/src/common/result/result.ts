/**
 * @fileoverview Result - Fallible Outcome Carrier
 *
 * @packageDocumentation
 * @module @registry-di/core/common/result
 * @license Apache-2.0
 *
 * `Result<T>` holds either a value or a `Failure`. Operations that are meant
 * to be inspected rather than trusted (startup validation, parsing, env file
 * loading) return a Result instead of throwing.
 *
 * ```typescript
 * resolver
 *   .validate()
 *   .onFailure((failure) => logger.warn(failure.message))
 *   .unwrap(); // throws when validation failed
 * ```
 *
 * @version 1.0.0
 */

import { Failure } from './failure';

type ResultState<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly failure: Failure };

/**
 * Result - success holding a value, or failure holding a `Failure`.
 *
 * @template T - The success value type (`void` for operations without one)
 */
export class Result<T> {
  private constructor(private readonly state: ResultState<T>) {}

  /**
   * Create a successful result.
   */
  static ok<T>(value: T): Result<T> {
    return new Result<T>({ ok: true, value });
  }

  /**
   * Create a failed result.
   *
   * @remarks
   * Strings and errors are converted with `Failure.from`.
   */
  static fail<T = void>(failure: Failure | Error | string): Result<T> {
    return new Result<T>({ ok: false, failure: Failure.from(failure) });
  }

  /**
   * Run `fn`, capturing a throw as a failed result.
   */
  static try<T>(fn: () => T): Result<T> {
    try {
      return Result.ok(fn());
    } catch (error) {
      return Result.fail<T>(Failure.from(error));
    }
  }

  get isOk(): boolean {
    return this.state.ok;
  }

  get isError(): boolean {
    return !this.state.ok;
  }

  /**
   * The success value, or `undefined` for a failed result.
   */
  get value(): T | undefined {
    return this.state.ok ? this.state.value : undefined;
  }

  /**
   * The failure, or `undefined` for a successful result.
   */
  get failure(): Failure | undefined {
    return this.state.ok ? undefined : this.state.failure;
  }

  /**
   * Run `action` with the value if successful.
   */
  onSuccess(action: (value: T) => void): this {
    if (this.state.ok) {
      action(this.state.value);
    }
    return this;
  }

  /**
   * Run `action` with the failure if failed.
   */
  onFailure(action: (failure: Failure) => void): this {
    if (!this.state.ok) {
      action(this.state.failure);
    }
    return this;
  }

  /**
   * Transform the value of a successful result; failures pass through.
   */
  map<U>(fn: (value: T) => U): Result<U> {
    return this.state.ok ? Result.ok(fn(this.state.value)) : Result.fail<U>(this.state.failure);
  }

  /**
   * The value if successful, else `fallback`.
   */
  or(fallback: T): T {
    return this.state.ok ? this.state.value : fallback;
  }

  /**
   * The value if successful, else throw.
   *
   * @remarks
   * Throws the failure's `cause` when it is an `Error`, otherwise a new
   * `Error` carrying the failure message.
   */
  unwrap(): T {
    if (this.state.ok) {
      return this.state.value;
    }

    const { failure } = this.state;
    throw failure.cause instanceof Error ? failure.cause : new Error(failure.message);
  }
}
