/**
 * @fileoverview ServiceIdentifier - Unified Service Identification
 *
 * @packageDocumentation
 * @module @registry-di/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the runtime tokens that key registrations and
 * resolutions, together with the capability check the resolver applies to
 * every object it hands out.
 *
 * ## Two Forms of Identification
 *
 * 1. **Class**: the class itself is the key, `instanceof` is the check
 *    ```typescript
 *    registration.addType(SystemClock);
 *    ```
 *
 * 2. **ServiceToken**: an interface-typed key with an optional type guard
 *    ```typescript
 *    const IClock = createToken<IClock>('IClock', isClock);
 *    registration.addType(IClock, SystemClock);
 *    ```
 *
 * Identifiers are compared by reference, never by name.
 *
 * @version 1.0.0
 */

/**
 * Type representing a concrete constructor function.
 *
 * @template T - The instance type created by the constructor
 *
 * @remarks
 * Parameters are typed `never[]` so that any class is assignable, including
 * classes whose constructors require arguments. Those fail at resolution time
 * with `NoValidConstructorError`, not at registration time.
 */
export type Constructor<T = unknown> = new (...args: never[]) => T;

/**
 * Abstract constructor type for abstract classes used as identifiers.
 */
export type AbstractConstructor<T = unknown> = abstract new (...args: never[]) => T;

/**
 * Type predicate used by tokens to check a candidate instance.
 */
export type ServiceGuard<T> = (value: unknown) => value is T;

/**
 * ServiceToken - Identifier for services described by an interface.
 *
 * @template T - The service type resolved through this token
 *
 * @remarks
 * Interfaces leave nothing behind at runtime, so a token optionally carries a
 * guard. Without one the resolver trusts the registration and accepts any
 * non-absent value.
 *
 * @example
 * ```typescript
 * interface IClock { now(): number; }
 *
 * const IClock = createToken<IClock>(
 *   'IClock',
 *   (value): value is IClock =>
 *     typeof value === 'object' && value !== null && 'now' in value,
 * );
 * ```
 */
export class ServiceToken<T> {
  /** Phantom member carrying `T` for inference; never assigned. */
  declare readonly type?: T;

  constructor(
    public readonly description: string,
    private readonly guard?: ServiceGuard<T>,
  ) {}

  /**
   * Whether `value` satisfies the contract this token stands for.
   */
  accepts(value: unknown): value is T {
    if (value === null || value === undefined) {
      return false;
    }
    return this.guard === undefined || this.guard(value);
  }

  toString(): string {
    return `ServiceToken(${this.description})`;
  }
}

/**
 * ServiceIdentifier - Unified type for identifying services.
 *
 * @template T - The service instance type
 *
 * @remarks
 * A concrete class is also an abstract constructor, so the union covers both
 * concrete and abstract classes.
 */
export type ServiceIdentifier<T = unknown> = AbstractConstructor<T> | ServiceToken<T>;

/**
 * Check if a value is a valid ServiceIdentifier.
 *
 * @example
 * ```typescript
 * isServiceIdentifier(SystemClock); // true
 * isServiceIdentifier(createToken('IClock')); // true
 * isServiceIdentifier('clock'); // false
 * ```
 */
export function isServiceIdentifier(value: unknown): value is ServiceIdentifier {
  return value instanceof ServiceToken || typeof value === 'function';
}

/**
 * Get a human-readable name for a ServiceIdentifier.
 *
 * @remarks
 * Used for error messages, logs and validation reports.
 *
 * @example
 * ```typescript
 * getServiceName(SystemClock); // 'SystemClock'
 * getServiceName(createToken('IClock')); // 'IClock'
 * ```
 */
export function getServiceName(identifier: ServiceIdentifier): string {
  if (identifier instanceof ServiceToken) {
    return identifier.description;
  }
  if (typeof identifier === 'function') {
    return identifier.name || 'AnonymousClass';
  }

  // Untyped callers can pass anything
  return String(identifier);
}

/**
 * Capability check: does `value` satisfy the contract of `identifier`?
 *
 * @remarks
 * - Class identifiers: `value instanceof identifier`
 * - Token identifiers: the token's guard (or presence, without a guard)
 */
export function isCompatible<T>(identifier: ServiceIdentifier<T>, value: unknown): value is T {
  if (identifier instanceof ServiceToken) {
    return identifier.accepts(value);
  }

  return value instanceof identifier;
}

/**
 * Narrow an identifier to a constructible class.
 *
 * @remarks
 * Abstract classes are plain functions at runtime, so they pass as well; the
 * resolver decides later whether construction actually works.
 */
export function isConstructor<T>(identifier: ServiceIdentifier<T>): identifier is Constructor<T> {
  return typeof identifier === 'function';
}

/**
 * Whether `value` can be invoked with `new` and no arguments.
 *
 * @remarks
 * Arrow functions and methods have no `prototype` and cannot be constructed.
 * A class whose constructor declares required parameters reports them through
 * `length`; parameters with defaults do not count.
 *
 * @internal
 */
export function hasParameterlessConstructor(value: unknown): boolean {
  return typeof value === 'function' && value.prototype !== undefined && value.length === 0;
}

// ============================================================================
// Token Creation Helpers
// ============================================================================

/**
 * Create a typed service token for interface abstraction.
 *
 * @template T - The interface type this token represents
 * @param description - Name used in errors and reports
 * @param guard - Optional runtime check for resolved values
 *
 * @example
 * ```typescript
 * interface ILogger { info(message: string): void; }
 *
 * const ILogger = createToken<ILogger>('ILogger');
 *
 * registration.addFactory(ILogger, () => new ConsoleLogger());
 * const logger = resolver.create(ILogger); // typed as ILogger
 * ```
 */
export function createToken<T>(description: string, guard?: ServiceGuard<T>): ServiceToken<T> {
  return new ServiceToken<T>(description, guard);
}
