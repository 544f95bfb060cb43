/**
 * @fileoverview DI Errors - Registration and Resolution Error Classes
 *
 * @packageDocumentation
 * @module @registry-di/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the error taxonomy raised by the registration store and
 * the resolver. `create()` and `singleton()` throw these immediately;
 * `validate()` collects them into an aggregate `Result` instead.
 *
 * Every error carries a `code` so callers can branch without `instanceof`
 * (useful when errors cross module-instance boundaries).
 *
 * @version 1.0.0
 */

import { type ServiceIdentifier, getServiceName } from './service-identifier';

/**
 * Discriminant for every error in this module.
 */
export type InjectionErrorCode =
  | 'NotRegistered'
  | 'InvalidRegistration'
  | 'DuplicateRegistration'
  | 'InvalidRegistrationShape'
  | 'NoValidConstructor'
  | 'TypeMismatch'
  | 'ConstructionFailure'
  | 'LocatorInitialized';

/**
 * Base error class for all registration and resolution errors.
 *
 * @remarks
 * ```typescript
 * try {
 *   resolver.create(IClock);
 * } catch (error) {
 *   if (error instanceof InjectionError && error.code === 'NotRegistered') {
 *     registration.addType(IClock, SystemClock);
 *   }
 * }
 * ```
 */
export abstract class InjectionError extends Error {
  /**
   * Machine-readable error kind.
   */
  public abstract readonly code: InjectionErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error thrown when a requested service is not registered.
 *
 * @example
 * ```typescript
 * // This will throw ServiceNotRegisteredError
 * resolver.create(UnregisteredService);
 *
 * // Fix:
 * registration.addType(UnregisteredService);
 * ```
 */
export class ServiceNotRegisteredError extends InjectionError {
  public readonly code = 'NotRegistered' as const;

  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier) {
    const name = getServiceName(identifier);
    super(
      `Service '${name}' is not registered. ` +
        `Did you forget to call registration.add*(${name})?`,
    );
    this.serviceIdentifier = identifier;
  }
}

/**
 * Error thrown when `null` or `undefined` is offered as a registration, or
 * when the key is neither a class nor a service token.
 */
export class InvalidRegistrationError extends InjectionError {
  public readonly code = 'InvalidRegistration' as const;

  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier, what: string, reason = 'must not be null or undefined') {
    super(`Cannot register service '${getServiceName(identifier)}': ${what} ${reason}`);
    this.serviceIdentifier = identifier;
  }
}

/**
 * Error thrown by a store in `duplicates: 'reject'` mode when an identifier
 * is registered twice.
 */
export class DuplicateRegistrationError extends InjectionError {
  public readonly code = 'DuplicateRegistration' as const;

  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier) {
    super(
      `Service '${getServiceName(identifier)}' is already registered ` +
        `and this registration rejects duplicates`,
    );
    this.serviceIdentifier = identifier;
  }
}

/**
 * Error thrown when a stored registration is none of instance, factory or type.
 *
 * @remarks
 * The typed write path cannot produce such a value; it appears only when the
 * store is fed untyped data.
 */
export class InvalidRegistrationShapeError extends InjectionError {
  public readonly code = 'InvalidRegistrationShape' as const;

  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier) {
    super(
      `Invalid registration for '${getServiceName(identifier)}': ` +
        `value is neither an instance, a factory nor a type`,
    );
    this.serviceIdentifier = identifier;
  }
}

/**
 * Error thrown when a type registration has no usable parameterless constructor.
 *
 * @example
 * ```typescript
 * class SqlRepository {
 *   constructor(private readonly url: string) {}
 * }
 *
 * registration.addType(IRepository, SqlRepository);
 * resolver.create(IRepository); // NoValidConstructorError
 *
 * // Fix: use a factory
 * registration.addFactory(IRepository, () => new SqlRepository(url));
 * ```
 */
export class NoValidConstructorError extends InjectionError {
  public readonly code = 'NoValidConstructor' as const;

  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier, implementationName: string) {
    super(
      `Invalid registration for '${getServiceName(identifier)}': ` +
        `implementation '${implementationName}' has no valid parameterless constructor`,
    );
    this.serviceIdentifier = identifier;
  }
}

/**
 * Error thrown when a stored or produced object does not satisfy the
 * identifier's capability check.
 */
export class TypeMismatchError extends InjectionError {
  public readonly code = 'TypeMismatch' as const;

  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier, actual: unknown) {
    super(
      `Invalid registration: resolved object (${describeValue(actual)}) ` +
        `is not a '${getServiceName(identifier)}'`,
    );
    this.serviceIdentifier = identifier;
  }
}

/**
 * Error thrown when a factory or constructor fails.
 *
 * @remarks
 * The original error is preserved as `cause`.
 */
export class ServiceCreationError extends InjectionError {
  public readonly code = 'ConstructionFailure' as const;

  public readonly serviceIdentifier: ServiceIdentifier;

  /**
   * The original error that caused creation to fail.
   */
  public override readonly cause: Error;

  constructor(identifier: ServiceIdentifier, cause: Error) {
    super(`Failed to create service '${getServiceName(identifier)}': ${cause.message}`, { cause });
    this.serviceIdentifier = identifier;
    this.cause = cause;
  }
}

/**
 * Error thrown when the default locator is initialized a second time.
 */
export class LocatorInitializedError extends InjectionError {
  public readonly code = 'LocatorInitialized' as const;

  constructor() {
    super(
      'The default service locator is already initialized. ' +
        'Call ServiceLocator.init() once, before the first registration or resolution.',
    );
  }
}

/**
 * Short description of a value for error messages.
 * @internal
 */
function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'Object';
  }
  return typeof value;
}
