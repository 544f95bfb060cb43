/**
 * @fileoverview Registration - Stored Recipes for Producing Services
 *
 * @packageDocumentation
 * @module @registry-di/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A registration is one of three variants, discriminated by `kind`:
 *
 * | kind | holds | resolution |
 * |------|-------|------------|
 * | `instance` | a pre-built object | returned as-is (shared) |
 * | `factory` | a zero-argument function | invoked on every `create` |
 * | `type` | a class with a parameterless constructor | `new` on every `create` |
 *
 * The resolver switches over `kind`, so adding a variant is a compile error
 * until every switch handles it.
 *
 * @version 1.0.0
 */

import { type Constructor, type ServiceIdentifier } from './service-identifier';

/**
 * Zero-argument producer of a service instance.
 *
 * @example
 * ```typescript
 * const loggerFactory: ServiceFactory<ILogger> = () => new ConsoleLogger('app');
 * ```
 */
export type ServiceFactory<T> = () => T;

/**
 * Discriminant of the registration variants.
 */
export type RegistrationKind = 'instance' | 'factory' | 'type';

interface RegistrationBase<T> {
  /** The identifier this registration was stored under. */
  readonly identifier: ServiceIdentifier<T>;
}

export interface InstanceRegistration<T = unknown> extends RegistrationBase<T> {
  readonly kind: 'instance';
  readonly instance: T;
}

export interface FactoryRegistration<T = unknown> extends RegistrationBase<T> {
  readonly kind: 'factory';
  readonly factory: ServiceFactory<T>;
}

export interface TypeRegistration<T = unknown> extends RegistrationBase<T> {
  readonly kind: 'type';
  readonly implementation: Constructor<T>;
}

/**
 * Registration - closed union of everything the store can hold.
 */
export type Registration<T = unknown> =
  | InstanceRegistration<T>
  | FactoryRegistration<T>
  | TypeRegistration<T>;

/**
 * Create an instance registration.
 */
export function createInstanceRegistration<T>(
  identifier: ServiceIdentifier<T>,
  instance: T,
): InstanceRegistration<T> {
  const registration: InstanceRegistration<T> = { kind: 'instance', identifier, instance };
  return Object.freeze(registration);
}

/**
 * Create a factory registration.
 */
export function createFactoryRegistration<T>(
  identifier: ServiceIdentifier<T>,
  factory: ServiceFactory<T>,
): FactoryRegistration<T> {
  const registration: FactoryRegistration<T> = { kind: 'factory', identifier, factory };
  return Object.freeze(registration);
}

/**
 * Create a type registration.
 *
 * @remarks
 * The constructor is not inspected here; a missing parameterless constructor
 * surfaces when the registration is resolved or validated.
 */
export function createTypeRegistration<T>(
  identifier: ServiceIdentifier<T>,
  implementation: Constructor<T>,
): TypeRegistration<T> {
  const registration: TypeRegistration<T> = { kind: 'type', identifier, implementation };
  return Object.freeze(registration);
}
