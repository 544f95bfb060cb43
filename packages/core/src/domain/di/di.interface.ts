/**
 * @fileoverview DI Interfaces - Registration and Resolution Contracts
 *
 * @packageDocumentation
 * @module @registry-di/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the contracts of the registration store and the
 * resolver. They describe WHAT the runtime does; the Infrastructure layer
 * decides HOW.
 *
 * ## Read and Write Paths
 *
 * ```
 * startup                         runtime
 * ───────                         ───────
 * registration.addType(...)  ──┐
 * registration.addFactory(...) ├─► IServiceRegistration ◄── IServiceResolver
 * registration.addInstance(...)┘        (shared map)        ├─ create()
 *                                                           ├─ singleton()  ─► own cache
 *                                                           └─ validate()   ─► Result
 * ```
 *
 * Neither side locks. Populate the store once at startup, then read.
 *
 * @version 1.0.0
 */

import { type Result } from '../../common/result';

import { type Registration, type ServiceFactory } from './registration';
import { type Constructor, type ServiceIdentifier } from './service-identifier';

// ============================================================================
// ILogger - Diagnostic Output
// ============================================================================

/**
 * Minimal logger accepted by the store and the resolver.
 *
 * @remarks
 * The global `console` satisfies this interface and is the default.
 */
export interface ILogger {
  debug(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
}

// ============================================================================
// IServiceRegistration - Write Path
// ============================================================================

/**
 * What happens when an identifier is registered a second time.
 *
 * - `overwrite`: last write wins (default)
 * - `reject`: throw `DuplicateRegistrationError`
 */
export type DuplicatePolicy = 'overwrite' | 'reject';

/**
 * Options for a registration store.
 */
export interface IRegistrationOptions {
  /**
   * Behavior on re-registration.
   *
   * Default: `'overwrite'`
   */
  duplicates?: DuplicatePolicy;

  /**
   * Receives a debug line whenever a registration is replaced.
   *
   * Default: `console`
   */
  logger?: ILogger;
}

/**
 * IServiceRegistration - Registration store contract.
 *
 * @remarks
 * Every `add*` method funnels into a single write keyed by identifier.
 * Registering `null` or `undefined` throws `InvalidRegistrationError`.
 *
 * **Not thread-safe**: callers serialize writers, and must not resolve while
 * a write is in progress.
 *
 * @example
 * ```typescript
 * const registration = new ServiceRegistration();
 *
 * registration
 *   .addType(IClock, SystemClock)
 *   .addInstance(IConfig, loadConfig())
 *   .addFactory(ILogger, () => new ConsoleLogger('app'));
 * ```
 */
export interface IServiceRegistration {
  /**
   * Register a class as its own identifier.
   *
   * @remarks
   * The parameterless constructor is required but only checked at resolution.
   */
  addType<T>(implementation: Constructor<T>): this;

  /**
   * Register an implementation class under a distinct identifier.
   */
  addType<T, TImpl extends T>(identifier: ServiceIdentifier<T>, implementation: Constructor<TImpl>): this;

  /**
   * Register a ready-made object. It is shared by every resolution.
   */
  addInstance<T, TImpl extends T>(identifier: ServiceIdentifier<T>, instance: TImpl): this;

  /**
   * Register a zero-argument producer, invoked on each fresh resolution.
   */
  addFactory<T, TImpl extends T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<TImpl>): this;

  /**
   * Point-in-time snapshot of every registration, in insertion order.
   *
   * @remarks
   * Later writes to the store do not change a snapshot already taken.
   */
  readonly registrations: ReadonlyMap<ServiceIdentifier, Registration>;

  /**
   * Number of registered identifiers.
   */
  readonly size: number;

  /**
   * Get the current registration for an identifier.
   */
  get(identifier: ServiceIdentifier): Registration | undefined;

  /**
   * Check if an identifier is registered.
   */
  has(identifier: ServiceIdentifier): boolean;
}

// ============================================================================
// IServiceResolver - Read Path
// ============================================================================

/**
 * Options for a resolver.
 */
export interface IResolverOptions {
  /**
   * Receives a warn line for every failure found by `validate()`.
   *
   * Default: `console`
   */
  logger?: ILogger;
}

/**
 * IServiceResolver - Produces instances from a registration store.
 *
 * @remarks
 * A resolver is bound to one store for its whole life and owns a singleton
 * cache that only grows.
 *
 * | method | caches | on failure |
 * |--------|--------|------------|
 * | `create` | never | throws |
 * | `singleton` | yes | throws |
 * | `validate` | never | returns `Result` |
 */
export interface IServiceResolver {
  /**
   * Resolve a fresh instance. Never reads or writes the singleton cache.
   *
   * @throws ServiceNotRegisteredError, TypeMismatchError,
   *   NoValidConstructorError, ServiceCreationError,
   *   InvalidRegistrationShapeError
   */
  create<T>(identifier: ServiceIdentifier<T>): T;

  /**
   * Like `create`, but returns `undefined` when the identifier is not
   * registered. Every other failure still throws.
   */
  tryCreate<T>(identifier: ServiceIdentifier<T>): T | undefined;

  /**
   * Resolve the resolver-wide shared instance.
   *
   * @remarks
   * Instance registrations are returned directly. Anything else is created
   * on first call and cached for the resolver's lifetime.
   */
  singleton<T>(identifier: ServiceIdentifier<T>): T;

  /**
   * Check if an identifier is registered in the bound store.
   */
  isRegistered(identifier: ServiceIdentifier): boolean;

  /**
   * Attempt `create` for every registered identifier and report all failures.
   *
   * @remarks
   * Factories and constructors DO run. Nothing is cached and nothing throws.
   */
  validate(): Result<void>;
}
