/**
 * @fileoverview ServiceResolver - Core Resolution Engine
 *
 * @packageDocumentation
 * @module @registry-di/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module implements the resolution algorithm, the resolver-local
 * singleton cache and the startup validation pass.
 *
 * ## Resolution Algorithm
 *
 * ```
 * create(identifier)
 *   1. Find registration            (missing      → NotRegistered)
 *   2. instance: capability check   (incompatible → TypeMismatch)
 *   3. factory:  invoke             (throws       → ConstructionFailure)
 *   4. type:     parameterless ctor (none         → NoValidConstructor)
 *                invoke             (throws       → ConstructionFailure)
 *   5. anything else                              → InvalidRegistrationShape
 *   6. Capability check on the product (incompatible → TypeMismatch)
 *
 * singleton(identifier)
 *   instance registration → return it (no caching needed)
 *   cache hit             → return cached
 *   otherwise             → create(), cache, return
 * ```
 *
 * @version 1.0.0
 */

import { Failure, AggregateFailure, Result } from '../../common/result';
import {
  type ILogger,
  type IResolverOptions,
  type IServiceRegistration,
  type IServiceResolver,
  type Registration,
  type ServiceIdentifier,
  InvalidRegistrationShapeError,
  NoValidConstructorError,
  ServiceCreationError,
  ServiceNotRegisteredError,
  TypeMismatchError,
  getServiceName,
  hasParameterlessConstructor,
  isCompatible,
} from '../../domain/di';

/**
 * ServiceResolver - IServiceResolver implementation.
 *
 * @remarks
 * **Binding:**
 *
 * A resolver reads its store on every call, so registrations added after the
 * resolver was created are visible. It never writes to the store.
 *
 * **Singleton Cache:**
 *
 * Each resolver owns its cache. Two resolvers over the same store produce two
 * different singletons for a factory or type registration (instance
 * registrations are shared by both, as they are stored once).
 *
 * **Thread Safety:**
 *
 * None. Two callers racing on the first `singleton()` call for an identifier
 * may each run the factory.
 *
 * @example
 * ```typescript
 * const registration = new ServiceRegistration()
 *   .addType(IClock, SystemClock)
 *   .addFactory(ILogger, () => new ConsoleLogger('app'));
 *
 * const resolver = new ServiceResolver(registration);
 *
 * resolver.validate().unwrap(); // fail startup on broken registrations
 *
 * const clock = resolver.singleton(IClock);
 * const logger = resolver.create(ILogger);
 * ```
 */
export class ServiceResolver implements IServiceResolver {
  /**
   * Cache for singleton instances.
   */
  private readonly singletonCache = new Map<ServiceIdentifier, unknown>();

  private readonly logger: ILogger;

  constructor(
    private readonly registration: IServiceRegistration,
    options?: IResolverOptions,
  ) {
    this.logger = options?.logger ?? console;
  }

  // ============================================================================
  // IServiceResolver Implementation
  // ============================================================================

  /**
   * Resolve a fresh instance.
   */
  create<T>(identifier: ServiceIdentifier<T>): T {
    const registration = this.registration.get(identifier);
    if (!registration) {
      throw new ServiceNotRegisteredError(identifier);
    }

    const instance = this.produce(identifier, registration);

    if (!isCompatible(identifier, instance)) {
      throw new TypeMismatchError(identifier, instance);
    }

    return instance;
  }

  /**
   * Try to resolve, returning undefined if not registered.
   */
  tryCreate<T>(identifier: ServiceIdentifier<T>): T | undefined {
    try {
      return this.create(identifier);
    } catch (error) {
      if (error instanceof ServiceNotRegisteredError && error.serviceIdentifier === identifier) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Resolve the shared instance for this resolver.
   */
  singleton<T>(identifier: ServiceIdentifier<T>): T {
    const registration = this.registration.get(identifier);

    // Instance registrations are singletons already
    if (registration?.kind === 'instance' && isCompatible(identifier, registration.instance)) {
      return registration.instance;
    }

    const cached = this.singletonCache.get(identifier);
    if (isCompatible(identifier, cached)) {
      return cached;
    }

    // create() has already rejected absent products as TypeMismatch
    const instance = this.create(identifier);
    this.singletonCache.set(identifier, instance);
    return instance;
  }

  /**
   * Check if a service is registered.
   */
  isRegistered(identifier: ServiceIdentifier): boolean {
    return this.registration.has(identifier);
  }

  /**
   * Attempt every registration and collect failures.
   */
  validate(): Result<void> {
    const failures: Failure[] = [];

    for (const identifier of this.registration.registrations.keys()) {
      try {
        this.create(identifier);
      } catch (error) {
        const failure = this.toValidationFailure(identifier, error);
        this.logger.warn(`Validation failed: ${failure.message}`);
        failures.push(failure);
      }
    }

    return failures.length === 0
      ? Result.ok<void>(undefined)
      : Result.fail<void>(new AggregateFailure(failures));
  }

  // ============================================================================
  // Internal Resolution
  // ============================================================================

  /**
   * Run the construction strategy of a registration.
   *
   * @returns The produced value, not yet capability-checked
   */
  private produce(identifier: ServiceIdentifier, registration: Registration): unknown {
    switch (registration.kind) {
      case 'instance':
        return registration.instance;

      case 'factory':
        return this.invoke(identifier, registration.factory);

      case 'type': {
        const { implementation } = registration;
        if (!hasParameterlessConstructor(implementation)) {
          throw new NoValidConstructorError(identifier, implementation.name || 'AnonymousClass');
        }
        return this.invoke(identifier, () => new implementation());
      }

      default:
        return this.rejectShape(identifier, registration);
    }
  }

  /**
   * Invoke user code, wrapping anything it throws.
   */
  private invoke(identifier: ServiceIdentifier, producer: () => unknown): unknown {
    let result: unknown;
    try {
      result = producer();
    } catch (error) {
      throw new ServiceCreationError(identifier, error instanceof Error ? error : new Error(String(error)));
    }

    if (result instanceof Promise) {
      throw new ServiceCreationError(
        identifier,
        new Error('Async factories are not supported in synchronous resolution'),
      );
    }

    return result;
  }

  /**
   * Reached only when the store holds something outside the Registration union.
   */
  private rejectShape(identifier: ServiceIdentifier, _registration: never): never {
    throw new InvalidRegistrationShapeError(identifier);
  }

  /**
   * Build the per-service failure reported by `validate()`.
   */
  private toValidationFailure(identifier: ServiceIdentifier, error: unknown): Failure {
    const service = getServiceName(identifier);
    const message = error instanceof Error ? error.message : String(error);

    return new Failure(`${service}: ${message}`, error, { service });
  }
}
