/**
 * @fileoverview ServiceRegistration - Registration Store Implementation
 *
 * @packageDocumentation
 * @module @registry-di/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module implements IServiceRegistration with a fluent API for
 * recording how each service is produced.
 *
 * @version 1.0.0
 */

import {
  type Constructor,
  type DuplicatePolicy,
  type ILogger,
  type IRegistrationOptions,
  type IServiceRegistration,
  type Registration,
  type ServiceFactory,
  type ServiceIdentifier,
  DuplicateRegistrationError,
  InvalidRegistrationError,
  createFactoryRegistration,
  createInstanceRegistration,
  createTypeRegistration,
  getServiceName,
  isConstructor,
  isServiceIdentifier,
} from '../../domain/di';

/**
 * ServiceRegistration - Fluent API for service registration.
 *
 * @remarks
 * **Usage Pattern:**
 *
 * ```typescript
 * const registration = new ServiceRegistration();
 *
 * registration
 *   .addType(ConfigService)
 *   .addType(IClock, SystemClock)
 *   .addFactory(ILogger, () => new ConsoleLogger('app'));
 *
 * const resolver = new ServiceResolver(registration);
 * ```
 *
 * **Duplicates:**
 *
 * By default the last registration for an identifier wins, which lets tests
 * and environment-specific setup override earlier defaults. Pass
 * `{ duplicates: 'reject' }` to make a second registration throw.
 *
 * **Thread Safety:**
 *
 * ServiceRegistration is NOT thread-safe. Populate it during application
 * startup, then treat it as read-only.
 */
export class ServiceRegistration implements IServiceRegistration {
  /**
   * Registrations by identifier, in insertion order.
   */
  private readonly entries = new Map<ServiceIdentifier, Registration>();

  private readonly duplicates: DuplicatePolicy;

  private readonly logger: ILogger;

  constructor(options?: IRegistrationOptions) {
    this.duplicates = options?.duplicates ?? 'overwrite';
    this.logger = options?.logger ?? console;
  }

  // ============================================================================
  // Registration
  // ============================================================================

  /**
   * Register a class, either as its own identifier or under a distinct one.
   *
   * @remarks
   * Two overloads:
   * 1. Self-registration: `addType(SystemClock)`
   * 2. Identifier-to-impl: `addType(IClock, SystemClock)`
   */
  addType<T>(implementation: Constructor<T>): this;
  addType<T, TImpl extends T>(identifier: ServiceIdentifier<T>, implementation: Constructor<TImpl>): this;
  addType<T>(identifierOrImpl: ServiceIdentifier<T>, implementation?: Constructor<T>): this {
    this.ensureIdentifier(identifierOrImpl);

    if (implementation === undefined) {
      if (!isConstructor(identifierOrImpl)) {
        throw new InvalidRegistrationError(identifierOrImpl, 'implementation type');
      }
      // Self-registration: the class is both key and implementation
      return this.register(createTypeRegistration(identifierOrImpl, identifierOrImpl));
    }

    this.ensurePresent(identifierOrImpl, implementation, 'implementation type');
    return this.register(createTypeRegistration(identifierOrImpl, implementation));
  }

  /**
   * Register a pre-created instance.
   */
  addInstance<T, TImpl extends T>(identifier: ServiceIdentifier<T>, instance: TImpl): this {
    this.ensureIdentifier(identifier);
    this.ensurePresent(identifier, instance, 'instance');
    return this.register(createInstanceRegistration<T>(identifier, instance));
  }

  /**
   * Register a zero-argument factory.
   */
  addFactory<T, TImpl extends T>(identifier: ServiceIdentifier<T>, factory: ServiceFactory<TImpl>): this {
    this.ensureIdentifier(identifier);
    this.ensurePresent(identifier, factory, 'factory');
    return this.register(createFactoryRegistration<T>(identifier, factory));
  }

  // ============================================================================
  // Read Access
  // ============================================================================

  get registrations(): ReadonlyMap<ServiceIdentifier, Registration> {
    return new Map(this.entries);
  }

  get size(): number {
    return this.entries.size;
  }

  get(identifier: ServiceIdentifier): Registration | undefined {
    return this.entries.get(identifier);
  }

  has(identifier: ServiceIdentifier): boolean {
    return this.entries.has(identifier);
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  /**
   * Single write path for every `add*` method.
   */
  private register(registration: Registration): this {
    const { identifier } = registration;

    if (this.entries.has(identifier)) {
      if (this.duplicates === 'reject') {
        throw new DuplicateRegistrationError(identifier);
      }
      this.logger.debug(
        `Replacing ${this.entries.get(identifier)?.kind} registration for '${getServiceName(identifier)}' ` +
          `with ${registration.kind} registration`,
      );
    }

    this.entries.set(identifier, registration);
    return this;
  }

  /**
   * @throws InvalidRegistrationError when the key is not a class or token
   */
  private ensureIdentifier(identifier: ServiceIdentifier): void {
    if (!isServiceIdentifier(identifier)) {
      throw new InvalidRegistrationError(identifier, 'service identifier', 'must be a class or a service token');
    }
  }

  /**
   * @throws InvalidRegistrationError for `null` or `undefined`
   */
  private ensurePresent(identifier: ServiceIdentifier, value: unknown, what: string): void {
    if (value === null || value === undefined) {
      throw new InvalidRegistrationError(identifier, what);
    }
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a new ServiceRegistration.
 *
 * @example
 * ```typescript
 * const registration = createServiceRegistration({ duplicates: 'reject' });
 * registration.addType(ConfigService);
 * ```
 */
export function createServiceRegistration(options?: IRegistrationOptions): IServiceRegistration {
  return new ServiceRegistration(options);
}
