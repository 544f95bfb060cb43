/**
 * @fileoverview ServiceLocator - Process-Wide Default Registry
 *
 * @packageDocumentation
 * @module @registry-di/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * One registration store and one resolver bound to it, created once and kept
 * for the rest of the process. Applications that do not manage their own
 * registry register into `ServiceLocator.registration` at startup and
 * resolve through the static helpers afterwards.
 *
 * ```typescript
 * // main.ts
 * ServiceLocator.init({ duplicates: 'reject' });
 *
 * ServiceLocator.registration
 *   .addType(IClock, SystemClock)
 *   .addFactory(ILogger, () => new ConsoleLogger('app'));
 *
 * ServiceLocator.validate().unwrap();
 *
 * // anywhere later
 * const clock = ServiceLocator.singleton(IClock);
 * ```
 *
 * There is no teardown: the pair lives as long as the process.
 *
 * @version 1.0.0
 */

import { type Result } from '../../common/result';
import {
  type ILogger,
  type IResolverOptions,
  type IServiceRegistration,
  type IServiceResolver,
  type ServiceIdentifier,
  type DuplicatePolicy,
  LocatorInitializedError,
} from '../../domain/di';

import { ServiceRegistration } from './service-registration';
import { ServiceResolver } from './service-resolver';

/**
 * Options for `ServiceLocator.init()`.
 */
export interface ILocatorOptions {
  duplicates?: DuplicatePolicy;
  logger?: ILogger;
}

interface LocatorDefaults {
  readonly registration: ServiceRegistration;
  readonly resolver: ServiceResolver;
}

/**
 * ServiceLocator - static access to the default store and resolver.
 */
export class ServiceLocator {
  private static defaults: LocatorDefaults | undefined;

  private constructor() {}

  /**
   * Create the default pair with explicit options.
   *
   * @throws LocatorInitializedError if the default pair already exists,
   *   whether from an earlier `init()` or from lazy creation on first access
   */
  static init(options: ILocatorOptions = {}): void {
    if (ServiceLocator.defaults) {
      throw new LocatorInitializedError();
    }
    ServiceLocator.defaults = ServiceLocator.createDefaults(options);
  }

  /**
   * Whether the default pair has been created.
   */
  static get isInitialized(): boolean {
    return ServiceLocator.defaults !== undefined;
  }

  /**
   * The process-wide registration store.
   */
  static get registration(): IServiceRegistration {
    return ServiceLocator.ensureDefaults().registration;
  }

  /**
   * The process-wide resolver, bound to `registration`.
   */
  static get resolver(): IServiceResolver {
    return ServiceLocator.ensureDefaults().resolver;
  }

  /**
   * A new resolver over the default store, with its own singleton cache.
   */
  static createResolver(options?: IResolverOptions): IServiceResolver {
    return new ServiceResolver(ServiceLocator.ensureDefaults().registration, options);
  }

  static create<T>(identifier: ServiceIdentifier<T>): T {
    return ServiceLocator.resolver.create(identifier);
  }

  static singleton<T>(identifier: ServiceIdentifier<T>): T {
    return ServiceLocator.resolver.singleton(identifier);
  }

  static validate(): Result<void> {
    return ServiceLocator.resolver.validate();
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private static ensureDefaults(): LocatorDefaults {
    const defaults = ServiceLocator.defaults ?? ServiceLocator.createDefaults({});
    ServiceLocator.defaults = defaults;
    return defaults;
  }

  private static createDefaults(options: ILocatorOptions): LocatorDefaults {
    const registration = new ServiceRegistration(options);
    const resolver = new ServiceResolver(registration, { logger: options.logger });
    return { registration, resolver };
  }
}
