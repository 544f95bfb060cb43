/**
 * @fileoverview Infrastructure DI Module Exports
 *
 * @packageDocumentation
 * @module @registry-di/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module exports the concrete registration store and resolver.
 * Use these in your application's composition root.
 *
 * ## Usage
 *
 * ```typescript
 * import { ServiceRegistration, ServiceResolver } from '@registry-di/core/infrastructure/di';
 *
 * const registration = new ServiceRegistration()
 *   .addType(ConfigService)
 *   .addFactory(ILogger, () => new ConsoleLogger('app'));
 *
 * const resolver = new ServiceResolver(registration);
 * resolver.validate().unwrap();
 * ```
 */

// ============================================================================
// ServiceRegistration - Write Path
// ============================================================================

export { ServiceRegistration, createServiceRegistration } from './service-registration';

// ============================================================================
// ServiceResolver - Read Path
// ============================================================================

export { ServiceResolver } from './service-resolver';

// ============================================================================
// ServiceLocator - Process-Wide Default
// ============================================================================

export { ServiceLocator, type ILocatorOptions } from './service-locator';
