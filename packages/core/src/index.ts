/**
 * @fileoverview @registry-di/core - Main Entry Point
 *
 * A small dependency-resolution runtime: a registration store, a resolver with
 * fresh and per-resolver singleton resolution, a startup validator and a
 * process-wide default locator.
 *
 * @packageDocumentation
 * @module @registry-di/core
 * @version 1.0.0-alpha.1
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import { ServiceRegistration, ServiceResolver, createToken } from '@registry-di/core';
 *
 * // Define interface token
 * interface IClock { now(): number; }
 * const IClock = createToken<IClock>('IClock');
 *
 * // Register services
 * const registration = new ServiceRegistration()
 *   .addType(IClock, SystemClock)
 *   .addFactory(ILogger, () => new ConsoleLogger('app'));
 *
 * // Validate once, then resolve
 * const resolver = new ServiceResolver(registration);
 * resolver.validate().unwrap();
 * const clock = resolver.singleton(IClock);
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Identifiers, registrations, contracts, errors
// ============================================================================
export * from './domain';

// ============================================================================
// Infrastructure Layer Exports
// Registration store, resolver, default locator, env loading
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Common Exports
// Result, Failure, parsers
// ============================================================================
export * from './common';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0-alpha.1';
