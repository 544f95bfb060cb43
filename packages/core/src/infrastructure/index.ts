/**
 * @fileoverview Infrastructure Layer Exports
 *
 * The Infrastructure layer contains the concrete store, resolver and
 * default locator, plus environment file loading.
 *
 * @module @registry-di/core/infrastructure
 * @license Apache-2.0
 */

// ============================================================================
// DI - Registration store, resolver, default locator
// ============================================================================
export * from './di';

// ============================================================================
// Env - .env file loading
// ============================================================================
export * from './env';
