/**
 * @fileoverview Domain Layer Exports
 *
 * The Domain layer holds the technology-agnostic contracts: identifiers,
 * registration variants, errors and interfaces.
 * NO infrastructure dependencies are allowed here (Hexagonal Architecture).
 *
 * @module @registry-di/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// DI - Registration and resolution contracts
// ============================================================================
export * from './di';
