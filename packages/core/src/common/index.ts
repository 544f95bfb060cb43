/**
 * @fileoverview Common Module Exports
 *
 * @packageDocumentation
 * @module @registry-di/core/common
 * @license Apache-2.0
 *
 * Shared types and utilities with no dependency on the DI layers.
 */

export * from './result';
export * from './parsers';
