/**
 * @fileoverview Infrastructure Env Module Exports
 *
 * @packageDocumentation
 * @module @registry-di/core/infrastructure/env
 * @license Apache-2.0
 */

export { loadEnvFile, type IEnvFileOptions, type EnvironmentTarget } from './dot-env';
