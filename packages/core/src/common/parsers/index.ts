/**
 * @fileoverview Parsers Module Exports
 *
 * @packageDocumentation
 * @module @registry-di/core/common/parsers
 * @license Apache-2.0
 */

export { parseInteger, parseNumber, parseBoolean, parseDuration } from './parsers';
