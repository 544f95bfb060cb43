/**
 * @fileoverview Result Module Exports
 *
 * @packageDocumentation
 * @module @registry-di/core/common/result
 * @license Apache-2.0
 */

export { Result } from './result';
export { Failure, AggregateFailure, AGGREGATE_FAILURE_MESSAGE } from './failure';
