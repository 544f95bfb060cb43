/**
 * @fileoverview DotEnv - Environment File Loading
 *
 * @packageDocumentation
 * @module @registry-di/core/infrastructure/env
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Loads `KEY=value` files into an environment map so that startup code can
 * read configuration before registering services.
 *
 * ```typescript
 * loadEnvFile({ path: '.env.local' })
 *   .onFailure((failure) => console.warn(failure.message));
 *
 * registration.addInstance(IConfig, readConfig(process.env));
 * ```
 *
 * @version 1.0.0
 */

import { readFileSync } from 'node:fs';

import { parse } from 'dotenv';

import { Failure, Result } from '../../common/result';

/**
 * Writable environment map. `process.env` satisfies it.
 */
export type EnvironmentTarget = Record<string, string | undefined>;

/**
 * Options for `loadEnvFile`.
 */
export interface IEnvFileOptions {
  /**
   * File to read.
   *
   * Default: `'.env'`
   */
  path?: string;

  /**
   * Replace keys that already hold a non-blank value.
   *
   * Default: `false`
   */
  override?: boolean;

  /**
   * Map to write into.
   *
   * Default: `process.env`
   */
  target?: EnvironmentTarget;
}

/**
 * Load an env file into `target`.
 *
 * @returns The keys written, or a failure when the file cannot be read
 *
 * @remarks
 * Parsing (quotes, `#` comments, `export` prefixes) is delegated to dotenv.
 * Blank values are skipped, and keys that already hold a non-blank value are
 * left alone unless `override` is set.
 */
export function loadEnvFile(options: IEnvFileOptions = {}): Result<string[]> {
  const path = options.path ?? '.env';
  const override = options.override ?? false;
  const target = options.target ?? process.env;

  let content: string;
  try {
    content = readFileSync(path, 'utf8');
  } catch (error) {
    return Result.fail<string[]>(new Failure(`Cannot read env file '${path}'`, error, { path }));
  }

  const written: string[] = [];
  for (const [key, value] of Object.entries(parse(content))) {
    if (isBlank(value)) {
      continue;
    }
    if (!override && !isBlank(target[key])) {
      continue;
    }

    target[key] = value;
    written.push(key);
  }

  return Result.ok(written);
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}
