/**
 * @fileoverview Startup Validation Integration Tests
 *
 * Composition-root flows: register services, validate once, then resolve.
 *
 * @license Apache-2.0
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, vi } from 'vitest';

import {
  AggregateFailure,
  NoValidConstructorError,
  ServiceRegistration,
  ServiceResolver,
  createToken,
  loadEnvFile,
  parseDuration,
} from '../../../src';

// ============================================================================
// Test Fixtures
// ============================================================================

interface IClock {
  now(): number;
}

interface ILogger {
  info(message: string): void;
}

interface IRepository {
  load(id: string): string;
}

interface ISettings {
  readonly timeoutMs: number;
}

const IClock = createToken<IClock>('Clock');
const ILogger = createToken<ILogger>('Logger');
const IRepository = createToken<IRepository>('Repo');
const ISettings = createToken<ISettings>('Settings');

class SystemClock implements IClock {
  now(): number {
    return 1_700_000_000_000;
  }
}

class StubLogger implements ILogger {
  readonly messages: string[] = [];

  info(message: string): void {
    this.messages.push(message);
  }
}

class SqlRepository implements IRepository {
  constructor(private readonly connectionString: string) {}

  load(id: string): string {
    return `${this.connectionString}#${id}`;
  }
}

function createRegistration(): ServiceRegistration {
  return new ServiceRegistration({ logger: { debug: vi.fn(), warn: vi.fn() } });
}

// ============================================================================
// Tests
// ============================================================================

describe('Startup validation', () => {
  it('should validate and resolve a healthy composition root', () => {
    const registration = createRegistration()
      .addType(IClock, SystemClock)
      .addFactory(ILogger, () => new StubLogger());
    const resolver = new ServiceResolver(registration, { logger: { debug: vi.fn(), warn: vi.fn() } });

    expect(resolver.validate().isOk).toBe(true);

    const clock = resolver.singleton(IClock);
    expect(resolver.singleton(IClock)).toBe(clock);

    const firstLogger = resolver.create(ILogger);
    const secondLogger = resolver.create(ILogger);
    expect(firstLogger).toBeInstanceOf(StubLogger);
    expect(firstLogger).not.toBe(secondLogger);
  });

  it('should list exactly the broken registration', () => {
    const logger = { debug: vi.fn(), warn: vi.fn() };
    const registration = createRegistration()
      .addType(IClock, SystemClock)
      .addType(IRepository, SqlRepository);
    const resolver = new ServiceResolver(registration, { logger });

    expect(() => resolver.create(IRepository)).toThrow(NoValidConstructorError);

    const failure = resolver.validate().failure;
    expect(failure).toBeInstanceOf(AggregateFailure);
    expect(failure instanceof AggregateFailure && failure.failures.map((f) => f.payload)).toEqual([
      { service: 'Repo' },
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('should pass validation once the broken registration is replaced', () => {
    const registration = createRegistration().addType(IRepository, SqlRepository);
    const resolver = new ServiceResolver(registration, { logger: { debug: vi.fn(), warn: vi.fn() } });

    expect(resolver.validate().isError).toBe(true);

    registration.addFactory(IRepository, () => new SqlRepository('sql://test'));

    expect(resolver.validate().isOk).toBe(true);
    expect(resolver.create(IRepository).load('42')).toBe('sql://test#42');
  });

  it('should register settings read from an env file', () => {
    const directory = mkdtempSync(join(tmpdir(), 'registry-di-startup-'));
    const env: Record<string, string | undefined> = {};

    try {
      writeFileSync(join(directory, '.env'), 'REQUEST_TIMEOUT=1m30s\n');
      expect(loadEnvFile({ path: join(directory, '.env'), target: env }).isOk).toBe(true);
    } finally {
      rmSync(directory, { recursive: true, force: true });
    }

    const timeoutMs = parseDuration(env.REQUEST_TIMEOUT).or(30_000);
    const registration = createRegistration().addInstance(ISettings, { timeoutMs });
    const resolver = new ServiceResolver(registration);

    expect(resolver.validate().isOk).toBe(true);
    expect(resolver.singleton(ISettings).timeoutMs).toBe(90_000);
  });
});
