/**
 * @fileoverview ServiceIdentifier Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import {
  ServiceToken,
  createToken,
  getServiceName,
  hasParameterlessConstructor,
  isCompatible,
  isServiceIdentifier,
} from '../../../src/domain/di';

// ============================================================================
// Test Fixtures
// ============================================================================

interface IClock {
  now(): number;
}

const isClock = (value: unknown): value is IClock =>
  typeof value === 'object' && value !== null && 'now' in value;

class SystemClock implements IClock {
  now(): number {
    return 1;
  }
}

class FixedClock extends SystemClock {}

abstract class BaseRepository {}

class NeedsUrl {
  constructor(readonly url: string) {}
}

class DefaultedUrl {
  constructor(readonly url: string = 'memory://test') {}
}

// ============================================================================
// Tests
// ============================================================================

describe('createToken', () => {
  it('should create distinct tokens for the same description', () => {
    const first = createToken<IClock>('IClock');
    const second = createToken<IClock>('IClock');

    expect(first).toBeInstanceOf(ServiceToken);
    expect(first).not.toBe(second);
  });

  it('should render its description', () => {
    expect(createToken('IClock').toString()).toBe('ServiceToken(IClock)');
  });
});

describe('ServiceToken.accepts', () => {
  it('should accept any present value without a guard', () => {
    const token = createToken<IClock>('IClock');

    expect(token.accepts({ now: () => 0 })).toBe(true);
    expect(token.accepts(0)).toBe(true);
  });

  it('should reject null and undefined', () => {
    const token = createToken<IClock>('IClock');

    expect(token.accepts(null)).toBe(false);
    expect(token.accepts(undefined)).toBe(false);
  });

  it('should defer to the guard when one is given', () => {
    const token = createToken<IClock>('IClock', isClock);

    expect(token.accepts(new SystemClock())).toBe(true);
    expect(token.accepts({ tick: () => 0 })).toBe(false);
  });
});

describe('isServiceIdentifier', () => {
  it('should recognise classes and tokens', () => {
    expect(isServiceIdentifier(SystemClock)).toBe(true);
    expect(isServiceIdentifier(BaseRepository)).toBe(true);
    expect(isServiceIdentifier(createToken('IClock'))).toBe(true);
  });

  it('should reject strings and plain objects', () => {
    expect(isServiceIdentifier('IClock')).toBe(false);
    expect(isServiceIdentifier({ description: 'IClock' })).toBe(false);
  });
});

describe('getServiceName', () => {
  it('should use the class name', () => {
    expect(getServiceName(SystemClock)).toBe('SystemClock');
  });

  it('should use the token description', () => {
    expect(getServiceName(createToken('IClock'))).toBe('IClock');
  });
});

describe('isCompatible', () => {
  it('should use instanceof for class identifiers', () => {
    expect(isCompatible(SystemClock, new FixedClock())).toBe(true);
    expect(isCompatible(FixedClock, new SystemClock())).toBe(false);
    expect(isCompatible(SystemClock, { now: () => 0 })).toBe(false);
  });

  it('should reject absent values for class identifiers', () => {
    expect(isCompatible(SystemClock, null)).toBe(false);
    expect(isCompatible(SystemClock, undefined)).toBe(false);
  });
});

describe('hasParameterlessConstructor', () => {
  it('should accept classes without required parameters', () => {
    expect(hasParameterlessConstructor(SystemClock)).toBe(true);
    expect(hasParameterlessConstructor(DefaultedUrl)).toBe(true);
  });

  it('should reject classes with required parameters', () => {
    expect(hasParameterlessConstructor(NeedsUrl)).toBe(false);
  });

  it('should reject arrow functions and non-functions', () => {
    expect(hasParameterlessConstructor(() => new SystemClock())).toBe(false);
    expect(hasParameterlessConstructor({})).toBe(false);
  });
});
