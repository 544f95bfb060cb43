/**
 * @fileoverview Parsers Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import { parseBoolean, parseDuration, parseInteger, parseNumber } from '../../../src/common/parsers';

describe('parseInteger', () => {
  it('should parse signed whole numbers', () => {
    expect(parseInteger(' 42 ').value).toBe(42);
    expect(parseInteger('-7').value).toBe(-7);
    expect(parseInteger('+3').value).toBe(3);
  });

  it('should reject decimals, words and absent input', () => {
    expect(parseInteger('4.2').failure?.message).toBe('Invalid format');
    expect(parseInteger('forty').failure?.message).toBe('Invalid format');
    expect(parseInteger(undefined).failure?.message).toBe('Invalid format');
  });

  it('should reject values beyond the safe integer range', () => {
    expect(parseInteger('9007199254740993').isError).toBe(true);
  });
});

describe('parseNumber', () => {
  it('should parse decimals and exponents', () => {
    expect(parseNumber('3.25').value).toBe(3.25);
    expect(parseNumber('.5').value).toBe(0.5);
    expect(parseNumber('1e3').value).toBe(1000);
  });

  it('should reject malformed and infinite numbers', () => {
    expect(parseNumber('1.2.3').failure?.message).toBe('Invalid format');
    expect(parseNumber('Infinity').isError).toBe(true);
    expect(parseNumber('1e999').isError).toBe(true);
  });
});

describe('parseBoolean', () => {
  it('should parse true and false in any case', () => {
    expect(parseBoolean('TRUE').value).toBe(true);
    expect(parseBoolean(' false ').value).toBe(false);
  });

  it('should reject anything else', () => {
    expect(parseBoolean('yes').failure?.message).toBe('Invalid format');
    expect(parseBoolean(null).isError).toBe(true);
  });
});

describe('parseDuration', () => {
  it('should parse compact durations', () => {
    expect(parseDuration('1h30m').value).toBe(5_400_000);
    expect(parseDuration('1h 30m').value).toBe(5_400_000);
    expect(parseDuration('1.5s').value).toBe(1_500);
    expect(parseDuration('250ms').value).toBe(250);
    expect(parseDuration('2D').value).toBe(172_800_000);
  });

  it('should parse clock durations', () => {
    expect(parseDuration('00:00:05').value).toBe(5_000);
    expect(parseDuration('01:30').value).toBe(5_400_000);
    expect(parseDuration('2.00:00:05').value).toBe(172_805_000);
    expect(parseDuration('00:00:01.25').value).toBe(1_250);
  });

  it('should reject empty input', () => {
    expect(parseDuration('  ').failure?.message).toBe('String is empty');
    expect(parseDuration(undefined).failure?.message).toBe('String is empty');
  });

  it('should read a bare whole number as days', () => {
    expect(parseDuration('5').value).toBe(432_000_000);
    expect(parseDuration(' 0 ').value).toBe(0);
  });

  it('should reject fractional numbers and trailing numbers without a unit', () => {
    expect(parseDuration('1.5').failure?.message).toBe('Both value and unit must be given');
    expect(parseDuration('1h30').failure?.message).toBe('Both value and unit must be given');
  });

  it('should reject clock hours beyond 23', () => {
    expect(parseDuration('23:59').value).toBe(86_340_000);
    expect(parseDuration('25:00').failure?.message).toBe("Invalid unit ':'");
    expect(parseDuration('1.24:00').isError).toBe(true);
  });

  it('should reject units without a number', () => {
    expect(parseDuration('h').failure?.message).toBe('Both value and unit must be given');
  });

  it('should reject unknown units', () => {
    expect(parseDuration('1x').failure?.message).toBe("Invalid unit 'x'");
    expect(parseDuration('3weeks').failure?.message).toBe("Invalid unit 'weeks'");
  });
});
