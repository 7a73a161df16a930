import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseBitWidth, parseNonNegativeInt, parsePositiveInt } from '../../src/utils/options.js';

describe('parseNonNegativeInt', () => {
  it('should accept zero and positive integers', () => {
    expect(parseNonNegativeInt('0')).toBe(0);
    expect(parseNonNegativeInt('93')).toBe(93);
  });

  it('should reject anything that is not a plain integer', () => {
    expect(() => parseNonNegativeInt('-1')).toThrow(InvalidArgumentError);
    expect(() => parseNonNegativeInt('1.5')).toThrow(InvalidArgumentError);
    expect(() => parseNonNegativeInt('abc')).toThrow('Not a non-negative integer.');
  });

  it('should reject unsafe integers', () => {
    expect(() => parseNonNegativeInt('99999999999999999999')).toThrow('Number is too large.');
  });
});

describe('parsePositiveInt', () => {
  it('should accept positive integers', () => {
    expect(parsePositiveInt('5')).toBe(5);
  });

  it('should reject zero', () => {
    expect(() => parsePositiveInt('0')).toThrow('Must be at least 1.');
  });
});

describe('parseBitWidth', () => {
  it('should accept widths up to 64', () => {
    expect(parseBitWidth('8')).toBe(8);
    expect(parseBitWidth('64')).toBe(64);
  });

  it('should reject widths past 64', () => {
    expect(() => parseBitWidth('65')).toThrow('Must be at most 64.');
  });
});
