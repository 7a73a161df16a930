import { InvalidArgumentError } from 'commander';
import { MAX_BIT_WIDTH } from '../constants.js';

function parseInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  const parsed = Number(value.trim());
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Number is too large.');
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  return parseInteger(value);
}

export function parsePositiveInt(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 1) {
    throw new InvalidArgumentError('Must be at least 1.');
  }
  return parsed;
}

export function parseBitWidth(value: string): number {
  const parsed = parsePositiveInt(value);
  if (parsed > MAX_BIT_WIDTH) {
    throw new InvalidArgumentError(`Must be at most ${MAX_BIT_WIDTH}.`);
  }
  return parsed;
}
