import { InvalidArgumentError } from 'commander';

/**
 * commander argument parser for unix seconds and minute counts
 */
export function parseInteger(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Integer is too large.');
  }
  return parsed;
}
