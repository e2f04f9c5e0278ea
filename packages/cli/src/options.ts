import { InvalidArgumentError } from 'commander';
import { isLogLevel, RESOURCE_KINDS } from '@labfleet/shared';
import type { LogLevel, ResourceKind } from '@labfleet/shared';

/** Accepts `a,b` and repeated flags alike. */
export function parseList(value: string, previous: string[] = []): string[] {
  const names = value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  return [...previous, ...names];
}

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`expected a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseNonNegativeInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`expected a non-negative integer, got "${value}"`);
  }
  return parsed;
}

export function parseKind(value: string): ResourceKind {
  const kind = RESOURCE_KINDS.find((k) => k === value);
  if (!kind) {
    throw new InvalidArgumentError(`expected one of ${RESOURCE_KINDS.join(', ')}`);
  }
  return kind;
}

export function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('expected debug, info, warn, error or silent');
  }
  return value;
}
