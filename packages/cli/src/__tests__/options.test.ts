import { describe, expect, it } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseKind, parseList, parseLogLevel, parseNonNegativeInteger, parsePositiveInteger } from '../options.js';

describe('option parsers', () => {
  it('accumulates comma-separated and repeated lists', () => {
    expect(parseList('redis, app,,')).toEqual(['redis', 'app']);
    expect(parseList('wiki', ['redis'])).toEqual(['redis', 'wiki']);
  });

  it('parses integers', () => {
    expect(parsePositiveInteger('4')).toBe(4);
    expect(parseNonNegativeInteger('0')).toBe(0);
    expect(() => parsePositiveInteger('0')).toThrow('expected a positive integer, got "0"');
    expect(() => parseNonNegativeInteger('1.5')).toThrow(InvalidArgumentError);
  });

  it('accepts only known resource kinds', () => {
    expect(parseKind('identity_registration')).toBe('identity_registration');
    expect(() => parseKind('vm')).toThrow('expected one of container, identity_registration, configuration_applied');
  });

  it('accepts only known log levels', () => {
    expect(parseLogLevel('silent')).toBe('silent');
    expect(() => parseLogLevel('trace')).toThrow(InvalidArgumentError);
  });
});
