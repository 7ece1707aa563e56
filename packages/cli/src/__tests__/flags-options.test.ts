import { describe, it, expect } from 'vitest';
import { ConfigError } from '@faultbranch/core';
import {
  parseLtPath,
  parseTreeOptions,
  resolveOutputFormat,
  resolvePathPolicy,
  resolveSampleCount,
  resolveSeed,
} from '../flags.js';

describe('CLI flag helpers', () => {
  describe('parseTreeOptions', () => {
    it('returns no options when no flags are provided', () => {
      expect(parseTreeOptions({})).toEqual({});
    });

    it('maps tree flags onto LogicTreeOptions', () => {
      expect(
        parseTreeOptions({
          pathPolicy: 'STRICT',
          maxDepth: '12',
          tolerance: '0.001',
          printMetrics: true,
        })
      ).toEqual({
        pathPolicy: 'strict',
        guards: { maxDepth: 12 },
        weights: { tolerance: 0.001 },
        metrics: true,
      });
    });

    it('throws on non-numeric depths', () => {
      expect(() => parseTreeOptions({ maxDepth: 'deep' })).toThrow(
        'Invalid --max-depth value "deep". Expected a number.'
      );
      expect(() => parseTreeOptions({ maxDepth: '2.5' })).toThrow(
        'Invalid --max-depth value "2.5". Expected an integer.'
      );
    });
  });

  describe('resolveSampleCount', () => {
    it('defaults to 0 when the flag is absent', () => {
      expect(resolveSampleCount(undefined)).toBe(0);
      expect(resolveSampleCount('')).toBe(0);
    });

    it('accepts strings and numbers', () => {
      expect(resolveSampleCount('10')).toBe(10);
      expect(resolveSampleCount(7)).toBe(7);
    });

    it('throws on negative values', () => {
      expect(() => resolveSampleCount('-3')).toThrow(ConfigError);
      expect(() => resolveSampleCount('-3')).toThrow(
        'Invalid --samples value "-3". Expected a non-negative integer.'
      );
    });
  });

  describe('resolveSeed', () => {
    it('defaults to 42', () => {
      expect(resolveSeed(undefined)).toBe(42);
    });

    it('rejects fractional seeds', () => {
      expect(() => resolveSeed('1.5')).toThrow(/Invalid --seed value/);
    });
  });

  describe('resolvePathPolicy', () => {
    it('throws on unknown policies', () => {
      expect(() => resolvePathPolicy('loose')).toThrow(
        'Invalid --path-policy value "loose". Expected "lenient" or "strict".'
      );
    });
  });

  describe('resolveOutputFormat', () => {
    it('defaults to json when value is absent', () => {
      expect(resolveOutputFormat(undefined)).toBe('json');
      expect(resolveOutputFormat('')).toBe('json');
    });

    it('accepts json and ndjson (case-insensitive)', () => {
      expect(resolveOutputFormat('json')).toBe('json');
      expect(resolveOutputFormat('ndjson')).toBe('ndjson');
      expect(resolveOutputFormat('NDJSON')).toBe('ndjson');
    });

    it('throws on invalid formats', () => {
      expect(() => resolveOutputFormat('csv')).toThrow(/Invalid --out value/);
    });
  });

  describe('parseLtPath', () => {
    it('splits on ~ and ,', () => {
      expect(parseLtPath('b1~c2')).toEqual(['b1', 'c2']);
      expect(parseLtPath(' b1, c2 ,')).toEqual(['b1', 'c2']);
    });

    it('requires at least one id', () => {
      expect(() => parseLtPath(undefined)).toThrow('Missing --path <ids>');
      expect(() => parseLtPath('~')).toThrow('Missing --path <ids>');
    });
  });
});
