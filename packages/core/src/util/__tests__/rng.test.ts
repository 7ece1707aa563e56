import { describe, it, expect } from 'vitest';
import { fnv1a32, mix32, XorShift32 } from '../rng.js';

describe('RNG utilities', () => {
  describe('fnv1a32', () => {
    it('computes correct FNV-1a hash for known strings', () => {
      expect(fnv1a32('')).toBe(2166136261);
      expect(fnv1a32('a')).toBe(3826002220);
      expect(fnv1a32('hello')).toBe(1335831723);
      expect(fnv1a32('logic-tree')).toBe(2719355236);
    });

    it('returns uint32 values', () => {
      const hash = fnv1a32('bs1/b1');
      expect(hash).toBe(hash >>> 0);
    });
  });

  describe('mix32', () => {
    it('matches the MurmurHash3 finalizer', () => {
      expect(mix32(0)).toBe(0);
      expect(mix32(1)).toBe(1364076727);
      expect(mix32(42)).toBe(142593372);
    });
  });

  describe('XorShift32', () => {
    it('produces a known sequence for seed 42 on the default stream', () => {
      const rng = new XorShift32(42, 'logic-tree');
      expect([rng.next(), rng.next(), rng.next()]).toEqual([
        2889616687, 2661713795, 2223953320,
      ]);
    });

    it('is deterministic for identical seed and stream', () => {
      const a = new XorShift32(7, 'logic-tree');
      const b = new XorShift32(7, 'logic-tree');
      const seqA = Array.from({ length: 5 }, () => a.next());
      const seqB = Array.from({ length: 5 }, () => b.next());
      expect(seqA).toEqual(seqB);
    });

    it('separates streams sharing a seed', () => {
      const a = new XorShift32(7, 'logic-tree');
      const b = new XorShift32(7, 'gmpe');
      expect(a.next()).not.toBe(b.next());
    });

    it('spreads the first draw of consecutive seeds', () => {
      let low = 0;
      for (let seed = 0; seed < 1000; seed++) {
        if (new XorShift32(seed, 'logic-tree').nextFloat01() < 0.5) low++;
      }
      expect(low).toBeGreaterThan(450);
      expect(low).toBeLessThan(550);
    });

    it('keeps floats in [0, 1)', () => {
      const rng = new XorShift32(123, 'logic-tree');
      for (let i = 0; i < 1000; i++) {
        const u = rng.nextFloat01();
        expect(u).toBeGreaterThanOrEqual(0);
        expect(u).toBeLessThan(1);
      }
    });
  });
});
