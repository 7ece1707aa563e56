// Deterministic RNG used for logic-tree sampling

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

/**
 * MurmurHash3 32-bit finalizer. Spreads neighbouring seeds over the whole
 * state space.
 */
export function mix32(value: number): number {
  let h = value >>> 0;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

/**
 * xorshift32 RNG with uint32 state.
 * Initialization: x = mix32(seed) ^ fnv1a32(stream)
 * Step: x ^= x << 13; x ^= x >>> 17; x ^= x << 5; (all masked to uint32)
 *
 * A zero state would stick at zero, so it is replaced by the FNV offset basis.
 */
export class XorShift32 {
  private x: number;

  constructor(seed: number, stream: string) {
    const x = (mix32(seed) ^ fnv1a32(stream)) >>> 0;
    this.x = x === 0 ? 2166136261 : x;
  }

  /** Returns the next uint32 value. */
  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /** Returns a deterministic float in [0, 1). */
  nextFloat01(): number {
    return (this.next() >>> 0) / 0x100000000;
  }
}
