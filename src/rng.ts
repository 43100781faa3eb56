/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
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
 * xorshift32 generator. Seeding with `(seed, key)` gives every element path
 * its own stream, so a value does not change when unrelated parts of the
 * document are added or removed.
 */
export class XorShift32 {
  private x: number;

  constructor(seed: number, key = '') {
    const mixed = ((seed >>> 0) ^ fnv1a32(key)) >>> 0;
    // An all-zero state would stay zero forever.
    this.x = mixed === 0 ? 0x9e3779b9 : mixed;
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

  /** Integer in `[min, max]`, both inclusive. */
  int(min: number, max: number): number {
    if (max <= min) return min;
    return min + (this.next() % (max - min + 1));
  }

  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.int(0, items.length - 1)];
  }
}
