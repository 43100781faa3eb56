import { describe, expect, it } from 'vitest';
import { fnv1a32, XorShift32 } from '../src/rng.js';
import { lookupPath, nameHas, toMap } from '../src/utils.js';

describe('lookupPath', () => {
  const map = new Map<string, number>([
    ['Order.Item.Price', 1],
    ['Price', 2],
    ['Item.Price', 3],
    ['order.note', 4],
    ['Order@channel', 5],
  ]);

  it('prefers an exact match', () => {
    expect(lookupPath(map, 'Order.Item.Price')).toBe(1);
  });

  it('matches the whole path case-insensitively', () => {
    expect(lookupPath(map, 'Order.Note')).toBe(4);
  });

  it('takes the longest dot-boundary suffix', () => {
    expect(lookupPath(map, 'Invoice.Item.Price')).toBe(3);
    expect(lookupPath(map, 'Quote.Price')).toBe(2);
  });

  it('does not match inside a name', () => {
    expect(lookupPath(map, 'Order.UnitPrice')).toBeUndefined();
  });

  it('keeps attribute segments part of the last component', () => {
    expect(lookupPath(map, 'Order@channel')).toBe(5);
    expect(lookupPath(map, 'Order@price')).toBeUndefined();
  });
});

describe('toMap', () => {
  it('accepts records, maps and nothing', () => {
    expect(toMap({ a: 1 })).toEqual(new Map([['a', 1]]));
    const source = new Map([['b', 2]]);
    const copy = toMap(source);
    expect(copy).toEqual(source);
    expect(copy).not.toBe(source);
    expect(toMap(undefined).size).toBe(0);
  });
});

describe('nameHas', () => {
  it('matches hints case-insensitively', () => {
    expect(nameHas('LineQuantity', ['quantity'])).toBe(true);
    expect(nameHas('Label', ['quantity', 'count'])).toBe(false);
  });
});

describe('XorShift32', () => {
  it('hashes keys with FNV-1a', () => {
    expect(fnv1a32('')).toBe(2166136261);
  });

  it('gives each key its own stream', () => {
    const a = new XorShift32(7, 'Order.Item#0');
    const b = new XorShift32(7, 'Order.Item#0');
    const c = new XorShift32(7, 'Order.Item#1');
    const first = a.next();
    expect(b.next()).toBe(first);
    expect(c.next()).not.toBe(first);
  });

  it('keeps int() within bounds', () => {
    const rng = new XorShift32(1);
    for (let i = 0; i < 200; i++) {
      const n = rng.int(3, 6);
      expect(n).toBeGreaterThanOrEqual(3);
      expect(n).toBeLessThanOrEqual(6);
    }
    expect(rng.int(5, 5)).toBe(5);
    expect(rng.pick([])).toBeUndefined();
  });
});
