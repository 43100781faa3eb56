import type { XorShift32 } from '../rng.js';

export type PatternEmitter = (rng: XorShift32) => string;

const UPPER = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const LOWER = 'abcdefghijklmnopqrstuvwxyz';
const DIGITS = '0123456789';

export function drawFrom(alphabet: string, count: number, rng: XorShift32): string {
  let out = '';
  for (let i = 0; i < count; i++) out += alphabet[rng.int(0, alphabet.length - 1)];
  return out;
}

const upper = (n: number): PatternEmitter => (rng) => drawFrom(UPPER, n, rng);
const digits = (min: number, max: number): PatternEmitter => (rng) => {
  const length = rng.int(min, max);
  // A leading zero reads oddly for counters such as flight numbers.
  return drawFrom('123456789', 1, rng) + drawFrom(DIGITS, length - 1, rng);
};

/**
 * Dedicated emitters for patterns that occur over and over in travel and
 * commerce schemas: carrier, airport, currency and country codes, flight
 * numbers and the like. Keys are the pattern text exactly as declared.
 */
export const PATTERN_LIBRARY: ReadonlyMap<string, PatternEmitter> = new Map<string, PatternEmitter>([
  ['[A-Z]{3}', upper(3)],
  ['[A-Z]{2}', upper(2)],
  ['[A-Z]{1,3}', (rng) => drawFrom(UPPER, rng.int(1, 3), rng)],
  ['[a-z]{2}', (rng) => drawFrom(LOWER, 2, rng)],
  ['[0-9]{1,4}', digits(1, 4)],
  ['[0-9]{1,3}', digits(1, 3)],
  ['[0-9]{4}', digits(4, 4)],
  ['\\d{1,4}', digits(1, 4)],
  ['[A-Z0-9]{2}', (rng) => drawFrom(UPPER, 1, rng) + drawFrom(DIGITS, 1, rng)],
  ['[A-Z0-9]{3}', (rng) => drawFrom(UPPER, 2, rng) + drawFrom(DIGITS, 1, rng)],
  ['[A-Z]{3}[0-9]{3}', (rng) => drawFrom(UPPER, 3, rng) + drawFrom(DIGITS, 3, rng)],
  ['([A-Z]{3}|[A-Z]{2})|([0-9][A-Z])|([A-Z][0-9])', upper(2)],
  ['[0-9]{1,4}[A-Z]?', digits(1, 4)],
  ['[A-Za-z0-9]{1,8}', (rng) => drawFrom(UPPER + DIGITS, rng.int(1, 8), rng)],
]);
