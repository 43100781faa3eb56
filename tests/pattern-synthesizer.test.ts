import { describe, expect, it, vi } from 'vitest';
import { PATTERN_LIBRARY } from '../src/patterns/library.js';
import { NUMERIC_PLACEHOLDER, PATTERN_FALLBACK, PatternSynthesizer } from '../src/patterns/synthesizer.js';
import { XorShift32 } from '../src/rng.js';

const STRUCTURAL = [
  '[A-Z]{2}[0-9]{4}',
  '\\d{3}-\\d{4}',
  '(ABC|DEF)[0-9]?',
  'ID[0-9]{2,5}',
  '[a-f0-9]{8}',
  '.{3,6}',
  '[^0-9]{4}',
  'X+Y*',
  '[A-Z][a-z]+ [A-Z][a-z]+',
  '(\\d{2}:){2}\\d{2}',
  '[0-9]{1,2}\\.[0-9]{2}',
  '\\i\\c*',
  '\\i\\c{2,5}',
  '[\\i-]{3}',
];

describe('PatternSynthesizer.synthesize', () => {
  const synth = new PatternSynthesizer();

  it.each([...PATTERN_LIBRARY.keys()])('library pattern %s yields compliant values', (pattern) => {
    for (let seed = 1; seed <= 25; seed++) {
      const value = synth.synthesize(pattern, new XorShift32(seed, pattern));
      expect(synth.isCompliant(value, pattern)).toBe(true);
    }
  });

  it.each(STRUCTURAL)('structural pattern %s yields compliant values', (pattern) => {
    for (let seed = 1; seed <= 25; seed++) {
      const value = synth.synthesize(pattern, new XorShift32(seed, pattern));
      expect(synth.isCompliant(value, pattern)).toBe(true);
    }
  });

  it('produces a three-letter code for [A-Z]{3}', () => {
    const value = synth.synthesize('[A-Z]{3}');
    expect(value).toMatch(/^[A-Z]{3}$/);
    expect(value).toHaveLength(3);
  });

  it('is reproducible for the same seed', () => {
    const a = synth.synthesize('[A-Z]{2}[0-9]{4}', new XorShift32(99, 'k'));
    const b = synth.synthesize('[A-Z]{2}[0-9]{4}', new XorShift32(99, 'k'));
    expect(a).toBe(b);
  });

  it('returns the numeric placeholder for constructs it cannot read', () => {
    expect(synth.synthesize('\\p{Lu}{2}')).toBe(NUMERIC_PLACEHOLDER);
    expect(synth.synthesize('(ab')).toBe(NUMERIC_PLACEHOLDER);
  });

  it('prefers a library emitter over the structural reading', () => {
    const custom = new PatternSynthesizer({ library: new Map([['[A-Z]{3}', () => 'QWE']]) });
    expect(custom.synthesize('[A-Z]{3}')).toBe('QWE');
  });
});

describe('PatternSynthesizer.isCompliant', () => {
  const synth = new PatternSynthesizer();

  it('matches the whole value', () => {
    expect(synth.isCompliant('ABC', '[A-Z]{3}')).toBe(true);
    expect(synth.isCompliant('ABCD', '[A-Z]{3}')).toBe(false);
  });

  it('treats an uncompilable pattern as never matched', () => {
    expect(synth.isCompliant('anything', '[A-Z')).toBe(false);
  });
});

describe('PatternSynthesizer.validateOrRegenerate', () => {
  it('keeps a value that already matches', () => {
    const synth = new PatternSynthesizer();
    expect(synth.validateOrRegenerate('LHR', '[A-Z]{3}', 5)).toBe('LHR');
  });

  it('replaces a value that does not match', () => {
    const synth = new PatternSynthesizer();
    const value = synth.validateOrRegenerate('hello', '[0-9]{4}', 5);
    expect(value).toMatch(/^[0-9]{4}$/);
  });

  it('falls back to "123" and reports it when no attempt succeeds', () => {
    const onFallback = vi.fn();
    const synth = new PatternSynthesizer({ onFallback });

    expect(synth.validateOrRegenerate('abc', '[A-Z]{3}', 0)).toBe(PATTERN_FALLBACK);
    expect(PATTERN_FALLBACK).toBe('123');
    expect(onFallback).toHaveBeenCalledWith('[A-Z]{3}', 'abc');
  });

  it('regenerates a value that breaks an XML-name pattern', () => {
    const synth = new PatternSynthesizer();
    const value = synth.validateOrRegenerate('0bad', '\\i\\c{2,5}', 5);
    expect(value).toMatch(/^[A-Za-z_:][-.0-9:A-Z_a-z]{2,5}$/);
    expect(synth.validateOrRegenerate('ok_1', '\\i\\c{2,5}', 5)).toBe('ok_1');
  });

  it('falls back for patterns it can neither read nor match', () => {
    const onFallback = vi.fn();
    const synth = new PatternSynthesizer({ onFallback });

    expect(synth.validateOrRegenerate('x', '[A-Z]{2}-\\p{Nd}', 3)).toBe('123');
    expect(onFallback).toHaveBeenCalledTimes(1);
  });
});
