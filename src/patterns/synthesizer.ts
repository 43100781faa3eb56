import { compilePattern } from '../constraints/extractor.js';
import { XorShift32 } from '../rng.js';
import { drawFrom, PATTERN_LIBRARY, type PatternEmitter } from './library.js';

/** Returned by {@link PatternSynthesizer.validateOrRegenerate} when every attempt failed. */
export const PATTERN_FALLBACK = '123';
/** Emitted for patterns neither the library nor the analyzer understands. */
export const NUMERIC_PLACEHOLDER = '123';

const DEFAULT_SEED = 424242;
/** Extra repetitions allowed above the minimum for `*`, `+` and `{m,}`. */
const OPEN_REPEAT_SPAN = 3;

const PRINTABLE: string = Array.from({ length: 0x7e - 0x20 + 1 }, (_, i) => String.fromCharCode(0x20 + i)).join('');
const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

// XSD multi-character escapes with no JavaScript equivalent.
const XSD_ESCAPES: Record<string, string> = {
  i: 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz_:',
  c: 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789._:-',
};

// ---------------------------------------------------------------------------
// Structural analysis
// ---------------------------------------------------------------------------

type Atom =
  | { kind: 'chars'; alphabet: string; min: number; max: number }
  | { kind: 'literal'; char: string; min: number; max: number }
  | { kind: 'group'; branches: Atom[][]; min: number; max: number };

class UnsupportedPattern extends Error {}

/** Characters of the printable ASCII range matched by a class expression. */
function alphabetOf(classSource: string): string {
  const re = compilePattern(classSource);
  if (!re) throw new UnsupportedPattern(classSource);
  let alphabet = '';
  for (const ch of PRINTABLE) if (re.test(ch)) alphabet += ch;
  if (alphabet === '') throw new UnsupportedPattern(classSource);
  return alphabet;
}

/**
 * Recursive-descent reader for the subset of the XSD regex language that
 * shows up in practice: classes, escapes, `.`, literals, groups, alternation
 * and the usual quantifiers.
 */
class PatternReader {
  private pos = 0;

  constructor(private readonly source: string) {}

  read(): Atom[][] {
    const branches = this.alternation();
    if (this.pos < this.source.length) throw new UnsupportedPattern(this.source);
    return branches;
  }

  private alternation(): Atom[][] {
    const branches: Atom[][] = [this.sequence()];
    while (this.peek() === '|') {
      this.pos++;
      branches.push(this.sequence());
    }
    return branches;
  }

  private sequence(): Atom[] {
    const atoms: Atom[] = [];
    for (;;) {
      const ch = this.peek();
      if (ch === undefined || ch === '|' || ch === ')') return atoms;
      const atom = this.atom();
      if (atom) atoms.push(this.quantified(atom));
    }
  }

  private atom(): Atom | undefined {
    const start = this.pos;
    const ch = this.source[this.pos++];
    switch (ch) {
      case '[': {
        this.skipClass();
        return { kind: 'chars', alphabet: alphabetOf(this.source.slice(start, this.pos)), min: 1, max: 1 };
      }
      case '(': {
        if (this.source.startsWith('?:', this.pos)) this.pos += 2;
        const branches = this.alternation();
        if (this.source[this.pos++] !== ')') throw new UnsupportedPattern(this.source);
        return { kind: 'group', branches, min: 1, max: 1 };
      }
      case '\\':
        return this.escape();
      case '.':
        return { kind: 'chars', alphabet: ALPHANUMERIC, min: 1, max: 1 };
      case '^':
        if (start === 0) return undefined;
        break;
      case '$':
        if (this.pos === this.source.length) return undefined;
        break;
      case '*':
      case '+':
      case '?':
      case '{':
        throw new UnsupportedPattern(this.source);
    }
    return { kind: 'literal', char: ch, min: 1, max: 1 };
  }

  private escape(): Atom {
    const ch = this.source[this.pos++];
    if (ch === undefined) throw new UnsupportedPattern(this.source);
    const xsd = XSD_ESCAPES[ch.toLowerCase()];
    if (xsd !== undefined && ch === ch.toLowerCase()) return { kind: 'chars', alphabet: xsd, min: 1, max: 1 };
    if (/[dDwWsS]/.test(ch)) return { kind: 'chars', alphabet: alphabetOf(`\\${ch}`), min: 1, max: 1 };
    if (/[A-Za-z0-9]/.test(ch)) throw new UnsupportedPattern(this.source);
    return { kind: 'literal', char: ch, min: 1, max: 1 };
  }

  private skipClass(): void {
    let depth = 1;
    if (this.source[this.pos] === '^') this.pos++;
    if (this.source[this.pos] === ']') this.pos++;
    while (this.pos < this.source.length && depth > 0) {
      const ch = this.source[this.pos++];
      if (ch === '\\') this.pos++;
      else if (ch === '[') depth++;
      else if (ch === ']') depth--;
    }
    if (depth !== 0) throw new UnsupportedPattern(this.source);
  }

  private quantified(atom: Atom): Atom {
    const ch = this.peek();
    if (ch === '?') {
      this.pos++;
      return { ...atom, min: 0, max: 1 };
    }
    if (ch === '*') {
      this.pos++;
      return { ...atom, min: 0, max: OPEN_REPEAT_SPAN };
    }
    if (ch === '+') {
      this.pos++;
      return { ...atom, min: 1, max: 1 + OPEN_REPEAT_SPAN };
    }
    if (ch === '{') {
      const match = /^\{(\d+)(,(\d*))?\}/.exec(this.source.slice(this.pos));
      if (!match) throw new UnsupportedPattern(this.source);
      this.pos += match[0].length;
      const min = Number.parseInt(match[1], 10);
      let max = min;
      if (match[2] !== undefined) {
        max = match[3] ? Number.parseInt(match[3], 10) : min + OPEN_REPEAT_SPAN;
      }
      if (max < min) throw new UnsupportedPattern(this.source);
      return { ...atom, min, max };
    }
    return atom;
  }

  private peek(): string | undefined {
    return this.source[this.pos];
  }
}

function emitAtoms(atoms: readonly Atom[], rng: XorShift32): string {
  let out = '';
  for (const atom of atoms) {
    const count = rng.int(atom.min, atom.max);
    for (let i = 0; i < count; i++) {
      if (atom.kind === 'literal') out += atom.char;
      else if (atom.kind === 'chars') out += drawFrom(atom.alphabet, 1, rng);
      else out += emitAtoms(rng.pick(atom.branches) ?? [], rng);
    }
  }
  return out;
}

// ---------------------------------------------------------------------------
// Synthesizer
// ---------------------------------------------------------------------------

export interface PatternSynthesizerOptions {
  library?: ReadonlyMap<string, PatternEmitter>;
  /** Called whenever {@link PatternSynthesizer.validateOrRegenerate} gives up. */
  onFallback?: (pattern: string, lastValue: string) => void;
}

/**
 * Produces strings matching XSD patterns: a lookup table of dedicated
 * emitters first, then a structural reading of the pattern, then a numeric
 * placeholder.
 */
export class PatternSynthesizer {
  private readonly library: ReadonlyMap<string, PatternEmitter>;
  private readonly onFallback?: (pattern: string, lastValue: string) => void;
  private readonly analyzed = new Map<string, Atom[][] | null>();
  private readonly compiled = new Map<string, RegExp | null>();

  constructor(options: PatternSynthesizerOptions = {}) {
    this.library = options.library ?? PATTERN_LIBRARY;
    this.onFallback = options.onFallback;
  }

  synthesize(pattern: string, rng: XorShift32 = new XorShift32(DEFAULT_SEED, pattern)): string {
    const emitter = this.library.get(pattern);
    if (emitter) return emitter(rng);

    const branches = this.analyze(pattern);
    if (!branches) return NUMERIC_PLACEHOLDER;
    return emitAtoms(rng.pick(branches) ?? [], rng);
  }

  /** True when `value` matches the whole pattern. */
  isCompliant(value: string, pattern: string): boolean {
    let re = this.compiled.get(pattern);
    if (re === undefined) {
      re = compilePattern(pattern) ?? null;
      this.compiled.set(pattern, re);
    }
    return re !== null && re.test(value);
  }

  /**
   * Keeps `value` if it already matches; otherwise synthesizes up to
   * `maxAttempts` candidates and returns the first compliant one, or
   * {@link PATTERN_FALLBACK}.
   */
  validateOrRegenerate(
    value: string,
    pattern: string,
    maxAttempts: number,
    rng: XorShift32 = new XorShift32(DEFAULT_SEED, pattern),
  ): string {
    if (this.isCompliant(value, pattern)) return value;
    let candidate = value;
    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      candidate = this.synthesize(pattern, rng);
      if (this.isCompliant(candidate, pattern)) return candidate;
    }
    this.onFallback?.(pattern, candidate);
    return PATTERN_FALLBACK;
  }

  /** Parsed form of the pattern, or null when it is outside the supported subset. */
  private analyze(pattern: string): Atom[][] | null {
    const cached = this.analyzed.get(pattern);
    if (cached !== undefined) return cached;
    let result: Atom[][] | null;
    try {
      result = new PatternReader(pattern).read();
    } catch (err) {
      if (!(err instanceof UnsupportedPattern)) throw err;
      result = null;
    }
    this.analyzed.set(pattern, result);
    return result;
  }
}
