import type { GeneratorSettings } from '../config/options.js';
import type { ConstraintSet } from '../constraints/extractor.js';
import type { Logger } from '../logger.js';
import type { PatternSynthesizer } from '../patterns/synthesizer.js';
import type { XorShift32 } from '../rng.js';
import type { Diagnostics, GeneratedValue } from '../types.js';
import type { EnumUsageTracker } from './enum-usage-tracker.js';
import type { IdentifierSequence } from './identifier.js';

/**
 * Everything a generator may read or update during one run. Built by the
 * session; the builder swaps in a fresh `rng` per element path.
 */
export interface GeneratorContext {
  readonly rng: XorShift32;
  readonly enumUsage: EnumUsageTracker;
  readonly identifiers: IdentifierSequence;
  readonly patterns: PatternSynthesizer;
  readonly settings: Readonly<GeneratorSettings>;
  readonly logger: Logger;
  readonly diagnostics: Diagnostics;
}

/**
 * Produces one value for a simple-typed element or attribute. Implementations
 * never return an empty value unless a length constraint demands one.
 */
export interface TypeGenerator {
  readonly name: string;
  generate(elementName: string, constraints: ConstraintSet, context: GeneratorContext): GeneratedValue;
}

/** First hint whose key occurs in the lower-cased element name. */
export function hintFor<T>(elementName: string, hints: ReadonlyArray<readonly [string, T]>): T | undefined {
  const lower = elementName.toLowerCase();
  for (const [key, value] of hints) {
    if (lower.includes(key)) return value;
  }
  return undefined;
}

/** Re-checks a value against a declared pattern, replacing it when it does not match. */
export function conformToPattern(value: string, constraints: ConstraintSet, context: GeneratorContext): string {
  if (constraints.pattern === undefined) return value;
  return context.patterns.validateOrRegenerate(
    value,
    constraints.pattern,
    context.settings.patternMaxAttempts,
    context.rng,
  );
}
