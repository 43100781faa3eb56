import type { ConstraintSet } from '../constraints/extractor.js';
import type { GeneratedValue } from '../types.js';
import { nameHas } from '../utils.js';
import { hintFor, type GeneratorContext, type TypeGenerator } from './base.js';

const DECIMAL_HINTS: ReadonlyArray<readonly [string, number]> = [
  ['amount', 99.99],
  ['price', 99.99],
  ['cost', 99.99],
  ['fee', 25.0],
  ['tax', 10.0],
  ['rate', 0.15],
  ['percentage', 10.5],
];

const INTEGER_HINTS: ReadonlyArray<readonly [string, number]> = [
  ['count', 5],
  ['number', 123],
  ['amount', 100],
  ['price', 100],
  ['quantity', 1],
  ['total', 500],
  ['tax', 10],
  ['fee', 25],
  ['rate', 15],
  ['percentage', 10],
  ['age', 25],
  ['year', 2024],
  ['month', 6],
  ['day', 15],
];

/** Names that only make sense as whole numbers, whatever the declared type. */
const INTEGRAL_NAMES = ['count', 'ordinal', 'quantity', 'number', 'sequence'];

const DEFAULT_DECIMAL = 123.45;
const DEFAULT_INTEGER = 123;
const DEFAULT_FRACTION_DIGITS = 2;

function roundTo(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}

// Absorbs float noise such as 0.9 / 0.01 = 89.99999999999999.
const EPSILON = 1e-9;

/**
 * Inclusive range the value must fall in, after turning exclusive bounds
 * into inclusive ones at the output's precision.
 */
function effectiveRange(c: ConstraintSet, step: number): [number, number] {
  let lo = Number.NEGATIVE_INFINITY;
  let hi = Number.POSITIVE_INFINITY;
  if (c.minValue !== undefined) {
    const units = c.minValue / step;
    lo = c.minExclusive ? (Math.floor(units + EPSILON) + 1) * step : Math.ceil(units - EPSILON) * step;
  }
  if (c.maxValue !== undefined) {
    const units = c.maxValue / step;
    hi = c.maxExclusive ? (Math.ceil(units - EPSILON) - 1) * step : Math.floor(units + EPSILON) * step;
  }
  return [lo, hi];
}

/** Largest magnitude totalDigits allows at the given fraction digits. */
function digitLimit(totalDigits: number, fractionDigits: number): number {
  return roundTo(10 ** (totalDigits - fractionDigits) - 10 ** -fractionDigits, fractionDigits);
}

/**
 * Decimal and integer values. The base is picked from the element name
 * ("amount" reads as money, "count" as a small whole number), then limited by
 * totalDigits, clamped into the declared range and rounded to fractionDigits.
 */
export class NumericGenerator implements TypeGenerator {
  readonly name: string;

  constructor(private readonly integral: boolean) {
    this.name = integral ? 'integer' : 'decimal';
  }

  generate(elementName: string, constraints: ConstraintSet, _context: GeneratorContext): GeneratedValue {
    const integral = this.integral || constraints.fractionDigits === 0 || this.wholeByName(elementName, constraints);

    let value = integral
      ? (hintFor(elementName, INTEGER_HINTS) ?? DEFAULT_INTEGER)
      : (hintFor(elementName, DECIMAL_HINTS) ?? DEFAULT_DECIMAL);

    let fractionDigits = integral ? 0 : (constraints.fractionDigits ?? DEFAULT_FRACTION_DIGITS);
    let [lo, hi] = [Number.NEGATIVE_INFINITY, Number.POSITIVE_INFINITY];
    if (constraints.totalDigits !== undefined && constraints.totalDigits > 0) {
      const total = constraints.totalDigits;
      const intDigits = String(Math.trunc(Math.abs(value))).length;
      fractionDigits = Math.min(fractionDigits, Math.max(total - intDigits, 0));
      hi = digitLimit(total, fractionDigits);
      lo = -hi;
    }

    const step = 10 ** -fractionDigits;
    const [min, max] = effectiveRange(constraints, step);
    lo = Math.max(lo, min);
    hi = Math.min(hi, max);
    if (lo <= hi) value = Math.min(Math.max(value, lo), hi);
    else value = Number.isFinite(min) ? min : max;
    value = roundTo(value, fractionDigits);

    return integral ? { kind: 'integer', value } : { kind: 'decimal', value };
  }

  /**
   * A name such as "count" asks for a whole number on a decimal type, as
   * long as the declared range holds one.
   */
  private wholeByName(elementName: string, constraints: ConstraintSet): boolean {
    if (!nameHas(elementName, INTEGRAL_NAMES)) return false;
    const [lo, hi] = effectiveRange(constraints, 1);
    return lo <= hi;
  }
}
