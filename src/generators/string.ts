import type { ConstraintSet } from '../constraints/extractor.js';
import type { GeneratedValue } from '../types.js';
import { conformToPattern, hintFor, type GeneratorContext, type TypeGenerator } from './base.js';

export type StringFlavour = 'text' | 'token' | 'language' | 'uri';

type Template = (elementName: string) => string;

const TEXT_HINTS: ReadonlyArray<readonly [string, Template]> = [
  ['code', () => 'ABC123'],
  ['id', (n) => `${n}123456`],
  ['name', (n) => `Sample ${n}`],
  ['description', (n) => `Sample description for ${n}`],
  ['type', () => 'SampleType'],
  ['currency', () => 'USD'],
  ['country', () => 'US'],
  ['language', () => 'en'],
  ['email', () => 'sample@example.com'],
  ['phone', () => '+1234567890'],
  ['url', () => 'https://example.com'],
  ['version', () => '1.0'],
];

/**
 * Truncates or pads `value` to satisfy the length facets. An exact length
 * wins over min/max. Digit-only values are padded with `0`, anything else
 * with `X`.
 */
export function applyLengthConstraints(value: string, constraints: ConstraintSet): string {
  const min = constraints.exactLength ?? constraints.minLength ?? 0;
  const max = constraints.exactLength ?? constraints.maxLength ?? Number.POSITIVE_INFINITY;
  let out = value.length > max ? value.slice(0, max) : value;
  if (out.length < min) {
    const filler = /^\d+$/.test(out) ? '0' : 'X';
    out += filler.repeat(min - out.length);
  }
  return out;
}

function baseValue(elementName: string, flavour: StringFlavour): string {
  switch (flavour) {
    case 'language':
      return 'en';
    case 'uri': {
      const slug = elementName.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
      return slug ? `https://example.com/${slug}` : 'https://example.com';
    }
    case 'token':
      return baseValue(elementName, 'text').replace(/\s+/g, '');
    case 'text': {
      if (!elementName) return 'SampleText';
      const template = hintFor(elementName, TEXT_HINTS);
      return template ? template(elementName) : `Sample${elementName}`;
    }
  }
}

/**
 * Free text and its restricted relatives. Length facets are applied first,
 * then a declared pattern, which may replace the value entirely.
 */
export class StringGenerator implements TypeGenerator {
  readonly name: string;

  constructor(private readonly flavour: StringFlavour = 'text') {
    this.name = flavour === 'text' ? 'string' : flavour;
  }

  generate(elementName: string, constraints: ConstraintSet, context: GeneratorContext): GeneratedValue {
    const sized = applyLengthConstraints(baseValue(elementName, this.flavour), constraints);
    return { kind: 'text', value: conformToPattern(sized, constraints, context) };
  }
}
