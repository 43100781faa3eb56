import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { baseChain, type TypeDescriptor } from '../xsd/descriptor.js';
import type { FacetDef, FacetName } from '../xsd/types.js';

/**
 * Normalized value restrictions for one simple type, including everything
 * inherited through its restriction base chain.
 *
 * `exactLength` takes precedence over `minLength`/`maxLength`; a non-empty
 * `enumValues` makes every other value-shape constraint irrelevant.
 */
export interface ConstraintSet {
  readonly pattern?: string;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly exactLength?: number;
  readonly minValue?: number;
  readonly maxValue?: number;
  /** `minValue` came from minExclusive. */
  readonly minExclusive?: boolean;
  /** `maxValue` came from maxExclusive. */
  readonly maxExclusive?: boolean;
  readonly fractionDigits?: number;
  readonly totalDigits?: number;
  readonly enumValues: readonly string[];
}

export const EMPTY_CONSTRAINTS: ConstraintSet = Object.freeze({ enumValues: Object.freeze([]) });

type Inheritable = Exclude<FacetName, 'enumeration' | 'pattern' | 'whiteSpace'>;

const SINGLE_VALUED: readonly Inheritable[] = ['length', 'minLength', 'maxLength', 'fractionDigits', 'totalDigits'];

interface Bound {
  value: number;
  exclusive: boolean;
}

const LENGTH_FACETS: ReadonlySet<Inheritable> = new Set<Inheritable>([
  'length',
  'minLength',
  'maxLength',
  'fractionDigits',
  'totalDigits',
]);

/** Class bodies of the XSD name-character escapes `\i` and `\c`. */
const XSD_NAME_ESCAPES = new Map<string, string>([
  ['i', 'A-Za-z_:'],
  ['c', '\\-.0-9:A-Z_a-z'],
]);

/**
 * Rewrites the XSD-only escapes `\i \c \I \C` as character classes. A
 * negated escape inside a class has no equivalent and yields undefined.
 */
export function translateXsdEscapes(pattern: string): string | undefined {
  let out = '';
  let inClass = false;
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '\\' && i + 1 < pattern.length) {
      const next = pattern[i + 1];
      i++;
      const body = XSD_NAME_ESCAPES.get(next.toLowerCase());
      if (body === undefined) {
        out += ch + next;
        continue;
      }
      const negated = next !== next.toLowerCase();
      if (inClass) {
        if (negated) return undefined;
        out += body;
      } else {
        out += negated ? `[^${body}]` : `[${body}]`;
      }
      continue;
    }
    if (ch === '[' && !inClass) inClass = true;
    else if (ch === ']' && inClass) inClass = false;
    out += ch;
  }
  return out;
}

/**
 * Compiles an XSD pattern the way it is matched: anchored on both ends.
 * Unicode property escapes compile in unicode mode.
 */
export function compilePattern(pattern: string): RegExp | undefined {
  const source = translateXsdEscapes(pattern);
  if (source === undefined) return undefined;
  try {
    return new RegExp(`^(?:${source})$`, /\\[pP]\{/.test(source) ? 'u' : '');
  } catch {
    return undefined;
  }
}

function parseCount(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) return undefined;
  return Number.parseInt(value, 10);
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const n = Number(value.trim());
  return Number.isFinite(n) ? n : undefined;
}

/** Keeps the narrower of two bounds; at equal values the exclusive one. */
function tighter(current: Bound | undefined, candidate: Bound, lower: boolean): Bound {
  if (current === undefined) return candidate;
  if (candidate.value === current.value) return candidate.exclusive ? candidate : current;
  const narrower = lower ? candidate.value > current.value : candidate.value < current.value;
  return narrower ? candidate : current;
}

function isUsableEnumValue(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '' && value !== 'None';
}

/**
 * Derives {@link ConstraintSet}s from type descriptors.
 *
 * Facet categories the type does not declare itself are inherited from the
 * nearest ancestor that does. Schemas often declare the enumeration on an
 * "…ContentType" base and derive a facet-less type from it; without the walk
 * that type would be generated as free text.
 */
export class ConstraintExtractor {
  constructor(private readonly logger: Logger = silentLogger) {}

  extract(type: TypeDescriptor): ConstraintSet {
    let pattern: string | undefined;
    let enumValues: string[] | undefined;
    const values = new Map<Inheritable, number>();
    let lower: Bound | undefined;
    let upper: Bound | undefined;

    for (const t of baseChain(type)) {
      lower = this.boundOf(t.facets, lower, 'minInclusive', 'minExclusive');
      upper = this.boundOf(t.facets, upper, 'maxInclusive', 'maxExclusive');
      if (pattern === undefined) pattern = this.firstValidPattern(t);
      if (enumValues === undefined) enumValues = this.enumerationOf(t.facets);
      for (const name of SINGLE_VALUED) {
        if (values.has(name)) continue;
        const value = this.facetValue(t.facets, name);
        if (value !== undefined) values.set(name, value);
      }
    }

    const set: ConstraintSet = {
      pattern,
      exactLength: values.get('length'),
      minLength: values.get('minLength'),
      maxLength: values.get('maxLength'),
      minValue: lower?.value,
      maxValue: upper?.value,
      minExclusive: lower?.exclusive ? true : undefined,
      maxExclusive: upper?.exclusive ? true : undefined,
      fractionDigits: values.get('fractionDigits'),
      totalDigits: values.get('totalDigits'),
      enumValues: Object.freeze(enumValues ?? []),
    };
    return Object.freeze(set);
  }

  private firstValidPattern(type: TypeDescriptor): string | undefined {
    for (const facet of type.facets) {
      if (facet.name !== 'pattern' || facet.value === undefined) continue;
      if (compilePattern(facet.value)) return facet.value;
      this.logger.debug('Skipping pattern facet the regex engine cannot compile', {
        type: type.name,
        pattern: facet.value,
      });
    }
    return undefined;
  }

  /** Enumeration of one type, or undefined when it declares none usable. */
  private enumerationOf(facets: readonly FacetDef[]): string[] | undefined {
    const values = facets
      .filter((f) => f.name === 'enumeration')
      .map((f) => f.value)
      .filter(isUsableEnumValue);
    return values.length > 0 ? values : undefined;
  }

  /**
   * Folds one type's inclusive and exclusive facets into the bound found so
   * far. A restriction can only narrow its base, so every declared bound on
   * the chain holds and the tightest one wins.
   */
  private boundOf(
    facets: readonly FacetDef[],
    found: Bound | undefined,
    inclusive: 'minInclusive' | 'maxInclusive',
    exclusive: 'minExclusive' | 'maxExclusive',
  ): Bound | undefined {
    const lower = inclusive === 'minInclusive';
    let bound = found;
    const inc = this.facetValue(facets, inclusive);
    if (inc !== undefined) bound = tighter(bound, { value: inc, exclusive: false }, lower);
    const exc = this.facetValue(facets, exclusive);
    if (exc !== undefined) bound = tighter(bound, { value: exc, exclusive: true }, lower);
    return bound;
  }

  private facetValue(facets: readonly FacetDef[], name: Inheritable): number | undefined {
    for (const facet of facets) {
      if (facet.name !== name) continue;
      const parsed = LENGTH_FACETS.has(name) ? parseCount(facet.value) : parseNumber(facet.value);
      if (parsed !== undefined) return parsed;
    }
    return undefined;
  }
}
