import type { FacetDef } from './types.js';

/**
 * Closed set of lexical categories the value generators understand.
 * `unknown` is the kind of any user-defined type until its base chain is read.
 */
export type PrimitiveKind =
  | 'string'
  | 'token'
  | 'language'
  | 'uri'
  | 'boolean'
  | 'decimal'
  | 'float'
  | 'integer'
  | 'date'
  | 'time'
  | 'dateTime'
  | 'duration'
  | 'yearMonthDuration'
  | 'gYear'
  | 'gYearMonth'
  | 'identifier'
  | 'reference'
  | 'base64Binary'
  | 'hexBinary'
  | 'unknown';

/**
 * Read-only view of a simple type: its own kind, its restriction base and
 * the facets it declares itself. Inherited facets are the extractor's job.
 */
export interface TypeDescriptor {
  /** Stable identity used for cycle detection and enum signatures. */
  readonly id: string;
  readonly name: string;
  readonly kind: PrimitiveKind;
  readonly base?: TypeDescriptor;
  readonly facets: readonly FacetDef[];
  readonly variety: 'atomic' | 'list' | 'union';
}

interface BuiltinSpec {
  kind: PrimitiveKind;
  base?: string;
  facets?: FacetDef[];
}

const bound = (name: FacetDef['name'], value: string): FacetDef => ({ name, value });

// Derived built-ins carry their implied bounds as facets so the extractor
// picks them up through the ordinary base-chain walk.
const BUILTINS: Record<string, BuiltinSpec> = {
  anyType: { kind: 'unknown' },
  anySimpleType: { kind: 'unknown' },
  anyAtomicType: { kind: 'unknown' },
  string: { kind: 'string' },
  normalizedString: { kind: 'string', base: 'string' },
  token: { kind: 'token', base: 'normalizedString' },
  language: { kind: 'language', base: 'token' },
  Name: { kind: 'token', base: 'token' },
  NCName: { kind: 'token', base: 'Name' },
  NMTOKEN: { kind: 'token', base: 'token' },
  NMTOKENS: { kind: 'token', base: 'token' },
  ENTITY: { kind: 'token', base: 'NCName' },
  QName: { kind: 'token' },
  NOTATION: { kind: 'token' },
  ID: { kind: 'identifier', base: 'NCName' },
  IDREF: { kind: 'reference', base: 'NCName' },
  IDREFS: { kind: 'reference', base: 'NCName' },
  anyURI: { kind: 'uri' },
  boolean: { kind: 'boolean' },
  decimal: { kind: 'decimal' },
  float: { kind: 'float' },
  double: { kind: 'float' },
  integer: { kind: 'integer', base: 'decimal' },
  long: { kind: 'integer', base: 'integer' },
  int: { kind: 'integer', base: 'long' },
  short: {
    kind: 'integer',
    base: 'int',
    facets: [bound('minInclusive', '-32768'), bound('maxInclusive', '32767')],
  },
  byte: {
    kind: 'integer',
    base: 'short',
    facets: [bound('minInclusive', '-128'), bound('maxInclusive', '127')],
  },
  nonNegativeInteger: { kind: 'integer', base: 'integer', facets: [bound('minInclusive', '0')] },
  positiveInteger: { kind: 'integer', base: 'nonNegativeInteger', facets: [bound('minInclusive', '1')] },
  nonPositiveInteger: { kind: 'integer', base: 'integer', facets: [bound('maxInclusive', '0')] },
  negativeInteger: { kind: 'integer', base: 'nonPositiveInteger', facets: [bound('maxInclusive', '-1')] },
  unsignedLong: { kind: 'integer', base: 'nonNegativeInteger' },
  unsignedInt: { kind: 'integer', base: 'unsignedLong', facets: [bound('maxInclusive', '4294967295')] },
  unsignedShort: { kind: 'integer', base: 'unsignedInt', facets: [bound('maxInclusive', '65535')] },
  unsignedByte: { kind: 'integer', base: 'unsignedShort', facets: [bound('maxInclusive', '255')] },
  date: { kind: 'date' },
  time: { kind: 'time' },
  dateTime: { kind: 'dateTime' },
  dateTimeStamp: { kind: 'dateTime', base: 'dateTime' },
  duration: { kind: 'duration' },
  dayTimeDuration: { kind: 'duration', base: 'duration' },
  yearMonthDuration: { kind: 'yearMonthDuration', base: 'duration' },
  gYear: { kind: 'gYear' },
  gYearMonth: { kind: 'gYearMonth' },
  base64Binary: { kind: 'base64Binary' },
  hexBinary: { kind: 'hexBinary' },
};

const builtinCache = new Map<string, TypeDescriptor>();

function builtinSpec(name: string): BuiltinSpec | undefined {
  return Object.hasOwn(BUILTINS, name) ? BUILTINS[name] : undefined;
}

/** True when `name` is an XML Schema built-in type known to the generators. */
export function isBuiltinName(name: string): boolean {
  return builtinSpec(name) !== undefined;
}

/**
 * Maps an XML Schema built-in type name to its kind. This is the only place
 * that interprets built-in type names; everything downstream matches on
 * {@link PrimitiveKind}.
 */
export function primitiveKindOf(builtinName: string): PrimitiveKind {
  return builtinSpec(builtinName)?.kind ?? 'unknown';
}

/** Returns the shared descriptor of an XML Schema built-in type. */
export function builtinDescriptor(name: string): TypeDescriptor {
  const cached = builtinCache.get(name);
  if (cached) return cached;
  const entry = builtinSpec(name);
  const descriptor: TypeDescriptor = {
    id: `xs:${name}`,
    name,
    kind: primitiveKindOf(name),
    base: entry?.base ? builtinDescriptor(entry.base) : undefined,
    facets: entry?.facets ?? [],
    variety: name === 'NMTOKENS' || name === 'IDREFS' ? 'list' : 'atomic',
  };
  builtinCache.set(name, descriptor);
  return descriptor;
}

/** Iterates the descriptor and its restriction bases, nearest first. */
export function* baseChain(type: TypeDescriptor): Generator<TypeDescriptor> {
  const seen = new Set<string>();
  let current: TypeDescriptor | undefined = type;
  while (current && !seen.has(current.id)) {
    seen.add(current.id);
    yield current;
    current = current.base;
  }
}

/** Kind of the first descriptor in the chain whose kind is known. */
export function ultimateKind(type: TypeDescriptor): PrimitiveKind {
  for (const t of baseChain(type)) {
    if (t.kind !== 'unknown') return t.kind;
  }
  return 'unknown';
}
