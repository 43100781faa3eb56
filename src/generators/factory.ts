import type { ConstraintSet } from '../constraints/extractor.js';
import { ultimateKind, type PrimitiveKind, type TypeDescriptor } from '../xsd/descriptor.js';
import type { TypeGenerator } from './base.js';
import { BinaryGenerator } from './binary.js';
import { BooleanGenerator } from './boolean.js';
import { DateTimeGenerator } from './datetime.js';
import { EnumerationGenerator } from './enumeration.js';
import { IdentifierGenerator, ReferenceGenerator } from './identifier.js';
import { NumericGenerator } from './numeric.js';
import { StringGenerator } from './string.js';

const CHAIN_KINDS: ReadonlySet<PrimitiveKind> = new Set<PrimitiveKind>([
  'identifier',
  'reference',
  'base64Binary',
  'hexBinary',
]);

/**
 * Picks the generator for a type. First match wins:
 *
 * 1. a non-empty enumeration
 * 2. identifier, reference and binary kinds, anywhere in the base chain
 * 3. the type's own primitive kind
 * 4. the kind its restriction chain ends in (an "indicator" restricting
 *    xs:boolean gets the boolean generator)
 * 5. plain string
 *
 * Generators hold no per-run state, so one instance per kind is shared.
 */
export class TypeGeneratorFactory {
  private readonly enumeration = new EnumerationGenerator();
  private readonly fallback = new StringGenerator('text');
  private readonly byKind = new Map<PrimitiveKind, TypeGenerator>();

  create(type: TypeDescriptor, constraints: ConstraintSet): TypeGenerator {
    if (constraints.enumValues.length > 0) return this.enumeration;

    const inherited = ultimateKind(type);
    if (CHAIN_KINDS.has(inherited)) return this.forKind(inherited) ?? this.fallback;
    return this.forKind(type.kind) ?? this.forKind(inherited) ?? this.fallback;
  }

  private forKind(kind: PrimitiveKind): TypeGenerator | undefined {
    const cached = this.byKind.get(kind);
    if (cached) return cached;
    const generator = instantiate(kind);
    if (generator) this.byKind.set(kind, generator);
    return generator;
  }
}

function instantiate(kind: PrimitiveKind): TypeGenerator | undefined {
  switch (kind) {
    case 'decimal':
    case 'float':
      return new NumericGenerator(false);
    case 'integer':
      return new NumericGenerator(true);
    case 'boolean':
      return new BooleanGenerator();
    case 'date':
    case 'time':
    case 'dateTime':
    case 'duration':
    case 'yearMonthDuration':
    case 'gYear':
    case 'gYearMonth':
      return new DateTimeGenerator(kind);
    case 'string':
      return new StringGenerator('text');
    case 'token':
    case 'language':
    case 'uri':
      return new StringGenerator(kind);
    case 'identifier':
      return new IdentifierGenerator();
    case 'reference':
      return new ReferenceGenerator();
    case 'base64Binary':
      return new BinaryGenerator('base64');
    case 'hexBinary':
      return new BinaryGenerator('hex');
    case 'unknown':
      return undefined;
  }
}
