import { describe, expect, it } from 'vitest';
import { EMPTY_CONSTRAINTS } from '../src/constraints/extractor.js';
import { TypeGeneratorFactory } from '../src/generators/factory.js';
import { builtinDescriptor, primitiveKindOf, ultimateKind, type TypeDescriptor } from '../src/xsd/descriptor.js';

function restricting(name: string, base: TypeDescriptor): TypeDescriptor {
  return { id: `type:${name}`, name, kind: 'unknown', base, facets: [], variety: 'atomic' };
}

describe('TypeGeneratorFactory', () => {
  const factory = new TypeGeneratorFactory();

  it.each([
    ['string', 'string'],
    ['normalizedString', 'string'],
    ['token', 'token'],
    ['NCName', 'token'],
    ['language', 'language'],
    ['anyURI', 'uri'],
    ['decimal', 'decimal'],
    ['double', 'decimal'],
    ['int', 'integer'],
    ['positiveInteger', 'integer'],
    ['boolean', 'boolean'],
    ['date', 'date'],
    ['dateTime', 'dateTime'],
    ['dayTimeDuration', 'duration'],
    ['gYearMonth', 'gYearMonth'],
    ['ID', 'identifier'],
    ['IDREF', 'reference'],
    ['IDREFS', 'reference'],
    ['base64Binary', 'base64Binary'],
    ['hexBinary', 'hexBinary'],
    ['anyType', 'string'],
  ])('xs:%s is handled by the %s generator', (builtin, generator) => {
    expect(factory.create(builtinDescriptor(builtin), EMPTY_CONSTRAINTS).name).toBe(generator);
  });

  it('prefers an enumeration over the type kind', () => {
    const type = restricting('Flag', builtinDescriptor('boolean'));
    expect(factory.create(type, { enumValues: ['true'] }).name).toBe('enumeration');
  });

  it('follows a user type to the kind its chain ends in', () => {
    const indicator = restricting('IndicatorType', builtinDescriptor('boolean'));
    expect(factory.create(indicator, EMPTY_CONSTRAINTS).name).toBe('boolean');

    const price = restricting('PriceType', restricting('MoneyType', builtinDescriptor('decimal')));
    expect(factory.create(price, EMPTY_CONSTRAINTS).name).toBe('decimal');
  });

  it('keeps identifier and binary generators for derived types', () => {
    const key = restricting('OrderKey', builtinDescriptor('ID'));
    expect(factory.create(key, EMPTY_CONSTRAINTS).name).toBe('identifier');
    expect(factory.create(restricting('Blob', builtinDescriptor('hexBinary')), EMPTY_CONSTRAINTS).name).toBe(
      'hexBinary',
    );
  });

  it('shares one instance per kind', () => {
    const a = factory.create(builtinDescriptor('int'), EMPTY_CONSTRAINTS);
    const b = factory.create(builtinDescriptor('long'), EMPTY_CONSTRAINTS);
    expect(a).toBe(b);
  });
});

describe('primitiveKindOf', () => {
  it('maps built-in names to kinds', () => {
    expect(primitiveKindOf('unsignedByte')).toBe('integer');
    expect(primitiveKindOf('anyURI')).toBe('uri');
    expect(primitiveKindOf('Widget')).toBe('unknown');
  });

  it('leaves user types unknown until the chain is read', () => {
    const type = restricting('Code', builtinDescriptor('token'));
    expect(type.kind).toBe('unknown');
    expect(ultimateKind(type)).toBe('token');
  });
});
