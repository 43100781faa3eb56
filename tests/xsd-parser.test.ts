import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it, vi } from 'vitest';
import { silentLogger, type Logger } from '../src/logger.js';
import { XsdParseError } from '../src/validation/errors.js';
import { parseXsd, parseXsdString } from '../src/xsd/parser.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const fixturesDir = resolve(__dirname, 'fixtures');

describe('parseXsd', () => {
  it('parses named types, occurrence bounds and attributes', async () => {
    const model = await parseXsd(resolve(fixturesDir, 'order.xsd'), undefined, silentLogger);

    expect(model.rootElement).toBe('Order');
    expect(model.complexTypes.has('OrderType')).toBe(true);
    expect(model.simpleTypes.has('CurrencyCode')).toBe(true);

    const ct = model.complexTypes.get('OrderType');
    expect(ct).toBeDefined();
    if (!ct?.content) return;
    expect(ct.content.compositor).toBe('sequence');
    expect(ct.content.particles).toHaveLength(6);

    const [first, , , note, item, choice] = ct.content.particles;
    expect(first.kind === 'element' && first.element.name).toBe('OrderID');
    expect(first.kind === 'element' && first.element.typeName).toEqual({ builtin: true, local: 'ID' });
    expect(note.kind === 'element' && note.element.minOccurs).toBe(0);
    expect(item.kind === 'element' && item.element.maxOccurs).toBe('unbounded');
    expect(choice.kind === 'group' && choice.compositor).toBe('choice');

    const version = ct.attributes.find((a) => a.name === 'version');
    expect(version).toMatchObject({ use: 'required', fixed: '2.1' });
    const channel = ct.attributes.find((a) => a.name === 'channel');
    expect(channel?.use).toBe('optional');
  });

  it('keeps restriction facets with their values', async () => {
    const model = await parseXsd(resolve(fixturesDir, 'order.xsd'), undefined, silentLogger);

    expect(model.simpleTypes.get('PriceType')?.facets).toEqual([
      { name: 'minInclusive', value: '0' },
      { name: 'maxInclusive', value: '50' },
      { name: 'fractionDigits', value: '2' },
    ]);
    const derived = model.simpleTypes.get('CurrencyCode');
    expect(derived?.base).toEqual({ builtin: false, local: 'CurrencyCodeContentType' });
    expect(derived?.facets).toEqual([]);
  });

  it('parses inline complex types', async () => {
    const model = await parseXsd(resolve(fixturesDir, 'deep.xsd'), undefined, silentLogger);
    const root = model.elements.get('Level0');
    const particles = root?.inlineComplexType?.content?.particles ?? [];
    expect(particles).toHaveLength(1);
    expect(particles[0].kind === 'element' && particles[0].element.name).toBe('Level1');
  });

  it('follows xs:include relative to the including file and warns about missing ones', async () => {
    const logger: Logger = { debug: vi.fn(), warn: vi.fn() };
    const model = await parseXsd(resolve(fixturesDir, 'main.xsd'), undefined, logger);

    expect(model.rootElement).toBe('Shipment');
    expect(model.complexTypes.has('ShipmentType')).toBe(true);
    expect(model.simpleTypes.has('WeightType')).toBe(true);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      'Skipping unresolvable xs:include',
      expect.objectContaining({ schemaLocation: 'missing.xsd' }),
    );
  });

  it('resolves a relative path against baseDir', async () => {
    const model = await parseXsd('recursive.xsd', fixturesDir, silentLogger);
    expect(model.rootElement).toBe('Node');
  });

  it('resolves prefixed type references through the declared namespaces', async () => {
    const model = await parseXsd(resolve(fixturesDir, 'namespaced.xsd'), undefined, silentLogger);
    expect(model.targetNamespace).toBe('urn:example:ping');
    expect(model.elements.get('Ping')?.typeName).toEqual({ builtin: false, local: 'PingType' });
    const particle = model.complexTypes.get('PingType')?.content?.particles[0];
    expect(particle?.kind === 'element' && particle.element.typeName).toEqual({ builtin: true, local: 'string' });
  });

  it('throws XsdParseError for a missing file', async () => {
    await expect(parseXsd(resolve(fixturesDir, 'nope.xsd'), undefined, silentLogger)).rejects.toBeInstanceOf(
      XsdParseError,
    );
  });
});

describe('parseXsdString', () => {
  it('parses list and union simple types', async () => {
    const model = await parseXsdString(
      `<xs:schema xmlns:xs="http://www.w3.org/2001/XMLSchema">
        <xs:simpleType name="Codes"><xs:list itemType="xs:token"/></xs:simpleType>
        <xs:simpleType name="SizeOrAuto"><xs:union memberTypes="xs:integer xs:string"/></xs:simpleType>
      </xs:schema>`,
      undefined,
      silentLogger,
    );

    expect(model.simpleTypes.get('Codes')).toMatchObject({ variety: 'list', base: { builtin: true, local: 'token' } });
    expect(model.simpleTypes.get('SizeOrAuto')).toMatchObject({
      variety: 'union',
      base: { builtin: true, local: 'integer' },
    });
    expect(model.rootElement).toBe('');
  });

  it('drops prohibited attributes and resolves element references', async () => {
    const model = await parseXsdString(
      `<xs:schema xmlns:xs="http://www.w3.org/2001/XMLSchema">
        <xs:element name="Root">
          <xs:complexType>
            <xs:sequence><xs:element ref="Leaf" minOccurs="0"/></xs:sequence>
            <xs:attribute name="keep" type="xs:string"/>
            <xs:attribute name="gone" type="xs:string" use="prohibited"/>
          </xs:complexType>
        </xs:element>
        <xs:element name="Leaf" type="xs:string"/>
      </xs:schema>`,
      undefined,
      silentLogger,
    );

    const ct = model.elements.get('Root')?.inlineComplexType;
    expect(ct?.attributes.map((a) => a.name)).toEqual(['keep']);
    const particle = ct?.content?.particles[0];
    expect(particle?.kind === 'element' && particle.element).toMatchObject({ name: 'Leaf', ref: 'Leaf', minOccurs: 0 });
  });

  it('throws XsdParseError when there is no xs:schema root', async () => {
    await expect(parseXsdString('<notASchema/>', undefined, silentLogger)).rejects.toThrow(
      'Invalid XSD: root element <xs:schema> not found in <inline schema>',
    );
  });
});
