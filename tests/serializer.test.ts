import { describe, expect, it } from 'vitest';
import type { DocumentElement } from '../src/types.js';
import { plainNumber, toLexical } from '../src/values.js';
import { serializeDocument } from '../src/xml/serializer.js';

const COMPACT = { prettyPrint: false, xmlDeclaration: false };

const TREE: DocumentElement = {
  kind: 'element',
  name: 'Order',
  attributes: { version: '2.1' },
  children: [
    { kind: 'element', name: 'Total', attributes: {}, children: [], value: { kind: 'decimal', value: 50 } },
    {
      kind: 'element',
      name: 'Line',
      attributes: {},
      children: [],
      value: { kind: 'text', value: 'a < b & c' },
      annotation: 'occurs 1..unbounded',
    },
    { kind: 'marker', name: 'Order', reason: 'cycle' },
    { kind: 'marker', name: 'Deep', reason: 'depth' },
  ],
};

describe('serializeDocument', () => {
  it('writes elements, attributes and escaped text', () => {
    expect(serializeDocument(TREE, COMPACT)).toBe(
      '<Order version="2.1"><Total>50</Total><Line>a &lt; b &amp; c</Line></Order>',
    );
  });

  it('renders occurrence notes and cut-off subtrees as comments', () => {
    expect(serializeDocument(TREE, { ...COMPACT, includeComments: true })).toBe(
      '<Order version="2.1"><Total>50</Total>' +
        '<!-- Line: occurs 1..unbounded --><Line>a &lt; b &amp; c</Line>' +
        '<!-- Order omitted: recursive definition -->' +
        '<!-- Deep omitted: depth limit reached -->' +
        '</Order>',
    );
  });

  it('adds the declaration with the requested encoding', () => {
    const xml = serializeDocument(TREE, { prettyPrint: false, encoding: 'ISO-8859-1' });
    expect(xml.startsWith('<?xml version="1.0" encoding="ISO-8859-1"?><Order')).toBe(true);
  });

  it('indents nested elements when pretty-printing', () => {
    const tree: DocumentElement = {
      kind: 'element',
      name: 'A',
      attributes: {},
      children: [{ kind: 'element', name: 'B', attributes: {}, children: [], value: { kind: 'boolean', value: false } }],
    };
    expect(serializeDocument(tree, { xmlDeclaration: false })).toBe('<A>\n  <B>false</B>\n</A>');
  });

  it('declares the target namespace as the default namespace', () => {
    const tree: DocumentElement = {
      kind: 'element',
      name: 'Ping',
      attributes: {},
      children: [],
      value: { kind: 'text', value: 'x' },
    };
    expect(serializeDocument(tree, { ...COMPACT, targetNamespace: 'urn:example:ping' })).toBe(
      '<Ping xmlns="urn:example:ping">x</Ping>',
    );
  });
});

describe('toLexical', () => {
  it('formats each value kind', () => {
    expect(toLexical({ kind: 'integer', value: 42 })).toBe('42');
    expect(toLexical({ kind: 'decimal', value: 0.15 })).toBe('0.15');
    expect(toLexical({ kind: 'boolean', value: true })).toBe('true');
    expect(toLexical({ kind: 'temporal', temporalKind: 'gYear', value: '2024' })).toBe('2024');
    expect(toLexical({ kind: 'binary', encoding: 'hex', value: '0A' })).toBe('0A');
  });

  it('never writes exponent notation', () => {
    expect(toLexical({ kind: 'decimal', value: 1e-7 })).toBe('0.0000001');
    expect(toLexical({ kind: 'decimal', value: 1e21 })).toBe('1000000000000000000000');
    expect(toLexical({ kind: 'integer', value: 2.5e22 })).toBe('25000000000000000000000');
  });
});

describe('plainNumber', () => {
  it('places the decimal point from the exponent', () => {
    expect(plainNumber(-1.5e-7)).toBe('-0.00000015');
    expect(plainNumber(1.25e21)).toBe('1250000000000000000000');
    expect(plainNumber(0.001)).toBe('0.001');
  });
});
