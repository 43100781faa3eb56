import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it, vi } from 'vitest';
import type { GenerationOptions } from '../src/config/options.js';
import { silentLogger, type Logger } from '../src/logger.js';
import { GenerationSession, generateSampleXml, generateXmlFromXsd } from '../src/session.js';
import type { DocumentElement, DocumentNode } from '../src/types.js';
import { MissingRootError } from '../src/validation/errors.js';
import { parseXsd, parseXsdString } from '../src/xsd/parser.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const fixturesDir = resolve(__dirname, 'fixtures');

const COMPACT: GenerationOptions = { prettyPrint: false, xmlDeclaration: false, logger: silentLogger };

async function session(fixture: string, options: GenerationOptions = {}): Promise<GenerationSession> {
  const schema = await parseXsd(resolve(fixturesDir, fixture), undefined, silentLogger);
  return new GenerationSession(schema, { ...COMPACT, ...options });
}

/** The airport code is drawn from the seeded generator; pin it so whole documents can be compared. */
function pinAirport(xml: string): string {
  return xml.replace(/<AirportCode>[A-Z]{3}<\/AirportCode>/, '<AirportCode>XXX</AirportCode>');
}

function elementChildren(node: DocumentNode): DocumentElement[] {
  return node.kind === 'element' ? node.children.filter((c): c is DocumentElement => c.kind === 'element') : [];
}

const ITEM = '<Item><Sku>SampleSk</Sku><Quantity>1</Quantity><Price>50</Price></Item>';

describe('GenerationSession on order.xsd', () => {
  it('builds the smallest valid document in minimal mode', async () => {
    const xml = (await session('order.xsd')).toXml();
    expect(pinAirport(xml)).toBe(
      '<Order version="2.1">' +
        '<OrderID>OrderID_1</OrderID>' +
        '<AirportCode>XXX</AirportCode>' +
        '<Currency>USD</Currency>' +
        ITEM +
        ITEM +
        '<Card><Holder>SampleHolder</Holder><Expiry>2024-06</Expiry></Card>' +
        '</Order>',
    );
  });

  it('includes every optional particle and attribute in complete mode', async () => {
    const xml = (await session('order.xsd', { mode: 'complete' })).toXml();
    const item = '<Item><Sku>SampleSk</Sku><Quantity>1</Quantity><Price>50</Price><Gift>true</Gift></Item>';
    expect(pinAirport(xml)).toBe(
      '<Order version="2.1" channel="Samplechannel">' +
        '<OrderID>OrderID_1</OrderID>' +
        '<AirportCode>XXX</AirportCode>' +
        '<Currency>USD</Currency>' +
        '<Note>SampleNote</Note>' +
        item +
        item +
        '<Card><Holder>SampleHolder</Holder><Expiry>2024-06</Expiry></Card>' +
        '</Order>',
    );
  });

  it('includes only the selected optional particles in custom mode', async () => {
    const xml = (await session('order.xsd', { mode: 'custom', optionalSelections: ['Order.Note'] })).toXml();
    expect(xml).toContain('<Currency>USD</Currency><Note>SampleNote</Note><Item>');
    expect(xml).not.toContain('<Gift>');
    expect(xml).not.toContain('channel=');
  });

  it('materializes the selected choice alternative', async () => {
    const xml = (await session('order.xsd', { choiceSelections: { Order: 'Cash' } })).toXml();
    expect(xml.endsWith(`${ITEM}<Cash>123.45</Cash></Order>`)).toBe(true);
  });

  it('matches choice selections case-insensitively', async () => {
    const xml = (await session('order.xsd', { choiceSelections: { order: 'cash' } })).toXml();
    expect(xml).toContain('<Cash>123.45</Cash>');
    expect(xml).not.toContain('<Card>');
  });

  it('warns and uses the first alternative for an unknown selection', async () => {
    const logger: Logger = { debug: vi.fn(), warn: vi.fn() };
    const xml = (await session('order.xsd', { choiceSelections: { Order: 'Cheque' }, logger })).toXml();

    expect(xml).toContain('<Card>');
    expect(logger.warn).toHaveBeenCalledWith('Choice selection names no alternative, using the first one', {
      path: 'Order',
      selection: 'Cheque',
      alternatives: ['Card', 'Cash'],
    });
  });

  it('clamps repetition overrides to the declared bounds and maxRepeatCount', async () => {
    const many = (await session('order.xsd', { repetitionOverrides: { Item: 50 } })).run();
    expect(elementChildren(many.tree).filter((c) => c.name === 'Item')).toHaveLength(10);

    const none = (await session('order.xsd', { repetitionOverrides: { 'Order.Item': 0 } })).run();
    expect(elementChildren(none.tree).filter((c) => c.name === 'Item')).toHaveLength(1);
  });

  it('hands out list custom values one per occurrence', async () => {
    const xml = (await session('order.xsd', { customValues: { 'Item.Quantity': [3, 4] } })).toXml();
    expect(xml).toContain('<Quantity>3</Quantity><Price>50</Price></Item><Item><Sku>SampleSk</Sku><Quantity>4</Quantity>');
  });

  it('includes an optional element that has a custom value', async () => {
    const xml = (await session('order.xsd', { customValues: { Gift: false } })).toXml();
    expect(xml).toContain('<Price>50</Price><Gift>false</Gift></Item>');
  });

  it('counts what it generated', async () => {
    const { diagnostics } = (await session('order.xsd')).run();
    expect(diagnostics).toEqual({
      cycleGuardHits: 0,
      depthGuardHits: 0,
      patternFallbacks: 0,
      enumerationFallbacks: 0,
      elementsGenerated: 15,
      valuesGenerated: 11,
    });
  });

  it('gives the same document on every run', async () => {
    const s = await session('order.xsd', { mode: 'complete' });
    const first = s.toXml();
    expect(s.toXml()).toBe(first);
    expect((await session('order.xsd', { mode: 'complete' })).toXml()).toBe(first);
  });

  it('writes the XML declaration when asked to', async () => {
    const xml = (await session('order.xsd', { xmlDeclaration: true })).toXml();
    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?><Order version="2.1">')).toBe(true);
  });
});

describe('GenerationSession on choices.xsd', () => {
  const tail = '<Level>99</Level><Score>49</Score><Score>49</Score></Payment>';

  it('takes the first alternative of every choice by default', async () => {
    const xml = (await session('choices.xsd')).toXml();
    expect(xml).toBe(
      '<Payment><Reference>SampleReference</Reference>' +
        '<Card>SampleCard</Card>' +
        '<Email>sample@example.com</Email>' +
        '<Delivery><Pickup>SamplePickup</Pickup></Delivery>' +
        tail,
    );
  });

  it('addresses a second choice under the same element through #choice2', async () => {
    const xml = (
      await session('choices.xsd', { choiceSelections: { Payment: 'Cash', 'Payment#choice2': 'Street' } })
    ).toXml();
    expect(xml).toContain('<Cash>SampleCash</Cash><Street>SampleStreet</Street><City>SampleCity</City><Delivery>');
    expect(xml).not.toContain('<Email>');
  });

  it('hands a selection down into a nested choice', async () => {
    const xml = (await session('choices.xsd', { choiceSelections: { 'Payment.Delivery': 'Post' } })).toXml();
    expect(xml).toContain('<Delivery><Post>SamplePost</Post></Delivery>');
  });

  it('includes an optional later choice through the alternative selected in custom mode', async () => {
    const xml = (await session('choices.xsd', { mode: 'custom', optionalSelections: ['Payment.Coupon'] })).toXml();
    expect(xml).toContain('</Delivery><Coupon>SampleCoupon</Coupon><Level>');
    expect(xml).not.toContain('<Voucher>');
  });

  it('leaves the optional choice out in minimal mode', async () => {
    const xml = (await session('choices.xsd')).toXml();
    expect(xml).toContain('</Delivery><Level>');
  });

  it('keeps values inside bounds inherited from several levels', async () => {
    const xml = (await session('choices.xsd', { mode: 'complete' })).toXml();
    expect(xml.endsWith(`<Voucher>SampleVoucher</Voucher>${tail}`)).toBe(true);
  });

  it('draws list custom values with the seeded RNG when asked to', async () => {
    const options: GenerationOptions = {
      customValues: { Score: ['7', '8', '9'] },
      customValueOrder: { Score: 'random' },
    };
    const s = await session('choices.xsd', options);
    const xml = s.toXml();
    expect(xml).toMatch(/<Score>[789]<\/Score><Score>[789]<\/Score><\/Payment>$/);
    expect(s.toXml()).toBe(xml);
  });
});

describe('ID references', () => {
  it('points IDREF and IDREFS values at IDs issued earlier in the document', async () => {
    const xml = (await session('references.xsd')).toXml();
    expect(xml).toBe(
      '<Library><BookID>BookID_1</BookID><BookID>BookID_2</BookID>' +
        '<LoanRef>BookID_1</LoanRef><Holds>BookID_2</Holds></Library>',
    );
  });
});

describe('recursion guards', () => {
  it('cuts a recursive element at its first repeat', async () => {
    const logger: Logger = { debug: vi.fn(), warn: vi.fn() };
    const s = await session('recursive.xsd', { mode: 'complete', logger });
    const { tree, diagnostics } = s.run();

    expect(diagnostics.cycleGuardHits).toBe(1);
    expect(tree.kind === 'element' && tree.children[1]).toEqual({ kind: 'marker', name: 'Node', reason: 'cycle' });
    expect(s.toXml(tree)).toBe('<Node><Label>SampleLabel</Label></Node>');
    expect(logger.warn).toHaveBeenCalledWith(
      'Some subtrees were cut off by the recursion guards',
      expect.objectContaining({ rootElement: 'Node', cycleGuardHits: 1, depthGuardHits: 0 }),
    );
  });

  it('renders a cut-off subtree as a comment when comments are on', async () => {
    const s = await session('recursive.xsd', { mode: 'complete', settings: { includeComments: true } });
    expect(s.toXml()).toBe('<Node><Label>SampleLabel</Label><!-- Node omitted: recursive definition --></Node>');
  });

  it('leaves an optional recursive element out in minimal mode', async () => {
    const { diagnostics } = (await session('recursive.xsd')).run();
    expect(diagnostics.cycleGuardHits).toBe(0);
  });

  it('stops below maxDepth', async () => {
    const s = await session('deep.xsd', { settings: { maxDepth: 2 } });
    const { tree, diagnostics } = s.run();

    expect(diagnostics.depthGuardHits).toBe(1);
    const level2 = elementChildren(elementChildren(tree)[0])[0];
    expect(level2.name).toBe('Level2');
    expect(level2.children).toEqual([{ kind: 'marker', name: 'Level3', reason: 'depth' }]);
    expect(s.toXml(tree)).toBe('<Level0><Level1><Level2/></Level1></Level0>');
  });
});

describe('root selection', () => {
  it('throws MissingRootError for a schema without global elements', async () => {
    const schema = await parseXsdString(
      '<xs:schema xmlns:xs="http://www.w3.org/2001/XMLSchema"><xs:simpleType name="T"><xs:restriction base="xs:string"/></xs:simpleType></xs:schema>',
      undefined,
      silentLogger,
    );
    expect(() => new GenerationSession(schema, COMPACT).run()).toThrow(MissingRootError);
  });

  it('names the known elements when the requested root does not exist', async () => {
    const s = await session('order.xsd', { rootElement: 'Nope' });
    expect(() => s.run()).toThrow('Root element "Nope" is not a global element of the schema (found: Order).');
  });

  it('declares the target namespace on the root', async () => {
    const xml = (await session('namespaced.xsd')).toXml();
    expect(xml).toBe('<Ping xmlns="urn:example:ping"><EchoToken>SampleEchoToken</EchoToken></Ping>');
  });
});

describe('generateSampleXml', () => {
  it('reads the schema with its includes and returns diagnostics', async () => {
    const { xml, diagnostics } = await generateSampleXml('main.xsd', { ...COMPACT, xsdBaseDir: fixturesDir });
    expect(xml).toBe('<Shipment carrier="Samplecarrier"><Weight>500</Weight></Shipment>');
    expect(diagnostics.elementsGenerated).toBe(2);
  });

  it('returns only the text from generateXmlFromXsd', async () => {
    const xml = await generateXmlFromXsd(resolve(fixturesDir, 'recursive.xsd'), COMPACT);
    expect(xml).toBe('<Node><Label>SampleLabel</Label></Node>');
  });
});
