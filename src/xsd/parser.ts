import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { XMLParser } from 'fast-xml-parser';
import { consoleLogger, type Logger } from '../logger.js';
import { XsdParseError } from '../validation/errors.js';
import type {
  AttributeDef,
  ComplexTypeDef,
  Compositor,
  ElementDef,
  FacetDef,
  FacetName,
  GroupParticle,
  Particle,
  SchemaModel,
  SimpleTypeDef,
  TypeName,
} from './types.js';

const XSD_NAMESPACE = 'http://www.w3.org/2001/XMLSchema';

// ---------------------------------------------------------------------------
// Ordered node tree (fast-xml-parser preserveOrder output)
// ---------------------------------------------------------------------------

/**
 * Prefix-free view of one XSD node. Tags are reduced to their local name so
 * `xs:`, `xsd:` and default-namespace schemas all read the same.
 */
interface XsdNode {
  tag: string;
  attrs: Record<string, string>;
  children: XsdNode[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function localPart(qname: string): string {
  const idx = qname.indexOf(':');
  return idx === -1 ? qname : qname.slice(idx + 1);
}

function readAttributes(raw: unknown): Record<string, string> {
  const attrs: Record<string, string> = {};
  if (!isRecord(raw)) return attrs;
  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith('@_')) continue;
    attrs[key.slice(2)] = String(value);
  }
  return attrs;
}

function toNodes(raw: unknown): XsdNode[] {
  if (!Array.isArray(raw)) return [];
  const nodes: XsdNode[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) continue;
    const attrs = readAttributes(entry[':@']);
    for (const [key, value] of Object.entries(entry)) {
      if (key === ':@' || key === '#text' || key.startsWith('?')) continue;
      nodes.push({ tag: localPart(key), attrs, children: toNodes(value) });
    }
  }
  return nodes;
}

function child(node: XsdNode, tag: string): XsdNode | undefined {
  return node.children.find((c) => c.tag === tag);
}

function childrenOf(node: XsdNode, tag: string): XsdNode[] {
  return node.children.filter((c) => c.tag === tag);
}

/**
 * Normalises the XML encoding declaration to UTF-8.
 *
 * The file content has already been decoded by `readFile(..., 'utf-8')`, so an
 * `encoding="ISO-8859-1"` declaration no longer describes the string and
 * `fast-xml-parser` would reject it.
 */
function normalizeXmlEncodingDeclaration(content: string): string {
  return content.replace(
    /(<\?xml\b[^?]*?)\s+encoding=["'][^"']*["']/i,
    '$1 encoding="UTF-8"',
  );
}

function makeParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    preserveOrder: true,
    allowBooleanAttributes: true,
    parseAttributeValue: false,
  });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Namespace bindings in effect for one schema document. */
interface ParseScope {
  prefixes: Map<string, string>;
  defaultNamespace?: string;
}

function resolveTypeName(qname: string, scope: ParseScope): TypeName {
  const idx = qname.indexOf(':');
  const prefix = idx === -1 ? '' : qname.slice(0, idx);
  const local = localPart(qname);
  const namespace = prefix ? scope.prefixes.get(prefix) : scope.defaultNamespace;
  if (namespace === undefined && (prefix === 'xs' || prefix === 'xsd')) {
    return { builtin: true, local };
  }
  return { builtin: namespace === XSD_NAMESPACE, local };
}

function parseOccurs(value: string | undefined, fallback = 1): number | 'unbounded' {
  if (value === 'unbounded') return 'unbounded';
  if (value === undefined) return fallback;
  const n = Number.parseInt(value, 10);
  return Number.isNaN(n) ? fallback : n;
}

function parseMinOccurs(value: string | undefined): number {
  const parsed = parseOccurs(value);
  return parsed === 'unbounded' ? 1 : parsed;
}

const FACET_NAMES: ReadonlySet<string> = new Set<FacetName>([
  'pattern',
  'enumeration',
  'length',
  'minLength',
  'maxLength',
  'minInclusive',
  'maxInclusive',
  'minExclusive',
  'maxExclusive',
  'fractionDigits',
  'totalDigits',
  'whiteSpace',
]);

function isFacetName(tag: string): tag is FacetName {
  return FACET_NAMES.has(tag);
}

function parseFacets(restriction: XsdNode): FacetDef[] {
  const facets: FacetDef[] = [];
  for (const c of restriction.children) {
    if (isFacetName(c.tag)) facets.push({ name: c.tag, value: c.attrs.value });
  }
  return facets;
}

// ---------------------------------------------------------------------------
// SimpleType parsing
// ---------------------------------------------------------------------------

function parseSimpleType(node: XsdNode, scope: ParseScope): SimpleTypeDef {
  const name = node.attrs.name ?? '';

  const restriction = child(node, 'restriction');
  if (restriction) {
    const inline = child(restriction, 'simpleType');
    return {
      name,
      variety: 'atomic',
      base: restriction.attrs.base ? resolveTypeName(restriction.attrs.base, scope) : undefined,
      inlineBase: inline ? parseSimpleType(inline, scope) : undefined,
      facets: parseFacets(restriction),
    };
  }

  const list = child(node, 'list');
  if (list) {
    const inline = child(list, 'simpleType');
    return {
      name,
      variety: 'list',
      base: list.attrs.itemType ? resolveTypeName(list.attrs.itemType, scope) : undefined,
      inlineBase: inline ? parseSimpleType(inline, scope) : undefined,
      facets: [],
    };
  }

  const union = child(node, 'union');
  if (union) {
    // The first member type stands in for the whole union.
    const members = (union.attrs.memberTypes ?? '').split(/\s+/).filter(Boolean);
    const inline = child(union, 'simpleType');
    return {
      name,
      variety: 'union',
      base: members[0] ? resolveTypeName(members[0], scope) : undefined,
      inlineBase: members[0] === undefined && inline ? parseSimpleType(inline, scope) : undefined,
      facets: [],
    };
  }

  return { name, variety: 'atomic', base: { builtin: true, local: 'string' }, facets: [] };
}

// ---------------------------------------------------------------------------
// Attribute parsing
// ---------------------------------------------------------------------------

function parseAttribute(node: XsdNode, scope: ParseScope): AttributeDef {
  const use = node.attrs.use;
  const inline = child(node, 'simpleType');
  const ref = node.attrs.ref;
  return {
    name: node.attrs.name ?? (ref ? localPart(ref) : ''),
    typeName: node.attrs.type ? resolveTypeName(node.attrs.type, scope) : undefined,
    inlineSimpleType: inline ? parseSimpleType(inline, scope) : undefined,
    use: use === 'required' || use === 'prohibited' ? use : 'optional',
    default: node.attrs.default,
    fixed: node.attrs.fixed,
  };
}

function parseAttributes(node: XsdNode, scope: ParseScope): AttributeDef[] {
  return childrenOf(node, 'attribute')
    .map((a) => parseAttribute(a, scope))
    .filter((a) => a.name !== '' && a.use !== 'prohibited');
}

// ---------------------------------------------------------------------------
// Model group parsing
// ---------------------------------------------------------------------------

const COMPOSITORS: ReadonlySet<string> = new Set<Compositor>(['sequence', 'choice', 'all']);

function isCompositor(tag: string): tag is Compositor {
  return COMPOSITORS.has(tag);
}

function parseGroup(node: XsdNode, compositor: Compositor, scope: ParseScope): GroupParticle {
  const particles: Particle[] = [];
  for (const c of node.children) {
    if (c.tag === 'element') {
      particles.push({ kind: 'element', element: parseElement(c, scope) });
    } else if (isCompositor(c.tag)) {
      particles.push(parseGroup(c, c.tag, scope));
    }
  }
  return {
    kind: 'group',
    compositor,
    minOccurs: parseMinOccurs(node.attrs.minOccurs),
    maxOccurs: parseOccurs(node.attrs.maxOccurs),
    particles,
  };
}

function findCompositor(node: XsdNode): XsdNode | undefined {
  return node.children.find((c) => isCompositor(c.tag));
}

// ---------------------------------------------------------------------------
// ComplexType parsing
// ---------------------------------------------------------------------------

function parseComplexType(node: XsdNode, name: string, scope: ParseScope): ComplexTypeDef {
  const def: ComplexTypeDef = {
    name,
    attributes: parseAttributes(node, scope),
  };

  const complexContent = child(node, 'complexContent');
  const simpleContent = child(node, 'simpleContent');

  if (complexContent) {
    const derivation = child(complexContent, 'extension') ?? child(complexContent, 'restriction');
    if (derivation) {
      def.derivation = derivation.tag === 'extension' ? 'extension' : 'restriction';
      def.extends = derivation.attrs.base ? resolveTypeName(derivation.attrs.base, scope) : undefined;
      const group = findCompositor(derivation);
      if (group && isCompositor(group.tag)) {
        def.content = parseGroup(group, group.tag, scope);
      }
      def.attributes.push(...parseAttributes(derivation, scope));
    }
    return def;
  }

  if (simpleContent) {
    const derivation = child(simpleContent, 'extension') ?? child(simpleContent, 'restriction');
    if (derivation) {
      def.simpleContentBase = derivation.attrs.base
        ? resolveTypeName(derivation.attrs.base, scope)
        : { builtin: true, local: 'string' };
      if (derivation.tag === 'restriction') def.simpleContentFacets = parseFacets(derivation);
      def.attributes.push(...parseAttributes(derivation, scope));
    }
    return def;
  }

  const group = findCompositor(node);
  if (group && isCompositor(group.tag)) {
    def.content = parseGroup(group, group.tag, scope);
  }
  return def;
}

// ---------------------------------------------------------------------------
// Element parsing
// ---------------------------------------------------------------------------

function parseElement(node: XsdNode, scope: ParseScope): ElementDef {
  const ref = node.attrs.ref ? localPart(node.attrs.ref) : undefined;
  const name = node.attrs.name ?? ref ?? '';
  const maxOccurs = parseOccurs(node.attrs.maxOccurs);

  const inlineComplex = child(node, 'complexType');
  const inlineSimple = child(node, 'simpleType');

  return {
    name,
    ref,
    typeName: node.attrs.type ? resolveTypeName(node.attrs.type, scope) : undefined,
    inlineComplexType: inlineComplex ? parseComplexType(inlineComplex, name, scope) : undefined,
    inlineSimpleType: inlineSimple ? parseSimpleType(inlineSimple, scope) : undefined,
    minOccurs: parseMinOccurs(node.attrs.minOccurs),
    maxOccurs,
    default: node.attrs.default,
    fixed: node.attrs.fixed,
  };
}

// ---------------------------------------------------------------------------
// Main parse function
// ---------------------------------------------------------------------------

function emptyModel(): SchemaModel {
  return {
    rootElement: '',
    elements: new Map(),
    complexTypes: new Map(),
    simpleTypes: new Map(),
  };
}

function mergeInto(target: SchemaModel, source: SchemaModel): void {
  for (const [k, v] of source.elements) {
    if (!target.elements.has(k)) target.elements.set(k, v);
  }
  for (const [k, v] of source.complexTypes) {
    if (!target.complexTypes.has(k)) target.complexTypes.set(k, v);
  }
  for (const [k, v] of source.simpleTypes) {
    if (!target.simpleTypes.has(k)) target.simpleTypes.set(k, v);
  }
}

interface ParseContext {
  visited: Set<string>;
  logger: Logger;
}

function parseSchemaNode(content: string, source: string): XsdNode {
  let nodes: XsdNode[];
  try {
    const parsed: unknown = makeParser().parse(normalizeXmlEncodingDeclaration(content));
    nodes = toNodes(parsed);
  } catch (err) {
    throw new XsdParseError(`Failed to parse XSD XML content from: ${source}`, err);
  }
  const schema = nodes.find((n) => n.tag === 'schema');
  if (!schema) {
    throw new XsdParseError(`Invalid XSD: root element <xs:schema> not found in ${source}`);
  }
  return schema;
}

async function buildModel(
  schema: XsdNode,
  baseDir: string | undefined,
  ctx: ParseContext,
): Promise<SchemaModel> {
  const model = emptyModel();
  model.targetNamespace = schema.attrs.targetNamespace;

  const scope: ParseScope = { prefixes: new Map(), defaultNamespace: schema.attrs.xmlns };
  for (const [key, value] of Object.entries(schema.attrs)) {
    if (key.startsWith('xmlns:')) scope.prefixes.set(key.slice('xmlns:'.length), value);
  }

  const topElements = childrenOf(schema, 'element');
  for (const node of topElements) {
    const el = parseElement(node, scope);
    if (el.name) model.elements.set(el.name, el);
  }

  for (const node of childrenOf(schema, 'complexType')) {
    const name = node.attrs.name;
    if (!name) continue;
    model.complexTypes.set(name, parseComplexType(node, name, scope));
  }

  for (const node of childrenOf(schema, 'simpleType')) {
    const name = node.attrs.name;
    if (!name) continue;
    model.simpleTypes.set(name, parseSimpleType(node, scope));
  }

  model.rootElement = topElements[0]?.attrs.name ?? '';
  if (baseDir === undefined) return model;

  for (const node of [...childrenOf(schema, 'include'), ...childrenOf(schema, 'import')]) {
    const schemaLocation = node.attrs.schemaLocation;
    if (!schemaLocation) continue;
    try {
      const nested = await parseFile(schemaLocation, baseDir, ctx);
      mergeInto(model, nested);
    } catch (err) {
      ctx.logger.warn(`Skipping unresolvable xs:${node.tag}`, {
        schemaLocation,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }

  // A main schema holding only includes takes its root from them. Type-library
  // schemas (no xs:element at all) leave this empty; the session reports it.
  if (!model.rootElement) model.rootElement = [...model.elements.keys()][0] ?? '';
  return model;
}

/**
 * Internal recursive implementation. Accepts a `visited` set of already-resolved
 * absolute paths so circular xs:include / xs:import chains terminate; a file
 * seen before contributes an empty model.
 */
async function parseFile(
  xsdPath: string,
  baseDir: string | undefined,
  ctx: ParseContext,
): Promise<SchemaModel> {
  const resolvedPath = baseDir ? resolve(baseDir, xsdPath) : resolve(xsdPath);

  if (ctx.visited.has(resolvedPath)) return emptyModel();
  ctx.visited.add(resolvedPath);

  let content: string;
  try {
    content = await readFile(resolvedPath, 'utf-8');
  } catch (err) {
    throw new XsdParseError(`Cannot read XSD file: ${resolvedPath}`, err);
  }

  const schema = parseSchemaNode(content, resolvedPath);
  return buildModel(schema, dirname(resolvedPath), ctx);
}

/**
 * Reads an XSD file from disk and parses it into a SchemaModel, following
 * xs:include and xs:import relative to the file.
 *
 * @param xsdPath - Absolute or relative path to the .xsd file.
 * @param baseDir - Optional base directory for resolving relative paths.
 */
export async function parseXsd(
  xsdPath: string,
  baseDir?: string,
  logger: Logger = consoleLogger,
): Promise<SchemaModel> {
  return parseFile(xsdPath, baseDir, { visited: new Set<string>(), logger });
}

/**
 * Parses XSD source text. Includes and imports are only followed when
 * `baseDir` is given.
 */
export async function parseXsdString(
  content: string,
  baseDir?: string,
  logger: Logger = consoleLogger,
): Promise<SchemaModel> {
  const schema = parseSchemaNode(content, '<inline schema>');
  return buildModel(schema, baseDir, { visited: new Set<string>(), logger });
}
