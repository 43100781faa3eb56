import { create } from 'xmlbuilder2';
import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces.js';
import type { DocumentElement, DocumentMarker, DocumentNode } from '../types.js';
import { toLexical } from '../values.js';

export interface SerializeOptions {
  prettyPrint: boolean;
  xmlDeclaration: boolean;
  encoding: string;
  /** Render occurrence notes and cut-off subtrees as comments. */
  includeComments: boolean;
  /** Declared as the default namespace on the root element. */
  targetNamespace?: string;
}

const DEFAULTS: SerializeOptions = {
  prettyPrint: true,
  xmlDeclaration: true,
  encoding: 'UTF-8',
  includeComments: false,
};

function markerText(marker: DocumentMarker): string {
  return marker.reason === 'cycle'
    ? ` ${marker.name} omitted: recursive definition `
    : ` ${marker.name} omitted: depth limit reached `;
}

function appendNode(parent: XMLBuilder, node: DocumentNode, options: SerializeOptions): void {
  if (node.kind === 'marker') {
    if (options.includeComments) parent.com(markerText(node));
    return;
  }
  if (options.includeComments && node.annotation) parent.com(` ${node.name}: ${node.annotation} `);
  writeElement(parent.ele(node.name), node, options);
}

function writeElement(target: XMLBuilder, element: DocumentElement, options: SerializeOptions): void {
  for (const [name, value] of Object.entries(element.attributes)) target.att(name, value);
  if (element.value !== undefined) target.txt(toLexical(element.value));
  for (const child of element.children) appendNode(target, child, options);
}

/**
 * Renders a generated tree as XML text.
 *
 * Markers left by the cycle and depth guards produce no element; with
 * `includeComments` they become comments, as do occurrence notes.
 */
export function serializeDocument(tree: DocumentNode, options: Partial<SerializeOptions> = {}): string {
  const opts: SerializeOptions = { ...DEFAULTS, ...options };

  // create() always produces at least a minimal <?xml version="1.0"?> node.
  // Pass headless:true to end() when the caller doesn't want the declaration.
  const doc = create(opts.xmlDeclaration ? { version: '1.0', encoding: opts.encoding } : {});

  if (tree.kind === 'marker') {
    doc.com(markerText(tree));
  } else {
    const root = opts.targetNamespace ? doc.ele(tree.name, { xmlns: opts.targetNamespace }) : doc.ele(tree.name);
    writeElement(root, tree, opts);
  }

  return doc.end({ prettyPrint: opts.prettyPrint, headless: !opts.xmlDeclaration });
}
