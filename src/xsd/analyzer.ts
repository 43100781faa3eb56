import { DEFAULT_SETTINGS } from '../config/options.js';
import type { ChoiceNode, ElementNode, Occurs, SchemaNode } from '../types.js';
import type { SchemaModel } from './types.js';
import { alternativeNames, choiceOwnerPath, SchemaWalker } from './walker.js';

export interface ChoiceSummary {
  /** Key to use in `choiceSelections`. */
  path: string;
  occurs: Occurs;
  /** Names a selection may use, in declaration order. */
  alternatives: string[];
}

export interface RepeatableSummary {
  name: string;
  path: string;
  occurs: Occurs;
}

export interface ElementSummary {
  name: string;
  path: string;
  occurs: Occurs;
  /** Element-only content, as opposed to a text value. */
  complex: boolean;
  children: ElementSummary[];
  /** Set when the outline stops here instead of expanding the element. */
  cut?: 'cycle' | 'depth';
}

/** What a caller needs to write selections and overrides for a schema. */
export interface SchemaAnalysis {
  rootElements: string[];
  rootElement: string;
  targetNamespace?: string;
  /** Every choice reachable from the root, including those inside unselected alternatives. */
  choices: ChoiceSummary[];
  /** Paths of elements and attributes that `optionalSelections` can switch on. */
  optionalElements: string[];
  /** Elements that may occur more than once. */
  repeatableElements: RepeatableSummary[];
  tree: ElementSummary;
}

export interface AnalyzeOptions {
  /** Defaults to the schema's first global element. */
  rootElement?: string;
  /** @default DEFAULT_SETTINGS.maxDepth */
  maxDepth?: number;
}

/**
 * Walks the schema from its root and lists the places generation can be
 * steered: choices, optional particles and repeating elements. Recursive
 * types are outlined once, the same way the document builder cuts them.
 */
export function analyzeSchema(schema: SchemaModel, options: AnalyzeOptions = {}): SchemaAnalysis | undefined {
  const walker = new SchemaWalker(schema);
  const rootElement = options.rootElement ?? schema.rootElement;
  const root = rootElement ? walker.rootNode(rootElement) : undefined;
  if (!root) return undefined;

  const maxDepth = options.maxDepth ?? DEFAULT_SETTINGS.maxDepth;
  const choices: ChoiceSummary[] = [];
  const optionalElements: string[] = [];
  const repeatableElements: RepeatableSummary[] = [];
  const ancestors = new Set<string>();
  const tree = visitElement(root, 0);

  return {
    rootElements: [...schema.elements.keys()],
    rootElement,
    targetNamespace: schema.targetNamespace,
    choices,
    optionalElements,
    repeatableElements,
    tree,
  };

  function visitElement(node: ElementNode, depth: number): ElementSummary {
    const summary = summarize(node, depth);
    if (node.occurs.min === 0) optionalElements.push(node.path);
    if (node.occurs.max === undefined || node.occurs.max > 1) {
      repeatableElements.push({ name: node.name, path: node.path, occurs: node.occurs });
    }
    for (const attr of node.attributes) {
      if (!attr.required) optionalElements.push(attr.path);
    }
    if (node.kind === 'simple' || summary.cut) return summary;

    ancestors.add(node.cycleKey);
    try {
      for (const child of node.expand()) visit(child, depth + 1, summary.children);
    } finally {
      ancestors.delete(node.cycleKey);
    }
    return summary;
  }

  function visit(node: SchemaNode, depth: number, out: ElementSummary[]): void {
    switch (node.kind) {
      case 'simple':
      case 'sequence':
        out.push(visitElement(node, depth));
        return;
      case 'choice':
        choices.push(describeChoice(node));
        if (node.occurs.min === 0) switchedBy(choiceOwnerPath(node.path), node);
        for (const alternative of node.alternatives) visit(alternative, depth, out);
        return;
      case 'group':
        if (node.occurs.min === 0) switchedBy(node.path, node);
        for (const child of node.children) visit(child, depth, out);
        return;
    }
  }

  /** An optional group or choice is switched on through the elements it can start with. */
  function switchedBy(owner: string, container: SchemaNode): void {
    for (const name of alternativeNames(container)) optionalElements.push(`${owner}.${name}`);
  }

  function summarize(node: ElementNode, depth: number): ElementSummary {
    const summary: ElementSummary = {
      name: node.name,
      path: node.path,
      occurs: node.occurs,
      complex: node.kind === 'sequence',
      children: [],
    };
    if (ancestors.has(node.cycleKey)) summary.cut = 'cycle';
    else if (depth > maxDepth) summary.cut = 'depth';
    return summary;
  }
}

function describeChoice(node: ChoiceNode): ChoiceSummary {
  return { path: node.path, occurs: node.occurs, alternatives: node.alternatives.flatMap(alternativeNames) };
}
