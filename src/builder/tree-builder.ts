import type { ConstraintExtractor, ConstraintSet } from '../constraints/extractor.js';
import type { GeneratorContext } from '../generators/base.js';
import type { TypeGeneratorFactory } from '../generators/factory.js';
import { XorShift32 } from '../rng.js';
import type {
  AttributeNode,
  ChoiceNode,
  CustomScalar,
  CustomValue,
  CustomValueOrder,
  DocumentElement,
  DocumentNode,
  ElementNode,
  GeneratedValue,
  GenerationMode,
  Occurs,
  SchemaNode,
} from '../types.js';
import { lookupPath } from '../utils.js';
import { toLexical } from '../values.js';
import type { TypeDescriptor } from '../xsd/descriptor.js';
import { alternativeNames, choiceOwnerPath } from '../xsd/walker.js';

/** User choices, already normalized to maps. */
export interface TreeSelections {
  mode: GenerationMode;
  choiceSelections: ReadonlyMap<string, string>;
  repetitionOverrides: ReadonlyMap<string, number>;
  optionalSelections: ReadonlyMap<string, true>;
  customValues: ReadonlyMap<string, CustomValue>;
  customValueOrder: ReadonlyMap<string, CustomValueOrder>;
}

/** Recursion state carried down the traversal. */
interface Frame {
  depth: number;
  /** Cycle keys of the elements currently being expanded. */
  ancestors: Set<string>;
}

interface LeafSource {
  path: string;
  name: string;
  type: TypeDescriptor;
  fixed?: string;
  default?: string;
}

function isValueList(value: CustomValue): value is readonly CustomScalar[] {
  return Array.isArray(value);
}

function describeOccurs(occurs: Occurs): string | undefined {
  if (occurs.min === 1 && occurs.max === 1) return undefined;
  if (occurs.min === 0 && occurs.max === 1) return 'optional';
  return `occurs ${occurs.min}..${occurs.max ?? 'unbounded'}`;
}

/**
 * Turns a root {@link ElementNode} into a {@link DocumentElement} tree.
 *
 * Counts never depend on randomness: an override (clamped to the declared
 * bounds and `maxRepeatCount`) wins, optional particles follow the mode, and
 * included repeating particles get `defaultRepeatCount`. Only the selected
 * alternative of a choice is built. Elements whose `(name, type)` is already
 * being expanded, or that sit deeper than `maxDepth`, become markers.
 *
 * One builder serves one run: custom-value cursors live on the instance.
 */
export class DocumentTreeBuilder {
  private readonly cursors = new Map<string, number>();
  private readonly constraintCache = new WeakMap<TypeDescriptor, ConstraintSet>();

  constructor(
    private readonly extractor: ConstraintExtractor,
    private readonly factory: TypeGeneratorFactory,
    private readonly context: GeneratorContext,
    private readonly selections: TreeSelections,
  ) {}

  build(root: ElementNode): DocumentNode {
    return this.visitElement(root, { depth: 0, ancestors: new Set() }, 0);
  }

  // -------------------------------------------------------------------------
  // Structure
  // -------------------------------------------------------------------------

  /**
   * @param preferred alternative name handed down from an enclosing choice
   *   whose selection matched this nested choice
   */
  private materialize(node: SchemaNode, frame: Frame, out: DocumentNode[], preferred?: string): void {
    switch (node.kind) {
      case 'simple':
      case 'sequence': {
        const count = this.occurrences(node.path, node.occurs);
        for (let i = 0; i < count; i++) out.push(this.visitElement(node, frame, i));
        return;
      }
      case 'choice': {
        const count = this.occurrences(node.path, node.occurs, node);
        const selected = count > 0 ? this.selectAlternative(node, preferred) : undefined;
        if (!selected) return;
        for (let i = 0; i < count; i++) this.materialize(selected.node, frame, out, selected.wanted);
        return;
      }
      case 'group': {
        const count = this.occurrences(node.path, node.occurs, node);
        for (let i = 0; i < count; i++) {
          for (const child of node.children) this.materialize(child, frame, out);
        }
        return;
      }
    }
  }

  private visitElement(node: ElementNode, frame: Frame, index: number): DocumentNode {
    const { diagnostics, logger, settings } = this.context;

    if (frame.ancestors.has(node.cycleKey)) {
      diagnostics.cycleGuardHits += 1;
      logger.debug('Recursive element cut off', { path: node.path, key: node.cycleKey });
      return { kind: 'marker', name: node.name, reason: 'cycle' };
    }
    if (frame.depth > settings.maxDepth) {
      diagnostics.depthGuardHits += 1;
      logger.debug('Element below the depth limit cut off', { path: node.path, depth: frame.depth });
      return { kind: 'marker', name: node.name, reason: 'depth' };
    }

    diagnostics.elementsGenerated += 1;
    const element: DocumentElement = {
      kind: 'element',
      name: node.name,
      attributes: this.attributes(node.attributes),
      children: [],
    };
    if (settings.includeComments && index === 0) {
      const note = describeOccurs(node.occurs);
      if (note) element.annotation = note;
    }

    if (node.kind === 'simple') {
      element.value = this.leafValue(node, index);
      return element;
    }

    frame.ancestors.add(node.cycleKey);
    try {
      const child: Frame = { depth: frame.depth + 1, ancestors: frame.ancestors };
      for (const particle of node.expand()) this.materialize(particle, child, element.children);
    } finally {
      frame.ancestors.delete(node.cycleKey);
    }
    return element;
  }

  /**
   * The alternative named by the choice's own selection, else by the
   * enclosing choice's, else the first one an optional selection or custom
   * value asks for, else the first declared.
   */
  private selectAlternative(
    choice: ChoiceNode,
    preferred: string | undefined,
  ): { node: SchemaNode; wanted?: string } | undefined {
    const explicit = lookupPath(this.selections.choiceSelections, choice.path);
    const wanted = explicit ?? preferred;
    if (wanted !== undefined) {
      const lower = wanted.toLowerCase();
      const match =
        choice.alternatives.find((a) => alternativeNames(a).includes(wanted)) ??
        choice.alternatives.find((a) => alternativeNames(a).some((n) => n.toLowerCase() === lower));
      if (match) return { node: match, wanted };
      if (explicit !== undefined) {
        this.context.logger.warn('Choice selection names no alternative, using the first one', {
          path: choice.path,
          selection: explicit,
          alternatives: choice.alternatives.flatMap(alternativeNames),
        });
      }
    }
    const owner = choiceOwnerPath(choice.path);
    const requested = choice.alternatives.find((a) =>
      alternativeNames(a).some((name) => this.includesOptional(`${owner}.${name}`)),
    );
    if (requested && this.selections.mode !== 'complete') return { node: requested };
    const first = choice.alternatives[0];
    return first ? { node: first } : undefined;
  }

  // -------------------------------------------------------------------------
  // Occurrence resolution
  // -------------------------------------------------------------------------

  /**
   * Number of copies to emit. Repetition overrides address elements only;
   * a `container` (group or choice) shares its parent element's path.
   */
  private occurrences(path: string, occurs: Occurs, container?: SchemaNode): number {
    const { defaultRepeatCount, maxRepeatCount } = this.context.settings;
    const max = occurs.max ?? Number.POSITIVE_INFINITY;
    const ceiling = Math.max(Math.min(max, maxRepeatCount), occurs.min);

    if (!container) {
      const override = lookupPath(this.selections.repetitionOverrides, path);
      if (override !== undefined) return Math.min(Math.max(Math.trunc(override), occurs.min), ceiling);
    }

    if (occurs.min === 0) {
      const included = container ? this.includesContainer(path, container) : this.includesOptional(path);
      if (!included) return 0;
    }
    if (max > 1) return Math.min(Math.max(defaultRepeatCount, occurs.min, 1), ceiling);
    return Math.max(occurs.min, 1);
  }

  private includesOptional(path: string): boolean {
    if (lookupPath(this.selections.customValues, path) !== undefined) return true;
    switch (this.selections.mode) {
      case 'minimal':
        return false;
      case 'complete':
        return true;
      case 'custom':
        return lookupPath(this.selections.optionalSelections, path) !== undefined;
    }
  }

  /** An optional group or choice is selected through any element it can start with. */
  private includesContainer(path: string, container: SchemaNode): boolean {
    const owner = choiceOwnerPath(path);
    if (this.selections.mode !== 'custom') return this.includesOptional(owner);
    return alternativeNames(container).some((name) => this.includesOptional(`${owner}.${name}`));
  }

  // -------------------------------------------------------------------------
  // Values
  // -------------------------------------------------------------------------

  private attributes(nodes: readonly AttributeNode[]): Record<string, string> {
    const out: Record<string, string> = {};
    for (const attr of nodes) {
      if (!attr.required && !this.includesOptional(attr.path)) continue;
      out[attr.name] = toLexical(this.leafValue(attr, 0));
    }
    return out;
  }

  /** Custom value, then fixed, then default, then a generated value. */
  private leafValue(source: LeafSource, index: number): GeneratedValue {
    const custom = this.nextCustomValue(source.path);
    if (custom !== undefined) return { kind: 'text', value: custom };
    if (source.fixed !== undefined) return { kind: 'text', value: source.fixed };
    if (source.default !== undefined) return { kind: 'text', value: source.default };

    const constraints = this.constraintsOf(source.type);
    const generator = this.factory.create(source.type, constraints);
    const rng = new XorShift32(this.context.settings.seed, `${source.path}#${index}`);
    this.context.diagnostics.valuesGenerated += 1;
    return generator.generate(source.name, constraints, { ...this.context, rng });
  }

  private constraintsOf(type: TypeDescriptor): ConstraintSet {
    let constraints = this.constraintCache.get(type);
    if (!constraints) {
      constraints = this.extractor.extract(type);
      this.constraintCache.set(type, constraints);
    }
    return constraints;
  }

  /**
   * Custom values given as a list are handed out one per occurrence, wrapping
   * around, or drawn per occurrence when the path asks for random order.
   */
  private nextCustomValue(path: string): string | undefined {
    const custom = lookupPath(this.selections.customValues, path);
    if (custom === undefined) return undefined;
    if (!isValueList(custom)) return String(custom);
    if (custom.length === 0) return undefined;
    const cursor = this.cursors.get(path) ?? 0;
    this.cursors.set(path, cursor + 1);
    if (lookupPath(this.selections.customValueOrder, path) === 'random') {
      const rng = new XorShift32(this.context.settings.seed, `${path}#custom${cursor}`);
      return String(rng.pick(custom) ?? custom[0]);
    }
    return String(custom[cursor % custom.length]);
  }
}
