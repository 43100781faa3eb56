import type {
  AttributeNode,
  ChoiceNode,
  ElementNode,
  GroupNode,
  Occurs,
  SchemaNode,
  SequenceNode,
} from '../types.js';
import { builtinDescriptor, isBuiltinName, type TypeDescriptor } from './descriptor.js';
import type {
  AttributeDef,
  ComplexTypeDef,
  ElementDef,
  FacetDef,
  GroupParticle,
  Particle,
  SchemaModel,
  SimpleTypeDef,
  TypeName,
} from './types.js';

function toOccurs(min: number, max: number | 'unbounded'): Occurs {
  return max === 'unbounded' ? { min } : { min, max };
}

/** Numbering of choice groups met while expanding one element's content. */
interface ExpandState {
  choices: number;
}

/**
 * Adapter over a parsed {@link SchemaModel}: resolves type references into
 * {@link TypeDescriptor}s and element declarations into lazily expanded
 * {@link SchemaNode}s.
 */
export class SchemaWalker {
  private readonly simpleDescriptors = new WeakMap<SimpleTypeDef, TypeDescriptor>();
  private readonly resolving = new Set<SimpleTypeDef>();
  private readonly anonymousIds = new WeakMap<object, string>();
  private anonymousCounter = 0;

  constructor(private readonly model: SchemaModel) {}

  get schema(): SchemaModel {
    return this.model;
  }

  /**
   * Returns the top-level ElementDef for the given name, if it exists.
   */
  lookupElement(name: string): ElementDef | undefined {
    return this.model.elements.get(name);
  }

  /**
   * Builds the node for a global element, used as the document root.
   */
  rootNode(name: string): ElementNode | undefined {
    const el = this.lookupElement(name);
    if (!el) return undefined;
    return this.elementNode({ ...el, minOccurs: 1, maxOccurs: 1 }, '');
  }

  // -------------------------------------------------------------------------
  // Type descriptors
  // -------------------------------------------------------------------------

  /**
   * Resolves a type reference to a descriptor. Complex types with simple
   * content resolve to the descriptor of their text content.
   */
  describeTypeName(ref: TypeName): TypeDescriptor {
    if (ref.builtin) return builtinDescriptor(ref.local);

    const simple = this.model.simpleTypes.get(ref.local);
    if (simple) return this.describeSimpleType(simple);

    const complex = this.model.complexTypes.get(ref.local);
    if (complex) return this.describeComplexContent(complex);

    if (isBuiltinName(ref.local)) return builtinDescriptor(ref.local);
    return { id: `type:${ref.local}`, name: ref.local, kind: 'unknown', facets: [], variety: 'atomic' };
  }

  describeSimpleType(def: SimpleTypeDef): TypeDescriptor {
    const cached = this.simpleDescriptors.get(def);
    if (cached) return cached;

    // A restriction chain that loops back on itself gets cut at the repeat.
    const cyclic = this.resolving.has(def);
    this.resolving.add(def);
    try {
      let base: TypeDescriptor | undefined;
      if (!cyclic) {
        if (def.inlineBase) base = this.describeSimpleType(def.inlineBase);
        else if (def.base) base = this.describeTypeName(def.base);
      }
      const descriptor: TypeDescriptor = {
        id: def.name ? `type:${def.name}` : this.anonymousId(def),
        name: def.name,
        kind: 'unknown',
        base,
        facets: def.facets,
        variety: def.variety,
      };
      if (!cyclic) this.simpleDescriptors.set(def, descriptor);
      return descriptor;
    } finally {
      if (!cyclic) this.resolving.delete(def);
    }
  }

  private describeComplexContent(ct: ComplexTypeDef, visited = new Set<string>()): TypeDescriptor {
    let base: TypeDescriptor;
    const ref = ct.simpleContentBase;
    if (!ref || visited.has(ct.name)) {
      base = builtinDescriptor('string');
    } else {
      visited.add(ct.name);
      const baseComplex = ref.builtin ? undefined : this.model.complexTypes.get(ref.local);
      base = baseComplex ? this.describeComplexContent(baseComplex, visited) : this.describeTypeName(ref);
    }
    const facets: FacetDef[] = ct.simpleContentFacets ?? [];
    if (facets.length === 0 && ct.name === '') return base;
    return {
      id: ct.name ? `complex:${ct.name}` : this.anonymousId(ct),
      name: ct.name,
      kind: 'unknown',
      base,
      facets,
      variety: 'atomic',
    };
  }

  private anonymousId(def: object): string {
    let id = this.anonymousIds.get(def);
    if (!id) {
      this.anonymousCounter += 1;
      id = `anonymous#${this.anonymousCounter}`;
      this.anonymousIds.set(def, id);
    }
    return id;
  }

  // -------------------------------------------------------------------------
  // Complex type resolution
  // -------------------------------------------------------------------------

  /**
   * Resolves the full ComplexTypeDef for an element:
   * - If the element has an inline complexType, return that.
   * - If the element has a typeName referencing a complexType, return that.
   * - Otherwise return undefined (element is simple/text-only).
   */
  resolveComplexTypeForElement(el: ElementDef): ComplexTypeDef | undefined {
    if (el.inlineComplexType) return el.inlineComplexType;
    if (el.typeName && !el.typeName.builtin) return this.model.complexTypes.get(el.typeName.local);
    return undefined;
  }

  /** True when the complex type carries text content through xs:simpleContent. */
  private hasSimpleContent(ct: ComplexTypeDef): boolean {
    return ct.simpleContentBase !== undefined;
  }

  /**
   * Recursively resolves the content model following the xs:extension chain.
   * Base type particles come first, then the derived type's own. A restriction
   * restates its content, so only its own particles count.
   */
  private resolveParticles(ct: ComplexTypeDef, visited = new Set<string>()): Particle[] {
    const own: Particle[] = ct.content ? [ct.content] : [];
    if (!ct.extends || ct.extends.builtin || ct.derivation !== 'extension') return own;
    if (visited.has(ct.name)) return own;
    visited.add(ct.name);
    const baseCt = this.model.complexTypes.get(ct.extends.local);
    if (!baseCt) return own;
    return [...this.resolveParticles(baseCt, visited), ...own];
  }

  /**
   * Recursively resolves all attributes following the derivation chain. A
   * derived declaration replaces an inherited one of the same name.
   */
  private resolveAttributes(ct: ComplexTypeDef, visited = new Set<string>()): AttributeDef[] {
    const baseRef = ct.extends ?? ct.simpleContentBase;
    let inherited: AttributeDef[] = [];
    if (baseRef && !baseRef.builtin && !visited.has(ct.name)) {
      visited.add(ct.name);
      const baseCt = this.model.complexTypes.get(baseRef.local);
      if (baseCt) inherited = this.resolveAttributes(baseCt, visited);
    }
    const ownNames = new Set(ct.attributes.map((a) => a.name));
    return [...inherited.filter((a) => !ownNames.has(a.name)), ...ct.attributes];
  }

  private typeIdentity(el: ElementDef, ct: ComplexTypeDef | undefined): string {
    if (el.typeName) return el.typeName.builtin ? `xs:${el.typeName.local}` : `type:${el.typeName.local}`;
    if (ct) return this.anonymousId(ct);
    if (el.inlineSimpleType) return this.anonymousId(el.inlineSimpleType);
    return 'xs:anyType';
  }

  // -------------------------------------------------------------------------
  // Schema nodes
  // -------------------------------------------------------------------------

  private attributeNodes(defs: AttributeDef[], elementPath: string): AttributeNode[] {
    return defs.map((a) => {
      let type: TypeDescriptor;
      if (a.inlineSimpleType) type = this.describeSimpleType(a.inlineSimpleType);
      else if (a.typeName) type = this.describeTypeName(a.typeName);
      else type = builtinDescriptor('string');
      return {
        name: a.name,
        path: `${elementPath}@${a.name}`,
        type,
        required: a.use === 'required',
        fixed: a.fixed,
        default: a.default,
      };
    });
  }

  /**
   * Builds the node for one element declaration. References to global
   * elements take the referenced declaration with the referring occurrence.
   */
  elementNode(decl: ElementDef, parentPath: string): ElementNode {
    let el = decl;
    if (decl.ref) {
      const target = this.lookupElement(decl.ref);
      if (target) {
        el = { ...target, minOccurs: decl.minOccurs, maxOccurs: decl.maxOccurs };
      }
    }

    const path = parentPath ? `${parentPath}.${el.name}` : el.name;
    const occurs = toOccurs(el.minOccurs, el.maxOccurs);
    const ct = this.resolveComplexTypeForElement(el);
    const cycleKey = `${el.name}|${this.typeIdentity(el, ct)}`;
    const common = { name: el.name, path, occurs, cycleKey, fixed: el.fixed, default: el.default };

    if (!ct) {
      let type: TypeDescriptor;
      if (el.inlineSimpleType) type = this.describeSimpleType(el.inlineSimpleType);
      else if (el.typeName) type = this.describeTypeName(el.typeName);
      else type = builtinDescriptor('anyType');
      return { kind: 'simple', ...common, type, attributes: [] };
    }

    const attributes = this.attributeNodes(this.resolveAttributes(ct), path);

    if (this.hasSimpleContent(ct)) {
      return { kind: 'simple', ...common, type: this.describeComplexContent(ct), attributes };
    }

    const node: SequenceNode = {
      kind: 'sequence',
      ...common,
      attributes,
      expand: () => {
        const state: ExpandState = { choices: 0 };
        return this.resolveParticles(ct).flatMap((p) => this.particleNodes(p, path, state, true));
      },
    };
    return node;
  }

  /**
   * Converts a particle into nodes. A sequence/all that occurs exactly once
   * directly under an element dissolves into its parent; other groups keep
   * their own node so their occurrence bounds apply.
   */
  private particleNodes(p: Particle, path: string, state: ExpandState, topLevel: boolean): SchemaNode[] {
    if (p.kind === 'element') return [this.elementNode(p.element, path)];
    if (p.compositor === 'choice') return [this.choiceNode(p, path, state)];

    const children = p.particles.flatMap((c) => this.particleNodes(c, path, state, false));
    if (topLevel && p.minOccurs === 1 && p.maxOccurs === 1) return children;
    const group: GroupNode = { kind: 'group', path, occurs: toOccurs(p.minOccurs, p.maxOccurs), children };
    return [group];
  }

  private choiceNode(group: GroupParticle, path: string, state: ExpandState): ChoiceNode {
    state.choices += 1;
    const choicePath = state.choices === 1 ? path : `${path}#choice${state.choices}`;
    return {
      kind: 'choice',
      path: choicePath,
      occurs: toOccurs(group.minOccurs, group.maxOccurs),
      alternatives: group.particles.flatMap<SchemaNode>((p) => {
        if (p.kind === 'element') return [this.elementNode(p.element, path)];
        if (p.compositor === 'choice') return [this.choiceNode(p, path, state)];
        const children = p.particles.flatMap((c) => this.particleNodes(c, path, state, false));
        const alternative: GroupNode = {
          kind: 'group',
          path,
          occurs: toOccurs(p.minOccurs, p.maxOccurs),
          children,
        };
        return [alternative];
      }),
    };
  }
}

/** Path of the element a choice sits in: the choice path without its `#choiceN` suffix. */
export function choiceOwnerPath(choicePath: string): string {
  return choicePath.replace(/#choice\d+$/, '');
}

/**
 * Name a choice selection refers to: the element's own name, or for a
 * group alternative the names of the elements it starts with.
 */
export function alternativeNames(node: SchemaNode): string[] {
  switch (node.kind) {
    case 'simple':
    case 'sequence':
      return [node.name];
    case 'choice':
      return node.alternatives.flatMap(alternativeNames);
    case 'group':
      return node.children.length > 0 ? alternativeNames(node.children[0]) : [];
  }
}
