/**
 * Reference to a type from an element, attribute or derivation.
 * `builtin` is true when the QName resolves into the XML Schema namespace.
 */
export interface TypeName {
  builtin: boolean;
  local: string;
}

/** Facet names collected from xs:restriction. */
export type FacetName =
  | 'pattern'
  | 'enumeration'
  | 'length'
  | 'minLength'
  | 'maxLength'
  | 'minInclusive'
  | 'maxInclusive'
  | 'minExclusive'
  | 'maxExclusive'
  | 'fractionDigits'
  | 'totalDigits'
  | 'whiteSpace';

/** One facet as declared; the value is kept verbatim. */
export interface FacetDef {
  name: FacetName;
  value: string | undefined;
}

/**
 * Represents a simple type definition (xs:simpleType), named or anonymous.
 */
export interface SimpleTypeDef {
  /** Empty for anonymous types declared inline. */
  name: string;
  variety: 'atomic' | 'list' | 'union';
  /** xs:restriction base, xs:list itemType or the first xs:union member. */
  base?: TypeName;
  /** Anonymous xs:simpleType nested in the restriction/list/union. */
  inlineBase?: SimpleTypeDef;
  facets: FacetDef[];
}

/**
 * Represents a single XSD attribute definition (xs:attribute).
 */
export interface AttributeDef {
  name: string;
  typeName?: TypeName;
  inlineSimpleType?: SimpleTypeDef;
  use: 'required' | 'optional' | 'prohibited';
  default?: string;
  fixed?: string;
}

/**
 * Represents an XSD element declaration (xs:element).
 */
export interface ElementDef {
  name: string;
  /** Target of `ref="..."` (local name of a global element). */
  ref?: string;
  /** Resolved type name (complexType or simpleType). Undefined for inline types. */
  typeName?: TypeName;
  /** Inline complex type definition when no type reference is used. */
  inlineComplexType?: ComplexTypeDef;
  /** Inline simple type definition when no type reference is used. */
  inlineSimpleType?: SimpleTypeDef;
  minOccurs: number;
  maxOccurs: number | 'unbounded';
  default?: string;
  fixed?: string;
}

/**
 * Compositor types supported.
 * - sequence: ordered list of particles
 * - all: any order, each 0 or 1 times (treated like sequence)
 * - choice: exactly one of the listed particles
 */
export type Compositor = 'sequence' | 'all' | 'choice';

export interface ElementParticle {
  kind: 'element';
  element: ElementDef;
}

export interface GroupParticle {
  kind: 'group';
  compositor: Compositor;
  minOccurs: number;
  maxOccurs: number | 'unbounded';
  particles: Particle[];
}

/** Content-model particle in declaration order. */
export type Particle = ElementParticle | GroupParticle;

/**
 * Represents a complex type definition (xs:complexType).
 */
export interface ComplexTypeDef {
  name: string;
  /** Top-level model group; undefined for empty or simple content. */
  content?: GroupParticle;
  attributes: AttributeDef[];
  /** Base type of xs:simpleContent (text content plus attributes). */
  simpleContentBase?: TypeName;
  /** Facets declared by an xs:simpleContent/xs:restriction. */
  simpleContentFacets?: FacetDef[];
  /** Base type name when using xs:complexContent/xs:extension or restriction. */
  extends?: TypeName;
  derivation?: 'extension' | 'restriction';
}

/**
 * The parsed and resolved internal schema model.
 */
export interface SchemaModel {
  /** Name of the root element (first xs:element at schema level). */
  rootElement: string;
  /** All top-level element definitions keyed by name. */
  elements: Map<string, ElementDef>;
  /** All named complex type definitions keyed by local name. */
  complexTypes: Map<string, ComplexTypeDef>;
  /** All named simple type definitions keyed by local name. */
  simpleTypes: Map<string, SimpleTypeDef>;
  /** xs:schema targetNamespace, if present. */
  targetNamespace?: string;
}
