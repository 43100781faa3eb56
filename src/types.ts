import type { TypeDescriptor } from './xsd/descriptor.js';

// ---------------------------------------------------------------------------
// Traversal-time schema nodes
// ---------------------------------------------------------------------------

/** Occurrence bounds; `max` undefined means unbounded. */
export interface Occurs {
  min: number;
  max?: number;
}

export interface AttributeNode {
  name: string;
  /** `elementPath@name` */
  path: string;
  type: TypeDescriptor;
  required: boolean;
  fixed?: string;
  default?: string;
}

interface ElementNodeBase {
  name: string;
  /** Dot-joined element names from the root. */
  path: string;
  occurs: Occurs;
  attributes: readonly AttributeNode[];
  /** `(element name, type identity)` pair used by the cycle guard. */
  cycleKey: string;
  fixed?: string;
  default?: string;
}

/** Element with simple content (a text value, possibly with attributes). */
export interface SimpleNode extends ElementNodeBase {
  kind: 'simple';
  type: TypeDescriptor;
}

/** Element with element-only content; children are built on demand. */
export interface SequenceNode extends ElementNodeBase {
  kind: 'sequence';
  expand(): readonly SchemaNode[];
}

/** Mutually exclusive alternatives; exactly one is materialized. */
export interface ChoiceNode {
  kind: 'choice';
  path: string;
  occurs: Occurs;
  alternatives: readonly SchemaNode[];
}

/** Anonymous nested sequence/all group. */
export interface GroupNode {
  kind: 'group';
  path: string;
  occurs: Occurs;
  children: readonly SchemaNode[];
}

export type SchemaNode = SimpleNode | SequenceNode | ChoiceNode | GroupNode;
export type ElementNode = SimpleNode | SequenceNode;

// ---------------------------------------------------------------------------
// Generated values
// ---------------------------------------------------------------------------

export type TemporalKind =
  | 'date'
  | 'time'
  | 'dateTime'
  | 'duration'
  | 'yearMonthDuration'
  | 'gYear'
  | 'gYearMonth';

export type GeneratedValue =
  | { kind: 'integer'; value: number }
  | { kind: 'decimal'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'text'; value: string }
  | { kind: 'temporal'; temporalKind: TemporalKind; value: string }
  | { kind: 'binary'; encoding: 'base64' | 'hex'; value: string };

// ---------------------------------------------------------------------------
// Output tree handed to the serializer
// ---------------------------------------------------------------------------

export interface DocumentElement {
  kind: 'element';
  name: string;
  attributes: Record<string, string>;
  children: DocumentNode[];
  value?: GeneratedValue;
  /** Occurrence note rendered as a comment when comments are enabled. */
  annotation?: string;
}

/** Stands in for a subtree the cycle or depth guard cut off. */
export interface DocumentMarker {
  kind: 'marker';
  name: string;
  reason: 'cycle' | 'depth';
}

export type DocumentNode = DocumentElement | DocumentMarker;

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * - minimal: optional particles and attributes are left out
 * - complete: every optional particle and attribute is included
 * - custom: only optional particles listed in `optionalSelections`
 */
export type GenerationMode = 'minimal' | 'complete' | 'custom';

export type CustomScalar = string | number | boolean;
/** A list is consumed one entry per occurrence, wrapping around. */
export type CustomValue = CustomScalar | readonly CustomScalar[];
/** How a custom value list is consumed: in order, or drawn with the seeded RNG. */
export type CustomValueOrder = 'sequential' | 'random';

export interface Diagnostics {
  cycleGuardHits: number;
  depthGuardHits: number;
  patternFallbacks: number;
  enumerationFallbacks: number;
  elementsGenerated: number;
  valuesGenerated: number;
}
