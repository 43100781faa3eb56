import type { ConstraintSet } from '../constraints/extractor.js';
import type { GeneratedValue } from '../types.js';
import { conformToPattern, type GeneratorContext, type TypeGenerator } from './base.js';
import { applyLengthConstraints } from './string.js';

/**
 * Per-run counters that make identifiers unique within one document, plus
 * the IDs handed out so far for references to point at.
 */
export class IdentifierSequence {
  private readonly counters = new Map<string, number>();
  private readonly issuedIds: string[] = [];
  private cursor = 0;

  next(prefix: string): number {
    const n = (this.counters.get(prefix) ?? 0) + 1;
    this.counters.set(prefix, n);
    return n;
  }

  record(id: string): void {
    this.issuedIds.push(id);
  }

  get issued(): readonly string[] {
    return this.issuedIds;
  }

  /** Next issued ID in rotation, or undefined before any was issued. */
  nextReference(): string | undefined {
    if (this.issuedIds.length === 0) return undefined;
    const id = this.issuedIds[this.cursor % this.issuedIds.length];
    this.cursor += 1;
    return id;
  }

  reset(): void {
    this.counters.clear();
    this.issuedIds.length = 0;
    this.cursor = 0;
  }
}

/** Element name reduced to the characters an NCName may contain. */
export function identifierStem(elementName: string): string {
  const body = elementName.replace(/[^A-Za-z0-9_.-]/g, '_');
  if (body === '') return 'ID';
  return /^[A-Za-z_]/.test(body) ? body : `_${body}`;
}

function freshIdentifier(elementName: string, constraints: ConstraintSet, context: GeneratorContext): string {
  const stem = identifierStem(elementName);
  const value = `${stem}_${context.identifiers.next(stem)}`;
  return conformToPattern(applyLengthConstraints(value, constraints), constraints, context);
}

/** xs:ID and its restrictions: `<stem>_<n>`, numbered per stem. */
export class IdentifierGenerator implements TypeGenerator {
  readonly name = 'identifier';

  generate(elementName: string, constraints: ConstraintSet, context: GeneratorContext): GeneratedValue {
    const value = freshIdentifier(elementName, constraints, context);
    context.identifiers.record(value);
    return { kind: 'text', value };
  }
}

/**
 * xs:IDREF and xs:IDREFS: points at an ID issued earlier in the document.
 * With nothing issued yet, or no issued ID fitting the reference's own
 * facets, a fresh identifier stands in.
 */
export class ReferenceGenerator implements TypeGenerator {
  readonly name = 'reference';

  generate(elementName: string, constraints: ConstraintSet, context: GeneratorContext): GeneratedValue {
    const { identifiers, patterns } = context;
    for (let tried = 0; tried < identifiers.issued.length; tried++) {
      const id = identifiers.nextReference();
      if (id === undefined) break;
      const fits =
        applyLengthConstraints(id, constraints) === id &&
        (constraints.pattern === undefined || patterns.isCompliant(id, constraints.pattern));
      if (fits) return { kind: 'text', value: id };
    }
    return { kind: 'text', value: freshIdentifier(elementName, constraints, context) };
  }
}
