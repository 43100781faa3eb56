import type { ConstraintSet } from '../constraints/extractor.js';
import type { GeneratedValue } from '../types.js';
import { hintFor, type GeneratorContext, type TypeGenerator } from './base.js';

export const GENERIC_ENUM_VALUE = 'EnumValue';

// Used when a type is enumerated but every declared value was unusable.
const NAME_HINTS: ReadonlyArray<readonly [string, string]> = [
  ['currency', 'USD'],
  ['country', 'US'],
  ['language', 'en'],
  ['status', 'Active'],
  ['gender', 'Unknown'],
  ['unit', 'EA'],
  ['type', 'Standard'],
];

function isUsable(value: string): boolean {
  return value.trim() !== '' && value !== 'None';
}

export class EnumerationGenerator implements TypeGenerator {
  readonly name = 'enumeration';

  generate(elementName: string, constraints: ConstraintSet, context: GeneratorContext): GeneratedValue {
    const values = constraints.enumValues.filter(isUsable);
    const picked = context.enumUsage.pickLeastUsed(elementName, values);
    if (picked !== undefined) return { kind: 'text', value: picked };

    context.diagnostics.enumerationFallbacks += 1;
    const value = hintFor(elementName, NAME_HINTS) ?? GENERIC_ENUM_VALUE;
    context.logger.debug('Enumeration has no usable values, using a name-based value', { elementName, value });
    return { kind: 'text', value };
  }
}
