import type { ConstraintSet } from '../constraints/extractor.js';
import type { GeneratedValue } from '../types.js';
import type { GeneratorContext, TypeGenerator } from './base.js';

/** Always the canonical lower-case form, taken from `settings.booleanDefault`. */
export class BooleanGenerator implements TypeGenerator {
  readonly name = 'boolean';

  generate(_elementName: string, _constraints: ConstraintSet, context: GeneratorContext): GeneratedValue {
    return { kind: 'boolean', value: context.settings.booleanDefault };
  }
}
