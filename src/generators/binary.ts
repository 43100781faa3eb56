import type { ConstraintSet } from '../constraints/extractor.js';
import type { GeneratedValue } from '../types.js';
import type { GeneratorContext, TypeGenerator } from './base.js';

export type BinaryEncoding = 'base64' | 'hex';

const MAX_NATURAL_BYTES = 12;

/** `count` bytes cycling through the UTF-8 bytes of the seed text. */
function syntheticBytes(seedText: string, count: number): Buffer {
  const source = Buffer.from(seedText || 'sample', 'utf8');
  const out = Buffer.alloc(count);
  for (let i = 0; i < count; i++) out[i] = source[i % source.length];
  return out;
}

function lengthBounds(c: ConstraintSet): [number, number] {
  const min = c.exactLength ?? c.minLength ?? 0;
  const max = c.exactLength ?? c.maxLength ?? Number.POSITIVE_INFINITY;
  return [min, max];
}

/**
 * base64Binary and hexBinary content derived from the element name.
 *
 * base64 length bounds count encoded characters; the output length is the
 * multiple of 4 nearest the natural length inside the bounds and never
 * carries `=` padding. hexBinary bounds count octets, as in XML Schema.
 */
export class BinaryGenerator implements TypeGenerator {
  readonly name: string;

  constructor(private readonly encoding: BinaryEncoding) {
    this.name = encoding === 'base64' ? 'base64Binary' : 'hexBinary';
  }

  generate(elementName: string, constraints: ConstraintSet, _context: GeneratorContext): GeneratedValue {
    const natural = Math.min(Math.max(Buffer.byteLength(elementName || 'sample', 'utf8'), 1), MAX_NATURAL_BYTES);
    const [min, max] = lengthBounds(constraints);

    if (this.encoding === 'hex') {
      const octets = Math.max(Math.min(Math.max(natural, min), max), 0);
      return { kind: 'binary', encoding: 'hex', value: syntheticBytes(elementName, octets).toString('hex').toUpperCase() };
    }

    const lo = Math.ceil(min / 4) * 4;
    const hi = Math.floor(max / 4) * 4;
    let chars = Math.ceil(natural / 3) * 4;
    if (lo <= hi) chars = Math.min(Math.max(chars, lo), hi);
    else chars = Math.max(hi, 4);
    const bytes = syntheticBytes(elementName, (chars / 4) * 3);
    return { kind: 'binary', encoding: 'base64', value: bytes.toString('base64') };
  }
}
