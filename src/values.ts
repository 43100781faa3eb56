import type { GeneratedValue } from './types.js';

/** Expands exponent notation such as `1e-7` into plain digits. */
export function plainNumber(n: number): string {
  const text = String(n);
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;
  const [, sign, whole, fraction = '', exponent] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/** Lexical form of a generated value as it appears in the document. */
export function toLexical(value: GeneratedValue): string {
  switch (value.kind) {
    case 'integer':
      return plainNumber(Math.trunc(value.value));
    case 'decimal':
      return plainNumber(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'text':
    case 'temporal':
    case 'binary':
      return value.value;
  }
}
