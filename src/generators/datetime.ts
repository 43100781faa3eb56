import type { ConstraintSet } from '../constraints/extractor.js';
import type { GeneratedValue, TemporalKind } from '../types.js';
import { conformToPattern, hintFor, type GeneratorContext, type TypeGenerator } from './base.js';

const LITERALS: Record<TemporalKind, string> = {
  date: '2024-06-08',
  time: '12:00:00',
  dateTime: '2024-06-08T12:00:00Z',
  duration: 'PT1H30M',
  yearMonthDuration: 'P1Y2M',
  gYear: '2024',
  gYearMonth: '2024-06',
};

const TZ = '(Z|[+-]\\d{2}:\\d{2})?';

const LEXICAL: Record<TemporalKind, RegExp> = {
  date: new RegExp(`^-?\\d{4,}-\\d{2}-\\d{2}${TZ}$`),
  time: new RegExp(`^\\d{2}:\\d{2}:\\d{2}(\\.\\d+)?${TZ}$`),
  dateTime: new RegExp(`^-?\\d{4,}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}(\\.\\d+)?${TZ}$`),
  duration: /^-?P(?=\d|T\d)(\d+Y)?(\d+M)?(\d+D)?(T(?=\d)(\d+H)?(\d+M)?(\d+(\.\d+)?S)?)?$/,
  yearMonthDuration: /^-?P(?=\d)(\d+Y)?(\d+M)?$/,
  gYear: new RegExp(`^-?\\d{4,}${TZ}$`),
  gYearMonth: new RegExp(`^-?\\d{4,}-\\d{2}${TZ}$`),
};

// Name fragments → value, per kind. Checked in order.
const NAME_HINTS: Partial<Record<TemporalKind, ReadonlyArray<readonly [string, string]>>> = {
  date: [
    ['birth', '1985-04-12'],
    ['expir', '2027-06-30'],
    ['arrival', '2024-06-09'],
    ['departure', '2024-06-08'],
  ],
  dateTime: [
    ['timestamp', '2024-06-08T12:00:00.000Z'],
    ['arrival', '2024-06-09T08:30:00Z'],
    ['departure', '2024-06-08T21:15:00Z'],
  ],
  time: [
    ['arrival', '08:30:00'],
    ['departure', '21:15:00'],
  ],
};

/** True when `value` is a well-formed lexical literal of the given kind. */
export function isTemporalLiteral(kind: TemporalKind, value: string): boolean {
  return LEXICAL[kind].test(value);
}

export class DateTimeGenerator implements TypeGenerator {
  readonly name: string;

  constructor(private readonly temporalKind: TemporalKind) {
    this.name = temporalKind;
  }

  generate(elementName: string, constraints: ConstraintSet, context: GeneratorContext): GeneratedValue {
    const kind = this.temporalKind;
    const hinted = hintFor(elementName, NAME_HINTS[kind] ?? []);
    let value = hinted !== undefined && isTemporalLiteral(kind, hinted) ? hinted : LITERALS[kind];
    value = conformToPattern(value, constraints, context);
    return { kind: 'temporal', temporalKind: kind, value };
  }
}
