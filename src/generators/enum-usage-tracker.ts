/**
 * Counts how often each enumeration value was emitted for an
 * `(element name, enumeration)` pair, so repeated elements cycle through the
 * allowed values instead of repeating the first one.
 *
 * One tracker belongs to one session and is reset at the start of every run.
 */
export class EnumUsageTracker {
  private readonly usage = new Map<string, Map<string, number>>();

  /**
   * Returns the least-used value for the key and records the use.
   * Ties go to the value declared first.
   */
  pickLeastUsed(elementName: string, values: readonly string[]): string | undefined {
    if (values.length === 0) return undefined;
    const key = `${elementName}\u0000${values.join('\u0001')}`;
    let counts = this.usage.get(key);
    if (!counts) {
      counts = new Map();
      this.usage.set(key, counts);
    }

    let best = values[0];
    let bestCount = counts.get(best) ?? 0;
    for (const value of values) {
      const count = counts.get(value) ?? 0;
      if (count < bestCount) {
        best = value;
        bestCount = count;
      }
    }
    counts.set(best, bestCount + 1);
    return best;
  }

  usageOf(elementName: string, values: readonly string[]): ReadonlyMap<string, number> {
    return this.usage.get(`${elementName}\u0000${values.join('\u0001')}`) ?? new Map();
  }

  reset(): void {
    this.usage.clear();
  }
}
