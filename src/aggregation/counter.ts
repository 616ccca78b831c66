/**
 * Insertion-ordered tally. Ties in {@link mostCommon} keep first-seen order.
 */
export class Counter<K extends string = string> {
  private readonly counts = new Map<K, number>();

  increment(key: K, by = 1): void {
    this.counts.set(key, (this.counts.get(key) ?? 0) + by);
  }

  get(key: K): number {
    return this.counts.get(key) ?? 0;
  }

  get size(): number {
    return this.counts.size;
  }

  total(): number {
    let sum = 0;
    for (const count of this.counts.values()) {
      sum += count;
    }
    return sum;
  }

  mostCommon(limit?: number): Array<[K, number]> {
    const ranked = [...this.counts.entries()].sort(([, left], [, right]) => right - left);
    return limit === undefined ? ranked : ranked.slice(0, limit);
  }

  entries(): Array<[K, number]> {
    return [...this.counts.entries()];
  }
}

export const toRecord = <K extends string, V>(entries: Iterable<[K, V]>): Partial<Record<K, V>> => {
  const record: Partial<Record<K, V>> = {};
  for (const [key, value] of entries) {
    record[key] = value;
  }
  return record;
};

/** Groups values by key, keeping first-seen key order. */
export function groupBy<T>(values: Iterable<T>, keyOf: (value: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const value of values) {
    const key = keyOf(value);
    const group = groups.get(key);
    if (group) {
      group.push(value);
    } else {
      groups.set(key, [value]);
    }
  }
  return groups;
}
