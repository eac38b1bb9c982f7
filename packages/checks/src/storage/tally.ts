/** Outcome label -> count. Never mutated; `increment` returns a copy. */
export type Tally = ReadonlyMap<string, number>;

export const IGNORED = 'ignored';

/** Tally with every known key and the ignored bucket at zero */
export function createTally(keys: readonly string[]): Tally {
  return new Map([...keys, IGNORED].map((key): [string, number] => [key, 0]));
}

export function increment(tally: Tally, key: string): Tally {
  const next = new Map(tally);
  next.set(key, (tally.get(key) ?? 0) + 1);
  return next;
}

/** Non-zero entries sorted by key */
export function tallyEntries(tally: Tally): Array<[string, number]> {
  return [...tally.entries()]
    .filter(([, count]) => count > 0)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}
