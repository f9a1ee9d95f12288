import { PositionRow } from '../types';

export type DatedRow = PositionRow & { readonly date: Date };
export type KeyedRow = DatedRow & { readonly ticker: string };

export const isDated = (row: PositionRow): row is DatedRow => row.date !== null;

export const isKeyed = (row: PositionRow): row is KeyedRow =>
  row.date !== null && row.ticker !== null;

const compareKeys = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Group items by key. Groups come back in ascending key order; items keep
 * their input order inside a group.
 */
export function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): [string, T[]][] {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return Array.from(groups.entries()).sort(([a], [b]) => compareKeys(a, b));
}

/** Stable chronological copy. */
export const sortByDate = <T extends DatedRow>(rows: readonly T[]): T[] =>
  [...rows].sort((a, b) => a.date.getTime() - b.date.getTime());

/** Stable copy ordered by ticker, then date. */
export const sortByTickerAndDate = (rows: readonly KeyedRow[]): KeyedRow[] =>
  [...rows].sort(
    (a, b) => compareKeys(a.ticker, b.ticker) || a.date.getTime() - b.date.getTime(),
  );
