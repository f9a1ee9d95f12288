import { createPositionTable } from '../../src/table/PositionTable';
import { PositionTable } from '../../src/types';

export type RawRecord = { [column: string]: unknown };

/** ISO date for day `n` of January 2024. */
export const jan = (n: number): string => `2024-01-${String(n).padStart(2, '0')}`;

export const table = (...records: RawRecord[]): PositionTable => createPositionTable(records);

/**
 * A fully consistent holding: value = quantity x price x rate, no trade.
 */
export const holding = (ticker: string, day: number, overrides: RawRecord = {}): RawRecord => ({
  Date: jan(day),
  P_Ticker: ticker,
  Price: 100,
  'Close Quantity': 10,
  'Open Quantity': 10,
  'Traded Today': 0,
  'Exchange Rate': 1,
  'Value in USD': 1000,
  Currency: 'USD',
  ...overrides,
});
