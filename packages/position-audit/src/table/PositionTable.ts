import { isValid, parse, parseISO } from 'date-fns';
import { z } from 'zod';
import { AuditError, ErrorCode } from '@position-audit/shared';
import {
  COLUMN_FIELDS,
  POSITION_COLUMNS,
  PositionCell,
  PositionColumn,
  PositionRow,
  PositionTable,
  TRADE_COLUMNS,
  TradeColumn,
  TradeRow,
  TradeTable,
} from '../types';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const isKnownColumn = (name: string): name is PositionColumn =>
  (POSITION_COLUMNS as readonly string[]).includes(name);

// --- Cell coercion ---

/** Calendar day of a moment, read in UTC. */
const utcDay = (date: Date): Date =>
  new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));

/** Calendar day of a moment, read in the process's local time. */
const localDay = (date: Date): Date =>
  new Date(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()));

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:[T ]|$)/;
const EXPLICIT_OFFSET = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

// Two-digit years first: 'yyyy' would also accept "24" as the year 24.
const LOCAL_DATE_FORMATS = ['MM/dd/yy', 'MM/dd/yyyy', 'yyyy/MM/dd', 'd MMM yyyy', 'MMM d, yyyy'];
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Calendar day named by a date string.
 *
 * ISO text is read by `parseISO`: date-only and offset-free date-times are
 * local wall-clock values, so their local fields name the day; text with a
 * `Z` or numeric offset is an instant and is read in UTC. Other layouts are
 * tried against `LOCAL_DATE_FORMATS`.
 */
const parseDateText = (text: string): Date | null => {
  if (ISO_DATE.test(text)) {
    const parsed = parseISO(text);
    if (!isValid(parsed)) return null;
    return EXPLICIT_OFFSET.test(text.slice(10)) ? utcDay(parsed) : localDay(parsed);
  }
  for (const format of LOCAL_DATE_FORMATS) {
    const parsed = parse(text, format, REFERENCE_DATE);
    if (isValid(parsed)) return localDay(parsed);
  }
  return null;
};

/** Numbers, or numeric text carrying currency symbols, separators or spaces. */
const NumberCell = z.unknown().transform((value): number | null => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  const cleaned = value.replace(/[$,\s]/g, '');
  if (cleaned === '') return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
});

/**
 * Dates become UTC midnight of their calendar day. `Date` instances carry a
 * local day (`new Date(2024, 0, 2)`); epoch milliseconds are instants and are
 * read in UTC.
 */
const DateCell = z.unknown().transform((value): Date | null => {
  if (value instanceof Date) return isValid(value) ? localDay(value) : null;
  if (typeof value === 'number' && Number.isFinite(value)) return utcDay(new Date(value));
  if (typeof value === 'string' && value.trim() !== '') return parseDateText(value.trim());
  return null;
});

/** Blank text is kept: the completeness detector reports it as missing. */
const TextCell = z.unknown().transform((value): string | null => {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
});

/** Percent text ("25%") stays textual; plain numeric text becomes a number. */
const WeightCell = z.unknown().transform((value): number | string | null => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string' || value.trim() === '') return null;
  if (value.includes('%')) return value.trim();

  const parsed = Number(value.replace(/[,\s]/g, ''));
  return Number.isFinite(parsed) ? parsed : null;
});

export const PositionRecordSchema = z
  .object({
    Date: DateCell,
    P_Ticker: TextCell,
    Price: NumberCell,
    'Close Quantity': NumberCell,
    'Open Quantity': NumberCell,
    'Exchange Rate': NumberCell,
    'Value in USD': NumberCell,
    'Closing Weights': WeightCell,
    'Trade Price': NumberCell,
    'Traded Today': NumberCell,
    Currency: TextCell,
    Country: TextCell,
    Sector: TextCell,
    Industry: TextCell,
    Short_Name: TextCell,
    Side: TextCell,
    'Trade Weight': NumberCell,
  })
  .transform(
    (raw): PositionRow => ({
      date: raw.Date,
      ticker: raw.P_Ticker,
      price: raw.Price,
      closeQuantity: raw['Close Quantity'],
      openQuantity: raw['Open Quantity'],
      exchangeRate: raw['Exchange Rate'],
      valueUsd: raw['Value in USD'],
      closingWeight: raw['Closing Weights'],
      tradePrice: raw['Trade Price'],
      tradedToday: raw['Traded Today'],
      currency: raw.Currency,
      country: raw.Country,
      sector: raw.Sector,
      industry: raw.Industry,
      shortName: raw.Short_Name,
      side: raw.Side,
      tradeWeight: raw['Trade Weight'],
    }),
  );

const RawRecordSchema = z.record(z.string(), z.unknown());

/**
 * Build an immutable position table from loosely typed records.
 *
 * Column names are trimmed and matched exactly; unrecognised columns are
 * dropped. Values that cannot be coerced become `null`.
 */
export function createPositionTable(records: readonly unknown[]): PositionTable {
  const columns = new Set<PositionColumn>();

  const rows = records.map((record, index) => {
    const parsed = RawRecordSchema.safeParse(record);
    if (!parsed.success || record instanceof Date || Array.isArray(record)) {
      throw new AuditError(ErrorCode.MALFORMED_INPUT, `Row ${index} is not a record`, {
        index,
      });
    }

    const trimmed: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(parsed.data)) {
      const name = key.trim();
      if (!isKnownColumn(name)) continue;
      columns.add(name);
      trimmed[name] = value;
    }
    return Object.freeze(PositionRecordSchema.parse(trimmed));
  });

  return Object.freeze({ columns, rows: Object.freeze(rows) });
}

/**
 * Trades are the position rows where `Traded Today` is known and non-zero.
 */
export function extractTrades(positions: PositionTable): TradeTable {
  if (!positions.columns.has('Traded Today')) {
    return Object.freeze({ columns: new Set<TradeColumn>(), rows: Object.freeze([]) });
  }

  const columns = new Set<TradeColumn>(
    TRADE_COLUMNS.filter((column) => positions.columns.has(column)),
  );
  const rows = positions.rows.flatMap((row): TradeRow[] =>
    row.tradedToday !== null && row.tradedToday !== 0
      ? [
          Object.freeze({
            date: row.date,
            ticker: row.ticker,
            tradedToday: row.tradedToday,
            tradePrice: row.tradePrice,
            tradeWeight: row.tradeWeight,
            side: row.side,
            currency: row.currency,
          }),
        ]
      : [],
  );

  return Object.freeze({ columns, rows: Object.freeze(rows) });
}

// --- Access helpers used by the detectors ---

export const hasColumns = (
  table: PositionTable,
  required: readonly PositionColumn[],
): boolean => required.every((column) => table.columns.has(column));

export const cellOf = (row: PositionRow, column: PositionColumn): PositionCell =>
  row[COLUMN_FIELDS[column]];

/** Whole calendar days from `from` to `to`, or null when either is unknown. */
export const daysBetween = (from: Date | null, to: Date | null): number | null => {
  if (from === null || to === null) return null;
  return Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY);
};

export const dayKey = (date: Date): string => date.toISOString().slice(0, 10);
