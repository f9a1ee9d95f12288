import { zScores } from '@position-audit/shared';
import { daysBetween, hasColumns } from '../table/PositionTable';
import { groupBy, isKeyed, KeyedRow, sortByDate } from '../table/grouping';
import {
  Detector,
  Finding,
  FindingType,
  PositionColumn,
  PositionTable,
  Severity,
  TradeTable,
} from '../types';
import { formatPercent } from './format';

const Z_THRESHOLD = 3;
const Z_FLOOR = 0.05;
const OUTRIGHT_MOVE = 0.2;

/**
 * Compounded daily return implied between two observations:
 * (price / base)^(1 / days) - 1. Gaps of 0 days or an unknown gap count as 1.
 */
export function impliedDailyReturn(
  price: number | null,
  base: number | null,
  gapDays: number | null,
): number | null {
  if (price === null || base === null) return null;

  const days = gapDays === null || gapDays === 0 ? 1 : Math.abs(gapDays);
  const change = Math.pow(price / base, 1 / days) - 1;
  return Number.isFinite(change) ? change : null;
}

const isSignificant = (change: number, z: number | null): boolean =>
  (Math.abs(z ?? 0) > Z_THRESHOLD && Math.abs(change) > Z_FLOOR) ||
  Math.abs(change) > OUTRIGHT_MOVE;

const classify = (magnitude: number, z: number): Severity => {
  if ((z > 5 && magnitude > 0.1) || magnitude > 0.3) return Severity.High;
  if ((z > 3 && magnitude > 0.1) || magnitude > 0.15) return Severity.Medium;
  return Severity.Low;
};

/**
 * Flags isolated peaks and valleys in each ticker's price history.
 *
 * A row is a spike when its move from BOTH neighbours is significant and in
 * the same direction, so a sustained move is never flagged. The first and last
 * observation of a ticker have only one neighbour and are never flagged.
 */
export class PriceSpikeDetector implements Detector {
  readonly name = 'price_spike';
  readonly requiredColumns: readonly PositionColumn[] = ['P_Ticker', 'Date', 'Price'];

  evaluate(positions: PositionTable, _trades: TradeTable): Finding[] {
    if (!hasColumns(positions, this.requiredColumns)) return [];

    const keyed = positions.rows.filter(isKeyed);
    return groupBy(keyed, (row) => row.ticker).flatMap(([ticker, rows]) =>
      this.evaluateTicker(ticker, sortByDate(rows)),
    );
  }

  private evaluateTicker(ticker: string, rows: readonly KeyedRow[]): Finding[] {
    const previousReturns = rows.map((row, i) =>
      i === 0
        ? null
        : impliedDailyReturn(row.price, rows[i - 1].price, daysBetween(rows[i - 1].date, row.date)),
    );
    const nextReturns = rows.map((row, i) =>
      i === rows.length - 1
        ? null
        : impliedDailyReturn(row.price, rows[i + 1].price, daysBetween(row.date, rows[i + 1].date)),
    );
    const previousZ = zScores(previousReturns);
    const nextZ = zScores(nextReturns);

    return rows.flatMap((row, i): Finding[] => {
      const changePrev = previousReturns[i];
      const changeNext = nextReturns[i];
      if (changePrev === null || changeNext === null) return [];
      if (!isSignificant(changePrev, previousZ[i]) || !isSignificant(changeNext, nextZ[i])) {
        return [];
      }
      if (changePrev * changeNext <= 0) return [];

      const magnitude = (Math.abs(changePrev) + Math.abs(changeNext)) / 2;
      const z = (Math.abs(previousZ[i] ?? 0) + Math.abs(nextZ[i] ?? 0)) / 2;

      return [
        {
          date: row.date,
          ticker,
          errorType: FindingType.PriceSpike,
          description:
            `Price spike detected: ${row.price} (Prev: ${rows[i - 1].price}, Next: ${rows[i + 1].price}). ` +
            `Avg daily move ${formatPercent(magnitude)} (Z=${z.toFixed(1)})`,
          severity: classify(magnitude, z),
        },
      ];
    });
  }
}
