import { zScores } from '@position-audit/shared';
import { hasColumns } from '../table/PositionTable';
import { groupBy, isKeyed, KeyedRow, sortByTickerAndDate } from '../table/grouping';
import {
  Detector,
  Finding,
  FindingType,
  PositionColumn,
  PositionTable,
  Severity,
  TradeTable,
} from '../types';
import { formatPercent, joinReasons } from './format';

const TOLERANCE = 1e-6;

interface QuantityBreak {
  readonly row: KeyedRow;
  readonly actual: number;
  readonly expected: number;
  readonly diff: number;
  readonly description: string;
}

/** Break size against the smaller of the two quantities, so 1 -> 100 and 100 -> 1 weigh the same. */
export const breakPercent = (diff: number, actual: number, expected: number): number => {
  const base = Math.min(Math.abs(actual), Math.abs(expected));
  return Math.abs(diff) / (base === 0 ? 1 : base);
};

export function classifyBreak(pctError: number, z: number): Severity {
  if (pctError > 10 || (z > 5 && pctError > 0.05)) return Severity.High;
  if (pctError > 0.3 || (z > 3 && pctError > 0.05)) return Severity.Medium;
  return Severity.Low;
}

const breakReasons = (pctError: number, z: number): string[] => {
  const reasons: string[] = [];
  if (pctError > 10) {
    reasons.push(`Massive Break > 1000% (${formatPercent(pctError)})`);
  } else if (pctError > 0.3) {
    reasons.push(`Significant Break > 30% (${formatPercent(pctError)})`);
  }
  if (z > 5) {
    reasons.push(`Extreme Statistical Outlier (Z=${z.toFixed(1)} > 5)`);
  } else if (z > 3) {
    reasons.push(`Statistical Outlier (Z=${z.toFixed(1)} > 3)`);
  }
  return reasons.length > 0 ? reasons : ['Minor Break'];
};

/**
 * Reconciles quantities with two accounting identities:
 *
 * - intra-day: Close = Open + Traded Today
 * - inter-day: Open(t) = Close(t-1), per ticker
 *
 * Unknown quantities are never read as zero; the identity is simply not
 * evaluated for that row. A row can break both identities.
 */
export class ReconciliationDetector implements Detector {
  readonly name = 'reconciliation';
  readonly requiredColumns: readonly PositionColumn[] = [
    'Date',
    'P_Ticker',
    'Close Quantity',
    'Open Quantity',
    'Traded Today',
  ];

  evaluate(positions: PositionTable, _trades: TradeTable): Finding[] {
    if (!hasColumns(positions, this.requiredColumns)) return [];

    const rows = sortByTickerAndDate(positions.rows.filter(isKeyed));
    return [
      ...this.report(this.intraDayBreaks(rows), FindingType.ReconciliationIntraDay),
      ...this.report(this.interDayBreaks(rows), FindingType.ReconciliationInterDay),
    ];
  }

  private intraDayBreaks(rows: readonly KeyedRow[]): QuantityBreak[] {
    return rows.flatMap((row): QuantityBreak[] => {
      const { openQuantity, tradedToday, closeQuantity } = row;
      if (openQuantity === null || tradedToday === null || closeQuantity === null) return [];

      const expected = openQuantity + tradedToday;
      const diff = closeQuantity - expected;
      if (Math.abs(diff) <= TOLERANCE) return [];

      return [
        {
          row,
          actual: closeQuantity,
          expected,
          diff,
          description: `Intra-day Mismatch: Open ${openQuantity.toFixed(2)} + Traded ${tradedToday.toFixed(2)} != Close ${closeQuantity.toFixed(2)}. Diff: ${diff.toFixed(2)}`,
        },
      ];
    });
  }

  private interDayBreaks(rows: readonly KeyedRow[]): QuantityBreak[] {
    return groupBy(rows, (row) => row.ticker).flatMap(([, history]) =>
      history.flatMap((row, i): QuantityBreak[] => {
        if (i === 0) return [];
        const previousClose = history[i - 1].closeQuantity;
        const { openQuantity } = row;
        if (openQuantity === null || previousClose === null) return [];

        const diff = openQuantity - previousClose;
        if (Math.abs(diff) <= TOLERANCE) return [];

        return [
          {
            row,
            actual: openQuantity,
            expected: previousClose,
            diff,
            description: `Inter-day Mismatch: Open ${openQuantity.toFixed(2)} != Prev Close ${previousClose.toFixed(2)}. Diff: ${diff.toFixed(2)}`,
          },
        ];
      }),
    );
  }

  private report(breaks: readonly QuantityBreak[], errorType: FindingType): Finding[] {
    const zs = zScores(
      breaks.map((b) => b.diff / (Math.abs(b.expected) === 0 ? 1 : Math.abs(b.expected))),
    );

    return breaks.map((b, i) => {
      const z = Math.abs(zs[i] ?? 0);
      const pctError = breakPercent(b.diff, b.actual, b.expected);
      return {
        date: b.row.date,
        ticker: b.row.ticker,
        errorType,
        description: `${b.description}. Flagged due to: ${joinReasons(breakReasons(pctError, z))}`,
        severity: classifyBreak(pctError, z),
      };
    });
  }
}
