import { mode } from '@position-audit/shared';
import { dayKey, hasColumns } from '../table/PositionTable';
import { DatedRow, groupBy, isDated } from '../table/grouping';
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

type RatedRow = DatedRow & { readonly exchangeRate: number; readonly currency: string };

const isRated = (row: DatedRow): row is RatedRow =>
  row.exchangeRate !== null &&
  row.exchangeRate !== 0 &&
  row.currency !== null &&
  row.currency.trim() !== '';

/**
 * Every holding in the same currency on the same day should use the same
 * exchange rate. The most common rate in a (day, currency) group is the
 * consensus; any other rate is at least Medium, and High beyond 1%.
 */
export class FxConsistencyDetector implements Detector {
  readonly name = 'fx_consistency';
  readonly requiredColumns: readonly PositionColumn[] = [
    'Date',
    'Currency',
    'Exchange Rate',
    'P_Ticker',
  ];

  evaluate(positions: PositionTable, _trades: TradeTable): Finding[] {
    if (!hasColumns(positions, this.requiredColumns)) return [];

    const rated = positions.rows.filter(isDated).filter(isRated);
    const groups = groupBy(rated, (row) => `${dayKey(row.date)}|${row.currency}`);

    return groups.flatMap(([, group]): Finding[] => {
      if (group.length < 2) return [];

      const rates = group.map((row) => row.exchangeRate);
      if (new Set(rates).size === 1) return [];
      const consensus = mode(rates);
      if (consensus === null) return [];

      return group
        .filter((row) => row.exchangeRate !== consensus)
        .map((row) => {
          const deviation = Math.abs(row.exchangeRate - consensus) / Math.abs(consensus);
          return {
            date: row.date,
            ticker: row.ticker ?? 'UNKNOWN',
            errorType: FindingType.FxInconsistency,
            description: `FX Rate ${row.exchangeRate} deviates from daily consensus ${consensus} for ${row.currency}. Deviation: ${formatPercent(deviation, 2)}`,
            severity: deviation > 0.01 ? Severity.High : Severity.Medium,
          };
        });
    });
  }
}
