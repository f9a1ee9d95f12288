import { mode } from '@position-audit/shared';
import { hasColumns } from '../table/PositionTable';
import { groupBy } from '../table/grouping';
import {
  Detector,
  Finding,
  FindingType,
  PositionColumn,
  PositionRow,
  PositionTable,
  Severity,
  TradeTable,
} from '../types';

type StaticField = 'currency' | 'country' | 'sector' | 'industry' | 'shortName';

interface StaticRule {
  readonly column: PositionColumn;
  readonly field: StaticField;
  readonly severity: Severity;
}

export const STATIC_RULES: readonly StaticRule[] = [
  { column: 'Currency', field: 'currency', severity: Severity.High },
  { column: 'Country', field: 'country', severity: Severity.Medium },
  { column: 'Sector', field: 'sector', severity: Severity.Medium },
  { column: 'Industry', field: 'industry', severity: Severity.Medium },
  { column: 'Short_Name', field: 'shortName', severity: Severity.Low },
];

type TickerRow = PositionRow & { readonly ticker: string };

const hasTicker = (row: PositionRow): row is TickerRow => row.ticker !== null;

// Undated rows sort last.
const byDate = (a: PositionRow, b: PositionRow): number => {
  if (a.date === null || b.date === null) {
    return (a.date === null ? 1 : 0) - (b.date === null ? 1 : 0);
  }
  return a.date.getTime() - b.date.getTime();
};

const valueOf = (row: PositionRow, field: StaticField): string | null => {
  const value = row[field];
  return value === null || value.trim() === '' ? null : value;
};

/**
 * Reference attributes of a security should not change from day to day.
 * Each ticker's most common value for a field is its consensus; rows that
 * disagree are flagged in date order.
 */
export class StaticDataDetector implements Detector {
  readonly name = 'static_data';
  readonly requiredColumns: readonly PositionColumn[] = ['P_Ticker'];

  evaluate(positions: PositionTable, _trades: TradeTable): Finding[] {
    if (!hasColumns(positions, this.requiredColumns)) return [];

    const rules = STATIC_RULES.filter((rule) => positions.columns.has(rule.column));
    if (rules.length === 0) return [];

    return groupBy(positions.rows.filter(hasTicker), (row) => row.ticker).flatMap(
      ([ticker, group]) => {
        const history = [...group].sort(byDate);
        return rules.flatMap((rule) => this.checkField(ticker, history, rule));
      },
    );
  }

  private checkField(ticker: string, history: readonly TickerRow[], rule: StaticRule): Finding[] {
    const values = history.flatMap((row) => {
      const value = valueOf(row, rule.field);
      return value === null ? [] : [value];
    });
    if (new Set(values).size <= 1) return [];

    const consensus = mode(values);
    if (consensus === null) return [];

    return history.flatMap((row): Finding[] => {
      const value = valueOf(row, rule.field);
      if (value === null || value === consensus) return [];
      return [
        {
          date: row.date,
          ticker,
          errorType: FindingType.StaticDataInconsistency,
          description: `Static field '${rule.column}' changed. Found '${value}', expected consensus '${consensus}'.`,
          severity: rule.severity,
        },
      ];
    });
  }
}
