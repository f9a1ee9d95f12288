import { cellOf } from '../table/PositionTable';
import {
  Detector,
  Finding,
  FindingType,
  PositionCell,
  PositionColumn,
  PositionRow,
  PositionTable,
  Severity,
  TradeTable,
} from '../types';

interface CompletenessRule {
  readonly column: PositionColumn;
  /** Whether a numeric zero is an acceptable value. */
  readonly zeroAllowed: boolean;
  readonly severity: Severity;
}

// Currency is text, so the zero check does not apply to it.
export const COMPLETENESS_RULES: readonly CompletenessRule[] = [
  { column: 'P_Ticker', zeroAllowed: false, severity: Severity.High },
  { column: 'Date', zeroAllowed: false, severity: Severity.High },
  { column: 'Price', zeroAllowed: false, severity: Severity.High },
  { column: 'Exchange Rate', zeroAllowed: false, severity: Severity.High },
  { column: 'Close Quantity', zeroAllowed: true, severity: Severity.High },
  { column: 'Currency', zeroAllowed: true, severity: Severity.Medium },
];

const isMissing = (value: PositionCell): boolean => {
  if (value === null) return true;
  if (value instanceof Date) return Number.isNaN(value.getTime());
  return String(value).trim() === '';
};

const isNumericZero = (value: PositionCell): boolean => {
  if (typeof value === 'number') return value === 0;
  if (typeof value === 'string' && value.trim() !== '') return Number(value.trim()) === 0;
  return false;
};

const tickerOf = (row: PositionRow): string =>
  row.ticker !== null && row.ticker.trim() !== '' ? row.ticker : 'UNKNOWN';

/**
 * Flags missing or invalid values in the columns every other check relies on.
 *
 * Runs ahead of the statistical detectors, which skip unknown values rather
 * than report them. Columns absent from the table cannot be checked row by
 * row and are skipped.
 */
export class CompletenessDetector implements Detector {
  readonly name = 'completeness';
  readonly requiredColumns: readonly PositionColumn[] = [];

  evaluate(positions: PositionTable, _trades: TradeTable): Finding[] {
    return COMPLETENESS_RULES.filter((rule) => positions.columns.has(rule.column)).flatMap(
      (rule) => [...this.missingValues(positions, rule), ...this.invalidZeros(positions, rule)],
    );
  }

  private missingValues(positions: PositionTable, rule: CompletenessRule): Finding[] {
    return positions.rows
      .filter((row) => isMissing(cellOf(row, rule.column)))
      .map((row) => ({
        date: row.date,
        ticker: tickerOf(row),
        errorType: FindingType.MissingData,
        description: `Missing value for critical column: '${rule.column}'`,
        severity: rule.severity,
      }));
  }

  private invalidZeros(positions: PositionTable, rule: CompletenessRule): Finding[] {
    if (rule.zeroAllowed) return [];

    return positions.rows
      .filter((row) => isNumericZero(cellOf(row, rule.column)))
      .map((row) => ({
        date: row.date,
        ticker: tickerOf(row),
        errorType: FindingType.InvalidData,
        description: `Invalid zero value for column: '${rule.column}'`,
        severity: rule.severity,
      }));
  }
}
