import { median, sampleStdDev, zScores } from '@position-audit/shared';
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
import { formatPercent, formatSignificant, formatSigned, joinReasons } from './format';

const ROUNDING_FLOOR = 1.0;
const MIN_THEORETICAL = 0.01;
const MIN_SYSTEMATIC_ROWS = 3;

export interface ValuationRow {
  readonly row: PositionRow;
  readonly ticker: string;
  readonly reported: number;
  readonly theoretical: number;
  readonly diff: number;
  readonly pctDiff: number;
  /** reported / theoretical, defined only when |theoretical| > 0.01 */
  readonly ratio: number | null;
}

export interface SystematicOffsets {
  readonly multipliers: ReadonlyMap<string, number>;
  readonly shifts: ReadonlyMap<string, number>;
}

const toValuation = (row: PositionRow): ValuationRow | null => {
  const { closeQuantity, price, exchangeRate, valueUsd, ticker } = row;
  if (
    closeQuantity === null ||
    price === null ||
    exchangeRate === null ||
    valueUsd === null ||
    ticker === null
  ) {
    return null;
  }

  const theoretical = closeQuantity * price * exchangeRate;
  const diff = valueUsd - theoretical;
  return {
    row,
    ticker,
    reported: valueUsd,
    theoretical,
    diff,
    pctDiff: diff / (theoretical === 0 ? 1 : theoretical),
    ratio: Math.abs(theoretical) > MIN_THEORETICAL ? valueUsd / theoretical : null,
  };
};

/**
 * Per-ticker offsets that are stable through time: a multiplier when the
 * reported/theoretical ratio barely moves, a shift when the dollar difference
 * barely moves. Tickers need at least three valid ratios.
 */
export function detectSystematicOffsets(rows: readonly ValuationRow[]): SystematicOffsets {
  const multipliers = new Map<string, number>();
  const shifts = new Map<string, number>();

  for (const [ticker, group] of groupBy(rows, (row) => row.ticker)) {
    const ratios = group.flatMap((row) => (row.ratio === null ? [] : [row.ratio]));
    if (ratios.length < MIN_SYSTEMATIC_ROWS) continue;

    const ratioMedian = median(ratios);
    const ratioSpread = sampleStdDev(ratios) ?? 0;
    if (ratioMedian !== null && ratioSpread < 0.2 && Math.abs(ratioMedian - 1) > 0.05) {
      multipliers.set(ticker, ratioMedian);
    }

    const diffs = group.flatMap((row) => (Math.abs(row.diff) > ROUNDING_FLOOR ? [row.diff] : []));
    const diffMedian = median(diffs);
    const diffSpread = sampleStdDev(diffs) ?? 0;
    if (
      diffMedian !== null &&
      Math.abs(diffMedian) > ROUNDING_FLOOR &&
      diffSpread / Math.abs(diffMedian) < 0.1
    ) {
      shifts.set(ticker, diffMedian);
    }
  }

  return { multipliers, shifts };
}

/**
 * Explanation for a reported value that is off by a recognisable factor or
 * offset. Checked in a fixed order: the ticker's systematic multiplier, its
 * systematic shift, then a whole-number or reciprocal multiplier.
 */
export function explainMismatch(
  valuation: ValuationRow,
  offsets: SystematicOffsets,
): string | null {
  const { ratio, diff, ticker } = valuation;
  if (ratio === null) return null;

  const systematicMultiplier = offsets.multipliers.get(ticker);
  if (systematicMultiplier !== undefined && Math.abs(ratio - systematicMultiplier) < 0.25) {
    return `Systematic Multiplier: x${systematicMultiplier.toFixed(2)}`;
  }

  const systematicShift = offsets.shifts.get(ticker);
  if (
    systematicShift !== undefined &&
    Math.abs(diff - systematicShift) / Math.abs(systematicShift) < 0.1
  ) {
    return `Systematic Shift: ${formatSigned(systematicShift)}`;
  }

  if (Math.abs(ratio) > 1.5) {
    const nearest = Math.round(ratio);
    return Math.abs(ratio - nearest) / Math.abs(nearest) < 0.05
      ? `Likely missing multiplier: x${nearest}`
      : null;
  }

  if (Math.abs(ratio) < 0.9) {
    if (Math.abs(ratio - 0.01) < 0.001) return 'Likely unit mismatch: x0.01';

    const reciprocal = ratio === 0 ? 0 : 1 / ratio;
    const nearest = Math.round(reciprocal);
    if (nearest !== 0 && Math.abs(reciprocal - nearest) / Math.abs(nearest) < 0.05) {
      return `Likely missing multiplier: x${formatSignificant(1 / nearest)} or 1/${nearest}`;
    }
  }

  return null;
}

/**
 * Relative size of a mismatch, measured against the larger of the reported
 * and theoretical magnitudes.
 */
export const mismatchPercent = (reported: number, theoretical: number): number => {
  const base = Math.max(Math.abs(reported), Math.abs(theoretical));
  return base === 0 ? 0 : Math.abs(reported - theoretical) / base;
};

/**
 * Checks Value in USD = Close Quantity x Price x Exchange Rate.
 *
 * Dollar differences under $1 are rounding. Mismatches explained by a
 * multiplier or shift are reported as Low; unexplained ones are graded on the
 * hybrid z-score / percentage scale, and opposite signs are always High.
 */
export class CalculationDetector implements Detector {
  readonly name = 'calculation';
  readonly requiredColumns: readonly PositionColumn[] = [
    'Close Quantity',
    'Price',
    'Exchange Rate',
    'Value in USD',
    'P_Ticker',
    'Date',
  ];

  evaluate(positions: PositionTable, _trades: TradeTable): Finding[] {
    if (!hasColumns(positions, this.requiredColumns)) return [];

    const valuations = positions.rows.flatMap((row) => {
      const valuation = toValuation(row);
      return valuation === null ? [] : [valuation];
    });
    const zs = zScores(valuations.map((valuation) => valuation.pctDiff));
    const offsets = detectSystematicOffsets(valuations);

    return valuations.flatMap((valuation, i): Finding[] => {
      if (Math.abs(valuation.diff) <= ROUNDING_FLOOR) return [];
      const finding = this.grade(valuation, Math.abs(zs[i] ?? 0), offsets);
      return finding === null ? [] : [finding];
    });
  }

  private grade(valuation: ValuationRow, z: number, offsets: SystematicOffsets): Finding | null {
    const { reported, theoretical, row, ticker } = valuation;
    const pct = mismatchPercent(reported, theoretical);
    const explanation = explainMismatch(valuation, offsets);

    const isOutlier = z > 3 && pct > 0.05;
    const isLarge = pct > 0.1;
    if (!(isOutlier || isLarge || explanation !== null)) return null;

    const reasons: string[] = [];
    // eslint-disable-next-line functional/no-let
    let severity: Severity;
    if (explanation !== null) {
      severity = Severity.Low;
      reasons.push(explanation);
    } else if (Math.abs(theoretical) < MIN_THEORETICAL) {
      // Theoretical value cannot be computed (zero price, quantity or rate)
      return null;
    } else if (reported * theoretical < 0) {
      severity = Severity.High;
      reasons.push('Sign Mismatch: Reported vs Calculated have opposite signs');
    } else if ((z > 5 && pct > 0.05) || pct > 0.3) {
      severity = Severity.High;
    } else if ((z > 3 && pct > 0.05) || pct > 0.15) {
      severity = Severity.Medium;
    } else {
      severity = Severity.Low;
    }

    if (pct > 0.3) {
      reasons.push(`Absolute Diff > 30% (${formatPercent(pct)})`);
    } else if (pct > 0.15) {
      reasons.push(`Absolute Diff > 15% (${formatPercent(pct)})`);
    } else if (pct > 0.1) {
      reasons.push(`Absolute Diff > 10% (${formatPercent(pct)})`);
    }

    if (z > 5) {
      reasons.push(`Extreme Statistical Outlier (Z=${z.toFixed(1)} > 5)`);
    } else if (z > 3) {
      reasons.push(`Statistical Outlier (Z=${z.toFixed(1)} > 3)`);
    }

    return {
      date: row.date,
      ticker,
      errorType: FindingType.CalculationError,
      description: `Value Mismatch: Reported ${reported.toFixed(2)} vs Calc ${theoretical.toFixed(2)}. Flagged due to: ${joinReasons(reasons)}`,
      severity,
    };
  }
}
