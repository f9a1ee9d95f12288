import { median, zScores } from '@position-audit/shared';
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
import { formatPercent, joinReasons } from './format';

/** Median daily weight sum above which weights are read as 0-100 percentages. */
const PERCENT_SCALE_THRESHOLD = 10;

const parseWeightText = (value: string): number | null => {
  const cleaned = value.replace(/[%,]/g, '').trim();
  if (cleaned === '') return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
};

/**
 * Reported weights as fractions of NAV.
 *
 * Textual weights ("25%") are parsed and divided by 100. Independently, if
 * the median per-date sum of weights is above 10 the whole column is taken to
 * be on a 0-100 scale and divided by 100 again. This is a heuristic: sparse
 * data whose daily sums happen to sit near 10 can be misread.
 */
export function normalizeWeights(rows: readonly DatedRow[]): (number | null)[] {
  const textual = rows.some((row) => typeof row.closingWeight === 'string');
  const weights = rows.map((row): number | null => {
    const raw = row.closingWeight;
    if (raw === null) return null;
    if (!textual) return typeof raw === 'number' ? raw : null;

    const parsed = typeof raw === 'string' ? parseWeightText(raw) : raw;
    return parsed === null ? null : parsed / 100;
  });

  const dailySums = groupBy(
    rows.map((row, i) => ({ day: dayKey(row.date), weight: weights[i] })),
    (entry) => entry.day,
  ).map(([, entries]) => entries.reduce((sum, entry) => sum + (entry.weight ?? 0), 0));

  const medianSum = median(dailySums);
  if (medianSum !== null && medianSum > PERCENT_SCALE_THRESHOLD) {
    return weights.map((weight) => (weight === null ? null : weight / 100));
  }
  return weights;
}

const classify = (diff: number, z: number): Severity => {
  if (z > 5 || diff > 0.05) return Severity.High;
  if (z > 3 || diff > 0.01) return Severity.Medium;
  return Severity.Low;
};

/**
 * Compares each reported closing weight with the weight implied by its USD
 * value against the day's total.
 */
export class WeightDetector implements Detector {
  readonly name = 'weight';
  readonly requiredColumns: readonly PositionColumn[] = [
    'Date',
    'Value in USD',
    'Closing Weights',
    'P_Ticker',
  ];

  evaluate(positions: PositionTable, _trades: TradeTable): Finding[] {
    if (!hasColumns(positions, this.requiredColumns)) return [];

    const rows = positions.rows.filter(isDated);
    const reported = normalizeWeights(rows);

    const dailyTotals = new Map<string, number>();
    for (const row of rows) {
      const day = dayKey(row.date);
      dailyTotals.set(day, (dailyTotals.get(day) ?? 0) + (row.valueUsd ?? 0));
    }

    const implied = rows.map((row): number | null => {
      if (row.valueUsd === null) return null;
      const total = dailyTotals.get(dayKey(row.date)) ?? 0;
      return row.valueUsd / (total === 0 ? 1 : total);
    });
    const diffs = rows.map((_, i): number | null => {
      const weight = reported[i];
      const impliedWeight = implied[i];
      return weight === null || impliedWeight === null ? null : impliedWeight - weight;
    });
    const zs = zScores(diffs);

    return rows.flatMap((row, i): Finding[] => {
      const weight = reported[i];
      const impliedWeight = implied[i];
      const signedDiff = diffs[i];
      if (row.valueUsd === 0 || weight === null || impliedWeight === null || signedDiff === null) {
        return [];
      }

      const diff = Math.abs(signedDiff);
      const z = Math.abs(zs[i] ?? 0);
      if (!(z > 3 || diff > 0.001)) return [];

      const reasons: string[] = [];
      if (diff > 0.05) {
        reasons.push(`Absolute Diff > 5% (${formatPercent(diff)})`);
      } else if (diff > 0.01) {
        reasons.push(`Absolute Diff > 1% (${formatPercent(diff)})`);
      } else if (diff > 0.001) {
        reasons.push(`Absolute Diff > 0.1% (${formatPercent(diff, 2)})`);
      }
      if (z > 5) {
        reasons.push(`Extreme Statistical Outlier (Z=${z.toFixed(1)} > 5)`);
      } else if (z > 3) {
        reasons.push(`Statistical Outlier (Z=${z.toFixed(1)} > 3)`);
      }

      return [
        {
          date: row.date,
          ticker: row.ticker ?? 'UNKNOWN',
          errorType: FindingType.WeightMismatch,
          description: `Reported Weight ${formatPercent(weight, 4)} vs Implied ${formatPercent(impliedWeight, 4)}. Flagged due to: ${joinReasons(reasons)}`,
          severity: classify(diff, z),
        },
      ];
    });
  }
}
