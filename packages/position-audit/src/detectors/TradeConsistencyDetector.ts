import { zScores } from '@position-audit/shared';
import { hasColumns } from '../table/PositionTable';
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
import { formatPercent, joinReasons } from './format';

const MATERIALITY_FLOOR = 0.05;

interface PricedTrade {
  readonly row: PositionRow;
  readonly tradePrice: number;
  readonly marketPrice: number;
  readonly pct: number;
}

const toPricedTrade = (row: PositionRow): PricedTrade | null => {
  const { tradedToday, tradePrice, price } = row;
  if (tradedToday === null || Math.abs(tradedToday) <= 0) return null;
  if (tradePrice === null || tradePrice === 0 || price === null || price === 0) return null;

  return {
    row,
    tradePrice,
    marketPrice: price,
    pct: Math.abs(tradePrice - price) / Math.abs(price),
  };
};

/**
 * Grades a trade/market deviation. A z-score alone never flags a row: every
 * tier also needs the deviation to clear the 5% floor.
 */
export function classifyTradeDeviation(pct: number, z: number): Severity | null {
  if ((z > 5 && pct > MATERIALITY_FLOOR) || pct > 0.2) return Severity.High;
  if ((z > 3 && pct > MATERIALITY_FLOOR) || pct > 0.1) return Severity.Medium;
  if ((z > 2 && pct > MATERIALITY_FLOOR) || pct > MATERIALITY_FLOOR) return Severity.Low;
  return null;
}

/**
 * Compares the executed trade price with the day's market price on every row
 * where a trade happened.
 */
export class TradeConsistencyDetector implements Detector {
  readonly name = 'trade_consistency';
  readonly requiredColumns: readonly PositionColumn[] = [
    'Date',
    'P_Ticker',
    'Price',
    'Trade Price',
    'Traded Today',
  ];

  evaluate(positions: PositionTable, _trades: TradeTable): Finding[] {
    if (!hasColumns(positions, this.requiredColumns)) return [];

    const trades = positions.rows.flatMap((row) => {
      const trade = toPricedTrade(row);
      return trade === null ? [] : [trade];
    });
    const zs = zScores(trades.map((trade) => trade.pct));

    return trades.flatMap((trade, i): Finding[] => {
      const z = Math.abs(zs[i] ?? 0);
      const severity = classifyTradeDeviation(trade.pct, z);
      if (severity === null) return [];

      const reasons: string[] = [];
      if (trade.pct > 0.2) {
        reasons.push(`Absolute Diff > 20% (${formatPercent(trade.pct)})`);
      } else if (trade.pct > 0.1) {
        reasons.push(`Absolute Diff > 10% (${formatPercent(trade.pct)})`);
      } else {
        reasons.push(`Absolute Diff > 5% (${formatPercent(trade.pct)})`);
      }
      if (z > 5) {
        reasons.push(`Extreme Statistical Outlier (Z=${z.toFixed(1)} > 5)`);
      } else if (z > 3) {
        reasons.push(`Statistical Outlier (Z=${z.toFixed(1)} > 3)`);
      }

      return [
        {
          date: trade.row.date,
          ticker: trade.row.ticker ?? 'UNKNOWN',
          errorType: FindingType.TradeConsistency,
          description:
            `Price Mismatch: Trade Price ${trade.tradePrice.toFixed(2)} vs Market Price ${trade.marketPrice.toFixed(2)}. ` +
            `Diff: ${formatPercent(trade.pct)} (Z=${z.toFixed(1)}). Flagged due to: ${joinReasons(reasons)}`,
          severity,
        },
      ];
    });
  }
}
