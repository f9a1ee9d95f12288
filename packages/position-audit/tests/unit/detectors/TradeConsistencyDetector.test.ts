import {
  classifyTradeDeviation,
  TradeConsistencyDetector,
} from '../../../src/detectors/TradeConsistencyDetector';
import { extractTrades } from '../../../src/table/PositionTable';
import { FindingType, PositionTable, Severity } from '../../../src/types';
import { holding, jan, table } from '../../fixtures/positions';

const trade = (ticker: string, tradePrice: number | null, traded: number | null = 5) =>
  holding(ticker, 2, { 'Trade Price': tradePrice, 'Traded Today': traded });

describe('TradeConsistencyDetector', () => {
  const detector = new TradeConsistencyDetector();
  const evaluate = (positions: PositionTable) =>
    detector.evaluate(positions, extractTrades(positions));

  it('flags a trade far from the market price', () => {
    const findings = evaluate(table(trade('AAPL', 125), trade('MSFT', 100), trade('NVDA', 101)));

    expect(findings).toEqual([
      {
        date: new Date(jan(2)),
        ticker: 'AAPL',
        errorType: FindingType.TradeConsistency,
        description:
          'Price Mismatch: Trade Price 125.00 vs Market Price 100.00. Diff: 25.0% (Z=1.2). ' +
          'Flagged due to: Absolute Diff > 20% (25.0%)',
        severity: Severity.High,
      },
    ]);
  });

  it('grades a 15% deviation as Medium and a 10% deviation as Low', () => {
    const [medium] = evaluate(table(trade('AAPL', 115)));
    const [low] = evaluate(table(trade('AAPL', 110)));

    expect(medium.severity).toBe(Severity.Medium);
    expect(medium.description).toBe(
      'Price Mismatch: Trade Price 115.00 vs Market Price 100.00. Diff: 15.0% (Z=0.0). ' +
        'Flagged due to: Absolute Diff > 10% (15.0%)',
    );
    expect(low.severity).toBe(Severity.Low);
    expect(low.description).toBe(
      'Price Mismatch: Trade Price 110.00 vs Market Price 100.00. Diff: 10.0% (Z=0.0). ' +
        'Flagged due to: Absolute Diff > 5% (10.0%)',
    );
  });

  it('never flags a deviation of 5% or less', () => {
    expect(evaluate(table(trade('AAPL', 105), trade('MSFT', 95)))).toEqual([]);
  });

  it('ignores rows without a trade or without prices', () => {
    expect(
      evaluate(table(trade('AAPL', 200, 0), trade('MSFT', 200, null), trade('NVDA', null), trade('TSLA', 0))),
    ).toEqual([]);
  });

  describe('classifyTradeDeviation', () => {
    it('requires the materiality floor for every tier', () => {
      expect(classifyTradeDeviation(0.04, 10)).toBeNull();
    });

    it('combines z-score and deviation', () => {
      expect(classifyTradeDeviation(0.06, 5.5)).toBe(Severity.High);
      expect(classifyTradeDeviation(0.06, 3.5)).toBe(Severity.Medium);
      expect(classifyTradeDeviation(0.06, 0)).toBe(Severity.Low);
      expect(classifyTradeDeviation(0.21, 0)).toBe(Severity.High);
      expect(classifyTradeDeviation(0.11, 0)).toBe(Severity.Medium);
    });
  });
});
