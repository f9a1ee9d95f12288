import { FxConsistencyDetector } from '../../../src/detectors/FxConsistencyDetector';
import { extractTrades } from '../../../src/table/PositionTable';
import { FindingType, PositionTable, Severity } from '../../../src/types';
import { holding, jan, table } from '../../fixtures/positions';

const fx = (ticker: string, day: number, currency: string, rate: number | null) =>
  holding(ticker, day, { Currency: currency, 'Exchange Rate': rate });

describe('FxConsistencyDetector', () => {
  const detector = new FxConsistencyDetector();
  const evaluate = (positions: PositionTable) =>
    detector.evaluate(positions, extractTrades(positions));

  it('flags the rate that deviates from the daily consensus', () => {
    const findings = evaluate(
      table(fx('SAP', 2, 'EUR', 1.1), fx('SIE', 2, 'EUR', 1.1), fx('ASML', 2, 'EUR', 1.2)),
    );

    expect(findings).toEqual([
      {
        date: new Date(jan(2)),
        ticker: 'ASML',
        errorType: FindingType.FxInconsistency,
        description: 'FX Rate 1.2 deviates from daily consensus 1.1 for EUR. Deviation: 9.09%',
        severity: Severity.High,
      },
    ]);
  });

  it('grades a deviation within 1% as Medium', () => {
    const findings = evaluate(
      table(fx('SAP', 2, 'EUR', 1.1), fx('SIE', 2, 'EUR', 1.1), fx('ASML', 2, 'EUR', 1.105)),
    );

    expect(findings).toHaveLength(1);
    expect(findings[0].description).toBe(
      'FX Rate 1.105 deviates from daily consensus 1.1 for EUR. Deviation: 0.45%',
    );
    expect(findings[0].severity).toBe(Severity.Medium);
  });

  it('compares rates only within the same day and currency', () => {
    const findings = evaluate(
      table(
        fx('SAP', 2, 'EUR', 1.1),
        fx('SIE', 3, 'EUR', 1.2),
        fx('HSBA', 2, 'GBP', 1.27),
        fx('BP', 2, 'GBP', 1.27),
      ),
    );
    expect(findings).toEqual([]);
  });

  it('resolves a tied consensus to the smaller rate', () => {
    const findings = evaluate(table(fx('SIE', 2, 'EUR', 1.2), fx('SAP', 2, 'EUR', 1.1)));

    expect(findings.map((finding) => finding.ticker)).toEqual(['SIE']);
  });

  it('ignores unknown or zero rates and blank currencies', () => {
    const findings = evaluate(
      table(
        fx('SAP', 2, 'EUR', 1.1),
        fx('SIE', 2, 'EUR', null),
        fx('ASML', 2, 'EUR', 0),
        fx('BAYN', 2, ' ', 1.3),
      ),
    );
    expect(findings).toEqual([]);
  });
});
