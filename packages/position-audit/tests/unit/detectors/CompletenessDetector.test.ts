import { CompletenessDetector } from '../../../src/detectors/CompletenessDetector';
import { extractTrades } from '../../../src/table/PositionTable';
import { FindingType, PositionTable, Severity } from '../../../src/types';
import { holding, jan, table } from '../../fixtures/positions';

describe('CompletenessDetector', () => {
  const detector = new CompletenessDetector();
  const evaluate = (positions: PositionTable) =>
    detector.evaluate(positions, extractTrades(positions));

  it('reports nothing for complete rows', () => {
    expect(evaluate(table(holding('AAPL', 2), holding('MSFT', 2)))).toEqual([]);
  });

  it('reports missing values before invalid zeros, column by column', () => {
    const findings = evaluate(
      table(
        holding('AAPL', 2),
        holding('MSFT', 2, { Price: null, 'Exchange Rate': 0, 'Close Quantity': 0, Currency: ' ' }),
      ),
    );

    expect(findings).toEqual([
      {
        date: new Date(jan(2)),
        ticker: 'MSFT',
        errorType: FindingType.MissingData,
        description: "Missing value for critical column: 'Price'",
        severity: Severity.High,
      },
      {
        date: new Date(jan(2)),
        ticker: 'MSFT',
        errorType: FindingType.InvalidData,
        description: "Invalid zero value for column: 'Exchange Rate'",
        severity: Severity.High,
      },
      {
        date: new Date(jan(2)),
        ticker: 'MSFT',
        errorType: FindingType.MissingData,
        description: "Missing value for critical column: 'Currency'",
        severity: Severity.Medium,
      },
    ]);
  });

  it('labels rows without a ticker as UNKNOWN and keeps an unknown date', () => {
    const findings = evaluate(table(holding('', 2, { Date: '' })));

    expect(findings).toEqual([
      {
        date: null,
        ticker: 'UNKNOWN',
        errorType: FindingType.MissingData,
        description: "Missing value for critical column: 'P_Ticker'",
        severity: Severity.High,
      },
      {
        date: null,
        ticker: 'UNKNOWN',
        errorType: FindingType.MissingData,
        description: "Missing value for critical column: 'Date'",
        severity: Severity.High,
      },
    ]);
  });

  it('treats unparseable numbers as missing', () => {
    const findings = evaluate(table(holding('AAPL', 2, { Price: 'n/a' })));

    expect(findings).toHaveLength(1);
    expect(findings[0].description).toBe("Missing value for critical column: 'Price'");
  });

  it('allows a zero closing quantity', () => {
    expect(evaluate(table(holding('AAPL', 2, { 'Close Quantity': 0 })))).toEqual([]);
  });

  it('skips columns the table does not have', () => {
    const findings = evaluate(table({ Date: jan(2), P_Ticker: 'AAPL' }, { Date: jan(2), P_Ticker: 'MSFT' }));
    expect(findings).toEqual([]);
  });
});
