import { meetsSeverity, rankFindings, summarizeFindings } from '../../../src/engine/findings';
import { Finding, FindingType, Severity } from '../../../src/types';

const finding = (
  ticker: string,
  severity: Severity,
  date: string | null,
  errorType = FindingType.CalculationError,
): Finding => ({
  date: date === null ? null : new Date(date),
  ticker,
  errorType,
  description: `${ticker} finding`,
  severity,
});

describe('rankFindings', () => {
  it('orders by severity, then date, then ticker', () => {
    const findings = [
      finding('MSFT', Severity.Low, '2024-01-01'),
      finding('NVDA', Severity.High, '2024-01-03'),
      finding('AAPL', Severity.High, null),
      finding('TSLA', Severity.High, '2024-01-02'),
      finding('AMZN', Severity.High, '2024-01-02'),
      finding('META', Severity.Medium, '2024-01-05'),
    ];

    expect(rankFindings(findings).map((f) => f.ticker)).toEqual([
      'AMZN',
      'TSLA',
      'NVDA',
      'AAPL',
      'META',
      'MSFT',
    ]);
  });

  it('does not reorder its input', () => {
    const findings = [finding('MSFT', Severity.Low, null), finding('AAPL', Severity.High, null)];
    rankFindings(findings);
    expect(findings.map((f) => f.ticker)).toEqual(['MSFT', 'AAPL']);
  });
});

describe('meetsSeverity', () => {
  it('compares against the minimum', () => {
    expect(meetsSeverity(finding('A', Severity.Medium, null), Severity.Low)).toBe(true);
    expect(meetsSeverity(finding('A', Severity.Medium, null), Severity.Medium)).toBe(true);
    expect(meetsSeverity(finding('A', Severity.Medium, null), Severity.High)).toBe(false);
  });
});

describe('summarizeFindings', () => {
  it('counts findings by severity and by type', () => {
    const summary = summarizeFindings([
      finding('A', Severity.High, null, FindingType.FxInconsistency),
      finding('B', Severity.High, null, FindingType.FxInconsistency),
      finding('C', Severity.Low, null, FindingType.WeightMismatch),
    ]);

    expect(summary).toEqual({
      total: 3,
      bySeverity: { High: 2, Medium: 0, Low: 1 },
      byType: { 'FX Inconsistency': 2, 'Weight Mismatch': 1 },
    });
  });

  it('summarises an empty list', () => {
    expect(summarizeFindings([])).toEqual({
      total: 0,
      bySeverity: { High: 0, Medium: 0, Low: 0 },
      byType: {},
    });
  });
});
