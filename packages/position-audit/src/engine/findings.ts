import { Finding, FindingType, SEVERITY_RANK, Severity } from '../types';

export interface FindingSummary {
  readonly total: number;
  readonly bySeverity: Readonly<Record<Severity, number>>;
  readonly byType: Readonly<Partial<Record<FindingType, number>>>;
}

const dateValue = (date: Date | null): number =>
  date === null ? Number.POSITIVE_INFINITY : date.getTime();

/**
 * Stable copy ordered by severity (High first), then date (undated last),
 * then ticker.
 */
export function rankFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort((a, b) => {
    const bySeverity = SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity];
    if (bySeverity !== 0) return bySeverity;

    const da = dateValue(a.date);
    const db = dateValue(b.date);
    if (da !== db) return da < db ? -1 : 1;

    return a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0;
  });
}

export const meetsSeverity = (finding: Finding, minSeverity: Severity): boolean =>
  SEVERITY_RANK[finding.severity] >= SEVERITY_RANK[minSeverity];

export function summarizeFindings(findings: readonly Finding[]): FindingSummary {
  const bySeverity: Record<Severity, number> = {
    [Severity.High]: 0,
    [Severity.Medium]: 0,
    [Severity.Low]: 0,
  };
  const byType: Partial<Record<FindingType, number>> = {};

  for (const finding of findings) {
    bySeverity[finding.severity] += 1;
    byType[finding.errorType] = (byType[finding.errorType] ?? 0) + 1;
  }

  return { total: findings.length, bySeverity, byType };
}
