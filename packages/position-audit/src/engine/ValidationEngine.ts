import { Logger } from '@position-audit/shared';
import { DEFAULT_ENGINE_CONFIG, EngineConfig } from '../config/ConfigSchema';
import { createDetectors } from '../detectors/registry';
import { hasColumns } from '../table/PositionTable';
import { Detector, Finding, PositionTable, TradeTable } from '../types';
import { meetsSeverity, summarizeFindings } from './findings';

/**
 * Runs the enabled detectors over one batch and collects their findings.
 *
 * Findings are concatenated in registry order, so the output is ordered by
 * detector rather than by severity; use `rankFindings` for a triage view.
 * The engine holds no state between runs and performs no I/O other than
 * logging.
 */
export class ValidationEngine {
  private readonly detectors: readonly Detector[];

  constructor(
    private readonly config: EngineConfig = DEFAULT_ENGINE_CONFIG,
    private readonly logger: Logger = Logger.getInstance('position-audit:engine'),
  ) {
    this.detectors = createDetectors(config.detectors);
  }

  getDetectorNames(): string[] {
    return this.detectors.map((detector) => detector.name);
  }

  run(positions: PositionTable, trades: TradeTable): Finding[] {
    const correlationId = Logger.generateCorrelationId();
    this.logger.info('Starting validation run', correlationId, {
      rows: positions.rows.length,
      trades: trades.rows.length,
      detectors: this.getDetectorNames(),
    });

    const findings: Finding[] = [];
    for (const detector of this.detectors) {
      if (!hasColumns(positions, detector.requiredColumns)) {
        const missing = detector.requiredColumns.filter(
          (column) => !positions.columns.has(column),
        );
        this.logger.info(`Skipping detector ${detector.name}: missing columns`, correlationId, {
          detector: detector.name,
          missing,
        });
        continue;
      }

      const timerId = this.logger.startTimer(`detector:${detector.name}`, correlationId);
      try {
        const result = detector.evaluate(positions, trades);
        this.logger.endTimer(timerId, { findings: result.length });
        this.logger.debug(
          `Detector ${detector.name} produced ${result.length} finding(s)`,
          correlationId,
        );
        findings.push(...result);
      } catch (error) {
        this.logger.endTimer(timerId, { failed: true });
        this.logger.fatal(
          `Detector ${detector.name} failed; aborting run`,
          error instanceof Error ? error : new Error(String(error)),
          correlationId,
        );
        throw error;
      }
    }

    const reported = findings.filter((finding) => meetsSeverity(finding, this.config.minSeverity));
    const summary = summarizeFindings(reported);
    this.logger.info('Validation run complete', correlationId, {
      total: summary.total,
      bySeverity: summary.bySeverity,
      filtered: findings.length - reported.length,
    });

    return reported;
  }
}
