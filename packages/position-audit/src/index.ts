/**
 * @position-audit/engine
 *
 * Batch data-quality checks for daily portfolio position snapshots.
 */

// Data model
export * from './types';

// Tables
export {
  cellOf,
  createPositionTable,
  dayKey,
  daysBetween,
  extractTrades,
  hasColumns,
  PositionRecordSchema,
} from './table/PositionTable';

// Detectors
export { CompletenessDetector, COMPLETENESS_RULES } from './detectors/CompletenessDetector';
export { impliedDailyReturn, PriceSpikeDetector } from './detectors/PriceSpikeDetector';
export {
  CalculationDetector,
  detectSystematicOffsets,
  explainMismatch,
  mismatchPercent,
  type SystematicOffsets,
  type ValuationRow,
} from './detectors/CalculationDetector';
export {
  classifyTradeDeviation,
  TradeConsistencyDetector,
} from './detectors/TradeConsistencyDetector';
export {
  breakPercent,
  classifyBreak,
  ReconciliationDetector,
} from './detectors/ReconciliationDetector';
export { FxConsistencyDetector } from './detectors/FxConsistencyDetector';
export { normalizeWeights, WeightDetector } from './detectors/WeightDetector';
export { StaticDataDetector, STATIC_RULES } from './detectors/StaticDataDetector';
export { createDetectors, DETECTOR_REGISTRY } from './detectors/registry';

// Engine
export { ValidationEngine } from './engine/ValidationEngine';
export {
  type FindingSummary,
  meetsSeverity,
  rankFindings,
  summarizeFindings,
} from './engine/findings';

// Configuration
export {
  DEFAULT_ENGINE_CONFIG,
  DetectorNameSchema,
  type EngineConfig,
  EngineConfigSchema,
  type EngineConfigInput,
  loadEngineConfigFromEnv,
  parseEngineConfig,
  parseEngineConfigJson,
  SeveritySchema,
} from './config/ConfigSchema';
