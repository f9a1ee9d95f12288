import { Detector, DetectorName } from '../types';
import { CalculationDetector } from './CalculationDetector';
import { CompletenessDetector } from './CompletenessDetector';
import { FxConsistencyDetector } from './FxConsistencyDetector';
import { PriceSpikeDetector } from './PriceSpikeDetector';
import { ReconciliationDetector } from './ReconciliationDetector';
import { StaticDataDetector } from './StaticDataDetector';
import { TradeConsistencyDetector } from './TradeConsistencyDetector';
import { WeightDetector } from './WeightDetector';

/**
 * Every detector, in the order their findings are reported.
 */
export const DETECTOR_REGISTRY: readonly Detector[] = Object.freeze([
  new CompletenessDetector(),
  new PriceSpikeDetector(),
  new CalculationDetector(),
  new TradeConsistencyDetector(),
  new ReconciliationDetector(),
  new FxConsistencyDetector(),
  new WeightDetector(),
  new StaticDataDetector(),
]);

/** Enabled detectors, kept in registry order whatever order `names` is in. */
export function createDetectors(names: readonly DetectorName[]): Detector[] {
  const enabled = new Set(names);
  return DETECTOR_REGISTRY.filter((detector) => enabled.has(detector.name));
}
