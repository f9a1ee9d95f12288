/**
 * position-audit central types
 */

export const POSITION_COLUMNS = [
  'Date',
  'P_Ticker',
  'Price',
  'Close Quantity',
  'Open Quantity',
  'Exchange Rate',
  'Value in USD',
  'Closing Weights',
  'Trade Price',
  'Traded Today',
  'Currency',
  'Country',
  'Sector',
  'Industry',
  'Short_Name',
  'Side',
  'Trade Weight',
] as const;

export type PositionColumn = (typeof POSITION_COLUMNS)[number];

/**
 * One row per (Date, Ticker). `null` is an unknown value, never zero.
 */
export interface PositionRow {
  readonly date: Date | null;
  readonly ticker: string | null;
  readonly price: number | null;
  readonly closeQuantity: number | null;
  readonly openQuantity: number | null;
  readonly exchangeRate: number | null;
  readonly valueUsd: number | null;
  /** Text such as "25%" is kept verbatim; the weight detector normalises it. */
  readonly closingWeight: number | string | null;
  readonly tradePrice: number | null;
  readonly tradedToday: number | null;
  readonly currency: string | null;
  readonly country: string | null;
  readonly sector: string | null;
  readonly industry: string | null;
  readonly shortName: string | null;
  readonly side: string | null;
  readonly tradeWeight: number | null;
}

export type PositionField = keyof PositionRow;
export type PositionCell = PositionRow[PositionField];

export const COLUMN_FIELDS: { readonly [C in PositionColumn]: PositionField } = {
  Date: 'date',
  P_Ticker: 'ticker',
  Price: 'price',
  'Close Quantity': 'closeQuantity',
  'Open Quantity': 'openQuantity',
  'Exchange Rate': 'exchangeRate',
  'Value in USD': 'valueUsd',
  'Closing Weights': 'closingWeight',
  'Trade Price': 'tradePrice',
  'Traded Today': 'tradedToday',
  Currency: 'currency',
  Country: 'country',
  Sector: 'sector',
  Industry: 'industry',
  Short_Name: 'shortName',
  Side: 'side',
  'Trade Weight': 'tradeWeight',
};

export interface PositionTable {
  /** Columns present in the source data. */
  readonly columns: ReadonlySet<PositionColumn>;
  readonly rows: readonly PositionRow[];
}

export const TRADE_COLUMNS = [
  'Date',
  'P_Ticker',
  'Traded Today',
  'Trade Price',
  'Trade Weight',
  'Side',
  'Currency',
] as const satisfies readonly PositionColumn[];

export type TradeColumn = (typeof TRADE_COLUMNS)[number];

export interface TradeRow {
  readonly date: Date | null;
  readonly ticker: string | null;
  readonly tradedToday: number;
  readonly tradePrice: number | null;
  readonly tradeWeight: number | null;
  readonly side: string | null;
  readonly currency: string | null;
}

export interface TradeTable {
  readonly columns: ReadonlySet<TradeColumn>;
  readonly rows: readonly TradeRow[];
}

export enum Severity {
  High = 'High',
  Medium = 'Medium',
  Low = 'Low',
}

export const SEVERITY_RANK: { readonly [S in Severity]: number } = {
  [Severity.Low]: 0,
  [Severity.Medium]: 1,
  [Severity.High]: 2,
};

export enum FindingType {
  MissingData = 'Missing Data',
  InvalidData = 'Invalid Data',
  PriceSpike = 'Price Spike',
  CalculationError = 'Calculation Error',
  TradeConsistency = 'Consistency Error (Trade vs Market)',
  ReconciliationIntraDay = 'Reconciliation Error (Intra-day)',
  ReconciliationInterDay = 'Reconciliation Error (Inter-day)',
  FxInconsistency = 'FX Inconsistency',
  WeightMismatch = 'Weight Mismatch',
  StaticDataInconsistency = 'Static Data Inconsistency',
}

export interface Finding {
  readonly date: Date | null;
  readonly ticker: string;
  readonly errorType: FindingType;
  readonly description: string;
  readonly severity: Severity;
}

export const DETECTOR_NAMES = [
  'completeness',
  'price_spike',
  'calculation',
  'trade_consistency',
  'reconciliation',
  'fx_consistency',
  'weight',
  'static_data',
] as const;

export type DetectorName = (typeof DETECTOR_NAMES)[number];

/**
 * A detector is any component that turns the two snapshots into findings.
 * Implementations hold no state between calls and never mutate the tables.
 */
export interface Detector {
  readonly name: DetectorName;
  /** Columns the detector needs; when any is absent it returns no findings. */
  readonly requiredColumns: readonly PositionColumn[];
  evaluate(positions: PositionTable, trades: TradeTable): Finding[];
}
