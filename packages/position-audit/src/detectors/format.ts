/** 0.25 -> "25.0%" */
export const formatPercent = (fraction: number, digits = 1): string =>
  `${(fraction * 100).toFixed(digits)}%`;

/** Four significant digits without trailing zeros: 0.25 -> "0.25", 1/3 -> "0.3333" */
export const formatSignificant = (value: number, digits = 4): string =>
  String(Number(value.toPrecision(digits)));

/** Explicit sign: 500 -> "+500.00" */
export const formatSigned = (value: number, digits = 2): string =>
  `${value >= 0 ? '+' : ''}${value.toFixed(digits)}`;

export const joinReasons = (reasons: readonly string[]): string => reasons.join(' | ');
