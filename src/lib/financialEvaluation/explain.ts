/**
 * Financial Evaluation: Explainability Helpers
 *
 * Shared division and formatting utilities so every indicator reports
 * its value, formula and zero-denominator guard the same way.
 */

import type { Indicator } from "./types";

export interface RatioResult {
  value: number;
  diagnostics?: Indicator["diagnostics"];
}

/**
 * Division guarded against an exactly-zero denominator.
 *
 * A zero denominator yields 0 (never Infinity or NaN) and flags the result.
 */
export function safeRatio(numerator: number, denominator: number): RatioResult {
  if (denominator === 0) {
    return { value: 0, diagnostics: { divideByZero: true } };
  }
  return { value: numerator / denominator };
}

/**
 * Fixed-point text that keeps the sign of negative zero ("-0.0"), which
 * `toFixed` drops.
 */
export function formatFixed(value: number, digits: number): string {
  const text = value.toFixed(digits);
  return Object.is(value, -0) ? `-${text}` : text;
}

/** Fraction → percentage text with one decimal, e.g. 0.5333 → "53.3". */
export function formatPercent(fraction: number): string {
  return formatFixed(fraction * 100, 1);
}

/** Unscaled ratio with two decimals, e.g. 1.3333 → "1.33". */
export function formatRatio(value: number): string {
  return formatFixed(value, 2);
}
