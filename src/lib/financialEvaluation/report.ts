/**
 * Plain-text rendering of evaluated indicators, grouped by category the way
 * the results screen shows them.
 */

import { formatFixed, formatRatio } from "./explain";
import type { ColorScore, Indicator, IndicatorCategory } from "./types";

const SCORE_LABELS: Record<ColorScore, string> = {
  good: "OK",
  warning: "ATENCIÓN",
  bad: "RIESGO",
  neutral: "INFO",
};

/**
 * Category → indicators, categories in first-seen order.
 */
export function groupIndicatorsByCategory(
  indicators: readonly Indicator[],
): Map<IndicatorCategory, Indicator[]> {
  const grouped = new Map<IndicatorCategory, Indicator[]>();
  for (const indicator of indicators) {
    const bucket = grouped.get(indicator.category);
    if (bucket) {
      bucket.push(indicator);
    } else {
      grouped.set(indicator.category, [indicator]);
    }
  }
  return grouped;
}

export function formatIndicatorValue(indicator: Indicator): string {
  return indicator.unit === "percent"
    ? `${formatFixed(indicator.value, 1)}%`
    : formatRatio(indicator.value);
}

export function renderIndicatorReport(indicators: readonly Indicator[]): string {
  const lines: string[] = [];

  for (const [category, group] of groupIndicatorsByCategory(indicators)) {
    if (lines.length > 0) lines.push("");
    lines.push(category.toUpperCase());
    for (const indicator of group) {
      lines.push(`[${SCORE_LABELS[indicator.score]}] ${indicator.name}: ${formatIndicatorValue(indicator)}`);
      lines.push(`  Interpretación: ${indicator.interpretation}`);
      lines.push(`  Recomendación: ${indicator.recommendation}`);
    }
  }

  return lines.join("\n");
}
