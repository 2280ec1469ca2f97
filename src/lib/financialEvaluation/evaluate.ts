/**
 * Financial Evaluation: Ratio Engine
 *
 * Seven deterministic indicators in fixed order, each with interpretation,
 * recommendation and traffic-light score.
 *
 * Thresholds are compared against the unscaled fraction even when the
 * reported value is a percentage.
 */

import { formatPercent, formatRatio, safeRatio, type RatioResult } from "./explain";
import type { ColorScore, FinancialRecord, Indicator } from "./types";

// ---------------------------------------------------------------------------
// Liquidez
// ---------------------------------------------------------------------------

function evaluateCurrentRatio(record: FinancialRecord): Indicator {
  const { value, diagnostics } = safeRatio(record.currentAssets, record.currentLiabilities);

  let score: ColorScore = "bad";
  if (value >= 1.5) score = "good";
  else if (value >= 1) score = "warning";

  return {
    category: "Liquidez",
    name: "Razón Corriente",
    value,
    unit: "ratio",
    interpretation:
      value > 1
        ? "La empresa puede cubrir sus deudas a corto plazo con sus activos corrientes."
        : "La empresa podría tener dificultades para pagar sus obligaciones a corto plazo.",
    recommendation:
      value < 1
        ? "Renegociar deudas a corto plazo o aumentar el capital de trabajo."
        : "Mantener el nivel actual, pero evitar exceso de liquidez ociosa.",
    score,
    formula: "CurrentAssets / CurrentLiabilities",
    ...(diagnostics ? { diagnostics } : {}),
  };
}

function evaluateQuickRatio(record: FinancialRecord): Indicator {
  const { value, diagnostics } = safeRatio(
    record.currentAssets - record.inventory,
    record.currentLiabilities,
  );

  let score: ColorScore = "bad";
  if (value >= 1) score = "good";
  else if (value >= 0.8) score = "warning";

  return {
    category: "Liquidez",
    name: "Prueba Ácida",
    value,
    unit: "ratio",
    interpretation:
      value > 1
        ? "La empresa tiene buena capacidad de pago inmediato sin depender de la venta de inventarios."
        : "Alta dependencia del inventario para cubrir obligaciones inmediatas.",
    recommendation:
      value < 1
        ? "Mejorar la gestión de cobro de cartera o reducir niveles de inventario."
        : "Excelente salud de liquidez inmediata.",
    score,
    formula: "(CurrentAssets - Inventory) / CurrentLiabilities",
    ...(diagnostics ? { diagnostics } : {}),
  };
}

// ---------------------------------------------------------------------------
// Endeudamiento
// ---------------------------------------------------------------------------

function evaluateDebtRatio(record: FinancialRecord): Indicator {
  const { value: debtRatio, diagnostics } = safeRatio(record.totalLiabilities, record.totalAssets);

  let score: ColorScore = "bad";
  if (debtRatio <= 0.5) score = "good";
  else if (debtRatio <= 0.7) score = "warning";

  return {
    category: "Endeudamiento",
    name: "Nivel de Endeudamiento",
    value: debtRatio * 100,
    unit: "percent",
    interpretation: `El ${formatPercent(debtRatio)}% de los activos está financiado por terceros.`,
    recommendation:
      debtRatio > 0.7
        ? "Riesgo alto. Buscar capitalización o reducir pasivos."
        : "Nivel de deuda manejable.",
    score,
    formula: "TotalLiabilities / TotalAssets × 100",
    ...(diagnostics ? { diagnostics } : {}),
  };
}

// ---------------------------------------------------------------------------
// Rentabilidad
// ---------------------------------------------------------------------------

function evaluateNetMargin({ value: netMargin, diagnostics }: RatioResult): Indicator {
  let score: ColorScore = "bad";
  if (netMargin > 0.1) score = "good";
  else if (netMargin > 0) score = "warning";

  return {
    category: "Rentabilidad",
    name: "Margen Neto",
    value: netMargin * 100,
    unit: "percent",
    interpretation: `Por cada unidad monetaria vendida, la empresa gana ${formatPercent(netMargin)}%.`,
    recommendation:
      netMargin < 0.05
        ? "Revisar estructura de costos y gastos. Evaluar precios de venta."
        : "Buen control de costos y gastos.",
    score,
    formula: "NetIncome / NetSales × 100",
    ...(diagnostics ? { diagnostics } : {}),
  };
}

function evaluateRoa(record: FinancialRecord): Indicator {
  const { value: roa, diagnostics } = safeRatio(record.netIncome, record.totalAssets);

  return {
    category: "Rentabilidad",
    name: "ROA (Retorno sobre Activos)",
    value: roa * 100,
    unit: "percent",
    interpretation: `Los activos generan una rentabilidad del ${formatPercent(roa)}%.`,
    recommendation:
      roa < 0.05
        ? "Optimizar el uso de activos para generar más ventas."
        : "Los activos están siendo utilizados eficientemente.",
    score: roa > 0.05 ? "good" : "warning",
    formula: "NetIncome / TotalAssets × 100",
    ...(diagnostics ? { diagnostics } : {}),
  };
}

/** ROE is judged against the net margin: a lower ROE means leverage is not paying off. */
function evaluateRoe(record: FinancialRecord, netMargin: number): Indicator {
  const { value: roe, diagnostics } = safeRatio(record.netIncome, record.totalEquity);

  return {
    category: "Rentabilidad",
    name: "ROE (Retorno sobre Patrimonio)",
    value: roe * 100,
    unit: "percent",
    interpretation: `Los accionistas obtienen un retorno del ${formatPercent(roe)}% sobre su inversión.`,
    recommendation:
      roe < netMargin
        ? "El apalancamiento no está jugando a favor. Revisar deuda."
        : "Buen retorno para los inversionistas.",
    score: roe > 0.1 ? "good" : "warning",
    formula: "NetIncome / TotalEquity × 100",
    ...(diagnostics ? { diagnostics } : {}),
  };
}

// ---------------------------------------------------------------------------
// Actividad
// ---------------------------------------------------------------------------

function evaluateAssetTurnover(record: FinancialRecord): Indicator {
  const { value, diagnostics } = safeRatio(record.netSales, record.totalAssets);

  return {
    category: "Actividad",
    name: "Rotación de Activos",
    value,
    unit: "ratio",
    interpretation: `La empresa genera ${formatRatio(value)} veces sus activos en ventas al año.`,
    recommendation:
      value < 1
        ? "Ventas bajas en relación al tamaño de la empresa. Impulsar ventas."
        : "Buena eficiencia en el uso de activos.",
    score: value > 1 ? "good" : "warning",
    formula: "NetSales / TotalAssets",
    ...(diagnostics ? { diagnostics } : {}),
  };
}

// ---------------------------------------------------------------------------
// Main entry
// ---------------------------------------------------------------------------

/**
 * Evaluate every indicator for a record.
 *
 * Pure function: always seven indicators in the same order, never throws.
 */
export function evaluateFinancialRecord(record: FinancialRecord): Indicator[] {
  const netMargin = safeRatio(record.netIncome, record.netSales);

  return [
    evaluateCurrentRatio(record),
    evaluateQuickRatio(record),
    evaluateDebtRatio(record),
    evaluateNetMargin(netMargin),
    evaluateRoa(record),
    evaluateRoe(record, netMargin.value),
    evaluateAssetTurnover(record),
  ];
}
