/**
 * Financial Evaluation: Shared Types
 *
 * Flat statement figures extracted from a workbook, and the scored
 * indicators derived from them.
 */

// ---------------------------------------------------------------------------
// Financial Record
// ---------------------------------------------------------------------------

export const FINANCIAL_FIELDS = [
  "totalAssets",
  "currentAssets",
  "inventory",
  "totalLiabilities",
  "currentLiabilities",
  "totalEquity",
  "netSales",
  "costOfGoodsSold",
  "netIncome",
  "operatingIncome",
  "interestExpense",
] as const;

export type FinancialField = (typeof FINANCIAL_FIELDS)[number];

/** Every field defaults to 0 when the workbook has no matching row. */
export type FinancialRecord = Readonly<Record<FinancialField, number>>;

export function emptyFinancialRecord(): FinancialRecord {
  return {
    totalAssets: 0,
    currentAssets: 0,
    inventory: 0,
    totalLiabilities: 0,
    currentLiabilities: 0,
    totalEquity: 0,
    netSales: 0,
    costOfGoodsSold: 0,
    netIncome: 0,
    operatingIncome: 0,
    interestExpense: 0,
  };
}

export function isFinancialRecordValid(record: FinancialRecord): boolean {
  return record.totalAssets > 0 && record.netSales > 0;
}

// ---------------------------------------------------------------------------
// Indicator
// ---------------------------------------------------------------------------

export const COLOR_SCORES = ["good", "warning", "bad", "neutral"] as const;

export type ColorScore = (typeof COLOR_SCORES)[number];

export type IndicatorCategory =
  | "Liquidez"
  | "Endeudamiento"
  | "Rentabilidad"
  | "Actividad";

export type IndicatorName =
  | "Razón Corriente"
  | "Prueba Ácida"
  | "Nivel de Endeudamiento"
  | "Margen Neto"
  | "ROA (Retorno sobre Activos)"
  | "ROE (Retorno sobre Patrimonio)"
  | "Rotación de Activos";

/** How `value` is scaled: percentages are the ratio ×100. */
export type IndicatorUnit = "ratio" | "percent";

export interface Indicator {
  readonly category: IndicatorCategory;
  readonly name: IndicatorName;
  readonly value: number;
  readonly unit: IndicatorUnit;
  readonly interpretation: string;
  readonly recommendation: string;
  readonly score: ColorScore;
  readonly formula: string;
  readonly diagnostics?: {
    readonly divideByZero: true;
  };
}

// ---------------------------------------------------------------------------
// Analysis Result
// ---------------------------------------------------------------------------

export type AnalysisResult =
  | {
      ok: true;
      record: FinancialRecord;
      indicators: Indicator[];
    }
  | {
      ok: false;
      code: "NO_VALID_FINANCIAL_DATA";
      record: FinancialRecord;
      message: string;
    };
