/**
 * Financial Evaluation: Pipeline
 *
 * Extract → validity gate → evaluate. The gate turns an unusable workbook
 * into a domain result instead of a parser error.
 */

import { evaluateFinancialRecord } from "./evaluate";
import { extractFinancialRecord } from "./extract";
import { isFinancialRecordValid, type AnalysisResult, type FinancialRecord } from "./types";

export const NO_VALID_FINANCIAL_DATA_MESSAGE =
  "No se pudieron detectar datos financieros válidos. Asegúrate de que el Excel tenga columnas con nombres como 'Activo Total', 'Ventas', 'Utilidad Neta'.";

export function analyzeFinancialRecord(record: FinancialRecord): AnalysisResult {
  if (!isFinancialRecordValid(record)) {
    return {
      ok: false,
      code: "NO_VALID_FINANCIAL_DATA",
      record,
      message: NO_VALID_FINANCIAL_DATA_MESSAGE,
    };
  }

  return { ok: true, record, indicators: evaluateFinancialRecord(record) };
}

export function analyzeWorkbook(bytes: Uint8Array): AnalysisResult {
  return analyzeFinancialRecord(extractFinancialRecord(bytes));
}
