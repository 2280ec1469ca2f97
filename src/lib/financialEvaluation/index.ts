/**
 * Financial Evaluation: Integration Entrypoint
 *
 * extractFinancialRecord() turns workbook bytes into figures,
 * evaluateFinancialRecord() turns figures into scored indicators,
 * analyzeWorkbook() runs both behind the validity gate.
 */

export type {
  AnalysisResult,
  ColorScore,
  FinancialField,
  FinancialRecord,
  Indicator,
  IndicatorCategory,
  IndicatorName,
  IndicatorUnit,
} from "./types";
export {
  COLOR_SCORES,
  FINANCIAL_FIELDS,
  emptyFinancialRecord,
  isFinancialRecordValid,
} from "./types";

export { coerceCellValue, extractFinancialRecord, extractFinancialRows } from "./extract";
export { FIELD_RULES, matchFinancialField } from "./fieldRules";
export { evaluateFinancialRecord } from "./evaluate";
export { safeRatio, formatFixed, formatPercent, formatRatio } from "./explain";
export type { RatioResult } from "./explain";
export {
  analyzeFinancialRecord,
  analyzeWorkbook,
  NO_VALID_FINANCIAL_DATA_MESSAGE,
} from "./analyze";
export { DEMO_FINANCIAL_RECORD } from "./demo";
export { FinancialFieldSchema, FinancialRecordSchema, parseFinancialRecord } from "./schema";
export { renderIndicatorReport, groupIndicatorsByCategory, formatIndicatorValue } from "./report";
export { FinancialEvaluationError, classifyEvaluationError } from "./errors";
export type { FinancialEvaluationErrorCode } from "./errors";
export { loadWorkbookBytes, loadFinancialRecordJson } from "./loadWorkbook";
