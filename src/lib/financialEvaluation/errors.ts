/**
 * Financial Evaluation Error Taxonomy
 *
 * Structured error codes for the surfaces around the core: config,
 * JSON record input and workbook file loading. Extraction and evaluation
 * themselves never throw.
 */

export type FinancialEvaluationErrorCode =
  | "INVALID_CONFIG"
  | "INVALID_RECORD"
  | "WORKBOOK_TOO_LARGE"
  | "WORKBOOK_UNREADABLE";

export class FinancialEvaluationError extends Error {
  readonly code: FinancialEvaluationErrorCode;

  constructor(code: FinancialEvaluationErrorCode, message: string) {
    super(message);
    this.name = "FinancialEvaluationError";
    this.code = code;
  }
}

/**
 * Classify a thrown error into a structured FinancialEvaluationErrorCode.
 */
export function classifyEvaluationError(err: unknown): FinancialEvaluationErrorCode {
  if (err instanceof FinancialEvaluationError) return err.code;
  return "WORKBOOK_UNREADABLE";
}
