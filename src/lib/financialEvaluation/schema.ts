/**
 * JSON record input.
 *
 * Records handed in as JSON (rather than extracted from a workbook) are
 * validated here; omitted fields default to 0 like unmatched rows do.
 */

import { z } from "zod";

import { FinancialEvaluationError } from "./errors";
import { emptyFinancialRecord, FINANCIAL_FIELDS, type FinancialRecord } from "./types";

export const FinancialFieldSchema = z.enum(FINANCIAL_FIELDS);

/** Keys outside FINANCIAL_FIELDS fail the key schema. */
export const FinancialRecordSchema = z.record(FinancialFieldSchema, z.number().finite());

export function parseFinancialRecord(input: unknown): FinancialRecord {
  const parsed = FinancialRecordSchema.safeParse(input);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors);
    const detail = fields.length > 0 ? fields.join(", ") : parsed.error.issues[0]?.message ?? "unknown";
    throw new FinancialEvaluationError("INVALID_RECORD", `Invalid financial record: ${detail}`);
  }
  return { ...emptyFinancialRecord(), ...parsed.data };
}
