/**
 * Workbook extractor.
 *
 * Reads the first sheet of a workbook and maps label/value rows onto a
 * FinancialRecord. Never throws: anything it cannot read stays at 0.
 */

import { read, utils } from "xlsx";

import { matchFinancialField } from "./fieldRules";
import { emptyFinancialRecord, type FinancialField, type FinancialRecord } from "./types";

type SheetRow = unknown[];

const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Cell value → number.
 *
 * Numbers pass through. Anything else is read as text with "," and "$"
 * stripped; text that is not a plain decimal literal becomes 0.
 */
export function coerceCellValue(raw: unknown): number {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : 0;
  }

  const text = String(raw).replace(/[,$]/g, "").trim();
  if (!DECIMAL_LITERAL.test(text)) return 0;

  const parsed = Number.parseFloat(text);
  return Number.isFinite(parsed) ? parsed : 0;
}

function isAbsent(value: unknown): boolean {
  return value === null || value === undefined || value === "";
}

/**
 * Map already-decoded rows onto a record.
 *
 * Column 0 is the label, column 1 the value. A later row that resolves to
 * the same field overwrites the earlier one.
 */
export function extractFinancialRows(rows: readonly SheetRow[]): FinancialRecord {
  const record: Record<FinancialField, number> = { ...emptyFinancialRecord() };

  for (const row of rows) {
    if (row.length < 2) continue;

    const rawValue = row[1];
    if (isAbsent(rawValue)) continue;

    const label = String(row[0] ?? "").toLowerCase();
    const field = matchFinancialField(label);
    if (!field) continue;

    record[field] = coerceCellValue(rawValue);
  }

  return record;
}

function readFirstSheetRows(bytes: Uint8Array): SheetRow[] {
  const workbook = read(bytes, { type: "array" });

  const sheetName = workbook.SheetNames[0];
  if (sheetName === undefined) return [];

  const worksheet = workbook.Sheets[sheetName];
  if (!worksheet) return [];

  const ref = worksheet["!ref"];
  if (!ref) return [];

  // Column 0 is always column A, even when the used range starts further right.
  const range = utils.decode_range(ref);
  range.s.c = 0;
  range.s.r = 0;

  return utils.sheet_to_json<SheetRow>(worksheet, {
    range,
    header: 1,
    defval: null,
    blankrows: false,
    raw: true,
  });
}

/**
 * Extract the financial figures from raw workbook bytes.
 *
 * Undecodable input yields the all-zero record; callers check
 * isFinancialRecordValid before evaluating.
 */
export function extractFinancialRecord(bytes: Uint8Array): FinancialRecord {
  let rows: SheetRow[];
  try {
    rows = readFirstSheetRows(bytes);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`[extractFinancialRecord] workbook decode failed: ${message}`);
    return emptyFinancialRecord();
  }

  return extractFinancialRows(rows);
}
