import { readFile, stat } from "node:fs/promises";

import { FinancialEvaluationError } from "./errors";
import { parseFinancialRecord } from "./schema";
import type { FinancialRecord } from "./types";

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read workbook bytes from disk, refusing files above `maxBytes`.
 */
export async function loadWorkbookBytes(path: string, maxBytes: number): Promise<Uint8Array> {
  let size: number;
  try {
    size = (await stat(path)).size;
  } catch (err: unknown) {
    throw new FinancialEvaluationError("WORKBOOK_UNREADABLE", `Cannot read ${path}: ${describe(err)}`);
  }

  if (size > maxBytes) {
    throw new FinancialEvaluationError(
      "WORKBOOK_TOO_LARGE",
      `${path} is ${size} bytes; the limit is ${maxBytes}`,
    );
  }

  try {
    return new Uint8Array(await readFile(path));
  } catch (err: unknown) {
    throw new FinancialEvaluationError("WORKBOOK_UNREADABLE", `Cannot read ${path}: ${describe(err)}`);
  }
}

/**
 * Read a FinancialRecord from a JSON file.
 */
export async function loadFinancialRecordJson(path: string): Promise<FinancialRecord> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err: unknown) {
    throw new FinancialEvaluationError("INVALID_RECORD", `Cannot read ${path}: ${describe(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err: unknown) {
    throw new FinancialEvaluationError("INVALID_RECORD", `${path} is not valid JSON: ${describe(err)}`);
  }

  return parseFinancialRecord(json);
}
