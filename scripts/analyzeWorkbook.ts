/**
 * Workbook Financial Evaluation
 *
 * Extracts statement figures from the first sheet of a workbook and prints
 * the seven scored indicators.
 *
 * Exit codes:
 *   0  Indicators printed
 *   1  Usage, config or file error
 *   2  No valid financial data detected (total assets or net sales missing)
 *
 * Usage:
 *   npx tsx scripts/analyzeWorkbook.ts --file estados.xlsx
 *   npx tsx scripts/analyzeWorkbook.ts --demo --json
 *   npx tsx scripts/analyzeWorkbook.ts --record figures.json
 *
 * Optional env vars:
 *   FIN_EVAL_MAX_WORKBOOK_BYTES  largest workbook read (default 10 MiB)
 *   FIN_EVAL_OUTPUT              "text" or "json" (default text)
 */

import { pathToFileURL } from "node:url";

import { serverEnv } from "@/lib/env/server";
import {
  DEMO_FINANCIAL_RECORD,
  analyzeFinancialRecord,
  analyzeWorkbook,
  classifyEvaluationError,
  loadFinancialRecordJson,
  loadWorkbookBytes,
  renderIndicatorReport,
  type AnalysisResult,
} from "@/lib/financialEvaluation";

// ── CLI arg parsing ─────────────────────────────────────────────────────────

export type CliSource =
  | { kind: "file"; path: string }
  | { kind: "record"; path: string }
  | { kind: "demo" };

export interface CliArgs {
  source: CliSource | null;
  format: "text" | "json" | null;
  help: boolean;
  error: string | null;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { source: null, format: null, help: false, error: null };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (flag === "--help" || flag === "-h") {
      args.help = true;
    } else if (flag === "--demo") {
      args.source = { kind: "demo" };
    } else if (flag === "--json") {
      args.format = "json";
    } else if (flag === "--text") {
      args.format = "text";
    } else if (flag === "--file" || flag === "--record") {
      const path = argv[i + 1];
      if (!path || path.startsWith("--")) {
        args.error = `Missing path after ${flag}`;
        return args;
      }
      args.source = { kind: flag === "--file" ? "file" : "record", path };
      i++;
    } else {
      args.error = `Unknown argument: ${flag}`;
      return args;
    }
  }

  return args;
}

function printHelp(): void {
  console.log(`
Workbook Financial Evaluation
=============================
Reads "Activo Total", "Ventas", "Utilidad Neta"... rows from the first sheet
and prints liquidity, leverage, profitability and activity indicators.

Options:
  --file <path>     Workbook to analyze (.xlsx, .xls, .ods, .csv)
  --record <path>   JSON file with the figures instead of a workbook
  --demo            Use the built-in sample statement
  --json            Print JSON instead of the text report
  --text            Print the text report
  -h, --help        Show this help
`);
}

// ── Main ────────────────────────────────────────────────────────────────────

async function resolveResult(source: CliSource, maxBytes: number): Promise<AnalysisResult> {
  switch (source.kind) {
    case "demo":
      return analyzeFinancialRecord(DEMO_FINANCIAL_RECORD);
    case "record":
      return analyzeFinancialRecord(await loadFinancialRecordJson(source.path));
    case "file":
      return analyzeWorkbook(await loadWorkbookBytes(source.path, maxBytes));
  }
}

export async function run(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    printHelp();
    return 0;
  }
  if (args.error || !args.source) {
    console.error(`[analyzeWorkbook] ${args.error ?? "Pass --file, --record or --demo"}`);
    return 1;
  }

  let result: AnalysisResult;
  let format: "text" | "json";
  try {
    const config = serverEnv(env);
    format = args.format ?? config.FIN_EVAL_OUTPUT;
    result = await resolveResult(args.source, config.FIN_EVAL_MAX_WORKBOOK_BYTES);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[analyzeWorkbook] ${classifyEvaluationError(err)}: ${message}`);
    return 1;
  }

  if (format === "json") {
    console.log(JSON.stringify(result, null, 2));
  } else if (result.ok) {
    console.log(renderIndicatorReport(result.indicators));
  } else {
    console.error(`[analyzeWorkbook] ${result.message}`);
  }

  return result.ok ? 0 : 2;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error("[analyzeWorkbook] Unexpected failure:", err);
      process.exitCode = 1;
    });
}
