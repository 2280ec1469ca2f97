import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { coerceCellValue, extractFinancialRecord, extractFinancialRows } from "../extract";
import { matchFinancialField } from "../fieldRules";
import { emptyFinancialRecord, isFinancialRecordValid } from "../types";
import { DEMO_FINANCIAL_RECORD } from "../demo";
import { buildWorkbook, buildWorkbookAt, DEMO_ROWS } from "./buildWorkbook";

// ---------------------------------------------------------------------------
// coerceCellValue
// ---------------------------------------------------------------------------

describe("coerceCellValue", () => {
  it("passes numbers through", () => {
    assert.equal(coerceCellValue(42), 42);
    assert.equal(coerceCellValue(1250.75), 1250.75);
  });

  it("strips commas and dollar signs from text", () => {
    assert.equal(coerceCellValue("150,000"), 150000);
    assert.equal(coerceCellValue("$1,250.50"), 1250.5);
    assert.equal(coerceCellValue("1,2,3"), 123);
  });

  it("parses signs, exponents and surrounding whitespace", () => {
    assert.equal(coerceCellValue("-5"), -5);
    assert.equal(coerceCellValue("1e3"), 1000);
    assert.equal(coerceCellValue(" 7 "), 7);
  });

  it("coerces unparseable values to 0", () => {
    assert.equal(coerceCellValue("abc"), 0);
    assert.equal(coerceCellValue("12abc"), 0);
    assert.equal(coerceCellValue("$"), 0);
    assert.equal(coerceCellValue(true), 0);
    assert.equal(coerceCellValue(Number.NaN), 0);
  });
});

// ---------------------------------------------------------------------------
// matchFinancialField
// ---------------------------------------------------------------------------

describe("matchFinancialField", () => {
  it("resolves each keyword group", () => {
    assert.equal(matchFinancialField("activos circulantes"), "currentAssets");
    assert.equal(matchFinancialField("pasivos circulantes"), "currentLiabilities");
    assert.equal(matchFinancialField("capital contable"), "totalEquity");
    assert.equal(matchFinancialField("ingresos operacionales"), "netSales");
    assert.equal(matchFinancialField("resultado neto del ejercicio"), "netIncome");
    assert.equal(matchFinancialField("intereses pagados"), "interestExpense");
  });

  it("prefers the higher-priority group when a label matches several", () => {
    assert.equal(matchFinancialField("costo de ventas"), "netSales");
    assert.equal(matchFinancialField("pasivo total e intereses"), "totalLiabilities");
  });

  it("returns null for unknown labels", () => {
    assert.equal(matchFinancialField("efectivo"), null);
    assert.equal(matchFinancialField(""), null);
  });
});

// ---------------------------------------------------------------------------
// extractFinancialRows
// ---------------------------------------------------------------------------

describe("extractFinancialRows", () => {
  it("lets the last matching row win for a field", () => {
    const record = extractFinancialRows([
      ["Activo Total", 100],
      ["Activo Total", 250],
    ]);
    assert.equal(record.totalAssets, 250);
  });

  it("skips rows without a value instead of overwriting", () => {
    const record = extractFinancialRows([
      ["Activo Total", 100],
      ["Activo Total", null],
      ["Activo Total", ""],
    ]);
    assert.equal(record.totalAssets, 100);
  });

  it("skips rows shorter than two cells", () => {
    const record = extractFinancialRows([["Activo Total"], []]);
    assert.deepEqual(record, emptyFinancialRecord());
  });

  it("assigns only the first group per row, later rows still assign normally", () => {
    const record = extractFinancialRows([
      ["Pasivo total e intereses", 500],
      ["Intereses", 40],
    ]);
    assert.equal(record.totalLiabilities, 500);
    assert.equal(record.interestExpense, 40);
  });

  it("treats a missing label as no match", () => {
    const record = extractFinancialRows([[null, 500]]);
    assert.deepEqual(record, emptyFinancialRecord());
  });
});

// ---------------------------------------------------------------------------
// extractFinancialRecord
// ---------------------------------------------------------------------------

describe("extractFinancialRecord", () => {
  it("returns the all-zero record for empty bytes", () => {
    const record = extractFinancialRecord(new Uint8Array(0));
    assert.deepEqual(record, emptyFinancialRecord());
    assert.equal(isFinancialRecordValid(record), false);
  });

  it("returns the all-zero record and warns once for a truncated zip", (t) => {
    const warn = t.mock.method(console, "warn", () => {});
    const record = extractFinancialRecord(new TextEncoder().encode("PK\u0003\u0004garbage"));
    assert.deepEqual(record, emptyFinancialRecord());
    assert.equal(warn.mock.callCount(), 1);
    assert.match(
      String(warn.mock.calls[0]?.arguments[0]),
      /^\[extractFinancialRecord\] workbook decode failed: /,
    );
  });

  it("reads the demo statement from a workbook", () => {
    const record = extractFinancialRecord(buildWorkbook({ Balance: DEMO_ROWS }));
    assert.deepEqual(record, DEMO_FINANCIAL_RECORD);
    assert.equal(isFinancialRecordValid(record), true);
  });

  it("strips separators from text cells", () => {
    const record = extractFinancialRecord(buildWorkbook({ Hoja1: [["Activo Total", "150,000"]] }));
    assert.equal(record.totalAssets, 150000);
  });

  it("matches labels case-insensitively", () => {
    const record = extractFinancialRecord(buildWorkbook({ Hoja1: [["ACTIVO TOTAL", 10], ["ventas", 20]] }));
    assert.equal(record.totalAssets, 10);
    assert.equal(record.netSales, 20);
  });

  it("reads only the first sheet", () => {
    const record = extractFinancialRecord(
      buildWorkbook({
        Balance: [["Activo Total", 150000]],
        Resultados: [["Ventas", 200000]],
      }),
    );
    assert.equal(record.totalAssets, 150000);
    assert.equal(record.netSales, 0);
    assert.equal(isFinancialRecordValid(record), false);
  });

  it("ignores a first sheet with a single column", () => {
    const record = extractFinancialRecord(buildWorkbook({ Hoja1: [["Activo Total"], ["Ventas"]] }));
    assert.deepEqual(record, emptyFinancialRecord());
  });

  it("reads labels from column A even when the used range starts at column B", () => {
    const record = extractFinancialRecord(
      buildWorkbookAt([["Activo Total", 150000], ["Ventas", 200000]], "B1"),
    );
    assert.deepEqual(record, emptyFinancialRecord());
  });

  it("keeps column A as the label when the used range starts below row 1", () => {
    const record = extractFinancialRecord(
      buildWorkbookAt([["Activo Total", 150000], ["Ventas", 200000]], "A3"),
    );
    assert.equal(record.totalAssets, 150000);
    assert.equal(record.netSales, 200000);
  });

  it("coerces a dollar zero to 0", () => {
    const record = extractFinancialRecord(
      buildWorkbook({ Hoja1: [["Pasivo Corriente", "$0"], ["Ventas", 200000]] }),
    );
    assert.equal(record.currentLiabilities, 0);
    assert.equal(record.netSales, 200000);
  });
});
