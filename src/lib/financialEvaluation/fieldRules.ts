/**
 * Row-label rules for the workbook extractor.
 *
 * Pure lookup: evaluated top to bottom, first match wins. Order is
 * significant: "costo de ventas" contains "ventas" and resolves to netSales,
 * never to costOfGoodsSold.
 */

import type { FinancialField } from "./types";

type FieldRule = {
  field: FinancialField;
  /** Lower-case substrings; any one of them is enough. */
  keywords: readonly string[];
};

export const FIELD_RULES: readonly FieldRule[] = [
  { field: "totalAssets", keywords: ["activo total"] },
  { field: "currentAssets", keywords: ["activo corriente", "activos circulantes"] },
  { field: "inventory", keywords: ["inventario"] },
  { field: "totalLiabilities", keywords: ["pasivo total"] },
  { field: "currentLiabilities", keywords: ["pasivo corriente", "pasivos circulantes"] },
  { field: "totalEquity", keywords: ["patrimonio", "capital contable"] },
  { field: "netSales", keywords: ["ventas", "ingresos operacionales"] },
  { field: "costOfGoodsSold", keywords: ["costo de venta"] },
  { field: "netIncome", keywords: ["utilidad neta", "resultado neto"] },
  { field: "operatingIncome", keywords: ["utilidad operativa"] },
  { field: "interestExpense", keywords: ["gastos financieros", "intereses"] },
];

/**
 * Resolve a lower-cased row label to the field it assigns, or null.
 */
export function matchFinancialField(label: string): FinancialField | null {
  for (const rule of FIELD_RULES) {
    if (rule.keywords.some((keyword) => label.includes(keyword))) {
      return rule.field;
    }
  }
  return null;
}
