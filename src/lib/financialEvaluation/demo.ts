import type { FinancialRecord } from "./types";

/** Sample statement used by the "--demo" entry point and as a test fixture. */
export const DEMO_FINANCIAL_RECORD: FinancialRecord = Object.freeze({
  totalAssets: 150_000,
  currentAssets: 60_000,
  inventory: 20_000,
  totalLiabilities: 80_000,
  currentLiabilities: 40_000,
  totalEquity: 70_000,
  netSales: 200_000,
  costOfGoodsSold: 120_000,
  netIncome: 30_000,
  operatingIncome: 45_000,
  interestExpense: 5_000,
});
