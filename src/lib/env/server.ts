import { z } from "zod";

import { FinancialEvaluationError } from "@/lib/financialEvaluation/errors";

const ServerEnvSchema = z.object({
  // Largest workbook the CLI will read from disk (bytes)
  FIN_EVAL_MAX_WORKBOOK_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),

  // Default report format when neither --json nor --text is passed
  FIN_EVAL_OUTPUT: z.enum(["text", "json"]).default("text"),

  // App
  NODE_ENV: z.enum(["development", "test", "production"]).optional(),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

export function serverEnv(source: NodeJS.ProcessEnv = process.env): ServerEnv {
  const parsed = ServerEnvSchema.safeParse(source);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("❌ Invalid server env:", parsed.error.flatten().fieldErrors);
    throw new FinancialEvaluationError(
      "INVALID_CONFIG",
      "Invalid server environment variables (see logs).",
    );
  }
  return parsed.data;
}
