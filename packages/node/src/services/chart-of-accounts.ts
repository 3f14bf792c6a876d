/**
 * Standard chart of accounts used to seed new companies.
 *
 * The list ships as JSON beside the package and is validated on load.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ACCOUNT_TYPES, BALANCE_DIRECTIONS } from "@socai/types";

export const DEFAULT_CHART_PATH = fileURLToPath(
  new URL("../../data/chart-of-accounts.json", import.meta.url),
);

const ChartEntrySchema = z.object({
  code: z.string().regex(/^[0-9A-Z]{1,20}$/),
  name: z.string().min(1),
  accountType: z.enum(ACCOUNT_TYPES),
  balanceDirection: z.enum(BALANCE_DIRECTIONS).optional(),
  parentCode: z.string().optional(),
  isDetail: z.boolean().default(true),
});

export const ChartOfAccountsSchema = z
  .array(ChartEntrySchema)
  .refine((entries) => new Set(entries.map((e) => e.code)).size === entries.length, {
    message: "Account codes must be unique",
  });

export type ChartEntry = z.infer<typeof ChartEntrySchema>;

/**
 * Read and validate a chart of accounts file.
 *
 * @throws {z.ZodError} when the file does not match the schema
 */
export function loadChartOfAccounts(path: string = DEFAULT_CHART_PATH): readonly ChartEntry[] {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return ChartOfAccountsSchema.parse(raw);
}
