import path from "path";
import { z } from "zod";
import { LOG_LEVELS } from "./common/logger";

export const ITEM_TABLE = "ItemTable.json";
export const AWARD_TABLE = "DropTable.json";
export const PACK_TABLE = "DropPackageTable.json";
export const INDEX_FILE = "index.csv";

/** Secondary directory searched for tables after the root. */
export const TABLE_SUBDIR = "ztable";
/** Directory, relative to the root, the reports are written to. */
export const REPORT_SUBDIR = "drop_chance";

export function awardFileName(awardId: number): string {
  return `award_${awardId}.csv`;
}

const configSchema = z.object({
  rootDir: z.string().min(1),
  /** Searched in order; the first directory holding a table wins. */
  tableDirs: z.array(z.string().min(1)).min(1),
  outputDir: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
});

export type ReportConfig = z.infer<typeof configSchema>;

/**
 * Fill in defaults around `rootDir` and validate the result.
 * Directories default to the root and its ztable/ subdirectory for input,
 * and drop_chance/ for output.
 */
export function resolveConfig(overrides: Partial<ReportConfig> = {}): ReportConfig {
  const rootDir = path.resolve(overrides.rootDir ?? process.cwd());
  return configSchema.parse({
    rootDir,
    tableDirs: overrides.tableDirs ?? [rootDir, path.join(rootDir, TABLE_SUBDIR)],
    outputDir: overrides.outputDir ?? path.join(rootDir, REPORT_SUBDIR),
    logLevel: overrides.logLevel ?? "info",
  });
}
