import { resolveAwards } from "./award";
import { createLogger, type Logger } from "./common/logger";
import { resolveConfig, type ReportConfig } from "./config";
import { resolvePacks } from "./pack";
import { buildReport, writeReport } from "./report";
import { loadAwardTable, loadItemNames, loadPackTable } from "./tables";

export interface ReportSummary {
  outputDir: string;
  /** Paths written, award files first, index last. */
  files: string[];
  /** Number of rows in the index. */
  rows: number;
}

/**
 * Load the drop tables, resolve every award and pack, and write the CSV reports.
 * A missing DropTable.json or DropPackageTable.json throws before anything is written.
 */
export function generateReports(
  overrides: Partial<ReportConfig> = {},
  logger?: Logger
): ReportSummary {
  const config = resolveConfig(overrides);
  const log = logger ?? createLogger(config.logLevel);

  const awardRecords = loadAwardTable(config.tableDirs, log);
  const packRecords = loadPackTable(config.tableDirs, log);
  const itemNames = loadItemNames(config.tableDirs, log);

  const awards = resolveAwards(awardRecords);
  const packs = resolvePacks(packRecords);
  log.info(`resolved ${awards.size} awards and ${packs.length} packs`);

  const report = buildReport(awards, packs, itemNames);
  const files = writeReport(report, config.outputDir, log);
  log.info(`wrote ${files.length} files (${report.index.length} rows) to ${config.outputDir}`);

  return { outputDir: config.outputDir, files, rows: report.index.length };
}
