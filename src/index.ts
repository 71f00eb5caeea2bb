/**
 * drop-odds: per-item drop probabilities for loot packs.
 *
 * Public API re-exports.
 */

// Types
export type {
  AwardId,
  Distribution,
  ItemId,
  PackId,
  PackSummary,
  Report,
  ReportRow,
  ResolvedPack,
} from "./types";
export { TEST_EPS } from "./types";
export type { AwardRecord, AwardRecordInput, ItemRecord, PackRecord, PackRecordInput } from "./schema";
export { awardRecordSchema, itemRecordSchema, packRecordSchema, parseInteger } from "./schema";

// Weights
export type { WeightSource } from "./common/weights";
export { aggregateWeights, equalWeights, normalize, selectWeightSource } from "./common/weights";

// Resolvers
export { resolveAward, resolveAwards } from "./award";
export { entryRolls, resolvePack, resolvePacks } from "./pack";

// Tables and configuration
export { fallbackItemName, findTable, loadAwardTable, loadItemNames, loadPackTable, loadTable } from "./tables";
export type { ReportConfig } from "./config";
export { resolveConfig } from "./config";
export { TableNotFoundError } from "./common/errors";
export type { LogLevel, Logger } from "./common/logger";
export { createLogger } from "./common/logger";

// Reports
export { REPORT_HEADER, buildReport, finalProbability, formatRow, renderRows, writeReport } from "./report";
export type { ReportSummary } from "./generate";
export { generateReports } from "./generate";
