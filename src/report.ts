import { mkdirSync, writeFileSync } from "fs";
import path from "path";
import { sort } from "fast-sort";
import { toCsv } from "./common/csv";
import { toFixedHalfEven } from "./common/format";
import type { Logger } from "./common/logger";
import { awardFileName, INDEX_FILE } from "./config";
import { fallbackItemName } from "./tables";
import type { AwardId, Distribution, ItemId, PackSummary, Report, ReportRow } from "./types";

export const REPORT_HEADER = [
  "AwardID",
  "PackID",
  "ItemID",
  "ItemName",
  "Rolls",
  "InPoolProbability",
  "PackTriggerProbability",
  "FinalPerRunProbability",
] as const;

/**
 * Chance of getting an item at least once from one pack opening:
 * the pack triggers the award, then at least one of `rolls` draws hits the item.
 */
export function finalProbability(trigger: number, inPool: number, rolls: number): number {
  return trigger * (1 - (1 - inPool) ** rolls);
}

/**
 * Combine resolved awards and packs into sorted report rows.
 *
 * A pack/award pair whose award has no items (or is not in the award table)
 * contributes no rows. An award missing from a pack's trigger mapping is
 * treated as triggering with probability 1.
 */
export function buildReport(
  awards: ReadonlyMap<AwardId, Distribution<ItemId>>,
  packs: readonly PackSummary[],
  itemNames: ReadonlyMap<ItemId, string>
): Report {
  const rows: ReportRow[] = [];

  for (const { packId, rolls: rollsByAward, trigger } of packs) {
    for (const [awardId, rolls] of rollsByAward) {
      const items = awards.get(awardId);
      if (!items || items.size === 0) continue;

      const packTriggerProbability = trigger.get(awardId) ?? 1;
      const itemIds = sort([...items.keys()]).asc();
      for (const itemId of itemIds) {
        const inPoolProbability = items.get(itemId) ?? 0;
        rows.push({
          awardId,
          packId,
          itemId,
          itemName: itemNames.get(itemId) ?? fallbackItemName(itemId),
          rolls,
          inPoolProbability,
          packTriggerProbability,
          finalPerRunProbability: finalProbability(packTriggerProbability, inPoolProbability, rolls),
        });
      }
    }
  }

  const byAward = new Map<AwardId, ReportRow[]>();
  for (const awardId of sort([...awards.keys()]).asc()) {
    const awardRows = rows.filter((row) => row.awardId === awardId);
    byAward.set(
      awardId,
      sort(awardRows).asc([(row) => row.packId, (row) => row.itemId])
    );
  }

  const index = sort(rows).asc([(row) => row.awardId, (row) => row.packId, (row) => row.itemId]);
  return { byAward, index };
}

/** CSV fields of a row, probabilities fixed at six decimals with ties to even. */
export function formatRow(row: ReportRow): string[] {
  return [
    String(row.awardId),
    String(row.packId),
    String(row.itemId),
    row.itemName,
    String(row.rolls),
    toFixedHalfEven(row.inPoolProbability, 6),
    toFixedHalfEven(row.packTriggerProbability, 6),
    toFixedHalfEven(row.finalPerRunProbability, 6),
  ];
}

export function renderRows(rows: readonly ReportRow[]): string {
  return toCsv(REPORT_HEADER, rows.map(formatRow));
}

/**
 * Write one file per award and the index into `outputDir`, creating it if needed.
 * Returns the written paths, award files first in AwardID order.
 */
export function writeReport(report: Report, outputDir: string, logger?: Logger): string[] {
  mkdirSync(outputDir, { recursive: true });
  const written: string[] = [];

  const write = (fileName: string, rows: readonly ReportRow[]) => {
    const file = path.join(outputDir, fileName);
    writeFileSync(file, renderRows(rows), "utf-8");
    logger?.debug(`wrote ${rows.length} rows to ${file}`);
    written.push(file);
  };

  for (const [awardId, rows] of report.byAward) write(awardFileName(awardId), rows);
  write(INDEX_FILE, report.index);
  return written;
}
