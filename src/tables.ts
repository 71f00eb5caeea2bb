import { existsSync, readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import { TableNotFoundError } from "./common/errors";
import type { Logger } from "./common/logger";
import { AWARD_TABLE, ITEM_TABLE, PACK_TABLE } from "./config";
import {
  awardRecordSchema,
  itemRecordSchema,
  packRecordSchema,
  type AwardRecord,
  type ItemRecord,
  type PackRecord,
} from "./schema";
import type { ItemId } from "./types";

/** Return the path of `fileName` in the first directory that has it. */
export function findTable(fileName: string, dirs: readonly string[]): string {
  for (const dir of dirs) {
    const candidate = path.join(dir, fileName);
    if (existsSync(candidate)) return candidate;
  }
  throw new TableNotFoundError(fileName, dirs);
}

/**
 * Read a table keyed by arbitrary strings and return its records in object key
 * order: integer-like keys first in ascending numeric order, then the other
 * keys in file order. Keys are discarded.
 */
export function loadTable<S extends z.ZodTypeAny>(
  fileName: string,
  dirs: readonly string[],
  schema: S,
  logger?: Logger
): z.output<S>[] {
  const file = findTable(fileName, dirs);
  const raw: unknown = JSON.parse(readFileSync(file, "utf-8"));
  const table = z.record(z.string(), schema).parse(raw);
  logger?.debug(`loaded ${fileName} from ${file}`);
  return Object.values(table);
}

export function loadAwardTable(dirs: readonly string[], logger?: Logger): AwardRecord[] {
  return loadTable(AWARD_TABLE, dirs, awardRecordSchema, logger);
}

export function loadPackTable(dirs: readonly string[], logger?: Logger): PackRecord[] {
  return loadTable(PACK_TABLE, dirs, packRecordSchema, logger);
}

export function fallbackItemName(itemId: ItemId): string {
  return `Item_${itemId}`;
}

/**
 * Item names by ID. A missing item table yields an empty mapping;
 * records without an Id are skipped and blank names are synthesized.
 */
export function loadItemNames(dirs: readonly string[], logger?: Logger): Map<ItemId, string> {
  let records: ItemRecord[];
  try {
    records = loadTable(ITEM_TABLE, dirs, itemRecordSchema, logger);
  } catch (error) {
    if (!(error instanceof TableNotFoundError)) throw error;
    logger?.warn(`${ITEM_TABLE} not found, falling back to synthesized item names`);
    return new Map();
  }

  const names = new Map<ItemId, string>();
  for (const { Id, Name } of records) {
    if (Id === null || Id === undefined) continue;
    names.set(Id, typeof Name === "string" && Name !== "" ? Name : fallbackItemName(Id));
  }
  return names;
}
