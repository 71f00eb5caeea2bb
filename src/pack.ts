import { accumulate, equalWeights, normalize, selectWeightSource } from "./common/weights";
import { parseInteger, type PackRecord } from "./schema";
import type { AwardId, PackSummary, ResolvedPack } from "./types";

/**
 * Roll count of a pack entry: the third field of `[awardId, _, count, ...]`,
 * or the last field of a shorter entry such as `[awardId, count]`.
 */
export function entryRolls(entry: readonly unknown[]): number {
  return parseInteger(entry.length >= 3 ? entry[2] : entry[entry.length - 1]);
}

/**
 * Awards a pack triggers, with accumulated rolls and trigger probabilities.
 *
 * Without GroupWeight or GroupRates every award triggers independently with
 * probability 1. With them, weights are paired with entries by index, summed
 * per award and normalized across the awards they reach.
 */
export function resolvePack(record: PackRecord): ResolvedPack {
  const content = record.PackContent;
  if (content.length === 0) return { rolls: new Map(), trigger: new Map() };

  const source = selectWeightSource(record.GroupWeight, record.GroupRates, content.length);
  const rolls = new Map<AwardId, number>();
  const weights = new Map<AwardId, number>();

  content.forEach((entry, index) => {
    // empty entries still take up their weight index
    if (entry.length === 0) return;
    const awardId = parseInteger(entry[0]);
    accumulate(rolls, awardId, entryRolls(entry));
    if (source.kind !== "uniform" && index < source.values.length) {
      accumulate(weights, awardId, source.values[index]);
    }
  });

  const trigger = source.kind === "uniform" ? equalWeights(rolls.keys(), 1) : normalize(weights);
  return { rolls, trigger };
}

export function resolvePacks(records: readonly PackRecord[]): PackSummary[] {
  return records.map((record) => ({ packId: record.PackID, ...resolvePack(record) }));
}
