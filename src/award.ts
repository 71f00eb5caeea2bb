import { aggregateWeights, normalize, selectWeightSource } from "./common/weights";
import type { AwardRecord } from "./schema";
import type { AwardId, Distribution, ItemId } from "./types";

/**
 * Per-roll probability of drawing each item from an award pool.
 *
 * Weights come from GroupWeight, else GroupRates, else one per content entry.
 * An award without content resolves to an empty distribution.
 */
export function resolveAward(record: AwardRecord): Distribution<ItemId> {
  const content = record.GroupContent;
  if (content.length === 0) return new Map();

  const itemIds = content.map(([itemId]) => itemId);
  const source = selectWeightSource(record.GroupWeight, record.GroupRates, content.length);
  const { weights } = aggregateWeights(
    itemIds,
    source.kind === "uniform" ? undefined : source.values
  );
  return normalize(weights);
}

/** Resolve every award record. A later record replaces an earlier one with the same AwardID. */
export function resolveAwards(records: readonly AwardRecord[]): Map<AwardId, Distribution<ItemId>> {
  const out = new Map<AwardId, Distribution<ItemId>>();
  for (const record of records) out.set(record.AwardID, resolveAward(record));
  return out;
}
