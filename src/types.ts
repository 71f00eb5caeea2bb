/** Integer identifier of an item in the item catalog. */
export type ItemId = number;
/** Integer identifier of an award pool. */
export type AwardId = number;
/** Integer identifier of a pack. */
export type PackId = number;

/** Mapping from key to probability mass. Values sum to 1 unless the mapping is empty. */
export type Distribution<K> = Map<K, number>;

/** Test tolerance for floating-point precision errors. */
export const TEST_EPS = 1e-9;

/** Per-pack view of the awards it triggers. */
export interface ResolvedPack {
  /** Accumulated roll count per referenced award. */
  rolls: Map<AwardId, number>;
  /** Probability that opening the pack triggers each award. */
  trigger: Distribution<AwardId>;
}

/** A pack resolved against its own ID, ready for report assembly. */
export interface PackSummary extends ResolvedPack {
  packId: PackId;
}

/** One line of a drop chance report. */
export interface ReportRow {
  awardId: AwardId;
  packId: PackId;
  itemId: ItemId;
  itemName: string;
  rolls: number;
  inPoolProbability: number;
  packTriggerProbability: number;
  /** Chance the item drops at least once from a single pack opening. */
  finalPerRunProbability: number;
}

export interface Report {
  /** Rows per award, sorted by pack then item. Every award in the award table has an entry. */
  byAward: Map<AwardId, ReportRow[]>;
  /** All rows sorted by award, pack, then item. */
  index: ReportRow[];
}
