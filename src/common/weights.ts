// weights.ts

/**
 * Which list a pool or pack draws its weights from.
 * Explicit weights win over rates; with neither, every entry counts once.
 */
export type WeightSource =
  | { kind: "weight"; values: number[] }
  | { kind: "rate"; values: number[] }
  | { kind: "uniform" };

/**
 * Pick the weight source for a record and truncate it to `length` entries.
 * An empty list counts as absent.
 */
export function selectWeightSource(
  weights: readonly number[],
  rates: readonly number[],
  length: number
): WeightSource {
  if (weights.length > 0) return { kind: "weight", values: weights.slice(0, length) };
  if (rates.length > 0) return { kind: "rate", values: rates.slice(0, length) };
  return { kind: "uniform" };
}

/** Assign the same value to every key. Shared by the zero-total fallbacks. */
export function equalWeights<K>(keys: Iterable<K>, value: number): Map<K, number> {
  const out = new Map<K, number>();
  for (const key of keys) out.set(key, value);
  return out;
}

export function sumValues<K>(values: ReadonlyMap<K, number>): number {
  let total = 0;
  for (const v of values.values()) total += v;
  return total;
}

/** Add `amount` to the value stored under `key`. */
export function accumulate<K>(target: Map<K, number>, key: K, amount: number): void {
  target.set(key, (target.get(key) ?? 0) + amount);
}

/**
 * Sum weights per distinct key.
 *
 * - Without `weights`, each entry contributes 1.
 * - With `weights`, entries are paired by index and unmatched trailing keys are dropped.
 * - A total of zero or less over at least one key resets every key to weight 1.
 */
export function aggregateWeights<K>(
  keys: readonly K[],
  weights?: readonly number[]
): { weights: Map<K, number>; total: number } {
  const perKey = new Map<K, number>();
  if (weights === undefined) {
    for (const key of keys) accumulate(perKey, key, 1);
  } else {
    const n = Math.min(keys.length, weights.length);
    for (let i = 0; i < n; i++) accumulate(perKey, keys[i], weights[i]);
  }

  const total = sumValues(perKey);
  if (total <= 0 && perKey.size > 0) {
    return { weights: equalWeights(perKey.keys(), 1), total: perKey.size };
  }
  return { weights: perKey, total };
}

/**
 * Scale weights so they sum to 1. A non-positive total splits the mass equally.
 */
export function normalize<K>(weights: ReadonlyMap<K, number>): Map<K, number> {
  if (weights.size === 0) return new Map();
  const total = sumValues(weights);
  if (total <= 0) return equalWeights(weights.keys(), 1 / weights.size);

  const out = new Map<K, number>();
  for (const [key, w] of weights) out.set(key, w / total);
  return out;
}
