import { describe, expect, it } from "vitest";
import {
  awardRecordSchema,
  resolveAward,
  resolveAwards,
  TEST_EPS,
  type AwardRecordInput,
} from "../src/index";

const award = (input: AwardRecordInput) => awardRecordSchema.parse(input);

describe("resolveAward", () => {
  it("returns an empty distribution for missing or empty content", () => {
    expect(resolveAward(award({ AwardID: 1 })).size).toBe(0);
    expect(resolveAward(award({ AwardID: 1, GroupContent: [] })).size).toBe(0);
    expect(resolveAward(award({ AwardID: 1, GroupContent: null })).size).toBe(0);
  });

  it("splits evenly by entry count without weights", () => {
    const p = resolveAward(award({ AwardID: 1, GroupContent: [[10], [20]] }));
    expect(p.get(10)).toBe(0.5);
    expect(p.get(20)).toBe(0.5);
  });

  it("counts repeated items once per entry", () => {
    const p = resolveAward(award({ AwardID: 1, GroupContent: [[10, 1], [20, 1], [10, 5], [10]] }));
    expect(p.get(10)).toBe(0.75);
    expect(p.get(20)).toBe(0.25);
  });

  it("sums GroupWeight per item", () => {
    const p = resolveAward(
      award({ AwardID: 2, GroupContent: [[1], [2], [1]], GroupWeight: [1, 1, 2] })
    );
    expect(p.get(1)).toBe(0.75);
    expect(p.get(2)).toBe(0.25);
  });

  it("ignores GroupRates when GroupWeight is present", () => {
    const p = resolveAward(
      award({ AwardID: 3, GroupContent: [[1], [2]], GroupWeight: [1, 3], GroupRates: [3, 1] })
    );
    expect(p.get(1)).toBe(0.25);
    expect(p.get(2)).toBe(0.75);
  });

  it("uses GroupRates when GroupWeight is empty", () => {
    const p = resolveAward(
      award({ AwardID: 4, GroupContent: [[1], [2]], GroupWeight: [], GroupRates: [4, 1] })
    );
    expect(p.get(1)).toBe(0.8);
    expect(p.get(2)).toBe(0.2);
  });

  it("drops content entries past the end of the weight list", () => {
    const p = resolveAward(award({ AwardID: 5, GroupContent: [[1], [2], [3]], GroupWeight: [2, 2] }));
    expect([...p.keys()]).toEqual([1, 2]);
    expect(p.get(1)).toBe(0.5);
  });

  it("spreads evenly when every weight is zero", () => {
    const p = resolveAward(award({ AwardID: 6, GroupContent: [[1], [2], [3], [4]], GroupWeight: [0, 0, 0, 0] }));
    expect([...p.values()]).toEqual([0.25, 0.25, 0.25, 0.25]);
  });

  it("accepts numeric strings for IDs and weights", () => {
    const p = resolveAward(award({ AwardID: "7", GroupContent: [["11"], [12]], GroupWeight: ["1", 3] }));
    expect(p.get(11)).toBe(0.25);
    expect(p.get(12)).toBe(0.75);
  });

  it("rejects a weight that is not a number", () => {
    expect(() => award({ AwardID: 8, GroupContent: [[1]], GroupWeight: ["heavy"] })).toThrow();
  });

  it("sums to one for weighted pools", () => {
    const pools: AwardRecordInput[] = [
      { AwardID: 1, GroupContent: [[1], [2], [3]], GroupWeight: [0.1, 0.2, 0.7] },
      { AwardID: 2, GroupContent: [[5], [6], [5], [7]], GroupRates: [13, 7, 1, 29] },
      { AwardID: 3, GroupContent: [[9], [8], [7], [6], [5]] },
    ];
    for (const input of pools) {
      const p = resolveAward(award(input));
      const sum = [...p.values()].reduce((s, v) => s + v, 0);
      expect(Math.abs(sum - 1)).toBeLessThan(TEST_EPS);
    }
  });
});

describe("resolveAwards", () => {
  it("keeps the last record for a repeated AwardID", () => {
    const awards = resolveAwards([
      award({ AwardID: 1, GroupContent: [[10]] }),
      award({ AwardID: 2, GroupContent: [[30]] }),
      award({ AwardID: 1, GroupContent: [[20]] }),
    ]);
    expect([...awards.keys()]).toEqual([1, 2]);
    expect([...(awards.get(1)?.keys() ?? [])]).toEqual([20]);
  });
});
