import { z } from "zod";

/** A finite number, given either as a JSON number or a numeric string. */
export const numberLike = z
  .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
  .pipe(z.number().finite());

/** A number-like value truncated toward zero. */
export const integerLike = numberLike.transform((v) => Math.trunc(v));

const numberList = z
  .array(numberLike)
  .nullish()
  .transform((v) => v ?? []);

/** One record of DropTable.json: a weighted pool of items. */
export const awardRecordSchema = z.object({
  AwardID: integerLike,
  GroupContent: z
    .array(z.tuple([integerLike]).rest(z.unknown()))
    .nullish()
    .transform((v) => v ?? []),
  GroupWeight: numberList,
  GroupRates: numberList,
});

/** One record of DropPackageTable.json: awards triggered by opening a pack. */
export const packRecordSchema = z.object({
  PackID: integerLike,
  PackContent: z
    .array(z.array(z.unknown()))
    .nullish()
    .transform((v) => v ?? []),
  GroupWeight: numberList,
  GroupRates: numberList,
});

/** One record of ItemTable.json. */
export const itemRecordSchema = z.object({
  Id: integerLike.nullish(),
  Name: z.unknown(),
});

export type AwardRecord = z.output<typeof awardRecordSchema>;
export type AwardRecordInput = z.input<typeof awardRecordSchema>;
export type PackRecord = z.output<typeof packRecordSchema>;
export type PackRecordInput = z.input<typeof packRecordSchema>;
export type ItemRecord = z.output<typeof itemRecordSchema>;

/** Coerce a loosely typed table cell to an integer, failing on anything non-numeric. */
export function parseInteger(value: unknown): number {
  return integerLike.parse(value);
}
