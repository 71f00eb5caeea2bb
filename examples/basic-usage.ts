import path from "path";
import { fileURLToPath } from "url";
import {
  awardRecordSchema,
  buildReport,
  generateReports,
  packRecordSchema,
  resolveAwards,
  resolvePacks,
} from "../src/index";

const pct = (x: number) => `${(x * 100).toFixed(2)}%`;

// In-memory: resolve records directly and print the rows.
const awards = resolveAwards([
  awardRecordSchema.parse({ AwardID: 1, GroupContent: [[10], [20], [30]], GroupWeight: [6, 3, 1] }),
]);
const packs = resolvePacks([packRecordSchema.parse({ PackID: 1, PackContent: [[1, 0, 2]] })]);
const report = buildReport(awards, packs, new Map([[30, "Dragon Scale"]]));

for (const row of report.index) {
  console.log(
    `pack ${row.packId} -> ${row.itemName.padEnd(14)} per roll ${pct(row.inPoolProbability)}, per pack ${pct(row.finalPerRunProbability)}`
  );
}

// From disk: the sample tables live in examples/ztable/.
const rootDir = path.dirname(fileURLToPath(import.meta.url));
const summary = generateReports({ rootDir, outputDir: path.join(rootDir, "drop_chance") });
console.log(`\n${summary.files.length} files, ${summary.rows} rows in ${summary.outputDir}`);
