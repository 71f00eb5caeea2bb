#!/usr/bin/env node

// drop-odds entrypoint: reads the drop tables from the working directory
// (or its ztable/ subdirectory) and writes CSV reports to drop_chance/.

import { createLogger } from "./common/logger";
import { resolveConfig } from "./config";
import { generateReports } from "./generate";

const config = resolveConfig();
const logger = createLogger(config.logLevel);

try {
  generateReports(config, logger);
} catch (error) {
  logger.error({ err: error }, "failed to generate drop chance reports");
  process.exitCode = 1;
}
