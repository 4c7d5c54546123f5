#!/usr/bin/env node
import { getConfig } from '../config.js';
import { logger } from '../logger.js';
import { runCycle } from '../services/pipeline.js';

/**
 * One-shot scrape cycle for cron / CI schedulers. Exits 0 on success, 1 on any failure.
 */
async function main() {
  const config = getConfig();
  logger.info({ dataFile: config.dataFile, dashboardFile: config.dashboardFile, alerts: config.alerts }, 'Configuration loaded');
  const result = await runCycle({ config });
  logger.info(result, 'Cycle summary');
}

main()
  .then(() => process.exit(0))
  .catch((err: unknown) => {
    logger.error({ err }, 'Cycle failed');
    process.exit(1);
  });
