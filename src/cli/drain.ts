#!/usr/bin/env node
/**
 * One retry-queue sweep, for cron (e.g. `0 8 * * *`).
 *
 * Exits 0 when the sweep ran, whatever happened to individual tasks;
 * non-zero only when the sweep itself could not run.
 */

import { loadConfigFromEnv } from '../config.js';
import { runDrain } from '../drain.js';
import { getLogger } from '../logging.js';

async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  if (!config.dbPath) {
    getLogger().warn('RQC_BRIDGE_DB_PATH is not set; draining an empty in-memory queue');
  }
  await runDrain({ config });
}

main().catch((err: unknown) => {
  getLogger().fatal({ err }, 'Drain failed');
  process.exit(1);
});
