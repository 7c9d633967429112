/**
 * One retry-queue sweep against the configured storage.
 */

import { createBridgeRuntime } from './app.js';
import { getLogger } from './logging.js';
import type { BridgeConfig } from './config.js';
import type { BridgeStorage } from './storage/storage-interface.js';
import type { DrainResult } from './types/grading-contract.js';

export interface DrainCommandOptions {
  config: BridgeConfig;
  /** Overrides the storage chosen from `config.dbPath` */
  storage?: BridgeStorage;
  fetchFn?: typeof fetch;
  now?: Date;
}

/**
 * Open the storage, drain due tasks once, close the storage.
 */
export async function runDrain(options: DrainCommandOptions): Promise<DrainResult> {
  const logger = getLogger().child({ logger: 'drain' });
  const { bridge, storage } = await createBridgeRuntime(options.config, {
    storage: options.storage,
    fetchFn: options.fetchFn,
    logger,
  });
  try {
    return await bridge.drainDueTasks(options.now ?? new Date());
  } finally {
    await storage.close();
  }
}
