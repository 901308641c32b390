/**
 * Installation Store - backend selection
 */

import { mkdir } from 'fs/promises';
import { join } from 'path';
import type { Clock } from '../types.js';
import type { InstallationStore, StoreBackend } from './types.js';
import { FileInstallationStore } from './file-store.js';
import { SqliteInstallationStore } from './sqlite-store.js';
import { PersistenceError } from '../errors.js';

export type { InstallationStore, StoreBackend } from './types.js';
export { FileInstallationStore } from './file-store.js';
export { SqliteInstallationStore } from './sqlite-store.js';

export interface OpenStoreOptions {
  backend: StoreBackend;
  /** Directory holding app_data.json (file) or app.db (sqlite) */
  dataDir: string;
  clock?: Clock;
}

export const FILE_STORE_NAME = 'app_data.json';
export const SQLITE_STORE_NAME = 'app.db';

/**
 * Open the configured backend. Call once at startup and close() on shutdown.
 */
export async function openStore(options: OpenStoreOptions): Promise<InstallationStore> {
  const { backend, dataDir, clock } = options;

  if (backend === 'sqlite') {
    try {
      await mkdir(dataDir, { recursive: true });
    } catch (error) {
      throw new PersistenceError(`Failed to create data directory ${dataDir}`, error);
    }
    return SqliteInstallationStore.open(join(dataDir, SQLITE_STORE_NAME), { clock });
  }
  return FileInstallationStore.open(join(dataDir, FILE_STORE_NAME), { clock });
}
