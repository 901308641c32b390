/**
 * Process entry point: load config, open the store, serve HTTP until signalled.
 */

import type { Server } from 'http';
import { loadConfig } from './config.js';
import { openStore } from './store/index.js';
import { createApp } from './express/app.js';
import { isAppError } from './errors.js';

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const store = await openStore({
    backend: config.store.backend,
    dataDir: config.store.dataDir,
  });

  const app = createApp({ config, store });
  const server = app.listen(config.port, () => {
    console.log(
      `[Server] Listening on :${config.port} (store: ${store.backend}, app url: ${config.appUrl})`
    );
  });

  if (config.allowDevShopParam) {
    console.warn('[Server] ALLOW_DEV_SHOP_PARAM is on: ?shop= is accepted without a session token');
  }

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`[Server] ${signal} received, shutting down`);
    await closeServer(server);
    await store.close();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error('[Server] Shutdown failed:', error);
        process.exitCode = 1;
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error('[Server] Failed to start:', isAppError(error) ? error.message : error);
  process.exitCode = 1;
});
