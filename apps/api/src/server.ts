import 'dotenv/config';
import { createServer } from 'http';
import { buildApp } from './app.js';
import { loadConfig } from './config/env.js';
import { getActorTypeCatalog } from './config/actor-types.js';

async function main() {
  const config = loadConfig();
  const catalog = getActorTypeCatalog();
  console.log(`[server] actor type catalog loaded (${catalog.list().length} types)`);

  const app = buildApp({ config, catalog });
  const httpServer = createServer(app);

  await new Promise<void>((resolve) => {
    httpServer.listen(config.PORT, resolve);
  });
  console.log(`[server] listening on http://0.0.0.0:${config.PORT}`);

  const shutdown = () => {
    console.log('[server] shutting down...');
    httpServer.close((err) => {
      if (err) console.error('[server] close error', err);
      process.exit(err ? 1 : 0);
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
