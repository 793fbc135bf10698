// ═══════════════════════════════════════════════════════════════════════════════
// HTTP SERVER — Question Answering over JSON
// ═══════════════════════════════════════════════════════════════════════════════

import { createQueryEngine } from './bootstrap.js';
import { createApp } from './api/app.js';
import { getLogger } from './logging/index.js';

const logger = getLogger({ component: 'http' });

async function main(): Promise<void> {
  const engine = await createQueryEngine();
  const app = createApp(engine);
  const { port } = engine.config.server;

  app.listen(port, () => {
    logger.info('Server listening', { port, provider: engine.provider.name });
  });
}

main().catch((error: unknown) => {
  logger.fatal('Server failed to start', error);
  process.exit(1);
});
