// ═══════════════════════════════════════════════════════════════════════════════
// BOOTSTRAP — Config → Provider → Registry → Dispatcher
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig, type AppConfig } from './config/index.js';
import { createDocumentProvider } from './services/reference/index.js';
import { createDefaultRegistry } from './core/rules/registry.js';
import { Dispatcher } from './core/rules/dispatcher.js';
import type { DocumentProvider } from './core/rules/types.js';

export interface QueryEngine {
  config: AppConfig;
  provider: DocumentProvider;
  dispatcher: Dispatcher;
}

export async function createQueryEngine(config: AppConfig = loadConfig()): Promise<QueryEngine> {
  const provider = await createDocumentProvider(config);
  const dispatcher = new Dispatcher(createDefaultRegistry(provider));
  return { config, provider, dispatcher };
}
