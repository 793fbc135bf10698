// ═══════════════════════════════════════════════════════════════════════════════
// FACTBOX — Public API
// ═══════════════════════════════════════════════════════════════════════════════

export * from './core/matching/index.js';
export * from './core/extraction/index.js';
export * from './core/rules/index.js';
export {
  createDocumentProvider,
  extractFactBlock,
  WikipediaDocumentProvider,
  StaticDocumentProvider,
} from './services/reference/index.js';
export { ReferenceFetchClient } from './services/web/index.js';
export { createQueryEngine, type QueryEngine } from './bootstrap.js';
export { loadConfig, resetConfig, type AppConfig } from './config/index.js';
export { runSession, WELCOME_LINE, FAREWELL_LINE } from './cli/session.js';
export type { Result, AsyncResult, AppError } from './types/result.js';
