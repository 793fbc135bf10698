// ═══════════════════════════════════════════════════════════════════════════════
// REFERENCE SERVICE — Document Provider Selection
// ═══════════════════════════════════════════════════════════════════════════════

import type { AppConfig } from '../../config/index.js';
import type { DocumentProvider } from '../../core/rules/types.js';
import { ReferenceFetchClient } from '../web/fetch-client.js';
import { WikipediaDocumentProvider } from './wikipedia-provider.js';
import { StaticDocumentProvider } from './static-provider.js';

export async function createDocumentProvider(config: AppConfig): Promise<DocumentProvider> {
  switch (config.provider.kind) {
    case 'static':
      return StaticDocumentProvider.fromFile(config.provider.fixturesPath);
    case 'wikipedia':
      return new WikipediaDocumentProvider({
        apiUrl: config.provider.wikipediaApiUrl,
        client: new ReferenceFetchClient(config.fetch),
      });
  }
}

export { extractFactBlock, SUMMARY_BOX_SELECTOR } from './fact-block.js';
export { WikipediaDocumentProvider, type WikipediaProviderOptions } from './wikipedia-provider.js';
export { StaticDocumentProvider, FactBlockFileSchema } from './static-provider.js';
export type { DocumentProvider } from '../../core/rules/types.js';
