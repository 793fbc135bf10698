// ═══════════════════════════════════════════════════════════════════════════════
// WIKIPEDIA PROVIDER — Search, Render, Take the First Infobox
// ═══════════════════════════════════════════════════════════════════════════════
//
// Two MediaWiki API calls per subject:
//   1. action=query&list=search   → title of the best hit
//   2. action=parse&prop=text     → rendered HTML of that page
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { ok, err, type AsyncResult } from '../../types/result.js';
import {
  subjectNotFound,
  noFactBlock,
  fetchFailed,
  type LookupError,
} from '../../core/extraction/errors.js';
import type { DocumentProvider } from '../../core/rules/types.js';
import { getFetchClient, type ReferenceFetchClient } from '../web/fetch-client.js';
import { getLogger } from '../../logging/index.js';
import { extractFactBlock } from './fact-block.js';

// ─────────────────────────────────────────────────────────────────────────────────
// API PAYLOADS
// ─────────────────────────────────────────────────────────────────────────────────

const ApiErrorSchema = z.object({
  error: z.object({
    code: z.string(),
    info: z.string().optional(),
  }),
});

const SearchResponseSchema = z.object({
  query: z.object({
    search: z.array(z.object({
      title: z.string(),
      pageid: z.number().optional(),
    })),
  }),
});

const ParseResponseSchema = z.object({
  parse: z.object({
    title: z.string(),
    text: z.string(),
  }),
});

// ─────────────────────────────────────────────────────────────────────────────────
// PROVIDER
// ─────────────────────────────────────────────────────────────────────────────────

export interface WikipediaProviderOptions {
  apiUrl: string;
  client?: ReferenceFetchClient;
}

const logger = getLogger({ component: 'wikipedia' });

export class WikipediaDocumentProvider implements DocumentProvider {
  readonly name = 'wikipedia';
  private readonly apiUrl: string;
  private readonly client: ReferenceFetchClient;

  constructor(options: WikipediaProviderOptions) {
    this.apiUrl = options.apiUrl;
    this.client = options.client ?? getFetchClient();
  }

  async fetchFactBlock(subject: string): AsyncResult<string, LookupError> {
    const title = await this.searchTitle(subject);
    if (!title.ok) {
      return title;
    }

    const html = await this.pageHtml(subject, title.value);
    if (!html.ok) {
      return html;
    }

    const block = extractFactBlock(html.value);
    if (block === null) {
      return err(noFactBlock(subject, title.value));
    }

    logger.debug('Summary box found', { subject, page: title.value, length: block.length });
    return ok(block);
  }

  searchUrl(subject: string): string {
    return this.buildUrl({
      action: 'query',
      list: 'search',
      srsearch: subject,
      srlimit: '1',
    });
  }

  parseUrl(title: string): string {
    return this.buildUrl({
      action: 'parse',
      page: title,
      prop: 'text',
      redirects: '1',
    });
  }

  private async searchTitle(subject: string): AsyncResult<string, LookupError> {
    const response = await this.client.getJson(this.searchUrl(subject));
    if (!response.ok) {
      return err(fetchFailed(subject, response.error));
    }

    const parsed = SearchResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(fetchFailed(subject, describeBadPayload(response.value)));
    }

    const first = parsed.data.query.search[0];
    if (!first) {
      return err(subjectNotFound(subject));
    }
    return ok(first.title);
  }

  private async pageHtml(subject: string, title: string): AsyncResult<string, LookupError> {
    const response = await this.client.getJson(this.parseUrl(title));
    if (!response.ok) {
      return err(fetchFailed(subject, response.error));
    }

    const apiError = ApiErrorSchema.safeParse(response.value);
    if (apiError.success && apiError.data.error.code === 'missingtitle') {
      return err(subjectNotFound(subject));
    }

    const parsed = ParseResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(fetchFailed(subject, describeBadPayload(response.value)));
    }
    return ok(parsed.data.parse.text);
  }

  private buildUrl(params: Record<string, string>): string {
    const url = new URL(this.apiUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('format', 'json');
    url.searchParams.set('formatversion', '2');
    return url.toString();
  }
}

function describeBadPayload(data: unknown): string {
  const apiError = ApiErrorSchema.safeParse(data);
  if (apiError.success) {
    return `API error ${apiError.data.error.code}${apiError.data.error.info ? `: ${apiError.data.error.info}` : ''}`;
  }
  return 'Unexpected API response';
}
