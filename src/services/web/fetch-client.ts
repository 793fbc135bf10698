// ═══════════════════════════════════════════════════════════════════════════════
// REFERENCE FETCH CLIENT — GET with Timeout and Size Cap
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig } from '../../config/index.js';
import { getLogger } from '../../logging/index.js';
import { ok, err, type AsyncResult } from '../../types/result.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface FetchClientConfig {
  timeoutMs: number;
  maxResponseBytes: number;
  userAgent: string;
}

export interface FetchResult {
  success: boolean;
  url: string;
  statusCode?: number;
  contentType?: string;
  content?: string;
  truncated: boolean;
  error?: string;
  timing: {
    totalMs: number;
  };
}

export interface FetchOptions {
  timeoutMs?: number;
  maxSizeBytes?: number;
  headers?: Record<string, string>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// URL VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface URLValidation {
  valid: boolean;
  error?: string;
  parsed?: URL;
}

export function validateUrl(url: string): URLValidation {
  try {
    const parsed = new URL(url);
    if (!['http:', 'https:'].includes(parsed.protocol)) {
      return { valid: false, error: 'Only HTTP/HTTPS protocols allowed' };
    }
    return { valid: true, parsed };
  } catch {
    return { valid: false, error: 'Invalid URL format' };
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CLIENT
// ─────────────────────────────────────────────────────────────────────────────────

const logger = getLogger({ component: 'fetch' });

export class ReferenceFetchClient {
  private readonly config: FetchClientConfig;

  constructor(config?: Partial<FetchClientConfig>) {
    this.config = { ...loadConfig().fetch, ...config };
  }

  async getText(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startTime = Date.now();
    const maxSize = options.maxSizeBytes ?? this.config.maxResponseBytes;

    const validation = validateUrl(url);
    if (!validation.valid) {
      return this.errorResult(url, validation.error ?? 'Invalid URL', startTime);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs ?? this.config.timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          'Accept': 'application/json,text/html;q=0.9,text/plain;q=0.8',
          ...options.headers,
        },
        signal: controller.signal,
        redirect: 'follow',
      });

      const { content, truncated } = await readBody(response, maxSize);

      logger.debug('Fetched', {
        url,
        status: response.status,
        bytes: content.length,
        truncated,
        durationMs: Date.now() - startTime,
      });

      return {
        success: response.ok,
        url,
        statusCode: response.status,
        contentType: response.headers.get('content-type') ?? 'unknown',
        content,
        truncated,
        error: response.ok ? undefined : `HTTP ${response.status}`,
        timing: { totalMs: Date.now() - startTime },
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return this.errorResult(url, 'Request timeout', startTime);
      }
      return this.errorResult(url, error instanceof Error ? error.message : 'Fetch failed', startTime);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * GET and parse JSON. A truncated body is reported as an error rather than
   * handed to JSON.parse.
   */
  async getJson(url: string, options: FetchOptions = {}): AsyncResult<unknown, string> {
    const result = await this.getText(url, options);
    if (!result.success || result.content === undefined) {
      return err(result.error ?? 'Empty response');
    }
    if (result.truncated) {
      return err('Response exceeded size limit');
    }
    try {
      const data: unknown = JSON.parse(result.content);
      return ok(data);
    } catch {
      return err('Response was not valid JSON');
    }
  }

  private errorResult(url: string, error: string, startTime: number): FetchResult {
    return {
      success: false,
      url,
      error,
      truncated: false,
      timing: { totalMs: Date.now() - startTime },
    };
  }
}

async function readBody(response: Response, maxSize: number): Promise<{ content: string; truncated: boolean }> {
  if (!response.body) {
    return { content: '', truncated: false };
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let content = '';
  let receivedBytes = 0;

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;

    receivedBytes += value.length;
    if (receivedBytes > maxSize) {
      const remaining = maxSize - (receivedBytes - value.length);
      if (remaining > 0) {
        content += decoder.decode(value.slice(0, remaining), { stream: true });
      }
      await reader.cancel();
      return { content: content + decoder.decode(), truncated: true };
    }

    content += decoder.decode(value, { stream: true });
  }

  return { content: content + decoder.decode(), truncated: false };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SINGLETON INSTANCE
// ─────────────────────────────────────────────────────────────────────────────────

let fetchClient: ReferenceFetchClient | null = null;

export function getFetchClient(): ReferenceFetchClient {
  if (!fetchClient) {
    fetchClient = new ReferenceFetchClient();
  }
  return fetchClient;
}
