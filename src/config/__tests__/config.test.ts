// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TESTS — Validation and Environment Loading
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  validateConfig,
  safeValidateConfig,
  formatConfigErrors,
  loadConfig,
  resetConfig,
  isProduction,
} from '../index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

describe('validateConfig', () => {
  it('should fill every section with defaults', () => {
    const config = validateConfig({});

    expect(config.environment).toBe('development');
    expect(config.logging).toEqual({ level: 'warn', format: 'pretty' });
    expect(config.provider).toEqual({
      kind: 'wikipedia',
      fixturesPath: 'data/fact-blocks.json',
      wikipediaApiUrl: 'https://en.wikipedia.org/w/api.php',
    });
    expect(config.fetch).toEqual({
      timeoutMs: 10_000,
      maxResponseBytes: 2_097_152,
      userAgent: 'factbox/1.0 (reference lookup)',
    });
    expect(config.server).toEqual({ port: 3000, trustProxy: false });
  });

  it('should reject an unknown provider', () => {
    expect(() => validateConfig({ provider: { kind: 'encyclopedia' } })).toThrow();
  });

  it('should reject a malformed API URL', () => {
    const result = safeValidateConfig({ provider: { wikipediaApiUrl: 'not a url' } });
    expect(result.success).toBe(false);
  });
});

describe('formatConfigErrors', () => {
  it('should prefix each issue with its path', () => {
    const result = safeValidateConfig({ server: { port: 70000 } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatConfigErrors(result.error)).toEqual([
        'server.port: Number must be less than or equal to 65535',
      ]);
    }
  });

  it('should label root issues', () => {
    const result = safeValidateConfig('nope');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatConfigErrors(result.error)[0]).toMatch(/^\(root\): /);
    }
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT LOADING
// ─────────────────────────────────────────────────────────────────────────────────

describe('loadConfig', () => {
  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    resetConfig();
  });

  it('should read overrides from the environment', () => {
    vi.stubEnv('PORT', '8080');
    vi.stubEnv('FACTBOX_PROVIDER', 'static');
    vi.stubEnv('FETCH_USER_AGENT', 'test-agent');
    vi.stubEnv('TRUST_PROXY', 'yes');

    const config = loadConfig();

    expect(config.server.port).toBe(8080);
    expect(config.server.trustProxy).toBe(true);
    expect(config.provider.kind).toBe('static');
    expect(config.fetch.userAgent).toBe('test-agent');
  });

  it('should accept an upper-case log level', () => {
    vi.stubEnv('LOG_LEVEL', 'DEBUG');
    expect(loadConfig().logging.level).toBe('debug');
  });

  it('should fall back to defaults for blank or non-numeric values', () => {
    vi.stubEnv('PORT', 'abc');
    vi.stubEnv('LOG_LEVEL', '   ');

    const config = loadConfig();

    expect(config.server.port).toBe(3000);
    expect(config.logging.level).toBe('warn');
  });

  it('should name the offending setting when invalid', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    expect(() => loadConfig()).toThrow('logging.level');
  });

  it('should cache until reset', () => {
    vi.stubEnv('PORT', '4000');
    const first = loadConfig();

    vi.stubEnv('PORT', '5000');
    expect(loadConfig()).toBe(first);

    resetConfig();
    expect(loadConfig().server.port).toBe(5000);
  });

  it('should report production', () => {
    vi.stubEnv('NODE_ENV', 'production');
    expect(isProduction()).toBe(true);
  });
});
