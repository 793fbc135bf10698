// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Config for Lookup, Fetch, Logging and HTTP
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function envString(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
}

function envNumber(key: string): number | undefined {
  const value = envString(key);
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function envBool(key: string): boolean | undefined {
  const value = envString(key)?.toLowerCase();
  if (value === undefined) return undefined;
  return value === 'true' || value === '1' || value === 'yes';
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

export const EnvironmentSchema = z.enum(['development', 'test', 'production']);
export type Environment = z.infer<typeof EnvironmentSchema>;

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

export const AppConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),

  logging: z.object({
    level: LogLevelSchema.default('warn'),
    format: z.enum(['pretty', 'json']).default('pretty'),
  }).default({}),

  provider: z.object({
    kind: z.enum(['wikipedia', 'static']).default('wikipedia'),
    fixturesPath: z.string().min(1).default('data/fact-blocks.json'),
    wikipediaApiUrl: z.string().url().default('https://en.wikipedia.org/w/api.php'),
  }).default({}),

  fetch: z.object({
    timeoutMs: z.number().int().positive().default(10_000),
    maxResponseBytes: z.number().int().positive().default(2 * 1024 * 1024),
    userAgent: z.string().min(1).default('factbox/1.0 (reference lookup)'),
  }).default({}),

  server: z.object({
    port: z.number().int().min(1).max(65535).default(3000),
    trustProxy: z.boolean().default(false),
  }).default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Parse a raw config object, throwing a ZodError when it is invalid.
 */
export function validateConfig(input: unknown): AppConfig {
  return AppConfigSchema.parse(input);
}

export function safeValidateConfig(input: unknown) {
  return AppConfigSchema.safeParse(input);
}

/**
 * One line per issue, e.g. `server.port: Number must be less than or equal to 65535`.
 */
export function formatConfigErrors(error: z.ZodError): string[] {
  return error.errors.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Read the raw (unvalidated) configuration from process.env. Unset variables
 * are left undefined so the schema defaults apply.
 */
export function readEnvironment() {
  return {
    environment: envString('NODE_ENV'),
    logging: {
      level: envString('LOG_LEVEL')?.toLowerCase(),
      format: envString('LOG_FORMAT'),
    },
    provider: {
      kind: envString('FACTBOX_PROVIDER'),
      fixturesPath: envString('FACTBOX_FIXTURES_PATH'),
      wikipediaApiUrl: envString('WIKIPEDIA_API_URL'),
    },
    fetch: {
      timeoutMs: envNumber('FETCH_TIMEOUT_MS'),
      maxResponseBytes: envNumber('FETCH_MAX_BYTES'),
      userAgent: envString('FETCH_USER_AGENT'),
    },
    server: {
      port: envNumber('PORT'),
      trustProxy: envBool('TRUST_PROXY'),
    },
  };
}

let cachedConfig: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;

  const result = safeValidateConfig(readEnvironment());
  if (!result.success) {
    throw new Error(`Invalid configuration:\n  ${formatConfigErrors(result.error).join('\n  ')}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}

export function isProduction(): boolean {
  return loadConfig().environment === 'production';
}
