import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'path';

// Load environment variables from the package dir or the monorepo root
dotenvConfig({ path: resolve(process.cwd(), '.env') });
dotenvConfig({ path: resolve(process.cwd(), '../../.env') });

// ============================================================================
// Environment Configuration Schema
// ============================================================================

const NodeEnvSchema = z.enum(['development', 'staging', 'production', 'test']);

// Helper to properly parse boolean from env vars (handles "false", "0", etc.)
const envBoolean = (defaultValue: boolean) =>
  z
    .union([z.boolean(), z.string().transform((val) => val.toLowerCase() === 'true' || val === '1')])
    .default(defaultValue);

const ApiConfigSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  corsOrigins: z
    .string()
    .transform((s) => s.split(',').map((origin) => origin.trim()).filter(Boolean))
    .default('http://localhost:8000'),
  staticIndexPath: z.string().startsWith('/').default('/static/index.html'),
  // Longest accepted path parameter; a 254-char email percent-encodes to well over 100
  maxParamLength: z.coerce.number().int().min(100).default(1024),
  // Only trust X-Forwarded-For when running behind a known proxy
  trustProxy: envBoolean(false),
});

const RateLimitConfigSchema = z.object({
  enabled: envBoolean(true),
  max: z.coerce.number().int().min(1).default(100),
  windowMs: z.coerce.number().int().min(1000).default(60000),
});

const DocsConfigSchema = z.object({
  enabled: envBoolean(true),
});

const MetricsConfigSchema = z.object({
  enabled: envBoolean(true),
  collectDefault: envBoolean(true),
  token: z.string().optional(),
});

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema.default('development'),
  appName: z.string().default('mergington-activities'),
  appVersion: z.string().default('1.0.0'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  api: ApiConfigSchema,
  rateLimit: RateLimitConfigSchema,
  docs: DocsConfigSchema,
  metrics: MetricsConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

// ============================================================================
// Parse and Export Configuration
// ============================================================================

function parseConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env['NODE_ENV'],
    appName: process.env['APP_NAME'],
    appVersion: process.env['APP_VERSION'],
    logLevel: process.env['LOG_LEVEL'],

    api: {
      host: process.env['API_HOST'],
      port: process.env['API_PORT'],
      corsOrigins: process.env['CORS_ORIGINS'],
      staticIndexPath: process.env['STATIC_INDEX_PATH'],
      maxParamLength: process.env['MAX_PARAM_LENGTH'],
      trustProxy: process.env['TRUST_PROXY'],
    },

    rateLimit: {
      enabled: process.env['RATE_LIMIT_ENABLED'],
      max: process.env['RATE_LIMIT_MAX'],
      windowMs: process.env['RATE_LIMIT_WINDOW_MS'],
    },

    docs: {
      enabled: process.env['DOCS_ENABLED'],
    },

    metrics: {
      enabled: process.env['METRICS_ENABLED'],
      collectDefault: process.env['METRICS_COLLECT_DEFAULT'],
      token: process.env['METRICS_TOKEN'],
    },
  };

  return ConfigSchema.parse(rawConfig);
}

// Lazy-loaded config singleton
let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = parseConfig();
  }
  return _config;
}

// For testing purposes
export function resetConfig(): void {
  _config = null;
}

export {
  ConfigSchema,
  NodeEnvSchema,
  ApiConfigSchema,
  RateLimitConfigSchema,
  DocsConfigSchema,
  MetricsConfigSchema,
};
