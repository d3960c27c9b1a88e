// Environment-driven configuration for both processes

import { z } from 'zod';
import { ConfigError } from './errors.js';

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']).default('info');

const wsUrl = z.string().refine(
  (val) => {
    try {
      const url = new URL(val);
      return url.protocol === 'ws:' || url.protocol === 'wss:';
    } catch {
      return false;
    }
  },
  { message: 'Invalid WebSocket URL (expected ws:// or wss://)' }
);

const optionalKey = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== '' ? val.trim() : undefined));

const positiveMs = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const CollectorConfigSchema = z.object({
  // Validator node
  RIPPLED_WS_URL: wsUrl.default('ws://localhost:6006'),
  RIPPLED_HTTP_URL: z.string().url().default('http://localhost:5005'),

  // Time-series store
  VICTORIA_METRICS_URL: z.string().url().default('http://localhost:8428'),

  // Auto-detected from server_info when unset
  VALIDATOR_PUBLIC_KEY: optionalKey,

  HEALTH_PORT: z.coerce.number().int().min(0).max(65535).default(8090),
  LOG_LEVEL: LogLevelSchema,

  // Poll cadences (ms)
  POLL_SERVER_INFO_MS: positiveMs(5000),
  POLL_PEERS_MS: positiveMs(60_000),
  POLL_SERVER_STATE_MS: positiveMs(300_000),

  // Stream liveness
  HEARTBEAT_INTERVAL_MS: positiveMs(30_000),
  HEARTBEAT_TIMEOUT_MS: positiveMs(10_000),
  MAX_RECONNECT_ATTEMPTS: z.coerce.number().int().positive().default(10),

  // Reconciliation
  GRACE_PERIOD_MS: positiveMs(8000),
  REPAIR_WINDOW_MS: positiveMs(300_000),
  RETENTION_WINDOW_MS: positiveMs(600_000),
});

export const ExporterConfigSchema = z.object({
  RIPPLED_HTTP_URL: z.string().url().default('http://localhost:5005'),
  EXPORTER_PORT: z.coerce.number().int().min(0).max(65535).default(9103),
  INSTANCE_LABEL: z.string().min(1).default('validator'),
  STATE_POLL_MS: positiveMs(1000),
  PEERS_POLL_MS: positiveMs(5000),
  LOG_LEVEL: LogLevelSchema,
});

export type CollectorConfig = z.infer<typeof CollectorConfigSchema>;
export type ExporterConfig = z.infer<typeof ExporterConfigSchema>;

function parseEnv<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, env: NodeJS.ProcessEnv): T {
  const result = schema.safeParse(env);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
}

export function loadCollectorConfig(env: NodeJS.ProcessEnv = process.env): CollectorConfig {
  const config = parseEnv(CollectorConfigSchema, env);
  if (config.HEARTBEAT_TIMEOUT_MS >= config.HEARTBEAT_INTERVAL_MS) {
    throw new ConfigError('Invalid configuration: HEARTBEAT_TIMEOUT_MS must be shorter than HEARTBEAT_INTERVAL_MS', [
      'HEARTBEAT_TIMEOUT_MS',
    ]);
  }
  return config;
}

export function loadExporterConfig(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
  return parseEnv(ExporterConfigSchema, env);
}
