import { z } from 'zod';
import { ConfigError } from '@depthcost/core';
import { DEFAULT_FEED_URL } from '@depthcost/feed';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const seconds = (fallback: number) =>
  z.coerce.number().finite().min(0).default(fallback);

const EnvSchema = z.object({
  WS_URL: z.string().url().default(DEFAULT_FEED_URL),
  MAX_RETRIES: positiveInt(5),
  RETRY_DELAY: seconds(2),
  // 0 disables the read timeout
  READ_TIMEOUT: seconds(30),
  MAX_SAMPLES: positiveInt(1000),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3001),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  CORS_ORIGIN: z.string().optional(),
});

export interface ServiceConfig {
  feed: {
    url: string;
    maxRetries: number;
    retryDelayMs: number;
    readTimeoutMs: number;
  };
  latency: { maxSamples: number };
  http: { port: number; host: string; corsOrigins: string[] };
  logLevel: string;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ServiceConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) {
      present[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    feed: {
      url: values.WS_URL,
      maxRetries: values.MAX_RETRIES,
      retryDelayMs: values.RETRY_DELAY * 1000,
      readTimeoutMs: values.READ_TIMEOUT * 1000,
    },
    latency: { maxSamples: values.MAX_SAMPLES },
    http: {
      port: values.PORT,
      host: values.HOST,
      corsOrigins: (values.CORS_ORIGIN ?? '')
        .split(',')
        .map((value) => value.trim())
        .filter((value) => value.length > 0),
    },
    logLevel: values.LOG_LEVEL,
  };
}
