import { z } from 'zod';

/** Version of the client library, sent in the User-Agent header. */
export const VERSION = '0.1.0';

/** Endpoint of the Objects API. */
export const DEFAULT_BASE_ENDPOINT = 'https://objects.segment.com';

/** Largest delay Node timers accept; anything above is clamped to 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Client options. Every field but `writeKey` has a default; durations
 * are milliseconds.
 */
export const clientConfigSchema = z.object({
  writeKey: z.string().min(1, 'writeKey is required'),
  baseEndpoint: z.string().url().default(DEFAULT_BASE_ENDPOINT),
  maxBatchBytes: z.number().int().positive().default(500 * 1024),
  maxBatchCount: z.number().int().positive().default(100),
  maxBatchInterval: z.number().int().positive().max(MAX_TIMER_MS).default(10_000),
  concurrency: z.number().int().positive().default(10),
  retryMaxElapsed: z.number().int().positive().max(MAX_TIMER_MS).default(10_000),
});

export type ClientConfig = z.infer<typeof clientConfigSchema>;
export type ClientConfigInput = z.input<typeof clientConfigSchema>;

/** Validates options and fills defaults. Throws a ZodError on bad input. */
export function resolveClientConfig(input: ClientConfigInput): ClientConfig {
  return clientConfigSchema.parse(input);
}

function readNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  // NaN is left for the schema to reject
  return Number(raw);
}

function readString(raw: string | undefined): string | undefined {
  return raw === undefined || raw === '' ? undefined : raw;
}

/**
 * Builds the client configuration from environment variables.
 *
 * Unset variables fall back to schema defaults; a missing
 * OBJECTS_WRITE_KEY or a malformed number throws.
 */
export function loadClientConfig(
  env: Record<string, string | undefined> = process.env,
): ClientConfig {
  return resolveClientConfig({
    writeKey: env['OBJECTS_WRITE_KEY'] ?? '',
    baseEndpoint: readString(env['OBJECTS_BASE_ENDPOINT']),
    maxBatchBytes: readNumber(env['OBJECTS_MAX_BATCH_BYTES']),
    maxBatchCount: readNumber(env['OBJECTS_MAX_BATCH_COUNT']),
    maxBatchInterval: readNumber(env['OBJECTS_MAX_BATCH_INTERVAL_MS']),
    concurrency: readNumber(env['OBJECTS_CONCURRENCY']),
    retryMaxElapsed: readNumber(env['OBJECTS_RETRY_MAX_ELAPSED_MS']),
  });
}
