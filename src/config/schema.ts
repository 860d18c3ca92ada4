import { z } from 'zod';

const retrySchema = z.object({
  max_attempts: z.number().int().min(1).default(3),
  delay_ms: z.number().int().min(0).default(2000),
  backoff: z.enum(['fixed', 'exponential']).default('fixed'),
});

const tableSchema = z.object({
  name: z.string().min(1),
  primary_key: z.string().min(1),
  excluded_columns: z.array(z.string()).default(['created_timestamp']),
});

const sourceSchema = z.object({
  type: z.literal('sqlite'),
  path: z.string().min(1),
});

const stateSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('sqlite'), path: z.string().min(1) }),
  z.object({ type: z.literal('blob'), dir: z.string().min(1) }),
]);

const streamSchema = z.object({
  url: z.string().url(),
  headers: z.record(z.string()).default({}),
  max_batch_bytes: z.number().int().min(256).default(256 * 1024),
});

const serverSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3000),
  api_key_hash: z.string().optional(),
});

export const snapdiffConfigSchema = z.object({
  source: sourceSchema,
  state: stateSchema.default({ type: 'sqlite', path: 'snapdiff.db' }),
  stream: streamSchema.optional(),
  tables: z.array(tableSchema).min(1),
  retry: retrySchema.default({}),
  stream_retry: retrySchema.default({ max_attempts: 3, delay_ms: 1000 }),
  concurrency: z.number().int().min(1).max(64).default(1),
  duplicates: z.enum(['last_wins', 'first_wins', 'reject']).default('last_wins'),
  hash_algorithm: z.enum(['md5', 'sha256']).default('md5'),
  log_level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  server: serverSchema.default({}),
});

export type SnapdiffConfig = z.infer<typeof snapdiffConfigSchema>;
export type SnapdiffConfigInput = z.input<typeof snapdiffConfigSchema>;
export type RetryConfig = z.infer<typeof retrySchema>;
