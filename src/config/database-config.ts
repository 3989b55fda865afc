import { z } from 'zod';

// --- Schemas ---

export const PoolConfigSchema = z.object({
  /** Maximum open connections (default: 25) */
  max: z.number().int().positive().default(25),
  /** How long an idle connection lives, in ms (default: 5 minutes) */
  idleTimeoutMillis: z.number().int().nonnegative().default(300_000),
  /** How long to wait for a new connection, in ms (0 = no limit) */
  connectionTimeoutMillis: z.number().int().nonnegative().default(0),
});

export const RetryConfigSchema = z.object({
  /** Connection attempts before giving up (default: 3) */
  attempts: z.number().int().positive().default(3),
  /** Delay before the first retry; doubles after each attempt (default: 1000) */
  baseDelayMillis: z.number().int().nonnegative().default(1_000),
});

export const PostgresConfigSchema = z.object({
  provider: z.literal('postgres'),
  host: z.string().min(1).default('localhost'),
  port: z.number().int().positive().default(5432),
  user: z.string().min(1),
  password: z.string().default(''),
  database: z.string().min(1),
  pool: PoolConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
});

export const SqliteConfigSchema = z.object({
  provider: z.literal('sqlite'),
  /** Path to the database file */
  path: z.string().min(1),
  /** Work on a temporary copy, leaving the file untouched (default: true) */
  copyToTemp: z.boolean().default(true),
});

export const DatabaseConfigSchema = z.discriminatedUnion('provider', [
  PostgresConfigSchema,
  SqliteConfigSchema,
]);

// --- Inferred Types ---

export type PoolConfig = z.infer<typeof PoolConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type PostgresConfig = z.infer<typeof PostgresConfigSchema>;
export type SqliteConfig = z.infer<typeof SqliteConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type DatabaseConfigInput = z.input<typeof DatabaseConfigSchema>;

/**
 * Validates a database configuration (e.g. parsed JSON) and fills in defaults.
 * @throws ZodError when the input does not match either provider
 */
export const parseDatabaseConfig = (input: unknown): DatabaseConfig =>
  DatabaseConfigSchema.parse(input);
