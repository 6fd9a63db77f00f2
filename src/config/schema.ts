import { z } from 'zod';
import { DEFAULT_SHOP_CHOICES, LEDGER_DEFAULTS } from '../expenses/constants.js';

// Environment validation
const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// HTTP server
const ServerConfigSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(8000),
  maxBodyBytes: z.number().int().min(1024).default(64 * 1024),
});

// Storage
const DatabaseConfigSchema = z.object({
  type: z.enum(['sqlite', 'memory']).default('sqlite'),
  filename: z.string().min(1).default('expenses.db'),
  busyTimeout: z.number().int().min(0).default(5000),
  journalMode: z.enum(['wal', 'delete', 'truncate', 'memory', 'off']).default('wal'),
  logging: z.boolean().default(false),
});

// Observability configuration
const ObservabilityConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    prettyPrint: z.boolean().default(false),
    redactPaths: z.array(z.string()).default([]),
  }).default({}),
});

// Ledger behaviour
const LedgerConfigSchema = z.object({
  amountPolicy: z.enum(['lenient', 'strict']).default(LEDGER_DEFAULTS.amountPolicy),
  requireMonthForView: z.boolean().default(LEDGER_DEFAULTS.requireMonthForView),
  yearsBefore: z.number().int().min(0).max(50).default(LEDGER_DEFAULTS.yearsBefore),
  yearsAfter: z.number().int().min(0).max(50).default(LEDGER_DEFAULTS.yearsAfter),
  shops: z.array(z.string().min(1)).min(1).default([...DEFAULT_SHOP_CHOICES]),
});

// Root configuration schema
export const ConfigSchema = z.object({
  env: NodeEnvSchema,
  server: ServerConfigSchema.default({}),
  database: DatabaseConfigSchema.default({}),
  observability: ObservabilityConfigSchema.default({}),
  ledger: LedgerConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type StorageConfig = z.infer<typeof DatabaseConfigSchema>;
export type ObservabilityConfig = z.infer<typeof ObservabilityConfigSchema>;
export type LedgerConfig = z.infer<typeof LedgerConfigSchema>;

type Env = Record<string, string | undefined>;

function envNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  // Leave junk as a string so the schema reports it against its path
  return Number.isNaN(parsed) ? value : parsed;
}

function envBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return value;
}

function envString(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

// Configuration loader with validation
export class ConfigLoader {
  static load(raw: unknown): Config {
    const result = ConfigSchema.safeParse(raw);

    if (!result.success) {
      throw new ConfigValidationError(
        result.error.errors.map(e => ({ path: e.path.join('.'), message: e.message }))
      );
    }

    return result.data;
  }

  /**
   * Map environment variables onto the config tree and validate it.
   * Unset or blank variables fall back to schema defaults.
   */
  static fromEnv(env: Env = process.env): Config {
    return this.load({
      env: envString(env.NODE_ENV),
      server: {
        host: envString(env.HOST),
        port: envNumber(env.PORT),
      },
      database: {
        type: envString(env.EXPENSES_DB_TYPE),
        filename: envString(env.EXPENSES_DB_PATH),
        logging: envBoolean(env.EXPENSES_DB_LOGGING),
      },
      observability: {
        logging: {
          level: envString(env.LOG_LEVEL),
          prettyPrint: envBoolean(env.LOG_PRETTY),
        },
      },
      ledger: {
        amountPolicy: envString(env.AMOUNT_POLICY),
        requireMonthForView: envBoolean(env.REQUIRE_MONTH_FOR_VIEW),
      },
    });
  }
}

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  public readonly errors: Array<{ path: string; message: string }>;

  constructor(errors: Array<{ path: string; message: string }>) {
    const message = errors.map(e =>
      e.path ? `${e.path}: ${e.message}` : e.message
    ).join(', ');

    super(`Configuration validation failed: ${message}`);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}
