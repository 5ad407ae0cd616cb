import { z } from 'zod';
import { configError } from './errors.js';

const csv = (v: string | undefined): string[] =>
  v ? v.split(',').map(s => s.trim()).filter(Boolean) : [];

const configSchema = z.object({
  // Metabase connection
  METABASE_URL: z.string().url().transform(v => v.replace(/\/+$/, '')),
  METABASE_USERNAME: z.string().min(1, 'METABASE_USERNAME is required'),
  METABASE_PASSWORD: z.string().min(1, 'METABASE_PASSWORD is required'),
  METABASE_DATABASE_ID: z.coerce.number().int().positive().optional(),
  SESSION_TTL_HOURS: z.coerce.number().positive().default(336),

  // Text generation
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_MODEL: z.string().default('gpt-4o'),

  // Table selection
  KPI_TABLES: z.string().optional().transform(csv),
  KPI_TABLE_PREFIX: z.string().default('tb_'),

  // Generation and validation
  MAX_PROMPT_FIELDS: z.coerce.number().int().positive().default(20),
  MAX_KPIS_PER_TABLE: z.coerce.number().int().positive().default(20),
  SQL_DIALECT: z.enum(['postgres', 'mysql']).default('postgres'),
  DEFAULT_DATE_COLUMN: z.string().default('create_date'),
  QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Rate limiting and retries
  REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),

  // Output and registration
  OUTPUT_PATH: z.string().default('kpis.json'),
  KPI_COLLECTION_NAME: z.string().default('Validated KPIs'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Config = z.infer<typeof configSchema>;
export type SqlDialect = Config['SQL_DIALECT'];

let config: Config | null = null;

/**
 * Validate an environment record. Every issue is reported at once so a
 * misconfigured run fails with the full list.
 */
export function parseConfig(env: Record<string, string | undefined>): Config {
  const result = configSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw configError(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

export function loadConfig(): Config {
  if (config) return config;
  config = parseConfig(process.env);
  return config;
}

export function getConfig(): Config {
  if (!config) {
    return loadConfig();
  }
  return config;
}
