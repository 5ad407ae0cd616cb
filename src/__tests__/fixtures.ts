import { createSession, type Session } from '../metabase/session.js';
import type { TableMetadata } from '../metadata/types.js';
import type { AcceptedOutcome, KpiCandidate } from '../types.js';
import type { RetryPolicy } from '../utils/retry.js';

export const testConfig = {
  METABASE_URL: 'http://metabase.test',
  METABASE_USERNAME: 'analyst@example.com',
  METABASE_PASSWORD: 'test-secret',
  METABASE_DATABASE_ID: undefined,
  SESSION_TTL_HOURS: 336,
  OPENAI_API_KEY: 'test-secret',
  OPENAI_MODEL: 'gpt-4o',
  KPI_TABLES: [],
  KPI_TABLE_PREFIX: 'tb_',
  MAX_PROMPT_FIELDS: 20,
  MAX_KPIS_PER_TABLE: 20,
  SQL_DIALECT: 'postgres',
  DEFAULT_DATE_COLUMN: 'create_date',
  QUERY_TIMEOUT_MS: 30_000,
  REQUEST_DELAY_MS: 0,
  RETRY_MAX_ATTEMPTS: 3,
  RETRY_DELAY_MS: 0,
  OUTPUT_PATH: 'kpis.json',
  KPI_COLLECTION_NAME: 'Validated KPIs',
  LOG_LEVEL: 'silent',
};

export const fastRetry: RetryPolicy = {
  maxAttempts: 3,
  delayMs: 0,
  backoffFactor: 1,
  retryable: ['SERVICE_UNAVAILABLE'],
};

export const session: Session = createSession('session-token', 3_600_000, new Date('2026-01-01T00:00:00Z'));

export const ordersMetadata: TableMetadata = {
  id: 10,
  name: 'orders',
  schema: 'public',
  description: 'Customer orders',
  databaseId: 1,
  fields: [
    { name: 'order_id', type: 'type/Integer', semanticTag: 'primary_key' },
    { name: 'status', type: 'type/Integer', semanticTag: 'foreign_key', foreignKey: { table: 'order_status', field: 'id' } },
    { name: 'payment_total', type: 'type/Decimal', description: 'Amount paid', semanticTag: 'cost' },
    { name: 'create_date', type: 'type/DateTime', semanticTag: 'timestamp' },
  ],
  relationships: [{ field: 'status', resolved: true, targetTable: 'order_status', targetField: 'id', targetTableId: 11 }],
};

export function candidate(name: string, sql: string, table = 'orders'): KpiCandidate {
  return {
    table,
    name,
    description: `${name} description`,
    businessValue: `${name} value`,
    sql,
    outputFormat: 'Single number',
  };
}

export function accepted(name: string, sql: string, table = 'orders'): AcceptedOutcome {
  return {
    candidate: candidate(name, sql, table),
    status: 'valid',
    originalSql: sql,
    executedSql: sql,
    rewrites: [],
    issues: [],
    rowCount: 1,
  };
}
