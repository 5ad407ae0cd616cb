import { randomBytes } from 'crypto';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { configError, errorMessage } from '../errors.js';
import type { TableMetadata } from '../metadata/types.js';
import type { AcceptedOutcome, ValidationOutcome } from '../types.js';

const RewriteKindSchema = z.enum(['null_guard', 'default_time_window', 'llm_repair']);

const KpiEntrySchema = z.object({
  kpi_name: z.string().min(1),
  description: z.string(),
  business_value: z.string(),
  sql_query: z.string().min(1),
  original_sql: z.string(),
  output_format: z.string(),
  validation_status: z.enum(['valid', 'fixed', 'problematic']),
  rewrites: z.array(RewriteKindSchema).default([]),
  row_count: z.number().int().nonnegative().nullable().default(null),
  error: z.string().nullable().default(null),
});

const FieldEntrySchema = z.object({
  name: z.string(),
  type: z.string(),
  description: z.string().nullable(),
  semantic_type: z.string().nullable(),
  foreign_key: z.object({ target_table: z.string(), target_field: z.string() }).nullable(),
});

const RelationshipEntrySchema = z.object({
  field: z.string(),
  target_table: z.string().nullable(),
  target_field: z.string().nullable(),
  resolved: z.boolean(),
});

const TableEntrySchema = z.object({
  table_name: z.string().min(1),
  table_id: z.number().int(),
  database_id: z.number().int(),
  description: z.string().nullable(),
  schema: z.string().nullable(),
  total_fields: z.number().int().nonnegative(),
  field_details: z.array(FieldEntrySchema),
  relationships: z.array(RelationshipEntrySchema),
  kpis: z.array(KpiEntrySchema),
});

export const KpiDocumentSchema = z.record(z.string(), TableEntrySchema);

export type KpiEntry = z.infer<typeof KpiEntrySchema>;
export type TableEntry = z.infer<typeof TableEntrySchema>;
export type KpiDocument = z.infer<typeof KpiDocumentSchema>;

export function toKpiEntry(outcome: ValidationOutcome): KpiEntry {
  const { candidate } = outcome;
  return {
    kpi_name: candidate.name,
    description: candidate.description,
    business_value: candidate.businessValue,
    sql_query: outcome.executedSql,
    original_sql: outcome.originalSql,
    output_format: candidate.outputFormat,
    validation_status: outcome.status,
    rewrites: [...outcome.rewrites],
    row_count: outcome.rowCount ?? null,
    error: outcome.error ?? null,
  };
}

export function toTableEntry(metadata: TableMetadata, outcomes: readonly ValidationOutcome[]): TableEntry {
  return {
    table_name: metadata.name,
    table_id: metadata.id,
    database_id: metadata.databaseId,
    description: metadata.description ?? null,
    schema: metadata.schema ?? null,
    total_fields: metadata.fields.length,
    field_details: metadata.fields.map(field => ({
      name: field.name,
      type: field.type,
      description: field.description ?? null,
      semantic_type: field.semanticTag ?? null,
      foreign_key: field.foreignKey ? { target_table: field.foreignKey.table, target_field: field.foreignKey.field } : null,
    })),
    relationships: metadata.relationships.map(r => ({
      field: r.field,
      target_table: r.targetTable ?? null,
      target_field: r.targetField ?? null,
      resolved: r.resolved,
    })),
    kpis: outcomes.map(toKpiEntry),
  };
}

/**
 * Write the document through a temporary file and a rename, so a crash never
 * leaves a half-written document at `path`.
 */
export async function writeKpiDocument(path: string, document: KpiDocument): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = `${path}.${randomBytes(4).toString('hex')}.tmp`;
  await writeFile(tmpPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
  await rename(tmpPath, path);
}

export function parseKpiDocument(text: string, source = 'document'): KpiDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw configError(`${source} is not valid JSON: ${errorMessage(err)}`);
  }

  const result = KpiDocumentSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw configError(`${source} is not a KPI document:\n${errors}`);
  }
  return result.data;
}

export async function readKpiDocument(path: string): Promise<KpiDocument> {
  return parseKpiDocument(await readFile(path, 'utf-8'), path);
}

export interface DocumentBatch {
  databaseId: number;
  outcomes: AcceptedOutcome[];
}

/**
 * Rebuild the accepted outcomes recorded in a document, grouped by the
 * database their queries run against.
 */
export function acceptedFromDocument(document: KpiDocument): DocumentBatch[] {
  const batches = new Map<number, AcceptedOutcome[]>();

  for (const table of Object.values(document)) {
    for (const kpi of table.kpis) {
      const status = kpi.validation_status;
      if (status === 'problematic') continue;

      const outcome: AcceptedOutcome = Object.freeze({
        candidate: Object.freeze({
          table: table.table_name,
          name: kpi.kpi_name,
          description: kpi.description,
          businessValue: kpi.business_value,
          sql: kpi.original_sql,
          outputFormat: kpi.output_format,
        }),
        status,
        originalSql: kpi.original_sql,
        executedSql: kpi.sql_query,
        rewrites: Object.freeze([...kpi.rewrites]),
        issues: Object.freeze([]),
        ...(kpi.row_count !== null && { rowCount: kpi.row_count }),
      });

      const batch = batches.get(table.database_id) ?? [];
      batch.push(outcome);
      batches.set(table.database_id, batch);
    }
  }

  return [...batches].map(([databaseId, outcomes]) => ({ databaseId, outcomes }));
}
