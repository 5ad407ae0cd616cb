import type { SqlDialect } from '../config.js';
import type { FieldInfo, TableMetadata } from '../metadata/types.js';

export const KPI_SYSTEM_PROMPT =
  'You are a data analytics expert who writes meaningful KPIs backed by correct SQL. Always respond with valid JSON only.';

export const REPAIR_SYSTEM_PROMPT =
  'You are a SQL expert who fixes broken queries. Return only the corrected SQL query, with no explanation.';

const DIALECT_NAMES: Record<SqlDialect, string> = {
  postgres: 'PostgreSQL',
  mysql: 'MySQL',
};

export interface PromptField {
  name: string;
  type: string;
  description: string;
  semantic_type?: string;
  foreign_key?: string;
}

/**
 * First `maxFields` fields in fetch order. Deterministic, and lossy on purpose:
 * the rest are only counted.
 */
export function truncateFields(fields: readonly FieldInfo[], maxFields: number): { kept: FieldInfo[]; omitted: number } {
  const kept = fields.slice(0, maxFields);
  return { kept, omitted: Math.max(0, fields.length - kept.length) };
}

function toPromptField(field: FieldInfo): PromptField {
  return {
    name: field.name,
    type: field.type,
    description: field.description ?? 'No description',
    ...(field.semanticTag && { semantic_type: field.semanticTag }),
    ...(field.foreignKey && { foreign_key: `${field.foreignKey.table}.${field.foreignKey.field}` }),
  };
}

export function buildKpiPrompt(
  metadata: TableMetadata,
  options: { maxFields: number; maxKpis: number; dialect: SqlDialect }
): string {
  const { kept, omitted } = truncateFields(metadata.fields, options.maxFields);
  const related = metadata.relationships
    .filter(r => r.resolved && r.targetTable)
    .map(r => `${r.field} -> ${r.targetTable}.${r.targetField}`);

  const tableInfo = {
    name: metadata.name,
    schema: metadata.schema ?? 'Unknown',
    description: metadata.description ?? 'No description',
  };

  const least = Math.min(15, options.maxKpis);
  const count = least === options.maxKpis ? `${least}` : `between ${least} and ${options.maxKpis}`;

  return `Generate ${count} useful KPIs for the table "${metadata.name}".

Table:
${JSON.stringify(tableInfo, null, 2)}

Fields:
${JSON.stringify(kept.map(toPromptField), null, 2)}${omitted > 0 ? `\n... and ${omitted} more fields` : ''}

Relationships: ${related.length > 0 ? related.join(', ') : 'none'}

SQL rules (${DIALECT_NAMES[options.dialect]}):
1. Guard aggregates and date arithmetic against NULL values.
2. Never nest aggregate functions (AVG(COUNT(...)) is invalid); use a subquery.
3. Use only the fields listed above, or fields of related tables joined on their foreign keys.
4. Use ${DIALECT_NAMES[options.dialect]} date functions and plain ASCII operators.
5. Restrict time-based KPIs to a reasonable window.

Respond with ONLY a JSON array of objects with these keys:
[
  {
    "kpi_name": "KPI name",
    "description": "What this KPI measures",
    "business_value": "Why this KPI matters",
    "sql_query": "SELECT ...",
    "output_format": "What the result represents"
  }
]`;
}

export function buildRepairPrompt(
  sql: string,
  errorMessage: string,
  metadata: TableMetadata,
  options: { maxFields: number; dialect: SqlDialect; warnings: readonly string[] }
): string {
  const { kept } = truncateFields(metadata.fields, options.maxFields);
  const fieldList = kept.map(f => `- ${f.name}: ${f.type}`).join('\n');
  const warnings = options.warnings.length > 0
    ? `\nKnown issues:\n${options.warnings.map(w => `- ${w}`).join('\n')}\n`
    : '';

  return `Fix this ${DIALECT_NAMES[options.dialect]} query against the table "${metadata.name}".

Fields:
${fieldList}

Query:
${sql}

Database error:
${errorMessage}
${warnings}
Return ONLY the corrected SQL query.`;
}
