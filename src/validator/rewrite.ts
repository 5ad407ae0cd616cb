import type { SqlDialect } from '../config.js';
import type { TableMetadata } from '../metadata/types.js';
import type { RewriteKind } from '../types.js';
import { addWhereCondition, analyzeQuery, depthAt, escapeRegExp } from './sql-scan.js';

const GUARDED_AGGREGATE = /\b(?:SUM|AVG|MIN|MAX)\s*\(\s*((?:"?[A-Za-z_][\w$]*"?\.)?"?[A-Za-z_][\w$]*"?)\s*\)/gi;
const RELATIVE_DATE = /\b(?:INTERVAL|CURRENT_DATE|CURRENT_TIMESTAMP|NOW\s*\(|CURDATE\s*\(|DATE_SUB\s*\(|DATE_TRUNC\s*\()/i;

export interface RewriteOptions {
  dialect: SqlDialect;
  /** Preferred column for the default time window. */
  dateColumn: string;
}

export interface RewriteResult {
  sql: string;
  rewrites: RewriteKind[];
}

/**
 * Add `<col> IS NOT NULL` for every column aggregated by SUM/AVG/MIN/MAX in
 * the top-level select list that is not already guarded.
 */
export function addNullGuards(sql: string): string {
  const shape = analyzeQuery(sql);
  if (shape.fromIndex === -1 || shape.hasSetOperation) return sql;

  const columns: string[] = [];
  GUARDED_AGGREGATE.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = GUARDED_AGGREGATE.exec(shape.masked)) !== null) {
    if (match.index > shape.fromIndex || depthAt(shape.masked, match.index) !== 0) continue;
    const column = match[1];
    if (/^"?(?:NULL|TRUE|FALSE)"?$/i.test(column)) continue;
    if (!columns.includes(column)) columns.push(column);
  }

  const unguarded = columns.filter(
    column => !new RegExp(`(?<![\\w$.])${escapeRegExp(column)}\\s+IS\\s+NOT\\s+NULL\\b`, 'i').test(shape.masked)
  );
  if (unguarded.length === 0) return sql;

  const condition = unguarded.map(column => `${column} IS NOT NULL`).join(' AND ');
  return addWhereCondition(sql, condition) ?? sql;
}

/**
 * The column the default time window filters on: `preferred` when the table
 * has it, otherwise its first timestamp field.
 */
export function pickDateColumn(metadata: TableMetadata, preferred: string): string | undefined {
  const exact = metadata.fields.find(f => f.name.toLowerCase() === preferred.toLowerCase());
  if (exact) return exact.name;
  return metadata.fields.find(f => f.semanticTag === 'timestamp')?.name;
}

/**
 * True when the top-level WHERE clause already restricts time: it compares
 * one of the table's timestamp columns (`=`, `<`, `<=`, `>`, `>=`, `BETWEEN`)
 * or uses a relative date expression. `IS NOT NULL` alone does not count.
 */
export function hasDateFilter(sql: string, metadata: TableMetadata, dateColumn?: string): boolean {
  const shape = analyzeQuery(sql);
  if (shape.whereIndex === -1) return false;

  const where = shape.masked.slice(shape.whereIndex, shape.tailIndex);
  if (RELATIVE_DATE.test(where)) return true;

  const columns = metadata.fields.filter(f => f.semanticTag === 'timestamp').map(f => f.name);
  if (dateColumn) columns.push(dateColumn);
  return columns.some(column => comparesColumn(where, column));
}

const COMPARISON = '(?:[<>]=?|=)';

function comparesColumn(where: string, column: string): boolean {
  const name = `"?${escapeRegExp(column)}"?`;
  const columnFirst = new RegExp(`(?<![\\w$])${name}\\s*(?:${COMPARISON}(?![<>=])|(?:NOT\\s+)?BETWEEN\\b)`, 'i');
  const columnLast = new RegExp(`(?<![<>!=])${COMPARISON}\\s*(?:"?[\\w$]+"?\\.)?${name}(?![\\w$])`, 'i');
  return columnFirst.test(where) || columnLast.test(where);
}

export function timeWindowCondition(column: string, dialect: SqlDialect): string {
  return dialect === 'mysql'
    ? `${column} >= DATE_SUB(CURRENT_DATE, INTERVAL 1 MONTH)`
    : `${column} >= CURRENT_DATE - INTERVAL '1 month'`;
}

/**
 * Restrict the query to the last month on the table's date column when it has
 * no date filter yet. Running it on its own output changes nothing.
 */
export function injectDefaultTimeWindow(sql: string, metadata: TableMetadata, options: RewriteOptions): string {
  const column = pickDateColumn(metadata, options.dateColumn);
  if (!column) return sql;

  const shape = analyzeQuery(sql);
  if (!shape.mainTable || shape.mainTable.table.toLowerCase() !== metadata.name.toLowerCase()) return sql;
  if (hasDateFilter(sql, metadata, column)) return sql;

  const qualifier = shape.mainTable.alias ?? (shape.hasJoin ? shape.mainTable.table : undefined);
  const target = qualifier ? `${qualifier}.${column}` : column;
  return addWhereCondition(sql, timeWindowCondition(target, options.dialect)) ?? sql;
}

/**
 * Deterministic rewrites, in order: NULL guards, then the default time window.
 */
export function applyRewrites(sql: string, metadata: TableMetadata, options: RewriteOptions): RewriteResult {
  const rewrites: RewriteKind[] = [];
  let current = sql;

  const guarded = addNullGuards(current);
  if (guarded !== current) {
    rewrites.push('null_guard');
    current = guarded;
  }

  const windowed = injectDefaultTimeWindow(current, metadata, options);
  if (windowed !== current) {
    rewrites.push('default_time_window');
    current = windowed;
  }

  return { sql: current, rewrites };
}
