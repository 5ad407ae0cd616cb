import type { SqlDialect } from '../config.js';
import type { TableMetadata } from '../metadata/types.js';
import type { StaticIssue } from '../types.js';
import { escapeRegExp, maskSql, matchParen, readTableRef } from './sql-scan.js';

const AGGREGATE_CALL = /\b(AVG|SUM|MIN|MAX|COUNT)\s*\(/gi;
const SUBQUERY_START = /^\s*(?:SELECT|WITH)\b/i;

// Unicode arrows, and arrows drawn with a minus sign or a long dash
const NON_ASCII_ARROW = /[\u2192\u21D2\u27F6]|[\u2212\u2013\u2014]>>?/;

const FOREIGN_DATE_SYNTAX: Record<SqlDialect, Array<{ pattern: RegExp; label: string }>> = {
  postgres: [
    { pattern: /\bDATEDIFF\s*\(/i, label: 'DATEDIFF()' },
    { pattern: /\bTIMESTAMPDIFF\s*\(/i, label: 'TIMESTAMPDIFF()' },
    { pattern: /\bDATE_SUB\s*\(/i, label: 'DATE_SUB()' },
    { pattern: /\bDATE_ADD\s*\(/i, label: 'DATE_ADD()' },
    { pattern: /\bDATE_FORMAT\s*\(/i, label: 'DATE_FORMAT()' },
    { pattern: /\bCURDATE\s*\(/i, label: 'CURDATE()' },
    { pattern: /\bINTERVAL\s+\d+\s+[A-Z]+/i, label: 'unquoted INTERVAL' },
  ],
  mysql: [
    { pattern: /::\s*[A-Z]/i, label: ':: cast' },
    { pattern: /\bDATE_PART\s*\(/i, label: 'DATE_PART()' },
    { pattern: /\bDATE_TRUNC\s*\(/i, label: 'DATE_TRUNC()' },
    { pattern: /\bAGE\s*\(/i, label: 'AGE()' },
    { pattern: /\bINTERVAL\s+'[^']*'/i, label: 'quoted INTERVAL' },
  ],
};

// Functions that turn the difference of two timestamps into a number.
const DATE_EXTRACTION: Record<SqlDialect, { functions: string[]; hint: string }> = {
  postgres: { functions: ['EXTRACT', 'DATE_PART'], hint: 'EXTRACT(EPOCH FROM ...)' },
  mysql: { functions: ['TIMESTAMPDIFF', 'DATEDIFF'], hint: 'TIMESTAMPDIFF()/DATEDIFF()' },
};

/**
 * Static checks on candidate SQL. Issues with severity `error` disqualify the
 * candidate before execution; warnings are only reported, and passed on to
 * the repair prompt if execution fails.
 */
export function checkSql(sql: string, metadata: TableMetadata, dialect: SqlDialect): StaticIssue[] {
  const masked = maskSql(sql);
  const issues: StaticIssue[] = [];

  if (!/\bSELECT\b/i.test(masked)) {
    issues.push({ rule: 'missing_select', severity: 'error', message: 'Missing SELECT statement' });
  }
  if (!/\bFROM\b/i.test(masked)) {
    issues.push({ rule: 'missing_from', severity: 'error', message: 'Missing FROM clause' });
  }

  for (const nested of findNestedAggregates(masked)) {
    issues.push({
      rule: 'nested_aggregate',
      severity: 'error',
      message: `Aggregate ${nested.inner}() nested directly inside ${nested.outer}(); compute the inner aggregate in a subquery`,
    });
  }

  const arrow = NON_ASCII_ARROW.exec(masked);
  if (arrow) {
    issues.push({
      rule: 'non_ascii_json_operator',
      severity: 'error',
      message: `Non-ASCII operator "${arrow[0]}"; use the database JSON accessor (-> or ->>)`,
    });
  }

  for (const { pattern, label } of FOREIGN_DATE_SYNTAX[dialect]) {
    if (pattern.test(masked)) {
      issues.push({
        rule: 'dialect_date_function',
        severity: 'warning',
        message: `${label} is not valid ${dialect === 'postgres' ? 'PostgreSQL' : 'MySQL'} date syntax`,
      });
    }
  }

  const subtraction = findTimestampSubtraction(masked, metadata, dialect);
  if (subtraction) {
    issues.push({
      rule: 'dialect_date_function',
      severity: 'warning',
      message: `Date subtraction "${subtraction}" without ${DATE_EXTRACTION[dialect].hint}`,
    });
  }

  for (const column of findUnknownColumns(masked, metadata)) {
    issues.push({
      rule: 'unknown_column',
      severity: 'warning',
      message: `Column "${column}" does not exist on ${metadata.name}`,
    });
  }

  return issues;
}

export function hasStaticErrors(issues: readonly StaticIssue[]): boolean {
  return issues.some(i => i.severity === 'error');
}

interface NestedAggregate {
  outer: string;
  inner: string;
}

/**
 * Aggregates called directly inside another aggregate's arguments. Calls
 * inside a scalar subquery are fine, and so is an outer aggregate used as a
 * window function (`SUM(COUNT(*)) OVER ()`).
 */
export function findNestedAggregates(masked: string): NestedAggregate[] {
  const found: NestedAggregate[] = [];
  AGGREGATE_CALL.lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = AGGREGATE_CALL.exec(masked)) !== null) {
    const open = match.index + match[0].length - 1;
    const close = matchParen(masked, open);
    if (close === -1) continue;

    if (/^\s*OVER\b/i.test(masked.slice(close + 1))) continue;

    const inner = findAggregateOutsideSubquery(masked, open + 1, close);
    if (inner) {
      found.push({ outer: match[1].toUpperCase(), inner: inner.toUpperCase() });
    }
  }
  return found;
}

function findAggregateOutsideSubquery(masked: string, start: number, end: number): string | undefined {
  // One entry per open parenthesis: does it start a subquery?
  const stack: boolean[] = [];
  const pattern = /\b(AVG|SUM|MIN|MAX|COUNT)\s*\(/iy;

  for (let i = start; i < end; i++) {
    const ch = masked[i];
    if (ch === '(') {
      stack.push(SUBQUERY_START.test(masked.slice(i + 1, i + 16)));
      continue;
    }
    if (ch === ')') {
      stack.pop();
      continue;
    }
    if (stack.includes(true)) continue;

    pattern.lastIndex = i;
    const hit = pattern.exec(masked);
    if (hit) return hit[1];
  }
  return undefined;
}

function findTimestampSubtraction(masked: string, metadata: TableMetadata, dialect: SqlDialect): string | undefined {
  const timestamps = metadata.fields.filter(f => f.semanticTag === 'timestamp').map(f => escapeRegExp(f.name));
  if (timestamps.length < 2) return undefined;

  const column = `(?:[\\w$]+\\.)?(?:${timestamps.join('|')})\\b`;
  const subtraction = new RegExp(`\\b${column}\\s*-\\s*${column}`, 'gi');
  const { functions } = DATE_EXTRACTION[dialect];

  let match: RegExpExecArray | null;
  while ((match = subtraction.exec(masked)) !== null) {
    if (!enclosingCalls(masked, match.index).some(name => functions.includes(name))) return match[0];
  }
  return undefined;
}

/** Upper-cased names of the function calls whose parentheses contain `index`. */
function enclosingCalls(masked: string, index: number): string[] {
  const calls: string[] = [];
  let depth = 0;
  for (let i = index - 1; i >= 0; i--) {
    const ch = masked[i];
    if (ch === ')') {
      depth++;
    } else if (ch === '(') {
      if (depth > 0) {
        depth--;
        continue;
      }
      const name = /([\w$]+)\s*$/.exec(masked.slice(0, i));
      if (name) calls.push(name[1].toUpperCase());
    }
  }
  return calls;
}

/**
 * Columns qualified with the candidate table's name or alias that the table
 * does not have. Unqualified names are not checked: without a parser they
 * cannot be told apart from aliases and functions.
 */
export function findUnknownColumns(masked: string, metadata: TableMetadata): string[] {
  if (metadata.fields.length === 0) return [];

  const qualifiers = new Set([metadata.name.toLowerCase()]);
  const refPattern = /\b(?:FROM|JOIN)\b/gi;
  let ref: RegExpExecArray | null;
  while ((ref = refPattern.exec(masked)) !== null) {
    const tableRef = readTableRef(masked, ref.index + ref[0].length);
    if (tableRef?.alias && tableRef.table.toLowerCase() === metadata.name.toLowerCase()) {
      qualifiers.add(tableRef.alias.toLowerCase());
    }
  }

  const known = new Set(metadata.fields.map(f => f.name.toLowerCase()));
  const unknown = new Set<string>();
  const columnPattern = /(?<![\w$.])"?([\w$]+)"?\."?([\w$]+)"?/g;
  let col: RegExpExecArray | null;
  while ((col = columnPattern.exec(masked)) !== null) {
    const [, qualifier, name] = col;
    if (!qualifiers.has(qualifier.toLowerCase())) continue;
    if (known.has(name.toLowerCase())) continue;
    unknown.add(name);
  }
  return [...unknown];
}
