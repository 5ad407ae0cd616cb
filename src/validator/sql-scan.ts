/**
 * Just enough SQL scanning for the static checks and rewrites: blank out
 * string literals and comments, then look for keywords at parenthesis depth 0.
 * This is not a parser; anything it cannot place is left alone.
 */

/**
 * Replace the contents of single-quoted literals and comments with spaces.
 * Offsets stay identical to the input, so indexes found in the masked text
 * can be used to slice the original.
 */
export function maskSql(sql: string): string {
  const out = sql.split('');
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (ch === "'") {
      i++;
      while (i < sql.length) {
        if (sql[i] === "'" && sql[i + 1] === "'") {
          out[i] = ' ';
          out[i + 1] = ' ';
          i += 2;
          continue;
        }
        if (sql[i] === "'") break;
        out[i] = ' ';
        i++;
      }
      i++;
      continue;
    }

    if (ch === '-' && next === '-') {
      while (i < sql.length && sql[i] !== '\n') {
        out[i] = ' ';
        i++;
      }
      continue;
    }

    if (ch === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      const stop = end === -1 ? sql.length : end + 2;
      for (; i < stop; i++) out[i] = ' ';
      continue;
    }

    i++;
  }

  return out.join('');
}

/**
 * Remove comments, keeping string literals intact. A block comment becomes a
 * single space so the tokens on either side stay apart.
 */
export function stripComments(sql: string): string {
  let out = '';
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (ch === "'") {
      let end = i + 1;
      while (end < sql.length) {
        if (sql[end] === "'" && sql[end + 1] === "'") {
          end += 2;
          continue;
        }
        if (sql[end] === "'") break;
        end++;
      }
      out += sql.slice(i, end + 1);
      i = end + 1;
      continue;
    }

    if (ch === '-' && next === '-') {
      while (i < sql.length && sql[i] !== '\n') i++;
      continue;
    }

    if (ch === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      i = end === -1 ? sql.length : end + 2;
      out += ' ';
      continue;
    }

    out += ch;
    i++;
  }

  return out;
}

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && /[\w$]/.test(ch);
}

/**
 * Index of the first match of `pattern` at depth 0, starting at `from`.
 * `pattern` must be sticky (`y`) and end in `\b`.
 */
export function findTopLevel(masked: string, pattern: RegExp, from = 0): number {
  let depth = 0;
  for (let i = 0; i < masked.length; i++) {
    const ch = masked[i];
    if (ch === '(') {
      depth++;
      continue;
    }
    if (ch === ')') {
      depth = Math.max(0, depth - 1);
      continue;
    }
    if (i < from || depth !== 0 || isWordChar(masked[i - 1])) continue;

    pattern.lastIndex = i;
    if (pattern.test(masked)) return i;
  }
  return -1;
}

/** Index of the parenthesis closing the one at `open`, or -1. */
export function matchParen(masked: string, open: number): number {
  let depth = 0;
  for (let i = open; i < masked.length; i++) {
    if (masked[i] === '(') depth++;
    else if (masked[i] === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Parenthesis depth at `index`. */
export function depthAt(masked: string, index: number): number {
  let depth = 0;
  for (let i = 0; i < index && i < masked.length; i++) {
    if (masked[i] === '(') depth++;
    else if (masked[i] === ')') depth = Math.max(0, depth - 1);
  }
  return depth;
}

const KW = {
  select: /SELECT\b/iy,
  from: /FROM\b/iy,
  where: /WHERE\b/iy,
  setOperation: /(?:UNION|INTERSECT|EXCEPT)\b/iy,
  join: /(?:(?:LEFT|RIGHT|FULL|INNER|CROSS)\s+(?:OUTER\s+)?)?JOIN\b/iy,
};

const CLAUSES_AFTER_WHERE = [
  /GROUP\s+BY\b/iy,
  /HAVING\b/iy,
  /WINDOW\b/iy,
  /ORDER\s+BY\b/iy,
  /LIMIT\b/iy,
  /OFFSET\b/iy,
  /FETCH\b/iy,
];

const NOT_AN_ALIAS = new Set([
  'where', 'join', 'left', 'right', 'full', 'inner', 'outer', 'cross', 'on', 'using',
  'group', 'order', 'having', 'limit', 'offset', 'union', 'intersect', 'except', 'window', 'fetch',
  'natural', 'lateral', 'tablesample', 'straight_join', 'qualify',
]);

export interface TableRef {
  table: string;
  alias?: string;
}

export interface QueryShape {
  /** SQL with any trailing semicolon removed. */
  sql: string;
  masked: string;
  fromIndex: number;
  whereIndex: number;
  /** Start of the first clause after WHERE (or after FROM when there is no WHERE). */
  tailIndex: number;
  hasSetOperation: boolean;
  hasJoin: boolean;
  mainTable?: TableRef;
}

const TABLE_REF = /\s+(?:"?[\w$]+"?\.)?"?([\w$]+)"?(?:\s+(?:AS\s+)?"?([\w$]+)"?)?/iy;

export function readTableRef(masked: string, keywordEnd: number): TableRef | undefined {
  TABLE_REF.lastIndex = keywordEnd;
  const match = TABLE_REF.exec(masked);
  if (!match?.[1]) return undefined;
  const alias = match[2] && !NOT_AN_ALIAS.has(match[2].toLowerCase()) ? match[2] : undefined;
  return { table: match[1], alias };
}

/**
 * Locate the top-level clauses of a single SELECT statement.
 */
export function analyzeQuery(input: string): QueryShape {
  const sql = input.trim().replace(/;\s*$/, '').trimEnd();
  const masked = maskSql(sql);
  const fromIndex = findTopLevel(masked, KW.from);
  const whereIndex = fromIndex === -1 ? -1 : findTopLevel(masked, KW.where, fromIndex);

  const clauseStart = whereIndex !== -1 ? whereIndex : fromIndex;
  let tailIndex = sql.length;
  if (clauseStart !== -1) {
    for (const pattern of CLAUSES_AFTER_WHERE) {
      const idx = findTopLevel(masked, pattern, clauseStart);
      if (idx !== -1 && idx < tailIndex) tailIndex = idx;
    }
  }

  return {
    sql,
    masked,
    fromIndex,
    whereIndex,
    tailIndex,
    hasSetOperation: findTopLevel(masked, KW.setOperation) !== -1,
    hasJoin: fromIndex !== -1 && findTopLevel(masked, KW.join, fromIndex) !== -1,
    mainTable: fromIndex === -1 ? undefined : readTableRef(masked, fromIndex + 4),
  };
}

/** Text of the top-level WHERE condition, or undefined when there is none. */
export function whereCondition(shape: QueryShape): string | undefined {
  if (shape.whereIndex === -1) return undefined;
  return shape.sql.slice(shape.whereIndex + 'WHERE'.length, shape.tailIndex).trim();
}

/**
 * Add `condition` to the top-level WHERE clause, creating it when absent.
 * Comments are dropped from the result: a trailing `--` comment would
 * otherwise swallow whatever follows it on the same line.
 * Returns undefined when the query shape is not one this can edit safely.
 */
export function addWhereCondition(input: string, condition: string): string | undefined {
  const shape = analyzeQuery(stripComments(input));
  if (shape.fromIndex === -1 || shape.hasSetOperation) return undefined;

  const { sql, tailIndex } = shape;
  const tail = sql.slice(tailIndex).trim();
  const suffix = tail ? ` ${tail}` : '';

  if (shape.whereIndex === -1) {
    const head = sql.slice(0, tailIndex).trimEnd();
    return `${head} WHERE ${condition}${suffix}`;
  }

  const existing = whereCondition(shape) ?? '';
  const maskedExisting = shape.masked.slice(shape.whereIndex + 'WHERE'.length, tailIndex);
  const needsParens = findTopLevel(maskedExisting, /OR\b/iy) !== -1;
  const head = sql.slice(0, shape.whereIndex).trimEnd();
  const combined = needsParens ? `(${existing}) AND ${condition}` : `${existing} AND ${condition}`;
  return `${head} WHERE ${combined}${suffix}`;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
