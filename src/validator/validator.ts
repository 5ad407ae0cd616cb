import { getConfig, type SqlDialect } from '../config.js';
import { errorMessage, isPipelineError } from '../errors.js';
import type { TextGenerator } from '../generator/llm.js';
import { REPAIR_SYSTEM_PROMPT, buildRepairPrompt } from '../generator/prompts.js';
import type { MetabaseClient } from '../metabase/client.js';
import type { Session } from '../metabase/session.js';
import type { TableMetadata } from '../metadata/types.js';
import type {
  AcceptedOutcome,
  KpiCandidate,
  ProblematicOutcome,
  RewriteKind,
  StaticIssue,
  ValidationOutcome,
} from '../types.js';
import { getLogger } from '../utils/logger.js';
import { defaultRetryPolicy, sleep, withRetry, type RetryPolicy } from '../utils/retry.js';
import { applyRewrites } from './rewrite.js';
import { checkSql, hasStaticErrors } from './static-checks.js';

export type QueryRunner = Pick<MetabaseClient, 'runNativeQuery'>;

export interface SqlValidatorOptions {
  dialect: SqlDialect;
  dateColumn: string;
  queryTimeoutMs: number;
  /** Pause before the repair request. */
  requestDelayMs: number;
  maxFields: number;
  retryPolicy: RetryPolicy;
}

type Execution = { ok: true; rowCount: number } | { ok: false; error: string };

/**
 * Strip code fences and surrounding prose markers from a repair answer.
 * Returns undefined unless what is left is a SELECT or WITH statement.
 */
export function cleanRepairResponse(text: string): string | undefined {
  let sql = text.trim();
  const fence = /```(?:sql)?\s*([\s\S]*?)```/i.exec(sql);
  if (fence?.[1] !== undefined) sql = fence[1];
  sql = sql.replace(/```/g, '').trim();
  return /^(?:SELECT|WITH)\b/i.test(sql) ? sql : undefined;
}

export function isAccepted(outcome: ValidationOutcome): outcome is AcceptedOutcome {
  return outcome.status === 'valid' || outcome.status === 'fixed';
}

export function partitionOutcomes(outcomes: readonly ValidationOutcome[]): {
  accepted: AcceptedOutcome[];
  problematic: ProblematicOutcome[];
} {
  const accepted: AcceptedOutcome[] = [];
  const problematic: ProblematicOutcome[] = [];
  for (const outcome of outcomes) {
    if (isAccepted(outcome)) {
      accepted.push(outcome);
    } else if (outcome.status === 'problematic') {
      problematic.push({ ...outcome, status: 'problematic', error: outcome.error ?? 'unknown error' });
    }
  }
  return { accepted, problematic };
}

export class SqlValidator {
  private options: SqlValidatorOptions;
  private logger = getLogger().child({ component: 'SqlValidator' });

  constructor(
    private runner: QueryRunner,
    private llm: TextGenerator,
    options?: Partial<SqlValidatorOptions>
  ) {
    const config = getConfig();
    this.options = {
      dialect: options?.dialect ?? config.SQL_DIALECT,
      dateColumn: options?.dateColumn ?? config.DEFAULT_DATE_COLUMN,
      queryTimeoutMs: options?.queryTimeoutMs ?? config.QUERY_TIMEOUT_MS,
      requestDelayMs: options?.requestDelayMs ?? config.REQUEST_DELAY_MS,
      maxFields: options?.maxFields ?? config.MAX_PROMPT_FIELDS,
      retryPolicy: options?.retryPolicy ?? defaultRetryPolicy(),
    };
  }

  /**
   * Check, rewrite, execute and, on failure, repair one candidate. Only an
   * authentication failure escapes; every other problem ends up on the outcome.
   */
  async validate(session: Session, candidate: KpiCandidate, metadata: TableMetadata): Promise<ValidationOutcome> {
    const log = this.logger.child({ table: candidate.table, kpi: candidate.name });
    const originalSql = candidate.sql;

    const issues = checkSql(originalSql, metadata, this.options.dialect);
    if (hasStaticErrors(issues)) {
      const error = describeErrors(issues);
      log.warn({ error }, 'Static check failed');
      return outcome(candidate, 'problematic', { originalSql, executedSql: originalSql, issues, error });
    }

    const rewriteOptions = { dialect: this.options.dialect, dateColumn: this.options.dateColumn };
    const first = applyRewrites(originalSql, metadata, rewriteOptions);
    if (first.rewrites.length > 0) {
      log.debug({ rewrites: first.rewrites, sql: first.sql }, 'Applied rewrites');
    }

    const firstRun = await this.execute(session, metadata.databaseId, first.sql);
    if (firstRun.ok) {
      log.info({ rowCount: firstRun.rowCount }, 'Query valid');
      return outcome(candidate, 'valid', {
        originalSql,
        executedSql: first.sql,
        rewrites: first.rewrites,
        issues,
        rowCount: firstRun.rowCount,
      });
    }

    log.warn({ error: firstRun.error }, 'Query failed, requesting repair');
    const problematic = (error: string, executedSql = first.sql, rewrites = first.rewrites) =>
      outcome(candidate, 'problematic', { originalSql, executedSql, rewrites, issues, error });

    await sleep(this.options.requestDelayMs);

    let answer: string;
    try {
      answer = await withRetry(
        () =>
          this.llm.complete({
            system: REPAIR_SYSTEM_PROMPT,
            prompt: buildRepairPrompt(first.sql, firstRun.error, metadata, {
              maxFields: this.options.maxFields,
              dialect: this.options.dialect,
              warnings: issues.map(i => i.message),
            }),
            maxOutputTokens: 1000,
            temperature: 0.1,
          }),
        this.options.retryPolicy,
        `repair:${candidate.table}/${candidate.name}`,
        log
      );
    } catch (err) {
      return problematic(`${firstRun.error}; repair request failed: ${errorMessage(err)}`);
    }

    const repaired = cleanRepairResponse(answer);
    if (!repaired) {
      return problematic(`${firstRun.error}; repair did not return a SELECT statement`);
    }

    const repairIssues = checkSql(repaired, metadata, this.options.dialect);
    if (hasStaticErrors(repairIssues)) {
      return problematic(`${firstRun.error}; repaired query: ${describeErrors(repairIssues)}`);
    }

    const second = applyRewrites(repaired, metadata, rewriteOptions);
    const rewrites = mergeRewrites(first.rewrites, ['llm_repair'], second.rewrites);

    const secondRun = await this.execute(session, metadata.databaseId, second.sql);
    if (!secondRun.ok) {
      log.warn({ error: secondRun.error }, 'Repaired query failed');
      return problematic(secondRun.error, second.sql, rewrites);
    }

    log.info({ rowCount: secondRun.rowCount }, 'Query fixed');
    return outcome(candidate, 'fixed', {
      originalSql,
      executedSql: second.sql,
      rewrites,
      issues,
      rowCount: secondRun.rowCount,
    });
  }

  /**
   * Run an accepted KPI's stored SQL again, unchanged. A query that no longer
   * runs comes back `problematic`; no repair is attempted.
   */
  async recheck(session: Session, accepted: AcceptedOutcome, databaseId: number): Promise<ValidationOutcome> {
    const { candidate } = accepted;
    const fields = {
      originalSql: accepted.originalSql,
      executedSql: accepted.executedSql,
      rewrites: accepted.rewrites,
      issues: accepted.issues,
    };

    const run = await this.execute(session, databaseId, accepted.executedSql);
    if (!run.ok) {
      this.logger.warn({ table: candidate.table, kpi: candidate.name, error: run.error }, 'Stored query no longer runs');
      return outcome(candidate, 'problematic', { ...fields, error: run.error });
    }
    return outcome(candidate, accepted.status, { ...fields, rowCount: run.rowCount });
  }

  private async execute(session: Session, databaseId: number, sql: string): Promise<Execution> {
    try {
      const result = await this.runner.runNativeQuery(session, databaseId, sql, this.options.queryTimeoutMs);
      return { ok: true, rowCount: result.rowCount };
    } catch (err) {
      if (isPipelineError(err, 'AUTHENTICATION_FAILURE')) throw err;
      return { ok: false, error: errorMessage(err) };
    }
  }
}

function describeErrors(issues: readonly StaticIssue[]): string {
  return issues
    .filter(i => i.severity === 'error')
    .map(i => i.message)
    .join('; ');
}

function mergeRewrites(...lists: ReadonlyArray<readonly RewriteKind[]>): RewriteKind[] {
  const merged: RewriteKind[] = [];
  for (const kind of lists.flat()) {
    if (!merged.includes(kind)) merged.push(kind);
  }
  return merged;
}

function outcome(
  candidate: KpiCandidate,
  status: ValidationOutcome['status'],
  fields: {
    originalSql: string;
    executedSql: string;
    rewrites?: readonly RewriteKind[];
    issues: readonly StaticIssue[];
    rowCount?: number;
    error?: string;
  }
): ValidationOutcome {
  return Object.freeze({
    candidate,
    status,
    originalSql: fields.originalSql,
    executedSql: fields.executedSql,
    rewrites: Object.freeze([...(fields.rewrites ?? [])]),
    issues: Object.freeze([...fields.issues]),
    ...(fields.rowCount !== undefined && { rowCount: fields.rowCount }),
    ...(fields.error !== undefined && { error: fields.error }),
  });
}
