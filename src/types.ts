import type { ErrorCode } from './errors.js';

export interface KpiCandidate {
  readonly table: string;
  readonly name: string;
  readonly description: string;
  readonly businessValue: string;
  readonly sql: string;
  readonly outputFormat: string;
}

export type ValidationStatus = 'valid' | 'fixed' | 'problematic';

export type RewriteKind = 'null_guard' | 'default_time_window' | 'llm_repair';

export type IssueSeverity = 'error' | 'warning';

export interface StaticIssue {
  rule:
    | 'missing_select'
    | 'missing_from'
    | 'nested_aggregate'
    | 'non_ascii_json_operator'
    | 'dialect_date_function'
    | 'unknown_column';
  severity: IssueSeverity;
  message: string;
}

export interface ValidationOutcome {
  readonly candidate: KpiCandidate;
  readonly status: ValidationStatus;
  readonly originalSql: string;
  /** The SQL that was last executed, or the checked SQL when execution never happened. */
  readonly executedSql: string;
  readonly rewrites: readonly RewriteKind[];
  readonly issues: readonly StaticIssue[];
  readonly rowCount?: number;
  readonly error?: string;
}

export type AcceptedOutcome = ValidationOutcome & { readonly status: 'valid' | 'fixed' };
export type ProblematicOutcome = ValidationOutcome & { readonly status: 'problematic'; readonly error: string };

export type RegistrationResult =
  | { readonly outcome: AcceptedOutcome; readonly collectionId: number; readonly status: 'created'; readonly questionId: number }
  | { readonly outcome: AcceptedOutcome; readonly collectionId: number; readonly status: 'skipped'; readonly questionId: number }
  | { readonly outcome: AcceptedOutcome; readonly collectionId: number; readonly status: 'failed'; readonly reason: string };

export interface RegistrationSummary {
  collectionId: number;
  collectionName: string;
  removed: number;
  created: number;
  skipped: number;
  failed: number;
  results: RegistrationResult[];
}

export interface RunFailure {
  code: ErrorCode;
  message: string;
  table?: string;
  kpi?: string;
}

export type TableRunStatus = 'processed' | 'not_found' | 'unavailable' | 'generation_failed' | 'failed';

export interface TableReport {
  table: string;
  status: TableRunStatus;
  candidates: number;
  valid: number;
  fixed: number;
  problematic: number;
}

/** One line per KPI considered for registration. */
export interface KpiReport {
  table: string;
  kpi: string;
  status: RegistrationResult['status'] | 'problematic';
  questionId?: number;
  reason?: string;
}

export interface RunReport {
  startedAt: string;
  finishedAt: string;
  outputPath?: string;
  tables: TableReport[];
  registration?: Omit<RegistrationSummary, 'results'>;
  kpis?: KpiReport[];
  failures: RunFailure[];
}
