import { getConfig } from '../config.js';
import { errorMessage, isPipelineError, notFoundError, type ErrorCode } from '../errors.js';
import { KpiGenerator } from '../generator/generator.js';
import type { TextGenerator } from '../generator/llm.js';
import type { MetabaseClient } from '../metabase/client.js';
import type { Session } from '../metabase/session.js';
import { MetadataFetcher } from '../metadata/fetcher.js';
import type { TableMetadata } from '../metadata/types.js';
import {
  acceptedFromDocument,
  readKpiDocument,
  toTableEntry,
  writeKpiDocument,
  type DocumentBatch,
  type KpiDocument,
} from '../output/document.js';
import { KpiRegistrar } from '../registrar/registrar.js';
import type {
  AcceptedOutcome,
  KpiCandidate,
  KpiReport,
  RegistrationResult,
  RegistrationSummary,
  RunFailure,
  RunReport,
  TableReport,
  TableRunStatus,
  ValidationOutcome,
} from '../types.js';
import { getLogger, runLog } from '../utils/logger.js';
import { defaultRetryPolicy, sleep, withRetry, type RetryPolicy } from '../utils/retry.js';
import { SqlValidator, partitionOutcomes } from '../validator/validator.js';

export type PipelineClient = Pick<
  MetabaseClient,
  | 'login'
  | 'renewSession'
  | 'listDatabases'
  | 'listTables'
  | 'getQueryMetadata'
  | 'runNativeQuery'
  | 'listCollections'
  | 'createCollection'
  | 'listCollectionItems'
  | 'createCard'
  | 'deleteCard'
>;

export interface PipelineOptions {
  databaseId?: number;
  tables: string[];
  tablePrefix: string;
  outputPath: string;
  requestDelayMs: number;
  retryPolicy: RetryPolicy;
}

export interface RunOptions {
  /** Register accepted KPIs after writing the document (default true). */
  register?: boolean;
  replaceExisting?: boolean;
}

export interface RegisterDocumentOptions {
  replaceExisting?: boolean;
  /** Register at most this many KPIs from the document. */
  limit?: number;
}

const SKIP_STATUS: Partial<Record<ErrorCode, TableRunStatus>> = {
  NOT_FOUND: 'not_found',
  SERVICE_UNAVAILABLE: 'unavailable',
  GENERATION_FAILED: 'generation_failed',
};

export class PipelineRunner {
  private options: PipelineOptions;
  private fetcher: MetadataFetcher;
  private generator: KpiGenerator;
  private validator: SqlValidator;
  private registrar: KpiRegistrar;
  private logger = getLogger().child({ component: 'PipelineRunner' });

  constructor(
    private client: PipelineClient,
    llm: TextGenerator,
    options?: Partial<PipelineOptions>
  ) {
    const config = getConfig();
    this.options = {
      databaseId: options?.databaseId ?? config.METABASE_DATABASE_ID,
      tables: options?.tables ?? config.KPI_TABLES,
      tablePrefix: options?.tablePrefix ?? config.KPI_TABLE_PREFIX,
      outputPath: options?.outputPath ?? config.OUTPUT_PATH,
      requestDelayMs: options?.requestDelayMs ?? config.REQUEST_DELAY_MS,
      retryPolicy: options?.retryPolicy ?? defaultRetryPolicy(),
    };

    const { retryPolicy, requestDelayMs } = this.options;
    this.fetcher = new MetadataFetcher(client, retryPolicy);
    this.generator = new KpiGenerator(llm, { retryPolicy });
    this.validator = new SqlValidator(client, llm, { retryPolicy, requestDelayMs });
    this.registrar = new KpiRegistrar(client, { retryPolicy, requestDelayMs });
  }

  /**
   * Generate, validate and (unless disabled) register KPIs for every
   * configured table. Only authentication failures and an unusable database
   * abort the run; table-level failures are recorded on the report.
   */
  async run(options: RunOptions = {}): Promise<RunReport> {
    const startedAt = new Date();
    let session = await this.login();

    let databaseId: number;
    let tableNames: string[];
    try {
      databaseId = await this.resolveDatabaseId(session);
      tableNames = await this.resolveTables(session, databaseId);
    } catch (err) {
      if (isPipelineError(err, 'AUTHENTICATION_FAILURE')) throw err;
      const failure = toFailure(err);
      this.logger.error({ code: failure.code, error: failure.message }, 'Could not resolve tables');
      return this.finish({
        startedAt: startedAt.toISOString(),
        finishedAt: new Date().toISOString(),
        tables: [],
        failures: [failure],
      });
    }

    this.logger.info({ databaseId, tables: tableNames }, 'Starting KPI run');

    const document: KpiDocument = {};
    const tables: TableReport[] = [];
    const failures: RunFailure[] = [];
    const accepted: AcceptedOutcome[] = [];

    for (const [index, tableName] of tableNames.entries()) {
      if (index > 0) await sleep(this.options.requestDelayMs);
      session = await this.client.renewSession(session);
      const started = Date.now();

      let metadata: TableMetadata;
      let outcomes: ValidationOutcome[];
      try {
        metadata = await this.fetcher.fetchTable(session, tableName, databaseId);
        await sleep(this.options.requestDelayMs);
        const candidates = await this.generator.generate(metadata);
        outcomes = await this.validateAll(session, metadata, candidates);
      } catch (err) {
        if (isPipelineError(err, 'AUTHENTICATION_FAILURE')) throw err;
        const failure = toFailure(err, tableName);
        const status = SKIP_STATUS[failure.code] ?? 'failed';
        this.logger.warn({ table: tableName, code: failure.code, error: failure.message }, 'Skipping table');
        runLog({ event: 'table.skipped', table: tableName, status, error: { code: failure.code, message: failure.message } });
        failures.push(failure);
        tables.push({ table: tableName, status, candidates: 0, valid: 0, fixed: 0, problematic: 0 });
        continue;
      }

      document[metadata.name] = toTableEntry(metadata, outcomes);
      const { accepted: tableAccepted, problematic } = partitionOutcomes(outcomes);
      accepted.push(...tableAccepted);

      const report: TableReport = {
        table: metadata.name,
        status: 'processed',
        candidates: outcomes.length,
        valid: outcomes.filter(o => o.status === 'valid').length,
        fixed: outcomes.filter(o => o.status === 'fixed').length,
        problematic: problematic.length,
      };
      tables.push(report);
      runLog({
        event: 'table.processed',
        table: metadata.name,
        duration_ms: Date.now() - started,
        counts: { candidates: report.candidates, valid: report.valid, fixed: report.fixed, problematic: report.problematic },
      });
    }

    await writeKpiDocument(this.options.outputPath, document);
    this.logger.info({ path: this.options.outputPath, tables: Object.keys(document).length }, 'Wrote KPI document');

    let registration: RegistrationSummary | undefined;
    if (options.register !== false && accepted.length > 0) {
      registration = await this.registerSafely(session, accepted, databaseId, options.replaceExisting, failures);
    }

    return this.finish({
      startedAt: startedAt.toISOString(),
      finishedAt: new Date().toISOString(),
      outputPath: this.options.outputPath,
      tables,
      registration: registration && summarize(registration),
      kpis: registration?.results.map(toKpiReport),
      failures,
    });
  }

  /**
   * Register the accepted KPIs recorded in a document written by an earlier
   * run. Each stored query is executed again first; those that no longer run
   * are reported as problematic and not registered.
   */
  async registerDocument(path: string, options: RegisterDocumentOptions = {}): Promise<RunReport> {
    const startedAt = new Date();
    const document = await readKpiDocument(path);
    const session = await this.login();
    const failures: RunFailure[] = [];
    const summaries: RegistrationSummary[] = [];
    const kpis: KpiReport[] = [];
    let replaceExisting = options.replaceExisting === true;

    for (const batch of limitBatches(acceptedFromDocument(document), options.limit)) {
      const rechecked = await this.recheckAll(session, batch.outcomes, batch.databaseId);
      const { accepted, problematic } = partitionOutcomes(rechecked);
      for (const outcome of problematic) {
        kpis.push({ table: outcome.candidate.table, kpi: outcome.candidate.name, status: 'problematic', reason: outcome.error });
      }
      if (accepted.length === 0) continue;

      const summary = await this.registerSafely(session, accepted, batch.databaseId, replaceExisting, failures);
      replaceExisting = false;
      if (summary) {
        summaries.push(summary);
        kpis.push(...summary.results.map(toKpiReport));
      }
    }

    return this.finish({
      startedAt: startedAt.toISOString(),
      finishedAt: new Date().toISOString(),
      tables: [],
      registration: summaries[0] ? mergeSummaries(summaries[0], summaries) : undefined,
      kpis,
      failures,
    });
  }

  private login(): Promise<Session> {
    return withRetry(() => this.client.login(), this.options.retryPolicy, 'login', this.logger);
  }

  private async resolveDatabaseId(session: Session): Promise<number> {
    if (this.options.databaseId !== undefined) return this.options.databaseId;

    const databases = await withRetry(
      () => this.client.listDatabases(session),
      this.options.retryPolicy,
      'listDatabases',
      this.logger
    );
    const first = databases[0];
    if (!first) throw notFoundError('Metabase database (none are configured)');
    this.logger.info({ databaseId: first.id, name: first.name }, 'Using first database');
    return first.id;
  }

  private async resolveTables(session: Session, databaseId: number): Promise<string[]> {
    if (this.options.tables.length > 0) return uniqueNames(this.options.tables);
    return uniqueNames(await this.fetcher.discoverTables(session, this.options.tablePrefix, databaseId));
  }

  private async recheckAll(
    session: Session,
    outcomes: readonly AcceptedOutcome[],
    databaseId: number
  ): Promise<ValidationOutcome[]> {
    const rechecked: ValidationOutcome[] = [];
    for (const [index, accepted] of outcomes.entries()) {
      if (index > 0) await sleep(this.options.requestDelayMs);
      const outcome = await this.validator.recheck(session, accepted, databaseId);
      runLog({ event: 'kpi.validated', table: outcome.candidate.table, kpi: outcome.candidate.name, status: outcome.status });
      rechecked.push(outcome);
    }
    return rechecked;
  }

  private async validateAll(
    session: Session,
    metadata: TableMetadata,
    candidates: readonly KpiCandidate[]
  ): Promise<ValidationOutcome[]> {
    const outcomes: ValidationOutcome[] = [];
    for (const [index, candidate] of candidates.entries()) {
      if (index > 0) await sleep(this.options.requestDelayMs);
      const outcome = await this.validator.validate(session, candidate, metadata);
      runLog({ event: 'kpi.validated', table: candidate.table, kpi: candidate.name, status: outcome.status });
      outcomes.push(outcome);
    }
    return outcomes;
  }

  private async registerSafely(
    session: Session,
    outcomes: readonly AcceptedOutcome[],
    databaseId: number,
    replaceExisting: boolean | undefined,
    failures: RunFailure[]
  ): Promise<RegistrationSummary | undefined> {
    try {
      const summary = await this.registrar.register(session, outcomes, databaseId, { replaceExisting });
      for (const result of summary.results) {
        if (result.status !== 'failed') continue;
        failures.push({
          code: 'REGISTRATION_FAILED',
          message: result.reason,
          table: result.outcome.candidate.table,
          kpi: result.outcome.candidate.name,
        });
      }
      return summary;
    } catch (err) {
      if (isPipelineError(err, 'AUTHENTICATION_FAILURE')) throw err;
      const failure = toFailure(err);
      this.logger.error({ code: failure.code, error: failure.message }, 'Registration aborted');
      failures.push(failure);
      return undefined;
    }
  }

  private finish(report: RunReport): RunReport {
    runLog({
      event: 'run.completed',
      counts: {
        tables: report.tables.length,
        processed: report.tables.filter(t => t.status === 'processed').length,
        failures: report.failures.length,
        created: report.registration?.created ?? 0,
        skipped: report.registration?.skipped ?? 0,
      },
    });
    return report;
  }
}

function toFailure(err: unknown, table?: string): RunFailure {
  return {
    code: isPipelineError(err) ? err.code : 'METABASE_ERROR',
    message: errorMessage(err),
    ...(table !== undefined && { table }),
  };
}

/** Table names with case-insensitive repeats removed, first spelling kept. */
function uniqueNames(names: readonly string[]): string[] {
  const seen = new Set<string>();
  return names.filter(name => {
    const key = name.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function limitBatches(batches: readonly DocumentBatch[], limit?: number): DocumentBatch[] {
  if (limit === undefined) return [...batches];
  const limited: DocumentBatch[] = [];
  let remaining = limit;
  for (const batch of batches) {
    if (remaining <= 0) break;
    const outcomes = batch.outcomes.slice(0, remaining);
    remaining -= outcomes.length;
    limited.push({ databaseId: batch.databaseId, outcomes });
  }
  return limited;
}

function toKpiReport(result: RegistrationResult): KpiReport {
  const { table, name } = result.outcome.candidate;
  return result.status === 'failed'
    ? { table, kpi: name, status: result.status, reason: result.reason }
    : { table, kpi: name, status: result.status, questionId: result.questionId };
}

function summarize(summary: RegistrationSummary): Omit<RegistrationSummary, 'results'> {
  const { collectionId, collectionName, removed, created, skipped, failed } = summary;
  return { collectionId, collectionName, removed, created, skipped, failed };
}

function mergeSummaries(
  first: RegistrationSummary,
  summaries: readonly RegistrationSummary[]
): Omit<RegistrationSummary, 'results'> {
  return {
    collectionId: first.collectionId,
    collectionName: first.collectionName,
    removed: summaries.reduce((n, s) => n + s.removed, 0),
    created: summaries.reduce((n, s) => n + s.created, 0),
    skipped: summaries.reduce((n, s) => n + s.skipped, 0),
    failed: summaries.reduce((n, s) => n + s.failed, 0),
  };
}
