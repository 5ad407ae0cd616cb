import { getConfig } from '../config.js';
import { errorMessage, isPipelineError, metabaseError, registrationFailedError } from '../errors.js';
import type { MetabaseClient } from '../metabase/client.js';
import type { Session } from '../metabase/session.js';
import type { CollectionItem, CreateCardPayload } from '../metabase/types.js';
import type { AcceptedOutcome, RegistrationResult, RegistrationSummary } from '../types.js';
import { getLogger, runLog } from '../utils/logger.js';
import { defaultRetryPolicy, sleep, withRetry, type RetryPolicy } from '../utils/retry.js';

export type RegistrarClient = Pick<
  MetabaseClient,
  'listCollections' | 'createCollection' | 'listCollectionItems' | 'createCard' | 'deleteCard'
>;

export interface KpiRegistrarOptions {
  collectionName: string;
  /** Pause between card requests. */
  requestDelayMs: number;
  retryPolicy: RetryPolicy;
}

export interface RegisterOptions {
  /** Delete every card in the collection before registering. */
  replaceExisting?: boolean;
}

const COLLECTION_COLOR = '#84BB4C';

/** Card names carry the (table, KPI) pair that duplicate detection keys on. */
export function cardName(outcome: AcceptedOutcome): string {
  return `${outcome.candidate.table} - ${outcome.candidate.name}`;
}

export function buildCardPayload(outcome: AcceptedOutcome, collectionId: number, databaseId: number): CreateCardPayload {
  const { candidate } = outcome;
  return {
    name: cardName(outcome),
    description: `Description: ${candidate.description}\n\nBusiness Value: ${candidate.businessValue}\n\nTable: ${candidate.table}`,
    collection_id: collectionId,
    dataset_query: {
      type: 'native',
      native: { query: outcome.executedSql, 'template-tags': {} },
      database: databaseId,
    },
    display: 'table',
    visualization_settings: {},
  };
}

export class KpiRegistrar {
  private options: KpiRegistrarOptions;
  private logger = getLogger().child({ component: 'KpiRegistrar' });

  constructor(
    private client: RegistrarClient,
    options?: Partial<KpiRegistrarOptions>
  ) {
    const config = getConfig();
    this.options = {
      collectionName: options?.collectionName ?? config.KPI_COLLECTION_NAME,
      requestDelayMs: options?.requestDelayMs ?? config.REQUEST_DELAY_MS,
      retryPolicy: options?.retryPolicy ?? defaultRetryPolicy(),
    };
  }

  /**
   * Id of the collection named `collectionName`, created at the root when no
   * unarchived collection has that name.
   */
  async ensureCollection(session: Session): Promise<number> {
    const name = this.options.collectionName;
    const collections = await this.retry(() => this.client.listCollections(session), 'listCollections');

    for (const collection of collections) {
      if (typeof collection.id === 'number' && !collection.archived && collection.name === name) {
        this.logger.info({ collectionId: collection.id, name }, 'Using existing collection');
        return collection.id;
      }
    }

    const created = await this.retry(
      () =>
        this.client.createCollection(session, {
          name,
          description: 'KPIs generated from table metadata and validated against the database',
          color: COLLECTION_COLOR,
          parent_id: null,
        }),
      'createCollection'
    );
    if (typeof created.id !== 'number') {
      throw metabaseError(`collection "${name}" was created without a numeric id`);
    }
    this.logger.info({ collectionId: created.id, name }, 'Created collection');
    return created.id;
  }

  /** Delete every card in the collection. Returns how many were removed. */
  async clearCollection(session: Session, collectionId: number): Promise<number> {
    const cards = await this.listCardItems(session, collectionId);
    let removed = 0;
    for (const card of cards) {
      await this.retry(() => this.client.deleteCard(session, card.id), `deleteCard:${card.id}`);
      removed++;
    }
    this.logger.info({ collectionId, removed }, 'Cleared collection');
    return removed;
  }

  async register(
    session: Session,
    outcomes: readonly AcceptedOutcome[],
    databaseId: number,
    options: RegisterOptions = {}
  ): Promise<RegistrationSummary> {
    const collectionId = await this.ensureCollection(session);
    const removed = options.replaceExisting ? await this.clearCollection(session, collectionId) : 0;
    const existing = await this.listCards(session, collectionId);
    const results: RegistrationResult[] = [];
    let requests = 0;

    for (const outcome of outcomes) {
      const name = cardName(outcome);
      const existingId = existing.get(name);

      if (existingId !== undefined) {
        this.logger.debug({ name, questionId: existingId }, 'Card already registered');
        results.push({ outcome, collectionId, status: 'skipped', questionId: existingId });
        runLog({ event: 'kpi.registered', table: outcome.candidate.table, kpi: outcome.candidate.name, status: 'skipped' });
        continue;
      }

      if (requests++ > 0) await sleep(this.options.requestDelayMs);

      try {
        const card = await this.retry(
          () => this.client.createCard(session, buildCardPayload(outcome, collectionId, databaseId)),
          `createCard:${name}`
        );
        existing.set(name, card.id);
        results.push({ outcome, collectionId, status: 'created', questionId: card.id });
        runLog({ event: 'kpi.registered', table: outcome.candidate.table, kpi: outcome.candidate.name, status: 'created' });
      } catch (err) {
        if (isPipelineError(err, 'AUTHENTICATION_FAILURE')) throw err;
        const error = registrationFailedError(outcome.candidate.table, outcome.candidate.name, errorMessage(err));
        this.logger.error({ name, error: error.message }, 'Card creation failed');
        results.push({ outcome, collectionId, status: 'failed', reason: errorMessage(err) });
        runLog({
          event: 'kpi.registered',
          table: outcome.candidate.table,
          kpi: outcome.candidate.name,
          status: 'failed',
          error: { code: error.code, message: error.message },
        });
      }
    }

    const summary: RegistrationSummary = {
      collectionId,
      collectionName: this.options.collectionName,
      removed,
      created: results.filter(r => r.status === 'created').length,
      skipped: results.filter(r => r.status === 'skipped').length,
      failed: results.filter(r => r.status === 'failed').length,
      results,
    };
    this.logger.info(
      { collectionId, removed, created: summary.created, skipped: summary.skipped, failed: summary.failed },
      'Registration complete'
    );
    return summary;
  }

  /** Saved questions in the collection, keyed by name. */
  private async listCards(session: Session, collectionId: number): Promise<Map<string, number>> {
    const cards = new Map<string, number>();
    for (const item of await this.listCardItems(session, collectionId)) {
      if (!cards.has(item.name)) cards.set(item.name, item.id);
    }
    return cards;
  }

  private async listCardItems(session: Session, collectionId: number): Promise<CollectionItem[]> {
    const items = await this.retry(
      () => this.client.listCollectionItems(session, collectionId),
      `listCollectionItems:${collectionId}`
    );
    return items.filter(item => item.model === 'card');
  }

  private retry<T>(fn: () => Promise<T>, label: string): Promise<T> {
    return withRetry(fn, this.options.retryPolicy, label, this.logger);
  }
}
