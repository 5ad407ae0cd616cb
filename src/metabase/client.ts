import { getConfig } from '../config.js';
import {
  authenticationFailureError,
  metabaseError,
  notFoundError,
  queryFailedError,
  serviceUnavailableError,
  errorMessage,
  PipelineError,
} from '../errors.js';
import { getLogger } from '../utils/logger.js';
import { createSession, isSessionExpired, type Session } from './session.js';
import type {
  CollectionItem,
  CreateCardPayload,
  CreateCollectionPayload,
  DatasetResponse,
  MetabaseCard,
  MetabaseCollection,
  MetabaseDatabase,
  MetabaseErrorResponse,
  MetabaseQueryMetadata,
  MetabaseSessionResponse,
  MetabaseTable,
  NativeQueryPayload,
  QueryResult,
} from './types.js';

/**
 * Configuration for creating a MetabaseClient instance
 */
export interface MetabaseClientConfig {
  baseUrl?: string;
  username?: string;
  password?: string;
  sessionTtlMs?: number;
  requestTimeoutMs?: number;
}

interface RequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  body?: unknown;
  session?: Session;
  timeoutMs?: number;
}

const SESSION_HEADER = 'X-Metabase-Session';
const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export class MetabaseClient {
  private baseUrl: string;
  private username: string;
  private password: string;
  private sessionTtlMs: number;
  private requestTimeoutMs: number;
  private logger = getLogger().child({ component: 'MetabaseClient' });

  constructor(config?: MetabaseClientConfig) {
    const globalConfig = getConfig();
    this.baseUrl = config?.baseUrl ?? globalConfig.METABASE_URL;
    this.username = config?.username ?? globalConfig.METABASE_USERNAME;
    this.password = config?.password ?? globalConfig.METABASE_PASSWORD;
    this.sessionTtlMs = config?.sessionTtlMs ?? globalConfig.SESSION_TTL_HOURS * 3_600_000;
    this.requestTimeoutMs = config?.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  private async request<T>(endpoint: string, options: RequestOptions = {}): Promise<T> {
    const url = `${this.baseUrl}${endpoint}`;
    const method = options.method ?? 'GET';
    const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs;
    this.logger.debug({ url, method }, 'Metabase API request');

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (options.session) {
      headers[SESSION_HEADER] = options.session.id;
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        throw serviceUnavailableError('Metabase', `${method} ${endpoint} timed out after ${timeoutMs}ms`);
      }
      throw serviceUnavailableError('Metabase', errorMessage(err));
    }

    const text = await response.text();
    const body = parseBody(text);

    if (!response.ok) {
      this.logger.error({ status: response.status, endpoint, error: body }, 'Metabase API error');
      throw httpError(response.status, endpoint, body);
    }

    return body as T;
  }

  async login(): Promise<Session> {
    this.logger.info({ username: this.username }, 'Authenticating with Metabase');
    let response: MetabaseSessionResponse;
    try {
      response = await this.request<MetabaseSessionResponse>('/api/session', {
        method: 'POST',
        body: { username: this.username, password: this.password },
      });
    } catch (err) {
      // Any client-side rejection of the login itself means bad credentials
      if (err instanceof PipelineError && (err.code === 'METABASE_ERROR' || err.code === 'NOT_FOUND')) {
        throw authenticationFailureError(err.message);
      }
      throw err;
    }

    if (!response?.id) {
      throw authenticationFailureError('no session id in login response');
    }
    return createSession(response.id, this.sessionTtlMs);
  }

  /**
   * Return `session` while it is still usable, otherwise log in again.
   */
  async renewSession(session: Session): Promise<Session> {
    if (!isSessionExpired(session)) return session;
    this.logger.info('Session expired, renewing');
    return this.login();
  }

  async listDatabases(session: Session): Promise<MetabaseDatabase[]> {
    const body = await this.request<MetabaseDatabase[] | { data: MetabaseDatabase[] }>('/api/database', { session });
    return Array.isArray(body) ? body : body.data;
  }

  async listTables(session: Session): Promise<MetabaseTable[]> {
    return this.request<MetabaseTable[]>('/api/table', { session });
  }

  async getQueryMetadata(session: Session, tableId: number): Promise<MetabaseQueryMetadata> {
    return this.request<MetabaseQueryMetadata>(`/api/table/${tableId}/query_metadata`, { session });
  }

  /**
   * Run native SQL through the dataset endpoint. Metabase reports SQL errors
   * with a 202 and `status: "failed"`; those become QUERY_FAILED errors carrying
   * the database message.
   */
  async runNativeQuery(session: Session, databaseId: number, sql: string, timeoutMs?: number): Promise<QueryResult> {
    const payload: NativeQueryPayload = {
      type: 'native',
      native: { query: sql, 'template-tags': {} },
      database: databaseId,
    };

    let body: DatasetResponse;
    try {
      body = await this.request<DatasetResponse>('/api/dataset', { method: 'POST', body: payload, session, timeoutMs });
    } catch (err) {
      if (err instanceof PipelineError && err.code === 'METABASE_ERROR') {
        throw queryFailedError(err.message, err.details.response);
      }
      throw err;
    }

    if (body.status === 'failed' || body.error) {
      throw queryFailedError(body.error ?? 'query failed', body);
    }

    const rows = body.data?.rows;
    if (!Array.isArray(rows)) {
      throw queryFailedError('query returned no result set', body);
    }

    return {
      rowCount: rows.length,
      columns: (body.data?.cols ?? []).map(col => col.name),
      runningTimeMs: body.running_time,
    };
  }

  async listCollections(session: Session): Promise<MetabaseCollection[]> {
    return this.request<MetabaseCollection[]>('/api/collection', { session });
  }

  async createCollection(session: Session, payload: CreateCollectionPayload): Promise<MetabaseCollection> {
    return this.request<MetabaseCollection>('/api/collection', { method: 'POST', body: payload, session });
  }

  async listCollectionItems(session: Session, collectionId: number): Promise<CollectionItem[]> {
    const body = await this.request<CollectionItem[] | { data: CollectionItem[] }>(
      `/api/collection/${collectionId}/items`,
      { session }
    );
    return Array.isArray(body) ? body : body.data;
  }

  async createCard(session: Session, payload: CreateCardPayload): Promise<MetabaseCard> {
    return this.request<MetabaseCard>('/api/card', { method: 'POST', body: payload, session });
  }

  async deleteCard(session: Session, cardId: number): Promise<void> {
    await this.request<unknown>(`/api/card/${cardId}`, { method: 'DELETE', session });
  }
}

function parseBody(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function describeBody(body: unknown): string | undefined {
  if (typeof body === 'string') return body;
  if (body && typeof body === 'object') {
    const err = body as MetabaseErrorResponse;
    if (err.message) return err.message;
    if (err.error) return err.error;
    if (err.errors) return Object.values(err.errors).join('; ');
  }
  return undefined;
}

function httpError(status: number, endpoint: string, body: unknown): PipelineError {
  const detail = describeBody(body) ?? `HTTP ${status}`;

  if (status === 401 || status === 403) {
    return authenticationFailureError(detail, status);
  }
  if (status === 404) {
    return notFoundError(endpoint);
  }
  if (status === 408 || status === 429 || status >= 500) {
    return serviceUnavailableError('Metabase', detail, status);
  }
  return metabaseError(detail, status, body);
}

/**
 * Create a new MetabaseClient instance with specific configuration
 */
export function createMetabaseClient(config?: MetabaseClientConfig): MetabaseClient {
  return new MetabaseClient(config);
}
