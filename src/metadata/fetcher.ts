import { tableNotFoundError } from '../errors.js';
import type { MetabaseClient } from '../metabase/client.js';
import type { Session } from '../metabase/session.js';
import type { MetabaseField, MetabaseTable } from '../metabase/types.js';
import { getLogger } from '../utils/logger.js';
import { defaultRetryPolicy, withRetry, type RetryPolicy } from '../utils/retry.js';
import type { FieldInfo, Relationship, SemanticTag, TableMetadata } from './types.js';

const COST_TYPES = new Set([
  'type/Cost',
  'type/Price',
  'type/Currency',
  'type/GrossMargin',
  'type/Discount',
  'type/Income',
]);

const TIMESTAMP_TYPES = new Set([
  'type/CreationTimestamp',
  'type/CreationDate',
  'type/UpdatedTimestamp',
  'type/UpdatedDate',
  'type/JoinTimestamp',
  'type/JoinDate',
  'type/CancelationTimestamp',
  'type/DeletionTimestamp',
]);

const TEMPORAL_BASE_TYPES = new Set([
  'type/DateTime',
  'type/DateTimeWithTZ',
  'type/DateTimeWithLocalTZ',
  'type/Date',
  'type/Instant',
]);

export function semanticTagFor(field: Pick<MetabaseField, 'semantic_type' | 'effective_type' | 'base_type'>): SemanticTag | undefined {
  const semantic = field.semantic_type ?? undefined;
  if (semantic === 'type/PK') return 'primary_key';
  if (semantic === 'type/FK') return 'foreign_key';
  if (semantic && COST_TYPES.has(semantic)) return 'cost';
  if (semantic && TIMESTAMP_TYPES.has(semantic)) return 'timestamp';

  const type = field.effective_type ?? field.base_type;
  if (type && TEMPORAL_BASE_TYPES.has(type)) return 'timestamp';
  return undefined;
}

export type MetadataSource = Pick<MetabaseClient, 'listTables' | 'getQueryMetadata'>;

export class MetadataFetcher {
  private retryPolicy: RetryPolicy;
  private logger = getLogger().child({ component: 'MetadataFetcher' });

  constructor(
    private client: MetadataSource,
    retryPolicy?: RetryPolicy
  ) {
    this.retryPolicy = retryPolicy ?? defaultRetryPolicy();
  }

  /**
   * Names of every table whose name starts with `prefix` (case-insensitive),
   * limited to one database when `databaseId` is given.
   */
  async discoverTables(session: Session, prefix: string, databaseId?: number): Promise<string[]> {
    const tables = await this.listTables(session, databaseId);
    const needle = prefix.toLowerCase();
    const names = tables
      .filter(t => t.name.toLowerCase().startsWith(needle))
      .map(t => t.name);
    this.logger.info({ prefix, found: names.length, total: tables.length }, 'Discovered tables');
    return names;
  }

  async fetchTable(session: Session, tableName: string, databaseId?: number): Promise<TableMetadata> {
    const tables = await this.listTables(session, databaseId);
    const wanted = tableName.toLowerCase();
    const table = tables.find(t => t.name.toLowerCase() === wanted);

    if (!table) {
      const suggestions = tables
        .filter(t => t.name.toLowerCase().includes(wanted))
        .map(t => t.name)
        .slice(0, 3);
      throw tableNotFoundError(tableName, suggestions);
    }

    const metadata = await withRetry(
      () => this.client.getQueryMetadata(session, table.id),
      this.retryPolicy,
      `getQueryMetadata:${table.name}`,
      this.logger
    );

    const tablesById = new Map(tables.map(t => [t.id, t]));
    const fields: FieldInfo[] = [];
    const relationships: Relationship[] = [];
    const seen = new Set<string>();

    for (const raw of metadata.fields ?? []) {
      if (!raw.name || seen.has(raw.name)) continue;
      seen.add(raw.name);

      const relationship = raw.fk_target_field_id ? resolveRelationship(raw, tablesById) : undefined;
      if (relationship) relationships.push(relationship);

      fields.push(toFieldInfo(raw, relationship));
    }

    const unresolved = relationships.filter(r => !r.resolved).length;
    if (unresolved > 0) {
      this.logger.warn({ table: table.name, unresolved }, 'Some foreign keys could not be resolved');
    }

    this.logger.info(
      { table: table.name, fields: fields.length, relationships: relationships.length },
      'Fetched table metadata'
    );

    return Object.freeze({
      id: table.id,
      name: table.name,
      schema: table.schema ?? undefined,
      description: metadata.description ?? table.description ?? undefined,
      databaseId: table.db_id,
      fields: Object.freeze(fields),
      relationships: Object.freeze(relationships),
    });
  }

  private async listTables(session: Session, databaseId?: number): Promise<MetabaseTable[]> {
    const tables = await withRetry(() => this.client.listTables(session), this.retryPolicy, 'listTables', this.logger);
    return databaseId === undefined ? tables : tables.filter(t => t.db_id === databaseId);
  }
}

function resolveRelationship(field: MetabaseField, tablesById: Map<number, MetabaseTable>): Relationship {
  const target = field.target;
  const targetTable = target ? tablesById.get(target.table_id) : undefined;

  if (!target || !targetTable) {
    return {
      field: field.name,
      resolved: false,
      targetTableId: target?.table_id,
      targetField: target?.name,
    };
  }

  return {
    field: field.name,
    resolved: true,
    targetTable: targetTable.name,
    targetField: target.name,
    targetTableId: targetTable.id,
  };
}

function toFieldInfo(field: MetabaseField, relationship?: Relationship): FieldInfo {
  const info: FieldInfo = {
    name: field.name,
    type: field.effective_type ?? field.base_type ?? 'Unknown',
    description: field.description || undefined,
    semanticTag: semanticTagFor(field),
    foreignKey:
      relationship?.resolved && relationship.targetTable && relationship.targetField
        ? { table: relationship.targetTable, field: relationship.targetField }
        : undefined,
  };
  return Object.freeze(info);
}
