export type SemanticTag = 'primary_key' | 'foreign_key' | 'timestamp' | 'cost';

export interface ForeignKeyTarget {
  table: string;
  field: string;
}

export interface FieldInfo {
  readonly name: string;
  readonly type: string;
  readonly description?: string;
  readonly semanticTag?: SemanticTag;
  readonly foreignKey?: ForeignKeyTarget;
}

/**
 * A foreign key found on one of the table's fields. When the target table
 * cannot be looked up the relationship is kept with `resolved: false`.
 */
export interface Relationship {
  readonly field: string;
  readonly resolved: boolean;
  readonly targetTable?: string;
  readonly targetField?: string;
  readonly targetTableId?: number;
}

export interface TableMetadata {
  readonly id: number;
  readonly name: string;
  readonly schema?: string;
  readonly description?: string;
  readonly databaseId: number;
  readonly fields: readonly FieldInfo[];
  readonly relationships: readonly Relationship[];
}
