export interface MetabaseSessionResponse {
  id: string;
}

export interface MetabaseDatabase {
  id: number;
  name: string;
  engine?: string;
}

export interface MetabaseTable {
  id: number;
  name: string;
  display_name?: string;
  description?: string | null;
  schema?: string | null;
  db_id: number;
  entity_type?: string | null;
}

export interface MetabaseFieldTarget {
  id: number;
  name: string;
  table_id: number;
}

export interface MetabaseField {
  id: number;
  name: string;
  display_name?: string;
  description?: string | null;
  base_type?: string;
  effective_type?: string;
  semantic_type?: string | null;
  fk_target_field_id?: number | null;
  target?: MetabaseFieldTarget | null;
  table_id?: number;
}

export interface MetabaseQueryMetadata extends MetabaseTable {
  fields: MetabaseField[];
}

export interface NativeQueryPayload {
  type: 'native';
  native: {
    query: string;
    'template-tags': Record<string, never>;
  };
  database: number;
}

export interface DatasetColumn {
  name: string;
  display_name?: string;
  base_type?: string;
}

export interface DatasetResponse {
  status?: 'completed' | 'failed' | string;
  error?: string | null;
  running_time?: number;
  row_count?: number;
  data?: {
    rows?: unknown[][];
    cols?: DatasetColumn[];
  };
}

export interface QueryResult {
  rowCount: number;
  columns: string[];
  runningTimeMs?: number;
}

export interface MetabaseCollection {
  id: number | 'root';
  name: string;
  description?: string | null;
  archived?: boolean;
}

export interface CreateCollectionPayload {
  name: string;
  description?: string;
  color?: string;
  parent_id: number | null;
}

export interface CollectionItem {
  id: number;
  name: string;
  model: 'card' | 'dataset' | 'dashboard' | 'collection' | string;
}

export interface CreateCardPayload {
  name: string;
  description: string;
  collection_id: number;
  dataset_query: NativeQueryPayload;
  display: 'table' | 'scalar' | string;
  visualization_settings: Record<string, unknown>;
}

export interface MetabaseCard {
  id: number;
  name: string;
  collection_id: number | null;
}

export interface MetabaseErrorResponse {
  message?: string;
  error?: string;
  errors?: Record<string, string>;
}
