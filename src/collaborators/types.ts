/**
 * Capability interfaces the dispatcher forwards approved actions to.
 */

// ---------------------------------------------------------------------------
// Warehouse
// ---------------------------------------------------------------------------

export interface QueryResult {
  columns: string[];
  rows: Array<Record<string, unknown>>;
  /** Rows returned, or rows changed for a statement that returns none. */
  rowCount: number;
  /** True when the statement had rows beyond the requested limit. */
  truncated: boolean;
}

export interface ColumnInfo {
  name: string;
  type: string;
  nullable: boolean;
}

/**
 * A live warehouse connection. Implementations throw CollaboratorError
 * with kind "connectivity" when the warehouse cannot be reached and kind
 * "query" when the warehouse rejects a statement.
 */
export interface WarehouseService {
  readonly warehouseType: string;
  /** Reads at most `maxRows` rows when given; the rest are never fetched. */
  executeQuery(sql: string, maxRows?: number): Promise<QueryResult>;
  listTables(schema: string): Promise<string[]>;
  describeTable(name: string): Promise<ColumnInfo[]>;
  close(): void;
}

// ---------------------------------------------------------------------------
// Documentation search
// ---------------------------------------------------------------------------

export interface SearchHit {
  snippet: string;
  score: number;
}

export interface DocumentationSearch {
  search(query: string, k: number, signal?: AbortSignal): Promise<SearchHit[]>;
}

// ---------------------------------------------------------------------------
// Config generator
// ---------------------------------------------------------------------------

export type GeneratedFileKind =
  | "inputs"
  | "models"
  | "entity_vars"
  | "date_filtered_vars"
  | "propensity";

export interface GeneratedFile {
  fileName: string;
  content: string;
}
