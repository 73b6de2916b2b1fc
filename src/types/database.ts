/**
 * pgaccess - Database Types
 *
 * Values, results and the connection contracts shared by sources,
 * the transaction scope and the statement executor.
 */

/**
 * A value that can be bound to a positional placeholder.
 * `null` and `undefined` both bind as SQL NULL.
 */
export type SqlValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | Buffer
  | null
  | undefined
  | readonly SqlValue[]
  | { readonly [key: string]: unknown };

/**
 * A result row keyed by column name
 */
export type Row = Record<string, unknown>;

/**
 * PostgreSQL field information from result set
 */
export interface FieldInfo {
  name: string;
  dataTypeID: number;
}

/**
 * Result of one round trip on a connection
 */
export interface RawResult {
  /** Rows returned (SELECT, or RETURNING on a write) */
  rows: Row[];

  /** Rows affected or returned; 0 when the driver reports none */
  rowCount: number;

  /** Column metadata in select-list order */
  fields: FieldInfo[];

  /** Command tag (SELECT, INSERT, ...) */
  command?: string | undefined;
}

/**
 * An exclusively owned session handle.
 *
 * Whoever acquired it releases it with `close()`, unless it is bound to an
 * active transaction, in which case only the transaction scope closes it.
 */
export interface Connection {
  /** Execute one statement with positional parameters ($1, $2, ...) */
  query(sql: string, params: readonly SqlValue[]): Promise<RawResult>;

  /**
   * Switch between autocommit and manual-commit mode.
   * Re-enabling autocommit commits pending work.
   */
  setAutoCommit(enabled: boolean): Promise<void>;

  getAutoCommit(): boolean;

  /** Commit pending work; the mode is left unchanged */
  commit(): Promise<void>;

  /** Discard pending work; the mode is left unchanged */
  rollback(): Promise<void>;

  /** Release the session. Idempotent. */
  close(): Promise<void>;

  isClosed(): boolean;
}

/**
 * Where connections come from.
 */
export interface ConnectionSource {
  /** Produce a live connection; fails with ConnectionError */
  acquire(): Promise<Connection>;

  /** Release everything the source itself owns. Idempotent. */
  shutdown(): Promise<void>;
}

/**
 * Connection pool statistics
 */
export interface PoolStats {
  /** Total connections in pool */
  total: number;

  /** Connections handed out and not yet returned */
  active: number;

  /** Idle connections (available) */
  idle: number;

  /** Waiting requests in queue */
  waiting: number;

  /** Successful acquisitions since creation */
  acquired: number;
}

/**
 * Database connection health status
 */
export interface HealthStatus {
  connected: boolean;
  latencyMs?: number | undefined;
  poolStats?: PoolStats | undefined;
  error?: string | undefined;
}
