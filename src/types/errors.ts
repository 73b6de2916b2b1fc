/**
 * pgaccess - Error Types
 *
 * Error classes surfaced by connection sources, the transaction scope
 * and the statement executor.
 */

/**
 * Base error class for pgaccess
 */
export class DataAccessError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DataAccessError";
  }
}

export type ConnectionErrorReason =
  | "CONNECT_FAILED"
  | "TIMEOUT"
  | "SOURCE_CLOSED"
  | "SHUTDOWN_FAILED";

/**
 * A connection could not be acquired, or a source failed to shut down
 */
export class ConnectionError extends DataAccessError {
  constructor(
    message: string,
    public readonly reason: ConnectionErrorReason,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, "CONNECTION_ERROR", details, options);
    this.name = "ConnectionError";
  }
}

export type TransactionErrorReason =
  | "ALREADY_ACTIVE"
  | "NO_ACTIVE_TRANSACTION"
  | "NO_CALL_CHAIN"
  | "BEGIN_FAILED"
  | "COMMIT_FAILED";

/**
 * Transaction state violation or failed commit
 */
export class TransactionError extends DataAccessError {
  constructor(
    message: string,
    public readonly reason: TransactionErrorReason,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, "TRANSACTION_ERROR", details, options);
    this.name = "TransactionError";
  }
}

export type QueryErrorReason =
  | "EXECUTION_FAILED"
  | "NO_ROWS_AFFECTED"
  | "INVALID_GENERATED_KEY"
  | "STATEMENT_CLOSED"
  | "CURSOR_CLOSED"
  | "NO_CURRENT_ROW"
  | "COLUMN_NOT_FOUND"
  | "TYPE_MISMATCH";

/**
 * Statement preparation, execution or result access error
 */
export class QueryError extends DataAccessError {
  constructor(
    message: string,
    public readonly reason: QueryErrorReason,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, "QUERY_ERROR", details, options);
    this.name = "QueryError";
  }
}

/**
 * Validation error for configuration values
 */
export class ValidationError extends DataAccessError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", details);
    this.name = "ValidationError";
  }
}

/**
 * Extract a printable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
