/**
 * pgaccess - Prepared Statement
 *
 * Statement text plus positionally bound parameters, executed on one
 * connection. Placeholder $n takes the value bound at index n.
 */

import type { Connection, RawResult, SqlValue } from '../types/database.js';
import { DataAccessError, QueryError, errorMessage } from '../types/errors.js';
import { ResultCursor } from './ResultCursor.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('QUERY');

/**
 * SQLSTATE reported by the server, when the driver exposes one
 */
function sqlStateOf(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Wrap a driver failure; errors already raised by this library pass through
 */
export function toQueryError(error: unknown, sql: string): DataAccessError {
    if (error instanceof DataAccessError) {
        return error;
    }
    const sqlState = sqlStateOf(error);
    return new QueryError(
        `Query failed: ${errorMessage(error)}`,
        'EXECUTION_FAILED',
        sqlState !== undefined ? { sql, sqlState } : { sql },
        { cause: error }
    );
}

export interface GeneratedKeysResult {
    affectedRows: number;
    generatedKeys: ResultCursor;
}

export class PreparedStatement {
    private parameters: SqlValue[] = [];
    private batch: SqlValue[][] = [];
    private closed = false;

    constructor(
        private readonly connection: Connection,
        readonly sql: string
    ) { }

    /**
     * Bind a value to placeholder $index (1-based)
     */
    bind(index: number, value: SqlValue): void {
        this.assertOpen();
        if (!Number.isInteger(index) || index < 1) {
            throw new RangeError(`Parameter index must be a positive integer, got ${String(index)}`);
        }
        this.parameters[index - 1] = value;
    }

    /**
     * Bind params[i] to placeholder $(i + 1); an absent list binds nothing
     */
    bindAll(params?: readonly SqlValue[]): void {
        params?.forEach((value, i) => { this.bind(i + 1, value); });
    }

    clearParameters(): void {
        this.assertOpen();
        this.parameters = [];
    }

    /**
     * Queue the current bindings and start a fresh set
     */
    addBatch(): void {
        this.assertOpen();
        this.batch.push(this.boundValues());
        this.parameters = [];
    }

    get batchSize(): number {
        return this.batch.length;
    }

    async executeQuery(): Promise<ResultCursor> {
        const result = await this.run(this.boundValues());
        return new ResultCursor(result);
    }

    async executeUpdate(): Promise<number> {
        const result = await this.run(this.boundValues());
        return result.rowCount;
    }

    /**
     * Execute a write and expose the rows it returned (RETURNING) as keys
     */
    async executeForKeys(): Promise<GeneratedKeysResult> {
        const result = await this.run(this.boundValues());
        return {
            affectedRows: result.rowCount,
            generatedKeys: new ResultCursor(result)
        };
    }

    /**
     * Execute every queued set in order; one count per set
     */
    async executeBatch(): Promise<number[]> {
        const queued = this.batch;
        this.batch = [];
        const counts: number[] = [];
        for (const values of queued) {
            const result = await this.run(values);
            counts.push(result.rowCount);
        }
        return counts;
    }

    close(): void {
        this.closed = true;
        this.parameters = [];
        this.batch = [];
    }

    isClosed(): boolean {
        return this.closed;
    }

    /** Unbound positions below the highest bound one go out as NULL */
    private boundValues(): SqlValue[] {
        return Array.from({ length: this.parameters.length }, (_, i) => this.parameters[i] ?? null);
    }

    private async run(values: readonly SqlValue[]): Promise<RawResult> {
        this.assertOpen();
        try {
            return await this.connection.query(this.sql, values);
        } catch (error) {
            const wrapped = toQueryError(error, this.sql);
            log.error('Query failed', {
                code: 'QUERY_FAILED',
                sql: this.sql.substring(0, 100),
                error: wrapped.message
            });
            throw wrapped;
        }
    }

    private assertOpen(): void {
        if (this.closed) {
            throw new QueryError('Statement is closed', 'STATEMENT_CLOSED', { sql: this.sql });
        }
    }
}
