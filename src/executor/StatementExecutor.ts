/**
 * pgaccess - Statement Executor
 *
 * Runs statements on the caller's transaction connection when one is bound,
 * otherwise on a connection acquired for the single operation and closed
 * when it ends. Statements and cursors are closed on every exit path.
 */

import type { Connection, ConnectionSource, SqlValue } from '../types/database.js';
import { QueryError, errorMessage } from '../types/errors.js';
import type { TransactionScope } from '../transaction/TransactionScope.js';
import { PreparedStatement, toQueryError } from './PreparedStatement.js';
import { ResultCursor } from './ResultCursor.js';
import { StatementDescriptor } from './StatementDescriptor.js';
import type { RowMapper } from './RowMapper.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('QUERY');

type StatementTarget = string | StatementDescriptor;

interface ResolvedStatement {
    sql: string;
    params: readonly SqlValue[];
}

function resolve(target: StatementTarget, params: readonly SqlValue[]): ResolvedStatement {
    return target instanceof StatementDescriptor
        ? { sql: target.sql, params: target.params }
        : { sql: target, params };
}

/**
 * First column of the first generated-key row, as a number
 */
function readGeneratedKey(keys: ResultCursor, sql: string): number | undefined {
    if (!keys.next() || keys.columns.length === 0) {
        return undefined;
    }
    const value = keys.get(1);
    if (value === null || value === undefined) {
        return undefined;
    }
    const key = typeof value === 'bigint' || (typeof value === 'string' && /^-?\d+$/.test(value))
        ? Number(value)
        : value;
    // int8 keys past 2^53 would round to a different id
    if (typeof key === 'number' && Number.isSafeInteger(key)) {
        return key;
    }
    throw new QueryError('Generated key is not a safe integer', 'INVALID_GENERATED_KEY', {
        sql,
        key: String(value)
    });
}

function closeCursor(cursor: ResultCursor | undefined): void {
    if (cursor !== undefined && !cursor.isClosed()) {
        cursor.close();
    }
}

export class StatementExecutor {
    constructor(
        private readonly source: ConnectionSource,
        private readonly transactions: TransactionScope
    ) { }

    /**
     * Execute a read query and hand back its cursor; the caller closes it
     */
    executeQuery(descriptor: StatementDescriptor): Promise<ResultCursor>;
    executeQuery(sql: string, ...params: SqlValue[]): Promise<ResultCursor>;
    async executeQuery(target: StatementTarget, ...params: SqlValue[]): Promise<ResultCursor> {
        const { sql, params: values } = resolve(target, params);
        return this.withStatement('executeQuery', sql, values, (statement) => statement.executeQuery());
    }

    /**
     * Execute a write statement and return the affected-row count
     */
    executeUpdate(descriptor: StatementDescriptor): Promise<number>;
    executeUpdate(sql: string, ...params: SqlValue[]): Promise<number>;
    async executeUpdate(target: StatementTarget, ...params: SqlValue[]): Promise<number> {
        const { sql, params: values } = resolve(target, params);
        return this.withStatement('executeUpdate', sql, values, (statement) => statement.executeUpdate());
    }

    /**
     * Execute an insert and return its generated key: the first column of
     * the first row the statement returns (INSERT ... RETURNING id).
     * Resolves to undefined when the statement returns no rows.
     */
    executeInsert(descriptor: StatementDescriptor): Promise<number | undefined>;
    executeInsert(sql: string, ...params: SqlValue[]): Promise<number | undefined>;
    async executeInsert(target: StatementTarget, ...params: SqlValue[]): Promise<number | undefined> {
        const { sql, params: values } = resolve(target, params);
        return this.withStatement('executeInsert', sql, values, async (statement) => {
            const { affectedRows, generatedKeys } = await statement.executeForKeys();
            try {
                if (affectedRows === 0) {
                    throw new QueryError('Executing insert failed, no rows affected', 'NO_ROWS_AFFECTED', { sql });
                }
                return readGeneratedKey(generatedKeys, sql);
            } finally {
                closeCursor(generatedKeys);
            }
        });
    }

    /**
     * Map the first row of a query, or resolve to undefined when there is none
     */
    queryForObject<T>(descriptor: StatementDescriptor, mapper: RowMapper<T>): Promise<T | undefined>;
    queryForObject<T>(sql: string, mapper: RowMapper<T>, ...params: SqlValue[]): Promise<T | undefined>;
    async queryForObject<T>(
        target: StatementTarget,
        mapper: RowMapper<T>,
        ...params: SqlValue[]
    ): Promise<T | undefined> {
        const { sql, params: values } = resolve(target, params);
        return this.withStatement('queryForObject', sql, values, async (statement) => {
            const cursor = await statement.executeQuery();
            try {
                return cursor.next() ? mapper(cursor) : undefined;
            } finally {
                closeCursor(cursor);
            }
        });
    }

    /**
     * Map every row of a query, in cursor order
     */
    queryForList<T>(descriptor: StatementDescriptor, mapper: RowMapper<T>): Promise<T[]>;
    queryForList<T>(sql: string, mapper: RowMapper<T>, ...params: SqlValue[]): Promise<T[]>;
    async queryForList<T>(
        target: StatementTarget,
        mapper: RowMapper<T>,
        ...params: SqlValue[]
    ): Promise<T[]> {
        const { sql, params: values } = resolve(target, params);
        return this.withStatement('queryForList', sql, values, async (statement) => {
            const cursor = await statement.executeQuery();
            try {
                const results: T[] = [];
                while (cursor.next()) {
                    results.push(mapper(cursor));
                }
                return results;
            } finally {
                closeCursor(cursor);
            }
        });
    }

    /**
     * Bind and queue each parameter set, then run them as one batch.
     * Returns one count per set, in input order. An empty input returns []
     * without touching a connection. Outside a transaction the batch runs in
     * a transaction of its own, so a failing set leaves nothing applied.
     */
    async batchUpdate(
        target: StatementTarget,
        paramSets: readonly (readonly SqlValue[])[]
    ): Promise<number[]> {
        if (paramSets.length === 0) {
            return [];
        }
        const { sql } = resolve(target, []);

        return this.withConnection('batchUpdate', sql, async (connection, owned) => {
            const statement = new PreparedStatement(connection, sql);
            try {
                for (const params of paramSets) {
                    statement.bindAll(params);
                    statement.addBatch();
                }
                return owned
                    ? await this.runIsolatedBatch(connection, statement)
                    : await statement.executeBatch();
            } finally {
                statement.close();
            }
        });
    }

    private async runIsolatedBatch(connection: Connection, statement: PreparedStatement): Promise<number[]> {
        try {
            await connection.setAutoCommit(false);
            const counts = await statement.executeBatch();
            await connection.commit();
            return counts;
        } catch (error) {
            await connection.rollback().catch((rollbackError: unknown) => {
                log.warn('Failed to roll back batch', {
                    code: 'QUERY_BATCH_ROLLBACK_FAILED',
                    sql: statement.sql.substring(0, 100),
                    error: errorMessage(rollbackError)
                });
            });
            throw toQueryError(error, statement.sql);
        } finally {
            await connection.setAutoCommit(true).catch((resetError: unknown) => {
                log.warn('Failed to restore autocommit after batch', {
                    code: 'QUERY_AUTOCOMMIT_FAILED',
                    error: errorMessage(resetError)
                });
            });
        }
    }

    /**
     * Prepare, bind, run `work`, and close the statement whatever happens
     */
    private async withStatement<T>(
        operation: string,
        sql: string,
        params: readonly SqlValue[],
        work: (statement: PreparedStatement) => Promise<T>
    ): Promise<T> {
        return this.withConnection(operation, sql, async (connection) => {
            const statement = new PreparedStatement(connection, sql);
            try {
                statement.bindAll(params);
                return await work(statement);
            } finally {
                statement.close();
            }
        });
    }

    /**
     * Resolve the connection for one operation. A transaction-bound connection
     * is borrowed and left open; anything else is acquired here and closed here.
     */
    private async withConnection<T>(
        operation: string,
        sql: string,
        work: (connection: Connection, owned: boolean) => Promise<T>
    ): Promise<T> {
        const bound = this.transactions.currentConnection();
        const connection = bound ?? await this.source.acquire();
        const owned = bound === undefined;
        const startTime = Date.now();

        try {
            const result = await work(connection, owned);
            log.debug('Statement executed', {
                operation,
                sql: sql.substring(0, 100),
                transactional: !owned,
                durationMs: Date.now() - startTime
            });
            return result;
        } finally {
            if (owned) {
                try {
                    await connection.close();
                } catch (error) {
                    log.warn('Failed to close connection', {
                        code: 'QUERY_CLOSE_FAILED',
                        operation,
                        error: errorMessage(error)
                    });
                }
            }
        }
    }
}
