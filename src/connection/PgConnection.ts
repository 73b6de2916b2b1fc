/**
 * pgaccess - node-postgres Connection
 *
 * Adapts a pg client to the Connection contract. Manual-commit mode is
 * emulated by opening a transaction (BEGIN) lazily before the first
 * statement that runs while autocommit is off.
 */

import type { ClientBase } from 'pg';
import type { Connection, RawResult, SqlValue } from '../types/database.js';
import { ConnectionError, TransactionError } from '../types/errors.js';

/**
 * Returns the client to wherever it came from.
 * `discard` is true when the session may still hold uncommitted work.
 */
export type ReleaseClient = (discard: boolean) => Promise<void>;

export class PgConnection implements Connection {
    private autoCommit = true;
    private inTransaction = false;
    // session state unknown after a failed ROLLBACK; never reused
    private broken = false;
    private closed = false;

    constructor(
        private readonly client: ClientBase,
        private readonly releaseClient: ReleaseClient
    ) { }

    async query(sql: string, params: readonly SqlValue[]): Promise<RawResult> {
        this.assertOpen();
        await this.ensureTransaction();

        const result = await this.client.query(sql, [...params]);
        return {
            rows: result.rows,
            rowCount: result.rowCount ?? 0,
            fields: result.fields.map(f => ({ name: f.name, dataTypeID: f.dataTypeID })),
            command: result.command
        };
    }

    async setAutoCommit(enabled: boolean): Promise<void> {
        this.assertOpen();
        if (enabled === this.autoCommit) {
            return;
        }
        if (enabled && this.inTransaction) {
            await this.commit();
        }
        this.autoCommit = enabled;
    }

    getAutoCommit(): boolean {
        return this.autoCommit;
    }

    async commit(): Promise<void> {
        this.assertOpen();
        if (!this.inTransaction) {
            return;
        }
        // Left pending on failure so a following rollback() still reaches the server
        const result = await this.client.query('COMMIT');
        this.inTransaction = false;
        // an aborted transaction answers COMMIT with the ROLLBACK tag and no error
        if (result.command === 'ROLLBACK') {
            throw new TransactionError(
                'Transaction was aborted; COMMIT was answered with ROLLBACK',
                'COMMIT_FAILED'
            );
        }
    }

    async rollback(): Promise<void> {
        this.assertOpen();
        if (!this.inTransaction) {
            return;
        }
        try {
            await this.client.query('ROLLBACK');
        } catch (error) {
            this.broken = true;
            throw error;
        } finally {
            this.inTransaction = false;
        }
    }

    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        await this.releaseClient(this.inTransaction || this.broken);
    }

    isClosed(): boolean {
        return this.closed;
    }

    private async ensureTransaction(): Promise<void> {
        if (this.autoCommit || this.inTransaction) {
            return;
        }
        await this.client.query('BEGIN');
        this.inTransaction = true;
    }

    private assertOpen(): void {
        if (this.closed) {
            throw new ConnectionError('Connection is closed', 'SOURCE_CLOSED');
        }
    }
}
