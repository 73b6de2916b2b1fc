/**
 * pgaccess - Database
 *
 * Wires a connection source, a transaction scope and a statement executor
 * together and owns their shutdown.
 */

import type { ConnectionSource } from '../types/database.js';
import { parseDatabaseConfig } from '../config/schemas.js';
import type { ConnectionProperties, DatabaseConfigInput, PoolConfigInput } from '../config/schemas.js';
import { DirectConnectionSource } from '../connection/DirectConnectionSource.js';
import { PooledConnectionSource } from '../connection/PooledConnectionSource.js';
import { TransactionScope } from '../transaction/TransactionScope.js';
import { StatementExecutor } from '../executor/StatementExecutor.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('CONNECTION');

export interface DatabaseOptions {
    /** Connection settings; validated on construction */
    database: DatabaseConfigInput;

    /** Pool settings; without them every operation opens its own connection */
    pool?: PoolConfigInput | undefined;

    /** Connection properties for the unpooled source, winning over database.properties */
    properties?: ConnectionProperties | undefined;
}

export class Database {
    readonly transactions: TransactionScope;
    readonly executor: StatementExecutor;
    private closed = false;

    constructor(readonly source: ConnectionSource) {
        this.transactions = new TransactionScope(source);
        this.executor = new StatementExecutor(source, this.transactions);
    }

    /**
     * Build a database from configuration: pooled when `pool` is given, unpooled otherwise
     */
    static create(options: DatabaseOptions): Database {
        const config = parseDatabaseConfig(options.database);
        const source = options.pool !== undefined
            ? new PooledConnectionSource(config, options.pool)
            : new DirectConnectionSource(config, options.properties);
        return new Database(source);
    }

    /**
     * Roll back transactions still bound in any call chain, then shut the source down.
     * Idempotent.
     */
    async shutdown(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;

        const aborted = await this.transactions.abortAll();
        if (aborted > 0) {
            log.warn('Shut down with open transactions', { aborted });
        }
        await this.source.shutdown();
        log.info('Database shut down');
    }
}
