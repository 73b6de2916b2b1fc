/**
 * pgaccess - Unpooled connection source
 *
 * Opens a brand-new physical connection for every acquire().
 */

import pg from 'pg';
import type { Connection, ConnectionSource } from '../types/database.js';
import type { ConnectionProperties, DatabaseConfig } from '../config/schemas.js';
import { buildDriverConnectionString } from '../config/connectionUrl.js';
import { PgConnection } from './PgConnection.js';
import { toConnectionError } from './connectionErrors.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('CONNECTION');

export class DirectConnectionSource implements ConnectionSource {
    private readonly connectionString: string;

    /**
     * @param overrides - connection properties that win over `config.properties`
     */
    constructor(
        private readonly config: DatabaseConfig,
        overrides?: ConnectionProperties
    ) {
        this.connectionString = buildDriverConnectionString(config, overrides);
    }

    async acquire(): Promise<Connection> {
        const client = new pg.Client({ connectionString: this.connectionString });

        try {
            await client.connect();
        } catch (error) {
            const wrapped = toConnectionError(error, {
                host: this.config.host,
                port: this.config.port,
                database: this.config.database
            });
            log.error('Failed to open connection', {
                code: wrapped.reason === 'TIMEOUT' ? 'CONN_TIMEOUT' : 'CONN_FAILED',
                host: this.config.host,
                port: this.config.port,
                database: this.config.database,
                error: wrapped.message
            });
            // a client whose connect() failed may still hold a socket
            await client.end().catch((endError: unknown) => {
                log.debug('Error closing failed client', { error: String(endError) });
            });
            throw wrapped;
        }

        log.debug('Connection opened', {
            host: this.config.host,
            port: this.config.port,
            database: this.config.database
        });

        return new PgConnection(client, async () => {
            await client.end();
        });
    }

    /**
     * Nothing to release: connections are owned by whoever acquired them.
     */
    shutdown(): Promise<void> {
        return Promise.resolve();
    }
}
