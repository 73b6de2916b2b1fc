/**
 * pgaccess - Pooled connection source
 *
 * Wraps pg connection pooling with statistics tracking, health checks
 * and a single, idempotent shutdown.
 */

import pg from 'pg';
import type { Connection, ConnectionSource, HealthStatus, PoolStats } from '../types/database.js';
import { parsePoolConfig } from '../config/schemas.js';
import type { DatabaseConfig, PoolConfig, PoolConfigInput } from '../config/schemas.js';
import { buildDriverConnectionString } from '../config/connectionUrl.js';
import { ConnectionError, errorMessage } from '../types/errors.js';
import { PgConnection } from './PgConnection.js';
import { toConnectionError } from './connectionErrors.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('POOL');

type PoolState = 'open' | 'closing' | 'closed';

export class PooledConnectionSource implements ConnectionSource {
    private readonly pool: pg.Pool;
    readonly poolConfig: PoolConfig;
    private state: PoolState = 'open';
    private shutdownPromise: Promise<void> | null = null;
    private acquiredCount = 0;
    private activeCount = 0;

    /**
     * @param poolConfig - validated here; an invalid value throws ValidationError
     */
    constructor(
        private readonly config: DatabaseConfig,
        poolConfig: PoolConfigInput
    ) {
        this.poolConfig = parsePoolConfig(poolConfig);
        const { poolName, properties } = this.poolConfig;

        const poolOptions: pg.PoolConfig = {
            connectionString: buildDriverConnectionString(config, properties),
            max: this.poolConfig.maximumPoolSize,
            min: this.poolConfig.minimumIdle,
            idleTimeoutMillis: this.poolConfig.idleTimeoutMillis,
            connectionTimeoutMillis: this.poolConfig.connectionTimeoutMillis,
            allowExitOnIdle: true
        };
        const mergedProperties = { ...config.properties, ...properties };
        if (!('application_name' in mergedProperties)) {
            poolOptions.application_name = poolName;
        }

        this.pool = new pg.Pool(poolOptions);

        this.pool.on('error', (err) => {
            log.error('Idle client error', { code: 'POOL_CLIENT_ERROR', poolName, error: err.message });
        });

        log.info('Connection pool created', {
            poolName,
            host: config.host,
            port: config.port,
            database: config.database,
            maximumPoolSize: this.poolConfig.maximumPoolSize,
            minimumIdle: this.poolConfig.minimumIdle
        });
    }

    get poolName(): string {
        return this.poolConfig.poolName;
    }

    /**
     * Take a connection from the pool, waiting up to connectionTimeoutMillis
     */
    async acquire(): Promise<Connection> {
        if (this.state !== 'open') {
            throw new ConnectionError(`Connection pool '${this.poolName}' is shut down`, 'SOURCE_CLOSED', {
                poolName: this.poolName
            });
        }

        let client: pg.PoolClient;
        try {
            client = await this.pool.connect();
        } catch (error) {
            const wrapped = toConnectionError(error, { poolName: this.poolName });
            log.error('Failed to acquire connection', {
                code: wrapped.reason === 'TIMEOUT' ? 'POOL_ACQUIRE_TIMEOUT' : 'POOL_ACQUIRE_FAILED',
                poolName: this.poolName,
                error: wrapped.message
            });
            throw wrapped;
        }

        this.acquiredCount++;
        this.activeCount++;

        return new PgConnection(client, (discard) => {
            this.activeCount = Math.max(0, this.activeCount - 1);
            // true destroys the client instead of returning it to the idle set
            client.release(discard);
            return Promise.resolve();
        });
    }

    /**
     * Get pool statistics
     */
    getStats(): PoolStats {
        return {
            total: this.pool.totalCount,
            active: this.activeCount,
            idle: this.pool.idleCount,
            waiting: this.pool.waitingCount,
            acquired: this.acquiredCount
        };
    }

    /**
     * Check pool health with a round trip
     */
    async checkHealth(): Promise<HealthStatus> {
        if (this.state !== 'open') {
            return { connected: false, error: 'Pool is shut down' };
        }

        const startTime = Date.now();

        try {
            await this.pool.query('SELECT 1');
            return {
                connected: true,
                latencyMs: Date.now() - startTime,
                poolStats: this.getStats()
            };
        } catch (error) {
            return {
                connected: false,
                error: errorMessage(error),
                latencyMs: Date.now() - startTime
            };
        }
    }

    /**
     * End the pool. Concurrent callers share one shutdown; later calls resolve at once.
     */
    async shutdown(): Promise<void> {
        if (this.state === 'closed') {
            return;
        }
        if (this.shutdownPromise === null) {
            this.state = 'closing';
            this.shutdownPromise = this.endPool();
        }
        return this.shutdownPromise;
    }

    isClosed(): boolean {
        return this.state !== 'open';
    }

    private async endPool(): Promise<void> {
        log.info('Shutting down connection pool...', { poolName: this.poolName });

        try {
            await this.pool.end();
            log.info('Connection pool shut down successfully', { poolName: this.poolName });
        } catch (error) {
            log.error('Error during pool shutdown', {
                code: 'POOL_SHUTDOWN_FAILED',
                poolName: this.poolName,
                error: errorMessage(error)
            });
            throw new ConnectionError(
                `Failed to shut down connection pool '${this.poolName}': ${errorMessage(error)}`,
                'SHUTDOWN_FAILED',
                { poolName: this.poolName },
                { cause: error }
            );
        } finally {
            this.state = 'closed';
        }
    }
}
