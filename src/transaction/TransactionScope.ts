/**
 * pgaccess - Transaction Scope
 *
 * Binds at most one connection per call chain. A call chain is an
 * AsyncLocalStorage context opened with run() or withTransaction(); code
 * outside any chain cannot begin a transaction and never sees one.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { Connection, ConnectionSource } from '../types/database.js';
import { TransactionError, errorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('TRANSACTION');

/**
 * Mutable slot owned by one call chain.
 * `claimed` is set as soon as begin() starts, before the acquire settles.
 */
interface TransactionBinding {
    claimed: boolean;
    connection: Connection | undefined;
}

function emptyBinding(): TransactionBinding {
    return { claimed: false, connection: undefined };
}

export class TransactionScope {
    private readonly storage = new AsyncLocalStorage<TransactionBinding>();
    private readonly activeBindings = new Set<TransactionBinding>();

    constructor(private readonly source: ConnectionSource) { }

    /**
     * Run `fn` in a new call chain with no transaction bound
     */
    run<T>(fn: () => Promise<T>): Promise<T> {
        return this.storage.run(emptyBinding(), fn);
    }

    /**
     * Acquire a connection, switch it to manual commit and bind it to the caller's chain
     */
    async begin(): Promise<void> {
        const binding = this.binding();
        if (binding === undefined) {
            throw new TransactionError(
                'No call chain: begin transactions inside run() or withTransaction()',
                'NO_CALL_CHAIN'
            );
        }
        if (binding.claimed) {
            throw new TransactionError(
                'A transaction is already active in this call chain',
                'ALREADY_ACTIVE'
            );
        }
        binding.claimed = true;

        let connection: Connection;
        try {
            connection = await this.source.acquire();
        } catch (error) {
            binding.claimed = false;
            throw error;
        }

        try {
            await connection.setAutoCommit(false);
        } catch (error) {
            binding.claimed = false;
            await connection.close().catch((closeError: unknown) => {
                log.warn('Failed to close connection after failed begin', {
                    code: 'TX_CLOSE_FAILED',
                    error: errorMessage(closeError)
                });
            });
            throw new TransactionError(
                `Failed to begin transaction: ${errorMessage(error)}`,
                'BEGIN_FAILED',
                undefined,
                { cause: error }
            );
        }

        binding.connection = connection;
        this.activeBindings.add(binding);
        log.debug('Transaction started', { operation: 'begin' });
    }

    /**
     * Commit the bound transaction. A failed commit is rolled back before the
     * commit failure is reported; the binding is cleared either way.
     */
    async commit(): Promise<void> {
        const binding = this.binding();
        const connection = binding?.connection;
        if (binding === undefined || connection === undefined) {
            throw new TransactionError('No active transaction to commit', 'NO_ACTIVE_TRANSACTION');
        }

        try {
            await connection.commit();
            log.debug('Transaction committed', { operation: 'commit' });
        } catch (error) {
            let rollbackFailure: unknown;
            try {
                await connection.rollback();
            } catch (rollbackError) {
                rollbackFailure = rollbackError;
                log.error('Rollback after failed commit also failed', {
                    code: 'TX_ROLLBACK_FAILED',
                    operation: 'commit',
                    error: errorMessage(rollbackError)
                });
            }

            const message = rollbackFailure === undefined
                ? 'Failed to commit transaction. Transaction has been rolled back'
                : 'Failed to commit transaction. Rollback failed as well';
            throw new TransactionError(
                `${message}: ${errorMessage(error)}`,
                'COMMIT_FAILED',
                rollbackFailure === undefined ? undefined : { rollbackError: errorMessage(rollbackFailure) },
                { cause: error }
            );
        } finally {
            await this.release(binding, connection, 'commit');
        }
    }

    /**
     * Roll back the bound transaction; the binding is cleared even when the rollback fails
     */
    async rollback(): Promise<void> {
        const binding = this.binding();
        const connection = binding?.connection;
        if (binding === undefined || connection === undefined) {
            throw new TransactionError('No active transaction to rollback', 'NO_ACTIVE_TRANSACTION');
        }

        try {
            await connection.rollback();
            log.debug('Transaction rolled back', { operation: 'rollback' });
        } finally {
            await this.release(binding, connection, 'rollback');
        }
    }

    /**
     * The connection bound to the caller's chain, if a transaction is active
     */
    currentConnection(): Connection | undefined {
        return this.binding()?.connection;
    }

    isActive(): boolean {
        return this.currentConnection() !== undefined;
    }

    /**
     * Run `fn` inside a transaction on a fresh call chain: commit when it
     * resolves, roll back and rethrow when it rejects.
     */
    withTransaction<T>(fn: () => Promise<T>): Promise<T> {
        return this.run(async () => {
            await this.begin();
            let result: T;
            try {
                result = await fn();
            } catch (error) {
                await this.rollback().catch((rollbackError: unknown) => {
                    log.error('Rollback after failed transaction body failed', {
                        code: 'TX_ROLLBACK_FAILED',
                        operation: 'withTransaction',
                        error: errorMessage(rollbackError)
                    });
                });
                throw error;
            }
            await this.commit();
            return result;
        });
    }

    /** Number of call chains with a bound transaction */
    get activeCount(): number {
        return this.activeBindings.size;
    }

    /**
     * Roll back and release every bound transaction, in every call chain.
     * Used when shutting down.
     */
    async abortAll(): Promise<number> {
        const bindings = [...this.activeBindings];
        for (const binding of bindings) {
            const connection = binding.connection;
            if (connection === undefined) {
                continue;
            }
            try {
                await connection.rollback();
            } catch (error) {
                log.warn('Failed to roll back orphaned transaction', {
                    code: 'TX_ROLLBACK_FAILED',
                    operation: 'abortAll',
                    error: errorMessage(error)
                });
            } finally {
                await this.release(binding, connection, 'abortAll');
            }
        }
        if (bindings.length > 0) {
            log.warn(`Rolled back ${String(bindings.length)} orphaned transaction(s)`, { operation: 'abortAll' });
        }
        return bindings.length;
    }

    private binding(): TransactionBinding | undefined {
        return this.storage.getStore();
    }

    /**
     * Restore autocommit, close, clear. Each step runs even when the one before fails.
     */
    private async release(binding: TransactionBinding, connection: Connection, operation: string): Promise<void> {
        try {
            await connection.setAutoCommit(true);
        } catch (error) {
            log.warn('Failed to restore autocommit', {
                code: 'TX_AUTOCOMMIT_FAILED',
                operation,
                error: errorMessage(error)
            });
        }

        try {
            await connection.close();
        } catch (error) {
            log.warn('Failed to close transaction connection', {
                code: 'TX_CLOSE_FAILED',
                operation,
                error: errorMessage(error)
            });
        }

        binding.connection = undefined;
        binding.claimed = false;
        this.activeBindings.delete(binding);
    }
}
