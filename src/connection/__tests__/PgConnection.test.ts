/**
 * Unit tests for PgConnection
 *
 * Verifies the lazy BEGIN used to emulate manual-commit mode and the
 * release flag handed back to the connection's owner.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PgConnection } from '../PgConnection.js';
import { ConnectionError } from '../../types/errors.js';
import { createMockPgClient, createMockPgResult, issuedStatements } from '../../__tests__/mocks/index.js';
import type { MockPgClient } from '../../__tests__/mocks/index.js';

describe('PgConnection', () => {
    let client: MockPgClient;
    let release: ReturnType<typeof vi.fn>;
    let connection: PgConnection;

    beforeEach(() => {
        client = createMockPgClient();
        release = vi.fn().mockResolvedValue(undefined);
        connection = new PgConnection(client.asClient, release);
    });

    describe('query', () => {
        it('should pass statement text and parameters through unchanged', async () => {
            await connection.query('SELECT * FROM t WHERE a = $1 AND b = $2', ['x', 7]);

            expect(client.query).toHaveBeenCalledWith('SELECT * FROM t WHERE a = $1 AND b = $2', ['x', 7]);
        });

        it('should map the driver result', async () => {
            client.query.mockResolvedValueOnce(createMockPgResult([{ id: 1, v: 'a' }], 1));

            const result = await connection.query('SELECT id, v FROM t', []);

            expect(result).toEqual({
                rows: [{ id: 1, v: 'a' }],
                rowCount: 1,
                fields: [{ name: 'id', dataTypeID: 25 }, { name: 'v', dataTypeID: 25 }],
                command: 'SELECT'
            });
        });

        it('should report a null rowCount as 0', async () => {
            client.query.mockResolvedValueOnce(createMockPgResult([], null, 'LISTEN'));

            const result = await connection.query('LISTEN jobs', []);

            expect(result.rowCount).toBe(0);
        });

        it('should not issue BEGIN in autocommit mode', async () => {
            await connection.query('SELECT 1', []);

            expect(issuedStatements(client)).toEqual(['SELECT 1']);
        });
    });

    describe('manual-commit mode', () => {
        it('should issue BEGIN once before the first statement', async () => {
            await connection.setAutoCommit(false);
            await connection.query('UPDATE t SET v = $1', ['a']);
            await connection.query('UPDATE t SET v = $1', ['b']);

            expect(issuedStatements(client)).toEqual(['BEGIN', 'UPDATE t SET v = $1', 'UPDATE t SET v = $1']);
            expect(connection.getAutoCommit()).toBe(false);
        });

        it('should not issue BEGIN until a statement runs', async () => {
            await connection.setAutoCommit(false);

            expect(client.query).not.toHaveBeenCalled();
        });

        it('should commit and start a fresh transaction for the next statement', async () => {
            await connection.setAutoCommit(false);
            await connection.query('DELETE FROM t', []);
            await connection.commit();
            await connection.query('DELETE FROM u', []);

            expect(issuedStatements(client)).toEqual(['BEGIN', 'DELETE FROM t', 'COMMIT', 'BEGIN', 'DELETE FROM u']);
        });

        it('should skip COMMIT and ROLLBACK when no transaction is open', async () => {
            await connection.setAutoCommit(false);
            await connection.commit();
            await connection.rollback();

            expect(client.query).not.toHaveBeenCalled();
        });

        it('should roll back pending work', async () => {
            await connection.setAutoCommit(false);
            await connection.query('DELETE FROM t', []);
            await connection.rollback();

            expect(issuedStatements(client)).toEqual(['BEGIN', 'DELETE FROM t', 'ROLLBACK']);
        });

        it('should commit pending work when autocommit is switched back on', async () => {
            await connection.setAutoCommit(false);
            await connection.query('DELETE FROM t', []);
            await connection.setAutoCommit(true);

            expect(issuedStatements(client)).toEqual(['BEGIN', 'DELETE FROM t', 'COMMIT']);
            expect(connection.getAutoCommit()).toBe(true);
        });

        it('should keep the transaction open after a failed COMMIT so rollback still runs', async () => {
            await connection.setAutoCommit(false);
            await connection.query('DELETE FROM t', []);
            client.query.mockRejectedValueOnce(new Error('could not serialize access'));

            await expect(connection.commit()).rejects.toThrow('could not serialize access');
            await connection.rollback();

            expect(issuedStatements(client)).toEqual(['BEGIN', 'DELETE FROM t', 'COMMIT', 'ROLLBACK']);
        });

        it('should never commit after a failed ROLLBACK and discard the client', async () => {
            await connection.setAutoCommit(false);
            await connection.query('DELETE FROM t', []);
            client.query.mockRejectedValueOnce(new Error('connection reset'));

            await expect(connection.rollback()).rejects.toThrow('connection reset');
            await connection.setAutoCommit(true);
            await connection.close();

            expect(issuedStatements(client)).toEqual(['BEGIN', 'DELETE FROM t', 'ROLLBACK']);
            expect(release).toHaveBeenCalledWith(true);
        });

        it('should fail a COMMIT that the server answers with ROLLBACK', async () => {
            await connection.setAutoCommit(false);
            await connection.query('INSERT INTO t(v) VALUES($1)', ['a']);
            client.query.mockResolvedValueOnce(createMockPgResult([], null, 'ROLLBACK'));

            await expect(connection.commit()).rejects.toMatchObject({
                reason: 'COMMIT_FAILED',
                message: 'Transaction was aborted; COMMIT was answered with ROLLBACK'
            });
            await connection.rollback();
            await connection.close();

            expect(issuedStatements(client)).toEqual(['BEGIN', 'INSERT INTO t(v) VALUES($1)', 'COMMIT']);
            expect(release).toHaveBeenCalledWith(false);
        });
    });

    describe('close', () => {
        it('should release the client once', async () => {
            await connection.close();
            await connection.close();

            expect(release).toHaveBeenCalledTimes(1);
            expect(release).toHaveBeenCalledWith(false);
            expect(connection.isClosed()).toBe(true);
        });

        it('should ask for the client to be discarded when work is pending', async () => {
            await connection.setAutoCommit(false);
            await connection.query('DELETE FROM t', []);
            await connection.close();

            expect(release).toHaveBeenCalledWith(true);
        });

        it('should reject use after close', async () => {
            await connection.close();

            await expect(connection.query('SELECT 1', [])).rejects.toThrow(ConnectionError);
            await expect(connection.commit()).rejects.toThrow('Connection is closed');
        });
    });
});
