/**
 * Unit tests for the structured logger
 *
 * Tests RFC 5424 severity levels, message sanitization (log injection prevention),
 * and context sanitization (credential redaction).
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { logger, isLogLevel } from '../logger.js';

describe('Logger', () => {
    let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

    const firstLine = (): string => String(consoleErrorSpy.mock.calls[0]?.[0]);

    beforeEach(() => {
        consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => { });
        logger.setLevel('debug');
    });

    afterEach(() => {
        consoleErrorSpy.mockRestore();
        logger.setLevel('info');
    });

    describe('RFC 5424 Severity Levels', () => {
        it('should log at all 8 severity levels', () => {
            logger.debug('debug message');
            logger.info('info message');
            logger.notice('notice message');
            logger.warn('warning message');
            logger.error('error message');
            logger.critical('critical message');
            logger.alert('alert message');
            logger.emergency('emergency message');

            expect(consoleErrorSpy).toHaveBeenCalledTimes(8);
        });

        it('should filter messages below minimum level', () => {
            logger.setLevel('error');

            logger.debug('debug message');
            logger.info('info message');
            logger.warning('warning message');
            logger.error('error message');
            logger.critical('critical message');

            expect(consoleErrorSpy).toHaveBeenCalledTimes(2);
        });

        it('should include level in uppercase in formatted output', () => {
            logger.error('test message');

            expect(firstLine()).toContain('[ERROR]');
        });
    });

    describe('Message Sanitization', () => {
        it('should strip null bytes and escape characters', () => {
            logger.info('user input\x00\x1B[2Kwith control chars');

            expect(firstLine()).toMatch(/\[INFO\] \[QUERY\] user input\[2Kwith control chars$/);
        });

        it('should strip C1 control characters', () => {
            logger.info('message\x80\x9Fcontrol');

            expect(firstLine()).toMatch(/ messagecontrol$/);
        });
    });

    describe('Context Sanitization (Credential Redaction)', () => {
        it('should redact password fields', () => {
            logger.info('test', { password: 'test-secret' });

            expect(firstLine()).toMatch(/ test \{"password":"\[REDACTED\]"\}$/);
        });

        it('should redact connection strings', () => {
            logger.info('test', { connectionString: 'postgresql://u:p@localhost:5432/db' });

            expect(firstLine()).toMatch(/\{"connectionString":"\[REDACTED\]"\}$/);
        });

        it('should redact nested sensitive fields and keep the rest', () => {
            logger.info('nested config', {
                config: { database: 'mydb', credentials: { user: 'admin', password: 'nested-secret' } }
            });

            expect(firstLine()).toMatch(/\{"config":\{"database":"mydb","credentials":"\[REDACTED\]"\}\}$/);
        });

        it('should preserve non-sensitive fields', () => {
            logger.info('test', { operation: 'executeUpdate', poolName: 'main', count: 42 });

            expect(firstLine()).toMatch(/\{"operation":"executeUpdate","poolName":"main","count":42\}$/);
        });
    });

    describe('Log Entry Formatting', () => {
        it('should include timestamp in ISO format', () => {
            logger.info('test message');

            expect(firstLine()).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\]/);
        });

        it('should format: [timestamp] [LEVEL] [MODULE] [CODE] message {context}', () => {
            logger.error('Query failed', {
                module: 'QUERY',
                code: 'QUERY_FAILED',
                operation: 'executeQuery'
            });

            expect(firstLine()).toMatch(/^\[.*\] \[ERROR\] \[QUERY\] \[QUERY_FAILED\] Query failed \{"operation":"executeQuery"\}$/);
        });
    });

    describe('Module-Scoped Logger', () => {
        it('should create child logger with fixed module', () => {
            logger.forModule('POOL').info('Connection acquired');

            expect(firstLine()).toContain('[POOL] Connection acquired');
        });

        it('should override module from context', () => {
            logger.forModule('TRANSACTION').error('Error', { module: 'POOL', code: 'TX_CLOSE_FAILED' });

            expect(firstLine()).toContain('[TRANSACTION] [TX_CLOSE_FAILED] Error');
        });
    });

    describe('Logger Configuration', () => {
        it('getLevel should return current minimum level', () => {
            logger.setLevel('warning');
            expect(logger.getLevel()).toBe('warning');
        });

        it('setDefaultModule should change default module for logs', () => {
            logger.setDefaultModule('CONFIG');
            logger.info('test message');

            expect(firstLine()).toContain('[CONFIG]');

            logger.setDefaultModule('QUERY');
        });

        it('isLogLevel should accept only known levels', () => {
            expect(isLogLevel('warning')).toBe(true);
            expect(isLogLevel('verbose')).toBe(false);
            expect(isLogLevel(undefined)).toBe(false);
        });
    });
});
