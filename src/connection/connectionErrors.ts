/**
 * pgaccess - Connection error classification
 */

import { ConnectionError, errorMessage } from '../types/errors.js';
import type { ConnectionErrorReason } from '../types/errors.js';

// pg: "Connection terminated due to connection timeout"
// pg-pool: "timeout exceeded when trying to connect"
const TIMEOUT_PATTERN = /timeout/i;

/**
 * Wrap a driver failure raised while opening or acquiring a connection
 */
export function toConnectionError(error: unknown, details?: Record<string, unknown>): ConnectionError {
    if (error instanceof ConnectionError) {
        return error;
    }
    const message = errorMessage(error);
    const reason: ConnectionErrorReason = TIMEOUT_PATTERN.test(message) ? 'TIMEOUT' : 'CONNECT_FAILED';
    const prefix = reason === 'TIMEOUT'
        ? 'Timed out acquiring connection'
        : 'Failed to acquire connection';
    return new ConnectionError(`${prefix}: ${message}`, reason, details, { cause: error });
}
