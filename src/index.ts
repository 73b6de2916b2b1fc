/**
 * pgaccess - Public API
 */

export type {
    SqlValue,
    Row,
    FieldInfo,
    RawResult,
    Connection,
    ConnectionSource,
    PoolStats,
    HealthStatus
} from './types/database.js';
export {
    DataAccessError,
    ConnectionError,
    TransactionError,
    QueryError,
    ValidationError
} from './types/errors.js';
export type {
    ConnectionErrorReason,
    TransactionErrorReason,
    QueryErrorReason
} from './types/errors.js';

export {
    DatabaseConfigSchema,
    PoolConfigSchema,
    parseDatabaseConfig,
    parsePoolConfig
} from './config/schemas.js';
export type {
    ConnectionProperties,
    DatabaseConfig,
    DatabaseConfigInput,
    PoolConfig,
    PoolConfigInput
} from './config/schemas.js';
export {
    buildConnectionUrl,
    parseConnectionUrl,
    loadDatabaseConfigFromEnv
} from './config/connectionUrl.js';

export { PgConnection } from './connection/PgConnection.js';
export { DirectConnectionSource } from './connection/DirectConnectionSource.js';
export { PooledConnectionSource } from './connection/PooledConnectionSource.js';

export { TransactionScope } from './transaction/TransactionScope.js';

export { StatementExecutor } from './executor/StatementExecutor.js';
export { PreparedStatement } from './executor/PreparedStatement.js';
export { ResultCursor } from './executor/ResultCursor.js';
export type { ColumnRef } from './executor/ResultCursor.js';
export { StatementDescriptor, statement } from './executor/StatementDescriptor.js';
export { rowToObject, stringColumn, numberColumn } from './executor/RowMapper.js';
export type { RowMapper } from './executor/RowMapper.js';

export { Database } from './database/Database.js';
export type { DatabaseOptions } from './database/Database.js';

export { logger } from './utils/logger.js';
export type { LogLevel, LogModule, LogContext } from './utils/logger.js';
