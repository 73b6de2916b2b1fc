/**
 * pgaccess - Connection URL helpers
 *
 * Shape: postgresql://host:port/database?key1=value1&key2=value2
 * Credentials travel beside the URL, never inside it.
 */

import { parseDatabaseConfig } from './schemas.js';
import type { ConnectionProperties, DatabaseConfig } from './schemas.js';
import { ValidationError } from '../types/errors.js';

export const CONNECTION_PROTOCOL = 'postgresql';

/**
 * Merge configuration properties with call-site overrides (overrides win)
 */
export function mergeProperties(
    base: ConnectionProperties | undefined,
    overrides?: ConnectionProperties
): ConnectionProperties {
    return { ...base, ...overrides };
}

/**
 * Render the connection URL for a configuration
 */
export function buildConnectionUrl(config: DatabaseConfig, overrides?: ConnectionProperties): string {
    const base = `${CONNECTION_PROTOCOL}://${config.host}:${String(config.port)}/${encodeURIComponent(config.database)}`;
    const pairs = Object.entries(mergeProperties(config.properties, overrides))
        .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`);
    return pairs.length > 0 ? `${base}?${pairs.join('&')}` : base;
}

/**
 * Parse a postgres:// or postgresql:// URL into a validated configuration.
 * Query parameters become connection properties.
 */
export function parseConnectionUrl(connectionString: string): DatabaseConfig {
    let url: URL;
    try {
        url = new URL(connectionString);
    } catch {
        throw new ValidationError('Invalid connection URL');
    }

    if (url.protocol !== 'postgres:' && url.protocol !== 'postgresql:') {
        throw new ValidationError(`Unsupported connection protocol: ${url.protocol}`, {
            protocol: url.protocol
        });
    }

    const properties: ConnectionProperties = {};
    url.searchParams.forEach((value, key) => {
        properties[key] = value;
    });

    return parseDatabaseConfig({
        host: decodeURIComponent(url.hostname),
        port: url.port === '' ? 5432 : parseInt(url.port, 10),
        database: decodeURIComponent(url.pathname.slice(1)),
        username: decodeURIComponent(url.username),
        password: decodeURIComponent(url.password),
        ...(Object.keys(properties).length > 0 ? { properties } : {})
    });
}

/**
 * Read connection settings from PG* / POSTGRES_* environment variables
 */
export function loadDatabaseConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
    const rawPort = env['PGPORT'] ?? env['POSTGRES_PORT'] ?? '5432';
    const port = Number(rawPort);
    return parseDatabaseConfig({
        host: env['PGHOST'] ?? env['POSTGRES_HOST'] ?? 'localhost',
        port: Number.isNaN(port) ? rawPort : port,
        database: env['PGDATABASE'] ?? env['POSTGRES_DATABASE'] ?? 'postgres',
        username: env['PGUSER'] ?? env['POSTGRES_USER'] ?? 'postgres',
        password: env['PGPASSWORD'] ?? env['POSTGRES_PASSWORD'] ?? ''
    });
}

/**
 * Connection URL carrying credentials, handed to the driver only
 */
export function buildDriverConnectionString(config: DatabaseConfig, overrides?: ConnectionProperties): string {
    const url = new URL(buildConnectionUrl(config, overrides));
    url.username = config.username;
    url.password = config.password;
    return url.toString();
}
