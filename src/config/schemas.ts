/**
 * pgaccess - Configuration Schemas
 *
 * Validated once at construction; parsed values are frozen.
 */

import { z } from 'zod';
import { ValidationError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('CONFIG');

/** Free-form key/value options appended to the connection URL */
export const ConnectionPropertiesSchema = z.record(
    z.union([z.string(), z.number(), z.boolean()])
);

export const DatabaseConfigSchema = z.object({
    host: z.string().min(1, 'host is required'),
    port: z.number().int().min(1, 'port must be between 1 and 65535').max(65535, 'port must be between 1 and 65535'),
    database: z.string().min(1, 'database is required'),
    username: z.string(),
    password: z.string(),
    properties: ConnectionPropertiesSchema.optional()
});

export const PoolConfigSchema = z.object({
    poolName: z.string().min(1, 'poolName is required'),
    maximumPoolSize: z.number().int().min(1, 'maximumPoolSize must be positive').default(10),
    minimumIdle: z.number().int().min(0, 'minimumIdle cannot be negative').default(2),
    idleTimeoutMillis: z.number().int().min(0, 'idleTimeoutMillis cannot be negative').default(300_000),
    connectionTimeoutMillis: z.number().int().min(0, 'connectionTimeoutMillis cannot be negative').default(10_000),
    properties: ConnectionPropertiesSchema.default({})
}).refine((data) => data.minimumIdle <= data.maximumPoolSize, {
    message: 'minimumIdle cannot exceed maximumPoolSize',
    path: ['minimumIdle']
});

export type ConnectionProperties = z.infer<typeof ConnectionPropertiesSchema>;
export type DatabaseConfig = Readonly<z.infer<typeof DatabaseConfigSchema>>;
export type DatabaseConfigInput = z.input<typeof DatabaseConfigSchema>;
export type PoolConfig = Readonly<z.infer<typeof PoolConfigSchema>>;
export type PoolConfigInput = z.input<typeof PoolConfigSchema>;

function validate<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.infer<S> {
    const result = schema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message
        }));
        log.error(`Invalid ${what}`, { code: 'CONFIG_INVALID', issues });
        const first = issues[0];
        const summary = first !== undefined ? `${first.path}: ${first.message}` : 'invalid value';
        throw new ValidationError(`Invalid ${what}: ${summary}`, { issues });
    }
    return result.data;
}

/**
 * Validate a database configuration
 */
export function parseDatabaseConfig(raw: unknown): DatabaseConfig {
    const parsed = validate(DatabaseConfigSchema, raw, 'database configuration');
    if (parsed.properties !== undefined) {
        Object.freeze(parsed.properties);
    }
    return Object.freeze(parsed);
}

/**
 * Validate a pool configuration, filling in defaults
 */
export function parsePoolConfig(raw: unknown): PoolConfig {
    const parsed = validate(PoolConfigSchema, raw, 'pool configuration');
    Object.freeze(parsed.properties);
    return Object.freeze(parsed);
}
