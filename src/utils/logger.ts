/**
 * pgaccess - Structured Logger
 *
 * Centralized logging utility with RFC 5424 severity levels and structured output.
 * Writes to stderr so library output never mixes with the host's stdout.
 *
 * Format: [timestamp] [LEVEL] [MODULE] [CODE] message {context}
 * Example: [2025-12-18T01:30:00Z] [ERROR] [POOL] [POOL_ACQUIRE_TIMEOUT] Timed out waiting for a connection {"poolName":"main"}
 */

/**
 * RFC 5424 syslog severity levels
 * @see https://datatracker.ietf.org/doc/html/rfc5424#section-6.2.1
 */
export type LogLevel =
    | 'debug'       // 7 - Debug-level messages
    | 'info'        // 6 - Informational messages
    | 'notice'      // 5 - Normal but significant condition
    | 'warning'     // 4 - Warning conditions
    | 'error'       // 3 - Error conditions
    | 'critical'    // 2 - Critical conditions
    | 'alert'       // 1 - Action must be taken immediately
    | 'emergency';  // 0 - System is unusable

/**
 * Module identifiers for log categorization
 */
export type LogModule =
    | 'CONFIG'      // Configuration validation
    | 'CONNECTION'  // Unpooled connections
    | 'POOL'        // Connection pool
    | 'TRANSACTION' // Transaction scope
    | 'QUERY';      // Statement execution

/**
 * Structured log context
 */
export interface LogContext {
    /** Module identifier */
    module?: LogModule;
    /** Module-prefixed error/event code (e.g., POOL_ACQUIRE_TIMEOUT) */
    code?: string;
    /** Operation being performed (e.g., executeUpdate, commit) */
    operation?: string;
    /** Error stack trace */
    stack?: string;
    /** Additional context fields */
    [key: string]: unknown;
}

interface LogEntry {
    level: LogLevel;
    module?: LogModule | undefined;
    code?: string | undefined;
    message: string;
    timestamp: string;
    context?: LogContext | undefined;
}

const LOG_LEVELS: readonly LogLevel[] = [
    'debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency'
];

export function isLogLevel(value: string | undefined): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

class Logger {
    private minLevel: LogLevel = 'info';
    private defaultModule: LogModule = 'QUERY';

    /**
     * RFC 5424 severity priority (lower number = higher severity)
     */
    private readonly levelPriority: Record<LogLevel, number> = {
        emergency: 0,
        alert: 1,
        critical: 2,
        error: 3,
        warning: 4,
        notice: 5,
        info: 6,
        debug: 7
    };

    /**
     * Set the minimum log level
     */
    setLevel(level: LogLevel): void {
        this.minLevel = level;
    }

    getLevel(): LogLevel {
        return this.minLevel;
    }

    /**
     * Set the default module for logs without explicit module
     */
    setDefaultModule(module: LogModule): void {
        this.defaultModule = module;
    }

    private shouldLog(level: LogLevel): boolean {
        return this.levelPriority[level] <= this.levelPriority[this.minLevel];
    }

    /**
     * Keys whose values are never written out
     */
    private readonly sensitiveKeys: ReadonlySet<string> = new Set([
        'password',
        'secret',
        'token',
        'key',
        'apikey',
        'api_key',
        'authorization',
        'credential',
        'credentials',
        'connectionstring',
        'connection_string'
    ]);

    /**
     * Redact sensitive values, recursing into nested objects
     */
    private sanitizeContext(context: object): LogContext {
        const sanitized: LogContext = {};

        for (const [key, value] of Object.entries(context)) {
            const lowerKey = key.toLowerCase();

            const isSensitive = this.sensitiveKeys.has(lowerKey) ||
                [...this.sensitiveKeys].some(sk => lowerKey.includes(sk));

            if (isSensitive && value !== undefined && value !== null) {
                sanitized[key] = '[REDACTED]';
            } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
                sanitized[key] = this.sanitizeContext(value);
            } else {
                sanitized[key] = value;
            }
        }

        return sanitized;
    }

    /**
     * Strip control characters (C0 except tab/newline/CR, DEL, C1)
     */
    private sanitizeMessage(message: string): string {
        // eslint-disable-next-line no-control-regex
        return message.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F-\x9F]/g, '');
    }

    /**
     * Format: [timestamp] [LEVEL] [MODULE] [CODE] message {context}
     */
    private formatEntry(entry: LogEntry): string {
        const parts: string[] = [
            `[${entry.timestamp}]`,
            `[${entry.level.toUpperCase()}]`
        ];

        if (entry.module) {
            parts.push(`[${entry.module}]`);
        }

        if (entry.code) {
            parts.push(`[${entry.code}]`);
        }

        parts.push(this.sanitizeMessage(entry.message));

        if (entry.context) {
            // module and code are already part of the line
            const { module, code, ...restContext } = entry.context;
            void module; void code;
            if (Object.keys(restContext).length > 0) {
                parts.push(JSON.stringify(this.sanitizeContext(restContext)));
            }
        }

        return parts.join(' ');
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const entry: LogEntry = {
            level,
            module: context?.module ?? this.defaultModule,
            code: context?.code,
            message,
            timestamp: new Date().toISOString(),
            context
        };

        console.error(this.formatEntry(entry));
    }

    // =========================================================================
    // Convenience methods for each log level
    // =========================================================================

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    notice(message: string, context?: LogContext): void {
        this.log('notice', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log('warning', message, context);
    }

    warning(message: string, context?: LogContext): void {
        this.log('warning', message, context);
    }

    error(message: string, context?: LogContext): void {
        this.log('error', message, context);
    }

    critical(message: string, context?: LogContext): void {
        this.log('critical', message, context);
    }

    alert(message: string, context?: LogContext): void {
        this.log('alert', message, context);
    }

    emergency(message: string, context?: LogContext): void {
        this.log('emergency', message, context);
    }

    /**
     * Create a child logger scoped to a specific module
     */
    forModule(module: LogModule): ModuleLogger {
        return new ModuleLogger(this, module);
    }
}

/**
 * Module-scoped logger for cleaner code in specific modules
 */
export class ModuleLogger {
    constructor(
        private parent: Logger,
        private module: LogModule
    ) { }

    private withModule(context?: LogContext): LogContext {
        return { ...context, module: this.module };
    }

    debug(message: string, context?: LogContext): void {
        this.parent.debug(message, this.withModule(context));
    }

    info(message: string, context?: LogContext): void {
        this.parent.info(message, this.withModule(context));
    }

    notice(message: string, context?: LogContext): void {
        this.parent.notice(message, this.withModule(context));
    }

    warn(message: string, context?: LogContext): void {
        this.parent.warn(message, this.withModule(context));
    }

    warning(message: string, context?: LogContext): void {
        this.parent.warning(message, this.withModule(context));
    }

    error(message: string, context?: LogContext): void {
        this.parent.error(message, this.withModule(context));
    }

    critical(message: string, context?: LogContext): void {
        this.parent.critical(message, this.withModule(context));
    }

    alert(message: string, context?: LogContext): void {
        this.parent.alert(message, this.withModule(context));
    }

    emergency(message: string, context?: LogContext): void {
        this.parent.emergency(message, this.withModule(context));
    }
}

export const logger = new Logger();

const envLevel = process.env['LOG_LEVEL'];
if (isLogLevel(envLevel)) {
    logger.setLevel(envLevel);
}
