/**
 * pgaccess - Statement Descriptor
 *
 * Statement text paired with its positional parameters, so a query can be
 * built once and handed around as a value.
 */

import type { SqlValue } from '../types/database.js';

export class StatementDescriptor {
    private constructor(
        readonly sql: string,
        readonly params: readonly SqlValue[]
    ) {
        Object.freeze(this);
    }

    static of(sql: string, params: readonly SqlValue[] = []): StatementDescriptor {
        return new StatementDescriptor(sql, Object.freeze([...params]));
    }

    toString(): string {
        return `StatementDescriptor{sql='${this.sql}', params=${String(this.params.length)}}`;
    }
}

/**
 * statement('SELECT * FROM users WHERE id = $1', 42)
 */
export function statement(sql: string, ...params: SqlValue[]): StatementDescriptor {
    return StatementDescriptor.of(sql, params);
}

