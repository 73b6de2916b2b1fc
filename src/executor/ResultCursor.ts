/**
 * pgaccess - Result Cursor
 *
 * Forward-only cursor over a buffered result. It stays readable after the
 * connection that produced it has been released; close() drops the rows.
 */

import type { RawResult, Row } from '../types/database.js';
import { QueryError } from '../types/errors.js';

/** A column by name, or by 1-based position in the select list */
export type ColumnRef = string | number;

export class ResultCursor {
    private rows: Row[];
    private readonly columnNames: readonly string[];
    private position = -1;
    private closed = false;

    constructor(result: RawResult) {
        this.rows = result.rows;
        const first = result.rows[0];
        this.columnNames = result.fields.length > 0
            ? result.fields.map(f => f.name)
            : first !== undefined ? Object.keys(first) : [];
    }

    /** Column names in select-list order */
    get columns(): readonly string[] {
        return this.columnNames;
    }

    /** Number of rows in the result */
    get size(): number {
        return this.rows.length;
    }

    /** 1-based number of the current row; 0 before the first next() */
    get rowNumber(): number {
        return this.position >= 0 && this.position < this.rows.length ? this.position + 1 : 0;
    }

    /**
     * Advance to the next row. Returns false once the rows are exhausted.
     */
    next(): boolean {
        this.assertOpen();
        if (this.position + 1 < this.rows.length) {
            this.position++;
            return true;
        }
        this.position = this.rows.length;
        return false;
    }

    /** Copy of the current row */
    getRow(): Row {
        return { ...this.current() };
    }

    get(column: ColumnRef): unknown {
        const row = this.current();
        const name = this.resolveColumn(column);
        if (!Object.prototype.hasOwnProperty.call(row, name)) {
            throw new QueryError(`Column not found: ${name}`, 'COLUMN_NOT_FOUND', { column: name });
        }
        return row[name];
    }

    getString(column: ColumnRef): string | null {
        const value = this.get(column);
        if (value === null || value === undefined) {
            return null;
        }
        if (typeof value === 'string') {
            return value;
        }
        if (value instanceof Date) {
            return value.toISOString();
        }
        if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
            return String(value);
        }
        return JSON.stringify(value);
    }

    /**
     * Numeric value of a column. pg hands int8 and numeric back as strings;
     * those are converted when they parse as a finite number.
     */
    getNumber(column: ColumnRef): number | null {
        const value = this.get(column);
        if (value === null || value === undefined) {
            return null;
        }
        if (typeof value === 'number') {
            return value;
        }
        if (typeof value === 'bigint') {
            return Number(value);
        }
        if (typeof value === 'string' && value.trim() !== '') {
            const parsed = Number(value);
            if (Number.isFinite(parsed)) {
                return parsed;
            }
        }
        throw new QueryError(
            `Column ${String(column)} is not numeric`,
            'TYPE_MISMATCH',
            { column: String(column) }
        );
    }

    getBoolean(column: ColumnRef): boolean | null {
        const value = this.get(column);
        if (value === null || value === undefined) {
            return null;
        }
        if (typeof value === 'boolean') {
            return value;
        }
        throw new QueryError(
            `Column ${String(column)} is not boolean`,
            'TYPE_MISMATCH',
            { column: String(column) }
        );
    }

    close(): void {
        this.closed = true;
        this.rows = [];
    }

    isClosed(): boolean {
        return this.closed;
    }

    private current(): Row {
        this.assertOpen();
        const row = this.rows[this.position];
        if (row === undefined) {
            throw new QueryError('Cursor is not positioned on a row', 'NO_CURRENT_ROW');
        }
        return row;
    }

    private resolveColumn(column: ColumnRef): string {
        if (typeof column === 'string') {
            return column;
        }
        const name = Number.isInteger(column) ? this.columnNames[column - 1] : undefined;
        if (name === undefined) {
            throw new QueryError(`Column index out of range: ${String(column)}`, 'COLUMN_NOT_FOUND', {
                column
            });
        }
        return name;
    }

    private assertOpen(): void {
        if (this.closed) {
            throw new QueryError('Cursor is closed', 'CURSOR_CLOSED');
        }
    }
}
