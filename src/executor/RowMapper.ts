/**
 * pgaccess - Row Mapper
 */

import type { Row } from '../types/database.js';
import type { ColumnRef, ResultCursor } from './ResultCursor.js';

/**
 * Converts the row a cursor is positioned on into a typed value.
 * Errors it throws reach the caller unchanged.
 */
export type RowMapper<T> = (cursor: ResultCursor) => T;

/** The current row as a plain object */
export const rowToObject: RowMapper<Row> = (cursor) => cursor.getRow();

export function stringColumn(column: ColumnRef = 1): RowMapper<string | null> {
    return (cursor) => cursor.getString(column);
}

export function numberColumn(column: ColumnRef = 1): RowMapper<number | null> {
    return (cursor) => cursor.getNumber(column);
}
