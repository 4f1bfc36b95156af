/**
 * Row Codec
 *
 * The SQL API returns every cell as a string (or null). Cells are decoded
 * here according to the column's rowType so callers see numbers, booleans
 * and ISO-style date strings.
 */

import type { Binding, Cell, ColumnType, ResultSet, Row } from './types.js';
import type { SqlParam } from '../sql/sql-builder.js';
import { QueryExecutionError } from '../errors.js';

const MS_PER_DAY = 86_400_000;

// Offsets in timestamp_tz cells are minutes shifted by this amount
const TZ_OFFSET_BIAS_MINUTES = 1440;

// Largest time value a Date can hold
const MAX_EPOCH_MS = 8.64e15;

// ─── Cells ───────────────────────────────────────────────────

export function decodeCell(value: string | null, column: ColumnType): Cell {
  if (value === null) return null;

  switch (column.type.toLowerCase()) {
    case 'fixed':
    case 'real':
    case 'float':
      return decodeNumber(value);
    case 'boolean':
      return value === 'true' || value === '1';
    case 'date':
      return formatDate(checkedMillis(Number(value) * MS_PER_DAY, value, column));
    case 'timestamp_ntz':
      return formatDateTime(checkedMillis(epochMillis(value), value, column));
    case 'timestamp_ltz':
      return `${formatDateTime(checkedMillis(epochMillis(value), value, column))}Z`;
    case 'timestamp_tz':
      return decodeZonedTimestamp(value, column);
    default:
      return value;
  }
}

/** Integers beyond the safe range stay strings to keep every digit. */
function decodeNumber(value: string): number | string {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return value;
  if (Number.isInteger(parsed) && !Number.isSafeInteger(parsed)) return value;
  return parsed;
}

function epochMillis(value: string): number {
  const [seconds = '0', fraction = ''] = value.split('.');
  const millis = fraction.padEnd(3, '0').slice(0, 3);
  const sign = seconds.startsWith('-') ? -1 : 1;
  return Number(seconds) * 1000 + sign * Number(millis);
}

/** Date and timestamp cells must be epoch numbers a Date can represent. */
function checkedMillis(millis: number, value: string, column: ColumnType): number {
  if (!Number.isFinite(millis) || Math.abs(millis) > MAX_EPOCH_MS) {
    throw new QueryExecutionError(
      `Unexpected result set from Snowflake SQL API: column ${column.name} (${column.type}) holds unreadable value '${value}'`,
      200,
      false
    );
  }
  return millis;
}

function formatDate(millis: number): string {
  return new Date(millis).toISOString().slice(0, 10);
}

function formatDateTime(millis: number): string {
  return new Date(millis).toISOString().slice(0, 19);
}

/**
 * `"<epoch seconds>.<fraction> <offset + 1440>"` → local wall time with
 * the UTC offset appended, e.g. `2025-07-29T07:38:53+02:00`.
 */
function decodeZonedTimestamp(value: string, column: ColumnType): string {
  const [epoch = '0', rawOffset] = value.trim().split(/\s+/);
  const offsetMinutes = rawOffset === undefined ? 0 : Number(rawOffset) - TZ_OFFSET_BIAS_MINUTES;
  const local = formatDateTime(
    checkedMillis(epochMillis(epoch) + offsetMinutes * 60_000, value, column)
  );

  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);
  const hours = String(Math.floor(absolute / 60)).padStart(2, '0');
  const minutes = String(absolute % 60).padStart(2, '0');
  return `${local}${sign}${hours}:${minutes}`;
}

// ─── Rows ────────────────────────────────────────────────────

export function decodeRows(rowType: readonly ColumnType[], data: ResultSet['data']): Row[] {
  return data.map((cells) =>
    rowType.map((column, index) => decodeCell(cells[index] ?? null, column))
  );
}

// ─── Bindings ────────────────────────────────────────────────

/**
 * Positional parameters → the SQL API `bindings` map ("1"-based).
 * Numbers bind as FIXED, strings as TEXT.
 */
export function encodeBindings(params: readonly SqlParam[]): Record<string, Binding> | undefined {
  if (params.length === 0) return undefined;
  const bindings: Record<string, Binding> = {};
  params.forEach((param, index) => {
    bindings[String(index + 1)] =
      typeof param === 'number'
        ? { type: 'FIXED', value: String(param) }
        : { type: 'TEXT', value: param };
  });
  return bindings;
}
