/**
 * Snowflake SQL API Types
 *
 * Response shapes of the /statements endpoint, validated with Zod before
 * any field is read, plus the client-facing result types they are decoded
 * into.
 */

import { z } from 'zod';

// ─── SQL API Responses ───────────────────────────────────────

export const ColumnTypeSchema = z.object({
  name: z.string(),
  type: z.string(),
  scale: z.number().nullish(),
  precision: z.number().nullish(),
  nullable: z.boolean().optional(),
});

export type ColumnType = z.infer<typeof ColumnTypeSchema>;

const CellSchema = z.string().nullable();

export const ResultSetSchema = z.object({
  statementHandle: z.string().optional(),
  resultSetMetaData: z.object({
    numRows: z.number().optional(),
    rowType: z.array(ColumnTypeSchema),
    partitionInfo: z.array(z.object({ rowCount: z.number().optional() })).optional(),
  }),
  data: z.array(z.array(CellSchema)).default([]),
});

export type ResultSet = z.infer<typeof ResultSetSchema>;

/** Partitions after the first carry only rows. */
export const PartitionSchema = z.object({
  data: z.array(z.array(CellSchema)).default([]),
});

/** 202 body: the statement is still executing. */
export const PendingStatementSchema = z.object({
  statementHandle: z.string(),
  code: z.string().optional(),
  message: z.string().optional(),
});

export const ApiErrorSchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
  sqlState: z.string().optional(),
  statementHandle: z.string().optional(),
});

// ─── Request Body ────────────────────────────────────────────

export interface Binding {
  type: 'TEXT' | 'FIXED';
  value: string;
}

export interface StatementRequest {
  statement: string;
  /** Server-side timeout in seconds. */
  timeout: number;
  database: string;
  schema: string;
  warehouse: string;
  role?: string;
  bindings?: Record<string, Binding>;
}

// ─── Decoded Results ─────────────────────────────────────────

export type Cell = string | number | boolean | null;

export type Row = Cell[];

export interface QueryResult {
  columns: string[];
  rows: Row[];
}

export interface ExecuteOptions {
  /** Set false to bypass the response cache for this call. */
  useCache?: boolean;
}
