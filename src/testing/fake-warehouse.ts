/**
 * In-process Snowflake SQL API stand-in for tests.
 *
 * Answers POST /statements by running the statement against an in-memory
 * SQLite database loaded from a JSON fixture, and replies with
 * Snowflake-shaped JSON. SYSDATE() and DATEADD() are registered so the
 * generated SQL runs unchanged. Install `fake.fetch` with vi.stubGlobal.
 */

import { readFileSync } from 'node:fs';
import Database from 'better-sqlite3';
import { z } from 'zod';
import type { SqlParam } from '../sql/sql-builder.js';

const FixtureValueSchema = z.union([z.string(), z.number(), z.null()]);

const FixtureSchema = z.object({
  /** Wall-clock time SYSDATE() returns, `YYYY-MM-DDTHH:MM:SS`. */
  now: z.string(),
  tables: z.record(
    z.object({
      columns: z.array(z.string()),
      rows: z.array(z.array(FixtureValueSchema)),
    })
  ),
});

export type Fixture = z.infer<typeof FixtureSchema>;

const RequestSchema = z.object({
  statement: z.string(),
  bindings: z
    .record(z.object({ type: z.enum(['TEXT', 'FIXED']), value: z.string() }))
    .optional(),
});

type StoredValue = string | number | null;

export interface RecordedStatement {
  text: string;
  params: SqlParam[];
}

/** Canned HTTP failure returned instead of running a statement. */
export interface InjectedFailure {
  status: number;
  body?: Record<string, unknown>;
}

export function loadFixture(): Fixture {
  const raw = readFileSync(new URL('./jira-fixture.json', import.meta.url), 'utf-8');
  return FixtureSchema.parse(JSON.parse(raw));
}

export class FakeWarehouse {
  readonly db: Database.Database;
  /** Every statement received, in arrival order. */
  readonly statements: RecordedStatement[] = [];
  private failWhen: ((statement: RecordedStatement) => InjectedFailure | null) | null = null;
  private handleCounter = 0;

  constructor(fixture: Fixture = loadFixture()) {
    this.db = new Database(':memory:');
    this.registerFunctions(fixture.now);
    this.load(fixture);
  }

  /** Drop-in replacement for the global fetch. */
  readonly fetch = (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    return Promise.resolve(this.handle(url, init));
  };

  /** Fail every statement the predicate picks out. */
  failStatements(predicate: (statement: RecordedStatement) => InjectedFailure | null): void {
    this.failWhen = predicate;
  }

  close(): void {
    this.db.close();
  }

  // ─── Request Handling ────────────────────────────────────

  private handle(url: string, init: RequestInit | undefined): Response {
    if (init?.method !== 'POST' || !new URL(url).pathname.endsWith('/statements')) {
      return json(404, { code: '390404', message: `No fake route for ${init?.method ?? 'GET'} ${url}` });
    }

    const parsed = RequestSchema.safeParse(
      typeof init.body === 'string' ? JSON.parse(init.body) : null
    );
    if (!parsed.success) {
      return json(400, { code: '390142', message: 'Malformed statement request' });
    }

    const statement: RecordedStatement = {
      text: parsed.data.statement,
      params: decodeBindings(parsed.data.bindings),
    };
    this.statements.push(statement);

    const failure = this.failWhen?.(statement);
    if (failure) {
      return json(failure.status, failure.body ?? { message: `Injected failure ${failure.status}` });
    }

    try {
      return json(200, this.run(statement));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return json(422, { code: '001003', sqlState: '42000', message });
    }
  }

  private run(statement: RecordedStatement): Record<string, unknown> {
    const prepared = this.db.prepare(statement.text);
    const columns = prepared.columns().map((column) => column.name);
    const rows = prepared
      .raw(true)
      .all(...statement.params)
      .map((row) => (Array.isArray(row) ? row.map(toStoredValue) : []));

    const rowType = columns.map((name, index) => ({
      name: name.toUpperCase(),
      ...columnType(rows.map((row) => row[index] ?? null)),
      nullable: true,
    }));

    return {
      code: '090001',
      message: 'Statement executed successfully.',
      statementHandle: `fake-${++this.handleCounter}`,
      resultSetMetaData: {
        numRows: rows.length,
        format: 'jsonv2',
        rowType,
        partitionInfo: [{ rowCount: rows.length }],
      },
      data: rows.map((row) => row.map((value) => (value === null ? null : String(value)))),
    };
  }

  // ─── Setup ───────────────────────────────────────────────

  private registerFunctions(now: string): void {
    this.db.function('SYSDATE', () => now);
    this.db.function('DATEADD', (part: unknown, amount: unknown, timestamp: unknown) => {
      if (part !== 'day' || typeof amount !== 'number' || typeof timestamp !== 'string') {
        return null;
      }
      const shifted = new Date(`${timestamp}Z`).getTime() + amount * 86_400_000;
      return new Date(shifted).toISOString().slice(0, 19);
    });
  }

  private load(fixture: Fixture): void {
    for (const [table, { columns, rows }] of Object.entries(fixture.tables)) {
      this.db.exec(`CREATE TABLE ${table} (${columns.join(', ')})`);
      const insert = this.db.prepare(
        `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`
      );
      for (const row of rows) {
        insert.run(...row);
      }
    }
  }
}

// ─── Helpers ─────────────────────────────────────────────────

function decodeBindings(
  bindings: Record<string, { type: 'TEXT' | 'FIXED'; value: string }> | undefined
): SqlParam[] {
  if (!bindings) return [];
  return Object.entries(bindings)
    .sort(([a], [b]) => Number(a) - Number(b))
    .map(([, binding]) => (binding.type === 'FIXED' ? Number(binding.value) : binding.value));
}

function toStoredValue(value: unknown): StoredValue {
  if (value === null || typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  return String(value);
}

/** Snowflake rowType inferred from a column's values. */
function columnType(values: StoredValue[]): { type: string; scale?: number } {
  const present = values.filter((value) => value !== null);
  if (present.length > 0 && present.every((value) => typeof value === 'number')) {
    return present.every((value) => Number.isInteger(value))
      ? { type: 'fixed', scale: 0 }
      : { type: 'real' };
  }
  return { type: 'text' };
}

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
