// packages/shadow-mysql/src/index.ts
import { Kysely, MysqlDialect } from 'kysely';
import { createPool, type Pool } from 'mysql2';
import type { Pool as PromisePool, PoolConnection, RowDataPacket } from 'mysql2/promise';
import {
  CancelledError,
  ExecutionError,
  errorMessage,
  parseCreateIndex,
  silentLogger,
  type ApplyIndexOptions,
  type CellValue,
  type ExecuteOptions,
  type ExecutionResult,
  type ExplainPlan,
  type HealthStatus,
  type IndexHandle,
  type IsolationScope,
  type Logger,
  type Row,
  type ShadowDatabase,
  type TableSchema
} from '@shadowsql/core';
import { describeTables, listBaseTables, type CatalogDB } from './catalog';
import { classifyMysqlError } from './errors';
import { normalizeExplainRows, type RawRecord } from './explain';

export { classifyMysqlError } from './errors';
export { normalizeExplainRow, normalizeExplainRows } from './explain';
export { assembleTableSchemas } from './catalog';

export type IsolationMode = 'transaction' | 'clone';

export interface MySqlShadowOptions {
  uri: string;
  isolation?: IsolationMode;
  connectionLimit?: number;
  logger?: Logger;
}

interface ScopeState {
  conn: PoolConnection;
  sourceDb: string | null;
  shadowDb: string | null;
  connectionId: number | null;
  timeoutMs: number | null; // last max_execution_time set on the session
  indexes: IndexHandle[];
}

let scopeSeq = 0;

export function qid(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

/** Output column names, with repeats suffixed (`id`, `id#2`) so no value is lost when rows become objects. */
export function uniqueColumnNames(names: string[]): string[] {
  const seen = new Map<string, number>();
  return names.map((n) => {
    const count = (seen.get(n) ?? 0) + 1;
    seen.set(n, count);
    return count === 1 ? n : `${n}#${count}`;
  });
}

export function toCell(v: unknown): CellValue {
  if (v === null || v === undefined) return null;
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean' || typeof v === 'bigint') return v;
  if (v instanceof Date || v instanceof Uint8Array) return v;
  if (Array.isArray(v)) return v;
  if (typeof v === 'object') return Object.fromEntries(Object.entries(v));
  return String(v);
}

export function toRow(columns: string[], values: unknown): Row {
  const cells: unknown[] = Array.isArray(values) ? values : [];
  const row: Row = {};
  columns.forEach((c, i) => { row[c] = toCell(cells[i]); });
  return row;
}

/**
 * Shadow database backed by MySQL. `transaction` scopes pin one connection
 * inside a read-only consistent snapshot; `clone` scopes copy the base tables
 * into a scratch schema so index DDL can be tried and thrown away.
 */
export class MySqlShadowDatabase implements ShadowDatabase {
  readonly dialect = 'mysql' as const;
  private readonly pool: Pool;
  private readonly promisePool: PromisePool;
  private readonly db: Kysely<CatalogDB>;
  private readonly isolation: IsolationMode;
  private readonly log: Logger;
  private readonly scopes = new Map<string, ScopeState>();

  constructor(opts: MySqlShadowOptions) {
    this.isolation = opts.isolation ?? 'transaction';
    this.log = opts.logger ?? silentLogger();
    this.pool = createPool({
      uri: opts.uri,
      connectionLimit: opts.connectionLimit ?? 4,
      multipleStatements: false,
      dateStrings: true,
      supportBigNumbers: true,
      bigNumberStrings: true
    });
    this.promisePool = this.pool.promise();
    this.db = new Kysely<CatalogDB>({ dialect: new MysqlDialect({ pool: this.pool }) });
  }

  private state(scope: IsolationScope): ScopeState {
    const s = this.scopes.get(scope.id);
    if (!s) throw new ExecutionError(`isolation scope ${scope.id} is not open`);
    return s;
  }

  async createIsolationScope(requestId: string): Promise<IsolationScope> {
    scopeSeq += 1;
    const id = `${Date.now().toString(36)}${scopeSeq.toString(36)}`;
    const scope: IsolationScope = { id, requestId, kind: this.isolation };

    let conn: PoolConnection;
    try {
      conn = await this.promisePool.getConnection();
    } catch (e) {
      throw classifyMysqlError(e, 'connect');
    }

    const st: ScopeState = { conn, sourceDb: null, shadowDb: null, connectionId: null, timeoutMs: null, indexes: [] };
    try {
      const [idRows] = await conn.query<RowDataPacket[]>('SELECT CONNECTION_ID() AS id');
      const cid = Number(idRows[0]?.id);
      st.connectionId = Number.isInteger(cid) ? cid : null;
      if (this.isolation === 'transaction') {
        await conn.query('SET SESSION TRANSACTION ISOLATION LEVEL REPEATABLE READ');
        await conn.query('START TRANSACTION WITH CONSISTENT SNAPSHOT, READ ONLY');
      } else {
        await this.cloneInto(st, `shadow_${id}`);
      }
    } catch (e) {
      await this.discard(st);
      throw classifyMysqlError(e, 'create isolation scope');
    }

    this.scopes.set(id, st);
    this.log.debug({ scope: id, requestId, kind: scope.kind, shadowDb: st.shadowDb }, 'isolation scope opened');
    return scope;
  }

  private async cloneInto(st: ScopeState, shadowDb: string): Promise<void> {
    const [dbRows] = await st.conn.query<RowDataPacket[]>('SELECT DATABASE() AS db');
    const source = dbRows[0]?.db;
    if (typeof source !== 'string' || !source) throw new ExecutionError('clone isolation needs a default database in the connection URI');
    st.sourceDb = source;

    const tables = await listBaseTables(this.db);
    await st.conn.query(`CREATE DATABASE ${qid(shadowDb)}`);
    st.shadowDb = shadowDb;
    for (const t of tables) {
      await st.conn.query(`CREATE TABLE ${qid(shadowDb)}.${qid(t)} LIKE ${qid(source)}.${qid(t)}`);
      await st.conn.query(`INSERT INTO ${qid(shadowDb)}.${qid(t)} SELECT * FROM ${qid(source)}.${qid(t)}`);
    }
    await st.conn.query(`USE ${qid(shadowDb)}`);
  }

  // Best-effort teardown after a failed open; the original error is what the caller sees.
  private async discard(st: ScopeState): Promise<void> {
    try {
      if (st.shadowDb) await st.conn.query(`DROP DATABASE IF EXISTS ${qid(st.shadowDb)}`);
      else await st.conn.query('ROLLBACK');
      st.conn.release();
    } catch (e) {
      this.log.warn({ err: errorMessage(e) }, 'teardown of a half-open scope failed; destroying connection');
      st.conn.destroy();
    }
  }

  async release(scope: IsolationScope): Promise<void> {
    const st = this.scopes.get(scope.id);
    if (!st) return;
    this.scopes.delete(scope.id);

    try {
      if (scope.kind === 'transaction') {
        await st.conn.query('ROLLBACK');
      } else {
        for (const idx of st.indexes) this.log.debug({ scope: scope.id, index: idx.name }, 'index left in clone; dropped with it');
        if (st.sourceDb) await st.conn.query(`USE ${qid(st.sourceDb)}`);
        if (st.shadowDb) await st.conn.query(`DROP DATABASE IF EXISTS ${qid(st.shadowDb)}`);
      }
      if (st.timeoutMs !== null) await st.conn.query('SET SESSION max_execution_time = DEFAULT');
      st.conn.release();
    } catch (e) {
      st.conn.destroy();
      throw classifyMysqlError(e, 'release isolation scope');
    }
    this.log.debug({ scope: scope.id, requestId: scope.requestId }, 'isolation scope released');
  }

  async execute(scope: IsolationScope, sql: string, opts: ExecuteOptions): Promise<ExecutionResult> {
    const st = this.state(scope);
    try {
      if (st.timeoutMs !== opts.timeoutMs) {
        await st.conn.query(`SET SESSION max_execution_time = ${Math.max(1, Math.floor(opts.timeoutMs))}`);
        st.timeoutMs = opts.timeoutMs;
      }
      const started = performance.now();
      const [raw, fields] = await st.conn.query<RowDataPacket[]>({ sql, rowsAsArray: true });
      const elapsedMs = performance.now() - started;
      const columns = uniqueColumnNames((fields ?? []).map((f) => f.name));
      return { rows: raw.map((r) => toRow(columns, r)), columns, elapsedMs };
    } catch (e) {
      throw classifyMysqlError(e, 'execute', opts.timeoutMs);
    }
  }

  async explain(scope: IsolationScope, sql: string): Promise<ExplainPlan> {
    const st = this.state(scope);
    let rows: RawRecord[];
    try {
      const [raw] = await st.conn.query<RowDataPacket[]>(`EXPLAIN ${sql}`);
      rows = raw.map((r) => ({ ...r }));
    } catch (e) {
      throw classifyMysqlError(e, 'explain');
    }

    let doc: unknown;
    try {
      const [json] = await st.conn.query<RowDataPacket[]>(`EXPLAIN FORMAT=JSON ${sql}`);
      const text = json[0]?.EXPLAIN;
      doc = typeof text === 'string' ? JSON.parse(text) : undefined;
    } catch (e) {
      this.log.warn({ scope: scope.id, err: errorMessage(e) }, 'EXPLAIN FORMAT=JSON unavailable; using tabular plan only');
    }
    return { steps: normalizeExplainRows(rows), raw: doc };
  }

  async describeTables(_scope: IsolationScope, tables: string[]): Promise<TableSchema[]> {
    try {
      return await describeTables(this.db, tables);
    } catch (e) {
      throw classifyMysqlError(e, 'describe tables');
    }
  }

  async applyIndex(scope: IsolationScope, ddl: string, opts: ApplyIndexOptions = {}): Promise<IndexHandle> {
    const st = this.state(scope);
    if (scope.kind !== 'clone') {
      throw new ExecutionError('index proposals need clone isolation; the snapshot transaction cannot run DDL');
    }
    const parsed = parseCreateIndex(ddl);
    if (!parsed) throw new ExecutionError('index DDL is not a CREATE INDEX statement');
    const signal = opts.signal;
    if (signal?.aborted) throw new CancelledError('index build aborted before it started');

    // the scope connection is busy with the DDL, so the kill goes through the pool
    const onAbort = () => {
      if (st.connectionId === null) return;
      void this.promisePool.query(`KILL QUERY ${st.connectionId}`).catch((e: unknown) => {
        this.log.warn({ scope: scope.id, err: errorMessage(e) }, 'could not kill abandoned index build');
      });
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      await st.conn.query(ddl);
    } catch (e) {
      throw classifyMysqlError(e, 'create index');
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
    const handle: IndexHandle = { name: parsed.name, table: parsed.table };
    st.indexes.push(handle);
    return handle;
  }

  async dropIndex(scope: IsolationScope, handle: IndexHandle): Promise<void> {
    const st = this.state(scope);
    try {
      await st.conn.query(`DROP INDEX ${qid(handle.name)} ON ${qid(handle.table)}`);
    } catch (e) {
      throw classifyMysqlError(e, 'drop index');
    }
    st.indexes = st.indexes.filter((i) => i.name !== handle.name || i.table !== handle.table);
  }

  async health(): Promise<HealthStatus> {
    try {
      const [rows] = await this.promisePool.query<RowDataPacket[]>('SELECT VERSION() AS version');
      const version = rows[0]?.version;
      return { ok: true, version: typeof version === 'string' ? version : undefined };
    } catch (e) {
      return { ok: false, error: errorMessage(e) };
    }
  }

  async close(): Promise<void> {
    for (const [id, st] of this.scopes) {
      this.log.warn({ scope: id }, 'closing with an open isolation scope');
      st.conn.destroy();
    }
    this.scopes.clear();
    await this.db.destroy(); // ends the underlying pool
  }
}
