/* packages/engine/test/sandbox.spec.ts */
import { describe, it, expect } from 'vitest';
import { ExecutionError, ShadowError, TimeoutError, silentLogger, type Proposal } from '@shadowsql/core';
import { ShadowSandbox, type SandboxSettings } from '../src/sandbox';
import { FakeShadowDatabase, orderRows } from '../../../tests/helpers';

const SQL = 'SELECT * FROM orders';
const settings: SandboxSettings = {
  timingRepeatCount: 3,
  executionTimeoutMs: 1000,
  floatEpsilon: 1e-9,
  retainRowsLimit: 100,
  maxResultRows: 1000
};

async function setup(over: Partial<SandboxSettings> = {}) {
  const db = new FakeShadowDatabase();
  const scope = await db.createIsolationScope('req-1');
  return { db, scope, sandbox: new ShadowSandbox(db, { ...settings, ...over }, silentLogger()) };
}

describe('ShadowSandbox.run', () => {
  it('discards the warm-up and reports the median of timed runs', async () => {
    const { db, scope, sandbox } = await setup();
    db.on(SQL, { rows: orderRows(5), elapsedMs: [900, 10, 30, 20] });

    const run = await sandbox.run(scope, 'original', SQL, false);
    expect(db.executed).toHaveLength(4);
    expect(run.timingsMs).toEqual([10, 30, 20]);
    expect(run.elapsedMs).toBe(20);
    expect(run.relativeSpread).toBe(1);
    expect(run.rowCount).toBe(5);
    expect(run.columns).toEqual(['created_at', 'customer_id', 'id', 'total']);
    expect(run.plan?.steps).toHaveLength(1);
    expect(run.rows).toHaveLength(5);
  });

  it('drops retained rows above the limit but keeps the hash', async () => {
    const { db, scope, sandbox } = await setup({ retainRowsLimit: 2 });
    db.on(SQL, { rows: [{ id: 1 }, { id: 2 }, { id: 3 }] });
    const run = await sandbox.run(scope, 'original', SQL, false);
    expect(run.rows).toBeUndefined();
    expect(run.resultHash).toMatch(/^[0-9a-f]{64}$/);
  });

  it('keeps rows with fractional values above the limit', async () => {
    const { db, scope, sandbox } = await setup({ retainRowsLimit: 2 });
    db.on(SQL, { rows: orderRows(5) });
    const run = await sandbox.run(scope, 'original', SQL, false);
    expect(run.rows).toHaveLength(5);
  });

  it('refuses oversized results', async () => {
    const { db, scope, sandbox } = await setup({ maxResultRows: 3 });
    db.on(SQL, { rows: orderRows(5) });
    await expect(sandbox.run(scope, 'original', SQL, false)).rejects.toThrow('result has 5 rows, above the 3 row limit');
  });

  it('times out a hanging execution', async () => {
    const { db, scope, sandbox } = await setup({ executionTimeoutMs: 30 });
    db.on(SQL, { hang: true });
    const err = await sandbox.run(scope, 'candidate', SQL, false).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toMatchObject({ message: 'candidate execution timed out after 30 ms' });
  });

  it('surfaces statement errors without retrying', async () => {
    const { db, scope, sandbox } = await setup();
    db.on(SQL, { error: new ExecutionError("Unknown column 'x' in 'field list'") });
    await expect(sandbox.run(scope, 'candidate', SQL, false)).rejects.toBeInstanceOf(ExecutionError);
    expect(db.executed).toHaveLength(1);
  });
});

describe('ShadowSandbox.executeProposal', () => {
  const ddl = 'CREATE INDEX idx_orders_created ON orders (created_at)';
  const proposal: Proposal = { attempt: 1, kind: 'index', sql: SQL, indexDdl: ddl, rationale: 'r', priorFeedback: [] };

  it('runs the original statement with the index applied, then drops it', async () => {
    const { db, scope, sandbox } = await setup();
    db.on(SQL, { rows: orderRows(5), elapsedMs: 500 });
    db.onWithIndex('idx_orders_created', SQL, { rows: orderRows(5), elapsedMs: 5 });

    const run = await sandbox.executeProposal(scope, proposal, false);
    expect(run.elapsedMs).toBe(5);
    expect(db.applied).toEqual([{ name: 'idx_orders_created', table: 'orders' }]);
    expect(db.dropped).toEqual([{ name: 'idx_orders_created', table: 'orders' }]);
  });

  it('drops the index when the run fails', async () => {
    const { db, scope, sandbox } = await setup();
    db.onWithIndex('idx_orders_created', SQL, { error: new ExecutionError('boom') });
    await expect(sandbox.executeProposal(scope, proposal, false)).rejects.toThrow('boom');
    expect(db.dropped).toHaveLength(1);
  });

  it('fails hard when the index cannot be dropped', async () => {
    const { db, scope, sandbox } = await setup();
    db.onWithIndex('idx_orders_created', SQL, { rows: orderRows(1) });
    db.dropIndex = async () => { throw new Error('lock wait timeout'); };
    const err = await sandbox.executeProposal(scope, proposal, false).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ShadowError);
    expect(err).toMatchObject({ recoverable: false, message: 'could not drop candidate index idx_orders_created: lock wait timeout' });
  });

  it('waits out an index build that missed its timeout and drops what it created', async () => {
    const { db, scope, sandbox } = await setup({ executionTimeoutMs: 40 });
    db.applyDelayMs = 60;
    const err = await sandbox.executeProposal(scope, proposal, false).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toMatchObject({ message: 'index build timed out after 40 ms' });
    expect(db.applySignals[0]?.aborted).toBe(true);
    expect(db.dropped).toEqual([{ name: 'idx_orders_created', table: 'orders' }]);
    expect(db.executed).toHaveLength(0);
  });
});
