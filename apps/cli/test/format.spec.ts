/* apps/cli/test/format.spec.ts */
import { describe, it, expect } from 'vitest';
import type { RequestOutcome, RunSummary } from '@shadowsql/core';
import { exitCodeFor, formatOutcome } from '../src/format';

const baseline: RunSummary = { variant: 'original', sql: 'SELECT 1', resultHash: 'h', rowCount: 3, elapsedMs: 80, relativeSpread: 0 };

function outcome(over: Partial<RequestOutcome>): RequestOutcome {
  return {
    requestId: 'req-1',
    status: 'exhausted',
    originalSql: 'SELECT * FROM t',
    finalSql: 'SELECT * FROM t',
    recommendation: null,
    acceptedVerdict: null,
    verdicts: [],
    diagnosis: null,
    baseline,
    error: null,
    exhaustionReason: null,
    transitions: [],
    startedAt: '2024-01-01T00:00:00.000Z',
    finishedAt: '2024-01-01T00:00:01.000Z',
    durationMs: 1000,
    ...over
  };
}

describe('exitCodeFor', () => {
  it('maps statuses to process exit codes', () => {
    expect(exitCodeFor('accepted')).toBe(0);
    expect(exitCodeFor('exhausted')).toBe(0);
    expect(exitCodeFor('fatal_error')).toBe(1);
    expect(exitCodeFor('cancelled')).toBe(130);
  });
});

describe('formatOutcome', () => {
  it('reports an accepted index with its DDL', () => {
    const verdict = {
      attempt: 1, semanticMatch: true, speedupRatio: 8, accepted: true, rejectionKind: null, rejectionReason: null,
      evidence: { baseline, candidate: { ...baseline, variant: 'candidate' as const, elapsedMs: 10 } }
    };
    const text = formatOutcome(outcome({
      status: 'accepted',
      recommendation: {
        attempt: 1, kind: 'index', sql: 'SELECT * FROM t', indexDdl: 'CREATE INDEX idx_a ON t (a)',
        rationale: 'filter on a', priorFeedback: []
      },
      acceptedVerdict: verdict,
      verdicts: [verdict]
    }));
    expect(text).toBe([
      'request:   req-1',
      'status:    accepted',
      'baseline:  80.00 ms (3 rows)',
      'attempt 1: accepted, speedup 8.00x',
      'result:    index verified, 8.00x faster',
      'index:     CREATE INDEX idx_a ON t (a)',
      'optimized sql:',
      '  SELECT * FROM t',
      'rationale: filter on a',
      'duration:  1000 ms'
    ].join('\n'));
  });

  it('reports the last rejection reason when exhausted', () => {
    const text = formatOutcome(outcome({ exhaustionReason: 'row count mismatch: 2 vs 3' }));
    expect(text.split('\n').slice(-3)).toEqual([
      'result:    original query kept (no candidate verified)',
      'last reason: row count mismatch: 2 vs 3',
      'duration:  1000 ms'
    ]);
  });
});
