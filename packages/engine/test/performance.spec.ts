/* packages/engine/test/performance.spec.ts */
import { describe, it, expect } from 'vitest';
import { ConfigError } from '@shadowsql/core';
import { comparePerformance, speedupRatio } from '../src/performance';
import { orderRows, shadowRun } from '../../../tests/helpers';

const settings = { minSpeedup: 1.1, varianceTolerance: 0.5 };
const rows = orderRows(10);
const base = shadowRun('original', rows, 1250);

describe('comparePerformance', () => {
  it('passes a large strict improvement', () => {
    const r = comparePerformance(base, shadowRun('candidate', rows, 12), settings);
    expect(r.pass).toBe(true);
    expect(r.outcome).toBe('pass');
    expect(r.speedupRatio).toBeCloseTo(104.17, 2);
    expect(r.reason).toBeNull();
  });

  it('rejects a slower candidate as a regression with the ratio', () => {
    const r = comparePerformance(base, shadowRun('candidate', rows, 1300), settings);
    expect(r.pass).toBe(false);
    expect(r.outcome).toBe('regression');
    expect(r.speedupRatio).toBeCloseTo(0.9615, 4);
    expect(r.reason).toBe('regressed by 1.04x: speedup ratio 0.96 (1300.00 ms vs 1250.00 ms baseline)');
  });

  it('rejects gains below the threshold and equal timings', () => {
    const small = comparePerformance(base, shadowRun('candidate', rows, 1200), settings);
    expect(small.outcome).toBe('insufficient');
    expect(small.reason).toBe('speedup ratio 1.04 is below the required 1.10 (1200.00 ms vs 1250.00 ms baseline)');

    const equal = comparePerformance(base, shadowRun('candidate', rows, 1250), settings);
    expect(equal.pass).toBe(false);
    expect(equal.speedupRatio).toBe(1);
  });

  it('marks noisy measurements inconclusive instead of deciding', () => {
    const r = comparePerformance(base, shadowRun('candidate', rows, 12, { spread: 2.08 }), settings);
    expect(r.outcome).toBe('inconclusive');
    expect(r.pass).toBe(false);
    expect(r.reason).toBe('timing too noisy to decide: relative spread 0.00 (baseline) / 2.08 (candidate) exceeds 0.50; speedup ratio 104.17');
  });

  it('floors a zero candidate time', () => {
    expect(speedupRatio(5, 0)).toBeCloseTo(5000, 6);
  });

  it('refuses a threshold that would allow non-improvements', () => {
    expect(() => comparePerformance(base, base, { minSpeedup: 1, varianceTolerance: 0.5 })).toThrow(ConfigError);
  });
});
