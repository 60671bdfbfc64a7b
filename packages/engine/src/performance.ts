// packages/engine/src/performance.ts
import { ConfigError, type ShadowRunResult } from '@shadowsql/core';

export type PerformanceOutcome = 'pass' | 'regression' | 'insufficient' | 'inconclusive';

export interface PerformanceResult {
  speedupRatio: number;
  pass: boolean;
  outcome: PerformanceOutcome;
  reason: string | null;
}

export interface PerformanceSettings {
  minSpeedup: number;
  varianceTolerance: number;
}

// sub-microsecond timings are noise; keeps the ratio finite
const MIN_DENOMINATOR_MS = 0.001;

const ms = (v: number) => `${v.toFixed(2)} ms`;

export function speedupRatio(baselineMs: number, candidateMs: number): number {
  return baselineMs / Math.max(candidateMs, MIN_DENOMINATOR_MS);
}

export function comparePerformance(baseline: ShadowRunResult, candidate: ShadowRunResult, settings: PerformanceSettings): PerformanceResult {
  if (!(settings.minSpeedup > 1)) throw new ConfigError(`min_speedup must be greater than 1.0 (got ${settings.minSpeedup})`);

  const ratio = speedupRatio(baseline.elapsedMs, candidate.elapsedMs);
  const timing = `${ms(candidate.elapsedMs)} vs ${ms(baseline.elapsedMs)} baseline`;

  const noisiest = Math.max(baseline.relativeSpread, candidate.relativeSpread);
  if (noisiest > settings.varianceTolerance) {
    return {
      speedupRatio: ratio,
      pass: false,
      outcome: 'inconclusive',
      reason:
        `timing too noisy to decide: relative spread ${baseline.relativeSpread.toFixed(2)} (baseline) / ` +
        `${candidate.relativeSpread.toFixed(2)} (candidate) exceeds ${settings.varianceTolerance.toFixed(2)}; speedup ratio ${ratio.toFixed(2)}`
    };
  }

  if (ratio >= settings.minSpeedup && candidate.elapsedMs < baseline.elapsedMs) {
    return { speedupRatio: ratio, pass: true, outcome: 'pass', reason: null };
  }

  if (ratio < 1) {
    const factor = candidate.elapsedMs / Math.max(baseline.elapsedMs, MIN_DENOMINATOR_MS);
    return {
      speedupRatio: ratio,
      pass: false,
      outcome: 'regression',
      reason: `regressed by ${factor.toFixed(2)}x: speedup ratio ${ratio.toFixed(2)} (${timing})`
    };
  }

  return {
    speedupRatio: ratio,
    pass: false,
    outcome: 'insufficient',
    reason: `speedup ratio ${ratio.toFixed(2)} is below the required ${settings.minSpeedup.toFixed(2)} (${timing})`
  };
}
