export { DecisionOrchestrator, withScope } from './orchestrator';
export type { OrchestratorDeps, RunOptions } from './orchestrator';
export { ShadowSandbox } from './sandbox';
export type { SandboxSettings } from './sandbox';
export { DiagnosisCollector, planIssues, predicateIssues, summarize, whereClauses } from './diagnosis';
export type { DiagnosisSettings } from './diagnosis';
export { ProposalGenerator } from './proposal';
export type { ProposalSettings } from './proposal';
export { compareResults } from './equivalence';
export type { EquivalenceResult, MismatchKind } from './equivalence';
export { comparePerformance, speedupRatio } from './performance';
export type { PerformanceOutcome, PerformanceResult, PerformanceSettings } from './performance';
export { canonicalizeResult, canonicalRow, canonicalValue, numbersClose, quantize, retainedRows } from './canonical';
export type { Canonical, CanonicalResult } from './canonical';
export { createRequest, toDialect } from './request';
export type { NewRequest } from './request';
