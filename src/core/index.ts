export * from './types';
export * from './collaborators';
export * from './errors';
export { createLogger, type Logger, type LogSink } from './log';
export { CONFIG_FILE, defaultConfig, loadConfig, resolveConfig, type EngineConfig, type EngineConfigInput, type GuardrailRule } from './config';
export { parseFileAnalysis, parseFileDiffs, parseDecision, parseProposal } from './schemas';
export { parseUnifiedDiff } from './diff/unifiedDiff';
export { DependencyGraph } from './graph/dependencyGraph';
export { ConflictEngine, type EngineDeps } from './analysis/engine';
export { computeOverlaps } from './analysis/overlap';
export { ConflictClassifier } from './analysis/classifier';
export { detectRegressions } from './analysis/regression';
export { evaluateGuardrails } from './analysis/guardrails';
export { scoreRisk } from './analysis/riskScorer';
export { TreeSitterExtractor } from './parser/extractor';
export { SnapshotProvider } from './providers/snapshot';
export { LocalGitProvider } from './providers/localGit';
export { DecisionsLog, InMemoryDecisions } from './providers/decisionsLog';
export { FileAnalysisCache, MemoryAnalysisCache } from './providers/cache';
