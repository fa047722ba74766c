import type { EngineConfig } from '../config';
import { rangeLength } from '../diff/ranges';
import type { DependencyGraph } from '../graph/dependencyGraph';
import type { CodeSymbol, Conflict, RiskBreakdown, RiskFactor, RiskFactorName } from '../types';
import { RISK_FACTORS } from '../types';
import type { PreparedProposal } from './prepared';
import { SEVERITY_VALUE } from './severity';

/** Σ value_i · 0.5^i over severities sorted descending, divided by 100. Not capped. */
export function conflictSeverityFactor(conflicts: readonly Conflict[]): number {
  const values = conflicts.map((c) => SEVERITY_VALUE[c.severity]).sort((a, b) => b - a);
  let total = 0;
  values.forEach((v, i) => {
    total += v * Math.pow(0.5, i);
  });
  return total / 100;
}

export function blastRadiusFactor(
  graph: DependencyGraph,
  files: readonly string[],
  maxDepth: number,
  saturation: number,
): { value: number; reachable: number } {
  const reachable = graph.reachable(files, 'reverse', maxDepth).size;
  return { value: Math.min(1, reachable / saturation), reachable };
}

function shape(s: CodeSymbol): [number, number, number] {
  return [rangeLength(s.range), s.nesting ?? 0, s.signature.params.length];
}

export function symbolDeviation(target: CodeSymbol, baseline: readonly CodeSymbol[]): number {
  const x = shape(target);
  const shapes = baseline.map(shape);
  let d = 0;
  for (let i = 0; i < 3; i++) {
    const avg = shapes.reduce((s, v) => s + (v[i] ?? 0), 0) / shapes.length;
    d += Math.abs((x[i] ?? 0) - avg) / Math.max(avg, 1);
  }
  return 1 - Math.exp(-(d / 3));
}

/** Mean saturated deviation of touched callables from their module's base shape. */
export function patternDeviationFactor(
  prepared: PreparedProposal,
  minBaselineSymbols: number,
): { value: number; evaluated: number } {
  const scores: number[] = [];
  for (const file of prepared.files.values()) {
    if (!file.base) continue;
    for (const cs of file.changed) {
      if (cs.change === 'removed') continue;
      const target = cs.head ?? cs.symbol;
      if (target.kind === 'class') continue;
      const baseline = file.base.symbols.filter(
        (s) => s.kind !== 'class' && s.module === target.module && !(cs.change !== 'added' && s === cs.symbol),
      );
      if (baseline.length === 0 || baseline.length < minBaselineSymbols) continue;
      scores.push(symbolDeviation(target, baseline));
    }
  }
  if (scores.length === 0) return { value: 0, evaluated: 0 };
  return { value: scores.reduce((a, b) => a + b, 0) / scores.length, evaluated: scores.length };
}

export function churnFactor(rates: ReadonlyMap<string, number>, files: readonly string[]): number {
  if (files.length === 0) return 0;
  const sum = files.reduce((s, f) => s + Math.min(1, Math.max(0, rates.get(f) ?? 0)), 0);
  return sum / files.length;
}

export interface RiskInputs {
  conflicts: readonly Conflict[];
  prepared: PreparedProposal | null;
  graph: DependencyGraph | null;
  /** null when the churn collaborator is absent or failed. */
  churn: ReadonlyMap<string, number> | null;
  /** null when attribution is unavailable. */
  attribution: number | null;
  config: Pick<EngineConfig, 'riskWeights' | 'blastRadius' | 'patternDeviation'>;
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function scoreRisk(inputs: RiskInputs): RiskBreakdown {
  const { config, prepared } = inputs;
  const files = prepared ? Array.from(prepared.files.keys()).sort() : [];
  const raw: Record<RiskFactorName, { raw: number; available: boolean; detail?: string }> = {
    conflictSeverity: { raw: conflictSeverityFactor(inputs.conflicts), available: true, detail: `${inputs.conflicts.length} conflicts` },
    blastRadius: { raw: 0, available: inputs.graph !== null },
    patternDeviation: { raw: 0, available: prepared !== null },
    churn: { raw: 0, available: inputs.churn !== null },
    attribution: { raw: inputs.attribution ?? 0, available: inputs.attribution !== null },
  };

  if (inputs.graph) {
    const br = blastRadiusFactor(inputs.graph, files, config.blastRadius.maxDepth, config.blastRadius.saturation);
    raw.blastRadius = { raw: br.value, available: true, detail: `${br.reachable} dependent files` };
  }
  if (prepared) {
    const pd = patternDeviationFactor(prepared, config.patternDeviation.minBaselineSymbols);
    raw.patternDeviation = { raw: pd.value, available: true, detail: `${pd.evaluated} symbols compared` };
  }
  if (inputs.churn) raw.churn = { raw: churnFactor(inputs.churn, files), available: true };

  const factor = (name: RiskFactorName): RiskFactor => {
    const f = raw[name];
    const weight = config.riskWeights[name];
    return { raw: f.raw, weight, weighted: f.raw * weight * 100, available: f.available, ...(f.detail ? { detail: f.detail } : {}) };
  };
  const factors: Record<RiskFactorName, RiskFactor> = {
    conflictSeverity: factor('conflictSeverity'),
    blastRadius: factor('blastRadius'),
    patternDeviation: factor('patternDeviation'),
    churn: factor('churn'),
    attribution: factor('attribution'),
  };
  const total = RISK_FACTORS.reduce((s, name) => s + factors[name].weighted, 0);

  return { factors, composite: round2(Math.min(100, Math.max(0, total))) };
}
