export type ChangeKind = 'added' | 'modified' | 'removed' | 'renamed';

export type SymbolKind = 'function' | 'method' | 'class';

export type ChangedSymbolKind = 'body-modified' | 'signature-modified' | 'added' | 'removed';

export type ConflictKind = 'hard' | 'interface' | 'behavioral' | 'duplication' | 'regression' | 'guardrail';

export type Severity = 'critical' | 'warning' | 'info';

export type DecisionKind = 'removal' | 'migration' | 'addition';

/** Inclusive line range, 1-based. Line 0 anchors insertions before the first line. */
export interface LineRange {
  start: number;
  end: number;
}

export interface HunkLine {
  line: number;
  text: string;
}

/**
 * One contiguous change block.
 * `before` is in base (target branch) coordinates, `after` in head coordinates.
 * `removed[].line` are base lines; `added[].line` are head lines.
 */
export interface Hunk {
  before: LineRange;
  after: LineRange;
  added: HunkLine[];
  removed: HunkLine[];
}

export interface FileDiff {
  path: string;
  previousPath?: string;
  change: ChangeKind;
  hunks: Hunk[];
}

export interface AutomationSignals {
  /** Likelihood in [0,1] that the proposal was machine-authored. */
  confidence: number;
  signals: string[];
}

export interface ChangeProposal {
  id: string;
  title: string;
  sourceRef: string;
  targetRef: string;
  /** Revision the diff was taken against; defaults to `targetRef`. */
  baseRef?: string;
  author: string;
  labels: string[];
  automation: AutomationSignals;
}

export interface ParamDescriptor {
  name: string;
  type?: string;
  optional?: boolean;
}

export interface SymbolSignature {
  params: ParamDescriptor[];
  returns?: string;
}

export interface CodeSymbol {
  name: string;
  kind: SymbolKind;
  file: string;
  range: LineRange;
  signature: SymbolSignature;
  module: string;
  /** Name of the enclosing class, for methods. */
  parent?: string;
  nesting?: number;
  complexity?: number;
}

export interface CallSite {
  name: string;
  line: number;
}

export interface FileAnalysis {
  path: string;
  symbols: CodeSymbol[];
  /** Raw import specifiers as written in the source. */
  imports: string[];
  calls: CallSite[];
}

export type CoverageReason = 'unsupported-language' | 'parse-error' | 'missing-content' | 'missing-dependency-graph';

export interface CoverageNote {
  file: string;
  reason: CoverageReason;
  detail?: string;
}

export interface ChangedSymbol {
  /** Qualified name, unique within the file. */
  key: string;
  /** Base version for modified/removed symbols, head version for added ones. */
  symbol: CodeSymbol;
  change: ChangedSymbolKind;
  /** Touched lines in base coordinates, merged and sorted. */
  touched: LineRange[];
  /** Head version of a modified symbol. */
  head?: CodeSymbol;
  /** Head-side text of the symbol's added lines. */
  addedLines: string[];
}

export interface OverlapSpan {
  range: LineRange;
  /** Qualified name of the innermost enclosing symbol, when one is known. */
  symbol?: string;
}

export interface SymbolOverlap {
  key: string;
  a: ChangedSymbol;
  b: ChangedSymbol;
  touchedIntersect: boolean;
}

/** Overlap of two proposals in one shared file. `pair` is ordered so the result is symmetric. */
export interface Overlap {
  pair: [string, string];
  file: string;
  hasLineOverlap: boolean;
  spans: OverlapSpan[];
  symbols: SymbolOverlap[];
  coarseFallback: boolean;
}

export interface Conflict {
  kind: ConflictKind;
  severity: Severity;
  /** [reporting proposal, other proposal or decision reference]. */
  proposals: [string, string];
  file: string;
  symbol?: string;
  explanation: string;
  recommendation: string;
  degraded?: boolean;
  rule?: string;
  adjudicated?: boolean;
}

export interface Decision {
  kind: DecisionKind;
  /** Symbol name for removal/addition, a short label for migrations. */
  entity: string;
  module?: string;
  file?: string;
  oldPattern?: string;
  newPattern?: string;
  proposalRef: string;
  description?: string;
  timestamp: string;
}

export type RiskFactorName = 'conflictSeverity' | 'blastRadius' | 'patternDeviation' | 'churn' | 'attribution';

export const RISK_FACTORS: readonly RiskFactorName[] = [
  'conflictSeverity',
  'blastRadius',
  'patternDeviation',
  'churn',
  'attribution',
];

export type RiskWeights = Record<RiskFactorName, number>;

export interface RiskFactor {
  raw: number;
  weight: number;
  /** Points contributed to the composite: raw × weight × 100. */
  weighted: number;
  available: boolean;
  detail?: string;
}

export interface RiskBreakdown {
  factors: Record<RiskFactorName, RiskFactor>;
  composite: number;
}

export type IssueStage = 'prepare' | 'pair' | 'regression' | 'guardrail' | 'deadline';

export interface AnalysisIssue {
  stage: IssueStage;
  message: string;
  other?: string;
}

export interface ProposalReport {
  proposal: ChangeProposal;
  conflicts: Conflict[];
  risk: RiskBreakdown;
  exceedsThreshold: boolean;
  noConflictWith: string[];
  coverage: CoverageNote[];
  issues: AnalysisIssue[];
  counts: Record<Severity, number>;
  durationMs: number;
}

/** An input record that failed validation and was left out of the run. */
export interface RejectedProposal {
  index: number;
  id: string | null;
  issue: AnalysisIssue;
}

export interface AnalysisRun {
  reports: ProposalReport[];
  rejected: RejectedProposal[];
  skippedPairs: Array<[string, string]>;
  deadlineExceeded: boolean;
  startedAt: string;
  durationMs: number;
}
