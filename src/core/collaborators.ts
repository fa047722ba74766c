import type { ChangeProposal, Decision, FileAnalysis, LineRange, Severity } from './types';

export type StatusState = 'success' | 'failure' | 'pending' | 'error';

/** Hosting backend (GitHub-shaped, GitLab-shaped, local git, snapshot). */
export interface HostingProvider {
  readonly name: string;
  listOpenProposals(limit: number): Promise<unknown[]>;
  /** Parsed file diffs; validated by the engine before use. */
  getFileDiffs(proposalId: string): Promise<unknown[]>;
  /** File text at `ref`, or null when the file does not exist there. */
  getFileContent(filePath: string, ref: string): Promise<string | null>;
  postComment(proposalId: string, body: string): Promise<void>;
  setStatus(proposalId: string, state: StatusState, description: string): Promise<void>;
  /** Every file at `ref`. Lets the engine build a repository-wide dependency graph. */
  listFiles?(ref: string): Promise<string[]>;
}

export type ExtractOutcome =
  | { status: 'ok'; analysis: FileAnalysis }
  | { status: 'unsupported' }
  | { status: 'parse-error'; message: string };

export interface AstExtractor {
  supports(filePath: string): boolean;
  extract(filePath: string, content: string): ExtractOutcome;
}

export interface DecisionsReader {
  /** Newest first, at most `depth` entries. */
  recent(depth: number): Promise<Decision[]>;
}

export interface AnalysisCacheKey {
  path: string;
  /** Digest of the content the analysis was extracted from. */
  digest: string;
}

export interface AnalysisCache {
  get(key: AnalysisCacheKey): Promise<ExtractOutcome | undefined>;
  set(key: AnalysisCacheKey, value: ExtractOutcome): Promise<void>;
}

/** Similarity in [0,1] over two normalized token sequences. */
export type SimilarityMeasure = (a: readonly string[], b: readonly string[]) => number | Promise<number>;

export interface AdjudicationSide {
  proposal: string;
  touched: LineRange[];
  addedLines: string[];
}

export interface AdjudicationRequest {
  file: string;
  symbol: string;
  source: AdjudicationSide;
  target: AdjudicationSide;
  defaultSeverity: Severity;
}

export interface AdjudicationVerdict {
  severity?: Severity;
  explanation?: string;
}

export interface SemanticAdjudicator {
  adjudicate(request: AdjudicationRequest): Promise<AdjudicationVerdict | null>;
}

export interface ChurnProvider {
  /** Historical revert/hotfix rate per path, in [0,1]. Paths without history may be omitted. */
  churn(paths: readonly string[]): Promise<Map<string, number>>;
}

export interface AttributionProvider {
  confidence(proposal: ChangeProposal): Promise<number | null>;
}
