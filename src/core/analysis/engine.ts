import type {
  AnalysisCache,
  AstExtractor,
  AttributionProvider,
  ChurnProvider,
  DecisionsReader,
  HostingProvider,
  SemanticAdjudicator,
  SimilarityMeasure,
} from '../collaborators';
import type { EngineConfig } from '../config';
import { errorMessage, InputShapeError } from '../errors';
import { DependencyGraph } from '../graph/dependencyGraph';
import { createLogger, type Logger } from '../log';
import { matchesAnyGlob } from '../paths';
import { parseFileDiffs, parseProposal } from '../schemas';
import { deriveChangedSymbols } from '../symbols/changedSymbols';
import { SymbolIndex } from '../symbols/symbolIndex';
import type {
  AnalysisIssue,
  AnalysisRun,
  ChangeProposal,
  Conflict,
  CoverageNote,
  CoverageReason,
  Decision,
  ProposalReport,
  RejectedProposal,
  Severity,
} from '../types';
import { ConflictClassifier } from './classifier';
import { FileAnalyzer, type FileOutcome } from './fileAnalyzer';
import { evaluateGuardrails } from './guardrails';
import { computeOverlaps } from './overlap';
import { beforeDeadline, runBounded } from './pool';
import { sharesFile, type PreparedFile, type PreparedProposal } from './prepared';
import { detectRegressions } from './regression';
import { scoreRisk } from './riskScorer';
import { compareConflicts } from './severity';

export interface EngineDeps {
  provider: HostingProvider;
  extractor?: AstExtractor;
  decisions?: DecisionsReader;
  cache?: AnalysisCache;
  similarity?: SimilarityMeasure;
  adjudicator?: SemanticAdjudicator;
  churn?: ChurnProvider;
  attribution?: AttributionProvider;
  /** Pre-built graph; otherwise one is built per target ref from the analyzed files. */
  graph?: DependencyGraph;
  logger?: Logger;
  now?: () => Date;
}

interface Candidate {
  proposal: ChangeProposal;
  prepared: PreparedProposal | null;
  issues: AnalysisIssue[];
  prepareMs: number;
}

/** Per-run deadline; `expired` records that some wait was cut short. */
interface RunClock {
  deadline: number | undefined;
  expired: boolean;
}

interface ProposalExtras {
  conflicts: Conflict[];
  issues: AnalysisIssue[];
  attribution: number | null;
  churn: ReadonlyMap<string, number> | null;
  durationMs: number;
}

const COVERAGE_REASON: Record<Exclude<FileOutcome['status'], 'ok'>, CoverageReason> = {
  unsupported: 'unsupported-language',
  'parse-error': 'parse-error',
  missing: 'missing-content',
};

function coverageFor(file: string, outcome: FileOutcome | null): CoverageNote | null {
  if (!outcome || outcome.status === 'ok') return null;
  const note: CoverageNote = { file, reason: COVERAGE_REASON[outcome.status] };
  if (outcome.status === 'parse-error' || outcome.status === 'missing') note.detail = outcome.message;
  return note;
}

function rawId(raw: unknown): string | null {
  return typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string' ? raw.id : null;
}

function pairKey(a: string, b: string): string {
  return a <= b ? `${a}\0${b}` : `${b}\0${a}`;
}

function orient(c: Conflict, id: string): Conflict {
  if (c.proposals[0] === id) return c;
  return { ...c, proposals: [id, c.proposals[0]] };
}

/**
 * Runs one analysis over a set of open proposals: prepare, pairwise overlap and
 * classification, per-proposal regression and guardrail checks, then risk scoring.
 */
export class ConflictEngine {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly config: EngineConfig,
    private readonly deps: EngineDeps,
  ) {
    this.log = deps.logger ?? createLogger({ component: 'engine' });
    this.now = deps.now ?? (() => new Date());
  }

  async run(proposals?: readonly unknown[]): Promise<AnalysisRun> {
    const started = Date.now();
    const startedAt = this.now().toISOString();
    const input = proposals ?? (await this.deps.provider.listOpenProposals(this.config.maxOpenProposals));
    let parsed: ChangeProposal[] = [];
    const rejected: RejectedProposal[] = [];
    input.forEach((raw, index) => {
      try {
        parsed.push(parseProposal(raw, `proposal #${index}`));
      } catch (e) {
        if (!(e instanceof InputShapeError)) throw e;
        const id = rawId(raw);
        this.log.warn('proposal_invalid', { index, proposal: id, err: e.message });
        rejected.push({ index, id, issue: { stage: 'prepare', message: e.message } });
      }
    });
    if (parsed.length > this.config.maxOpenProposals) {
      this.log.warn('proposals_truncated', { total: parsed.length, limit: this.config.maxOpenProposals });
      parsed = parsed.slice(0, this.config.maxOpenProposals);
    }

    return this.log.span('analysis_run', { proposals: parsed.length, provider: this.deps.provider.name }, async () => {
      const run = await this.analyze(parsed, started);
      return { ...run, rejected, startedAt, durationMs: Date.now() - started };
    });
  }

  private async analyze(
    proposals: ChangeProposal[],
    started: number,
  ): Promise<Omit<AnalysisRun, 'rejected' | 'startedAt' | 'durationMs'>> {
    const clock: RunClock = {
      deadline: this.config.deadlineMs === undefined ? undefined : started + this.config.deadlineMs,
      expired: false,
    };
    const analyzer = new FileAnalyzer(this.deps.provider, this.deps.extractor, this.deps.cache, this.log);
    const [candidates, decisions] = await Promise.all([
      runBounded(proposals, (p) => this.prepare(p, analyzer), { concurrency: this.config.concurrency, deadline: clock.deadline }),
      this.readDecisions(clock),
    ]);
    if (candidates.deadlineExceeded) clock.expired = true;

    const prepared: Candidate[] = proposals.map((proposal, i) => {
      const o = candidates.outcomes[i];
      if (o?.status === 'fulfilled') return o.value;
      if (o?.status === 'rejected') {
        const message = errorMessage(o.error);
        this.log.warn('proposal_prepare_failed', { proposal: proposal.id, err: message });
        return { proposal, prepared: null, issues: [{ stage: 'prepare', message }], prepareMs: 0 };
      }
      this.log.warn('proposal_prepare_timeout', { proposal: proposal.id });
      return {
        proposal,
        prepared: null,
        issues: [{ stage: 'deadline', message: 'proposal not prepared before the deadline' }],
        prepareMs: 0,
      };
    });

    const graphs = await this.buildGraphs(prepared, analyzer, clock);

    // Pair phase, pre-filtered on shared files and target branch.
    const ready = prepared.flatMap((c) => (c.prepared ? [c.prepared] : []));
    const pairs: Array<[PreparedProposal, PreparedProposal]> = [];
    const compared = new Set<string>();
    for (let i = 0; i < ready.length; i++) {
      for (let j = i + 1; j < ready.length; j++) {
        const a = ready[i];
        const b = ready[j];
        if (!a || !b || a.proposal.targetRef !== b.proposal.targetRef) continue;
        if (sharesFile(a, b)) pairs.push([a, b]);
        else compared.add(pairKey(a.proposal.id, b.proposal.id));
      }
    }

    const [pairRun, extras] = await Promise.all([
      runBounded(
        pairs,
        async ([a, b]) => {
          const graph = graphs.get(a.proposal.targetRef) ?? new DependencyGraph();
          const classifier = new ConflictClassifier({
            graph,
            similarityThreshold: this.config.similarityThreshold,
            similarity: this.deps.similarity,
            adjudicator: this.deps.adjudicator,
            log: this.log,
          });
          return classifier.classify(a, b, computeOverlaps(a, b));
        },
        { concurrency: this.config.concurrency, deadline: clock.deadline },
      ),
      Promise.all(prepared.map((c) => this.perProposal(c, decisions, graphs.get(c.proposal.targetRef) ?? null, clock))),
    ]);

    const pairConflicts: Conflict[] = [];
    const pairIssues = new Map<string, AnalysisIssue[]>();
    const skippedPairs: Array<[string, string]> = [];
    const addIssue = (id: string, issue: AnalysisIssue) => {
      const list = pairIssues.get(id);
      if (list) list.push(issue);
      else pairIssues.set(id, [issue]);
    };

    pairs.forEach(([a, b], i) => {
      const ida = a.proposal.id;
      const idb = b.proposal.id;
      const o = pairRun.outcomes[i];
      if (o?.status === 'fulfilled') {
        pairConflicts.push(...o.value);
        compared.add(pairKey(ida, idb));
      } else if (o?.status === 'rejected') {
        const message = errorMessage(o.error);
        this.log.warn('pair_failed', { a: ida, b: idb, err: message });
        addIssue(ida, { stage: 'pair', message, other: idb });
        addIssue(idb, { stage: 'pair', message, other: ida });
      } else {
        skippedPairs.push([ida, idb]);
        const message = 'pair not analyzed before the deadline';
        addIssue(ida, { stage: 'deadline', message, other: idb });
        addIssue(idb, { stage: 'deadline', message, other: ida });
      }
    });
    const deadlineExceeded = pairRun.deadlineExceeded || clock.expired;
    if (deadlineExceeded) {
      this.log.warn('deadline_exceeded', { skipped: skippedPairs.length, completed: pairs.length - skippedPairs.length });
    }

    const reports = prepared.map((c, i) => {
      const extra = extras[i];
      return this.report(c, extra, pairConflicts, pairIssues.get(c.proposal.id) ?? [], compared, graphs, proposals);
    });

    return { reports, skippedPairs, deadlineExceeded };
  }

  private async readDecisions(clock: RunClock): Promise<Decision[] | Error> {
    const reader = this.deps.decisions;
    if (!this.config.checkRegressions || !reader) return [];
    try {
      const res = await beforeDeadline(reader.recent(this.config.decisionsLogDepth), clock.deadline);
      if (res.status === 'done') return res.value;
      clock.expired = true;
      this.log.warn('decisions_timeout');
      return new Error('no answer before the deadline');
    } catch (e) {
      this.log.warn('decisions_unavailable', { err: errorMessage(e) });
      return e instanceof Error ? e : new Error(String(e));
    }
  }

  private async prepare(proposal: ChangeProposal, analyzer: FileAnalyzer): Promise<Candidate> {
    const startedAt = Date.now();
    const raw = await this.deps.provider.getFileDiffs(proposal.id);
    const diffs = parseFileDiffs(raw, `diffs of ${proposal.id}`).filter(
      (d) => !matchesAnyGlob(d.path, this.config.ignoredPaths),
    );
    const baseRef = proposal.baseRef ?? proposal.targetRef;

    const files = await Promise.all(
      diffs.map(async (diff): Promise<{ file: PreparedFile; notes: CoverageNote[] }> => {
        const key = diff.previousPath ?? diff.path;
        const [baseOutcome, headOutcome] = await Promise.all([
          diff.change === 'added' ? Promise.resolve(null) : analyzer.analyze(key, baseRef),
          diff.change === 'removed' ? Promise.resolve(null) : analyzer.analyze(diff.path, proposal.sourceRef),
        ]);
        const base = baseOutcome?.status === 'ok' ? baseOutcome.analysis : null;
        const head = headOutcome?.status === 'ok' ? headOutcome.analysis : null;
        const symbolsAvailable = (diff.change === 'added' || base !== null) && (diff.change === 'removed' || head !== null);
        const notes = [coverageFor(key, baseOutcome), coverageFor(diff.path, headOutcome)].flatMap((n) => (n ? [n] : []));
        return {
          file: {
            key,
            diff,
            base,
            head,
            changed: symbolsAvailable ? deriveChangedSymbols(diff, base, head) : [],
            symbolsAvailable,
            baseIndex: new SymbolIndex(base?.symbols ?? []),
          },
          notes,
        };
      }),
    );

    const coverage: CoverageNote[] = [];
    const seen = new Set<string>();
    for (const note of files.flatMap((f) => f.notes)) {
      const k = `${note.file}\0${note.reason}`;
      if (seen.has(k)) continue;
      seen.add(k);
      coverage.push(note);
    }

    return {
      proposal,
      prepared: { proposal, files: new Map(files.map((f) => [f.file.key, f.file])), coverage },
      issues: [],
      prepareMs: Date.now() - startedAt,
    };
  }

  /** One dependency graph per target ref, from base analyses plus every listed file. */
  private async buildGraphs(
    candidates: Candidate[],
    analyzer: FileAnalyzer,
    clock: RunClock,
  ): Promise<Map<string, DependencyGraph>> {
    const graphs = new Map<string, DependencyGraph>();
    const refs = Array.from(new Set(candidates.map((c) => c.proposal.targetRef))).sort();
    for (const ref of refs) {
      if (this.deps.graph) {
        graphs.set(ref, this.deps.graph);
        continue;
      }
      const imports = new Map<string, string[]>();
      for (const c of candidates) {
        if (c.proposal.targetRef !== ref || !c.prepared) continue;
        for (const f of c.prepared.files.values()) if (f.base) imports.set(f.key, f.base.imports);
      }

      let listed: string[] = [];
      const listFiles = this.deps.provider.listFiles?.bind(this.deps.provider);
      if (listFiles) {
        try {
          const res = await beforeDeadline(listFiles(ref), clock.deadline);
          if (res.status === 'done') listed = res.value;
          else {
            clock.expired = true;
            this.log.warn('list_files_timeout', { ref });
          }
        } catch (e) {
          this.log.warn('list_files_failed', { ref, err: errorMessage(e) });
        }
      }
      const pending = listed.filter((f) => !imports.has(f) && analyzer.supports(f));
      const outcomes = await runBounded(pending, (f) => analyzer.analyze(f, ref), {
        concurrency: this.config.concurrency,
        deadline: clock.deadline,
      });
      if (outcomes.deadlineExceeded) clock.expired = true;
      pending.forEach((f, i) => {
        const o = outcomes.outcomes[i];
        if (o?.status === 'fulfilled' && o.value.status === 'ok') imports.set(f, o.value.analysis.imports);
      });

      graphs.set(ref, DependencyGraph.fromImports(imports, listed));
    }
    return graphs;
  }

  private async resolveAttribution(proposal: ChangeProposal, clock: RunClock, issues: AnalysisIssue[]): Promise<number | null> {
    const provider = this.deps.attribution;
    if (!provider) return proposal.automation.confidence;
    try {
      const res = await beforeDeadline(provider.confidence(proposal), clock.deadline);
      if (res.status === 'timeout') {
        clock.expired = true;
        this.log.warn('attribution_timeout', { proposal: proposal.id });
        issues.push({ stage: 'deadline', message: 'attribution provider did not answer before the deadline' });
        return null;
      }
      const v = res.value;
      return v === null || !Number.isFinite(v) ? null : Math.min(1, Math.max(0, v));
    } catch (e) {
      this.log.warn('attribution_unavailable', { proposal: proposal.id, err: errorMessage(e) });
      return null;
    }
  }

  private async resolveChurn(files: string[], clock: RunClock, issues: AnalysisIssue[]): Promise<ReadonlyMap<string, number> | null> {
    const provider = this.deps.churn;
    if (!provider) return null;
    try {
      const res = await beforeDeadline(provider.churn(files), clock.deadline);
      if (res.status === 'done') return res.value;
      clock.expired = true;
      this.log.warn('churn_timeout', { files: files.length });
      issues.push({ stage: 'deadline', message: 'churn provider did not answer before the deadline' });
      return null;
    } catch (e) {
      this.log.warn('churn_unavailable', { err: errorMessage(e) });
      return null;
    }
  }

  /** Regression, guardrail and auxiliary-signal work that does not depend on other proposals. */
  private async perProposal(
    c: Candidate,
    decisions: Decision[] | Error,
    graph: DependencyGraph | null,
    clock: RunClock,
  ): Promise<ProposalExtras> {
    const startedAt = Date.now();
    const issues: AnalysisIssue[] = [];
    const conflicts: Conflict[] = [];
    const attribution = await this.resolveAttribution(c.proposal, clock, issues);
    const p = c.prepared;
    const churn = await this.resolveChurn(p ? Array.from(p.files.keys()).sort() : [], clock, issues);

    if (p) {
      if (decisions instanceof Error) {
        issues.push({ stage: 'regression', message: `decisions log unavailable: ${decisions.message}` });
      } else if (this.config.checkRegressions) {
        try {
          conflicts.push(
            ...detectRegressions(p, decisions, {
              recencyMinutes: this.config.regressionRecencyMinutes,
              now: this.now(),
            }),
          );
        } catch (e) {
          issues.push({ stage: 'regression', message: errorMessage(e) });
        }
      }

      try {
        conflicts.push(...evaluateGuardrails(p, this.config.rules, { automation: attribution ?? 0, graph: graph ?? undefined }));
      } catch (e) {
        issues.push({ stage: 'guardrail', message: errorMessage(e) });
      }
    }

    return { conflicts, issues, attribution, churn, durationMs: Date.now() - startedAt };
  }

  private report(
    c: Candidate,
    extra: ProposalExtras | undefined,
    pairConflicts: readonly Conflict[],
    pairIssues: AnalysisIssue[],
    compared: ReadonlySet<string>,
    graphs: ReadonlyMap<string, DependencyGraph>,
    proposals: readonly ChangeProposal[],
  ): ProposalReport {
    const id = c.proposal.id;
    const conflicts = [
      ...pairConflicts.filter((x) => x.proposals[0] === id || x.proposals[1] === id).map((x) => orient(x, id)),
      ...(extra?.conflicts ?? []),
    ].sort(compareConflicts);

    const withConflict = new Set(conflicts.map((x) => x.proposals[1]));
    const noConflictWith = proposals
      .map((p) => p.id)
      .filter((other) => other !== id && compared.has(pairKey(id, other)) && !withConflict.has(other))
      .sort();

    const graph = c.prepared ? graphs.get(c.proposal.targetRef) ?? null : null;
    const coverage = c.prepared ? c.prepared.coverage.slice() : [];
    if (c.prepared && graph) {
      const noted = new Set(coverage.map((n) => n.file));
      for (const f of c.prepared.files.values()) {
        if (f.diff.change !== 'added' && !noted.has(f.key) && !graph.hasImportsFor(f.key)) {
          coverage.push({ file: f.key, reason: 'missing-dependency-graph' });
        }
      }
    }

    const risk = scoreRisk({
      conflicts,
      prepared: c.prepared,
      graph,
      churn: extra?.churn ?? null,
      attribution: extra?.attribution ?? null,
      config: this.config,
    });

    const counts: Record<Severity, number> = { critical: 0, warning: 0, info: 0 };
    for (const x of conflicts) counts[x.severity]++;

    return {
      proposal: c.proposal,
      conflicts,
      risk,
      exceedsThreshold: risk.composite > this.config.riskThreshold,
      noConflictWith,
      coverage,
      issues: [...c.issues, ...pairIssues, ...(extra?.issues ?? [])],
      counts,
      durationMs: c.prepareMs + (extra?.durationMs ?? 0),
    };
  }
}
