import fs from 'fs-extra';
import path from 'path';
import { ConflictEngine } from '../../core/analysis/engine';
import type { AnalysisCache, ChurnProvider, DecisionsReader, HostingProvider } from '../../core/collaborators';
import { CONFIG_FILE, loadConfig } from '../../core/config';
import { createLogger } from '../../core/log';
import { TreeSitterExtractor } from '../../core/parser/extractor';
import { FileAnalysisCache, MemoryAnalysisCache } from '../../core/providers/cache';
import { DecisionsLog } from '../../core/providers/decisionsLog';
import { LocalGitProvider } from '../../core/providers/localGit';
import { SnapshotProvider } from '../../core/providers/snapshot';
import { formatComment, statusFor } from '../format';
import type { AnalyzeInput } from '../schemas/analyzeSchemas';
import type { CLIError, CLIResult } from '../types';
import { error, ErrorHints, ErrorReasons, success } from '../types';

interface Collaborators {
  provider: HostingProvider;
  decisions: DecisionsReader;
  churn?: ChurnProvider;
}

async function collaborators(input: AnalyzeInput, root: string): Promise<Collaborators> {
  const logFile = input.decisions ? path.resolve(input.decisions) : null;
  if (input.snapshot) {
    const snapshot = await SnapshotProvider.fromFile(path.resolve(input.snapshot));
    return {
      provider: snapshot,
      decisions: logFile ? new DecisionsLog(logFile) : snapshot,
      churn: snapshot.hasChurn ? snapshot : undefined,
    };
  }
  const git = new LocalGitProvider({ repoRoot: root, targetBranch: input.target, branchPrefix: input.prefix });
  return { provider: git, decisions: logFile ? new DecisionsLog(logFile) : DecisionsLog.forRepo(root), churn: git };
}

export async function handleAnalyze(input: AnalyzeInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'analyze' });
  const root = path.resolve(input.repo ?? '.');

  if (input.config && !(await fs.pathExists(path.resolve(root, input.config)))) {
    return error(ErrorReasons.CONFIG_NOT_FOUND, { message: `no such file: ${input.config}`, hint: ErrorHints.CONFIG_NOT_FOUND });
  }
  let config = await loadConfig(root, input.config ?? CONFIG_FILE);
  if (input.deadline !== undefined) config = { ...config, deadlineMs: input.deadline };

  const { provider, decisions, churn } = await collaborators(input, root);
  const cache: AnalysisCache = input.cacheDir ? new FileAnalysisCache(path.resolve(input.cacheDir)) : new MemoryAnalysisCache();
  const engine = new ConflictEngine(config, {
    provider,
    extractor: new TreeSitterExtractor(),
    decisions,
    cache,
    churn,
    logger: log.child({ provider: provider.name }),
  });

  const run = await engine.run();

  let posted = 0;
  if (input.post) {
    for (const report of run.reports) {
      const status = statusFor(report);
      await provider.postComment(report.proposal.id, formatComment(report));
      await provider.setStatus(report.proposal.id, status.state, status.description);
      posted++;
    }
  }

  const highest = run.reports.reduce((m, r) => Math.max(m, r.risk.composite), 0);
  log.info('analyze', {
    ok: true,
    proposals: run.reports.length,
    rejected: run.rejected.length,
    highest_risk: highest,
    skipped_pairs: run.skippedPairs.length,
    duration_ms: run.durationMs,
  });

  return success({
    provider: provider.name,
    riskThreshold: config.riskThreshold,
    exceedsThreshold: run.reports.some((r) => r.exceedsThreshold),
    highestRisk: highest,
    posted,
    ...run,
  });
}
