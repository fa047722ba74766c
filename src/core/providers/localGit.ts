import fs from 'fs-extra';
import path from 'path';
import simpleGit from 'simple-git';
import type { ChurnProvider, HostingProvider, StatusState } from '../collaborators';
import { parseUnifiedDiff } from '../diff/unifiedDiff';
import { ProviderError, errorMessage } from '../errors';
import { createLogger, type Logger } from '../log';
import { toPosixPath } from '../paths';
import type { AutomationSignals, ChangeProposal, FileDiff } from '../types';

const RECORD = '\x1e';
const FIELD = '\x1f';

export interface LocalGitOptions {
  repoRoot: string;
  /** Branch every proposal targets. */
  targetBranch?: string;
  /** Only local branches under this prefix are proposals, e.g. `feature/`. */
  branchPrefix?: string;
  /** Where comments and statuses are appended. */
  notesFile?: string;
  /** How many target-branch commits feed the churn rate. */
  churnDepth?: number;
  /** Runs git; defaults to simple-git in `repoRoot`. */
  git?: GitRunner;
  logger?: Logger;
}

/** The two git entry points the provider needs. */
export interface GitRunner {
  raw(args: string[]): Promise<string>;
  show(args: string[]): Promise<string>;
}

function simpleGitRunner(repoRoot: string): GitRunner {
  const git = simpleGit(path.resolve(repoRoot));
  return {
    raw: (args) => git.raw(args),
    show: (args) => git.show(args),
  };
}

export interface BranchEntry {
  branch: string;
  author: string;
  subject: string;
}

export interface CommitEntry {
  author: string;
  email: string;
  message: string;
}

export interface ChurnCommit {
  subject: string;
  files: string[];
}

export function parseBranchList(raw: string): BranchEntry[] {
  const out: BranchEntry[] = [];
  for (const line of raw.split('\n')) {
    if (!line.trim()) continue;
    const [branch = '', author = '', subject = ''] = line.split('\t');
    if (branch) out.push({ branch: branch.trim(), author: author.trim(), subject: subject.trim() });
  }
  return out;
}

export function parseCommitLog(raw: string): CommitEntry[] {
  const out: CommitEntry[] = [];
  for (const rec of raw.split(RECORD)) {
    if (!rec.trim()) continue;
    const [author = '', email = '', message = ''] = rec.replace(/^\n+/, '').split(FIELD);
    out.push({ author: author.trim(), email: email.trim(), message: message.trim() });
  }
  return out;
}

export function parseChurnLog(raw: string): ChurnCommit[] {
  const out: ChurnCommit[] = [];
  for (const rec of raw.split(RECORD)) {
    const lines = rec.split('\n').map((l) => l.trim());
    const subject = lines.shift() ?? '';
    if (!subject && lines.every((l) => !l)) continue;
    out.push({ subject, files: lines.filter(Boolean).map(toPosixPath) });
  }
  return out;
}

const BOT_AUTHOR = /\[bot\]|(^|[-_.])bot($|[-_.@])|dependabot|renovate/i;
const ASSISTANT_COAUTHOR = /^co-authored-by:.*\b(copilot|claude|cursor|devin|codex|aider|gpt)\b/im;
const GENERATED_TRAILER = /^(generated-by|assisted-by):/im;

/** Share of commits carrying a machine-authorship signal, with the signals seen. */
export function automationFromCommits(commits: readonly CommitEntry[]): AutomationSignals {
  if (commits.length === 0) return { confidence: 0, signals: [] };
  const signals = new Set<string>();
  let flagged = 0;
  for (const c of commits) {
    const hits: string[] = [];
    if (BOT_AUTHOR.test(c.author) || BOT_AUTHOR.test(c.email)) hits.push('bot-author');
    if (ASSISTANT_COAUTHOR.test(c.message)) hits.push('assistant-co-author');
    if (GENERATED_TRAILER.test(c.message)) hits.push('generated-trailer');
    if (hits.length > 0) flagged++;
    hits.forEach((h) => signals.add(h));
  }
  return { confidence: flagged / commits.length, signals: Array.from(signals).sort() };
}

const FIX_SUBJECT = /\b(revert|hotfix|hot-fix)\b/i;

/** Per path: commits whose subject marks a revert or hotfix, over all commits touching it. */
export function churnRates(commits: readonly ChurnCommit[], paths: readonly string[]): Map<string, number> {
  const wanted = new Set(paths);
  const total = new Map<string, number>();
  const fixes = new Map<string, number>();
  for (const c of commits) {
    const isFix = FIX_SUBJECT.test(c.subject);
    for (const f of new Set(c.files)) {
      if (!wanted.has(f)) continue;
      total.set(f, (total.get(f) ?? 0) + 1);
      if (isFix) fixes.set(f, (fixes.get(f) ?? 0) + 1);
    }
  }
  const out = new Map<string, number>();
  for (const p of paths) {
    const n = total.get(p);
    if (n) out.set(p, (fixes.get(p) ?? 0) / n);
  }
  return out;
}

/** Local branches as proposals against one target branch. */
export class LocalGitProvider implements HostingProvider, ChurnProvider {
  readonly name = 'local-git';
  private readonly git: GitRunner;
  private readonly log: Logger;
  private readonly target: string;
  private readonly prefix: string;
  private readonly notesFile: string;
  private readonly churnDepth: number;

  constructor(options: LocalGitOptions) {
    this.git = options.git ?? simpleGitRunner(options.repoRoot);
    this.log = options.logger ?? createLogger({ component: 'local-git' });
    this.target = options.targetBranch ?? 'main';
    this.prefix = options.branchPrefix ?? '';
    this.notesFile = options.notesFile ?? path.join(options.repoRoot, '.merge-radar', 'notes.jsonl');
    this.churnDepth = options.churnDepth ?? 500;
  }

  async listOpenProposals(limit: number): Promise<ChangeProposal[]> {
    const pattern = `refs/heads/${this.prefix}`;
    let raw: string;
    try {
      raw = await this.git.raw(['for-each-ref', '--format=%(refname:short)%09%(authorname)%09%(subject)', pattern]);
    } catch (e) {
      throw new ProviderError(this.name, `cannot list branches: ${errorMessage(e)}`, { cause: e });
    }
    const branches = parseBranchList(raw)
      .filter((b) => b.branch !== this.target && b.branch.startsWith(this.prefix))
      .slice(0, limit);

    const out: ChangeProposal[] = [];
    for (const b of branches) {
      const baseRef = await this.mergeBase(b.branch);
      const log = await this.git.raw(['log', `--format=%an${FIELD}%ae${FIELD}%B${RECORD}`, `${this.target}..${b.branch}`]);
      out.push({
        id: b.branch,
        title: b.subject,
        sourceRef: b.branch,
        targetRef: this.target,
        baseRef,
        author: b.author,
        labels: [],
        automation: automationFromCommits(parseCommitLog(log)),
      });
    }
    return out;
  }

  /** Branches with no common history are diffed against the target itself. */
  private async mergeBase(branch: string): Promise<string> {
    try {
      return (await this.git.raw(['merge-base', this.target, branch])).trim();
    } catch (e) {
      this.log.warn('merge_base_failed', { branch, target: this.target, err: errorMessage(e) });
      return this.target;
    }
  }

  async getFileDiffs(proposalId: string): Promise<FileDiff[]> {
    let raw: string;
    try {
      raw = await this.git.raw(['diff', '--find-renames', '--no-color', `${this.target}...${proposalId}`]);
    } catch (e) {
      throw new ProviderError(this.name, `cannot diff ${proposalId}: ${errorMessage(e)}`, { cause: e });
    }
    return parseUnifiedDiff(raw);
  }

  async getFileContent(filePath: string, ref: string): Promise<string | null> {
    try {
      return await this.git.show([`${ref}:${filePath}`]);
    } catch {
      // not present at this ref
      return null;
    }
  }

  async listFiles(ref: string): Promise<string[]> {
    const raw = await this.git.raw(['ls-tree', '-r', '--name-only', ref]);
    return raw
      .split('\n')
      .map((l) => l.trim())
      .filter(Boolean)
      .map(toPosixPath)
      .sort();
  }

  private async appendNote(entry: Record<string, unknown>): Promise<void> {
    await fs.ensureDir(path.dirname(this.notesFile));
    await fs.appendFile(this.notesFile, JSON.stringify({ ...entry, at: new Date().toISOString() }) + '\n', 'utf-8');
  }

  async postComment(proposalId: string, body: string): Promise<void> {
    await this.appendNote({ kind: 'comment', proposalId, body });
  }

  async setStatus(proposalId: string, state: StatusState, description: string): Promise<void> {
    await this.appendNote({ kind: 'status', proposalId, state, description });
  }

  async churn(paths: readonly string[]): Promise<Map<string, number>> {
    if (paths.length === 0) return new Map();
    const raw = await this.git.raw([
      'log',
      `-n${this.churnDepth}`,
      `--format=${RECORD}%s`,
      '--name-only',
      this.target,
      '--',
      ...paths,
    ]);
    return churnRates(parseChurnLog(raw), paths);
  }
}
