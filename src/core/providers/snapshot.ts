import fs from 'fs-extra';
import { z } from 'zod';
import type { ChurnProvider, DecisionsReader, HostingProvider, StatusState } from '../collaborators';
import { parseUnifiedDiff } from '../diff/unifiedDiff';
import { InputShapeError, ProviderError, errorMessage, issuesFromZod } from '../errors';
import { ChangeProposalSchema, DecisionSchema } from '../schemas';
import type { ChangeProposal, Decision } from '../types';
import { newestFirst } from './decisionsLog';

export const SnapshotSchema = z.object({
  proposals: z.array(
    ChangeProposalSchema.extend({
      /** Structured diffs, validated by the engine. */
      diffs: z.array(z.unknown()).optional(),
      /** Raw unified diff text, used when `diffs` is absent. */
      patch: z.string().optional(),
    }),
  ),
  /** ref -> path -> file text */
  contents: z.record(z.record(z.string())).default({}),
  decisions: z.array(DecisionSchema).default([]),
  churn: z.record(z.number().min(0).max(1)).optional(),
});

export type Snapshot = z.output<typeof SnapshotSchema>;

export interface PostedComment {
  proposalId: string;
  body: string;
}

export interface PostedStatus {
  proposalId: string;
  state: StatusState;
  description: string;
}

/** Serves a recorded set of open proposals. Comments and statuses stay in memory. */
export class SnapshotProvider implements HostingProvider, ChurnProvider, DecisionsReader {
  readonly name = 'snapshot';
  readonly comments: PostedComment[] = [];
  readonly statuses: PostedStatus[] = [];

  constructor(private readonly snapshot: Snapshot) {}

  static fromObject(raw: unknown, source = 'snapshot'): SnapshotProvider {
    const res = SnapshotSchema.safeParse(raw);
    if (!res.success) throw new InputShapeError(source, issuesFromZod(res.error));
    return new SnapshotProvider(res.data);
  }

  static async fromFile(file: string): Promise<SnapshotProvider> {
    let raw: unknown;
    try {
      raw = await fs.readJson(file);
    } catch (e) {
      throw new InputShapeError(file, [{ path: '', message: `cannot read snapshot: ${errorMessage(e)}` }]);
    }
    return SnapshotProvider.fromObject(raw, file);
  }

  get hasChurn(): boolean {
    return this.snapshot.churn !== undefined;
  }

  get hasDecisions(): boolean {
    return this.snapshot.decisions.length > 0;
  }

  private find(id: string) {
    const p = this.snapshot.proposals.find((x) => x.id === id);
    if (!p) throw new ProviderError(this.name, `unknown proposal ${id}`);
    return p;
  }

  async listOpenProposals(limit: number): Promise<ChangeProposal[]> {
    return this.snapshot.proposals.slice(0, limit).map(({ diffs: _diffs, patch: _patch, ...proposal }) => proposal);
  }

  async getFileDiffs(proposalId: string): Promise<unknown[]> {
    const p = this.find(proposalId);
    if (p.diffs) return p.diffs;
    return p.patch ? parseUnifiedDiff(p.patch) : [];
  }

  async getFileContent(filePath: string, ref: string): Promise<string | null> {
    return this.snapshot.contents[ref]?.[filePath] ?? null;
  }

  async listFiles(ref: string): Promise<string[]> {
    return Object.keys(this.snapshot.contents[ref] ?? {}).sort();
  }

  async postComment(proposalId: string, body: string): Promise<void> {
    this.find(proposalId);
    this.comments.push({ proposalId, body });
  }

  async setStatus(proposalId: string, state: StatusState, description: string): Promise<void> {
    this.find(proposalId);
    this.statuses.push({ proposalId, state, description });
  }

  async churn(paths: readonly string[]): Promise<Map<string, number>> {
    const rates = this.snapshot.churn ?? {};
    const out = new Map<string, number>();
    for (const p of paths) {
      const r = rates[p];
      if (r !== undefined) out.set(p, r);
    }
    return out;
  }

  async recent(depth: number): Promise<Decision[]> {
    return newestFirst(this.snapshot.decisions).slice(0, depth);
  }
}
