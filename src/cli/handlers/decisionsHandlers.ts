import path from 'path';
import { createLogger } from '../../core/log';
import { DecisionsLog } from '../../core/providers/decisionsLog';
import type { ListDecisionsInput, RecordDecisionInput } from '../schemas/decisionsSchemas';
import type { CLIError, CLIResult } from '../types';
import { success } from '../types';

function openLog(input: { log?: string; repo: string }): DecisionsLog {
  return input.log ? new DecisionsLog(path.resolve(input.log)) : DecisionsLog.forRepo(path.resolve(input.repo));
}

export async function handleRecordDecision(input: RecordDecisionInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'decisions:record' });
  const store = openLog(input);
  const decision = await store.recordMerge({
    kind: input.kind,
    entity: input.entity,
    module: input.module,
    file: input.file,
    oldPattern: input.oldPattern,
    newPattern: input.newPattern,
    proposalRef: input.proposal,
    description: input.description,
    timestamp: input.timestamp ?? new Date().toISOString(),
  });
  log.info('decision_recorded', { file: store.file, kind: decision.kind, entity: decision.entity });
  return success({ file: store.file, decision });
}

export async function handleListDecisions(input: ListDecisionsInput): Promise<CLIResult | CLIError> {
  const store = openLog(input);
  const decisions = await store.recent(input.depth);
  return success({ file: store.file, count: decisions.length, decisions });
}
