import { handleAnalyze } from './handlers/analyzeHandlers';
import { handleConfigCheck } from './handlers/configHandlers';
import { handleListDecisions, handleRecordDecision } from './handlers/decisionsHandlers';
import { AnalyzeSchema } from './schemas/analyzeSchemas';
import { ConfigCheckSchema } from './schemas/configSchemas';
import { ListDecisionsSchema, RecordDecisionSchema } from './schemas/decisionsSchemas';
import { register, type RegisteredHandler } from './types';

/**
 * Registry of all CLI command handlers.
 *
 * Command keys follow the pattern:
 * - Top-level commands: 'analyze'
 * - Subcommands: 'decisions:record', 'config:check'
 */
export const cliHandlers: Record<string, RegisteredHandler> = {
  analyze: register({ schema: AnalyzeSchema, handler: handleAnalyze }),
  'decisions:record': register({ schema: RecordDecisionSchema, handler: handleRecordDecision }),
  'decisions:list': register({ schema: ListDecisionsSchema, handler: handleListDecisions }),
  'config:check': register({ schema: ConfigCheckSchema, handler: handleConfigCheck }),
};
