import { z, ZodSchema } from 'zod';
import { ConfigError, InputShapeError, ProviderError } from '../core/errors';
import { createLogger } from '../core/log';

/**
 * Successful command output, printed as JSON on stdout.
 * `command`, `timestamp` and `duration_ms` are filled in by `executeHandler`.
 */
export interface CLIResult {
  ok: true;
  command?: string;
  timestamp?: string;
  duration_ms?: number;
  [key: string]: unknown;
}

/** Failed command output, printed as JSON on stderr. `reason` is machine-readable. */
export interface CLIError {
  ok: false;
  reason: string;
  message?: string;
  command?: string;
  timestamp?: string;
  hint?: string;
  [key: string]: unknown;
}

export type CLIHandler<TInput = unknown> = (input: TInput) => Promise<CLIResult | CLIError>;

export interface HandlerRegistration<TInput = unknown> {
  schema: ZodSchema<TInput, z.ZodTypeDef, unknown>;
  handler: CLIHandler<TInput>;
}

/** A registration whose input type has been checked at the point of definition. */
export interface RegisteredHandler {
  run(rawInput: unknown): Promise<CLIResult | CLIError>;
}

export function register<TInput>(registration: HandlerRegistration<TInput>): RegisteredHandler {
  return {
    run: async (rawInput) => registration.handler(registration.schema.parse(rawInput)),
  };
}

export const ErrorReasons = {
  VALIDATION_ERROR: 'validation_error',
  CONFIG_INVALID: 'config_invalid',
  CONFIG_NOT_FOUND: 'config_not_found',
  INVALID_INPUT: 'invalid_input',
  PROVIDER_FAILED: 'provider_failed',
  INTERNAL_ERROR: 'internal_error',
} as const;

export const ErrorHints = {
  VALIDATION_ERROR: 'Check command syntax with --help',
  CONFIG_INVALID: 'Fix the reported keys, then run "merge-radar config check"',
  CONFIG_NOT_FOUND: 'Pass an existing file with --config',
  INVALID_INPUT: 'The snapshot or decisions file does not match the expected shape',
  PROVIDER_FAILED: 'Check that the repository and target branch exist',
} as const;

function print(stream: NodeJS.WriteStream, payload: unknown): void {
  stream.write(JSON.stringify(payload, null, 2) + '\n');
}

/**
 * Execute a CLI handler with validation and error handling.
 *
 * Exit codes: 0 on success, 2 for invalid arguments, configuration or input,
 * 1 for anything unexpected.
 *
 * @example
 * ```typescript
 * .action(async (options) => {
 *   await executeHandler('analyze', options);
 * })
 * ```
 */
export async function executeHandler(commandKey: string, rawInput: unknown): Promise<void> {
  const { cliHandlers } = await import('./registry');
  const startedAt = Date.now();
  const timestamp = new Date().toISOString();

  const handler = cliHandlers[commandKey];
  if (!handler) {
    print(process.stderr, {
      ok: false,
      reason: 'unknown_command',
      command: commandKey,
      timestamp,
      hint: 'Run "merge-radar --help" to see available commands',
    });
    process.exitCode = 1;
    return;
  }

  const log = createLogger({ component: 'cli', cmd: commandKey });

  try {
    const result = await handler.run(rawInput);
    const duration_ms = Date.now() - startedAt;
    if (result.ok) {
      print(process.stdout, { ...result, command: commandKey, timestamp, duration_ms });
      process.exitCode = 0;
    } else {
      print(process.stderr, { ...result, command: commandKey, timestamp, duration_ms });
      process.exitCode = 2;
    }
  } catch (e) {
    const duration_ms = Date.now() - startedAt;
    const base = { ok: false, command: commandKey, timestamp, duration_ms };

    if (e instanceof z.ZodError) {
      const errors = e.issues.map((err: z.ZodIssue) => ({
        path: err.path.join('.'),
        message: err.message,
        code: err.code,
      }));
      print(process.stderr, {
        ...base,
        reason: ErrorReasons.VALIDATION_ERROR,
        message: 'Invalid command arguments',
        errors,
        hint: ErrorHints.VALIDATION_ERROR,
      });
      process.exitCode = 2;
      return;
    }

    if (e instanceof ConfigError) {
      print(process.stderr, {
        ...base,
        reason: ErrorReasons.CONFIG_INVALID,
        message: e.message,
        file: e.file,
        errors: e.issues,
        hint: ErrorHints.CONFIG_INVALID,
      });
      process.exitCode = 2;
      return;
    }

    if (e instanceof InputShapeError) {
      print(process.stderr, {
        ...base,
        reason: ErrorReasons.INVALID_INPUT,
        message: e.message,
        source: e.source,
        errors: e.issues,
        hint: ErrorHints.INVALID_INPUT,
      });
      process.exitCode = 2;
      return;
    }

    if (e instanceof ProviderError) {
      log.warn(commandKey, { ok: false, provider: e.provider, err: e.message });
      print(process.stderr, { ...base, reason: ErrorReasons.PROVIDER_FAILED, message: e.message, hint: ErrorHints.PROVIDER_FAILED });
      process.exitCode = 2;
      return;
    }

    const errorDetails = e instanceof Error ? { name: e.name, message: e.message, stack: e.stack } : { message: String(e) };
    log.error(commandKey, { ok: false, err: errorDetails });
    print(process.stderr, {
      ...base,
      reason: ErrorReasons.INTERNAL_ERROR,
      message: e instanceof Error ? e.message : String(e),
      hint: 'An unexpected error occurred. Check logs for details.',
    });
    process.exitCode = 1;
  }
}

export function success(data: Record<string, unknown>): CLIResult {
  return { ok: true, ...data };
}

export function error(reason: string, details?: Record<string, unknown>): CLIError {
  return { ok: false, reason, ...details };
}
