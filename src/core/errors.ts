import type { ZodError } from 'zod';

export interface ShapeIssue {
  path: string;
  message: string;
}

export function issuesFromZod(err: ZodError): ShapeIssue[] {
  return err.issues.map((i) => ({ path: i.path.join('.'), message: i.message }));
}

function formatIssues(issues: ShapeIssue[]): string {
  return issues.map((i) => `  [${i.path || '<root>'}] ${i.message}`).join('\n');
}

/**
 * Malformed diff, symbol or proposal data handed to the engine.
 * Raised at the boundary; values are never coerced into shape.
 */
export class InputShapeError extends Error {
  public readonly source: string;
  public readonly issues: ShapeIssue[];

  constructor(source: string, issues: ShapeIssue[]) {
    super(`Invalid ${source}:\n${formatIssues(issues)}`);
    this.name = 'InputShapeError';
    this.source = source;
    this.issues = issues;
    Object.setPrototypeOf(this, InputShapeError.prototype);
  }
}

/** Invalid configuration. Always raised before any proposal is analyzed. */
export class ConfigError extends Error {
  public readonly file: string | null;
  public readonly issues: ShapeIssue[];

  constructor(file: string | null, issues: ShapeIssue[]) {
    super(`Invalid configuration${file ? ` (${file})` : ''}:\n${formatIssues(issues)}`);
    this.name = 'ConfigError';
    this.file = file;
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/** A collaborator (hosting provider, git, cache) failed to answer. */
export class ProviderError extends Error {
  public readonly provider: string;

  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super(`${provider}: ${message}`, options);
    this.name = 'ProviderError';
    this.provider = provider;
    Object.setPrototypeOf(this, ProviderError.prototype);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
