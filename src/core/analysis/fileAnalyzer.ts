import type { AnalysisCache, AstExtractor, ExtractOutcome, HostingProvider } from '../collaborators';
import { sha256Hex } from '../crypto';
import { errorMessage } from '../errors';
import type { Logger } from '../log';
import { parseFileAnalysis } from '../schemas';

export type FileOutcome = ExtractOutcome | { status: 'missing'; message: string };

/**
 * Fetches file contents and extracts symbols, sharing in-flight work between callers.
 * Extraction results are cached by (path, content digest); the cache only saves time.
 */
export class FileAnalyzer {
  private readonly contents = new Map<string, Promise<string | null>>();
  private readonly extractions = new Map<string, Promise<ExtractOutcome>>();

  constructor(
    private readonly provider: HostingProvider,
    private readonly extractor: AstExtractor | undefined,
    private readonly cache: AnalysisCache | undefined,
    private readonly log: Logger,
  ) {}

  supports(filePath: string): boolean {
    return this.extractor?.supports(filePath) ?? false;
  }

  private content(filePath: string, ref: string): Promise<string | null> {
    const key = `${ref}\0${filePath}`;
    let pending = this.contents.get(key);
    if (!pending) {
      pending = this.provider.getFileContent(filePath, ref);
      this.contents.set(key, pending);
    }
    return pending;
  }

  private extract(filePath: string, content: string): Promise<ExtractOutcome> {
    const digest = sha256Hex(content);
    const key = `${filePath}\0${digest}`;
    let pending = this.extractions.get(key);
    if (!pending) {
      pending = this.extractUncached(filePath, content, digest);
      this.extractions.set(key, pending);
    }
    return pending;
  }

  private async extractUncached(filePath: string, content: string, digest: string): Promise<ExtractOutcome> {
    const extractor = this.extractor;
    if (!extractor) return { status: 'unsupported' };
    const cacheKey = { path: filePath, digest };

    if (this.cache) {
      try {
        const hit = await this.cache.get(cacheKey);
        if (hit) return hit;
      } catch (e) {
        this.log.debug('cache_read_failed', { file: filePath, err: errorMessage(e) });
      }
    }

    let outcome: ExtractOutcome;
    try {
      outcome = extractor.extract(filePath, content);
      if (outcome.status === 'ok') {
        outcome = { status: 'ok', analysis: parseFileAnalysis(outcome.analysis, `symbols of ${filePath}`) };
      }
    } catch (e) {
      outcome = { status: 'parse-error', message: errorMessage(e) };
    }

    if (this.cache) {
      try {
        await this.cache.set(cacheKey, outcome);
      } catch (e) {
        this.log.warn('cache_write_failed', { file: filePath, err: errorMessage(e) });
      }
    }
    return outcome;
  }

  /** Analyze `filePath` as it exists at `ref`. Unsupported files are not fetched. */
  async analyze(filePath: string, ref: string): Promise<FileOutcome> {
    if (!this.supports(filePath)) return { status: 'unsupported' };
    let content: string | null;
    try {
      content = await this.content(filePath, ref);
    } catch (e) {
      return { status: 'missing', message: errorMessage(e) };
    }
    if (content === null) return { status: 'missing', message: `${filePath} not found at ${ref}` };
    return this.extract(filePath, content);
  }
}
