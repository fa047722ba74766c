import type { SimilarityMeasure } from '../collaborators';
import type { Logger } from '../log';
import { errorMessage } from '../errors';
import type { ChangedSymbol } from '../types';

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/\w+/g) ?? []).slice();
}

/** Token-set Jaccard. Two empty sequences are not considered similar. */
export const jaccardSimilarity: SimilarityMeasure = (a, b) => {
  const sa = new Set(a);
  const sb = new Set(b);
  if (sa.size === 0 || sb.size === 0) return 0;
  let inter = 0;
  for (const t of sa) if (sb.has(t)) inter++;
  return inter / (sa.size + sb.size - inter);
};

function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[_\-$]/g, '');
}

export function nameSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  const na = normalizeName(a);
  const nb = normalizeName(b);
  if (na === nb) return 0.95;
  if (na.length > 0 && nb.length > 0 && (na.startsWith(nb) || nb.startsWith(na))) return 0.7;
  const ca = new Set(na);
  const cb = new Set(nb);
  const denom = Math.max(ca.size, cb.size);
  if (denom === 0) return 0;
  let shared = 0;
  for (const c of ca) if (cb.has(c)) shared++;
  return (shared / denom) * 0.5;
}

/** Signature and body tokens of an added symbol. */
export function symbolTokens(cs: ChangedSymbol): string[] {
  const sig = cs.symbol.signature;
  const parts = [
    ...sig.params.map((p) => `${p.name} ${p.type ?? ''}`),
    sig.returns ?? '',
    ...cs.addedLines,
  ];
  return tokenize(parts.join('\n'));
}

export interface SimilarityResult {
  value: number;
  fellBack: boolean;
}

/**
 * Run a pluggable measure; a throw or an out-of-range answer falls back to Jaccard.
 */
export async function measureSimilarity(
  measure: SimilarityMeasure | undefined,
  a: readonly string[],
  b: readonly string[],
  log?: Logger,
): Promise<SimilarityResult> {
  if (!measure) return { value: await jaccardSimilarity(a, b), fellBack: false };
  try {
    const v = await measure(a, b);
    if (Number.isFinite(v) && v >= 0 && v <= 1) return { value: v, fellBack: false };
    log?.warn('similarity_fallback', { reason: `measure returned ${String(v)}` });
  } catch (e) {
    log?.warn('similarity_fallback', { reason: errorMessage(e) });
  }
  return { value: await jaccardSimilarity(a, b), fellBack: true };
}

/** Weighted blend: 40% name, 60% signature and body tokens. */
export async function duplicationScore(
  x: ChangedSymbol,
  y: ChangedSymbol,
  measure: SimilarityMeasure | undefined,
  log?: Logger,
): Promise<SimilarityResult> {
  const tokens = await measureSimilarity(measure, symbolTokens(x), symbolTokens(y), log);
  return { value: nameSimilarity(x.symbol.name, y.symbol.name) * 0.4 + tokens.value * 0.6, fellBack: tokens.fellBack };
}
