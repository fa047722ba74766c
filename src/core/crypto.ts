import crypto from 'crypto';

export function sha256Hex(input: string): string {
  return crypto.createHash('sha256').update(input).digest('hex');
}

/** Short, filesystem-safe key built from several parts. */
export function cacheKey(...parts: string[]): string {
  return sha256Hex(parts.join('\0')).slice(0, 24);
}
