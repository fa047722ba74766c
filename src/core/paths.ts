export function toPosixPath(p: string): string {
  return String(p).replace(/\\/g, '/');
}

export function splitPosixPath(p: string): string[] {
  return toPosixPath(p).split('/').filter(Boolean);
}

/** Collapse `.` and `..` segments of a repository-relative posix path. */
export function normalizeRepoPath(p: string): string {
  const out: string[] = [];
  for (const seg of splitPosixPath(p)) {
    if (seg === '.') continue;
    if (seg === '..') {
      out.pop();
      continue;
    }
    out.push(seg);
  }
  return out.join('/');
}

export function dirnamePosix(p: string): string {
  const parts = splitPosixPath(p);
  parts.pop();
  return parts.join('/');
}

export function stripExtension(p: string): string {
  const posix = toPosixPath(p);
  const slash = posix.lastIndexOf('/');
  const dot = posix.lastIndexOf('.');
  return dot > slash + 1 ? posix.slice(0, dot) : posix;
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const globCache = new Map<string, RegExp>();

/**
 * Convert a glob to an anchored regex.
 * `**` crosses directory boundaries, `*` and `?` do not.
 */
export function globToRegex(pattern: string): RegExp {
  const cached = globCache.get(pattern);
  if (cached) return cached;

  const src = toPosixPath(pattern);
  let body = '';
  for (let i = 0; i < src.length; i++) {
    const ch = src[i];
    if (ch === '*' && src[i + 1] === '*') {
      if (src[i + 2] === '/') {
        body += '(?:.*/)?';
        i += 2;
      } else {
        body += '.*';
        i += 1;
      }
      continue;
    }
    if (ch === '*') {
      body += '[^/]*';
      continue;
    }
    if (ch === '?') {
      body += '[^/]';
      continue;
    }
    body += escapeRegex(ch ?? '');
  }

  const re = new RegExp(`^${body}$`);
  globCache.set(pattern, re);
  return re;
}

/** Patterns without a slash match the basename anywhere in the tree. */
export function matchesGlob(filePath: string, pattern: string): boolean {
  const posix = normalizeRepoPath(filePath);
  const pat = toPosixPath(pattern).replace(/^\.\//, '');
  if (!pat.includes('/')) {
    const base = posix.slice(posix.lastIndexOf('/') + 1);
    return globToRegex(pat).test(base);
  }
  return globToRegex(pat).test(posix);
}

export function matchesAnyGlob(filePath: string, patterns: readonly string[]): boolean {
  return patterns.some((p) => matchesGlob(filePath, p));
}
