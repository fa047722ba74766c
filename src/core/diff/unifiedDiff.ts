import { toPosixPath } from '../paths';
import type { FileDiff, Hunk, HunkLine } from '../types';

const GIT_HEADER = /^diff --git a\/(.+?) b\/(.+)$/;
const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

interface PendingFile {
  gitOld?: string;
  gitNew?: string;
  /** null means /dev/null. */
  oldPath?: string | null;
  newPath?: string | null;
  renameFrom?: string;
  renameTo?: string;
  isNew: boolean;
  isDeleted: boolean;
  sawHeaders: boolean;
  hunks: Hunk[];
}

function newPending(): PendingFile {
  return { isNew: false, isDeleted: false, sawHeaders: false, hunks: [] };
}

function headerPath(raw: string): string | null {
  const p = raw.split('\t')[0]?.trim() ?? '';
  if (p === '/dev/null') return null;
  return toPosixPath(p.replace(/^[ab]\//, ''));
}

function finish(f: PendingFile): FileDiff | null {
  const oldP = f.renameFrom ?? (f.oldPath !== undefined ? f.oldPath : f.gitOld ?? null);
  const newP = f.renameTo ?? (f.newPath !== undefined ? f.newPath : f.gitNew ?? null);
  const hunks = f.hunks;
  if (f.isNew || oldP === null) {
    const p = newP ?? oldP;
    return p ? { path: p, change: 'added', hunks } : null;
  }
  if (f.isDeleted || newP === null) return { path: oldP, change: 'removed', hunks };
  if (oldP !== newP) return { path: newP, previousPath: oldP, change: 'renamed', hunks };
  return { path: newP, change: 'modified', hunks };
}

class BlockBuilder {
  private removed: HunkLine[] = [];
  private added: HunkLine[] = [];
  private oldStart = 0;
  private newStart = 0;

  constructor(private readonly out: Hunk[]) {}

  note(oldCursor: number, newCursor: number): void {
    if (this.removed.length === 0 && this.added.length === 0) {
      this.oldStart = oldCursor;
      this.newStart = newCursor;
    }
  }

  remove(line: HunkLine): void {
    this.removed.push(line);
  }

  add(line: HunkLine): void {
    this.added.push(line);
  }

  flush(): void {
    if (this.removed.length === 0 && this.added.length === 0) return;
    const firstRemoved = this.removed[0];
    const lastRemoved = this.removed[this.removed.length - 1];
    const firstAdded = this.added[0];
    const lastAdded = this.added[this.added.length - 1];
    const beforeAnchor = Math.max(0, this.oldStart - 1);
    const afterAnchor = Math.max(0, this.newStart - 1);
    this.out.push({
      before:
        firstRemoved && lastRemoved
          ? { start: firstRemoved.line, end: lastRemoved.line }
          : { start: beforeAnchor, end: beforeAnchor },
      after:
        firstAdded && lastAdded ? { start: firstAdded.line, end: lastAdded.line } : { start: afterAnchor, end: afterAnchor },
      added: this.added,
      removed: this.removed,
    });
    this.removed = [];
    this.added = [];
  }
}

/**
 * Consume one `@@` section starting at `start`; returns the index of the first line after it.
 * Contiguous +/- runs become one hunk each.
 */
function consumeHunk(lines: string[], start: number, header: RegExpExecArray, out: Hunk[]): number {
  const oldCount = header[2] === undefined ? 1 : Number(header[2]);
  const newCount = header[4] === undefined ? 1 : Number(header[4]);
  // A zero count names the line after which the change sits.
  let oldCursor = Number(header[1]) + (oldCount === 0 ? 1 : 0);
  let newCursor = Number(header[3]) + (newCount === 0 ? 1 : 0);
  let oldLeft = oldCount;
  let newLeft = newCount;
  const block = new BlockBuilder(out);

  let i = start;
  while (i < lines.length && (oldLeft > 0 || newLeft > 0)) {
    const line = lines[i] ?? '';
    const tag = line[0];
    if (tag === '\\') {
      i++;
      continue;
    }
    if (tag === '-') {
      block.note(oldCursor, newCursor);
      block.remove({ line: oldCursor, text: line.slice(1) });
      oldCursor++;
      oldLeft--;
    } else if (tag === '+') {
      block.note(oldCursor, newCursor);
      block.add({ line: newCursor, text: line.slice(1) });
      newCursor++;
      newLeft--;
    } else if (tag === ' ' || line === '') {
      block.flush();
      oldCursor++;
      newCursor++;
      oldLeft--;
      newLeft--;
    } else {
      break;
    }
    i++;
  }
  block.flush();
  while (i < lines.length && (lines[i] ?? '').startsWith('\\')) i++;
  return i;
}

/** Parse multi-file unified diff text (`git diff` output or plain `---`/`+++` patches). */
export function parseUnifiedDiff(text: string): FileDiff[] {
  const lines = text.split(/\r?\n/);
  const files: FileDiff[] = [];
  let cur: PendingFile | null = null;

  const close = () => {
    if (!cur) return;
    const done = finish(cur);
    if (done) files.push(done);
    cur = null;
  };

  let i = 0;
  while (i < lines.length) {
    const line = lines[i] ?? '';

    const git = GIT_HEADER.exec(line);
    if (git) {
      close();
      cur = newPending();
      cur.gitOld = toPosixPath(git[1] ?? '');
      cur.gitNew = toPosixPath(git[2] ?? '');
      i++;
      continue;
    }

    const next = lines[i + 1] ?? '';
    if (line.startsWith('--- ') && next.startsWith('+++ ')) {
      if (!cur || cur.sawHeaders) {
        close();
        cur = newPending();
      }
      cur.oldPath = headerPath(line.slice(4));
      cur.newPath = headerPath(next.slice(4));
      cur.sawHeaders = true;
      i += 2;
      continue;
    }

    const hunk = HUNK_HEADER.exec(line);
    if (hunk && cur) {
      i = consumeHunk(lines, i + 1, hunk, cur.hunks);
      continue;
    }

    if (cur) {
      if (line.startsWith('new file mode')) cur.isNew = true;
      else if (line.startsWith('deleted file mode')) cur.isDeleted = true;
      else if (line.startsWith('rename from ')) cur.renameFrom = toPosixPath(line.slice('rename from '.length).trim());
      else if (line.startsWith('rename to ')) cur.renameTo = toPosixPath(line.slice('rename to '.length).trim());
    }
    i++;
  }
  close();
  return files;
}
