export type DiffLineKind = 'context' | 'add' | 'del';

export interface DiffLine {
  kind: DiffLineKind;
  text: string;
}

export interface DiffHunk {
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  lines: DiffLine[];
}

/**
 * Minimal line edit script turning `oldLines` into `newLines`. Within a change
 * run, deletions come before additions.
 */
export function diffLines(oldLines: readonly string[], newLines: readonly string[]): DiffLine[] {
  let prefix = 0;
  while (prefix < oldLines.length && prefix < newLines.length && oldLines[prefix] === newLines[prefix]) prefix++;
  let suffix = 0;
  while (
    suffix < oldLines.length - prefix &&
    suffix < newLines.length - prefix &&
    oldLines[oldLines.length - 1 - suffix] === newLines[newLines.length - 1 - suffix]
  ) {
    suffix++;
  }

  const a = oldLines.slice(prefix, oldLines.length - suffix);
  const b = newLines.slice(prefix, newLines.length - suffix);
  const width = b.length + 1;
  // lcs[i * width + j]: longest common subsequence of a[i..] and b[j..]
  const lcs = new Uint32Array((a.length + 1) * width);
  const at = (i: number, j: number): number => lcs[i * width + j] ?? 0;
  for (let i = a.length - 1; i >= 0; i--) {
    for (let j = b.length - 1; j >= 0; j--) {
      lcs[i * width + j] = a[i] === b[j] ? at(i + 1, j + 1) + 1 : Math.max(at(i + 1, j), at(i, j + 1));
    }
  }

  const out: DiffLine[] = oldLines.slice(0, prefix).map((text) => ({ kind: 'context', text }));
  let i = 0;
  let j = 0;
  while (i < a.length || j < b.length) {
    const left = a[i];
    const right = b[j];
    if (left !== undefined && right !== undefined && left === right) {
      out.push({ kind: 'context', text: left });
      i++;
      j++;
    } else if (left !== undefined && (right === undefined || at(i + 1, j) >= at(i, j + 1))) {
      out.push({ kind: 'del', text: left });
      i++;
    } else if (right !== undefined) {
      out.push({ kind: 'add', text: right });
      j++;
    }
  }
  for (const text of oldLines.slice(oldLines.length - suffix)) out.push({ kind: 'context', text });
  return out;
}

/**
 * Groups an edit script into hunks carrying `context` unchanged lines around
 * each change. Changes closer than twice the context share a hunk.
 */
export function toHunks(script: readonly DiffLine[], context = 1): DiffHunk[] {
  const oldAt: number[] = [];
  const newAt: number[] = [];
  let oldNo = 1;
  let newNo = 1;
  const changes: number[] = [];
  script.forEach((line, idx) => {
    oldAt.push(oldNo);
    newAt.push(newNo);
    if (line.kind !== 'add') oldNo++;
    if (line.kind !== 'del') newNo++;
    if (line.kind !== 'context') changes.push(idx);
  });

  const ranges: Array<[number, number]> = [];
  for (const idx of changes) {
    const start = Math.max(0, idx - context);
    const end = Math.min(script.length - 1, idx + context);
    const last = ranges[ranges.length - 1];
    if (last && start <= last[1] + 1) last[1] = end;
    else ranges.push([start, end]);
  }

  return ranges.map(([start, end]) => {
    const lines = script.slice(start, end + 1).map((l) => ({ ...l }));
    return {
      oldStart: oldAt[start] ?? 1,
      oldLines: lines.filter((l) => l.kind !== 'add').length,
      newStart: newAt[start] ?? 1,
      newLines: lines.filter((l) => l.kind !== 'del').length,
      lines,
    };
  });
}

export interface FormatHunksOptions {
  /** Emit `@@ -a,b +c,d @@` before each hunk. Without headers, hunks are separated by an empty line. */
  headers?: boolean;
}

const PREFIX: Record<DiffLineKind, string> = { context: ' ', add: '+', del: '-' };

export function formatHunks(hunks: readonly DiffHunk[], opts: FormatHunksOptions = {}): string {
  const out: string[] = [];
  for (const [i, h] of hunks.entries()) {
    if (!opts.headers && i > 0) out.push('');
    if (opts.headers) out.push(`@@ -${h.oldStart},${h.oldLines} +${h.newStart},${h.newLines} @@`);
    for (const line of h.lines) out.push(`${PREFIX[line.kind]}${line.text}`);
  }
  return out.join('\n');
}
