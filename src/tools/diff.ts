import { diffArrays } from 'diff';

export const CONTEXT_LINES = 3;

const RULE = '='.repeat(60);
const ELLIPSIS = '      ...  │';

export type DiffTag = 'equal' | 'replace' | 'delete' | 'insert';

export type DiffOpcode = {
  tag: DiffTag;
  i1: number;
  i2: number;
  j1: number;
  j2: number;
};

/**
 * Line-level edit script as opcodes over [i1,i2) of `a` and [j1,j2) of `b`.
 * Consecutive removals and additions between two equal spans fold into a
 * single replace (or delete / insert when only one side changed).
 */
export function computeOpcodes(a: string[], b: string[]): DiffOpcode[] {
  const ops: DiffOpcode[] = [];
  let i = 0;
  let j = 0;
  let pendingDel = 0;
  let pendingIns = 0;

  const flush = () => {
    if (!pendingDel && !pendingIns) return;
    const tag: DiffTag = pendingDel && pendingIns ? 'replace' : pendingDel ? 'delete' : 'insert';
    ops.push({ tag, i1: i, i2: i + pendingDel, j1: j, j2: j + pendingIns });
    i += pendingDel;
    j += pendingIns;
    pendingDel = 0;
    pendingIns = 0;
  };

  for (const change of diffArrays(a, b)) {
    const n = change.count ?? change.value.length;
    if (n === 0) continue;
    if (change.removed) {
      pendingDel += n;
    } else if (change.added) {
      pendingIns += n;
    } else {
      flush();
      ops.push({ tag: 'equal', i1: i, i2: i + n, j1: j, j2: j + n });
      i += n;
      j += n;
    }
  }
  flush();
  return ops;
}

function pad(n: number): string {
  return String(n).padStart(4, ' ');
}

function contextLine(oldLines: string[], op: DiffOpcode, i: number): string {
  return ` ${pad(i + 1)} ${pad(op.j1 + (i - op.i1) + 1)} │ ${oldLines[i]}`;
}

/**
 * Render a windowed, numbered diff of two file contents. Only changed regions
 * and up to CONTEXT_LINES of unchanged text around them are printed.
 */
export function renderDiff(oldContent: string, newContent: string, label: string): string {
  const out = [`File changes: ${label}`, RULE];
  if (oldContent === newContent) {
    out.push('No changes');
    return out.join('\n');
  }

  const oldLines = oldContent.split('\n');
  const newLines = newContent.split('\n');
  const ops = computeOpcodes(oldLines, newLines);

  const firstChange = ops.find((op) => op.tag !== 'equal');
  const firstShown = firstChange ? Math.max(0, firstChange.i1 - CONTEXT_LINES) : oldLines.length;
  if (firstShown > 0) out.push(ELLIPSIS);

  ops.forEach((op, idx) => {
    switch (op.tag) {
      case 'equal': {
        const hasPrev = idx > 0;
        const hasNext = idx < ops.length - 1;
        if (hasPrev && hasNext) {
          if (op.i2 - op.i1 > CONTEXT_LINES * 2) {
            for (let i = op.i1; i < op.i1 + CONTEXT_LINES; i++) out.push(contextLine(oldLines, op, i));
            out.push(ELLIPSIS);
            for (let i = op.i2 - CONTEXT_LINES; i < op.i2; i++) out.push(contextLine(oldLines, op, i));
          } else {
            for (let i = op.i1; i < op.i2; i++) out.push(contextLine(oldLines, op, i));
          }
        } else if (hasPrev) {
          const end = Math.min(op.i1 + CONTEXT_LINES, op.i2);
          for (let i = op.i1; i < end; i++) out.push(contextLine(oldLines, op, i));
        } else if (hasNext) {
          for (let i = Math.max(op.i2 - CONTEXT_LINES, op.i1); i < op.i2; i++) {
            out.push(contextLine(oldLines, op, i));
          }
        }
        break;
      }
      case 'replace':
      case 'delete':
      case 'insert':
        for (let i = op.i1; i < op.i2; i++) out.push(`-${pad(i + 1)}      │ ${oldLines[i]}`);
        for (let j = op.j1; j < op.j2; j++) out.push(`+     ${pad(j + 1)} │ ${newLines[j]}`);
        break;
      default: {
        const never: never = op.tag;
        throw new Error(`unknown opcode ${String(never)}`);
      }
    }
  });

  let lastChange: DiffOpcode | undefined;
  for (const op of ops) if (op.tag !== 'equal') lastChange = op;
  const lastShown = lastChange
    ? Math.min(oldLines.length - 1, lastChange.i2 + CONTEXT_LINES - 1)
    : -1;
  if (lastShown < oldLines.length - 1) out.push(ELLIPSIS);

  return out.join('\n');
}
