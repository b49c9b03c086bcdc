import { spawn } from 'node:child_process';
import fs from 'node:fs/promises';
import path from 'node:path';

import { ToolError } from './tool-error.js';

export type SearchBackend = 'rg' | 'grep' | 'walk';

export type SearchOptions = {
  cwd: string;
  maxResults?: number;
  timeoutSec?: number;
  /** Backends tried in order. Defaults to ripgrep, grep, then the in-process walker. */
  backends?: SearchBackend[];
};

const SKIP_DIRS = new Set(['node_modules', '.git', 'dist', 'build']);
const availability = new Map<string, Promise<boolean>>();

/** Whether an executable answers `--version`. Cached per process. */
export function hasCommand(bin: string): Promise<boolean> {
  let probe = availability.get(bin);
  if (!probe) {
    probe = new Promise<boolean>((resolve) => {
      const c = spawn(bin, ['--version'], { stdio: 'ignore' });
      c.on('error', () => resolve(false));
      c.on('close', (code) => resolve(code === 0));
    });
    availability.set(bin, probe);
  }
  return probe;
}

type ArgvResult = { rc: number | null; out: string };

function runArgv(argv: string[], cwd: string, timeoutSec: number): Promise<ArgvResult> {
  return new Promise((resolve, reject) => {
    const [bin, ...rest] = argv;
    const child = spawn(bin, rest, { cwd, stdio: ['ignore', 'pipe', 'ignore'] });
    const chunks: Buffer[] = [];
    const timer = setTimeout(() => child.kill('SIGKILL'), timeoutSec * 1000);
    child.stdout.on('data', (d: Buffer) => chunks.push(d));
    child.on('error', (err) => {
      clearTimeout(timer);
      reject(err);
    });
    child.on('close', (rc) => {
      clearTimeout(timer);
      resolve({ rc, out: Buffer.concat(chunks).toString('utf8') });
    });
  });
}

function relativize(line: string, cwd: string): string {
  const colonIdx = line.indexOf(':');
  if (colonIdx === -1) return line;
  const filePath = line.slice(0, colonIdx);
  const rel = path.relative(cwd, filePath);
  return (rel || filePath) + line.slice(colonIdx);
}

function capLines(lines: string[], maxResults: number): string[] {
  if (lines.length <= maxResults) return lines;
  return [...lines.slice(0, maxResults), `[truncated after ${maxResults} results]`];
}

/** Compile the pattern, falling back to a literal match when it is not a valid regex. */
export function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch {
    return new RegExp(pattern.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
  }
}

async function walkSearch(root: string, re: RegExp, cwd: string, maxResults: number) {
  const out: string[] = [];

  const scanFile = async (file: string) => {
    const rawBuf = await fs.readFile(file).catch(() => null);
    if (!rawBuf || rawBuf.subarray(0, 512).includes(0)) return;
    const lines = rawBuf.toString('utf8').split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
      if (re.test(lines[i])) out.push(relativize(`${file}:${i + 1}:${lines[i]}`, cwd));
      if (out.length > maxResults) return;
    }
  };

  async function walk(dir: string, depth: number) {
    const ents = await fs.readdir(dir, { withFileTypes: true }).catch(() => []);
    ents.sort((a, b) => a.name.localeCompare(b.name));
    for (const ent of ents) {
      if (out.length > maxResults) return;
      const full = path.join(dir, ent.name);
      if (ent.isDirectory()) {
        if (!SKIP_DIRS.has(ent.name) && depth < 8) await walk(full, depth + 1);
      } else if (ent.isFile()) {
        await scanFile(full);
      }
    }
  }

  const st = await fs.stat(root).catch(() => null);
  if (!st) throw new ToolError('not_found', `no such file or directory: ${root}`);
  if (st.isFile()) await scanFile(root);
  else await walk(root, 0);
  return out;
}

/**
 * Recursive text search under `directory`. Output lines are
 * `<path>:<line>:<text>` with paths relative to the working directory.
 */
export async function searchCode(
  pattern: string,
  directory: string,
  opts: SearchOptions
): Promise<string> {
  if (!pattern) throw new ToolError('invalid_args', 'missing pattern', false, 'pass a regex or literal text as pattern');
  const root = path.resolve(opts.cwd, directory);
  const maxResults = opts.maxResults ?? 100;
  const timeoutSec = opts.timeoutSec ?? 30;
  const backends = opts.backends ?? ['rg', 'grep', 'walk'];
  const noMatches = `No matches for pattern "${pattern}" in ${directory}.`;

  for (const backend of backends) {
    if (backend === 'walk') {
      const lines = await walkSearch(root, compilePattern(pattern), opts.cwd, maxResults);
      return lines.length ? capLines(lines, maxResults).join('\n') : noMatches;
    }

    if (!(await hasCommand(backend))) continue;
    const argv =
      backend === 'rg'
        ? ['rg', '-n', '--no-heading', '--color', 'never', '-e', pattern, root]
        : ['grep', '-rn', '--color=never', '-e', pattern, root];
    const res = await runArgv(argv, opts.cwd, timeoutSec);
    // rc 1 means "no matches"; 2 and up is an error, e.g. a bad regex, so try the next backend
    if (res.rc === 1) return noMatches;
    if (res.rc !== 0) continue;
    const lines = res.out.split(/\r?\n/).filter(Boolean).map((l) => relativize(l, opts.cwd));
    return lines.length ? capLines(lines, maxResults).join('\n') : noMatches;
  }
  return noMatches;
}
