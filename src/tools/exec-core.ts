import { spawn } from 'node:child_process';
import fs from 'node:fs/promises';

import { BASH_PATH } from '../utils.js';

import { stripAnsi, truncateBytes } from './text-utils.js';
import { ToolError } from './tool-error.js';

const DEFAULT_MAX_EXEC_BYTES = 65536;

export type ExecOptions = {
  cwd: string;
  /** Hard limit in seconds; the whole process group is killed on expiry. */
  timeoutSec: number;
  maxBytes?: number;
};

export type ExecResult = {
  rc: number | null;
  /** stdout and stderr interleaved in arrival order. */
  output: string;
  timedOut: boolean;
  truncated: boolean;
};

/**
 * Run a shell command through bash in its own process group.
 * Never rejects for a non-zero exit or a timeout; inspect the result.
 */
export async function runCommand(command: string, opts: ExecOptions): Promise<ExecResult> {
  try {
    await fs.access(opts.cwd);
  } catch {
    throw new ToolError('not_found', `working directory does not exist: ${opts.cwd}`);
  }

  const timeout = Math.max(1, opts.timeoutSec);
  const maxBytes = opts.maxBytes ?? DEFAULT_MAX_EXEC_BYTES;
  const captureLimit = Math.max(maxBytes * 4, 256 * 1024);

  const child = spawn(command, [], {
    cwd: opts.cwd,
    stdio: ['ignore', 'pipe', 'pipe'],
    shell: BASH_PATH,
    detached: true,
  });

  const chunks: Buffer[] = [];
  let seen = 0;
  let captured = 0;
  let timedOut = false;

  const killProcessGroup = () => {
    const pid = child.pid;
    if (!pid) return;
    try {
      process.kill(-pid, 'SIGKILL');
    } catch {
      // group already gone; fall back to the direct child
      child.kill('SIGKILL');
    }
  };

  const killTimer = setTimeout(() => {
    timedOut = true;
    killProcessGroup();
  }, timeout * 1000);

  const pushCapped = (buf: Buffer) => {
    seen += buf.length;
    const remaining = captureLimit - captured;
    if (remaining <= 0) return;
    const take = buf.length <= remaining ? buf : buf.subarray(0, remaining);
    chunks.push(Buffer.from(take));
    captured += take.length;
  };

  child.stdout.on('data', pushCapped);
  child.stderr.on('data', pushCapped);

  const rc = await new Promise<number | null>((resolve, reject) => {
    child.on('error', (err: NodeJS.ErrnoException) => {
      clearTimeout(killTimer);
      reject(
        new ToolError(
          'internal',
          `failed to spawn shell (cwd=${opts.cwd}): ${err.message} (${err.code ?? 'unknown'})`
        )
      );
    });
    child.on('close', (code) => {
      clearTimeout(killTimer);
      resolve(code);
    });
  });

  const raw = stripAnsi(Buffer.concat(chunks).toString('utf8'));
  const t = truncateBytes(raw, maxBytes, seen);
  let output = t.text;
  if (timedOut) output = (output ? output.replace(/\n?$/, '\n') : '') + `[killed after ${timeout}s timeout]`;

  return { rc, output, timedOut, truncated: t.truncated || seen > captured };
}

/**
 * Start a command detached from this process. Output is discarded and the
 * child is not tracked after it starts.
 */
export function startBackground(command: string, cwd: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, [], {
      cwd,
      stdio: 'ignore',
      shell: BASH_PATH,
      detached: true,
    });
    child.once('error', (err) => {
      reject(new ToolError('internal', `failed to start in background: ${err.message}`));
    });
    child.once('spawn', () => {
      const pid = child.pid;
      child.unref();
      if (pid === undefined) {
        reject(new ToolError('internal', 'failed to start in background: no pid'));
        return;
      }
      resolve(pid);
    });
  });
}

const LONG_RUNNING_PATTERNS: RegExp[] = [
  /\bpython3?\b/,
  /\bnode/,
  /\bnpm\s+(start|run)\b/,
  /\bgo\s+run\b/,
  /serve/,
  /\buvicorn\b/,
  /\bgunicorn\b/,
  /\bflask\s+run\b/,
  /\brails\s+server\b/,
  /\bphp\s+-s\b/,
  /\bjava\s+-jar\b/,
  /(^|[\s;&|])\.\//,
  /\bwatch\b/,
  /\btail\s+-f\b/,
  /\bping\b/,
  /\bcurl\b.*\s-w\b/,
  /\bsleep\b/,
  /\bwhile\s+true\b/,
];

/**
 * Heuristic for commands that may not return on their own (servers,
 * watchers, interpreters, loops). Only these are offered the background path.
 */
export function isLongRunningCommand(command: string): boolean {
  const lower = command.toLowerCase();
  return LONG_RUNNING_PATTERNS.some((re) => re.test(lower));
}
