/**
 * Shared utility functions.
 */

import { spawnSync } from 'node:child_process';
import { readFileSync, existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

/** Package version read once at startup. Falls back to '0.0.0'. */
export const PKG_VERSION: string = (() => {
  // src/ under tsx, dist/src/ after a build
  for (const rel of ['../package.json', '../../package.json']) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(new URL(rel, import.meta.url), 'utf8'));
      if (parsed && typeof parsed === 'object' && 'version' in parsed) {
        const v = parsed.version;
        if (typeof v === 'string') return v;
      }
    } catch {
      // try next candidate
    }
  }
  return '0.0.0';
})();

/** Resolved absolute path to bash. */
export const BASH_PATH: string = (() => {
  try {
    const r = spawnSync('which', ['bash'], { encoding: 'utf8', timeout: 1000 });
    const p = r.stdout?.split(/\r?\n/)[0]?.trim();
    if (p && p.startsWith('/')) return p;
  } catch {
    /* fallback */
  }
  return existsSync('/bin/bash') ? '/bin/bash' : '/usr/bin/bash';
})();

/**
 * Rough token estimate: floor(charCount / 4).
 * Good enough for budget math, not a real tokenizer.
 */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

/**
 * XDG-compatible config directory.
 * `~/.config/patchwarden`, overridable with PATCHWARDEN_CONFIG_DIR.
 */
export function configDir(): string {
  if (process.env.PATCHWARDEN_CONFIG_DIR) return process.env.PATCHWARDEN_CONFIG_DIR;
  if (process.env.XDG_CONFIG_HOME) return path.join(process.env.XDG_CONFIG_HOME, 'patchwarden');
  return path.join(os.homedir(), '.config', 'patchwarden');
}

/** Shorten a string to `max` chars, marking the cut with an ellipsis. */
export function truncate(s: string, max: number): string {
  if (s.length <= max) return s;
  return s.slice(0, Math.max(0, max - 3)) + '...';
}

/** Narrow an unknown JSON value to a plain object. */
export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}
