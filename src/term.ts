import pc from 'picocolors';

import type { ColorMode } from './types.js';

export function resolveColorMode(mode: ColorMode): { enabled: boolean } {
  const env = process.env;

  // Standard opt-out
  if ('NO_COLOR' in env) return { enabled: false };

  // Explicit force/disable
  if (env.FORCE_COLOR === '0') return { enabled: false };
  if (env.FORCE_COLOR && env.FORCE_COLOR !== '0') return { enabled: true };

  if (mode === 'always') return { enabled: true };
  if (mode === 'never') return { enabled: false };

  // auto
  return { enabled: !!process.stdout.isTTY };
}

export type Styler = {
  enabled: boolean;
  dim: (s: string) => string;
  bold: (s: string) => string;
  red: (s: string) => string;
  yellow: (s: string) => string;
  green: (s: string) => string;
  cyan: (s: string) => string;
  blue: (s: string) => string;
};

export function makeStyler(enabled: boolean): Styler {
  const wrap = (fn: (s: string) => string) => (s: string) => (enabled ? fn(s) : s);
  return {
    enabled,
    dim: wrap(pc.dim),
    bold: wrap(pc.bold),
    red: wrap(pc.red),
    yellow: wrap(pc.yellow),
    green: wrap(pc.green),
    cyan: wrap(pc.cyan),
    blue: wrap(pc.blue),
  };
}

/** Colour a windowed diff produced by renderDiff(). */
export function colorizeDiff(diff: string, s: Styler): string {
  const out: string[] = [];
  for (const line of diff.split('\n')) {
    if (line.startsWith('File changes:')) {
      out.push(s.cyan(line));
    } else if (/^=+$/.test(line)) {
      out.push(s.blue(line));
    } else if (line.startsWith('+')) {
      out.push(s.green(line));
    } else if (line.startsWith('-')) {
      out.push(s.red(line));
    } else if (line.trimStart().startsWith('...')) {
      out.push(s.dim(line));
    } else {
      out.push(line);
    }
  }
  return out.join('\n');
}

export function banner(title: string, s: Styler): string {
  return s.blue(s.bold(title));
}

export function warn(msg: string, s: Styler): string {
  return s.yellow('WARN') + s.dim(': ') + msg;
}

export function err(msg: string, s: Styler): string {
  return s.red('ERROR') + s.dim(': ') + msg;
}
