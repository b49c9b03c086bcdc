/**
 * CLI argument parsing and help text.
 */

import type { ColorMode, WardenConfig } from '../types.js';

export type CliArgs = {
  prompt: string[];
  config?: string;
  model?: string;
  color?: ColorMode;
  yes: boolean;
  noStream: boolean;
  noContext: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
};

/** Convert raw errors into user-friendly messages (no stack traces). */
export function friendlyError(e: unknown): string {
  const msg = e instanceof Error ? e.message : String(e);
  if (msg.includes('max_iterations')) {
    return `Stopped: ${msg}. Raise max_iterations in the config to allow more steps.`;
  }
  if (msg.includes('Cannot reach') || msg.includes('ECONNREFUSED')) {
    return `Connection failed: ${msg}. Is your model server running?`;
  }
  if (msg.includes('503')) {
    return `Model is busy or loading, try again in a few seconds. (${msg})`;
  }
  if (msg.includes('AbortError') || msg.includes('aborted')) {
    return 'Aborted.';
  }
  return msg;
}

const BOOLEAN_FLAGS: Record<string, 'yes' | 'noStream' | 'noContext' | 'verbose' | 'help' | 'version'> = {
  yes: 'yes',
  y: 'yes',
  'no-stream': 'noStream',
  'no-context': 'noContext',
  verbose: 'verbose',
  help: 'help',
  h: 'help',
  version: 'version',
  v: 'version',
};

const VALUE_FLAGS = new Set(['config', 'model', 'color', 'c', 'm']);
const SHORT_VALUE: Record<string, string> = { c: 'config', m: 'model' };

function parseColor(v: string): ColorMode {
  if (v === 'auto' || v === 'always' || v === 'never') return v;
  throw new Error(`--color must be auto, always or never (got "${v}")`);
}

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = {
    prompt: [],
    yes: false,
    noStream: false,
    noContext: false,
    verbose: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--') {
      out.prompt.push(...argv.slice(i + 1));
      break;
    }
    if (!a.startsWith('-') || a === '-') {
      out.prompt.push(a);
      continue;
    }

    const eq = a.indexOf('=');
    const raw = (eq >= 0 ? a.slice(0, eq) : a).replace(/^--?/, '');
    const inline = eq >= 0 ? a.slice(eq + 1) : undefined;

    const bool = BOOLEAN_FLAGS[raw];
    if (bool) {
      out[bool] = true;
      continue;
    }
    if (!VALUE_FLAGS.has(raw)) throw new Error(`Unknown option: ${a} (see --help)`);

    let value = inline;
    if (value === undefined) {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('-')) throw new Error(`Option ${a} needs a value`);
      value = next;
      i++;
    }

    const key = SHORT_VALUE[raw] ?? raw;
    if (key === 'config') out.config = value;
    else if (key === 'model') out.model = value;
    else out.color = parseColor(value);
  }
  return out;
}

/** Config overrides the flags carry; merged over file and environment. */
export function cliOverrides(args: CliArgs): Partial<WardenConfig> {
  const o: Partial<WardenConfig> = {};
  if (args.model) o.current_model = args.model;
  if (args.color) o.color = args.color;
  if (args.yes) o.yes = true;
  if (args.noStream) o.stream = false;
  if (args.noContext) o.no_context = true;
  if (args.verbose) o.verbose = true;
  return o;
}

export function printHelp(): void {
  console.log(`patchwarden: a coding agent that asks before it touches anything

Usage:
  patchwarden [options] [prompt...]

With a prompt, runs one turn and exits. Without one, starts an interactive session.

Options:
  -c, --config <path>   Config file (default ~/.config/patchwarden/config.json)
  -m, --model <alias>   Model alias from the config's "models" map
  -y, --yes             Approve every tool call without asking
      --no-stream       Disable streaming responses
      --no-context      Do not load AGENTS.md into the system prompt
      --color <mode>    auto | always | never
      --verbose         Trace model requests on stderr
  -h, --help            Show this help
  -v, --version         Show the version

In a session, type /help for commands, or #<text> to add a permanent instruction.`);
}
