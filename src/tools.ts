import path from 'node:path';

import { isLongRunningCommand, runCommand, startBackground } from './tools/exec-core.js';
import {
  editFileTool,
  listFilesTool,
  planDiff,
  planEdit,
  previewEditTool,
  readFileTool,
  type EditArgs,
} from './tools/file-ops.js';
import { folderFor, resolvePath } from './tools/path-safety.js';
import { searchCode, type SearchBackend } from './tools/search.js';
import { ToolError } from './tools/tool-error.js';
import type { ToolCall } from './types.js';
import { isRecord, truncate } from './utils.js';

export type ToolInvocation =
  | { tool: 'read_file'; path: string }
  | { tool: 'list_files'; path: string }
  | { tool: 'bash_command'; command: string }
  | { tool: 'run_background'; command: string }
  | { tool: 'edit_file'; edit: EditArgs }
  | { tool: 'search_code'; pattern: string; directory: string }
  | { tool: 'preview_edit'; path: string; content: string };

export type ReadInvocation = Extract<ToolInvocation, { tool: 'read_file' | 'list_files' | 'preview_edit' }>;

export type ToolOutcome = {
  text: string;
  error?: ToolError;
  /** Rendered diff for a successful edit. */
  diff?: string;
};

export type ParsedToolCall =
  | { ok: true; invocation: ToolInvocation; args: Record<string, unknown> }
  | { ok: false; error: ToolError; args: Record<string, unknown> };

function parseArgsJson(raw: string): Record<string, unknown> {
  if (!raw.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ToolError('invalid_args', `arguments are not valid JSON: ${msg}`, true, 'send arguments as a JSON object');
  }
  if (!isRecord(parsed)) {
    throw new ToolError('invalid_args', 'arguments must be a JSON object', true);
  }
  return parsed;
}

function reqString(args: Record<string, unknown>, key: string): string {
  const v = args[key];
  if (typeof v !== 'string' || v === '') {
    throw new ToolError('invalid_args', `missing ${key}`, true, `pass ${key} as a non-empty string`);
  }
  return v;
}

function optString(args: Record<string, unknown>, key: string): string | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== 'string') throw new ToolError('invalid_args', `${key} must be a string`, true);
  return v;
}

function toInvocation(name: string, args: Record<string, unknown>): ToolInvocation {
  switch (name) {
    case 'read_file':
      return { tool: 'read_file', path: reqString(args, 'path') };
    case 'list_files':
      return { tool: 'list_files', path: optString(args, 'path') || '.' };
    case 'bash_command':
      return { tool: 'bash_command', command: reqString(args, 'command') };
    case 'search_code':
      return {
        tool: 'search_code',
        pattern: reqString(args, 'pattern'),
        directory: optString(args, 'directory') || '.',
      };
    case 'preview_edit': {
      const content = optString(args, 'content');
      if (content === undefined) throw new ToolError('invalid_args', 'missing content', true);
      return { tool: 'preview_edit', path: reqString(args, 'path'), content };
    }
    case 'edit_file': {
      const filePath = optString(args, 'filePath') || optString(args, 'path');
      if (!filePath) {
        throw new ToolError('invalid_args', 'missing filePath', true, 'pass filePath as a string');
      }
      const oldString = optString(args, 'oldString');
      const newString = optString(args, 'newString');
      const content = optString(args, 'content');
      if (newString === undefined && content === undefined) {
        throw new ToolError(
          'invalid_args',
          'edit_file needs newString or content',
          true,
          'pass oldString+newString to edit, newString alone to create, or content to replace the file'
        );
      }
      return {
        tool: 'edit_file',
        edit: { filePath, oldString, newString, content, replaceAll: args.replaceAll === true },
      };
    }
    default:
      throw new ToolError('invalid_args', `unknown tool: ${name}`, false);
  }
}

/** Validate a model tool call into an invocation. Never throws. */
export function parseToolCall(call: ToolCall): ParsedToolCall {
  let args: Record<string, unknown> = {};
  try {
    args = parseArgsJson(call.function.arguments);
    return { ok: true, invocation: toInvocation(call.function.name, args), args };
  } catch (e: unknown) {
    return { ok: false, error: ToolError.fromError(e, 'invalid_args'), args };
  }
}

export function isReadOriented(inv: ToolInvocation): inv is ReadInvocation {
  return inv.tool === 'read_file' || inv.tool === 'list_files' || inv.tool === 'preview_edit';
}

/** Folder the permission gate checks for a read-oriented call. */
export function folderOf(inv: ReadInvocation, cwd: string): string {
  const abs = path.resolve(cwd, inv.path);
  return folderFor(abs, inv.tool === 'list_files');
}

/** One-line description shown to the operator. */
export function summarizeInvocation(inv: ToolInvocation): string {
  switch (inv.tool) {
    case 'read_file':
      return `Read file ${inv.path}`;
    case 'list_files':
      return `List files in ${inv.path}`;
    case 'bash_command':
      return `Run: ${truncate(inv.command, 200)}`;
    case 'run_background':
      return `Run in background: ${truncate(inv.command, 200)}`;
    case 'edit_file':
      return inv.edit.oldString
        ? `Edit ${inv.edit.filePath}`
        : inv.edit.newString !== undefined
          ? `Create ${inv.edit.filePath}`
          : `Rewrite ${inv.edit.filePath}`;
    case 'search_code':
      return `Search for "${inv.pattern}" in ${inv.directory}`;
    case 'preview_edit':
      return `Preview edit of ${inv.path}`;
  }
}

/** Text of the tool message the model receives. */
export function formatToolOutcome(o: ToolOutcome): string {
  if (!o.error) return o.text;
  const head = o.error.toToolResult();
  return o.text ? `${head}\noutput:\n${o.text}` : head;
}

export type ToolDispatcherOptions = {
  cwd: string;
  execTimeoutSec: number;
  maxOutputBytes?: number;
  searchBackends?: SearchBackend[];
};

/**
 * Executes validated tool invocations. Expected failures come back as
 * `error` on the outcome; nothing here throws for them.
 */
export class ToolDispatcher {
  constructor(private readonly opts: ToolDispatcherOptions) {}

  get cwd(): string {
    return this.opts.cwd;
  }

  isLongRunning(inv: ToolInvocation): boolean {
    return inv.tool === 'bash_command' && isLongRunningCommand(inv.command);
  }

  /** Diff shown before an edit is approved; undefined when there is nothing to show. */
  async preview(inv: ToolInvocation): Promise<string | undefined> {
    if (inv.tool !== 'edit_file') return undefined;
    try {
      const abs = resolvePath(this.opts.cwd, inv.edit.filePath, 'filePath');
      return planDiff(await planEdit(abs, inv.edit));
    } catch {
      // the real edit reports the failure
      return undefined;
    }
  }

  async execute(inv: ToolInvocation): Promise<ToolOutcome> {
    try {
      return await this.run(inv);
    } catch (e: unknown) {
      return { text: '', error: ToolError.fromError(e) };
    }
  }

  private async run(inv: ToolInvocation): Promise<ToolOutcome> {
    const { cwd } = this.opts;
    switch (inv.tool) {
      case 'read_file':
        return { text: await readFileTool(resolvePath(cwd, inv.path)) };

      case 'list_files': {
        const text = await listFilesTool(resolvePath(cwd, inv.path));
        return { text: text || '(empty directory)' };
      }

      case 'bash_command':
        return this.runShell(inv.command);

      case 'run_background': {
        const pid = await startBackground(inv.command, cwd);
        return { text: `Started in background with PID ${pid}: ${inv.command}` };
      }

      case 'edit_file': {
        const abs = resolvePath(cwd, inv.edit.filePath, 'filePath');
        const res = await editFileTool(abs, inv.edit);
        return { text: res.text, ...(res.diff !== undefined && { diff: res.diff }) };
      }

      case 'search_code':
        return {
          text: await searchCode(inv.pattern, inv.directory, {
            cwd,
            timeoutSec: this.opts.execTimeoutSec,
            ...(this.opts.searchBackends && { backends: this.opts.searchBackends }),
          }),
        };

      case 'preview_edit':
        return { text: await previewEditTool(resolvePath(cwd, inv.path), inv.path, inv.content) };

      default: {
        const never: never = inv;
        throw new ToolError('invalid_args', `unknown tool: ${JSON.stringify(never)}`);
      }
    }
  }

  private async runShell(command: string): Promise<ToolOutcome> {
    const res = await runCommand(command, {
      cwd: this.opts.cwd,
      timeoutSec: this.opts.execTimeoutSec,
      ...(this.opts.maxOutputBytes !== undefined && { maxBytes: this.opts.maxOutputBytes }),
    });
    if (res.timedOut) {
      return {
        text: res.output,
        error: new ToolError(
          'timeout',
          `command timed out after ${Math.max(1, this.opts.execTimeoutSec)}s`,
          false,
          'long-running commands can be run in the background'
        ),
      };
    }
    if (res.rc !== 0) {
      return {
        text: res.output,
        error: new ToolError('exit_status', `command exited with code ${res.rc ?? 'null'}`, false),
      };
    }
    return { text: res.output || '(no output)' };
  }
}
