import fs from 'node:fs/promises';
import path from 'node:path';

import { renderDiff } from './diff.js';
import { replaceInContent } from './replace.js';
import { ToolError } from './tool-error.js';

export type EditArgs = {
  filePath: string;
  oldString?: string;
  newString?: string;
  replaceAll: boolean;
  content?: string;
};

export type EditPlan =
  | { kind: 'create'; filePath: string; content: string }
  | { kind: 'replace'; filePath: string; before: string; after: string; strategy: string; replacements: number }
  | { kind: 'full'; filePath: string; before: string | null; after: string };

async function readIfExists(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, 'utf8');
  } catch (e: unknown) {
    const err = ToolError.fromError(e);
    if (err.code === 'not_found') return null;
    throw err;
  }
}

export async function readFileTool(absPath: string): Promise<string> {
  try {
    return await fs.readFile(absPath, 'utf8');
  } catch (e: unknown) {
    throw ToolError.fromError(e);
  }
}

/** Immediate children, directories suffixed with `/`, sorted by name. */
export async function listFilesTool(absPath: string): Promise<string> {
  try {
    const ents = await fs.readdir(absPath, { withFileTypes: true });
    const names = ents
      .map((e) => (e.isDirectory() ? e.name + '/' : e.name))
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    return names.join('\n');
  } catch (e: unknown) {
    throw ToolError.fromError(e);
  }
}

function noOp(): never {
  throw new ToolError(
    'no_op',
    'oldString and newString must be different',
    false,
    'nothing to change; skip this edit'
  );
}

/**
 * Work out what an edit would do without touching the disk.
 * Both the confirmation preview and the real edit go through here.
 */
export async function planEdit(absPath: string, args: EditArgs): Promise<EditPlan> {
  const { oldString, newString, content } = args;

  if (oldString !== undefined && oldString === newString) return noOp();

  if (oldString && newString === undefined) {
    throw new ToolError(
      'invalid_args',
      'newString is required when oldString is given',
      false,
      'pass newString with the replacement text, or drop oldString to replace the whole file with content'
    );
  }

  if (oldString && newString !== undefined) {
    const before = await readIfExists(absPath);
    if (before === null) {
      throw new ToolError(
        'not_found',
        `file not found: ${args.filePath}`,
        false,
        'omit oldString to create a new file'
      );
    }
    const res = replaceInContent(before, oldString, newString, args.replaceAll);
    return {
      kind: 'replace',
      filePath: args.filePath,
      before,
      after: res.content,
      strategy: res.strategy,
      replacements: res.replacements,
    };
  }

  if (newString !== undefined) {
    const existing = await readIfExists(absPath);
    if (existing) {
      throw new ToolError(
        'conflict',
        `file already exists: ${args.filePath}`,
        false,
        'pass oldString to edit an existing file, or content to replace it entirely'
      );
    }
    return { kind: 'create', filePath: args.filePath, content: newString };
  }

  if (content !== undefined) {
    const before = await readIfExists(absPath);
    return { kind: 'full', filePath: args.filePath, before, after: content };
  }

  throw new ToolError(
    'invalid_args',
    'edit_file needs newString (create), oldString+newString (edit), or content (full replacement)',
    false
  );
}

/** Diff the operator sees before approving an edit. */
export function planDiff(plan: EditPlan): string {
  switch (plan.kind) {
    case 'create':
      return renderDiff('', plan.content, plan.filePath);
    case 'replace':
      return renderDiff(plan.before, plan.after, plan.filePath);
    case 'full':
      return renderDiff(plan.before ?? '', plan.after, plan.filePath);
  }
}

async function writeFile(absPath: string, text: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(absPath), { recursive: true });
    await fs.writeFile(absPath, text, 'utf8');
  } catch (e: unknown) {
    throw ToolError.fromError(e);
  }
}

export type EditOutcome = { text: string; diff?: string };

export async function editFileTool(absPath: string, args: EditArgs): Promise<EditOutcome> {
  const plan = await planEdit(absPath, args);
  switch (plan.kind) {
    case 'create':
      await writeFile(absPath, plan.content);
      return { text: `File ${plan.filePath} has been created` };
    case 'replace': {
      await writeFile(absPath, plan.after);
      const diff = renderDiff(plan.before, plan.after, plan.filePath);
      const count = plan.replacements === 1 ? '1 replacement' : `${plan.replacements} replacements`;
      return { text: `Edited ${plan.filePath} (${plan.strategy}, ${count})\n${diff}`, diff };
    }
    case 'full': {
      if (plan.before === plan.after) return { text: `File ${plan.filePath} unchanged` };
      await writeFile(absPath, plan.after);
      if (!plan.before) return { text: `File ${plan.filePath} has been created` };
      const diff = renderDiff(plan.before, plan.after, plan.filePath);
      return { text: `File ${plan.filePath} has been modified\n${diff}`, diff };
    }
  }
}

/** Report the diff a full replacement would produce without writing. */
export async function previewEditTool(
  absPath: string,
  label: string,
  content: string
): Promise<string> {
  const before = (await readIfExists(absPath)) ?? '';
  if (before === content) return `Preview: No changes would be made to ${label}`;
  const diff = renderDiff(before, content, label);
  const verb = before === '' ? `Would create new file ${label}` : `Would modify file ${label}`;
  return `Preview: ${verb}\n${diff}`;
}
