import fs from 'node:fs/promises';
import path from 'node:path';

import type { ChatMessage, TokenUsage, WardenConfig } from './types.js';

export type ProjectContext = {
  /** Name shown in the system prompt markers. */
  file: string;
  content: string;
};

export const PERMANENT_SECTION = '### Permanent Instructions';
const PLACEHOLDER_PREFIX = '*Use #';

async function readIfExists(p: string): Promise<string | null> {
  try {
    const st = await fs.stat(p);
    if (!st.isFile()) return null;
    return await fs.readFile(p, 'utf8');
  } catch {
    return null;
  }
}

export function contextFilePath(config: Pick<WardenConfig, 'context_file'>, cwd: string): string {
  const f = config.context_file.trim() || 'AGENTS.md';
  return path.isAbsolute(f) ? f : path.join(cwd, f);
}

/** The project context file, or null when disabled, missing or blank. */
export async function loadProjectContext(
  config: Pick<WardenConfig, 'context_file' | 'no_context'>,
  cwd: string
): Promise<ProjectContext | null> {
  if (config.no_context) return null;
  const abs = contextFilePath(config, cwd);
  const txt = await readIfExists(abs);
  if (!txt || !txt.trim()) return null;
  return { file: path.basename(abs), content: txt.trim() };
}

function stamp(d: Date): string {
  return d.toISOString().replace('T', ' ').slice(0, 19);
}

export function agentsTemplate(cwd: string, now = new Date()): string {
  const name = path.basename(cwd);
  return `# ${name}: agent instructions

## Project Overview
**Project Name:** ${name}
**Location:** ${cwd}
**Initialized:** ${stamp(now)}

## Project Structure
*Describe the layout and the key files here*

## Development Guidelines
*Coding standards, patterns and conventions for this project*

## Agent Instructions

${PERMANENT_SECTION}
${PLACEHOLDER_PREFIX}<instruction> to add permanent instructions for agents working on this project*

### Project Context
*Background an agent should know before changing anything*
`;
}

/**
 * Write the template. Returns false without touching the file when it exists
 * and `overwrite` is not set.
 */
export async function writeAgentsTemplate(
  target: string,
  cwd: string,
  overwrite: boolean,
  now = new Date()
): Promise<boolean> {
  if (!overwrite && (await readIfExists(target)) !== null) return false;
  await fs.writeFile(target, agentsTemplate(cwd, now), 'utf8');
  return true;
}

/** Insert `- instruction` at the end of the permanent-instructions list. */
export function insertPermanentInstruction(content: string, instruction: string): string {
  const bullet = `- ${instruction}`;
  const lines = content.split('\n');
  const head = lines.findIndex((l) => l.trim() === PERMANENT_SECTION);

  if (head < 0) {
    const nextSection = lines.map((l) => l.startsWith('### ')).lastIndexOf(true);
    if (nextSection < 0) {
      const base = content.replace(/\n+$/, '');
      return `${base}\n\n## Agent Instructions\n\n${PERMANENT_SECTION}\n${bullet}\n`;
    }
    lines.splice(nextSection, 0, PERMANENT_SECTION, bullet, '');
    return lines.join('\n');
  }

  let end = lines.length;
  for (let i = head + 1; i < lines.length; i++) {
    if (/^#{1,3}\s/.test(lines[i])) {
      end = i;
      break;
    }
  }

  let lastBullet = -1;
  let placeholder = -1;
  for (let i = head + 1; i < end; i++) {
    if (/^\s*- /.test(lines[i])) lastBullet = i;
    else if (placeholder < 0 && lines[i].trim().startsWith(PLACEHOLDER_PREFIX)) placeholder = i;
  }

  if (lastBullet >= 0) lines.splice(lastBullet + 1, 0, bullet);
  else if (placeholder >= 0) lines[placeholder] = bullet;
  else lines.splice(head + 1, 0, bullet);
  return lines.join('\n');
}

/**
 * Append a permanent instruction to the context file, creating the file from
 * the template first when it does not exist. Returns whether it was created.
 */
export async function addPermanentInstruction(
  target: string,
  cwd: string,
  instruction: string,
  now = new Date()
): Promise<{ created: boolean }> {
  let content = await readIfExists(target);
  const created = content === null;
  if (content === null) content = agentsTemplate(cwd, now);
  await fs.writeFile(target, insertPermanentInstruction(content, instruction.trim()), 'utf8');
  return { created };
}

export type TranscriptInfo = {
  messages: ChatMessage[];
  lastUsage: TokenUsage | null;
  totalTokens: number;
};

const RULE = '='.repeat(80);

export function formatTranscript(info: TranscriptInfo, now = new Date()): string {
  const out: string[] = ['# patchwarden transcript', `Exported: ${stamp(now)}`];
  if (info.lastUsage) out.push(`Context tokens: ${info.lastUsage.promptTokens}`);
  out.push(`Session tokens: ${info.totalTokens}`, '', RULE);

  info.messages.forEach((m, i) => {
    if (i > 0) out.push('-'.repeat(40));
    switch (m.role) {
      case 'system':
      case 'user':
        out.push(`[${m.role}]`, m.content);
        break;
      case 'assistant':
        out.push('[assistant]');
        if (m.content) out.push(m.content);
        for (const tc of m.tool_calls ?? []) {
          out.push(`tool call ${tc.function.name} (${tc.id}): ${tc.function.arguments}`);
        }
        break;
      case 'tool':
        out.push(`[tool ${m.tool_call_id}]`, m.content);
        break;
    }
  });

  out.push(RULE, `${info.messages.length} messages`);
  return out.join('\n') + '\n';
}

/** Export target: `context.txt` by default, `.txt` appended when missing. */
export function exportFileName(arg: string | undefined): string {
  const name = arg?.trim() || 'context.txt';
  return name.endsWith('.txt') ? name : `${name}.txt`;
}

export async function exportTranscript(
  info: TranscriptInfo,
  fileArg: string | undefined,
  cwd: string,
  now = new Date()
): Promise<string> {
  const abs = path.resolve(cwd, exportFileName(fileArg));
  await fs.writeFile(abs, formatTranscript(info, now), 'utf8');
  return abs;
}
