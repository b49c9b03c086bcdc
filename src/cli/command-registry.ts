import type { ReplContext } from './repl-context.js';

export interface SlashCommand {
  name: string;
  aliases?: string[];
  /** Argument synopsis shown by /help. */
  usage?: string;
  description?: string;
  execute(ctx: ReplContext, args: string, line: string): Promise<boolean>;
}

const registry = new Map<string, SlashCommand>();

export function registerCommand(cmd: SlashCommand): void {
  registry.set(cmd.name.toLowerCase(), cmd);
  for (const a of cmd.aliases ?? []) registry.set(a.toLowerCase(), cmd);
}

export function registerAll(cmds: SlashCommand[]): void {
  for (const c of cmds) registerCommand(c);
}

export function findCommand(line: string): SlashCommand | null {
  const head = (line.trim().split(/\s+/)[0] || '').toLowerCase();
  if (!head.startsWith('/')) return null;
  return registry.get(head) ?? null;
}

/** Distinct registered commands, sorted by name. */
export function allCommands(): SlashCommand[] {
  return [...new Set(registry.values())].sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Run a slash command line. Returns false when the line names no known command.
 */
export async function dispatchCommand(ctx: ReplContext, line: string): Promise<boolean> {
  const cmd = findCommand(line);
  if (!cmd) return false;
  const args = line.trim().replace(/^\S+\s*/, '');
  return cmd.execute(ctx, args, line);
}
