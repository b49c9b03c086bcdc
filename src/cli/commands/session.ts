/**
 * Session commands: /exit, /quit, /new, /export, /help.
 */

import { resetSession } from '../../agent.js';
import { exportTranscript } from '../../project.js';
import { err as errFmt } from '../../term.js';
import { allCommands, type SlashCommand } from '../command-registry.js';

export const sessionCommands: SlashCommand[] = [
  {
    name: '/exit',
    aliases: ['/quit'],
    description: 'Exit the session',
    async execute(ctx) {
      await ctx.shutdown(0);
      return true;
    },
  },
  {
    name: '/new',
    description: 'Clear the conversation and start fresh',
    async execute(ctx) {
      resetSession(ctx.session, ctx.projectContext);
      ctx.print(ctx.S.green('Conversation cleared.'));
      return true;
    },
  },
  {
    name: '/export',
    usage: '[file]',
    description: 'Write the conversation to a text file (default context.txt)',
    async execute(ctx, args) {
      const { session } = ctx;
      if (!session.messages.some((m) => m.role !== 'system')) {
        ctx.print('Nothing to export yet.');
        return true;
      }
      try {
        const out = await exportTranscript(session, args, session.cwd);
        ctx.print(`Exported ${session.messages.length} messages to ${out}`);
      } catch (e: unknown) {
        ctx.print(errFmt(`EXPORT: ${e instanceof Error ? e.message : String(e)}`, ctx.S));
      }
      return true;
    },
  },
  {
    name: '/help',
    description: 'Show available commands',
    async execute(ctx) {
      const rows = allCommands().map((c) => {
        const names = [c.name, ...(c.aliases ?? [])].join(', ');
        const head = c.usage ? `${names} ${c.usage}` : names;
        return `  ${head.padEnd(28)} ${ctx.S.dim(c.description ?? '')}`;
      });
      ctx.print(
        ['Commands:', ...rows, '', ctx.S.dim('#<text> adds a permanent instruction to the project context file')].join(
          '\n'
        )
      );
      return true;
    },
  },
];
