/**
 * Project commands: /init.
 */

import fs from 'node:fs/promises';

import { contextFilePath, writeAgentsTemplate } from '../../project.js';
import { err as errFmt } from '../../term.js';
import type { SlashCommand } from '../command-registry.js';

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export const projectCommands: SlashCommand[] = [
  {
    name: '/init',
    description: 'Create a project context file from a template',
    async execute(ctx) {
      const { session } = ctx;
      const target = contextFilePath(session.config, session.cwd);
      try {
        let overwrite = false;
        if (await exists(target)) {
          const ans = (await ctx.rl.question(`${target} already exists. Overwrite? [y/N] `))
            .trim()
            .toLowerCase();
          if (ans !== 'y' && ans !== 'yes') {
            ctx.print('Cancelled.');
            return true;
          }
          overwrite = true;
        }
        await writeAgentsTemplate(target, session.cwd, overwrite);
        await ctx.reloadProjectContext();
        ctx.print(`Wrote ${target}`);
      } catch (e: unknown) {
        ctx.print(errFmt(`INIT: ${e instanceof Error ? e.message : String(e)}`, ctx.S));
      }
      return true;
    },
  },
];
