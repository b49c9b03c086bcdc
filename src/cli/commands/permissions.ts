/**
 * /permissions: list or revoke approved folders.
 */

import path from 'node:path';

import type { SlashCommand } from '../command-registry.js';
import { firstToken, restOf } from '../command-utils.js';

export const permissionCommands: SlashCommand[] = [
  {
    name: '/permissions',
    usage: '[remove <path>]',
    description: 'List approved folders, or revoke one',
    async execute(ctx, args) {
      const { gate, cwd } = ctx.session;
      const sub = firstToken(args);

      if (!sub) {
        const folders = gate.list();
        ctx.print(
          folders.length
            ? ['Approved folders:', ...folders.map((f) => `  ${f}`)].join('\n')
            : 'No approved folders.'
        );
        return true;
      }

      if (sub === 'remove' || sub === 'rm') {
        const target = restOf(args);
        if (!target) {
          ctx.print('Usage: /permissions remove <path>');
          return true;
        }
        const abs = path.resolve(cwd, target);
        ctx.print((await gate.revoke(abs)) ? `Removed ${abs}` : `Not an approved folder: ${abs}`);
        return true;
      }

      ctx.print('Usage: /permissions [remove <path>]');
      return true;
    },
  },
];
