/**
 * Model commands: /models.
 */

import { saveConfigPatch } from '../../config.js';
import { warn as warnFmt } from '../../term.js';
import type { SlashCommand } from '../command-registry.js';
import { firstToken, maskSecret } from '../command-utils.js';
import type { ReplContext } from '../repl-context.js';

function listModels(ctx: ReplContext): string {
  const { config } = ctx.session;
  const lines = ['Configured models:'];
  for (const [alias, entry] of Object.entries(config.models)) {
    const mark = alias === config.current_model ? ctx.S.green('*') : ' ';
    const key = entry.api_key ? `  key ${maskSecret(entry.api_key)}` : '';
    lines.push(`${mark} ${alias.padEnd(12)} ${entry.name} @ ${entry.base_url}${key}`);
  }
  return lines.join('\n');
}

export const modelCommands: SlashCommand[] = [
  {
    name: '/models',
    usage: '[alias]',
    description: 'List configured models or switch to one',
    async execute(ctx, args) {
      const { config } = ctx.session;
      const alias = args.trim() ? args.trim().split(/\s+/)[0] : '';
      if (!alias || firstToken(args) === 'list') {
        ctx.print(listModels(ctx));
        return true;
      }

      const entry = config.models[alias];
      if (!entry) {
        ctx.print(`Unknown model "${alias}". Configured models: ${Object.keys(config.models).join(', ')}`);
        return true;
      }

      config.current_model = alias;
      ctx.print(`Switched to ${alias} (${entry.name})`);
      try {
        await saveConfigPatch(ctx.configPath, { current_model: alias });
      } catch (e: unknown) {
        ctx.print(warnFmt(`could not save current_model: ${e instanceof Error ? e.message : String(e)}`, ctx.S));
      }
      return true;
    },
  },
];
