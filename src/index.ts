#!/usr/bin/env node

import { stdin as input, stdout as output } from 'node:process';
import readline from 'node:readline/promises';

import { createSession, refreshSystemPrompt, runTurn, type Session, type TurnDeps } from './agent.js';
import { cliOverrides, friendlyError, parseArgs, printHelp } from './cli/args.js';
import { dispatchCommand, registerAll } from './cli/command-registry.js';
import { modelCommands } from './cli/commands/model.js';
import { permissionCommands } from './cli/commands/permissions.js';
import { projectCommands } from './cli/commands/project.js';
import { sessionCommands } from './cli/commands/session.js';
import type { ReplContext } from './cli/repl-context.js';
import { CliReporter, formatUsageLine } from './cli/reporter.js';
import { ModelRouter } from './client.js';
import { loadConfig, resolveModel, saveConfigPatch } from './config.js';
import { HeadlessConfirmProvider } from './confirm/headless.js';
import { TerminalConfirmProvider } from './confirm/terminal.js';
import { PermissionGate } from './permissions.js';
import { addPermanentInstruction, contextFilePath, loadProjectContext } from './project.js';
import { CliSpinner } from './spinner.js';
import { banner, err as errFmt, makeStyler, resolveColorMode, type Styler } from './term.js';
import { ToolDispatcher } from './tools.js';
import type { ConfirmationProvider } from './types.js';
import { PKG_VERSION } from './utils.js';

async function readStdinIfPiped(): Promise<string> {
  if (process.stdin.isTTY) return '';
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8').trim();
}

async function runOne(session: Session, deps: TurnDeps, text: string, S: Styler): Promise<boolean> {
  try {
    const res = await runTurn(session, deps, text);
    console.error(S.dim(formatUsageLine(res.usage, session.totalTokens)));
    return true;
  } catch (e: unknown) {
    await deps.indicator?.stop();
    console.error(errFmt(friendlyError(e), S));
    return false;
  }
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.version) {
    console.log(PKG_VERSION);
    return 0;
  }
  if (args.help) {
    printHelp();
    return 0;
  }

  const { config, configPath } = await loadConfig({
    ...(args.config !== undefined && { configPath: args.config }),
    cli: cliOverrides(args),
  });
  const S = makeStyler(resolveColorMode(config.color).enabled);
  const cwd = process.cwd();
  const model = resolveModel(config);

  const piped = await readStdinIfPiped();
  const prompt = [args.prompt.join(' '), piped].filter(Boolean).join('\n\n');
  const rl = process.stdin.isTTY ? readline.createInterface({ input, output, historySize: 1000 }) : null;
  const askOperator = rl !== null && !config.yes;
  let confirm: ConfirmationProvider;
  if (config.yes) confirm = new HeadlessConfirmProvider('yolo');
  else if (rl) confirm = new TerminalConfirmProvider(rl, S);
  else confirm = new HeadlessConfirmProvider('reject');

  // Only folders the operator approved by hand are saved.
  const gate = new PermissionGate(
    config.approved_folders,
    askOperator ? (folders) => saveConfigPatch(configPath, { approved_folders: folders }) : undefined
  );

  let projectContext = await loadProjectContext(config, cwd);
  const session = createSession({ config, gate, cwd, projectContext });
  const deps: TurnDeps = {
    client: new ModelRouter(config, { responseTimeoutSec: config.response_timeout, verbose: config.verbose }),
    dispatcher: new ToolDispatcher({
      cwd,
      execTimeoutSec: config.exec_timeout,
      maxOutputBytes: config.max_output_bytes,
    }),
    confirm,
    reporter: new CliReporter(S),
    indicator: new CliSpinner({ styler: S }),
  };

  if (prompt) {
    const ok = await runOne(session, deps, prompt, S);
    rl?.close();
    return ok ? 0 : 1;
  }
  if (!rl) {
    console.error(errFmt('no prompt given and stdin is not a terminal', S));
    return 2;
  }

  registerAll([...sessionCommands, ...projectCommands, ...modelCommands, ...permissionCommands]);

  const ctx: ReplContext = {
    session,
    configPath,
    rl,
    S,
    version: PKG_VERSION,
    get projectContext() {
      return projectContext;
    },
    print: (text) => console.log(text),
    async reloadProjectContext() {
      projectContext = await loadProjectContext(config, cwd);
      refreshSystemPrompt(session, projectContext);
    },
    async shutdown(code) {
      rl.close();
      process.exit(code);
    },
  };

  rl.on('close', () => process.exit(0));

  console.log(banner(`patchwarden v${PKG_VERSION}`, S));
  console.log(S.dim(`model ${config.current_model} (${model.name}) · ${cwd}`));
  if (projectContext) console.log(S.dim(`loaded ${projectContext.file}`));
  console.log(S.dim('Type /help for commands, /exit to quit.'));

  for (;;) {
    const line = (await rl.question(S.bold('> '))).trim();
    if (!line) continue;

    if (line.startsWith('/')) {
      if (!(await dispatchCommand(ctx, line))) {
        console.log(`Unknown command: ${line.split(/\s+/)[0]} (try /help)`);
      }
      continue;
    }

    if (line.startsWith('#')) {
      const instruction = line.slice(1).trim();
      if (!instruction) continue;
      const target = contextFilePath(config, cwd);
      try {
        const { created } = await addPermanentInstruction(target, cwd, instruction);
        if (created) console.log(S.dim(`Created ${target}`));
        console.log(S.green(`Added permanent instruction: ${instruction}`));
        await ctx.reloadProjectContext();
      } catch (e: unknown) {
        console.error(errFmt(friendlyError(e), S));
      }
      continue;
    }

    await runOne(session, deps, line, S);
  }
}

main().then(
  (code) => process.exit(code),
  (e: unknown) => {
    console.error(`patchwarden: ${friendlyError(e)}`);
    process.exit(1);
  }
);
