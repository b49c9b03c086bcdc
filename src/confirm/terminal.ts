/**
 * TerminalConfirmProvider: interactive readline-based confirmation.
 */

import { colorizeDiff, type Styler } from '../term.js';
import type { ConfirmationProvider, ConfirmRequest, ToolDecision } from '../types.js';

/** The slice of readline/promises this provider uses. */
export type Asker = {
  question(query: string): Promise<string>;
};

export class TerminalConfirmProvider implements ConfirmationProvider {
  constructor(
    private rl: Asker,
    private S: Styler,
    private print: (text: string) => void = (text) => console.log(text)
  ) {}

  async confirmTool(req: ConfirmRequest): Promise<ToolDecision> {
    this.print(this.boxedPrompt(req.summary));
    if (req.diff) this.print(colorizeDiff(req.diff, this.S));
    if (req.longRunning) this.print(this.S.yellow('This looks like a long-running command.'));

    const options = req.longRunning
      ? 'Execute this tool? [Y/n/s/i/b] (s skip, i interrupt, b background): '
      : 'Execute this tool? [Y/n/s/i] (s skip, i interrupt): ';
    const ans = (await this.rl.question(options)).trim().toLowerCase();

    if (ans === '' || ans === 'y' || ans === 'yes') return { kind: 'execute' };
    if (ans === 's' || ans === 'skip') return { kind: 'skip' };
    if (ans === 'b' || ans === 'background') return { kind: 'background' };
    if (ans === 'i' || ans === 'interrupt') {
      const instruction = (await this.rl.question('What would you like me to do instead? ')).trim();
      return { kind: 'interrupt', instruction };
    }
    return { kind: 'deny' };
  }

  async confirmFolder(folder: string): Promise<boolean> {
    this.print(this.boxedPrompt(`Folder access: ${folder}`));
    const ans = (
      await this.rl.question('Allow list_files and read_file in this folder and all subfolders? [Y/n] ')
    )
      .trim()
      .toLowerCase();
    return ans === '' || ans === 'y' || ans === 'yes';
  }

  /** Format a boxed prompt: ┌─ summary ─┐ */
  private boxedPrompt(summary: string): string {
    const maxW = Math.min(process.stdout.columns ?? 80, 80);
    const inner = summary.length > maxW - 6 ? summary.slice(0, maxW - 9) + '...' : summary;
    const border = '─'.repeat(Math.max(inner.length + 2, 20));
    return [`┌${border}┐`, `│ ${inner.padEnd(border.length - 1)}│`, `└${border}┘`].join('\n');
  }
}
