/**
 * Terminal rendering of a running turn: assistant text on stdout, tool
 * activity and notices on stderr.
 */

import { colorizeDiff, type Styler } from '../term.js';
import type { TokenUsage, ToolCallEvent, ToolResultEvent, TurnReporter } from '../types.js';
import { truncate } from '../utils.js';

export type ReporterStreams = {
  out: { write(s: string): unknown };
  log: (line: string) => void;
};

export function formatUsageLine(usage: TokenUsage | null, sessionTotal: number): string {
  const ctx = usage?.promptTokens ?? 0;
  const resp = usage?.completionTokens ?? 0;
  return `[Context: ${ctx} tokens | Response: ${resp} tokens | Session: ${sessionTotal} tokens]`;
}

function argsPreview(args: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [k, v] of Object.entries(args)) {
    const s = typeof v === 'string' ? v.replace(/\s+/g, ' ') : JSON.stringify(v);
    parts.push(`${k}=${truncate(s, 80)}`);
  }
  return parts.join(' ');
}

export class CliReporter implements TurnReporter {
  private midLine = false;
  private readonly out: ReporterStreams['out'];
  private readonly log: ReporterStreams['log'];

  constructor(
    private readonly S: Styler,
    streams: Partial<ReporterStreams> = {}
  ) {
    this.out = streams.out ?? process.stdout;
    this.log = streams.log ?? ((line) => console.error(line));
  }

  onToken(text: string): void {
    if (!text) return;
    this.out.write(text);
    this.midLine = !text.endsWith('\n');
  }

  onAssistantEnd(): void {
    this.endLine();
  }

  onToolCall(e: ToolCallEvent): void {
    this.endLine();
    const args = argsPreview(e.args);
    this.log(`${this.S.cyan('▸')} ${this.S.bold(e.name)}${args ? ' ' + this.S.dim(args) : ''}`);
  }

  onToolResult(e: ToolResultEvent): void {
    const mark = e.success ? this.S.green('✓') : this.S.red('✗');
    this.log(`${mark} ${e.name}: ${e.summary}`);
    if (e.diff) this.log(colorizeDiff(e.diff, this.S));
  }

  onNotice(msg: string): void {
    this.endLine();
    this.log(this.S.yellow(msg));
  }

  private endLine(): void {
    if (!this.midLine) return;
    this.out.write('\n');
    this.midLine = false;
  }
}
