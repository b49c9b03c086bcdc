/**
 * CLI spinner shown while the model drafts tool calls or a tool runs.
 *
 * Stopping is a handshake: `stop()` cancels the animation and resolves only
 * after the spinner line has been cleared, so text printed afterwards never
 * lands on the same line as a frame.
 */

import type { Styler } from './term.js';
import type { ProgressIndicator } from './types.js';

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const INTERVAL = 80; // ms per frame

export type SpinnerStream = {
  write(s: string): unknown;
  isTTY?: boolean;
};

export class CliSpinner implements ProgressIndicator {
  private frame = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private startTime = Date.now();
  private label = '';
  private readonly out: SpinnerStream;
  private readonly animate: boolean;
  private S: Styler;

  constructor(opts: { styler: Styler; stream?: SpinnerStream; enabled?: boolean }) {
    this.S = opts.styler;
    this.out = opts.stream ?? process.stderr;
    this.animate =
      opts.enabled !== false && this.out.isTTY === true && process.env.TERM !== 'dumb';
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(label: string): void {
    if (!this.animate || this.timer) return;
    this.label = label;
    this.startTime = Date.now();
    this.frame = 0;
    this.timer = setInterval(() => this.render(), INTERVAL);
  }

  stop(): Promise<void> {
    if (!this.timer) return Promise.resolve();
    clearInterval(this.timer);
    this.timer = null;
    // Acknowledge on the next tick, after any in-flight frame write.
    return new Promise((resolve) => {
      setImmediate(() => {
        this.out.write('\r\x1b[K');
        resolve();
      });
    });
  }

  private render(): void {
    const elapsed = ((Date.now() - this.startTime) / 1000).toFixed(1);
    const f = FRAMES[this.frame % FRAMES.length];
    this.frame++;
    this.out.write(`\r${this.S.dim(`${f} ${this.label}... (${elapsed}s)`)}`);
  }
}
