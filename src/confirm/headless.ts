/**
 * HeadlessConfirmProvider: for CI, piped and other non-interactive use.
 *   - yolo: approve everything
 *   - reject: run read-only tools, deny everything else (nobody can be asked)
 */

import type { ConfirmationProvider, ConfirmRequest, ToolDecision } from '../types.js';

export type HeadlessMode = 'yolo' | 'reject';

const READ_ONLY_TOOLS = new Set(['read_file', 'list_files', 'search_code', 'preview_edit']);

export class HeadlessConfirmProvider implements ConfirmationProvider {
  constructor(
    private mode: HeadlessMode,
    private log: (msg: string) => void = (msg) => console.error(msg)
  ) {}

  async confirmTool(req: ConfirmRequest): Promise<ToolDecision> {
    if (this.mode === 'yolo' || READ_ONLY_TOOLS.has(req.tool)) return { kind: 'execute' };
    this.log(`[non-interactive] rejected ${req.tool}: ${req.summary}; pass --yes to auto-approve`);
    return { kind: 'deny' };
  }

  async confirmFolder(folder: string): Promise<boolean> {
    if (this.mode !== 'yolo') this.log(`[non-interactive] allowing read access to ${folder}`);
    return true;
  }
}
