import path from 'node:path';

import { isWithinDir } from './tools/path-safety.js';

export type PersistFolders = (folders: string[]) => Promise<void>;

/**
 * Folder-level approval for read-oriented tools.
 *
 * Approving a folder approves every descendant. Siblings that merely share a
 * name prefix and ancestors of an approved folder stay unapproved.
 */
export class PermissionGate {
  private readonly folders: string[] = [];

  constructor(
    initial: Iterable<string> = [],
    private readonly persist?: PersistFolders,
    private readonly onWarn: (msg: string) => void = (msg) => console.warn(msg)
  ) {
    for (const f of initial) this.add(path.resolve(f));
  }

  check(target: string): boolean {
    const abs = path.resolve(target);
    return this.folders.some((f) => isWithinDir(abs, f));
  }

  /**
   * Approve a folder for the rest of the session and persist the set.
   * A failed save is reported but the approval still holds in memory.
   */
  async grant(folder: string): Promise<void> {
    if (!this.add(path.resolve(folder))) return;
    await this.save();
  }

  /** Remove an exact entry. Returns whether anything was removed. */
  async revoke(folder: string): Promise<boolean> {
    const abs = path.resolve(folder);
    const idx = this.folders.indexOf(abs);
    if (idx === -1) return false;
    this.folders.splice(idx, 1);
    await this.save();
    return true;
  }

  list(): string[] {
    return [...this.folders];
  }

  private add(abs: string): boolean {
    if (this.folders.includes(abs)) return false;
    this.folders.push(abs);
    return true;
  }

  private async save(): Promise<void> {
    if (!this.persist) return;
    try {
      await this.persist(this.list());
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      this.onWarn(`[warn] could not save approved folders: ${msg}`);
    }
  }
}
