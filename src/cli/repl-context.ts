import type { Session } from '../agent.js';
import type { Asker } from '../confirm/terminal.js';
import type { ProjectContext } from '../project.js';
import type { Styler } from '../term.js';

export interface ReplContext {
  session: Session;
  configPath: string;
  rl: Asker;
  S: Styler;
  version: string;
  projectContext: ProjectContext | null;

  /** User-facing output. */
  print(text: string): void;
  /** Re-read the context file into the system prompt. */
  reloadProjectContext(): Promise<void>;
  shutdown(code: number): Promise<void>;
}
