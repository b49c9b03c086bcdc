/**
 * Structured tool error taxonomy.
 * Every failure a tool reports back to the model carries one of these codes.
 */

export type ToolErrorCode =
  | 'invalid_args' // Wrong types, missing params, unknown tool
  | 'not_found' // File/directory doesn't exist
  | 'conflict' // File already exists
  | 'no_op' // Edit would not change anything
  | 'no_match' // Edit target not located by any strategy
  | 'ambiguous' // Edit target located but not unique
  | 'permission' // Permission denied (filesystem)
  | 'timeout' // Command killed after its time limit
  | 'exit_status' // Command exited non-zero
  | 'internal'; // Unexpected error in tool implementation

export type ToolErrorDetails = Record<string, string | number | boolean>;

export class ToolError extends Error {
  constructor(
    public readonly code: ToolErrorCode,
    message: string,
    public readonly retryable: boolean = false,
    public readonly hint?: string,
    public readonly details?: ToolErrorDetails
  ) {
    super(message);
    this.name = 'ToolError';
  }

  /**
   * Format as a concise tool result content string
   */
  toToolResult(): string {
    const lines = [`ERROR: code=${this.code} retryable=${this.retryable}`, `msg=${this.message}`];

    if (this.hint) {
      lines.push(`hint=${this.hint}`);
    }

    if (this.details && Object.keys(this.details).length > 0) {
      const detailsStr = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v).slice(0, 200)}`)
        .join(' ');
      lines.push(`details=${detailsStr}`);
    }

    return lines.join('\n');
  }

  /**
   * Create from a generic error, inferring the code from errno or message.
   */
  static fromError(err: unknown, defaultCode: ToolErrorCode = 'internal'): ToolError {
    if (err instanceof ToolError) return err;

    const message = err instanceof Error ? err.message : String(err);
    const errno =
      err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : '';

    if (errno === 'ENOENT' || errno === 'ENOTDIR' || message.includes('ENOENT')) {
      return new ToolError('not_found', message);
    }
    if (errno === 'EACCES' || errno === 'EPERM' || message.includes('permission denied')) {
      return new ToolError('permission', message);
    }
    if (errno === 'EISDIR') {
      return new ToolError('invalid_args', message, false, 'path is a directory; use list_files');
    }
    if (errno === 'EEXIST' || message.includes('already exists')) {
      return new ToolError('conflict', message);
    }
    return new ToolError(defaultCode, message);
  }
}
