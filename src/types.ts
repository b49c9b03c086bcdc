export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; tool_calls?: ToolCall[] }
  | { role: 'tool'; content: string; tool_call_id: string };

export type ToolSchema = {
  type: 'function';
  function: {
    name: string;
    description?: string;
    // OpenAI style JSON schema
    parameters: Record<string, unknown>;
  };
};

export type ToolCall = {
  id: string;
  index?: number;
  type: 'function';
  function: {
    name: string;
    arguments: string; // JSON string
  };
};

/** Streamed tool-call fragment; every field but `index` may be missing. */
export type ToolCallDelta = {
  index?: number;
  id?: string;
  type?: 'function';
  function?: {
    name?: string;
    arguments?: string;
  };
};

export type UsageBlock = {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
};

export type ChatCompletionResponse = {
  id: string;
  model?: string;
  choices: Array<{
    index: number;
    message?: {
      role: 'assistant';
      content?: string | null;
      tool_calls?: ToolCall[];
    };
    delta?: {
      role?: 'assistant';
      content?: string | null;
      tool_calls?: ToolCallDelta[];
    };
    finish_reason?: string | null;
  }>;
  usage?: UsageBlock;
};

export type TokenUsage = {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
};

// --- Configuration ---

export type ColorMode = 'auto' | 'always' | 'never';

export type ModelEntry = {
  /** Model id sent to the server. */
  name: string;
  base_url: string;
  api_key?: string;
};

export type WardenConfig = {
  current_model: string;
  models: Record<string, ModelEntry>;
  approved_folders: string[];

  // generation
  max_tokens: number;
  context_limit: number;
  fallback_max_tokens: number;
  temperature?: number;

  // loop
  trim_threshold: number;
  keep_recent: number;
  max_iterations: number;
  stream: boolean;

  // tools
  exec_timeout: number; // seconds
  max_output_bytes: number;

  // network
  response_timeout: number; // seconds

  // context bootstrap
  context_file: string;
  no_context: boolean;

  // appearance
  color: ColorMode;
  verbose: boolean;
  yes: boolean;
};

// --- Confirmation ---

export type ToolDecision =
  | { kind: 'execute' }
  | { kind: 'skip' }
  | { kind: 'deny' }
  | { kind: 'background' }
  | { kind: 'interrupt'; instruction: string };

export type ConfirmRequest = {
  tool: string;
  args: Record<string, unknown>;
  summary: string; // human-readable one-liner
  diff?: string; // edit preview, already rendered
  longRunning: boolean;
};

/**
 * Frontend-agnostic confirmation interface.
 * Implementations: TerminalConfirmProvider, HeadlessConfirmProvider.
 */
export interface ConfirmationProvider {
  /** Decide what to do with one pending tool call. */
  confirmTool(req: ConfirmRequest): Promise<ToolDecision>;
  /** Ask whether read-oriented tools may access a folder and its descendants. */
  confirmFolder(folder: string): Promise<boolean>;
}

// --- Agent hooks ---

export type ToolCallEvent = {
  id: string;
  name: string;
  args: Record<string, unknown>;
};

export type ToolResultEvent = {
  id: string;
  name: string;
  success: boolean;
  summary: string;
  /** Rendered windowed diff for edit_file. */
  diff?: string;
};

/** Animated "working" indicator. `stop()` resolves once the line is cleared. */
export interface ProgressIndicator {
  start(label: string): void;
  stop(): Promise<void>;
}

/** Where a turn reports what it is doing. */
export interface TurnReporter {
  /** Streamed or final assistant text. */
  onToken(text: string): void;
  /** The assistant message of one model request is complete. */
  onAssistantEnd?(): void;
  onToolCall(event: ToolCallEvent): void;
  onToolResult(event: ToolResultEvent): void;
  /** Trimming, retries and other out-of-band notices. */
  onNotice(msg: string): void;
}
