import {
  classifyDegradable,
  resolveUsage,
  responseBudget,
  trimHistory,
  type DegradeKind,
} from './agent/context.js';
import { TurnError } from './agent/errors.js';
import { buildToolsSchema } from './agent/tools-schema.js';
import type { ChatOptions, ModelClient } from './client.js';
import { resolveModel } from './config.js';
import type { PermissionGate } from './permissions.js';
import type { ProjectContext } from './project.js';
import {
  folderOf,
  formatToolOutcome,
  isReadOriented,
  parseToolCall,
  summarizeInvocation,
  type ToolDispatcher,
  type ToolOutcome,
} from './tools.js';
import type {
  ChatCompletionResponse,
  ChatMessage,
  ConfirmationProvider,
  ProgressIndicator,
  TokenUsage,
  ToolCall,
  TurnReporter,
  WardenConfig,
} from './types.js';
import { truncate } from './utils.js';

export { TurnError } from './agent/errors.js';

export const SKIPPED_RESULT = 'Tool execution skipped by user';
export const DENIED_RESULT = 'Tool execution denied by user';
export const FOLDER_DENIED_RESULT = 'Permission denied for folder access';
export const BACKGROUND_UNAVAILABLE_RESULT =
  'Background execution only available for long-running commands';
export const EMPTY_INTERRUPT_RESULT =
  'Tool execution interrupted but no alternative instruction provided';
export const SUPERSEDED_RESULT = 'Tool execution cancelled: superseded by a new user instruction';

const BASE_PROMPT = `You are a coding agent working in the user's project directory. You have tools to:
- read files and list directories
- run bash commands
- create and edit files (edit_file with oldString/newString)
- search code

Every side-effecting call is shown to the user for approval first. Keep edits small and precise,
copy oldString exactly from the file, and explain briefly what you are doing and why.`;

export type Session = {
  config: WardenConfig;
  messages: ChatMessage[];
  lastUsage: TokenUsage | null;
  totalTokens: number;
  gate: PermissionGate;
  cwd: string;
};

export type TurnDeps = {
  client: ModelClient;
  dispatcher: ToolDispatcher;
  confirm: ConfirmationProvider;
  reporter: TurnReporter;
  indicator?: ProgressIndicator;
};

export type TurnResult = {
  /** Assistant text of the final model response. */
  text: string;
  modelCalls: number;
  toolCalls: number;
  usage: TokenUsage | null;
};

export function buildSystemPrompt(project?: ProjectContext | null): string {
  if (!project) return BASE_PROMPT;
  return (
    `${BASE_PROMPT}\n\n--- PROJECT CONTEXT (${project.file}) ---\n${project.content}\n--- END PROJECT CONTEXT ---\n\n` +
    `Follow any "Permanent Instructions" in the project context above consistently.`
  );
}

export function createSession(opts: {
  config: WardenConfig;
  gate: PermissionGate;
  cwd: string;
  projectContext?: ProjectContext | null;
}): Session {
  return {
    config: opts.config,
    messages: [{ role: 'system', content: buildSystemPrompt(opts.projectContext) }],
    lastUsage: null,
    totalTokens: 0,
    gate: opts.gate,
    cwd: opts.cwd,
  };
}

/** Clear the conversation back to its system messages. The session total is kept. */
export function resetSession(session: Session, projectContext?: ProjectContext | null): void {
  session.messages = [{ role: 'system', content: buildSystemPrompt(projectContext) }];
  session.lastUsage = null;
}

/** Swap the leading system prompt, e.g. after the project context file changed. */
export function refreshSystemPrompt(session: Session, projectContext?: ProjectContext | null): void {
  const content = buildSystemPrompt(projectContext);
  if (session.messages[0]?.role === 'system') session.messages[0] = { role: 'system', content };
  else session.messages.unshift({ role: 'system', content });
}

type Reply = { content: string; toolCalls: ToolCall[]; response: ChatCompletionResponse };

function replyOf(response: ChatCompletionResponse): Reply {
  const msg = response.choices[0]?.message;
  return { content: msg?.content ?? '', toolCalls: msg?.tool_calls ?? [], response };
}

function errMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Replace the history with its trimmed copy when the last prompt crossed the threshold. */
function maybeTrim(session: Session, reporter: TurnReporter): void {
  const prompt = session.lastUsage?.promptTokens ?? 0;
  if (prompt <= session.config.trim_threshold) return;
  const before = session.messages.length;
  session.messages = trimHistory(session.messages, session.config.keep_recent);
  reporter.onNotice(
    `Context getting large (${prompt} tokens), trimmed ${before} → ${session.messages.length} messages`
  );
}

async function draft(session: Session, deps: TurnDeps): Promise<Reply> {
  const { config } = session;
  const model = resolveModel(config).name;
  const base = {
    model,
    messages: session.messages,
    tools: buildToolsSchema(),
    temperature: config.temperature,
    max_tokens: responseBudget(config.max_tokens, config.context_limit, session.lastUsage?.promptTokens),
  };

  try {
    if (!config.stream) {
      const reply = replyOf(await deps.client.chat(base));
      if (reply.content) deps.reporter.onToken(reply.content);
      return reply;
    }
    return await streamDraft(base, deps);
  } catch (e: unknown) {
    const kind = classifyDegradable(e);
    if (!kind) throw e;
    return degradedRetry(session, deps, model, kind, e);
  }
}

async function streamDraft(base: ChatOptions, deps: TurnDeps): Promise<Reply> {
  let indicatorOn = false;
  // Content must never share a line with the indicator: stop, await the ack, then print.
  const stopIndicator = async () => {
    if (!indicatorOn) return;
    indicatorOn = false;
    await deps.indicator?.stop();
  };
  try {
    const response = await deps.client.chatStream({
      ...base,
      onToken: async (text) => {
        await stopIndicator();
        deps.reporter.onToken(text);
      },
      onToolCallDelta: () => {
        if (indicatorOn || !deps.indicator) return;
        indicatorOn = true;
        deps.indicator.start('Preparing tool call');
      },
    });
    return replyOf(response);
  } finally {
    await stopIndicator();
  }
}

async function degradedRetry(
  session: Session,
  deps: TurnDeps,
  model: string,
  kind: DegradeKind,
  first: unknown
): Promise<Reply> {
  const { config } = session;
  const { reporter } = deps;
  reporter.onNotice(`Request failed: ${errMessage(first)}`);
  reporter.onNotice(
    kind === 'context'
      ? 'This looks like a context window overflow. Trimming context and retrying without tools...'
      : `This may be a tool-calling format issue with model "${model}". Retrying without tools...`
  );

  session.messages = trimHistory(session.messages, config.keep_recent);
  try {
    const reply = replyOf(
      await deps.client.chat({
        model,
        messages: session.messages,
        temperature: config.temperature,
        max_tokens: config.fallback_max_tokens,
      })
    );
    if (reply.content) reporter.onToken(reply.content);
    return reply;
  } catch (e: unknown) {
    throw new TurnError(`request failed even after degraded retry: ${errMessage(e)}`, e);
  }
}

type CallResult = {
  content: string;
  success: boolean;
  diff?: string;
  /** Set when the operator interrupted with a new instruction. */
  instruction?: string;
};

function fromOutcome(o: ToolOutcome): CallResult {
  return {
    content: formatToolOutcome(o),
    success: !o.error,
    ...(o.diff !== undefined && { diff: o.diff }),
  };
}

async function handleCall(session: Session, deps: TurnDeps, call: ToolCall): Promise<CallResult> {
  const parsed = parseToolCall(call);
  deps.reporter.onToolCall({ id: call.id, name: call.function.name, args: parsed.args });
  if (!parsed.ok) return fromOutcome({ text: '', error: parsed.error });

  const inv = parsed.invocation;
  if (isReadOriented(inv)) {
    const folder = folderOf(inv, session.cwd);
    if (!session.gate.check(folder)) {
      if (!(await deps.confirm.confirmFolder(folder))) {
        return { content: FOLDER_DENIED_RESULT, success: false };
      }
      await session.gate.grant(folder);
    }
    return fromOutcome(await deps.dispatcher.execute(inv));
  }

  const longRunning = deps.dispatcher.isLongRunning(inv);
  const diff = await deps.dispatcher.preview(inv);
  const decision = await deps.confirm.confirmTool({
    tool: inv.tool,
    args: parsed.args,
    summary: summarizeInvocation(inv),
    longRunning,
    ...(diff !== undefined && { diff }),
  });

  switch (decision.kind) {
    case 'execute':
      return fromOutcome(await deps.dispatcher.execute(inv));
    case 'skip':
      return { content: SKIPPED_RESULT, success: false };
    case 'deny':
      return { content: DENIED_RESULT, success: false };
    case 'background':
      if (inv.tool !== 'bash_command' || !longRunning) {
        return { content: BACKGROUND_UNAVAILABLE_RESULT, success: false };
      }
      return fromOutcome(await deps.dispatcher.execute({ tool: 'run_background', command: inv.command }));
    case 'interrupt':
      if (!decision.instruction) return { content: EMPTY_INTERRUPT_RESULT, success: false };
      return {
        content: `Tool execution interrupted by user. New instruction: ${decision.instruction}`,
        success: false,
        instruction: decision.instruction,
      };
  }
}

/**
 * Run one user turn to completion: draft, confirm and dispatch tool calls,
 * record their results, and draft again until the model answers without
 * calling a tool.
 */
export async function runTurn(session: Session, deps: TurnDeps, input: string): Promise<TurnResult> {
  const { config } = session;
  session.messages.push({ role: 'user', content: input });

  let modelCalls = 0;
  let toolCalls = 0;

  for (;;) {
    if (modelCalls >= config.max_iterations) {
      throw new TurnError(`turn exceeded max_iterations (${config.max_iterations}) without a final answer`);
    }
    maybeTrim(session, deps.reporter);

    const reply = await draft(session, deps);
    modelCalls++;
    deps.reporter.onAssistantEnd?.();

    const { usage, countedTotal } = resolveUsage(reply.response.usage, session.messages, reply.content);
    session.lastUsage = usage;
    session.totalTokens += countedTotal;

    session.messages.push({
      role: 'assistant',
      content: reply.content,
      ...(reply.toolCalls.length > 0 && { tool_calls: reply.toolCalls }),
    });

    if (reply.toolCalls.length === 0) {
      return { text: reply.content, modelCalls, toolCalls, usage };
    }

    let instruction: string | undefined;
    for (let k = 0; k < reply.toolCalls.length; k++) {
      const call = reply.toolCalls[k];
      const res = await handleCall(session, deps, call);
      toolCalls++;
      session.messages.push({ role: 'tool', content: res.content, tool_call_id: call.id });
      deps.reporter.onToolResult({
        id: call.id,
        name: call.function.name,
        success: res.success,
        summary: truncate(res.content.split('\n')[0] ?? '', 200),
        ...(res.diff !== undefined && { diff: res.diff }),
      });

      if (res.instruction !== undefined) {
        instruction = res.instruction;
        const rest = reply.toolCalls.slice(k + 1);
        for (const skipped of rest) {
          session.messages.push({ role: 'tool', content: SUPERSEDED_RESULT, tool_call_id: skipped.id });
        }
        if (rest.length) deps.reporter.onNotice(`Cancelled ${rest.length} remaining tool call(s)`);
        break;
      }
    }

    if (instruction !== undefined) {
      session.messages.push({ role: 'user', content: instruction });
    }
  }
}
