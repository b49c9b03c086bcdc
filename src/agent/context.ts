import { statusOf } from '../client/error-utils.js';
import type { ChatMessage, TokenUsage, UsageBlock } from '../types.js';
import { estimateTokens } from '../utils.js';

/** Room kept free between the prompt and the context limit. */
export const SAFETY_MARGIN_TOKENS = 1000;
/** Smallest response budget ever requested. */
export const MIN_RESPONSE_TOKENS = 1000;

/**
 * System messages plus the most recent `keepRecent` non-system messages.
 * Tool results at the head of the window whose assistant call was cut off
 * are dropped, since servers reject a tool message without its call.
 */
export function trimHistory(messages: ChatMessage[], keepRecent: number): ChatMessage[] {
  const system = messages.filter((m) => m.role === 'system');
  const rest = messages.filter((m) => m.role !== 'system');
  let recent = rest.slice(Math.max(0, rest.length - keepRecent));
  while (recent.length && recent[0].role === 'tool') recent = recent.slice(1);
  return [...system, ...recent];
}

export function responseBudget(
  maxTokens: number,
  contextLimit: number,
  promptTokens: number | undefined
): number {
  if (promptTokens === undefined) return maxTokens;
  const remaining = contextLimit - promptTokens - SAFETY_MARGIN_TOKENS;
  return Math.max(MIN_RESPONSE_TOKENS, Math.min(maxTokens, remaining));
}

/** ~4 characters per token over every message's content. */
export function estimatePromptTokens(messages: ChatMessage[]): number {
  let n = 0;
  for (const m of messages) n += estimateTokens(m.content);
  return n;
}

/**
 * Usage of one request: the server's numbers when it sent them, otherwise an
 * estimate from the history and the response text. `countedTotal` is what the
 * session total grows by.
 */
export function resolveUsage(
  server: UsageBlock | undefined,
  messages: ChatMessage[],
  responseText: string
): { usage: TokenUsage; countedTotal: number } {
  if (server && (server.prompt_tokens !== undefined || server.total_tokens !== undefined)) {
    const promptTokens = server.prompt_tokens ?? 0;
    const completionTokens = server.completion_tokens ?? 0;
    const totalTokens = server.total_tokens ?? promptTokens + completionTokens;
    return { usage: { promptTokens, completionTokens, totalTokens }, countedTotal: totalTokens };
  }
  const promptTokens = estimatePromptTokens(messages);
  const completionTokens = Math.max(1, estimateTokens(responseText));
  return {
    usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
    countedTotal: completionTokens,
  };
}

const TOOL_FORMAT_RE = /tool call|failed to parse|unexpected end/i;
const CONTEXT_RE = /context|too long|maximum|too many tokens/i;

export type DegradeKind = 'tool-format' | 'context';

/** Which degraded-retry class a request failure belongs to, if any. */
export function classifyDegradable(err: unknown): DegradeKind | null {
  if (statusOf(err) === 413) return 'context';
  const msg = err instanceof Error ? err.message : String(err);
  if (CONTEXT_RE.test(msg)) return 'context';
  if (TOOL_FORMAT_RE.test(msg)) return 'tool-format';
  return null;
}
