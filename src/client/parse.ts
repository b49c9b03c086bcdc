/**
 * Normalizers from untyped server JSON to the wire types in types.ts.
 * Servers differ in what they omit; anything mistyped is dropped rather than trusted.
 */

import type { ChatCompletionResponse, ToolCall, ToolCallDelta, UsageBlock } from '../types.js';
import { isRecord } from '../utils.js';

function optNum(v: unknown): number | undefined {
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

function optStr(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

export function parseUsage(raw: unknown): UsageBlock | undefined {
  if (!isRecord(raw)) return undefined;
  return {
    prompt_tokens: optNum(raw.prompt_tokens),
    completion_tokens: optNum(raw.completion_tokens),
    total_tokens: optNum(raw.total_tokens),
  };
}

function parseToolCalls(raw: unknown): ToolCall[] | undefined {
  if (!Array.isArray(raw)) return undefined;
  const out: ToolCall[] = [];
  raw.forEach((tc: unknown, i) => {
    if (!isRecord(tc) || !isRecord(tc.function)) return;
    const name = optStr(tc.function.name);
    if (!name) return;
    const args = tc.function.arguments;
    out.push({
      id: optStr(tc.id) || `call_${i}`,
      type: 'function',
      function: {
        name,
        // some servers send arguments as an object instead of a JSON string
        arguments: typeof args === 'string' ? args : args === undefined ? '' : JSON.stringify(args),
      },
    });
  });
  return out.length ? out : undefined;
}

export function parseToolCallDeltas(raw: unknown): ToolCallDelta[] | undefined {
  if (!Array.isArray(raw)) return undefined;
  const out: ToolCallDelta[] = [];
  for (const tc of raw) {
    if (!isRecord(tc)) continue;
    const fn = isRecord(tc.function) ? tc.function : undefined;
    out.push({
      index: optNum(tc.index),
      id: optStr(tc.id),
      function: fn ? { name: optStr(fn.name), arguments: optStr(fn.arguments) } : undefined,
    });
  }
  return out;
}

/** Non-streaming completion body. */
export function parseCompletion(raw: unknown): ChatCompletionResponse {
  if (!isRecord(raw) || !Array.isArray(raw.choices)) {
    throw new Error('malformed completion response: missing choices');
  }
  const first: unknown = raw.choices[0];
  const msg: Record<string, unknown> =
    isRecord(first) && isRecord(first.message) ? first.message : {};
  const content = msg.content;
  return {
    id: optStr(raw.id) ?? 'completion',
    model: optStr(raw.model),
    choices: [
      {
        index: 0,
        message: {
          role: 'assistant',
          content: typeof content === 'string' ? content : null,
          tool_calls: parseToolCalls(msg.tool_calls),
        },
        finish_reason: isRecord(first) ? (optStr(first.finish_reason) ?? null) : null,
      },
    ],
    usage: parseUsage(raw.usage),
  };
}

export type StreamChunk = {
  content?: string;
  toolCalls?: ToolCallDelta[];
  finishReason?: string;
  usage?: UsageBlock;
};

/** One `data:` payload of a streamed completion. */
export function parseStreamChunk(raw: unknown): StreamChunk {
  if (!isRecord(raw)) return {};
  const out: StreamChunk = {};
  const usage = parseUsage(raw.usage);
  if (usage) out.usage = usage;
  const first: unknown = Array.isArray(raw.choices) ? raw.choices[0] : undefined;
  if (!isRecord(first)) return out;
  const finish = optStr(first.finish_reason);
  if (finish) out.finishReason = finish;
  if (isRecord(first.delta)) {
    const content = optStr(first.delta.content);
    if (content) out.content = content;
    const tcs = parseToolCallDeltas(first.delta.tool_calls);
    if (tcs?.length) out.toolCalls = tcs;
  }
  return out;
}
