import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { Headers, Response, type RequestInit } from 'undici';

import { ClientError, ModelRouter, OpenAIClient, type FetchFn } from '../src/client.js';
import { defaultConfig } from '../src/config.js';
import type { ToolCallDeltaEvent } from '../src/client.js';

type Sent = { url: string; auth: string | null; body: Record<string, unknown> };

function fakeFetch(responder: (n: number) => Response | Error): { fetch: FetchFn; sent: Sent[] } {
  const sent: Sent[] = [];
  const fetch: FetchFn = async (url: string, init: RequestInit) => {
    const n = sent.length;
    sent.push({
      url,
      auth: new Headers(init.headers).get('authorization'),
      body: typeof init.body === 'string' ? JSON.parse(init.body) : {},
    });
    const r = responder(n);
    if (r instanceof Error) throw r;
    return r;
  };
  return { fetch, sent };
}

function recordSleeps(): { sleep: (ms: number) => Promise<void>; slept: number[] } {
  const slept: number[] = [];
  return {
    slept,
    sleep: async (ms: number) => {
      slept.push(ms);
    },
  };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

const okBody = {
  id: 'cmpl-1',
  choices: [{ index: 0, message: { role: 'assistant', content: 'hi' }, finish_reason: 'stop' }],
  usage: { prompt_tokens: 7, completion_tokens: 1, total_tokens: 8 },
};

const baseOpts = { model: 'm', messages: [{ role: 'user' as const, content: 'hello' }] };

describe('OpenAIClient.chat', () => {
  it('posts the request and parses the completion', async () => {
    const { fetch, sent } = fakeFetch(() => json(okBody));
    const client = new OpenAIClient('http://model.test/v1/', 'test-secret', { fetch });

    const res = await client.chat({ ...baseOpts, max_tokens: 100 });

    assert.equal(res.choices[0].message?.content, 'hi');
    assert.deepEqual(res.usage, { prompt_tokens: 7, completion_tokens: 1, total_tokens: 8 });
    assert.equal(sent[0].url, 'http://model.test/v1/chat/completions');
    assert.equal(sent[0].auth, 'Bearer test-secret');
    assert.deepEqual(sent[0].body, {
      model: 'm',
      messages: [{ role: 'user', content: 'hello' }],
      max_tokens: 100,
      stream: false,
    });
  });

  it('omits the auth header without a key', async () => {
    const { fetch, sent } = fakeFetch(() => json(okBody));
    await new OpenAIClient('http://model.test/v1', undefined, { fetch }).chat(baseOpts);
    assert.equal(sent[0].auth, null);
  });

  it('backs off on 503 and succeeds on the next attempt', async () => {
    const { fetch } = fakeFetch((n) => (n === 0 ? json({}, 503) : json(okBody)));
    const { sleep, slept } = recordSleeps();
    const res = await new OpenAIClient('http://model.test/v1', undefined, { fetch, sleep }).chat(baseOpts);
    assert.equal(res.choices[0].message?.content, 'hi');
    assert.deepEqual(slept, [2000]);
  });

  it('gives up after three busy responses', async () => {
    const { fetch, sent } = fakeFetch(() => json({}, 503));
    const { sleep, slept } = recordSleeps();
    const client = new OpenAIClient('http://model.test/v1', undefined, { fetch, sleep });

    await assert.rejects(
      client.chat(baseOpts),
      (e: unknown) => e instanceof ClientError && e.status === 503 && e.retryable
    );
    assert.equal(sent.length, 3);
    assert.deepEqual(slept, [2000, 4000]);
  });

  it('fails immediately on other errors with the response body', async () => {
    const { fetch, sent } = fakeFetch(
      () => new Response('boom', { status: 500, statusText: 'Internal Server Error' })
    );
    const client = new OpenAIClient('http://model.test/v1', undefined, { fetch });

    await assert.rejects(client.chat(baseOpts), {
      message: 'POST /chat/completions failed: 500 Internal Server Error\nboom',
    });
    assert.equal(sent.length, 1);
  });

  it('retries unreachable servers before giving up', async () => {
    const { fetch, sent } = fakeFetch(() => new TypeError('fetch failed'));
    const { sleep, slept } = recordSleeps();
    const client = new OpenAIClient('http://model.test/v1', undefined, { fetch, sleep });

    await assert.rejects(client.chat(baseOpts), {
      message: 'Cannot reach http://model.test/v1 (fetch failed)',
    });
    assert.equal(sent.length, 3);
    assert.deepEqual(slept, [2000, 2000]);
  });
});

function sse(frames: unknown[]): Response {
  const text = frames.map((f) => `data: ${typeof f === 'string' ? f : JSON.stringify(f)}\n\n`).join('');
  return new Response(text, { status: 200, headers: { 'content-type': 'text/event-stream' } });
}

describe('OpenAIClient.chatStream', () => {
  it('assembles content, tool calls and usage from SSE frames', async () => {
    const { fetch, sent } = fakeFetch(() =>
      sse([
        { choices: [{ index: 0, delta: { role: 'assistant', content: 'Hel' } }] },
        { choices: [{ index: 0, delta: { content: 'lo' } }] },
        {
          choices: [
            {
              index: 0,
              delta: {
                tool_calls: [
                  { index: 0, id: 'call_a', type: 'function', function: { name: 'read_file', arguments: '{"path"' } },
                ],
              },
            },
          ],
        },
        {
          choices: [
            { index: 0, delta: { tool_calls: [{ index: 0, function: { arguments: ':"x"}' } }] }, finish_reason: 'tool_calls' },
          ],
        },
        { choices: [], usage: { prompt_tokens: 10, completion_tokens: 4, total_tokens: 14 } },
        '[DONE]',
      ])
    );
    const tokens: string[] = [];
    const deltas: ToolCallDeltaEvent[] = [];
    const client = new OpenAIClient('http://model.test/v1', undefined, { fetch });

    const res = await client.chatStream({
      ...baseOpts,
      onToken: (t) => {
        tokens.push(t);
      },
      onToolCallDelta: (d) => {
        deltas.push(d);
      },
    });

    assert.deepEqual(tokens, ['Hel', 'lo']);
    assert.deepEqual(
      deltas.map((d) => d.argumentsSoFar),
      ['{"path"', '{"path":"x"}']
    );
    assert.deepEqual(res, {
      id: 'stream',
      choices: [
        {
          index: 0,
          message: {
            role: 'assistant',
            content: 'Hello',
            tool_calls: [{ id: 'call_a', type: 'function', function: { name: 'read_file', arguments: '{"path":"x"}' } }],
          },
          finish_reason: 'tool_calls',
        },
      ],
      usage: { prompt_tokens: 10, completion_tokens: 4, total_tokens: 14 },
    });
    assert.equal(sent[0].body.stream, true);
    assert.deepEqual(sent[0].body.stream_options, { include_usage: true });
  });

  it('falls back to a plain request on HTTP 400 and still reports the text', async () => {
    const { fetch, sent } = fakeFetch((n) => (n === 0 ? new Response('no streaming', { status: 400 }) : json(okBody)));
    const tokens: string[] = [];
    const client = new OpenAIClient('http://model.test/v1', undefined, { fetch });

    const res = await client.chatStream({ ...baseOpts, onToken: (t) => void tokens.push(t) });

    assert.equal(res.choices[0].message?.content, 'hi');
    assert.deepEqual(tokens, ['hi']);
    assert.equal(sent[1].body.stream, false);
  });
});

describe('ModelRouter', () => {
  it('follows the current model alias', async () => {
    const config = defaultConfig();
    config.models.remote = { name: 'big-model', base_url: 'http://remote.test/v1', api_key: 'test-secret' };
    const { fetch, sent } = fakeFetch(() => json(okBody));
    const router = new ModelRouter(config, { fetch });

    await router.chat(baseOpts);
    config.current_model = 'remote';
    await router.chat(baseOpts);

    assert.deepEqual(
      sent.map((s) => [s.url, s.auth]),
      [
        ['http://localhost:1234/v1/chat/completions', null],
        ['http://remote.test/v1/chat/completions', 'Bearer test-secret'],
      ]
    );
  });

  it('rejects an alias that is not configured', async () => {
    const config = defaultConfig();
    config.current_model = 'missing';
    const router = new ModelRouter(config, { fetch: fakeFetch(() => json(okBody)).fetch });
    await assert.rejects(router.chat(baseOpts), {
      message: 'Unknown model "missing". Configured models: local',
    });
  });
});
