import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';

import { buildToolsSchema } from '../src/agent/tools-schema.js';
import { renderDiff } from '../src/tools/diff.js';
import { ToolError } from '../src/tools/tool-error.js';
import {
  folderOf,
  formatToolOutcome,
  isReadOriented,
  parseToolCall,
  summarizeInvocation,
  ToolDispatcher,
  type ToolInvocation,
} from '../src/tools.js';
import type { ToolCall } from '../src/types.js';

let tmpDir: string;
let dispatcher: ToolDispatcher;

before(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'patchwarden-tools-'));
  dispatcher = new ToolDispatcher({ cwd: tmpDir, execTimeoutSec: 5, searchBackends: ['walk'] });
});

after(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

const call = (name: string, args: string): ToolCall => ({
  id: 'call_1',
  type: 'function',
  function: { name, arguments: args },
});

describe('parseToolCall', () => {
  it('builds an invocation from valid arguments', () => {
    const p = parseToolCall(call('read_file', '{"path":"a.txt"}'));
    assert.deepEqual(p, { ok: true, invocation: { tool: 'read_file', path: 'a.txt' }, args: { path: 'a.txt' } });
  });

  it('defaults list_files to the working directory on empty arguments', () => {
    const p = parseToolCall(call('list_files', ''));
    assert.ok(p.ok);
    assert.deepEqual(p.invocation, { tool: 'list_files', path: '.' });
  });

  it('accepts path as an alias for filePath', () => {
    const p = parseToolCall(call('edit_file', '{"path":"x.ts","oldString":"a","newString":"b"}'));
    assert.ok(p.ok);
    assert.deepEqual(p.invocation, {
      tool: 'edit_file',
      edit: { filePath: 'x.ts', oldString: 'a', newString: 'b', content: undefined, replaceAll: false },
    });
  });

  it('reports malformed JSON as invalid_args', () => {
    const p = parseToolCall(call('bash_command', '{"command": '));
    assert.equal(p.ok, false);
    if (p.ok) return;
    assert.equal(p.error.code, 'invalid_args');
    assert.ok(p.error.message.startsWith('arguments are not valid JSON: '));
  });

  it('rejects unknown tools and missing arguments', () => {
    const unknown = parseToolCall(call('format_disk', '{}'));
    assert.ok(!unknown.ok && unknown.error.message === 'unknown tool: format_disk');

    const missing = parseToolCall(call('bash_command', '{}'));
    assert.ok(!missing.ok && missing.error.message === 'missing command');
  });

  it('exposes a schema for every model-visible tool', () => {
    assert.deepEqual(
      buildToolsSchema().map((t) => t.function.name),
      ['read_file', 'list_files', 'bash_command', 'edit_file', 'search_code', 'preview_edit']
    );
  });
});

describe('invocation helpers', () => {
  it('classifies read-oriented tools and their folders', () => {
    const read: ToolInvocation = { tool: 'read_file', path: 'src/a.ts' };
    const list: ToolInvocation = { tool: 'list_files', path: 'src' };
    const bash: ToolInvocation = { tool: 'bash_command', command: 'ls' };
    assert.ok(isReadOriented(read) && isReadOriented(list));
    assert.equal(isReadOriented(bash), false);
    if (isReadOriented(read)) assert.equal(folderOf(read, '/w'), path.resolve('/w/src'));
    if (isReadOriented(list)) assert.equal(folderOf(list, '/w'), path.resolve('/w/src'));
  });

  it('summarizes invocations for the operator', () => {
    assert.equal(summarizeInvocation({ tool: 'bash_command', command: 'make' }), 'Run: make');
    assert.equal(
      summarizeInvocation({ tool: 'edit_file', edit: { filePath: 'a.ts', oldString: 'x', newString: 'y', replaceAll: false } }),
      'Edit a.ts'
    );
    assert.equal(
      summarizeInvocation({ tool: 'edit_file', edit: { filePath: 'b.ts', newString: 'y', replaceAll: false } }),
      'Create b.ts'
    );
    assert.equal(
      summarizeInvocation({ tool: 'search_code', pattern: 'TODO', directory: 'src' }),
      'Search for "TODO" in src'
    );
  });

  it('formats an error outcome with the gathered output', () => {
    const text = formatToolOutcome({
      text: 'partial',
      error: new ToolError('timeout', 'command timed out after 1s', false, 'long-running commands can be run in the background'),
    });
    assert.equal(
      text,
      'ERROR: code=timeout retryable=false\nmsg=command timed out after 1s\nhint=long-running commands can be run in the background\noutput:\npartial'
    );
  });
});

describe('ToolDispatcher', () => {
  it('reports a non-zero exit as exit_status', async () => {
    const o = await dispatcher.execute({ tool: 'bash_command', command: 'exit 4' });
    assert.equal(formatToolOutcome(o), 'ERROR: code=exit_status retryable=false\nmsg=command exited with code 4');
  });

  it('marks silent success', async () => {
    assert.deepEqual(await dispatcher.execute({ tool: 'bash_command', command: 'true' }), { text: '(no output)' });
  });

  it('lists an empty directory', async () => {
    await fs.mkdir(path.join(tmpDir, 'empty'));
    assert.deepEqual(await dispatcher.execute({ tool: 'list_files', path: 'empty' }), { text: '(empty directory)' });
  });

  it('turns filesystem failures into outcomes instead of throwing', async () => {
    const o = await dispatcher.execute({ tool: 'read_file', path: 'missing.txt' });
    assert.equal(o.text, '');
    assert.equal(o.error?.code, 'not_found');
  });

  it('previews an edit without writing it', async () => {
    await fs.writeFile(path.join(tmpDir, 'cfg.txt'), 'debug=false\n');
    const inv: ToolInvocation = {
      tool: 'edit_file',
      edit: { filePath: 'cfg.txt', oldString: 'debug=false', newString: 'debug=true', replaceAll: false },
    };
    assert.equal(await dispatcher.preview(inv), renderDiff('debug=false\n', 'debug=true\n', 'cfg.txt'));
    assert.equal(await fs.readFile(path.join(tmpDir, 'cfg.txt'), 'utf8'), 'debug=false\n');
    assert.equal(await dispatcher.preview({ tool: 'bash_command', command: 'ls' }), undefined);
  });

  it('offers the background path only for long-running shell commands', () => {
    assert.equal(dispatcher.isLongRunning({ tool: 'bash_command', command: 'npm start' }), true);
    assert.equal(dispatcher.isLongRunning({ tool: 'bash_command', command: 'ls' }), false);
    assert.equal(dispatcher.isLongRunning({ tool: 'read_file', path: 'node.txt' }), false);
  });

  it('searches through the configured backends', async () => {
    await fs.writeFile(path.join(tmpDir, 'needle.txt'), 'hay\nneedle\n');
    const o = await dispatcher.execute({ tool: 'search_code', pattern: 'needle', directory: '.' });
    assert.equal(o.text, 'needle.txt:2:needle');
  });
});
