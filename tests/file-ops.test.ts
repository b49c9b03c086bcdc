import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';

import { renderDiff } from '../src/tools/diff.js';
import {
  editFileTool,
  listFilesTool,
  planEdit,
  previewEditTool,
  readFileTool,
  type EditArgs,
} from '../src/tools/file-ops.js';
import { ToolError } from '../src/tools/tool-error.js';

let tmpDir: string;

before(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'patchwarden-files-'));
});

after(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

const abs = (p: string) => path.join(tmpDir, p);
const edit = (filePath: string, rest: Partial<EditArgs>): EditArgs => ({ filePath, replaceAll: false, ...rest });
const hasCode = (code: string) => (e: unknown) => e instanceof ToolError && e.code === code;

describe('editFileTool', () => {
  it('creates a new file, including missing parent directories', async () => {
    const r = await editFileTool(abs('deep/dir/new.txt'), edit('deep/dir/new.txt', { newString: 'hello\n' }));
    assert.deepEqual(r, { text: 'File deep/dir/new.txt has been created' });
    assert.equal(await fs.readFile(abs('deep/dir/new.txt'), 'utf8'), 'hello\n');
  });

  it('refuses to create over an existing non-empty file', async () => {
    await fs.writeFile(abs('taken.txt'), 'content');
    await assert.rejects(editFileTool(abs('taken.txt'), edit('taken.txt', { newString: 'x' })), hasCode('conflict'));
    assert.equal(await fs.readFile(abs('taken.txt'), 'utf8'), 'content');
  });

  it('replaces text and returns the rendered diff', async () => {
    await fs.writeFile(abs('f.txt'), 'a\nb\nc');
    const r = await editFileTool(abs('f.txt'), edit('f.txt', { oldString: 'b', newString: 'B' }));
    const diff = renderDiff('a\nb\nc', 'a\nB\nc', 'f.txt');
    assert.deepEqual(r, { text: `Edited f.txt (exact, 1 replacement)\n${diff}`, diff });
    assert.equal(await fs.readFile(abs('f.txt'), 'utf8'), 'a\nB\nc');
  });

  it('counts replacements with replaceAll', async () => {
    await fs.writeFile(abs('many.txt'), 'x\nx\nx\n');
    const r = await editFileTool(abs('many.txt'), edit('many.txt', { oldString: 'x', newString: 'y', replaceAll: true }));
    assert.ok(r.text.startsWith('Edited many.txt (exact, 3 replacements)\n'));
    assert.equal(await fs.readFile(abs('many.txt'), 'utf8'), 'y\ny\ny\n');
  });

  it('reports a missing file with a creation hint', async () => {
    await assert.rejects(
      editFileTool(abs('ghost.txt'), edit('ghost.txt', { oldString: 'a', newString: 'b' })),
      (e: unknown) =>
        e instanceof ToolError && e.code === 'not_found' && e.hint === 'omit oldString to create a new file'
    );
  });

  it('checks for a no-op before reading the file', async () => {
    await assert.rejects(
      editFileTool(abs('ghost.txt'), edit('ghost.txt', { oldString: 'same', newString: 'same' })),
      hasCode('no_op')
    );
  });

  it('treats an empty oldString and newString as a no-op, not a creation', async () => {
    await assert.rejects(
      editFileTool(abs('blank.txt'), edit('blank.txt', { oldString: '', newString: '' })),
      hasCode('no_op')
    );
    await assert.rejects(fs.stat(abs('blank.txt')), { code: 'ENOENT' });
  });

  it('requires newString alongside oldString', async () => {
    await fs.writeFile(abs('keep.txt'), 'alpha\n');
    await assert.rejects(
      editFileTool(abs('keep.txt'), edit('keep.txt', { oldString: 'alpha', content: 'beta\n' })),
      (e: unknown) =>
        e instanceof ToolError &&
        e.code === 'invalid_args' &&
        e.message === 'newString is required when oldString is given'
    );
    assert.equal(await fs.readFile(abs('keep.txt'), 'utf8'), 'alpha\n');
  });

  it('leaves the file untouched when the match is ambiguous', async () => {
    await fs.writeFile(abs('dup.txt'), 'k = 1\nk = 1\n');
    await assert.rejects(
      editFileTool(abs('dup.txt'), edit('dup.txt', { oldString: 'k = 1', newString: 'k = 2' })),
      hasCode('ambiguous')
    );
    assert.equal(await fs.readFile(abs('dup.txt'), 'utf8'), 'k = 1\nk = 1\n');
  });

  it('handles full-content replacement', async () => {
    await fs.writeFile(abs('full.txt'), 'one\n');
    assert.deepEqual(await editFileTool(abs('full.txt'), edit('full.txt', { content: 'one\n' })), {
      text: 'File full.txt unchanged',
    });

    const r = await editFileTool(abs('full.txt'), edit('full.txt', { content: 'two\n' }));
    const diff = renderDiff('one\n', 'two\n', 'full.txt');
    assert.deepEqual(r, { text: `File full.txt has been modified\n${diff}`, diff });

    assert.deepEqual(await editFileTool(abs('fresh.txt'), edit('fresh.txt', { content: 'new' })), {
      text: 'File fresh.txt has been created',
    });
  });

  it('needs newString or content', async () => {
    await assert.rejects(planEdit(abs('x.txt'), edit('x.txt', {})), hasCode('invalid_args'));
  });
});

describe('previewEditTool', () => {
  it('describes a would-be creation without writing', async () => {
    const out = await previewEditTool(abs('p.txt'), 'p.txt', 'x');
    assert.equal(out, `Preview: Would create new file p.txt\n${renderDiff('', 'x', 'p.txt')}`);
    await assert.rejects(fs.access(abs('p.txt')));
  });

  it('reports when nothing would change', async () => {
    await fs.writeFile(abs('same.txt'), 'keep');
    assert.equal(await previewEditTool(abs('same.txt'), 'same.txt', 'keep'), 'Preview: No changes would be made to same.txt');
  });

  it('shows the diff of a modification', async () => {
    await fs.writeFile(abs('mod.txt'), 'a\nb');
    assert.equal(
      await previewEditTool(abs('mod.txt'), 'mod.txt', 'a\nc'),
      `Preview: Would modify file mod.txt\n${renderDiff('a\nb', 'a\nc', 'mod.txt')}`
    );
  });
});

describe('read and list', () => {
  it('lists children with directories suffixed, in code point order', async () => {
    const dir = abs('listing');
    await fs.mkdir(path.join(dir, 'a'), { recursive: true });
    await fs.writeFile(path.join(dir, 'b.txt'), '');
    await fs.writeFile(path.join(dir, 'C.md'), '');
    assert.equal(await listFilesTool(dir), 'C.md\na/\nb.txt');
  });

  it('reads a whole file', async () => {
    await fs.writeFile(abs('r.txt'), 'line1\nline2\n');
    assert.equal(await readFileTool(abs('r.txt')), 'line1\nline2\n');
  });

  it('maps a missing file to not_found', async () => {
    await assert.rejects(readFileTool(abs('absent.txt')), hasCode('not_found'));
  });
});
