import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';

import { compilePattern, searchCode } from '../src/tools/search.js';
import { ToolError } from '../src/tools/tool-error.js';

let tmpDir: string;

before(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'patchwarden-search-'));
  await fs.mkdir(path.join(tmpDir, 'src'));
  await fs.mkdir(path.join(tmpDir, 'node_modules'));
  await fs.writeFile(path.join(tmpDir, 'src', 'a.ts'), 'const alpha = 1;\nconst beta = 2;\n');
  await fs.writeFile(path.join(tmpDir, 'src', 'b.ts'), 'alpha again\n');
  await fs.writeFile(path.join(tmpDir, 'node_modules', 'dep.js'), 'alpha in a dependency\n');
  await fs.writeFile(path.join(tmpDir, 'src', 'blob.bin'), Buffer.from([0x61, 0x6c, 0x70, 0x68, 0x61, 0x00]));
});

after(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('searchCode (in-process walker)', () => {
  it('lists matches relative to cwd and skips vendored and binary files', async () => {
    const out = await searchCode('alpha', '.', { cwd: tmpDir, backends: ['walk'] });
    assert.equal(out, 'src/a.ts:1:const alpha = 1;\nsrc/b.ts:1:alpha again');
  });

  it('treats no matches as a successful result', async () => {
    const out = await searchCode('zeta', 'src', { cwd: tmpDir, backends: ['walk'] });
    assert.equal(out, 'No matches for pattern "zeta" in src.');
  });

  it('caps the number of results', async () => {
    const out = await searchCode('alpha', '.', { cwd: tmpDir, backends: ['walk'], maxResults: 1 });
    assert.equal(out, 'src/a.ts:1:const alpha = 1;\n[truncated after 1 results]');
  });

  it('rejects a missing directory', async () => {
    await assert.rejects(
      searchCode('alpha', 'missing', { cwd: tmpDir, backends: ['walk'] }),
      (e: unknown) => e instanceof ToolError && e.code === 'not_found'
    );
  });

  it('rejects an empty pattern', async () => {
    await assert.rejects(
      searchCode('', '.', { cwd: tmpDir, backends: ['walk'] }),
      (e: unknown) => e instanceof ToolError && e.code === 'invalid_args'
    );
  });
});

describe('compilePattern', () => {
  it('falls back to a literal match for an invalid regex', () => {
    const re = compilePattern('foo(');
    assert.equal(re.test('call foo(x)'), true);
    assert.equal(re.test('call foo'), false);
  });
});
