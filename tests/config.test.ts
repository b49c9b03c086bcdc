import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, mock } from 'node:test';

import { defaultConfig, loadConfig, parseFileConfig, resolveModel, saveConfigPatch } from '../src/config.js';

let tmpDir: string;
let savedEnv: Record<string, string | undefined>;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'patchwarden-config-'));
  savedEnv = {};
  for (const key of Object.keys(process.env)) {
    if (!key.startsWith('PATCHWARDEN_')) continue;
    savedEnv[key] = process.env[key];
    delete process.env[key];
  }
});

afterEach(async () => {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith('PATCHWARDEN_')) delete process.env[key];
  }
  for (const [key, value] of Object.entries(savedEnv)) {
    if (value !== undefined) process.env[key] = value;
  }
  await fs.rm(tmpDir, { recursive: true, force: true });
});

async function writeConfig(body: unknown): Promise<string> {
  const p = path.join(tmpDir, 'config.json');
  await fs.writeFile(p, JSON.stringify(body), 'utf8');
  return p;
}

describe('loadConfig', () => {
  it('returns defaults when the file does not exist', async () => {
    const configPath = path.join(tmpDir, 'nope.json');
    const { config, configPath: used } = await loadConfig({ configPath });
    assert.equal(used, configPath);
    assert.deepEqual(config, defaultConfig());
  });

  it('layers file, environment and flags in that order', async () => {
    const configPath = await writeConfig({
      current_model: 'fast',
      models: { fast: { name: 'fast-model', base_url: 'http://fast.test/v1' } },
      max_tokens: 4000,
      temperature: 0.2,
      keep_recent: 3,
      color: 'always',
      something_else: true,
    });
    process.env.PATCHWARDEN_MAX_TOKENS = '5000';
    process.env.PATCHWARDEN_STREAM = 'off';

    const { config } = await loadConfig({ configPath, cli: { color: 'never' } });

    assert.equal(config.current_model, 'fast');
    assert.deepEqual(config.models, { fast: { name: 'fast-model', base_url: 'http://fast.test/v1' } });
    assert.equal(config.max_tokens, 5000);
    assert.equal(config.temperature, 0.2);
    assert.equal(config.keep_recent, 3);
    assert.equal(config.stream, false);
    assert.equal(config.color, 'never');
  });

  it('normalizes limits and approved folders', async () => {
    const configPath = await writeConfig({
      keep_recent: 0,
      max_iterations: 2.7,
      exec_timeout: 0,
      approved_folders: ['/srv/a/../b', '/srv/b', 5],
    });
    const { config } = await loadConfig({ configPath });
    assert.equal(config.keep_recent, 1);
    assert.equal(config.max_iterations, 2);
    assert.equal(config.exec_timeout, 1);
    assert.deepEqual(config.approved_folders, [path.resolve('/srv/b')]);
  });

  it('reads approved folders from a comma-separated variable', async () => {
    process.env.PATCHWARDEN_APPROVED_FOLDERS = '/srv/x, /srv/y,';
    const { config } = await loadConfig({ configPath: path.join(tmpDir, 'nope.json') });
    assert.deepEqual(config.approved_folders, [path.resolve('/srv/x'), path.resolve('/srv/y')]);
  });

  it('ignores unparsable environment values', async () => {
    process.env.PATCHWARDEN_MAX_TOKENS = 'lots';
    process.env.PATCHWARDEN_YES = 'maybe';
    const { config } = await loadConfig({ configPath: path.join(tmpDir, 'nope.json') });
    assert.equal(config.max_tokens, 8000);
    assert.equal(config.yes, false);
  });

  it('drops incomplete model entries with a warning', async () => {
    const warn = mock.method(console, 'warn', () => {});
    try {
      const configPath = await writeConfig({ models: { half: { name: 'x' } } });
      const { config } = await loadConfig({ configPath });
      assert.deepEqual(Object.keys(config.models), ['local']);
      assert.deepEqual(warn.mock.calls[0].arguments, [
        '[warn] config: model "half" needs name and base_url, ignoring it',
      ]);
    } finally {
      warn.mock.restore();
    }
  });

  it('rejects a file that is not JSON', async () => {
    const configPath = path.join(tmpDir, 'config.json');
    await fs.writeFile(configPath, '{ nope', 'utf8');
    await assert.rejects(loadConfig({ configPath }), SyntaxError);
  });
});

describe('parseFileConfig', () => {
  it('drops mistyped keys', () => {
    assert.deepEqual(parseFileConfig({ max_tokens: '9000', stream: 'yes', color: 'pink', verbose: true }), {
      verbose: true,
    });
    assert.deepEqual(parseFileConfig([1, 2]), {});
  });
});

describe('resolveModel', () => {
  it('names the configured aliases when the alias is unknown', () => {
    const config = defaultConfig();
    assert.equal(resolveModel(config).name, 'local-model');
    assert.throws(() => resolveModel(config, 'gpt'), {
      message: 'Unknown model "gpt". Configured models: local',
    });
  });
});

describe('saveConfigPatch', () => {
  it('rewrites only the patched keys', async () => {
    const configPath = await writeConfig({ max_tokens: 4000, custom: 'kept' });
    await saveConfigPatch(configPath, { approved_folders: ['/srv/a'] });
    assert.deepEqual(JSON.parse(await fs.readFile(configPath, 'utf8')), {
      max_tokens: 4000,
      custom: 'kept',
      approved_folders: ['/srv/a'],
    });
  });

  it('creates the config directory on first save', async () => {
    const configPath = path.join(tmpDir, 'nested', 'dir', 'config.json');
    await saveConfigPatch(configPath, { current_model: 'remote' });
    assert.equal(await fs.readFile(configPath, 'utf8'), '{\n  "current_model": "remote"\n}\n');
  });
});
