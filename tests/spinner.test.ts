import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { CliSpinner } from '../src/spinner.js';
import { makeStyler } from '../src/term.js';

let savedTerm: string | undefined;

beforeEach(() => {
  savedTerm = process.env.TERM;
  process.env.TERM = 'xterm-256color';
});

afterEach(() => {
  if (savedTerm === undefined) delete process.env.TERM;
  else process.env.TERM = savedTerm;
});

function stream(isTTY: boolean) {
  const writes: string[] = [];
  return { writes, stream: { isTTY, write: (s: string) => writes.push(s) } };
}

describe('CliSpinner', () => {
  it('clears its line before stop resolves', async () => {
    const { writes, stream: out } = stream(true);
    const spinner = new CliSpinner({ styler: makeStyler(false), stream: out });

    spinner.start('Preparing tool call');
    assert.equal(spinner.running, true);
    await spinner.stop();

    assert.equal(spinner.running, false);
    assert.equal(writes[writes.length - 1], '\r\x1b[K');
  });

  it('stays silent when the stream is not a terminal', async () => {
    const { writes, stream: out } = stream(false);
    const spinner = new CliSpinner({ styler: makeStyler(false), stream: out });

    spinner.start('Working');
    assert.equal(spinner.running, false);
    await spinner.stop();
    assert.deepEqual(writes, []);
  });

  it('can be disabled explicitly', async () => {
    const { writes, stream: out } = stream(true);
    const spinner = new CliSpinner({ styler: makeStyler(false), stream: out, enabled: false });
    spinner.start('Working');
    await spinner.stop();
    assert.deepEqual(writes, []);
  });
});
