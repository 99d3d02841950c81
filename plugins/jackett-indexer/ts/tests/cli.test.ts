/**
 * Jackett CLI entry point, run from its sources
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { execFile } from 'node:child_process';
import { fileURLToPath } from 'node:url';
import { promisify } from 'node:util';

const run = promisify(execFile);

const CLI = fileURLToPath(new URL('../src/cli.ts', import.meta.url));
const ROOT = fileURLToPath(new URL('../../../../', import.meta.url));

function cli(...args: string[]) {
  return run(process.execPath, ['--import', 'tsx', CLI, ...args], { cwd: ROOT, timeout: 30000 });
}

describe('mediabridge-jackett', () => {
  it('prints its version', async () => {
    const { stdout } = await cli('--version');
    assert.equal(stdout, '1.0.0\n');
  });

  it('lists its commands', async () => {
    const { stdout } = await cli('--help');
    assert.equal(stdout.split('\n')[0], 'Usage: mediabridge-jackett [options] [command]');
  });
});
