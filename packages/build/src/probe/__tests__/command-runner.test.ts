/**
 * @fileoverview Tests for runCommand against real child processes
 */

import { describe, it, expect } from '@jest/globals';
import { isMissingExecutable, runCommand } from '../command-runner';
import { isForgeError } from '../../errors';

describe('runCommand', () => {
  it('should reject with a missing-executable error for an unknown command', async () => {
    const error: unknown = await runCommand('definitely-not-a-tool-xyz', []).then(
      () => undefined,
      (rejection: unknown) => rejection
    );

    expect(error).toMatchObject({ code: 'ENOENT' });
    expect(isMissingExecutable(error)).toBe(true);
  });

  it('should kill the child and reject after the timeout', async () => {
    const started = Date.now();

    const error: unknown = await runCommand('sleep', ['5'], { timeoutMs: 200 }).then(
      () => undefined,
      (rejection: unknown) => rejection
    );

    expect(isForgeError(error)).toBe(true);
    expect(error).toMatchObject({ details: 'sleep did not finish within 200ms' });
    expect(Date.now() - started).toBeLessThan(4000);
  });

  it('should feed input to stdin and capture stdout', async () => {
    await expect(runCommand('cat', [], { input: 'hello\n' })).resolves.toEqual({
      exitCode: 0,
      stdout: 'hello\n',
      stderr: ''
    });
  });

  it('should resolve with a non-zero exit code', async () => {
    const result = await runCommand('sh', ['-c', 'echo oops >&2; exit 3']);

    expect(result).toEqual({ exitCode: 3, stdout: '', stderr: 'oops\n' });
  });

  it('should look the command up on the PATH it is given', async () => {
    const error: unknown = await runCommand('pkg-config', ['--exists', 'x264'], { env: { PATH: '/nonexistent' } }).then(
      () => undefined,
      (rejection: unknown) => rejection
    );

    expect(isMissingExecutable(error)).toBe(true);
  });
});

describe('isMissingExecutable', () => {
  it('should accept plain objects carrying a spawn error code', () => {
    expect(isMissingExecutable({ code: 'ENOENT' })).toBe(true);
    expect(isMissingExecutable({ code: 'EACCES' })).toBe(true);
  });

  it('should reject other codes and non-objects', () => {
    expect(isMissingExecutable({ code: 'EPIPE' })).toBe(false);
    expect(isMissingExecutable('ENOENT')).toBe(false);
    expect(isMissingExecutable(null)).toBe(false);
  });
});
