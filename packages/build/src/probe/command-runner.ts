/**
 * Child process execution for probes and the configure step
 */

import { spawn } from 'child_process';
import { ForgeError, ForgeErrorCode, errorMessage } from '../errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('command');

export interface CommandResult {
  /** Exit status; null when the process was terminated by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Text written to the child's stdin, which is then closed */
  input?: string;
  /** Kill the child and reject with ProbeTimedOut after this many milliseconds */
  timeoutMs?: number;
  /** Pass the child's output straight through instead of capturing it */
  inheritOutput?: boolean;
}

/**
 * Runs a command to completion. A non-zero exit resolves normally; only a
 * failure to spawn or a timeout rejects.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, options = {}) => {
  const { cwd = process.cwd(), env = process.env, input, timeoutMs, inheritOutput = false } = options;

  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd,
      env,
      stdio: inheritOutput ? ['pipe', 'inherit', 'inherit'] : ['pipe', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const timer = timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
          if (settled) return;
          settled = true;
          child.kill('SIGTERM');
          reject(new ForgeError(ForgeErrorCode.ProbeTimedOut, `${command} did not finish within ${timeoutMs}ms`));
        }, timeoutMs);

    const finish = (): boolean => {
      if (timer) clearTimeout(timer);
      if (settled) return false;
      settled = true;
      return true;
    };

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', error => {
      if (finish()) reject(error);
    });

    child.on('close', code => {
      if (finish()) resolve({ exitCode: code, stdout, stderr });
    });

    // The child may exit before reading its input
    child.stdin?.on('error', error => {
      logger.trace(`stdin of ${command} closed early: ${errorMessage(error)}`);
    });
    child.stdin?.end(input);
  });
};

/**
 * Whether a spawn failure means the executable itself could not be found
 */
export function isMissingExecutable(error: unknown): boolean {
  // spawn errors may come from another realm, so no instanceof check
  return typeof error === 'object' && error !== null && 'code' in error && (error.code === 'ENOENT' || error.code === 'EACCES');
}
