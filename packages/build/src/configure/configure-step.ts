/**
 * The downstream FFmpeg ./configure invocation
 */

import { existsSync } from 'fs';
import { join, resolve } from 'path';
import { ForgeError, ForgeErrorCode, errorMessage } from '../errors';
import { CommandRunner, runCommand } from '../probe';
import { createLogger } from '../utils/logger';

const logger = createLogger('configure');

export interface ConfigureRunOptions {
  env?: NodeJS.ProcessEnv;
}

export interface ConfigureStepResult {
  /** null when the tool could not be started or was killed */
  exitCode: number | null;
  success: boolean;
}

/**
 * Anything that accepts configure arguments and reports success through an
 * exit status
 */
export interface ConfigureStep {
  run(args: readonly string[], options?: ConfigureRunOptions): Promise<ConfigureStepResult>;
}

/**
 * Build the full argument vector handed to configure
 */
export function configureArguments(installPrefix: string, flags: readonly string[]): string[] {
  return [`--prefix=${installPrefix}`, ...flags];
}

/**
 * Runs `<sourceDir>/configure` with inherited output and no timeout
 */
export class ScriptConfigureStep implements ConfigureStep {
  readonly sourceDir: string;
  private readonly runner: CommandRunner;

  constructor(sourceDir: string, runner: CommandRunner = runCommand) {
    this.sourceDir = resolve(sourceDir);
    this.runner = runner;
  }

  get scriptPath(): string {
    return join(this.sourceDir, 'configure');
  }

  /**
   * Fail early when the directory is not an FFmpeg source tree
   */
  assertSourceTree(): void {
    if (!existsSync(this.scriptPath)) {
      throw new ForgeError(
        ForgeErrorCode.SourceNotFound,
        `no configure script in ${this.sourceDir}; run from the FFmpeg source root or pass --source`
      );
    }
  }

  async run(args: readonly string[], options: ConfigureRunOptions = {}): Promise<ConfigureStepResult> {
    logger.step('Running FFmpeg configure...');

    try {
      const result = await this.runner(this.scriptPath, args, {
        cwd: this.sourceDir,
        env: options.env,
        inheritOutput: true
      });
      return { exitCode: result.exitCode, success: result.exitCode === 0 };
    } catch (error) {
      const failure = new ForgeError(ForgeErrorCode.ConfigureSpawnFailed, errorMessage(error), {
        cause: error instanceof Error ? error : undefined
      });
      logger.error(failure.message);
      return { exitCode: null, success: false };
    }
  }
}
