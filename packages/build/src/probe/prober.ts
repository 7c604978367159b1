/**
 * Environment probes answering "is this dependency available here?"
 */

import { FeatureSpec, ProbeResult, ProbeSpec, ProbeStrategy } from '../types';
import { ForgeError, ForgeErrorCode, isForgeError, errorMessage } from '../errors';
import { createLogger, Logger } from '../utils/logger';
import { CommandRunner, runCommand, isMissingExecutable } from './command-runner';
import { ExecutableLookup, findExecutable } from './path-lookup';

const moduleLogger = createLogger('probe');

export const DEFAULT_PROBE_TIMEOUT_MS = 30000;
export const DEFAULT_COMPILER = 'gcc';
const PKG_CONFIG = 'pkg-config';

export interface ProbeOutcome {
  available: boolean;
  reason: string;
}

/** Anything that can decide a feature's availability */
export interface FeatureProber {
  probeFeature(feature: FeatureSpec): Promise<ProbeResult>;
}

export interface ProberOptions {
  /** Environment handed to every probe process */
  env?: NodeJS.ProcessEnv;
  /** Preprocessor for header probes; defaults to $CC, then gcc */
  compiler?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
  lookup?: ExecutableLookup;
  logger?: Logger;
}

/**
 * Runs probes against the live toolchain. A probe never throws: a missing
 * or failing detection tool yields an unavailable result.
 */
export class Prober implements FeatureProber {
  private readonly env: NodeJS.ProcessEnv;
  private readonly compiler: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly lookup: ExecutableLookup;
  private readonly logger: Logger;

  constructor(options: ProberOptions = {}) {
    this.env = options.env ?? process.env;
    this.compiler = options.compiler ?? this.env.CC ?? DEFAULT_COMPILER;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.runner = options.runner ?? runCommand;
    this.lookup = options.lookup ?? findExecutable;
    this.logger = options.logger ?? moduleLogger;
  }

  async probe(strategy: ProbeStrategy, target: string): Promise<ProbeOutcome> {
    switch (strategy) {
      case ProbeStrategy.AlwaysTrue:
        return { available: true, reason: 'no external dependency' };
      case ProbeStrategy.PackageMetadata:
        return this.probePackage(target);
      case ProbeStrategy.HeaderInclusion:
        return this.probeHeader(target);
      case ProbeStrategy.CommandExists:
        return this.probeCommand(target);
    }
  }

  /**
   * Try the feature's primary probe, then each alternate in order
   */
  async probeFeature(feature: FeatureSpec): Promise<ProbeResult> {
    const probes: ProbeSpec[] = [
      { strategy: feature.probeStrategy, target: feature.probeTarget },
      ...feature.alternateProbes
    ];
    const reasons: string[] = [];

    for (const spec of probes) {
      const outcome = await this.probe(spec.strategy, spec.target);
      if (outcome.available) {
        this.logger.info(`Found ${feature.name}`);
        this.logger.debug(`${feature.name}: ${outcome.reason}`);
        return { feature, available: true, reason: outcome.reason, ...spec };
      }
      reasons.push(outcome.reason);
    }

    this.logger.warn(`${feature.name} not found, skipping`);
    const last = probes[probes.length - 1];
    return { feature, available: false, reason: reasons.join('; '), ...last };
  }

  private async probePackage(name: string): Promise<ProbeOutcome> {
    return this.runProbe(PKG_CONFIG, ['--exists', name], undefined, {
      available: `${PKG_CONFIG} found ${name}`,
      missing: `${PKG_CONFIG} could not find ${name}`
    });
  }

  private async probeHeader(header: string): Promise<ProbeOutcome> {
    const [command, ...compilerArgs] = this.compiler.trim().split(/\s+/);
    return this.runProbe(command, [...compilerArgs, '-E', '-'], `#include <${header}>\n`, {
      available: `${header} preprocesses with ${command}`,
      missing: `${header} not found by ${command}`
    });
  }

  private async probeCommand(command: string): Promise<ProbeOutcome> {
    const location = await this.lookup(command, this.env);
    return location
      ? { available: true, reason: `${command} found at ${location}` }
      : { available: false, reason: `${command} not found on PATH` };
  }

  private async runProbe(
    tool: string,
    args: string[],
    input: string | undefined,
    reasons: { available: string; missing: string }
  ): Promise<ProbeOutcome> {
    try {
      const result = await this.runner(tool, args, {
        env: this.env,
        input,
        timeoutMs: this.timeoutMs
      });
      return result.exitCode === 0
        ? { available: true, reason: reasons.available }
        : { available: false, reason: reasons.missing };
    } catch (error) {
      if (isMissingExecutable(error)) {
        return { available: false, reason: new ForgeError(ForgeErrorCode.ProbeToolUnavailable, tool).message };
      }
      if (isForgeError(error)) {
        return { available: false, reason: error.details };
      }
      return { available: false, reason: `${tool} failed: ${errorMessage(error)}` };
    }
  }
}
