/**
 * Two-tier configuration: the resolved primary flag set, then a single retry
 * with the minimal built-in-codecs flag set
 */

import { EventEmitter } from 'eventemitter3';
import { ResolutionReport, ResolutionRequest } from './types';
import { Resolver } from './resolver';
import { ConfigureStep, configureArguments } from './configure';
import { PolicyOverlay } from './platforms';
import { ForgeError, ForgeErrorCode } from './errors';
import { createLogger } from './utils/logger';

const logger = createLogger('fallback');

export enum ConfigurationTier {
  Primary = 'primary',
  Minimal = 'minimal'
}

export type FallbackReason = 'no-features-resolved' | 'primary-rejected';

export interface ConfigurationAttempt {
  tier: ConfigurationTier;
  args: readonly string[];
  exitCode: number | null;
  success: boolean;
}

export interface ConfigurationOutcome {
  tier: ConfigurationTier;
  /** Flags handed to configure on the successful attempt */
  flags: readonly string[];
  /** Full argument vector, including --prefix */
  args: readonly string[];
  /** Features whose flags the successful attempt carried */
  features: readonly string[];
  report: ResolutionReport;
  attempts: readonly ConfigurationAttempt[];
  fallbackReason?: FallbackReason;
}

export interface FallbackEvents {
  resolved: (report: ResolutionReport) => void;
  attempt: (tier: ConfigurationTier, args: readonly string[]) => void;
  fallback: (reason: FallbackReason, report: ResolutionReport) => void;
  completed: (outcome: ConfigurationOutcome) => void;
}

export interface FallbackControllerOptions {
  /** Base environment for configure; the platform overlay is applied on top */
  env?: NodeJS.ProcessEnv;
}

/**
 * True when the probes look systemically broken: something was requested
 * and nothing resolved
 */
export function needsFallback(report: ResolutionReport): boolean {
  return report.included.length === 0 && report.request.requestedFeatures.length > 0;
}

export class FallbackController extends EventEmitter<FallbackEvents> {
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    private readonly resolver: Resolver,
    private readonly configureStep: ConfigureStep,
    options: FallbackControllerOptions = {}
  ) {
    super();
    this.env = options.env ?? process.env;
  }

  async configure(request: ResolutionRequest): Promise<ConfigurationOutcome> {
    const report = await this.resolver.resolve(request);
    this.emit('resolved', report);

    const env = PolicyOverlay.platformEnvironment(request.platform, this.env);
    const attempts: ConfigurationAttempt[] = [];

    if (needsFallback(report)) {
      logger.warn('No requested feature could be resolved; using the minimal configuration');
      return this.runMinimal(request, report, attempts, 'no-features-resolved', env);
    }

    const primaryArgs = configureArguments(request.installPrefix, report.enabledFlags);
    const primary = await this.attempt(ConfigurationTier.Primary, primaryArgs, env);
    attempts.push(primary);

    if (primary.success) {
      logger.success('Configuration completed successfully!');
      return this.complete({
        tier: ConfigurationTier.Primary,
        flags: report.enabledFlags,
        args: primaryArgs,
        features: report.included,
        report,
        attempts
      });
    }

    const rejection = new ForgeError(
      ForgeErrorCode.PrimaryConfigurationRejected,
      `configure exited with ${primary.exitCode ?? 'no status'}`
    );
    logger.warn(`${rejection.message}; trying minimal configuration...`);
    return this.runMinimal(request, report, attempts, 'primary-rejected', env);
  }

  private async runMinimal(
    request: ResolutionRequest,
    report: ResolutionReport,
    attempts: ConfigurationAttempt[],
    reason: FallbackReason,
    env: NodeJS.ProcessEnv
  ): Promise<ConfigurationOutcome> {
    this.emit('fallback', reason, report);

    const flags = this.resolver.minimalFlags(request);
    const args = configureArguments(request.installPrefix, flags);
    const minimal = await this.attempt(ConfigurationTier.Minimal, args, env);
    attempts.push(minimal);

    if (!minimal.success) {
      throw new ForgeError(
        ForgeErrorCode.MinimalConfigurationRejected,
        `configure exited with ${minimal.exitCode ?? 'no status'} even with built-in codecs only; ` +
          'the toolchain is likely broken',
        { context: { operation: 'configure', platform: request.platform, architecture: request.architecture } }
      );
    }

    logger.success('Minimal configuration completed successfully!');
    logger.warn('The build will include only built-in codecs');
    return this.complete({
      tier: ConfigurationTier.Minimal,
      flags,
      args,
      features: this.resolver.catalog.minimalFeatures().map(feature => feature.name),
      report,
      attempts,
      fallbackReason: reason
    });
  }

  private async attempt(
    tier: ConfigurationTier,
    args: string[],
    env: NodeJS.ProcessEnv
  ): Promise<ConfigurationAttempt> {
    this.emit('attempt', tier, args);
    logger.info(`Configuration options (${tier}):`);
    for (const arg of args) {
      logger.info(`  ${arg}`);
    }
    const result = await this.configureStep.run(args, { env });
    return { tier, args, exitCode: result.exitCode, success: result.success };
  }

  private complete(outcome: ConfigurationOutcome): ConfigurationOutcome {
    const frozen = Object.freeze(outcome);
    this.emit('completed', frozen);
    return frozen;
  }
}
