/**
 * Feature resolution: requested features + probe results + policy overlays
 * into an ordered configure flag list and a diagnostic report
 */

import { FeatureSpec, ProbeResult, ResolutionReport, ResolutionRequest } from './types';
import { FeatureCatalog, getDefaultCatalog } from './catalog';
import { FeatureProber, Prober, ProberOptions } from './probe';
import { PolicyOverlay } from './platforms';
import { FlagList } from './flag-list';
import { ForgeError, ForgeErrorCode } from './errors';
import { createLogger } from './utils/logger';

const logger = createLogger('resolver');

export interface ResolverOptions {
  catalog?: FeatureCatalog;
  /** Builds the prober used for one request; defaults to a live Prober */
  createProber?: (request: ResolutionRequest) => FeatureProber;
  /** Passed to the default live Prober */
  probeOptions?: Omit<ProberOptions, 'env'>;
  /** Base environment for the default live Prober */
  env?: NodeJS.ProcessEnv;
}

/** Which catalog features a request selects */
export interface EffectiveSelection {
  effective: FeatureSpec[];
  unrequested: FeatureSpec[];
  unknown: string[];
}

export class Resolver {
  readonly catalog: FeatureCatalog;
  private readonly createProber: (request: ResolutionRequest) => FeatureProber;

  constructor(options: ResolverOptions = {}) {
    this.catalog = options.catalog ?? getDefaultCatalog();
    const baseEnv = options.env ?? process.env;
    this.createProber = options.createProber ?? (request => new Prober({
      ...options.probeOptions,
      env: PolicyOverlay.platformEnvironment(request.platform, baseEnv)
    }));
  }

  /**
   * Split the catalog into the features this request considers and those it
   * leaves out. An empty request selects the default tier.
   */
  select(request: ResolutionRequest): EffectiveSelection {
    const requested = request.requestedFeatures.length === 0
      ? new Set(this.catalog.defaultFeatureNames())
      : new Set(request.requestedFeatures);

    const unknown = [...requested].filter(name => !this.catalog.has(name));
    const effective: FeatureSpec[] = [];
    const unrequested: FeatureSpec[] = [];

    for (const feature of this.catalog.list()) {
      (requested.has(feature.name) ? effective : unrequested).push(feature);
    }

    return { effective, unrequested, unknown };
  }

  async resolve(request: ResolutionRequest): Promise<ResolutionReport> {
    // Fails before any probe runs
    const platformFlags = PolicyOverlay.platformFlags(request.platform, request.architecture);
    const profileFlags = PolicyOverlay.profileFlags(request.buildProfile);

    const { effective, unrequested, unknown } = this.select(request);
    const prober = this.createProber(request);

    logger.debug(`Probing ${effective.length} feature(s) for ${request.platform}/${request.architecture}`);
    const startTime = Date.now();
    // Probes are independent; Promise.all keeps results in catalog order
    const probeResults: ProbeResult[] = await Promise.all(
      effective.map(feature => prober.probeFeature(feature))
    );
    logger.timing('Probing', startTime);

    const flags = new FlagList(platformFlags);
    const included: string[] = [];
    const skippedMissing: string[] = [];

    for (const result of probeResults) {
      if (result.available) {
        flags.appendAll(result.feature.flags);
        included.push(result.feature.name);
      } else {
        skippedMissing.push(result.feature.name);
      }
    }
    flags.appendAll(profileFlags);

    const report: ResolutionReport = Object.freeze({
      request,
      enabledFlags: Object.freeze(flags.toArray()),
      platformFlags: Object.freeze(platformFlags),
      profileFlags: Object.freeze(profileFlags),
      included: Object.freeze(included),
      skippedMissing: Object.freeze(skippedMissing),
      skippedUnrequested: Object.freeze(unrequested.map(feature => feature.name)),
      unknownRequested: Object.freeze(unknown),
      probeResults: Object.freeze(probeResults)
    });

    this.logSummary(report);
    return report;
  }

  /**
   * Flags for the minimal fallback: platform flags, the minimal-tier feature
   * flags and profile flags. Nothing is probed.
   */
  minimalFlags(request: ResolutionRequest): string[] {
    const flags = new FlagList(PolicyOverlay.platformFlags(request.platform, request.architecture));
    for (const feature of this.catalog.minimalFeatures()) {
      flags.appendAll(feature.flags);
    }
    flags.appendAll(PolicyOverlay.profileFlags(request.buildProfile));
    return flags.toArray();
  }

  private logSummary(report: ResolutionReport): void {
    logger.info(`Enabled features: ${report.included.join(', ') || '(none)'}`);
    if (report.skippedMissing.length > 0) {
      logger.warn(`Skipped, dependency not found: ${report.skippedMissing.join(', ')}`);
    }
    if (report.unknownRequested.length > 0) {
      logger.warn(new ForgeError(ForgeErrorCode.UnknownRequestedFeature, report.unknownRequested.join(', ')).message);
    }
    logger.debug(`Not requested: ${report.skippedUnrequested.join(', ') || '(none)'}`);
  }
}
