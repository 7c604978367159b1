/**
 * Core type definitions for FFmpeg feature resolution
 */

/** Target operating systems */
export enum TargetPlatform {
  Linux = 'linux',
  Darwin = 'darwin',
  Windows = 'windows'
}

/** Build profiles; exactly one applies to a build */
export enum BuildProfile {
  Release = 'release',
  Debug = 'debug'
}

/** How a feature's dependency is detected */
export enum ProbeStrategy {
  PackageMetadata = 'package-metadata',
  HeaderInclusion = 'header-inclusion',
  CommandExists = 'command-exists',
  AlwaysTrue = 'always-true'
}

/** Diagnostic grouping of catalog features */
export enum FeatureCategory {
  License = 'license',
  Video = 'video',
  Audio = 'audio',
  Image = 'image',
  Subtitle = 'subtitle',
  Tls = 'tls',
  Output = 'output',
  Tool = 'tool'
}

/** A single detection step */
export interface ProbeSpec {
  strategy: ProbeStrategy;
  /** Package name, header path or command name */
  target: string;
}

/** Static catalog entry for one optional capability */
export interface FeatureSpec {
  /** Unique key, e.g. "libx264" */
  readonly name: string;
  readonly description: string;
  readonly category: FeatureCategory;
  readonly probeStrategy: ProbeStrategy;
  readonly probeTarget: string;
  /** Probes tried in order when the primary probe reports unavailable */
  readonly alternateProbes: readonly ProbeSpec[];
  /** Configure flags emitted when the feature is enabled */
  readonly flags: readonly string[];
  /** Entry only reports availability and emits no flags */
  readonly detectionOnly: boolean;
  /** Member of the default-on tier */
  readonly defaultRequested: boolean;
  /** Flags survive into the minimal fallback configuration */
  readonly minimalTier: boolean;
}

/** Caller-supplied description of one resolution */
export interface ResolutionRequest {
  /** Empty means "use the default tier" */
  readonly requestedFeatures: readonly string[];
  readonly platform: TargetPlatform;
  readonly architecture: string;
  readonly buildProfile: BuildProfile;
  readonly installPrefix: string;
}

/** Outcome of probing one feature during one resolution run */
export interface ProbeResult {
  readonly feature: FeatureSpec;
  readonly available: boolean;
  /** Diagnostic text */
  readonly reason: string;
  /** Strategy of the probe that decided the result */
  readonly strategy: ProbeStrategy;
  readonly target: string;
}

/** Immutable result of a resolution */
export interface ResolutionReport {
  readonly request: ResolutionRequest;
  /** Platform flags, then feature flags in catalog order, then profile flags */
  readonly enabledFlags: readonly string[];
  readonly platformFlags: readonly string[];
  readonly profileFlags: readonly string[];
  /** Requested and available, in catalog order */
  readonly included: readonly string[];
  /** Requested but the probe failed, in catalog order */
  readonly skippedMissing: readonly string[];
  /** In the catalog but outside the effective set; never probed */
  readonly skippedUnrequested: readonly string[];
  /** Requested names absent from the catalog, in request order */
  readonly unknownRequested: readonly string[];
  /** One result per probed feature, in catalog order */
  readonly probeResults: readonly ProbeResult[];
}

export interface ResolutionRequestInput {
  requestedFeatures?: Iterable<string>;
  platform: TargetPlatform;
  architecture: string;
  buildProfile: BuildProfile;
  installPrefix: string;
}

/**
 * Create a frozen request. Feature names are trimmed, empty names dropped and
 * repeats collapsed to their first occurrence.
 */
export function createResolutionRequest(input: ResolutionRequestInput): ResolutionRequest {
  const seen = new Set<string>();
  for (const name of input.requestedFeatures ?? []) {
    const trimmed = name.trim();
    if (trimmed.length > 0) {
      seen.add(trimmed);
    }
  }

  return Object.freeze({
    requestedFeatures: Object.freeze([...seen]),
    platform: input.platform,
    architecture: input.architecture.trim(),
    buildProfile: input.buildProfile,
    installPrefix: input.installPrefix
  });
}
