/**
 * Build configuration management and constants
 */

import { z } from 'zod';
import { BuildProfile, ResolutionRequest, TargetPlatform, createResolutionRequest } from './types';
import { DEFAULT_PROBE_TIMEOUT_MS } from './probe';
import { ForgeError, ForgeErrorCode } from './errors';
import { LogLevel, parseLogLevel } from './utils/logger';

/** Default configuration values */
export const DEFAULT_CONFIG = {
  /** FFmpeg release the build targets */
  FFMPEG_VERSION: '6.1',

  BUILD_PROFILE: BuildProfile.Release,

  INSTALL_PREFIX: '/usr/local',

  /** Per-probe timeout in milliseconds */
  PROBE_TIMEOUT: DEFAULT_PROBE_TIMEOUT_MS
};

/** Environment variable names */
export const ENV_VARS = {
  FFMPEG_VERSION: 'FFMPEG_VERSION',

  /** release or debug */
  BUILD_TYPE: 'BUILD_TYPE',

  PREFIX: 'PREFIX',

  ARCH: 'ARCH',

  /** Not PLATFORM, which Visual Studio developer shells set to the architecture */
  TARGET_PLATFORM: 'TARGET_PLATFORM',

  /** Comma separated feature names */
  ENABLE_CODECS: 'ENABLE_CODECS',

  LOG_LEVEL: 'LOG_LEVEL',

  /** Preprocessor used by header probes */
  CC: 'CC'
} as const;

const PLATFORM_ALIASES: Record<string, TargetPlatform> = {
  linux: TargetPlatform.Linux,
  darwin: TargetPlatform.Darwin,
  macos: TargetPlatform.Darwin,
  mac: TargetPlatform.Darwin,
  windows: TargetPlatform.Windows,
  win32: TargetPlatform.Windows,
  mingw32: TargetPlatform.Windows,
  mingw64: TargetPlatform.Windows,
  msys: TargetPlatform.Windows
};

/** Options as they arrive from the command line; all strings */
export interface BuildCliOptions {
  codecs?: string;
  type?: string;
  prefix?: string;
  platform?: string;
  arch?: string;
  ffmpegVersion?: string;
  logLevel?: string;
  probeTimeout?: string;
}

export interface BuildOptions {
  request: ResolutionRequest;
  ffmpegVersion: string;
  logLevel?: LogLevel;
  probeTimeoutMs: number;
  /** Preprocessor override for header probes */
  compiler?: string;
}

/** Host information used when the target is not given explicitly */
export interface HostInfo {
  platform: NodeJS.Platform;
  arch: string;
}

export function parsePlatform(value: string): TargetPlatform | undefined {
  return PLATFORM_ALIASES[value.trim().toLowerCase()];
}

/**
 * Get current platform information
 */
export function getCurrentPlatform(nodePlatform: NodeJS.Platform = process.platform): TargetPlatform {
  switch (nodePlatform) {
    case 'darwin':
      return TargetPlatform.Darwin;
    case 'win32':
      return TargetPlatform.Windows;
    case 'linux':
      return TargetPlatform.Linux;
    default:
      throw new ForgeError(ForgeErrorCode.UnsupportedPlatform, nodePlatform);
  }
}

/**
 * Map Node's architecture name to the one configure expects for the target
 */
export function getCurrentArchitecture(platform: TargetPlatform, nodeArch: string = process.arch): string {
  switch (nodeArch) {
    case 'x64':
      return 'x86_64';
    case 'arm64':
      return platform === TargetPlatform.Linux ? 'aarch64' : 'arm64';
    case 'ia32':
      return 'i686';
    default:
      return nodeArch;
  }
}

/**
 * Split a comma separated feature list, dropping blanks
 */
export function parseFeatureList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map(name => name.trim())
    .filter(name => name.length > 0);
}

const buildOptionsSchema = z.object({
  ffmpegVersion: z.string().trim().min(1, 'FFmpeg version must not be empty'),
  buildType: z
    .string()
    .trim()
    .refine(
      value => value === BuildProfile.Release || value === BuildProfile.Debug,
      value => ({ message: `Invalid build type: ${value} (must be 'release' or 'debug')` })
    )
    .transform(value => (value === BuildProfile.Debug ? BuildProfile.Debug : BuildProfile.Release)),
  installPrefix: z.string().trim().min(1, 'Install prefix must not be empty'),
  platform: z.string().transform((value, ctx) => {
    const platform = parsePlatform(value);
    if (!platform) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid platform: ${value} (must be one of ${Object.values(TargetPlatform).join(', ')})`
      });
      return z.NEVER;
    }
    return platform;
  }),
  architecture: z.string().trim().optional(),
  codecs: z.string().optional(),
  logLevel: z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) {
        return undefined;
      }
      const level = parseLogLevel(value);
      if (level === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Invalid log level: ${value} (must be one of ${Object.values(LogLevel).join(', ')})`
        });
        return z.NEVER;
      }
      return level;
    }),
  probeTimeoutMs: z.coerce.number().int().positive('Probe timeout must be a positive number of milliseconds'),
  compiler: z.string().trim().min(1).optional()
});

/** First value that is set and not blank, mirroring `${VAR:-default}` */
function firstSet(...values: Array<string | undefined>): string | undefined {
  return values.find(value => value !== undefined && value.trim().length > 0);
}

/**
 * Merge command line options over the environment over the defaults and
 * validate the result
 */
export function loadBuildOptions(
  input: BuildCliOptions = {},
  env: NodeJS.ProcessEnv = process.env,
  host: HostInfo = { platform: process.platform, arch: process.arch }
): BuildOptions {
  const parsed = buildOptionsSchema.safeParse({
    ffmpegVersion: firstSet(input.ffmpegVersion, env[ENV_VARS.FFMPEG_VERSION]) ?? DEFAULT_CONFIG.FFMPEG_VERSION,
    buildType: firstSet(input.type, env[ENV_VARS.BUILD_TYPE]) ?? DEFAULT_CONFIG.BUILD_PROFILE,
    installPrefix: firstSet(input.prefix, env[ENV_VARS.PREFIX]) ?? DEFAULT_CONFIG.INSTALL_PREFIX,
    platform: firstSet(input.platform, env[ENV_VARS.TARGET_PLATFORM]) ?? getCurrentPlatform(host.platform),
    architecture: firstSet(input.arch, env[ENV_VARS.ARCH]),
    codecs: firstSet(input.codecs, env[ENV_VARS.ENABLE_CODECS]),
    logLevel: firstSet(input.logLevel, env[ENV_VARS.LOG_LEVEL]),
    probeTimeoutMs: firstSet(input.probeTimeout) ?? DEFAULT_CONFIG.PROBE_TIMEOUT,
    compiler: firstSet(env[ENV_VARS.CC])
  });

  if (!parsed.success) {
    throw new ForgeError(
      ForgeErrorCode.InvalidConfig,
      parsed.error.issues.map(issue => issue.message).join('; ')
    );
  }

  const options = parsed.data;
  const request = createResolutionRequest({
    requestedFeatures: parseFeatureList(options.codecs),
    platform: options.platform,
    architecture: options.architecture ?? getCurrentArchitecture(options.platform, host.arch),
    buildProfile: options.buildType,
    installPrefix: options.installPrefix
  });

  return {
    request,
    ffmpegVersion: options.ffmpegVersion,
    logLevel: options.logLevel,
    probeTimeoutMs: options.probeTimeoutMs,
    compiler: options.compiler
  };
}
