/**
 * Platform and profile policy overlays for FFmpeg configure flags
 */

import { TargetPlatform, BuildProfile } from './types';
import { ForgeError, ForgeErrorCode } from './errors';

/** Minimum macOS version passed to both compile and link stages */
export const MACOS_MIN_VERSION = '10.15';

/** Homebrew pkg-config directories searched ahead of the caller's own */
export const DARWIN_PKG_CONFIG_DIRS = ['/opt/homebrew/lib/pkgconfig', '/usr/local/lib/pkgconfig'];

const LINKAGE_FLAGS = ['--enable-static', '--disable-shared'];
const STATIC_LINK_FLAGS = ['--extra-cflags=-static', '--extra-ldflags=-static'];

const SUPPORTED_ARCHITECTURES: Record<TargetPlatform, readonly string[]> = {
  [TargetPlatform.Linux]: ['x86_64', 'aarch64', 'arm64', 'i686'],
  [TargetPlatform.Darwin]: ['x86_64', 'arm64'],
  [TargetPlatform.Windows]: ['x86_64', 'i686']
};

export interface SupportedTarget {
  platform: TargetPlatform;
  architecture: string;
}

/**
 * Flag injection that depends only on the target and the build profile,
 * never on feature selection
 */
export class PolicyOverlay {
  static supportedArchitectures(platform: TargetPlatform): readonly string[] {
    return SUPPORTED_ARCHITECTURES[platform];
  }

  static isSupportedArchitecture(platform: TargetPlatform, architecture: string): boolean {
    return SUPPORTED_ARCHITECTURES[platform].includes(architecture);
  }

  static supportedTargets(): SupportedTarget[] {
    return Object.values(TargetPlatform).flatMap(platform =>
      SUPPORTED_ARCHITECTURES[platform].map(architecture => ({ platform, architecture }))
    );
  }

  /**
   * Throw when the overlay has no rules for the platform/architecture pair
   */
  static assertSupported(platform: TargetPlatform, architecture: string): void {
    if (!this.isSupportedArchitecture(platform, architecture)) {
      const supported = SUPPORTED_ARCHITECTURES[platform].join(', ');
      throw new ForgeError(
        ForgeErrorCode.UnsupportedPlatformArchitecture,
        `${platform}/${architecture} (supported on ${platform}: ${supported})`,
        { context: { operation: 'platformFlags', platform, architecture } }
      );
    }
  }

  /** mingw-w64 toolchain prefix for a Windows target */
  static crossPrefix(architecture: string): string {
    return `${architecture}-w64-mingw32-`;
  }

  static platformFlags(platform: TargetPlatform, architecture: string): string[] {
    this.assertSupported(platform, architecture);

    switch (platform) {
      case TargetPlatform.Windows:
        return [
          '--target-os=mingw32',
          `--arch=${architecture}`,
          `--cross-prefix=${this.crossPrefix(architecture)}`,
          ...LINKAGE_FLAGS,
          ...STATIC_LINK_FLAGS
        ];

      case TargetPlatform.Darwin: {
        // arm64 counts as a cross build even on an arm64 host
        const archFlags = architecture === 'arm64' ? ['--arch=arm64', '--enable-cross-compile'] : [];
        return [
          '--target-os=darwin',
          ...archFlags,
          ...LINKAGE_FLAGS,
          `--extra-cflags=-mmacosx-version-min=${MACOS_MIN_VERSION}`,
          `--extra-ldflags=-mmacosx-version-min=${MACOS_MIN_VERSION}`
        ];
      }

      case TargetPlatform.Linux:
        return [...LINKAGE_FLAGS, ...STATIC_LINK_FLAGS, '--pkg-config-flags=--static'];
    }
  }

  static profileFlags(profile: BuildProfile): string[] {
    switch (profile) {
      case BuildProfile.Debug:
        return ['--enable-debug', '--disable-optimizations', '--disable-stripping'];
      case BuildProfile.Release:
        return ['--enable-optimizations'];
    }
  }

  /**
   * Environment for probes and configure. Darwin puts the Homebrew
   * pkg-config directories ahead of any existing PKG_CONFIG_PATH.
   */
  static platformEnvironment(platform: TargetPlatform, baseEnv: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
    if (platform !== TargetPlatform.Darwin) {
      return { ...baseEnv };
    }

    const searchPath = [...DARWIN_PKG_CONFIG_DIRS, baseEnv.PKG_CONFIG_PATH]
      .filter((dir): dir is string => Boolean(dir))
      .join(':');

    return { ...baseEnv, PKG_CONFIG_PATH: searchPath };
  }
}

export function platformFlags(platform: TargetPlatform, architecture: string): string[] {
  return PolicyOverlay.platformFlags(platform, architecture);
}

export function profileFlags(profile: BuildProfile): string[] {
  return PolicyOverlay.profileFlags(profile);
}
