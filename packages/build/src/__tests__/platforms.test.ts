/**
 * @fileoverview Tests for the platform and profile policy overlay
 */

import { describe, it, expect } from '@jest/globals';
import { PolicyOverlay, DARWIN_PKG_CONFIG_DIRS } from '../platforms';
import { BuildProfile, TargetPlatform } from '../types';
import { ForgeError, ForgeErrorCode } from '../errors';

describe('PolicyOverlay', () => {
  describe('platformFlags', () => {
    it('should emit static pkg-config flags for Linux', () => {
      expect(PolicyOverlay.platformFlags(TargetPlatform.Linux, 'x86_64')).toEqual([
        '--enable-static',
        '--disable-shared',
        '--extra-cflags=-static',
        '--extra-ldflags=-static',
        '--pkg-config-flags=--static'
      ]);
    });

    it('should emit mingw cross-compilation flags for Windows', () => {
      expect(PolicyOverlay.platformFlags(TargetPlatform.Windows, 'x86_64')).toEqual([
        '--target-os=mingw32',
        '--arch=x86_64',
        '--cross-prefix=x86_64-w64-mingw32-',
        '--enable-static',
        '--disable-shared',
        '--extra-cflags=-static',
        '--extra-ldflags=-static'
      ]);
    });

    it('should use the architecture in the Windows cross prefix', () => {
      expect(PolicyOverlay.platformFlags(TargetPlatform.Windows, 'i686')).toContain('--cross-prefix=i686-w64-mingw32-');
    });

    it('should pin the macOS deployment target', () => {
      expect(PolicyOverlay.platformFlags(TargetPlatform.Darwin, 'x86_64')).toEqual([
        '--target-os=darwin',
        '--enable-static',
        '--disable-shared',
        '--extra-cflags=-mmacosx-version-min=10.15',
        '--extra-ldflags=-mmacosx-version-min=10.15'
      ]);
    });

    it('should mark darwin arm64 as a cross build', () => {
      const flags = PolicyOverlay.platformFlags(TargetPlatform.Darwin, 'arm64');

      expect(flags.slice(0, 3)).toEqual(['--target-os=darwin', '--arch=arm64', '--enable-cross-compile']);
    });

    it('should reject combinations it has no rules for', () => {
      let thrown: unknown;
      try {
        PolicyOverlay.platformFlags(TargetPlatform.Windows, 'arm64');
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ForgeError);
      expect(thrown).toMatchObject({ code: ForgeErrorCode.UnsupportedPlatformArchitecture });
      expect(thrown).toHaveProperty(
        'message',
        'Unsupported platform/architecture combination: windows/arm64 (supported on windows: x86_64, i686)'
      );
    });
  });

  describe('profileFlags', () => {
    it('should enable optimizations for release', () => {
      expect(PolicyOverlay.profileFlags(BuildProfile.Release)).toEqual(['--enable-optimizations']);
    });

    it('should disable optimizations and stripping for debug', () => {
      expect(PolicyOverlay.profileFlags(BuildProfile.Debug)).toEqual([
        '--enable-debug',
        '--disable-optimizations',
        '--disable-stripping'
      ]);
    });
  });

  describe('supportedTargets', () => {
    it('should list every platform/architecture pair', () => {
      const targets = PolicyOverlay.supportedTargets().map(target => `${target.platform}/${target.architecture}`);

      expect(targets).toEqual([
        'linux/x86_64',
        'linux/aarch64',
        'linux/arm64',
        'linux/i686',
        'darwin/x86_64',
        'darwin/arm64',
        'windows/x86_64',
        'windows/i686'
      ]);
    });
  });

  describe('platformEnvironment', () => {
    it('should prepend the Homebrew pkg-config directories on darwin', () => {
      const env = PolicyOverlay.platformEnvironment(TargetPlatform.Darwin, {
        PATH: '/usr/bin',
        PKG_CONFIG_PATH: '/opt/custom/pkgconfig'
      });

      expect(env.PKG_CONFIG_PATH).toBe(
        '/opt/homebrew/lib/pkgconfig:/usr/local/lib/pkgconfig:/opt/custom/pkgconfig'
      );
      expect(env.PATH).toBe('/usr/bin');
    });

    it('should use only the Homebrew directories when none were set', () => {
      const env = PolicyOverlay.platformEnvironment(TargetPlatform.Darwin, {});

      expect(env.PKG_CONFIG_PATH).toBe(DARWIN_PKG_CONFIG_DIRS.join(':'));
    });

    it('should copy the environment unchanged elsewhere', () => {
      const base = { PKG_CONFIG_PATH: '/opt/custom/pkgconfig' };
      const env = PolicyOverlay.platformEnvironment(TargetPlatform.Linux, base);

      expect(env).toEqual(base);
      expect(env).not.toBe(base);
    });
  });
});
