/**
 * @fileoverview Tests for FallbackController
 */

import { describe, it, expect } from '@jest/globals';
import { ConfigurationTier, FallbackController, needsFallback } from '../fallback';
import { Resolver } from '../resolver';
import { getDefaultCatalog } from '../catalog';
import { BuildProfile, ResolutionRequestInput, TargetPlatform, createResolutionRequest } from '../types';
import { ForgeErrorCode } from '../errors';
import { FakeConfigureStep, fakeProberFactory } from '../../../../tests/mocks/toolchain-mocks';

const LINUX_STATIC_FLAGS = [
  '--enable-static',
  '--disable-shared',
  '--extra-cflags=-static',
  '--extra-ldflags=-static',
  '--pkg-config-flags=--static'
];

const MINIMAL_ARGS = [
  '--prefix=/opt/ffmpeg',
  ...LINUX_STATIC_FLAGS,
  '--enable-gpl',
  '--enable-version3',
  '--enable-optimizations'
];

function request(overrides: Partial<ResolutionRequestInput> = {}) {
  return createResolutionRequest({
    requestedFeatures: ['libx264', 'libopus'],
    platform: TargetPlatform.Linux,
    architecture: 'x86_64',
    buildProfile: BuildProfile.Release,
    installPrefix: '/opt/ffmpeg',
    ...overrides
  });
}

function setup(installed: string[], exitCodes: Array<number | null>, env: NodeJS.ProcessEnv = { PATH: '/usr/bin' }) {
  const resolver = new Resolver({ catalog: getDefaultCatalog(), createProber: fakeProberFactory(installed).create });
  const step = new FakeConfigureStep(exitCodes);
  const controller = new FallbackController(resolver, step, { env });
  const events: string[] = [];
  controller.on('resolved', () => events.push('resolved'));
  controller.on('attempt', tier => events.push(`attempt:${tier}`));
  controller.on('fallback', reason => events.push(`fallback:${reason}`));
  controller.on('completed', outcome => events.push(`completed:${outcome.tier}`));
  return { controller, step, events };
}

describe('FallbackController', () => {
  it('should stop after a successful primary configuration', async () => {
    const { controller, step, events } = setup(['libx264', 'libopus'], [0]);

    const outcome = await controller.configure(request());

    expect(outcome.tier).toBe(ConfigurationTier.Primary);
    expect(outcome.args).toEqual([
      '--prefix=/opt/ffmpeg',
      ...LINUX_STATIC_FLAGS,
      '--enable-gpl',
      '--enable-libx264',
      '--enable-libopus',
      '--enable-optimizations'
    ]);
    expect(outcome.features).toEqual(['libx264', 'libopus']);
    expect(outcome.fallbackReason).toBeUndefined();
    expect(step.runs).toHaveLength(1);
    expect(events).toEqual(['resolved', 'attempt:primary', 'completed:primary']);
  });

  it('should retry once with the minimal flags when configure rejects the primary set', async () => {
    const { controller, step, events } = setup(['libx264', 'libopus'], [1, 0]);

    const outcome = await controller.configure(request());

    expect(outcome.tier).toBe(ConfigurationTier.Minimal);
    expect(outcome.fallbackReason).toBe('primary-rejected');
    expect(outcome.args).toEqual(MINIMAL_ARGS);
    expect(outcome.features).toEqual(['gpl', 'version3']);
    expect(outcome.attempts.map(attempt => [attempt.tier, attempt.exitCode])).toEqual([
      [ConfigurationTier.Primary, 1],
      [ConfigurationTier.Minimal, 0]
    ]);
    expect(outcome.report.included).toEqual(['libx264', 'libopus']);
    expect(step.runs.map(run => run.args)).toEqual([outcome.attempts[0].args, MINIMAL_ARGS]);
    expect(events).toEqual([
      'resolved',
      'attempt:primary',
      'fallback:primary-rejected',
      'attempt:minimal',
      'completed:minimal'
    ]);
  });

  it('should go straight to minimal when nothing requested resolves', async () => {
    const { controller, step, events } = setup([], [0]);

    const outcome = await controller.configure(request({ requestedFeatures: ['libfoo'] }));

    expect(outcome.report.included).toEqual([]);
    expect(outcome.report.unknownRequested).toEqual(['libfoo']);
    expect(outcome.tier).toBe(ConfigurationTier.Minimal);
    expect(outcome.fallbackReason).toBe('no-features-resolved');
    expect(step.runs.map(run => run.args)).toEqual([MINIMAL_ARGS]);
    expect(events).toEqual(['resolved', 'fallback:no-features-resolved', 'attempt:minimal', 'completed:minimal']);
  });

  it('should treat a configure that could not start as rejected', async () => {
    const { controller } = setup(['libx264'], [null, 0]);

    const outcome = await controller.configure(request());

    expect(outcome.tier).toBe(ConfigurationTier.Minimal);
    expect(outcome.attempts[0].exitCode).toBeNull();
  });

  it('should fail when the minimal configuration is rejected too', async () => {
    const { controller, step, events } = setup(['libx264', 'libopus'], [1, 1]);

    await expect(controller.configure(request())).rejects.toMatchObject({
      code: ForgeErrorCode.MinimalConfigurationRejected,
      message:
        'Minimal configuration rejected: configure exited with 1 even with built-in codecs only; ' +
        'the toolchain is likely broken'
    });
    expect(step.runs).toHaveLength(2);
    expect(events).not.toContain('completed:minimal');
  });

  it('should hand configure the platform environment', async () => {
    const { controller, step } = setup(['libx264'], [0], { PATH: '/usr/bin' });

    await controller.configure(request({ platform: TargetPlatform.Darwin, architecture: 'arm64' }));

    expect(step.runs[0].env).toEqual({
      PATH: '/usr/bin',
      PKG_CONFIG_PATH: '/opt/homebrew/lib/pkgconfig:/usr/local/lib/pkgconfig'
    });
  });
});

describe('needsFallback', () => {
  it('should only trigger when a non-empty request resolved nothing', async () => {
    const resolver = new Resolver({ catalog: getDefaultCatalog(), createProber: fakeProberFactory([]).create });

    const missing = await resolver.resolve(request({ requestedFeatures: ['libx264'] }));
    const defaults = await resolver.resolve(request({ requestedFeatures: [] }));

    expect(needsFallback(missing)).toBe(true);
    expect(needsFallback(defaults)).toBe(false);
  });
});
