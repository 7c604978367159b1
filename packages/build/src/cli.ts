#!/usr/bin/env node
/**
 * CLI interface for FFmpeg feature resolution and configuration
 */

import { join } from 'path';
import { Command } from 'commander';
import { table } from 'table';
import { ProbeStrategy, ResolutionRequest } from './types';
import { BuildCliOptions, BuildOptions, HostInfo, loadBuildOptions } from './config';
import { FeatureCatalog, getDefaultCatalog } from './catalog';
import { FeatureProber } from './probe';
import { Resolver } from './resolver';
import { ConfigureStep, ScriptConfigureStep } from './configure';
import { FallbackController } from './fallback';
import { PolicyOverlay } from './platforms';
import { formatFlagList, renderReport, reportToJson } from './report';
import { createBuildInfoRecord, distributionDirName, writeBuildInfo } from './build-info';
import { errorMessage } from './errors';
import { configureLogger, createLogger } from './utils/logger';

const logger = createLogger('cli');

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliDependencies {
  stdout?: OutputStream;
  env?: NodeJS.ProcessEnv;
  host?: HostInfo;
  catalog?: FeatureCatalog;
  /** Replaces the live prober, e.g. in tests */
  createProber?: (request: ResolutionRequest, options: BuildOptions) => FeatureProber;
  createConfigureStep?: (sourceDir: string) => ConfigureStep;
  setExitCode?: (code: number) => void;
}

interface ResolveCommandOptions extends BuildCliOptions {
  json?: boolean;
}

interface ConfigureCommandOptions extends BuildCliOptions {
  source: string;
  buildInfo?: string;
}

function addBuildOptions(command: Command): Command {
  return command
    .option('-c, --codecs <list>', 'Comma separated features to request (default tier when omitted)')
    .option('-t, --type <type>', 'Build type (release, debug)')
    .option('-p, --prefix <dir>', 'Install prefix')
    .option('--platform <platform>', 'Target platform (linux, darwin, windows)')
    .option('--arch <arch>', 'Target architecture')
    .option('--ffmpeg-version <version>', 'FFmpeg version')
    .option('--probe-timeout <ms>', 'Timeout for each dependency probe')
    .option('--log-level <level>', 'Log level (silent, error, warn, info, debug, trace)');
}

function defaultConfigureStep(sourceDir: string): ConfigureStep {
  const step = new ScriptConfigureStep(sourceDir);
  step.assertSourceTree();
  return step;
}

export function createProgram(deps: CliDependencies = {}): Command {
  const stdout = deps.stdout ?? process.stdout;
  const env = deps.env ?? process.env;
  const setExitCode = deps.setExitCode ?? ((code: number) => {
    process.exitCode = code;
  });
  const createConfigureStep = deps.createConfigureStep ?? defaultConfigureStep;

  const print = (text: string) => {
    stdout.write(`${text}\n`);
  };

  const fail = (error: unknown) => {
    logger.failure(errorMessage(error));
    setExitCode(1);
  };

  const load = (input: BuildCliOptions): BuildOptions => {
    const options = loadBuildOptions(input, env, deps.host);
    if (options.logLevel !== undefined) {
      configureLogger({ level: options.logLevel });
    }
    return options;
  };

  const createResolver = (options: BuildOptions): Resolver => {
    const createProber = deps.createProber;
    return new Resolver({
      catalog: deps.catalog,
      env,
      createProber: createProber ? request => createProber(request, options) : undefined,
      probeOptions: { timeoutMs: options.probeTimeoutMs, compiler: options.compiler }
    });
  };

  const program = new Command();

  program
    .name('ffmpeg-forge')
    .description('Resolve FFmpeg configure flags from the dependencies present on this machine')
    .version('0.1.0')
    .configureOutput({ writeOut: text => stdout.write(text) });

  addBuildOptions(
    program
      .command('resolve')
      .description('Probe dependencies and print the resolved configure flags')
      .option('--json', 'Print the report as JSON')
  ).action(async (input: ResolveCommandOptions) => {
    try {
      const options = load(input);
      const report = await createResolver(options).resolve(options.request);

      if (input.json) {
        print(JSON.stringify(reportToJson(report), null, 2));
      } else {
        print(renderReport(report));
      }
    } catch (error) {
      fail(error);
    }
  });

  addBuildOptions(
    program
      .command('configure')
      .description('Run FFmpeg configure, falling back to a minimal configuration when it fails')
      .option('-s, --source <dir>', 'FFmpeg source directory', '.')
      .option('--build-info <dir>', 'Distribution root to write build-info.txt under')
  ).action(async (input: ConfigureCommandOptions) => {
    try {
      const options = load(input);
      const { request } = options;
      const step = createConfigureStep(input.source);

      logger.info(`Configuring FFmpeg ${options.ffmpegVersion} for ${request.platform}-${request.architecture} (${request.buildProfile})`);
      const controller = new FallbackController(createResolver(options), step, { env });
      controller.on('fallback', reason => {
        logger.debug(`Falling back to minimal configuration (${reason})`);
      });

      const outcome = await controller.configure(request);
      print(`Configuration: ${outcome.tier}`);
      print(formatFlagList(outcome.args));

      if (input.buildInfo) {
        const dir = join(
          input.buildInfo,
          distributionDirName(request.platform, request.architecture, request.buildProfile)
        );
        const filePath = await writeBuildInfo(dir, createBuildInfoRecord(options.ffmpegVersion, outcome));
        print(`Build information: ${filePath}`);
      }
    } catch (error) {
      fail(error);
    }
  });

  program
    .command('features')
    .description('List the feature catalog')
    .action(() => {
      const catalog = deps.catalog ?? getDefaultCatalog();
      const rows = catalog.list().map(feature => [
        feature.name,
        feature.category,
        feature.minimalTier ? 'minimal' : feature.defaultRequested ? 'default' : 'opt-in',
        feature.probeStrategy === ProbeStrategy.AlwaysTrue ? '-' : `${feature.probeStrategy} ${feature.probeTarget}`,
        feature.detectionOnly ? '(detection only)' : feature.flags.join(' ')
      ]);
      print(table([['Feature', 'Category', 'Tier', 'Probe', 'Flags'], ...rows]));
    });

  program
    .command('targets')
    .description('List supported platform/architecture combinations')
    .action(() => {
      print('Supported targets:');
      for (const target of PolicyOverlay.supportedTargets()) {
        print(`  ${target.platform}/${target.architecture}`);
      }
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch(error => {
      logger.failure(errorMessage(error));
      process.exitCode = 1;
    });
}
