/**
 * build-info.txt metadata written next to a distribution
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { BuildProfile, TargetPlatform } from './types';
import { ConfigurationOutcome, ConfigurationTier } from './fallback';
import { ForgeError, ForgeErrorCode, errorMessage } from './errors';
import { createLogger } from './utils/logger';

const logger = createLogger('build-info');

export const BUILD_INFO_FILE = 'build-info.txt';

export interface BuildInfoRecord {
  ffmpegVersion: string;
  platform: TargetPlatform;
  architecture: string;
  buildProfile: BuildProfile;
  /** Which configuration tier succeeded */
  configuration: ConfigurationTier;
  features: readonly string[];
  flags: readonly string[];
  buildDate: Date;
}

export function createBuildInfoRecord(
  ffmpegVersion: string,
  outcome: ConfigurationOutcome,
  buildDate: Date = new Date()
): BuildInfoRecord {
  const { request } = outcome.report;
  return {
    ffmpegVersion,
    platform: request.platform,
    architecture: request.architecture,
    buildProfile: request.buildProfile,
    configuration: outcome.tier,
    features: outcome.features,
    flags: outcome.flags,
    buildDate
  };
}

export function formatBuildInfo(record: BuildInfoRecord): string {
  const title = 'FFmpeg Build Information';
  // The minimal tier enables license toggles only
  const codecs = record.configuration === ConfigurationTier.Minimal ? '(built-in only)' : record.features.join(',');
  const lines = [
    title,
    '='.repeat(title.length),
    `Version: ${record.ffmpegVersion}`,
    `Platform: ${record.platform}`,
    `Architecture: ${record.architecture}`,
    `Build Type: ${record.buildProfile}`,
    `Configuration: ${record.configuration}`,
    `Codecs: ${codecs}`,
    `Flags: ${record.flags.join(' ')}`,
    `Build Date: ${record.buildDate.toISOString()}`
  ];
  return `${lines.join('\n')}\n`;
}

/** `<platform>-<arch>-<profile>` */
export function distributionDirName(platform: TargetPlatform, architecture: string, profile: BuildProfile): string {
  return `${platform}-${architecture}-${profile}`;
}

/**
 * Write build-info.txt into `dir`, creating it when needed. Returns the file path.
 */
export async function writeBuildInfo(dir: string, record: BuildInfoRecord): Promise<string> {
  const filePath = join(dir, BUILD_INFO_FILE);
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(filePath, formatBuildInfo(record), 'utf8');
  } catch (error) {
    throw new ForgeError(ForgeErrorCode.BuildInfoWriteFailed, `${filePath}: ${errorMessage(error)}`, {
      cause: error instanceof Error ? error : undefined
    });
  }
  logger.info(`Build information written to ${filePath}`);
  return filePath;
}
