/**
 * @fileoverview Error codes for the FFmpeg build toolchain
 *
 * Error codes are organized by category using numeric ranges:
 * - 1000-1099: Configuration errors
 * - 2000-2099: Probe errors
 * - 3000-3099: Resolution errors
 * - 4000-4099: Configure step errors
 * - 5000-5099: I/O errors
 */

export enum ForgeErrorCode {
  // Configuration errors (1000-1099)
  InvalidConfig = 1000,
  InvalidCatalog = 1001,
  UnsupportedPlatformArchitecture = 1002,
  UnsupportedPlatform = 1003,
  SourceNotFound = 1004,

  // Probe errors (2000-2099)
  ProbeToolUnavailable = 2000,
  ProbeTimedOut = 2001,

  // Resolution errors (3000-3099)
  UnknownRequestedFeature = 3000,

  // Configure step errors (4000-4099)
  PrimaryConfigurationRejected = 4000,
  MinimalConfigurationRejected = 4001,
  ConfigureSpawnFailed = 4002,

  // I/O errors (5000-5099)
  BuildInfoWriteFailed = 5000,
}

export enum ErrorCategory {
  Configuration = 'configuration',
  Probe = 'probe',
  Resolution = 'resolution',
  Configure = 'configure',
  IO = 'io',
}

/**
 * Map an error code to its category from the numeric range
 */
export function getErrorCategory(code: ForgeErrorCode): ErrorCategory {
  if (code >= 1000 && code < 2000) return ErrorCategory.Configuration;
  if (code >= 2000 && code < 3000) return ErrorCategory.Probe;
  if (code >= 3000 && code < 4000) return ErrorCategory.Resolution;
  if (code >= 4000 && code < 5000) return ErrorCategory.Configure;
  return ErrorCategory.IO;
}

/**
 * Codes that never abort a build run on their own. They are collected into
 * the resolution report or handled by the fallback controller.
 */
export const NON_FATAL_CODES: ReadonlySet<ForgeErrorCode> = new Set([
  ForgeErrorCode.ProbeToolUnavailable,
  ForgeErrorCode.ProbeTimedOut,
  ForgeErrorCode.UnknownRequestedFeature,
  ForgeErrorCode.PrimaryConfigurationRejected,
]);

export function isFatalCode(code: ForgeErrorCode): boolean {
  return !NON_FATAL_CODES.has(code);
}
