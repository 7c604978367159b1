/**
 * @fileoverview Structured error class for build resolution and configuration
 */

import { ForgeErrorCode, ErrorCategory, getErrorCategory, isFatalCode } from './codes';

/**
 * Context attached to an error for diagnostics
 */
export interface ErrorContext {
  /** Operation being performed when the error occurred */
  operation?: string;
  /** Target platform of the build */
  platform?: string;
  /** Target architecture of the build */
  architecture?: string;
  /** Component or module where the error originated */
  component?: string;
  /** Additional contextual data */
  metadata?: Record<string, unknown>;
}

export enum ErrorSeverity {
  Warning = 'warning',
  Error = 'error',
  Critical = 'critical',
}

export interface ForgeErrorOptions {
  recoverable?: boolean;
  severity?: ErrorSeverity;
  cause?: Error;
  context?: ErrorContext;
}

/**
 * Error raised by the build toolchain. The message is composed from a fixed
 * per-code summary and the caller's details.
 */
export class ForgeError extends Error {
  public readonly name = 'ForgeError';
  public readonly code: ForgeErrorCode;
  public readonly category: ErrorCategory;
  public readonly details: string;
  public readonly recoverable: boolean;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly timestamp: Date;

  constructor(code: ForgeErrorCode, details: string, options: ForgeErrorOptions = {}) {
    super(ForgeError.formatMessage(code, details));

    this.code = code;
    this.category = getErrorCategory(code);
    this.details = details;
    this.recoverable = options.recoverable ?? !isFatalCode(code);
    this.severity = options.severity ?? ForgeError.getSeverityForCode(code);
    this.context = options.context;
    this.timestamp = new Date();

    if (options.cause) {
      this.cause = options.cause;
    }

    Object.setPrototypeOf(this, ForgeError.prototype);
  }

  private static formatMessage(code: ForgeErrorCode, details: string): string {
    const baseMessage = ForgeError.getMessageForCode(code);
    return details ? `${baseMessage}: ${details}` : baseMessage;
  }

  /**
   * Human-readable summary for an error code
   */
  static getMessageForCode(code: ForgeErrorCode): string {
    const messages: Record<ForgeErrorCode, string> = {
      [ForgeErrorCode.InvalidConfig]: 'Invalid build configuration',
      [ForgeErrorCode.InvalidCatalog]: 'Invalid feature catalog',
      [ForgeErrorCode.UnsupportedPlatformArchitecture]: 'Unsupported platform/architecture combination',
      [ForgeErrorCode.UnsupportedPlatform]: 'Unsupported platform',
      [ForgeErrorCode.SourceNotFound]: 'FFmpeg source tree not found',
      [ForgeErrorCode.ProbeToolUnavailable]: 'Probe tool unavailable',
      [ForgeErrorCode.ProbeTimedOut]: 'Probe timed out',
      [ForgeErrorCode.UnknownRequestedFeature]: 'Unknown requested feature',
      [ForgeErrorCode.PrimaryConfigurationRejected]: 'Primary configuration rejected',
      [ForgeErrorCode.MinimalConfigurationRejected]: 'Minimal configuration rejected',
      [ForgeErrorCode.ConfigureSpawnFailed]: 'Failed to start configure',
      [ForgeErrorCode.BuildInfoWriteFailed]: 'Failed to write build information',
    };

    return messages[code] ?? 'Unknown build error';
  }

  private static getSeverityForCode(code: ForgeErrorCode): ErrorSeverity {
    if (code === ForgeErrorCode.MinimalConfigurationRejected) {
      return ErrorSeverity.Critical;
    }
    return isFatalCode(code) ? ErrorSeverity.Error : ErrorSeverity.Warning;
  }

  get fatal(): boolean {
    return isFatalCode(this.code);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      details: this.details,
      recoverable: this.recoverable,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export function isForgeError(error: unknown): error is ForgeError {
  return error instanceof ForgeError;
}

/**
 * Render any thrown value as a single-line message
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
