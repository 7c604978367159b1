/**
 * @fileoverview Tests for ForgeError and the error code helpers
 */

import { describe, it, expect } from '@jest/globals';
import { ForgeError, ErrorSeverity, isForgeError, errorMessage } from '../forge-error';
import { ForgeErrorCode, ErrorCategory, getErrorCategory, isFatalCode } from '../codes';

describe('ForgeError', () => {
  it('should compose the message from the code summary and details', () => {
    const error = new ForgeError(ForgeErrorCode.UnsupportedPlatformArchitecture, 'windows/arm64');

    expect(error.message).toBe('Unsupported platform/architecture combination: windows/arm64');
    expect(error.details).toBe('windows/arm64');
    expect(error.name).toBe('ForgeError');
  });

  it('should use the summary alone when no details are given', () => {
    const error = new ForgeError(ForgeErrorCode.SourceNotFound, '');

    expect(error.message).toBe('FFmpeg source tree not found');
  });

  it('should classify fatal configuration errors', () => {
    const error = new ForgeError(ForgeErrorCode.InvalidConfig, 'bad build type');

    expect(error.category).toBe(ErrorCategory.Configuration);
    expect(error.fatal).toBe(true);
    expect(error.recoverable).toBe(false);
    expect(error.severity).toBe(ErrorSeverity.Error);
  });

  it('should treat a rejected primary configuration as recoverable', () => {
    const error = new ForgeError(ForgeErrorCode.PrimaryConfigurationRejected, 'exit code 1');

    expect(error.category).toBe(ErrorCategory.Configure);
    expect(error.fatal).toBe(false);
    expect(error.recoverable).toBe(true);
    expect(error.severity).toBe(ErrorSeverity.Warning);
  });

  it('should mark a rejected minimal configuration as critical', () => {
    const error = new ForgeError(ForgeErrorCode.MinimalConfigurationRejected, 'exit code 1');

    expect(error.severity).toBe(ErrorSeverity.Critical);
    expect(error.fatal).toBe(true);
  });

  it('should honour explicit options', () => {
    const cause = new Error('spawn ENOENT');
    const error = new ForgeError(ForgeErrorCode.ConfigureSpawnFailed, './configure', {
      recoverable: true,
      cause,
      context: { operation: 'configure', platform: 'linux' },
    });

    expect(error.recoverable).toBe(true);
    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ operation: 'configure', platform: 'linux' });
  });

  it('should serialize to JSON with code and category', () => {
    const json = new ForgeError(ForgeErrorCode.InvalidCatalog, 'duplicate name: libx264').toJSON();

    expect(json.code).toBe(ForgeErrorCode.InvalidCatalog);
    expect(json.category).toBe('configuration');
    expect(json.message).toBe('Invalid feature catalog: duplicate name: libx264');
  });

  it('should be detectable with isForgeError', () => {
    expect(isForgeError(new ForgeError(ForgeErrorCode.InvalidConfig, 'x'))).toBe(true);
    expect(isForgeError(new Error('x'))).toBe(false);
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });

  it('should read the message of errors that fail instanceof', () => {
    expect(errorMessage({ message: 'spawn gcc ENOENT', code: 'ENOENT' })).toBe('spawn gcc ENOENT');
    expect(errorMessage({ message: 42 })).toBe('[object Object]');
  });
});

describe('error codes', () => {
  it('should map numeric ranges to categories', () => {
    expect(getErrorCategory(ForgeErrorCode.ProbeTimedOut)).toBe(ErrorCategory.Probe);
    expect(getErrorCategory(ForgeErrorCode.UnknownRequestedFeature)).toBe(ErrorCategory.Resolution);
    expect(getErrorCategory(ForgeErrorCode.BuildInfoWriteFailed)).toBe(ErrorCategory.IO);
  });

  it('should list the non-fatal conditions', () => {
    expect(isFatalCode(ForgeErrorCode.ProbeToolUnavailable)).toBe(false);
    expect(isFatalCode(ForgeErrorCode.UnknownRequestedFeature)).toBe(false);
    expect(isFatalCode(ForgeErrorCode.UnsupportedPlatformArchitecture)).toBe(true);
  });
});
