/**
 * @fileoverview Feature resolution for FFmpeg builds
 *
 * Probes the build machine for optional dependencies, turns the requested
 * features that are present into an ordered configure flag list and drives
 * FFmpeg's configure with a minimal fallback.
 */

export * from './types';
export * from './errors';
export * from './flag-list';
export * from './catalog';
export * from './probe';
export * from './platforms';
export * from './resolver';
export * from './configure';
export * from './fallback';
export * from './report';
export * from './build-info';
export * from './config';
export { Logger, LogLevel, type LoggerConfig, configureLogger, createLogger, parseLogLevel } from './utils/logger';
export { createProgram, type CliDependencies, type OutputStream } from './cli';
