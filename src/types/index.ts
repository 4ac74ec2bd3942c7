// Core types for the otel-layer CLI

export type { Distribution, DistributionTable, DependencyMapping, ComponentTag, DistributionSummary } from './distribution.js';

export interface CommandResult {
  success: boolean;
  error?: string;
}

// Error types
export class LayerToolError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LayerToolError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  DISTRIBUTION_NOT_FOUND = 'DISTRIBUTION_NOT_FOUND',
  CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',
  CIRCULAR_DEPENDENCY = 'CIRCULAR_DEPENDENCY',
  CONFIG_ERROR = 'CONFIG_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  COMMAND_FAILED = 'COMMAND_FAILED',
  BUILD_FAILED = 'BUILD_FAILED'
}

// Non-fatal conditions reported through the diagnostics port
export enum WarningCodes {
  DEPENDENCY_CONFIG_DEGRADED = 'DEPENDENCY_CONFIG_DEGRADED',
  UNKNOWN_COMPONENT_TAG_FORMAT = 'UNKNOWN_COMPONENT_TAG_FORMAT',
  OVERLAY_SKIPPED = 'OVERLAY_SKIPPED',
  DEPENDENCY_NOT_ADDED = 'DEPENDENCY_NOT_ADDED',
  CONFIG_FILE_MISSING = 'CONFIG_FILE_MISSING'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export type Architecture = 'amd64' | 'arm64';
