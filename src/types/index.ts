/**
 * Common types and interfaces for the riverSpider setup CLI
 */

export * from './setup-context.js';

// System facts

export type ShellKind = 'bash' | 'zsh';

export type CpuArch = 'arm64' | 'x86_64';

export interface SystemFacts {
  osKind: 'darwin';
  osVersion: string;
  cpuArch: CpuArch;
  /** Human label for the chip, e.g. "Apple Silicon" */
  chipLabel: string;
  shellKind: ShellKind;
  shellProfilePath: string;
  /** Shell name handed to `mise activate` */
  versionManagerShell: ShellKind;
  /** Fixed by architecture, never searched for */
  packageManagerPath: string;
}

export interface ToolchainState {
  packageManagerPath: string;
  activated: boolean;
}

export type TargetDirectoryOrigin = 'found_existing' | 'freshly_downloaded';

export interface TargetDirectoryHandle {
  path: string;
  origin: TargetDirectoryOrigin;
}

export interface PatchRule {
  oldLine: string;
  newLine: string;
  description: string;
}

export interface ProfileInjection {
  /** Function name whose declaration marks the block as installed */
  marker: string;
  block: string;
}

// Configuration

export interface ProfileBasenames {
  zsh: string;
  bash: string;
}

export interface RiverSpiderConfig {
  profiles: ProfileBasenames;
  archive: {
    fileId: string;
    fileName: string;
  };
  runtime: {
    name: string;
    fallbackVersion: string;
  };
  packages: string[];
  toolsToVerify: string[];
  checkDomains: string[];
  resolver: {
    maxAttempts: number;
  };
  packageManager: {
    /** Overrides the per-architecture Homebrew location */
    path?: string;
  };
}

/** Shape accepted from config.jsonc; every key is optional */
export type RiverSpiderConfigFile = {
  [K in keyof RiverSpiderConfig]?: RiverSpiderConfig[K] extends unknown[]
    ? RiverSpiderConfig[K]
    : Partial<RiverSpiderConfig[K]>;
};

// Command results

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class SetupError extends Error {
  public code: ErrorCodes;
  public details?: unknown;

  constructor(message: string, code: ErrorCodes, details?: unknown) {
    super(message);
    this.name = 'SetupError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  UNSUPPORTED_PLATFORM = 'UNSUPPORTED_PLATFORM',
  NETWORK_UNAVAILABLE = 'NETWORK_UNAVAILABLE',
  MISSING_COMMAND = 'MISSING_COMMAND',
  CRITICAL_TASK_FAILED = 'CRITICAL_TASK_FAILED',
  RESOLUTION_EXHAUSTED = 'RESOLUTION_EXHAUSTED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  USER_CANCELLED = 'USER_CANCELLED'
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
