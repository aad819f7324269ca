// Core types for the pkgdeck client

import type { ChangeFailedError } from '../utils/errors.js';

export type Confinement = 'strict' | 'classic' | 'devmode';

/**
 * Installed package metadata as reported by the daemon.
 */
export interface LocalPackageInfo {
  name: string;
  version: string;
  revision: string;
  /** Tracking channel, normalized to `track/risk` */
  channel?: string;
  confinement: Confinement;
  summary?: string;
}

export interface ChannelInfo {
  version: string;
  revision: string;
  confinement: Confinement;
  releasedAt?: string;
}

/**
 * Remote catalog metadata for a package.
 */
export interface CatalogPackageInfo {
  name: string;
  summary?: string;
  defaultTrack?: string;
  channels: Record<string, ChannelInfo>;
}

export interface ChangeTask {
  done: number;
  total: number;
}

export interface ChangeErrorInfo {
  message: string;
  kind?: string;
}

/**
 * A daemon-tracked change. Immutable once `ready` is true.
 */
export interface ChangeRecord {
  id: string;
  kind?: string;
  summary?: string;
  status?: string;
  ready: boolean;
  error?: ChangeErrorInfo;
  tasks: ChangeTask[];
}

export type ChangeSummary = Pick<ChangeRecord, 'id' | 'ready' | 'kind' | 'summary'>;

export interface PackageRecord {
  name: string;
  localInfo?: LocalPackageInfo;
  catalogInfo?: CatalogPackageInfo;
  selectedChannel: string;
  activeChangeId?: string;
  hasUpdate: boolean;
  /** Failure of the most recent install/refresh, kept across the rebuild after it */
  lastChangeError?: ChangeFailedError;
}

export type AsyncValue<T> =
  | { status: 'loading' }
  | { status: 'data'; value: T }
  | { status: 'error'; error: Error };

/**
 * Tagged outcome of a daemon lookup. A missing package is a value, not an error.
 */
export type Lookup<T> =
  | { status: 'found'; value: T }
  | { status: 'not-found' }
  | { status: 'error'; error: Error };

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

export interface PkgdeckConfig {
  daemon: {
    socketPath: string;
    pollIntervalMs: number;
  };
  defaults: {
    channel?: string;
  };
}

export interface PkgdeckDirectories {
  config: string;
  cache: string;
}

// Error types
export class PkgdeckError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PkgdeckError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  PACKAGE_NOT_FOUND = 'PACKAGE_NOT_FOUND',
  PRECONDITION_FAILED = 'PRECONDITION_FAILED',
  DAEMON_ERROR = 'DAEMON_ERROR',
  CHANGE_FAILED = 'CHANGE_FAILED',
  WATCH_ABORTED = 'WATCH_ABORTED',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
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
