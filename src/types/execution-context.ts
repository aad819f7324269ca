/**
 * Execution Context Types
 *
 * Everything a command needs to act on packages: the daemon connection,
 * the package state store built on it, the aggregate installed view and
 * the output port.
 */

import type { PkgdeckConfig } from './index.js';
import type { DaemonClient } from '../core/daemon/daemon-client.js';
import type { PackageStateStore } from '../core/packages/package-state-store.js';
import type { InstalledPackagesView } from '../core/packages/installed-packages.js';
import type { DaemonUpdateChecker } from '../core/packages/update-checker.js';
import type { OutputPort } from '../core/ports/output.js';

export interface ExecutionContext {
  config: PkgdeckConfig;

  /** Shared by every store entry, watcher and progress channel */
  daemon: DaemonClient;

  packages: PackageStateStore;

  installed: InstalledPackagesView;

  updates: DaemonUpdateChecker;

  /**
   * Output port for all user-facing messages.
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;

  /** Release the daemon connection and every package entry */
  close(): Promise<void>;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /** --socket flag: daemon socket path */
  socket?: string;

  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}
