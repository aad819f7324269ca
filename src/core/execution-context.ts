/**
 * Execution Context Module
 *
 * Wires the daemon client, package state store, update checker and
 * installed-packages view for one command invocation. The daemon client
 * is created here and handed to everything else; nothing looks it up on
 * its own.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import type { PkgdeckConfig } from '../types/index.js';
import type { DaemonClient } from './daemon/daemon-client.js';
import { HttpDaemonClient } from './daemon/http-daemon-client.js';
import { PackageStateStore } from './packages/package-state-store.js';
import { InstalledPackagesView } from './packages/installed-packages.js';
import { DaemonUpdateChecker } from './packages/update-checker.js';
import { OperationController } from './packages/operation-controller.js';
import type { PackageHandle } from './packages/package-state-store.js';
import { configManager, resolveSocketPath } from './config.js';
import { logger } from '../utils/logger.js';

export interface ExecutionDeps {
  config?: PkgdeckConfig;
  /** Use this daemon instead of connecting to the configured socket */
  daemon?: DaemonClient;
}

/**
 * Create an ExecutionContext from command options.
 *
 * Socket priority: --socket, then PKGDECK_SOCKET, then the config file.
 */
export async function createExecutionContext(
  options: ExecutionOptions = {},
  deps: ExecutionDeps = {}
): Promise<ExecutionContext> {
  const config = deps.config ?? await configManager.load();

  let daemon: DaemonClient;
  let closeDaemon: () => Promise<void> = async () => {};
  if (deps.daemon) {
    daemon = deps.daemon;
  } else {
    const socketPath = resolveSocketPath(config, options.socket);
    const http = new HttpDaemonClient({ socketPath, pollIntervalMs: config.daemon.pollIntervalMs });
    daemon = http;
    closeDaemon = () => http.close();
    logger.debug('Created daemon client', { socketPath });
  }

  const updates = new DaemonUpdateChecker(daemon);
  const installed = new InstalledPackagesView(daemon);
  const packages = new PackageStateStore({
    daemon,
    updates,
    defaultChannel: config.defaults.channel
  });

  return {
    config,
    daemon,
    packages,
    installed,
    updates,
    async close() {
      packages.dispose();
      await closeDaemon();
    }
  };
}

/**
 * Operation controller bound to a package handle of this context.
 */
export function createOperationController(ctx: ExecutionContext, handle: PackageHandle): OperationController {
  return new OperationController(handle, { daemon: ctx.daemon, installed: ctx.installed });
}
