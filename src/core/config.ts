import { join, extname } from 'path';
import { z } from 'zod';
import { PkgdeckConfig, PkgdeckDirectories } from '../types/index.js';
import { CONFIG_FILE_NAMES, DAEMON_DEFAULTS } from '../constants/index.js';
import { readJsonOrJsoncFile, writeJsonFile, writeTextFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { getPkgdeckDirectories } from './directory.js';

/**
 * Configuration management for the pkgdeck client
 * Supports both JSON and JSONC formats
 */

const DEFAULT_CONFIG_FILE = 'config.jsonc';

const DEFAULT_CONFIG: PkgdeckConfig = {
  daemon: {
    socketPath: DAEMON_DEFAULTS.SOCKET_PATH,
    pollIntervalMs: DAEMON_DEFAULTS.POLL_INTERVAL_MS
  },
  defaults: {}
};

const fileConfigSchema = z.object({
  daemon: z.object({
    socketPath: z.string().min(1).optional(),
    pollIntervalMs: z.number().int().positive().optional()
  }).optional(),
  defaults: z.object({
    channel: z.string().min(1).optional()
  }).optional()
});

const DEFAULT_CONFIG_TEXT = `{
  // Unix socket of the package daemon
  "daemon": {
    "socketPath": "${DEFAULT_CONFIG.daemon.socketPath}",
    "pollIntervalMs": ${DEFAULT_CONFIG.daemon.pollIntervalMs}
  },
  // "channel" picks the channel used when a package is not installed yet
  "defaults": {}
}
`;

function cloneDefaults(): PkgdeckConfig {
  return {
    daemon: { ...DEFAULT_CONFIG.daemon },
    defaults: { ...DEFAULT_CONFIG.defaults }
  };
}

export class ConfigManager {
  private config: PkgdeckConfig | null = null;
  private configPath: string | null = null;
  private dirs: PkgdeckDirectories;

  constructor(dirs: PkgdeckDirectories = getPkgdeckDirectories()) {
    this.dirs = dirs;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.dirs.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  private async getConfigPath(): Promise<string> {
    if (this.configPath) {
      return this.configPath;
    }

    const existingPath = await this.findConfigFile();
    this.configPath = existingPath ?? join(this.dirs.config, DEFAULT_CONFIG_FILE);
    return this.configPath;
  }

  /**
   * Load configuration from file, create default if it doesn't exist
   */
  async load(): Promise<PkgdeckConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = cloneDefaults();
      await this.writeDefaultFile();
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      logger.error('Failed to load configuration', { error });
      throw new ConfigError(`Failed to load configuration: ${configPath}`, { configPath });
    }

    const parsed = fileConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? issue.path.join('.') : '(root)';
      throw new ConfigError(`Invalid configuration value at '${where}' in ${configPath}`, {
        configPath,
        issues: parsed.error.issues.map(i => i.message)
      });
    }

    const { daemon, defaults } = parsed.data;
    this.configPath = configPath;
    this.config = {
      daemon: {
        socketPath: daemon?.socketPath ?? DEFAULT_CONFIG.daemon.socketPath,
        pollIntervalMs: daemon?.pollIntervalMs ?? DEFAULT_CONFIG.daemon.pollIntervalMs
      },
      defaults: defaults?.channel ? { channel: defaults.channel } : {}
    };
    return this.config;
  }

  /**
   * Save current configuration to file
   */
  async save(): Promise<void> {
    if (!this.config) {
      throw new ConfigError('No configuration loaded to save');
    }

    const configPath = await this.getConfigPath();
    try {
      logger.debug(`Saving config to: ${configPath}`);
      await writeJsonFile(configPath, this.config);
    } catch (error) {
      logger.error('Failed to save configuration', { error, configPath });
      throw new ConfigError(`Failed to save configuration: ${configPath}`, { configPath });
    }
  }

  private async writeDefaultFile(): Promise<void> {
    const configPath = await this.getConfigPath();
    try {
      if (extname(configPath) === '.jsonc') {
        await writeTextFile(configPath, DEFAULT_CONFIG_TEXT);
      } else {
        await writeJsonFile(configPath, DEFAULT_CONFIG);
      }
    } catch (error) {
      // Not fatal: defaults are already in memory
      logger.warn('Could not write default configuration', { error, configPath });
    }
  }

  async get<K extends keyof PkgdeckConfig>(key: K): Promise<PkgdeckConfig[K]> {
    const config = await this.load();
    return config[key];
  }

  async set<K extends keyof PkgdeckConfig>(key: K, value: PkgdeckConfig[K]): Promise<void> {
    const config = await this.load();
    config[key] = value;
    await this.save();
    logger.info(`Configuration updated: ${key}`, value);
  }

  async getAll(): Promise<PkgdeckConfig> {
    return await this.load();
  }

  /**
   * Reset configuration to defaults
   */
  async reset(): Promise<void> {
    this.config = cloneDefaults();
    await this.save();
    logger.info('Configuration reset to defaults');
  }

  async getConfigFilePath(): Promise<string> {
    return await this.getConfigPath();
  }
}

/**
 * Resolve the daemon socket path: explicit flag, then PKGDECK_SOCKET, then config.
 */
export function resolveSocketPath(config: PkgdeckConfig, override?: string): string {
  return override ?? process.env.PKGDECK_SOCKET ?? config.daemon.socketPath;
}

export const configManager = new ConfigManager();
