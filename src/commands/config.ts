import { Command } from 'commander';
import { withErrorHandling, ValidationError } from '../utils/errors.js';
import { configManager } from '../core/config.js';
import { resolveOutput } from '../core/ports/resolve.js';
import type { PkgdeckConfig } from '../types/index.js';

const CONFIG_KEYS = ['socket', 'channel', 'poll-interval'] as const;
type ConfigKey = typeof CONFIG_KEYS[number];

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some(candidate => candidate === key);
}

function applySetting(config: PkgdeckConfig, key: ConfigKey, value: string): PkgdeckConfig {
  switch (key) {
    case 'socket':
      return { ...config, daemon: { ...config.daemon, socketPath: value } };
    case 'channel':
      return { ...config, defaults: { ...config.defaults, channel: value } };
    case 'poll-interval': {
      const ms = Number(value);
      if (!Number.isInteger(ms) || ms <= 0) {
        throw new ValidationError(`poll-interval must be a positive integer, got '${value}'`);
      }
      return { ...config, daemon: { ...config.daemon, pollIntervalMs: ms } };
    }
  }
}

async function showConfig(): Promise<void> {
  const config = await configManager.getAll();
  const lines = [
    `socket:        ${config.daemon.socketPath}`,
    `poll-interval: ${config.daemon.pollIntervalMs}ms`,
    `channel:       ${config.defaults.channel ?? '(catalog default)'}`
  ];
  resolveOutput().note(lines.join('\n'), await configManager.getConfigFilePath());
}

async function setConfig(key: string, value: string): Promise<void> {
  if (!isConfigKey(key)) {
    throw new ValidationError(`Unknown config key '${key}'. Valid keys: ${CONFIG_KEYS.join(', ')}`);
  }
  const next = applySetting(await configManager.getAll(), key, value);
  await configManager.set('daemon', next.daemon);
  await configManager.set('defaults', next.defaults);
  resolveOutput().success(`${key} set to ${value}`);
}

export function setupConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Show or edit pkgdeck configuration');

  config
    .command('show')
    .description('Show the effective configuration')
    .action(withErrorHandling(showConfig));

  config
    .command('set')
    .description(`Set a configuration value (${CONFIG_KEYS.join(', ')})`)
    .argument('<key>', 'configuration key')
    .argument('<value>', 'new value')
    .action(withErrorHandling(async (key: string, value: string) => {
      await setConfig(key, value);
    }));

  config
    .command('reset')
    .description('Restore the default configuration')
    .action(withErrorHandling(async () => {
      await configManager.reset();
      resolveOutput().success('Configuration reset to defaults');
    }));
}
