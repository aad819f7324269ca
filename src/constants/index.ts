/**
 * Shared constants for the pkgdeck client
 */

export const DIR_PATTERNS = {
  PKGDECK: '.pkgdeck'
} as const;

export const PKGDECK_DIRS = {
  CACHE: 'cache'
} as const;

export const CONFIG_FILE_NAMES = ['config.jsonc', 'config.json'] as const;

export const DAEMON_DEFAULTS = {
  SOCKET_PATH: '/run/snapd.socket',
  POLL_INTERVAL_MS: 250
} as const;

export const CHANNEL_DEFAULTS = {
  TRACK: 'latest',
  RISK: 'stable'
} as const;

/** Daemon error kinds that mean "no such package" on lookup endpoints */
export const NOT_FOUND_KINDS: readonly string[] = ['snap-not-found'];
