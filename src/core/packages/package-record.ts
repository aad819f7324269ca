import type { CatalogPackageInfo, ChannelInfo, LocalPackageInfo, PackageRecord } from '../../types/index.js';
import { CHANNEL_DEFAULTS } from '../../constants/index.js';

const FALLBACK_CHANNEL = `${CHANNEL_DEFAULTS.TRACK}/${CHANNEL_DEFAULTS.RISK}`;

/**
 * Pick the channel a package record starts with.
 *
 * With catalog data the result is always one of its channels (when it has
 * any): the installed tracking channel, then the configured default, then
 * the catalog's own default. Without catalog data the installed tracking
 * channel or configured default is used as-is.
 */
export function defaultSelectedChannel(
  localInfo: LocalPackageInfo | undefined,
  catalogInfo: CatalogPackageInfo | undefined,
  configuredDefault?: string
): string {
  if (!catalogInfo) {
    return localInfo?.channel ?? configuredDefault ?? FALLBACK_CHANNEL;
  }

  const channels = catalogInfo.channels;
  if (localInfo?.channel && channels[localInfo.channel]) {
    return localInfo.channel;
  }
  if (configuredDefault && channels[configuredDefault]) {
    return configuredDefault;
  }
  return catalogDefaultChannel(catalogInfo) ?? configuredDefault ?? FALLBACK_CHANNEL;
}

/**
 * `<default-track>/stable`, then `latest/stable`, then the first listed channel.
 */
export function catalogDefaultChannel(catalogInfo: CatalogPackageInfo): string | undefined {
  const candidates = [
    catalogInfo.defaultTrack ? `${catalogInfo.defaultTrack}/${CHANNEL_DEFAULTS.RISK}` : undefined,
    FALLBACK_CHANNEL
  ];
  for (const candidate of candidates) {
    if (candidate && catalogInfo.channels[candidate]) {
      return candidate;
    }
  }
  return Object.keys(catalogInfo.channels)[0];
}

export function selectedChannelInfo(record: PackageRecord): ChannelInfo | undefined {
  return record.catalogInfo?.channels[record.selectedChannel];
}

export function isInstalled(record: PackageRecord): boolean {
  return record.localInfo !== undefined;
}
