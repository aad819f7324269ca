import type { CatalogPackageInfo, LocalPackageInfo, PackageRecord } from '../types/index.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Multi-line summary of a package record for `pkgdeck info`.
 */
export function formatPackageRecord(record: PackageRecord): string {
  const lines: string[] = [];
  const summary = record.localInfo?.summary ?? record.catalogInfo?.summary;
  if (summary) {
    lines.push(summary, '');
  }

  if (record.localInfo) {
    const { version, revision, channel } = record.localInfo;
    lines.push(`installed: ${version} (${revision})${channel ? ` tracking ${channel}` : ''}`);
  } else {
    lines.push('installed: no');
  }
  lines.push(`channel:   ${record.selectedChannel}`);
  if (record.hasUpdate) {
    lines.push('update:    available');
  }
  if (record.activeChangeId) {
    lines.push(`change:    ${record.activeChangeId} in progress`);
  }
  if (record.lastChangeError) {
    lines.push(`last error: ${record.lastChangeError.message}`);
  }

  if (record.catalogInfo) {
    lines.push('', 'channels:', ...formatChannelTable(record.catalogInfo, record.selectedChannel));
  }
  return lines.join('\n');
}

/**
 * One aligned line per catalog channel, the selected one marked with '*'.
 */
export function formatChannelTable(catalog: CatalogPackageInfo, selected?: string): string[] {
  const names = Object.keys(catalog.channels);
  const width = Math.max(0, ...names.map(name => name.length));
  return names.map(name => {
    const channel = catalog.channels[name];
    const marker = name === selected ? '*' : ' ';
    const classic = channel.confinement === 'classic' ? ' classic' : '';
    return `${marker} ${name.padEnd(width)}  ${channel.version} (${channel.revision})${classic}`;
  });
}

export function formatInstalledPackage(pkg: LocalPackageInfo, hasUpdate: boolean): string {
  const channel = pkg.channel ? `  ${pkg.channel}` : '';
  const update = hasUpdate ? '  (update available)' : '';
  return `${pkg.name}@${pkg.version}${channel}${update}`;
}
