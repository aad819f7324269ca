/**
 * Wire schemas for the daemon's REST API, plus mappers into domain types.
 */

import { z } from 'zod';
import type {
  CatalogPackageInfo,
  ChangeRecord,
  ChangeSummary,
  LocalPackageInfo
} from '../../types/index.js';
import { CHANNEL_DEFAULTS } from '../../constants/index.js';

const confinementSchema = z.enum(['strict', 'classic', 'devmode']);

export const envelopeSchema = z.object({
  type: z.enum(['sync', 'async', 'error']),
  'status-code': z.number(),
  status: z.string().optional(),
  result: z.unknown(),
  change: z.string().optional()
});

export type DaemonEnvelope = z.infer<typeof envelopeSchema>;

export const errorResultSchema = z.object({
  message: z.string(),
  kind: z.string().optional()
});

export const localPackageSchema = z.object({
  name: z.string(),
  version: z.string(),
  revision: z.union([z.string(), z.number()]).transform(String),
  'tracking-channel': z.string().optional(),
  channel: z.string().optional(),
  confinement: confinementSchema.default('strict'),
  summary: z.string().optional()
});

const catalogChannelSchema = z.object({
  version: z.string(),
  revision: z.union([z.string(), z.number()]).transform(String),
  confinement: confinementSchema.default('strict'),
  'released-at': z.string().optional()
});

export const catalogPackageSchema = z.object({
  name: z.string(),
  summary: z.string().optional(),
  'default-track': z.string().optional(),
  channels: z.record(catalogChannelSchema).default({})
});

const taskSchema = z.object({
  progress: z.object({
    done: z.number(),
    total: z.number()
  }).optional()
});

export const changeSchema = z.object({
  id: z.string(),
  kind: z.string().optional(),
  summary: z.string().optional(),
  status: z.string().optional(),
  ready: z.boolean(),
  err: z.string().optional(),
  tasks: z.array(taskSchema).default([])
});

export const changeIdSchema = z.object({ id: z.string() });

/**
 * Normalize a channel name to `track/risk` ("stable" -> "latest/stable").
 */
export function normalizeChannel(channel: string): string {
  return channel.includes('/') ? channel : `${CHANNEL_DEFAULTS.TRACK}/${channel}`;
}

export function toLocalPackageInfo(raw: z.infer<typeof localPackageSchema>): LocalPackageInfo {
  const tracking = raw['tracking-channel'] ?? raw.channel;
  return {
    name: raw.name,
    version: raw.version,
    revision: raw.revision,
    channel: tracking ? normalizeChannel(tracking) : undefined,
    confinement: raw.confinement,
    summary: raw.summary
  };
}

export function toCatalogPackageInfo(raw: z.infer<typeof catalogPackageSchema>): CatalogPackageInfo {
  const channels: CatalogPackageInfo['channels'] = {};
  for (const [name, channel] of Object.entries(raw.channels)) {
    channels[normalizeChannel(name)] = {
      version: channel.version,
      revision: channel.revision,
      confinement: channel.confinement,
      releasedAt: channel['released-at']
    };
  }
  return {
    name: raw.name,
    summary: raw.summary,
    defaultTrack: raw['default-track'],
    channels
  };
}

export function toChangeRecord(raw: z.infer<typeof changeSchema>): ChangeRecord {
  return {
    id: raw.id,
    kind: raw.kind,
    summary: raw.summary,
    status: raw.status,
    ready: raw.ready,
    error: raw.err ? { message: raw.err } : undefined,
    tasks: raw.tasks.map(task => ({
      done: task.progress?.done ?? 0,
      total: task.progress?.total ?? 0
    }))
  };
}

export function toChangeSummary(raw: z.infer<typeof changeSchema>): ChangeSummary {
  return { id: raw.id, ready: raw.ready, kind: raw.kind, summary: raw.summary };
}
