/**
 * HTTP Daemon Client
 *
 * DaemonClient implementation for a snapd-style REST API served on a Unix
 * socket. Requests go through an undici Agent bound to the socket; tests
 * inject a MockAgent as the dispatcher instead.
 */

import { Agent, request, type Dispatcher } from 'undici';
import { from, timer, type Observable } from 'rxjs';
import { exhaustMap, takeWhile } from 'rxjs/operators';
import { z } from 'zod';
import type {
  CatalogPackageInfo,
  ChangeRecord,
  ChangeSummary,
  LocalPackageInfo,
  Lookup
} from '../../types/index.js';
import { DAEMON_DEFAULTS, NOT_FOUND_KINDS } from '../../constants/index.js';
import { DaemonError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { DaemonClient } from './daemon-client.js';
import {
  catalogPackageSchema,
  changeIdSchema,
  changeSchema,
  envelopeSchema,
  errorResultSchema,
  localPackageSchema,
  toCatalogPackageInfo,
  toChangeRecord,
  toChangeSummary,
  toLocalPackageInfo,
  type DaemonEnvelope
} from './daemon-schemas.js';

// Host is ignored when talking over a Unix socket, but undici needs an origin
const DAEMON_ORIGIN = 'http://localhost';

export interface HttpDaemonClientOptions {
  socketPath?: string;
  pollIntervalMs?: number;
  /** Overrides the socket-bound Agent */
  dispatcher?: Dispatcher;
}

type SnapAction =
  | { action: 'install' | 'refresh'; channel: string; classic: boolean }
  | { action: 'remove' };

export class HttpDaemonClient implements DaemonClient {
  private readonly socketPath: string;
  private readonly pollIntervalMs: number;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(options: HttpDaemonClientOptions = {}) {
    this.socketPath = options.socketPath ?? DAEMON_DEFAULTS.SOCKET_PATH;
    this.pollIntervalMs = options.pollIntervalMs ?? DAEMON_DEFAULTS.POLL_INTERVAL_MS;
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher = options.dispatcher ?? new Agent({ connect: { socketPath: this.socketPath } });
  }

  async getLocalInfo(name: string): Promise<Lookup<LocalPackageInfo>> {
    return this.lookup(async () => {
      const envelope = await this.call('GET', `/v2/snaps/${encodeURIComponent(name)}`);
      return toLocalPackageInfo(this.parse(localPackageSchema, envelope.result, 'package'));
    });
  }

  async getCatalogInfo(name: string): Promise<Lookup<CatalogPackageInfo>> {
    try {
      const envelope = await this.call('GET', `/v2/find?name=${encodeURIComponent(name)}`);
      const results = this.parse(z.array(catalogPackageSchema), envelope.result, 'catalog results');
      const match = results.find(result => result.name === name);
      return match ? { status: 'found', value: toCatalogPackageInfo(match) } : { status: 'not-found' };
    } catch (error) {
      return this.toLookupFailure(error);
    }
  }

  async listChanges(name: string): Promise<ChangeSummary[]> {
    const envelope = await this.call('GET', `/v2/changes?select=all&for=${encodeURIComponent(name)}`);
    return this.parse(z.array(changeSchema), envelope.result, 'change list').map(toChangeSummary);
  }

  async install(name: string, channel: string, classic: boolean): Promise<string> {
    return this.postSnapAction(name, { action: 'install', channel, classic });
  }

  async refresh(name: string, channel: string, classic: boolean): Promise<string> {
    return this.postSnapAction(name, { action: 'refresh', channel, classic });
  }

  async remove(name: string): Promise<string> {
    return this.postSnapAction(name, { action: 'remove' });
  }

  async abortChange(id: string): Promise<{ id: string }> {
    const envelope = await this.call('POST', `/v2/changes/${encodeURIComponent(id)}`, { action: 'abort' });
    const { id: abortId } = this.parse(changeIdSchema, envelope.result, 'abort result');
    logger.debug(`Abort of change ${id} tracked as ${abortId}`);
    return { id: abortId };
  }

  async getChange(id: string): Promise<ChangeRecord> {
    const envelope = await this.call('GET', `/v2/changes/${encodeURIComponent(id)}`);
    return toChangeRecord(this.parse(changeSchema, envelope.result, 'change'));
  }

  /**
   * Polls the change until it is ready. The last emitted record is the
   * ready one; the stream completes after it.
   */
  watchChange(id: string): Observable<ChangeRecord> {
    return timer(0, this.pollIntervalMs).pipe(
      exhaustMap(() => from(this.getChange(id))),
      takeWhile(change => !change.ready, true)
    );
  }

  async listInstalled(): Promise<LocalPackageInfo[]> {
    const envelope = await this.call('GET', '/v2/snaps');
    return this.parse(z.array(localPackageSchema), envelope.result, 'installed packages').map(toLocalPackageInfo);
  }

  async listUpdates(): Promise<string[]> {
    try {
      const envelope = await this.call('GET', '/v2/find?select=refresh');
      return this.parse(z.array(catalogPackageSchema), envelope.result, 'refresh candidates').map(p => p.name);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async postSnapAction(name: string, body: SnapAction): Promise<string> {
    const envelope = await this.call('POST', `/v2/snaps/${encodeURIComponent(name)}`, body);
    if (envelope.type !== 'async' || !envelope.change) {
      throw new DaemonError(`Daemon did not start a change for ${body.action} of '${name}'`, 'invalid-response', envelope['status-code']);
    }
    logger.debug(`Daemon started change ${envelope.change} (${body.action} ${name})`);
    return envelope.change;
  }

  private async call(method: 'GET' | 'POST', path: string, body?: object): Promise<DaemonEnvelope> {
    let response: Dispatcher.ResponseData;
    try {
      response = await request(`${DAEMON_ORIGIN}${path}`, {
        method,
        dispatcher: this.dispatcher,
        headers: body ? { 'content-type': 'application/json' } : undefined,
        body: body ? JSON.stringify(body) : undefined
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DaemonError(`Cannot reach daemon at ${this.socketPath}: ${reason}`, 'connection-failed');
    }

    const text = await response.body.text();
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new DaemonError(`Daemon returned a non-JSON response for ${method} ${path}`, 'invalid-response', response.statusCode);
    }

    const envelope = envelopeSchema.safeParse(json);
    if (!envelope.success) {
      throw new DaemonError(`Daemon returned a malformed response for ${method} ${path}`, 'invalid-response', response.statusCode);
    }

    if (envelope.data.type === 'error') {
      const details = errorResultSchema.safeParse(envelope.data.result);
      const statusCode = envelope.data['status-code'];
      if (details.success) {
        throw new DaemonError(details.data.message, details.data.kind, statusCode);
      }
      throw new DaemonError(`Daemon request ${method} ${path} failed with status ${statusCode}`, undefined, statusCode);
    }

    return envelope.data;
  }

  private parse<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.infer<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
      logger.debug(`Invalid ${what} payload`, { issues: result.error.issues });
      throw new DaemonError(`Daemon returned an invalid ${what} payload`, 'invalid-response');
    }
    return result.data;
  }

  private async lookup<T>(fetch: () => Promise<T>): Promise<Lookup<T>> {
    try {
      return { status: 'found', value: await fetch() };
    } catch (error) {
      return this.toLookupFailure(error);
    }
  }

  private toLookupFailure<T>(error: unknown): Lookup<T> {
    if (isNotFound(error)) {
      return { status: 'not-found' };
    }
    if (error instanceof Error) {
      return { status: 'error', error };
    }
    return { status: 'error', error: new DaemonError(String(error)) };
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof DaemonError && error.kind !== undefined && NOT_FOUND_KINDS.includes(error.kind);
}
