import { z } from 'zod';
import logger from '../../config/logger';
import { NotFoundError, TransientError, ValidationError } from '../../utils/errors';
import type { HttpClient, HttpResponse } from '../../utils/http';
import { readCookie } from '../../utils/http';
import type { SourceType } from '../indexers/types';
import type { ClientJobState, ClientJobStatus, DownloadClient, SubmitOptions } from './types';
import { missingStatus } from './types';

export interface QBittorrentConfig {
  url: string;
  username: string;
  password: string;
  category: string;
}

const torrentInfoSchema = z
  .object({
    hash: z.string(),
    name: z.string(),
    size: z.number().default(0),
    progress: z.number().default(0),
    dlspeed: z.number().default(0),
    eta: z.number().default(0),
    state: z.string(),
    category: z.string().default(''),
    tags: z.string().default(''),
    save_path: z.string().default(''),
    content_path: z.string().optional(),
    ratio: z.number().default(0),
    seeding_time: z.number().optional(),
  })
  .passthrough();

export type TorrentInfo = z.infer<typeof torrentInfoSchema>;

const torrentListSchema = z.array(torrentInfoSchema);

const COMPLETED_STATES = new Set(['uploading', 'stalledUP', 'queuedUP', 'forcedUP', 'checkingUP', 'pausedUP', 'stoppedUP']);
const ERROR_STATES = new Set(['error', 'missingFiles', 'unknown']);
const PAUSED_STATES = new Set(['pausedDL', 'stoppedDL']);
const QUEUED_STATES = new Set(['queuedDL', 'checkingDL', 'checkingResumeData', 'allocating', 'moving', 'metaDL']);

/** qBittorrent's "infinite" ETA. */
const ETA_UNKNOWN = 8640000;

export function mapTorrentState(state: string, progress: number): ClientJobState {
  if (ERROR_STATES.has(state)) return 'error';
  if (COMPLETED_STATES.has(state)) return state === 'pausedUP' || state === 'stoppedUP' ? 'completed' : 'seeding';
  if (PAUSED_STATES.has(state)) return 'paused';
  if (QUEUED_STATES.has(state)) return 'queued';
  return progress >= 1 ? 'completed' : 'downloading';
}

/** Info-hash from a magnet link, as lowercase hex, or null for anything else. */
export function infoHashFromMagnet(reference: string): string | null {
  if (!reference.toLowerCase().startsWith('magnet:')) return null;
  const match = reference.match(/xt=urn:btih:([a-z0-9]+)/i);
  if (!match) return null;
  const hash = match[1];
  if (/^[a-f0-9]{40}$/i.test(hash)) return hash.toLowerCase();
  if (/^[a-z2-7]{32}$/i.test(hash)) return base32ToHex(hash);
  return null;
}

function base32ToHex(value: string): string {
  const alphabet = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';
  let bits = '';
  for (const char of value.toUpperCase()) {
    bits += alphabet.indexOf(char).toString(2).padStart(5, '0');
  }
  let hex = '';
  for (let i = 0; i + 4 <= bits.length; i += 4) {
    hex += parseInt(bits.slice(i, i + 4), 2).toString(16);
  }
  return hex;
}

export class QBittorrentClient implements DownloadClient {
  readonly name = 'qbittorrent';
  readonly sourceTypes: readonly SourceType[] = ['torrent'];
  private cookie: string | null = null;

  constructor(private readonly config: QBittorrentConfig, private readonly http: HttpClient) {}

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
      // qBittorrent rejects cross-origin requests without these (CSRF protection)
      Referer: this.config.url,
      Origin: this.config.url,
    };
    if (this.cookie) {
      headers.Cookie = this.cookie;
    }
    return headers;
  }

  private async login(signal?: AbortSignal): Promise<void> {
    const body = new URLSearchParams({ username: this.config.username, password: this.config.password });
    const response = await this.http.post(`${this.config.url}/api/v2/auth/login`, body.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded', Referer: this.config.url, Origin: this.config.url },
      validateStatus: () => true,
      signal,
    });

    if (response.status === 403) {
      throw new TransientError('qBittorrent refused login (IP banned after failed attempts)');
    }
    if (response.data === 'Fails.') {
      throw new ValidationError('qBittorrent login failed: invalid credentials');
    }

    const cookie = readCookie(response.headers, 'SID');
    if (!cookie) {
      throw new TransientError('qBittorrent login returned no session cookie');
    }
    this.cookie = cookie;
    logger.info('[qBittorrent] Login successful');
  }

  /** Authenticated request; a 403 means the session expired, so log in again once. */
  private async request(
    method: 'get' | 'post',
    endpoint: string,
    options: { params?: Record<string, string>; form?: Record<string, string>; signal?: AbortSignal },
  ): Promise<HttpResponse> {
    if (!this.cookie) {
      await this.login(options.signal);
    }

    const send = () => {
      const url = `${this.config.url}/api/v2/${endpoint}`;
      const config = { headers: this.headers(), params: options.params, signal: options.signal, validateStatus: () => true };
      return method === 'get'
        ? this.http.get(url, config)
        : this.http.post(url, new URLSearchParams(options.form ?? {}).toString(), config);
    };

    let response = await send();
    if (response.status === 403) {
      logger.debug('[qBittorrent] Session expired, logging in again');
      this.cookie = null;
      await this.login(options.signal);
      response = await send();
    }

    if (response.status >= 500) {
      throw new TransientError(`qBittorrent ${endpoint} failed with HTTP ${response.status}`);
    }
    if (response.status === 404) {
      throw new NotFoundError(`qBittorrent has no endpoint ${endpoint}`);
    }
    if (response.status >= 400) {
      throw new ValidationError(`qBittorrent ${endpoint} failed with HTTP ${response.status}`);
    }
    return response;
  }

  async submit(reference: string, options: SubmitOptions, signal?: AbortSignal): Promise<string | null> {
    const form: Record<string, string> = {
      urls: reference,
      category: options.category ?? this.config.category,
      tags: options.tag,
    };
    if (options.savePath) {
      form.savepath = options.savePath;
    }

    const response = await this.request('post', 'torrents/add', { form, signal });
    if (typeof response.data === 'string' && response.data.trim() === 'Fails.') {
      throw new ValidationError('qBittorrent rejected the torrent');
    }

    logger.info(`[qBittorrent] Added torrent: ${options.name}`);
    // Only magnets tell us the hash up front; .torrent URLs are resolved by tag
    return infoHashFromMagnet(reference);
  }

  async listTorrents(params: Record<string, string>, signal?: AbortSignal): Promise<TorrentInfo[]> {
    const response = await this.request('get', 'torrents/info', { params, signal });
    const parsed = torrentListSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new TransientError('qBittorrent returned an unexpected torrent list');
    }
    return parsed.data;
  }

  async findHandle(options: SubmitOptions, signal?: AbortSignal): Promise<string | null> {
    const tagged = await this.listTorrents({ tag: options.tag }, signal);
    if (tagged.length > 0) {
      return tagged[0].hash.toLowerCase();
    }

    const inCategory = await this.listTorrents({ category: options.category ?? this.config.category }, signal);
    const byName = inCategory.find((torrent) => torrent.name === options.name);
    return byName ? byName.hash.toLowerCase() : null;
  }

  async status(handle: string, signal?: AbortSignal): Promise<ClientJobStatus> {
    const [torrent] = await this.listTorrents({ hashes: handle }, signal);
    if (!torrent) {
      return missingStatus('Torrent no longer present in qBittorrent');
    }

    const state = mapTorrentState(torrent.state, torrent.progress);
    return {
      state,
      progress: Math.min(100, Math.max(0, torrent.progress * 100)),
      downloadSpeed: torrent.dlspeed,
      etaSeconds: torrent.eta >= ETA_UNKNOWN || torrent.eta < 0 ? null : torrent.eta,
      ratio: torrent.ratio,
      seedingSeconds: torrent.seeding_time ?? null,
      contentPath: torrent.content_path ?? (torrent.save_path ? `${torrent.save_path.replace(/\/$/, '')}/${torrent.name}` : null),
      message: state === 'error' ? `qBittorrent reports ${torrent.state}` : null,
    };
  }

  // qBittorrent 5 renamed pause/resume to stop/start
  private async postWithFallback(endpoint: string, fallback: string, form: Record<string, string>, signal?: AbortSignal) {
    try {
      await this.request('post', endpoint, { form, signal });
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
      await this.request('post', fallback, { form, signal });
    }
  }

  async pause(handle: string, signal?: AbortSignal): Promise<void> {
    await this.postWithFallback('torrents/pause', 'torrents/stop', { hashes: handle }, signal);
  }

  async resume(handle: string, signal?: AbortSignal): Promise<void> {
    await this.postWithFallback('torrents/resume', 'torrents/start', { hashes: handle }, signal);
  }

  async remove(handle: string, deleteData: boolean, signal?: AbortSignal): Promise<void> {
    await this.request('post', 'torrents/delete', { form: { hashes: handle, deleteFiles: String(deleteData) }, signal });
    logger.info(`[qBittorrent] Removed torrent ${handle} (deleteFiles=${deleteData})`);
  }
}
