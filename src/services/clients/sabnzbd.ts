import { z } from 'zod';
import logger from '../../config/logger';
import { TransientError, ValidationError } from '../../utils/errors';
import type { HttpClient } from '../../utils/http';
import type { SourceType } from '../indexers/types';
import type { ClientJobState, ClientJobStatus, DownloadClient, SubmitOptions } from './types';
import { missingStatus } from './types';

export interface SABnzbdConfig {
  url: string;
  apiKey: string;
  category: string;
}

const numeric = z.union([z.number(), z.string()]).transform((value) => {
  const parsed = typeof value === 'number' ? value : parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
});

const queueSlotSchema = z
  .object({
    nzo_id: z.string(),
    filename: z.string(),
    status: z.string(),
    percentage: numeric.default(0),
    mb: numeric.default(0),
    mbleft: numeric.default(0),
    timeleft: z.string().default('0:00:00'),
    cat: z.string().default(''),
  })
  .passthrough();

const historySlotSchema = z
  .object({
    nzo_id: z.string(),
    name: z.string(),
    status: z.string(),
    storage: z.string().nullable().default(null),
    fail_message: z.string().default(''),
    category: z.string().default(''),
  })
  .passthrough();

const queueResponseSchema = z.object({
  queue: z.object({ slots: z.array(queueSlotSchema).default([]), kbpersec: numeric.default(0) }),
});

const historyResponseSchema = z.object({
  history: z.object({ slots: z.array(historySlotSchema).default([]) }),
});

const addResponseSchema = z
  .object({
    status: z.boolean().optional(),
    nzo_ids: z.array(z.string()).optional(),
    error: z.string().optional(),
  })
  .passthrough();

export type QueueSlot = z.infer<typeof queueSlotSchema>;
export type HistorySlot = z.infer<typeof historySlotSchema>;

/** "1:02:03" or "2:01:02:03" (days first) to seconds. */
export function parseTimeLeft(value: string): number | null {
  const parts = value.split(':').map((part) => parseInt(part, 10));
  if (parts.length < 2 || parts.some((part) => Number.isNaN(part))) return null;
  return parts.reduce((total, part, index) => {
    const multipliers = parts.length === 4 ? [86400, 3600, 60, 1] : [3600, 60, 1].slice(3 - parts.length);
    return total + part * multipliers[index];
  }, 0);
}

const HISTORY_FAILED = new Set(['Failed']);
const HISTORY_RUNNING = new Set(['Queued', 'Fetching', 'Verifying', 'Repairing', 'Extracting', 'Moving', 'Running']);

export function mapQueueStatus(status: string): ClientJobState {
  if (status === 'Paused') return 'paused';
  if (status === 'Queued' || status === 'Grabbing' || status === 'Propagating') return 'queued';
  return 'downloading';
}

export class SABnzbdClient implements DownloadClient {
  readonly name = 'sabnzbd';
  readonly sourceTypes: readonly SourceType[] = ['usenet'];

  constructor(private readonly config: SABnzbdConfig, private readonly http: HttpClient) {}

  private async api(params: Record<string, string | number>, signal?: AbortSignal): Promise<unknown> {
    const response = await this.http.get(`${this.config.url}/api`, {
      params: { ...params, apikey: this.config.apiKey, output: 'json' },
      signal,
      validateStatus: () => true,
    });

    if (response.status >= 500) {
      throw new TransientError(`SABnzbd ${params.mode} failed with HTTP ${response.status}`);
    }
    if (response.status >= 400) {
      throw new ValidationError(`SABnzbd ${params.mode} failed with HTTP ${response.status}`);
    }
    return response.data;
  }

  async submit(reference: string, options: SubmitOptions, signal?: AbortSignal): Promise<string | null> {
    logger.info(`[SABnzbd] Adding NZB: ${options.name}`);
    const data = await this.api(
      {
        mode: 'addurl',
        name: reference,
        nzbname: options.tag,
        cat: options.category ?? this.config.category,
      },
      signal,
    );

    const parsed = addResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new TransientError('SABnzbd returned an unexpected addurl response');
    }
    if (parsed.data.status === false || parsed.data.error) {
      throw new ValidationError(`SABnzbd rejected the NZB: ${parsed.data.error ?? 'unknown error'}`);
    }

    const nzoId = parsed.data.nzo_ids?.[0] ?? null;
    logger.info(`[SABnzbd] NZB added${nzoId ? `: ${nzoId}` : ''}`);
    return nzoId;
  }

  async getQueue(signal?: AbortSignal): Promise<QueueSlot[]> {
    const parsed = queueResponseSchema.safeParse(await this.api({ mode: 'queue' }, signal));
    if (!parsed.success) {
      throw new TransientError('SABnzbd returned an unexpected queue response');
    }
    return parsed.data.queue.slots;
  }

  async getHistory(signal?: AbortSignal, limit = 100): Promise<HistorySlot[]> {
    const parsed = historyResponseSchema.safeParse(await this.api({ mode: 'history', limit }, signal));
    if (!parsed.success) {
      throw new TransientError('SABnzbd returned an unexpected history response');
    }
    return parsed.data.history.slots;
  }

  async findHandle(options: SubmitOptions, signal?: AbortSignal): Promise<string | null> {
    const matches = (name: string) => name === options.tag || name === options.name;
    const queued = (await this.getQueue(signal)).find((slot) => matches(slot.filename));
    if (queued) return queued.nzo_id;
    const finished = (await this.getHistory(signal)).find((slot) => matches(slot.name));
    return finished ? finished.nzo_id : null;
  }

  async status(handle: string, signal?: AbortSignal): Promise<ClientJobStatus> {
    const slot = (await this.getQueue(signal)).find((entry) => entry.nzo_id === handle);
    if (slot) {
      const totalMb = slot.mb;
      const doneMb = Math.max(0, totalMb - slot.mbleft);
      const etaSeconds = parseTimeLeft(slot.timeleft);
      return {
        state: mapQueueStatus(slot.status),
        progress: Math.min(100, Math.max(0, slot.percentage)),
        // SABnzbd only reports an overall rate; estimate this job's from what is left
        downloadSpeed: etaSeconds && etaSeconds > 0 ? Math.round((slot.mbleft * 1024 * 1024) / etaSeconds) : 0,
        etaSeconds,
        ratio: null,
        seedingSeconds: null,
        contentPath: null,
        message: totalMb > 0 ? `${doneMb.toFixed(1)} of ${totalMb.toFixed(1)} MB` : null,
      };
    }

    const history = (await this.getHistory(signal)).find((entry) => entry.nzo_id === handle);
    if (!history) {
      return missingStatus('Job no longer present in SABnzbd queue or history');
    }

    if (HISTORY_FAILED.has(history.status)) {
      return { ...missingStatus(history.fail_message || 'SABnzbd reports the job failed'), state: 'error' };
    }
    if (HISTORY_RUNNING.has(history.status)) {
      // Post-processing (verify, repair, unpack) is still part of the download stage
      return { ...missingStatus(`SABnzbd ${history.status.toLowerCase()}`), state: 'downloading', progress: 99 };
    }

    return {
      state: 'completed',
      progress: 100,
      downloadSpeed: 0,
      etaSeconds: 0,
      ratio: null,
      seedingSeconds: null,
      contentPath: history.storage,
      message: null,
    };
  }

  async pause(handle: string, signal?: AbortSignal): Promise<void> {
    await this.api({ mode: 'queue', name: 'pause', value: handle }, signal);
  }

  async resume(handle: string, signal?: AbortSignal): Promise<void> {
    await this.api({ mode: 'queue', name: 'resume', value: handle }, signal);
  }

  async remove(handle: string, deleteData: boolean, signal?: AbortSignal): Promise<void> {
    const delFiles = deleteData ? 1 : 0;
    await this.api({ mode: 'queue', name: 'delete', value: handle, del_files: delFiles }, signal);
    await this.api({ mode: 'history', name: 'delete', value: handle, del_files: delFiles }, signal);
    logger.info(`[SABnzbd] Removed ${handle} (del_files=${delFiles})`);
  }
}
