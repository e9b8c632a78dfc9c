import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { v4 as uuidv4 } from 'uuid';
import logger from '../../config/logger';
import { TransientError, ValidationError, errorMessage } from '../../utils/errors';
import type { HttpClient } from '../../utils/http';
import { readHeader } from '../../utils/http';
import type { SourceType } from '../indexers/types';
import type { ClientJobState, ClientJobStatus, DownloadClient, SubmitOptions } from './types';
import { missingStatus } from './types';

interface DirectJob {
  id: string;
  tag: string;
  name: string;
  url: string;
  directory: string;
  finalPath: string;
  partialPath: string;
  state: ClientJobState;
  totalBytes: number | null;
  receivedBytes: number;
  speed: number;
  error: string | null;
  controller: AbortController | null;
  task: Promise<void> | null;
}

function fileNameFor(url: string, fallback: string): string {
  let base = '';
  try {
    base = decodeURIComponent(path.posix.basename(new URL(url).pathname));
  } catch {
    base = '';
  }
  const cleaned = base.replace(/[<>:"/\\|?*]/g, '').trim();
  return cleaned && cleaned.includes('.') ? cleaned : `${fallback.replace(/[<>:"/\\|?*]/g, '').trim() || 'download'}.bin`;
}

/**
 * Streams catalog downloads straight to disk over HTTP. Jobs live in memory;
 * after a restart a job reports as missing and the scheduler resubmits it.
 */
export class DirectDownloadClient implements DownloadClient {
  readonly name = 'direct';
  readonly sourceTypes: readonly SourceType[] = ['catalog'];
  private readonly jobs = new Map<string, DirectJob>();

  constructor(private readonly downloadPath: string, private readonly http: HttpClient) {}

  async submit(reference: string, options: SubmitOptions): Promise<string> {
    if (!/^https?:\/\//i.test(reference)) {
      throw new ValidationError(`Direct downloads need an http(s) URL, got ${reference.slice(0, 40)}`);
    }

    const directory = path.join(options.savePath ?? this.downloadPath, options.tag);
    const finalPath = path.join(directory, fileNameFor(reference, options.name));
    const job: DirectJob = {
      id: uuidv4(),
      tag: options.tag,
      name: options.name,
      url: reference,
      directory,
      finalPath,
      partialPath: `${finalPath}.part`,
      state: 'queued',
      totalBytes: null,
      receivedBytes: 0,
      speed: 0,
      error: null,
      controller: null,
      task: null,
    };

    this.jobs.set(job.id, job);
    this.start(job);
    logger.info(`[Direct] Started ${options.name} -> ${finalPath}`);
    return job.id;
  }

  async findHandle(options: SubmitOptions): Promise<string | null> {
    for (const job of this.jobs.values()) {
      if (job.tag === options.tag) return job.id;
    }
    return null;
  }

  async status(handle: string): Promise<ClientJobStatus> {
    const job = this.jobs.get(handle);
    if (!job) {
      return missingStatus('Direct download not tracked (process restarted?)');
    }

    const progress =
      job.state === 'completed' ? 100 : job.totalBytes ? Math.min(99.9, (job.receivedBytes / job.totalBytes) * 100) : 0;
    const remaining = job.totalBytes !== null ? job.totalBytes - job.receivedBytes : null;

    return {
      state: job.state,
      progress,
      downloadSpeed: job.state === 'downloading' ? job.speed : 0,
      etaSeconds: remaining !== null && job.speed > 0 ? Math.round(remaining / job.speed) : null,
      ratio: null,
      seedingSeconds: null,
      contentPath: job.state === 'completed' ? job.finalPath : null,
      message: job.error,
    };
  }

  async pause(handle: string): Promise<void> {
    const job = this.requireJob(handle);
    if (job.state !== 'downloading' && job.state !== 'queued') return;
    job.state = 'paused';
    job.controller?.abort();
    await job.task;
  }

  async resume(handle: string): Promise<void> {
    const job = this.requireJob(handle);
    if (job.state !== 'paused') return;
    this.start(job);
  }

  async remove(handle: string, deleteData: boolean): Promise<void> {
    const job = this.jobs.get(handle);
    if (!job) return;
    this.jobs.delete(handle);
    if (job.state === 'downloading' || job.state === 'queued') {
      job.state = 'paused';
      job.controller?.abort();
      await job.task;
    }
    if (deleteData) {
      await fs.promises.rm(job.directory, { recursive: true, force: true });
    }
    logger.info(`[Direct] Removed ${job.name} (deleteData=${deleteData})`);
  }

  private requireJob(handle: string): DirectJob {
    const job = this.jobs.get(handle);
    if (!job) {
      throw new ValidationError(`Unknown direct download ${handle}`);
    }
    return job;
  }

  private start(job: DirectJob): void {
    job.state = 'downloading';
    job.error = null;
    job.controller = new AbortController();
    job.task = this.transfer(job, job.controller.signal).catch((error: unknown) => {
      if (job.state === 'paused') {
        logger.debug(`[Direct] ${job.name} paused at ${job.receivedBytes} bytes`);
        return;
      }
      job.state = 'error';
      job.error = errorMessage(error);
      logger.error(`[Direct] ${job.name} failed: ${job.error}`);
    });
  }

  private async transfer(job: DirectJob, signal: AbortSignal): Promise<void> {
    await fs.promises.mkdir(job.directory, { recursive: true });

    const offset = fs.existsSync(job.partialPath) ? (await fs.promises.stat(job.partialPath)).size : 0;
    const response = await this.http.get(job.url, {
      responseType: 'stream',
      signal,
      timeout: 0,
      headers: offset > 0 ? { Range: `bytes=${offset}-` } : undefined,
      validateStatus: () => true,
    });

    if (response.status === 416 && offset > 0) {
      // Range past the end: the partial file already holds everything
      await fs.promises.rename(job.partialPath, job.finalPath);
      this.complete(job, offset);
      return;
    }
    if (response.status >= 500 || response.status === 429) {
      throw new TransientError(`HTTP ${response.status} from ${new URL(job.url).host}`);
    }
    if (response.status >= 400) {
      throw new ValidationError(`HTTP ${response.status} from ${new URL(job.url).host}`);
    }
    if (!(response.data instanceof Readable)) {
      throw new TransientError('Download response is not a stream');
    }

    const resumed = response.status === 206 && offset > 0;
    const length = Number(readHeader(response.headers, 'content-length') ?? NaN);
    job.receivedBytes = resumed ? offset : 0;
    job.totalBytes = Number.isFinite(length) ? length + job.receivedBytes : null;

    const startedAt = Date.now();
    const startBytes = job.receivedBytes;
    const body = response.data;
    body.on('data', (chunk: Buffer) => {
      job.receivedBytes += chunk.length;
      const elapsed = (Date.now() - startedAt) / 1000;
      job.speed = elapsed > 0 ? Math.round((job.receivedBytes - startBytes) / elapsed) : 0;
    });

    await pipeline(body, fs.createWriteStream(job.partialPath, { flags: resumed ? 'a' : 'w' }), { signal });
    await fs.promises.rename(job.partialPath, job.finalPath);
    this.complete(job, job.receivedBytes);
  }

  private complete(job: DirectJob, bytes: number): void {
    job.state = 'completed';
    job.receivedBytes = bytes;
    job.totalBytes = bytes;
    job.speed = 0;
    logger.info(`[Direct] Finished ${job.name} (${bytes} bytes)`);
  }
}
