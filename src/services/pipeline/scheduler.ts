import { createHash } from 'crypto';
import fs from 'fs';
import path from 'path';
import logger from '../../config/logger';
import type { PathMapping, SeedingConfig } from '../../config/settings';
import type {
  ImportRecord,
  PipelineItem,
  QueueStore,
  SelectedCandidate,
} from '../../models/PipelineItem';
import { isTerminal } from '../../models/PipelineItem';
import { StaleItemError, TransientError, ValidationError, classifyError, errorMessage } from '../../utils/errors';
import { mapClientPath } from '../clients/pathMapping';
import type { ClientRegistry } from '../clients/registry';
import type { ClientJobStatus, DownloadClient, SubmitOptions } from '../clients/types';
import type { FormatConverter } from '../conversion/converter';
import { isDrmContainer, requiresConversion } from '../conversion/converter';
import type { ImportExecutor, ImportMode, ImportResult } from '../import/importExecutor';
import { collectAudioFiles } from '../import/importExecutor';
import type { PathResolver } from '../import/pathResolver';
import type { RankedCandidate } from '../quality/qualityAssessor';
import type { CandidateSearch } from './candidateSearch';
import { runBounded, sleep, withTimeout } from './concurrency';
import type { ItemChanges, PipelineItemUpdater } from './itemUpdater';
import { restartChanges } from './queueService';
import type { PipelineEvent } from './stateMachine';
import { canApply } from './stateMachine';

export interface SchedulerOptions {
  maxActiveSearches: number;
  maxConcurrentDownloads: number;
  maxStageWorkers: number;
  externalTimeoutMs: number;
  importTimeoutMs: number;
  conversionTimeoutMs: number;
  handleResolveAttempts: number;
  handleResolveDelayMs: number;
  removeCompleted: boolean;
  seeding: SeedingConfig;
  pathMappings: PathMapping[];
  namingTemplate: string;
  conversionPath: string;
}

export interface SchedulerDependencies {
  store: QueueStore;
  updater: PipelineItemUpdater;
  search: CandidateSearch;
  clients: ClientRegistry;
  importer: ImportExecutor;
  converter: FormatConverter;
  resolver: PathResolver;
  clock?: () => Date;
}

export interface TickResult {
  controls: number;
  admitted: number;
  searched: number;
  submitted: number;
  polled: number;
  converted: number;
  imported: number;
  failures: number;
}

function emptyResult(): TickResult {
  return { controls: 0, admitted: 0, searched: 0, submitted: 0, polled: 0, converted: 0, imported: 0, failures: 0 };
}

export function submitOptionsFor(item: PipelineItem): SubmitOptions {
  return { name: item.candidate?.title ?? item.title, tag: `audiobook-${item.id}` };
}

function selectedFrom(ranked: RankedCandidate): SelectedCandidate {
  const { candidate, assessment } = ranked;
  return {
    downloadUrl: candidate.downloadUrl,
    sourceType: candidate.sourceType,
    title: candidate.title,
    indexer: candidate.indexer,
    format: candidate.format,
    bitrate: candidate.bitrate > 0 ? candidate.bitrate : null,
    size: candidate.size,
    seeders: candidate.seeders,
    confidence: assessment.confidence,
    manual: false,
  };
}

/**
 * The control loop. Each tick applies operator controls, admits and runs
 * searches, admits downloads, reconciles client progress and dispatches
 * conversion and import. External calls run in bounded batches; results are
 * committed one item at a time, and one item's fault never stops the tick.
 */
export class PipelineScheduler {
  private running = false;
  private readonly clock: () => Date;

  constructor(private readonly deps: SchedulerDependencies, private readonly options: SchedulerOptions) {
    this.clock = deps.clock ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Run one tick. Resolves to null when the previous tick is still running. */
  async tick(): Promise<TickResult | null> {
    if (this.running) {
      logger.debug('[Scheduler] Previous tick still running, skipping');
      return null;
    }

    this.running = true;
    const result = emptyResult();
    try {
      await this.applyPendingControls(result);
      this.admitSearches(result);
      await this.runSearches(result);
      await this.admitDownloads(result);
      await this.reconcile(result);
      this.routeCompletedDownloads(result);
      await this.runConversions(result);
      this.beginImports(result);
      await this.runImports(result);
    } finally {
      this.running = false;
    }

    if (result.failures > 0) {
      logger.warn(`[Scheduler] Tick finished with ${result.failures} item failure(s)`);
    }
    return result;
  }

  // ---- phase 0: operator controls ----

  private async applyPendingControls(result: TickResult): Promise<void> {
    // Terminal items can hold a requeue while their client job is still removed
    const pending = this.deps.store.findWithPendingControl();

    for (const item of pending) {
      await this.guard(item, result, async () => {
        if (await this.applyControl(item)) result.controls++;
      });
    }
  }

  /** Resolves to false when the control stays pending for a later tick. */
  private async applyControl(item: PipelineItem): Promise<boolean> {
    const { updater } = this.deps;
    const client = this.clientFor(item);
    const handle = item.clientHandle;

    const event: PipelineEvent | null =
      item.pendingControl === 'cancel'
        ? 'operator_cancel'
        : item.pendingControl === 'requeue'
          ? 'operator_requeue'
          : item.pendingControl === 'pause'
            ? 'pause_requested'
            : item.pendingControl === 'resume'
              ? 'resume_requested'
              : null;

    if (!event || !canApply(item, event, updater.context)) {
      logger.warn(`[Scheduler] Dropping ${item.pendingControl} for ${item.id}: no longer applicable in ${item.status}`);
      this.deps.store.save({ ...item, pendingControl: null });
      return false;
    }

    if (event === 'resume_requested' && this.deps.store.countByStatus().DOWNLOADING >= this.options.maxConcurrentDownloads) {
      logger.debug(`[Scheduler] Resume of ${item.id} waits for a download slot`);
      return false;
    }

    if (event === 'operator_cancel') {
      this.cancel(item, await this.removeForCancel(item));
      return true;
    }

    if (client && handle) {
      await this.callClient(`${event} ${item.id}`, async (signal) => {
        if (event === 'pause_requested') await client.pause(handle, signal);
        else if (event === 'resume_requested') await client.resume(handle, signal);
        else await client.remove(handle, true, signal);
      });
    }

    if (event === 'operator_requeue') {
      updater.apply(item, event, restartChanges(item), 'operator requeue');
    } else {
      updater.apply(item, event, { pendingControl: null, downloadSpeed: 0, etaSeconds: null }, `operator ${item.pendingControl}`);
    }
    return true;
  }

  /** The remove failure, if any. A cancel goes through either way. */
  private async removeForCancel(item: PipelineItem): Promise<string | null> {
    try {
      await this.removeJob(item, true);
      return null;
    } catch (error) {
      const message = errorMessage(error);
      logger.warn(`[Scheduler] Could not remove the client job of cancelled ${item.id}: ${message}`);
      return message;
    }
  }

  private cancel(item: PipelineItem, removeError: string | null): void {
    const changes: ItemChanges = { pendingControl: null, downloadSpeed: 0, etaSeconds: null };
    if (removeError) {
      // Keep the handle so a later retry or requeue can remove the job
      changes.lastError = removeError;
    } else {
      changes.clientName = null;
      changes.clientHandle = null;
    }
    this.deps.updater.apply(item, 'operator_cancel', changes, removeError ? `operator cancel (${removeError})` : 'operator cancel');
  }

  // ---- phase 1: search admission ----

  private admitSearches(result: TickResult): void {
    const now = this.clock();
    let slots = this.options.maxActiveSearches - this.deps.store.countByStatus().SEARCHING;

    for (const item of this.ready(this.deps.store.findByStatus('QUEUED'), now)) {
      if (item.candidate) {
        this.commit(item, result, (fresh) => this.deps.updater.apply(fresh, 'skip_search', {}, 'candidate already selected'));
        result.admitted++;
        continue;
      }
      if (slots <= 0) continue;
      this.commit(item, result, (fresh) => this.deps.updater.apply(fresh, 'submit_for_search'));
      slots--;
      result.admitted++;
    }
  }

  // ---- phase 2: search ----

  private async runSearches(result: TickResult): Promise<void> {
    const searching = this.deps.store.findByStatus('SEARCHING').filter((item) => item.pendingControl === null);
    const outcomes = await runBounded(searching, this.options.maxActiveSearches, (item) =>
      this.deps.search.best(
        { title: item.title, author: item.author, narrator: item.narrator },
        { exclude: item.rejectedReferences },
      ),
    );

    outcomes.forEach((outcome, index) => {
      const item = searching[index];
      result.searched++;
      if (outcome.status === 'rejected') {
        this.fail(item, outcome.reason, 'search_transient_error', result);
        return;
      }
      const best = outcome.value;
      this.commit(item, result, (fresh) => {
        if (!best) {
          return this.deps.updater.apply(fresh, 'no_candidate', { lastError: 'No acceptable candidate found' });
        }
        const { candidate, assessment } = best;
        return this.deps.updater.apply(
          fresh,
          'candidate_found',
          { candidate: selectedFrom(best), lastError: null },
          `${candidate.title} via ${candidate.indexer} (confidence ${assessment.confidence}, ${assessment.rating})`,
        );
      });
    });
  }

  // ---- phase 3: download admission ----

  private async admitDownloads(result: TickResult): Promise<void> {
    const { store } = this.deps;
    const slots = this.options.maxConcurrentDownloads - store.countByStatus().DOWNLOADING;
    if (slots <= 0) return;

    const found = this.ready(store.findByStatus('FOUND'), this.clock()).slice(0, slots);
    const outcomes = await runBounded(found, slots, (item) => this.submit(item));

    outcomes.forEach((outcome, index) => {
      const item = found[index];
      result.submitted++;
      if (outcome.status === 'rejected') {
        this.rejectSubmission(item, outcome.reason, result);
        return;
      }
      const { client, handle } = outcome.value;
      this.commit(item, result, (fresh) =>
        this.deps.updater.apply(
          fresh,
          'client_accepted',
          { clientName: client.name, clientHandle: handle, progress: 0, lastError: null },
          `${client.name} job ${handle}`,
        ),
      );
    });
  }

  private async submit(item: PipelineItem): Promise<{ client: DownloadClient; handle: string }> {
    const candidate = item.candidate;
    if (!candidate) {
      throw new ValidationError(`Item ${item.id} reached FOUND without a candidate`);
    }

    const options = submitOptionsFor(item);
    const submitted = await withTimeout(`Submit ${item.id}`, this.options.externalTimeoutMs, (signal) =>
      this.deps.clients.submit(candidate.sourceType, candidate.downloadUrl, options, signal),
    );
    if (submitted.handle) {
      return { client: submitted.client, handle: submitted.handle };
    }
    return { client: submitted.client, handle: await this.resolveHandle(submitted.client, options) };
  }

  /** Poll the client's job list until the submitted job shows up. */
  private async resolveHandle(client: DownloadClient, options: SubmitOptions): Promise<string> {
    for (let attempt = 1; attempt <= this.options.handleResolveAttempts; attempt++) {
      const handle = await withTimeout(`Find ${options.tag}`, this.options.externalTimeoutMs, (signal) =>
        client.findHandle(options, signal),
      );
      if (handle) {
        logger.debug(`[Scheduler] Resolved ${options.tag} to ${handle} after ${attempt} attempt(s)`);
        return handle;
      }
      if (attempt < this.options.handleResolveAttempts) {
        await sleep(this.options.handleResolveDelayMs);
      }
    }
    throw new TransientError(
      `${client.name} accepted ${options.name} but the job did not appear after ${this.options.handleResolveAttempts} lookups`,
    );
  }

  /**
   * A client refusing an automatically chosen reference sends the item back to
   * search with that reference excluded. Transient faults retry the same one.
   */
  private rejectSubmission(item: PipelineItem, reason: unknown, result: TickResult): void {
    const error = classifyError(reason);
    const candidate = item.candidate;
    if (error.kind !== 'validation' || !candidate || candidate.manual) {
      this.fail(item, error, 'client_rejected', result);
      return;
    }

    result.failures++;
    logger.warn(`[Scheduler] ${item.id} reference rejected by client: ${error.message}`);
    this.commit(item, result, (fresh) =>
      this.deps.updater.apply(
        fresh,
        'client_rejected',
        {
          candidate: null,
          rejectedReferences: [...fresh.rejectedReferences, candidate.downloadUrl],
          lastError: error.message,
        },
        error.message,
      ),
    );
  }

  // ---- phase 4: progress reconciliation ----

  private async reconcile(result: TickResult): Promise<void> {
    const watched = this.deps.store
      .findByStatus(['DOWNLOADING', 'SEEDING'])
      .filter((item) => item.pendingControl === null && item.clientHandle !== null);

    const outcomes = await runBounded(watched, this.options.maxStageWorkers, (item) => this.poll(item));

    for (const [index, outcome] of outcomes.entries()) {
      const item = watched[index];
      result.polled++;
      if (outcome.status === 'rejected') {
        // A failed poll is retried next tick; it does not consume the download budget
        result.failures++;
        logger.warn(`[Scheduler] Status poll failed for ${item.id}: ${errorMessage(outcome.reason)}`);
        const message = errorMessage(outcome.reason);
        this.commit(item, result, (fresh) => this.deps.updater.update(fresh, { lastError: message }));
        continue;
      }
      const status = outcome.value;
      if (item.status === 'DOWNLOADING') {
        await this.guard(item, result, () => this.reconcileDownload(item, status));
      } else {
        await this.guard(item, result, () => this.reconcileSeeding(item, status));
      }
    }
  }

  private poll(item: PipelineItem): Promise<ClientJobStatus> {
    const client = this.clientFor(item);
    const handle = item.clientHandle;
    if (!client || !handle) {
      return Promise.reject(new ValidationError(`Item ${item.id} has no usable client handle`));
    }
    return withTimeout(`Status ${item.id}`, this.options.externalTimeoutMs, (signal) => client.status(handle, signal));
  }

  private async reconcileDownload(item: PipelineItem, status: ClientJobStatus): Promise<void> {
    const { updater } = this.deps;
    const fresh = this.refresh(item);
    if (!fresh) return;

    if (status.state === 'completed' || status.state === 'seeding' || status.progress >= 100) {
      updater.apply(fresh, 'progress_100', {
        progress: 100,
        downloadSpeed: 0,
        etaSeconds: 0,
        ratio: status.ratio,
        downloadPath: status.contentPath ? mapClientPath(status.contentPath, this.options.pathMappings) : null,
        lastError: null,
      });
      return;
    }

    if (status.state === 'missing') {
      // Resubmit the same reference
      updater.apply(fresh, 'client_error', { ...this.detached(), lastError: status.message }, status.message);
      return;
    }

    if (status.state === 'error') {
      await this.removeJob(fresh, true);
      const candidate = fresh.candidate;
      const changes: ItemChanges = { ...this.detached(), lastError: status.message };
      if (candidate && !candidate.manual) {
        changes.candidate = null;
        changes.rejectedReferences = [...fresh.rejectedReferences, candidate.downloadUrl];
      }
      updater.apply(fresh, 'client_error', changes, status.message);
      return;
    }

    updater.update(fresh, {
      progress: Math.round(status.progress * 10) / 10,
      downloadSpeed: status.downloadSpeed,
      etaSeconds: status.etaSeconds,
      ratio: status.ratio,
    });
  }

  private async reconcileSeeding(item: PipelineItem, status: ClientJobStatus): Promise<void> {
    const fresh = this.refresh(item);
    if (!fresh) return;

    const { ratioLimit, timeLimitSeconds } = this.options.seeding;
    // Clients restart their own seeding timer when a job is re-added
    const wall = fresh.seedingStartedAt
      ? Math.max(0, Math.round((this.clock().getTime() - Date.parse(fresh.seedingStartedAt)) / 1000))
      : 0;
    const elapsed = Math.max(status.seedingSeconds ?? 0, wall);

    let reason: string | null = null;
    if (status.state === 'missing') reason = 'job no longer present in client';
    else if (status.state === 'error') reason = `client reported an error: ${status.message ?? 'unknown'}`;
    else if (status.ratio !== null && status.ratio >= ratioLimit) reason = `ratio ${status.ratio.toFixed(2)} reached`;
    else if (elapsed >= timeLimitSeconds) reason = `seeded for ${Math.round(elapsed / 3600)}h`;

    if (!reason) {
      this.deps.updater.update(fresh, { ratio: status.ratio, seedingSeconds: elapsed });
      return;
    }

    if (status.state !== 'missing') {
      await this.removeJob(fresh, true);
    }
    this.deps.updater.apply(fresh, 'seeding_goal_met', { ratio: status.ratio, seedingSeconds: elapsed }, reason);
  }

  // ---- phase 5: stage dispatch ----

  private routeCompletedDownloads(result: TickResult): void {
    for (const item of this.deps.store.findByStatus('DOWNLOAD_COMPLETE')) {
      if (item.pendingControl !== null) continue;
      this.commit(item, result, (fresh) =>
        this.deps.updater.apply(fresh, requiresConversion(fresh) ? 'needs_conversion' : 'no_conversion_needed'),
      );
    }
  }

  private async runConversions(result: TickResult): Promise<void> {
    const converting = this.ready(this.deps.store.findByStatus('CONVERTING'), this.clock());
    const outcomes = await runBounded(converting, this.options.maxStageWorkers, (item) =>
      withTimeout(`Conversion ${item.id}`, this.options.conversionTimeoutMs, (signal) => this.convert(item, signal)),
    );

    outcomes.forEach((outcome, index) => {
      const item = converting[index];
      if (outcome.status === 'rejected') {
        this.fail(item, outcome.reason, 'conversion_failed', result);
        return;
      }
      result.converted++;
      const convertedPath = outcome.value;
      this.commit(item, result, (fresh) =>
        this.deps.updater.apply(fresh, 'conversion_succeeded', { convertedPath, lastError: null }),
      );
    });
  }

  private async convert(item: PipelineItem, signal: AbortSignal): Promise<string> {
    if (!item.downloadPath) {
      throw new ValidationError(`Item ${item.id} has no download path to convert`);
    }
    const inputs = await this.filesToConvert(item.downloadPath);
    if (inputs.length === 0) {
      throw new ValidationError(`No convertible audio found in ${item.downloadPath}`);
    }

    const outputDir = path.join(this.options.conversionPath, item.id);
    const outputs: string[] = [];
    for (const input of inputs) {
      outputs.push(await this.deps.converter.convert(input, outputDir, signal));
    }
    return outputs.length === 1 ? outputs[0] : outputDir;
  }

  private async filesToConvert(target: string): Promise<string[]> {
    const stats = await fs.promises.stat(target);
    if (stats.isFile()) return [target];
    const drm = (await fs.promises.readdir(target)).filter((name) => isDrmContainer(name)).map((name) => path.join(target, name));
    return drm.length > 0 ? drm : collectAudioFiles(target);
  }

  private beginImports(result: TickResult): void {
    for (const item of this.deps.store.findByStatus('CONVERTED')) {
      if (item.pendingControl !== null) continue;
      this.commit(item, result, (fresh) => this.deps.updater.apply(fresh, 'begin_import'));
    }
  }

  private async runImports(result: TickResult): Promise<void> {
    const importing = this.ready(this.deps.store.findByStatus('IMPORTING'), this.clock());
    const outcomes = await runBounded(importing, this.options.maxStageWorkers, (item) =>
      withTimeout(`Import ${item.id}`, this.options.importTimeoutMs, (signal) => this.importItem(item, signal)),
    );

    for (const [index, outcome] of outcomes.entries()) {
      const item = importing[index];
      if (outcome.status === 'rejected') {
        this.fail(item, outcome.reason, 'import_failed', result);
        continue;
      }
      result.imported++;
      const { finalPath, record, duplicate } = outcome.value;
      const imported = this.commit(item, result, (fresh) =>
        this.deps.updater.apply(
          fresh,
          'import_succeeded',
          { finalPath, imported: record, progress: 100, lastError: null },
          duplicate ? 'already present in library' : finalPath,
        ),
      );
      if (imported) {
        await this.guard(imported, result, () => this.afterImport(imported));
      }
    }
  }

  importModeFor(item: PipelineItem): ImportMode {
    if (item.convertedPath) return 'move';
    // The client still needs the payload: it will seed, or the job stays in the client
    const keepsPayload = this.options.seeding.enabled || !this.options.removeCompleted;
    return item.candidate?.sourceType === 'torrent' && keepsPayload ? 'copy' : 'move';
  }

  private async importItem(
    item: PipelineItem,
    signal: AbortSignal,
  ): Promise<{ finalPath: string; record: ImportRecord; duplicate: boolean }> {
    const source = item.convertedPath ?? item.downloadPath;
    if (!source) {
      throw new ValidationError(`Item ${item.id} has nothing to import`);
    }
    if (!fs.existsSync(source)) {
      throw new ValidationError(`Downloaded content not found at ${source}`);
    }

    const files = await collectAudioFiles(source);
    if (files.length === 0) {
      throw new ValidationError(`No importable audio files in ${source}`);
    }

    const base = this.deps.resolver.resolvePath(
      {
        title: item.title,
        author: item.author,
        narrator: item.narrator,
        series: item.series,
        seriesPosition: item.seriesPosition,
        year: item.year,
      },
      this.options.namingTemplate,
    );
    const mode = this.importModeFor(item);

    const results: ImportResult[] = [];
    try {
      for (const file of files) {
        const destination =
          files.length === 1 ? `${base}${path.extname(file).toLowerCase()}` : path.join(base, path.basename(file));
        results.push(await this.deps.importer.importFile({ source: file, destination, mode, signal }));
      }
    } catch (error) {
      // All or nothing: a retry has to find the download as it was
      await this.rollBackImport(item, results, mode);
      throw error;
    }

    const [first] = results;
    const checksum =
      results.length === 1
        ? first.checksum
        : createHash('sha256')
            .update(results.map((entry) => entry.checksum).join('\n'))
            .digest('hex');

    return {
      finalPath: results.length === 1 ? first.destination : base,
      duplicate: results.every((entry) => entry.duplicate),
      record: {
        size: results.reduce((total, entry) => total + entry.size, 0),
        format: first.quality.format,
        bitrate: first.quality.bitrate,
        channels: first.quality.channels,
        checksum,
      },
    };
  }

  private async rollBackImport(item: PipelineItem, placed: ImportResult[], mode: ImportMode): Promise<void> {
    for (const entry of [...placed].reverse()) {
      try {
        await this.deps.importer.undo(entry, mode);
      } catch (error) {
        logger.error(`[Scheduler] Could not roll back ${entry.destination} for ${item.id}:`, error);
      }
    }
  }

  private async afterImport(item: PipelineItem): Promise<void> {
    if (item.convertedPath) {
      await fs.promises.rm(path.join(this.options.conversionPath, item.id), { recursive: true, force: true });
    }

    if (canApply(item, 'start_seeding', this.deps.updater.context)) {
      this.deps.updater.apply(item, 'start_seeding', { ratio: item.ratio ?? 0, seedingSeconds: 0 });
      return;
    }

    if (this.options.removeCompleted) {
      await this.removeJob(item, true);
    }
  }

  // ---- helpers ----

  private clientFor(item: PipelineItem): DownloadClient | null {
    return item.clientName ? this.deps.clients.byClientName(item.clientName) : null;
  }

  private async removeJob(item: PipelineItem, deleteData: boolean): Promise<void> {
    const client = this.clientFor(item);
    const handle = item.clientHandle;
    if (!client || !handle) return;
    await this.callClient(`Remove ${item.id}`, (signal) => client.remove(handle, deleteData, signal));
  }

  private callClient(label: string, call: (signal: AbortSignal) => Promise<void>): Promise<void> {
    return withTimeout(label, this.options.externalTimeoutMs, call);
  }

  private detached(): ItemChanges {
    return { clientName: null, clientHandle: null, progress: 0, downloadSpeed: 0, etaSeconds: null };
  }

  /** Items whose retry delay has passed and that have no control waiting. */
  private ready(items: PipelineItem[], now: Date): PipelineItem[] {
    return items.filter(
      (item) => item.pendingControl === null && (!item.nextRetryAt || Date.parse(item.nextRetryAt) <= now.getTime()),
    );
  }

  /** The stored item if it is still in the state this tick read it in. */
  private refresh(item: PipelineItem): PipelineItem | null {
    const fresh = this.deps.store.findById(item.id);
    if (!fresh || fresh.status !== item.status) {
      logger.debug(`[Scheduler] ${item.id} moved on to ${fresh?.status ?? 'nowhere'} during the tick, skipping`);
      return null;
    }
    return fresh;
  }

  /** Commit one item's result; a failure is logged against that item only. */
  private commit(
    item: PipelineItem,
    result: TickResult,
    write: (fresh: PipelineItem) => PipelineItem,
  ): PipelineItem | null {
    try {
      const fresh = this.refresh(item);
      return fresh ? write(fresh) : null;
    } catch (error) {
      this.record(item, error, result);
      return null;
    }
  }

  private async guard(item: PipelineItem, result: TickResult, work: () => Promise<void>): Promise<void> {
    try {
      await work();
    } catch (error) {
      this.record(item, error, result);
    }
  }

  private record(item: PipelineItem, error: unknown, result: TickResult): void {
    if (error instanceof StaleItemError) {
      logger.debug(`[Scheduler] ${item.id} changed concurrently, will retry next tick`);
      return;
    }
    result.failures++;
    logger.error(`[Scheduler] Item ${item.id} (${item.status}) failed:`, error);
    try {
      const fresh = this.deps.store.findById(item.id);
      if (fresh && !isTerminal(fresh.status)) {
        this.deps.store.save({ ...fresh, lastError: errorMessage(error) });
      }
    } catch (saveError) {
      logger.error(`[Scheduler] Could not record the failure of ${item.id}:`, saveError);
    }
  }

  /**
   * Route a stage failure by kind: transient faults take the stage's retry
   * edge, validation and integrity faults fail the item, anything else halts
   * it in ERROR for an operator.
   */
  private fail(item: PipelineItem, reason: unknown, retryEvent: PipelineEvent, result: TickResult): void {
    const error = classifyError(reason);
    result.failures++;
    logger.warn(`[Scheduler] ${item.id} ${item.status} failed (${error.kind}): ${error.message}`);

    const event: PipelineEvent =
      error.kind === 'transient'
        ? retryEvent
        : error.kind === 'validation' || error.kind === 'integrity'
          ? 'fatal_error'
          : 'internal_error';

    this.commit(item, result, (fresh) =>
      this.deps.updater.apply(fresh, event, { lastError: error.message, downloadSpeed: 0 }, error.message),
    );
  }
}
