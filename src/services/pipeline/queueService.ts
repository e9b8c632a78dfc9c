import { z } from 'zod';
import logger from '../../config/logger';
import type { EventQuery, PipelineEventRecord } from '../../models/PipelineEvent';
import type {
  ListFilter,
  PendingControl,
  PipelineItem,
  PipelineStatus,
  QueueStore,
  SelectedCandidate,
} from '../../models/PipelineItem';
import { PIPELINE_STATUSES } from '../../models/PipelineItem';
import { ConflictError, NotFoundError, TransitionRejectedError, ValidationError } from '../../utils/errors';
import type { PipelineEventBus } from '../events/pipelineEvents';
import type { RankedCandidate } from '../quality/qualityAssessor';
import type { CandidateSearch } from './candidateSearch';
import type { ItemChanges, PipelineItemUpdater } from './itemUpdater';
import type { PipelineEvent } from './stateMachine';
import { canApply } from './stateMachine';

const text = z.string().trim().min(1);
const optionalText = z.string().trim().min(1).nullish();

export const wantedSchema = z.object({
  identity: text,
  title: text,
  author: text,
  narrator: optionalText,
  series: optionalText,
  seriesPosition: z.union([z.string(), z.number()]).transform(String).nullish(),
  year: z.number().int().min(1000).max(9999).nullish(),
  priority: z.number().int().default(0),
});

export const manualSchema = wantedSchema.extend({
  identity: optionalText,
  candidate: z.object({
    downloadUrl: text,
    sourceType: z.enum(['catalog', 'torrent', 'usenet']),
    title: optionalText,
    indexer: optionalText,
    format: optionalText,
    bitrate: z.number().nonnegative().nullish(),
    size: z.number().nonnegative().nullish(),
    seeders: z.number().int().nonnegative().nullish(),
  }),
});

export type WantedInput = z.input<typeof wantedSchema>;
export type ManualInput = z.input<typeof manualSchema>;

export const listQuerySchema = z.object({
  status: z
    .string()
    .transform((value) => value.split(',').map((status) => status.trim().toUpperCase()))
    .pipe(z.array(z.enum(PIPELINE_STATUSES)))
    .optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

/** State machine event each deferred control stands for; used to validate the request up front. */
const CONTROL_EVENTS: Record<PendingControl, PipelineEvent> = {
  pause: 'pause_requested',
  resume: 'resume_requested',
  cancel: 'operator_cancel',
  requeue: 'operator_requeue',
};

/** States a requeue applies to immediately unless a client job is still attached. */
const DIRECT_REQUEUE_STATES: readonly PipelineStatus[] = ['FAILED', 'CANCELLED', 'ERROR'];

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`${issue.path.join('.') || 'input'}: ${issue.message}`);
  }
  return parsed.data;
}

/** Field resets for an item going back to the start of the pipeline. */
export function restartChanges(item: PipelineItem): ItemChanges {
  const keepCandidate = item.candidate?.manual ? item.candidate : null;
  return {
    candidate: keepCandidate,
    clientName: null,
    clientHandle: null,
    progress: 0,
    downloadSpeed: 0,
    etaSeconds: null,
    ratio: null,
    seedingSeconds: null,
    pendingControl: null,
    searchStartedAt: null,
    foundAt: null,
    downloadStartedAt: null,
    downloadCompletedAt: null,
    conversionStartedAt: null,
    convertedAt: null,
    importStartedAt: null,
    importedAt: null,
    seedingStartedAt: null,
    downloadPath: null,
    convertedPath: null,
    finalPath: null,
    imported: null,
    lastError: null,
  };
}

/**
 * Inbound operations on the queue. Controls that touch a live download
 * (pause, resume, cancel, requeue of an active item) are validated here and
 * recorded as pending; the scheduler applies them on its next tick.
 */
export class QueueService {
  constructor(
    private readonly store: QueueStore,
    private readonly updater: PipelineItemUpdater,
    private readonly events: PipelineEventBus,
    private readonly search: CandidateSearch,
  ) {}

  /** Idempotent by identity: an active item for the identity is returned as is. */
  enqueueWanted(input: WantedInput): { item: PipelineItem; created: boolean } {
    const wanted = parseInput(wantedSchema, input);

    const existing = this.store.findActiveByIdentity(wanted.identity);
    if (existing) {
      return { item: existing, created: false };
    }

    try {
      const item = this.store.insert(wanted);
      this.events.created(item);
      logger.info(`[Queue] Wanted: "${item.title}" by ${item.author} (${item.id})`);
      return { item, created: true };
    } catch (error) {
      // Lost a race with another enqueue for the same identity
      if (error instanceof ConflictError && error.existingId) {
        return { item: this.get(error.existingId), created: false };
      }
      throw error;
    }
  }

  /** An operator-chosen download. Enters at FOUND, skipping search. */
  enqueueManual(input: ManualInput): PipelineItem {
    const manual = parseInput(manualSchema, input);

    if (manual.identity) {
      const existing = this.store.findActiveByIdentity(manual.identity);
      if (existing) {
        throw new ConflictError(`Item ${existing.id} is already active for identity ${manual.identity}`, existing.id);
      }
    }

    const candidate: SelectedCandidate = {
      downloadUrl: manual.candidate.downloadUrl,
      sourceType: manual.candidate.sourceType,
      title: manual.candidate.title ?? manual.title,
      indexer: manual.candidate.indexer ?? null,
      format: manual.candidate.format?.toLowerCase() ?? null,
      bitrate: manual.candidate.bitrate ?? null,
      size: manual.candidate.size ?? null,
      seeders: manual.candidate.seeders ?? null,
      confidence: null,
      manual: true,
    };

    const item = this.store.insert({ ...manual, identity: manual.identity ?? null, candidate });
    this.events.created(item);
    logger.info(`[Queue] Manual selection: "${item.title}" from ${candidate.indexer ?? candidate.sourceType} (${item.id})`);
    return this.updater.apply(item, 'skip_search', {}, 'manual selection');
  }

  pause(id: string): PipelineItem {
    return this.requestControl(id, 'pause');
  }

  resume(id: string): PipelineItem {
    return this.requestControl(id, 'resume');
  }

  cancel(id: string): PipelineItem {
    return this.requestControl(id, 'cancel');
  }

  /**
   * FAILED, CANCELLED or ERROR back to QUEUED with fresh counters. An item
   * still holding a client job is requeued on the next tick, after the job
   * has been removed.
   */
  retry(id: string): PipelineItem {
    const item = this.get(id);
    if (item.clientHandle && canApply(item, 'operator_retry', this.updater.context)) {
      return this.deferredRequeue(item);
    }
    return this.updater.apply(item, 'operator_retry', restartChanges(item), 'operator retry');
  }

  /**
   * Back to QUEUED from anywhere except QUEUED and the imported states.
   * Items with nothing running move immediately; active ones on the next tick.
   */
  forceRequeue(id: string): PipelineItem {
    const item = this.get(id);
    if (DIRECT_REQUEUE_STATES.includes(item.status)) {
      if (item.clientHandle) return this.deferredRequeue(item);
      return this.updater.apply(item, 'operator_requeue', restartChanges(item), 'operator requeue');
    }
    return this.requestControl(id, 'requeue');
  }

  list(filter: ListFilter = {}): PipelineItem[] {
    return this.store.list(filter);
  }

  get(id: string): PipelineItem {
    const item = this.store.findById(id);
    if (!item) {
      throw new NotFoundError(`Queue item ${id} not found`);
    }
    return item;
  }

  /** The active item for the identity, else its most recent one. */
  getByIdentity(identity: string): PipelineItem {
    const item = this.store.findLatestByIdentity(identity);
    if (!item) {
      throw new NotFoundError(`No queue item for identity ${identity}`);
    }
    return item;
  }

  countsByStatus(): Record<PipelineStatus, number> {
    return this.store.countByStatus();
  }

  listEvents(query: EventQuery = {}): PipelineEventRecord[] {
    return this.events.list(query);
  }

  async interactiveSearch(query: { title: string; author?: string | null }, signal?: AbortSignal): Promise<RankedCandidate[]> {
    const title = query.title.trim();
    if (!title) {
      throw new ValidationError('title is required');
    }
    return this.search.search({ title, author: query.author?.trim() || null }, { signal });
  }

  private deferredRequeue(item: PipelineItem): PipelineItem {
    const active = item.identity ? this.store.findActiveByIdentity(item.identity) : null;
    if (active && active.id !== item.id) {
      throw new ConflictError(`Item ${active.id} is already active for identity ${item.identity}`, active.id);
    }
    return this.requestControl(item.id, 'requeue');
  }

  private requestControl(id: string, control: PendingControl): PipelineItem {
    const item = this.get(id);
    const event = CONTROL_EVENTS[control];

    if (!canApply(item, event, this.updater.context)) {
      throw new TransitionRejectedError(item.id, item.status, control);
    }
    if (item.pendingControl === 'cancel' && control !== 'cancel') {
      throw new TransitionRejectedError(item.id, item.status, control, `Item ${item.id} is already being cancelled`);
    }
    if (item.pendingControl === control) {
      return item;
    }

    const saved = this.store.save({ ...item, pendingControl: control });
    this.events.intent(saved, control);
    logger.info(`[Queue] ${control} requested for ${item.id} (${item.status})`);
    return saved;
  }
}
