import logger from '../../config/logger';
import type { PipelineItem, QueueStore } from '../../models/PipelineItem';
import { TransitionRejectedError } from '../../utils/errors';
import type { PipelineEventBus } from '../events/pipelineEvents';
import type { PipelineEvent, TransitionContext } from './stateMachine';
import { applyTransition, isRetryEvent, transition } from './stateMachine';

/** Fields a caller may change alongside a transition. Status, counters and version belong to the updater. */
export type ItemChanges = Partial<Omit<PipelineItem, 'id' | 'status' | 'retries' | 'version' | 'updatedAt'>>;

export interface UpdaterOptions {
  context: TransitionContext;
  retryBackoffMs: number;
  clock?: () => Date;
}

/**
 * The single writer of item state. Every status change goes through the state
 * machine, is saved under the store's version check, logged, and published.
 */
export class PipelineItemUpdater {
  private readonly clock: () => Date;

  constructor(
    private readonly store: QueueStore,
    private readonly events: PipelineEventBus,
    private readonly options: UpdaterOptions,
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  get context(): TransitionContext {
    return this.options.context;
  }

  /**
   * Apply `event` to the item with `changes` merged first, so guards see the
   * new fields. Throws TransitionRejectedError when the event does not apply
   * and StaleItemError when someone else saved the item in between.
   */
  apply(item: PipelineItem, event: PipelineEvent, changes: ItemChanges = {}, message: string | null = null): PipelineItem {
    const staged: PipelineItem = { ...item, ...changes };
    const result = transition(staged, event, this.options.context);
    if (!result.ok) {
      throw new TransitionRejectedError(item.id, item.status, event, result.reason);
    }

    const now = this.clock();
    const next = applyTransition(staged, result, now);
    next.nextRetryAt =
      isRetryEvent(event) && !result.exhausted ? new Date(now.getTime() + this.options.retryBackoffMs).toISOString() : null;
    if (result.exhausted) {
      next.lastError = `Retry budget exhausted: ${message ?? next.lastError ?? event}`;
    }

    const saved = this.store.save(next);
    const detail = message ? `: ${message}` : '';
    if (result.to === 'FAILED' || result.to === 'ERROR') {
      logger.warn(`[Pipeline] ${item.id} ${result.from} -> ${result.to} (${event})${detail}`);
    } else {
      logger.info(`[Pipeline] ${item.id} ${result.from} -> ${result.to} (${event})${detail}`);
    }
    this.events.transition(saved, result.from, event, result.exhausted ? saved.lastError : message);
    return saved;
  }

  /** Save non-status changes; publishes a progress event when progress moved. */
  update(item: PipelineItem, changes: ItemChanges): PipelineItem {
    const saved = this.store.save({ ...item, ...changes });
    if (Math.floor(saved.progress) !== Math.floor(item.progress)) {
      this.events.progress(saved);
    }
    return saved;
  }
}
