import logger from '../../config/logger';
import type { EventRetention } from '../../config/settings';
import type { EventQuery, PipelineEventLog, PipelineEventRecord } from '../../models/PipelineEvent';
import type { PipelineItem, PipelineStatus } from '../../models/PipelineItem';
import { errorMessage } from '../../utils/errors';

export type PipelineEventListener = (event: PipelineEventRecord) => void;

/**
 * Records transition, progress and operator events in the event log and pushes
 * them to in-process subscribers (the SSE route). A failing subscriber never
 * affects the pipeline.
 */
export class PipelineEventBus {
  private readonly listeners = new Set<PipelineEventListener>();

  constructor(private readonly log: PipelineEventLog, private readonly clock: () => Date = () => new Date()) {}

  created(item: PipelineItem): PipelineEventRecord {
    return this.publish(item, 'enqueued', null, null);
  }

  transition(item: PipelineItem, from: PipelineStatus, event: string, message: string | null = null): PipelineEventRecord {
    return this.publish(item, event, from, message);
  }

  progress(item: PipelineItem): PipelineEventRecord {
    return this.publish(item, 'progress', item.status, null);
  }

  /** Operator intent (pause, cancel, ...) accepted for later application. */
  intent(item: PipelineItem, intent: string): PipelineEventRecord {
    return this.publish(item, `operator_${intent}`, item.status, `${intent} requested`);
  }

  subscribe(listener: PipelineEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }

  list(query: EventQuery = {}): PipelineEventRecord[] {
    return this.log.list(query);
  }

  /** Apply the retention policy to the event log. */
  prune(retention: EventRetention): number {
    const before = new Date(this.clock().getTime() - retention.maxAgeMs);
    const removed = this.log.prune(before, retention.maxPerItem);
    if (removed > 0) {
      logger.info(`[Events] Pruned ${removed} event(s) older than ${before.toISOString()} or over the per-item cap`);
    }
    return removed;
  }

  private publish(
    item: PipelineItem,
    eventType: string,
    oldState: PipelineStatus | null,
    message: string | null,
  ): PipelineEventRecord {
    const record = this.log.append({
      itemId: item.id,
      identity: item.identity,
      eventType,
      oldState,
      newState: item.status,
      progress: item.progress,
      message,
      createdAt: this.clock().toISOString(),
    });

    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (error) {
        logger.warn(`[Events] Subscriber failed on event ${record.id}: ${errorMessage(error)}`);
      }
    }
    return record;
  }
}
