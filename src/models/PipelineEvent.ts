import { z } from 'zod';
import type { SqliteDatabase } from '../config/database';
import { PIPELINE_STATUSES } from './PipelineItem';
import type { PipelineStatus } from './PipelineItem';

export interface PipelineEventRecord {
  id: number;
  itemId: string;
  identity: string | null;
  /** State machine event name, `progress`, or an operator intent such as `operator_pause`. */
  eventType: string;
  oldState: PipelineStatus | null;
  newState: PipelineStatus;
  progress: number;
  message: string | null;
  createdAt: string;
}

export type PipelineEventInput = Omit<PipelineEventRecord, 'id'>;

export interface EventQuery {
  /** Only events with an id greater than this cursor. */
  since?: number;
  itemId?: string;
  limit?: number;
}

const eventRowSchema = z.object({
  id: z.number(),
  item_id: z.string(),
  identity: z.string().nullable(),
  event_type: z.string(),
  old_state: z.enum(PIPELINE_STATUSES).nullable(),
  new_state: z.enum(PIPELINE_STATUSES),
  progress: z.number(),
  message: z.string().nullable(),
  created_at: z.string(),
});

function mapRow(row: unknown): PipelineEventRecord {
  const parsed = eventRowSchema.parse(row);
  return {
    id: parsed.id,
    itemId: parsed.item_id,
    identity: parsed.identity,
    eventType: parsed.event_type,
    oldState: parsed.old_state,
    newState: parsed.new_state,
    progress: parsed.progress,
    message: parsed.message,
    createdAt: parsed.created_at,
  };
}

// Rows are never updated; only the retention sweep deletes them
export class PipelineEventLog {
  constructor(private readonly db: SqliteDatabase) {}

  append(input: PipelineEventInput): PipelineEventRecord {
    const result = this.db
      .prepare(
        `INSERT INTO pipeline_events (item_id, identity, event_type, old_state, new_state, progress, message, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.itemId,
        input.identity,
        input.eventType,
        input.oldState,
        input.newState,
        input.progress,
        input.message,
        input.createdAt,
      );
    return { ...input, id: Number(result.lastInsertRowid) };
  }

  /** Oldest first, so a consumer can resume from the last id it saw. */
  list(query: EventQuery = {}): PipelineEventRecord[] {
    const clauses: string[] = ['id > ?'];
    const params: Array<string | number> = [query.since ?? 0];
    if (query.itemId) {
      clauses.push('item_id = ?');
      params.push(query.itemId);
    }
    params.push(Math.min(Math.max(query.limit ?? 100, 1), 1000));

    const rows = this.db
      .prepare(`SELECT * FROM pipeline_events WHERE ${clauses.join(' AND ')} ORDER BY id ASC LIMIT ?`)
      .all(...params);
    return rows.map(mapRow);
  }

  /**
   * Delete events created before `before`, then all but the newest
   * `maxPerItem` of each item's events. Returns the number of rows removed.
   */
  prune(before: Date, maxPerItem: number): number {
    const sweep = this.db.transaction(() => {
      const aged = this.db.prepare('DELETE FROM pipeline_events WHERE created_at < ?').run(before.toISOString());
      const capped = this.db
        .prepare(
          `DELETE FROM pipeline_events WHERE id IN (
             SELECT id FROM (
               SELECT id, ROW_NUMBER() OVER (PARTITION BY item_id ORDER BY id DESC) AS position
               FROM pipeline_events
             ) WHERE position > ?
           )`,
        )
        .run(maxPerItem);
      return aged.changes + capped.changes;
    });
    return sweep();
  }

  latestId(): number {
    const row = z
      .object({ id: z.number().nullable() })
      .parse(this.db.prepare('SELECT MAX(id) AS id FROM pipeline_events').get());
    return row.id ?? 0;
  }
}
