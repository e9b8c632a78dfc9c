import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { SqliteDatabase } from '../config/database';
import { TERMINAL_STATUS_SQL } from '../config/database';
import type { SourceType } from '../services/indexers/types';
import { ConflictError, StaleItemError } from '../utils/errors';

export const PIPELINE_STATUSES = [
  'QUEUED',
  'SEARCHING',
  'FOUND',
  'DOWNLOADING',
  'DOWNLOAD_COMPLETE',
  'CONVERTING',
  'CONVERTED',
  'IMPORTING',
  'IMPORTED',
  'SEEDING',
  'SEEDING_COMPLETE',
  'PAUSED',
  'FAILED',
  'CANCELLED',
  'ERROR',
] as const;

export type PipelineStatus = (typeof PIPELINE_STATUSES)[number];

export const TERMINAL_STATUSES: readonly PipelineStatus[] = ['IMPORTED', 'SEEDING_COMPLETE', 'FAILED', 'CANCELLED'];

export function isTerminal(status: PipelineStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isPipelineStatus(value: string): value is PipelineStatus {
  return PIPELINE_STATUSES.some((status) => status === value);
}

export type PendingControl = 'pause' | 'resume' | 'cancel' | 'requeue';

export interface SelectedCandidate {
  downloadUrl: string;
  sourceType: SourceType;
  title: string;
  indexer: string | null;
  format: string | null;
  bitrate: number | null;
  size: number | null;
  seeders: number | null;
  confidence: number | null;
  manual: boolean;
}

export interface RetryCounters {
  search: number;
  download: number;
  conversion: number;
  import: number;
}

export type RetryStage = keyof RetryCounters;

export interface ImportRecord {
  size: number;
  format: string;
  bitrate: number;
  channels: number;
  checksum: string;
}

export interface PipelineItem {
  id: string;
  identity: string | null;
  title: string;
  author: string;
  narrator: string | null;
  series: string | null;
  seriesPosition: string | null;
  year: number | null;
  status: PipelineStatus;
  priority: number;
  candidate: SelectedCandidate | null;
  rejectedReferences: string[];

  clientName: string | null;
  clientHandle: string | null;
  progress: number;
  downloadSpeed: number;
  etaSeconds: number | null;
  ratio: number | null;
  seedingSeconds: number | null;

  retries: RetryCounters;
  nextRetryAt: string | null;
  pendingControl: PendingControl | null;

  queuedAt: string;
  searchStartedAt: string | null;
  foundAt: string | null;
  downloadStartedAt: string | null;
  downloadCompletedAt: string | null;
  conversionStartedAt: string | null;
  convertedAt: string | null;
  importStartedAt: string | null;
  importedAt: string | null;
  seedingStartedAt: string | null;
  completedAt: string | null;

  downloadPath: string | null;
  convertedPath: string | null;
  finalPath: string | null;
  imported: ImportRecord | null;

  lastError: string | null;
  version: number;
  updatedAt: string;
}

export interface NewPipelineItem {
  identity?: string | null;
  title: string;
  author: string;
  narrator?: string | null;
  series?: string | null;
  seriesPosition?: string | null;
  year?: number | null;
  priority?: number;
  candidate?: SelectedCandidate | null;
}

export interface ListFilter {
  status?: PipelineStatus | PipelineStatus[];
  limit?: number;
  offset?: number;
}

/**
 * Repository over persisted pipeline items. Writes are optimistic: `save`
 * succeeds only when the stored version still matches the one the caller read.
 */
export interface QueueStore {
  insert(input: NewPipelineItem): PipelineItem;
  findById(id: string): PipelineItem | null;
  findActiveByIdentity(identity: string): PipelineItem | null;
  findLatestByIdentity(identity: string): PipelineItem | null;
  findByStatus(statuses: PipelineStatus | PipelineStatus[]): PipelineItem[];
  findWithPendingControl(): PipelineItem[];
  list(filter?: ListFilter): PipelineItem[];
  countByStatus(): Record<PipelineStatus, number>;
  save(item: PipelineItem): PipelineItem;
}

const nullableText = z.string().nullable();
const nullableNumber = z.number().nullable();

const rowSchema = z.object({
  id: z.string(),
  identity: nullableText,
  title: z.string(),
  author: z.string(),
  narrator: nullableText,
  series: nullableText,
  series_position: nullableText,
  year: nullableNumber,
  status: z.enum(PIPELINE_STATUSES),
  priority: z.number(),
  download_url: nullableText,
  source_type: z.enum(['catalog', 'torrent', 'usenet']).nullable(),
  candidate_title: nullableText,
  indexer: nullableText,
  format: nullableText,
  bitrate: nullableNumber,
  size: nullableNumber,
  seeders: nullableNumber,
  confidence: nullableNumber,
  manual_selection: z.number(),
  rejected_references: z.string(),
  client_name: nullableText,
  client_handle: nullableText,
  progress: z.number(),
  download_speed: z.number(),
  eta_seconds: nullableNumber,
  ratio: nullableNumber,
  seeding_seconds: nullableNumber,
  search_retries: z.number(),
  download_retries: z.number(),
  conversion_retries: z.number(),
  import_retries: z.number(),
  next_retry_at: nullableText,
  pending_control: z.enum(['pause', 'resume', 'cancel', 'requeue']).nullable(),
  queued_at: z.string(),
  search_started_at: nullableText,
  found_at: nullableText,
  download_started_at: nullableText,
  download_completed_at: nullableText,
  conversion_started_at: nullableText,
  converted_at: nullableText,
  import_started_at: nullableText,
  imported_at: nullableText,
  seeding_started_at: nullableText,
  completed_at: nullableText,
  download_path: nullableText,
  converted_path: nullableText,
  final_path: nullableText,
  imported_size: nullableNumber,
  imported_format: nullableText,
  imported_bitrate: nullableNumber,
  imported_channels: nullableNumber,
  checksum: nullableText,
  last_error: nullableText,
  version: z.number(),
  updated_at: z.string(),
});

type PipelineRow = z.infer<typeof rowSchema>;

const referenceListSchema = z.array(z.string());

function parseReferences(raw: string): string[] {
  try {
    const parsed = referenceListSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

function mapRowToItem(row: PipelineRow): PipelineItem {
  const candidate: SelectedCandidate | null =
    row.download_url && row.source_type
      ? {
          downloadUrl: row.download_url,
          sourceType: row.source_type,
          title: row.candidate_title ?? row.title,
          indexer: row.indexer,
          format: row.format,
          bitrate: row.bitrate,
          size: row.size,
          seeders: row.seeders,
          confidence: row.confidence,
          manual: row.manual_selection === 1,
        }
      : null;

  const imported: ImportRecord | null =
    row.imported_size !== null && row.checksum !== null
      ? {
          size: row.imported_size,
          format: row.imported_format ?? 'unknown',
          bitrate: row.imported_bitrate ?? 0,
          channels: row.imported_channels ?? 0,
          checksum: row.checksum,
        }
      : null;

  return {
    id: row.id,
    identity: row.identity,
    title: row.title,
    author: row.author,
    narrator: row.narrator,
    series: row.series,
    seriesPosition: row.series_position,
    year: row.year,
    status: row.status,
    priority: row.priority,
    candidate,
    rejectedReferences: parseReferences(row.rejected_references),
    clientName: row.client_name,
    clientHandle: row.client_handle,
    progress: row.progress,
    downloadSpeed: row.download_speed,
    etaSeconds: row.eta_seconds,
    ratio: row.ratio,
    seedingSeconds: row.seeding_seconds,
    retries: {
      search: row.search_retries,
      download: row.download_retries,
      conversion: row.conversion_retries,
      import: row.import_retries,
    },
    nextRetryAt: row.next_retry_at,
    pendingControl: row.pending_control,
    queuedAt: row.queued_at,
    searchStartedAt: row.search_started_at,
    foundAt: row.found_at,
    downloadStartedAt: row.download_started_at,
    downloadCompletedAt: row.download_completed_at,
    conversionStartedAt: row.conversion_started_at,
    convertedAt: row.converted_at,
    importStartedAt: row.import_started_at,
    importedAt: row.imported_at,
    seedingStartedAt: row.seeding_started_at,
    completedAt: row.completed_at,
    downloadPath: row.download_path,
    convertedPath: row.converted_path,
    finalPath: row.final_path,
    imported,
    lastError: row.last_error,
    version: row.version,
    updatedAt: row.updated_at,
  };
}

function mapItemToParams(item: PipelineItem): Record<string, string | number | null> {
  return {
    id: item.id,
    identity: item.identity,
    title: item.title,
    author: item.author,
    narrator: item.narrator,
    series: item.series,
    series_position: item.seriesPosition,
    year: item.year,
    status: item.status,
    priority: item.priority,
    download_url: item.candidate?.downloadUrl ?? null,
    source_type: item.candidate?.sourceType ?? null,
    candidate_title: item.candidate?.title ?? null,
    indexer: item.candidate?.indexer ?? null,
    format: item.candidate?.format ?? null,
    bitrate: item.candidate?.bitrate ?? null,
    size: item.candidate?.size ?? null,
    seeders: item.candidate?.seeders ?? null,
    confidence: item.candidate?.confidence ?? null,
    manual_selection: item.candidate?.manual ? 1 : 0,
    rejected_references: JSON.stringify(item.rejectedReferences),
    client_name: item.clientName,
    client_handle: item.clientHandle,
    progress: item.progress,
    download_speed: item.downloadSpeed,
    eta_seconds: item.etaSeconds,
    ratio: item.ratio,
    seeding_seconds: item.seedingSeconds,
    search_retries: item.retries.search,
    download_retries: item.retries.download,
    conversion_retries: item.retries.conversion,
    import_retries: item.retries.import,
    next_retry_at: item.nextRetryAt,
    pending_control: item.pendingControl,
    queued_at: item.queuedAt,
    search_started_at: item.searchStartedAt,
    found_at: item.foundAt,
    download_started_at: item.downloadStartedAt,
    download_completed_at: item.downloadCompletedAt,
    conversion_started_at: item.conversionStartedAt,
    converted_at: item.convertedAt,
    import_started_at: item.importStartedAt,
    imported_at: item.importedAt,
    seeding_started_at: item.seedingStartedAt,
    completed_at: item.completedAt,
    download_path: item.downloadPath,
    converted_path: item.convertedPath,
    final_path: item.finalPath,
    imported_size: item.imported?.size ?? null,
    imported_format: item.imported?.format ?? null,
    imported_bitrate: item.imported?.bitrate ?? null,
    imported_channels: item.imported?.channels ?? null,
    checksum: item.imported?.checksum ?? null,
    last_error: item.lastError,
  };
}

const WRITABLE_COLUMNS = Object.keys(mapItemToParams(blankItem('', { title: '', author: '' }, ''))).filter(
  (column) => column !== 'id',
);

export function blankItem(id: string, input: NewPipelineItem, now: string): PipelineItem {
  return {
    id,
    identity: input.identity ?? null,
    title: input.title,
    author: input.author,
    narrator: input.narrator ?? null,
    series: input.series ?? null,
    seriesPosition: input.seriesPosition ?? null,
    year: input.year ?? null,
    status: 'QUEUED',
    priority: input.priority ?? 0,
    candidate: input.candidate ?? null,
    rejectedReferences: [],
    clientName: null,
    clientHandle: null,
    progress: 0,
    downloadSpeed: 0,
    etaSeconds: null,
    ratio: null,
    seedingSeconds: null,
    retries: { search: 0, download: 0, conversion: 0, import: 0 },
    nextRetryAt: null,
    pendingControl: null,
    queuedAt: now,
    searchStartedAt: null,
    foundAt: null,
    downloadStartedAt: null,
    downloadCompletedAt: null,
    conversionStartedAt: null,
    convertedAt: null,
    importStartedAt: null,
    importedAt: null,
    seedingStartedAt: null,
    completedAt: null,
    downloadPath: null,
    convertedPath: null,
    finalPath: null,
    imported: null,
    lastError: null,
    version: 0,
    updatedAt: now,
  };
}

export function emptyStatusCounts(): Record<PipelineStatus, number> {
  return {
    QUEUED: 0,
    SEARCHING: 0,
    FOUND: 0,
    DOWNLOADING: 0,
    DOWNLOAD_COMPLETE: 0,
    CONVERTING: 0,
    CONVERTED: 0,
    IMPORTING: 0,
    IMPORTED: 0,
    SEEDING: 0,
    SEEDING_COMPLETE: 0,
    PAUSED: 0,
    FAILED: 0,
    CANCELLED: 0,
    ERROR: 0,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && /UNIQUE constraint failed/.test(error.message);
}

export class SqliteQueueStore implements QueueStore {
  constructor(private readonly db: SqliteDatabase, private readonly clock: () => Date = () => new Date()) {}

  insert(input: NewPipelineItem): PipelineItem {
    const now = this.clock().toISOString();
    const item = blankItem(uuidv4(), input, now);
    const params = { ...mapItemToParams(item), version: 0, updated_at: now };
    const columns = Object.keys(params);

    try {
      this.db
        .prepare(`INSERT INTO pipeline_items (${columns.join(', ')}) VALUES (${columns.map((c) => `@${c}`).join(', ')})`)
        .run(params);
    } catch (error) {
      if (isUniqueViolation(error) && item.identity) {
        const existing = this.findActiveByIdentity(item.identity);
        throw new ConflictError(`An active item already exists for identity ${item.identity}`, existing?.id);
      }
      throw error;
    }

    return item;
  }

  findById(id: string): PipelineItem | null {
    return this.one(this.db.prepare('SELECT * FROM pipeline_items WHERE id = ?').get(id));
  }

  findActiveByIdentity(identity: string): PipelineItem | null {
    const row = this.db
      .prepare(`SELECT * FROM pipeline_items WHERE identity = ? AND status NOT IN ${TERMINAL_STATUS_SQL} LIMIT 1`)
      .get(identity);
    return this.one(row);
  }

  findLatestByIdentity(identity: string): PipelineItem | null {
    const active = this.findActiveByIdentity(identity);
    if (active) return active;
    const row = this.db
      .prepare('SELECT * FROM pipeline_items WHERE identity = ? ORDER BY queued_at DESC, rowid DESC LIMIT 1')
      .get(identity);
    return this.one(row);
  }

  findByStatus(statuses: PipelineStatus | PipelineStatus[]): PipelineItem[] {
    const list = Array.isArray(statuses) ? statuses : [statuses];
    if (list.length === 0) return [];
    const rows = this.db
      .prepare(
        `SELECT * FROM pipeline_items WHERE status IN (${list.map(() => '?').join(', ')})
         ORDER BY priority DESC, queued_at ASC, rowid ASC`,
      )
      .all(...list);
    return this.many(rows);
  }

  findWithPendingControl(): PipelineItem[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM pipeline_items WHERE pending_control IS NOT NULL
         ORDER BY priority DESC, queued_at ASC, rowid ASC`,
      )
      .all();
    return this.many(rows);
  }

  list(filter: ListFilter = {}): PipelineItem[] {
    const statuses = filter.status === undefined ? [] : Array.isArray(filter.status) ? filter.status : [filter.status];
    const where = statuses.length > 0 ? `WHERE status IN (${statuses.map(() => '?').join(', ')})` : '';
    const limit = filter.limit ?? 100;
    const offset = filter.offset ?? 0;
    const rows = this.db
      .prepare(`SELECT * FROM pipeline_items ${where} ORDER BY queued_at DESC, rowid DESC LIMIT ? OFFSET ?`)
      .all(...statuses, limit, offset);
    return this.many(rows);
  }

  countByStatus(): Record<PipelineStatus, number> {
    const counts = emptyStatusCounts();
    const rows = z
      .array(z.object({ status: z.enum(PIPELINE_STATUSES), count: z.number() }))
      .parse(this.db.prepare('SELECT status, COUNT(*) AS count FROM pipeline_items GROUP BY status').all());
    for (const row of rows) {
      counts[row.status] = row.count;
    }
    return counts;
  }

  save(item: PipelineItem): PipelineItem {
    const now = this.clock().toISOString();
    const params = { ...mapItemToParams(item), expected_version: item.version, updated_at: now };
    const assignments = WRITABLE_COLUMNS.map((column) => `${column} = @${column}`).join(', ');

    let changes: number;
    try {
      changes = this.db
        .prepare(
          `UPDATE pipeline_items SET ${assignments}, version = version + 1, updated_at = @updated_at
           WHERE id = @id AND version = @expected_version`,
        )
        .run(params).changes;
    } catch (error) {
      if (isUniqueViolation(error) && item.identity) {
        const existing = this.findActiveByIdentity(item.identity);
        throw new ConflictError(`An active item already exists for identity ${item.identity}`, existing?.id);
      }
      throw error;
    }

    if (changes === 0) {
      throw new StaleItemError(item.id, item.version);
    }
    return { ...item, version: item.version + 1, updatedAt: now };
  }

  private one(row: unknown): PipelineItem | null {
    if (row === undefined) return null;
    return mapRowToItem(rowSchema.parse(row));
  }

  private many(rows: unknown[]): PipelineItem[] {
    return rows.map((row) => mapRowToItem(rowSchema.parse(row)));
  }
}
