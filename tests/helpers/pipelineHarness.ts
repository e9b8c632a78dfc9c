import fs from 'fs';
import path from 'path';
import type { SeedingConfig } from '../../src/config/settings';
import type { SqliteDatabase } from '../../src/config/database';
import { openDatabase } from '../../src/config/database';
import { PipelineEventLog } from '../../src/models/PipelineEvent';
import { SqliteQueueStore } from '../../src/models/PipelineItem';
import { ClientRegistry } from '../../src/services/clients/registry';
import type { FormatConverter } from '../../src/services/conversion/converter';
import { PipelineEventBus } from '../../src/services/events/pipelineEvents';
import type { FreeSpaceProbe } from '../../src/services/import/importExecutor';
import { ImportExecutor } from '../../src/services/import/importExecutor';
import type { AudioQuality, QualityProbe } from '../../src/services/import/mediaProbe';
import { TemplatePathResolver } from '../../src/services/import/pathResolver';
import type { RawResult, SearchQuery } from '../../src/services/indexers/types';
import type { ResultSource } from '../../src/services/pipeline/candidateSearch';
import { CandidateSearch } from '../../src/services/pipeline/candidateSearch';
import { PipelineItemUpdater } from '../../src/services/pipeline/itemUpdater';
import { QueueService } from '../../src/services/pipeline/queueService';
import { PipelineScheduler } from '../../src/services/pipeline/scheduler';
import { QualityAssessor } from '../../src/services/quality/qualityAssessor';
import { FakeDownloadClient } from './fakeClient';
import { DEFAULT_LIMITS, FIXED_NOW, makeTempDir } from './fixtures';

export const RETRY_BACKOFF_MS = 10_000;

/** Indexer stand-in: answers every query with `results`, or throws `error` while it is set. */
export class FakeResultSource implements ResultSource {
  results: RawResult[] = [];
  error: Error | null = null;
  readonly queries: SearchQuery[] = [];

  async search(query: SearchQuery): Promise<RawResult[]> {
    this.queries.push(query);
    if (this.error) throw this.error;
    return this.results;
  }
}

export class FakeProbe implements QualityProbe {
  async detectQuality(filePath: string): Promise<AudioQuality> {
    return { format: path.extname(filePath).slice(1), bitrate: 128, channels: 2 };
  }
}

/** Writes a small .m4b into the output directory instead of running ffmpeg. */
export class FakeConverter implements FormatConverter {
  readonly inputs: string[] = [];
  error: Error | null = null;

  async convert(inputPath: string, outputDir: string): Promise<string> {
    this.inputs.push(inputPath);
    if (this.error) throw this.error;
    await fs.promises.mkdir(outputDir, { recursive: true });
    const output = path.join(outputDir, `${path.parse(inputPath).name}.m4b`);
    await fs.promises.writeFile(output, 'converted-audio');
    return output;
  }
}

export interface HarnessOptions {
  maxActiveSearches?: number;
  maxConcurrentDownloads?: number;
  removeCompleted?: boolean;
  seeding?: Partial<SeedingConfig>;
  freeSpace?: FreeSpaceProbe;
}

export interface PipelineHarness {
  db: SqliteDatabase;
  root: string;
  libraryPath: string;
  downloadPath: string;
  conversionPath: string;
  store: SqliteQueueStore;
  events: PipelineEventBus;
  updater: PipelineItemUpdater;
  queue: QueueService;
  scheduler: PipelineScheduler;
  source: FakeResultSource;
  torrents: FakeDownloadClient;
  usenet: FakeDownloadClient;
  direct: FakeDownloadClient;
  converter: FakeConverter;
  advance(ms: number): void;
  eventTypes(itemId: string): string[];
  cleanup(): void;
}

/** The whole pipeline over an in-memory database, fake backends and a temp directory tree. */
export function createHarness(options: HarnessOptions = {}): PipelineHarness {
  let now = FIXED_NOW.getTime();
  const clock = () => new Date(now);

  const root = makeTempDir();
  const libraryPath = path.join(root, 'library');
  const downloadPath = path.join(root, 'downloads');
  const conversionPath = path.join(root, 'converted');
  const seeding: SeedingConfig = { enabled: false, ratioLimit: 2, timeLimitSeconds: 72 * 3600, ...options.seeding };

  const db = openDatabase(':memory:');
  const store = new SqliteQueueStore(db, clock);
  const events = new PipelineEventBus(new PipelineEventLog(db), clock);
  const updater = new PipelineItemUpdater(store, events, {
    context: { retryLimits: { ...DEFAULT_LIMITS }, seedingEnabled: seeding.enabled },
    retryBackoffMs: RETRY_BACKOFF_MS,
    clock,
  });

  const source = new FakeResultSource();
  const search = new CandidateSearch(source, new QualityAssessor());
  const queue = new QueueService(store, updater, events, search);

  const torrents = new FakeDownloadClient('qbittorrent', ['torrent']);
  const usenet = new FakeDownloadClient('sabnzbd', ['usenet']);
  const direct = new FakeDownloadClient('direct', ['catalog']);
  const converter = new FakeConverter();

  const scheduler = new PipelineScheduler(
    {
      store,
      updater,
      search,
      clients: new ClientRegistry([torrents, usenet, direct], { baseUrl: null, allowLoopback: true }),
      importer: new ImportExecutor(new FakeProbe(), options.freeSpace ?? (async () => Number.MAX_SAFE_INTEGER)),
      converter,
      resolver: new TemplatePathResolver(libraryPath),
      clock,
    },
    {
      maxActiveSearches: options.maxActiveSearches ?? 2,
      maxConcurrentDownloads: options.maxConcurrentDownloads ?? 2,
      maxStageWorkers: 2,
      externalTimeoutMs: 5_000,
      importTimeoutMs: 5_000,
      conversionTimeoutMs: 5_000,
      handleResolveAttempts: 3,
      handleResolveDelayMs: 0,
      removeCompleted: options.removeCompleted ?? true,
      seeding,
      pathMappings: [],
      namingTemplate: '{Author}/{Series}/{Title}',
      conversionPath,
    },
  );

  return {
    db,
    root,
    libraryPath,
    downloadPath,
    conversionPath,
    store,
    events,
    updater,
    queue,
    scheduler,
    source,
    torrents,
    usenet,
    direct,
    converter,
    advance: (ms) => {
      now += ms;
    },
    eventTypes: (itemId) => events.list({ itemId, limit: 1000 }).map((event) => event.eventType),
    cleanup: () => {
      db.close();
      fs.rmSync(root, { recursive: true, force: true });
    },
  };
}
