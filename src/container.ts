import type { AppConfig } from './config/settings';
import type { SqliteDatabase } from './config/database';
import { PipelineEventLog } from './models/PipelineEvent';
import { SqliteQueueStore } from './models/PipelineItem';
import { createClientRegistry } from './services/clients/registry';
import { FfmpegConverter } from './services/conversion/converter';
import { PipelineEventBus } from './services/events/pipelineEvents';
import { ImportExecutor } from './services/import/importExecutor';
import { FfprobeQualityProbe } from './services/import/mediaProbe';
import { TemplatePathResolver } from './services/import/pathResolver';
import { createIndexerService } from './services/indexers/indexerService';
import { CandidateSearch } from './services/pipeline/candidateSearch';
import { PipelineItemUpdater } from './services/pipeline/itemUpdater';
import { QueueService } from './services/pipeline/queueService';
import { PipelineScheduler } from './services/pipeline/scheduler';
import { QualityAssessor, reputationFromMap } from './services/quality/qualityAssessor';
import { PipelineWorker } from './workers/PipelineWorker';

export interface Services {
  events: PipelineEventBus;
  queue: QueueService;
  scheduler: PipelineScheduler;
  worker: PipelineWorker;
}

/** Wire the pipeline from configuration. */
export function createServices(config: AppConfig, db: SqliteDatabase): Services {
  const { pipeline } = config;

  const store = new SqliteQueueStore(db);
  const events = new PipelineEventBus(new PipelineEventLog(db));
  const updater = new PipelineItemUpdater(store, events, {
    context: { retryLimits: pipeline.retryLimits, seedingEnabled: pipeline.seeding.enabled },
    retryBackoffMs: pipeline.retryBackoffMs,
  });

  const assessor = new QualityAssessor(reputationFromMap(config.reputation));
  const search = new CandidateSearch(createIndexerService(config), assessor, pipeline.minConfidence);
  const queue = new QueueService(store, updater, events, search);

  const scheduler = new PipelineScheduler(
    {
      store,
      updater,
      search,
      clients: createClientRegistry(config),
      importer: new ImportExecutor(new FfprobeQualityProbe(config.tools.ffprobe)),
      converter: new FfmpegConverter(config.tools.ffmpeg, config.tools.activationBytes, pipeline.conversionTimeoutMs),
      resolver: new TemplatePathResolver(config.libraryPath),
    },
    {
      maxActiveSearches: pipeline.maxActiveSearches,
      maxConcurrentDownloads: pipeline.maxConcurrentDownloads,
      maxStageWorkers: pipeline.maxStageWorkers,
      externalTimeoutMs: pipeline.externalTimeoutMs,
      importTimeoutMs: pipeline.importTimeoutMs,
      conversionTimeoutMs: pipeline.conversionTimeoutMs,
      handleResolveAttempts: pipeline.handleResolveAttempts,
      handleResolveDelayMs: pipeline.handleResolveDelayMs,
      removeCompleted: pipeline.removeCompleted,
      seeding: pipeline.seeding,
      pathMappings: config.pathMappings,
      namingTemplate: config.namingTemplate,
      conversionPath: config.conversionPath,
    },
  );

  const worker = new PipelineWorker(scheduler, pipeline.pollIntervalMs, {
    sweep: () => events.prune(config.events),
  });

  return { events, queue, scheduler, worker };
}
