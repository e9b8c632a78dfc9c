import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

export const MIN_POLL_INTERVAL_SECONDS = 2;
export const MAX_POLL_INTERVAL_SECONDS = 30;
export const MIN_RETRY_BACKOFF_SECONDS = 10;

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const indexerSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  apiKey: z.string().default(''),
  type: z.enum(['torznab', 'newznab']).default('torznab'),
  categories: z.array(z.number().int()).default([3030]),
  enabled: z.boolean().default(true),
});

export type IndexerConfig = z.infer<typeof indexerSchema>;

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5056),
  DATA_PATH: z.string().default('./data'),
  DATABASE_FILE: z.string().default('pipeline.db'),
  LIBRARY_PATH: z.string().default('./library'),
  DOWNLOAD_PATH: z.string().default('./downloads'),
  CONVERSION_PATH: z.string().default('./converted'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  API_KEY: z.string().min(1).optional(),

  POLL_INTERVAL_SECONDS: z.coerce.number().default(5),
  MAX_ACTIVE_SEARCHES: z.coerce.number().int().min(1).default(2),
  MAX_CONCURRENT_DOWNLOADS: z.coerce.number().int().min(1).default(2),
  MAX_STAGE_WORKERS: z.coerce.number().int().min(1).default(2),
  MAX_SEARCH_RETRIES: z.coerce.number().int().min(0).default(3),
  MAX_DOWNLOAD_RETRIES: z.coerce.number().int().min(0).default(2),
  MAX_CONVERSION_RETRIES: z.coerce.number().int().min(0).default(1),
  MAX_IMPORT_RETRIES: z.coerce.number().int().min(0).default(2),
  RETRY_BACKOFF_SECONDS: z.coerce.number().default(10),
  EXTERNAL_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  IMPORT_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  CONVERSION_TIMEOUT_MS: z.coerce.number().int().positive().default(2 * 60 * 60 * 1000),
  HANDLE_RESOLVE_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  HANDLE_RESOLVE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  MIN_CONFIDENCE: z.coerce.number().min(0).max(100).default(0),

  SEEDING_ENABLED: booleanFlag.default('false'),
  SEED_RATIO_LIMIT: z.coerce.number().positive().default(2.0),
  SEED_TIME_LIMIT_HOURS: z.coerce.number().positive().default(72),
  REMOVE_COMPLETED: booleanFlag.default('true'),

  EVENT_RETENTION_DAYS: z.coerce.number().positive().default(30),
  EVENT_MAX_PER_ITEM: z.coerce.number().int().min(1).default(500),

  INDEXERS: z.string().default('[]'),
  INDEXER_REPUTATION: z.string().optional(),
  INDEXER_DOWNLOAD_BASE_URL: z.string().url().optional(),
  ALLOW_LOOPBACK_REFERENCES: booleanFlag.default('false'),

  QBITTORRENT_URL: z.string().url().optional(),
  QBITTORRENT_USERNAME: z.string().optional(),
  QBITTORRENT_PASSWORD: z.string().optional(),
  QBITTORRENT_CATEGORY: z.string().default('audiobooks'),
  SABNZBD_URL: z.string().url().optional(),
  SABNZBD_API_KEY: z.string().optional(),
  SABNZBD_CATEGORY: z.string().default('audiobooks'),
  CLIENT_PATH_MAPPINGS: z.string().optional(),

  NAMING_TEMPLATE: z.string().default('{Author}/{Series}/{Title}'),
  FFPROBE_PATH: z.string().default('ffprobe'),
  FFMPEG_PATH: z.string().default('ffmpeg'),
  CONVERSION_ACTIVATION_BYTES: z.string().optional(),
});

export interface PathMapping {
  remote: string;
  local: string;
}

export interface AppConfig {
  port: number;
  apiKey: string | null;
  logLevel: string;
  databasePath: string;
  libraryPath: string;
  downloadPath: string;
  conversionPath: string;
  pipeline: {
    pollIntervalMs: number;
    maxActiveSearches: number;
    maxConcurrentDownloads: number;
    maxStageWorkers: number;
    retryBackoffMs: number;
    externalTimeoutMs: number;
    importTimeoutMs: number;
    conversionTimeoutMs: number;
    handleResolveAttempts: number;
    handleResolveDelayMs: number;
    minConfidence: number;
    removeCompleted: boolean;
    retryLimits: RetryLimits;
    seeding: SeedingConfig;
  };
  events: EventRetention;
  indexers: IndexerConfig[];
  reputation: Record<string, number>;
  address: {
    downloadBaseUrl: string | null;
    allowLoopback: boolean;
  };
  qbittorrent: { url: string; username: string; password: string; category: string } | null;
  sabnzbd: { url: string; apiKey: string; category: string } | null;
  pathMappings: PathMapping[];
  namingTemplate: string;
  tools: {
    ffprobe: string;
    ffmpeg: string;
    activationBytes: string | null;
  };
}

export interface RetryLimits {
  search: number;
  download: number;
  conversion: number;
  import: number;
}

export interface EventRetention {
  maxAgeMs: number;
  maxPerItem: number;
}

export interface SeedingConfig {
  enabled: boolean;
  ratioLimit: number;
  timeLimitSeconds: number;
}

export function clampPollInterval(seconds: number): number {
  if (!Number.isFinite(seconds)) return MIN_POLL_INTERVAL_SECONDS;
  return Math.min(MAX_POLL_INTERVAL_SECONDS, Math.max(MIN_POLL_INTERVAL_SECONDS, seconds));
}

/** `name=score,name2=score` */
export function parseReputation(raw: string | undefined): Record<string, number> {
  const result: Record<string, number> = {};
  if (!raw) return result;
  for (const entry of raw.split(',')) {
    const [name, value] = entry.split('=').map((part) => part.trim());
    const score = Number(value);
    if (!name || value === undefined || !Number.isFinite(score)) {
      throw new ConfigurationError(`Invalid INDEXER_REPUTATION entry: "${entry}"`);
    }
    result[name.toLowerCase()] = score;
  }
  return result;
}

/** `remote=local;remote2=local2` */
export function parsePathMappings(raw: string | undefined): PathMapping[] {
  if (!raw) return [];
  return raw
    .split(';')
    .filter((entry) => entry.trim().length > 0)
    .map((entry) => {
      const separator = entry.indexOf('=');
      if (separator <= 0) {
        throw new ConfigurationError(`Invalid CLIENT_PATH_MAPPINGS entry: "${entry}"`);
      }
      return {
        remote: entry.slice(0, separator).trim(),
        local: entry.slice(separator + 1).trim(),
      };
    });
}

function parseIndexers(raw: string): IndexerConfig[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigurationError('INDEXERS must be a JSON array');
  }
  const parsed = z.array(indexerSchema).safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid INDEXERS: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  return parsed.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  let qbittorrent: AppConfig['qbittorrent'] = null;
  if (e.QBITTORRENT_URL) {
    if (!e.QBITTORRENT_USERNAME || e.QBITTORRENT_PASSWORD === undefined) {
      throw new ConfigurationError('QBITTORRENT_URL is set but QBITTORRENT_USERNAME/QBITTORRENT_PASSWORD are missing');
    }
    qbittorrent = {
      url: e.QBITTORRENT_URL.replace(/\/$/, ''),
      username: e.QBITTORRENT_USERNAME,
      password: e.QBITTORRENT_PASSWORD,
      category: e.QBITTORRENT_CATEGORY,
    };
  }

  let sabnzbd: AppConfig['sabnzbd'] = null;
  if (e.SABNZBD_URL) {
    if (!e.SABNZBD_API_KEY) {
      throw new ConfigurationError('SABNZBD_URL is set but SABNZBD_API_KEY is missing');
    }
    sabnzbd = { url: e.SABNZBD_URL.replace(/\/$/, ''), apiKey: e.SABNZBD_API_KEY, category: e.SABNZBD_CATEGORY };
  }

  return {
    port: e.PORT,
    apiKey: e.API_KEY ?? null,
    logLevel: e.LOG_LEVEL,
    databasePath: e.DATABASE_FILE === ':memory:' ? ':memory:' : path.resolve(e.DATA_PATH, e.DATABASE_FILE),
    libraryPath: path.resolve(e.LIBRARY_PATH),
    downloadPath: path.resolve(e.DOWNLOAD_PATH),
    conversionPath: path.resolve(e.CONVERSION_PATH),
    pipeline: {
      pollIntervalMs: clampPollInterval(e.POLL_INTERVAL_SECONDS) * 1000,
      maxActiveSearches: e.MAX_ACTIVE_SEARCHES,
      maxConcurrentDownloads: e.MAX_CONCURRENT_DOWNLOADS,
      maxStageWorkers: e.MAX_STAGE_WORKERS,
      retryBackoffMs: Math.max(MIN_RETRY_BACKOFF_SECONDS, e.RETRY_BACKOFF_SECONDS) * 1000,
      externalTimeoutMs: e.EXTERNAL_TIMEOUT_MS,
      importTimeoutMs: e.IMPORT_TIMEOUT_MS,
      conversionTimeoutMs: e.CONVERSION_TIMEOUT_MS,
      handleResolveAttempts: e.HANDLE_RESOLVE_ATTEMPTS,
      handleResolveDelayMs: e.HANDLE_RESOLVE_DELAY_MS,
      minConfidence: e.MIN_CONFIDENCE,
      removeCompleted: e.REMOVE_COMPLETED,
      retryLimits: {
        search: e.MAX_SEARCH_RETRIES,
        download: e.MAX_DOWNLOAD_RETRIES,
        conversion: e.MAX_CONVERSION_RETRIES,
        import: e.MAX_IMPORT_RETRIES,
      },
      seeding: {
        enabled: e.SEEDING_ENABLED,
        ratioLimit: e.SEED_RATIO_LIMIT,
        timeLimitSeconds: e.SEED_TIME_LIMIT_HOURS * 3600,
      },
    },
    events: {
      maxAgeMs: e.EVENT_RETENTION_DAYS * 24 * 3600 * 1000,
      maxPerItem: e.EVENT_MAX_PER_ITEM,
    },
    indexers: parseIndexers(e.INDEXERS),
    reputation: parseReputation(e.INDEXER_REPUTATION),
    address: {
      downloadBaseUrl: e.INDEXER_DOWNLOAD_BASE_URL ?? null,
      allowLoopback: e.ALLOW_LOOPBACK_REFERENCES,
    },
    qbittorrent,
    sabnzbd,
    pathMappings: parsePathMappings(e.CLIENT_PATH_MAPPINGS),
    namingTemplate: e.NAMING_TEMPLATE,
    tools: {
      ffprobe: e.FFPROBE_PATH,
      ffmpeg: e.FFMPEG_PATH,
      activationBytes: e.CONVERSION_ACTIVATION_BYTES ?? null,
    },
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

export function reloadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  cached = loadConfig(env);
  return cached;
}
