import logger from '../../config/logger';
import type { AppConfig } from '../../config/settings';
import { ConfigurationError, ValidationError } from '../../utils/errors';
import { createHttpClient } from '../../utils/http';
import type { SourceType } from '../indexers/types';
import type { RewriteOptions } from './addressRewrite';
import { rewriteLoopbackReference } from './addressRewrite';
import { DirectDownloadClient } from './direct';
import { QBittorrentClient } from './qbittorrent';
import { SABnzbdClient } from './sabnzbd';
import type { DownloadClient, SubmitOptions } from './types';

const CAPABILITIES = ['submit', 'findHandle', 'status', 'pause', 'resume', 'remove'] as const;

/**
 * Holds the configured download backends. Routes by source type for new
 * submissions and by name for existing jobs, and rewrites unreachable loopback
 * references before anything is submitted.
 */
export class ClientRegistry {
  private readonly byName = new Map<string, DownloadClient>();
  private readonly bySource = new Map<SourceType, DownloadClient>();

  constructor(clients: DownloadClient[], private readonly rewrite: RewriteOptions) {
    for (const client of clients) {
      const missing = CAPABILITIES.filter((capability) => typeof client[capability] !== 'function');
      if (missing.length > 0) {
        throw new ConfigurationError(`Download client ${client.name} does not implement ${missing.join(', ')}`);
      }
      if (this.byName.has(client.name)) {
        throw new ConfigurationError(`Download client ${client.name} is registered twice`);
      }
      this.byName.set(client.name, client);
      for (const sourceType of client.sourceTypes) {
        if (!this.bySource.has(sourceType)) {
          this.bySource.set(sourceType, client);
        }
      }
    }
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  supports(sourceType: SourceType): boolean {
    return this.bySource.has(sourceType);
  }

  forSource(sourceType: SourceType): DownloadClient {
    const client = this.bySource.get(sourceType);
    if (!client) {
      throw new ValidationError(`No download client configured for ${sourceType} sources`);
    }
    return client;
  }

  byClientName(name: string): DownloadClient | null {
    return this.byName.get(name) ?? null;
  }

  /** Submit through the loopback rewrite. Returns the client used and its job id, if it reported one. */
  async submit(
    sourceType: SourceType,
    reference: string,
    options: SubmitOptions,
    signal?: AbortSignal,
  ): Promise<{ client: DownloadClient; handle: string | null }> {
    const client = this.forSource(sourceType);
    const target = rewriteLoopbackReference(reference, this.rewrite);
    const handle = await client.submit(target, options, signal);
    return { client, handle };
  }
}

export function createClientRegistry(config: AppConfig): ClientRegistry {
  const timeout = config.pipeline.externalTimeoutMs;
  const clients: DownloadClient[] = [];

  if (config.qbittorrent) {
    clients.push(new QBittorrentClient(config.qbittorrent, createHttpClient(undefined, timeout)));
  }
  if (config.sabnzbd) {
    clients.push(new SABnzbdClient(config.sabnzbd, createHttpClient(undefined, timeout)));
  }
  clients.push(new DirectDownloadClient(config.downloadPath, createHttpClient(undefined, timeout)));

  const registry = new ClientRegistry(clients, {
    baseUrl: config.address.downloadBaseUrl,
    allowLoopback: config.address.allowLoopback,
  });
  logger.info(`[Clients] Registered: ${registry.names().join(', ')}`);
  return registry;
}
