import logger from '../../config/logger';
import type { AppConfig } from '../../config/settings';
import { TransientError, ValidationError, errorMessage } from '../../utils/errors';
import { createHttpClient } from '../../utils/http';
import { withTimeout } from '../pipeline/concurrency';
import { TorznabIndexer } from './torznabIndexer';
import type { Indexer, RawResult, SearchQuery } from './types';

/**
 * Fans a query out to every configured indexer and merges what comes back.
 * A failing indexer is logged and skipped; the search only fails when all do.
 */
export class IndexerService {
  constructor(private readonly indexers: Indexer[], private readonly timeoutMs: number) {}

  get size(): number {
    return this.indexers.length;
  }

  async search(query: SearchQuery, signal?: AbortSignal): Promise<RawResult[]> {
    if (this.indexers.length === 0) {
      throw new ValidationError('No indexers configured');
    }

    const settled = await Promise.allSettled(
      this.indexers.map((indexer) =>
        withTimeout(`Search on ${indexer.name}`, this.timeoutMs, (s) => indexer.search(query, s), signal),
      ),
    );

    const merged: RawResult[] = [];
    const seen = new Set<string>();
    const failures: string[] = [];

    settled.forEach((outcome, index) => {
      const name = this.indexers[index].name;
      if (outcome.status === 'rejected') {
        failures.push(`${name}: ${errorMessage(outcome.reason)}`);
        logger.warn(`[Search] ${name} failed: ${errorMessage(outcome.reason)}`);
        return;
      }
      logger.debug(`[Search] ${name} returned ${outcome.value.length} results`);
      for (const result of outcome.value) {
        const key = result.infoHash?.toLowerCase() || result.guid || result.downloadUrl;
        if (seen.has(key)) continue;
        seen.add(key);
        merged.push(result);
      }
    });

    if (failures.length === this.indexers.length) {
      throw new TransientError(`All indexers failed: ${failures.join('; ')}`);
    }

    return merged;
  }
}

export function createIndexerService(config: AppConfig): IndexerService {
  const indexers = config.indexers
    .filter((indexer) => indexer.enabled)
    .map((indexer) => new TorznabIndexer(indexer, createHttpClient(undefined, config.pipeline.externalTimeoutMs)));
  return new IndexerService(indexers, config.pipeline.externalTimeoutMs);
}
