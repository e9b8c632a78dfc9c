import logger from '../../config/logger';
import { matchesTitle, toCandidate } from '../indexers/releaseParser';
import type { RawResult, SearchQuery } from '../indexers/types';
import type { QualityAssessor, RankedCandidate } from '../quality/qualityAssessor';
import { isAcceptable } from '../quality/qualityAssessor';

export interface ResultSource {
  search(query: SearchQuery, signal?: AbortSignal): Promise<RawResult[]>;
}

export interface SearchOptions {
  /** Download references already tried for this item. */
  exclude?: readonly string[];
  signal?: AbortSignal;
}

/**
 * Indexer results to ranked candidates: drop unrelated releases and excluded
 * references, then score and order what is left.
 */
export class CandidateSearch {
  constructor(
    private readonly source: ResultSource,
    private readonly assessor: QualityAssessor,
    private readonly minConfidence = 0,
  ) {}

  async search(query: SearchQuery, options: SearchOptions = {}): Promise<RankedCandidate[]> {
    const excluded = new Set(options.exclude ?? []);
    const raw = await this.source.search(query, options.signal);

    const candidates = raw
      .filter((result) => !excluded.has(result.downloadUrl))
      .filter((result) => matchesTitle(query.title, result.title))
      .map(toCandidate);

    logger.debug(`[Search] "${query.title}": ${raw.length} results, ${candidates.length} relevant`);
    return this.assessor.rank(candidates);
  }

  /** Best candidate eligible for automatic selection, or null. */
  async best(query: SearchQuery, options: SearchOptions = {}): Promise<RankedCandidate | null> {
    const ranked = await this.search(query, options);
    return (
      ranked.find(
        ({ candidate, assessment }) => isAcceptable(candidate) && assessment.confidence >= this.minConfidence,
      ) ?? null
    );
  }
}
