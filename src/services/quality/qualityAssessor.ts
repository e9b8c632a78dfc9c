import type { AudioFormat, Candidate } from '../indexers/types';

export type QualityRating = 'Excellent' | 'Good' | 'Fair' | 'Poor';

export interface ComponentScores {
  format: number;
  bitrate: number;
  source: number;
  metadata: number;
  availability: number;
}

export interface QualityAssessment {
  components: ComponentScores;
  totalScore: number;
  confidence: number;
  rating: QualityRating;
  bonuses: string[];
  penalties: string[];
}

export interface RankedCandidate {
  candidate: Candidate;
  assessment: QualityAssessment;
}

/** Reputation of an indexer on a 0-10 scale, or undefined when unknown. */
export type ReputationProvider = (indexer: string) => number | undefined;

export const DEFAULT_SOURCE_REPUTATION = 7.0;

export const WEIGHTS: ComponentScores = {
  format: 0.3,
  bitrate: 0.25,
  source: 0.2,
  metadata: 0.15,
  availability: 0.1,
};

const FORMAT_SCORES: Record<AudioFormat | 'unknown', number> = {
  m4b: 10,
  aax: 9,
  aaxc: 9,
  m4a: 8,
  flac: 7,
  mp3: 6,
  opus: 6,
  aac: 5,
  ogg: 4,
  unknown: 1,
};

const BEST_FORMAT: AudioFormat = 'm4b';

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function knownBitrate(bitrate: number): boolean {
  return Number.isFinite(bitrate) && bitrate > 0;
}

function isPeerToPeer(candidate: Candidate): boolean {
  return candidate.sourceType === 'torrent';
}

function seedersOf(candidate: Candidate): number {
  const seeders = candidate.seeders ?? 0;
  return Number.isFinite(seeders) ? seeders : 0;
}

export function scoreFormat(format: Candidate['format']): number {
  return FORMAT_SCORES[format] ?? FORMAT_SCORES.unknown;
}

export function scoreBitrate(bitrate: number): number {
  if (Number.isNaN(bitrate) || bitrate <= 0) return 0;
  if (bitrate >= 320) return 10;
  if (bitrate >= 128) return 8 + (2 * (bitrate - 128)) / 192;
  if (bitrate >= 96) return 6 + (2 * (bitrate - 96)) / 32;
  if (bitrate >= 64) return 3 + (3 * (bitrate - 64)) / 32;
  return 1;
}

export function scoreMetadata(candidate: Candidate): number {
  let score = 0;
  if (candidate.title.trim()) score += 4;
  if (candidate.author?.trim()) score += 4;
  if (candidate.size !== null && candidate.size > 0) score += 2;
  return Math.min(10, score);
}

export function scoreAvailability(candidate: Candidate): number {
  if (!isPeerToPeer(candidate)) return 10;
  const seeders = seedersOf(candidate);
  if (seeders >= 50) return 10;
  if (seeders >= 10) return 8;
  if (seeders >= 5) return 6;
  if (seeders >= 2) return 4;
  if (seeders >= 1) return 2;
  return 0;
}

export function ratingFor(confidence: number): QualityRating {
  if (confidence >= 90) return 'Excellent';
  if (confidence >= 75) return 'Good';
  if (confidence >= 50) return 'Fair';
  return 'Poor';
}

/** Minimum bar for automatic selection, checked before ranking. */
export function isAcceptable(candidate: Candidate): boolean {
  if (!candidate.title.trim()) return false;
  if (candidate.format === 'unknown') return false;
  return !knownBitrate(candidate.bitrate) || candidate.bitrate >= 64;
}

export class QualityAssessor {
  constructor(private readonly reputation: ReputationProvider = () => undefined) {}

  private scoreSource(indexer: string): number {
    const value = this.reputation(indexer);
    if (value === undefined || !Number.isFinite(value)) return DEFAULT_SOURCE_REPUTATION;
    return clamp(value, 0, 10);
  }

  assess(candidate: Candidate): QualityAssessment {
    const components: ComponentScores = {
      format: scoreFormat(candidate.format),
      bitrate: scoreBitrate(candidate.bitrate),
      source: this.scoreSource(candidate.indexer),
      metadata: scoreMetadata(candidate),
      availability: scoreAvailability(candidate),
    };

    const totalScore = round2(
      clamp(
        components.format * WEIGHTS.format +
          components.bitrate * WEIGHTS.bitrate +
          components.source * WEIGHTS.source +
          components.metadata * WEIGHTS.metadata +
          components.availability * WEIGHTS.availability,
        0,
        10,
      ),
    );

    const penalties: string[] = [];
    const bonuses: string[] = [];
    let adjustment = 0;

    const penalize = (points: number, reason: string) => {
      adjustment -= points;
      penalties.push(`${reason} (-${points})`);
    };
    const reward = (points: number, reason: string) => {
      adjustment += points;
      bonuses.push(`${reason} (+${points})`);
    };

    if (components.availability === 0) {
      penalize(20, 'No availability');
    } else if (isPeerToPeer(candidate) && seedersOf(candidate) <= 2) {
      penalize(10, 'Very low availability');
    }

    if (candidate.format === 'unknown') {
      penalize(15, 'Unknown format');
    }

    if (!knownBitrate(candidate.bitrate)) {
      penalize(10, 'Unknown bitrate');
    } else if (candidate.bitrate < 64) {
      penalize(10, 'Very low bitrate');
    } else if (candidate.bitrate < 96) {
      penalize(5, 'Low bitrate');
    }

    const missingFields = [
      !candidate.title.trim(),
      !candidate.author?.trim(),
      candidate.size === null || candidate.size <= 0,
    ].filter(Boolean).length;
    if (missingFields > 0) {
      penalize(5 * missingFields, `Missing ${missingFields} metadata field${missingFields > 1 ? 's' : ''}`);
    }

    if (components.availability === 10) {
      reward(5, 'Excellent availability');
    }
    if (candidate.format === BEST_FORMAT) {
      reward(5, 'Preferred format');
    }
    if (knownBitrate(candidate.bitrate) && candidate.bitrate >= 256) {
      reward(3, 'High bitrate');
    }
    if (missingFields === 0) {
      reward(2, 'Complete metadata');
    }

    const confidence = round2(clamp(totalScore * 10 + adjustment, 0, 100));

    return {
      components,
      totalScore,
      confidence,
      rating: ratingFor(confidence),
      bonuses,
      penalties,
    };
  }

  /**
   * Score and order candidates: confidence, then total score, then
   * availability, all descending. Equal candidates keep their input order.
   */
  rank(candidates: Candidate[]): RankedCandidate[] {
    return candidates
      .map((candidate, index) => ({ candidate, assessment: this.assess(candidate), index }))
      .sort(
        (a, b) =>
          b.assessment.confidence - a.assessment.confidence ||
          b.assessment.totalScore - a.assessment.totalScore ||
          b.assessment.components.availability - a.assessment.components.availability ||
          a.index - b.index,
      )
      .map(({ candidate, assessment }) => ({ candidate, assessment }));
  }
}

export function reputationFromMap(scores: Record<string, number>): ReputationProvider {
  return (indexer) => scores[indexer.toLowerCase()];
}
