export type SourceType = 'catalog' | 'torrent' | 'usenet';

export const SOURCE_TYPES: readonly SourceType[] = ['catalog', 'torrent', 'usenet'];

export const AUDIO_FORMATS = ['m4b', 'aax', 'aaxc', 'm4a', 'flac', 'mp3', 'opus', 'aac', 'ogg'] as const;

export type AudioFormat = (typeof AUDIO_FORMATS)[number];

export function isAudioFormat(value: string): value is AudioFormat {
  return AUDIO_FORMATS.some((format) => format === value);
}

/** One item as an indexer returned it, before any interpretation. */
export interface RawResult {
  title: string;
  downloadUrl: string;
  indexer: string;
  protocol: 'torrent' | 'usenet';
  guid?: string;
  size?: number | null;
  seeders?: number | null;
  peers?: number | null;
  infoHash?: string | null;
  publishDate?: string | null;
  description?: string | null;
  format?: string | null;
  bitrate?: number | null;
  author?: string | null;
  narrator?: string | null;
}

/** A discovered download source. Never persisted unless chosen. */
export interface Candidate {
  title: string;
  author: string | null;
  narrator: string | null;
  format: AudioFormat | 'unknown';
  bitrate: number;
  size: number | null;
  seeders: number | null;
  peers: number | null;
  sourceType: SourceType;
  indexer: string;
  downloadUrl: string;
  infoHash: string | null;
}

export interface SearchQuery {
  title: string;
  author?: string | null;
  narrator?: string | null;
}

export interface Indexer {
  readonly name: string;
  search(query: SearchQuery, signal?: AbortSignal): Promise<RawResult[]>;
}
