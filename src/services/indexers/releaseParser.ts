import type { AudioFormat, Candidate, RawResult, SourceType } from './types';
import { isAudioFormat } from './types';

export interface ParsedRelease {
  cleanTitle: string;
  author: string | null;
  narrator: string | null;
  format: AudioFormat | 'unknown';
  bitrate: number;
  year: number | null;
}

const FORMAT_PATTERN = /\b(m4b|aaxc|aax|m4a|flac|mp3|opus|aac|ogg)\b/i;
const BITRATE_PATTERN = /\b(\d{2,4})\s?(?:kbps|kb\/s|kbit\/s|kbits|kbit|k)\b/i;
const NARRATOR_PATTERN = /\b(?:narrated|read)\s+by\s+([^[\](){}|,;-]+)/i;
const YEAR_PATTERN = /(?:^|[^\d])((?:19|20)\d{2})(?:[^\d]|$)/;
const BRACKETED = /[[({][^\])}]*[\])}]/g;

function normalizeFormat(value: string | null | undefined): AudioFormat | 'unknown' {
  if (!value) return 'unknown';
  const lowered = value.trim().toLowerCase().replace(/^\./, '');
  return isAudioFormat(lowered) ? lowered : 'unknown';
}

function tidy(value: string): string {
  // Scene-style names use dots or underscores as separators
  const spaced = /\s/.test(value.trim()) ? value : value.replace(/[._]+/g, ' ');
  return spaced
    .replace(/\s{2,}/g, ' ')
    .replace(/^[\s\-–:]+|[\s\-–:]+$/g, '')
    .trim();
}

export function parseFormat(text: string): AudioFormat | 'unknown' {
  const match = text.match(FORMAT_PATTERN);
  return match ? normalizeFormat(match[1]) : 'unknown';
}

/** Bitrate in kbps, 0 when none is stated. */
export function parseBitrate(text: string): number {
  const match = text.match(BITRATE_PATTERN);
  if (!match) return 0;
  const value = parseInt(match[1], 10);
  return value >= 8 && value <= 1536 ? value : 0;
}

export function parseNarrator(text: string): string | null {
  const match = text.match(NARRATOR_PATTERN);
  if (!match) return null;
  const narrator = tidy(match[1].replace(FORMAT_PATTERN, ' ').replace(BITRATE_PATTERN, ' '));
  return narrator || null;
}

export function parseYear(text: string): number | null {
  const match = text.match(YEAR_PATTERN);
  return match ? parseInt(match[1], 10) : null;
}

/**
 * Split a release name into title and author. Recognises "Title by Author"
 * and "Author - Title"; anything else is all title.
 */
export function splitTitleAuthor(text: string): { title: string; author: string | null } {
  const stripped = tidy(
    text
      .replace(BRACKETED, ' ')
      .replace(FORMAT_PATTERN, ' ')
      .replace(BITRATE_PATTERN, ' ')
      .replace(NARRATOR_PATTERN, ' ')
      .replace(/\b(?:unabridged|abridged|audiobook)\b/gi, ' '),
  );

  const byMatch = stripped.match(/^(.+?)\s+by\s+(.+)$/i);
  if (byMatch) {
    return { title: tidy(byMatch[1]), author: tidy(byMatch[2]) || null };
  }

  const dashIndex = stripped.search(/\s[-–]\s/);
  if (dashIndex > 0) {
    const author = tidy(stripped.slice(0, dashIndex));
    const title = tidy(stripped.slice(dashIndex + 3));
    if (author && title) {
      return { title, author };
    }
  }

  return { title: stripped, author: null };
}

export function parseRelease(raw: RawResult): ParsedRelease {
  const text = [raw.title, raw.description ?? ''].join(' ');
  const split = splitTitleAuthor(raw.title);

  const format = raw.format ? normalizeFormat(raw.format) : parseFormat(text);
  const bitrate = raw.bitrate !== undefined && raw.bitrate !== null && raw.bitrate > 0 ? raw.bitrate : parseBitrate(text);

  return {
    cleanTitle: split.title || raw.title.trim(),
    author: raw.author?.trim() || split.author,
    narrator: raw.narrator?.trim() || parseNarrator(text),
    format,
    bitrate,
    year: parseYear(raw.title),
  };
}

export function sourceTypeFor(raw: RawResult): SourceType {
  return raw.protocol === 'usenet' ? 'usenet' : 'torrent';
}

export function toCandidate(raw: RawResult): Candidate {
  const parsed = parseRelease(raw);
  return {
    title: raw.title.trim(),
    author: parsed.author,
    narrator: parsed.narrator,
    format: parsed.format,
    bitrate: parsed.bitrate,
    size: raw.size !== undefined && raw.size !== null && raw.size > 0 ? raw.size : null,
    seeders: raw.seeders ?? null,
    peers: raw.peers ?? null,
    sourceType: sourceTypeFor(raw),
    indexer: raw.indexer,
    downloadUrl: raw.downloadUrl,
    infoHash: raw.infoHash ?? null,
  };
}

const STOP_WORDS = new Set(['the', 'and', 'of', 'a', 'an', 'to', 'in', 'on', 'by']);

function significantWords(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter((word) => word.length > 2 && !STOP_WORDS.has(word));
}

/**
 * Loose relevance check between the wanted title and a release name: enough of
 * the wanted title's significant words must appear in the release.
 */
export function matchesTitle(wanted: string, releaseTitle: string): boolean {
  const words = significantWords(wanted);
  if (words.length === 0) {
    return releaseTitle.toLowerCase().includes(wanted.trim().toLowerCase());
  }
  const haystack = new Set(significantWords(releaseTitle));
  const matchCount = words.filter((word) => haystack.has(word)).length;
  return matchCount >= Math.min(3, Math.ceil(words.length * 0.6));
}
