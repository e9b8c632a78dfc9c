import { describe, expect, it } from 'vitest';
import {
  matchesTitle,
  parseBitrate,
  parseFormat,
  parseNarrator,
  parseRelease,
  parseYear,
  splitTitleAuthor,
  toCandidate,
} from '../src/services/indexers/releaseParser';
import { makeRawResult } from './helpers/fixtures';

describe('releaseParser', () => {
  it('splits "Author - Title" names and drops tags', () => {
    expect(splitTitleAuthor('Mara Quill - The Glass Orchard [M4B] 64kbps')).toEqual({
      title: 'The Glass Orchard',
      author: 'Mara Quill',
    });
  });

  it('splits "Title by Author" names', () => {
    expect(splitTitleAuthor('The Glass Orchard by Mara Quill (Unabridged) m4b')).toEqual({
      title: 'The Glass Orchard',
      author: 'Mara Quill',
    });
  });

  it('treats an unrecognised name as all title', () => {
    expect(splitTitleAuthor('The Glass Orchard')).toEqual({ title: 'The Glass Orchard', author: null });
  });

  it('reads format, bitrate and year from scene-style names', () => {
    const name = 'Mara.Quill-The.Glass.Orchard.2019.MP3.128kbps';
    expect(parseFormat(name)).toBe('mp3');
    expect(parseBitrate(name)).toBe(128);
    expect(parseYear(name)).toBe(2019);
  });

  it('ignores implausible bitrates', () => {
    expect(parseBitrate('Some Book 2000kbps')).toBe(0);
    expect(parseBitrate('Some Book')).toBe(0);
  });

  it('extracts the narrator up to the next tag', () => {
    expect(parseNarrator('The Glass Orchard, narrated by Ellis Grant [m4b]')).toBe('Ellis Grant');
    expect(parseNarrator('The Glass Orchard')).toBeNull();
  });

  it('prefers fields the indexer reported over parsed ones', () => {
    const parsed = parseRelease(
      makeRawResult({ title: 'Mara Quill - The Glass Orchard [MP3]', format: 'M4B', bitrate: 256, author: 'M. Quill' }),
    );
    expect(parsed).toEqual({
      cleanTitle: 'The Glass Orchard',
      author: 'M. Quill',
      narrator: null,
      format: 'm4b',
      bitrate: 256,
      year: null,
    });
  });

  it('builds a usenet candidate without a size when the indexer reports zero', () => {
    const candidate = toCandidate(
      makeRawResult({ protocol: 'usenet', size: 0, seeders: null, downloadUrl: 'http://indexer.test/get/5.nzb' }),
    );
    expect(candidate).toMatchObject({
      sourceType: 'usenet',
      size: null,
      seeders: null,
      format: 'm4b',
      bitrate: 128,
      author: 'Mara Quill',
      downloadUrl: 'http://indexer.test/get/5.nzb',
    });
  });

  it('matches releases that carry most of the wanted title', () => {
    expect(matchesTitle('The Glass Orchard', 'Mara Quill - The Glass Orchard [m4b]')).toBe(true);
    expect(matchesTitle('The Glass Orchard', 'Mara Quill - Silver Rivers')).toBe(false);
  });
});
