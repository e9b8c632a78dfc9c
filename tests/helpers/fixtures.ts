import fs from 'fs';
import os from 'os';
import path from 'path';
import { blankItem } from '../../src/models/PipelineItem';
import type { PipelineItem, SelectedCandidate } from '../../src/models/PipelineItem';
import type { Candidate, RawResult } from '../../src/services/indexers/types';
import type { TransitionContext } from '../../src/services/pipeline/stateMachine';

export const FIXED_NOW = new Date('2024-03-01T12:00:00.000Z');

export const DEFAULT_LIMITS = { search: 3, download: 2, conversion: 1, import: 2 };

export function transitionContext(overrides: Partial<TransitionContext> = {}): TransitionContext {
  return { retryLimits: { ...DEFAULT_LIMITS }, seedingEnabled: false, ...overrides };
}

export function makeCandidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    title: 'Mara Quill - The Glass Orchard',
    author: 'Mara Quill',
    narrator: null,
    format: 'm4b',
    bitrate: 128,
    size: 250_000_000,
    seeders: 50,
    peers: 3,
    sourceType: 'torrent',
    indexer: 'test-indexer',
    downloadUrl: 'http://indexer.test/dl/1',
    infoHash: null,
    ...overrides,
  };
}

export function makeSelected(overrides: Partial<SelectedCandidate> = {}): SelectedCandidate {
  return {
    downloadUrl: 'http://indexer.test/dl/1',
    sourceType: 'torrent',
    title: 'Mara Quill - The Glass Orchard',
    indexer: 'test-indexer',
    format: 'm4b',
    bitrate: 128,
    size: 250_000_000,
    seeders: 50,
    confidence: 100,
    manual: false,
    ...overrides,
  };
}

export function makeItem(overrides: Partial<PipelineItem> = {}): PipelineItem {
  return {
    ...blankItem('item-1', { identity: 'book-1', title: 'The Glass Orchard', author: 'Mara Quill' }, FIXED_NOW.toISOString()),
    ...overrides,
  };
}

export function makeRawResult(overrides: Partial<RawResult> = {}): RawResult {
  return {
    title: 'Mara Quill - The Glass Orchard [M4B] 128kbps',
    downloadUrl: 'http://indexer.test/dl/1',
    indexer: 'test-indexer',
    protocol: 'torrent',
    size: 250_000_000,
    seeders: 50,
    peers: 3,
    ...overrides,
  };
}

export function makeTempDir(prefix = 'tomefetch-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFile(filePath: string, content: string): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}
