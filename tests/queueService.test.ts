import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { listQuerySchema } from '../src/services/pipeline/queueService';
import type { ManualInput } from '../src/services/pipeline/queueService';
import { ConflictError, NotFoundError, TransitionRejectedError, ValidationError } from '../src/utils/errors';
import { makeRawResult } from './helpers/fixtures';
import type { PipelineHarness } from './helpers/pipelineHarness';
import { createHarness } from './helpers/pipelineHarness';

const WANTED = { identity: 'book-1', title: 'The Glass Orchard', author: 'Mara Quill' };

function manualTorrent(overrides: Partial<ManualInput> = {}): ManualInput {
  return {
    ...WANTED,
    candidate: { downloadUrl: 'magnet:?xt=urn:btih:0123456789abcdef0123456789abcdef01234567', sourceType: 'torrent' },
    ...overrides,
  };
}

describe('QueueService', () => {
  let h: PipelineHarness;

  beforeEach(() => {
    h = createHarness();
  });

  afterEach(() => {
    h.cleanup();
  });

  describe('enqueueWanted', () => {
    it('is idempotent by identity', () => {
      const first = h.queue.enqueueWanted(WANTED);
      const second = h.queue.enqueueWanted({ ...WANTED, title: 'Different Title' });

      expect(first.created).toBe(true);
      expect(first.item.status).toBe('QUEUED');
      expect(second.created).toBe(false);
      expect(second.item.id).toBe(first.item.id);
      expect(second.item.title).toBe('The Glass Orchard');
      expect(h.eventTypes(first.item.id)).toEqual(['enqueued']);
    });

    it('accepts a numeric series position', () => {
      const { item } = h.queue.enqueueWanted({ ...WANTED, series: 'Orchard Cycle', seriesPosition: 2, year: 2019 });
      expect(item.seriesPosition).toBe('2');
      expect(item.year).toBe(2019);
    });

    it('rejects blank fields', () => {
      expect(() => h.queue.enqueueWanted({ ...WANTED, title: '   ' })).toThrow(ValidationError);
      expect(() => h.queue.enqueueWanted({ ...WANTED, identity: '' })).toThrow(ValidationError);
    });
  });

  describe('enqueueManual', () => {
    it('enters at FOUND with the operator candidate', () => {
      const item = h.queue.enqueueManual(manualTorrent());

      expect(item.status).toBe('FOUND');
      expect(item.candidate).toMatchObject({
        sourceType: 'torrent',
        title: 'The Glass Orchard',
        manual: true,
        confidence: null,
      });
      expect(h.eventTypes(item.id)).toEqual(['enqueued', 'skip_search']);
    });

    it('conflicts with an active item for the same identity', () => {
      const { item } = h.queue.enqueueWanted(WANTED);

      let error: unknown;
      try {
        h.queue.enqueueManual(manualTorrent());
      } catch (caught) {
        error = caught;
      }
      expect(error).toBeInstanceOf(ConflictError);
      expect(error).toMatchObject({ existingId: item.id });
    });

    it('requires a download reference', () => {
      expect(() =>
        h.queue.enqueueManual(manualTorrent({ candidate: { downloadUrl: '', sourceType: 'torrent' } })),
      ).toThrow(ValidationError);
    });
  });

  describe('controls', () => {
    it('rejects a pause for an item that is not downloading', () => {
      const { item } = h.queue.enqueueWanted(WANTED);

      expect(() => h.queue.pause(item.id)).toThrow(TransitionRejectedError);
      expect(h.queue.get(item.id).pendingControl).toBeNull();
    });

    it('records a cancel and applies it on the next tick', async () => {
      const { item } = h.queue.enqueueWanted(WANTED);

      const pending = h.queue.cancel(item.id);
      expect(pending.status).toBe('QUEUED');
      expect(pending.pendingControl).toBe('cancel');
      expect(h.queue.cancel(item.id).version).toBe(pending.version);

      await h.scheduler.tick();

      const cancelled = h.queue.get(item.id);
      expect(cancelled.status).toBe('CANCELLED');
      expect(cancelled.pendingControl).toBeNull();
      expect(h.source.queries).toEqual([]);
      expect(h.eventTypes(item.id)).toEqual(['enqueued', 'operator_cancel', 'operator_cancel']);
    });

    it('pauses and resumes a running download through the client', async () => {
      const item = h.queue.enqueueManual(manualTorrent());
      await h.scheduler.tick();

      h.queue.pause(item.id);
      await h.scheduler.tick();
      expect(h.queue.get(item.id).status).toBe('PAUSED');
      expect(h.torrents.paused).toEqual(['qbittorrent-job-1']);

      h.queue.resume(item.id);
      await h.scheduler.tick();
      expect(h.queue.get(item.id).status).toBe('DOWNLOADING');
      expect(h.torrents.resumed).toEqual(['qbittorrent-job-1']);
    });

    it('lets a cancel override a pending pause but not the reverse', async () => {
      const item = h.queue.enqueueManual(manualTorrent());
      await h.scheduler.tick();

      h.queue.pause(item.id);
      expect(h.queue.cancel(item.id).pendingControl).toBe('cancel');
      expect(() => h.queue.pause(item.id)).toThrow('is already being cancelled');
    });
  });

  describe('retry and requeue', () => {
    it('retries a failed item from scratch', async () => {
      const { item } = h.queue.enqueueWanted(WANTED);
      await h.scheduler.tick();
      const failed = h.queue.get(item.id);
      expect(failed.status).toBe('FAILED');
      expect(failed.lastError).toBe('No acceptable candidate found');

      const retried = h.queue.retry(item.id);

      expect(retried.status).toBe('QUEUED');
      expect(retried.lastError).toBeNull();
      expect(retried.completedAt).toBeNull();
      expect(retried.retries).toEqual({ search: 0, download: 0, conversion: 0, import: 0 });
    });

    it('refuses to retry an item that has not stopped', () => {
      const { item } = h.queue.enqueueWanted(WANTED);
      expect(() => h.queue.retry(item.id)).toThrow(TransitionRejectedError);
    });

    it('requeues a stopped item immediately', async () => {
      const { item } = h.queue.enqueueWanted(WANTED);
      await h.scheduler.tick();

      expect(h.queue.forceRequeue(item.id).status).toBe('QUEUED');
    });

    it('requeues an active download on the next tick and keeps a manual candidate', async () => {
      const item = h.queue.enqueueManual(manualTorrent());
      await h.scheduler.tick();

      expect(h.queue.forceRequeue(item.id).pendingControl).toBe('requeue');
      await h.scheduler.tick();

      // Removed from the client, then resubmitted within the same tick
      expect(h.torrents.removed).toEqual([{ handle: 'qbittorrent-job-1', deleteData: true }]);
      const requeued = h.queue.get(item.id);
      expect(requeued.status).toBe('DOWNLOADING');
      expect(requeued.clientHandle).toBe('qbittorrent-job-2');
      expect(requeued.candidate?.manual).toBe(true);
      expect(h.eventTypes(item.id)).toContain('operator_requeue');
    });

    it('removes the client job of an errored item before retrying it', async () => {
      const item = h.queue.enqueueManual(manualTorrent());
      await h.scheduler.tick();
      h.updater.apply(h.queue.get(item.id), 'internal_error', { lastError: 'boom' });

      const pending = h.queue.retry(item.id);
      expect(pending.status).toBe('ERROR');
      expect(pending.pendingControl).toBe('requeue');
      expect(h.torrents.removed).toEqual([]);

      await h.scheduler.tick();

      expect(h.torrents.removed).toEqual([{ handle: 'qbittorrent-job-1', deleteData: true }]);
      const retried = h.queue.get(item.id);
      expect(retried.status).toBe('DOWNLOADING');
      expect(retried.clientHandle).toBe('qbittorrent-job-2');
      expect(retried.lastError).toBeNull();
    });

    it('defers a forced requeue of an errored item that still has a client job', async () => {
      const item = h.queue.enqueueManual(manualTorrent());
      await h.scheduler.tick();
      h.updater.apply(h.queue.get(item.id), 'internal_error', { lastError: 'boom' });

      expect(h.queue.forceRequeue(item.id).pendingControl).toBe('requeue');
      await h.scheduler.tick();

      expect(h.torrents.removed).toEqual([{ handle: 'qbittorrent-job-1', deleteData: true }]);
      expect(h.queue.get(item.id).clientHandle).toBe('qbittorrent-job-2');
    });

    it('refuses a deferred retry while another item holds the identity', async () => {
      const item = h.queue.enqueueManual(manualTorrent());
      await h.scheduler.tick();
      h.torrents.removeError = new Error('client unreachable');
      h.queue.cancel(item.id);
      await h.scheduler.tick();
      expect(h.queue.get(item.id).clientHandle).toBe('qbittorrent-job-1');

      const { item: replacement } = h.queue.enqueueWanted(WANTED);

      expect(() => h.queue.retry(item.id)).toThrow(ConflictError);
      expect(h.queue.get(item.id).pendingControl).toBeNull();
      expect(h.queue.getByIdentity('book-1').id).toBe(replacement.id);
    });
  });

  describe('queries', () => {
    it('looks items up by id and identity', () => {
      const { item } = h.queue.enqueueWanted(WANTED);

      expect(h.queue.getByIdentity('book-1').id).toBe(item.id);
      expect(() => h.queue.get('missing-id')).toThrow(NotFoundError);
      expect(() => h.queue.getByIdentity('book-404')).toThrow(NotFoundError);
    });

    it('lists and counts by status', () => {
      h.queue.enqueueWanted(WANTED);
      h.queue.enqueueManual(manualTorrent({ identity: 'book-2' }));

      expect(h.queue.list({ status: 'FOUND' })).toHaveLength(1);
      expect(h.queue.countsByStatus()).toMatchObject({ QUEUED: 1, FOUND: 1, DOWNLOADING: 0 });
    });

    it('parses list filters from query strings', () => {
      expect(listQuerySchema.parse({ status: 'failed, queued', limit: '10' })).toEqual({
        status: ['FAILED', 'QUEUED'],
        limit: 10,
        offset: 0,
      });
      expect(listQuerySchema.safeParse({ status: 'LOST' }).success).toBe(false);
    });

    it('runs an interactive search without touching the queue', async () => {
      h.source.results = [makeRawResult()];

      const ranked = await h.queue.interactiveSearch({ title: 'The Glass Orchard', author: 'Mara Quill' });

      expect(ranked).toHaveLength(1);
      expect(ranked[0].candidate).toMatchObject({ format: 'm4b', bitrate: 128, downloadUrl: 'http://indexer.test/dl/1' });
      expect(h.queue.list()).toEqual([]);
      await expect(h.queue.interactiveSearch({ title: ' ' })).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
