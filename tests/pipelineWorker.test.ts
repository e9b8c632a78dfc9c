import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PipelineWorker } from '../src/workers/PipelineWorker';
import type { PipelineHarness } from './helpers/pipelineHarness';
import { createHarness } from './helpers/pipelineHarness';

describe('PipelineWorker', () => {
  let h: PipelineHarness;

  beforeEach(() => {
    h = createHarness();
  });

  afterEach(() => {
    h.cleanup();
  });

  it('clamps the interval to the allowed range', () => {
    expect(new PipelineWorker(h.scheduler, 100).intervalMs).toBe(2000);
    expect(new PipelineWorker(h.scheduler, 5000).intervalMs).toBe(5000);
  });

  it('shares a tick in flight instead of starting another', async () => {
    const tick = vi.spyOn(h.scheduler, 'tick');
    const worker = new PipelineWorker(h.scheduler, 5000);
    h.queue.enqueueWanted({ identity: 'book-1', title: 'The Glass Orchard', author: 'Mara Quill' });

    await Promise.all([worker.runTick(), worker.runTick()]);

    expect(tick).toHaveBeenCalledTimes(1);
    expect(h.queue.getByIdentity('book-1').status).toBe('FAILED');
  });

  it('logs a failing tick and keeps going', async () => {
    vi.spyOn(h.scheduler, 'tick').mockRejectedValueOnce(new Error('database is locked'));
    const worker = new PipelineWorker(h.scheduler, 5000);

    await expect(worker.runTick()).resolves.toBeUndefined();
    await expect(worker.runTick()).resolves.toBeUndefined();
  });

  it('starts once and stops cleanly', async () => {
    const worker = new PipelineWorker(h.scheduler, 5000, { initialDelayMs: 60_000 });

    worker.start();
    worker.start();
    expect(worker.running).toBe(true);

    await worker.stop();
    expect(worker.running).toBe(false);
  });

  it('prunes the event log through its sweep', () => {
    h.queue.enqueueWanted({ identity: 'book-1', title: 'The Glass Orchard', author: 'Mara Quill' });
    h.advance(31 * 24 * 3600 * 1000);
    const worker = new PipelineWorker(h.scheduler, 5000, {
      sweep: () => h.events.prune({ maxAgeMs: 30 * 24 * 3600 * 1000, maxPerItem: 500 }),
    });

    expect(worker.runSweep()).toBe(1);
    expect(h.events.list()).toEqual([]);
  });

  it('keeps running when the sweep throws', () => {
    const worker = new PipelineWorker(h.scheduler, 5000, {
      sweep: () => {
        throw new Error('database is locked');
      },
    });

    expect(worker.runSweep()).toBe(0);
  });
});
