import type { ClientJobStatus, DownloadClient, SubmitOptions } from '../../src/services/clients/types';
import { missingStatus } from '../../src/services/clients/types';
import type { SourceType } from '../../src/services/indexers/types';

export function jobStatus(overrides: Partial<ClientJobStatus> = {}): ClientJobStatus {
  return {
    state: 'downloading',
    progress: 0,
    downloadSpeed: 0,
    etaSeconds: null,
    ratio: null,
    seedingSeconds: null,
    contentPath: null,
    message: null,
    ...overrides,
  };
}

/** In-memory download backend. Jobs are numbered `<name>-job-<n>` in submission order. */
export class FakeDownloadClient implements DownloadClient {
  readonly submitted: Array<{ reference: string; options: SubmitOptions }> = [];
  readonly removed: Array<{ handle: string; deleteData: boolean }> = [];
  readonly paused: string[] = [];
  readonly resumed: string[] = [];
  readonly statuses = new Map<string, ClientJobStatus>();
  private readonly handlesByTag = new Map<string, string>();
  private counter = 0;

  /** Thrown from submit while set. */
  submitError: Error | null = null;
  /** Thrown from status while set. */
  statusError: Error | null = null;
  /** Thrown from remove while set. */
  removeError: Error | null = null;
  /** When false, submit reports no id and the job has to be found by tag. */
  reportsHandle = true;

  constructor(readonly name: string, readonly sourceTypes: readonly SourceType[]) {}

  async submit(reference: string, options: SubmitOptions): Promise<string | null> {
    if (this.submitError) throw this.submitError;
    this.counter++;
    const handle = `${this.name}-job-${this.counter}`;
    this.submitted.push({ reference, options });
    this.handlesByTag.set(options.tag, handle);
    this.statuses.set(handle, jobStatus());
    return this.reportsHandle ? handle : null;
  }

  async findHandle(options: SubmitOptions): Promise<string | null> {
    return this.handlesByTag.get(options.tag) ?? null;
  }

  async status(handle: string): Promise<ClientJobStatus> {
    if (this.statusError) throw this.statusError;
    return this.statuses.get(handle) ?? missingStatus('Job not found');
  }

  async pause(handle: string): Promise<void> {
    this.paused.push(handle);
  }

  async resume(handle: string): Promise<void> {
    this.resumed.push(handle);
  }

  async remove(handle: string, deleteData: boolean): Promise<void> {
    if (this.removeError) throw this.removeError;
    this.removed.push({ handle, deleteData });
    this.statuses.delete(handle);
  }

  setStatus(handle: string, overrides: Partial<ClientJobStatus>): void {
    this.statuses.set(handle, jobStatus(overrides));
  }
}
