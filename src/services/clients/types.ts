import type { SourceType } from '../indexers/types';

export type ClientJobState = 'queued' | 'downloading' | 'paused' | 'completed' | 'seeding' | 'error' | 'missing';

export interface ClientJobStatus {
  state: ClientJobState;
  /** 0-100 */
  progress: number;
  /** bytes per second */
  downloadSpeed: number;
  etaSeconds: number | null;
  ratio: number | null;
  /** Time spent seeding, in seconds, for clients that report it. */
  seedingSeconds: number | null;
  /** Where the client put the payload, in the client's own path space. */
  contentPath: string | null;
  message: string | null;
}

export interface SubmitOptions {
  /** Display name for the job, usually the release title. */
  name: string;
  /** Unique per pipeline item; used to find the job again when submit returns no id. */
  tag: string;
  category?: string;
  savePath?: string;
}

/**
 * Capability surface every download backend implements. Callers never branch on
 * the concrete backend; the registry picks one by source type.
 */
export interface DownloadClient {
  readonly name: string;
  readonly sourceTypes: readonly SourceType[];

  /** Hand a reference to the client. Resolves to the native job id, or null when the client did not report one. */
  submit(reference: string, options: SubmitOptions, signal?: AbortSignal): Promise<string | null>;
  /** Look the job up by tag, name or category after a submit that returned no id. */
  findHandle(options: SubmitOptions, signal?: AbortSignal): Promise<string | null>;
  status(handle: string, signal?: AbortSignal): Promise<ClientJobStatus>;
  pause(handle: string, signal?: AbortSignal): Promise<void>;
  resume(handle: string, signal?: AbortSignal): Promise<void>;
  remove(handle: string, deleteData: boolean, signal?: AbortSignal): Promise<void>;
}

export function missingStatus(message: string): ClientJobStatus {
  return {
    state: 'missing',
    progress: 0,
    downloadSpeed: 0,
    etaSeconds: null,
    ratio: null,
    seedingSeconds: null,
    contentPath: null,
    message,
  };
}
