import type { RetryLimits } from '../../config/settings';
import type { PipelineItem, PipelineStatus, RetryCounters, RetryStage } from '../../models/PipelineItem';
import { PIPELINE_STATUSES, isTerminal } from '../../models/PipelineItem';

export const PIPELINE_EVENTS = [
  'submit_for_search',
  'skip_search',
  'candidate_found',
  'no_candidate',
  'search_transient_error',
  'client_accepted',
  'client_rejected',
  'progress_100',
  'pause_requested',
  'resume_requested',
  'client_error',
  'needs_conversion',
  'no_conversion_needed',
  'conversion_succeeded',
  'conversion_failed',
  'begin_import',
  'import_succeeded',
  'import_failed',
  'start_seeding',
  'seeding_goal_met',
  'fatal_error',
  'internal_error',
  'operator_cancel',
  'operator_retry',
  'operator_requeue',
] as const;

export type PipelineEvent = (typeof PIPELINE_EVENTS)[number];

export interface TransitionContext {
  retryLimits: RetryLimits;
  seedingEnabled: boolean;
}

export type TransitionResult =
  | {
      ok: true;
      event: PipelineEvent;
      from: PipelineStatus;
      to: PipelineStatus;
      retries: RetryCounters;
      /** The stage budget ran out and the item was failed instead of retried. */
      exhausted: boolean;
    }
  | {
      ok: false;
      event: PipelineEvent;
      from: PipelineStatus;
      reason: string;
    };

type Guard = (item: PipelineItem, context: TransitionContext) => string | null;

interface TransitionRule {
  from: readonly PipelineStatus[];
  to: PipelineStatus;
  /** Stage whose counter the edge consumes; exceeding its limit sends the item to FAILED. */
  retryStage?: RetryStage;
  resetCounters?: boolean;
  guard?: Guard;
}

const NON_TERMINAL: readonly PipelineStatus[] = PIPELINE_STATUSES.filter((status) => !isTerminal(status));

const ZERO_COUNTERS: RetryCounters = { search: 0, download: 0, conversion: 0, import: 0 };

const TRANSITIONS: Record<PipelineEvent, TransitionRule> = {
  submit_for_search: {
    from: ['QUEUED'],
    to: 'SEARCHING',
    guard: (item) => (item.candidate ? 'item already carries a selected candidate' : null),
  },
  skip_search: {
    from: ['QUEUED'],
    to: 'FOUND',
    guard: (item) => (item.candidate ? null : 'no pre-selected candidate'),
  },
  candidate_found: {
    from: ['SEARCHING'],
    to: 'FOUND',
    guard: (item) => (item.candidate ? null : 'candidate must be recorded before leaving SEARCHING'),
  },
  no_candidate: { from: ['SEARCHING'], to: 'FAILED' },
  search_transient_error: { from: ['SEARCHING'], to: 'QUEUED', retryStage: 'search' },
  client_accepted: {
    from: ['FOUND'],
    to: 'DOWNLOADING',
    guard: (item) => (item.clientHandle ? null : 'client handle must be recorded on admission'),
  },
  client_rejected: { from: ['FOUND'], to: 'QUEUED', retryStage: 'download' },
  progress_100: { from: ['DOWNLOADING'], to: 'DOWNLOAD_COMPLETE' },
  pause_requested: { from: ['DOWNLOADING'], to: 'PAUSED' },
  resume_requested: { from: ['PAUSED'], to: 'DOWNLOADING' },
  client_error: { from: ['DOWNLOADING'], to: 'QUEUED', retryStage: 'download' },
  needs_conversion: { from: ['DOWNLOAD_COMPLETE'], to: 'CONVERTING' },
  no_conversion_needed: { from: ['DOWNLOAD_COMPLETE'], to: 'IMPORTING' },
  conversion_succeeded: { from: ['CONVERTING'], to: 'CONVERTED' },
  conversion_failed: { from: ['CONVERTING'], to: 'CONVERTING', retryStage: 'conversion' },
  begin_import: { from: ['CONVERTED'], to: 'IMPORTING' },
  import_succeeded: { from: ['IMPORTING'], to: 'IMPORTED' },
  import_failed: { from: ['IMPORTING'], to: 'IMPORTING', retryStage: 'import' },
  start_seeding: {
    from: ['IMPORTED'],
    to: 'SEEDING',
    guard: (item, context) => {
      if (!context.seedingEnabled) return 'seeding is disabled';
      if (item.candidate?.sourceType !== 'torrent') return 'only torrent downloads seed';
      return null;
    },
  },
  seeding_goal_met: { from: ['SEEDING'], to: 'SEEDING_COMPLETE' },
  fatal_error: { from: NON_TERMINAL, to: 'FAILED' },
  internal_error: { from: NON_TERMINAL.filter((status) => status !== 'ERROR'), to: 'ERROR' },
  operator_cancel: { from: NON_TERMINAL, to: 'CANCELLED' },
  operator_retry: { from: ['FAILED', 'CANCELLED', 'ERROR'], to: 'QUEUED', resetCounters: true },
  operator_requeue: {
    from: PIPELINE_STATUSES.filter((status) => !['QUEUED', 'IMPORTED', 'SEEDING', 'SEEDING_COMPLETE'].includes(status)),
    to: 'QUEUED',
    resetCounters: true,
  },
};

/**
 * Pure transition function. Returns the next state and counters, or the reason
 * the event does not apply to the item as it stands.
 */
export function transition(item: PipelineItem, event: PipelineEvent, context: TransitionContext): TransitionResult {
  const rule = TRANSITIONS[event];
  const from = item.status;

  if (!rule.from.includes(from)) {
    return { ok: false, event, from, reason: `${event} is not allowed from ${from}` };
  }

  const blocked = rule.guard?.(item, context);
  if (blocked) {
    return { ok: false, event, from, reason: blocked };
  }

  if (rule.resetCounters) {
    return { ok: true, event, from, to: rule.to, retries: { ...ZERO_COUNTERS }, exhausted: false };
  }

  if (rule.retryStage) {
    const stage = rule.retryStage;
    const retries = { ...item.retries, [stage]: item.retries[stage] + 1 };
    const exhausted = retries[stage] > context.retryLimits[stage];
    return { ok: true, event, from, to: exhausted ? 'FAILED' : rule.to, retries, exhausted };
  }

  return { ok: true, event, from, to: rule.to, retries: { ...item.retries }, exhausted: false };
}

export function canApply(item: PipelineItem, event: PipelineEvent, context: TransitionContext): boolean {
  return transition(item, event, context).ok;
}

/** Events whose source set includes the status, ignoring guards. */
export function allowedEvents(status: PipelineStatus): PipelineEvent[] {
  return PIPELINE_EVENTS.filter((event) => TRANSITIONS[event].from.includes(status));
}

/** Edges that consume a stage retry budget. */
export function isRetryEvent(event: PipelineEvent): boolean {
  return TRANSITIONS[event].retryStage !== undefined;
}

export function targetOf(event: PipelineEvent): PipelineStatus {
  return TRANSITIONS[event].to;
}

/**
 * Produce the next item for an accepted transition: status, counters and the
 * stage timestamps. Other field changes are the caller's.
 */
export function applyTransition(
  item: PipelineItem,
  result: Extract<TransitionResult, { ok: true }>,
  now: Date,
): PipelineItem {
  const stamp = now.toISOString();
  const next: PipelineItem = { ...item, status: result.to, retries: result.retries };

  switch (result.to) {
    case 'SEARCHING':
      next.searchStartedAt = stamp;
      break;
    case 'FOUND':
      next.foundAt = stamp;
      break;
    case 'DOWNLOAD_COMPLETE':
      next.downloadCompletedAt = stamp;
      break;
    case 'CONVERTED':
      next.convertedAt = stamp;
      break;
    case 'IMPORTED':
      next.importedAt = stamp;
      break;
    case 'SEEDING':
      next.seedingStartedAt = stamp;
      break;
    default:
      break;
  }

  if (result.event === 'client_accepted') next.downloadStartedAt = stamp;
  if (result.event === 'needs_conversion') next.conversionStartedAt = stamp;
  if (result.event === 'begin_import' || result.event === 'no_conversion_needed') next.importStartedAt = stamp;

  if (isTerminal(result.to)) {
    next.completedAt = stamp;
  }

  if (result.to === 'QUEUED' && result.from !== 'QUEUED') {
    next.queuedAt = result.event === 'operator_retry' || result.event === 'operator_requeue' ? stamp : item.queuedAt;
    next.completedAt = null;
  }

  return next;
}
