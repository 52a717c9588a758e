/**
 * Polls a submitted generation until the provider reports a terminal state,
 * the per-kind ceiling passes, or the caller cancels.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { logger } from '../utils/logger.ts';
import { CancelledError, RemoteError, TimeoutError } from '../utils/errors.ts';
import type { GenerationApi, GenerationKind, LumaGeneration } from './luma-client.ts';
import type { Job, JobStatus } from './job-submitter.ts';

const DEFAULT_POLL_INTERVAL_MS = 3000;
const DEFAULT_TIMEOUTS_MS: Record<GenerationKind, number> = {
  image: 60_000,
  video: 180_000,
};

export interface Clock {
  now(): number;
  /** Resolves after `ms`; rejects once `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
  /** Signal that aborts once `ms` have passed. */
  timeout(ms: number): AbortSignal;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) => delay(ms, undefined, { signal }),
  timeout: (ms) => AbortSignal.timeout(ms),
};

export interface PollerOptions {
  intervalMs?: number;
  timeoutsMs?: Partial<Record<GenerationKind, number>>;
  clock?: Clock;
}

export interface GenerationAssets {
  image?: string;
  video?: string;
}

export interface CompletedJob extends Job {
  status: 'completed';
  assets: GenerationAssets;
  completedAt: Date;
}

const STATE_TO_STATUS = new Map<string, JobStatus>([
  ['queued', 'pending'],
  ['dreaming', 'processing'],
  ['completed', 'completed'],
  ['failed', 'failed'],
]);

/** Maps the provider state onto a JobStatus; unknown states count as still processing. */
export function toJobStatus(state: string | undefined): JobStatus {
  const status = state === undefined ? undefined : STATE_TO_STATUS.get(state);
  if (status === undefined) {
    logger.warn({ state }, 'Unknown generation state; treating as processing');
    return 'processing';
  }
  return status;
}

export function extractAssets(generation: LumaGeneration): GenerationAssets {
  const image = generation.assets?.image;
  const video = generation.assets?.video;
  return {
    ...(image ? { image } : {}),
    ...(video ? { video } : {}),
  };
}

export class Poller {
  private readonly intervalMs: number;
  private readonly timeoutsMs: Record<GenerationKind, number>;
  private readonly clock: Clock;

  constructor(
    private readonly api: GenerationApi,
    options: PollerOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.timeoutsMs = {
      image: options.timeoutsMs?.image ?? DEFAULT_TIMEOUTS_MS.image,
      video: options.timeoutsMs?.video ?? DEFAULT_TIMEOUTS_MS.video,
    };
    this.clock = options.clock ?? systemClock;
  }

  timeoutFor(kind: GenerationKind): number {
    return this.timeoutsMs[kind];
  }

  /**
   * Queries the generation until it completes. Updates `job.status` as it goes.
   * Each status query is bounded by the time left before the job's ceiling.
   * @throws RemoteError when the provider reports failure
   * @throws TimeoutError when the ceiling for the job's kind passes first
   * @throws CancelledError when `signal` aborts
   */
  async waitForCompletion(job: Job, signal?: AbortSignal): Promise<CompletedJob> {
    const timeoutMs = this.timeoutFor(job.kind);
    const deadline = this.clock.now() + timeoutMs;
    let queries = 0;

    const timedOut = (): TimeoutError => {
      const lastStatus = job.status;
      job.status = 'timed_out';
      logger.warn({ jobId: job.id, kind: job.kind, lastStatus, timeoutMs, queries }, 'Generation timed out');
      return new TimeoutError(job.id, lastStatus, timeoutMs);
    };

    for (;;) {
      if (signal?.aborted) throw new CancelledError(job.id);

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) throw timedOut();

      const deadlineSignal = this.clock.timeout(remaining);
      let generation: LumaGeneration;
      try {
        generation = await this.api.getGeneration(
          job.id,
          signal ? AbortSignal.any([signal, deadlineSignal]) : deadlineSignal,
        );
      } catch (error) {
        if (signal?.aborted) throw new CancelledError(job.id);
        if (deadlineSignal.aborted) throw timedOut();
        throw error;
      }
      queries++;

      const status = toJobStatus(generation.state);
      if (status !== job.status) {
        logger.debug({ jobId: job.id, kind: job.kind, from: job.status, to: status }, 'Generation status changed');
      }
      job.status = status;

      if (status === 'failed') {
        const reason = generation.failure_reason ?? 'unknown reason';
        logger.warn({ jobId: job.id, kind: job.kind, reason }, 'Generation failed');
        throw new RemoteError(`Generation ${job.id} failed: ${reason}`, undefined, reason, job.id);
      }

      if (status === 'completed') {
        const assets = extractAssets(generation);
        const expected = job.kind === 'image' ? assets.image : assets.video;
        if (!expected) {
          throw new RemoteError(
            `Generation ${job.id} completed without a${job.kind === 'image' ? 'n image' : ' video'} asset`,
            undefined,
            undefined,
            job.id,
          );
        }
        logger.info({ jobId: job.id, kind: job.kind, queries }, 'Generation completed');
        return { ...job, status: 'completed', assets, completedAt: new Date(this.clock.now()) };
      }

      const left = deadline - this.clock.now();
      if (left <= 0) continue;

      try {
        await this.clock.sleep(Math.min(this.intervalMs, left), signal);
      } catch (error) {
        if (signal?.aborted) throw new CancelledError(job.id);
        throw error;
      }
    }
  }
}
