import type {
  DownloadedImage,
  GenerationApi,
  GenerationPayload,
  LumaGeneration,
} from '../src/services/luma-client.ts';
import type { Clock } from '../src/services/poller.ts';
import { RemoteError } from '../src/utils/errors.ts';

/**
 * Clock whose sleeps advance virtual time and resolve on the next microtask.
 * Timeout signals fire as virtual time passes their due time.
 */
export class FakeClock implements Clock {
  time = 0;
  readonly sleeps: number[] = [];
  private timers: Array<{ at: number; controller: AbortController }> = [];

  now(): number {
    return this.time;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new Error('The operation was aborted');
    this.sleeps.push(ms);
    await this.elapse(ms, signal);
  }

  timeout(ms: number): AbortSignal {
    const controller = new AbortController();
    this.timers.push({ at: this.time + ms, controller });
    return controller.signal;
  }

  /** Moves time forward by `ms`, stopping early if a due timer aborts `signal`. */
  async elapse(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new Error('The operation was aborted');
    const target = this.time + ms;
    for (let timer = this.nextTimer(target); timer; timer = this.nextTimer(target)) {
      this.time = timer.at;
      timer.controller.abort();
      if (signal?.aborted) throw new Error('The operation was aborted');
    }
    this.time = target;
    await Promise.resolve();
    if (signal?.aborted) throw new Error('The operation was aborted');
  }

  private nextTimer(until: number): { at: number; controller: AbortController } | undefined {
    let next: { at: number; controller: AbortController } | undefined;
    for (const timer of this.timers) {
      if (timer.at <= until && (!next || timer.at < next.at)) next = timer;
    }
    if (next) this.timers = this.timers.filter((timer) => timer !== next);
    return next;
  }
}

export function generationId(n: number): string {
  return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;
}

export function imageUrlFor(id: string): string {
  return `https://cdn.example.test/${id}.jpg`;
}

export function videoUrlFor(id: string): string {
  return `https://cdn.example.test/${id}.mp4`;
}

/** `processing` answers followed by a completed one carrying the kind's assets. */
export function processingThenCompleted(n: number) {
  return (id: string, payload: GenerationPayload): LumaGeneration[] => [
    ...Array.from({ length: n }, () => ({ id, state: 'dreaming' })),
    {
      id,
      state: 'completed',
      assets:
        payload.kind === 'image'
          ? { image: imageUrlFor(id) }
          : { video: videoUrlFor(id), image: imageUrlFor(id) },
    },
  ];
}

export type Script = (id: string, payload: GenerationPayload) => LumaGeneration[];

/**
 * In-memory GenerationApi. Each submission gets the next sequential id and a
 * scripted list of status answers; the last answer repeats once the list runs out.
 */
export class FakeGenerationApi implements GenerationApi {
  readonly created: Array<{ id: string; payload: GenerationPayload }> = [];
  readonly statusQueries: string[] = [];
  readonly fetched: string[] = [];
  createError?: Error;
  fetchError?: Error;
  onStatusQuery?: (id: string, count: number) => void;
  /** Virtual time each status query takes on `clock`. */
  queryDelay?: { clock: FakeClock; ms: number };

  private counter = 0;
  private readonly answers = new Map<string, LumaGeneration[]>();

  constructor(private readonly script: Script = processingThenCompleted(0)) {}

  async createGeneration(payload: GenerationPayload): Promise<LumaGeneration> {
    if (this.createError) throw this.createError;
    this.counter++;
    const id = generationId(this.counter);
    this.created.push({ id, payload });
    this.answers.set(id, this.script(id, payload));
    await Promise.resolve();
    return { id, state: 'queued' };
  }

  async getGeneration(id: string, signal?: AbortSignal): Promise<LumaGeneration> {
    this.statusQueries.push(id);
    this.onStatusQuery?.(id, this.queriesFor(id));
    if (this.queryDelay) await this.queryDelay.clock.elapse(this.queryDelay.ms, signal);
    const answers = this.answers.get(id);
    const next = answers && (answers.length > 1 ? answers.shift() : answers[0]);
    if (!next) throw new RemoteError('Luma API error: Generation not found', 404, undefined, id);
    await Promise.resolve();
    return next;
  }

  async fetchImage(url: string): Promise<DownloadedImage> {
    if (this.fetchError) throw this.fetchError;
    this.fetched.push(url);
    return { data: Buffer.from(url).toString('base64'), mimeType: 'image/jpeg' };
  }

  queriesFor(id: string): number {
    return this.statusQueries.filter((queried) => queried === id).length;
  }
}
