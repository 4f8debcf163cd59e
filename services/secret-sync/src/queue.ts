import { formatKey, isConflict, type SecretKey } from '@secretsync/core';
import { logger } from '@secretsync/shared';
import type { ReconcileResult } from './reconciler.js';

const log = logger.child({ module: 'reconcile-queue' });

export type ReconcileHandler = (key: SecretKey, signal: AbortSignal) => Promise<ReconcileResult>;

export interface ReconcileQueueOptions {
  /** Keys processed in parallel (default: 4) */
  concurrency?: number;
  /** Delay before the first retry of a failing key (default: 500) */
  baseDelayMs?: number;
  /** Upper bound for the retry delay (default: 300000) */
  maxDelayMs?: number;
}

/**
 * Work queue of secret keys.
 *
 * A key is queued at most once and never processed by two workers at a time;
 * enqueueing a key while it is being processed schedules exactly one more pass.
 * Failed keys are retried with exponential backoff.
 */
export class ReconcileQueue {
  private readonly handler: ReconcileHandler;
  private readonly concurrency: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;

  private readonly pending = new Map<string, SecretKey>();
  private readonly active = new Set<string>();
  private readonly dirty = new Set<string>();
  private readonly failures = new Map<string, number>();
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private idleWaiters: Array<() => void> = [];
  private readonly abort = new AbortController();

  constructor(handler: ReconcileHandler, opts: ReconcileQueueOptions = {}) {
    this.handler = handler;
    this.concurrency = opts.concurrency ?? 4;
    this.baseDelayMs = opts.baseDelayMs ?? 500;
    this.maxDelayMs = opts.maxDelayMs ?? 300_000;
  }

  get stopped(): boolean {
    return this.abort.signal.aborted;
  }

  /** Number of keys waiting for a worker. */
  get length(): number {
    return this.pending.size;
  }

  enqueue(key: SecretKey): void {
    if (this.stopped) return;
    const id = formatKey(key);

    // A direct enqueue supersedes a scheduled retry.
    const timer = this.timers.get(id);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(id);
    }

    if (this.active.has(id)) {
      this.dirty.add(id);
      return;
    }
    this.pending.set(id, key);
    this.pump();
  }

  /** Resolves once no key is queued or being processed. Scheduled retries do not count. */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Abort in-flight passes, drop queued keys and retries, and wait for workers to finish. */
  async shutdown(): Promise<void> {
    this.abort.abort();
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
    this.pending.clear();
    this.dirty.clear();
    await this.drain();
    log.info('reconcile queue shut down');
  }

  private isIdle(): boolean {
    return this.pending.size === 0 && this.active.size === 0;
  }

  private pump(): void {
    while (this.active.size < this.concurrency && this.pending.size > 0) {
      const next = this.pending.entries().next();
      if (next.done) return;
      const [id, key] = next.value;
      this.pending.delete(id);
      this.active.add(id);
      void this.process(id, key);
    }
    if (this.isIdle()) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async process(id: string, key: SecretKey): Promise<void> {
    try {
      const result = await this.handler(key, this.abort.signal);
      this.failures.delete(id);
      if (result.requeueAfterMs !== undefined) {
        this.schedule(id, key, result.requeueAfterMs);
      }
    } catch (err) {
      if (this.stopped) {
        log.debug({ resource: id }, 'reconcile aborted by shutdown');
      } else {
        const attempts = (this.failures.get(id) ?? 0) + 1;
        this.failures.set(id, attempts);
        const delayMs = this.backoff(attempts);
        if (isConflict(err)) {
          log.debug({ resource: id, attempts, delayMs }, 'conflict, retrying against fresh state');
        } else {
          log.warn({ err, resource: id, attempts, delayMs }, 'reconcile failed, retrying');
        }
        this.schedule(id, key, delayMs);
      }
    } finally {
      this.active.delete(id);
      if (this.dirty.delete(id)) {
        this.enqueue(key);
      }
      this.pump();
    }
  }

  private backoff(attempts: number): number {
    return Math.min(this.baseDelayMs * 2 ** (attempts - 1), this.maxDelayMs);
  }

  private schedule(id: string, key: SecretKey, delayMs: number): void {
    if (this.stopped || this.timers.has(id)) return;
    const timer = setTimeout(() => {
      this.timers.delete(id);
      this.enqueue(key);
    }, delayMs);
    timer.unref();
    this.timers.set(id, timer);
  }
}
