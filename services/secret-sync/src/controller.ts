import type { Informer, V1Secret } from '@kubernetes/client-node';
import { formatKey, keyOf, type SecretKey } from '@secretsync/core';
import { logger } from '@secretsync/shared';
import { sourceKeyOf } from './projector.js';
import type { ReconcileQueue } from './queue.js';

const log = logger.child({ module: 'controller' });

const RESTART_DELAY_MS = 5_000;

/**
 * Source identity to reconcile for a watch event on `secret`.
 *
 * Copies in the secrets namespace map back to their source, so deleting or
 * editing a copy by hand gets undone. Anything else in that namespace is not
 * ours and is ignored.
 */
export function sourceKeyForEvent(secret: V1Secret, secretsNamespace: string): SecretKey | undefined {
  const key = keyOf(secret);
  if (!key.name) return undefined;
  if (key.namespace === secretsNamespace) {
    return sourceKeyOf(secret);
  }
  return key;
}

export interface SecretSyncControllerOptions {
  secretsNamespace: string;
  informer: Informer<V1Secret>;
  queue: ReconcileQueue;
  restartDelayMs?: number;
}

/**
 * Feeds the reconcile queue from an informer over every Secret in the cluster.
 * The informer's periodic relist doubles as the resync.
 */
export class SecretSyncController {
  private readonly secretsNamespace: string;
  private readonly informer: Informer<V1Secret>;
  private readonly queue: ReconcileQueue;
  private readonly restartDelayMs: number;
  private restartTimer: NodeJS.Timeout | undefined;
  private running = false;

  constructor(opts: SecretSyncControllerOptions) {
    this.secretsNamespace = opts.secretsNamespace;
    this.informer = opts.informer;
    this.queue = opts.queue;
    this.restartDelayMs = opts.restartDelayMs ?? RESTART_DELAY_MS;

    const onObject = (secret: V1Secret) => this.handle(secret);
    this.informer.on('add', onObject);
    this.informer.on('update', onObject);
    this.informer.on('delete', onObject);
    this.informer.on('error', (err: unknown) => {
      log.error({ err }, 'secret informer failed');
      this.scheduleRestart();
    });
  }

  async start(): Promise<void> {
    this.running = true;
    await this.informer.start();
    log.info({ secretsNamespace: this.secretsNamespace }, 'secret sync controller started');
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = undefined;
    }
    await this.informer.stop();
    await this.queue.shutdown();
    log.info('secret sync controller stopped');
  }

  private handle(secret: V1Secret): void {
    const key = sourceKeyForEvent(secret, this.secretsNamespace);
    if (!key) return;
    log.debug({ resource: formatKey(key) }, 'enqueue');
    this.queue.enqueue(key);
  }

  private scheduleRestart(): void {
    if (!this.running || this.restartTimer) return;
    this.restartTimer = setTimeout(() => {
      this.restartTimer = undefined;
      if (!this.running) return;
      this.informer.start().catch((err: unknown) => {
        log.error({ err }, 'secret informer restart failed');
        this.scheduleRestart();
      });
    }, this.restartDelayMs);
  }
}
