import type { V1Secret } from '@kubernetes/client-node';
import { formatKey, keyOf, type SecretKey, type SecretReader, type SecretStore } from '@secretsync/core';
import { logger, withSpan, type Logger } from '@secretsync/shared';
import type { EligibilityPredicate } from './eligibility.js';
import { desiredSyncSecret, syncedSecretKey } from './projector.js';

const log = logger.child({ module: 'reconciler' });

export interface SecretSyncerOptions {
  /** Namespace holding the synced copies. */
  secretsNamespace: string;
  store: SecretStore;
  eligibility: EligibilityPredicate;
}

/** What a reconcile pass did to the synced copy. */
export type SyncAction = 'created' | 'updated' | 'unchanged' | 'deleted' | 'absent';

export interface ReconcileResult {
  action: SyncAction;
  /** Ask the caller to reconcile this key again after the delay. */
  requeueAfterMs?: number;
}

/**
 * Keeps the synced copy of one source secret converged with its source.
 *
 * Every pass re-reads both objects, so calling `reconcile` again with nothing
 * changed performs no writes. A rejected promise means the pass should be
 * retried; the queue owns backoff.
 */
export class SecretSyncer {
  private readonly secretsNamespace: string;
  private readonly store: SecretStore;
  private readonly eligibility: EligibilityPredicate;
  /** Read-only view of the store handed to the eligibility predicate. */
  private readonly reader: SecretReader;

  constructor(opts: SecretSyncerOptions) {
    this.secretsNamespace = opts.secretsNamespace;
    this.store = opts.store;
    this.eligibility = opts.eligibility;
    this.reader = { get: (key, signal) => this.store.get(key, signal) };
  }

  async reconcile(key: SecretKey, signal?: AbortSignal): Promise<ReconcileResult> {
    const resource = formatKey(key);
    return withSpan('secret-sync.reconcile', { resource }, async () => {
      const scopedLog = log.child({ controller: 'secret-syncer', resource });
      scopedLog.info('syncing secret');

      const original = await this.store.get(key, signal);
      if (!original) {
        scopedLog.debug('source secret not found, either deleted or not yet available');
        return { action: await this.cleanupSyncedSecret(key, scopedLog, signal) };
      }

      if (!(await this.eligibility.isEligible(original, this.reader, signal))) {
        scopedLog.debug('source secret is not eligible for syncing');
        return { action: await this.cleanupSyncedSecret(key, scopedLog, signal) };
      }

      const desired = desiredSyncSecret(this.secretsNamespace, original);
      const action = await this.ensureSyncedSecret(desired, signal);

      scopedLog.info({ action }, 'secret synced');
      return { action };
    });
  }

  private async cleanupSyncedSecret(
    source: SecretKey,
    scopedLog: Logger,
    signal?: AbortSignal,
  ): Promise<SyncAction> {
    const synced = await this.store.get(syncedSecretKey(this.secretsNamespace, source), signal);
    if (!synced) return 'absent';

    scopedLog.info({ synced: formatKey(keyOf(synced)) }, 'deleting synced secret');
    await this.store.delete(synced, signal);
    return 'deleted';
  }

  private async ensureSyncedSecret(desired: V1Secret, signal?: AbortSignal): Promise<SyncAction> {
    const existing = await this.store.get(keyOf(desired), signal);
    if (!existing) {
      await this.store.create(desired, signal);
      return 'created';
    }

    const modified = structuredClone(existing);
    modified.metadata = {
      ...modified.metadata,
      annotations: desired.metadata?.annotations,
      labels: desired.metadata?.labels,
    };
    modified.immutable = desired.immutable;
    modified.data = desired.data;
    modified.stringData = desired.stringData;
    modified.type = desired.type;

    return (await this.store.update(existing, modified, signal)) ? 'updated' : 'unchanged';
  }
}
