import * as k8s from '@kubernetes/client-node';
import { createK8sSecretStore } from '@secretsync/core';
import { logger } from '@secretsync/shared';
import { loadConfig } from './config.js';
import { SecretSyncController } from './controller.js';
import { allowAll, createLabelEligibility } from './eligibility.js';
import { ReconcileQueue } from './queue.js';
import { SecretSyncer } from './reconciler.js';

const log = logger.child({ module: 'secret-sync' });

async function main(): Promise<void> {
  log.info('secret sync starting...');
  const config = loadConfig();

  const kc = new k8s.KubeConfig();
  kc.loadFromDefault();
  const coreApi = kc.makeApiClient(k8s.CoreV1Api);

  const syncer = new SecretSyncer({
    secretsNamespace: config.secretsNamespace,
    store: createK8sSecretStore(coreApi),
    eligibility: config.syncLabel ? createLabelEligibility(config.syncLabel) : allowAll,
  });

  const queue = new ReconcileQueue((key, signal) => syncer.reconcile(key, signal), {
    concurrency: config.concurrency,
    baseDelayMs: config.retryBaseDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
  });

  const informer = k8s.makeInformer(kc, '/api/v1/secrets', () => coreApi.listSecretForAllNamespaces());
  const controller = new SecretSyncController({
    secretsNamespace: config.secretsNamespace,
    informer,
    queue,
  });

  await controller.start();

  // Graceful shutdown
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      log.info({ signal }, 'shutting down');
      controller
        .stop()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log.error({ err }, 'shutdown failed');
          process.exit(1);
        });
    });
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'secret sync failed to start');
  process.exit(1);
});
