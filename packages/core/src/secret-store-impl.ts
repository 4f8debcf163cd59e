/**
 * Default SecretStore backed by the Kubernetes API through @kubernetes/client-node.
 */

import * as k8s from '@kubernetes/client-node';
import { logger } from '@secretsync/shared';
import { isNotFound } from './errors.js';
import { createMergePatch, withResourceVersion } from './merge-patch.js';
import { formatKey, keyOf, type SecretKey, type SecretStore } from './secret-store.js';

const log = logger.child({ module: 'k8s-secret-store' });

export function createK8sSecretStore(coreApi: k8s.CoreV1Api): SecretStore {
  return {
    async get(key: SecretKey, signal?: AbortSignal): Promise<k8s.V1Secret | undefined> {
      signal?.throwIfAborted();
      try {
        return await coreApi.readNamespacedSecret({ name: key.name, namespace: key.namespace });
      } catch (err) {
        if (isNotFound(err)) return undefined;
        throw err;
      }
    },

    async create(secret: k8s.V1Secret, signal?: AbortSignal): Promise<void> {
      signal?.throwIfAborted();
      const { namespace } = keyOf(secret);
      await coreApi.createNamespacedSecret({ namespace, body: secret });
      log.debug({ secret: formatKey(keyOf(secret)) }, 'secret created');
    },

    async update(existing: k8s.V1Secret, modified: k8s.V1Secret, signal?: AbortSignal): Promise<boolean> {
      const patch = createMergePatch(existing, modified);
      if (Object.keys(patch).length === 0) return false;

      signal?.throwIfAborted();
      const key = keyOf(existing);
      const resourceVersion = existing.metadata?.resourceVersion;
      await coreApi.patchNamespacedSecret(
        {
          name: key.name,
          namespace: key.namespace,
          body: resourceVersion ? withResourceVersion(patch, resourceVersion) : patch,
        },
        k8s.setHeaderOptions('Content-Type', k8s.PatchStrategy.MergePatch),
      );
      log.debug({ secret: formatKey(key), fields: Object.keys(patch) }, 'secret patched');
      return true;
    },

    async delete(secret: k8s.V1Secret, signal?: AbortSignal): Promise<void> {
      signal?.throwIfAborted();
      const key = keyOf(secret);
      const uid = secret.metadata?.uid;
      await coreApi.deleteNamespacedSecret({
        name: key.name,
        namespace: key.namespace,
        body: uid ? { preconditions: { uid } } : undefined,
      });
      log.debug({ secret: formatKey(key) }, 'secret deleted');
    },
  };
}
