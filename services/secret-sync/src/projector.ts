import type { V1Secret } from '@kubernetes/client-node';
import type { SecretKey } from '@secretsync/core';

/** Label on a synced copy naming the namespace of its source. */
export const OWNING_SECRET_NAMESPACE = 'secretsync.io/owning-secret-namespace';
/** Label on a synced copy naming its source. */
export const OWNING_SECRET_NAME = 'secretsync.io/owning-secret-name';

/**
 * Identity of the synced copy of `source`.
 *
 * The `<namespace>-<name>` rule is not injective: `a-b/c` and `a/b-c` both map
 * to `a-b-c`. Deployed copies depend on it, so it stays as is.
 */
export function syncedSecretKey(secretsNamespace: string, source: SecretKey): SecretKey {
  return {
    namespace: secretsNamespace,
    name: `${source.namespace}-${source.name}`,
  };
}

/** Source identity recorded on a synced copy, if it carries both provenance labels. */
export function sourceKeyOf(synced: V1Secret): SecretKey | undefined {
  const labels = synced.metadata?.labels;
  const namespace = labels?.[OWNING_SECRET_NAMESPACE];
  const name = labels?.[OWNING_SECRET_NAME];
  if (!namespace || !name) return undefined;
  return { namespace, name };
}

function copyMap(map: Record<string, string> | undefined): Record<string, string> | undefined {
  return map ? { ...map } : undefined;
}

/**
 * Desired state of the synced copy of `source`. Pure: the result shares no
 * maps with the input.
 */
export function desiredSyncSecret(secretsNamespace: string, source: V1Secret): V1Secret {
  const sourceNamespace = source.metadata?.namespace ?? '';
  const sourceName = source.metadata?.name ?? '';
  const key = syncedSecretKey(secretsNamespace, { namespace: sourceNamespace, name: sourceName });

  return {
    metadata: {
      namespace: key.namespace,
      name: key.name,
      annotations: copyMap(source.metadata?.annotations),
      labels: {
        ...source.metadata?.labels,
        [OWNING_SECRET_NAMESPACE]: sourceNamespace,
        [OWNING_SECRET_NAME]: sourceName,
      },
    },
    immutable: source.immutable,
    data: copyMap(source.data),
    stringData: copyMap(source.stringData),
    type: source.type,
  };
}
