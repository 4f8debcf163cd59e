/**
 * SecretStore — the capability set the sync core needs from the cluster.
 *
 * Kept as an interface so the reconciler can run against an in-memory store in
 * tests and against the Kubernetes API in production.
 */
import type { V1Secret } from '@kubernetes/client-node';

/** Identity of a Secret: namespace plus name. */
export interface SecretKey {
  namespace: string;
  name: string;
}

/** Read-only view of the store, handed to eligibility predicates. */
export interface SecretReader {
  /** Fetch a Secret; resolves `undefined` when it does not exist. */
  get(key: SecretKey, signal?: AbortSignal): Promise<V1Secret | undefined>;
}

export interface SecretStore extends SecretReader {
  create(secret: V1Secret, signal?: AbortSignal): Promise<void>;
  /**
   * Merge-patch `existing` into `modified`, locked on the resourceVersion of
   * `existing`. Resolves `false` without calling the API when nothing differs.
   */
  update(existing: V1Secret, modified: V1Secret, signal?: AbortSignal): Promise<boolean>;
  delete(secret: V1Secret, signal?: AbortSignal): Promise<void>;
}

export function keyOf(secret: V1Secret): SecretKey {
  return {
    namespace: secret.metadata?.namespace ?? '',
    name: secret.metadata?.name ?? '',
  };
}

export function formatKey(key: SecretKey): string {
  return `${key.namespace}/${key.name}`;
}
