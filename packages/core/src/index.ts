/**
 * @secretsync/core — cluster-facing building blocks for the secret sync service.
 *
 * - SecretStore: the get/create/update/delete capability set and its
 *   Kubernetes implementation
 * - Error classification for Kubernetes API failures
 * - JSON merge patch generation
 */

export type { SecretKey, SecretReader, SecretStore } from './secret-store.js';
export { keyOf, formatKey } from './secret-store.js';
export { createK8sSecretStore } from './secret-store-impl.js';
export { statusCodeOf, isNotFound, isConflict } from './errors.js';
export { createMergePatch, withResourceVersion, type MergePatch } from './merge-patch.js';
