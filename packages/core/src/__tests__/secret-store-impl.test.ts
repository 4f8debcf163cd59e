import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ApiException, type CoreV1Api, type V1Secret } from '@kubernetes/client-node';

vi.mock('@secretsync/shared', () => ({
  logger: {
    child: () => ({
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    }),
  },
}));

import { createK8sSecretStore } from '../secret-store-impl.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const api = {
  readNamespacedSecret: vi.fn(),
  createNamespacedSecret: vi.fn(),
  patchNamespacedSecret: vi.fn(),
  deleteNamespacedSecret: vi.fn(),
};

function makeStore() {
  return createK8sSecretStore(api as unknown as CoreV1Api);
}

function existingSecret(): V1Secret {
  return {
    metadata: {
      name: 'payments-api-key',
      namespace: 'synced',
      resourceVersion: '7',
      uid: 'uid-1',
      creationTimestamp: new Date('2024-01-01T00:00:00Z'),
    },
    type: 'Opaque',
    data: { k: 'djE=' },
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('createK8sSecretStore', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('get', () => {
    it('returns the secret read from the API', async () => {
      const secret = existingSecret();
      api.readNamespacedSecret.mockResolvedValue(secret);

      await expect(makeStore().get({ namespace: 'synced', name: 'payments-api-key' })).resolves.toBe(secret);
      expect(api.readNamespacedSecret).toHaveBeenCalledWith({ name: 'payments-api-key', namespace: 'synced' });
    });

    it('returns undefined on 404', async () => {
      api.readNamespacedSecret.mockRejectedValue(new ApiException(404, 'not found', {}, {}));
      await expect(makeStore().get({ namespace: 'synced', name: 'missing' })).resolves.toBeUndefined();
    });

    it('propagates other API errors', async () => {
      const err = new ApiException(500, 'server error', {}, {});
      api.readNamespacedSecret.mockRejectedValue(err);
      await expect(makeStore().get({ namespace: 'synced', name: 'x' })).rejects.toBe(err);
    });

    it('does not call the API once the signal is aborted', async () => {
      await expect(
        makeStore().get({ namespace: 'synced', name: 'x' }, AbortSignal.abort()),
      ).rejects.toMatchObject({ name: 'AbortError' });
      expect(api.readNamespacedSecret).not.toHaveBeenCalled();
    });
  });

  describe('create', () => {
    it('creates the secret in its own namespace', async () => {
      api.createNamespacedSecret.mockResolvedValue({});
      const secret: V1Secret = { metadata: { name: 'a-b', namespace: 'synced' }, data: { k: 'dg==' } };

      await makeStore().create(secret);
      expect(api.createNamespacedSecret).toHaveBeenCalledWith({ namespace: 'synced', body: secret });
    });
  });

  describe('update', () => {
    it('sends a merge patch locked on the resourceVersion', async () => {
      api.patchNamespacedSecret.mockResolvedValue({});
      const existing = existingSecret();
      const modified = structuredClone(existing);
      modified.data = { k: 'djI=' };

      await expect(makeStore().update(existing, modified)).resolves.toBe(true);
      expect(api.patchNamespacedSecret).toHaveBeenCalledWith(
        {
          name: 'payments-api-key',
          namespace: 'synced',
          body: { data: { k: 'djI=' }, metadata: { resourceVersion: '7' } },
        },
        expect.anything(),
      );
    });

    it('skips the API call when nothing changed', async () => {
      const existing = existingSecret();
      await expect(makeStore().update(existing, structuredClone(existing))).resolves.toBe(false);
      expect(api.patchNamespacedSecret).not.toHaveBeenCalled();
    });

    it('propagates conflicts', async () => {
      const err = new ApiException(409, 'conflict', {}, {});
      api.patchNamespacedSecret.mockRejectedValue(err);
      const existing = existingSecret();
      const modified = structuredClone(existing);
      modified.type = 'kubernetes.io/tls';

      await expect(makeStore().update(existing, modified)).rejects.toBe(err);
    });
  });

  describe('delete', () => {
    it('deletes with a uid precondition', async () => {
      api.deleteNamespacedSecret.mockResolvedValue({});
      await makeStore().delete(existingSecret());
      expect(api.deleteNamespacedSecret).toHaveBeenCalledWith({
        name: 'payments-api-key',
        namespace: 'synced',
        body: { preconditions: { uid: 'uid-1' } },
      });
    });

    it('deletes without a body when the uid is unknown', async () => {
      api.deleteNamespacedSecret.mockResolvedValue({});
      await makeStore().delete({ metadata: { name: 'a-b', namespace: 'synced' } });
      expect(api.deleteNamespacedSecret).toHaveBeenCalledWith({
        name: 'a-b',
        namespace: 'synced',
        body: undefined,
      });
    });
  });
});
