import type { V1Secret } from '@kubernetes/client-node';
import type { SecretReader } from '@secretsync/core';

/**
 * Decides whether a source secret should currently have a synced copy.
 * Implementations may read other secrets through `reader`.
 */
export interface EligibilityPredicate {
  isEligible(secret: V1Secret, reader: SecretReader, signal?: AbortSignal): Promise<boolean>;
}

/** Every secret is eligible. */
export const allowAll: EligibilityPredicate = {
  async isEligible(): Promise<boolean> {
    return true;
  },
};

/** Eligible when `labelKey` is set to `"true"` on the secret. */
export function createLabelEligibility(labelKey: string): EligibilityPredicate {
  return {
    async isEligible(secret: V1Secret): Promise<boolean> {
      return secret.metadata?.labels?.[labelKey] === 'true';
    },
  };
}
