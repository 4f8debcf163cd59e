import { logger } from '@secretsync/shared';

const log = logger.child({ module: 'config' });

export const DEFAULT_SYNC_LABEL = 'secretsync.io/sync';

export interface SyncConfig {
  /** Namespace the synced copies live in. */
  readonly secretsNamespace: string;
  /** Label that opts a secret into syncing; empty means every secret is synced. */
  readonly syncLabel: string;
  readonly concurrency: number;
  readonly retryBaseDelayMs: number;
  readonly retryMaxDelayMs: number;
}

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    log.warn({ name, configured: value, using: fallback }, 'invalid number, falling back to default');
    return fallback;
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const secretsNamespace = env.SECRETS_NAMESPACE?.trim();
  if (!secretsNamespace) {
    throw new Error('SECRETS_NAMESPACE is required');
  }

  const retryBaseDelayMs = parsePositiveInt('RETRY_BASE_DELAY_MS', env.RETRY_BASE_DELAY_MS, 500);
  let retryMaxDelayMs = parsePositiveInt('RETRY_MAX_DELAY_MS', env.RETRY_MAX_DELAY_MS, 300_000);
  if (retryMaxDelayMs < retryBaseDelayMs) {
    log.warn({ retryBaseDelayMs, retryMaxDelayMs }, 'RETRY_MAX_DELAY_MS below base delay, raising it');
    retryMaxDelayMs = retryBaseDelayMs;
  }

  const config: SyncConfig = {
    secretsNamespace,
    syncLabel: (env.SYNC_LABEL ?? DEFAULT_SYNC_LABEL).trim(),
    concurrency: parsePositiveInt('RECONCILE_CONCURRENCY', env.RECONCILE_CONCURRENCY, 4),
    retryBaseDelayMs,
    retryMaxDelayMs,
  };

  if (!config.syncLabel) {
    log.warn('SYNC_LABEL is empty, every secret in the cluster will be synced');
  }

  log.info(
    { secretsNamespace: config.secretsNamespace, syncLabel: config.syncLabel || 'all', concurrency: config.concurrency },
    'secret sync configured',
  );

  return config;
}
