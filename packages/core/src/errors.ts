import { ApiException } from '@kubernetes/client-node';

/** HTTP status carried by a Kubernetes API error, if any. */
export function statusCodeOf(err: unknown): number | undefined {
  if (err instanceof ApiException) return err.code;
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return undefined;
}

export function isNotFound(err: unknown): boolean {
  return statusCodeOf(err) === 404;
}

/** 409: stale resourceVersion or failed delete precondition. */
export function isConflict(err: unknown): boolean {
  return statusCodeOf(err) === 409;
}
