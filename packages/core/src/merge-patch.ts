/**
 * JSON merge patch (RFC 7386) generation.
 *
 * Keys whose value is `undefined` count as absent, matching how the API
 * serializer drops them.
 */

export type MergePatch = Record<string, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function sameValue(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/** Patch that turns `original` into `modified` when applied as a merge patch. */
export function createMergePatch(original: object, modified: object): MergePatch {
  const before = new Map<string, unknown>(Object.entries(original));
  const after = new Map<string, unknown>(Object.entries(modified));
  const patch: MergePatch = {};

  for (const [key, value] of before) {
    if (value !== undefined && after.get(key) === undefined) {
      patch[key] = null;
    }
  }

  for (const [key, value] of after) {
    if (value === undefined) continue;
    const previous = before.get(key);
    if (isPlainObject(previous) && isPlainObject(value)) {
      const nested = createMergePatch(previous, value);
      if (Object.keys(nested).length > 0) patch[key] = nested;
    } else if (!sameValue(previous, value)) {
      patch[key] = value;
    }
  }

  return patch;
}

/**
 * Pin a patch to a resourceVersion so the server rejects it with 409 when the
 * object changed since it was read.
 */
export function withResourceVersion(patch: MergePatch, resourceVersion: string): MergePatch {
  const metadata = isPlainObject(patch.metadata) ? patch.metadata : {};
  return { ...patch, metadata: { ...metadata, resourceVersion } };
}
