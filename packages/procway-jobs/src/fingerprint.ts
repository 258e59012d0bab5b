/**
 * Request fingerprinting
 *
 * fingerprint = sha256(canonical_json({ process_id, inputs, outputs }))
 *
 * Object keys are sorted at every depth; requested outputs are a set, so they
 * are de-duplicated and sorted. Outputs are part of the key: two requests that
 * differ only in requested outputs must never share a cache entry.
 */

import { createHash } from 'crypto';

type Canonical = null | boolean | number | string | Canonical[] | { [key: string]: Canonical };

/**
 * Stable JSON form of a value: sorted keys, undefined members dropped (as
 * JSON.stringify would), non-finite numbers rejected.
 */
export function canonicalize(value: unknown): Canonical {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new TypeError(`Cannot fingerprint non-finite number ${value}`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : canonicalize(item)));
  }
  if (typeof value === 'object') {
    const result: { [key: string]: Canonical } = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member !== undefined) {
        result[key] = canonicalize(member);
      }
    }
    return result;
  }
  throw new TypeError(`Cannot fingerprint value of type ${typeof value}`);
}

export function normalizeOutputs(outputs: readonly string[]): string[] {
  return [...new Set(outputs)].sort();
}

export function computeFingerprint(
  processId: string,
  inputs: Record<string, unknown>,
  outputs: readonly string[]
): string {
  const canonical = JSON.stringify({
    process_id: processId,
    inputs: canonicalize(inputs),
    outputs: normalizeOutputs(outputs)
  });
  return createHash('sha256').update(canonical, 'utf8').digest('hex');
}
