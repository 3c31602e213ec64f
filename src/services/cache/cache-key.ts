import { createHash } from 'node:crypto';
import { buildQueryString, serializeBody } from '../market/signer.js';
import type { RequestSpec } from '../market/types.js';

/**
 * Deterministic key for a request: sha256 over method, path, sorted query and body.
 * Two specs differing only in query key order map to the same key.
 */
export function cacheKey(spec: RequestSpec, prefix = ''): string {
  const material = [spec.method, spec.path, buildQueryString(spec.query), serializeBody(spec)].join('\n');
  return `${prefix}${createHash('sha256').update(material).digest('hex')}`;
}
