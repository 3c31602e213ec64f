import { createHmac } from 'node:crypto';
import type { Credentials, QueryValue, RequestSpec } from './types.js';

/**
 * Serialize query parameters with keys in sorted order, dropping undefined values.
 * The same string is sent on the wire and signed, so both must agree.
 */
export function buildQueryString(query: Record<string, QueryValue> = {}): string {
  const params = new URLSearchParams();
  for (const key of Object.keys(query).sort()) {
    const value = query[key];
    if (value !== undefined) params.append(key, String(value));
  }
  return params.toString();
}

/** Path plus query string, e.g. `/exchange/v1/market/items?gameId=a8db&limit=100`. */
export function buildTarget(spec: RequestSpec): string {
  const qs = buildQueryString(spec.query);
  return qs ? `${spec.path}?${qs}` : spec.path;
}

export function serializeBody(spec: RequestSpec): string {
  return spec.body === undefined ? '' : JSON.stringify(spec.body);
}

export class RequestSigner {
  constructor(private readonly credentials: Credentials) {}

  /**
   * Build auth headers. The signed string is method + path/query + body + unix timestamp,
   * HMAC-SHA256 keyed with the private secret.
   */
  sign(method: string, target: string, body: string, timestamp: number): Record<string, string> {
    const date = String(timestamp);
    const signature = createHmac('sha256', this.credentials.secretKey)
      .update(`${method}${target}${body}${date}`)
      .digest('hex');

    return {
      'X-Api-Key': this.credentials.publicKey,
      'X-Sign-Date': date,
      'X-Request-Sign': signature,
    };
  }
}
