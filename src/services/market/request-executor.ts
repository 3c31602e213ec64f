import pino from 'pino';
import type { z } from 'zod';
import { ApiError, err, getErrorMessage, ok, type Result } from '../../utils/errors.js';
import { sleep } from '../../utils/sleep.js';
import type { CircuitBreaker } from './circuit-breaker.js';
import type { RateLimiter } from './rate-limiter.js';
import { buildTarget, serializeBody, type RequestSigner } from './signer.js';
import type { RequestSpec } from './types.js';

const log = pino({ name: 'request-executor' });

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface RequestExecutorOptions {
  baseUrl: string;
  timeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffFactor: number;
  backoffMaxMs: number;
  maxRetryAfterMs: number;
}

export interface RequestExecutorDeps {
  signer: RequestSigner;
  limiter: RateLimiter;
  breaker: CircuitBreaker;
  fetchFn?: FetchFn;
  /** Jitter source in [0, 1). */
  random?: () => number;
}

export interface SendOptions {
  signal?: AbortSignal;
}

export interface RequestExecutorStats {
  requests: number;
  retries: number;
  rateLimited: number;
  failures: number;
}

type AttemptOutcome<T> =
  | { type: 'success'; data: T; breakerFailure: false }
  | { type: 'retry'; error: ApiError; breakerFailure: boolean }
  | { type: 'fatal'; error: ApiError; breakerFailure: false };

/**
 * Parse a Retry-After header given as delta-seconds or an HTTP date.
 * Returns milliseconds to wait, capped at `capMs`, or undefined when absent or unreadable.
 */
export function parseRetryAfter(header: string | null, nowMs: number, capMs: number): number | undefined {
  if (!header) return undefined;
  const value = header.trim();

  if (/^\d+(\.\d+)?$/.test(value)) {
    return Math.min(capMs, Math.round(Number(value) * 1000));
  }

  const at = Date.parse(value);
  if (Number.isNaN(at)) return undefined;
  return Math.min(capMs, Math.max(0, at - nowMs));
}

/**
 * Delay before retry number `attempt` (1-based): base * factor^(attempt-1) plus up to
 * 25% jitter, never above `backoffMaxMs`.
 */
export function computeBackoff(
  attempt: number,
  options: Pick<RequestExecutorOptions, 'backoffBaseMs' | 'backoffFactor' | 'backoffMaxMs'>,
  random: () => number = Math.random,
): number {
  const base = Math.min(
    options.backoffMaxMs,
    options.backoffBaseMs * options.backoffFactor ** (attempt - 1),
  );
  const jitter = base * 0.25 * random();
  return Math.min(options.backoffMaxMs, Math.round(base + jitter));
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Signed, rate-limited, circuit-broken HTTP calls to the marketplace.
 *
 * Every attempt takes a limiter slot and passes the breaker gate. 429 responses are retried
 * without counting against the breaker; 5xx, network errors and timeouts are retried and
 * do count. Other 4xx responses and schema mismatches are returned immediately.
 */
export class RequestExecutor {
  private readonly signer: RequestSigner;
  private readonly limiter: RateLimiter;
  private readonly breaker: CircuitBreaker;
  private readonly fetchFn: FetchFn;
  private readonly random: () => number;
  private readonly counters: RequestExecutorStats = {
    requests: 0,
    retries: 0,
    rateLimited: 0,
    failures: 0,
  };

  constructor(
    private readonly options: RequestExecutorOptions,
    deps: RequestExecutorDeps,
  ) {
    if (options.maxAttempts < 1) {
      throw new Error('maxAttempts must be at least 1');
    }
    this.signer = deps.signer;
    this.limiter = deps.limiter;
    this.breaker = deps.breaker;
    this.fetchFn = deps.fetchFn ?? ((url, init) => fetch(url, init));
    this.random = deps.random ?? Math.random;
  }

  async send<T>(
    spec: RequestSpec,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: SendOptions = {},
  ): Promise<Result<T, ApiError>> {
    const { signal } = options;
    let lastError: ApiError | null = null;

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      const granted = await this.limiter.acquire(signal);
      if (!granted) return err(this.cancelled(spec));

      const gated = await this.breaker.execute(
        () => this.attempt(spec, schema),
        (outcome) => outcome.breakerFailure,
      );

      if (!gated.success) {
        return err(
          new ApiError('CircuitOpen', gated.error.message, {
            retryAfterMs: gated.error.retryInMs,
            context: { path: spec.path },
            cause: gated.error,
          }),
        );
      }

      const outcome = gated.data;
      if (outcome.type === 'success') return ok(outcome.data);
      if (outcome.type === 'fatal') {
        this.counters.failures++;
        return err(outcome.error);
      }

      lastError = outcome.error;
      if (outcome.error.kind === 'RateLimited') this.counters.rateLimited++;
      if (attempt === this.options.maxAttempts) break;

      const delayMs = outcome.error.retryAfterMs ?? computeBackoff(attempt, this.options, this.random);
      this.counters.retries++;
      log.warn(
        { path: spec.path, attempt, kind: outcome.error.kind, status: outcome.error.status, delayMs },
        'Retrying marketplace request',
      );

      const waited = await sleep(delayMs, signal);
      if (!waited) return err(this.cancelled(spec));
    }

    this.counters.failures++;
    const finalError =
      lastError ?? new ApiError('Unavailable', 'Request failed', { context: { path: spec.path } });
    log.error(
      { path: spec.path, kind: finalError.kind, status: finalError.status, attempts: this.options.maxAttempts },
      'Marketplace request failed after retries',
    );
    return err(finalError);
  }

  stats(): RequestExecutorStats {
    return { ...this.counters };
  }

  private async attempt<T>(
    spec: RequestSpec,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<AttemptOutcome<T>> {
    const target = buildTarget(spec);
    const body = serializeBody(spec);
    const headers: Record<string, string> = {
      ...this.signer.sign(spec.method, target, body, Math.floor(Date.now() / 1000)),
      Accept: 'application/json',
    };
    if (body) headers['Content-Type'] = 'application/json';

    this.counters.requests++;
    const context = { method: spec.method, path: spec.path };

    let response: Response;
    try {
      response = await this.fetchFn(`${this.options.baseUrl}${target}`, {
        method: spec.method,
        headers,
        body: body || undefined,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      const message = isTimeout(error)
        ? `Request timed out after ${this.options.timeoutMs}ms`
        : `Network error: ${getErrorMessage(error)}`;
      return {
        type: 'retry',
        breakerFailure: true,
        error: new ApiError('Unavailable', message, { context, cause: error }),
      };
    }

    const retryAfterMs = parseRetryAfter(
      response.headers.get('Retry-After'),
      Date.now(),
      this.options.maxRetryAfterMs,
    );

    if (response.status === 429) {
      return {
        type: 'retry',
        breakerFailure: false,
        error: new ApiError('RateLimited', 'Rate limited by marketplace', {
          status: 429,
          retryAfterMs,
          context,
        }),
      };
    }

    if (response.status >= 500) {
      return {
        type: 'retry',
        breakerFailure: true,
        error: new ApiError('Unavailable', `Marketplace error (${response.status})`, {
          status: response.status,
          retryAfterMs,
          context,
        }),
      };
    }

    if (!response.ok) {
      log.warn({ ...context, status: response.status }, 'Marketplace rejected request');
      return {
        type: 'fatal',
        breakerFailure: false,
        error: new ApiError('ClientError', `Marketplace rejected request (${response.status})`, {
          status: response.status,
          context,
        }),
      };
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      if (isTimeout(error)) {
        return {
          type: 'retry',
          breakerFailure: true,
          error: new ApiError('Unavailable', `Response body timed out after ${this.options.timeoutMs}ms`, {
            status: response.status,
            context,
            cause: error,
          }),
        };
      }
      return {
        type: 'fatal',
        breakerFailure: false,
        error: new ApiError('InvalidResponse', 'Response body is not valid JSON', {
          status: response.status,
          context,
          cause: error,
        }),
      };
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      log.warn({ ...context, issues }, 'Unexpected response shape');
      return {
        type: 'fatal',
        breakerFailure: false,
        error: new ApiError('InvalidResponse', 'Response did not match the expected shape', {
          status: response.status,
          context: { ...context, issues },
        }),
      };
    }

    return { type: 'success', breakerFailure: false, data: parsed.data };
  }

  private cancelled(spec: RequestSpec): ApiError {
    return new ApiError('Cancelled', 'Request cancelled', { context: { path: spec.path } });
  }
}
