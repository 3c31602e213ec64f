/**
 * Circuit Breaker
 *
 * Three-state failure gate for one upstream:
 * - closed: calls pass; failures are counted in a fixed window that starts at the
 *   first failure. Reaching `failureThreshold` inside the window opens the circuit.
 * - open: calls are rejected with CircuitOpenError until `resetTimeoutMs` elapses.
 * - half-open: a single probe call is let through. Success closes the circuit,
 *   failure opens it again with a fresh timer.
 *
 * @example
 * ```typescript
 * const breaker = new CircuitBreaker({ failureThreshold: 5, windowMs: 60_000, resetTimeoutMs: 60_000 });
 * const result = await breaker.execute(() => fetch(url), (res) => res.status >= 500);
 * if (!result.success) {
 *   // rejected without calling upstream
 * }
 * ```
 */

import pino from 'pino';
import { CircuitOpenError, err, ok, type Result } from '../../utils/errors.js';

const log = pino({ name: 'circuit-breaker' });

export type CircuitStateName = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  name?: string;
  failureThreshold: number;
  windowMs: number;
  resetTimeoutMs: number;
}

export interface CircuitSnapshot {
  name: string;
  state: CircuitStateName;
  failures: number;
  windowStartedAt: number;
  lastFailureAt: number;
  openUntil: number;
  failureThreshold: number;
}

export class CircuitBreaker {
  private state: CircuitStateName = 'closed';
  private failures = 0;
  private windowStartedAt = 0;
  private lastFailureAt = 0;
  private openUntil = 0;
  private probeInFlight = false;
  private readonly name: string;

  constructor(private readonly options: CircuitBreakerOptions) {
    if (options.failureThreshold < 1) {
      throw new Error('Circuit breaker failureThreshold must be at least 1');
    }
    if (options.resetTimeoutMs < 0 || options.windowMs <= 0) {
      throw new Error('Circuit breaker timings must be positive');
    }
    this.name = options.name ?? 'upstream';
  }

  /**
   * Run `fn` through the gate. `isFailure` classifies a resolved value; a thrown error
   * always counts as a failure and is rethrown.
   */
  async execute<T>(
    fn: () => Promise<T>,
    isFailure: (result: T) => boolean = () => false,
  ): Promise<Result<T, CircuitOpenError>> {
    const admission = this.admit();
    if (admission === 'rejected') {
      return err(new CircuitOpenError(this.name, this.retryInMs()));
    }
    const isProbe = admission === 'probe';

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.onFailure(isProbe);
      throw error;
    }

    if (isFailure(result)) {
      this.onFailure(isProbe);
    } else {
      this.onSuccess(isProbe);
    }
    return ok(result);
  }

  getState(): CircuitStateName {
    this.refreshState();
    return this.state;
  }

  snapshot(): CircuitSnapshot {
    this.refreshState();
    return {
      name: this.name,
      state: this.state,
      failures: this.failures,
      windowStartedAt: this.windowStartedAt,
      lastFailureAt: this.lastFailureAt,
      openUntil: this.openUntil,
      failureThreshold: this.options.failureThreshold,
    };
  }

  reset(): void {
    this.state = 'closed';
    this.failures = 0;
    this.windowStartedAt = 0;
    this.lastFailureAt = 0;
    this.openUntil = 0;
    this.probeInFlight = false;
  }

  private refreshState(): void {
    if (this.state === 'open' && Date.now() >= this.openUntil) {
      this.state = 'half-open';
      this.probeInFlight = false;
      log.info({ breaker: this.name }, 'Circuit half-open, next call is a probe');
    }
  }

  private admit(): 'pass' | 'probe' | 'rejected' {
    this.refreshState();
    if (this.state === 'closed') return 'pass';
    if (this.state === 'open' || this.probeInFlight) return 'rejected';
    this.probeInFlight = true;
    return 'probe';
  }

  private retryInMs(): number {
    if (this.state === 'open') return Math.max(0, this.openUntil - Date.now());
    return 0;
  }

  private onFailure(isProbe: boolean): void {
    const now = Date.now();
    this.lastFailureAt = now;

    if (isProbe) {
      this.trip(now);
      return;
    }
    // Late results of calls admitted before the circuit opened do not move it
    if (this.state !== 'closed') return;

    if (this.failures === 0 || now - this.windowStartedAt >= this.options.windowMs) {
      this.windowStartedAt = now;
      this.failures = 1;
    } else {
      this.failures++;
    }

    if (this.failures >= this.options.failureThreshold) {
      this.trip(now);
    }
  }

  private onSuccess(isProbe: boolean): void {
    if (!isProbe) return;
    this.state = 'closed';
    this.failures = 0;
    this.windowStartedAt = 0;
    this.probeInFlight = false;
    log.info({ breaker: this.name }, 'Probe succeeded, circuit closed');
  }

  private trip(now: number): void {
    this.state = 'open';
    this.openUntil = now + this.options.resetTimeoutMs;
    this.probeInFlight = false;
    log.warn(
      { breaker: this.name, failures: this.failures, openForMs: this.options.resetTimeoutMs },
      'Circuit opened',
    );
  }
}
