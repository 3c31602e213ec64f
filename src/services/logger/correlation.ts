import { randomUUID } from 'node:crypto';

/**
 * Generate a short correlation ID for tracing one scan run through the logs.
 * Uses first 8 chars of a UUID for brevity.
 */
export function generateCorrelationId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Context carried through a tier scan. Every log call in the run includes it.
 */
export interface ScanContext {
  correlationId: string;
  tierKey: string;
  service: string;
}

export function createScanContext(tierKey: string): ScanContext {
  return {
    correlationId: generateCorrelationId(),
    tierKey,
    service: 'arbitrage-scanner',
  };
}
