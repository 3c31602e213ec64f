import { z } from 'zod';

export const listingSchema = z.object({
  itemId: z.string(),
  title: z.string(),
  gameId: z.string(),
  price: z.number().int(),
  suggestedPrice: z.number().int().nullable(),
  recentSales: z.number().int().nullable(),
});

export const scanParamsSchema = z.object({
  gameId: z.string(),
  level: z.string(),
  priceFrom: z.number().int(),
  priceTo: z.number().int(),
  commissionRate: z.number(),
  segments: z.number().int().positive(),
});

export const checkpointStateSchema = z.object({
  listings: z.array(listingSchema).default([]),
});

export type ScanParams = z.infer<typeof scanParamsSchema>;
export type CheckpointState = z.infer<typeof checkpointStateSchema>;

/**
 * Durable progress of one tier scan. `cursor` is the count of leading segments known to
 * be complete; `state.listings` holds what those segments returned.
 */
export interface ScanCheckpoint {
  scanId: string;
  tierKey: string;
  cursor: string;
  /** Listings collected so far, i.e. `state.listings.length`. */
  processedItems: number;
  params: ScanParams;
  state: CheckpointState;
  updatedAt: Date;
}

export interface CheckpointStore {
  /** Insert or replace by scanId. */
  save(checkpoint: ScanCheckpoint): Promise<void>;
  load(scanId: string): Promise<ScanCheckpoint | null>;
  delete(scanId: string): Promise<void>;
  /** Delete checkpoints not updated within `maxAgeMs`. Returns the number removed. */
  purgeOlderThan(maxAgeMs: number): Promise<number>;
  /** Most recently updated checkpoint for a tier, if any. */
  findLatest(tierKey: string): Promise<ScanCheckpoint | null>;
}

export function sameParams(a: ScanParams, b: ScanParams): boolean {
  return (
    a.gameId === b.gameId &&
    a.level === b.level &&
    a.priceFrom === b.priceFrom &&
    a.priceTo === b.priceTo &&
    a.commissionRate === b.commissionRate &&
    a.segments === b.segments
  );
}
