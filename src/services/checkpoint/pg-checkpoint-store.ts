import pino from 'pino';
import { z } from 'zod';
import { CheckpointError } from '../../utils/errors.js';
import {
  checkpointStateSchema,
  scanParamsSchema,
  type CheckpointStore,
  type ScanCheckpoint,
} from './types.js';

const log = pino({ name: 'pg-checkpoint-store' });

/** The slice of pg's Pool this store uses. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

const rowSchema = z.object({
  scan_id: z.string(),
  tier_key: z.string(),
  cursor: z.string(),
  processed_items: z.coerce.number().int(),
  params: scanParamsSchema,
  state: checkpointStateSchema,
  updated_at: z.coerce.date(),
});

const COLUMNS = 'scan_id, tier_key, cursor, processed_items, params, state, updated_at';

function toCheckpoint(row: unknown, scanId: string): ScanCheckpoint {
  const parsed = rowSchema.safeParse(row);
  if (!parsed.success) {
    throw new CheckpointError('decode', scanId, parsed.error);
  }
  const r = parsed.data;
  return {
    scanId: r.scan_id,
    tierKey: r.tier_key,
    cursor: r.cursor,
    processedItems: r.processed_items,
    params: r.params,
    state: r.state,
    updatedAt: r.updated_at,
  };
}

/**
 * Checkpoints in the `scan_checkpoints` table. Rows are validated on the way out, so a
 * row written by an incompatible version surfaces as CheckpointError rather than bad state.
 */
export class PgCheckpointStore implements CheckpointStore {
  constructor(private readonly db: Queryable) {}

  async save(checkpoint: ScanCheckpoint): Promise<void> {
    try {
      await this.db.query(
        `INSERT INTO scan_checkpoints (scan_id, tier_key, cursor, processed_items, params, state, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         ON CONFLICT (scan_id) DO UPDATE SET
           cursor = EXCLUDED.cursor,
           processed_items = EXCLUDED.processed_items,
           params = EXCLUDED.params,
           state = EXCLUDED.state,
           updated_at = EXCLUDED.updated_at`,
        [
          checkpoint.scanId,
          checkpoint.tierKey,
          checkpoint.cursor,
          checkpoint.processedItems,
          JSON.stringify(checkpoint.params),
          JSON.stringify(checkpoint.state),
          checkpoint.updatedAt,
        ],
      );
    } catch (error) {
      throw new CheckpointError('save', checkpoint.scanId, error);
    }
  }

  async load(scanId: string): Promise<ScanCheckpoint | null> {
    let rows: unknown[];
    try {
      ({ rows } = await this.db.query(`SELECT ${COLUMNS} FROM scan_checkpoints WHERE scan_id = $1`, [scanId]));
    } catch (error) {
      throw new CheckpointError('load', scanId, error);
    }
    return rows.length > 0 ? toCheckpoint(rows[0], scanId) : null;
  }

  async delete(scanId: string): Promise<void> {
    try {
      await this.db.query('DELETE FROM scan_checkpoints WHERE scan_id = $1', [scanId]);
    } catch (error) {
      throw new CheckpointError('delete', scanId, error);
    }
  }

  async purgeOlderThan(maxAgeMs: number): Promise<number> {
    const cutoff = new Date(Date.now() - maxAgeMs);
    try {
      const result = await this.db.query('DELETE FROM scan_checkpoints WHERE updated_at < $1', [cutoff]);
      const count = result.rowCount || 0;
      if (count > 0) {
        log.info({ purged: count, cutoff: cutoff.toISOString() }, 'Purged stale checkpoints');
      }
      return count;
    } catch (error) {
      throw new CheckpointError('purge', '*', error);
    }
  }

  async findLatest(tierKey: string): Promise<ScanCheckpoint | null> {
    let rows: unknown[];
    try {
      ({ rows } = await this.db.query(
        `SELECT ${COLUMNS} FROM scan_checkpoints
         WHERE tier_key = $1
         ORDER BY updated_at DESC
         LIMIT 1`,
        [tierKey],
      ));
    } catch (error) {
      throw new CheckpointError('findLatest', tierKey, error);
    }
    return rows.length > 0 ? toCheckpoint(rows[0], tierKey) : null;
  }
}
