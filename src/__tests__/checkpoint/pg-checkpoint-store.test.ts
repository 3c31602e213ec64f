import { describe, expect, it, vi } from 'vitest';
import { PgCheckpointStore, type Queryable } from '../../services/checkpoint/pg-checkpoint-store.js';
import type { ScanCheckpoint } from '../../services/checkpoint/types.js';
import { CheckpointError } from '../../utils/errors.js';

vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const updatedAt = new Date('2026-01-10T12:00:00Z');

const checkpoint: ScanCheckpoint = {
  scanId: 'scan-1',
  tierKey: 'csgo:medium',
  cursor: '2',
  processedItems: 2,
  params: { gameId: 'a8db', level: 'medium', priceFrom: 1000, priceTo: 3000, commissionRate: 0.07, segments: 4 },
  state: { listings: [] },
  updatedAt,
};

function row(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    scan_id: 'scan-1',
    tier_key: 'csgo:medium',
    cursor: '2',
    processed_items: '2',
    params: checkpoint.params,
    state: { listings: [] },
    updated_at: updatedAt.toISOString(),
    ...overrides,
  };
}

function fakeDb(result: { rows: unknown[]; rowCount: number | null } = { rows: [], rowCount: 0 }) {
  const query = vi.fn<Queryable['query']>().mockResolvedValue(result);
  const db: Queryable = { query };
  return { db, query };
}

describe('PgCheckpointStore', () => {
  it('upserts with serialized params and state', async () => {
    const { db, query } = fakeDb();
    await new PgCheckpointStore(db).save(checkpoint);

    const [sql, values] = query.mock.calls[0];
    expect(sql).toContain('ON CONFLICT (scan_id) DO UPDATE');
    expect(values).toEqual([
      'scan-1',
      'csgo:medium',
      '2',
      2,
      JSON.stringify(checkpoint.params),
      '{"listings":[]}',
      updatedAt,
    ]);
  });

  it('decodes a stored row', async () => {
    const { db, query } = fakeDb({ rows: [row()], rowCount: 1 });

    await expect(new PgCheckpointStore(db).load('scan-1')).resolves.toEqual(checkpoint);
    expect(query.mock.calls[0][1]).toEqual(['scan-1']);
  });

  it('returns null when no row matches', async () => {
    const { db } = fakeDb();
    await expect(new PgCheckpointStore(db).findLatest('csgo:medium')).resolves.toBeNull();
  });

  it('rejects a row that does not decode', async () => {
    const { db } = fakeDb({ rows: [row({ params: { gameId: 'a8db' } })], rowCount: 1 });

    await expect(new PgCheckpointStore(db).load('scan-1')).rejects.toBeInstanceOf(CheckpointError);
  });

  it('purges with a cutoff date and returns the row count', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-10T00:00:00Z'));
    const { db, query } = fakeDb({ rows: [], rowCount: 3 });

    const removed = await new PgCheckpointStore(db).purgeOlderThan(86_400_000);

    expect(removed).toBe(3);
    expect(query.mock.calls[0][1]).toEqual([new Date('2026-01-09T00:00:00Z')]);
    vi.useRealTimers();
  });

  it('wraps driver errors in CheckpointError', async () => {
    const query = vi.fn<Queryable['query']>().mockRejectedValue(new Error('connection terminated'));
    const store = new PgCheckpointStore({ query });

    await expect(store.save(checkpoint)).rejects.toThrow(
      'Checkpoint save failed for scan scan-1: connection terminated',
    );
  });
});
