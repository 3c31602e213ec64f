import type { CheckpointStore, ScanCheckpoint } from './types.js';

function copy(checkpoint: ScanCheckpoint): ScanCheckpoint {
  return {
    ...checkpoint,
    params: { ...checkpoint.params },
    state: { listings: checkpoint.state.listings.map((listing) => ({ ...listing })) },
    updatedAt: new Date(checkpoint.updatedAt.getTime()),
  };
}

/** Process-local checkpoint store. Progress does not survive a restart. */
export class MemoryCheckpointStore implements CheckpointStore {
  private readonly checkpoints = new Map<string, ScanCheckpoint>();

  async save(checkpoint: ScanCheckpoint): Promise<void> {
    this.checkpoints.set(checkpoint.scanId, copy(checkpoint));
  }

  async load(scanId: string): Promise<ScanCheckpoint | null> {
    const found = this.checkpoints.get(scanId);
    return found ? copy(found) : null;
  }

  async delete(scanId: string): Promise<void> {
    this.checkpoints.delete(scanId);
  }

  async purgeOlderThan(maxAgeMs: number): Promise<number> {
    const cutoff = Date.now() - maxAgeMs;
    let removed = 0;
    for (const [scanId, checkpoint] of this.checkpoints) {
      if (checkpoint.updatedAt.getTime() < cutoff) {
        this.checkpoints.delete(scanId);
        removed++;
      }
    }
    return removed;
  }

  async findLatest(tierKey: string): Promise<ScanCheckpoint | null> {
    let latest: ScanCheckpoint | null = null;
    for (const checkpoint of this.checkpoints.values()) {
      if (checkpoint.tierKey !== tierKey) continue;
      if (!latest || checkpoint.updatedAt.getTime() > latest.updatedAt.getTime()) {
        latest = checkpoint;
      }
    }
    return latest ? copy(latest) : null;
  }

  size(): number {
    return this.checkpoints.size;
  }
}
