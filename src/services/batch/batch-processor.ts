import Bottleneck from 'bottleneck';
import pino from 'pino';
import { getErrorMessage, type Result } from '../../utils/errors.js';

const log = pino({ name: 'batch-processor' });

export interface BatchProgress {
  /** Items finished in this run, successes and failures. */
  processed: number;
  /** Items this run set out to process (from startIndex). */
  total: number;
  succeeded: number;
  failed: number;
  /** Absolute index of the first item not known to be finished. */
  cursor: number;
}

export interface BatchSuccess<T, R> {
  index: number;
  item: T;
  value: R;
}

export interface BatchFailure<T, E> {
  index: number;
  item: T;
  error: E | Error;
}

export interface BatchCheckpoint<T, R> {
  cursor: number;
  processed: number;
  /** Successes below the cursor, in index order. */
  successes: BatchSuccess<T, R>[];
  final: boolean;
}

export interface BatchCheckpointOptions<T, R> {
  everyItems: number;
  intervalMs: number;
  write: (checkpoint: BatchCheckpoint<T, R>) => Promise<void>;
}

export interface BatchOptions<T, R> {
  chunkSize: number;
  maxConcurrency: number;
  startIndex?: number;
  signal?: AbortSignal;
  onProgress?: (progress: BatchProgress) => void;
  checkpoint?: BatchCheckpointOptions<T, R>;
}

export interface BatchResult<T, R, E> {
  successes: BatchSuccess<T, R>[];
  failures: BatchFailure<T, E>[];
  /** Failed after cancellation; not counted as processed, so a resume retries them. */
  interrupted: BatchFailure<T, E>[];
  processed: number;
  cursor: number;
  cancelled: boolean;
}

export type ProcessFn<T, R, E> = (item: T, index: number, signal: AbortSignal) => Promise<Result<R, E>>;

interface Chunk<T> {
  start: number;
  items: T[];
}

function byIndex(a: { index: number }, b: { index: number }): number {
  return a.index - b.index;
}

function chunkFrom<T>(items: T[], startIndex: number, size: number): Chunk<T>[] {
  const chunks: Chunk<T>[] = [];
  for (let i = startIndex; i < items.length; i += size) {
    chunks.push({ start: i, items: items.slice(i, i + size) });
  }
  return chunks;
}

/**
 * Runs items through `processFn` in chunks with bounded chunk concurrency. Items within a
 * chunk run in input order. Per-item errors are collected, never thrown.
 */
export class BatchProcessor {
  constructor(private readonly name = 'batch') {}

  async run<T, R, E>(
    items: T[],
    processFn: ProcessFn<T, R, E>,
    options: BatchOptions<T, R>,
  ): Promise<BatchResult<T, R, E>> {
    const { chunkSize, maxConcurrency, onProgress, checkpoint } = options;
    if (chunkSize < 1 || maxConcurrency < 1) {
      throw new Error('chunkSize and maxConcurrency must be at least 1');
    }

    const startIndex = Math.min(Math.max(0, options.startIndex ?? 0), items.length);
    const total = items.length - startIndex;
    const successes: BatchSuccess<T, R>[] = [];
    const failures: BatchFailure<T, E>[] = [];
    const interrupted: BatchFailure<T, E>[] = [];
    const finished = new Array<boolean>(items.length).fill(false);
    let cursor = startIndex;
    let processed = 0;

    // One controller per run so processFn always gets a signal, linked to the caller's
    const controller = new AbortController();
    const onAbort = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) controller.abort(options.signal.reason);
    else options.signal?.addEventListener('abort', onAbort, { once: true });
    const signal = controller.signal;

    const limiter = new Bottleneck({ maxConcurrent: maxConcurrency });
    const stopLimiter = () => {
      limiter.stop({ dropWaitingJobs: true }).catch((error: unknown) => {
        log.warn({ batch: this.name, err: getErrorMessage(error) }, 'Failed to stop chunk scheduler');
      });
    };
    signal.addEventListener('abort', stopLimiter, { once: true });

    // --- Checkpointing: writes are chained, and a written cursor never moves back ---
    let writeChain: Promise<void> = Promise.resolve();
    let lastQueuedCursor = startIndex;
    let lastWrittenCursor = startIndex;
    let processedAtLastWrite = 0;
    let lastWriteAt = Date.now();

    const queueCheckpoint = (final: boolean) => {
      if (!checkpoint) return;
      const due =
        final ||
        processed - processedAtLastWrite >= checkpoint.everyItems ||
        Date.now() - lastWriteAt >= checkpoint.intervalMs;
      if (!due || (!final && cursor <= lastQueuedCursor)) return;

      const snapshot: BatchCheckpoint<T, R> = {
        cursor,
        processed,
        successes: successes.filter((s) => s.index < cursor).sort(byIndex),
        final,
      };
      lastQueuedCursor = cursor;
      processedAtLastWrite = processed;
      lastWriteAt = Date.now();

      writeChain = writeChain.then(async () => {
        if (snapshot.final ? snapshot.cursor < lastWrittenCursor : snapshot.cursor <= lastWrittenCursor) {
          return;
        }
        try {
          await checkpoint.write(snapshot);
          lastWrittenCursor = snapshot.cursor;
        } catch (error) {
          log.warn(
            { batch: this.name, cursor: snapshot.cursor, err: getErrorMessage(error) },
            'Checkpoint write failed, will retry on next chunk',
          );
          lastQueuedCursor = lastWrittenCursor;
          lastWriteAt = 0;
        }
      });
    };

    const markFinished = (index: number) => {
      finished[index] = true;
      processed++;
      while (cursor < items.length && finished[cursor]) cursor++;
    };

    const reportProgress = () => {
      if (!onProgress) return;
      try {
        onProgress({ processed, total, succeeded: successes.length, failed: failures.length, cursor });
      } catch (error) {
        log.warn({ batch: this.name, err: getErrorMessage(error) }, 'Progress callback threw');
      }
    };

    const runChunk = async (chunk: Chunk<T>): Promise<void> => {
      for (let offset = 0; offset < chunk.items.length; offset++) {
        if (signal.aborted) break;
        const index = chunk.start + offset;
        const item = chunk.items[offset];

        let outcome: Result<R, E | Error>;
        try {
          outcome = await processFn(item, index, signal);
        } catch (error) {
          outcome = {
            success: false,
            error: error instanceof Error ? error : new Error(getErrorMessage(error)),
          };
        }

        if (outcome.success) {
          successes.push({ index, item, value: outcome.data });
          markFinished(index);
        } else if (signal.aborted) {
          interrupted.push({ index, item, error: outcome.error });
        } else {
          failures.push({ index, item, error: outcome.error });
          markFinished(index);
        }
      }

      reportProgress();
      queueCheckpoint(false);
    };

    const chunks = chunkFrom(items, startIndex, chunkSize);
    log.debug(
      { batch: this.name, items: total, chunks: chunks.length, chunkSize, maxConcurrency, startIndex },
      'Batch run starting',
    );

    await Promise.all(
      chunks.map((chunk) =>
        limiter.schedule(() => runChunk(chunk)).catch((error: unknown) => {
          // Waiting chunks are dropped when the limiter stops on cancellation
          if (!signal.aborted) {
            log.error({ batch: this.name, start: chunk.start, err: getErrorMessage(error) }, 'Chunk scheduling failed');
          }
        }),
      ),
    );

    options.signal?.removeEventListener('abort', onAbort);
    signal.removeEventListener('abort', stopLimiter);

    const cancelled = signal.aborted;
    if (cancelled || cursor > lastQueuedCursor) {
      queueCheckpoint(true);
    }
    await writeChain;

    if (cancelled) {
      log.info(
        { batch: this.name, processed, cursor, interrupted: interrupted.length },
        'Batch run cancelled',
      );
    }

    return {
      successes: successes.sort(byIndex),
      failures: failures.sort(byIndex),
      interrupted: interrupted.sort(byIndex),
      processed,
      cursor,
      cancelled,
    };
  }
}
