import { RenderProgress } from '../types';
import { FrameRenderError, OutputError, RenderCancelledError } from '../utils/errors';

/** Holds out-of-order results until every earlier index has arrived. */
export class ReorderBuffer<T> {
  private pending = new Map<number, T>();
  private nextIndex: number;

  constructor(start = 0) {
    this.nextIndex = start;
  }

  get next(): number {
    return this.nextIndex;
  }

  get size(): number {
    return this.pending.size;
  }

  put(index: number, value: T) {
    if (index < this.nextIndex || this.pending.has(index)) {
      throw new OutputError(`Frame ${index} was produced twice`);
    }
    this.pending.set(index, value);
  }

  /** Removes and returns the run of consecutive results starting at `next`. */
  takeReady(): { index: number; value: T }[] {
    const ready: { index: number; value: T }[] = [];
    while (this.pending.has(this.nextIndex)) {
      const index = this.nextIndex;
      const value = this.pending.get(index);
      this.pending.delete(index);
      if (value !== undefined) ready.push({ index, value });
      this.nextIndex++;
    }
    return ready;
  }
}

export interface ScheduleOptions {
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: (progress: RenderProgress) => void;
}

const asFrameError = (frameIndex: number, error: unknown) => {
  return error instanceof FrameRenderError ? error : new FrameRenderError(frameIndex, error);
};

/**
 * Computes frames 0..totalFrames-1 with up to `concurrency` in flight and
 * writes them strictly in ascending order. Stops at the first failure;
 * cancellation is only noticed between frames.
 */
export const renderInOrder = async <T>(
  totalFrames: number,
  compute: (frameIndex: number) => T | Promise<T>,
  write: (frameIndex: number, value: T) => Promise<void>,
  options: ScheduleOptions = {}
): Promise<number> => {
  const concurrency = options.concurrency ?? 1;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new OutputError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const buffer = new ReorderBuffer<T>();
  let nextToCompute = 0;
  let written = 0;
  let stopped = false;
  let cancelled = false;
  let failure: { error: unknown } | undefined;
  let writing: Promise<void> = Promise.resolve();

  const flushReady = () => {
    writing = writing.then(async () => {
      for (const { index, value } of buffer.takeReady()) {
        if (stopped) return;
        try {
          await write(index, value);
        } catch (err) {
          throw asFrameError(index, err);
        }
        written++;
        options.onProgress?.({ frameIndex: index, totalFrames, status: `Rendering Frame ${index + 1}/${totalFrames}` });
      }
    });
    return writing;
  };

  const worker = async () => {
    while (!stopped && nextToCompute < totalFrames) {
      if (options.signal?.aborted) {
        cancelled = true;
        stopped = true;
        return;
      }
      const frameIndex = nextToCompute++;
      let value: T;
      try {
        value = await compute(frameIndex);
      } catch (err) {
        throw asFrameError(frameIndex, err);
      }
      buffer.put(frameIndex, value);
      await flushReady();
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, totalFrames) }, () =>
    worker().catch((error: unknown) => {
      stopped = true;
      failure ??= { error };
    })
  );
  await Promise.all(workers);

  if (failure) throw failure.error;
  if (cancelled) throw new RenderCancelledError(written);
  return written;
};
