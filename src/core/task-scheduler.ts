import { InvalidInputError, TaskAbortedError } from '../errors/tabula-error.js';

export type Task<T> = () => Promise<T>;

/** Plánovač asynchronních vyhodnocení */
export interface TaskScheduler {
  schedule<T>(task: Task<T>, signal?: AbortSignal): Promise<T>;
  readonly pending: number;
  readonly running: number;
  drain(): Promise<void>;
}

interface QueuedTask {
  start(): void;
}

/**
 * FIFO plánovač s omezeným počtem současně běžících úloh.
 *
 * Zrušení před startem úlohu vyřadí z fronty. Zrušení po startu odmítne
 * promise volajícího, úloha ale doběhne a slot uvolní až po svém dokončení.
 */
export class BoundedTaskScheduler implements TaskScheduler {
  private readonly maxConcurrency: number;
  private readonly queue: QueuedTask[] = [];
  private readonly drainWaiters: Array<() => void> = [];
  private active = 0;

  constructor(maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new InvalidInputError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
    }
    this.maxConcurrency = maxConcurrency;
  }

  /** Úlohy čekající ve frontě */
  get pending(): number {
    return this.queue.length;
  }

  /** Právě běžící úlohy */
  get running(): number {
    return this.active;
  }

  schedule<T>(task: Task<T>, signal?: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new TaskAbortedError(false, signal.reason));
        return;
      }

      let started = false;
      let settled = false;

      const onAbort = (): void => {
        if (settled) return;
        settled = true;
        if (!started) {
          const index = this.queue.indexOf(entry);
          if (index >= 0) this.queue.splice(index, 1);
          this.notifyIfIdle();
        }
        reject(new TaskAbortedError(started, signal?.reason));
      };

      const entry: QueuedTask = {
        start: () => {
          started = true;
          void this.run(task, signal, onAbort, (outcome) => {
            if (settled) return;
            settled = true;
            if (outcome.ok) resolve(outcome.value);
            else reject(outcome.error);
          });
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(entry);
      this.next();
    });
  }

  /** Počká, až fronta i běžící úlohy doběhnou. */
  drain(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  private async run<T>(
    task: Task<T>,
    signal: AbortSignal | undefined,
    onAbort: () => void,
    settle: (outcome: { ok: true; value: T } | { ok: false; error: unknown }) => void,
  ): Promise<void> {
    this.active++;
    try {
      settle({ ok: true, value: await task() });
    } catch (error) {
      settle({ ok: false, error });
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.active--;
      this.next();
    }
  }

  private next(): void {
    while (this.active < this.maxConcurrency) {
      const entry = this.queue.shift();
      if (!entry) break;
      entry.start();
    }
    this.notifyIfIdle();
  }

  private notifyIfIdle(): void {
    if (this.active !== 0 || this.queue.length !== 0) return;
    for (const resolve of this.drainWaiters.splice(0)) {
      resolve();
    }
  }
}
