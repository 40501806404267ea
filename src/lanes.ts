import { LANE_QUEUE_LIMIT } from './config.js';
import { BackpressureError, errorMessage } from './errors.js';
import { logger } from './logger.js';

type Job<T> = () => Promise<T>;

interface QueuedJob {
  run: () => Promise<void>;
}

interface Lane {
  queue: QueuedJob[];
  running: boolean;
}

/**
 * One FIFO lane per thread id. Jobs in a lane run strictly one after
 * another; different lanes run concurrently. A lane holds at most
 * `limit` pending jobs (not counting the running one).
 */
export class ThreadLanes {
  private readonly lanes = new Map<string, Lane>();
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly limit: number = LANE_QUEUE_LIMIT) {}

  /**
   * Queue `job` on the thread's lane. Rejects immediately with
   * BackpressureError when the lane is full.
   */
  enqueue<T>(threadId: string, job: Job<T>): Promise<T> {
    const lane = this.lanes.get(threadId) ?? this.openLane(threadId);
    if (lane.queue.length >= this.limit) {
      logger.warn({ threadId, pending: lane.queue.length }, 'Lane full, rejecting message');
      return Promise.reject(new BackpressureError(threadId, this.limit));
    }

    return new Promise<T>((resolve, reject) => {
      lane.queue.push({
        run: () => Promise.resolve().then(job).then(resolve, reject),
      });
      this.pump(threadId, lane);
    });
  }

  pending(threadId: string): number {
    return this.lanes.get(threadId)?.queue.length ?? 0;
  }

  isBusy(threadId: string): boolean {
    return this.lanes.get(threadId)?.running ?? false;
  }

  get activeLanes(): number {
    return this.lanes.size;
  }

  /** Resolves once every lane has run dry. */
  drain(): Promise<void> {
    if (this.lanes.size === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private openLane(threadId: string): Lane {
    const lane: Lane = { queue: [], running: false };
    this.lanes.set(threadId, lane);
    return lane;
  }

  private pump(threadId: string, lane: Lane): void {
    if (lane.running) return;
    const next = lane.queue.shift();
    if (!next) {
      this.lanes.delete(threadId);
      if (this.lanes.size === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const wake of waiters) wake();
      }
      return;
    }

    lane.running = true;
    next
      .run()
      .catch((err: unknown) => {
        // run() forwards job errors to the caller; this only fires on a bug here
        logger.error({ threadId, err: errorMessage(err) }, 'Lane job crashed');
      })
      .finally(() => {
        lane.running = false;
        this.pump(threadId, lane);
      });
  }
}
