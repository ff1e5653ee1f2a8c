import PQueue from 'p-queue';

/**
 * Serializes login attempts per user id: a second login for the same
 * user starts only after the first has finished, successfully or not.
 * Different users run independently.
 */
export class AttemptQueue {
  private queues = new Map<string, PQueue>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(key, queue);
    }

    try {
      return await queue.add(fn, { throwOnTimeout: true });
    } finally {
      if (queue.size === 0 && queue.pending === 0) {
        this.queues.delete(key);
      }
    }
  }

  /** Attempts running or waiting for `key` */
  getPending(key: string): number {
    const queue = this.queues.get(key);
    return queue ? queue.size + queue.pending : 0;
  }
}
