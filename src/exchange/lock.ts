/**
 * Exchange Module - FIFO Lock
 *
 * Promise-chain mutex: waiters are released strictly in arrival order.
 */
export class FifoLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /** Callers holding or queued for the lock */
  get queueLength(): number {
    return this.waiting;
  }

  /**
   * Run `task` once every earlier caller has finished, including their
   * cleanup.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const previous = this.tail;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    this.waiting += 1;
    try {
      await previous;
      return await task();
    } finally {
      this.waiting -= 1;
      release();
    }
  }
}
