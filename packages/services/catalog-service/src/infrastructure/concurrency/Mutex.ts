/**
 * Promise-chain mutex. Callers queue in arrival order; a failing critical section
 * releases the lock and rejects only its own caller.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(criticalSection: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });
    this.pending++;

    await previous;
    try {
      return await criticalSection();
    } finally {
      this.pending--;
      release();
    }
  }

  get isLocked(): boolean {
    return this.pending > 0;
  }
}
