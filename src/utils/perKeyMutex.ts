// Per-key async mutex for serializing functions by key
export class PerKeyMutex {
  private tails = new Map<string, Promise<unknown>>();

  async acquire<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    // Tails never reject, so a failed holder still releases the next caller
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  // Get current lock status for debugging
  getLockStatus(): Record<string, boolean> {
    const status: Record<string, boolean> = {};
    for (const key of this.tails.keys()) {
      status[key] = true;
    }
    return status;
  }
}
