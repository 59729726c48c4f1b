/**
 * In-process mutual exclusion for read-modify-write sequences on a file.
 * Offers no protection against other processes editing the same file.
 */
export class FileLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  public get locked(): boolean {
    return this.pending > 0;
  }

  public async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    this.pending += 1;
    try {
      await previous;
      return await task();
    } finally {
      this.pending -= 1;
      release();
    }
  }
}
