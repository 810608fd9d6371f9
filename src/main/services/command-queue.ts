/**
 * Single-consumer serialization point. Tasks run strictly one after another in
 * submission order; a rejected task does not stop the ones queued behind it.
 */
export class CommandQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  public run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(async () => {
      try {
        return await task();
      } finally {
        this.pending -= 1;
      }
    });

    // The chain itself must never reject, callers observe failures through `result`.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );

    return result;
  }

  public get size(): number {
    return this.pending;
  }

  public async drain(): Promise<void> {
    await this.tail;
  }
}
