/**
 * FIFO mutex for async critical sections.
 *
 * Sections run one at a time in the order `runExclusive` was called. A
 * section that rejects passes its error to its own caller and releases the
 * lock for the next one.
 */
export class Mutex {
  private tail: Promise<unknown> = Promise.resolve();

  runExclusive<T>(section: () => Promise<T>): Promise<T> {
    const result = this.tail.then(section);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
