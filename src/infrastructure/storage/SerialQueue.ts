/**
 * Runs async tasks one at a time, in the order they were queued.
 *
 * Each store owns one queue so that a read-modify-write of its files
 * never interleaves with another. A task must not queue onto the same
 * queue it is running on, or it waits on itself.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The caller gets the rejection; the queue moves on to the next task
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
