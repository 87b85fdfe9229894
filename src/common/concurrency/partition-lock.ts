import { Injectable } from '@nestjs/common';

/**
 * In-process mutual exclusion keyed by partition. Work for the same key runs
 * strictly one after another; different keys do not wait on each other.
 */
@Injectable()
export class PartitionLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(() => work());
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}
