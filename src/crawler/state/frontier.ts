import type { FrontierItem } from '../../types.js';

const COMPACT_THRESHOLD = 32;

/**
 * FIFO of internal URLs still to fetch, plus the seen-set of every URL ever
 * enqueued. Membership is checked at enqueue time, so a URL enters the
 * queue at most once per crawl.
 */
export class Frontier {
  private queue: FrontierItem[] = [];
  private head = 0;
  private readonly seen = new Set<string>();
  private readonly waiting = new Set<string>();

  enqueueIfNew(url: string, depth: number): boolean {
    if (this.seen.has(url)) {
      return false;
    }

    this.seen.add(url);
    this.waiting.add(url);
    this.queue.push({ url, depth });
    return true;
  }

  dequeue(): FrontierItem | undefined {
    for (;;) {
      const next = this.queue[this.head];
      if (!next) {
        return undefined;
      }

      this.head += 1;

      if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.queue.length) {
        this.queue.splice(0, this.head);
        this.head = 0;
      }

      // Entries withdrawn by markSeen are skipped.
      if (this.waiting.delete(next.url)) {
        return next;
      }
    }
  }

  /**
   * Records a URL reached some other way (a redirect target). If it is still
   * waiting in the queue it is withdrawn, so it is never fetched again.
   */
  markSeen(url: string): void {
    this.seen.add(url);
    this.waiting.delete(url);
  }

  has(url: string): boolean {
    return this.seen.has(url);
  }

  get pending(): number {
    return this.waiting.size;
  }

  get uniqueCount(): number {
    return this.seen.size;
  }
}
