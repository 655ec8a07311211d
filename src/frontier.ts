import type { FrontierEntry } from "./types.js";

/**
 * FIFO work queue plus the set of canonical keys already enqueued.
 *
 * `enqueue` checks and records the key in one synchronous step, so two
 * workers sharing the frontier can never both queue the same page.
 */
export class Frontier {
  private readonly queue: FrontierEntry[] = [];
  private head = 0;
  private readonly visited = new Set<string>();

  /**
   * Returns false (and queues nothing) when the key was seen before.
   */
  enqueue(entry: FrontierEntry, key: string): boolean {
    if (this.visited.has(key)) {
      return false;
    }
    this.visited.add(key);
    this.queue.push(entry);
    return true;
  }

  hasSeen(key: string): boolean {
    return this.visited.has(key);
  }

  next(): FrontierEntry | null {
    const entry = this.queue[this.head];
    if (!entry) {
      return null;
    }
    this.head += 1;
    // Drop consumed entries once they dominate the backing array.
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }
    return entry;
  }

  /**
   * Return a dequeued entry to the front of the queue. Its key stays seen.
   */
  putBack(entry: FrontierEntry): void {
    if (this.head > 0) {
      this.head -= 1;
      this.queue[this.head] = entry;
      return;
    }
    this.queue.unshift(entry);
  }

  get pending(): number {
    return this.queue.length - this.head;
  }

  get seen(): number {
    return this.visited.size;
  }
}
