/**
 * Crawling Queue
 * FIFO frontier for breadth-first traversal with O(1) membership checks
 */

export class CrawlingQueue {
  private queue: string[] = [];
  private urlSet: Set<string> = new Set();

  constructor(initial: string[] = []) {
    initial.forEach((url) => this.enqueue(url));
  }

  /**
   * Add URL to the back of the queue; false when already queued
   */
  enqueue(url: string): boolean {
    if (this.urlSet.has(url)) {
      return false;
    }

    this.queue.push(url);
    this.urlSet.add(url);
    return true;
  }

  /**
   * Take the URL at the front of the queue
   */
  dequeue(): string | null {
    const url = this.queue.shift();
    if (url === undefined) {
      return null;
    }

    this.urlSet.delete(url);
    return url;
  }

  isEmpty(): boolean {
    return this.queue.length === 0;
  }
}
