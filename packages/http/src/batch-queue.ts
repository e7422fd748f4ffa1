import { BatchInProgressError, type RequestSpec } from './types.js';

/**
 * Ordered collection of requests waiting for a batch run.
 *
 * Append-only until a run drains it. While a run is in progress the queue
 * rejects `add`, and it is empty again once the run ends, whether the run
 * finished or a hook aborted it. The same RequestSpec may be added more than
 * once; each entry is retried on its own budget.
 */
export class BatchQueue {
  private items: RequestSpec[] = [];
  private running = false;

  add(request: RequestSpec): this {
    if (this.running) {
      throw new BatchInProgressError();
    }
    this.items.push(request);
    return this;
  }

  get size(): number {
    return this.items.length;
  }

  get isRunning(): boolean {
    return this.running;
  }

  toArray(): readonly RequestSpec[] {
    return [...this.items];
  }

  /**
   * Hand the current contents to a run and lock the queue until `release`.
   */
  acquire(): RequestSpec[] {
    if (this.running) {
      throw new BatchInProgressError();
    }
    const drained = this.items;
    this.items = [];
    this.running = true;
    return drained;
  }

  release(): void {
    this.items = [];
    this.running = false;
  }

  clear(): void {
    if (this.running) {
      throw new BatchInProgressError();
    }
    this.items = [];
  }
}
