import type { EventBatch, EventSink } from './types.js';

/** Holds committed batches until the service hands them to the event log. */
export class PendingEventSink implements EventSink {
  private batches: EventBatch[] = [];

  publish(batch: EventBatch): void {
    this.batches.push(batch);
  }

  drain(): EventBatch[] {
    const drained = this.batches;
    this.batches = [];
    return drained;
  }

  size(): number {
    return this.batches.length;
  }
}
