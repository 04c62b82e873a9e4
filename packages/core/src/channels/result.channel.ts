import type { Status } from '@auditray/shared';

export type StatusConsumer = (status: Status) => void;

/**
 * Single-producer, single-consumer handoff from the coordinator to whatever
 * renders statuses.
 *
 * `publish` only enqueues; delivery happens on a later turn of the event loop
 * so the coordinator never runs display code. Statuses published while no
 * consumer is attached wait in the buffer and are delivered, in order, as
 * soon as one attaches.
 */
export class ResultChannel {
  private readonly buffer: Status[] = [];
  private consumer: StatusConsumer | null = null;
  private flushScheduled = false;

  publish(status: Status): void {
    this.buffer.push(status);
    this.scheduleFlush();
  }

  /** Install the consumer. Throws if one is already attached. */
  attach(consumer: StatusConsumer): void {
    if (this.consumer) {
      throw new Error('ResultChannel already has a consumer');
    }
    this.consumer = consumer;
    this.scheduleFlush();
  }

  /** Remove the consumer; later statuses are buffered until the next attach. */
  detach(): void {
    this.consumer = null;
  }

  /** Statuses published but not yet delivered. */
  get pending(): number {
    return this.buffer.length;
  }

  private scheduleFlush(): void {
    if (this.flushScheduled || !this.consumer || this.buffer.length === 0) return;
    this.flushScheduled = true;
    setImmediate(() => this.flush());
  }

  private flush(): void {
    this.flushScheduled = false;

    while (this.consumer && this.buffer.length > 0) {
      const status = this.buffer.shift();
      if (status === undefined) break;
      this.consumer(status);
    }
  }
}
