import type { TriggerEvent } from '@auditray/shared';
import { createLogger } from '../logging/logger.js';

const log = createLogger('triggers');

/**
 * Unbounded multi-producer, single-consumer queue of trigger events.
 *
 * Producers (the watcher, the display) call `send` and never wait. The
 * coordinator is the only reader: it awaits `receive` and uses `drain` to
 * collapse whatever else has piled up. The channel itself never drops an
 * event; collapsing is the reader's decision.
 */
export class TriggerChannel {
  private readonly queue: TriggerEvent[] = [];
  private waiter: ((event: TriggerEvent | null) => void) | null = null;
  private closed = false;

  /** Queue `event`. Ignored (and logged) once the channel is closed. */
  send(event: TriggerEvent): void {
    if (this.closed) {
      log.debug(`dropped "${event}" after close`);
      return;
    }

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(event);
      return;
    }

    this.queue.push(event);
  }

  /**
   * Resolve with the oldest queued event, waiting for one if the queue is
   * empty. Resolves `null` once the channel is closed and nothing is left.
   */
  receive(): Promise<TriggerEvent | null> {
    const next = this.queue.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);
    if (this.waiter) {
      return Promise.reject(new Error('TriggerChannel already has a pending receiver'));
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Discard every queued event without waiting. Returns how many were discarded. */
  drain(): number {
    const count = this.queue.length;
    this.queue.length = 0;
    return count;
  }

  /** Number of events waiting to be received. */
  get pending(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Stop accepting events and wake a waiting receiver with `null`. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const waiter = this.waiter;
    if (waiter && this.queue.length === 0) {
      this.waiter = null;
      waiter(null);
    }
  }
}
