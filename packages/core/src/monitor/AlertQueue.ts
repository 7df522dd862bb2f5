import { DEFAULT_ALERT_CAPACITY } from '@rexec/shared';
import type { Alert } from '@rexec/shared';

/**
 * Fixed-capacity ring of alerts. Pushing into a full queue overwrites the
 * oldest alert and bumps `dropped`; it never blocks or throws.
 */
export class AlertQueue {
  readonly capacity: number;
  private readonly buffer: Array<Alert | undefined>;
  private head: number = 0;
  private count: number = 0;
  private droppedCount: number = 0;

  constructor(capacity: number = DEFAULT_ALERT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Alert queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buffer = new Array<Alert | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  /** Alerts overwritten since the queue was created. Never decreases. */
  get dropped(): number {
    return this.droppedCount;
  }

  /**
   * Append an alert. Returns the alert it displaced, if the queue was full.
   */
  push(alert: Alert): Alert | undefined {
    if (this.count < this.capacity) {
      this.buffer[(this.head + this.count) % this.capacity] = alert;
      this.count++;
      return undefined;
    }

    const displaced = this.buffer[this.head];
    this.buffer[this.head] = alert;
    this.head = (this.head + 1) % this.capacity;
    this.droppedCount++;
    return displaced;
  }

  /** Oldest first, without removing anything. */
  snapshot(): Alert[] {
    const alerts: Alert[] = [];
    for (let i = 0; i < this.count; i++) {
      const alert = this.buffer[(this.head + i) % this.capacity];
      if (alert) {
        alerts.push(alert);
      }
    }
    return alerts;
  }

  /** Remove and return every alert, oldest first. */
  drain(): Alert[] {
    const alerts = this.snapshot();
    this.buffer.fill(undefined);
    this.head = 0;
    this.count = 0;
    return alerts;
  }

  latest(): Alert | undefined {
    if (this.count === 0) {
      return undefined;
    }
    return this.buffer[(this.head + this.count - 1) % this.capacity];
  }
}
