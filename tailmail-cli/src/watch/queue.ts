import type { Incident } from "./types.js";

export const DEFAULT_QUEUE_SIZE = 5;

export class DeliveryQueue {
  private incidents: Incident[] = [];
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_QUEUE_SIZE) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Returns false, leaving the queue untouched, when it is already full. */
  enqueue(incident: Incident): boolean {
    if (this.isFull()) return false;
    this.incidents.push(incident);
    return true;
  }

  drainAll(): Incident[] {
    const batch = this.incidents;
    this.incidents = [];
    return batch;
  }

  snapshot(): Incident[] {
    return this.incidents.map((incident) => ({ ...incident, lines: [...incident.lines] }));
  }

  isFull(): boolean {
    return this.incidents.length >= this.capacity;
  }

  size(): number {
    return this.incidents.length;
  }
}
