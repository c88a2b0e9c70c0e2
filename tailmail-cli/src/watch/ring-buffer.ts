export interface RingBuffer<T> {
  push(item: T): void;
  /** Oldest first. Does not modify the buffer. */
  snapshot(): T[];
  size(): number;
  clear(): void;
}

export function createRingBuffer<T>(capacity: number): RingBuffer<T> {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`ring buffer capacity must be a positive integer, got ${capacity}`);
  }

  const buffer: T[] = [];
  let writeIndex = 0;

  return {
    push(item: T): void {
      if (buffer.length < capacity) {
        buffer.push(item);
      } else {
        buffer[writeIndex] = item;
      }
      writeIndex = (writeIndex + 1) % capacity;
    },

    snapshot(): T[] {
      if (buffer.length < capacity) return [...buffer];

      const result: T[] = [];
      for (let i = 0; i < capacity; i++) {
        result.push(buffer[(writeIndex + i) % capacity]);
      }
      return result;
    },

    size(): number {
      return buffer.length;
    },

    clear(): void {
      buffer.length = 0;
      writeIndex = 0;
    },
  };
}
