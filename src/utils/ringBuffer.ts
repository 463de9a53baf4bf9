export class RingBuffer<T> {
  private readonly values: T[] = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error("RingBuffer capacity must be an integer >= 1");
    }
  }

  push(value: T): void {
    this.values.push(value);
    if (this.values.length > this.capacity) {
      this.values.shift();
    }
  }

  /** Most recent `n` values, oldest first. */
  lastN(n: number): T[] {
    if (n <= 0) return [];
    return this.values.slice(-n);
  }

  toArray(): T[] {
    return [...this.values];
  }

  first(): T | undefined {
    return this.values[0];
  }

  last(): T | undefined {
    return this.values[this.values.length - 1];
  }

  get length(): number {
    return this.values.length;
  }
}
