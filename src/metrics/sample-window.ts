/**
 * Fixed-capacity ring of numeric samples. Once full, each push overwrites
 * the oldest sample. The mean is kept as a running sum; percentiles sort.
 */
export class SampleWindow {
  private readonly buffer: Float64Array;
  private next = 0;
  private count = 0;
  private sum = 0;

  constructor(readonly capacity = 1000) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Sample window capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Float64Array(capacity);
  }

  push(sample: number): void {
    if (this.count === this.capacity) this.sum -= this.buffer[this.next] ?? 0;
    this.sum += sample;
    this.buffer[this.next] = sample;
    this.next = (this.next + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  get size(): number {
    return this.count;
  }

  /** Samples oldest first. */
  values(): number[] {
    const out: number[] = [];
    const start = this.count < this.capacity ? 0 : this.next;
    for (let i = 0; i < this.count; i++) {
      out.push(this.buffer[(start + i) % this.capacity] ?? 0);
    }
    return out;
  }

  mean(): number {
    return this.count === 0 ? 0 : this.sum / this.count;
  }

  /** Nearest-rank percentile over a sorted copy, index `floor(n * p)`. */
  percentile(p: number): number {
    if (this.count === 0) return 0;
    const sorted = this.values().sort((a, b) => a - b);
    const idx = Math.min(sorted.length - 1, Math.floor(sorted.length * p));
    return sorted[idx] ?? 0;
  }
}
