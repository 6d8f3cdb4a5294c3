const INITIAL_CAPACITY = 64 * 1024;

/**
 * Append-only byte accumulator for one session. Storage doubles on demand, so
 * `append` is amortised O(1); draining shifts the retained tail to the front.
 */
export class AudioBuffer {
  private bytes = new Uint8Array(0);
  private size = 0;

  get length(): number {
    return this.size;
  }

  append(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    this.ensureCapacity(this.size + chunk.length);
    this.bytes.set(chunk, this.size);
    this.size += chunk.length;
  }

  /**
   * Copy of the current contents. Later appends do not show up in it.
   */
  snapshot(): Uint8Array {
    return this.bytes.slice(0, this.size);
  }

  /**
   * Drop the first `byteCount` bytes, keeping whatever arrived after them.
   */
  drain(byteCount: number): void {
    const n = Math.max(0, Math.min(byteCount, this.size));
    if (n === 0) return;
    if (n === this.size) {
      this.clear();
      return;
    }
    this.bytes.copyWithin(0, n, this.size);
    this.size -= n;
  }

  drainAll(): Uint8Array {
    const out = this.snapshot();
    this.clear();
    return out;
  }

  clear(): void {
    // Release large backing stores so an idle session does not pin memory.
    this.bytes = new Uint8Array(0);
    this.size = 0;
  }

  private ensureCapacity(needed: number) {
    if (needed <= this.bytes.length) return;
    let capacity = Math.max(this.bytes.length, INITIAL_CAPACITY);
    while (capacity < needed) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.bytes.subarray(0, this.size), 0);
    this.bytes = next;
  }
}
