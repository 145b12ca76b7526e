const encoder = new TextEncoder();

/** Growable in-memory byte sink for emitted code. */
export class OutputBuffer {
  #bytes: Uint8Array;
  #length = 0;

  constructor(initialCapacity: number = 512 * 1024) {
    this.#bytes = new Uint8Array(Math.max(0, Math.floor(initialCapacity)));
  }

  get length(): number {
    return this.#length;
  }

  get capacity(): number {
    return this.#bytes.length;
  }

  write(text: string): void {
    const data = encoder.encode(text);
    this.#ensureCapacity(this.#length + data.length);
    this.#bytes.set(data, this.#length);
    this.#length += data.length;
  }

  /** Copy of the written bytes. */
  toBytes(): Uint8Array {
    return this.#bytes.slice(0, this.#length);
  }

  #ensureCapacity(size: number): void {
    if (size <= this.#bytes.length) return;
    let capacity = Math.max(this.#bytes.length * 2, 256);
    while (capacity < size) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.#bytes.subarray(0, this.#length));
    this.#bytes = next;
  }
}
