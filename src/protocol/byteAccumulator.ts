/**
 * Growable byte buffer owned by one connection. The codec reads from the
 * front and only ever consumes whole frames (or garbage it resynchronised
 * past); whatever follows stays for the next decode call.
 */
export class ByteAccumulator {
  private buffer: Buffer = Buffer.alloc(0);

  get length(): number {
    return this.buffer.length;
  }

  append(chunk: Uint8Array): void {
    if (chunk.length === 0) {
      return;
    }
    this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
  }

  byteAt(index: number): number | undefined {
    return this.buffer[index];
  }

  indexOf(byte: number, fromIndex = 0): number {
    return this.buffer.indexOf(byte, fromIndex);
  }

  view(start = 0, end = this.buffer.length): Buffer {
    return this.buffer.subarray(start, end);
  }

  consume(count: number): Buffer {
    const taken = Buffer.from(this.buffer.subarray(0, count));
    this.buffer = this.buffer.subarray(Math.min(count, this.buffer.length));
    return taken;
  }

  clear(): void {
    this.buffer = Buffer.alloc(0);
  }
}
