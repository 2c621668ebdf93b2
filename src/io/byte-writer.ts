/**
 * Growing byte buffer used by the object serializer and the font writer.
 *
 * The buffer doubles when needed, and toBytes() returns a trimmed slice
 * to release the oversized buffer for garbage collection.
 */

export interface ByteWriterOptions {
  /** Initial buffer size in bytes. Default: 65536 (64KB) */
  initialSize?: number;
  /** Maximum buffer size in bytes. Throws if exceeded. Default: unlimited */
  maxSize?: number;
}

export class ByteWriter {
  protected buffer: Uint8Array;
  protected offset = 0;
  private readonly maxSize: number;

  constructor(options: ByteWriterOptions = {}) {
    this.maxSize = options.maxSize ?? Number.MAX_SAFE_INTEGER;
    this.buffer = new Uint8Array(Math.max(1, options.initialSize ?? 65536));
  }

  /**
   * Ensure capacity for `needed` more bytes, doubling buffer if necessary.
   * @throws {Error} if maxSize would be exceeded
   */
  private grow(needed: number): void {
    const requiredSize = this.offset + needed;

    if (requiredSize > this.maxSize) {
      throw new Error(`ByteWriter exceeded maximum size of ${this.maxSize} bytes`);
    }

    if (requiredSize <= this.buffer.length) {
      return;
    }

    let newSize = this.buffer.length;

    while (newSize < requiredSize) {
      newSize *= 2;
    }

    newSize = Math.min(newSize, this.maxSize);

    const newBuffer = new Uint8Array(newSize);
    newBuffer.set(this.buffer.subarray(0, this.offset));
    this.buffer = newBuffer;
  }

  /** Current write position (number of bytes written) */
  get position(): number {
    return this.offset;
  }

  writeByte(b: number): void {
    this.grow(1);
    this.buffer[this.offset++] = b;
  }

  writeBytes(data: Uint8Array): void {
    this.grow(data.length);
    this.buffer.set(data, this.offset);
    this.offset += data.length;
  }

  /**
   * Write ASCII string (fast path, no encoding needed).
   * Only use for strings known to be ASCII (PDF keywords, numbers, etc.)
   */
  writeAscii(str: string): void {
    this.grow(str.length);

    for (let i = 0; i < str.length; i++) {
      this.buffer[this.offset++] = str.charCodeAt(i);
    }
  }

  /** Write ASCII string followed by a line feed */
  writeLine(str: string): void {
    this.writeAscii(str);
    this.writeByte(0x0a);
  }

  /**
   * Get final bytes.
   * Returns a copy (slice) so the internal buffer can be garbage collected.
   */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }
}
