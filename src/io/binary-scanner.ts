/**
 * Big-endian reader over a byte array, used for sfnt font tables.
 *
 * Reads past the end throw, so truncated tables surface as errors
 * instead of silently reading zeros.
 */
export class BinaryScanner {
  private readonly view: DataView;
  private pos = 0;

  constructor(readonly data: Uint8Array) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.data.length;
  }

  /** Move to an absolute offset */
  moveTo(offset: number): void {
    if (offset < 0 || offset > this.data.length) {
      throw new Error(`Offset ${offset} is outside the data (length ${this.data.length})`);
    }

    this.pos = offset;
  }

  skip(count: number): void {
    this.moveTo(this.pos + count);
  }

  private ensure(count: number): void {
    if (this.pos + count > this.data.length) {
      throw new Error(`Unexpected end of data at offset ${this.pos} (wanted ${count} bytes)`);
    }
  }

  readUint8(): number {
    this.ensure(1);

    return this.view.getUint8(this.pos++);
  }

  readUint16(): number {
    this.ensure(2);
    const value = this.view.getUint16(this.pos);
    this.pos += 2;

    return value;
  }

  readInt16(): number {
    this.ensure(2);
    const value = this.view.getInt16(this.pos);
    this.pos += 2;

    return value;
  }

  readUint32(): number {
    this.ensure(4);
    const value = this.view.getUint32(this.pos);
    this.pos += 4;

    return value;
  }

  readInt32(): number {
    this.ensure(4);
    const value = this.view.getInt32(this.pos);
    this.pos += 4;

    return value;
  }

  /** Read a 16.16 fixed-point number */
  readFixed(): number {
    return this.readInt32() / 65536;
  }

  /** Read a 4-character table tag */
  readTag(): string {
    this.ensure(4);
    let tag = "";

    for (let i = 0; i < 4; i++) {
      tag += String.fromCharCode(this.data[this.pos++]);
    }

    return tag;
  }
}
