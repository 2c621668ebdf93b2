/**
 * ByteWriter extended with big-endian binary writing methods.
 *
 * Used to write sfnt font programs (table directories, glyf/loca/hmtx data).
 */

import { ByteWriter, type ByteWriterOptions } from "./byte-writer";

export class BinaryWriter extends ByteWriter {
  constructor(options: ByteWriterOptions = { initialSize: 4096 }) {
    super(options);
  }

  writeUint8(value: number): void {
    this.writeByte(value & 0xff);
  }

  /** Write uint16 big-endian */
  writeUint16(value: number): void {
    this.writeByte((value >> 8) & 0xff);
    this.writeByte(value & 0xff);
  }

  /** Write int16 big-endian */
  writeInt16(value: number): void {
    this.writeUint16(value);
  }

  /** Write uint32 big-endian */
  writeUint32(value: number): void {
    this.writeByte((value >>> 24) & 0xff);
    this.writeByte((value >>> 16) & 0xff);
    this.writeByte((value >>> 8) & 0xff);
    this.writeByte(value & 0xff);
  }

  /**
   * Write 4-byte tag from string.
   * Pads with spaces if string is shorter than 4 characters.
   */
  writeTag(tag: string): void {
    for (let i = 0; i < 4; i++) {
      this.writeByte(i < tag.length ? tag.charCodeAt(i) : 0x20);
    }
  }

  /**
   * Write n bytes of padding (zeros).
   */
  writePadding(n: number): void {
    for (let i = 0; i < n; i++) {
      this.writeByte(0);
    }
  }

  /**
   * Write padding to align to n-byte boundary.
   */
  writeAlignmentPadding(alignment: number): void {
    const remainder = this.position % alignment;

    if (remainder !== 0) {
      this.writePadding(alignment - remainder);
    }
  }

  /**
   * Overwrite a uint16 at an earlier position.
   */
  patchUint16(at: number, value: number): void {
    if (at + 2 > this.offset) {
      throw new Error(`Cannot patch past write position: ${at}`);
    }

    this.buffer[at] = (value >> 8) & 0xff;
    this.buffer[at + 1] = value & 0xff;
  }

  /**
   * Overwrite a uint32 at an earlier position.
   */
  patchUint32(at: number, value: number): void {
    if (at + 4 > this.offset) {
      throw new Error(`Cannot patch past write position: ${at}`);
    }

    this.buffer[at] = (value >>> 24) & 0xff;
    this.buffer[at + 1] = (value >>> 16) & 0xff;
    this.buffer[at + 2] = (value >>> 8) & 0xff;
    this.buffer[at + 3] = value & 0xff;
  }
}
