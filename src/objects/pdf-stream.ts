import type { ByteWriter } from "#src/io/byte-writer";
import { PdfDict } from "./pdf-dict";
import type { PdfName } from "./pdf-name";
import type { PdfObject } from "./pdf-object";

/**
 * PDF stream object (dictionary + binary data).
 *
 * In PDF:
 * ```
 * << /Length 5 /Filter /FlateDecode >>
 * stream
 * ...binary data...
 * endstream
 * ```
 *
 * `data` is the payload as it will be written. A stream carrying a /Filter
 * entry already holds encoded data (for example a passed-through JPEG); the
 * writer compresses only streams without one.
 */
export class PdfStream extends PdfDict {
  override get type(): "stream" {
    return "stream";
  }

  private _data: Uint8Array;

  constructor(
    dict?: PdfDict | Iterable<[PdfName | string, PdfObject]>,
    data: Uint8Array = new Uint8Array(0),
  ) {
    super(dict);

    this._data = data;
  }

  get data(): Uint8Array {
    return this._data;
  }

  /**
   * Create stream from dict entries and data.
   */
  static fromDict(
    entries: Record<string, PdfObject>,
    data: Uint8Array = new Uint8Array(0),
  ): PdfStream {
    return new PdfStream(Object.entries(entries), data);
  }

  /**
   * Write stream to bytes.
   *
   * /Length is always written first as a direct value computed from the
   * payload; any /Length entry in the dictionary is ignored.
   */
  override toBytes(writer: ByteWriter): void {
    writer.writeAscii(`<<\n/Length ${this._data.length}`);

    for (const [key, value] of this) {
      if (key.value === "Length") {
        continue;
      }

      writer.writeAscii("\n");
      key.toBytes(writer);
      writer.writeAscii(" ");
      value.toBytes(writer);
    }

    writer.writeAscii("\n>>\nstream\n");
    writer.writeBytes(this._data);
    writer.writeAscii("\nendstream");
  }
}
