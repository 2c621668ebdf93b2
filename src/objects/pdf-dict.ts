import type { RefResolver } from "#src/helpers/types";
import type { ByteWriter } from "#src/io/byte-writer";

import type { PdfArray } from "./pdf-array";
import { PdfName } from "./pdf-name";
import type { PdfNumber } from "./pdf-number";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";
import type { PdfRef } from "./pdf-ref";

/**
 * PDF dictionary object.
 *
 * In PDF: `<< /Type /Page /MediaBox [0 0 612 792] >>`
 *
 * Keys are always PdfName. Entries keep insertion order, which is also the
 * order they are serialized and traversed in.
 */
export class PdfDict implements PdfPrimitive {
  get type(): "dict" | "stream" {
    return "dict";
  }

  private entries = new Map<PdfName, PdfObject>();

  constructor(entries?: Iterable<[PdfName | string, PdfObject]>) {
    if (entries) {
      for (const [key, value] of entries) {
        const name = typeof key === "string" ? PdfName.of(key) : key;

        this.entries.set(name, value);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Get value for key. Key can be string or PdfName.
   */
  get(key: PdfName | string, resolver?: RefResolver): PdfObject | undefined {
    const name = typeof key === "string" ? PdfName.of(key) : key;

    const value = this.entries.get(name);

    if (resolver && value?.type === "ref") {
      return resolver(value) ?? undefined;
    }

    return value;
  }

  set(key: PdfName | string, value: PdfObject): void {
    const name = typeof key === "string" ? PdfName.of(key) : key;

    this.entries.set(name, value);
  }

  has(key: PdfName | string): boolean {
    const name = typeof key === "string" ? PdfName.of(key) : key;

    return this.entries.has(name);
  }

  keys(): Iterable<PdfName> {
    return this.entries.keys();
  }

  *[Symbol.iterator](): Iterator<[PdfName, PdfObject]> {
    yield* this.entries;
  }

  /**
   * Typed getters.
   *
   * When a resolver is given and the value is a PdfRef, it is dereferenced first.
   */

  getName(key: string, resolver?: RefResolver): PdfName | undefined {
    const value = this.get(key, resolver);

    return value?.type === "name" ? value : undefined;
  }

  getNumber(key: string, resolver?: RefResolver): PdfNumber | undefined {
    const value = this.get(key, resolver);

    return value?.type === "number" ? value : undefined;
  }

  getArray(key: string, resolver?: RefResolver): PdfArray | undefined {
    const value = this.get(key, resolver);

    return value?.type === "array" ? value : undefined;
  }

  getDict(key: string, resolver?: RefResolver): PdfDict | undefined {
    const value = this.get(key, resolver);

    return value?.type === "dict" ? value : undefined;
  }

  getRef(key: string): PdfRef | undefined {
    const value = this.get(key);

    return value?.type === "ref" ? value : undefined;
  }

  /**
   * Create dict from entries.
   */
  static of(entries: Record<string, PdfObject>): PdfDict {
    return new PdfDict(Object.entries(entries));
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("<<");

    for (const [key, value] of this.entries) {
      writer.writeAscii("\n");
      key.toBytes(writer);
      writer.writeAscii(" ");
      value.toBytes(writer);
    }

    writer.writeAscii("\n>>");
  }
}
