/**
 * PDF object serialization.
 *
 * The byte-writing logic lives in each object's toBytes(); these helpers
 * wrap it for callers that want standalone bytes.
 */

import { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";

/**
 * Serialize a PDF object to bytes.
 */
export function serializeObject(obj: PdfObject): Uint8Array {
  const writer = new ByteWriter({ initialSize: 256 });

  obj.toBytes(writer);

  return writer.toBytes();
}

/**
 * Write an indirect object definition: "N G obj\n[object]\nendobj\n"
 */
export function writeIndirectObject(writer: ByteWriter, ref: PdfRef, obj: PdfObject): void {
  writer.writeAscii(`${ref.objectNumber} ${ref.generation} obj\n`);
  obj.toBytes(writer);
  writer.writeAscii("\nendobj\n");
}
