/**
 * PDF file writer.
 *
 * Lays out a finished, renumbered object graph as a complete file. Uses a
 * single ByteWriter for the entire PDF to minimize allocations.
 */

import { sha256 } from "@noble/hashes/sha2.js";
import type { IndirectObject } from "#src/document/object-store";
import { encodeFilters } from "#src/filters/filter-pipeline";
import { ByteWriter } from "#src/io/byte-writer";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNull } from "#src/objects/pdf-null";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { writeIndirectObject } from "./serializer";
import { writeXRefStream, writeXRefTable, type XRefWriteEntry } from "./xref-writer";

/** Length of each /ID element in bytes */
const FILE_ID_LENGTH = 16;

/** Comment after the header; high bytes mark the file as binary */
const BINARY_MARKER = new Uint8Array([0x25, 0xe2, 0xe3, 0xcf, 0xd3, 0x0a]); // %âãÏÓ\n

/** Printable replacement used when the file must stay 7-bit clean */
const ASCII_MARKER = "%AAAA\n";

export interface StreamEncodingOptions {
  /** Compress unfiltered streams with FlateDecode */
  compressStreams: boolean;

  /** Wrap every stream in ASCIIHexDecode so the file is 7-bit clean */
  asciiCompatible: boolean;
}

export interface WriteOptions extends Partial<StreamEncodingOptions> {
  /** PDF version string (default: "1.7") */
  version?: string;

  /** Root catalog reference */
  root: PdfRef;

  /** Info dictionary reference */
  info?: PdfRef;

  /**
   * First element of /ID. The second is always derived from the written
   * body; when this is left out both elements are that value.
   */
  documentId?: Uint8Array;

  /** Use an xref stream instead of a table (PDF 1.5+) */
  useXRefStream?: boolean;
}

export interface WriteResult {
  bytes: Uint8Array;

  /** Byte offset where the xref section starts */
  xrefOffset: number;

  /** The /ID pair written to the trailer */
  id: [Uint8Array, Uint8Array];
}

const encoder = new TextEncoder();

/**
 * A 16-byte file identifier derived from strings.
 *
 * Parts are length-prefixed, so `("ab", "c")` and `("a", "bc")` differ.
 */
export function fileIdentifier(...parts: string[]): Uint8Array {
  const hasher = sha256.create();

  for (const part of parts) {
    const bytes = encoder.encode(part);
    const length = new Uint8Array(4);

    new DataView(length.buffer).setUint32(0, bytes.length);
    hasher.update(length);
    hasher.update(bytes);
  }

  return hasher.digest().slice(0, FILE_ID_LENGTH);
}

function asArray(value: PdfObject): PdfObject[] {
  return value instanceof PdfArray ? value.toArray() : [value];
}

/**
 * Prepend ASCIIHexDecode to a stream's filter chain.
 *
 * Existing /DecodeParms are shifted along with a null entry for the new filter.
 */
function wrapInAsciiHex(stream: PdfStream): PdfStream {
  const filter = stream.get("Filter");
  const parms = stream.get("DecodeParms");
  const wrapped = new PdfStream(stream, encodeFilters(stream.data, ["ASCIIHexDecode"]));

  wrapped.set(
    "Filter",
    filter === undefined
      ? PdfName.ASCIIHexDecode
      : new PdfArray([PdfName.ASCIIHexDecode, ...asArray(filter)]),
  );

  if (parms !== undefined) {
    wrapped.set("DecodeParms", new PdfArray([PdfNull.instance, ...asArray(parms)]));
  }

  return wrapped;
}

/**
 * Apply output encodings to a stream.
 *
 * Streams without a /Filter are compressed with FlateDecode when that makes
 * them smaller. Streams that already have filters (including image formats
 * like DCTDecode) keep their data. The original stream is not modified.
 */
export function encodeStream(stream: PdfStream, options: StreamEncodingOptions): PdfStream {
  if (stream.data.length === 0) {
    return stream;
  }

  let result = stream;

  if (options.compressStreams && !stream.has("Filter")) {
    const compressed = encodeFilters(stream.data, ["FlateDecode"]);

    if (compressed.length < stream.data.length) {
      result = new PdfStream(stream, compressed);
      result.set("Filter", PdfName.FlateDecode);
    }
  }

  return options.asciiCompatible ? wrapInAsciiHex(result) : result;
}

/**
 * Write a complete PDF.
 *
 * Objects are written in the order given and should already carry their
 * final numbers.
 *
 * Structure:
 * ```
 * %PDF-X.Y
 * %[binary comment]
 * 1 0 obj
 * ...
 * endobj
 * xref
 * ...
 * trailer
 * ...
 * startxref
 * ...
 * %%EOF
 * ```
 */
export function writeDocument(objects: readonly IndirectObject[], options: WriteOptions): WriteResult {
  const writer = new ByteWriter();
  const encoding: StreamEncodingOptions = {
    compressStreams: options.compressStreams ?? true,
    asciiCompatible: options.asciiCompatible ?? false,
  };

  writer.writeAscii(`%PDF-${options.version ?? "1.7"}\n`);

  if (encoding.asciiCompatible) {
    writer.writeAscii(ASCII_MARKER);
  } else {
    writer.writeBytes(BINARY_MARKER);
  }

  const entries: XRefWriteEntry[] = [
    // Object 0 is always the free list head
    { objectNumber: 0, generation: 65535, type: "free", offset: 0 },
  ];

  for (const { ref, object } of objects) {
    entries.push({
      objectNumber: ref.objectNumber,
      generation: ref.generation,
      type: "inuse",
      offset: writer.position,
    });

    writeIndirectObject(writer, ref, object instanceof PdfStream ? encodeStream(object, encoding) : object);
  }

  const instanceId = sha256(writer.toBytes()).slice(0, FILE_ID_LENGTH);
  const id: [Uint8Array, Uint8Array] = [options.documentId ?? instanceId, instanceId];

  const xrefOffset = writer.position;
  const maxObjectNumber = objects.reduce((max, o) => Math.max(max, o.ref.objectNumber), 0);

  if (options.useXRefStream) {
    const streamRef = PdfRef.of(maxObjectNumber + 1);

    // The stream lists itself
    entries.push({ objectNumber: streamRef.objectNumber, generation: 0, type: "inuse", offset: xrefOffset });

    writeXRefStream(writer, {
      entries,
      size: streamRef.objectNumber + 1,
      xrefOffset,
      root: options.root,
      info: options.info,
      id,
      streamRef,
      encode: stream => encodeStream(stream, encoding),
    });
  } else {
    writeXRefTable(writer, {
      entries,
      size: maxObjectNumber + 1,
      xrefOffset,
      root: options.root,
      info: options.info,
      id,
    });
  }

  return { bytes: writer.toBytes(), xrefOffset, id };
}
