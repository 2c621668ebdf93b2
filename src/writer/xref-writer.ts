/**
 * Cross-reference section writing.
 *
 * Supports both traditional xref tables (PDF 1.0+) and
 * xref streams (PDF 1.5+).
 */

import { SINGLE_BYTE_MASK } from "#src/helpers/chars";
import type { ByteWriter } from "#src/io/byte-writer";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { PdfString } from "#src/objects/pdf-string";
import { writeIndirectObject } from "./serializer";

/**
 * An entry in the xref section.
 */
export interface XRefWriteEntry {
  objectNumber: number;
  generation: number;
  type: "inuse" | "free";
  /** Byte offset of the object; 0 for the free list head */
  offset: number;
}

export interface XRefWriteOptions {
  /** Byte offset where the xref section starts */
  xrefOffset: number;

  /** Maximum object number + 1 (for /Size) */
  size: number;

  entries: XRefWriteEntry[];

  root: PdfRef;

  info?: PdfRef;

  /** File identifier pair for /ID */
  id?: [Uint8Array, Uint8Array];
}

export interface XRefStreamOptions extends XRefWriteOptions {
  /** Reference the xref stream itself is written under */
  streamRef: PdfRef;

  /** Applied to the stream before it is written, e.g. to add filters */
  encode?: (stream: PdfStream) => PdfStream;
}

interface Subsection {
  start: number;
  entries: XRefWriteEntry[];
}

/**
 * Group consecutive object numbers into subsections.
 *
 * For example: [1, 2, 3, 7, 8] → [[1, 3], [7, 2]] (start, count pairs)
 */
function groupIntoSubsections(entries: XRefWriteEntry[]): Subsection[] {
  const sorted = [...entries].sort((a, b) => a.objectNumber - b.objectNumber);
  const subsections: Subsection[] = [];
  let current: Subsection | null = null;

  for (const entry of sorted) {
    if (current !== null && entry.objectNumber === current.start + current.entries.length) {
      current.entries.push(entry);
    } else {
      current = { start: entry.objectNumber, entries: [entry] };
      subsections.push(current);
    }
  }

  return subsections;
}

/**
 * Format a single xref table entry (exactly 20 bytes).
 *
 * Format: "OOOOOOOOOO GGGGG n\r\n" or "OOOOOOOOOO GGGGG f\r\n"
 */
function formatXRefTableEntry(entry: XRefWriteEntry): string {
  const offset = entry.offset.toString().padStart(10, "0");
  const generation = entry.generation.toString().padStart(5, "0");
  const marker = entry.type === "free" ? "f" : "n";

  return `${offset} ${generation} ${marker}\r\n`;
}

function trailerEntries(options: XRefWriteOptions): [string, PdfObject][] {
  const entries: [string, PdfObject][] = [["Root", options.root]];

  if (options.info) {
    entries.push(["Info", options.info]);
  }

  if (options.id) {
    const [first, second] = options.id;

    entries.push(["ID", PdfArray.of(new PdfString(first, "hex"), new PdfString(second, "hex"))]);
  }

  return entries;
}

function writeFooter(writer: ByteWriter, xrefOffset: number): void {
  writer.writeAscii(`startxref\n${xrefOffset}\n%%EOF\n`);
}

/**
 * Write a traditional xref table followed by the trailer.
 *
 * ```
 * xref
 * 0 3
 * 0000000000 65535 f
 * 0000000015 00000 n
 * 0000000074 00000 n
 * trailer
 * << /Size 3 /Root 1 0 R >>
 * startxref
 * 123
 * %%EOF
 * ```
 */
export function writeXRefTable(writer: ByteWriter, options: XRefWriteOptions): void {
  writer.writeAscii("xref\n");

  for (const subsection of groupIntoSubsections(options.entries)) {
    writer.writeAscii(`${subsection.start} ${subsection.entries.length}\n`);

    for (const entry of subsection.entries) {
      writer.writeAscii(formatXRefTableEntry(entry));
    }
  }

  writer.writeAscii("trailer\n");
  new PdfDict([["Size", PdfNumber.of(options.size)], ...trailerEntries(options)]).toBytes(writer);
  writer.writeAscii("\n");

  writeFooter(writer, options.xrefOffset);
}

/**
 * Bytes needed to store a value, at least one.
 */
function byteWidth(value: number): number {
  let width = 1;

  while (value >= 256 ** width) {
    width++;
  }

  return width;
}

/**
 * Encode a number as big-endian bytes into `target`.
 */
function encodeNumber(target: Uint8Array, offset: number, value: number, width: number): void {
  for (let i = width - 1; i >= 0; i--) {
    target[offset + i] = value & SINGLE_BYTE_MASK;
    value = Math.floor(value / 256);
  }
}

/**
 * Build an xref stream dictionary and its binary entry data.
 *
 * Each entry is `type offset generation` with field widths given by /W.
 */
export function buildXRefStream(options: XRefWriteOptions): PdfStream {
  const subsections = groupIntoSubsections(options.entries);
  const ordered = subsections.flatMap(s => s.entries);

  const widths: [number, number, number] = [
    1,
    byteWidth(ordered.reduce((max, e) => Math.max(max, e.offset), 0)),
    byteWidth(ordered.reduce((max, e) => Math.max(max, e.generation), 0)),
  ];
  const entrySize = widths[0] + widths[1] + widths[2];
  const data = new Uint8Array(ordered.length * entrySize);

  ordered.forEach((entry, i) => {
    const base = i * entrySize;

    encodeNumber(data, base, entry.type === "free" ? 0 : 1, widths[0]);
    encodeNumber(data, base + widths[0], entry.offset, widths[1]);
    encodeNumber(data, base + widths[0] + widths[1], entry.generation, widths[2]);
  });

  const entries: [string, PdfObject][] = [
    ["Type", PdfName.of("XRef")],
    ["Size", PdfNumber.of(options.size)],
    ["W", PdfArray.ofNumbers(widths)],
  ];

  // /Index defaults to [0 Size]
  if (subsections.length !== 1 || subsections[0].start !== 0) {
    entries.push(["Index", PdfArray.ofNumbers(subsections.flatMap(s => [s.start, s.entries.length]))]);
  }

  return new PdfStream([...entries, ...trailerEntries(options)], data);
}

/**
 * Write an xref stream (PDF 1.5+) as an indirect object, then the footer.
 *
 * The stream dictionary doubles as the trailer.
 */
export function writeXRefStream(writer: ByteWriter, options: XRefStreamOptions): PdfStream {
  const built = buildXRefStream(options);
  const stream = options.encode ? options.encode(built) : built;

  writeIndirectObject(writer, options.streamRef, stream);
  writeFooter(writer, options.xrefOffset);

  return stream;
}
