/**
 * TrueType Font Parser.
 *
 * Parses TrueType (.ttf) font files with 'glyf' outlines. OpenType fonts
 * with CFF outlines and font collections are rejected.
 */

import { BinaryScanner } from "#src/io/binary-scanner";
import { parseCmap } from "./cmap";
import {
  parseHead,
  parseHhea,
  parseHmtx,
  parseLoca,
  parseMaxpNumGlyphs,
  parseName,
  parseOs2,
  parsePost,
} from "./tables";
import { TrueTypeFont } from "./truetype-font";
import type { TableRecord } from "./types";

/** TrueType magic number (version 1.0 as Fixed) */
const TTF_MAGIC = 0x00010000;
/** Apple 'true' magic */
const TRUE_MAGIC = 0x74727565;
/** OpenType magic number ('OTTO') */
const OTF_MAGIC = 0x4f54544f;
/** TrueType collection magic ('ttcf') */
const TTC_MAGIC = 0x74746366;

const REQUIRED_TABLES = ["head", "hhea", "maxp", "hmtx", "loca", "glyf"];

export interface ParseOptions {
  /**
   * If true, the font is a PDF-embedded program and 'cmap' is optional.
   * @default false
   */
  isEmbedded?: boolean;
}

/**
 * Parse a TrueType font from bytes.
 *
 * @throws {Error} if the font is invalid or unsupported
 */
export function parseTTF(data: Uint8Array, options: ParseOptions = {}): TrueTypeFont {
  const scanner = new BinaryScanner(data);

  const version = scanner.readUint32();

  if (version === TTC_MAGIC) {
    throw new Error("TrueType Collections (.ttc) are not supported");
  }

  if (version === OTF_MAGIC) {
    throw new Error("OpenType fonts with CFF outlines are not supported");
  }

  if (version !== TTF_MAGIC && version !== TRUE_MAGIC) {
    throw new Error(`Invalid font: unknown version 0x${version.toString(16)}`);
  }

  const numTables = scanner.readUint16();
  scanner.skip(6); // searchRange, entrySelector, rangeShift

  const tableRecords = new Map<string, TableRecord>();

  for (let i = 0; i < numTables; i++) {
    const tag = scanner.readTag();
    const checksum = scanner.readUint32();
    const offset = scanner.readUint32();
    const length = scanner.readUint32();

    if (offset + length > data.length) {
      throw new Error(
        `Table '${tag}' goes past the end of the font (offset ${offset}, length ${length}, size ${data.length})`,
      );
    }

    tableRecords.set(tag, { tag, checksum, offset, length });
  }

  const required = options.isEmbedded ? REQUIRED_TABLES : [...REQUIRED_TABLES, "cmap"];

  for (const tag of required) {
    if (!tableRecords.has(tag)) {
      throw new Error(`'${tag}' table is mandatory`);
    }
  }

  const table = (tag: string): Uint8Array => {
    const record = tableRecords.get(tag);

    if (!record) {
      throw new Error(`'${tag}' table is mandatory`);
    }

    return data.subarray(record.offset, record.offset + record.length);
  };

  const optional = (tag: string): Uint8Array | undefined =>
    tableRecords.has(tag) ? table(tag) : undefined;

  const head = parseHead(table("head"));
  const hhea = parseHhea(table("hhea"));
  const numGlyphs = parseMaxpNumGlyphs(table("maxp"));

  if (numGlyphs === 0) {
    throw new Error("Font has no glyphs");
  }

  const hmtx = parseHmtx(table("hmtx"), hhea.numberOfHMetrics, numGlyphs);
  const loca = parseLoca(table("loca"), head.indexToLocFormat, numGlyphs);

  if (loca[numGlyphs] > table("glyf").length) {
    throw new Error("'loca' points past the end of 'glyf'");
  }

  const post = optional("post");
  const os2 = optional("OS/2");
  const name = optional("name");
  const cmap = optional("cmap");

  return new TrueTypeFont(data, tableRecords, {
    head,
    hhea,
    hmtx,
    numGlyphs,
    loca,
    cmap: cmap ? parseCmap(cmap) : new Map(),
    post: post ? parsePost(post) : undefined,
    os2: os2 ? parseOs2(os2) : undefined,
    name: name ? parseName(name) : {},
  });
}

/**
 * Quick check if bytes look like a TrueType font.
 */
export function isTTF(data: Uint8Array): boolean {
  if (data.length < 4) {
    return false;
  }

  const version = ((data[0] << 24) | (data[1] << 16) | (data[2] << 8) | data[3]) >>> 0;

  return version === TTF_MAGIC || version === TRUE_MAGIC;
}
