/**
 * Parsers for the fixed-layout TrueType tables.
 */

import { BinaryScanner } from "#src/io/binary-scanner";
import type {
  HeadTable,
  HheaTable,
  HmtxTable,
  NameTable,
  Os2Table,
  PostTable,
} from "./types";

/** Expected 'head' magic number */
const HEAD_MAGIC = 0x5f0f3cf5;

/** Byte offset of checkSumAdjustment in 'head' */
export const HEAD_CHECKSUM_ADJUSTMENT_OFFSET = 8;
/** Byte offset of indexToLocFormat in 'head' */
export const HEAD_INDEX_TO_LOC_FORMAT_OFFSET = 50;
/** Byte offset of numberOfHMetrics in 'hhea' */
export const HHEA_NUMBER_OF_HMETRICS_OFFSET = 34;
/** Byte offset of numGlyphs in 'maxp' */
export const MAXP_NUM_GLYPHS_OFFSET = 4;

export function parseHead(data: Uint8Array): HeadTable {
  const s = new BinaryScanner(data);

  s.skip(12); // version, fontRevision, checkSumAdjustment

  const magic = s.readUint32();

  if (magic !== HEAD_MAGIC) {
    throw new Error(`Invalid 'head' magic number 0x${magic.toString(16)}`);
  }

  s.skip(2); // flags
  const unitsPerEm = s.readUint16();

  if (unitsPerEm === 0) {
    throw new Error("'head' unitsPerEm must not be zero");
  }

  s.skip(16); // created, modified
  const xMin = s.readInt16();
  const yMin = s.readInt16();
  const xMax = s.readInt16();
  const yMax = s.readInt16();
  const macStyle = s.readUint16();
  s.skip(4); // lowestRecPPEM, fontDirectionHint
  const indexToLocFormat = s.readInt16();

  if (indexToLocFormat !== 0 && indexToLocFormat !== 1) {
    throw new Error(`Unknown indexToLocFormat ${indexToLocFormat}`);
  }

  return { unitsPerEm, xMin, yMin, xMax, yMax, macStyle, indexToLocFormat };
}

export function parseHhea(data: Uint8Array): HheaTable {
  const s = new BinaryScanner(data);

  s.skip(4); // version
  const ascender = s.readInt16();
  const descender = s.readInt16();
  const lineGap = s.readInt16();
  const advanceWidthMax = s.readUint16();

  s.moveTo(HHEA_NUMBER_OF_HMETRICS_OFFSET);
  const numberOfHMetrics = s.readUint16();

  return { ascender, descender, lineGap, advanceWidthMax, numberOfHMetrics };
}

export function parseMaxpNumGlyphs(data: Uint8Array): number {
  const s = new BinaryScanner(data);

  s.moveTo(MAXP_NUM_GLYPHS_OFFSET);

  return s.readUint16();
}

/**
 * Parse 'hmtx'. Glyphs past numberOfHMetrics repeat the last advance width.
 */
export function parseHmtx(data: Uint8Array, numberOfHMetrics: number, numGlyphs: number): HmtxTable {
  if (numberOfHMetrics === 0 || numberOfHMetrics > numGlyphs) {
    throw new Error(`Invalid numberOfHMetrics ${numberOfHMetrics} for ${numGlyphs} glyphs`);
  }

  const s = new BinaryScanner(data);
  const advanceWidths: number[] = [];
  const leftSideBearings: number[] = [];

  for (let i = 0; i < numberOfHMetrics; i++) {
    advanceWidths.push(s.readUint16());
    leftSideBearings.push(s.readInt16());
  }

  const lastAdvance = advanceWidths[numberOfHMetrics - 1];

  for (let i = numberOfHMetrics; i < numGlyphs; i++) {
    advanceWidths.push(lastAdvance);
    // Some fonts truncate the trailing bearings
    leftSideBearings.push(s.position + 2 <= s.length ? s.readInt16() : 0);
  }

  return { advanceWidths, leftSideBearings };
}

/**
 * Parse 'loca' into numGlyphs + 1 byte offsets into 'glyf'.
 */
export function parseLoca(data: Uint8Array, indexToLocFormat: number, numGlyphs: number): number[] {
  const s = new BinaryScanner(data);
  const offsets: number[] = [];

  for (let i = 0; i <= numGlyphs; i++) {
    offsets.push(indexToLocFormat === 0 ? s.readUint16() * 2 : s.readUint32());
  }

  for (let i = 0; i < numGlyphs; i++) {
    if (offsets[i + 1] < offsets[i]) {
      throw new Error(`'loca' offsets decrease at glyph ${i}`);
    }
  }

  return offsets;
}

export function parsePost(data: Uint8Array): PostTable {
  const s = new BinaryScanner(data);

  s.skip(4); // version
  const italicAngle = s.readFixed();
  s.skip(4); // underlinePosition, underlineThickness
  const isFixedPitch = s.readUint32() !== 0;

  return { italicAngle, isFixedPitch };
}

export function parseOs2(data: Uint8Array): Os2Table {
  const s = new BinaryScanner(data);

  const version = s.readUint16();
  s.skip(2); // xAvgCharWidth
  const weightClass = s.readUint16();

  s.moveTo(68);
  const typoAscender = s.readInt16();
  const typoDescender = s.readInt16();

  if (version < 2 || data.length < 90) {
    return { version, weightClass, typoAscender, typoDescender };
  }

  s.moveTo(86);
  const xHeight = s.readInt16();
  const capHeight = s.readInt16();

  return { version, weightClass, typoAscender, typoDescender, xHeight, capHeight };
}

const NAME_ID_FAMILY = 1;
const NAME_ID_POSTSCRIPT = 6;

/**
 * Parse the family and PostScript names.
 *
 * Windows (platform 3) names are UTF-16BE, Macintosh (platform 1) names are
 * single-byte. Windows names win when both exist.
 */
export function parseName(data: Uint8Array): NameTable {
  const s = new BinaryScanner(data);

  s.skip(2); // format
  const count = s.readUint16();
  const stringOffset = s.readUint16();

  const found = new Map<number, { platformId: number; value: string }>();

  for (let i = 0; i < count; i++) {
    const platformId = s.readUint16();
    s.skip(4); // encodingID, languageID
    const nameId = s.readUint16();
    const length = s.readUint16();
    const offset = s.readUint16();

    if (nameId !== NAME_ID_FAMILY && nameId !== NAME_ID_POSTSCRIPT) {
      continue;
    }

    if (platformId !== 1 && platformId !== 3) {
      continue;
    }

    const existing = found.get(nameId);

    if (existing && existing.platformId === 3) {
      continue;
    }

    const start = stringOffset + offset;

    if (start + length > data.length) {
      continue;
    }

    const bytes = data.subarray(start, start + length);

    found.set(nameId, { platformId, value: decodeName(bytes, platformId) });
  }

  return {
    familyName: found.get(NAME_ID_FAMILY)?.value,
    postScriptName: found.get(NAME_ID_POSTSCRIPT)?.value,
  };
}

function decodeName(bytes: Uint8Array, platformId: number): string {
  let result = "";

  if (platformId === 3) {
    for (let i = 0; i + 1 < bytes.length; i += 2) {
      result += String.fromCharCode((bytes[i] << 8) | bytes[i + 1]);
    }

    return result;
  }

  for (const byte of bytes) {
    result += String.fromCharCode(byte);
  }

  return result;
}
