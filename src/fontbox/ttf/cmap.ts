/**
 * 'cmap' table parsing (formats 4 and 12).
 *
 * Produces a flat code point -> glyph id map from the best Unicode subtable.
 */

import { BinaryScanner } from "#src/io/binary-scanner";

interface EncodingRecord {
  platformId: number;
  encodingId: number;
  offset: number;
}

/**
 * Preferred (platform, encoding) pairs, best first.
 * Full-repertoire Unicode subtables come before BMP-only ones.
 */
const PREFERRED_ENCODINGS: ReadonlyArray<[number, number]> = [
  [3, 10],
  [0, 6],
  [0, 4],
  [3, 1],
  [0, 3],
  [0, 2],
  [0, 1],
  [0, 0],
];

export function parseCmap(data: Uint8Array): Map<number, number> {
  const s = new BinaryScanner(data);

  s.skip(2); // version
  const numTables = s.readUint16();
  const records: EncodingRecord[] = [];

  for (let i = 0; i < numTables; i++) {
    records.push({
      platformId: s.readUint16(),
      encodingId: s.readUint16(),
      offset: s.readUint32(),
    });
  }

  for (const [platformId, encodingId] of PREFERRED_ENCODINGS) {
    const record = records.find(r => r.platformId === platformId && r.encodingId === encodingId);

    if (!record) {
      continue;
    }

    s.moveTo(record.offset);
    const format = s.readUint16();

    if (format === 4) {
      return parseFormat4(data, record.offset);
    }

    if (format === 12) {
      return parseFormat12(data, record.offset);
    }
  }

  throw new Error("No supported Unicode 'cmap' subtable (format 4 or 12)");
}

/**
 * Format 4: segment mapping to delta values (BMP only).
 */
function parseFormat4(data: Uint8Array, offset: number): Map<number, number> {
  const s = new BinaryScanner(data);
  const map = new Map<number, number>();

  s.moveTo(offset + 6); // format, length, language
  const segCount = s.readUint16() / 2;

  const endCodesStart = offset + 14;
  const startCodesStart = endCodesStart + segCount * 2 + 2; // + reservedPad
  const idDeltasStart = startCodesStart + segCount * 2;
  const idRangeOffsetsStart = idDeltasStart + segCount * 2;

  for (let seg = 0; seg < segCount; seg++) {
    s.moveTo(endCodesStart + seg * 2);
    const endCode = s.readUint16();

    s.moveTo(startCodesStart + seg * 2);
    const startCode = s.readUint16();

    s.moveTo(idDeltasStart + seg * 2);
    const idDelta = s.readInt16();

    const rangeOffsetPosition = idRangeOffsetsStart + seg * 2;
    s.moveTo(rangeOffsetPosition);
    const idRangeOffset = s.readUint16();

    // The final 0xFFFF segment maps nothing
    if (startCode === 0xffff) {
      continue;
    }

    for (let code = startCode; code <= endCode; code++) {
      let gid: number;

      if (idRangeOffset === 0) {
        gid = (code + idDelta) & 0xffff;
      } else {
        s.moveTo(rangeOffsetPosition + idRangeOffset + (code - startCode) * 2);
        gid = s.readUint16();

        if (gid !== 0) {
          gid = (gid + idDelta) & 0xffff;
        }
      }

      if (gid !== 0) {
        map.set(code, gid);
      }
    }
  }

  return map;
}

/**
 * Format 12: segmented coverage (full Unicode range).
 */
function parseFormat12(data: Uint8Array, offset: number): Map<number, number> {
  const s = new BinaryScanner(data);
  const map = new Map<number, number>();

  s.moveTo(offset + 12); // format, reserved, length, language
  const numGroups = s.readUint32();

  for (let i = 0; i < numGroups; i++) {
    const startChar = s.readUint32();
    const endChar = s.readUint32();
    const startGlyph = s.readUint32();

    if (endChar < startChar || endChar > 0x10ffff) {
      throw new Error(`Invalid 'cmap' group ${startChar}-${endChar}`);
    }

    for (let code = startChar; code <= endChar; code++) {
      map.set(code, startGlyph + (code - startChar));
    }
  }

  return map;
}
