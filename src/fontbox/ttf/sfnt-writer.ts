/**
 * sfnt container writer: table directory, checksums, 4-byte alignment.
 */

import { BinaryWriter } from "#src/io/binary-writer";
import { HEAD_CHECKSUM_ADJUSTMENT_OFFSET } from "./tables";

const SFNT_VERSION_TRUETYPE = 0x00010000;
const CHECKSUM_MAGIC = 0xb1b0afba;

const TABLE_RECORD_SIZE = 16;
const OFFSET_TABLE_SIZE = 12;

/**
 * Checksum of a table: the uint32 sum of its big-endian words, zero padded.
 */
export function tableChecksum(data: Uint8Array): number {
  let sum = 0;
  const byteAt = (i: number) => (i < data.length ? data[i] : 0);

  for (let i = 0; i < data.length; i += 4) {
    const word = ((byteAt(i) << 24) | (byteAt(i + 1) << 16) | (byteAt(i + 2) << 8) | byteAt(i + 3)) >>> 0;

    sum = (sum + word) >>> 0;
  }

  return sum;
}

/**
 * Write a TrueType font file from its tables.
 *
 * Tables are written in tag order. When a 'head' table is present its
 * checkSumAdjustment is computed over the finished file; the value passed
 * in is ignored.
 */
export function writeSfnt(tables: ReadonlyMap<string, Uint8Array>): Uint8Array {
  const tags = [...tables.keys()].sort();
  const numTables = tags.length;

  const entrySelector = numTables === 0 ? 0 : Math.floor(Math.log2(numTables));
  const searchRange = 2 ** entrySelector * TABLE_RECORD_SIZE;

  const writer = new BinaryWriter();

  writer.writeUint32(SFNT_VERSION_TRUETYPE);
  writer.writeUint16(numTables);
  writer.writeUint16(searchRange);
  writer.writeUint16(entrySelector);
  writer.writeUint16(numTables * TABLE_RECORD_SIZE - searchRange);

  let offset = OFFSET_TABLE_SIZE + numTables * TABLE_RECORD_SIZE;
  const ordered: Uint8Array[] = [];
  let headOffset: number | undefined;

  for (const tag of tags) {
    let data = tables.get(tag) ?? new Uint8Array(0);

    if (tag === "head") {
      data = data.slice();
      data.fill(0, HEAD_CHECKSUM_ADJUSTMENT_OFFSET, HEAD_CHECKSUM_ADJUSTMENT_OFFSET + 4);
      headOffset = offset;
    }

    writer.writeTag(tag);
    writer.writeUint32(tableChecksum(data));
    writer.writeUint32(offset);
    writer.writeUint32(data.length);

    ordered.push(data);
    offset += Math.ceil(data.length / 4) * 4;
  }

  for (const data of ordered) {
    writer.writeBytes(data);
    writer.writeAlignmentPadding(4);
  }

  if (headOffset !== undefined) {
    const fileChecksum = tableChecksum(writer.toBytes());

    writer.patchUint32(
      headOffset + HEAD_CHECKSUM_ADJUSTMENT_OFFSET,
      (CHECKSUM_MAGIC - fileChecksum) >>> 0,
    );
  }

  return writer.toBytes();
}
