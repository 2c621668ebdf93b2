/**
 * TrueType Font Subsetter.
 *
 * Creates a subset of a 'glyf' font containing only the requested glyphs and
 * the components they depend on. Glyphs are renumbered in ascending order of
 * their original ids, so the output depends only on the closed glyph set.
 */

import { IncompleteGlyphClosureError } from "#src/errors";
import { BinaryWriter } from "#src/io/binary-writer";
import { isCompositeGlyph, readComponents, remapComponents } from "./glyf";
import { writeSfnt } from "./sfnt-writer";
import {
  HEAD_INDEX_TO_LOC_FORMAT_OFFSET,
  HHEA_NUMBER_OF_HMETRICS_OFFSET,
  MAXP_NUM_GLYPHS_OFFSET,
} from "./tables";
import type { TrueTypeFont } from "./truetype-font";

/** Hinting tables copied unchanged when present */
const COPIED_TABLES = ["cvt ", "fpgm", "prep"];

export interface SubsetProgram {
  /** Original glyph ids in new-id order: `glyphIds[newId] = oldId` */
  glyphIds: number[];
  /** The subset font file */
  bytes: Uint8Array;
}

/**
 * Close a glyph set over composite components.
 *
 * Always includes .notdef (0). Returns the ids sorted ascending.
 *
 * @throws {IncompleteGlyphClosureError} if a component is not in the font
 */
export function closeGlyphSet(font: TrueTypeFont, glyphIds: Iterable<number>): number[] {
  const closed = new Set<number>([0]);
  const pending = [0, ...glyphIds];

  while (pending.length > 0) {
    const gid = pending.pop();

    if (gid === undefined) {
      break;
    }

    closed.add(gid);

    const glyph = font.getGlyphData(gid);

    if (!isCompositeGlyph(glyph)) {
      continue;
    }

    for (const component of readComponents(glyph)) {
      if (component.glyphId >= font.numGlyphs) {
        throw new IncompleteGlyphClosureError(gid, component.glyphId, font.numGlyphs);
      }

      if (!closed.has(component.glyphId)) {
        closed.add(component.glyphId);
        pending.push(component.glyphId);
      }
    }
  }

  return [...closed].sort((a, b) => a - b);
}

/**
 * TrueType Subsetter - creates a subset font with only the specified glyphs.
 */
export class TrueTypeSubsetter {
  private readonly requested = new Set<number>();

  constructor(private readonly font: TrueTypeFont) {}

  addGlyph(gid: number): void {
    this.requested.add(gid);
  }

  addGlyphs(gids: Iterable<number>): void {
    for (const gid of gids) {
      this.addGlyph(gid);
    }
  }

  /**
   * Write the subset font.
   */
  write(): SubsetProgram {
    const glyphIds = closeGlyphSet(this.font, this.requested);
    const newIds = new Map(glyphIds.map((gid, index) => [gid, index]));

    const { glyf, offsets } = this.buildGlyf(glyphIds, newIds);
    const longLoca = offsets[offsets.length - 1] / 2 > 0xffff;

    const tables = new Map<string, Uint8Array>([
      ["head", this.buildHead(longLoca)],
      ["hhea", this.patchTable("hhea", HHEA_NUMBER_OF_HMETRICS_OFFSET, glyphIds.length)],
      ["maxp", this.patchTable("maxp", MAXP_NUM_GLYPHS_OFFSET, glyphIds.length)],
      ["hmtx", this.buildHmtx(glyphIds)],
      ["loca", buildLoca(offsets, longLoca)],
      ["glyf", glyf],
    ]);

    for (const tag of COPIED_TABLES) {
      const data = this.font.getTableBytes(tag);

      if (data) {
        tables.set(tag, data);
      }
    }

    return { glyphIds, bytes: writeSfnt(tables) };
  }

  /**
   * Copy glyph outlines in new-id order, rewriting component ids.
   * Each glyph is padded to 4 bytes so short 'loca' offsets stay exact.
   */
  private buildGlyf(
    glyphIds: number[],
    newIds: Map<number, number>,
  ): { glyf: Uint8Array; offsets: number[] } {
    const writer = new BinaryWriter();
    const offsets: number[] = [];

    for (const gid of glyphIds) {
      offsets.push(writer.position);

      let data = this.font.getGlyphData(gid);

      if (isCompositeGlyph(data)) {
        data = remapComponents(data, oldId => {
          const newId = newIds.get(oldId);

          if (newId === undefined) {
            throw new IncompleteGlyphClosureError(gid, oldId, this.font.numGlyphs);
          }

          return newId;
        });
      }

      writer.writeBytes(data);
      writer.writeAlignmentPadding(4);
    }

    offsets.push(writer.position);

    return { glyf: writer.toBytes(), offsets };
  }

  private buildHmtx(glyphIds: number[]): Uint8Array {
    const writer = new BinaryWriter();

    for (const gid of glyphIds) {
      writer.writeUint16(this.font.getAdvanceWidth(gid));
      writer.writeInt16(this.font.getLeftSideBearing(gid));
    }

    return writer.toBytes();
  }

  private buildHead(longLoca: boolean): Uint8Array {
    const head = this.requireTable("head").slice();

    setUint16(head, HEAD_INDEX_TO_LOC_FORMAT_OFFSET, longLoca ? 1 : 0);

    return head;
  }

  private patchTable(tag: string, at: number, value: number): Uint8Array {
    const data = this.requireTable(tag).slice();

    setUint16(data, at, value);

    return data;
  }

  private requireTable(tag: string): Uint8Array {
    const data = this.font.getTableBytes(tag);

    if (!data) {
      throw new Error(`'${tag}' table is mandatory`);
    }

    return data;
  }
}

function buildLoca(offsets: number[], long: boolean): Uint8Array {
  const writer = new BinaryWriter();

  for (const offset of offsets) {
    if (long) {
      writer.writeUint32(offset);
    } else {
      writer.writeUint16(offset / 2);
    }
  }

  return writer.toBytes();
}

function setUint16(data: Uint8Array, at: number, value: number): void {
  data[at] = (value >> 8) & 0xff;
  data[at + 1] = value & 0xff;
}
