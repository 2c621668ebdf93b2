/**
 * Parsed TrueType font.
 *
 * Holds the decoded tables a subsetter and a PDF font descriptor need, plus
 * raw access to every table for copying.
 */

import type {
  HeadTable,
  HheaTable,
  HmtxTable,
  NameTable,
  Os2Table,
  PostTable,
  TableRecord,
} from "./types";

export interface TrueTypeTables {
  head: HeadTable;
  hhea: HheaTable;
  hmtx: HmtxTable;
  post?: PostTable;
  os2?: Os2Table;
  name: NameTable;
  numGlyphs: number;
  /** numGlyphs + 1 offsets into 'glyf' */
  loca: number[];
  cmap: Map<number, number>;
}

export class TrueTypeFont {
  constructor(
    readonly data: Uint8Array,
    private readonly tableRecords: Map<string, TableRecord>,
    private readonly tables: TrueTypeTables,
  ) {}

  get numGlyphs(): number {
    return this.tables.numGlyphs;
  }

  get unitsPerEm(): number {
    return this.tables.head.unitsPerEm;
  }

  get head(): HeadTable {
    return this.tables.head;
  }

  get hhea(): HheaTable {
    return this.tables.hhea;
  }

  /** [xMin, yMin, xMax, yMax] in font units */
  get bbox(): [number, number, number, number] {
    const { xMin, yMin, xMax, yMax } = this.tables.head;

    return [xMin, yMin, xMax, yMax];
  }

  get postScriptName(): string | undefined {
    return this.tables.name.postScriptName;
  }

  get familyName(): string | undefined {
    return this.tables.name.familyName;
  }

  get italicAngle(): number {
    return this.tables.post?.italicAngle ?? 0;
  }

  get isFixedPitch(): boolean {
    return this.tables.post?.isFixedPitch ?? false;
  }

  /** Typographic ascender, falling back to 'hhea' */
  get ascent(): number {
    return this.tables.os2?.typoAscender ?? this.tables.hhea.ascender;
  }

  get descent(): number {
    return this.tables.os2?.typoDescender ?? this.tables.hhea.descender;
  }

  /** Cap height, falling back to the ascent when 'OS/2' has none */
  get capHeight(): number {
    return this.tables.os2?.capHeight ?? this.ascent;
  }

  get weightClass(): number {
    return this.tables.os2?.weightClass ?? 400;
  }

  hasTable(tag: string): boolean {
    return this.tableRecords.has(tag);
  }

  /**
   * Raw bytes of a table (a view into the font data).
   */
  getTableBytes(tag: string): Uint8Array | undefined {
    const record = this.tableRecords.get(tag);

    if (!record) {
      return undefined;
    }

    return this.data.subarray(record.offset, record.offset + record.length);
  }

  /**
   * Raw 'glyf' data of one glyph. Empty glyphs return a zero-length array.
   */
  getGlyphData(gid: number): Uint8Array {
    this.checkGlyphId(gid);

    const glyf = this.getTableBytes("glyf") ?? new Uint8Array(0);
    const start = this.tables.loca[gid];
    const end = this.tables.loca[gid + 1];

    if (end > glyf.length) {
      throw new Error(`Glyph ${gid} extends past the end of 'glyf'`);
    }

    return glyf.subarray(start, end);
  }

  getAdvanceWidth(gid: number): number {
    this.checkGlyphId(gid);

    return this.tables.hmtx.advanceWidths[gid];
  }

  getLeftSideBearing(gid: number): number {
    this.checkGlyphId(gid);

    return this.tables.hmtx.leftSideBearings[gid];
  }

  /**
   * Glyph id for a Unicode code point, 0 (.notdef) if unmapped.
   */
  getGlyphId(codePoint: number): number {
    return this.tables.cmap.get(codePoint) ?? 0;
  }

  hasGlyph(codePoint: number): boolean {
    return this.tables.cmap.has(codePoint);
  }

  private checkGlyphId(gid: number): void {
    if (!Number.isInteger(gid) || gid < 0 || gid >= this.tables.numGlyphs) {
      throw new RangeError(`Glyph id ${gid} is out of range (font has ${this.tables.numGlyphs} glyphs)`);
    }
  }
}
