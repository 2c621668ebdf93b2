/**
 * TrueType table structures.
 *
 * Only the fields needed for subsetting and PDF font descriptors are kept.
 */

/** Entry in the sfnt table directory */
export interface TableRecord {
  tag: string;
  checksum: number;
  offset: number;
  length: number;
}

/** 'head' - font header */
export interface HeadTable {
  unitsPerEm: number;
  xMin: number;
  yMin: number;
  xMax: number;
  yMax: number;
  macStyle: number;
  /** 0 = short offsets (uint16 / 2), 1 = long offsets (uint32) */
  indexToLocFormat: number;
}

/** 'hhea' - horizontal header */
export interface HheaTable {
  ascender: number;
  descender: number;
  lineGap: number;
  advanceWidthMax: number;
  numberOfHMetrics: number;
}

/** 'hmtx' - horizontal metrics, expanded to one entry per glyph */
export interface HmtxTable {
  advanceWidths: number[];
  leftSideBearings: number[];
}

/** 'post' - PostScript information */
export interface PostTable {
  italicAngle: number;
  isFixedPitch: boolean;
}

/** 'OS/2' - OS/2 and Windows metrics */
export interface Os2Table {
  version: number;
  weightClass: number;
  typoAscender: number;
  typoDescender: number;
  /** Only present from version 2 */
  xHeight?: number;
  /** Only present from version 2 */
  capHeight?: number;
}

/** 'name' - the names we use */
export interface NameTable {
  familyName?: string;
  postScriptName?: string;
}
