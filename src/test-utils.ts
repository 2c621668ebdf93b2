/**
 * Test utilities for pdf-forge.
 *
 * Fonts and images are generated in memory so tests need no fixture files.
 */

import { writeSfnt } from "#src/fontbox/ttf/sfnt-writer";
import { BinaryWriter } from "#src/io/binary-writer";

/**
 * Create a Uint8Array from a string (for creating test data).
 *
 * @param str - The ASCII string to convert
 */
export function stringToBytes(str: string): Uint8Array {
  return new Uint8Array(str.split("").map(c => c.charCodeAt(0)));
}

/**
 * Convert bytes to a string, one character per byte.
 */
export function bytesToLatin1(bytes: Uint8Array): string {
  let result = "";

  for (const byte of bytes) {
    result += String.fromCharCode(byte);
  }

  return result;
}

/**
 * Glyph ids of the generated test font.
 *
 * `Adieresis` is a composite of `A` and `dieresis`; `Adieresismacron` is a
 * composite of `Adieresis`, so its closure is two levels deep.
 */
export const TEST_GLYPHS = {
  notdef: 0,
  A: 1,
  B: 2,
  C: 3,
  Adieresis: 4,
  dieresis: 5,
  space: 6,
  Adieresismacron: 7,
} as const;

/** Advance widths of the test font, by glyph id, in font units */
export const TEST_ADVANCE_WIDTHS = [500, 600, 550, 650, 600, 300, 250, 600];

export interface TestFontOptions {
  unitsPerEm?: number;
  postScriptName?: string;
  /** Replace the `dieresis` component of `Adieresis` with this id */
  brokenComponentId?: number;
  italicAngle?: number;
}

/**
 * Build a small TrueType font.
 *
 * cmap: U+0020 space, U+0041-0043 A-C, U+00C4 Adieresis, U+01DE Adieresismacron.
 * The dieresis glyph has no code point.
 */
export function buildTestFont(options: TestFontOptions = {}): Uint8Array {
  const unitsPerEm = options.unitsPerEm ?? 1000;
  const numGlyphs = TEST_ADVANCE_WIDTHS.length;

  const glyphs: Uint8Array[] = [
    simpleGlyph(500, 700),
    simpleGlyph(600, 700),
    simpleGlyph(550, 700),
    simpleGlyph(650, 700),
    compositeGlyph([
      { glyphId: TEST_GLYPHS.A, words: true },
      { glyphId: options.brokenComponentId ?? TEST_GLYPHS.dieresis, words: false, scale: true },
    ]),
    simpleGlyph(300, 900),
    new Uint8Array(0),
    compositeGlyph([{ glyphId: TEST_GLYPHS.Adieresis, words: true }]),
  ];

  const glyf = new BinaryWriter();
  const offsets: number[] = [];

  for (const glyph of glyphs) {
    offsets.push(glyf.position);
    glyf.writeBytes(glyph);
    glyf.writeAlignmentPadding(2);
  }

  offsets.push(glyf.position);

  const loca = new BinaryWriter();

  for (const offset of offsets) {
    loca.writeUint16(offset / 2);
  }

  const hmtx = new BinaryWriter();

  for (const width of TEST_ADVANCE_WIDTHS) {
    hmtx.writeUint16(width);
    hmtx.writeInt16(0);
  }

  const maxp = new BinaryWriter();
  maxp.writeUint32(0x00005000);
  maxp.writeUint16(numGlyphs);

  return writeSfnt(
    new Map([
      ["head", buildHead(unitsPerEm)],
      ["hhea", buildHhea(numGlyphs)],
      ["maxp", maxp.toBytes()],
      ["hmtx", hmtx.toBytes()],
      ["loca", loca.toBytes()],
      ["glyf", glyf.toBytes()],
      ["cmap", buildCmap()],
      ["post", buildPost(options.italicAngle ?? 0)],
      ["OS/2", buildOs2()],
      ["name", buildName("Test Sans", options.postScriptName ?? "TestSans-Regular")],
      ["fpgm", new Uint8Array([0xb0, 0x01])],
      ["cvt ", new Uint8Array([0x00, 0x64])],
    ]),
  );
}

/** A one-contour triangle */
function simpleGlyph(xMax: number, yMax: number): Uint8Array {
  const w = new BinaryWriter();

  w.writeInt16(1); // numberOfContours
  w.writeInt16(0);
  w.writeInt16(0);
  w.writeInt16(xMax);
  w.writeInt16(yMax);
  w.writeUint16(2); // endPtsOfContours
  w.writeUint16(0); // instructionLength
  w.writeBytes(new Uint8Array([0x01, 0x01, 0x01])); // on-curve, word coordinates
  w.writeInt16(0);
  w.writeInt16(xMax);
  w.writeInt16(-Math.round(xMax / 2));
  w.writeInt16(0);
  w.writeInt16(0);
  w.writeInt16(yMax);

  return w.toBytes();
}

function compositeGlyph(
  components: Array<{ glyphId: number; words: boolean; scale?: boolean }>,
): Uint8Array {
  const w = new BinaryWriter();

  w.writeInt16(-1);
  w.writeInt16(0);
  w.writeInt16(0);
  w.writeInt16(600);
  w.writeInt16(900);

  components.forEach((component, i) => {
    let flags = 0x0002; // ARGS_ARE_XY_VALUES

    if (component.words) {
      flags |= 0x0001;
    }

    if (component.scale) {
      flags |= 0x0008;
    }

    if (i < components.length - 1) {
      flags |= 0x0020;
    }

    w.writeUint16(flags);
    w.writeUint16(component.glyphId);

    if (component.words) {
      w.writeInt16(0);
      w.writeInt16(0);
    } else {
      w.writeUint8(100);
      w.writeUint8(50);
    }

    if (component.scale) {
      w.writeUint16(0x4000); // 1.0 as F2Dot14
    }
  });

  return w.toBytes();
}

function buildHead(unitsPerEm: number): Uint8Array {
  const w = new BinaryWriter();

  w.writeUint32(0x00010000); // version
  w.writeUint32(0x00010000); // fontRevision
  w.writeUint32(0); // checkSumAdjustment
  w.writeUint32(0x5f0f3cf5); // magic
  w.writeUint16(0x000b); // flags
  w.writeUint16(unitsPerEm);
  w.writePadding(16); // created, modified
  w.writeInt16(0);
  w.writeInt16(-200);
  w.writeInt16(1000);
  w.writeInt16(800);
  w.writeUint16(0); // macStyle
  w.writeUint16(8); // lowestRecPPEM
  w.writeInt16(2); // fontDirectionHint
  w.writeInt16(0); // indexToLocFormat
  w.writeInt16(0); // glyphDataFormat

  return w.toBytes();
}

function buildHhea(numberOfHMetrics: number): Uint8Array {
  const w = new BinaryWriter();

  w.writeUint32(0x00010000);
  w.writeInt16(800); // ascender
  w.writeInt16(-200); // descender
  w.writeInt16(0); // lineGap
  w.writeUint16(650); // advanceWidthMax
  w.writePadding(6); // minLeftSideBearing, minRightSideBearing, xMaxExtent
  w.writeInt16(1); // caretSlopeRise
  w.writePadding(4); // caretSlopeRun, caretOffset
  w.writePadding(8); // reserved
  w.writeInt16(0); // metricDataFormat
  w.writeUint16(numberOfHMetrics);

  return w.toBytes();
}

function buildCmap(): Uint8Array {
  // [startCode, endCode, firstGlyphId]
  const segments: Array<[number, number, number]> = [
    [0x20, 0x20, TEST_GLYPHS.space],
    [0x41, 0x43, TEST_GLYPHS.A],
    [0xc4, 0xc4, TEST_GLYPHS.Adieresis],
    [0x1de, 0x1de, TEST_GLYPHS.Adieresismacron],
    [0xffff, 0xffff, 0],
  ];
  const segCount = segments.length;

  const w = new BinaryWriter();

  w.writeUint16(0); // version
  w.writeUint16(1); // numTables
  w.writeUint16(3); // platformID: Windows
  w.writeUint16(1); // encodingID: Unicode BMP
  w.writeUint32(12);

  w.writeUint16(4); // format
  w.writeUint16(16 + segCount * 8); // length
  w.writeUint16(0); // language
  w.writeUint16(segCount * 2);
  w.writeUint16(8); // searchRange
  w.writeUint16(2); // entrySelector
  w.writeUint16(segCount * 2 - 8); // rangeShift

  for (const [, end] of segments) {
    w.writeUint16(end);
  }

  w.writeUint16(0); // reservedPad

  for (const [start] of segments) {
    w.writeUint16(start);
  }

  for (const [start, , glyphId] of segments) {
    w.writeInt16(start === 0xffff ? 1 : glyphId - start);
  }

  for (let i = 0; i < segCount; i++) {
    w.writeUint16(0); // idRangeOffset
  }

  return w.toBytes();
}

function buildPost(italicAngle: number): Uint8Array {
  const w = new BinaryWriter();

  w.writeUint32(0x00030000);
  w.writeUint32(Math.round(italicAngle * 65536) >>> 0);
  w.writeInt16(-100); // underlinePosition
  w.writeInt16(50); // underlineThickness
  w.writeUint32(0); // isFixedPitch
  w.writePadding(16);

  return w.toBytes();
}

function buildOs2(): Uint8Array {
  const data = new Uint8Array(96);
  const view = new DataView(data.buffer);

  view.setUint16(0, 2); // version
  view.setUint16(4, 400); // usWeightClass
  view.setInt16(68, 750); // sTypoAscender
  view.setInt16(70, -250); // sTypoDescender
  view.setInt16(86, 500); // sxHeight
  view.setInt16(88, 700); // sCapHeight

  return data;
}

function buildName(family: string, postScriptName: string): Uint8Array {
  const encode = (text: string) => {
    const w = new BinaryWriter();

    for (let i = 0; i < text.length; i++) {
      w.writeUint16(text.charCodeAt(i));
    }

    return w.toBytes();
  };

  const strings = [
    { nameId: 1, bytes: encode(family) },
    { nameId: 6, bytes: encode(postScriptName) },
  ];

  const w = new BinaryWriter();

  w.writeUint16(0); // format
  w.writeUint16(strings.length);
  w.writeUint16(6 + strings.length * 12);

  let offset = 0;

  for (const { nameId, bytes } of strings) {
    w.writeUint16(3); // platformID
    w.writeUint16(1); // encodingID
    w.writeUint16(0x409); // languageID
    w.writeUint16(nameId);
    w.writeUint16(bytes.length);
    w.writeUint16(offset);
    offset += bytes.length;
  }

  for (const { bytes } of strings) {
    w.writeBytes(bytes);
  }

  return w.toBytes();
}

/**
 * Build the header of a baseline JPEG: SOI, an APP0 segment and SOF0.
 * Enough for dimension sniffing; not decodable.
 */
export function buildTestJpeg(width: number, height: number, components: 1 | 3 | 4 = 3): Uint8Array {
  const w = new BinaryWriter();

  w.writeUint16(0xffd8); // SOI

  w.writeUint16(0xffe0); // APP0
  w.writeUint16(16);
  w.writeBytes(stringToBytes("JFIF\0"));
  w.writePadding(9);

  w.writeUint16(0xffc0); // SOF0
  w.writeUint16(8 + components * 3);
  w.writeUint8(8); // precision
  w.writeUint16(height);
  w.writeUint16(width);
  w.writeUint8(components);

  for (let i = 0; i < components; i++) {
    w.writeUint8(i + 1);
    w.writeUint8(0x11);
    w.writeUint8(0);
  }

  w.writeUint16(0xffd9); // EOI

  return w.toBytes();
}
