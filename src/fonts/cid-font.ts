/**
 * Embedding of TrueType subsets as composite (Type0) fonts.
 *
 * Object structure:
 * ```
 * Type0 font (/Encoding /Identity-H, /ToUnicode)
 *   └── CIDFontType2 (/CIDToGIDMap /Identity, /W)
 *         └── FontDescriptor
 *               └── FontFile2 stream (the subset program)
 * ```
 */

import type { ContentCache } from "#src/document/content-cache";
import { type ContentKey, contentKey, type KeyField } from "#src/document/content-key";
import type { ObjectStore } from "#src/document/object-store";
import type { TrueTypeFont } from "#src/fontbox/ttf/truetype-font";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { PdfString } from "#src/objects/pdf-string";
import { type FontSubset, toThousandths } from "./font-subset";
import { buildToUnicodeCMap } from "./to-unicode";

const FLAG_FIXED_PITCH = 1 << 0;
const FLAG_SYMBOLIC = 1 << 2;
const FLAG_ITALIC = 1 << 6;

export interface FontEmbedContext {
  store: ObjectStore;
  cache: ContentCache;
}

/**
 * Key of an embedded font: the subset program plus its text mappings.
 */
export function embeddedFontKey(subset: FontSubset, text: ReadonlyMap<number, string>): ContentKey {
  const pairs: KeyField[] = [...text].sort(([a], [b]) => a - b).flat();

  return contentKey("font-subset", subset.key, pairs);
}

/**
 * FontDescriptor flags. Embedded subsets are always marked symbolic since
 * their glyphs are addressed by code, not by a standard encoding.
 */
export function computeFontFlags(font: TrueTypeFont): number {
  let flags = FLAG_SYMBOLIC;

  if (font.isFixedPitch) {
    flags |= FLAG_FIXED_PITCH;
  }

  if (font.italicAngle !== 0) {
    flags |= FLAG_ITALIC;
  }

  return flags;
}

/**
 * Estimate the dominant vertical stem width from the weight class.
 */
export function estimateStemV(weightClass: number): number {
  return Math.round(10 + (220 * (weightClass - 50)) / 900);
}

/**
 * `/W` array for consecutive codes starting at 0: `[0 [w0 w1 ...]]`.
 */
export function buildWidthsArray(widths: readonly number[]): PdfArray {
  return PdfArray.of(PdfNumber.of(0), PdfArray.ofNumbers(widths));
}

/**
 * Build the FontDescriptor with metrics scaled to 1000 units per em.
 */
export function buildFontDescriptor(font: TrueTypeFont, fontName: string, fontFile: PdfRef): PdfDict {
  const scale = (value: number) => toThousandths(value, font.unitsPerEm);

  return PdfDict.of({
    Type: PdfName.of("FontDescriptor"),
    FontName: PdfName.of(fontName),
    Flags: PdfNumber.of(computeFontFlags(font)),
    FontBBox: PdfArray.ofNumbers(font.bbox.map(scale)),
    ItalicAngle: PdfNumber.of(font.italicAngle),
    Ascent: PdfNumber.of(scale(font.ascent)),
    Descent: PdfNumber.of(scale(font.descent)),
    CapHeight: PdfNumber.of(scale(font.capHeight)),
    StemV: PdfNumber.of(estimateStemV(font.weightClass)),
    FontFile2: fontFile,
  });
}

/**
 * The name a subset is embedded under: `TAG+PostScriptName`.
 */
export function subsetFontName(font: TrueTypeFont, subset: FontSubset): string {
  const baseName = (font.postScriptName ?? font.familyName ?? "Unnamed").replace(/\s+/g, "");

  return `${subset.subsetTag}+${baseName}`;
}

/**
 * Define the objects of an embedded subset and return the Type0 font ref.
 *
 * The font program is shared through the cache, so fonts that differ only
 * in their text mappings embed the program once.
 *
 * @param text - Text per code, for the ToUnicode map
 */
export async function embedFontSubset(
  ctx: FontEmbedContext,
  font: TrueTypeFont,
  subset: FontSubset,
  text: ReadonlyMap<number, string>,
): Promise<PdfRef> {
  const { store, cache } = ctx;

  const fontFile = await cache.getOrBuild(subset.key, () =>
    store.register(
      PdfStream.fromDict({ Length1: PdfNumber.of(subset.program.length) }, subset.program),
    ),
  );

  const fontName = subsetFontName(font, subset);
  const descriptor = store.register(buildFontDescriptor(font, fontName, fontFile));

  const cidFont = store.register(
    PdfDict.of({
      Type: PdfName.Font,
      Subtype: PdfName.of("CIDFontType2"),
      BaseFont: PdfName.of(fontName),
      CIDSystemInfo: PdfDict.of({
        Registry: PdfString.fromText("Adobe"),
        Ordering: PdfString.fromText("Identity"),
        Supplement: PdfNumber.of(0),
      }),
      FontDescriptor: descriptor,
      W: buildWidthsArray(subset.widths),
      CIDToGIDMap: PdfName.of("Identity"),
    }),
  );

  const type0 = PdfDict.of({
    Type: PdfName.Font,
    Subtype: PdfName.of("Type0"),
    BaseFont: PdfName.of(fontName),
    Encoding: PdfName.of("Identity-H"),
    DescendantFonts: PdfArray.of(cidFont),
  });

  if (text.size > 0) {
    type0.set("ToUnicode", store.register(new PdfStream([], buildToUnicodeCMap(text))));
  }

  return store.register(type0);
}
