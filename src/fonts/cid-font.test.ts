import { describe, expect, it } from "vitest";
import { ContentCache } from "#src/document/content-cache";
import { ObjectStore } from "#src/document/object-store";
import { parseTTF } from "#src/fontbox/ttf/parser";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { serializeObject } from "#src/writer/serializer";
import { buildTestFont, bytesToLatin1, TEST_GLYPHS } from "#src/test-utils";
import {
  buildWidthsArray,
  computeFontFlags,
  embeddedFontKey,
  embedFontSubset,
  estimateStemV,
  subsetFontName,
} from "./cid-font";
import { FontRegistry } from "./font-registry";
import { subsetFont } from "./font-subset";

const registry = new FontRegistry({ body: buildTestFont() });
const { font, fontDigest } = registry.get("body");

const text = (obj: Parameters<typeof serializeObject>[0]) => bytesToLatin1(serializeObject(obj));

describe("font descriptor values", () => {
  it("marks embedded fonts symbolic", () => {
    expect(computeFontFlags(font)).toBe(4);
  });

  it("adds the italic flag for slanted fonts", () => {
    expect(computeFontFlags(parseTTF(buildTestFont({ italicAngle: -12 })))).toBe(68);
  });

  it("estimates StemV from the weight class", () => {
    expect(estimateStemV(400)).toBe(96);
    expect(estimateStemV(700)).toBe(169);
  });

  it("writes widths as one run from code 0", () => {
    expect(text(buildWidthsArray([500, 600, 300]))).toBe("[0 [500 600 300]]");
  });

  it("prefixes the subset tag to the PostScript name", () => {
    const subset = subsetFont(font, fontDigest, [TEST_GLYPHS.A]);

    expect(subsetFontName(font, subset)).toBe(`${subset.subsetTag}+TestSans-Regular`);
  });
});

describe("embedFontSubset", () => {
  const embed = async (mappings: Map<number, string>) => {
    const store = new ObjectStore();
    const cache = new ContentCache();
    const subset = subsetFont(font, fontDigest, [TEST_GLYPHS.A, TEST_GLYPHS.B]);
    const ref = await embedFontSubset({ store, cache }, font, subset, mappings);

    return { store, cache, subset, ref };
  };

  it("builds the Type0 / CIDFontType2 / descriptor chain", async () => {
    const { store, subset, ref } = await embed(new Map([[1, "A"]]));
    const resolve = (r: PdfRef) => store.get(r);

    const type0 = store.get(ref);
    expect(type0).toBeInstanceOf(PdfDict);
    if (!(type0 instanceof PdfDict)) return;

    const fontName = `${subset.subsetTag}+TestSans-Regular`;

    expect(type0.getName("Subtype")?.value).toBe("Type0");
    expect(type0.getName("BaseFont")?.value).toBe(fontName);
    expect(type0.getName("Encoding")?.value).toBe("Identity-H");

    const descendants = type0.getArray("DescendantFonts");
    const cidRef = descendants?.at(0);
    expect(cidRef).toBeInstanceOf(PdfRef);
    if (!(cidRef instanceof PdfRef)) return;

    const cidFont = store.get(cidRef);
    if (!(cidFont instanceof PdfDict)) throw new Error("expected CIDFont dict");

    expect(cidFont.getName("Subtype")?.value).toBe("CIDFontType2");
    expect(cidFont.getName("CIDToGIDMap")?.value).toBe("Identity");
    expect(text(cidFont.get("W") ?? new PdfArray())).toBe("[0 [500 600 550]]");

    const descriptor = cidFont.getDict("FontDescriptor", resolve);
    if (!descriptor) throw new Error("expected FontDescriptor");

    expect(descriptor.getName("FontName")?.value).toBe(fontName);
    expect(text(descriptor.get("FontBBox") ?? new PdfArray())).toBe("[0 -200 1000 800]");
    expect(descriptor.getNumber("Ascent")?.value).toBe(750);
    expect(descriptor.getNumber("Descent")?.value).toBe(-250);
    expect(descriptor.getNumber("CapHeight")?.value).toBe(700);
    expect(descriptor.getNumber("StemV")?.value).toBe(96);
    expect(descriptor.getNumber("Flags")?.value).toBe(4);

    const fontFile = descriptor.get("FontFile2", resolve);
    expect(fontFile).toBeInstanceOf(PdfStream);
    if (!(fontFile instanceof PdfStream)) return;

    expect(fontFile.data).toEqual(subset.program);
    expect(fontFile.getNumber("Length1")?.value).toBe(subset.program.length);

    const toUnicode = type0.get("ToUnicode", resolve);
    expect(toUnicode).toBeInstanceOf(PdfStream);
  });

  it("omits ToUnicode without text", async () => {
    const { store, ref } = await embed(new Map());
    const type0 = store.get(ref);

    expect(type0 instanceof PdfDict && type0.has("ToUnicode")).toBe(false);
    // program, descriptor, CIDFont, Type0
    expect(store.definedCount).toBe(4);
  });

  it("shares the program between fonts that differ only in text", async () => {
    const store = new ObjectStore();
    const cache = new ContentCache();
    const subset = subsetFont(font, fontDigest, [TEST_GLYPHS.A]);

    await embedFontSubset({ store, cache }, font, subset, new Map([[1, "A"]]));
    await embedFontSubset({ store, cache }, font, subset, new Map([[1, "a"]]));

    const programs = store.finalize().filter(o => o.object instanceof PdfStream && o.object.has("Length1"));

    expect(programs).toHaveLength(1);
    expect(cache.stats.hits).toBe(1);
  });

  it("keys embedded fonts by program and text", () => {
    const subset = subsetFont(font, fontDigest, [TEST_GLYPHS.A]);

    expect(embeddedFontKey(subset, new Map([[1, "A"]]))).toBe(embeddedFontKey(subset, new Map([[1, "A"]])));
    expect(embeddedFontKey(subset, new Map([[1, "A"]]))).not.toBe(
      embeddedFontKey(subset, new Map([[1, "a"]])),
    );
  });
});
