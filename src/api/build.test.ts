import { describe, expect, it } from "vitest";
import type { Instruction, PageRecord } from "#src/content/instructions";
import { ConfigError, IncompleteDocumentError, ResourceDecodeFailedError, UnbalancedStateError } from "#src/errors";
import { SharedContentCache } from "#src/fonts/shared-cache";
import { bytesToHex } from "#src/helpers/buffer";
import { rgb } from "#src/helpers/colors";
import { PdfDict } from "#src/objects/pdf-dict";
import { collectRefs } from "#src/objects/pdf-object";
import { PdfStream } from "#src/objects/pdf-stream";
import { buildTestFont, buildTestJpeg, bytesToLatin1, TEST_GLYPHS } from "#src/test-utils";
import { fileIdentifier } from "#src/writer/pdf-writer";
import { serializeObject } from "#src/writer/serializer";
import { type BuildResult, buildDocument, type DocumentInput } from "./build";

function text(font: string, ids: number[], y = 700): Instruction {
  return {
    op: "text",
    font,
    size: 12,
    runs: [{ x: 72, y, glyphs: ids.map(id => ({ id, text: String.fromCharCode(64 + id) })) }],
  };
}

function page(...instructions: Instruction[]): PageRecord {
  return { width: 612, height: 792, instructions };
}

function countSubtype(result: BuildResult, subtype: string): number {
  return result.objects.filter(
    ({ object }) => object instanceof PdfDict && object.getName("Subtype")?.value === subtype,
  ).length;
}

function pageDicts(result: BuildResult): PdfDict[] {
  return result.objects
    .map(({ object }) => object)
    .filter((object): object is PdfDict => object instanceof PdfDict && object.getName("Type")?.value === "Page");
}

function countType(result: BuildResult, type: string): number {
  return result.objects.filter(
    ({ object }) => object instanceof PdfDict && object.getName("Type")?.value === type,
  ).length;
}

const { A, B, C, Adieresis } = TEST_GLYPHS;

/** Fonts, images, opacity and a group spread over several pages */
function richDocument(): DocumentInput {
  return {
    fonts: {
      body: buildTestFont(),
      heading: buildTestFont({ postScriptName: "TestHeading-Bold" }),
    },
    images: {
      logo: {
        kind: "raw",
        width: 2,
        height: 1,
        colorSpace: "rgb",
        data: new Uint8Array([255, 0, 0, 0, 0, 255]),
        alpha: new Uint8Array([255, 128]),
      },
      photo: { kind: "jpeg", data: buildTestJpeg(4, 3) },
    },
    groups: {
      badge: {
        bbox: [0, 0, 50, 20],
        instructions: [
          { op: "setAlpha", fill: 0.5 },
          { op: "path", segments: [{ type: "rect", x: 0, y: 0, width: 50, height: 20 }], paint: "fill" },
          text("heading", [A], 5),
        ],
      },
    },
    pages: Array.from({ length: 6 }, (_, i) =>
      page(
        text(i % 2 === 0 ? "body" : "heading", [A + (i % 3), Adieresis]),
        { op: "save" },
        { op: "setFill", color: rgb(0, 0, 1) },
        { op: "setAlpha", fill: 0.5 },
        { op: "image", image: i % 2 === 0 ? "logo" : "photo", transform: [100, 0, 0, 50, 72, 600] },
        { op: "restore" },
        { op: "group", group: "badge", transform: [1, 0, 0, 1, 72, 72] },
      ),
    ),
    metadata: { title: "Quarterly Report", authors: ["Test Author"] },
  };
}

describe("buildDocument", () => {
  it("writes a complete file", async () => {
    const result = await buildDocument({ pages: [page()] });
    const text = bytesToLatin1(result.bytes);

    expect(text.startsWith("%PDF-1.7\n")).toBe(true);
    expect(text.endsWith("%%EOF\n")).toBe(true);
    expect(result.root.objectNumber).toBe(1);
    expect(result.stats.pages).toBe(1);
  });

  it("embeds a font used on several pages once", async () => {
    const result = await buildDocument({
      fonts: { body: buildTestFont() },
      pages: [page(text("body", [A, B])), page(text("body", [B, C]))],
    });

    expect(countSubtype(result, "Type0")).toBe(1);
    expect(countSubtype(result, "CIDFontType2")).toBe(1);
    expect(result.stats.fontSubsets).toBe(1);
  });

  it("points every page at the one font it shares", async () => {
    const run = text("body", [A, B, C]);
    const result = await buildDocument({ fonts: { body: buildTestFont() }, pages: [page(run), page(run)] });

    const fonts = result.objects.filter(
      ({ object }) => object instanceof PdfDict && object.getName("Subtype")?.value === "Type0",
    );
    const pageFonts = pageDicts(result).map(dict => dict.getDict("Resources")?.getDict("Font")?.getRef("F1"));

    expect(fonts).toHaveLength(1);
    expect(pageFonts).toEqual([fonts[0].ref, fonts[0].ref]);
  });

  it("defines one opacity state for all pages that use it", async () => {
    const alpha: Instruction = { op: "setAlpha", fill: 0.25 };
    const result = await buildDocument({ pages: [page(alpha), page(alpha), page(alpha)] });

    expect(countType(result, "ExtGState")).toBe(1);
  });

  it("produces the same bytes with one lane or many", async () => {
    const sequential = await buildDocument(richDocument(), { enableParallelism: false });
    const parallel = await buildDocument(richDocument(), { workerCount: 4 });

    expect(sequential.stats.concurrency).toBe(1);
    expect(parallel.stats.concurrency).toBe(4);
    expect(parallel.bytes).toEqual(sequential.bytes);
  });

  it("leaves no dangling references and shares resources", async () => {
    const result = await buildDocument(richDocument());
    const numbers = new Set(result.objects.map(({ ref }) => ref.objectNumber));

    for (const { object } of result.objects) {
      for (const ref of collectRefs(object)) {
        expect(numbers.has(ref.objectNumber)).toBe(true);
      }
    }

    expect([...numbers]).toEqual(result.objects.map((_, i) => i + 1));
    expect(countSubtype(result, "Type0")).toBe(2);
    expect(countSubtype(result, "Form")).toBe(1);
    // pages set both opacities; the group inherits stroke opacity and sets fill only
    expect(countType(result, "ExtGState")).toBe(2);
    // logo, its soft mask and photo
    expect(countSubtype(result, "Image")).toBe(3);
    expect(countType(result, "Page")).toBe(6);
  });

  it("applies numeric precision to content streams only", async () => {
    const result = await buildDocument(
      {
        pages: [
          { width: 612.123456, height: 792, instructions: [{ op: "transform", matrix: [0.123456, 0, 0, 1, 0, 0] }] },
        ],
      },
      { numericPrecision: 2, compressStreams: false },
    );
    const [pageDict] = pageDicts(result);
    const contentRef = pageDict.getRef("Contents");
    const content = result.objects.find(({ ref }) => ref === contentRef)?.object;
    const mediaBox = pageDict.getArray("MediaBox");

    expect(mediaBox && bytesToLatin1(serializeObject(mediaBox))).toBe("[0 0 612.12346 792]");
    expect(content instanceof PdfStream && bytesToLatin1(content.data)).toBe("0.12 0 0 1 0 0 cm");
  });

  it("writes an xref stream when asked", async () => {
    const result = await buildDocument({ pages: [page()] }, { crossReferenceStyle: "stream" });

    expect(bytesToLatin1(result.bytes)).toContain("/Type /XRef");
    expect(bytesToLatin1(result.bytes)).not.toContain("\ntrailer\n");
  });

  it("uses the caller's document id for the first file identifier", async () => {
    const result = await buildDocument({ pages: [page()], metadata: { documentId: "report-1" } });

    expect(bytesToLatin1(result.bytes)).toContain(`/ID [<${bytesToHex(fileIdentifier("1.7", "report-1"))}> <`);
  });

  it("reuses subsets from a shared cache across builds", async () => {
    const sharedCache = new SharedContentCache();
    const input: DocumentInput = { fonts: { body: buildTestFont() }, pages: [page(text("body", [A]))] };

    const first = await buildDocument(input, { sharedCache });
    const second = await buildDocument(input, { sharedCache });

    expect(sharedCache.stats).toEqual({ lookups: 2, reused: 1 });
    expect(second.bytes).toEqual(first.bytes);
  });

  it("rejects a document without pages", async () => {
    await expect(buildDocument({ pages: [] })).rejects.toThrow(IncompleteDocumentError);
  });

  it("rejects invalid options before building", async () => {
    await expect(buildDocument({ pages: [page()] }, { numericPrecision: -1 })).rejects.toThrow(ConfigError);
  });

  it("fails for unregistered fonts", async () => {
    await expect(buildDocument({ pages: [page(text("missing", [A]))] })).rejects.toThrow(
      ResourceDecodeFailedError,
    );
  });

  it("fails when one page is unbalanced", async () => {
    const pages = [page(), page({ op: "save" }), page()];

    await expect(buildDocument({ pages })).rejects.toThrow(UnbalancedStateError);
  });
});
