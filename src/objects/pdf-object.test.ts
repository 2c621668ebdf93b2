import { describe, expect, it } from "vitest";
import { PdfArray } from "./pdf-array";
import { PdfBool } from "./pdf-bool";
import { PdfDict } from "./pdf-dict";
import { PdfName } from "./pdf-name";
import { PdfNull } from "./pdf-null";
import { PdfNumber } from "./pdf-number";
import { collectRefs, remapRefs } from "./pdf-object";
import { PdfRef } from "./pdf-ref";
import { PdfStream } from "./pdf-stream";
import { PdfString } from "./pdf-string";
import { serializeObject } from "#src/writer/serializer";
import { bytesToLatin1 } from "#src/test-utils";

const text = (obj: Parameters<typeof serializeObject>[0]) => bytesToLatin1(serializeObject(obj));

describe("primitive serialization", () => {
  it("writes numbers, booleans and null", () => {
    expect(text(PdfNumber.of(42))).toBe("42");
    expect(text(PdfNumber.of(-0.5))).toBe("-0.5");
    expect(text(PdfNumber.of(1 / 3))).toBe("0.33333");
    expect(text(PdfBool.of(true))).toBe("true");
    expect(text(PdfNull.instance)).toBe("null");
  });

  it("escapes delimiters and non-printable bytes in names", () => {
    expect(text(PdfName.of("Type"))).toBe("/Type");
    expect(text(PdfName.of("A B"))).toBe("/A#20B");
    expect(text(PdfName.of("a/b#c"))).toBe("/a#2Fb#23c");
  });

  it("interns names and references", () => {
    expect(PdfName.of("Font")).toBe(PdfName.Font);
    expect(PdfRef.of(7)).toBe(PdfRef.of(7, 0));
    expect(text(PdfRef.of(7))).toBe("7 0 R");
  });

  it("escapes parentheses and backslashes in literal strings", () => {
    const str = new PdfString(new TextEncoder().encode("a(b)\\c"));

    expect(text(str)).toBe("(a\\(b\\)\\\\c)");
  });

  it("writes hex strings in upper case", () => {
    expect(text(new PdfString(new Uint8Array([0xab, 0x01]), "hex"))).toBe("<AB01>");
  });
});

describe("PdfString.fromText", () => {
  it("keeps printable ASCII as a literal string", () => {
    expect(text(PdfString.fromText("Report 2024"))).toBe("(Report 2024)");
  });

  it("encodes other text as UTF-16BE with a byte order mark", () => {
    expect(text(PdfString.fromText("é"))).toBe("<FEFF00E9>");
  });
});

describe("containers", () => {
  it("writes arrays space-separated", () => {
    expect(text(PdfArray.ofNumbers([0, 0, 612, 792]))).toBe("[0 0 612 792]");
    expect(text(new PdfArray())).toBe("[]");
  });

  it("writes dictionary entries in insertion order", () => {
    const dict = PdfDict.of({ Type: PdfName.Page, Count: PdfNumber.of(2) });

    expect(text(dict)).toBe("<<\n/Type /Page\n/Count 2\n>>");
    expect(text(new PdfDict())).toBe("<<\n>>");
  });

  it("writes streams with a computed /Length", () => {
    const stream = PdfStream.fromDict(
      { Length: PdfNumber.of(99), Type: PdfName.XObject },
      new TextEncoder().encode("q Q"),
    );

    expect(text(stream)).toBe("<<\n/Length 3\n/Type /XObject\n>>\nstream\nq Q\nendstream");
  });

  it("resolves references through typed getters", () => {
    const target = PdfDict.of({ Kind: PdfName.of("Target") });
    const dict = PdfDict.of({ Link: PdfRef.of(3), Size: PdfNumber.of(1) });
    const resolver = (ref: PdfRef) => (ref.objectNumber === 3 ? target : null);

    expect(dict.getDict("Link", resolver)).toBe(target);
    expect(dict.getDict("Link")).toBeUndefined();
    expect(dict.getRef("Link")).toBe(PdfRef.of(3));
    expect(dict.getNumber("Size")?.value).toBe(1);
    expect(dict.getName("Size")).toBeUndefined();
  });
});

describe("collectRefs", () => {
  it("finds nested references in traversal order", () => {
    const dict = PdfDict.of({
      A: PdfRef.of(4),
      B: PdfArray.of(PdfRef.of(2), PdfDict.of({ C: PdfRef.of(9) })),
      D: PdfRef.of(4),
    });

    expect(collectRefs(dict).map(ref => ref.objectNumber)).toEqual([4, 2, 9, 4]);
  });

  it("returns nothing for primitives", () => {
    expect(collectRefs(PdfNumber.of(1))).toEqual([]);
  });
});

describe("remapRefs", () => {
  it("copies containers and rewrites references", () => {
    const original = PdfDict.of({ Kids: PdfArray.of(PdfRef.of(5)), Parent: PdfRef.of(6) });

    const copy = remapRefs(original, ref => PdfRef.of(ref.objectNumber * 10));

    expect(copy).not.toBe(original);
    expect(text(copy)).toBe("<<\n/Kids [50 0 R]\n/Parent 60 0 R\n>>");
    expect(text(original)).toBe("<<\n/Kids [5 0 R]\n/Parent 6 0 R\n>>");
  });

  it("keeps stream data", () => {
    const data = new Uint8Array([1, 2, 3]);
    const stream = PdfStream.fromDict({ Font: PdfRef.of(1) }, data);

    const copy = remapRefs(stream, () => PdfRef.of(2));

    expect(copy.type).toBe("stream");
    expect(copy instanceof PdfStream && copy.data).toBe(data);
    expect(copy instanceof PdfStream && copy.getRef("Font")).toBe(PdfRef.of(2));
  });
});
