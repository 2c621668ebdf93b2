import { describe, expect, it } from "vitest";
import { PdfRef } from "#src/objects/pdf-ref";
import { serializeObject } from "#src/writer/serializer";
import { bytesToLatin1 } from "#src/test-utils";
import { ResourceNames } from "./resource-names";

describe("ResourceNames", () => {
  it("numbers names per prefix in first-use order", () => {
    const names = new ResourceNames();

    expect(names.nameFor("font", PdfRef.of(7))).toBe("F1");
    expect(names.nameFor("image", PdfRef.of(3))).toBe("Im1");
    expect(names.nameFor("font", PdfRef.of(2))).toBe("F2");
    expect(names.nameFor("group", PdfRef.of(9))).toBe("Fm1");
    expect(names.nameFor("extGState", PdfRef.of(4))).toBe("GS1");
  });

  it("reuses the name of an object already used", () => {
    const names = new ResourceNames();

    names.nameFor("image", PdfRef.of(3));

    expect(names.nameFor("image", PdfRef.of(3))).toBe("Im1");
    expect(names.size).toBe(1);
  });

  it("groups entries into resource subdictionaries", () => {
    const names = new ResourceNames();

    names.nameFor("extGState", PdfRef.of(4));
    names.nameFor("group", PdfRef.of(9));
    names.nameFor("font", PdfRef.of(7));
    names.nameFor("image", PdfRef.of(3));

    expect(bytesToLatin1(serializeObject(names.toResources()))).toBe(
      "<<\n/Font <<\n/F1 7 0 R\n>>\n/XObject <<\n/Fm1 9 0 R\n/Im1 3 0 R\n>>\n/ExtGState <<\n/GS1 4 0 R\n>>\n>>",
    );
  });

  it("produces an empty dictionary when nothing is used", () => {
    expect(new ResourceNames().toResources().size).toBe(0);
  });
});
