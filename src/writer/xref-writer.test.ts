import { describe, expect, it } from "vitest";
import { ByteWriter } from "#src/io/byte-writer";
import { PdfRef } from "#src/objects/pdf-ref";
import { bytesToLatin1 } from "#src/test-utils";
import { serializeObject } from "./serializer";
import { buildXRefStream, writeXRefStream, writeXRefTable, type XRefWriteEntry } from "./xref-writer";

const entries: XRefWriteEntry[] = [
  { objectNumber: 0, generation: 65535, type: "free", offset: 0 },
  { objectNumber: 1, generation: 0, type: "inuse", offset: 15 },
  { objectNumber: 2, generation: 0, type: "inuse", offset: 300 },
];

describe("writeXRefTable", () => {
  it("writes 20-byte entries, the trailer and the footer", () => {
    const writer = new ByteWriter();

    writeXRefTable(writer, { entries, size: 3, xrefOffset: 400, root: PdfRef.of(1) });

    expect(bytesToLatin1(writer.toBytes())).toBe(
      "xref\n0 3\n" +
        "0000000000 65535 f\r\n" +
        "0000000015 00000 n\r\n" +
        "0000000300 00000 n\r\n" +
        "trailer\n<<\n/Size 3\n/Root 1 0 R\n>>\n" +
        "startxref\n400\n%%EOF\n",
    );
  });

  it("splits non-contiguous numbers into subsections", () => {
    const writer = new ByteWriter();

    writeXRefTable(writer, {
      entries: [
        { objectNumber: 6, generation: 0, type: "inuse", offset: 600 },
        { objectNumber: 0, generation: 65535, type: "free", offset: 0 },
        { objectNumber: 5, generation: 0, type: "inuse", offset: 500 },
      ],
      size: 7,
      xrefOffset: 700,
      root: PdfRef.of(5),
    });

    const text = bytesToLatin1(writer.toBytes());

    expect(text.startsWith("xref\n0 1\n0000000000 65535 f\r\n5 2\n0000000500 00000 n\r\n")).toBe(true);
  });

  it("adds info and the file identifier to the trailer", () => {
    const writer = new ByteWriter();

    writeXRefTable(writer, {
      entries,
      size: 3,
      xrefOffset: 400,
      root: PdfRef.of(1),
      info: PdfRef.of(2),
      id: [new Uint8Array([0x01, 0xab]), new Uint8Array([0xcd, 0x02])],
    });

    expect(bytesToLatin1(writer.toBytes())).toContain(
      "trailer\n<<\n/Size 3\n/Root 1 0 R\n/Info 2 0 R\n/ID [<01AB> <CD02>]\n>>\n",
    );
  });
});

describe("buildXRefStream", () => {
  it("packs entries with the narrowest field widths", () => {
    const stream = buildXRefStream({ entries, size: 3, xrefOffset: 400, root: PdfRef.of(1) });

    expect(stream.data).toEqual(
      new Uint8Array([
        0x00, 0x00, 0x00, 0xff, 0xff,
        0x01, 0x00, 0x0f, 0x00, 0x00,
        0x01, 0x01, 0x2c, 0x00, 0x00,
      ]),
    );
    expect(bytesToLatin1(serializeObject(stream)).split("\nstream\n")[0]).toBe(
      "<<\n/Length 15\n/Type /XRef\n/Size 3\n/W [1 2 2]\n/Root 1 0 R\n>>",
    );
  });

  it("writes /Index when numbering does not start at zero or has gaps", () => {
    const stream = buildXRefStream({
      entries: [
        { objectNumber: 0, generation: 0, type: "free", offset: 0 },
        { objectNumber: 5, generation: 0, type: "inuse", offset: 10 },
        { objectNumber: 6, generation: 0, type: "inuse", offset: 20 },
      ],
      size: 7,
      xrefOffset: 30,
      root: PdfRef.of(5),
    });

    expect(bytesToLatin1(serializeObject(stream))).toContain("/W [1 1 1]\n/Index [0 1 5 2]\n");
  });
});

describe("writeXRefStream", () => {
  it("writes the stream as an indirect object followed by the footer", () => {
    const writer = new ByteWriter();

    writeXRefStream(writer, {
      entries,
      size: 4,
      xrefOffset: 400,
      root: PdfRef.of(1),
      streamRef: PdfRef.of(3),
    });

    const text = bytesToLatin1(writer.toBytes());

    expect(text.startsWith("3 0 obj\n<<\n/Length 15\n/Type /XRef\n/Size 4\n")).toBe(true);
    expect(text.endsWith("endstream\nendobj\nstartxref\n400\n%%EOF\n")).toBe(true);
  });

  it("runs the stream through the encoder", () => {
    const writer = new ByteWriter();

    const written = writeXRefStream(writer, {
      entries,
      size: 4,
      xrefOffset: 400,
      root: PdfRef.of(1),
      streamRef: PdfRef.of(3),
      encode: stream => {
        stream.set("Marked", PdfRef.of(1));

        return stream;
      },
    });

    expect(written.has("Marked")).toBe(true);
  });
});
