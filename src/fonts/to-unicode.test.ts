import { describe, expect, it } from "vitest";
import { bytesToLatin1 } from "#src/test-utils";
import { buildToUnicodeCMap, utf16Hex } from "./to-unicode";

describe("utf16Hex", () => {
  it("encodes BMP characters as four hex digits", () => {
    expect(utf16Hex("AÄ")).toBe("004100C4");
  });

  it("encodes astral characters as surrogate pairs", () => {
    expect(utf16Hex("\u{1F600}")).toBe("D83DDE00");
  });

  it("keeps ligature text together", () => {
    expect(utf16Hex("fi")).toBe("00660069");
  });
});

describe("buildToUnicodeCMap", () => {
  it("writes bfchar entries in code order", () => {
    const cmap = bytesToLatin1(
      buildToUnicodeCMap(
        new Map([
          [4, "Ä"],
          [1, "A"],
        ]),
      ),
    );

    expect(cmap).toBe(
      [
        "/CIDInit /ProcSet findresource begin",
        "12 dict begin",
        "begincmap",
        "/CIDSystemInfo",
        "<< /Registry (Adobe)",
        "/Ordering (UCS)",
        "/Supplement 0",
        ">> def",
        "/CMapName /Adobe-Identity-UCS def",
        "/CMapType 2 def",
        "1 begincodespacerange",
        "<0000> <FFFF>",
        "endcodespacerange",
        "2 beginbfchar",
        "<0001> <0041>",
        "<0004> <00C4>",
        "endbfchar",
        "endcmap",
        "CMapName currentdict /CMap defineresource pop",
        "end",
        "end",
        "",
      ].join("\n"),
    );
  });

  it("splits long maps into blocks of 100", () => {
    const mappings = new Map<number, string>();

    for (let code = 1; code <= 101; code++) {
      mappings.set(code, "x");
    }

    const lines = bytesToLatin1(buildToUnicodeCMap(mappings)).split("\n");

    expect(lines.filter(line => line.endsWith("beginbfchar"))).toEqual([
      "100 beginbfchar",
      "1 beginbfchar",
    ]);
    expect(lines).toContain("<0065> <0078>");
  });

  it("skips empty text", () => {
    const lines = bytesToLatin1(buildToUnicodeCMap(new Map([[3, ""]]))).split("\n");

    expect(lines.some(line => line.endsWith("beginbfchar"))).toBe(false);
  });
});
