import { describe, expect, it } from "vitest";
import { concatBytes } from "#src/helpers/buffer";
import { buildTestJpeg, stringToBytes } from "#src/test-utils";
import { parseJpegHeader } from "./jpeg";

function adobeSegment(): Uint8Array {
  return concatBytes([
    new Uint8Array([0xff, 0xee, 0x00, 0x0e]),
    stringToBytes("Adobe"),
    new Uint8Array([0x00, 0x64, 0x00, 0x00, 0x00, 0x00, 0x02]),
  ]);
}

describe("parseJpegHeader", () => {
  it("reads dimensions from the frame header", () => {
    expect(parseJpegHeader(buildTestJpeg(640, 480))).toEqual({
      width: 640,
      height: 480,
      components: 3,
      bitsPerComponent: 8,
      adobe: false,
    });
  });

  it("reads grayscale and CMYK component counts", () => {
    expect(parseJpegHeader(buildTestJpeg(10, 20, 1)).components).toBe(1);
    expect(parseJpegHeader(buildTestJpeg(10, 20, 4)).components).toBe(4);
  });

  it("detects the Adobe APP14 segment", () => {
    const jpeg = buildTestJpeg(8, 8, 4);
    const withAdobe = concatBytes([jpeg.subarray(0, 2), adobeSegment(), jpeg.subarray(2)]);

    expect(parseJpegHeader(withAdobe).adobe).toBe(true);
  });

  it("skips fill bytes before markers", () => {
    const jpeg = buildTestJpeg(3, 5);
    const padded = concatBytes([jpeg.subarray(0, 2), new Uint8Array([0xff]), jpeg.subarray(2)]);

    expect(parseJpegHeader(padded).width).toBe(3);
  });

  it("rejects data without a start-of-image marker", () => {
    expect(() => parseJpegHeader(new Uint8Array([0x89, 0x50, 0x4e, 0x47]))).toThrow(
      "Not a JPEG file: missing SOI marker",
    );
  });

  it("rejects scans before any frame header", () => {
    expect(() => parseJpegHeader(new Uint8Array([0xff, 0xd8, 0xff, 0xda, 0x00, 0x02]))).toThrow(
      "Invalid JPEG: no frame header before image data",
    );
  });

  it("rejects truncated headers", () => {
    expect(() => parseJpegHeader(buildTestJpeg(3, 5).subarray(0, 10))).toThrow();
  });
});
