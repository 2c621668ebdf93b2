import { describe, expect, it } from "vitest";
import { stringToBytes } from "#src/test-utils";
import { BinaryScanner } from "./binary-scanner";
import { BinaryWriter } from "./binary-writer";
import { ByteWriter } from "./byte-writer";

describe("ByteWriter", () => {
  it("starts empty", () => {
    expect(new ByteWriter().position).toBe(0);
  });

  it("writes bytes, ASCII and lines sequentially", () => {
    const writer = new ByteWriter();

    writer.writeByte(0x25);
    writer.writeAscii("PDF");
    writer.writeLine("-1.7");
    writer.writeBytes(new Uint8Array([0x41, 0x42]));

    expect(writer.toBytes()).toEqual(stringToBytes("%PDF-1.7\nAB"));
  });

  it("grows past the initial size", () => {
    const writer = new ByteWriter({ initialSize: 2 });

    writer.writeAscii("abcdefghij");

    expect(writer.position).toBe(10);
    expect(writer.toBytes()).toEqual(stringToBytes("abcdefghij"));
  });

  it("throws when maxSize is exceeded", () => {
    const writer = new ByteWriter({ initialSize: 4, maxSize: 4 });

    writer.writeAscii("abcd");

    expect(() => writer.writeByte(0x65)).toThrow("exceeded maximum size of 4 bytes");
  });
});

describe("BinaryWriter", () => {
  it("writes big-endian integers and tags", () => {
    const writer = new BinaryWriter();

    writer.writeUint16(0x0102);
    writer.writeInt16(-2);
    writer.writeUint32(0xdeadbeef);
    writer.writeTag("OS/2");

    expect([...writer.toBytes()]).toEqual([
      0x01, 0x02, 0xff, 0xfe, 0xde, 0xad, 0xbe, 0xef, 0x4f, 0x53, 0x2f, 0x32,
    ]);
  });

  it("aligns to a boundary", () => {
    const writer = new BinaryWriter();

    writer.writeUint8(1);
    writer.writeAlignmentPadding(4);

    expect(writer.position).toBe(4);
  });

  it("patches earlier values", () => {
    const writer = new BinaryWriter();

    writer.writeUint32(0);
    writer.writeUint16(0);
    writer.patchUint32(0, 0x11223344);
    writer.patchUint16(4, 0x5566);

    expect([...writer.toBytes()]).toEqual([0x11, 0x22, 0x33, 0x44, 0x55, 0x66]);
    expect(() => writer.patchUint32(4, 1)).toThrow("Cannot patch past write position");
  });
});

describe("BinaryScanner", () => {
  it("reads what BinaryWriter wrote", () => {
    const writer = new BinaryWriter();

    writer.writeUint16(513);
    writer.writeInt16(-300);
    writer.writeUint32(70000);
    writer.writeTag("glyf");

    const scanner = new BinaryScanner(writer.toBytes());

    expect(scanner.readUint16()).toBe(513);
    expect(scanner.readInt16()).toBe(-300);
    expect(scanner.readUint32()).toBe(70000);
    expect(scanner.readTag()).toBe("glyf");
    expect(scanner.position).toBe(12);
  });

  it("throws on reads past the end", () => {
    const scanner = new BinaryScanner(new Uint8Array([1]));

    expect(() => scanner.readUint16()).toThrow("Unexpected end of data");
  });

  it("honours the view offset of subarrays", () => {
    const bytes = new Uint8Array([9, 9, 0x00, 0x2a]);
    const scanner = new BinaryScanner(bytes.subarray(2));

    expect(scanner.readUint16()).toBe(42);
  });
});
