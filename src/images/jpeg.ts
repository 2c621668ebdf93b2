/**
 * JPEG header sniffing for DCTDecode passthrough.
 *
 * Only the frame header is read; the compressed data is embedded as is.
 */

import { BinaryScanner } from "#src/io/binary-scanner";

const MARKER_PREFIX = 0xff;
const SOI = 0xd8;
const EOI = 0xd9;
const SOS = 0xda;
const APP14 = 0xee;

export interface JpegInfo {
  width: number;
  height: number;
  components: 1 | 3 | 4;
  bitsPerComponent: number;
  /** An Adobe APP14 segment was present (CMYK data is stored inverted) */
  adobe: boolean;
}

/**
 * Start-of-frame markers: C0-CF except DHT (C4), JPG (C8) and DAC (CC).
 */
function isStartOfFrame(marker: number): boolean {
  return marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
}

/** Markers without a length field */
function isStandalone(marker: number): boolean {
  return marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7);
}

/**
 * Read dimensions and color layout from a JPEG file.
 *
 * @throws {Error} if the data is not a JPEG or has no usable frame header
 */
export function parseJpegHeader(data: Uint8Array): JpegInfo {
  const scanner = new BinaryScanner(data);

  if (scanner.readUint8() !== MARKER_PREFIX || scanner.readUint8() !== SOI) {
    throw new Error("Not a JPEG file: missing SOI marker");
  }

  let adobe = false;

  for (;;) {
    if (scanner.readUint8() !== MARKER_PREFIX) {
      throw new Error(`Invalid JPEG: expected a marker at offset ${scanner.position - 1}`);
    }

    let marker = scanner.readUint8();

    // Fill bytes
    while (marker === MARKER_PREFIX) {
      marker = scanner.readUint8();
    }

    if (isStandalone(marker)) {
      continue;
    }

    if (marker === SOS || marker === EOI) {
      throw new Error("Invalid JPEG: no frame header before image data");
    }

    const segmentStart = scanner.position;
    const length = scanner.readUint16();

    if (isStartOfFrame(marker)) {
      const bitsPerComponent = scanner.readUint8();
      const height = scanner.readUint16();
      const width = scanner.readUint16();
      const components = scanner.readUint8();

      if (components !== 1 && components !== 3 && components !== 4) {
        throw new Error(`Unsupported JPEG: ${components} color components`);
      }

      if (width === 0 || height === 0) {
        throw new Error("Unsupported JPEG: dimensions are defined by a later DNL segment");
      }

      return { width, height, components, bitsPerComponent, adobe };
    }

    if (marker === APP14 && length >= 7) {
      const id = String.fromCharCode(...data.subarray(segmentStart + 2, segmentStart + 7));

      adobe = id === "Adobe";
    }

    scanner.moveTo(segmentStart + length);
  }
}
