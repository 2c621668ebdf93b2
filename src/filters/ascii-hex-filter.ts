import { CR, hexValue, LF, SPACE, TAB } from "#src/helpers/chars";
import type { Filter } from "./filter";

/** Bytes per output line when encoding */
const BYTES_PER_LINE = 35;

const HEX_DIGITS = "0123456789ABCDEF";

/**
 * ASCIIHexDecode filter.
 *
 * Encodes binary data as pairs of hex digits so the file stays 7-bit clean.
 * Output is broken into lines and terminated by '>'.
 *
 * Example: "Hello" <-> "48656C6C6F>"
 */
export class ASCIIHexFilter implements Filter {
  readonly name = "ASCIIHexDecode";

  private static readonly END_MARKER = 0x3e;

  encode(data: Uint8Array): Uint8Array {
    const lineBreaks = Math.floor(Math.max(0, data.length - 1) / BYTES_PER_LINE);
    const result = new Uint8Array(data.length * 2 + lineBreaks + 1);

    let i = 0;

    data.forEach((byte, index) => {
      if (index > 0 && index % BYTES_PER_LINE === 0) {
        result[i++] = LF;
      }

      result[i++] = HEX_DIGITS.charCodeAt(byte >> 4);
      result[i++] = HEX_DIGITS.charCodeAt(byte & 0x0f);
    });

    result[i] = ASCIIHexFilter.END_MARKER;

    return result;
  }

  decode(data: Uint8Array): Uint8Array {
    const result: number[] = [];

    let high: number | null = null;

    for (const byte of data) {
      if (byte === SPACE || byte === TAB || byte === LF || byte === CR) {
        continue;
      }

      if (byte === ASCIIHexFilter.END_MARKER) {
        break;
      }

      const nibble = hexValue(byte);

      if (nibble === -1) {
        throw new Error(`Invalid character 0x${byte.toString(16)} in ASCIIHex data`);
      }

      if (high === null) {
        high = nibble;
      } else {
        result.push((high << 4) | nibble);
        high = null;
      }
    }

    // Odd number of digits: pad final nibble with 0
    if (high !== null) {
      result.push(high << 4);
    }

    return new Uint8Array(result);
  }
}
