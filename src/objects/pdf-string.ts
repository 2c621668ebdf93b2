import { BACKSLASH, PARENTHESIS_CLOSE, PARENTHESIS_OPEN } from "#src/helpers/chars";
import { bytesToHex } from "#src/helpers/buffer";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * Escape a PDF literal string: backslash-escape `\`, `(` and `)`.
 */
function escapeLiteralString(bytes: Uint8Array): Uint8Array {
  let escapeCount = 0;

  for (const byte of bytes) {
    if (byte === BACKSLASH || byte === PARENTHESIS_OPEN || byte === PARENTHESIS_CLOSE) {
      escapeCount++;
    }
  }

  if (escapeCount === 0) {
    return bytes;
  }

  const result = new Uint8Array(bytes.length + escapeCount);
  let j = 0;

  for (const byte of bytes) {
    if (byte === BACKSLASH || byte === PARENTHESIS_OPEN || byte === PARENTHESIS_CLOSE) {
      result[j++] = BACKSLASH;
    }

    result[j++] = byte;
  }

  return result;
}

/**
 * PDF string object.
 *
 * In PDF: `(Hello World)` (literal) or `<48656C6C6F>` (hex)
 */
export class PdfString implements PdfPrimitive {
  get type(): "string" {
    return "string";
  }

  constructor(
    readonly bytes: Uint8Array,
    readonly format: "literal" | "hex" = "literal",
  ) {}

  /**
   * Create a text string (ISO 32000-1 7.9.2.2).
   *
   * Printable ASCII is stored as-is; anything else is written as UTF-16BE
   * with a byte order mark so viewers decode it correctly.
   */
  static fromText(text: string): PdfString {
    if (/^[\x20-\x7e]*$/.test(text)) {
      const bytes = new Uint8Array(text.length);

      for (let i = 0; i < text.length; i++) {
        bytes[i] = text.charCodeAt(i);
      }

      return new PdfString(bytes, "literal");
    }

    const bytes = new Uint8Array(2 + text.length * 2);
    bytes[0] = 0xfe;
    bytes[1] = 0xff;

    for (let i = 0; i < text.length; i++) {
      const unit = text.charCodeAt(i);
      bytes[2 + i * 2] = unit >> 8;
      bytes[3 + i * 2] = unit & 0xff;
    }

    return new PdfString(bytes, "hex");
  }

  toBytes(writer: ByteWriter): void {
    if (this.format === "hex") {
      writer.writeAscii(`<${bytesToHex(this.bytes)}>`);
    } else {
      writer.writeByte(PARENTHESIS_OPEN);
      writer.writeBytes(escapeLiteralString(this.bytes));
      writer.writeByte(PARENTHESIS_CLOSE);
    }
  }
}
