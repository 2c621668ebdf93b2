import { CHAR_HASH, DELIMITERS, WHITESPACE } from "#src/helpers/chars";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

// Whitespace, delimiters and '#' need hex escaping in names (ISO 32000-1 7.3.5),
// plus anything outside printable ASCII (33-126)
const NAME_NEEDS_ESCAPE = new Set([...WHITESPACE, ...DELIMITERS, CHAR_HASH]);

const encoder = new TextEncoder();

function escapeName(name: string): string {
  let result = "";

  for (const byte of encoder.encode(name)) {
    if (byte < 33 || byte > 126 || NAME_NEEDS_ESCAPE.has(byte)) {
      result += `#${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    } else {
      result += String.fromCharCode(byte);
    }
  }

  return result;
}

/**
 * PDF name object (interned).
 *
 * In PDF: `/Type`, `/Page`, `/Length`
 *
 * Names are interned: `PdfName.of("Type") === PdfName.of("Type")`.
 */
export class PdfName implements PdfPrimitive {
  get type(): "name" {
    return "name";
  }

  private static cache = new Map<string, PdfName>();

  private constructor(readonly value: string) {}

  /**
   * Get or create an interned PdfName for the given string.
   * The leading `/` should NOT be included.
   */
  static of(name: string): PdfName {
    let cached = PdfName.cache.get(name);

    if (!cached) {
      cached = new PdfName(name);

      PdfName.cache.set(name, cached);
    }

    return cached;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(`/${escapeName(this.value)}`);
  }

  // Common PDF names (pre-cached)
  static readonly Type = PdfName.of("Type");
  static readonly Subtype = PdfName.of("Subtype");
  static readonly Page = PdfName.of("Page");
  static readonly Pages = PdfName.of("Pages");
  static readonly Catalog = PdfName.of("Catalog");
  static readonly Font = PdfName.of("Font");
  static readonly XObject = PdfName.of("XObject");
  static readonly ExtGState = PdfName.of("ExtGState");
  static readonly Image = PdfName.of("Image");
  static readonly Form = PdfName.of("Form");
  static readonly Filter = PdfName.of("Filter");
  static readonly FlateDecode = PdfName.of("FlateDecode");
  static readonly ASCIIHexDecode = PdfName.of("ASCIIHexDecode");
  static readonly DCTDecode = PdfName.of("DCTDecode");
}
