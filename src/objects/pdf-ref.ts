import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF indirect reference (interned).
 *
 * In PDF: `1 0 R`, `42 0 R`
 *
 * References are interned (`PdfRef.of(1) === PdfRef.of(1)`), so they can be
 * used directly as Map keys. Every object of a build uses generation 0.
 */
export class PdfRef implements PdfPrimitive {
  get type(): "ref" {
    return "ref";
  }

  private static cache = new Map<string, PdfRef>();

  private constructor(
    readonly objectNumber: number,
    readonly generation: number,
  ) {}

  static of(objectNumber: number, generation: number = 0): PdfRef {
    const key = `${objectNumber} ${generation}`;

    let cached = PdfRef.cache.get(key);

    if (!cached) {
      cached = new PdfRef(objectNumber, generation);

      PdfRef.cache.set(key, cached);
    }

    return cached;
  }

  /**
   * Returns the PDF syntax representation: "1 0 R"
   */
  toString(): string {
    return `${this.objectNumber} ${this.generation} R`;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(this.toString());
  }
}
