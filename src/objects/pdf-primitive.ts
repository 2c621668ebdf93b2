import type { ByteWriter } from "#src/io/byte-writer";

/**
 * Interface for PDF objects that serialize themselves.
 *
 * Each concrete object class writes its own byte representation, so the
 * serializer is a single recursive `toBytes` call.
 */
export interface PdfPrimitive {
  /**
   * Type discriminator used by the `PdfObject` union.
   */
  readonly type: string;

  /**
   * Write this object's PDF syntax. Called recursively for nested objects.
   */
  toBytes(writer: ByteWriter): void;
}
