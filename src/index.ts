/**
 * pdf-forge
 *
 * Builds PDF files from pages of drawing instructions, with document-wide
 * deduplication of fonts, images and graphics states.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Build API
// ─────────────────────────────────────────────────────────────────────────────

export {
  type BuildResult,
  type BuildStats,
  buildDocument,
  type DocumentInput,
} from "./api/build";
export {
  type BuildOptions,
  BuildOptionsSchema,
  type CrossReferenceStyle,
  type PdfVersion,
  type ResolvedBuildOptions,
  resolveBuildOptions,
} from "./api/options";
export type { DocumentMetadata } from "./document/assembler";
export { SharedContentCache } from "./fonts/shared-cache";

// ─────────────────────────────────────────────────────────────────────────────
// Instructions and resources
// ─────────────────────────────────────────────────────────────────────────────

export type {
  BlendMode,
  FillRule,
  GlyphRun,
  GroupSource,
  Instruction,
  MaskType,
  Matrix,
  PageRecord,
  PaintMode,
  PathSegment,
  PositionedGlyph,
  Rectangle,
  SoftMask,
  TransparencyGroup,
} from "./content/instructions";
export type { ImageColorSpace, ImageSource, JpegImageSource, RawImageSource } from "./images/image-source";
export { type CMYK, type Color, cmyk, type Grayscale, grayscale, type RGB, rgb } from "./helpers/colors";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  BuildError,
  ConfigError,
  DanglingReferenceError,
  DuplicateDefinitionError,
  IncompleteDocumentError,
  IncompleteGlyphClosureError,
  ResourceDecodeFailedError,
  UnbalancedStateError,
  UnmappedGlyphError,
} from "./errors";

// ─────────────────────────────────────────────────────────────────────────────
// Low-level building blocks
// ─────────────────────────────────────────────────────────────────────────────

export { type CacheStats, ContentCache } from "./document/content-cache";
export { type ContentKey, type ContentKind, contentKey } from "./document/content-key";
export { type IndirectObject, ObjectStore } from "./document/object-store";
export { runPool } from "./scheduler/worker-pool";
export { PdfArray } from "./objects/pdf-array";
export { PdfBool } from "./objects/pdf-bool";
export { PdfDict } from "./objects/pdf-dict";
export { PdfName } from "./objects/pdf-name";
export { PdfNull } from "./objects/pdf-null";
export { PdfNumber } from "./objects/pdf-number";
export type { PdfObject } from "./objects/pdf-object";
export { PdfRef } from "./objects/pdf-ref";
export { PdfStream } from "./objects/pdf-stream";
export { PdfString } from "./objects/pdf-string";
