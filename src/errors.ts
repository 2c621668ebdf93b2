/**
 * Error classes for document builds.
 *
 * Every error here is fatal to the build that raised it: nothing is written
 * and no error is retried, since the computations involved are deterministic.
 */

/**
 * Base class for build errors.
 */
export class BuildError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BuildError";
  }
}

/**
 * An object id was defined twice with different content.
 */
export class DuplicateDefinitionError extends BuildError {
  readonly objectNumber: number;

  constructor(objectNumber: number) {
    super(`Object ${objectNumber} 0 R is already defined with different content`);
    this.name = "DuplicateDefinitionError";
    this.objectNumber = objectNumber;
  }
}

/**
 * A reference points at an object that was never allocated or never defined.
 */
export class DanglingReferenceError extends BuildError {
  readonly objectNumber: number;

  constructor(objectNumber: number, detail: string) {
    super(`Dangling reference to ${objectNumber} 0 R: ${detail}`);
    this.name = "DanglingReferenceError";
    this.objectNumber = objectNumber;
  }
}

/**
 * A composite glyph references a component that the font does not contain.
 */
export class IncompleteGlyphClosureError extends BuildError {
  readonly glyphId: number;
  readonly componentId: number;

  constructor(glyphId: number, componentId: number, numGlyphs: number) {
    super(
      `Composite glyph ${glyphId} references component ${componentId}, but the font has only ${numGlyphs} glyphs`,
    );
    this.name = "IncompleteGlyphClosureError";
    this.glyphId = glyphId;
    this.componentId = componentId;
  }
}

/**
 * A content stream restored more graphics states than it saved, or left saves open.
 */
export class UnbalancedStateError extends BuildError {
  constructor(message: string) {
    super(message);
    this.name = "UnbalancedStateError";
  }
}

/**
 * A text run uses a glyph that the font subset does not map to a code.
 */
export class UnmappedGlyphError extends BuildError {
  readonly fontHandle: string;
  readonly glyphId: number;

  constructor(fontHandle: string, glyphId: number) {
    super(`Glyph ${glyphId} of font "${fontHandle}" has no code in its subset`);
    this.name = "UnmappedGlyphError";
    this.fontHandle = fontHandle;
    this.glyphId = glyphId;
  }
}

/**
 * A document was assembled without any pages.
 */
export class IncompleteDocumentError extends BuildError {
  constructor(message = "Cannot assemble a document without pages") {
    super(message);
    this.name = "IncompleteDocumentError";
  }
}

/**
 * A caller-supplied resource (font, image, group) could not be decoded or was not registered.
 *
 * The original failure is kept as `cause`.
 */
export class ResourceDecodeFailedError extends BuildError {
  readonly handle: string;

  constructor(handle: string, message: string, options?: ErrorOptions) {
    super(`Resource "${handle}": ${message}`, options);
    this.name = "ResourceDecodeFailedError";
    this.handle = handle;
  }
}

/**
 * Build options failed validation.
 */
export class ConfigError extends BuildError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid build options: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Describe an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
