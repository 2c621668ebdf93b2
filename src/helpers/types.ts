/**
 * Shared type definitions used across the library.
 */

import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";

/**
 * Function type for resolving a PdfRef to its target PdfObject.
 *
 * All objects of a build live in memory, so resolution is synchronous.
 *
 * @returns The resolved object, or null if not defined
 */
export type RefResolver = (ref: PdfRef) => PdfObject | null;

/**
 * Receives warnings as they are recorded.
 */
export type WarningHandler = (message: string) => void;
