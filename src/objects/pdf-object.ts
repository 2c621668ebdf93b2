/**
 * PDF object types and graph traversal.
 */
import { PdfArray } from "./pdf-array";
import type { PdfBool } from "./pdf-bool";
import { PdfDict } from "./pdf-dict";
import type { PdfName } from "./pdf-name";
import type { PdfNull } from "./pdf-null";
import type { PdfNumber } from "./pdf-number";
import type { PdfRef } from "./pdf-ref";
import { PdfStream } from "./pdf-stream";
import type { PdfString } from "./pdf-string";

/**
 * Union of all PDF object types.
 * All types have a `type` field for discrimination.
 */
export type PdfObject =
  | PdfNull
  | PdfBool
  | PdfNumber
  | PdfName
  | PdfString
  | PdfRef
  | PdfArray
  | PdfDict
  | PdfStream;

/**
 * Collect every reference held directly or nested inside `obj`, in
 * traversal order (dict entries in insertion order, array items in order).
 *
 * References are not followed; duplicates are kept.
 */
export function collectRefs(obj: PdfObject, out: PdfRef[] = []): PdfRef[] {
  switch (obj.type) {
    case "ref":
      out.push(obj);
      break;

    case "array":
      for (const item of obj) {
        collectRefs(item, out);
      }
      break;

    case "dict":
    case "stream":
      for (const [, value] of obj) {
        collectRefs(value, out);
      }
      break;
  }

  return out;
}

/**
 * Deep-copy `obj`, replacing every reference with `map(ref)`.
 *
 * Containers are copied; primitives are immutable and returned as-is.
 */
export function remapRefs(obj: PdfObject, map: (ref: PdfRef) => PdfRef): PdfObject {
  switch (obj.type) {
    case "ref":
      return map(obj);

    case "array":
      return new PdfArray(obj.toArray().map(item => remapRefs(item, map)));

    case "stream":
      return new PdfStream(remapEntries(obj, map), obj.data);

    case "dict":
      return new PdfDict(remapEntries(obj, map));

    default:
      return obj;
  }
}

function remapEntries(dict: PdfDict, map: (ref: PdfRef) => PdfRef): Array<[PdfName, PdfObject]> {
  const entries: Array<[PdfName, PdfObject]> = [];

  for (const [key, value] of dict) {
    entries.push([key, remapRefs(value, map)]);
  }

  return entries;
}
