/**
 * Content-addressed keys for deduplicating resources.
 *
 * A key is the SHA-256 of a length-prefixed encoding of the resource kind and
 * every field that affects the emitted objects, so two resources with equal
 * keys are interchangeable.
 */

import { sha256 } from "@noble/hashes/sha2.js";
import { bytesToHex } from "@noble/hashes/utils.js";

/** Resource kinds the cache deduplicates */
export type ContentKind = "font-subset" | "font-program" | "image" | "ext-g-state" | "group";

/** 64 lowercase hex digits */
export type ContentKey = string;

export type KeyField = string | number | boolean | Uint8Array | undefined | readonly KeyField[];

const encoder = new TextEncoder();

type Hasher = ReturnType<typeof sha256.create>;

function writeTagged(hasher: Hasher, tag: string, payload: Uint8Array): void {
  const header = new Uint8Array(5);

  header[0] = tag.charCodeAt(0);
  new DataView(header.buffer).setUint32(1, payload.length);

  hasher.update(header);
  hasher.update(payload);
}

function writeField(hasher: Hasher, field: KeyField): void {
  if (field === undefined) {
    writeTagged(hasher, "z", new Uint8Array(0));
  } else if (typeof field === "string") {
    writeTagged(hasher, "s", encoder.encode(field));
  } else if (typeof field === "number") {
    if (!Number.isFinite(field)) {
      throw new Error(`Cannot key a non-finite number: ${field}`);
    }

    // -0 and 0 are the same value in output
    writeTagged(hasher, "n", encoder.encode(String(field === 0 ? 0 : field)));
  } else if (typeof field === "boolean") {
    writeTagged(hasher, "b", new Uint8Array([field ? 1 : 0]));
  } else if (field instanceof Uint8Array) {
    writeTagged(hasher, "u", field);
  } else {
    writeTagged(hasher, "a", encoder.encode(String(field.length)));

    for (const item of field) {
      writeField(hasher, item);
    }
  }
}

/**
 * Derive the key of a resource.
 *
 * @example
 * ```ts
 * contentKey("ext-g-state", 0.5, 1);
 * contentKey("image", "raw", digest(samples), width, height, "rgb", 8);
 * ```
 */
export function contentKey(kind: ContentKind, ...fields: KeyField[]): ContentKey {
  const hasher = sha256.create();

  writeField(hasher, kind);

  for (const field of fields) {
    writeField(hasher, field);
  }

  return bytesToHex(hasher.digest());
}

/**
 * SHA-256 of raw bytes, as lowercase hex. Used as the identity of source data.
 */
export function digest(data: Uint8Array): string {
  return bytesToHex(sha256(data));
}
