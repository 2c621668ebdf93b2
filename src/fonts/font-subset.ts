/**
 * Font subsets and their per-build memoization.
 */

import { UnmappedGlyphError } from "#src/errors";
import { type ContentKey, contentKey } from "#src/document/content-key";
import { closeGlyphSet, TrueTypeSubsetter } from "#src/fontbox/ttf/subsetter";
import type { TrueTypeFont } from "#src/fontbox/ttf/truetype-font";
import { yieldToEventLoop } from "#src/scheduler/worker-pool";
import type { RegisteredFont } from "./font-registry";
import type { SharedContentCache } from "./shared-cache";

const SUBSET_TAG_LENGTH = 6;

/**
 * A subset font program and its code assignment.
 *
 * Codes are indices into `glyphIds`, which is sorted and starts with
 * .notdef, so glyph 0 always has code 0. With `/CIDToGIDMap /Identity`
 * the code is also the glyph id inside the subset program.
 */
export interface FontSubset {
  /** Identity of the program: source font digest plus closed glyph set */
  readonly key: ContentKey;
  readonly fontDigest: string;
  /** Closed glyph set in code order */
  readonly glyphIds: readonly number[];
  readonly codeForGlyph: ReadonlyMap<number, number>;
  /** Advance width per code, in 1/1000 em */
  readonly widths: readonly number[];
  readonly program: Uint8Array;
  /** Six uppercase letters prefixed to the font name */
  readonly subsetTag: string;
}

/**
 * Key of the subset program for a closed glyph set.
 */
export function subsetProgramKey(fontDigest: string, closedGlyphIds: readonly number[]): ContentKey {
  return contentKey("font-program", fontDigest, closedGlyphIds);
}

/**
 * Derive a subset tag from a key: one letter per key byte, `A` to `Z`.
 */
export function subsetTag(key: ContentKey): string {
  let tag = "";

  for (let i = 0; i < SUBSET_TAG_LENGTH; i++) {
    const byte = Number.parseInt(key.slice(i * 2, i * 2 + 2), 16);

    tag += String.fromCharCode(0x41 + (byte % 26));
  }

  return tag;
}

/**
 * Convert a width in font units to 1/1000 em.
 */
export function toThousandths(value: number, unitsPerEm: number): number {
  return Math.round((value * 1000) / unitsPerEm);
}

/**
 * Subset a font to the given glyphs and their composite components.
 *
 * Pure: the same font bytes and glyph set give a byte-identical result.
 */
export function subsetFont(font: TrueTypeFont, fontDigest: string, glyphIds: Iterable<number>): FontSubset {
  const subsetter = new TrueTypeSubsetter(font);

  subsetter.addGlyphs(glyphIds);

  const program = subsetter.write();
  const key = subsetProgramKey(fontDigest, program.glyphIds);

  return {
    key,
    fontDigest,
    glyphIds: program.glyphIds,
    codeForGlyph: new Map(program.glyphIds.map((gid, code) => [gid, code])),
    widths: program.glyphIds.map(gid => toThousandths(font.getAdvanceWidth(gid), font.unitsPerEm)),
    program: program.bytes,
    subsetTag: subsetTag(key),
  };
}

/**
 * Memoizes subsets per (font, closed glyph set) within one build.
 *
 * Concurrent requests for the same subset share one computation. When a
 * shared cache is given, finished subsets are read from and written to it,
 * so later builds skip the subsetting work.
 */
export class FontSubsetCache {
  private readonly subsets = new Map<ContentKey, Promise<FontSubset>>();

  constructor(private readonly shared?: SharedContentCache) {}

  /**
   * Get the subset of a registered font covering `glyphIds`.
   *
   * @throws {UnmappedGlyphError} if a glyph id is not in the font
   * @throws {IncompleteGlyphClosureError} if a composite references a missing component
   */
  async get(entry: RegisteredFont, glyphIds: Iterable<number>): Promise<FontSubset> {
    const requested = [...glyphIds];

    for (const gid of requested) {
      if (!Number.isInteger(gid) || gid < 0 || gid >= entry.font.numGlyphs) {
        throw new UnmappedGlyphError(entry.handle, gid);
      }
    }

    const closed = closeGlyphSet(entry.font, requested);
    const key = subsetProgramKey(entry.fontDigest, closed);

    // Lookup and insert happen before the first await
    const existing = this.subsets.get(key);

    if (existing) {
      return existing;
    }

    const shared = this.shared?.getSubset(key);

    const promise = shared
      ? Promise.resolve(shared)
      : yieldToEventLoop().then(() => {
          const subset = subsetFont(entry.font, entry.fontDigest, closed);

          this.shared?.setSubset(key, subset);

          return subset;
        });

    this.subsets.set(key, promise);

    return await promise;
  }

  get size(): number {
    return this.subsets.size;
  }
}
