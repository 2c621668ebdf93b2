/**
 * Cross-build memoization of font subset programs.
 *
 * Builds never share state unless the caller passes one of these in the
 * build options. Only subset programs are kept: they are a pure function of
 * the font bytes and glyph set. Object numbers belong to a single build and
 * are never stored here.
 */

import type { ContentKey } from "#src/document/content-key";
import type { FontSubset } from "./font-subset";

export class SharedContentCache {
  private readonly subsets = new Map<ContentKey, FontSubset>();

  private lookups = 0;
  private reused = 0;

  getSubset(key: ContentKey): FontSubset | undefined {
    this.lookups++;

    const subset = this.subsets.get(key);

    if (subset) {
      this.reused++;
    }

    return subset;
  }

  setSubset(key: ContentKey, subset: FontSubset): void {
    this.subsets.set(key, subset);
  }

  /** Number of stored subsets */
  get size(): number {
    return this.subsets.size;
  }

  get stats(): { lookups: number; reused: number } {
    return { lookups: this.lookups, reused: this.reused };
  }

  clear(): void {
    this.subsets.clear();
    this.lookups = 0;
    this.reused = 0;
  }
}
