/**
 * Resolves font handles to embedded subsets for one build.
 */

import { ResourceDecodeFailedError } from "#src/errors";
import type { PdfRef } from "#src/objects/pdf-ref";
import { embeddedFontKey, embedFontSubset, type FontEmbedContext } from "./cid-font";
import type { FontRegistry } from "./font-registry";
import type { FontSubset, FontSubsetCache } from "./font-subset";
import type { GlyphUsage } from "./glyph-usage";

/**
 * An embedded font ready for use in content streams.
 */
export interface ResolvedFont {
  handle: string;
  ref: PdfRef;
  subset: FontSubset;
}

export interface FontPipelineOptions extends FontEmbedContext {
  registry: FontRegistry;
  usage: GlyphUsage;
  subsets: FontSubsetCache;
}

export class FontPipeline {
  private readonly resolved = new Map<string, Promise<ResolvedFont>>();

  constructor(private readonly options: FontPipelineOptions) {}

  /**
   * Get the embedded subset for a font handle.
   *
   * The subset covers every glyph the document uses from this font, so all
   * pages share it. Requests for the same handle share one resolution.
   */
  resolve(handle: string): Promise<ResolvedFont> {
    let pending = this.resolved.get(handle);

    if (!pending) {
      pending = this.build(handle);
      this.resolved.set(handle, pending);
    }

    return pending;
  }

  private async build(handle: string): Promise<ResolvedFont> {
    const { registry, usage, subsets, store, cache } = this.options;

    const entry = registry.get(handle);
    const fontUsage = usage.get(handle);

    if (!fontUsage) {
      throw new ResourceDecodeFailedError(handle, "font has no recorded glyph usage");
    }

    const subset = await subsets.get(entry, fontUsage.glyphIds);

    const text = new Map<number, string>();

    for (const [gid, value] of fontUsage.text) {
      const code = subset.codeForGlyph.get(gid);

      if (code !== undefined) {
        text.set(code, value);
      }
    }

    const ref = await cache.getOrBuild(embeddedFontKey(subset, text), () =>
      embedFontSubset({ store, cache }, entry.font, subset, text),
    );

    return { handle, ref, subset };
  }
}
