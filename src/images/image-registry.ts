/**
 * Resolves image handles to embedded XObjects for one build.
 */

import { ResourceDecodeFailedError } from "#src/errors";
import type { PdfRef } from "#src/objects/pdf-ref";
import { embedImage, type ImageEmbedContext, imageKey } from "./image-embedder";
import type { ImageSource } from "./image-source";

export class ImageRegistry {
  constructor(
    private readonly ctx: ImageEmbedContext,
    private readonly sources: Readonly<Record<string, ImageSource>> = {},
  ) {}

  /**
   * Get the XObject for an image handle. Handles with identical content
   * resolve to the same object.
   */
  resolve(handle: string): Promise<PdfRef> {
    if (!Object.hasOwn(this.sources, handle)) {
      return Promise.reject(new ResourceDecodeFailedError(handle, "image is not registered"));
    }

    const source = this.sources[handle];

    return this.ctx.cache.getOrBuild(imageKey(source), () => embedImage(this.ctx, handle, source));
  }
}
