/**
 * Document-wide resource resolution for content builders.
 *
 * Every resource goes through the content cache, so a font, image, graphics
 * state or form group used from any number of pages is defined once.
 */

import type { ContentCache } from "#src/document/content-cache";
import { type ContentKey, contentKey } from "#src/document/content-key";
import type { ObjectStore } from "#src/document/object-store";
import { ResourceDecodeFailedError } from "#src/errors";
import type { FontPipeline, ResolvedFont } from "#src/fonts/font-pipeline";
import type { ImageRegistry } from "#src/images/image-registry";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfBool } from "#src/objects/pdf-bool";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import type { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { buildExtGState, type ExtGStateParams, extGStateKey } from "./ext-g-state";
import type { GroupSource, MaskType, SoftMask } from "./instructions";
import { type ContentResources, PageContentBuilder } from "./page-content-builder";

export interface DocumentResourcesOptions {
  store: ObjectStore;
  cache: ContentCache;
  fonts: FontPipeline;
  images: ImageRegistry;
  groups?: Readonly<Record<string, GroupSource>>;
  precision?: number;
}

/**
 * JSON with object keys sorted, so equal values always serialize equally.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (val === null || typeof val !== "object" || Array.isArray(val)) {
      return val;
    }

    return Object.fromEntries(Object.entries(val).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  });
}

/**
 * Key of a form group, or of the group painted as a soft mask of the given
 * type. Font and image handles inside the instructions are only meaningful
 * within one build, so this key never leaves it.
 */
export function groupKey(source: GroupSource, maskType?: MaskType): ContentKey {
  return contentKey(
    "group",
    canonicalJson({ bbox: source.bbox, instructions: source.instructions, transparency: source.transparency }),
    maskType,
  );
}

/**
 * `/Group` entry of a form. Mask groups are always transparency groups, and
 * a luminosity mask needs a color space to measure luminosity in.
 */
export function transparencyGroupDict(source: GroupSource, maskType?: MaskType): PdfDict | undefined {
  if (!source.transparency && !maskType) {
    return undefined;
  }

  const dict = PdfDict.of({ S: PdfName.of("Transparency") });

  if (maskType === "luminosity") {
    dict.set("CS", PdfName.of("DeviceRGB"));
  }

  if (source.transparency?.isolated) {
    dict.set("I", PdfBool.of(true));
  }

  if (source.transparency?.knockout) {
    dict.set("K", PdfBool.of(true));
  }

  return dict;
}

export class DocumentResources implements ContentResources {
  constructor(private readonly options: DocumentResourcesOptions) {}

  font(handle: string): Promise<ResolvedFont> {
    return this.options.fonts.resolve(handle);
  }

  image(handle: string): Promise<PdfRef> {
    return this.options.images.resolve(handle);
  }

  extGState(params: ExtGStateParams): Promise<PdfRef> {
    const { store, cache } = this.options;

    return cache.getOrBuild(extGStateKey(params), () => store.register(buildExtGState(params)));
  }

  group(handle: string, ancestors: readonly string[]): Promise<PdfRef> {
    return this.resolveGroup(handle, ancestors);
  }

  softMask(mask: SoftMask, ancestors: readonly string[]): Promise<PdfRef> {
    return this.resolveGroup(mask.group, ancestors, mask.type);
  }

  private resolveGroup(handle: string, ancestors: readonly string[], maskType?: MaskType): Promise<PdfRef> {
    const groups = this.options.groups ?? {};

    if (!Object.hasOwn(groups, handle)) {
      return Promise.reject(new ResourceDecodeFailedError(handle, "group is not registered"));
    }

    if (ancestors.includes(handle)) {
      return Promise.reject(new ResourceDecodeFailedError(handle, "group places itself"));
    }

    const source = groups[handle];

    return this.options.cache.getOrBuild(groupKey(source, maskType), () =>
      this.buildGroup(handle, source, ancestors, maskType),
    );
  }

  /**
   * Emit a group as a Form XObject with its own resources.
   */
  private async buildGroup(
    handle: string,
    source: GroupSource,
    ancestors: readonly string[],
    maskType: MaskType | undefined,
  ): Promise<PdfRef> {
    const builder = new PageContentBuilder(this, {
      precision: this.options.precision,
      ancestors: [...ancestors, handle],
      inheritsState: true,
    });

    const { content, resources } = await builder.build(source.instructions);

    const form = PdfStream.fromDict(
      {
        Type: PdfName.XObject,
        Subtype: PdfName.Form,
        BBox: PdfArray.ofNumbers(source.bbox),
        Resources: resources,
      },
      content,
    );

    const group = transparencyGroupDict(source, maskType);

    if (group) {
      form.set("Group", group);
    }

    return this.options.store.register(form);
  }
}
