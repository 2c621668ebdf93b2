/**
 * Embedding of images as Image XObjects.
 *
 * Raw samples are stored unfiltered and compressed by the writer like any
 * other stream. JPEG data keeps its /DCTDecode encoding. Alpha channels
 * become a separate /SMask image, shared through the cache so two images
 * with the same mask embed it once.
 */

import type { ContentCache } from "#src/document/content-cache";
import { type ContentKey, contentKey, digest } from "#src/document/content-key";
import type { ObjectStore } from "#src/document/object-store";
import { describeError, ResourceDecodeFailedError } from "#src/errors";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { yieldToEventLoop } from "#src/scheduler/worker-pool";
import {
  CHANNELS,
  DEVICE_COLOR_SPACES,
  type ImageSource,
  type JpegImageSource,
  type RawImageSource,
} from "./image-source";
import { type JpegInfo, parseJpegHeader } from "./jpeg";

const JPEG_COLOR_SPACES: Record<JpegInfo["components"], string> = {
  1: "DeviceGray",
  3: "DeviceRGB",
  4: "DeviceCMYK",
};

export interface ImageEmbedContext {
  store: ObjectStore;
  cache: ContentCache;
}

/**
 * Content key of an image: its bytes plus every parameter that reaches the output.
 */
export function imageKey(source: ImageSource): ContentKey {
  if (source.kind === "jpeg") {
    return contentKey("image", "jpeg", digest(source.data));
  }

  return contentKey(
    "image",
    "raw",
    digest(source.data),
    source.width,
    source.height,
    source.colorSpace,
    source.bitsPerComponent ?? 8,
    source.alpha ? digest(source.alpha) : undefined,
  );
}

function softMaskKey(alpha: Uint8Array, width: number, height: number): ContentKey {
  return contentKey("image", "soft-mask", digest(alpha), width, height);
}

function imageStream(
  width: number,
  height: number,
  colorSpace: string,
  data: Uint8Array,
  extra: Record<string, PdfObject> = {},
): PdfStream {
  return PdfStream.fromDict(
    {
      Type: PdfName.XObject,
      Subtype: PdfName.Image,
      Width: PdfNumber.of(width),
      Height: PdfNumber.of(height),
      ColorSpace: PdfName.of(colorSpace),
      BitsPerComponent: PdfNumber.of(8),
      ...extra,
    },
    data,
  );
}

/**
 * Check a raw image's geometry against its sample data.
 *
 * @throws {Error} describing the first mismatch
 */
export function validateRawImage(source: RawImageSource): void {
  const { width, height } = source;

  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`dimensions must be positive integers, got ${width}x${height}`);
  }

  if ((source.bitsPerComponent ?? 8) !== 8) {
    throw new Error("only 8 bits per component are supported");
  }

  const expected = width * height * CHANNELS[source.colorSpace];

  if (source.data.length !== expected) {
    throw new Error(`expected ${expected} bytes of ${source.colorSpace} samples, got ${source.data.length}`);
  }

  if (source.alpha && source.alpha.length !== width * height) {
    throw new Error(`expected ${width * height} alpha samples, got ${source.alpha.length}`);
  }
}

async function embedRaw(ctx: ImageEmbedContext, source: RawImageSource): Promise<PdfRef> {
  const { store, cache } = ctx;
  const { width, height, alpha } = source;
  const extra: Record<string, PdfObject> = {};

  if (alpha) {
    extra.SMask = await cache.getOrBuild(softMaskKey(alpha, width, height), () =>
      store.register(imageStream(width, height, "DeviceGray", alpha)),
    );
  }

  return store.register(
    imageStream(width, height, DEVICE_COLOR_SPACES[source.colorSpace], source.data, extra),
  );
}

function readJpegHeader(handle: string, data: Uint8Array): JpegInfo {
  try {
    return parseJpegHeader(data);
  } catch (error) {
    throw new ResourceDecodeFailedError(handle, describeError(error), { cause: error });
  }
}

function embedJpeg(ctx: ImageEmbedContext, source: JpegImageSource, info: JpegInfo): PdfRef {
  const extra: Record<string, PdfObject> = { Filter: PdfName.DCTDecode };

  // Adobe CMYK JPEGs store inverted samples
  if (info.components === 4 && info.adobe) {
    extra.Decode = PdfArray.ofNumbers([1, 0, 1, 0, 1, 0, 1, 0]);
  }

  const stream = imageStream(info.width, info.height, JPEG_COLOR_SPACES[info.components], source.data, extra);

  stream.set("BitsPerComponent", PdfNumber.of(info.bitsPerComponent));

  return ctx.store.register(stream);
}

/**
 * Define the objects of an image and return the image XObject ref.
 *
 * @throws {ResourceDecodeFailedError} tagged with `handle` if the data is invalid
 */
export async function embedImage(
  ctx: ImageEmbedContext,
  handle: string,
  source: ImageSource,
): Promise<PdfRef> {
  await yieldToEventLoop();

  if (source.kind === "jpeg") {
    return embedJpeg(ctx, source, readJpegHeader(handle, source.data));
  }

  try {
    validateRawImage(source);
  } catch (error) {
    throw new ResourceDecodeFailedError(handle, `invalid raw image: ${describeError(error)}`, {
      cause: error,
    });
  }

  return embedRaw(ctx, source);
}
