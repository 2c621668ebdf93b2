/**
 * Opacity, blend mode and soft mask as ExtGState dictionaries.
 */

import { type ContentKey, contentKey } from "#src/document/content-key";
import { BuildError } from "#src/errors";
import { formatPdfNumber } from "#src/helpers/format";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfRef } from "#src/objects/pdf-ref";
import type { BlendMode, MaskType } from "./instructions";

/** A soft mask whose group has been emitted as a Form XObject */
export interface ResolvedSoftMask {
  type: MaskType;
  group: PdfRef;
}

/**
 * Parameters of one ExtGState. Only the parameters that are set are
 * written; the rest keep whatever value is in effect where it is applied.
 */
export interface ExtGStateParams {
  /** `/ca` */
  fill?: number;
  /** `/CA` */
  stroke?: number;
  blendMode?: BlendMode;
  /** `none` removes the current mask */
  softMask?: ResolvedSoftMask | "none";
}

/**
 * @throws {BuildError} if the value is outside 0..1
 */
export function checkAlpha(value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new BuildError(`Alpha must be between 0 and 1, got ${value}`);
  }

  return value;
}

function maskField(mask: ExtGStateParams["softMask"]): string | undefined {
  if (mask === undefined || mask === "none") {
    return mask;
  }

  return `${mask.type}:${mask.group.objectNumber}`;
}

/**
 * Alphas are keyed as written, so values that serialize equally share a state.
 * Mask groups are keyed by object number, which is only stable within a build.
 */
export function extGStateKey(params: ExtGStateParams): ContentKey {
  return contentKey(
    "ext-g-state",
    params.fill === undefined ? undefined : formatPdfNumber(params.fill),
    params.stroke === undefined ? undefined : formatPdfNumber(params.stroke),
    params.blendMode,
    maskField(params.softMask),
  );
}

function softMaskDict(mask: ResolvedSoftMask): PdfDict {
  return PdfDict.of({
    Type: PdfName.of("Mask"),
    S: PdfName.of(mask.type === "luminosity" ? "Luminosity" : "Alpha"),
    G: mask.group,
  });
}

/**
 * `<< /Type /ExtGState /ca fill /CA stroke /BM mode /SMask mask >>`
 */
export function buildExtGState(params: ExtGStateParams): PdfDict {
  const dict = PdfDict.of({ Type: PdfName.ExtGState });

  if (params.fill !== undefined) {
    dict.set("ca", PdfNumber.of(params.fill));
  }

  if (params.stroke !== undefined) {
    dict.set("CA", PdfNumber.of(params.stroke));
  }

  if (params.blendMode !== undefined) {
    dict.set("BM", PdfName.of(params.blendMode));
  }

  if (params.softMask !== undefined) {
    dict.set("SMask", params.softMask === "none" ? PdfName.of("None") : softMaskDict(params.softMask));
  }

  return dict;
}
