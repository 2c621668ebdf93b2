/**
 * Caller-supplied image data.
 */

export type ImageColorSpace = "gray" | "rgb" | "cmyk";

/**
 * Uncompressed samples, row by row, 8 bits per component.
 */
export interface RawImageSource {
  kind: "raw";
  width: number;
  height: number;
  colorSpace: ImageColorSpace;
  bitsPerComponent?: 8;
  data: Uint8Array;
  /** One 8-bit opacity sample per pixel, embedded as a soft mask */
  alpha?: Uint8Array;
}

/**
 * A complete JPEG file, embedded without decoding.
 */
export interface JpegImageSource {
  kind: "jpeg";
  data: Uint8Array;
}

export type ImageSource = RawImageSource | JpegImageSource;

export const CHANNELS: Record<ImageColorSpace, number> = {
  gray: 1,
  rgb: 3,
  cmyk: 4,
};

export const DEVICE_COLOR_SPACES: Record<ImageColorSpace, string> = {
  gray: "DeviceGray",
  rgb: "DeviceRGB",
  cmyk: "DeviceCMYK",
};
