/**
 * Caller-supplied fonts, parsed on first use.
 */

import { describeError, ResourceDecodeFailedError } from "#src/errors";
import { digest } from "#src/document/content-key";
import { parseTTF } from "#src/fontbox/ttf/parser";
import type { TrueTypeFont } from "#src/fontbox/ttf/truetype-font";

/**
 * A parsed source font and the identity of its bytes.
 */
export interface RegisteredFont {
  handle: string;
  font: TrueTypeFont;
  /** SHA-256 of the font file; equal files share subsets */
  fontDigest: string;
}

export class FontRegistry {
  private readonly parsed = new Map<string, RegisteredFont>();

  constructor(private readonly sources: Readonly<Record<string, Uint8Array>> = {}) {}

  has(handle: string): boolean {
    return Object.hasOwn(this.sources, handle);
  }

  /**
   * Get the parsed font for a handle.
   *
   * @throws {ResourceDecodeFailedError} if the handle is unknown or the data is not a usable TrueType font
   */
  get(handle: string): RegisteredFont {
    const cached = this.parsed.get(handle);

    if (cached) {
      return cached;
    }

    if (!this.has(handle)) {
      throw new ResourceDecodeFailedError(handle, "font is not registered");
    }

    const data = this.sources[handle];
    let font: TrueTypeFont;

    try {
      font = parseTTF(data);
    } catch (error) {
      throw new ResourceDecodeFailedError(handle, `invalid font data: ${describeError(error)}`, {
        cause: error,
      });
    }

    const entry: RegisteredFont = { handle, font, fontDigest: digest(data) };

    this.parsed.set(handle, entry);

    return entry;
  }
}
