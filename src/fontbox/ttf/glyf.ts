/**
 * Composite glyph handling for the 'glyf' table.
 *
 * Simple glyphs are copied as opaque bytes; composites are scanned for their
 * component glyph ids, which the subsetter rewrites to new ids.
 */

import { BinaryScanner } from "#src/io/binary-scanner";

// Composite component flags
const ARG_1_AND_2_ARE_WORDS = 0x0001;
const WE_HAVE_A_SCALE = 0x0008;
const MORE_COMPONENTS = 0x0020;
const WE_HAVE_AN_X_AND_Y_SCALE = 0x0040;
const WE_HAVE_A_TWO_BY_TWO = 0x0080;

/** Size of the glyph header (numberOfContours + bbox) */
const GLYPH_HEADER_SIZE = 10;

/**
 * A component reference inside a composite glyph.
 */
export interface GlyphComponent {
  /** Byte position of the component's glyphIndex within the glyph data */
  position: number;
  glyphId: number;
}

/**
 * True when the glyph data describes a composite glyph.
 * Empty glyphs (zero-length, e.g. space) are not composite.
 */
export function isCompositeGlyph(glyph: Uint8Array): boolean {
  if (glyph.length < GLYPH_HEADER_SIZE) {
    return false;
  }

  const numberOfContours = (glyph[0] << 8) | glyph[1];

  // int16 < 0
  return (numberOfContours & 0x8000) !== 0;
}

/**
 * List the components of a composite glyph, in order.
 * Returns an empty list for simple and empty glyphs.
 */
export function readComponents(glyph: Uint8Array): GlyphComponent[] {
  if (!isCompositeGlyph(glyph)) {
    return [];
  }

  const s = new BinaryScanner(glyph);
  const components: GlyphComponent[] = [];

  s.moveTo(GLYPH_HEADER_SIZE);

  let flags: number;

  do {
    flags = s.readUint16();
    const position = s.position;
    const glyphId = s.readUint16();

    components.push({ position, glyphId });

    s.skip(flags & ARG_1_AND_2_ARE_WORDS ? 4 : 2);

    if (flags & WE_HAVE_A_SCALE) {
      s.skip(2);
    } else if (flags & WE_HAVE_AN_X_AND_Y_SCALE) {
      s.skip(4);
    } else if (flags & WE_HAVE_A_TWO_BY_TWO) {
      s.skip(8);
    }
  } while (flags & MORE_COMPONENTS);

  return components;
}

/**
 * Copy a composite glyph with each component id replaced by `mapId(oldId)`.
 * Trailing instructions are kept untouched.
 */
export function remapComponents(glyph: Uint8Array, mapId: (glyphId: number) => number): Uint8Array {
  const copy = glyph.slice();

  for (const component of readComponents(glyph)) {
    const newId = mapId(component.glyphId);

    copy[component.position] = (newId >> 8) & 0xff;
    copy[component.position + 1] = newId & 0xff;
  }

  return copy;
}
