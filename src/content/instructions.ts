/**
 * Typed drawing instructions consumed by the content stream builder.
 *
 * Coordinates are in PDF user space (points, origin bottom-left).
 */

import type { Color } from "#src/helpers/colors";

/** Affine transform `[a b c d e f]` as used by the `cm` operator */
export type Matrix = [number, number, number, number, number, number];

/** `[llx lly urx ury]` */
export type Rectangle = [number, number, number, number];

export type PathSegment =
  | { type: "moveTo"; x: number; y: number }
  | { type: "lineTo"; x: number; y: number }
  | { type: "curveTo"; x1: number; y1: number; x2: number; y2: number; x: number; y: number }
  | { type: "rect"; x: number; y: number; width: number; height: number }
  | { type: "close" };

export type PaintMode = "fill" | "stroke" | "fillStroke" | "clip";

export type FillRule = "nonzero" | "evenodd";

/** Separable and non-separable blend modes (ISO 32000-1 11.3.5) */
export type BlendMode =
  | "Normal"
  | "Multiply"
  | "Screen"
  | "Overlay"
  | "Darken"
  | "Lighten"
  | "ColorDodge"
  | "ColorBurn"
  | "HardLight"
  | "SoftLight"
  | "Difference"
  | "Exclusion"
  | "Hue"
  | "Saturation"
  | "Color"
  | "Luminosity";

/**
 * How a mask group turns into coverage: by the luminosity of what it paints,
 * or by its alpha.
 */
export type MaskType = "luminosity" | "alpha";

export interface SoftMask {
  /** Group painted as the mask */
  group: string;
  type: MaskType;
}

/**
 * One glyph of a text run.
 */
export interface PositionedGlyph {
  /** Glyph id in the source font */
  id: number;
  /** Text this glyph represents, for the ToUnicode map */
  text?: string;
  /**
   * Horizontal pen advance after this glyph, in user space units.
   * Defaults to the glyph's own advance width at the run's size.
   */
  advance?: number;
}

export interface GlyphRun {
  /** Baseline origin of the first glyph */
  x: number;
  y: number;
  glyphs: PositionedGlyph[];
}

export type Instruction =
  | { op: "save" }
  | { op: "restore" }
  | { op: "transform"; matrix: Matrix }
  | { op: "setFill"; color: Color }
  | { op: "setStroke"; color: Color }
  | { op: "setLineWidth"; width: number }
  | { op: "setAlpha"; fill?: number; stroke?: number }
  | { op: "setBlendMode"; mode: BlendMode }
  /** Without a mask, removes the current one */
  | { op: "setSoftMask"; mask?: SoftMask }
  | { op: "path"; segments: PathSegment[]; paint: PaintMode; fillRule?: FillRule }
  | { op: "text"; font: string; size: number; runs: GlyphRun[] }
  | { op: "image"; image: string; transform: Matrix }
  | { op: "group"; group: string; transform: Matrix };

export type InstructionOp = Instruction["op"];

/**
 * Description of one page.
 */
export interface PageRecord {
  width: number;
  height: number;
  instructions: Instruction[];
}

/**
 * A reusable group of instructions, emitted once as a Form XObject.
 */
export interface GroupSource {
  bbox: Rectangle;
  instructions: Instruction[];
  /**
   * Composite the group as a transparency group before it meets the
   * backdrop. Groups used as soft masks always are.
   */
  transparency?: TransparencyGroup;
}

export interface TransparencyGroup {
  /** Composite against a transparent backdrop instead of the page */
  isolated?: boolean;
  /** Each object composites against the group's initial backdrop only */
  knockout?: boolean;
}
