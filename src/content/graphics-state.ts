/**
 * Graphics state tracking for one content stream.
 *
 * The builder consults the current state to drop operators that would not
 * change anything, and uses the stack depth to reject unbalanced streams.
 */

import { UnbalancedStateError } from "#src/errors";
import { black, type Color } from "#src/helpers/colors";
import type { BlendMode, Matrix } from "./instructions";

export interface TextFontState {
  /** Resource name, e.g. `F1` */
  name: string;
  size: number;
}

/**
 * Parameters left undefined are unknown: a form XObject inherits them from
 * whatever paints it, so nothing about them can be assumed.
 */
export interface GraphicsState {
  ctm: Matrix;
  fill?: Color;
  stroke?: Color;
  fillAlpha?: number;
  strokeAlpha?: number;
  lineWidth?: number;
  blendMode?: BlendMode;
  /** `none`, or `type:group` of the mask in effect */
  softMask?: string;
  font?: TextFontState;
  /** Number of clipping paths applied in this state */
  clipDepth: number;
}

export const IDENTITY_MATRIX: Matrix = [1, 0, 0, 1, 0, 0];

/**
 * The state at the start of a page's content stream.
 */
export function initialGraphicsState(): GraphicsState {
  return {
    ctm: IDENTITY_MATRIX,
    fill: black,
    stroke: black,
    fillAlpha: 1,
    strokeAlpha: 1,
    lineWidth: 1,
    blendMode: "Normal",
    softMask: "none",
    clipDepth: 0,
  };
}

/**
 * The state at the start of a form XObject: only its own space is known.
 */
export function inheritedGraphicsState(): GraphicsState {
  return { ctm: IDENTITY_MATRIX, clipDepth: 0 };
}

/**
 * Multiply two matrices: the result applies `a` first, then `b`.
 */
export function multiplyMatrix(a: Matrix, b: Matrix): Matrix {
  return [
    a[0] * b[0] + a[1] * b[2],
    a[0] * b[1] + a[1] * b[3],
    a[2] * b[0] + a[3] * b[2],
    a[2] * b[1] + a[3] * b[3],
    a[4] * b[0] + a[5] * b[2] + b[4],
    a[4] * b[1] + a[5] * b[3] + b[5],
  ];
}

export class GraphicsStateStack {
  private readonly saved: GraphicsState[] = [];
  private state: GraphicsState;

  constructor(initial: GraphicsState = initialGraphicsState()) {
    this.state = initial;
  }

  get current(): Readonly<GraphicsState> {
    return this.state;
  }

  /** Number of unrestored saves */
  get depth(): number {
    return this.saved.length;
  }

  save(): void {
    this.saved.push({ ...this.state });
  }

  /**
   * @throws {UnbalancedStateError} if there is no saved state to return to
   */
  restore(): void {
    const previous = this.saved.pop();

    if (!previous) {
      throw new UnbalancedStateError("Restore without a matching save");
    }

    this.state = previous;
  }

  update(changes: Partial<GraphicsState>): void {
    this.state = { ...this.state, ...changes };
  }

  /**
   * Concatenate a transform onto the current matrix.
   */
  transform(matrix: Matrix): void {
    this.update({ ctm: multiplyMatrix(matrix, this.state.ctm) });
  }

  /**
   * @throws {UnbalancedStateError} if saves are left open
   */
  assertBalanced(): void {
    if (this.saved.length > 0) {
      throw new UnbalancedStateError(
        `Content stream ended with ${this.saved.length} unrestored save(s)`,
      );
    }
  }
}
