/**
 * Translates drawing instructions into a content stream.
 *
 * Resources are resolved through a ContentResources implementation (which
 * deduplicates them document-wide) and bound to page-local names. The
 * graphics state is tracked so settings that change nothing are not written,
 * and so unbalanced save/restore fails the build.
 *
 * A form XObject inherits the state of whatever paints it, so a group's
 * builder starts with every parameter unknown and writes each first setting.
 */

import { BuildError, UnmappedGlyphError } from "#src/errors";
import { colorsEqual } from "#src/helpers/colors";
import { formatPdfNumber } from "#src/helpers/format";
import {
  beginText,
  clip,
  clipEvenOdd,
  closePath,
  concatMatrix,
  curveTo,
  endPath,
  endText,
  fill,
  fillAndStroke,
  fillAndStrokeEvenOdd,
  fillEvenOdd,
  lineTo,
  moveTo,
  paintXObject,
  popGraphicsState,
  pushGraphicsState,
  rectangle,
  setFont,
  setGraphicsState,
  setLineWidth,
  setNonStrokingColor,
  setStrokingColor,
  setTextMatrix,
  showText,
  showTextArray,
  stroke,
} from "#src/helpers/operators";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfRef } from "#src/objects/pdf-ref";
import { PdfString } from "#src/objects/pdf-string";
import type { ResolvedFont } from "#src/fonts/font-pipeline";
import { yieldToEventLoop } from "#src/scheduler/worker-pool";
import { ContentStreamBuilder } from "./content-stream";
import { checkAlpha, type ExtGStateParams } from "./ext-g-state";
import { type GraphicsState, GraphicsStateStack, inheritedGraphicsState } from "./graphics-state";
import type { GlyphRun, Instruction, Matrix, PaintMode, PathSegment, SoftMask } from "./instructions";
import { DEFAULT_CONTENT_PRECISION, type Operator, type TextArrayItem } from "./operators";
import { ResourceNames } from "./resource-names";

/**
 * Document-wide resource resolution used by content builders.
 */
export interface ContentResources {
  font(handle: string): Promise<ResolvedFont>;
  image(handle: string): Promise<PdfRef>;
  extGState(params: ExtGStateParams): Promise<PdfRef>;
  /**
   * @param ancestors - Groups being built around this one, outermost first
   */
  group(handle: string, ancestors: readonly string[]): Promise<PdfRef>;
  /** The form XObject painted as a soft mask */
  softMask(mask: SoftMask, ancestors: readonly string[]): Promise<PdfRef>;
}

export interface ContentOutput {
  content: Uint8Array;
  resources: PdfDict;
}

export interface PageContentBuilderOptions {
  /** Decimal places for numbers in the stream */
  precision?: number;
  /** Groups enclosing the stream being built */
  ancestors?: readonly string[];
  /** Start from an unknown graphics state, as a form XObject does */
  inheritsState?: boolean;
}

/**
 * Encode subset codes as a hex string of 2-byte values.
 */
export function encodeCodes(codes: readonly number[]): PdfString {
  const bytes = new Uint8Array(codes.length * 2);

  codes.forEach((code, i) => {
    bytes[i * 2] = (code >> 8) & 0xff;
    bytes[i * 2 + 1] = code & 0xff;
  });

  return new PdfString(bytes, "hex");
}

function segmentOperator(segment: PathSegment): Operator {
  switch (segment.type) {
    case "moveTo":
      return moveTo(segment.x, segment.y);
    case "lineTo":
      return lineTo(segment.x, segment.y);
    case "curveTo":
      return curveTo(segment.x1, segment.y1, segment.x2, segment.y2, segment.x, segment.y);
    case "rect":
      return rectangle(segment.x, segment.y, segment.width, segment.height);
    case "close":
      return closePath();
  }
}

function optionalAlpha(value: number | undefined): number | undefined {
  return value === undefined ? undefined : checkAlpha(value);
}

export class PageContentBuilder {
  private readonly state: GraphicsStateStack;
  private readonly names = new ResourceNames();
  private readonly content: ContentStreamBuilder;
  private readonly precision: number;
  private readonly ancestors: readonly string[];
  private consumed = false;

  constructor(
    private readonly resources: ContentResources,
    options: PageContentBuilderOptions = {},
  ) {
    this.precision = options.precision ?? DEFAULT_CONTENT_PRECISION;
    this.ancestors = options.ancestors ?? [];
    this.state = new GraphicsStateStack(options.inheritsState ? inheritedGraphicsState() : undefined);
    this.content = new ContentStreamBuilder(this.precision);
  }

  /**
   * Build the stream for an instruction list. A builder is used once.
   *
   * @throws {UnbalancedStateError} if saves and restores do not pair up
   * @throws {UnmappedGlyphError} if a text run uses a glyph outside its font's subset
   */
  async build(instructions: readonly Instruction[]): Promise<ContentOutput> {
    if (this.consumed) {
      throw new BuildError("A content builder can only build one stream");
    }

    this.consumed = true;

    await yieldToEventLoop();

    for (const instruction of instructions) {
      await this.apply(instruction);
    }

    this.state.assertBalanced();

    return { content: this.content.toBytes(), resources: this.names.toResources() };
  }

  private async apply(instruction: Instruction): Promise<void> {
    const current = this.state.current;

    switch (instruction.op) {
      case "save":
        this.state.save();
        this.content.add(pushGraphicsState());
        break;

      case "restore":
        this.state.restore();
        this.content.add(popGraphicsState());
        break;

      case "transform":
        this.state.transform(instruction.matrix);
        this.content.add(concatMatrix(instruction.matrix));
        break;

      case "setFill":
        if (current.fill === undefined || !colorsEqual(current.fill, instruction.color)) {
          this.state.update({ fill: instruction.color });
          this.content.add(setNonStrokingColor(instruction.color));
        }
        break;

      case "setStroke":
        if (current.stroke === undefined || !colorsEqual(current.stroke, instruction.color)) {
          this.state.update({ stroke: instruction.color });
          this.content.add(setStrokingColor(instruction.color));
        }
        break;

      case "setLineWidth":
        if (current.lineWidth !== instruction.width) {
          this.state.update({ lineWidth: instruction.width });
          this.content.add(setLineWidth(instruction.width));
        }
        break;

      case "setAlpha": {
        const fill = optionalAlpha(instruction.fill ?? current.fillAlpha);
        const stroke = optionalAlpha(instruction.stroke ?? current.strokeAlpha);

        if (current.fillAlpha !== fill || current.strokeAlpha !== stroke) {
          await this.applyExtGState({ fill, stroke }, { fillAlpha: fill, strokeAlpha: stroke });
        }
        break;
      }

      case "setBlendMode":
        if (current.blendMode !== instruction.mode) {
          await this.applyExtGState({ blendMode: instruction.mode }, { blendMode: instruction.mode });
        }
        break;

      case "setSoftMask":
        await this.setSoftMask(instruction.mask);
        break;

      case "path":
        this.path(instruction.segments, instruction.paint, instruction.fillRule === "evenodd");
        break;

      case "text":
        await this.text(instruction.font, instruction.size, instruction.runs);
        break;

      case "image": {
        const ref = await this.resources.image(instruction.image);
        this.placeXObject(this.names.nameFor("image", ref), instruction.transform);
        break;
      }

      case "group": {
        const ref = await this.resources.group(instruction.group, this.ancestors);
        this.placeXObject(this.names.nameFor("group", ref), instruction.transform);
        break;
      }
    }
  }

  private async setSoftMask(mask: SoftMask | undefined): Promise<void> {
    const softMask = mask ? `${mask.type}:${mask.group}` : "none";

    if (this.state.current.softMask === softMask) {
      return;
    }

    const params: ExtGStateParams = {
      softMask: mask ? { type: mask.type, group: await this.resources.softMask(mask, this.ancestors) } : "none",
    };

    await this.applyExtGState(params, { softMask });
  }

  private async applyExtGState(params: ExtGStateParams, changes: Partial<GraphicsState>): Promise<void> {
    const ref = await this.resources.extGState(params);

    this.state.update(changes);
    this.content.add(setGraphicsState(this.names.nameFor("extGState", ref)));
  }

  private path(segments: readonly PathSegment[], paint: PaintMode, evenOdd: boolean): void {
    if (segments.length === 0) {
      return;
    }

    for (const segment of segments) {
      this.content.add(segmentOperator(segment));
    }

    switch (paint) {
      case "fill":
        this.content.add(evenOdd ? fillEvenOdd() : fill());
        break;
      case "stroke":
        this.content.add(stroke());
        break;
      case "fillStroke":
        this.content.add(evenOdd ? fillAndStrokeEvenOdd() : fillAndStroke());
        break;
      case "clip":
        this.content.add(evenOdd ? clipEvenOdd() : clip(), endPath());
        this.state.update({ clipDepth: this.state.current.clipDepth + 1 });
        break;
    }
  }

  private async text(handle: string, size: number, runs: readonly GlyphRun[]): Promise<void> {
    const font = await this.resources.font(handle);
    const name = this.names.nameFor("font", font.ref);
    const currentFont = this.state.current.font;

    this.content.add(beginText());

    if (currentFont?.name !== name || currentFont.size !== size) {
      this.state.update({ font: { name, size } });
      this.content.add(setFont(name, size));
    }

    for (const run of runs) {
      if (run.glyphs.length === 0) {
        continue;
      }

      this.content.add(setTextMatrix([1, 0, 0, 1, run.x, run.y]), this.showRun(font, size, run));
    }

    this.content.add(endText());
  }

  /**
   * `Tj` for runs at natural advances, `TJ` with adjustments otherwise.
   *
   * An adjustment is in thousandths of the font size and moves the next
   * glyph left when positive.
   */
  private showRun(font: ResolvedFont, size: number, run: GlyphRun): Operator {
    const items: TextArrayItem[] = [];
    let pending: number[] = [];

    run.glyphs.forEach((glyph, i) => {
      const code = font.subset.codeForGlyph.get(glyph.id);

      if (code === undefined) {
        throw new UnmappedGlyphError(font.handle, glyph.id);
      }

      pending.push(code);

      if (glyph.advance === undefined || size === 0 || i === run.glyphs.length - 1) {
        return;
      }

      const adjustment = font.subset.widths[code] - (glyph.advance * 1000) / size;

      if (formatPdfNumber(adjustment, this.precision) !== "0") {
        items.push(encodeCodes(pending), adjustment);
        pending = [];
      }
    });

    if (items.length === 0) {
      return showText(encodeCodes(pending));
    }

    if (pending.length > 0) {
      items.push(encodeCodes(pending));
    }

    return showTextArray(items);
  }

  private placeXObject(name: string, transform: Matrix): void {
    this.content.add(pushGraphicsState(), concatMatrix(transform), paintXObject(name), popGraphicsState());
  }
}
