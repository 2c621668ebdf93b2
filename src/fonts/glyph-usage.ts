/**
 * Document-wide glyph usage, collected before any page is built.
 *
 * Every page that uses a font shares one subset, so the glyph set of each
 * font must be known up front. Form groups are followed from the pages
 * that place them or use them as soft masks; groups no page reaches
 * contribute nothing.
 */

import type { GroupSource, Instruction, PageRecord } from "#src/content/instructions";
import { ResourceDecodeFailedError } from "#src/errors";

export interface FontUsage {
  glyphIds: Set<number>;
  /** Text for a glyph; the first mapping seen wins */
  text: Map<number, string>;
}

export type GlyphUsage = Map<string, FontUsage>;

/**
 * Collect the glyphs and text each font handle needs across the document.
 *
 * @throws {ResourceDecodeFailedError} if a group is unknown or places itself
 */
export function collectGlyphUsage(
  pages: readonly PageRecord[],
  groups: Readonly<Record<string, GroupSource>> = {},
): GlyphUsage {
  const usage: GlyphUsage = new Map();
  const visited = new Set<string>();

  const visit = (instructions: readonly Instruction[], active: readonly string[]): void => {
    for (const instruction of instructions) {
      if (instruction.op === "text") {
        let entry = usage.get(instruction.font);

        if (!entry) {
          entry = { glyphIds: new Set(), text: new Map() };
          usage.set(instruction.font, entry);
        }

        for (const run of instruction.runs) {
          for (const glyph of run.glyphs) {
            entry.glyphIds.add(glyph.id);

            if (glyph.text !== undefined && glyph.text !== "" && !entry.text.has(glyph.id)) {
              entry.text.set(glyph.id, glyph.text);
            }
          }
        }
      } else if (instruction.op === "group") {
        enter(instruction.group, active);
      } else if (instruction.op === "setSoftMask" && instruction.mask) {
        enter(instruction.mask.group, active);
      }
    }
  };

  const enter = (handle: string, active: readonly string[]): void => {
    if (active.includes(handle)) {
      throw new ResourceDecodeFailedError(handle, "group places itself");
    }

    if (visited.has(handle)) {
      return;
    }

    if (!Object.hasOwn(groups, handle)) {
      throw new ResourceDecodeFailedError(handle, "group is not registered");
    }

    visit(groups[handle].instructions, [...active, handle]);
    visited.add(handle);
  };

  for (const page of pages) {
    visit(page.instructions, []);
  }

  return usage;
}
