/**
 * Page-local resource names.
 *
 * Each resource gets a short name the first time a stream uses it (`F1`,
 * `Im1`, `GS1`, `Fm1`), numbered per prefix in first-use order. Later uses
 * of the same object reuse the name.
 */

import { PdfDict } from "#src/objects/pdf-dict";
import type { PdfRef } from "#src/objects/pdf-ref";

export type ResourceCategory = "font" | "image" | "extGState" | "group";

const PREFIXES: Record<ResourceCategory, string> = {
  font: "F",
  image: "Im",
  extGState: "GS",
  group: "Fm",
};

/** Resource dictionary subdictionary each category lives in */
const SUBDICTS: Record<ResourceCategory, "Font" | "XObject" | "ExtGState"> = {
  font: "Font",
  image: "XObject",
  extGState: "ExtGState",
  group: "XObject",
};

const SUBDICT_ORDER = ["Font", "XObject", "ExtGState"] as const;

export class ResourceNames {
  private readonly names = new Map<string, string>();
  private readonly counters = new Map<ResourceCategory, number>();
  private readonly entries = new Map<string, Map<string, PdfRef>>();

  /**
   * Name for a resource, assigning the next free one on first use.
   */
  nameFor(category: ResourceCategory, ref: PdfRef): string {
    const id = `${category}:${ref}`;
    const existing = this.names.get(id);

    if (existing) {
      return existing;
    }

    const next = (this.counters.get(category) ?? 0) + 1;
    const name = `${PREFIXES[category]}${next}`;

    this.counters.set(category, next);
    this.names.set(id, name);

    const subdict = SUBDICTS[category];
    let entries = this.entries.get(subdict);

    if (!entries) {
      entries = new Map();
      this.entries.set(subdict, entries);
    }

    entries.set(name, ref);

    return name;
  }

  get size(): number {
    return this.names.size;
  }

  /**
   * Build the /Resources dictionary. Empty categories are left out.
   */
  toResources(): PdfDict {
    const resources = new PdfDict();

    for (const subdict of SUBDICT_ORDER) {
      const entries = this.entries.get(subdict);

      if (entries) {
        resources.set(subdict, new PdfDict(entries));
      }
    }

    return resources;
  }
}
