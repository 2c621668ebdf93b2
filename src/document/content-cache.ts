/**
 * Single-flight cache from content keys to indirect objects.
 *
 * The first request for a key runs its builder; requests that arrive while
 * it runs await the same promise, so each key is built at most once per
 * build no matter how many page builders share it.
 */

import type { PdfRef } from "#src/objects/pdf-ref";
import type { ContentKey } from "./content-key";

type CacheEntry =
  | { state: "pending"; promise: Promise<PdfRef> }
  | { state: "resolved"; ref: PdfRef }
  | { state: "failed"; error: unknown };

export type ResourceBuilder = () => PdfRef | Promise<PdfRef>;

export interface CacheStats {
  /** Requests answered from a resolved entry */
  hits: number;
  /** Requests that ran a builder */
  misses: number;
  /** Requests that awaited a builder started by someone else */
  waits: number;
}

export class ContentCache {
  private readonly entries = new Map<ContentKey, CacheEntry>();

  private readonly counters: CacheStats = { hits: 0, misses: 0, waits: 0 };

  /**
   * Return the object for `key`, building it on first request.
   *
   * The pending entry is stored before the builder runs, so a builder may
   * request other keys (or be raced by other callers) safely. A failed
   * builder rejects every waiter with its error, and the key stays failed.
   */
  getOrBuild(key: ContentKey, builder: ResourceBuilder): Promise<PdfRef> {
    const entry = this.entries.get(key);

    if (entry) {
      switch (entry.state) {
        case "resolved":
          this.counters.hits++;
          return Promise.resolve(entry.ref);

        case "pending":
          this.counters.waits++;
          return entry.promise;

        case "failed":
          return Promise.reject(entry.error);
      }
    }

    this.counters.misses++;

    const promise = Promise.resolve()
      .then(builder)
      .then(
        ref => {
          this.entries.set(key, { state: "resolved", ref });

          return ref;
        },
        (error: unknown) => {
          this.entries.set(key, { state: "failed", error });

          throw error;
        },
      );

    this.entries.set(key, { state: "pending", promise });

    return promise;
  }

  /**
   * The resolved ref for a key, if its build has finished.
   */
  peek(key: ContentKey): PdfRef | undefined {
    const entry = this.entries.get(key);

    return entry?.state === "resolved" ? entry.ref : undefined;
  }

  get size(): number {
    return this.entries.size;
  }

  get stats(): CacheStats {
    return { ...this.counters };
  }
}
