import { describe, expect, it } from "vitest";
import { contentKey, digest } from "./content-key";

describe("contentKey", () => {
  it("is 64 lowercase hex digits", () => {
    expect(contentKey("image", "raw", 1, 2)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is stable for equal fields", () => {
    const data = new Uint8Array([1, 2, 3]);

    expect(contentKey("font-subset", data, [0, 3, 4])).toBe(
      contentKey("font-subset", new Uint8Array([1, 2, 3]), [0, 3, 4]),
    );
  });

  it("separates kinds", () => {
    expect(contentKey("image", "a")).not.toBe(contentKey("group", "a"));
  });

  it("does not confuse field boundaries", () => {
    expect(contentKey("group", "ab", "c")).not.toBe(contentKey("group", "a", "bc"));
    expect(contentKey("group", ["a", "b"])).not.toBe(contentKey("group", "a", "b"));
  });

  it("does not confuse field types", () => {
    expect(contentKey("group", "1")).not.toBe(contentKey("group", 1));
    expect(contentKey("group", undefined)).not.toBe(contentKey("group", ""));
  });

  it("treats negative zero as zero", () => {
    expect(contentKey("ext-g-state", -0)).toBe(contentKey("ext-g-state", 0));
  });

  it("rejects non-finite numbers", () => {
    expect(() => contentKey("ext-g-state", Number.NaN)).toThrow("Cannot key a non-finite number");
  });
});

describe("digest", () => {
  it("hashes bytes with SHA-256", () => {
    expect(digest(new TextEncoder().encode("abc"))).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });
});
