import { describe, expect, it } from "vitest";
import { BuildError, DanglingReferenceError, DuplicateDefinitionError } from "#src/errors";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import { PdfRef } from "#src/objects/pdf-ref";
import { ObjectStore } from "./object-store";

describe("ObjectStore", () => {
  describe("allocate", () => {
    it("hands out increasing numbers starting at 1", () => {
      const store = new ObjectStore();

      expect(store.allocate()).toBe(PdfRef.of(1));
      expect(store.allocate()).toBe(PdfRef.of(2));
      expect(store.register(PdfNumber.of(7))).toBe(PdfRef.of(3));
      expect(store.allocatedCount).toBe(3);
      expect(store.definedCount).toBe(1);
    });
  });

  describe("define", () => {
    it("stores the object for a ref", () => {
      const store = new ObjectStore();
      const ref = store.allocate();
      const dict = PdfDict.of({ Type: PdfName.Page });

      store.define(ref, dict);

      expect(store.get(ref)).toBe(dict);
      expect(store.isDefined(ref)).toBe(true);
    });

    it("accepts an identical redefinition", () => {
      const store = new ObjectStore();
      const ref = store.allocate();

      store.define(ref, PdfDict.of({ Count: PdfNumber.of(1) }));

      expect(() => store.define(ref, PdfDict.of({ Count: PdfNumber.of(1) }))).not.toThrow();
    });

    it("rejects a conflicting redefinition", () => {
      const store = new ObjectStore();
      const ref = store.allocate();

      store.define(ref, PdfNumber.of(1));

      expect(() => store.define(ref, PdfNumber.of(2))).toThrow(DuplicateDefinitionError);
      expect(() => store.define(ref, PdfNumber.of(2))).toThrow(
        "Object 1 0 R is already defined with different content",
      );
    });

    it("rejects refs that were never allocated", () => {
      const store = new ObjectStore();

      expect(() => store.define(PdfRef.of(5), PdfNumber.of(1))).toThrow(DanglingReferenceError);
    });
  });

  describe("finalize", () => {
    it("returns objects in ascending order", () => {
      const store = new ObjectStore();
      const a = store.allocate();
      const b = store.allocate();

      store.define(b, PdfNumber.of(2));
      store.define(a, PdfArray.of(b));

      const objects = store.finalize();

      expect(objects.map(o => o.ref.objectNumber)).toEqual([1, 2]);
      expect(objects[0].object).toBeInstanceOf(PdfArray);
    });

    it("fails on a reference to an allocated but undefined object", () => {
      const store = new ObjectStore();
      const missing = store.allocate();

      store.register(PdfDict.of({ Next: missing }));

      expect(() => store.finalize()).toThrow(
        "Dangling reference to 1 0 R: referenced from 2 0 R but never defined",
      );
    });

    it("fails on a reference that was never allocated", () => {
      const store = new ObjectStore();

      store.register(PdfArray.of(PdfRef.of(40)));

      expect(() => store.finalize()).toThrow(
        "Dangling reference to 40 0 R: referenced from 1 0 R but never allocated",
      );
    });

    it("drops unreferenced undefined objects with a warning", () => {
      const messages: string[] = [];
      const store = new ObjectStore({ onWarning: message => messages.push(message) });

      store.allocate();
      store.register(PdfNumber.of(1));

      expect(store.finalize().map(o => o.ref.objectNumber)).toEqual([2]);
      expect(store.warnings).toEqual(["Object 1 0 R was allocated but never defined; dropped"]);
      expect(messages).toEqual(store.warnings);
    });

    it("can only run once", () => {
      const store = new ObjectStore();

      store.finalize();

      expect(() => store.finalize()).toThrow(BuildError);
      expect(() => store.allocate()).toThrow("Object store is already finalized");
    });
  });
});
