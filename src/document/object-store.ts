/**
 * Object store for a document build.
 *
 * Allocates object numbers and owns every indirect object. Everything else
 * holds PdfRefs; the store resolves them and, once the build is done,
 * checks the graph is closed before handing it over.
 */

import { BuildError, DanglingReferenceError, DuplicateDefinitionError } from "#src/errors";
import { bytesEqual } from "#src/helpers/buffer";
import type { WarningHandler } from "#src/helpers/types";
import { collectRefs, type PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { serializeObject } from "#src/writer/serializer";

/**
 * A defined indirect object.
 */
export interface IndirectObject {
  ref: PdfRef;
  object: PdfObject;
}

export interface ObjectStoreOptions {
  /** Called with each warning as it is recorded */
  onWarning?: WarningHandler;
}

/**
 * Registry of indirect objects for one build.
 *
 * Responsibilities:
 * - Assign sequential object numbers, starting at 1, never reused
 * - Map refs to their defined objects
 * - Reject conflicting redefinitions
 * - Verify on finalize that every reference resolves
 * - Collect warnings
 */
export class ObjectStore {
  private readonly objects = new Map<number, PdfObject>();

  /** Next object number to assign (0 is reserved for the free list head) */
  private nextObjNum = 1;

  private finalized = false;

  private readonly onWarning?: WarningHandler;

  /** Warnings collected during the build */
  readonly warnings: string[] = [];

  constructor(options: ObjectStoreOptions = {}) {
    this.onWarning = options.onWarning;
  }

  /**
   * Number of objects allocated so far.
   */
  get allocatedCount(): number {
    return this.nextObjNum - 1;
  }

  /**
   * Number of objects defined so far.
   */
  get definedCount(): number {
    return this.objects.size;
  }

  /**
   * Allocate a reference without assigning an object.
   *
   * Used to hand out refs before their objects exist (a page needs its
   * parent's ref before the page tree is built).
   */
  allocate(): PdfRef {
    this.checkOpen();

    return PdfRef.of(this.nextObjNum++, 0);
  }

  /**
   * Define the object for an allocated reference.
   *
   * Defining the same content twice is a no-op.
   *
   * @throws {DuplicateDefinitionError} if the ref already holds different content
   * @throws {DanglingReferenceError} if the ref was never allocated
   */
  define(ref: PdfRef, obj: PdfObject): void {
    this.checkOpen();

    if (!this.isAllocated(ref)) {
      throw new DanglingReferenceError(ref.objectNumber, "defined but never allocated");
    }

    const existing = this.objects.get(ref.objectNumber);

    if (existing !== undefined) {
      if (existing === obj || bytesEqual(serializeObject(existing), serializeObject(obj))) {
        return;
      }

      throw new DuplicateDefinitionError(ref.objectNumber);
    }

    this.objects.set(ref.objectNumber, obj);
  }

  /**
   * Allocate a reference and define it in one step.
   */
  register(obj: PdfObject): PdfRef {
    const ref = this.allocate();

    this.define(ref, obj);

    return ref;
  }

  /**
   * Get the object defined for a reference, or null.
   *
   * Compatible with `RefResolver`.
   */
  get(ref: PdfRef): PdfObject | null {
    if (ref.generation !== 0) {
      return null;
    }

    return this.objects.get(ref.objectNumber) ?? null;
  }

  isDefined(ref: PdfRef): boolean {
    return ref.generation === 0 && this.objects.has(ref.objectNumber);
  }

  /**
   * Add a warning message.
   */
  addWarning(message: string): void {
    this.warnings.push(message);
    this.onWarning?.(message);
  }

  /**
   * Close the store and return every object in ascending number order.
   *
   * Allocated numbers that were never defined and never referenced are
   * dropped with a warning. Can only be called once.
   *
   * @throws {DanglingReferenceError} if any object refers to an undefined object
   */
  finalize(): IndirectObject[] {
    this.checkOpen();
    this.finalized = true;

    const result: IndirectObject[] = [];

    for (let num = 1; num < this.nextObjNum; num++) {
      const object = this.objects.get(num);

      if (object === undefined) {
        continue;
      }

      const ref = PdfRef.of(num, 0);

      for (const target of collectRefs(object)) {
        if (this.isDefined(target)) {
          continue;
        }

        const reason = this.isAllocated(target) ? "never defined" : "never allocated";

        throw new DanglingReferenceError(target.objectNumber, `referenced from ${ref} but ${reason}`);
      }

      result.push({ ref, object });
    }

    for (let num = 1; num < this.nextObjNum; num++) {
      if (!this.objects.has(num)) {
        this.addWarning(`Object ${num} 0 R was allocated but never defined; dropped`);
      }
    }

    return result;
  }

  private isAllocated(ref: PdfRef): boolean {
    return ref.generation === 0 && ref.objectNumber >= 1 && ref.objectNumber < this.nextObjNum;
  }

  private checkOpen(): void {
    if (this.finalized) {
      throw new BuildError("Object store is already finalized");
    }
  }
}
