/**
 * Document assembly: page tree, catalog and info dictionary.
 *
 * Page builds run concurrently, so the numbers the store hands out depend
 * on timing. The assembler finalizes the store and then renumbers the graph
 * by a walk from the catalog, which makes the output depend only on the
 * input.
 */

import { BuildError, IncompleteDocumentError } from "#src/errors";
import { formatPdfDate } from "#src/helpers/format";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import { collectRefs, type PdfObject, remapRefs } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { PdfString } from "#src/objects/pdf-string";
import type { IndirectObject, ObjectStore } from "./object-store";

/**
 * A page whose content stream has been built.
 */
export interface PageOutput {
  width: number;
  height: number;
  content: Uint8Array;
  resources: PdfDict;
}

/**
 * Document information. Every field is optional; without any of them no
 * /Info dictionary is written.
 */
export interface DocumentMetadata {
  title?: string;
  authors?: string[];
  subject?: string;
  keywords?: string[];
  creator?: string;
  producer?: string;
  creationDate?: Date;
  modificationDate?: Date;
  /** Natural language of the document, e.g. `en-US`; written to the catalog */
  language?: string;
  /** Stable identifier for the first /ID element */
  documentId?: string;
}

export interface AssembledDocument {
  /** Objects with their final numbers, in ascending order */
  objects: IndirectObject[];
  root: PdfRef;
  info?: PdfRef;
}

/**
 * Build the /Info dictionary, or undefined when there is nothing to say.
 */
export function buildInfoDict(metadata: DocumentMetadata): PdfDict | undefined {
  const info = new PdfDict();

  const text = (key: string, value: string | undefined) => {
    if (value !== undefined) {
      info.set(key, PdfString.fromText(value));
    }
  };

  const date = (key: string, value: Date | undefined) => {
    if (value !== undefined) {
      info.set(key, PdfString.fromText(formatPdfDate(value)));
    }
  };

  text("Title", metadata.title);
  text("Author", metadata.authors?.join(", "));
  text("Subject", metadata.subject);
  text("Keywords", metadata.keywords?.join(", "));
  text("Creator", metadata.creator);
  text("Producer", metadata.producer);
  date("CreationDate", metadata.creationDate);
  date("ModDate", metadata.modificationDate);

  return info.size > 0 ? info : undefined;
}

/**
 * Renumber a finalized graph by a depth-first walk.
 *
 * The walk starts at `root` and follows references in the order they appear
 * (dict entries in insertion order, array items in order), numbering each
 * object when first reached. `trailing` objects are walked after it. Objects
 * not reached are left out.
 */
export function renumberObjects(
  objects: readonly IndirectObject[],
  root: PdfRef,
  trailing: readonly PdfRef[] = [],
): { objects: IndirectObject[]; mapping: Map<PdfRef, PdfRef> } {
  const byRef = new Map<PdfRef, PdfObject>(objects.map(({ ref, object }) => [ref, object]));
  const mapping = new Map<PdfRef, PdfRef>();

  const visit = (ref: PdfRef): void => {
    const object = byRef.get(ref);

    if (object === undefined || mapping.has(ref)) {
      return;
    }

    mapping.set(ref, PdfRef.of(mapping.size + 1));

    for (const child of collectRefs(object)) {
      visit(child);
    }
  };

  visit(root);
  trailing.forEach(visit);

  const renumbered: IndirectObject[] = [];

  for (const [oldRef, newRef] of mapping) {
    const object = byRef.get(oldRef);

    if (object !== undefined) {
      renumbered.push({ ref: newRef, object: remapRefs(object, ref => mapping.get(ref) ?? ref) });
    }
  }

  return { objects: renumbered, mapping };
}

export class DocumentAssembler {
  constructor(private readonly store: ObjectStore) {}

  /**
   * Add the page tree, catalog and info to the store, finalize it and
   * renumber the result.
   *
   * @throws {IncompleteDocumentError} if there are no pages
   * @throws {DanglingReferenceError} if any object refers to an undefined one
   */
  assemble(pages: readonly PageOutput[], metadata: DocumentMetadata = {}): AssembledDocument {
    if (pages.length === 0) {
      throw new IncompleteDocumentError();
    }

    const { store } = this;
    const pagesRef = store.allocate();

    const kids = pages.map((page, index) => {
      if (!(page.width > 0 && page.height > 0)) {
        throw new BuildError(`Page ${index + 1} has invalid size ${page.width}x${page.height}`);
      }

      const contents = store.register(PdfStream.fromDict({}, page.content));

      return store.register(
        PdfDict.of({
          Type: PdfName.Page,
          Parent: pagesRef,
          MediaBox: PdfArray.ofNumbers([0, 0, page.width, page.height]),
          Resources: page.resources,
          Contents: contents,
        }),
      );
    });

    store.define(
      pagesRef,
      PdfDict.of({
        Type: PdfName.Pages,
        Kids: new PdfArray(kids),
        Count: PdfNumber.of(kids.length),
      }),
    );

    const catalog = PdfDict.of({ Type: PdfName.Catalog, Pages: pagesRef });

    if (metadata.language !== undefined) {
      catalog.set("Lang", PdfString.fromText(metadata.language));
    }

    const catalogRef = store.register(catalog);
    const infoDict = buildInfoDict(metadata);
    const infoRef = infoDict ? store.register(infoDict) : undefined;

    const finalized = store.finalize();
    const { objects, mapping } = renumberObjects(finalized, catalogRef, infoRef ? [infoRef] : []);

    const dropped = finalized.length - objects.length;

    if (dropped > 0) {
      store.addWarning(`${dropped} unreferenced object(s) left out of the document`);
    }

    return {
      objects,
      root: mapping.get(catalogRef) ?? catalogRef,
      info: infoRef && mapping.get(infoRef),
    };
  }
}
