/**
 * Document build entry point.
 *
 * A build owns one ObjectStore and one ContentCache. Pages are built
 * concurrently against both; the assembler then renumbers the finished
 * graph so the output does not depend on how the page builds interleaved.
 */

import type { GroupSource, PageRecord } from "#src/content/instructions";
import { DocumentResources } from "#src/content/document-resources";
import { PageContentBuilder } from "#src/content/page-content-builder";
import { type DocumentMetadata, DocumentAssembler, type PageOutput } from "#src/document/assembler";
import { type CacheStats, ContentCache } from "#src/document/content-cache";
import { type IndirectObject, ObjectStore } from "#src/document/object-store";
import { IncompleteDocumentError } from "#src/errors";
import { FontPipeline } from "#src/fonts/font-pipeline";
import { FontRegistry } from "#src/fonts/font-registry";
import { FontSubsetCache } from "#src/fonts/font-subset";
import { collectGlyphUsage } from "#src/fonts/glyph-usage";
import { ImageRegistry } from "#src/images/image-registry";
import type { ImageSource } from "#src/images/image-source";
import type { PdfRef } from "#src/objects/pdf-ref";
import { resolveConcurrency, runPool } from "#src/scheduler/worker-pool";
import { fileIdentifier, writeDocument } from "#src/writer/pdf-writer";
import { type BuildOptions, type ResolvedBuildOptions, resolveBuildOptions } from "./options";

/**
 * Everything a document is built from.
 */
export interface DocumentInput {
  pages: PageRecord[];
  /** TrueType font programs by handle */
  fonts?: Record<string, Uint8Array>;
  images?: Record<string, ImageSource>;
  /** Reusable form groups by handle */
  groups?: Record<string, GroupSource>;
  metadata?: DocumentMetadata;
}

export interface BuildStats {
  pages: number;
  /** Indirect objects written, excluding an xref stream */
  objects: number;
  /** Concurrent page builds used */
  concurrency: number;
  cache: CacheStats;
  /** Distinct font subsets computed or reused */
  fontSubsets: number;
}

export interface BuildResult {
  bytes: Uint8Array;
  /** The object graph as written, with final numbers */
  objects: IndirectObject[];
  root: PdfRef;
  info?: PdfRef;
  warnings: string[];
  stats: BuildStats;
}

/**
 * First /ID element: stable across revisions when the caller gives an id,
 * or when title and authors are known. Otherwise the writer derives it from
 * the file body.
 */
function documentIdentifier(
  metadata: DocumentMetadata | undefined,
  options: ResolvedBuildOptions,
): Uint8Array | undefined {
  if (metadata?.documentId !== undefined) {
    return fileIdentifier(options.pdfVersion, metadata.documentId);
  }

  if (metadata?.title !== undefined && metadata.authors !== undefined) {
    return fileIdentifier(options.pdfVersion, metadata.title, ...metadata.authors);
  }

  return undefined;
}

/**
 * Build a complete PDF file.
 *
 * @throws {ConfigError} if options are invalid
 * @throws {IncompleteDocumentError} if there are no pages
 * @throws {BuildError} subclasses for any failure while building; nothing is
 * written and no partial result is returned
 */
export async function buildDocument(input: DocumentInput, options: BuildOptions = {}): Promise<BuildResult> {
  const config = resolveBuildOptions(options);

  if (input.pages.length === 0) {
    throw new IncompleteDocumentError();
  }

  const usage = collectGlyphUsage(input.pages, input.groups);

  const store = new ObjectStore({ onWarning: config.onWarning });
  const cache = new ContentCache();
  const subsets = new FontSubsetCache(config.sharedCache);

  const resources = new DocumentResources({
    store,
    cache,
    fonts: new FontPipeline({ store, cache, registry: new FontRegistry(input.fonts), usage, subsets }),
    images: new ImageRegistry({ store, cache }, input.images),
    groups: input.groups,
    precision: config.numericPrecision,
  });

  const concurrency = resolveConcurrency(config);

  const pages = await runPool(input.pages, concurrency, async (page): Promise<PageOutput> => {
    const builder = new PageContentBuilder(resources, { precision: config.numericPrecision });
    const { content, resources: pageResources } = await builder.build(page.instructions);

    return { width: page.width, height: page.height, content, resources: pageResources };
  });

  const assembled = new DocumentAssembler(store).assemble(pages, input.metadata);

  const { bytes } = writeDocument(assembled.objects, {
    version: config.pdfVersion,
    root: assembled.root,
    info: assembled.info,
    documentId: documentIdentifier(input.metadata, config),
    useXRefStream: config.crossReferenceStyle === "stream",
    compressStreams: config.compressStreams,
    asciiCompatible: config.asciiCompatible,
  });

  return {
    bytes,
    objects: assembled.objects,
    root: assembled.root,
    info: assembled.info,
    warnings: [...store.warnings],
    stats: {
      pages: pages.length,
      objects: assembled.objects.length,
      concurrency,
      cache: cache.stats,
      fontSubsets: subsets.size,
    },
  };
}
