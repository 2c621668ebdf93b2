/**
 * Zod schema for build options.
 *
 * Options are validated once at the start of a build; everything after
 * works with the parsed, defaulted values.
 */

import { z } from "zod";
import { ConfigError } from "#src/errors";
import { SharedContentCache } from "#src/fonts/shared-cache";
import type { WarningHandler } from "#src/helpers/types";

/**
 * PDF versions that can be declared in the header.
 */
export const PdfVersionSchema = z.enum(["1.4", "1.5", "1.6", "1.7", "2.0"]);
export type PdfVersion = z.infer<typeof PdfVersionSchema>;

/**
 * How the cross-reference section is written.
 *
 * - table: classic `xref` table and `trailer` (PDF 1.0+)
 * - stream: a binary xref stream object (PDF 1.5+)
 */
export const CrossReferenceStyleSchema = z.enum(["table", "stream"]);
export type CrossReferenceStyle = z.infer<typeof CrossReferenceStyleSchema>;

export const BuildOptionsSchema = z
  .object({
    /** Build pages concurrently */
    enableParallelism: z.boolean().default(true),
    /**
     * Concurrent page builds; defaults to the host's available parallelism.
     * Builds share one thread, so this bounds interleaving and memory held by
     * pages in flight, not CPU use.
     */
    workerCount: z.number().int().positive().optional(),
    crossReferenceStyle: CrossReferenceStyleSchema.default("table"),
    /**
     * Decimal places for numbers in content streams. Numbers in object
     * dictionaries (/MediaBox, /BBox, /W, opacities) always keep 5.
     */
    numericPrecision: z.number().int().min(0).max(10).default(4),
    compressStreams: z.boolean().default(true),
    /** Keep the file 7-bit clean: ASCII binary marker and hex-encoded streams */
    asciiCompatible: z.boolean().default(false),
    pdfVersion: PdfVersionSchema.default("1.7"),
    /** Reuse font subsets across builds */
    sharedCache: z.instanceof(SharedContentCache).optional(),
    /** Receives each warning as it is recorded */
    onWarning: z
      .custom<WarningHandler>(value => typeof value === "function", "Expected a function")
      .optional(),
  })
  .strict()
  .superRefine((options, ctx) => {
    if (options.crossReferenceStyle === "stream" && options.pdfVersion === "1.4") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["crossReferenceStyle"],
        message: "Cross-reference streams need PDF 1.5 or later",
      });
    }
  });

/** Options as callers pass them */
export type BuildOptions = z.input<typeof BuildOptionsSchema>;

/** Options with every default applied */
export type ResolvedBuildOptions = z.output<typeof BuildOptionsSchema>;

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/**
 * Validate options and apply defaults.
 *
 * @throws {ConfigError} listing every problem found
 */
export function resolveBuildOptions(options: unknown = {}): ResolvedBuildOptions {
  const result = BuildOptionsSchema.safeParse(options);

  if (!result.success) {
    throw new ConfigError(result.error.issues.map(formatIssue));
  }

  return result.data;
}
