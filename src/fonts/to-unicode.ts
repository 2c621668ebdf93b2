/**
 * ToUnicode CMap generation.
 *
 * Maps the 2-byte codes of an Identity-H font back to the text each glyph
 * represents, so viewers can extract and search the text:
 *
 * ```
 * 2 beginbfchar
 * <0001> <0041>
 * <0002> <00C4>
 * endbfchar
 * ```
 */

/** Maximum entries per bfchar block */
const MAX_BFCHAR_ENTRIES = 100;

const CMAP_HEADER = [
  "/CIDInit /ProcSet findresource begin",
  "12 dict begin",
  "begincmap",
  "/CIDSystemInfo",
  "<< /Registry (Adobe)",
  "/Ordering (UCS)",
  "/Supplement 0",
  ">> def",
  "/CMapName /Adobe-Identity-UCS def",
  "/CMapType 2 def",
  "1 begincodespacerange",
  "<0000> <FFFF>",
  "endcodespacerange",
];

const CMAP_FOOTER = ["endcmap", "CMapName currentdict /CMap defineresource pop", "end", "end"];

/**
 * Format a code as 4 uppercase hex digits.
 */
function hexCode(code: number): string {
  return code.toString(16).toUpperCase().padStart(4, "0");
}

/**
 * Encode text as UTF-16BE hex. Astral characters become surrogate pairs.
 */
export function utf16Hex(text: string): string {
  let hex = "";

  for (let i = 0; i < text.length; i++) {
    hex += hexCode(text.charCodeAt(i));
  }

  return hex;
}

/**
 * Build a ToUnicode CMap program for code-to-text mappings.
 *
 * Entries are written in ascending code order.
 */
export function buildToUnicodeCMap(mappings: ReadonlyMap<number, string>): Uint8Array {
  const entries = [...mappings].filter(([, text]) => text.length > 0).sort(([a], [b]) => a - b);
  const lines = [...CMAP_HEADER];

  for (let start = 0; start < entries.length; start += MAX_BFCHAR_ENTRIES) {
    const block = entries.slice(start, start + MAX_BFCHAR_ENTRIES);

    lines.push(`${block.length} beginbfchar`);

    for (const [code, text] of block) {
      lines.push(`<${hexCode(code)}> <${utf16Hex(text)}>`);
    }

    lines.push("endbfchar");
  }

  lines.push(...CMAP_FOOTER);

  return new TextEncoder().encode(`${lines.join("\n")}\n`);
}
