import { ASCIIHexFilter } from "./ascii-hex-filter";
import type { Filter } from "./filter";
import { FlateFilter } from "./flate-filter";

const filters = new Map<string, Filter>(
  [new FlateFilter(), new ASCIIHexFilter()].map(filter => [filter.name, filter]),
);

function getFilter(name: string): Filter {
  const filter = filters.get(name);

  if (!filter) {
    throw new Error(`Unknown filter: ${name}`);
  }

  return filter;
}

/**
 * Decode data through a /Filter chain.
 *
 * Filters are applied in order: `[/ASCIIHexDecode /FlateDecode]` means
 * decode the hex first, then inflate.
 */
export function decodeFilters(data: Uint8Array, names: readonly string[]): Uint8Array {
  let result = data;

  for (const name of names) {
    result = getFilter(name).decode(result);
  }

  return result;
}

/**
 * Encode data for a /Filter chain. Filters are applied in reverse order.
 */
export function encodeFilters(data: Uint8Array, names: readonly string[]): Uint8Array {
  let result = data;

  for (const name of [...names].reverse()) {
    result = getFilter(name).encode(result);
  }

  return result;
}

/**
 * Whether a filter is available for encoding and decoding.
 */
export function hasFilter(name: string): boolean {
  return filters.has(name);
}
