import { deflate, inflate } from "pako";
import type { Filter } from "./filter";

/** zlib level used for every FlateDecode stream */
const COMPRESSION_LEVEL = 6;

/**
 * FlateDecode filter - zlib/deflate compression.
 *
 * A fixed compression level keeps output byte-identical across builds.
 */
export class FlateFilter implements Filter {
  readonly name = "FlateDecode";

  encode(data: Uint8Array): Uint8Array {
    // zlib format (RFC 1950), header included
    return deflate(data, { level: COMPRESSION_LEVEL });
  }

  decode(data: Uint8Array): Uint8Array {
    return inflate(data);
  }
}
