/**
 * A stream filter, named by its /Filter value.
 *
 * Both directions are synchronous: encoding happens while the writer lays
 * out the file, decoding is used to inspect written streams.
 */
export interface Filter {
  readonly name: string;

  encode(data: Uint8Array): Uint8Array;

  decode(data: Uint8Array): Uint8Array;
}
