/**
 * Operator accumulator for one content stream.
 */

import { ByteWriter } from "#src/io/byte-writer";
import { DEFAULT_CONTENT_PRECISION, type Operator } from "./operators";

/**
 * Collects operators and writes them one per line.
 *
 * @example
 * ```ts
 * const content = ContentStreamBuilder.from([pushGraphicsState(), rectangle(0, 0, 10, 10), fill()])
 *   .add(popGraphicsState());
 *
 * content.toBytes(); // "q\n0 0 10 10 re\nf\nQ"
 * ```
 */
export class ContentStreamBuilder {
  private readonly operators: Operator[] = [];

  constructor(private readonly precision: number = DEFAULT_CONTENT_PRECISION) {}

  static from(operators: Operator[], precision?: number): ContentStreamBuilder {
    return new ContentStreamBuilder(precision).add(...operators);
  }

  add(...operators: Operator[]): this {
    this.operators.push(...operators);

    return this;
  }

  get length(): number {
    return this.operators.length;
  }

  toBytes(): Uint8Array {
    const writer = new ByteWriter({ initialSize: this.operators.length * 16 + 16 });

    this.operators.forEach((operator, i) => {
      if (i > 0) {
        writer.writeAscii("\n");
      }

      operator.toBytes(writer, this.precision);
    });

    return writer.toBytes();
  }

  toString(): string {
    return new TextDecoder("latin1").decode(this.toBytes());
  }
}
