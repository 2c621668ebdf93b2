import { describe, expect, it } from "vitest";
import { PdfRef } from "#src/objects/pdf-ref";
import { bytesToLatin1 } from "#src/test-utils";
import { serializeObject } from "#src/writer/serializer";
import { buildExtGState, checkAlpha, extGStateKey } from "./ext-g-state";

describe("checkAlpha", () => {
  it("accepts the closed unit interval", () => {
    expect(checkAlpha(0)).toBe(0);
    expect(checkAlpha(1)).toBe(1);
  });

  it("rejects values outside it", () => {
    expect(() => checkAlpha(1.5)).toThrow("Alpha must be between 0 and 1, got 1.5");
    expect(() => checkAlpha(Number.NaN)).toThrow("Alpha must be between 0 and 1, got NaN");
  });
});

describe("extGStateKey", () => {
  it("distinguishes fill from stroke opacity", () => {
    expect(extGStateKey({ fill: 0.5, stroke: 1 })).toBe(extGStateKey({ fill: 0.5, stroke: 1 }));
    expect(extGStateKey({ fill: 0.5, stroke: 1 })).not.toBe(extGStateKey({ fill: 1, stroke: 0.5 }));
  });

  it("keys opacities as they are written", () => {
    expect(extGStateKey({ fill: 0.1 + 0.2, stroke: 1 })).toBe(extGStateKey({ fill: 0.3, stroke: 1 }));
  });

  it("distinguishes unset parameters from set ones", () => {
    expect(extGStateKey({ fill: 1 })).not.toBe(extGStateKey({ fill: 1, stroke: 1 }));
    expect(extGStateKey({ blendMode: "Normal" })).not.toBe(extGStateKey({}));
  });

  it("distinguishes mask types and mask removal", () => {
    const group = PdfRef.of(7);

    expect(extGStateKey({ softMask: { type: "alpha", group } })).not.toBe(
      extGStateKey({ softMask: { type: "luminosity", group } }),
    );
    expect(extGStateKey({ softMask: "none" })).not.toBe(extGStateKey({}));
  });
});

describe("buildExtGState", () => {
  it("writes both opacities", () => {
    expect(bytesToLatin1(serializeObject(buildExtGState({ fill: 0.5, stroke: 1 })))).toBe(
      "<<\n/Type /ExtGState\n/ca 0.5\n/CA 1\n>>",
    );
  });

  it("writes only the parameters that are set", () => {
    expect(bytesToLatin1(serializeObject(buildExtGState({ stroke: 0.25, blendMode: "Multiply" })))).toBe(
      "<<\n/Type /ExtGState\n/CA 0.25\n/BM /Multiply\n>>",
    );
  });

  it("writes soft masks and their removal", () => {
    const mask = buildExtGState({ softMask: { type: "alpha", group: PdfRef.of(7) } });

    expect(bytesToLatin1(serializeObject(mask))).toBe(
      "<<\n/Type /ExtGState\n/SMask <<\n/Type /Mask\n/S /Alpha\n/G 7 0 R\n>>\n>>",
    );
    expect(bytesToLatin1(serializeObject(buildExtGState({ softMask: "none" })))).toBe(
      "<<\n/Type /ExtGState\n/SMask /None\n>>",
    );
  });
});
