import { describe, expect, it } from "vitest";
import { cmyk, colorsEqual, colorToArray, fillColorOperator, grayscale, rgb } from "./colors";

describe("color constructors", () => {
  it("creates RGB color object", () => {
    const color = rgb(0.5, 0.3, 0.8);

    expect(color).toEqual({ type: "RGB", red: 0.5, green: 0.3, blue: 0.8 });
  });

  it("creates grayscale color object", () => {
    expect(grayscale(0.5)).toEqual({ type: "Grayscale", gray: 0.5 });
  });

  it("creates CMYK color object", () => {
    expect(cmyk(0.1, 0.2, 0.3, 0.4)).toEqual({
      type: "CMYK",
      cyan: 0.1,
      magenta: 0.2,
      yellow: 0.3,
      black: 0.4,
    });
  });
});

describe("colorToArray", () => {
  it("converts each color type to operands", () => {
    expect(colorToArray(rgb(0.1, 0.2, 0.3))).toEqual([0.1, 0.2, 0.3]);
    expect(colorToArray(grayscale(0.5))).toEqual([0.5]);
    expect(colorToArray(cmyk(0.1, 0.2, 0.3, 0.4))).toEqual([0.1, 0.2, 0.3, 0.4]);
  });
});

describe("fillColorOperator", () => {
  it("picks the operator matching the color space", () => {
    expect(fillColorOperator(rgb(1, 0, 0))).toBe("rg");
    expect(fillColorOperator(grayscale(0))).toBe("g");
    expect(fillColorOperator(cmyk(0, 0, 0, 1))).toBe("k");
  });
});

describe("colorsEqual", () => {
  it("compares components", () => {
    expect(colorsEqual(rgb(1, 0, 0), rgb(1, 0, 0))).toBe(true);
    expect(colorsEqual(rgb(1, 0, 0), rgb(1, 0, 0.5))).toBe(false);
  });

  it("treats different color spaces as different", () => {
    expect(colorsEqual(grayscale(0), cmyk(0, 0, 0, 0))).toBe(false);
  });
});
