import { Canvas } from "@/canvas/Canvas";
import { ColorUtils } from "@/math/Color";
import { describe, expect, it } from "vitest";

describe("Canvas", () => {
  it("should start with every pixel black", () => {
    const c = new Canvas(10, 20);
    expect(c.width).toBe(10);
    expect(c.height).toBe(20);
    expect([...c.pixels()].every((p) => ColorUtils.equals(p, ColorUtils.black()))).toBe(true);
    expect([...c.pixels()]).toHaveLength(200);
  });

  it("should write and read back a pixel", () => {
    const c = new Canvas(10, 20);
    const red = ColorUtils.create(1, 0, 0);
    c.writePixel(2, 3, red);
    expect(c.pixelAt(2, 3)).toEqual(red);
    expect(c.pixelAt(3, 2)).toEqual(ColorUtils.black());
  });

  it("should throw RangeError outside the canvas", () => {
    const c = new Canvas(4, 3);
    expect(() => c.pixelAt(4, 0)).toThrow(RangeError);
    expect(() => c.writePixel(0, 3, ColorUtils.white())).toThrow("Pixel (0, 3) is outside the 4x3 canvas");
    expect(() => c.pixelAt(-1, 0)).toThrow(RangeError);
  });

  it("should reject invalid dimensions", () => {
    expect(() => new Canvas(0, 5)).toThrow("Canvas dimensions must be positive integers, got 0x5");
    expect(() => new Canvas(3, 1.5)).toThrow("Canvas dimensions must be positive integers");
  });

  it("should fill every pixel", () => {
    const c = new Canvas(3, 2);
    const grey = ColorUtils.create(0.5, 0.5, 0.5);
    c.fill(grey);
    expect([...c.pixels()]).toEqual(new Array(6).fill(grey));
  });

  it("should iterate pixels in row-major order", () => {
    const c = new Canvas(2, 2);
    const a = ColorUtils.create(0.1, 0, 0);
    const b = ColorUtils.create(0, 0.2, 0);
    c.writePixel(1, 0, a);
    c.writePixel(0, 1, b);
    expect([...c.pixels()]).toEqual([ColorUtils.black(), a, b, ColorUtils.black()]);
  });
});
