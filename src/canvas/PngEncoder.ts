import { PNG } from "pngjs";
import type { Canvas } from "./Canvas";
import { colorToBytes } from "./PpmEncoder";

/**
 * Encode a canvas as an 8-bit RGBA PNG.
 * Channels use the same rounding and clamping as the PPM encoder; alpha is opaque.
 */
export function encodePng(canvas: Canvas): Buffer {
  const png = new PNG({ width: canvas.width, height: canvas.height });

  let offset = 0;
  for (const color of canvas.pixels()) {
    const [red, green, blue] = colorToBytes(color);
    png.data[offset] = red;
    png.data[offset + 1] = green;
    png.data[offset + 2] = blue;
    png.data[offset + 3] = 255;
    offset += 4;
  }

  return PNG.sync.write(png);
}
