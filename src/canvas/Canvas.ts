import { ColorUtils } from "@/math/Color";
import type { Color } from "@/types";

/**
 * Canvas - Dense 2D grid of colors, row-major, initially black
 */
export class Canvas {
  readonly width: number;
  readonly height: number;
  private readonly _pixels: Color[];

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error(`Canvas dimensions must be positive integers, got ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this._pixels = new Array<Color>(width * height).fill(ColorUtils.black());
  }

  /**
   * Set the color at (x, y); (0, 0) is the top-left corner.
   * @throws RangeError if (x, y) is outside the canvas
   */
  writePixel(x: number, y: number, color: Color): void {
    this._pixels[this._index(x, y)] = color;
  }

  /**
   * @throws RangeError if (x, y) is outside the canvas
   */
  pixelAt(x: number, y: number): Color {
    return this._pixels[this._index(x, y)];
  }

  /**
   * Set every pixel to the same color
   */
  fill(color: Color): void {
    this._pixels.fill(color);
  }

  /**
   * Iterate pixels in row-major order (left to right, top to bottom)
   */
  *pixels(): IterableIterator<Color> {
    yield* this._pixels;
  }

  private _index(x: number, y: number): number {
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`Pixel (${x}, ${y}) is outside the ${this.width}x${this.height} canvas`);
    }
    return y * this.width + x;
  }
}
