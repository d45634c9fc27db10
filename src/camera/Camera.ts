import { Canvas } from "@/canvas/Canvas";
import { RenderDebugLogger } from "@/debug/RenderDebugLogger";
import { Matrix } from "@/math/Matrix";
import { RayUtils } from "@/math/Ray";
import { Tuple } from "@/math/Tuple";
import type { Color, Ray, Tuple as TupleValue } from "@/types";
import type { World } from "@/world/World";

export interface RenderCallbacks {
  /** Called after each completed row */
  readonly onRow?: (rowsCompleted: number, totalRows: number) => void;
}

/**
 * Camera - Maps pixels to rays and renders a world into a canvas
 *
 * The canvas sits one unit in front of the eye, which looks down -z in
 * camera space. `transform` is the world-to-camera (view) transform.
 */
export class Camera {
  /** Horizontal size in pixels */
  readonly hsize: number;
  /** Vertical size in pixels */
  readonly vsize: number;
  /** Horizontal or vertical view angle in radians, whichever side is longer */
  readonly fieldOfView: number;
  readonly transform: Matrix;
  readonly halfWidth: number;
  readonly halfHeight: number;
  /** World-space size of one pixel on the canvas plane */
  readonly pixelSize: number;
  private readonly _inverse: Matrix;
  private readonly _origin: TupleValue;

  /**
   * @throws NotInvertibleError if the transform is singular
   */
  constructor(hsize: number, vsize: number, fieldOfView: number, transform: Matrix = Matrix.identity(4)) {
    if (!Number.isInteger(hsize) || !Number.isInteger(vsize) || hsize <= 0 || vsize <= 0) {
      throw new Error(`Camera size must be positive integers, got ${hsize}x${vsize}`);
    }
    this.hsize = hsize;
    this.vsize = vsize;
    this.fieldOfView = fieldOfView;
    this.transform = transform;

    const halfView = Math.tan(fieldOfView / 2);
    const aspect = hsize / vsize;
    if (aspect >= 1) {
      this.halfWidth = halfView;
      this.halfHeight = halfView / aspect;
    } else {
      this.halfWidth = halfView * aspect;
      this.halfHeight = halfView;
    }
    this.pixelSize = (this.halfWidth * 2) / hsize;

    this._inverse = transform.inverse();
    this._origin = this._inverse.multiplyTuple(Tuple.point(0, 0, 0));
  }

  /**
   * Copy of this camera with a different view transform
   */
  withTransform(transform: Matrix): Camera {
    return new Camera(this.hsize, this.vsize, this.fieldOfView, transform);
  }

  /**
   * Ray from the eye through the center of pixel (px, py).
   * x grows to the right and y downward on the canvas; camera space is
   * mirrored, so the offsets are subtracted from the half extents.
   */
  rayForPixel(px: number, py: number): Ray {
    const xOffset = (px + 0.5) * this.pixelSize;
    const yOffset = (py + 0.5) * this.pixelSize;

    const worldX = this.halfWidth - xOffset;
    const worldY = this.halfHeight - yOffset;

    const pixel = this._inverse.multiplyTuple(Tuple.point(worldX, worldY, -1));
    const direction = Tuple.normalize(Tuple.subtract(pixel, this._origin));

    return RayUtils.create(this._origin, direction);
  }

  /**
   * Color of a single pixel. Depends only on the world and (x, y).
   */
  renderPixel(world: World, x: number, y: number): Color {
    return world.colorAt(this.rayForPixel(x, y));
  }

  /**
   * Render every pixel into a new canvas
   */
  render(world: World, callbacks: RenderCallbacks = {}): Canvas {
    const canvas = new Canvas(this.hsize, this.vsize);

    RenderDebugLogger.logRenderStart({
      width: this.hsize,
      height: this.vsize,
      objectCount: world.objects.length,
      hasLight: world.light !== null,
    });

    for (let y = 0; y < this.vsize; y++) {
      for (let x = 0; x < this.hsize; x++) {
        canvas.writePixel(x, y, this.renderPixel(world, x, y));
      }
      RenderDebugLogger.logRowComplete(y + 1, this.vsize);
      callbacks.onRow?.(y + 1, this.vsize);
    }

    RenderDebugLogger.logRenderEnd();
    return canvas;
  }
}
