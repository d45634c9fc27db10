import type { Tuple as TupleValue } from "@/types";
import { Matrix } from "./Matrix";
import { Tuple } from "./Tuple";

/**
 * Transform - Named constructors for 4x4 affine transformation matrices
 *
 * Composition is right-to-left: to rotate, then scale, then translate a point,
 * compute translation * scaling * rotation * point. `chain` takes the steps in
 * application order and multiplies them in that reversed order.
 */
export const Transform = {
  identity(): Matrix {
    return Matrix.identity(4);
  },

  translation(x: number, y: number, z: number): Matrix {
    return Matrix.fromRows([
      [1, 0, 0, x],
      [0, 1, 0, y],
      [0, 0, 1, z],
      [0, 0, 0, 1],
    ]);
  },

  scaling(x: number, y: number, z: number): Matrix {
    return Matrix.fromRows([
      [x, 0, 0, 0],
      [0, y, 0, 0],
      [0, 0, z, 0],
      [0, 0, 0, 1],
    ]);
  },

  /**
   * Rotation around the x axis (right-handed)
   */
  rotationX(radians: number): Matrix {
    const cos = Math.cos(radians);
    const sin = Math.sin(radians);
    return Matrix.fromRows([
      [1, 0, 0, 0],
      [0, cos, -sin, 0],
      [0, sin, cos, 0],
      [0, 0, 0, 1],
    ]);
  },

  rotationY(radians: number): Matrix {
    const cos = Math.cos(radians);
    const sin = Math.sin(radians);
    return Matrix.fromRows([
      [cos, 0, sin, 0],
      [0, 1, 0, 0],
      [-sin, 0, cos, 0],
      [0, 0, 0, 1],
    ]);
  },

  rotationZ(radians: number): Matrix {
    const cos = Math.cos(radians);
    const sin = Math.sin(radians);
    return Matrix.fromRows([
      [cos, -sin, 0, 0],
      [sin, cos, 0, 0],
      [0, 0, 1, 0],
      [0, 0, 0, 1],
    ]);
  },

  /**
   * Shear: each component moves in proportion to the other two.
   * `xy` is how much x moves in proportion to y, and so on.
   */
  shearing(xy: number, xz: number, yx: number, yz: number, zx: number, zy: number): Matrix {
    return Matrix.fromRows([
      [1, xy, xz, 0],
      [yx, 1, yz, 0],
      [zx, zy, 1, 0],
      [0, 0, 0, 1],
    ]);
  },

  /**
   * World-to-eye transform for an eye at `from` looking at `to`.
   * `up` only needs to be roughly up; it is re-orthogonalized here.
   */
  viewTransform(from: TupleValue, to: TupleValue, up: TupleValue): Matrix {
    const forward = Tuple.normalize(Tuple.subtract(to, from));
    const left = Tuple.cross(forward, Tuple.normalize(up));
    const trueUp = Tuple.cross(left, forward);
    const orientation = Matrix.fromRows([
      [left.x, left.y, left.z, 0],
      [trueUp.x, trueUp.y, trueUp.z, 0],
      [-forward.x, -forward.y, -forward.z, 0],
      [0, 0, 0, 1],
    ]);
    return orientation.multiply(Transform.translation(-from.x, -from.y, -from.z));
  },

  /**
   * Compose transforms given in the order they should be applied.
   * chain(a, b, c) === c * b * a
   */
  chain(...steps: Matrix[]): Matrix {
    return steps.reduce((composed, step) => step.multiply(composed), Transform.identity());
  },
};
