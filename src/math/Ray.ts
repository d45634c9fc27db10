import type { Ray, Tuple as TupleValue } from "@/types";
import type { Matrix } from "./Matrix";
import { Tuple } from "./Tuple";

/**
 * RayUtils - Pure utility functions for ray operations
 */
export const RayUtils = {
  /**
   * Create a ray from origin and direction.
   * The direction is kept as given; sphere intersection relies on t being
   * measured in units of the (possibly scaled) direction.
   */
  create(origin: TupleValue, direction: TupleValue): Ray {
    return { origin, direction };
  },

  /**
   * Get point along ray at parameter t
   * P(t) = origin + t * direction
   */
  position(ray: Ray, t: number): TupleValue {
    return Tuple.add(ray.origin, Tuple.scale(ray.direction, t));
  },

  /**
   * Apply a matrix to both origin and direction
   */
  transform(ray: Ray, matrix: Matrix): Ray {
    return {
      origin: matrix.multiplyTuple(ray.origin),
      direction: matrix.multiplyTuple(ray.direction),
    };
  },
};
