import { EPSILON } from "@/config/tracerConfig";
import { RayUtils } from "@/math/Ray";
import { Tuple } from "@/math/Tuple";
import type { Shape } from "@/shapes/Shape";
import type { Intersection, PreparedHit, Ray } from "@/types";

/**
 * Pair a ray parameter with the shape it belongs to
 */
export function createIntersection(t: number, object: Shape): Intersection {
  return { t, object };
}

/**
 * Sort intersections by ascending t.
 * Returns a new array; the input is not modified.
 */
export function sortIntersections(intersections: readonly Intersection[]): Intersection[] {
  return [...intersections].sort((a, b) => a.t - b.t);
}

/**
 * Find the visible hit: the intersection with the smallest non-negative t.
 * Intersections behind the ray origin (t < 0) are never hits.
 *
 * @returns The hit, or null if every intersection is behind the origin
 */
export function findHit(intersections: readonly Intersection[]): Intersection | null {
  let hit: Intersection | null = null;
  for (const intersection of intersections) {
    if (intersection.t < 0) continue;
    if (hit === null || intersection.t < hit.t) {
      hit = intersection;
    }
  }
  return hit;
}

/**
 * Precompute the shading state for an intersection along a ray.
 *
 * When the normal faces away from the eye the ray started inside the shape,
 * so the normal is flipped. overPoint sits EPSILON above the surface along
 * that (possibly flipped) normal so shadow rays do not hit the surface they
 * start on.
 */
export function prepareHit(intersection: Intersection, ray: Ray): PreparedHit {
  const point = RayUtils.position(ray, intersection.t);
  const eyeVector = Tuple.negate(ray.direction);
  let normalVector = intersection.object.normalAt(point);

  const inside = Tuple.dot(normalVector, eyeVector) < 0;
  if (inside) {
    normalVector = Tuple.negate(normalVector);
  }

  const overPoint = Tuple.add(point, Tuple.scale(normalVector, EPSILON));

  return {
    t: intersection.t,
    object: intersection.object,
    point,
    eyeVector,
    normalVector,
    inside,
    overPoint,
  };
}
