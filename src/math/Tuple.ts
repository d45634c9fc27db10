import { EPSILON } from "@/config/tracerConfig";
import type { NormalizeResult, Tuple as TupleValue } from "@/types";

/**
 * Compare two numbers within a tolerance
 */
export function approxEqual(a: number, b: number, epsilon: number = EPSILON): boolean {
  return Math.abs(a - b) < epsilon;
}

/**
 * Tuple - Pure utility functions for homogeneous 4D tuples
 * All functions are immutable and return new tuples.
 *
 * Points have w = 1 and vectors w = 0. Nothing enforces this at runtime:
 * point - point gives a vector and point + vector a point only because the
 * w components add up that way.
 */
export const Tuple = {
  /**
   * Create a tuple from raw components
   */
  create(x: number, y: number, z: number, w: number): TupleValue {
    return { x, y, z, w };
  },

  point(x: number, y: number, z: number): TupleValue {
    return { x, y, z, w: 1 };
  },

  vector(x: number, y: number, z: number): TupleValue {
    return { x, y, z, w: 0 };
  },

  isPoint(t: TupleValue): boolean {
    return t.w === 1;
  },

  isVector(t: TupleValue): boolean {
    return t.w === 0;
  },

  add(a: TupleValue, b: TupleValue): TupleValue {
    return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z, w: a.w + b.w };
  },

  /**
   * Subtract tuple b from tuple a
   */
  subtract(a: TupleValue, b: TupleValue): TupleValue {
    return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z, w: a.w - b.w };
  },

  negate(t: TupleValue): TupleValue {
    return { x: -t.x, y: -t.y, z: -t.z, w: -t.w };
  },

  scale(t: TupleValue, scalar: number): TupleValue {
    return { x: t.x * scalar, y: t.y * scalar, z: t.z * scalar, w: t.w * scalar };
  },

  divide(t: TupleValue, scalar: number): TupleValue {
    return { x: t.x / scalar, y: t.y / scalar, z: t.z / scalar, w: t.w / scalar };
  },

  /**
   * Euclidean length over all four components
   */
  magnitude(t: TupleValue): number {
    return Math.sqrt(t.x * t.x + t.y * t.y + t.z * t.z + t.w * t.w);
  },

  /**
   * Scale to unit length.
   * A zero tuple yields NaN components; use tryNormalize when that can happen.
   */
  normalize(t: TupleValue): TupleValue {
    return Tuple.divide(t, Tuple.magnitude(t));
  },

  /**
   * Normalize, reporting a zero-length input instead of producing NaN
   */
  tryNormalize(t: TupleValue): NormalizeResult {
    const magnitude = Tuple.magnitude(t);
    if (magnitude === 0) {
      return { ok: false, reason: "zero-magnitude" };
    }
    return { ok: true, value: Tuple.divide(t, magnitude) };
  },

  dot(a: TupleValue, b: TupleValue): number {
    return a.x * b.x + a.y * b.y + a.z * b.z + a.w * b.w;
  },

  /**
   * Cross product of the x/y/z parts. w is ignored and the result is always a vector.
   */
  cross(a: TupleValue, b: TupleValue): TupleValue {
    return Tuple.vector(a.y * b.z - a.z * b.y, a.z * b.x - a.x * b.z, a.x * b.y - a.y * b.x);
  },

  /**
   * Reflect a vector around a normal
   * Uses formula: r = v - 2(v · n)n
   * The normal is used as given (not normalized here).
   */
  reflect(v: TupleValue, normal: TupleValue): TupleValue {
    return Tuple.subtract(v, Tuple.scale(normal, 2 * Tuple.dot(v, normal)));
  },

  equals(a: TupleValue, b: TupleValue, epsilon: number = EPSILON): boolean {
    return (
      approxEqual(a.x, b.x, epsilon) &&
      approxEqual(a.y, b.y, epsilon) &&
      approxEqual(a.z, b.z, epsilon) &&
      approxEqual(a.w, b.w, epsilon)
    );
  },
};
