import type { Matrix } from "@/math/Matrix";
import type { Intersection, Material, Ray, Tuple } from "@/types";

/**
 * Shape interface - base contract for all renderable primitives
 * New primitive types implement this interface without touching World or Camera
 */
export interface Shape {
  /** Unique identifier for this shape */
  readonly id: string;

  /** Type identifier for serialization and logging */
  readonly shapeType: string;

  /** Object-to-world transform */
  readonly transform: Matrix;

  readonly material: Material;

  /**
   * Intersect a world-space ray with this shape
   * @returns Intersections sorted by ascending t (including negative t),
   *   or an empty list when the ray misses or the shape is not renderable
   */
  intersect(ray: Ray): Intersection[];

  /**
   * Surface normal at a world-space point on the shape
   * @returns Unit vector (w = 0) in world space
   */
  normalAt(worldPoint: Tuple): Tuple;

  /**
   * False when the transform is singular; such shapes are skipped at render time
   */
  isRenderable(): boolean;
}
