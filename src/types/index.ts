/**
 * Core type definitions for the ray tracer
 */

import type { Matrix } from "@/math/Matrix";
import type { Shape } from "@/shapes/Shape";

// =============================================================================
// MATH TYPES
// =============================================================================

/** Homogeneous 4-component tuple (immutable). w = 1 is a point, w = 0 a vector */
export interface Tuple {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly w: number;
}

/** RGB color; channels are nominally 0-1 but may exceed that range */
export interface Color {
  readonly red: number;
  readonly green: number;
  readonly blue: number;
}

/** Ray defined by origin and direction */
export interface Ray {
  readonly origin: Tuple; // Point
  readonly direction: Tuple; // Vector, not necessarily normalized
}

/** Result of normalizing a tuple that may have zero length */
export type NormalizeResult =
  | { readonly ok: true; readonly value: Tuple }
  | { readonly ok: false; readonly reason: "zero-magnitude" };

/** Result of inverting a matrix that may be singular */
export type MatrixInversion =
  | { readonly invertible: true; readonly matrix: Matrix }
  | { readonly invertible: false; readonly determinant: number };

// =============================================================================
// SHADING TYPES
// =============================================================================

/** Phong surface parameters */
export interface Material {
  readonly color: Color;
  readonly ambient: number;
  readonly diffuse: number;
  readonly specular: number;
  readonly shininess: number;
}

/** Light source with no size, radiating equally in every direction */
export interface PointLight {
  readonly position: Tuple;
  readonly intensity: Color;
}

// =============================================================================
// INTERSECTION TYPES
// =============================================================================

/** A ray parameter paired with the shape it hit */
export interface Intersection {
  readonly t: number;
  readonly object: Shape;
}

/** An intersection with the geometry needed for shading precomputed */
export interface PreparedHit extends Intersection {
  readonly point: Tuple;
  readonly eyeVector: Tuple;
  readonly normalVector: Tuple;
  /** True when the ray started inside the shape (normal has been flipped) */
  readonly inside: boolean;
  /** point nudged along the normal; used as the shadow ray origin */
  readonly overPoint: Tuple;
}

// =============================================================================
// RENDER TYPES
// =============================================================================

/** Supported output encodings */
export type ImageFormat = "ppm" | "png";

/** Render options accepted by the CLI and config layer */
export interface RenderOptions {
  /** Image width in pixels (overrides the scene camera) */
  readonly width: number | null;
  /** Image height in pixels (overrides the scene camera) */
  readonly height: number | null;
  readonly format: ImageFormat;
  readonly output: string;
  /** Built-in scene name, used when no scene file is given */
  readonly scene: string;
  readonly sceneFile: string | null;
  readonly verbose: boolean;
}
