import { RenderDebugLogger } from "@/debug/RenderDebugLogger";
import { lighting } from "@/lighting/Lighting";
import { createMaterial } from "@/lighting/Material";
import { createPointLight } from "@/lighting/PointLight";
import { ColorUtils } from "@/math/Color";
import { RayUtils } from "@/math/Ray";
import { Transform } from "@/math/Transform";
import { Tuple } from "@/math/Tuple";
import type { Shape } from "@/shapes/Shape";
import { Sphere } from "@/shapes/Sphere";
import { findHit, prepareHit, sortIntersections } from "@/tracer/Intersection";
import type { Color, Intersection, PointLight, PreparedHit, Ray, Tuple as TupleValue } from "@/types";

/**
 * Configuration for creating a World
 */
export interface WorldConfig {
  readonly objects?: readonly Shape[];
  readonly light?: PointLight | null;
}

/**
 * World - The scene: an ordered list of shapes and at most one light
 *
 * Immutable; every query only reads the shape list and the light, so
 * colorAt can be called for any number of rays independently.
 */
export class World {
  readonly objects: readonly Shape[];
  readonly light: PointLight | null;
  /** Objects with an invertible transform; the rest are skipped */
  private readonly _renderable: readonly Shape[];

  constructor(config: WorldConfig = {}) {
    this.objects = config.objects ?? [];
    this.light = config.light ?? null;

    this._renderable = this.objects.filter((shape) => {
      if (shape.isRenderable()) return true;
      RenderDebugLogger.warnSkippedShape(shape, "transform is not invertible");
      return false;
    });
  }

  /**
   * Copy of this world with a different object list
   */
  withObjects(objects: readonly Shape[]): World {
    return new World({ objects, light: this.light });
  }

  /**
   * Copy of this world with a different light (null removes it)
   */
  withLight(light: PointLight | null): World {
    return new World({ objects: this.objects, light });
  }

  /**
   * Intersect a ray with every renderable object.
   * The combined list is sorted by t, so the hit is the global nearest.
   */
  intersect(ray: Ray): Intersection[] {
    const intersections: Intersection[] = [];
    for (const shape of this._renderable) {
      intersections.push(...shape.intersect(ray));
    }
    return sortIntersections(intersections);
  }

  /**
   * Color at a prepared hit. Black when the world has no light.
   */
  shadeHit(hit: PreparedHit): Color {
    if (this.light === null) {
      return ColorUtils.black();
    }
    return lighting(
      hit.object.material,
      this.light,
      hit.point,
      hit.eyeVector,
      hit.normalVector,
      this.isShadowed(hit.overPoint)
    );
  }

  /**
   * Color seen along a ray; black when nothing is hit
   */
  colorAt(ray: Ray): Color {
    const hit = findHit(this.intersect(ray));
    if (hit === null) {
      return ColorUtils.black();
    }
    return this.shadeHit(prepareHit(hit, ray));
  }

  /**
   * Whether an object lies between the point and the light.
   * Objects beyond the light do not count. Without a light nothing is shadowed.
   */
  isShadowed(point: TupleValue): boolean {
    if (this.light === null) {
      return false;
    }

    const toLight = Tuple.subtract(this.light.position, point);
    const distance = Tuple.magnitude(toLight);
    const shadowRay = RayUtils.create(point, Tuple.normalize(toLight));
    const hit = findHit(this.intersect(shadowRay));

    return hit !== null && hit.t < distance;
  }
}

/**
 * The reference two-sphere world: a green-tinted unit sphere with a
 * half-size sphere inside it, lit by a white light at (-10, 10, -10).
 */
export function createDefaultWorld(): World {
  const outer = new Sphere({
    id: "outer",
    material: createMaterial({
      color: ColorUtils.create(0.8, 1.0, 0.6),
      diffuse: 0.7,
      specular: 0.2,
    }),
  });
  const inner = new Sphere({
    id: "inner",
    transform: Transform.scaling(0.5, 0.5, 0.5),
  });

  return new World({
    objects: [outer, inner],
    light: createPointLight(Tuple.point(-10, 10, -10), ColorUtils.white()),
  });
}
