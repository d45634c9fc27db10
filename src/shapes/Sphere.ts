import { DEFAULT_MATERIAL } from "@/lighting/Material";
import { Matrix } from "@/math/Matrix";
import { RayUtils } from "@/math/Ray";
import { Tuple } from "@/math/Tuple";
import type { Intersection, Material, Ray, Tuple as TupleValue } from "@/types";
import type { Shape } from "./Shape";

let sphereIdCounter = 0;

/**
 * Configuration for creating a Sphere
 */
export interface SphereConfig {
  /** Defaults to a generated "sphere-N" */
  readonly id?: string;
  /** Object-to-world transform (default: identity) */
  readonly transform?: Matrix;
  readonly material?: Material;
}

/**
 * Sphere - Unit sphere centered at the object-space origin
 *
 * Size, position and orientation all come from the transform. The inverse
 * transform is computed once here; a singular transform leaves the sphere
 * unrenderable instead of filling the image with NaN.
 */
export class Sphere implements Shape {
  readonly id: string;
  readonly shapeType = "sphere";
  readonly transform: Matrix;
  readonly material: Material;
  /** Object-space center */
  readonly origin: TupleValue = Tuple.point(0, 0, 0);
  /** World-to-object transform, null when the transform is singular */
  private readonly _inverse: Matrix | null;
  /** Transpose of the inverse, for carrying normals back to world space */
  private readonly _normalTransform: Matrix | null;

  constructor(config: SphereConfig = {}) {
    this.id = config.id ?? `sphere-${sphereIdCounter++}`;
    this.transform = config.transform ?? Matrix.identity(4);
    this.material = config.material ?? DEFAULT_MATERIAL;

    // Small spheres have tiny determinants; only an exactly singular transform is skipped
    const inversion = this.transform.invert(0);
    this._inverse = inversion.invertible ? inversion.matrix : null;
    this._normalTransform = this._inverse ? this._inverse.transpose() : null;
  }

  /**
   * Copy of this sphere with a different transform
   */
  withTransform(transform: Matrix): Sphere {
    return new Sphere({ id: this.id, transform, material: this.material });
  }

  /**
   * Copy of this sphere with a different material
   */
  withMaterial(material: Material): Sphere {
    return new Sphere({ id: this.id, transform: this.transform, material });
  }

  isRenderable(): boolean {
    return this._inverse !== null;
  }

  /**
   * Ray-sphere intersection in object space.
   *
   * Solves |O + tD|^2 = 1 for t. Both roots are returned in ascending order,
   * including roots behind the ray origin; a tangent ray gives two equal roots.
   */
  intersect(ray: Ray): Intersection[] {
    if (this._inverse === null) {
      return [];
    }

    const localRay = RayUtils.transform(ray, this._inverse);
    const sphereToRay = Tuple.subtract(localRay.origin, this.origin);

    const a = Tuple.dot(localRay.direction, localRay.direction);
    const b = 2 * Tuple.dot(localRay.direction, sphereToRay);
    const c = Tuple.dot(sphereToRay, sphereToRay) - 1;
    const discriminant = b * b - 4 * a * c;

    if (discriminant < 0) {
      return [];
    }

    const sqrtDiscriminant = Math.sqrt(discriminant);
    const t1 = (-b - sqrtDiscriminant) / (2 * a);
    const t2 = (-b + sqrtDiscriminant) / (2 * a);
    const [near, far] = t1 <= t2 ? [t1, t2] : [t2, t1];

    return [
      { t: near, object: this },
      { t: far, object: this },
    ];
  }

  /**
   * Normal at a world-space point.
   *
   * The object-space normal is carried back with the inverse transpose so that
   * non-uniform scaling keeps it perpendicular to the surface. The w component
   * is zeroed because the inverse transpose can leave a translation term there.
   */
  normalAt(worldPoint: TupleValue): TupleValue {
    if (this._inverse === null || this._normalTransform === null) {
      throw new Error(`Sphere "${this.id}" has a singular transform and no surface normal`);
    }

    const objectPoint = this._inverse.multiplyTuple(worldPoint);
    const objectNormal = Tuple.subtract(objectPoint, this.origin);
    const worldNormal = this._normalTransform.multiplyTuple(objectNormal);

    return Tuple.normalize({ ...worldNormal, w: 0 });
  }
}
