import { DEFAULT_MATERIAL, createMaterial } from "@/lighting/Material";
import { Matrix } from "@/math/Matrix";
import { RayUtils } from "@/math/Ray";
import { Transform } from "@/math/Transform";
import { Tuple } from "@/math/Tuple";
import { Sphere } from "@/shapes/Sphere";
import { expectTupleClose } from "@test/helpers/tracerHelpers";
import { describe, expect, it } from "vitest";

const alongZ = (x: number, y: number, z: number) => RayUtils.create(Tuple.point(x, y, z), Tuple.vector(0, 0, 1));

describe("Sphere", () => {
  describe("construction", () => {
    it("should default to identity transform and default material", () => {
      const s = new Sphere();
      expect(s.transform.equals(Matrix.identity(4))).toBe(true);
      expect(s.material).toEqual(DEFAULT_MATERIAL);
      expect(s.shapeType).toBe("sphere");
      expect(s.isRenderable()).toBe(true);
    });

    it("should generate distinct ids unless one is given", () => {
      expect(new Sphere().id).not.toBe(new Sphere().id);
      expect(new Sphere({ id: "ball" }).id).toBe("ball");
    });

    it("should copy with a new transform or material, keeping the id", () => {
      const s = new Sphere({ id: "ball" });
      const moved = s.withTransform(Transform.translation(2, 3, 4));
      expect(moved.id).toBe("ball");
      expect(moved.transform.equals(Transform.translation(2, 3, 4))).toBe(true);
      expect(s.transform.equals(Matrix.identity(4))).toBe(true);

      const material = createMaterial({ ambient: 1 });
      const recolored = moved.withMaterial(material);
      expect(recolored.material).toBe(material);
      expect(recolored.transform.equals(moved.transform)).toBe(true);
    });
  });

  describe("intersect", () => {
    it("should intersect at two points", () => {
      const s = new Sphere();
      const xs = s.intersect(alongZ(0, 0, -5));
      expect(xs.map((i) => i.t)).toEqual([4, 6]);
      expect(xs[0].object).toBe(s);
      expect(xs[1].object).toBe(s);
    });

    it("should intersect a tangent ray twice at the same t", () => {
      const xs = new Sphere().intersect(alongZ(0, 1, -5));
      expect(xs.map((i) => i.t)).toEqual([5, 5]);
    });

    it("should miss", () => {
      expect(new Sphere().intersect(alongZ(0, 2, -5))).toEqual([]);
    });

    it("should return a negative and a positive t when the ray starts inside", () => {
      const xs = new Sphere().intersect(alongZ(0, 0, 0));
      expect(xs.map((i) => i.t)).toEqual([-1, 1]);
    });

    it("should return two negative t values when the sphere is behind the ray", () => {
      const xs = new Sphere().intersect(alongZ(0, 0, 5));
      expect(xs.map((i) => i.t)).toEqual([-6, -4]);
    });

    it("should intersect a scaled sphere", () => {
      const s = new Sphere({ transform: Transform.scaling(2, 2, 2) });
      expect(s.intersect(alongZ(0, 0, -5)).map((i) => i.t)).toEqual([3, 7]);
    });

    it("should miss a translated sphere", () => {
      const s = new Sphere({ transform: Transform.translation(5, 0, 0) });
      expect(s.intersect(alongZ(0, 0, -5))).toEqual([]);
    });
  });

  describe("normalAt", () => {
    const s = new Sphere();

    it("should compute normals on the axes", () => {
      expectTupleClose(s.normalAt(Tuple.point(1, 0, 0)), Tuple.vector(1, 0, 0));
      expectTupleClose(s.normalAt(Tuple.point(0, 1, 0)), Tuple.vector(0, 1, 0));
      expectTupleClose(s.normalAt(Tuple.point(0, 0, 1)), Tuple.vector(0, 0, 1));
    });

    it("should compute a normalized normal at a non-axial point", () => {
      const k = Math.sqrt(3) / 3;
      const n = s.normalAt(Tuple.point(k, k, k));
      expectTupleClose(n, Tuple.vector(k, k, k));
      expect(Tuple.magnitude(n)).toBeCloseTo(1);
    });

    it("should compute the normal on a translated sphere", () => {
      const moved = new Sphere({ transform: Transform.translation(0, 1, 0) });
      const n = moved.normalAt(Tuple.point(0, 1.70711, -0.70711));
      expectTupleClose(n, Tuple.vector(0, 0.70711, -0.70711));
    });

    it("should compute the normal on a scaled and rotated sphere", () => {
      const transformed = new Sphere({
        transform: Transform.scaling(1, 0.5, 1).multiply(Transform.rotationZ(Math.PI / 5)),
      });
      const n = transformed.normalAt(Tuple.point(0, Math.SQRT2 / 2, -Math.SQRT2 / 2));
      expectTupleClose(n, Tuple.vector(0, 0.97014, -0.24254));
    });

    it("should always return a vector", () => {
      const moved = new Sphere({ transform: Transform.translation(3, -2, 1) });
      expect(moved.normalAt(Tuple.point(4, -2, 1)).w).toBe(0);
    });
  });

  describe("small spheres", () => {
    it("should stay renderable when the determinant is below epsilon", () => {
      const tiny = new Sphere({ transform: Transform.scaling(0.02, 0.02, 0.02) });
      expect(tiny.isRenderable()).toBe(true);

      const r = RayUtils.create(Tuple.point(0, 0, -5), Tuple.vector(0, 0, 1));
      const xs = tiny.intersect(r);
      expect(xs).toHaveLength(2);
      expect(xs[0].t).toBeCloseTo(4.98, 6);
      expect(xs[1].t).toBeCloseTo(5.02, 6);
    });
  });

  describe("singular transform", () => {
    const flat = new Sphere({ id: "flat", transform: Transform.scaling(0, 1, 1) });

    it("should not be renderable", () => {
      expect(flat.isRenderable()).toBe(false);
    });

    it("should never be intersected", () => {
      expect(flat.intersect(alongZ(0, 0, -5))).toEqual([]);
    });

    it("should refuse to compute a normal", () => {
      expect(() => flat.normalAt(Tuple.point(0, 1, 0))).toThrow('Sphere "flat" has a singular transform');
    });
  });
});
