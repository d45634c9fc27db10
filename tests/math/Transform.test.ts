import { Matrix } from "@/math/Matrix";
import { Transform } from "@/math/Transform";
import { Tuple } from "@/math/Tuple";
import { expectMatrixClose, expectTupleClose } from "@test/helpers/tracerHelpers";
import { describe, expect, it } from "vitest";

const HALF_SQRT2 = Math.SQRT2 / 2;

describe("Transform", () => {
  describe("translation", () => {
    it("should move a point", () => {
      const t = Transform.translation(5, -3, 2);
      expect(t.multiplyTuple(Tuple.point(-3, 4, 5))).toEqual(Tuple.point(2, 1, 7));
    });

    it("should move a point backwards with the inverse", () => {
      const inv = Transform.translation(5, -3, 2).inverse();
      expectTupleClose(inv.multiplyTuple(Tuple.point(-3, 4, 5)), Tuple.point(-8, 7, 3));
    });

    it("should not affect vectors", () => {
      const v = Tuple.vector(-3, 4, 5);
      expect(Transform.translation(5, -3, 2).multiplyTuple(v)).toEqual(v);
    });
  });

  describe("scaling", () => {
    it("should scale a point and a vector", () => {
      const s = Transform.scaling(2, 3, 4);
      expect(s.multiplyTuple(Tuple.point(-4, 6, 8))).toEqual(Tuple.point(-8, 18, 32));
      expect(s.multiplyTuple(Tuple.vector(-4, 6, 8))).toEqual(Tuple.vector(-8, 18, 32));
    });

    it("should shrink with the inverse", () => {
      const inv = Transform.scaling(2, 3, 4).inverse();
      expectTupleClose(inv.multiplyTuple(Tuple.vector(-4, 6, 8)), Tuple.vector(-2, 2, 2));
    });

    it("should reflect with a negative factor", () => {
      const r = Transform.scaling(-1, 1, 1);
      expect(r.multiplyTuple(Tuple.point(2, 3, 4))).toEqual(Tuple.point(-2, 3, 4));
    });
  });

  describe("rotation", () => {
    it("should rotate a point around the x axis", () => {
      const p = Tuple.point(0, 1, 0);
      expectTupleClose(Transform.rotationX(Math.PI / 4).multiplyTuple(p), Tuple.point(0, HALF_SQRT2, HALF_SQRT2));
      expectTupleClose(Transform.rotationX(Math.PI / 2).multiplyTuple(p), Tuple.point(0, 0, 1));
    });

    it("should rotate the opposite way with the inverse", () => {
      const inv = Transform.rotationX(Math.PI / 4).inverse();
      expectTupleClose(inv.multiplyTuple(Tuple.point(0, 1, 0)), Tuple.point(0, HALF_SQRT2, -HALF_SQRT2));
    });

    it("should rotate a point around the y axis", () => {
      const p = Tuple.point(0, 0, 1);
      expectTupleClose(Transform.rotationY(Math.PI / 4).multiplyTuple(p), Tuple.point(HALF_SQRT2, 0, HALF_SQRT2));
      expectTupleClose(Transform.rotationY(Math.PI / 2).multiplyTuple(p), Tuple.point(1, 0, 0));
    });

    it("should rotate a point around the z axis", () => {
      const p = Tuple.point(0, 1, 0);
      expectTupleClose(Transform.rotationZ(Math.PI / 4).multiplyTuple(p), Tuple.point(-HALF_SQRT2, HALF_SQRT2, 0));
      expectTupleClose(Transform.rotationZ(Math.PI / 2).multiplyTuple(p), Tuple.point(-1, 0, 0));
    });
  });

  describe("shearing", () => {
    const p = Tuple.point(2, 3, 4);

    it.each([
      [[1, 0, 0, 0, 0, 0], Tuple.point(5, 3, 4)],
      [[0, 1, 0, 0, 0, 0], Tuple.point(6, 3, 4)],
      [[0, 0, 1, 0, 0, 0], Tuple.point(2, 5, 4)],
      [[0, 0, 0, 1, 0, 0], Tuple.point(2, 7, 4)],
      [[0, 0, 0, 0, 1, 0], Tuple.point(2, 3, 6)],
      [[0, 0, 0, 0, 0, 1], Tuple.point(2, 3, 7)],
    ] as const)("should shear with factors %j", (factors, expected) => {
      const [xy, xz, yx, yz, zx, zy] = factors;
      expect(Transform.shearing(xy, xz, yx, yz, zx, zy).multiplyTuple(p)).toEqual(expected);
    });
  });

  describe("composition", () => {
    const p = Tuple.point(1, 0, 1);
    const rotate = Transform.rotationX(Math.PI / 2);
    const scale = Transform.scaling(5, 5, 5);
    const translate = Transform.translation(10, 5, 7);

    it("should apply individual transforms in sequence", () => {
      const p2 = rotate.multiplyTuple(p);
      expectTupleClose(p2, Tuple.point(1, -1, 0));
      const p3 = scale.multiplyTuple(p2);
      expectTupleClose(p3, Tuple.point(5, -5, 0));
      const p4 = translate.multiplyTuple(p3);
      expectTupleClose(p4, Tuple.point(15, 0, 7));
    });

    it("should apply chained transforms in reverse order", () => {
      const combined = translate.multiply(scale).multiply(rotate);
      expectTupleClose(combined.multiplyTuple(p), Tuple.point(15, 0, 7));
    });

    it("should take steps in application order with chain", () => {
      const combined = Transform.chain(rotate, scale, translate);
      expectTupleClose(combined.multiplyTuple(p), Tuple.point(15, 0, 7));
      expectMatrixClose(combined, translate.multiply(scale).multiply(rotate), 1e-9);
    });

    it("should return identity for an empty chain", () => {
      expect(Transform.chain().equals(Matrix.identity(4))).toBe(true);
    });
  });

  describe("viewTransform", () => {
    it("should be identity for the default orientation", () => {
      const t = Transform.viewTransform(Tuple.point(0, 0, 0), Tuple.point(0, 0, -1), Tuple.vector(0, 1, 0));
      expectMatrixClose(t, Matrix.identity(4));
    });

    it("should mirror x and z when looking in positive z", () => {
      const t = Transform.viewTransform(Tuple.point(0, 0, 0), Tuple.point(0, 0, 1), Tuple.vector(0, 1, 0));
      expectMatrixClose(t, Transform.scaling(-1, 1, -1));
    });

    it("should move the world rather than the eye", () => {
      const t = Transform.viewTransform(Tuple.point(0, 0, 8), Tuple.point(0, 0, 0), Tuple.vector(0, 1, 0));
      expectMatrixClose(t, Transform.translation(0, 0, -8));
    });

    it("should build an arbitrary view transform", () => {
      const t = Transform.viewTransform(Tuple.point(1, 3, 2), Tuple.point(4, -2, 8), Tuple.vector(1, 1, 0));
      const expected = Matrix.fromRows([
        [-0.50709, 0.50709, 0.67612, -2.36643],
        [0.76772, 0.60609, 0.12122, -2.82843],
        [-0.35857, 0.59761, -0.71714, 0],
        [0, 0, 0, 1],
      ]);
      expectMatrixClose(t, expected);
    });
  });
});
