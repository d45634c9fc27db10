/**
 * JSON scene files
 *
 * A scene file describes a camera, an optional light and a list of spheres.
 * Transforms are lists of steps in the order they are applied to the object.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { Camera } from "@/camera/Camera";
import { EPSILON } from "@/config/tracerConfig";
import { DEFAULT_MATERIAL } from "@/lighting/Material";
import { createPointLight } from "@/lighting/PointLight";
import { ColorUtils } from "@/math/Color";
import { type Matrix, NotInvertibleError } from "@/math/Matrix";
import { Transform } from "@/math/Transform";
import { Tuple } from "@/math/Tuple";
import { Sphere } from "@/shapes/Sphere";
import { World } from "@/world/World";
import type { Scene } from "./builtinScenes";

const triple = z.tuple([z.number(), z.number(), z.number()]);

const transformStepSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("translate"), x: z.number(), y: z.number(), z: z.number() }),
  z.object({ type: z.literal("scale"), x: z.number(), y: z.number(), z: z.number() }),
  z.object({ type: z.literal("rotateX"), radians: z.number() }),
  z.object({ type: z.literal("rotateY"), radians: z.number() }),
  z.object({ type: z.literal("rotateZ"), radians: z.number() }),
  z.object({
    type: z.literal("shear"),
    xy: z.number(),
    xz: z.number(),
    yx: z.number(),
    yz: z.number(),
    zx: z.number(),
    zy: z.number(),
  }),
]);

const { color: defaultColor } = DEFAULT_MATERIAL;

const materialSchema = z.object({
  color: triple.default([defaultColor.red, defaultColor.green, defaultColor.blue]),
  ambient: z.number().min(0).default(DEFAULT_MATERIAL.ambient),
  diffuse: z.number().min(0).default(DEFAULT_MATERIAL.diffuse),
  specular: z.number().min(0).default(DEFAULT_MATERIAL.specular),
  shininess: z.number().positive().default(DEFAULT_MATERIAL.shininess),
});

const sphereSchema = z.object({
  type: z.literal("sphere"),
  id: z.string().min(1).optional(),
  transform: z.array(transformStepSchema).default([]),
  material: materialSchema.default({}),
});

const cameraSchema = z
  .object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    fieldOfView: z.number().positive().lt(Math.PI),
    from: triple,
    to: triple,
    up: triple.default([0, 1, 0]),
  })
  .refine((camera) => camera.from.some((value, i) => value !== camera.to[i]), {
    message: "Camera must look at a point other than its own position",
    path: ["to"],
  })
  .refine(hasUsableUp, {
    message: "Camera up must be non-zero and not parallel to the view direction",
    path: ["up"],
  });

/**
 * The up vector must leave a sideways axis once crossed with the view direction.
 * A camera that looks at its own position is reported by the `to` check instead.
 */
function hasUsableUp(camera: {
  from: [number, number, number];
  to: [number, number, number];
  up: [number, number, number];
}): boolean {
  const forward = Tuple.subtract(Tuple.point(...camera.to), Tuple.point(...camera.from));
  const up = Tuple.vector(...camera.up);
  const forwardLength = Tuple.magnitude(forward);
  if (forwardLength === 0) return true;
  const side = Tuple.magnitude(Tuple.cross(forward, up));
  return side > EPSILON * forwardLength * Tuple.magnitude(up);
}

const lightSchema = z.object({
  position: triple,
  intensity: triple.default([1, 1, 1]),
});

export const sceneFileSchema = z.object({
  camera: cameraSchema,
  light: lightSchema.nullable().default(null),
  objects: z.array(sphereSchema).default([]),
});

export type SceneFile = z.infer<typeof sceneFileSchema>;
export type TransformStep = z.infer<typeof transformStepSchema>;

/** Result of parsing a scene file */
export type SceneParseResult =
  | { readonly ok: true; readonly scene: Scene }
  | { readonly ok: false; readonly errors: string[] };

/** Image size overrides applied on top of the file's camera */
export interface SceneSizeOverrides {
  readonly width?: number | null;
  readonly height?: number | null;
}

/**
 * Turn one transform step into its matrix
 */
export function stepToMatrix(step: TransformStep): Matrix {
  switch (step.type) {
    case "translate":
      return Transform.translation(step.x, step.y, step.z);
    case "scale":
      return Transform.scaling(step.x, step.y, step.z);
    case "rotateX":
      return Transform.rotationX(step.radians);
    case "rotateY":
      return Transform.rotationY(step.radians);
    case "rotateZ":
      return Transform.rotationZ(step.radians);
    case "shear":
      return Transform.shearing(step.xy, step.xz, step.yx, step.yz, step.zx, step.zy);
  }
}

/**
 * Build a scene from a validated scene file
 */
export function buildScene(file: SceneFile, overrides: SceneSizeOverrides = {}): Scene {
  const objects = file.objects.map(
    (sphere) =>
      new Sphere({
        id: sphere.id,
        transform: Transform.chain(...sphere.transform.map(stepToMatrix)),
        material: { ...sphere.material, color: ColorUtils.create(...sphere.material.color) },
      })
  );

  const light = file.light
    ? createPointLight(Tuple.point(...file.light.position), ColorUtils.create(...file.light.intensity))
    : null;

  const { camera: cam } = file;
  const camera = new Camera(
    overrides.width ?? cam.width,
    overrides.height ?? cam.height,
    cam.fieldOfView,
    Transform.viewTransform(Tuple.point(...cam.from), Tuple.point(...cam.to), Tuple.vector(...cam.up))
  );

  return { world: new World({ objects, light }), camera };
}

/**
 * Validate raw JSON data and build the scene it describes
 */
export function parseSceneFile(input: unknown, overrides: SceneSizeOverrides = {}): SceneParseResult {
  const result = sceneFileSchema.safeParse(input);
  if (!result.success) {
    return {
      ok: false,
      errors: result.error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
    };
  }
  try {
    return { ok: true, scene: buildScene(result.data, overrides) };
  } catch (err) {
    // Nearly parallel up vectors pass validation but still collapse the view transform
    if (err instanceof NotInvertibleError) {
      return { ok: false, errors: [`camera.up: View transform is not invertible (determinant ${err.determinant})`] };
    }
    throw err;
  }
}

/**
 * Read, validate and build a scene from a JSON file on disk
 */
export async function loadSceneFile(
  path: string,
  overrides: SceneSizeOverrides = {}
): Promise<SceneParseResult> {
  const text = await readFile(path, "utf8");

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { ok: false, errors: [`Invalid JSON in ${path}: ${detail}`] };
  }

  return parseSceneFile(data, overrides);
}
