/**
 * Built-in Scene Configurations
 *
 * Named scenes the CLI can render without a scene file.
 */

import { Camera } from "@/camera/Camera";
import { createMaterial } from "@/lighting/Material";
import { createPointLight } from "@/lighting/PointLight";
import { ColorUtils } from "@/math/Color";
import { Transform } from "@/math/Transform";
import { Tuple } from "@/math/Tuple";
import { Sphere } from "@/shapes/Sphere";
import { World, createDefaultWorld } from "@/world/World";

/**
 * A world plus the camera that views it.
 */
export interface Scene {
  readonly world: World;
  readonly camera: Camera;
}

/**
 * A named scene that can be built at any image size.
 */
export interface SceneDefinition {
  /** Unique identifier used on the command line */
  readonly id: string;

  /** Human-readable name */
  readonly name: string;

  readonly description: string;

  /** Image size used when none is given */
  readonly defaultWidth: number;
  readonly defaultHeight: number;

  build(width: number, height: number): Scene;
}

/**
 * The reference two-sphere world seen from (0, 0, -5).
 */
const DEFAULT_WORLD: SceneDefinition = {
  id: "default-world",
  name: "Default World",
  description: "Green-tinted unit sphere around a half-size sphere, light at (-10, 10, -10)",
  defaultWidth: 11,
  defaultHeight: 11,
  build(width, height) {
    const camera = new Camera(
      width,
      height,
      Math.PI / 2,
      Transform.viewTransform(Tuple.point(0, 0, -5), Tuple.point(0, 0, 0), Tuple.vector(0, 1, 0))
    );
    return { world: createDefaultWorld(), camera };
  },
};

/**
 * Three spheres in a corner made of flattened spheres.
 */
const THREE_SPHERES: SceneDefinition = {
  id: "three-spheres",
  name: "Three Spheres",
  description: "Floor and two walls from squashed spheres, with red, green and blue spheres",
  defaultWidth: 500,
  defaultHeight: 250,
  build(width, height) {
    const wallMaterial = createMaterial({
      color: ColorUtils.create(0.9, 0.9, 0.9),
      specular: 0,
    });
    const flatten = Transform.scaling(10, 0.01, 10);

    const floor = new Sphere({ id: "floor", transform: flatten, material: wallMaterial });

    const leftWall = new Sphere({
      id: "left-wall",
      transform: Transform.chain(
        flatten,
        Transform.rotationX(Math.PI / 2),
        Transform.rotationY(-Math.PI / 4),
        Transform.translation(0, 0, 5)
      ),
      material: wallMaterial,
    });

    const rightWall = new Sphere({
      id: "right-wall",
      transform: Transform.chain(
        flatten,
        Transform.rotationX(Math.PI / 2),
        Transform.rotationY(Math.PI / 4),
        Transform.translation(0, 0, 5)
      ),
      material: wallMaterial,
    });

    const middle = new Sphere({
      id: "middle",
      transform: Transform.translation(-0.5, 1, 0.5),
      material: createMaterial({ color: ColorUtils.create(0, 1, 0), diffuse: 0.7, specular: 0.3 }),
    });

    const right = new Sphere({
      id: "right",
      transform: Transform.translation(1.5, 0.5, -0.5).multiply(Transform.scaling(0.5, 0.5, 0.5)),
      material: createMaterial({ color: ColorUtils.create(0, 0, 1), diffuse: 0.7, specular: 0.3 }),
    });

    const left = new Sphere({
      id: "left",
      transform: Transform.translation(-1.5, 0.33, -0.75).multiply(Transform.scaling(0.33, 0.33, 0.33)),
      material: createMaterial({ color: ColorUtils.create(1, 0, 0), diffuse: 0.7, specular: 0.3 }),
    });

    const world = new World({
      objects: [floor, leftWall, rightWall, middle, right, left],
      light: createPointLight(Tuple.point(-10, 10, -10), ColorUtils.white()),
    });

    const camera = new Camera(
      width,
      height,
      Math.PI / 3,
      Transform.viewTransform(Tuple.point(0, 1.5, -5), Tuple.point(0, 1, 0), Tuple.vector(0, 1, 0))
    );

    return { world, camera };
  },
};

/** Half the width of the backdrop the sphere is projected onto */
const LIT_SPHERE_HALF_WALL = 2.5;
/** Distance from the eye to that backdrop */
const LIT_SPHERE_WALL_DISTANCE = 10;

/**
 * A single magenta unit sphere, framed so it fills the middle of the image.
 */
const LIT_SPHERE: SceneDefinition = {
  id: "lit-sphere",
  name: "Lit Sphere",
  description: "One magenta sphere with a white light up and to the left",
  defaultWidth: 500,
  defaultHeight: 500,
  build(width, height) {
    const sphere = new Sphere({
      id: "sphere",
      material: createMaterial({ color: ColorUtils.create(1, 0, 1) }),
    });

    const world = new World({
      objects: [sphere],
      light: createPointLight(Tuple.point(-10, 10, -10), ColorUtils.white()),
    });

    const camera = new Camera(
      width,
      height,
      2 * Math.atan(LIT_SPHERE_HALF_WALL / LIT_SPHERE_WALL_DISTANCE),
      Transform.viewTransform(Tuple.point(0, 0, -5), Tuple.point(0, 0, 0), Tuple.vector(0, 1, 0))
    );

    return { world, camera };
  },
};

/**
 * All built-in scenes.
 */
export const BUILTIN_SCENES: SceneDefinition[] = [THREE_SPHERES, DEFAULT_WORLD, LIT_SPHERE];

export function getSceneById(id: string): SceneDefinition | undefined {
  return BUILTIN_SCENES.find((scene) => scene.id === id);
}
