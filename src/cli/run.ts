import { writeFile } from "node:fs/promises";
import type { Canvas } from "@/canvas/Canvas";
import { encodePng } from "@/canvas/PngEncoder";
import { encodePpm } from "@/canvas/PpmEncoder";
import { RenderDebugLogger } from "@/debug/RenderDebugLogger";
import { BUILTIN_SCENES, type Scene, getSceneById } from "@/scenes/builtinScenes";
import { loadSceneFile } from "@/scenes/SceneFile";
import type { ImageFormat, RenderOptions } from "@/types";

/** What a finished render produced */
export interface RenderSummary {
  readonly output: string;
  readonly format: ImageFormat;
  readonly width: number;
  readonly height: number;
  readonly bytes: number;
  readonly durationMs: number;
}

/**
 * Encode a canvas in the requested format
 */
export function encodeImage(canvas: Canvas, format: ImageFormat): Buffer {
  switch (format) {
    case "ppm":
      return Buffer.from(encodePpm(canvas), "ascii");
    case "png":
      return encodePng(canvas);
  }
}

/**
 * Resolve the scene named by the options: a scene file if given, else a built-in scene.
 * @throws Error if the scene is unknown or the file is invalid
 */
export async function resolveScene(options: RenderOptions): Promise<Scene> {
  if (options.sceneFile !== null) {
    const result = await loadSceneFile(options.sceneFile, {
      width: options.width,
      height: options.height,
    });
    if (!result.ok) {
      throw new Error(`Invalid scene file ${options.sceneFile}:\n  ${result.errors.join("\n  ")}`);
    }
    return result.scene;
  }

  const definition = getSceneById(options.scene);
  if (!definition) {
    const known = BUILTIN_SCENES.map((scene) => scene.id).join(", ");
    throw new Error(`Unknown scene "${options.scene}" (available: ${known})`);
  }
  return definition.build(options.width ?? definition.defaultWidth, options.height ?? definition.defaultHeight);
}

/**
 * Render the configured scene and write the encoded image to disk
 */
export async function runRender(options: RenderOptions): Promise<RenderSummary> {
  if (options.verbose && !RenderDebugLogger.isEnabled()) {
    RenderDebugLogger.enable();
  }

  const { world, camera } = await resolveScene(options);

  const started = Date.now();
  const canvas = camera.render(world);
  const durationMs = Date.now() - started;

  const image = encodeImage(canvas, options.format);
  await writeFile(options.output, image);

  return {
    output: options.output,
    format: options.format,
    width: canvas.width,
    height: canvas.height,
    bytes: image.length,
    durationMs,
  };
}
