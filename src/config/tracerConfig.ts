import type { ImageFormat, RenderOptions } from "@/types";

/**
 * Tolerance used by every approximate float comparison.
 * Also the distance hit points are nudged off a surface before casting shadow rays.
 */
export const EPSILON = 0.00001;

/** PPM readers are only guaranteed to handle lines shorter than this */
export const PPM_MAX_LINE_LENGTH = 70;

/** Colors are scaled by this before being written as integer channels */
export const MAX_COLOR_VALUE = 255;

export const IMAGE_FORMATS: readonly ImageFormat[] = ["ppm", "png"];

/**
 * Default render options
 */
export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  width: null,
  height: null,
  format: "ppm",
  output: "scene.ppm",
  scene: "three-spheres",
  sceneFile: null,
  verbose: false,
};

/**
 * Creates a render configuration from partial overrides.
 * The output path follows the format unless it was set explicitly.
 */
export function createRenderConfig(options: Partial<RenderOptions> = {}): RenderOptions {
  const opts = { ...DEFAULT_RENDER_OPTIONS, ...options };

  if (opts.width !== null) assertDimension("width", opts.width);
  if (opts.height !== null) assertDimension("height", opts.height);
  if (!IMAGE_FORMATS.includes(opts.format)) {
    throw new Error(`Unsupported image format "${opts.format}"`);
  }

  const output = options.output ?? `scene.${opts.format}`;

  return { ...opts, output };
}

function assertDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Image ${name} must be a positive integer, got ${value}`);
  }
}
