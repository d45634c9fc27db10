import { IMAGE_FORMATS, createRenderConfig } from "@/config/tracerConfig";
import type { ImageFormat, RenderOptions } from "@/types";

export const USAGE = `Usage: phong-tracer [options]

Render a scene to a PPM or PNG image

Options:
  -s, --scene <name>     Built-in scene (default: three-spheres)
  -f, --file <path>      JSON scene file (overrides --scene)
  -w, --width <int>      Image width in pixels
  -h, --height <int>     Image height in pixels
  -o, --output <path>    Output file (default: scene.<format>)
      --format <fmt>     ppm or png (default: ppm)
  -v, --verbose          Log render progress
      --list             List built-in scenes
      --help             Show this help`;

/** What the command line asked for */
export type CliCommand =
  | { readonly kind: "render"; readonly options: RenderOptions }
  | { readonly kind: "help" }
  | { readonly kind: "list" }
  | { readonly kind: "error"; readonly message: string };

/**
 * Parse command-line arguments (without the node and script entries).
 */
export function parseArgs(args: readonly string[]): CliCommand {
  const overrides: {
    -readonly [K in keyof RenderOptions]?: RenderOptions[K];
  } = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = (): string | undefined => args[++i];

    switch (arg) {
      case "-s":
      case "--scene": {
        const value = next();
        if (!value) return missingValue(arg);
        overrides.scene = value;
        break;
      }
      case "-f":
      case "--file": {
        const value = next();
        if (!value) return missingValue(arg);
        overrides.sceneFile = value;
        break;
      }
      case "-w":
      case "--width":
      case "-h":
      case "--height": {
        const value = next();
        if (!value) return missingValue(arg);
        const size = Number(value);
        if (!Number.isInteger(size) || size <= 0) {
          return { kind: "error", message: `${arg} expects a positive integer, got "${value}"` };
        }
        if (arg === "-w" || arg === "--width") {
          overrides.width = size;
        } else {
          overrides.height = size;
        }
        break;
      }
      case "-o":
      case "--output": {
        const value = next();
        if (!value) return missingValue(arg);
        overrides.output = value;
        break;
      }
      case "--format": {
        const value = next();
        if (!value) return missingValue(arg);
        if (!isImageFormat(value)) {
          return { kind: "error", message: `--format must be one of ${IMAGE_FORMATS.join(", ")}` };
        }
        overrides.format = value;
        break;
      }
      case "-v":
      case "--verbose":
        overrides.verbose = true;
        break;
      case "--list":
        return { kind: "list" };
      case "--help":
        return { kind: "help" };
      default:
        return { kind: "error", message: `Unknown option "${arg}"` };
    }
  }

  return { kind: "render", options: createRenderConfig(overrides) };
}

function isImageFormat(value: string): value is ImageFormat {
  return IMAGE_FORMATS.some((format) => format === value);
}

function missingValue(arg: string): CliCommand {
  return { kind: "error", message: `${arg} expects a value` };
}
