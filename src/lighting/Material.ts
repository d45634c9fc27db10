import { ColorUtils } from "@/math/Color";
import type { Material } from "@/types";

/**
 * Default surface: white, mostly diffuse, with a tight specular highlight
 */
export const DEFAULT_MATERIAL: Material = {
  color: ColorUtils.white(),
  ambient: 0.1,
  diffuse: 0.9,
  specular: 0.9,
  shininess: 200,
};

/**
 * Creates a material from partial overrides of the default
 */
export function createMaterial(overrides: Partial<Material> = {}): Material {
  return { ...DEFAULT_MATERIAL, ...overrides };
}
