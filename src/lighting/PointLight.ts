import { Tuple } from "@/math/Tuple";
import type { Color, PointLight, Tuple as TupleValue } from "@/types";

/**
 * Create a point light.
 * @throws Error if position is not a point (w !== 1)
 */
export function createPointLight(position: TupleValue, intensity: Color): PointLight {
  if (!Tuple.isPoint(position)) {
    throw new Error(`Light position must be a point (w = 1), got w = ${position.w}`);
  }
  return { position, intensity };
}
