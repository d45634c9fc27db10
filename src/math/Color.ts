import { EPSILON } from "@/config/tracerConfig";
import type { Color } from "@/types";
import { approxEqual } from "./Tuple";

/**
 * ColorUtils - Pure utility functions for RGB colors
 */
export const ColorUtils = {
  create(red: number, green: number, blue: number): Color {
    return { red, green, blue };
  },

  black(): Color {
    return { red: 0, green: 0, blue: 0 };
  },

  white(): Color {
    return { red: 1, green: 1, blue: 1 };
  },

  add(a: Color, b: Color): Color {
    return { red: a.red + b.red, green: a.green + b.green, blue: a.blue + b.blue };
  },

  subtract(a: Color, b: Color): Color {
    return { red: a.red - b.red, green: a.green - b.green, blue: a.blue - b.blue };
  },

  scale(c: Color, scalar: number): Color {
    return { red: c.red * scalar, green: c.green * scalar, blue: c.blue * scalar };
  },

  /**
   * Component-wise (Hadamard) product, used to blend a surface color with a light
   */
  multiply(a: Color, b: Color): Color {
    return { red: a.red * b.red, green: a.green * b.green, blue: a.blue * b.blue };
  },

  equals(a: Color, b: Color, epsilon: number = EPSILON): boolean {
    return (
      approxEqual(a.red, b.red, epsilon) &&
      approxEqual(a.green, b.green, epsilon) &&
      approxEqual(a.blue, b.blue, epsilon)
    );
  },
};
