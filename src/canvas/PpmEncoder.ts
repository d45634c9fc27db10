import { MAX_COLOR_VALUE, PPM_MAX_LINE_LENGTH } from "@/config/tracerConfig";
import type { Color } from "@/types";
import type { Canvas } from "./Canvas";

export interface PpmOptions {
  /** Lines are wrapped before reaching this many characters */
  readonly maxLineLength?: number;
}

/**
 * Scale a 0-1 channel to 0-255, rounding to nearest and clamping out-of-range values.
 * NaN maps to 0 so the output always holds integers.
 */
export function toByte(channel: number): number {
  const scaled = Math.round(channel * MAX_COLOR_VALUE);
  if (Number.isNaN(scaled)) return 0;
  return Math.min(MAX_COLOR_VALUE, Math.max(0, scaled));
}

/**
 * Channel bytes of a color in RGB order
 */
export function colorToBytes(color: Color): [number, number, number] {
  return [toByte(color.red), toByte(color.green), toByte(color.blue)];
}

/**
 * Encode a canvas as plain-text PPM (P3).
 *
 * Header is "P3", "<width> <height>", "255". Each pixel row starts on a new
 * line; rows longer than the limit wrap between values, never inside one.
 * The output ends with a newline.
 */
export function encodePpm(canvas: Canvas, options: PpmOptions = {}): string {
  const maxLineLength = options.maxLineLength ?? PPM_MAX_LINE_LENGTH;
  const lines = ["P3", `${canvas.width} ${canvas.height}`, `${MAX_COLOR_VALUE}`];

  for (let y = 0; y < canvas.height; y++) {
    let line = "";
    for (let x = 0; x < canvas.width; x++) {
      for (const value of colorToBytes(canvas.pixelAt(x, y))) {
        const text = `${value}`;
        if (line.length > 0 && line.length + 1 + text.length >= maxLineLength) {
          lines.push(line);
          line = "";
        }
        line = line.length > 0 ? `${line} ${text}` : text;
      }
    }
    lines.push(line);
  }

  return `${lines.join("\n")}\n`;
}
