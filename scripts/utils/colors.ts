/**
 * Color model: hex parsing, 256-color quantization and ANSI escape codes
 */

import type { Color, Rgb } from '../types.js';

export const RESET = '\x1b[0m';

/**
 * Channel levels of the 6x6x6 cube at palette indices 16-231
 */
const CUBE_LEVELS = [0, 95, 135, 175, 215, 255] as const;

const CUBE_OFFSET = 16;
const GRAY_OFFSET = 232;
const GRAY_STEPS = 24;

function nearestCubeLevel(value: number): number {
  let best = 0;
  let bestDistance = Infinity;
  for (let i = 0; i < CUBE_LEVELS.length; i++) {
    const distance = Math.abs(value - CUBE_LEVELS[i]);
    if (distance < bestDistance) {
      best = i;
      bestDistance = distance;
    }
  }
  return best;
}

/**
 * Map an RGB color to the closest xterm-256 palette index (16-255).
 *
 * The cube candidate is picked channel by channel; the grayscale ramp
 * (232-255, levels 8..238) wins only when strictly closer.
 */
export function quantize(rgb: Rgb): number {
  const ri = nearestCubeLevel(rgb.r);
  const gi = nearestCubeLevel(rgb.g);
  const bi = nearestCubeLevel(rgb.b);
  const cubeDistance =
    (rgb.r - CUBE_LEVELS[ri]) ** 2 +
    (rgb.g - CUBE_LEVELS[gi]) ** 2 +
    (rgb.b - CUBE_LEVELS[bi]) ** 2;

  const luminance = 0.299 * rgb.r + 0.587 * rgb.g + 0.114 * rgb.b;
  const grayIndex = Math.min(GRAY_STEPS - 1, Math.max(0, Math.round((luminance - 8) / 10)));
  const gray = 8 + 10 * grayIndex;
  const grayDistance = (rgb.r - gray) ** 2 + (rgb.g - gray) ** 2 + (rgb.b - gray) ** 2;

  if (grayDistance < cubeDistance) {
    return GRAY_OFFSET + grayIndex;
  }
  return CUBE_OFFSET + 36 * ri + 6 * gi + bi;
}

/**
 * Parse "#rrggbb" or "rrggbb". Returns null for anything else.
 */
export function parseHex(hex: string): Rgb | null {
  const digits = hex.startsWith('#') ? hex.slice(1) : hex;
  if (!/^[0-9a-fA-F]{6}$/.test(digits)) return null;

  return {
    r: parseInt(digits.slice(0, 2), 16),
    g: parseInt(digits.slice(2, 4), 16),
    b: parseInt(digits.slice(4, 6), 16),
  };
}

/**
 * Build a color from hex, deriving the fallback index
 */
export function colorFromHex(hex: string): Color | null {
  const rgb = parseHex(hex);
  if (!rgb) return null;
  return { rgb, fallback: quantize(rgb) };
}

/**
 * Foreground escape for a color
 */
export function fgCode(color: Color, truecolor: boolean): string {
  if (truecolor && color.rgb) {
    const { r, g, b } = color.rgb;
    return `\x1b[38;2;${r};${g};${b}m`;
  }
  return `\x1b[38;5;${color.fallback}m`;
}

/**
 * Background escape for a color
 */
export function bgCode(color: Color, truecolor: boolean): string {
  if (truecolor && color.rgb) {
    const { r, g, b } = color.rgb;
    return `\x1b[48;2;${r};${g};${b}m`;
  }
  return `\x1b[48;5;${color.fallback}m`;
}

/**
 * Wrap text with an escape code and auto-reset
 */
export function colorize(text: string, code: string): string {
  return `${code}${text}${RESET}`;
}
