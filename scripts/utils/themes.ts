/**
 * Built-in palettes. Fallback indices are the xterm-256 entries nearest to
 * each RGB value.
 */

import type { Color, ThemeSpec } from '../types.js';

function rgb(r: number, g: number, b: number, fallback: number): Color {
  return { rgb: { r, g, b }, fallback };
}

/** Tuned for dark terminal backgrounds */
const defaultTheme: ThemeSpec = {
  roles: {
    model: rgb(135, 215, 255, 117),
    cost: rgb(255, 215, 135, 222),
    label: rgb(188, 188, 188, 250),
    muted: rgb(138, 138, 138, 245),
    separator: rgb(88, 88, 88, 240),
    warning: rgb(255, 175, 0, 214),
    gaugeEmpty: rgb(58, 58, 58, 237),
    paceAhead: rgb(95, 215, 215, 80),
    paceOnTrack: rgb(135, 215, 135, 114),
    paceCaution: rgb(255, 215, 95, 221),
    paceCritical: rgb(255, 95, 95, 203),
  },
  gradient: [
    { threshold: 50, color: rgb(135, 215, 135, 114) },
    { threshold: 70, color: rgb(255, 215, 95, 221) },
    { threshold: 85, color: rgb(255, 175, 95, 215) },
    { threshold: 101, color: rgb(255, 95, 95, 203) },
  ],
  gradientFloor: rgb(215, 0, 0, 160),
};

/** Soft colors: 0-50% green, 51-80% yellow, above that coral */
const pastelTheme: ThemeSpec = {
  roles: {
    model: rgb(135, 215, 255, 117),
    cost: rgb(255, 215, 135, 222),
    label: rgb(178, 178, 178, 249),
    muted: rgb(138, 138, 138, 245),
    separator: rgb(88, 88, 88, 240),
    warning: rgb(255, 175, 135, 216),
    gaugeEmpty: rgb(48, 48, 48, 236),
    paceAhead: rgb(175, 215, 215, 152),
    paceOnTrack: rgb(175, 215, 175, 151),
    paceCaution: rgb(255, 215, 135, 222),
    paceCritical: rgb(255, 135, 135, 210),
  },
  gradient: [
    { threshold: 51, color: rgb(175, 215, 175, 151) },
    { threshold: 81, color: rgb(255, 215, 135, 222) },
    { threshold: 101, color: rgb(255, 135, 135, 210) },
  ],
  gradientFloor: rgb(255, 135, 135, 210),
};

/** Darker foregrounds for light terminal backgrounds */
const lightTheme: ThemeSpec = {
  roles: {
    model: rgb(0, 95, 175, 25),
    cost: rgb(135, 95, 0, 94),
    label: rgb(78, 78, 78, 239),
    muted: rgb(118, 118, 118, 243),
    separator: rgb(168, 168, 168, 248),
    warning: rgb(215, 95, 0, 166),
    gaugeEmpty: rgb(218, 218, 218, 253),
    paceAhead: rgb(0, 135, 135, 30),
    paceOnTrack: rgb(0, 135, 0, 28),
    paceCaution: rgb(175, 135, 0, 136),
    paceCritical: rgb(215, 0, 0, 160),
  },
  gradient: [
    { threshold: 50, color: rgb(0, 135, 0, 28) },
    { threshold: 75, color: rgb(175, 135, 0, 136) },
    { threshold: 90, color: rgb(215, 95, 0, 166) },
    { threshold: 101, color: rgb(215, 0, 0, 160) },
  ],
  gradientFloor: rgb(175, 0, 0, 124),
};

export type BuiltinThemeName = 'default' | 'pastel' | 'light';

export const THEMES: Readonly<Record<BuiltinThemeName, ThemeSpec>> = {
  default: defaultTheme,
  pastel: pastelTheme,
  light: lightTheme,
};

export function isBuiltinTheme(name: string): name is BuiltinThemeName {
  return Object.prototype.hasOwnProperty.call(THEMES, name);
}
