/**
 * Theme resolution - builds the single immutable theme used for a process
 */

import type { Color, ColorMode, GradientStop, ResolvedTheme, ThemeRole } from '../types.js';
import { THEME_ROLES } from '../types.js';
import { colorize, fgCode, parseHex, quantize } from './colors.js';
import { THEMES, isBuiltinTheme } from './themes.js';
import type { BuiltinThemeName } from './themes.js';
import { debugLog } from './debug.js';

/**
 * Name under which a theme with overrides is registered
 */
export const CUSTOM_THEME_NAME = 'custom';

export interface ResolveThemeOptions {
  name: string;
  /** Sparse role -> hex overrides */
  overrides?: Record<string, string>;
  truecolor: boolean;
}

function freezeColor(color: Color): Color {
  return Object.freeze({
    rgb: color.rgb ? Object.freeze({ ...color.rgb }) : null,
    fallback: color.fallback,
  });
}

function findRole(key: string): ThemeRole | undefined {
  return THEME_ROLES.find((role) => role === key);
}

/**
 * Resolve a built-in theme plus optional overrides into a frozen theme.
 *
 * Roles missing from `overrides` inherit from the base. An override whose
 * hex is malformed keeps the base fallback index and drops the RGB value.
 */
export function resolveTheme(options: ResolveThemeOptions): ResolvedTheme {
  const baseName: BuiltinThemeName = isBuiltinTheme(options.name) ? options.name : 'default';
  if (baseName !== options.name) {
    debugLog('theme', `Unknown theme '${options.name}', using default`);
  }
  const base = THEMES[baseName];

  const roles: Record<ThemeRole, Color> = { ...base.roles };
  let overridden = 0;

  for (const [key, hex] of Object.entries(options.overrides ?? {})) {
    const role = findRole(key);
    if (!role) {
      debugLog('theme', `Ignoring override for unknown role '${key}'`);
      continue;
    }

    const rgb = parseHex(hex);
    if (rgb) {
      roles[role] = { rgb, fallback: quantize(rgb) };
    } else {
      debugLog('theme', `Malformed color '${hex}' for role '${role}'`);
      roles[role] = { rgb: null, fallback: base.roles[role].fallback };
    }
    overridden++;
  }

  const frozenRoles: Record<ThemeRole, Color> = { ...roles };
  for (const role of THEME_ROLES) {
    frozenRoles[role] = freezeColor(roles[role]);
  }

  const gradient: GradientStop[] = base.gradient.map((stop) =>
    Object.freeze({ threshold: stop.threshold, color: freezeColor(stop.color) })
  );

  return Object.freeze({
    name: overridden > 0 ? CUSTOM_THEME_NAME : baseName,
    truecolor: options.truecolor,
    roles: Object.freeze(frozenRoles),
    gradient: Object.freeze(gradient),
    gradientFloor: freezeColor(base.gradientFloor),
  });
}

export function resolveRole(theme: ResolvedTheme, role: ThemeRole): Color {
  return theme.roles[role];
}

/**
 * First gradient stop whose threshold exceeds `percent`, else the floor color
 */
export function resolveGradient(theme: ResolvedTheme, percent: number): Color {
  for (const stop of theme.gradient) {
    if (stop.threshold > percent) return stop.color;
  }
  return theme.gradientFloor;
}

/**
 * Color text with a theme color (foreground) and reset afterwards
 */
export function paint(theme: ResolvedTheme, text: string, color: Color): string {
  return colorize(text, fgCode(color, theme.truecolor));
}

/**
 * Color text with a theme role
 */
export function paintRole(theme: ResolvedTheme, text: string, role: ThemeRole): string {
  return paint(theme, text, resolveRole(theme, role));
}

/**
 * Whether the terminal advertises 24-bit color
 */
export function isTruecolorTerminal(env: NodeJS.ProcessEnv = process.env): boolean {
  const colorterm = env.COLORTERM?.toLowerCase();
  return colorterm === 'truecolor' || colorterm === '24bit';
}

/**
 * Decide truecolor emission once at startup
 */
export function resolveTruecolor(mode: ColorMode, env: NodeJS.ProcessEnv = process.env): boolean {
  switch (mode) {
    case 'truecolor':
      return true;
    case '256':
      return false;
    case 'auto':
      return isTruecolorTerminal(env);
  }
}
