/**
 * Pace gauges - render a pace ratio with sub-cell precision
 *
 * vertical: one cell. Behind pace fills from the bottom in the warning tier
 * color. Ahead of pace fills from the top: the bottom-filling glyph is drawn
 * in the empty color over a tier-colored background, so the visible fill is
 * its complement.
 *
 * blocks: an even number of cells split at the center. Ahead grows leftwards
 * from the center, behind grows rightwards. Only one half is ever filled.
 */

import type { Color, GaugeStyle, ResolvedTheme } from '../types.js';
import { RESET, bgCode, fgCode } from './colors.js';
import { classifyPace, tierRole } from './pace.js';
import { resolveRole } from './theme.js';

/** Bottom-filling eighths, index 0 = one eighth */
export const VERTICAL_GLYPHS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'] as const;

/** Left-filling eighths, index 0 = blank, 8 = full */
export const PARTIAL_GLYPHS = [' ', '▏', '▎', '▍', '▌', '▋', '▊', '▉', '█'] as const;

export const DEFAULT_MAX_GAUGE_WIDTH = 128;

export interface CellLayout {
  full: number;
  /** Eighths in the partial cell (0 when there is none) */
  partial: number;
  empty: number;
}

export interface BlockLayout {
  halfWidth: number;
  /** Ahead side, drawn right-to-left from the center */
  left: CellLayout;
  /** Behind side, drawn left-to-right from the center */
  right: CellLayout;
}

export interface GaugeOptions {
  width: number;
  maxWidth?: number;
}

function toRatio(ratio: number): number {
  if (Number.isNaN(ratio)) return 1;
  // Both halves saturate at a magnitude of 1
  return Math.min(2, Math.max(0, ratio));
}

function eighthIndex(magnitude: number): number {
  return Math.min(7, Math.max(0, Math.floor(Math.min(1, magnitude) * 7.99)));
}

/**
 * Split `magnitude` (0-1) of `cells` into full cells, one partial and blanks
 */
export function layoutCells(magnitude: number, cells: number): CellLayout {
  const clamped = Number.isFinite(magnitude) ? Math.min(1, Math.max(0, magnitude)) : 0;
  const units = Math.round(clamped * cells * 8);
  const full = Math.floor(units / 8);
  const partial = units % 8;
  const empty = cells - full - (partial > 0 ? 1 : 0);
  return { full, partial, empty };
}

/**
 * Round down to even and clamp to [2, maxWidth]
 */
export function normalizeGaugeWidth(width: number, maxWidth = DEFAULT_MAX_GAUGE_WIDTH): number {
  const bound = Math.max(2, Math.floor(maxWidth) - (Math.floor(maxWidth) % 2));
  const floored = Number.isFinite(width) ? Math.floor(width) : 2;
  const even = floored - (floored % 2);
  return Math.min(bound, Math.max(2, even));
}

export function layoutBlockGauge(
  ratio: number,
  width: number,
  maxWidth = DEFAULT_MAX_GAUGE_WIDTH
): BlockLayout {
  const r = toRatio(ratio);
  const halfWidth = normalizeGaugeWidth(width, maxWidth) / 2;
  return {
    halfWidth,
    left: layoutCells(r >= 1 ? r - 1 : 0, halfWidth),
    right: layoutCells(r < 1 ? 1 - r : 0, halfWidth),
  };
}

function tierColor(theme: ResolvedTheme, ratio: number): Color {
  return resolveRole(theme, tierRole(classifyPace(ratio)));
}

export function renderVerticalGauge(ratio: number, theme: ResolvedTheme): string {
  const r = toRatio(ratio);
  const fill = tierColor(theme, r);
  const empty = resolveRole(theme, 'gaugeEmpty');
  const tc = theme.truecolor;

  if (r >= 1) {
    const index = eighthIndex(r - 1);
    if (index === 0) {
      return `${bgCode(fill, tc)} ${RESET}`;
    }
    return `${bgCode(fill, tc)}${fgCode(empty, tc)}${VERTICAL_GLYPHS[7 - index]}${RESET}`;
  }

  const index = eighthIndex(1 - r);
  return `${bgCode(empty, tc)}${fgCode(fill, tc)}${VERTICAL_GLYPHS[index]}${RESET}`;
}

export function renderBlockGauge(
  ratio: number,
  width: number,
  theme: ResolvedTheme,
  maxWidth = DEFAULT_MAX_GAUGE_WIDTH
): string {
  const r = toRatio(ratio);
  const { left, right } = layoutBlockGauge(r, width, maxWidth);
  const fill = tierColor(theme, r);
  const empty = resolveRole(theme, 'gaugeEmpty');
  const bg = (color: Color): string => bgCode(color, theme.truecolor);
  const fg = (color: Color): string => fgCode(color, theme.truecolor);

  let output = '';

  if (left.empty > 0) output += `${bg(empty)}${' '.repeat(left.empty)}`;
  // Right-aligned partial: left-filling glyph in the empty color over the fill
  if (left.partial > 0) output += `${bg(fill)}${fg(empty)}${PARTIAL_GLYPHS[8 - left.partial]}`;
  if (left.full > 0) output += `${bg(fill)}${' '.repeat(left.full)}`;

  if (right.full > 0) output += `${bg(fill)}${' '.repeat(right.full)}`;
  if (right.partial > 0) output += `${bg(empty)}${fg(fill)}${PARTIAL_GLYPHS[right.partial]}`;
  if (right.empty > 0) output += `${bg(empty)}${' '.repeat(right.empty)}`;

  return `${output}${RESET}`;
}

/**
 * Render the configured gauge style for a pace ratio
 */
export function renderPaceGauge(
  style: GaugeStyle,
  ratio: number,
  theme: ResolvedTheme,
  options: GaugeOptions
): string {
  switch (style) {
    case 'vertical':
      return renderVerticalGauge(ratio, theme);
    case 'blocks':
      return renderBlockGauge(ratio, options.width, theme, options.maxWidth);
    case 'none':
      return '';
  }
}
