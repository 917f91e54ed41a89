/**
 * Context progress bar - left-to-right fill at eighth-cell precision,
 * colored by the theme gradient
 */

import type { ResolvedTheme } from '../types.js';
import { RESET, bgCode, fgCode } from './colors.js';
import { PARTIAL_GLYPHS, layoutCells } from './gauge.js';
import { resolveGradient, resolveRole } from './theme.js';

export const DEFAULT_BAR_WIDTH = 10;

export function renderProgressBar(
  percent: number,
  theme: ResolvedTheme,
  width = DEFAULT_BAR_WIDTH
): string {
  const cells = Number.isFinite(width) ? Math.max(1, Math.floor(width)) : DEFAULT_BAR_WIDTH;
  const { full, partial, empty } = layoutCells(percent / 100, cells);
  const fill = resolveGradient(theme, percent);
  const background = resolveRole(theme, 'gaugeEmpty');

  return (
    bgCode(background, theme.truecolor) +
    fgCode(fill, theme.truecolor) +
    PARTIAL_GLYPHS[8].repeat(full) +
    (partial > 0 ? PARTIAL_GLYPHS[partial] : '') +
    ' '.repeat(empty) +
    RESET
  );
}
