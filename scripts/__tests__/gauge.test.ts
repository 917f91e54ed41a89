import { describe, it, expect } from 'vitest';
import {
  layoutBlockGauge,
  layoutCells,
  normalizeGaugeWidth,
  renderBlockGauge,
  renderPaceGauge,
  renderVerticalGauge,
} from '../utils/gauge.js';
import { classifyPace, tierRole } from '../utils/pace.js';
import { renderProgressBar } from '../utils/progress-bar.js';
import { resolveTheme } from '../utils/theme.js';

const theme = resolveTheme({ name: 'default', truecolor: false });
const truecolorTheme = resolveTheme({ name: 'default', truecolor: true });

const R = '\x1b[0m';
const bg = (index: number): string => `\x1b[48;5;${index}m`;
const fg = (index: number): string => `\x1b[38;5;${index}m`;

// default theme palette indices
const EMPTY = 237;
const AHEAD = 80;
const ON_TRACK = 114;
const CAUTION = 221;
const CRITICAL = 203;

function visible(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

describe('classifyPace', () => {
  it('should band ratios into four tiers', () => {
    expect(classifyPace(2)).toBe('ahead');
    expect(classifyPace(4 / 3)).toBe('ahead');
    expect(classifyPace(1.33)).toBe('onTrack');
    expect(classifyPace(1)).toBe('onTrack');
    expect(classifyPace(0.99)).toBe('caution');
    expect(classifyPace(0.75)).toBe('caution');
    expect(classifyPace(0.7499)).toBe('critical');
    expect(classifyPace(0)).toBe('critical');
  });

  it('should map each tier to its theme role', () => {
    expect(tierRole('ahead')).toBe('paceAhead');
    expect(tierRole('onTrack')).toBe('paceOnTrack');
    expect(tierRole('caution')).toBe('paceCaution');
    expect(tierRole('critical')).toBe('paceCritical');
  });
});

describe('renderVerticalGauge', () => {
  it('should fill from the bottom in the critical color when far behind', () => {
    expect(renderVerticalGauge(0.5, theme)).toBe(`${bg(EMPTY)}${fg(CRITICAL)}▄${R}`);
    expect(renderVerticalGauge(0, theme)).toBe(`${bg(EMPTY)}${fg(CRITICAL)}█${R}`);
  });

  it('should use the caution color when slightly behind', () => {
    expect(renderVerticalGauge(0.9, theme)).toBe(`${bg(EMPTY)}${fg(CAUTION)}▁${R}`);
    expect(renderVerticalGauge(0.8, theme)).toBe(`${bg(EMPTY)}${fg(CAUTION)}▂${R}`);
  });

  it('should render a fully inverted cell exactly on pace', () => {
    expect(renderVerticalGauge(1, theme)).toBe(`${bg(ON_TRACK)} ${R}`);
  });

  it('should fill from the top by inverting the complement glyph when ahead', () => {
    // ahead 0.2 -> index 1 -> complement glyph index 6
    expect(renderVerticalGauge(1.2, theme)).toBe(`${bg(ON_TRACK)}${fg(EMPTY)}▇${R}`);
    // ahead 0.5 -> index 3 -> complement glyph index 4
    expect(renderVerticalGauge(1.5, theme)).toBe(`${bg(AHEAD)}${fg(EMPTY)}▅${R}`);
  });

  it('should saturate far ahead of pace', () => {
    expect(renderVerticalGauge(2.5, theme)).toBe(`${bg(AHEAD)}${fg(EMPTY)}▁${R}`);
  });

  it('should emit rgb codes in truecolor mode', () => {
    expect(renderVerticalGauge(0.5, truecolorTheme)).toBe(
      `\x1b[48;2;58;58;58m\x1b[38;2;255;95;95m▄${R}`
    );
  });

  it('should be idempotent', () => {
    expect(renderVerticalGauge(0.63, theme)).toBe(renderVerticalGauge(0.63, theme));
  });
});

describe('normalizeGaugeWidth', () => {
  it('should round down to even and clamp', () => {
    expect(normalizeGaugeWidth(7)).toBe(6);
    expect(normalizeGaugeWidth(8)).toBe(8);
    expect(normalizeGaugeWidth(1)).toBe(2);
    expect(normalizeGaugeWidth(0)).toBe(2);
    expect(normalizeGaugeWidth(-3)).toBe(2);
    expect(normalizeGaugeWidth(Number.NaN)).toBe(2);
    expect(normalizeGaugeWidth(200)).toBe(128);
  });

  it('should respect a configured bound', () => {
    expect(normalizeGaugeWidth(200, 40)).toBe(40);
    expect(normalizeGaugeWidth(12, 9)).toBe(8);
  });
});

describe('layoutCells', () => {
  it('should decompose eighths into full, partial and empty cells', () => {
    expect(layoutCells(0.25, 10)).toEqual({ full: 2, partial: 4, empty: 7 });
    expect(layoutCells(1, 4)).toEqual({ full: 4, partial: 0, empty: 0 });
    expect(layoutCells(0, 4)).toEqual({ full: 0, partial: 0, empty: 4 });
  });

  it('should clamp magnitudes outside 0-1', () => {
    expect(layoutCells(3, 2)).toEqual({ full: 2, partial: 0, empty: 0 });
    expect(layoutCells(-1, 2)).toEqual({ full: 0, partial: 0, empty: 2 });
  });
});

describe('renderBlockGauge', () => {
  it('should fill the right half from the center when behind', () => {
    expect(renderBlockGauge(0.5, 4, theme)).toBe(
      `${bg(EMPTY)}  ${bg(CRITICAL)} ${bg(EMPTY)} ${R}`
    );
    expect(renderBlockGauge(0, 4, theme)).toBe(`${bg(EMPTY)}  ${bg(CRITICAL)}  ${R}`);
  });

  it('should draw a left-to-right partial glyph on the behind side', () => {
    // behind ~0.1 of 4 cells -> 3 eighths
    expect(renderBlockGauge(0.9, 8, theme)).toBe(
      `${bg(EMPTY)}    ${bg(EMPTY)}${fg(CAUTION)}▍${bg(EMPTY)}   ${R}`
    );
  });

  it('should draw an inverted partial glyph on the ahead side', () => {
    // ahead 0.25 of 2 cells -> 4 eighths, drawn as a half block inverted
    expect(renderBlockGauge(1.25, 4, theme)).toBe(
      `${bg(EMPTY)} ${bg(ON_TRACK)}${fg(EMPTY)}▌${bg(EMPTY)}  ${R}`
    );
  });

  it('should fill the left half toward the edge when far ahead', () => {
    expect(renderBlockGauge(2, 4, theme)).toBe(`${bg(AHEAD)}  ${bg(EMPTY)}  ${R}`);
  });

  it('should leave both halves empty exactly on pace', () => {
    expect(renderBlockGauge(1, 6, theme)).toBe(`${bg(EMPTY)}   ${bg(EMPTY)}   ${R}`);
  });

  it('should normalize odd widths', () => {
    expect(visible(renderBlockGauge(0.5, 5, theme))).toHaveLength(4);
  });

  it('should always produce exactly `width` cells', () => {
    for (let step = 0; step <= 200; step++) {
      const ratio = step / 100;
      for (let width = 2; width <= 128; width += 2) {
        const { halfWidth, left, right } = layoutBlockGauge(ratio, width);
        expect(halfWidth * 2).toBe(width);
        expect(left.full + (left.partial > 0 ? 1 : 0) + left.empty).toBe(halfWidth);
        expect(right.full + (right.partial > 0 ? 1 : 0) + right.empty).toBe(halfWidth);
        expect(visible(renderBlockGauge(ratio, width, theme))).toHaveLength(width);
      }
    }
  });

  it('should only ever fill one half', () => {
    for (let step = 0; step <= 200; step++) {
      const { left, right } = layoutBlockGauge(step / 100, 16);
      const leftFilled = left.full > 0 || left.partial > 0;
      const rightFilled = right.full > 0 || right.partial > 0;
      expect(leftFilled && rightFilled).toBe(false);
    }
  });

  it('should be idempotent', () => {
    expect(renderBlockGauge(0.42, 10, theme)).toBe(renderBlockGauge(0.42, 10, theme));
  });
});

describe('renderPaceGauge', () => {
  it('should dispatch on style', () => {
    expect(renderPaceGauge('vertical', 0.5, theme, { width: 8 })).toBe(renderVerticalGauge(0.5, theme));
    expect(renderPaceGauge('blocks', 0.5, theme, { width: 8 })).toBe(renderBlockGauge(0.5, 8, theme));
    expect(renderPaceGauge('none', 0.5, theme, { width: 8 })).toBe('');
  });

  it('should pass the width bound through', () => {
    const output = renderPaceGauge('blocks', 0.5, theme, { width: 64, maxWidth: 10 });
    expect(visible(output)).toHaveLength(10);
  });
});

describe('renderProgressBar', () => {
  it('should fill left to right with partial eighths in the gradient color', () => {
    expect(renderProgressBar(25, theme, 10)).toBe(`${bg(EMPTY)}${fg(ON_TRACK)}██▌       ${R}`);
    expect(renderProgressBar(73, theme, 4)).toBe(`${bg(EMPTY)}${fg(215)}██▉ ${R}`);
  });

  it('should render empty and full bars', () => {
    expect(renderProgressBar(0, theme, 5)).toBe(`${bg(EMPTY)}${fg(ON_TRACK)}     ${R}`);
    expect(renderProgressBar(100, theme, 5)).toBe(`${bg(EMPTY)}${fg(CRITICAL)}█████${R}`);
  });
});
