/**
 * Rate limit widgets - usage, pace gauge and depletion forecast for the
 * 5h and 7d budgets
 */

import type { Widget } from './base.js';
import type { WidgetContext, RateLimitData, Translations, UsageLimits } from '../types.js';
import { buildForecastMessage, forecastWindow } from '../utils/forecast.js';
import { formatTimeRemaining, parseResetTime } from '../utils/formatters.js';
import { renderPaceGauge } from '../utils/gauge.js';
import { tierRole } from '../utils/pace.js';
import { paint, paintRole, resolveGradient, resolveRole } from '../utils/theme.js';

type LabelKey = keyof Translations['labels'];
type LimitKey = keyof UsageLimits;

const HOUR_SECONDS = 3600;
const DAY_SECONDS = 24 * HOUR_SECONDS;

/**
 * Length of each rolling window
 */
export const WINDOW_SECONDS: Record<LimitKey, number> = {
  five_hour: 5 * HOUR_SECONDS,
  seven_day: 7 * DAY_SECONDS,
  seven_day_sonnet: 7 * DAY_SECONDS,
};

function renderRateLimit(data: RateLimitData, ctx: WidgetContext, labelKey: LabelKey): string {
  const { theme, translations: t, config } = ctx;

  if (data.isError) {
    return paintRole(theme, '⚠️', 'warning');
  }

  // Pace tier drives every color in this segment once a pace is known
  const color = data.pace
    ? resolveRole(theme, tierRole(data.pace.tier))
    : resolveGradient(theme, data.utilization);

  const parts = [
    `${paintRole(theme, `${t.labels[labelKey]}:`, 'label')} ${paint(theme, `${data.utilization}%`, color)}`,
  ];

  if (data.pace) {
    const gauge = renderPaceGauge(config.gauge.style, data.pace.ratio, theme, config.gauge);
    if (gauge) parts.push(gauge);
    if (config.showPaceRatio) parts.push(paint(theme, data.pace.ratio.toFixed(2), color));
  }

  if (data.resetAt !== null) {
    const remaining = formatTimeRemaining(data.resetAt * 1000, ctx.now, t);
    parts.push(paintRole(theme, `(${remaining})`, 'muted'));
  }

  if (data.pace?.depletion) {
    const message = buildForecastMessage(data.pace.depletion, t);
    if (message) parts.push(paint(theme, message, color));
  }

  return parts.join(' ');
}

/**
 * Build widget data for one window, forecasting against the shared `now`
 */
export function getLimitData(ctx: WidgetContext, key: LimitKey): RateLimitData | null {
  const limit = ctx.stdin.rate_limits?.[key];
  if (!limit) return null;

  if (typeof limit.utilization !== 'number' || !Number.isFinite(limit.utilization)) {
    return { utilization: 0, resetAt: null, pace: null, isError: true };
  }

  const utilization = Math.min(100, Math.max(0, limit.utilization));
  const resetAt = parseResetTime(limit.resets_at);
  const pace =
    resetAt === null
      ? null
      : forecastWindow(
          { windowSeconds: WINDOW_SECONDS[key], utilizationPct: utilization, resetAt },
          ctx.now / 1000,
          ctx.config.forecast
        );

  return {
    utilization: Math.round(utilization),
    resetAt,
    pace,
  };
}

/**
 * 5-hour rate limit widget
 */
export const rateLimit5hWidget: Widget<RateLimitData> = {
  id: 'rateLimit5h',
  name: '5h Rate Limit',

  async getData(ctx: WidgetContext): Promise<RateLimitData | null> {
    return getLimitData(ctx, 'five_hour');
  },

  render(data: RateLimitData, ctx: WidgetContext): string {
    return renderRateLimit(data, ctx, '5h');
  },
};

/**
 * 7-day rate limit widget
 */
export const rateLimit7dWidget: Widget<RateLimitData> = {
  id: 'rateLimit7d',
  name: '7d Rate Limit',

  async getData(ctx: WidgetContext): Promise<RateLimitData | null> {
    return getLimitData(ctx, 'seven_day');
  },

  render(data: RateLimitData, ctx: WidgetContext): string {
    return renderRateLimit(data, ctx, '7d');
  },
};

/**
 * 7-day Sonnet-only rate limit widget
 */
export const rateLimit7dSonnetWidget: Widget<RateLimitData> = {
  id: 'rateLimit7dSonnet',
  name: '7d Sonnet Rate Limit',

  async getData(ctx: WidgetContext): Promise<RateLimitData | null> {
    return getLimitData(ctx, 'seven_day_sonnet');
  },

  render(data: RateLimitData, ctx: WidgetContext): string {
    return renderRateLimit(data, ctx, '7d_sonnet');
  },
};
