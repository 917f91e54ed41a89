/**
 * Usage forecast - pace ratio and depletion prediction for rolling budgets
 *
 * The pace ratio compares the share of budget left with the share of time
 * left. When a window is behind pace, the observed consumption rate is
 * blended with the on-track rate using a hyperbolic confidence weight
 * (elapsed / (halfTrust + elapsed)), so early-window bursts are damped.
 * A relevance filter then drops predictions whose margin before the reset
 * is small compared to how far away the reset still is.
 */

import type {
  DepletionForecast,
  ForecastMode,
  ForecastSettings,
  PaceForecast,
  Translations,
  UsageWindow,
} from '../types.js';
import { classifyPace } from './pace.js';

const MINUTE = 60;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

/** Below this share of remaining time the ratio is no longer divided out */
export const MIN_REMAINING_TIME_PCT = 0.1;

/** Depletion closer than this is worded around the reset */
export const SOON_SECONDS = HOUR;

/** Depletion this far out only reports how much earlier than the reset */
export const PACE_ONLY_SECONDS = 48 * HOUR;

/** Durations shorter than this are not displayed */
export const MIN_DISPLAY_SECONDS = 30 * MINUTE;

/** Gaps before the reset longer than this are mentioned in countdowns */
export const WAIT_MENTION_SECONDS = HOUR;

export const DEFAULT_FORECAST_SETTINGS: ForecastSettings = {
  halfTrustHours: 16,
  relevanceExponent: 1.4,
};

function clampPercent(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

/**
 * Remaining budget share divided by remaining time share.
 * 1.0 means the budget runs out exactly at the reset.
 */
export function computePaceRatio(
  elapsedSeconds: number,
  windowSeconds: number,
  utilizationPct: number
): number {
  const remainingBudgetPct = 100 - clampPercent(utilizationPct);
  const elapsedPct = windowSeconds > 0 ? clampPercent((elapsedSeconds / windowSeconds) * 100) : 100;
  const remainingTimePct = 100 - elapsedPct;

  if (remainingTimePct > MIN_REMAINING_TIME_PCT) {
    return remainingBudgetPct / remainingTimePct;
  }
  // Window is over: leftover budget is far ahead, none left ends together with it
  return remainingBudgetPct > 0 ? 2.0 : 1.0;
}

/**
 * Whether `secondsEarly` is a large enough margin to be worth reporting.
 * Requires (daysUntilReset ^ exponent) hours, so distant resets need a wide
 * margin and nearby ones almost none.
 */
export function passesRelevanceFilter(
  secondsEarly: number,
  secondsUntilReset: number,
  exponent: number
): boolean {
  if (!(secondsUntilReset > 0)) return false;
  const daysUntilReset = secondsUntilReset / DAY;
  return secondsEarly >= Math.pow(daysUntilReset, exponent) * HOUR;
}

export function selectForecastMode(secondsToDepletion: number): ForecastMode {
  if (secondsToDepletion < SOON_SECONDS) return 'soon';
  if (secondsToDepletion >= PACE_ONLY_SECONDS) return 'pace';
  return 'countdown';
}

export interface DepletionInput {
  elapsedSeconds: number;
  windowSeconds: number;
  utilizationPct: number;
  secondsUntilReset: number;
}

/**
 * Predict when a behind-pace window runs dry, or null when it will not run
 * out meaningfully before its reset.
 */
export function computeDepletion(
  input: DepletionInput,
  settings: ForecastSettings = DEFAULT_FORECAST_SETTINGS
): DepletionForecast | null {
  const { elapsedSeconds, windowSeconds, secondsUntilReset } = input;
  const utilization = clampPercent(input.utilizationPct);

  const ratio = computePaceRatio(elapsedSeconds, windowSeconds, utilization);
  if (!(ratio < 1)) return null;
  if (!(elapsedSeconds > 0) || utilization < 1) return null;

  const observedRate = utilization / elapsedSeconds;
  const onTrackRate = 100 / windowSeconds;
  const halfTrustSeconds = Math.max(0, settings.halfTrustHours) * HOUR;
  const confidence = elapsedSeconds / (halfTrustSeconds + elapsedSeconds);
  const effectiveRate = observedRate * confidence + onTrackRate * (1 - confidence);

  if (!(effectiveRate > onTrackRate)) return null;

  const secondsToDepletion = (100 - utilization) / effectiveRate;
  const secondsEarly = secondsUntilReset - secondsToDepletion;
  if (!(secondsEarly > 0)) return null;

  if (!passesRelevanceFilter(secondsEarly, secondsUntilReset, settings.relevanceExponent)) {
    return null;
  }

  return {
    secondsToDepletion,
    secondsUntilReset,
    secondsEarly,
    mode: selectForecastMode(secondsToDepletion),
  };
}

/**
 * Pace ratio, tier and depletion forecast for one window at `nowSeconds`
 */
export function forecastWindow(
  window: UsageWindow,
  nowSeconds: number,
  settings: ForecastSettings = DEFAULT_FORECAST_SETTINGS
): PaceForecast {
  const windowStart = window.resetAt - window.windowSeconds;
  const elapsedSeconds = nowSeconds - windowStart;
  const ratio = computePaceRatio(elapsedSeconds, window.windowSeconds, window.utilizationPct);

  return {
    ratio,
    tier: classifyPace(ratio),
    depletion: computeDepletion(
      {
        elapsedSeconds,
        windowSeconds: window.windowSeconds,
        utilizationPct: window.utilizationPct,
        secondsUntilReset: window.resetAt - nowSeconds,
      },
      settings
    ),
  };
}

/**
 * Format a forecast duration. Under 30 minutes yields ''.
 * Examples: 1800 -> "30 m", 7200 -> "2 h", 90000 -> "1 d", 129600 -> "1.5 d"
 */
export function formatForecastDuration(seconds: number, units: Translations['time']): string {
  if (!(seconds >= MIN_DISPLAY_SECONDS)) return '';

  const minutes = Math.round(seconds / MINUTE);
  if (minutes < 60) return `${minutes} ${units.minutes}`;

  const hours = Math.round(seconds / HOUR);
  if (hours < 24) return `${hours} ${units.hours}`;

  const days = (seconds / DAY).toFixed(1).replace(/\.0$/, '');
  return `${days} ${units.days}`;
}

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

/**
 * Human-readable forecast. Empty when a required duration is too short to show.
 */
export function buildForecastMessage(depletion: DepletionForecast, t: Translations): string {
  const reset = formatForecastDuration(depletion.secondsUntilReset, t.time);
  const early = formatForecastDuration(depletion.secondsEarly, t.time);
  const remaining = formatForecastDuration(depletion.secondsToDepletion, t.time);

  switch (depletion.mode) {
    case 'soon':
      return reset ? fill(t.forecast.soonWithReset, { reset }) : t.forecast.soon;
    case 'pace':
      return early ? fill(t.forecast.pace, { early }) : '';
    case 'countdown':
      if (!remaining) return '';
      if (depletion.secondsEarly > WAIT_MENTION_SECONDS && early) {
        return fill(t.forecast.countdownWithWait, { depletion: remaining, early });
      }
      return fill(t.forecast.countdown, { depletion: remaining });
  }
}
