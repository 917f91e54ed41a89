/**
 * User configuration loading with mtime-based cache
 */

import { readFile, stat } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';

import type { ColorMode, Config, DisplayMode, GaugeStyle, WidgetId } from '../types.js';
import { DEFAULT_CONFIG, WIDGET_IDS } from '../types.js';
import { debugLog } from './debug.js';

export const CONFIG_PATH = join(homedir(), '.claude', 'paceline.local.json');

const DISPLAY_MODES: readonly DisplayMode[] = ['compact', 'normal', 'custom'];
const GAUGE_STYLES: readonly GaugeStyle[] = ['vertical', 'blocks', 'none'];
const COLOR_MODES: readonly ColorMode[] = ['auto', 'truecolor', '256'];
const LANGUAGES: readonly Config['language'][] = ['en', 'ko', 'auto'];

/**
 * Cached config with mtime-based invalidation
 */
let configCache: {
  path: string;
  config: Config;
  mtime: number;
} | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick<T extends string>(allowed: readonly T[], value: unknown, fallback: T): T {
  return allowed.find((item) => item === value) ?? fallback;
}

function positiveNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}

function parseLines(value: unknown): WidgetId[][] | undefined {
  if (!Array.isArray(value)) return undefined;

  const lines: WidgetId[][] = [];
  for (const line of value) {
    if (!Array.isArray(line)) continue;
    const ids: WidgetId[] = [];
    for (const item of line) {
      const id = WIDGET_IDS.find((known) => known === item);
      if (id) {
        ids.push(id);
      } else {
        debugLog('config', `Unknown widget '${String(item)}' ignored`);
      }
    }
    if (ids.length > 0) lines.push(ids);
  }
  return lines.length > 0 ? lines : undefined;
}

function parseOverrides(value: unknown): Record<string, string> {
  if (!isRecord(value)) return {};

  const overrides: Record<string, string> = {};
  for (const [role, hex] of Object.entries(value)) {
    if (typeof hex === 'string') overrides[role] = hex;
  }
  return overrides;
}

/**
 * Merge raw user JSON over the defaults, field by field.
 * Invalid fields keep their default value.
 */
export function normalizeConfig(raw: unknown): Config {
  if (!isRecord(raw)) return DEFAULT_CONFIG;

  const gauge: Record<string, unknown> = isRecord(raw.gauge) ? raw.gauge : {};
  const forecast: Record<string, unknown> = isRecord(raw.forecast) ? raw.forecast : {};
  const lines = parseLines(raw.lines);

  const config: Config = {
    language: pick(LANGUAGES, raw.language, DEFAULT_CONFIG.language),
    displayMode: pick(DISPLAY_MODES, raw.displayMode, DEFAULT_CONFIG.displayMode),
    theme: typeof raw.theme === 'string' ? raw.theme : DEFAULT_CONFIG.theme,
    themeOverrides: parseOverrides(raw.themeOverrides),
    colorMode: pick(COLOR_MODES, raw.colorMode, DEFAULT_CONFIG.colorMode),
    gauge: {
      style: pick(GAUGE_STYLES, gauge.style, DEFAULT_CONFIG.gauge.style),
      width: positiveNumber(gauge.width, DEFAULT_CONFIG.gauge.width),
      maxWidth: positiveNumber(gauge.maxWidth, DEFAULT_CONFIG.gauge.maxWidth),
    },
    contextBarWidth: positiveNumber(raw.contextBarWidth, DEFAULT_CONFIG.contextBarWidth),
    showPaceRatio:
      typeof raw.showPaceRatio === 'boolean' ? raw.showPaceRatio : DEFAULT_CONFIG.showPaceRatio,
    forecast: {
      halfTrustHours: positiveNumber(forecast.halfTrustHours, DEFAULT_CONFIG.forecast.halfTrustHours),
      relevanceExponent: positiveNumber(
        forecast.relevanceExponent,
        DEFAULT_CONFIG.forecast.relevanceExponent
      ),
    },
  };

  if (lines) config.lines = lines;

  // Custom mode without usable lines falls back to the compact preset
  if (config.displayMode === 'custom' && !config.lines) {
    debugLog('config', "displayMode 'custom' without lines, using compact");
    config.displayMode = 'compact';
  }

  return config;
}

/**
 * Load user configuration, re-reading only when the file's mtime changes
 */
export async function loadConfig(path: string = CONFIG_PATH): Promise<Config> {
  try {
    // Check mtime for cache invalidation
    const fileStat = await stat(path);
    const mtime = fileStat.mtimeMs;

    // Return cached if mtime matches
    if (configCache?.path === path && configCache.mtime === mtime) {
      return configCache.config;
    }

    const content = await readFile(path, 'utf-8');
    const raw: unknown = JSON.parse(content);
    const config = normalizeConfig(raw);

    // Cache result
    configCache = { path, config, mtime };
    return config;
  } catch (error) {
    const isNotFound =
      error instanceof Error && 'code' in error && error.code === 'ENOENT';
    if (!isNotFound) {
      debugLog('config', `Failed to load ${path}`, error);
    }
    return DEFAULT_CONFIG;
  }
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  configCache = null;
}
