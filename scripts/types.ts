/**
 * Stdin JSON input from Claude Code
 */
export interface StdinInput {
  model: {
    id: string;
    display_name: string;
  };
  workspace: {
    current_dir: string;
  };
  context_window: {
    total_input_tokens: number;
    total_output_tokens: number;
    context_window_size: number;
    current_usage: {
      input_tokens: number;
      output_tokens: number;
      cache_creation_input_tokens: number;
      cache_read_input_tokens: number;
    } | null;
  };
  cost: {
    total_cost_usd: number;
  };
  /** Session ID (informational) */
  session_id?: string;
  /** Rolling usage budgets, already fetched by the host */
  rate_limits?: UsageLimits | null;
}

/**
 * Widget identifiers
 */
export type WidgetId =
  | 'model'
  | 'context'
  | 'cost'
  | 'rateLimit5h'
  | 'rateLimit7d'
  | 'rateLimit7dSonnet';

export const WIDGET_IDS: readonly WidgetId[] = [
  'model',
  'context',
  'cost',
  'rateLimit5h',
  'rateLimit7d',
  'rateLimit7dSonnet',
];

/**
 * Display mode for status line output
 */
export type DisplayMode = 'compact' | 'normal' | 'custom';

/**
 * Preset configurations for each display mode
 *
 * compact: everything on one line
 * normal: session on the first line, usage budgets on the second
 */
export const DISPLAY_PRESETS: Record<Exclude<DisplayMode, 'custom'>, WidgetId[][]> = {
  compact: [
    ['model', 'context', 'cost', 'rateLimit5h', 'rateLimit7d'],
  ],
  normal: [
    ['model', 'context', 'cost'],
    ['rateLimit5h', 'rateLimit7d', 'rateLimit7dSonnet'],
  ],
};

export type GaugeStyle = 'vertical' | 'blocks' | 'none';

export type ColorMode = 'auto' | 'truecolor' | '256';

/**
 * User configuration stored in ~/.claude/paceline.local.json
 */
export interface Config {
  language: 'en' | 'ko' | 'auto';
  /** Display mode: preset (compact/normal) or custom */
  displayMode: DisplayMode;
  /** Custom line configuration (only used when displayMode is 'custom') */
  lines?: WidgetId[][];
  /** Built-in theme name */
  theme: string;
  /** Sparse role -> hex color overrides applied on top of `theme` */
  themeOverrides: Record<string, string>;
  colorMode: ColorMode;
  gauge: {
    style: GaugeStyle;
    /** Cell width of the blocks gauge (rounded down to even) */
    width: number;
    maxWidth: number;
  };
  contextBarWidth: number;
  /** Append the raw pace ratio after each usage gauge */
  showPaceRatio: boolean;
  forecast: ForecastSettings;
}

/**
 * Tuning knobs for the depletion forecast
 */
export interface ForecastSettings {
  /** Elapsed hours at which observed and on-track rates are trusted equally */
  halfTrustHours: number;
  /** Exponent of the days-until-reset term in the relevance filter */
  relevanceExponent: number;
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Config = {
  language: 'auto',
  displayMode: 'compact',
  theme: 'default',
  themeOverrides: {},
  colorMode: 'auto',
  gauge: {
    style: 'vertical',
    width: 8,
    maxWidth: 128,
  },
  contextBarWidth: 10,
  showPaceRatio: false,
  forecast: {
    halfTrustHours: 16,
    relevanceExponent: 1.4,
  },
};

/**
 * Translations interface
 */
export interface Translations {
  labels: {
    '5h': string;
    '7d': string;
    '7d_sonnet': string;
  };
  time: {
    days: string;
    hours: string;
    minutes: string;
  };
  /**
   * Forecast message templates. `{reset}`, `{early}` and `{depletion}` are
   * replaced with formatted durations.
   */
  forecast: {
    soon: string;
    soonWithReset: string;
    pace: string;
    countdown: string;
    countdownWithWait: string;
  };
}

export interface UsageLimit {
  utilization: number;
  resets_at: string | null;
}

/**
 * Rolling usage budgets as reported by the usage endpoint
 */
export interface UsageLimits {
  five_hour: UsageLimit | null;
  seven_day: UsageLimit | null;
  seven_day_sonnet: UsageLimit | null;
}

/**
 * Widget context passed to all widgets
 */
export interface WidgetContext {
  stdin: StdinInput;
  config: Config;
  translations: Translations;
  theme: ResolvedTheme;
  /** Wall clock for this render pass (ms since epoch), shared by every widget */
  now: number;
}

/**
 * Widget data types for each widget
 */
export interface ModelData {
  id: string;
  displayName: string;
}

export interface ContextData {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  contextSize: number;
  percentage: number;
}

export interface CostData {
  totalCostUsd: number;
}

export interface RateLimitData {
  /** Rounded utilization (0-100) */
  utilization: number;
  /** Reset instant in seconds since epoch */
  resetAt: number | null;
  /** Pace and depletion forecast, absent when the reset instant is unknown */
  pace: PaceForecast | null;
  isError?: boolean;
}

/**
 * Union type of all widget data
 */
export type WidgetData = ModelData | ContextData | CostData | RateLimitData;

// Color and theme model

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/**
 * A color with a 256-palette fallback. `rgb` is null when only the palette
 * index may be used.
 */
export interface Color {
  rgb: Rgb | null;
  fallback: number;
}

export type ThemeRole =
  | 'model'
  | 'cost'
  | 'label'
  | 'muted'
  | 'separator'
  | 'warning'
  | 'gaugeEmpty'
  | 'paceAhead'
  | 'paceOnTrack'
  | 'paceCaution'
  | 'paceCritical';

export const THEME_ROLES: readonly ThemeRole[] = [
  'model',
  'cost',
  'label',
  'muted',
  'separator',
  'warning',
  'gaugeEmpty',
  'paceAhead',
  'paceOnTrack',
  'paceCaution',
  'paceCritical',
];

export interface GradientStop {
  /** Exclusive upper bound (percent) of this stop's bucket */
  threshold: number;
  color: Color;
}

export interface ThemeSpec {
  roles: Record<ThemeRole, Color>;
  /** Sorted by strictly increasing threshold; the last threshold exceeds 100 */
  gradient: GradientStop[];
  /** Used above the last threshold */
  gradientFloor: Color;
}

export interface ResolvedTheme {
  readonly name: string;
  readonly truecolor: boolean;
  readonly roles: Readonly<Record<ThemeRole, Color>>;
  readonly gradient: readonly GradientStop[];
  readonly gradientFloor: Color;
}

// Pace and forecast model

/**
 * Qualitative pace band, shared by gauges and text
 */
export type PaceTier = 'ahead' | 'onTrack' | 'caution' | 'critical';

/**
 * How a depletion forecast is worded
 * - soon: budget gone within the hour, talk about the reset instead
 * - countdown: time until exhausted, plus the wait after it
 * - pace: too far out for a countdown, only how much sooner than scheduled
 */
export type ForecastMode = 'soon' | 'countdown' | 'pace';

/**
 * One rolling budget, built fresh per render
 */
export interface UsageWindow {
  windowSeconds: number;
  /** Consumed so far (0-100, clamped on use) */
  utilizationPct: number;
  /** Reset instant in seconds since epoch */
  resetAt: number;
}

export interface DepletionForecast {
  secondsToDepletion: number;
  secondsUntilReset: number;
  /** How much earlier than the reset the budget runs out */
  secondsEarly: number;
  mode: ForecastMode;
}

export interface PaceForecast {
  /** Remaining budget fraction over remaining time fraction; 1.0 is on schedule */
  ratio: number;
  tier: PaceTier;
  depletion: DepletionForecast | null;
}
