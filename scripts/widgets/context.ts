/**
 * Context widget - displays progress bar, percentage, and token count
 */

import type { Widget } from './base.js';
import type { WidgetContext, ContextData } from '../types.js';
import { formatTokens, calculatePercent } from '../utils/formatters.js';
import { renderProgressBar } from '../utils/progress-bar.js';
import { paint, paintRole, resolveGradient } from '../utils/theme.js';

const DEFAULT_CONTEXT_SIZE = 200000;

export const contextWidget: Widget<ContextData> = {
  id: 'context',
  name: 'Context',

  async getData(ctx: WidgetContext): Promise<ContextData | null> {
    const { context_window } = ctx.stdin;
    const usage = context_window?.current_usage;
    const contextSize = context_window?.context_window_size || DEFAULT_CONTEXT_SIZE;

    if (!usage) {
      // Return default values when no usage data
      return {
        inputTokens: 0,
        outputTokens: 0,
        totalTokens: 0,
        contextSize,
        percentage: 0,
      };
    }

    const inputTokens =
      usage.input_tokens +
      usage.cache_creation_input_tokens +
      usage.cache_read_input_tokens;
    const outputTokens = usage.output_tokens;

    return {
      inputTokens,
      outputTokens,
      totalTokens: inputTokens + outputTokens,
      contextSize,
      percentage: calculatePercent(inputTokens, contextSize),
    };
  },

  render(data: ContextData, ctx: WidgetContext): string {
    const { theme, config } = ctx;

    const bar = renderProgressBar(data.percentage, theme, config.contextBarWidth);
    const percent = paint(theme, `${data.percentage}%`, resolveGradient(theme, data.percentage));
    const tokens = `${formatTokens(data.inputTokens)}/${formatTokens(data.contextSize)}`;

    return `${bar} ${percent} ${paintRole(theme, tokens, 'muted')}`;
  },
};
