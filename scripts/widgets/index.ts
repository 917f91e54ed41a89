/**
 * Widget registry and orchestrator
 */

import type { Widget, WidgetRenderResult } from './base.js';
import type { WidgetId, WidgetContext, Config } from '../types.js';
import { DISPLAY_PRESETS } from '../types.js';
import { debugLog } from '../utils/debug.js';
import { paintRole } from '../utils/theme.js';

// Widget imports
import { modelWidget } from './model.js';
import { contextWidget } from './context.js';
import { costWidget } from './cost.js';
import { rateLimit5hWidget, rateLimit7dWidget, rateLimit7dSonnetWidget } from './rate-limit.js';

/**
 * Widget registry - maps widget IDs to widget implementations
 */
const widgetRegistry: Record<WidgetId, Widget> = {
  model: modelWidget,
  context: contextWidget,
  cost: costWidget,
  rateLimit5h: rateLimit5hWidget,
  rateLimit7d: rateLimit7dWidget,
  rateLimit7dSonnet: rateLimit7dSonnetWidget,
};

/**
 * Get widget by ID
 */
export function getWidget(id: WidgetId): Widget {
  return widgetRegistry[id];
}

/**
 * Get lines configuration based on display mode
 */
export function getLines(config: Config): WidgetId[][] {
  if (config.displayMode === 'custom') {
    return config.lines ?? DISPLAY_PRESETS.compact;
  }
  return DISPLAY_PRESETS[config.displayMode];
}

/**
 * Render a single widget
 */
async function renderWidget(
  widgetId: WidgetId,
  ctx: WidgetContext
): Promise<WidgetRenderResult | null> {
  const widget = getWidget(widgetId);

  try {
    const data = await widget.getData(ctx);
    if (!data) {
      return null;
    }

    const output = widget.render(data, ctx);
    return { id: widgetId, output };
  } catch (error) {
    // Graceful degradation - skip failed widgets, but log for debugging
    debugLog('widget', `Widget '${widgetId}' failed`, error);
    return null;
  }
}

/**
 * Render a line of widgets
 */
async function renderLine(
  widgetIds: WidgetId[],
  ctx: WidgetContext
): Promise<string> {
  const results = await Promise.all(
    widgetIds.map((id) => renderWidget(id, ctx))
  );

  const separator = ` ${paintRole(ctx.theme, '│', 'separator')} `;
  const outputs = results
    .filter((r): r is WidgetRenderResult => r !== null && r.output.length > 0)
    .map((r) => r.output);

  return outputs.join(separator);
}

/**
 * Render all lines based on configuration
 */
export async function renderAllLines(ctx: WidgetContext): Promise<string[]> {
  const lines = getLines(ctx.config);
  const renderedLines: string[] = [];

  for (const lineWidgets of lines) {
    const rendered = await renderLine(lineWidgets, ctx);
    if (rendered.length > 0) {
      renderedLines.push(rendered);
    }
  }

  return renderedLines;
}

/**
 * Format final output with multiple lines
 */
export async function formatOutput(ctx: WidgetContext): Promise<string> {
  const lines = await renderAllLines(ctx);
  return lines.join('\n');
}
