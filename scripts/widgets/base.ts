/**
 * Base widget interface and types
 */

import type { WidgetContext, WidgetData, WidgetId } from '../types.js';

/**
 * Widget interface - every status line segment implements this
 */
export interface Widget<T extends WidgetData = WidgetData> {
  /** Unique widget identifier */
  readonly id: WidgetId;

  /** Human-readable widget name */
  readonly name: string;

  /**
   * Collect data for this widget
   * @returns Widget data or null if unavailable
   */
  getData(ctx: WidgetContext): Promise<T | null>;

  /**
   * Render widget data to a formatted string
   * @param data - Widget data from getData()
   * @param ctx - Widget context for theme, translations and config
   */
  render(data: T, ctx: WidgetContext): string;
}

/**
 * Widget render result
 */
export interface WidgetRenderResult {
  id: WidgetId;
  output: string;
}
