/**
 * Model widget - displays current Claude model name
 */

import type { Widget } from './base.js';
import type { WidgetContext, ModelData } from '../types.js';
import { shortenModelName } from '../utils/formatters.js';
import { paintRole } from '../utils/theme.js';

export const modelWidget: Widget<ModelData> = {
  id: 'model',
  name: 'Model',

  async getData(ctx: WidgetContext): Promise<ModelData | null> {
    const { model } = ctx.stdin;

    return {
      id: model?.id || '',
      displayName: model?.display_name || '-',
    };
  },

  render(data: ModelData, ctx: WidgetContext): string {
    return paintRole(ctx.theme, `🤖 ${shortenModelName(data.displayName)}`, 'model');
  },
};
