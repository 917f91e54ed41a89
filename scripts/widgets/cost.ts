/**
 * Cost widget - displays session cost in USD
 */

import type { Widget } from './base.js';
import type { WidgetContext, CostData } from '../types.js';
import { formatCost } from '../utils/formatters.js';
import { paintRole } from '../utils/theme.js';

export const costWidget: Widget<CostData> = {
  id: 'cost',
  name: 'Cost',

  async getData(ctx: WidgetContext): Promise<CostData | null> {
    const { cost } = ctx.stdin;

    return {
      totalCostUsd: cost?.total_cost_usd ?? 0,
    };
  },

  render(data: CostData, ctx: WidgetContext): string {
    return paintRole(ctx.theme, formatCost(data.totalCostUsd), 'cost');
  },
};
