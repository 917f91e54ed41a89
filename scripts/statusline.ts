#!/usr/bin/env node

/**
 * paceline status line
 * Displays model, context usage, and pace of the rolling usage budgets
 */

import type { StdinInput, WidgetContext } from './types.js';
import { loadConfig } from './utils/config.js';
import { debugLog } from './utils/debug.js';
import { getTranslations } from './utils/i18n.js';
import { paintRole, resolveTheme, resolveTruecolor } from './utils/theme.js';
import { formatOutput } from './widgets/index.js';

function isStdinInput(value: unknown): value is StdinInput {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read and parse stdin JSON
 */
async function readStdin(): Promise<StdinInput | null> {
  try {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.from(chunk));
    }
    const content = Buffer.concat(chunks).toString('utf-8');
    const parsed: unknown = JSON.parse(content);
    return isStdinInput(parsed) ? parsed : null;
  } catch (error) {
    debugLog('stdin', 'Failed to parse stdin', error);
    return null;
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  // Load configuration
  const config = await loadConfig();

  // Resolve the theme once; it stays fixed for the rest of the process
  const theme = resolveTheme({
    name: config.theme,
    overrides: config.themeOverrides,
    truecolor: resolveTruecolor(config.colorMode),
  });

  // Read stdin
  const stdin = await readStdin();
  if (!stdin) {
    console.log(paintRole(theme, '⚠️', 'warning'));
    return;
  }

  // Create widget context; every widget shares this render pass's clock
  const ctx: WidgetContext = {
    stdin,
    config,
    translations: getTranslations(config),
    theme,
    now: Date.now(),
  };

  // Format output using widget system
  const output = await formatOutput(ctx);

  console.log(output);
}

// Run
main().catch((error: unknown) => {
  debugLog('main', 'Status line failed', error);
  console.log('⚠️');
});
