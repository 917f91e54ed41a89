/**
 * Debug utilities for paceline
 *
 * Enable debug logging by setting DEBUG=paceline or DEBUG=1
 */

const DEBUG =
  process.env.DEBUG === 'paceline' ||
  process.env.DEBUG === '1' ||
  process.env.DEBUG === 'true';

/**
 * Log debug message if DEBUG is enabled
 */
export function debugLog(context: string, message: string, error?: unknown): void {
  if (!DEBUG) return;

  const timestamp = new Date().toISOString();
  const prefix = `[paceline:${context}]`;

  // stdout belongs to the status line, so everything goes to stderr
  if (error) {
    console.error(`${timestamp} ${prefix} ${message}`, error);
  } else {
    console.error(`${timestamp} ${prefix} ${message}`);
  }
}

