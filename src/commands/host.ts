import type { TreepackConfig } from '../config.js';
import type { TreepackContext } from '../types.js';

/**
 * What a command needs from the program that hosts it.
 */
export type CommandHost = {
  /** Runs a command body; a false outcome makes the process exit with 1 */
  run: (task: () => Promise<boolean>) => Promise<void>;
  /** Configuration from the global options, environment and defaults */
  config: () => TreepackConfig;
  /** Context over that configuration, opened on first use */
  context: () => TreepackContext;
};

/**
 * Splits a comma-separated option value, dropping empty items.
 */
export function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(',').map(item => item.trim()).filter(Boolean);
  return items.length ? items : undefined;
}
