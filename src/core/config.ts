/**
 * Process-wide DataTable settings.
 *
 * ```ts
 * import { configureDataTables } from 'report-datatable/core';
 *
 * configureDataTables({ debug: true });   // log overflow, serialization, filters
 * setMaximumDepthLevelAllowedAtLeast(20); // allow deeper report trees
 * ```
 */

export interface DataTableConfig {
  /** Maximum sub-table nesting depth before traversals fail */
  maxDepth: number;
  /** Enable console logging for debugging */
  debug: boolean;
}

export const MAX_DEPTH_DEFAULT = 15;

const DEFAULT_CONFIG: DataTableConfig = {
  maxDepth: MAX_DEPTH_DEFAULT,
  debug: false,
};

let currentConfig: DataTableConfig = { ...DEFAULT_CONFIG };

/** Current settings (read-only snapshot) */
export function getDataTableConfig(): Readonly<DataTableConfig> {
  return currentConfig;
}

/** Merge settings into the current configuration */
export function configureDataTables(config: Partial<DataTableConfig>): void {
  currentConfig = { ...currentConfig, ...config };
}

/** Restore defaults (for testing) */
export function resetDataTableConfig(): void {
  currentConfig = { ...DEFAULT_CONFIG };
}

/**
 * Raise the maximum nesting level to at least `level`.
 * Never lowers it, and never lets it drop below 1.
 */
export function setMaximumDepthLevelAllowedAtLeast(level: number): void {
  const maxDepth = Math.max(1, level, currentConfig.maxDepth);
  currentConfig = { ...currentConfig, maxDepth };
}

/** Debug logger used across the package */
export function debugLog(scope: string, message: string): void {
  if (currentConfig.debug) {
    console.log(`[${scope}] ${message}`);
  }
}
