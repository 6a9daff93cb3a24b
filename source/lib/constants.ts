/**
 * Constants - Paths and environment variables.
 */

import os from 'node:os';
import path from 'node:path';

// ============================================================================
// Environment
// ============================================================================

/**
 * Environment variable to override the fuzzrank home directory.
 */
export const FUZZRANK_HOME_ENV = 'FUZZRANK_HOME';

/**
 * Environment variable to override the configured log level.
 */
export const FUZZRANK_LOG_LEVEL_ENV = 'FUZZRANK_LOG_LEVEL';

// ============================================================================
// Directory Paths
// ============================================================================

/**
 * Get the fuzzrank home directory.
 *
 * Default: ~/.config/fuzzrank
 * Override: $FUZZRANK_HOME
 * Linux (conventional): $XDG_CONFIG_HOME/fuzzrank
 */
export function getHomeDir(): string {
	const override = process.env[FUZZRANK_HOME_ENV]?.trim();
	if (override) return override;

	const xdg = process.env['XDG_CONFIG_HOME']?.trim();
	if (xdg) return path.join(xdg, 'fuzzrank');

	return path.join(os.homedir(), '.config', 'fuzzrank');
}

/**
 * Get the path to the settings file.
 */
export function getSettingsPath(): string {
	return path.join(getHomeDir(), 'config.json');
}

/**
 * Get the logs directory.
 */
export function getLogsDir(): string {
	return path.join(getHomeDir(), 'logs');
}
