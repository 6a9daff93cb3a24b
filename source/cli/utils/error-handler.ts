/**
 * CLI Error Handler
 *
 * Centralized error handling for the CLI with logging to:
 * - Console (stderr) - immediate visibility
 * - {home}/logs/ - persistent log with daily rotation
 *
 * Usage:
 * ```typescript
 * import {handleCliError} from './utils/error-handler.js';
 *
 * try {
 *   await someOperation();
 * } catch (error) {
 *   handleCliError('ComponentName', error, logger);
 * }
 * ```
 */

import {isAbortError} from '../../core/index.js';
import type {Logger} from '../../lib/logger.js';
import {SettingsError} from '../../lib/settings.js';
import {EXIT_USAGE, UsageError} from '../options.js';

/**
 * Handle a CLI error with full logging.
 *
 * Expected errors print their message only and stay out of the log file.
 * Anything else prints with its stack and is logged.
 *
 * @param component - Component or context name (e.g., 'Batch', 'RankedResults')
 * @param error - The error that occurred
 * @param logger - Optional logger instance (null before settings are loaded)
 * @param options - Optional configuration
 */
export function handleCliError(
	component: string,
	error: unknown,
	logger?: Logger | null,
	options?: {
		/** If true, don't log to console (the terminal belongs to the UI) */
		skipConsole?: boolean;
		/** Additional context to include in logs */
		context?: Record<string, unknown>;
	},
): void {
	const message = error instanceof Error ? error.message : String(error);
	const expected = isExpectedError(error);

	// Tier 1: Console
	if (!options?.skipConsole) {
		if (expected) {
			console.error(`fuzzrank: ${message}`);
		} else {
			console.error(`fuzzrank: ${component}:`, error);
		}
	}

	// Tier 2: Persistent log file
	if (logger && !expected) {
		logger.error(
			component,
			message,
			error instanceof Error ? error : new Error(message),
		);
		if (options?.context) {
			logger.debug(component, 'Error context', options.context);
		}
	}
}

/**
 * Check if an error is expected (bad usage, bad settings, discarded search).
 */
export function isExpectedError(error: unknown): boolean {
	return (
		error instanceof UsageError ||
		error instanceof SettingsError ||
		isAbortError(error)
	);
}

/**
 * Exit code for an error that reached the top level.
 */
export function exitCodeFor(error: unknown): number {
	if (error instanceof UsageError) return error.exitCode;
	return EXIT_USAGE;
}
