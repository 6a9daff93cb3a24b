/**
 * Logger - File-based logging with daily rotation.
 *
 * Entries go to {home}/logs/YYYY-MM-DD.log. The directory is created on the
 * first entry that passes the level filter, so quiet runs leave no files.
 */

import fs from 'node:fs';
import path from 'node:path';
import {getLogsDir} from './constants.js';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogThreshold = LogLevel | 'silent';

export interface Logger {
	debug(component: string, message: string, data?: object): void;
	info(component: string, message: string, data?: object): void;
	warn(component: string, message: string, data?: object): void;
	error(component: string, message: string, error?: Error): void;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
};

// ============================================================================
// Formatting
// ============================================================================

/**
 * Get the path to today's log file.
 */
export function getLogPath(date: Date = new Date()): string {
	const day = date.toISOString().split('T')[0]; // YYYY-MM-DD
	return path.join(getLogsDir(), `${day}.log`);
}

/**
 * Format a log entry.
 */
export function formatEntry(
	level: LogLevel,
	component: string,
	message: string,
	extra?: object | Error,
	now: Date = new Date(),
): string {
	const timestamp = now.toISOString();
	const levelStr = level.toUpperCase().padEnd(5);
	let entry = `[${timestamp}] [${levelStr}] ${component}: ${message}`;

	if (extra) {
		if (extra instanceof Error) {
			entry += `\n  Error: ${extra.message}`;
			if (extra.stack) {
				entry += `\n  Stack: ${extra.stack}`;
			}
		} else {
			entry += `\n  ${JSON.stringify(extra)}`;
		}
	}

	return entry;
}

// ============================================================================
// Logger Implementations
// ============================================================================

/**
 * Create a logger that appends entries at or above `threshold` to the daily
 * log file.
 */
export function createLogger(threshold: LogThreshold = 'warn'): Logger {
	function enabled(level: LogLevel): boolean {
		return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
	}

	let failed = false;

	function write(level: LogLevel, entry: string) {
		if (!enabled(level) || failed) return;
		try {
			fs.mkdirSync(getLogsDir(), {recursive: true});
			fs.appendFileSync(getLogPath(), entry + '\n');
		} catch (error) {
			// Logging must not take the CLI down; report once and stop
			failed = true;
			const reason = error instanceof Error ? error.message : String(error);
			process.stderr.write(`fuzzrank: logging disabled (${reason})\n`);
		}
	}

	return {
		debug(component: string, message: string, data?: object) {
			write('debug', formatEntry('debug', component, message, data));
		},

		info(component: string, message: string, data?: object) {
			write('info', formatEntry('info', component, message, data));
		},

		warn(component: string, message: string, data?: object) {
			write('warn', formatEntry('warn', component, message, data));
		},

		error(component: string, message: string, error?: Error) {
			write('error', formatEntry('error', component, message, error));
		},
	};
}

/**
 * Create a no-op logger for testing or when logging is disabled.
 */
export function createNullLogger(): Logger {
	return {
		debug() {},
		info() {},
		warn() {},
		error() {},
	};
}
