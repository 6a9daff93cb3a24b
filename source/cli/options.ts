/**
 * Resolve command-line flags and user settings into run options.
 */

import type {ScoreConfig} from '../core/index.js';
import type {Settings} from '../lib/settings.js';

// ============================================================================
// Exit Codes
// ============================================================================

/** At least one candidate matched, or a candidate was selected */
export const EXIT_OK = 0;
/** No candidate matched, or the picker was cancelled */
export const EXIT_NO_MATCH = 1;
/** Bad flags or settings */
export const EXIT_USAGE = 2;

// ============================================================================
// Types
// ============================================================================

export type CliFlags = {
	query?: string;
	showMatches?: string;
	lines?: number;
	showScores?: boolean;
	parallelism?: number;
	prompt?: string;
	benchmark?: number;
	highlight?: boolean;
};

export type CliMode = 'batch' | 'benchmark' | 'interactive';

export type CliOptions = {
	mode: CliMode;
	query: string;
	lines: number;
	showScores: boolean;
	highlight: boolean;
	parallelism: number;
	prompt: string;
	benchmark: number;
	scoring: Partial<ScoreConfig>;
};

/**
 * Invalid command-line usage.
 */
export class UsageError extends Error {
	constructor(
		message: string,
		readonly exitCode: number = EXIT_USAGE,
	) {
		super(message);
		this.name = 'UsageError';
	}
}

function requireInteger(name: string, value: number, min: number): number {
	if (!Number.isInteger(value) || value < min) {
		throw new UsageError(`--${name} must be an integer >= ${min}`);
	}
	return value;
}

/**
 * Merge flags over settings. Flags win.
 *
 * @throws UsageError for out-of-range numbers or a benchmark without a query
 */
export function resolveOptions(flags: CliFlags, settings: Settings): CliOptions {
	const query = flags.query ?? flags.showMatches ?? '';
	const benchmark = requireInteger('benchmark', flags.benchmark ?? 0, 0);

	if (benchmark > 0 && query === '') {
		throw new UsageError(
			'To benchmark, provide a query with one of the -q/-e/--query/--show-matches flags',
			EXIT_NO_MATCH,
		);
	}

	let mode: CliMode = 'interactive';
	if (benchmark > 0) {
		mode = 'benchmark';
	} else if (query !== '') {
		mode = 'batch';
	}

	return {
		mode,
		query,
		lines: requireInteger('lines', flags.lines ?? settings.lines, 1),
		showScores: flags.showScores ?? settings.showScores,
		highlight: flags.highlight ?? false,
		parallelism: requireInteger(
			'parallelism',
			flags.parallelism ?? settings.parallelism,
			1,
		),
		prompt: flags.prompt ?? settings.prompt,
		benchmark,
		scoring: settings.scoring,
	};
}
