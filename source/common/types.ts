/**
 * Terminal dimensions for resize handling.
 */
export type TerminalDimensions = {
	rows: number;
	columns: number;
};

/**
 * App status for the status bar.
 */
export type AppStatus =
	| {state: 'ready'; elapsedMs: number}
	| {state: 'searching'}
	| {state: 'warning'; message: string}
	| {state: 'error'; message: string};

/**
 * Match counts for the status bar.
 */
export type MatchStats = {
	matched: number;
	total: number;
};
