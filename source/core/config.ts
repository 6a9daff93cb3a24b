/**
 * Scoring constants - The tuning table shared by the bonus table, the scorer
 * and the locator.
 *
 * A ScoreConfig is frozen at creation and injected into a Scorer, so
 * alternate tunings never leak between scorers.
 */

// ============================================================================
// Sentinels
// ============================================================================

/** Score given when the query does not match the candidate at all. */
export const SCORE_MIN = Number.NEGATIVE_INFINITY;

/** Score given when the query matches the whole candidate. */
export const SCORE_MAX = Number.POSITIVE_INFINITY;

// ============================================================================
// Tuning Table
// ============================================================================

export interface ScoreConfig {
	/** Per character skipped before the first match */
	gapLeading: number;
	/** Per character between two matched characters */
	gapInner: number;
	/** Per character after the last match */
	gapTrailing: number;
	/** Matched character directly after the previous matched character */
	matchConsecutive: number;
	/** Matched character after '/' (or at the start of the candidate) */
	matchSlash: number;
	/** Matched character after '-', '_' or ' ' */
	matchWord: number;
	/** Uppercase matched character after a lowercase one */
	matchCapital: number;
	/** Matched character after '.' */
	matchDot: number;
}

export const DEFAULT_SCORE_CONFIG: Readonly<ScoreConfig> = Object.freeze({
	gapLeading: -0.005,
	gapInner: -0.01,
	gapTrailing: -0.005,
	matchConsecutive: 1.0,
	matchSlash: 0.9,
	matchWord: 0.8,
	matchCapital: 0.7,
	matchDot: 0.6,
});

const SCORE_KEYS: ReadonlyArray<keyof ScoreConfig> = [
	'gapLeading',
	'gapInner',
	'gapTrailing',
	'matchConsecutive',
	'matchSlash',
	'matchWord',
	'matchCapital',
	'matchDot',
];

/**
 * Create a frozen tuning table from the defaults and the given overrides.
 *
 * @throws RangeError if an override is not a finite number
 */
export function createScoreConfig(
	overrides: Partial<ScoreConfig> = {},
): Readonly<ScoreConfig> {
	const config: ScoreConfig = {...DEFAULT_SCORE_CONFIG};

	for (const key of SCORE_KEYS) {
		const value = overrides[key];
		if (value === undefined) continue;
		if (!Number.isFinite(value)) {
			throw new RangeError(`Score constant "${key}" must be finite`);
		}
		config[key] = value;
	}

	return Object.freeze(config);
}
