/**
 * Positional bonuses - How much a match at each candidate position is worth,
 * based on the boundary it sits on.
 */

import {isLowercase, isUppercase} from './case-fold.js';
import type {ScoreConfig} from './config.js';

/** Predecessor of the first character */
const START_OF_STRING = '/';

const WORD_SEPARATORS = new Set(['-', '_', ' ']);

/**
 * Bonus for matching `current` when it follows `previous`.
 *
 * Separator boundaries take precedence over camelCase boundaries:
 * slash, then dot, then word separators, then capitals.
 */
export function characterBonus(
	current: string,
	previous: string,
	config: Readonly<ScoreConfig>,
): number {
	if (previous === '/') return config.matchSlash;
	if (previous === '.') return config.matchDot;
	if (WORD_SEPARATORS.has(previous)) return config.matchWord;
	if (isLowercase(previous) && isUppercase(current)) {
		return config.matchCapital;
	}
	return 0;
}

/**
 * Compute the bonus for every position of a candidate (original case).
 */
export function computeBonus(
	chars: readonly string[],
	config: Readonly<ScoreConfig>,
): Float64Array {
	const bonus = new Float64Array(chars.length);
	let previous = START_OF_STRING;

	chars.forEach((current, i) => {
		bonus[i] = characterBonus(current, previous, config);
		previous = current;
	});

	return bonus;
}
