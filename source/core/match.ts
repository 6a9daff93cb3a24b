import {foldChars, toChars} from './case-fold.js';

/**
 * Check whether folded candidate characters contain the folded query
 * characters in order.
 */
export function hasMatchChars(
	query: readonly string[],
	candidate: readonly string[],
): boolean {
	if (query.length > candidate.length) return false;

	let cursor = 0;
	for (let i = 0; i < candidate.length && cursor < query.length; i++) {
		if (candidate[i] === query[cursor]) {
			cursor++;
		}
	}
	return cursor === query.length;
}

/**
 * Return true if the candidate contains every character of the query in
 * order, ignoring case and contiguity.
 */
export function hasMatch(query: string, candidate: string): boolean {
	return hasMatchChars(
		foldChars(toChars(query)),
		foldChars(toChars(candidate)),
	);
}
