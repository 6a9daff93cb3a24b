import {foldChars, toChars} from './case-fold.js';
import type {CandidateInput, PreparedCandidate} from './types.js';

/**
 * Split and fold a candidate once.
 */
export function prepareCandidate(text: string): PreparedCandidate {
	const chars = toChars(text);
	return {text, chars, folded: foldChars(chars)};
}

export function prepareCandidates(
	lines: readonly string[],
): PreparedCandidate[] {
	return lines.map(prepareCandidate);
}

export function toPrepared(candidate: CandidateInput): PreparedCandidate {
	return typeof candidate === 'string'
		? prepareCandidate(candidate)
		: candidate;
}
