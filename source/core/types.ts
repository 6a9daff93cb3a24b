/**
 * Shared core types.
 */

/**
 * A candidate split and folded once, reusable across queries.
 */
export interface PreparedCandidate {
	/** Original line */
	text: string;
	/** Code points of the original line */
	chars: readonly string[];
	/** Case-folded code points, same length as chars */
	folded: readonly string[];
}

export type CandidateInput = string | PreparedCandidate;

/**
 * Result of comparing one query against one candidate.
 *
 * - no-match: the candidate does not contain the query in order
 * - exact: the candidate equals the query after folding
 * - matched: scored alignment, with positions when they were requested
 */
export type MatchOutcome =
	| {kind: 'no-match'}
	| {kind: 'exact'; positions: number[]}
	| {kind: 'matched'; score: number; positions?: number[]};

/**
 * One entry of a ranked list.
 */
export interface RankedResult {
	candidate: string;
	/** Position of the candidate in the input sequence */
	index: number;
	score: number;
	/** Matched character indices (code points), when requested */
	positions?: number[];
}
