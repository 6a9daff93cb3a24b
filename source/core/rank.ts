/**
 * Ranker - Match, score and order a candidate set best-first.
 */

import {SCORE_MIN} from './config.js';
import {toPrepared} from './prepare.js';
import {
	defaultScorer,
	outcomeScore,
	prepareQuery,
	type Scorer,
} from './scorer.js';
import type {CandidateInput, RankedResult} from './types.js';

export interface RankOptions {
	/** Scorer to use (defaults to the default tuning table) */
	scorer?: Scorer;
	/** Attach matched positions to every result */
	positions?: boolean;
	/** Keep only the best N results */
	limit?: number;
}

/**
 * Best-first order: higher score first, input order on ties.
 */
export function compareResults(a: RankedResult, b: RankedResult): number {
	if (a.score !== b.score) {
		return a.score > b.score ? -1 : 1;
	}
	return a.index - b.index;
}

/**
 * Score a contiguous slice of candidates, keeping input indices.
 * Results are unsorted.
 */
export function scoreSlice(
	query: readonly string[],
	candidates: readonly CandidateInput[],
	offset: number,
	options: RankOptions = {},
): RankedResult[] {
	const scorer = options.scorer ?? defaultScorer;
	const results: RankedResult[] = [];

	candidates.forEach((input, i) => {
		const candidate = toPrepared(input);
		const outcome = scorer.evaluatePrepared(query, candidate, {
			locate: options.positions,
		});
		const score = outcomeScore(outcome);
		if (score === SCORE_MIN) return;

		const result: RankedResult = {
			candidate: candidate.text,
			index: offset + i,
			score,
		};
		if (options.positions && outcome.kind !== 'no-match') {
			result.positions = outcome.positions ?? [];
		}
		results.push(result);
	});

	return results;
}

/**
 * Rank candidates against a query. Non-matching candidates are dropped.
 */
export function rank(
	query: string,
	candidates: readonly CandidateInput[],
	options: RankOptions = {},
): RankedResult[] {
	const results = scoreSlice(prepareQuery(query), candidates, 0, options);
	results.sort(compareResults);
	return options.limit === undefined
		? results
		: results.slice(0, options.limit);
}
