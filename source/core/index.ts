/**
 * Fuzzy matching and ranking core.
 *
 * Pure functions of (query, candidate) plus a tuning table. The free
 * functions below use the default tuning; construct a Scorer with
 * createScoreConfig() for another one.
 */

import {defaultScorer} from './scorer.js';
import type {CandidateInput} from './types.js';

export {
	SCORE_MAX,
	SCORE_MIN,
	DEFAULT_SCORE_CONFIG,
	createScoreConfig,
	type ScoreConfig,
} from './config.js';
export {foldChar, toChars} from './case-fold.js';
export {characterBonus, computeBonus} from './bonus.js';
export {hasMatch} from './match.js';
export {prepareCandidate, prepareCandidates} from './prepare.js';
export {
	Scorer,
	defaultScorer,
	outcomeScore,
	outcomePositions,
	type EvaluateOptions,
} from './scorer.js';
export {rank, compareResults, type RankOptions} from './rank.js';
export {
	search,
	calculateParallelism,
	DEFAULT_PARALLELISM,
	type SearchOptions,
} from './search.js';
export {isAbortError, createAbortError} from './abort.js';
export type {
	CandidateInput,
	MatchOutcome,
	PreparedCandidate,
	RankedResult,
} from './types.js';

/**
 * Score a candidate with the default tuning. SCORE_MIN for no match,
 * SCORE_MAX for an exact match.
 */
export function score(query: string, candidate: CandidateInput): number {
	return defaultScorer.score(query, candidate);
}

/**
 * Matched character indices with the default tuning, null for no match.
 */
export function locate(
	query: string,
	candidate: CandidateInput,
): number[] | null {
	return defaultScorer.locate(query, candidate);
}
