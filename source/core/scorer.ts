/**
 * Scorer - Optimal alignment score of a query within a candidate.
 *
 * Two tables are filled row by row, one row per query character:
 * - D[j][i]: best score with query[j] matched exactly at candidate[i]
 * - M[j][i]: best score with query[0..j] placed within candidate[0..i]
 *
 * Scoring alone keeps two rolling rows. Locating keeps every row so the
 * matched positions can be recovered by backtracking.
 */

import {computeBonus} from './bonus.js';
import {foldChars, toChars} from './case-fold.js';
import {
	DEFAULT_SCORE_CONFIG,
	SCORE_MAX,
	SCORE_MIN,
	type ScoreConfig,
} from './config.js';
import {hasMatchChars} from './match.js';
import {toPrepared} from './prepare.js';
import type {
	CandidateInput,
	MatchOutcome,
	PreparedCandidate,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface EvaluateOptions {
	/** Recover matched positions (keeps the full tables) */
	locate?: boolean;
}

interface ScoreTables {
	D: Float64Array[];
	M: Float64Array[];
}

/**
 * Map an outcome to the public sentinel convention.
 */
export function outcomeScore(outcome: MatchOutcome): number {
	switch (outcome.kind) {
		case 'no-match':
			return SCORE_MIN;
		case 'exact':
			return SCORE_MAX;
		case 'matched':
			return outcome.score;
	}
}

export function outcomePositions(outcome: MatchOutcome): number[] | null {
	switch (outcome.kind) {
		case 'no-match':
			return null;
		case 'exact':
			return outcome.positions;
		case 'matched':
			return outcome.positions ?? null;
	}
}

/**
 * Fold a query once for repeated evaluation.
 */
export function prepareQuery(query: string): string[] {
	return foldChars(toChars(query));
}

function range(length: number): number[] {
	return Array.from({length}, (_, i) => i);
}

// ============================================================================
// Scorer
// ============================================================================

export class Scorer {
	private readonly bonusCache = new WeakMap<PreparedCandidate, Float64Array>();

	constructor(
		readonly config: Readonly<ScoreConfig> = DEFAULT_SCORE_CONFIG,
	) {}

	hasMatch(query: string, candidate: CandidateInput): boolean {
		return hasMatchChars(prepareQuery(query), toPrepared(candidate).folded);
	}

	/**
	 * Score a candidate. SCORE_MIN for no match, SCORE_MAX for an exact
	 * match.
	 */
	score(query: string, candidate: CandidateInput): number {
		return outcomeScore(this.evaluate(query, candidate));
	}

	/**
	 * Matched character indices, or null when there is no match.
	 */
	locate(query: string, candidate: CandidateInput): number[] | null {
		return outcomePositions(this.evaluate(query, candidate, {locate: true}));
	}

	evaluate(
		query: string,
		candidate: CandidateInput,
		options: EvaluateOptions = {},
	): MatchOutcome {
		return this.evaluatePrepared(
			prepareQuery(query),
			toPrepared(candidate),
			options,
		);
	}

	/**
	 * Evaluate an already folded query against a prepared candidate.
	 */
	evaluatePrepared(
		query: readonly string[],
		candidate: PreparedCandidate,
		options: EvaluateOptions = {},
	): MatchOutcome {
		if (!hasMatchChars(query, candidate.folded)) {
			return {kind: 'no-match'};
		}

		// In-order match of equal length means equal strings
		if (query.length === candidate.folded.length) {
			return {kind: 'exact', positions: range(query.length)};
		}

		if (query.length === 0) {
			return {kind: 'matched', score: 0, positions: []};
		}

		const bonus = this.bonusFor(candidate);

		if (!options.locate) {
			return {
				kind: 'matched',
				score: this.scoreRolling(query, candidate.folded, bonus),
			};
		}

		const tables = this.computeTables(query, candidate.folded, bonus);
		const last = query.length - 1;
		const score = tables.M[last][candidate.folded.length - 1];

		return {
			kind: 'matched',
			score,
			positions: this.backtrack(tables, query.length, candidate.folded.length),
		};
	}

	private bonusFor(candidate: PreparedCandidate): Float64Array {
		let bonus = this.bonusCache.get(candidate);
		if (!bonus) {
			bonus = computeBonus(candidate.chars, this.config);
			this.bonusCache.set(candidate, bonus);
		}
		return bonus;
	}

	/**
	 * Fill row j of both tables from row j-1 (null for the first row).
	 */
	private fillRow(
		j: number,
		query: readonly string[],
		candidate: readonly string[],
		bonus: Float64Array,
		prev: {D: Float64Array; M: Float64Array} | null,
		D: Float64Array,
		M: Float64Array,
	): void {
		const {gapLeading, gapInner, gapTrailing, matchConsecutive} =
			this.config;
		const gap = j === query.length - 1 ? gapTrailing : gapInner;
		const queryChar = query[j];
		let best = SCORE_MIN;

		for (let i = 0; i < candidate.length; i++) {
			if (candidate[i] === queryChar) {
				let score = SCORE_MIN;
				if (!prev) {
					score = i * gapLeading + bonus[i];
				} else if (i > 0) {
					score = Math.max(
						prev.M[i - 1] + bonus[i],
						prev.D[i - 1] + matchConsecutive,
					);
				}
				D[i] = score;
				best = Math.max(score, best + gap);
			} else {
				D[i] = SCORE_MIN;
				best = best + gap;
			}
			M[i] = best;
		}
	}

	private scoreRolling(
		query: readonly string[],
		candidate: readonly string[],
		bonus: Float64Array,
	): number {
		const n = candidate.length;
		let prev: {D: Float64Array; M: Float64Array} | null = null;
		let current = {D: new Float64Array(n), M: new Float64Array(n)};
		let spare = {D: new Float64Array(n), M: new Float64Array(n)};

		for (let j = 0; j < query.length; j++) {
			this.fillRow(j, query, candidate, bonus, prev, current.D, current.M);
			prev = current;
			[current, spare] = [spare, current];
		}

		return prev?.M[n - 1] ?? SCORE_MIN;
	}

	private computeTables(
		query: readonly string[],
		candidate: readonly string[],
		bonus: Float64Array,
	): ScoreTables {
		const n = candidate.length;
		const tables: ScoreTables = {D: [], M: []};
		let prev: {D: Float64Array; M: Float64Array} | null = null;

		for (let j = 0; j < query.length; j++) {
			const row = {D: new Float64Array(n), M: new Float64Array(n)};
			this.fillRow(j, query, candidate, bonus, prev, row.D, row.M);
			tables.D.push(row.D);
			tables.M.push(row.M);
			prev = row;
		}

		return tables;
	}

	/**
	 * Walk back from the last cell. A cell is taken as a match when its D
	 * value produced the M value, or unconditionally when the following
	 * match extended it as a consecutive run.
	 */
	private backtrack({D, M}: ScoreTables, m: number, n: number): number[] {
		const {matchConsecutive} = this.config;
		const positions = new Array<number>(m).fill(-1);
		let matchRequired = false;
		let i = n - 1;

		for (let j = m - 1; j >= 0; j--) {
			const dRow = D[j];
			const mRow = M[j];
			for (; i >= 0; i--) {
				const d = dRow[i];
				if (d !== SCORE_MIN && (matchRequired || d === mRow[i])) {
					matchRequired =
						j > 0 && i > 0 && d === D[j - 1][i - 1] + matchConsecutive;
					positions[j] = i;
					i--;
					break;
				}
			}
		}

		return positions;
	}
}

/**
 * Scorer with the default tuning table.
 */
export const defaultScorer = new Scorer();
