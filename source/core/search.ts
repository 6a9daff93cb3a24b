/**
 * Search - Chunked, cancellable ranking.
 *
 * Candidates are split into contiguous chunks, each scored in its own task
 * behind a p-limit queue of one. A task yields to the event loop before
 * scoring, and the next yield is only scheduled once the previous chunk is
 * done, so pending I/O (keystrokes) runs between chunks and an aborted
 * search stops at the next chunk boundary.
 */

import {setImmediate as yieldToEventLoop} from 'node:timers/promises';
import pLimit from 'p-limit';
import {throwIfAborted} from './abort.js';
import {compareResults, scoreSlice, type RankOptions} from './rank.js';
import {prepareQuery} from './scorer.js';
import type {CandidateInput, RankedResult} from './types.js';

export interface SearchOptions extends RankOptions {
	/** Upper bound on the number of chunks (default: 4) */
	parallelism?: number;
	/** Abort to discard the search; the promise then rejects */
	signal?: AbortSignal;
}

export const DEFAULT_PARALLELISM = 4;

function ceilDiv(a: number, b: number): number {
	return Math.ceil(a / b);
}

/**
 * Number of chunks to split a search into.
 *
 * Ramps up with the candidate count so that small sets are not split
 * needlessly. An empty query matches everything and is never split.
 */
export function calculateParallelism(
	candidateCount: number,
	configured: number,
	emptyQuery: boolean,
): number {
	if (emptyQuery) {
		return 1;
	}

	let ramped: number;
	if (candidateCount < 17) {
		ramped = ceilDiv(candidateCount, 4);
	} else if (candidateCount > 32) {
		ramped = ceilDiv(candidateCount, 8);
	} else {
		ramped = 4;
	}

	return Math.max(1, Math.min(configured, ramped, candidateCount));
}

/**
 * Rank candidates in chunks. Resolves to the same list as rank().
 */
export async function search(
	query: string,
	candidates: readonly CandidateInput[],
	options: SearchOptions = {},
): Promise<RankedResult[]> {
	const {signal, parallelism = DEFAULT_PARALLELISM} = options;
	throwIfAborted(signal, 'search');

	const folded = prepareQuery(query);
	const chunkCount = calculateParallelism(
		candidates.length,
		parallelism,
		folded.length === 0,
	);
	const chunkSize = Math.max(1, ceilDiv(candidates.length, chunkCount));
	// One chunk per event-loop turn
	const limit = pLimit(1);

	const tasks: Array<Promise<RankedResult[]>> = [];
	for (let offset = 0; offset < candidates.length; offset += chunkSize) {
		const chunk = candidates.slice(offset, offset + chunkSize);
		tasks.push(
			limit(async () => {
				await yieldToEventLoop();
				throwIfAborted(signal, 'search');
				return scoreSlice(folded, chunk, offset, options);
			}),
		);
	}

	const results = (await Promise.all(tasks)).flat();
	throwIfAborted(signal, 'search');

	results.sort(compareResults);
	return options.limit === undefined
		? results
		: results.slice(0, options.limit);
}
